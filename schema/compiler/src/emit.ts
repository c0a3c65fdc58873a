/**
 * Output files for one compiled schema file, shared by the CLI and the
 * watcher.
 */

import { mkdirSync, readFileSync, writeFileSync } from "fs";
import { basename, extname, join } from "path";
import { compile, type CompilerOptions } from "./index.js";
import type { CompilerOutput, SchemaFormat } from "./types.js";
import {
  formatDiagnostic,
  SchemaValidationException,
} from "./validation-errors.js";

export interface OutputFiles {
  up: string;
  down: string;
  repository: string;
  manifest: string;
}

export function formatForFile(inputFile: string): SchemaFormat {
  return extname(inputFile) === ".json" ? "json" : "yaml";
}

export function outputFiles(inputFile: string, outputDir: string): OutputFiles {
  const baseName = basename(inputFile, extname(inputFile));
  return {
    up: join(outputDir, `${baseName}.up.sql`),
    down: join(outputDir, `${baseName}.down.sql`),
    repository: join(outputDir, `${baseName}.repository.json`),
    manifest: join(outputDir, `${baseName}.manifest.json`),
  };
}

function toJSON(value: unknown): string {
  return JSON.stringify(value, null, 2) + "\n";
}

/**
 * Read, compile and write every artifact. Throws whatever `compile` throws;
 * nothing is written in that case.
 */
export function compileFile(
  inputFile: string,
  outputDir: string,
  options: CompilerOptions = {}
): { output: CompilerOutput; files: OutputFiles } {
  const content = readFileSync(inputFile, "utf-8");
  const output = compile(content, formatForFile(inputFile), options);
  const files = outputFiles(inputFile, outputDir);

  mkdirSync(outputDir, { recursive: true });
  writeFileSync(files.up, output.migrations.up);
  writeFileSync(files.down, output.migrations.down);
  writeFileSync(
    files.repository,
    toJSON({
      entities: output.entities.flatMap((e) => (e.repository ? [e.repository] : [])),
    })
  );
  writeFileSync(files.manifest, toJSON(output.manifest));

  return { output, files };
}

/** Lines to print for a failed compilation */
export function describeFailure(error: unknown, inputFile: string): string[] {
  if (error instanceof SchemaValidationException) {
    return error.errors.map((d) => formatDiagnostic(d, inputFile));
  }
  return [`Error: ${error instanceof Error ? error.message : String(error)}`];
}
