#!/usr/bin/env node
/**
 * Entity SQL generator CLI
 *
 * Usage:
 *   entity-sqlgen <input.yaml> [output-dir] [--strict]
 */

import { dirname } from "path";
import { compileFile, describeFailure } from "./emit.js";
import { formatDiagnostic } from "./validation-errors.js";

function main() {
  const args = process.argv.slice(2);
  const strict = args.includes("--strict");
  const positional = args.filter((arg) => !arg.startsWith("--"));

  if (positional.length === 0) {
    console.error("Usage: entity-sqlgen <input.yaml|input.json> [output-dir] [--strict]");
    console.error("");
    console.error("Examples:");
    console.error("  entity-sqlgen schema.yaml");
    console.error("  entity-sqlgen schema.json ./generated --strict");
    process.exit(1);
  }

  const inputFile = positional[0];
  const outputDir = positional[1] || dirname(inputFile);

  try {
    console.log(`Compiling ${inputFile}...`);
    const { output, files } = compileFile(inputFile, outputDir, { strict });

    for (const warning of output.warnings) {
      console.warn(formatDiagnostic(warning, inputFile));
    }

    console.log(`✓ Generated up migration: ${files.up}`);
    console.log(`✓ Generated down migration: ${files.down}`);
    console.log(`✓ Generated repositories: ${files.repository}`);
    console.log(`✓ Generated manifest: ${files.manifest}`);
    console.log("");
    console.log(`✨ Compiled ${output.entities.length} entities`);
  } catch (error) {
    for (const line of describeFailure(error, inputFile)) {
      console.error(line);
    }
    process.exit(1);
  }
}

main();
