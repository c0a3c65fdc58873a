/**
 * Entity compiler entry point
 */

export { SchemaParser } from "./parser.js";
export { EntityBuilder } from "./ir/builder.js";
export { EntitySchema } from "./ir/entity.js";
export { EntityValidator } from "./validator.js";
export { CrudSynthesizer } from "./generators/crud-generator.js";
export { DdlSynthesizer } from "./generators/ddl-generator.js";
export { buildFilterQuery, escapeLikePattern } from "./generators/filter-query.js";
export { describeRepository } from "./generators/surface.js";
export { assembleMigrations } from "./generators/migration.js";
export { buildManifest } from "./generators/manifest.js";
export { materializeWriteResult } from "./generators/statements.js";
export { mapType, renderSqlType } from "./generators/type-mapper.js";
export {
  CatalogRelationResolver,
  HeuristicRelationResolver,
} from "./generators/relations.js";
export { dialectFor, UnsupportedDialectError } from "./dialects/index.js";
export { parseTypeExpr, renderTypeExpr } from "./ir/type-expr.js";
export * from "./validation-errors.js";
export * from "./types.js";

import { SchemaParser } from "./parser.js";
import { UnsupportedDialectError } from "./dialects/index.js";
import { DdlSynthesizer } from "./generators/ddl-generator.js";
import { buildManifest } from "./generators/manifest.js";
import { assembleMigrations } from "./generators/migration.js";
import { CatalogRelationResolver } from "./generators/relations.js";
import { describeRepository } from "./generators/surface.js";
import type { EntitySchema } from "./ir/entity.js";
import type {
  CompilerOutput,
  EntityOutput,
  ParsedSchema,
  SchemaFormat,
} from "./types.js";
import {
  DiagnosticSink,
  SchemaValidationException,
  type ValidationError,
} from "./validation-errors.js";

export interface CompilerOptions {
  /** Treat warnings as errors */
  strict?: boolean;
}

/**
 * Main compiler class that orchestrates parsing and code generation
 */
export class EntityCompiler {
  private parser: SchemaParser;
  private options: Required<CompilerOptions>;

  constructor(options: CompilerOptions = {}) {
    this.parser = new SchemaParser();
    this.options = { strict: false, ...options };
  }

  /**
   * Compile a schema from YAML or JSON string. Throws
   * SchemaValidationException when any entity has an error.
   */
  compile(content: string, format: SchemaFormat = "yaml"): CompilerOutput {
    const parsed = this.parser.parse(content, format);
    return this.compileParsed(parsed, content);
  }

  /**
   * Compile an already parsed document
   */
  compileParsed(parsed: ParsedSchema, source: string): CompilerOutput {
    this.ensureValid(parsed.errors, parsed.warnings);

    const sink = new DiagnosticSink();
    sink.merge({ errors: [], warnings: parsed.warnings });

    const relations = new CatalogRelationResolver(parsed.entities);
    const ddl = new DdlSynthesizer(relations);

    const entities = parsed.entities.map((entity) =>
      this.compileEntity(entity, ddl, relations, sink)
    );
    this.ensureValid(sink.errors, sink.warnings);

    const migrations = assembleMigrations(parsed.entities, ddl);
    sink.merge({ errors: [], warnings: migrations.warnings });
    this.ensureValid(sink.errors, sink.warnings);

    const manifest = buildManifest({
      source,
      name: parsed.name,
      version: parsed.version,
      entities: entities.map((output) => ({
        entity: output.entity.name,
        table: output.entity.tableQualifiedName(),
        artifacts: {
          up: output.up,
          down: output.down,
          repository:
            output.repository && JSON.stringify(output.repository),
        },
      })),
    });

    return {
      ...(parsed.name !== undefined ? { name: parsed.name } : {}),
      ...(parsed.version !== undefined ? { version: parsed.version } : {}),
      entities,
      migrations: {
        order: migrations.order,
        up: migrations.up,
        down: migrations.down,
      },
      manifest,
      warnings: sink.warnings,
    };
  }

  /**
   * Parse schema without generating code
   */
  parseSchema(content: string, format: SchemaFormat = "yaml"): ParsedSchema {
    return this.parser.parse(content, format);
  }

  /**
   * An unimplemented dialect becomes an error on that entity instead of
   * aborting the whole document.
   */
  private compileEntity(
    entity: EntitySchema,
    ddl: DdlSynthesizer,
    relations: CatalogRelationResolver,
    sink: DiagnosticSink
  ): EntityOutput {
    const output: EntityOutput = { entity };
    const segments = ["entities", entity.name, "dialect"];

    try {
      const repository = describeRepository(entity, { relations });
      if (repository) output.repository = repository;
    } catch (err) {
      if (!(err instanceof UnsupportedDialectError)) throw err;
      sink.error(segments, err.message);
    }

    if (entity.migrations) {
      try {
        output.up = ddl.up(entity);
        output.down = ddl.down(entity);
      } catch (err) {
        if (!(err instanceof UnsupportedDialectError)) throw err;
        sink.error(segments, `Migrations for ${entity.dialect} are not yet implemented`, {
          suggestion: "Set `migrations: false`",
        });
      }
    }

    return output;
  }

  private ensureValid(errors: ValidationError[], warnings: ValidationError[]): void {
    if (errors.length > 0) {
      throw new SchemaValidationException(errors, warnings);
    }
    if (this.options.strict && warnings.length > 0) {
      throw new SchemaValidationException(
        warnings.map((w): ValidationError => ({ ...w, type: "error" })),
        []
      );
    }
  }
}

/**
 * Convenience function to compile a schema in one call
 */
export function compile(
  content: string,
  format: SchemaFormat = "yaml",
  options: CompilerOptions = {}
): CompilerOutput {
  const compiler = new EntityCompiler(options);
  return compiler.compile(content, format);
}
