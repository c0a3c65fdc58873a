/**
 * YAML/JSON Schema Parser
 *
 * Reads a schema document, feeds every entity declaration clause by clause
 * into an EntityBuilder and collects all diagnostics. For YAML input each
 * diagnostic is given the line and column of the offending key or value.
 */

import YAML, {
  isMap,
  isNode,
  isScalar,
  isSeq,
  LineCounter,
  type Document,
  type YAMLError,
} from "yaml";
import type {
  ColumnOverrides,
  DialectName,
  EntitySchema,
  Exposure,
  FieldSchema,
  FilterKind,
  IdentityGeneration,
  IndexKind,
  ReferentialAction,
  RelationSpec,
  ReturningPolicy,
  SqlLevel,
} from "./ir/entity.js";
import { EntityBuilder } from "./ir/builder.js";
import { parseTypeExpr, TypeExprSyntaxError, type TypeExpr } from "./ir/type-expr.js";
import type { ParsedSchema, SchemaFormat } from "./types.js";
import {
  DiagnosticSink,
  type PathSegment,
  type ValidationError,
} from "./validation-errors.js";

type Plain = Record<string, unknown>;

const DOCUMENT_KEYS = ["version", "name", "description", "entities"];
const ENTITY_KEYS = [
  "table",
  "schema",
  "dialect",
  "identity_generation",
  "error",
  "soft_delete",
  "returning",
  "sql",
  "migrations",
  "has_many",
  "projections",
  "composite_index",
  "unique_index",
  "fields",
  "description",
];
const FIELD_KEYS = [
  "name",
  "type",
  "identity",
  "generated",
  "expose",
  "filter",
  "column",
  "relation",
  "description",
];
const COLUMN_KEYS = [
  "unique",
  "index",
  "default",
  "check",
  "varchar",
  "sql_type",
  "nullable",
  "name",
];
const RELATION_KEYS = ["target", "on_delete"];
const INDEX_KEYS = ["columns", "name", "type", "where"];

// Accepted spellings -> canonical value
const DIALECTS: Record<string, DialectName> = {
  postgres: "postgres",
  postgresql: "postgres",
  clickhouse: "clickhouse",
  mongodb: "mongodb",
  mongo: "mongodb",
};
const IDENTITY_GENERATIONS: Record<string, IdentityGeneration> = {
  v7: "v7",
  "7": "v7",
  time_ordered: "v7",
  v4: "v4",
  "4": "v4",
  random: "v4",
};
const SQL_LEVELS: Record<string, SqlLevel> = { full: "full", trait: "trait", none: "none" };
const EXPOSURES: Record<string, Exposure> = {
  create: "create",
  update: "update",
  response: "response",
  skip: "skip",
};
const FILTERS: Record<string, FilterKind> = {
  eq: "eq",
  like: "like",
  range: "range",
  none: "none",
  true: "eq",
  false: "none",
};
const INDEX_KINDS: Record<string, IndexKind> = {
  btree: "btree",
  hash: "hash",
  gin: "gin",
  gist: "gist",
  brin: "brin",
};
const REFERENTIAL_ACTIONS: Record<string, ReferentialAction> = {
  cascade: "cascade",
  set_null: "set_null",
  set_default: "set_default",
  restrict: "restrict",
  no_action: "no_action",
};

function isPlain(value: unknown): value is Plain {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Accepts a list of strings or one comma-separated string */
function splitList(value: unknown): string[] | undefined {
  if (typeof value === "string") {
    return value
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  }
  if (Array.isArray(value)) {
    const items: string[] = [];
    for (const item of value) {
      if (typeof item !== "string") return undefined;
      items.push(item.trim());
    }
    return items;
  }
  return undefined;
}

/**
 * Look `value` up in an alias table. Keys are matched case-insensitively
 * with spaces and dashes read as underscores.
 */
function enumValue<T extends string>(
  sink: DiagnosticSink,
  value: unknown,
  values: Record<string, T>,
  what: string,
  segments: PathSegment[]
): T | undefined {
  const key =
    typeof value === "string"
      ? value.trim().toLowerCase().replace(/[\s-]+/g, "_")
      : String(value);
  const resolved = Object.prototype.hasOwnProperty.call(values, key) ? values[key] : undefined;
  if (resolved === undefined) {
    sink.error(segments, `Unknown ${what} "${String(value)}"`, {
      suggestion: `Allowed values: ${Object.keys(values).join(", ")}`,
    });
  }
  return resolved;
}

/**
 * Typed reads of one mapping's clauses. Every malformed clause becomes a
 * diagnostic and reads as absent.
 */
class ClauseReader {
  constructor(
    private readonly sink: DiagnosticSink,
    private readonly value: Plain,
    readonly segments: PathSegment[]
  ) {}

  at(...path: PathSegment[]): PathSegment[] {
    return [...this.segments, ...path];
  }

  has(key: string): boolean {
    return this.value[key] !== undefined && this.value[key] !== null;
  }

  raw(key: string): unknown {
    return this.value[key];
  }

  keys(): string[] {
    return Object.keys(this.value);
  }

  checkKeys(allowed: readonly string[], what: string): void {
    for (const key of Object.keys(this.value)) {
      if (!allowed.includes(key)) {
        this.sink.error(this.at(key), `Unknown ${what} option "${key}"`, {
          suggestion: `Allowed options: ${allowed.join(", ")}`,
          target: "key",
        });
      }
    }
  }

  string(key: string): string | undefined {
    if (!this.has(key)) return undefined;
    const value = this.value[key];
    if (typeof value !== "string") {
      this.sink.error(this.at(key), `"${key}" must be a string`);
      return undefined;
    }
    return value;
  }

  /** Strings, plus numbers and booleans taken as SQL text */
  expression(key: string): string | undefined {
    const value = this.value[key];
    if (typeof value === "number" || typeof value === "boolean") {
      return String(value);
    }
    return this.string(key);
  }

  boolean(key: string): boolean | undefined {
    if (!this.has(key)) return undefined;
    const value = this.value[key];
    if (typeof value !== "boolean") {
      this.sink.error(this.at(key), `"${key}" must be true or false`);
      return undefined;
    }
    return value;
  }

  positiveInteger(key: string): number | undefined {
    if (!this.has(key)) return undefined;
    const value = this.value[key];
    if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
      this.sink.error(this.at(key), `"${key}" must be a positive integer`);
      return undefined;
    }
    return value;
  }

  oneOf<T extends string>(key: string, values: Record<string, T>, what: string): T | undefined {
    if (!this.has(key)) return undefined;
    return enumValue(this.sink, this.value[key], values, what, this.at(key));
  }

  list(key: string): string[] | undefined {
    if (!this.has(key)) return undefined;
    const items = splitList(this.value[key]);
    if (!items) {
      this.sink.error(
        this.at(key),
        `"${key}" must be a list of names or a comma-separated string`
      );
    }
    return items;
  }

  child(key: string, what: string): ClauseReader | undefined {
    if (!this.has(key)) return undefined;
    return readerFor(this.sink, this.value[key], this.at(key), what);
  }
}

function readerFor(
  sink: DiagnosticSink,
  value: unknown,
  segments: PathSegment[],
  what: string
): ClauseReader | undefined {
  if (!isPlain(value)) {
    sink.error(segments, `${what} must be a mapping`);
    return undefined;
  }
  return new ClauseReader(sink, value, segments);
}

/**
 * Resolve path segments against the YAML node tree and attach the 1-based
 * position of the deepest node reached.
 */
function locate(
  doc: Document,
  lineCounter: LineCounter,
  diagnostic: ValidationError
): ValidationError {
  let node: unknown = doc.contents;
  let key: unknown;

  for (const segment of diagnostic.segments) {
    if (isMap(node)) {
      const pair = node.items.find((item) =>
        isScalar(item.key) ? String(item.key.value) === String(segment) : item.key === segment
      );
      if (!pair) break;
      key = pair.key;
      node = pair.value;
    } else if (isSeq(node) && typeof segment === "number" && segment < node.items.length) {
      key = undefined;
      node = node.items[segment];
    } else {
      break;
    }
  }

  const target = diagnostic.target === "key" && isNode(key) ? key : node;
  if (!isNode(target) || !target.range) {
    return diagnostic;
  }
  const { line, col } = lineCounter.linePos(target.range[0]);
  return { ...diagnostic, line, column: col };
}

export class SchemaParser {
  /**
   * Parse a YAML or JSON schema document
   */
  parse(content: string, format: SchemaFormat = "yaml"): ParsedSchema {
    return format === "yaml" ? this.parseYAML(content) : this.parseJSON(content);
  }

  /**
   * Parse YAML, resolving diagnostic locations
   */
  parseYAML(content: string): ParsedSchema {
    const lineCounter = new LineCounter();
    const doc = YAML.parseDocument(content, { lineCounter });

    if (doc.errors.length > 0) {
      return {
        entities: [],
        errors: doc.errors.map((err) => this.yamlDiagnostic("error", err)),
        warnings: doc.warnings.map((err) => this.yamlDiagnostic("warning", err)),
      };
    }

    const raw: unknown = doc.toJS();
    const parsed = this.buildSchema(raw);
    return {
      ...parsed,
      errors: parsed.errors.map((d) => locate(doc, lineCounter, d)),
      warnings: parsed.warnings.map((d) => locate(doc, lineCounter, d)),
    };
  }

  /**
   * Parse JSON; diagnostics carry paths but no positions
   */
  parseJSON(content: string): ParsedSchema {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return {
        entities: [],
        errors: [{ type: "error", message: `Invalid JSON: ${message}`, path: "", segments: [] }],
        warnings: [],
      };
    }
    return this.buildSchema(raw);
  }

  private yamlDiagnostic(type: "error" | "warning", err: YAMLError): ValidationError {
    const position = err.linePos?.[0];
    return {
      type,
      message: err.message.split("\n")[0],
      path: "",
      segments: [],
      ...(position ? { line: position.line, column: position.col } : {}),
    };
  }

  private buildSchema(raw: unknown): ParsedSchema {
    const sink = new DiagnosticSink();
    const doc = readerFor(sink, raw, [], "Schema document");
    if (!doc) {
      return { entities: [], errors: sink.errors, warnings: sink.warnings };
    }

    doc.checkKeys(DOCUMENT_KEYS, "document");

    const name = doc.string("name");
    const version = doc.has("version") ? String(doc.raw("version")) : undefined;
    if (version !== undefined && !/^\d+\.\d+(\.\d+)?$/.test(version)) {
      sink.error(["version"], 'Schema version must follow semver format (e.g., "1.0" or "1.2.3")', {
        suggestion: 'Use format like "1.0" or "1.2.3"',
      });
    }

    const entities: EntitySchema[] = [];
    if (!doc.has("entities")) {
      sink.error([], "Schema must declare at least one entity under \"entities\"");
    } else {
      const declarations = doc.child("entities", "entities");
      if (declarations) {
        for (const entityName of declarations.keys()) {
          const result = this.buildEntity(entityName, declarations);
          sink.merge(result.diagnostics);
          if (result.entity) entities.push(result.entity);
        }
      }
    }

    return {
      ...(name !== undefined ? { name } : {}),
      ...(version !== undefined ? { version } : {}),
      entities,
      errors: sink.errors,
      warnings: sink.warnings,
    };
  }

  private buildEntity(
    name: string,
    declarations: ClauseReader
  ): {
    entity?: EntitySchema;
    diagnostics: { errors: ValidationError[]; warnings: ValidationError[] };
  } {
    const sink = new DiagnosticSink();
    const segments = declarations.at(name);
    const entity = readerFor(sink, declarations.raw(name), segments, `Entity "${name}"`);
    if (!entity) {
      return { diagnostics: sink };
    }
    entity.checkKeys(ENTITY_KEYS, "entity");

    const builder = new EntityBuilder(name, segments);

    const table = entity.string("table");
    if (table !== undefined) builder.table(table);
    const namespace = entity.string("schema");
    if (namespace !== undefined) builder.namespace(namespace);
    const dialect = entity.oneOf("dialect", DIALECTS, "dialect");
    if (dialect) builder.dialect(dialect);
    const generation = entity.oneOf("identity_generation", IDENTITY_GENERATIONS, "identity generation");
    if (generation) builder.identityGeneration(generation);
    const errorType = entity.string("error");
    if (errorType !== undefined) builder.errorType(errorType);
    const softDelete = entity.boolean("soft_delete");
    if (softDelete !== undefined) builder.softDelete(softDelete);
    const returning = this.readReturning(entity, sink);
    if (returning) builder.returning(returning);
    const sqlLevel = entity.oneOf("sql", SQL_LEVELS, "sql level");
    if (sqlLevel) builder.sqlLevel(sqlLevel);
    const migrations = entity.boolean("migrations");
    if (migrations !== undefined) builder.migrations(migrations);

    entity.list("has_many")?.forEach((target, i) => {
      builder.hasMany(target, entity.at("has_many", i));
    });

    this.readFields(entity, builder, sink);
    this.readIndexes(entity, builder, sink, "composite_index", false);
    this.readIndexes(entity, builder, sink, "unique_index", true);
    this.readProjections(entity, builder, sink);

    const result = builder.build(sink);
    return result.ok
      ? { entity: result.entity, diagnostics: { errors: [], warnings: result.warnings } }
      : { diagnostics: { errors: result.errors, warnings: result.warnings } };
  }

  /** full | identity | id | none | a list of columns */
  private readReturning(entity: ClauseReader, sink: DiagnosticSink): ReturningPolicy | undefined {
    if (!entity.has("returning")) return undefined;
    const value = entity.raw("returning");

    if (typeof value === "string") {
      const mode = value.trim().toLowerCase();
      if (mode === "full") return { mode: "full" };
      if (mode === "identity" || mode === "id") return { mode: "identity" };
      if (mode === "none") return { mode: "none" };
    }

    const columns = splitList(value);
    if (!columns || columns.length === 0) {
      sink.error(entity.at("returning"), "RETURNING must be full, identity, none or a list of columns");
      return undefined;
    }
    return { mode: "custom", columns };
  }

  private readFields(entity: ClauseReader, builder: EntityBuilder, sink: DiagnosticSink): void {
    if (!entity.has("fields")) return;
    const fields = entity.raw("fields");
    if (!Array.isArray(fields)) {
      sink.error(entity.at("fields"), "fields must be a list");
      return;
    }

    fields.forEach((value: unknown, i) => {
      const field = readerFor(sink, value, entity.at("fields", i), "A field");
      if (!field) return;
      const parsed = this.readField(field, sink);
      if (parsed) builder.field(parsed, field.segments);
    });
  }

  private readField(field: ClauseReader, sink: DiagnosticSink): FieldSchema | undefined {
    field.checkKeys(FIELD_KEYS, "field");

    const name = field.string("name");
    if (name === undefined && !field.has("name")) {
      sink.error(field.segments, 'Field is missing "name"');
    }
    const type = this.readType(field, sink);

    const expose = (field.list("expose") ?? []).flatMap((option, i) => {
      const exposure = enumValue(sink, option, EXPOSURES, "expose option", field.at("expose", i));
      return exposure ? [exposure] : [];
    });

    let filter: FilterKind = "none";
    if (field.has("filter")) {
      filter = enumValue(sink, field.raw("filter"), FILTERS, "filter", field.at("filter")) ?? "none";
    }

    const column = this.readColumn(field, sink);
    const relation = this.readRelation(field, sink);

    if (name === undefined || type === undefined) return undefined;
    return {
      name,
      type,
      isIdentity: field.boolean("identity") ?? false,
      isGenerated: field.boolean("generated") ?? false,
      expose: Array.from(new Set(expose)),
      filter,
      column,
      ...(relation ? { relation } : {}),
    };
  }

  private readType(field: ClauseReader, sink: DiagnosticSink): TypeExpr | undefined {
    if (!field.has("type")) {
      sink.error(field.segments, 'Field is missing "type"');
      return undefined;
    }
    const source = field.string("type");
    if (source === undefined) return undefined;
    try {
      return parseTypeExpr(source);
    } catch (err) {
      if (err instanceof TypeExprSyntaxError) {
        sink.error(field.at("type"), err.message, {
          suggestion: "Use a type name, optionally wrapped as Option<T> or Vec<T>",
        });
        return undefined;
      }
      throw err;
    }
  }

  private readColumn(field: ClauseReader, sink: DiagnosticSink): ColumnOverrides {
    const column = field.child("column", "column");
    if (!column) return { unique: false, nullable: false };
    column.checkKeys(COLUMN_KEYS, "column");

    // `index: true` means a btree index
    let index: IndexKind | undefined;
    const rawIndex = column.raw("index");
    if (rawIndex === true) {
      index = "btree";
    } else if (rawIndex !== undefined && rawIndex !== null && rawIndex !== false) {
      index = enumValue(sink, rawIndex, INDEX_KINDS, "index type", column.at("index"));
    }

    const overrides: {
      -readonly [K in keyof ColumnOverrides]: ColumnOverrides[K];
    } = {
      unique: column.boolean("unique") ?? false,
      nullable: column.boolean("nullable") ?? false,
    };
    if (index) overrides.index = index;
    const defaultExpr = column.expression("default");
    if (defaultExpr !== undefined) overrides.default = defaultExpr;
    const check = column.string("check");
    if (check !== undefined) overrides.check = check;
    const varchar = column.positiveInteger("varchar");
    if (varchar !== undefined) overrides.varchar = varchar;
    const sqlType = column.string("sql_type");
    if (sqlType !== undefined) overrides.sqlType = sqlType;
    const name = column.string("name");
    if (name !== undefined) overrides.name = name;
    return overrides;
  }

  /** `relation: User` or `relation: { target: User, on_delete: cascade }` */
  private readRelation(field: ClauseReader, sink: DiagnosticSink): RelationSpec | undefined {
    if (!field.has("relation")) return undefined;
    const value = field.raw("relation");
    if (typeof value === "string") {
      return { target: value };
    }

    const relation = field.child("relation", "relation");
    if (!relation) return undefined;
    relation.checkKeys(RELATION_KEYS, "relation");

    const target = relation.string("target");
    if (target === undefined) {
      if (!relation.has("target")) {
        sink.error(relation.segments, 'Relation is missing "target"');
      }
      return undefined;
    }
    const onDelete = relation.oneOf("on_delete", REFERENTIAL_ACTIONS, "on_delete action");
    return onDelete ? { target, onDelete } : { target };
  }

  private readIndexes(
    entity: ClauseReader,
    builder: EntityBuilder,
    sink: DiagnosticSink,
    key: "composite_index" | "unique_index",
    unique: boolean
  ): void {
    if (!entity.has(key)) return;
    const indexes = entity.raw(key);
    if (!Array.isArray(indexes)) {
      sink.error(entity.at(key), `${key} must be a list`);
      return;
    }

    indexes.forEach((value: unknown, i) => {
      const index = readerFor(sink, value, entity.at(key, i), "An index");
      if (!index) return;
      index.checkKeys(INDEX_KEYS, "index");

      if (!index.has("columns")) {
        sink.error(index.segments, 'Index is missing "columns"');
        return;
      }
      const columns = index.list("columns");
      if (!columns) return;

      const name = index.string("name");
      const where = index.string("where");
      builder.index(
        {
          columns,
          kind: index.oneOf("type", INDEX_KINDS, "index type") ?? "btree",
          unique,
          ...(name !== undefined ? { name } : {}),
          ...(where !== undefined ? { where } : {}),
        },
        index.segments
      );
    });
  }

  private readProjections(entity: ClauseReader, builder: EntityBuilder, sink: DiagnosticSink): void {
    const projections = entity.child("projections", "projections");
    if (!projections) return;

    for (const name of projections.keys()) {
      const fields = projections.list(name);
      if (fields) {
        builder.projection({ name, fields }, projections.at(name));
      } else if (!projections.has(name)) {
        sink.error(projections.at(name), `Projection "${name}" must list at least one field`);
      }
    }
  }
}
