/**
 * Entity builder
 *
 * Accumulates an entity declaration clause by clause, then runs the
 * validation pass. Callers only ever receive the frozen EntitySchema or the
 * diagnostics, never the builder state.
 */

import {
  columnName,
  DEFAULT_ERROR_TYPE,
  DEFAULT_NAMESPACE,
  EntitySchema,
  type DialectName,
  type FieldSchema,
  type IdentityGeneration,
  type IndexSpec,
  type ProjectionSpec,
  type ReturningPolicy,
  type SqlLevel,
} from "./entity.js";
import {
  DiagnosticSink,
  type PathSegment,
  type ValidationError,
} from "../validation-errors.js";
import { EntityValidator } from "../validator.js";

export type Located<T> = T & { segments: PathSegment[] };

export interface EntityDraft {
  name: string;
  segments: PathSegment[];
  table?: string;
  namespace: string;
  dialect: DialectName;
  identityGeneration: IdentityGeneration;
  errorType: string;
  softDelete: boolean;
  returning: ReturningPolicy;
  sqlLevel: SqlLevel;
  migrations: boolean;
  fields: Located<FieldSchema>[];
  oneToManyTargets: Located<{ target: string }>[];
  indexes: Located<IndexSpec>[];
  projections: Located<ProjectionSpec>[];
}

export type EntityBuildResult =
  | { ok: true; entity: EntitySchema; warnings: ValidationError[] }
  | { ok: false; errors: ValidationError[]; warnings: ValidationError[] };

export class EntityBuilder {
  private readonly draft: EntityDraft;

  constructor(name: string, segments: PathSegment[] = ["entities", name]) {
    this.draft = {
      name,
      segments,
      namespace: DEFAULT_NAMESPACE,
      dialect: "postgres",
      identityGeneration: "v7",
      errorType: DEFAULT_ERROR_TYPE,
      softDelete: false,
      returning: { mode: "full" },
      sqlLevel: "full",
      migrations: true,
      fields: [],
      oneToManyTargets: [],
      indexes: [],
      projections: [],
    };
  }

  table(table: string): this {
    this.draft.table = table;
    return this;
  }

  namespace(namespace: string): this {
    this.draft.namespace = namespace;
    return this;
  }

  dialect(dialect: DialectName): this {
    this.draft.dialect = dialect;
    return this;
  }

  identityGeneration(generation: IdentityGeneration): this {
    this.draft.identityGeneration = generation;
    return this;
  }

  errorType(errorType: string): this {
    this.draft.errorType = errorType;
    return this;
  }

  softDelete(enabled: boolean): this {
    this.draft.softDelete = enabled;
    return this;
  }

  returning(policy: ReturningPolicy): this {
    this.draft.returning = policy;
    return this;
  }

  sqlLevel(level: SqlLevel): this {
    this.draft.sqlLevel = level;
    return this;
  }

  migrations(enabled: boolean): this {
    this.draft.migrations = enabled;
    return this;
  }

  field(field: FieldSchema, segments: PathSegment[] = []): this {
    this.draft.fields.push({ ...field, segments });
    return this;
  }

  hasMany(target: string, segments: PathSegment[] = []): this {
    this.draft.oneToManyTargets.push({ target, segments });
    return this;
  }

  index(index: IndexSpec, segments: PathSegment[] = []): this {
    this.draft.indexes.push({ ...index, segments });
    return this;
  }

  projection(projection: ProjectionSpec, segments: PathSegment[] = []): this {
    this.draft.projections.push({ ...projection, segments });
    return this;
  }

  /**
   * Validate and freeze. Diagnostics already raised while reading clauses
   * are merged in; any error among them fails the build.
   */
  build(
    clauseDiagnostics: { errors: ValidationError[]; warnings: ValidationError[] } = {
      errors: [],
      warnings: [],
    }
  ): EntityBuildResult {
    const sink = new DiagnosticSink();
    sink.merge(clauseDiagnostics);
    sink.merge(new EntityValidator().validate(this.draft));

    const { table } = this.draft;
    if (sink.hasErrors || table === undefined) {
      return { ok: false, errors: sink.errors, warnings: sink.warnings };
    }

    const strip = <T extends { segments: PathSegment[] }>({
      segments: _segments,
      ...rest
    }: T): Omit<T, "segments"> => rest;

    // Indexes and RETURNING may name a field; statements need its column
    const columnsByField = new Map(
      this.draft.fields.map((f): [string, string] => [f.name, columnName(f)])
    );
    const toColumn = (name: string): string => columnsByField.get(name) ?? name;
    const { returning } = this.draft;

    const entity = new EntitySchema({
      name: this.draft.name,
      table,
      namespace: this.draft.namespace,
      dialect: this.draft.dialect,
      identityGeneration: this.draft.identityGeneration,
      errorType: this.draft.errorType,
      softDelete: this.draft.softDelete,
      returning:
        returning.mode === "custom"
          ? { mode: "custom", columns: returning.columns.map(toColumn) }
          : returning,
      sqlLevel: this.draft.sqlLevel,
      migrations: this.draft.migrations,
      fields: this.draft.fields.map(strip),
      oneToManyTargets: this.draft.oneToManyTargets.map((t) => t.target),
      indexes: this.draft.indexes.map((index) => ({
        ...strip(index),
        columns: index.columns.map(toColumn),
      })),
      projections: this.draft.projections.map(strip),
    });

    return { ok: true, entity, warnings: sink.warnings };
  }
}
