/**
 * Entity IR
 *
 * The validated, immutable schema model for one entity. Every generator reads
 * it through the accessor queries below and never sees a mutable view.
 */

import type { TypeExpr } from "./type-expr.js";

export type DialectName = "postgres" | "clickhouse" | "mongodb";
export type IdentityGeneration = "v7" | "v4";
export type SqlLevel = "full" | "trait" | "none";
export type Exposure = "create" | "update" | "response" | "skip";
export type FilterKind = "none" | "eq" | "like" | "range";
export type IndexKind = "btree" | "hash" | "gin" | "gist" | "brin";
export type ReferentialAction =
  | "cascade"
  | "set_null"
  | "set_default"
  | "restrict"
  | "no_action";

export type ReturningPolicy =
  | { mode: "full" }
  | { mode: "identity" }
  | { mode: "none" }
  | { mode: "custom"; columns: readonly string[] };

export interface ColumnOverrides {
  readonly unique: boolean;
  readonly index?: IndexKind;
  readonly default?: string;
  readonly check?: string;
  readonly varchar?: number;
  readonly sqlType?: string;
  readonly nullable: boolean;
  readonly name?: string;
}

export interface RelationSpec {
  readonly target: string;
  readonly onDelete?: ReferentialAction;
}

export interface FieldSchema {
  readonly name: string;
  readonly type: TypeExpr;
  readonly isIdentity: boolean;
  readonly isGenerated: boolean;
  readonly expose: readonly Exposure[];
  readonly filter: FilterKind;
  readonly column: ColumnOverrides;
  readonly relation?: RelationSpec;
}

export interface IndexSpec {
  readonly name?: string;
  readonly columns: readonly string[];
  readonly kind: IndexKind;
  readonly unique: boolean;
  readonly where?: string;
}

export interface ProjectionSpec {
  readonly name: string;
  readonly fields: readonly string[];
}

export interface EntitySchemaInit {
  name: string;
  table: string;
  namespace: string;
  dialect: DialectName;
  identityGeneration: IdentityGeneration;
  errorType: string;
  softDelete: boolean;
  returning: ReturningPolicy;
  sqlLevel: SqlLevel;
  migrations: boolean;
  fields: FieldSchema[];
  oneToManyTargets: string[];
  indexes: IndexSpec[];
  projections: ProjectionSpec[];
}

export const DEFAULT_NAMESPACE = "public";
export const DEFAULT_ERROR_TYPE = "DatabaseError";
export const SOFT_DELETE_COLUMN = "deleted_at";

export const REFERENTIAL_ACTION_SQL: Record<ReferentialAction, string> = {
  cascade: "CASCADE",
  set_null: "SET NULL",
  set_default: "SET DEFAULT",
  restrict: "RESTRICT",
  no_action: "NO ACTION",
};

export function columnName(field: FieldSchema): string {
  return field.column.name ?? field.name;
}

export function isSkipped(field: FieldSchema): boolean {
  return field.expose.includes("skip");
}

/** `idx_{table}_{col1}_{col2}` unless the index is named */
export function indexName(index: IndexSpec, table: string): string {
  return index.name ?? `idx_${table}_${index.columns.join("_")}`;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

export class EntitySchema {
  readonly name: string;
  readonly table: string;
  readonly namespace: string;
  readonly dialect: DialectName;
  readonly identityGeneration: IdentityGeneration;
  readonly errorType: string;
  readonly softDelete: boolean;
  readonly returning: ReturningPolicy;
  readonly sqlLevel: SqlLevel;
  readonly migrations: boolean;
  readonly indexes: readonly IndexSpec[];
  readonly softDeleteColumn = SOFT_DELETE_COLUMN;

  private readonly fields: readonly FieldSchema[];
  private readonly identityIndex: number;
  private readonly hasMany: readonly string[];
  private readonly projectionList: readonly ProjectionSpec[];

  /**
   * Only the builder calls this, after validation has established that
   * exactly one field is the identity.
   */
  constructor(init: EntitySchemaInit) {
    const identityIndex = init.fields.findIndex((f) => f.isIdentity);
    if (identityIndex < 0) {
      throw new Error(`Entity "${init.name}" has no identity field`);
    }

    this.name = init.name;
    this.table = init.table;
    this.namespace = init.namespace;
    this.dialect = init.dialect;
    this.identityGeneration = init.identityGeneration;
    this.errorType = init.errorType;
    this.softDelete = init.softDelete;
    this.returning = deepFreeze(structuredClone(init.returning));
    this.sqlLevel = init.sqlLevel;
    this.migrations = init.migrations;
    this.fields = deepFreeze(structuredClone(init.fields));
    this.identityIndex = identityIndex;
    this.hasMany = deepFreeze([...init.oneToManyTargets]);
    this.indexes = deepFreeze(structuredClone(init.indexes));
    this.projectionList = deepFreeze(structuredClone(init.projections));
    Object.freeze(this);
  }

  identityField(): FieldSchema {
    return this.fields[this.identityIndex];
  }

  allFields(): readonly FieldSchema[] {
    return this.fields;
  }

  createFields(): readonly FieldSchema[] {
    return Object.freeze(
      this.fields.filter(
        (f) =>
          f.expose.includes("create") &&
          !isSkipped(f) &&
          !f.isIdentity &&
          !f.isGenerated
      )
    );
  }

  updateFields(): readonly FieldSchema[] {
    return Object.freeze(
      this.fields.filter(
        (f) =>
          f.expose.includes("update") &&
          !isSkipped(f) &&
          !f.isIdentity &&
          !f.isGenerated
      )
    );
  }

  /** The identity field is always part of the response */
  responseFields(): readonly FieldSchema[] {
    return Object.freeze(
      this.fields.filter(
        (f) => f.isIdentity || (f.expose.includes("response") && !isSkipped(f))
      )
    );
  }

  relationFields(): readonly FieldSchema[] {
    return Object.freeze(this.fields.filter((f) => f.relation !== undefined));
  }

  oneToManyTargets(): readonly string[] {
    return this.hasMany;
  }

  filterFields(): readonly FieldSchema[] {
    return Object.freeze(this.fields.filter((f) => f.filter !== "none"));
  }

  hasFilters(): boolean {
    return this.fields.some((f) => f.filter !== "none");
  }

  projections(): readonly ProjectionSpec[] {
    return this.projectionList;
  }

  tableQualifiedName(): string {
    return `${this.namespace}.${this.table}`;
  }

  field(name: string): FieldSchema | undefined {
    return this.fields.find((f) => f.name === name);
  }
}
