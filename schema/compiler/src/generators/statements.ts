/**
 * Statement shapes shared by the CRUD and filter synthesizers
 */

export type FilterOperator = "=" | "ILIKE" | ">=" | "<=";

/** What each positional placeholder is bound to, in placeholder order */
export type BindParam =
  | { kind: "field"; field: string; column: string; from: "entity" | "dto" }
  | { kind: "identity"; field: string; column: string }
  | {
      kind: "filter";
      field: string;
      column: string;
      input: string;
      operator: FilterOperator;
      pattern?: "contains";
    }
  | { kind: "limit"; default?: number }
  | { kind: "offset"; default?: number };

export interface ColumnBinding {
  field: string;
  column: string;
}

/** How the repository turns the statement's outcome into its return value */
export type ResultMapping =
  /** Build the entity from the row RETURNING produced */
  | { kind: "returned-row"; columns: ColumnBinding[] }
  /** Return the entity built before the write; any RETURNING output is dropped */
  | { kind: "input-entity"; discardedColumns: string[] }
  /** Run the follow-up read and build the entity from its row */
  | { kind: "reread"; statement: SqlStatement; columns: ColumnBinding[] }
  /** `true` when at least one row was affected */
  | { kind: "rows-affected" }
  | { kind: "optional-row"; columns: ColumnBinding[] }
  | { kind: "rows"; columns: ColumnBinding[] }
  /** Full rows of another entity's table, mapped by that entity */
  | { kind: "related-row"; target: string }
  | { kind: "related-rows"; target: string };

export interface SqlStatement {
  sql: string;
  params: BindParam[];
  result: ResultMapping;
}

export type EntityRecord = Record<string, unknown>;

/**
 * Apply a create/update result mapping. `row` is the row returned by the
 * statement (or by the follow-up read for `reread`).
 */
export function materializeWriteResult(
  result: ResultMapping,
  outcome: { entity: EntityRecord; row?: EntityRecord }
): EntityRecord {
  switch (result.kind) {
    case "input-entity":
      return { ...outcome.entity };
    case "returned-row":
    case "reread": {
      const { row } = outcome;
      if (!row) {
        throw new Error(`A "${result.kind}" result needs the returned row`);
      }
      return rowToEntity(row, result.columns);
    }
    default:
      throw new Error(`"${result.kind}" does not produce an entity`);
  }
}

export function rowToEntity(
  row: EntityRecord,
  columns: readonly ColumnBinding[]
): EntityRecord {
  const entity: EntityRecord = {};
  for (const { field, column } of columns) {
    entity[field] = row[column];
  }
  return entity;
}
