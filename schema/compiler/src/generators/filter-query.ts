/**
 * Dynamic filter query
 *
 * The plan is fixed at generation time and serializable; the number of
 * conditions is only known once the caller's input arrives. Placeholders
 * are numbered in the order conditions are emitted, and LIMIT/OFFSET always
 * take the last two.
 */

import { columnName, type DialectName, type EntitySchema } from "../ir/entity.js";
import { requireImplemented } from "../dialects/index.js";
import type { BindParam, FilterOperator } from "./statements.js";

export const DEFAULT_LIMIT = 100;
export const DEFAULT_OFFSET = 0;

export interface FilterCondition {
  /** Name of the query DTO property feeding this condition */
  input: string;
  field: string;
  column: string;
  operator: FilterOperator;
  pattern?: "contains";
}

export interface FilterQueryPlan {
  dialect: DialectName;
  /** `SELECT <columns> FROM <table>` */
  select: string;
  /** Conditions applied whatever the input, e.g. the soft-delete term */
  fixedConditions: string[];
  conditions: FilterCondition[];
  orderBy: string;
  defaultLimit: number;
  defaultOffset: number;
}

export type FilterInput = Record<string, unknown>;

export interface FilterQuery {
  sql: string;
  values: unknown[];
  params: BindParam[];
}

export function planFilterQuery(
  entity: EntitySchema,
  selectColumns: readonly string[]
): FilterQueryPlan {
  const conditions: FilterCondition[] = [];

  for (const field of entity.filterFields()) {
    const column = columnName(field);
    switch (field.filter) {
      case "eq":
        conditions.push({ input: field.name, field: field.name, column, operator: "=" });
        break;
      case "like":
        conditions.push({
          input: field.name,
          field: field.name,
          column,
          operator: "ILIKE",
          pattern: "contains",
        });
        break;
      case "range":
        conditions.push(
          { input: `${field.name}_from`, field: field.name, column, operator: ">=" },
          { input: `${field.name}_to`, field: field.name, column, operator: "<=" }
        );
        break;
      case "none":
        break;
    }
  }

  return {
    dialect: entity.dialect,
    select: `SELECT ${selectColumns.join(", ")} FROM ${entity.tableQualifiedName()}`,
    fixedConditions: entity.softDelete ? [`${entity.softDeleteColumn} IS NULL`] : [],
    conditions,
    orderBy: `${columnName(entity.identityField())} DESC`,
    defaultLimit: DEFAULT_LIMIT,
    defaultOffset: DEFAULT_OFFSET,
  };
}

/** Escape LIKE metacharacters so the value matches literally */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function isSupplied(value: unknown): boolean {
  return value !== undefined && value !== null;
}

export function buildFilterQuery(
  plan: FilterQueryPlan,
  input: FilterInput = {}
): FilterQuery {
  const dialect = requireImplemented(plan.dialect);
  const where = [...plan.fixedConditions];
  const values: unknown[] = [];
  const params: BindParam[] = [];

  for (const condition of plan.conditions) {
    const value = input[condition.input];
    if (!isSupplied(value)) continue;

    values.push(
      condition.pattern === "contains"
        ? `%${escapeLikePattern(String(value))}%`
        : value
    );
    params.push({
      kind: "filter",
      field: condition.field,
      column: condition.column,
      input: condition.input,
      operator: condition.operator,
      ...(condition.pattern ? { pattern: condition.pattern } : {}),
    });
    where.push(`${condition.column} ${condition.operator} ${dialect.placeholder(values.length)}`);
  }

  const limit = typeof input.limit === "number" ? input.limit : plan.defaultLimit;
  const offset = typeof input.offset === "number" ? input.offset : plan.defaultOffset;
  values.push(limit, offset);
  params.push({ kind: "limit", default: plan.defaultLimit }, { kind: "offset", default: plan.defaultOffset });

  const parts = [plan.select];
  if (where.length > 0) {
    parts.push(`WHERE ${where.join(" AND ")}`);
  }
  parts.push(
    `ORDER BY ${plan.orderBy}`,
    `LIMIT ${dialect.placeholder(values.length - 1)} OFFSET ${dialect.placeholder(values.length)}`
  );

  return { sql: parts.join(" "), values, params };
}
