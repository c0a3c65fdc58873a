/**
 * SQL dialect strategies
 *
 * Everything that differs between storage backends at the statement level
 * goes through this interface.
 */

import type { DialectName } from "../ir/entity.js";
import type { TypeMapper } from "../generators/type-mapper.js";

export interface Dialect {
  readonly name: DialectName;
  readonly implemented: boolean;
  readonly types: TypeMapper;

  /** 1-based positional placeholder */
  placeholder(index: number): string;
  /** `count` placeholders starting at 1, comma separated */
  placeholders(count: number): string;
  /** `a = $start, b = $start+1, ...` */
  assignmentClause(columns: readonly string[], start?: number): string;
  supportsReturning(): boolean;
}

const DIALECT_LABELS: Record<DialectName, string> = {
  postgres: "PostgreSQL",
  clickhouse: "ClickHouse",
  mongodb: "MongoDB",
};

export class UnsupportedDialectError extends Error {
  constructor(public dialect: DialectName) {
    super(
      `${DIALECT_LABELS[dialect]} support is not yet implemented. ` +
        "Use `sql: trait` to generate the repository interface only, then implement it manually."
    );
    this.name = "UnsupportedDialectError";
  }
}
