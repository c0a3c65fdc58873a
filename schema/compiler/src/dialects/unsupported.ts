import { UnsupportedDialectError, type Dialect } from "./dialect.js";
import type { TypeMapper } from "../generators/type-mapper.js";

/**
 * Placeholder for backends without SQL synthesis. Every capability fails
 * with UnsupportedDialectError so nothing emits best-effort text.
 */
export class UnsupportedDialect implements Dialect {
  readonly implemented = false;

  constructor(readonly name: "clickhouse" | "mongodb") {}

  get types(): TypeMapper {
    throw new UnsupportedDialectError(this.name);
  }

  placeholder(): string {
    throw new UnsupportedDialectError(this.name);
  }

  placeholders(): string {
    throw new UnsupportedDialectError(this.name);
  }

  assignmentClause(): string {
    throw new UnsupportedDialectError(this.name);
  }

  supportsReturning(): boolean {
    return false;
  }
}
