import type { Dialect } from "./dialect.js";
import { PostgresTypeMapper } from "../generators/type-mapper.js";

export class PostgresDialect implements Dialect {
  readonly name = "postgres";
  readonly implemented = true;
  readonly types = new PostgresTypeMapper();

  placeholder(index: number): string {
    return `$${index}`;
  }

  placeholders(count: number): string {
    return Array.from({ length: count }, (_, i) => this.placeholder(i + 1)).join(
      ", "
    );
  }

  assignmentClause(columns: readonly string[], start = 1): string {
    return columns
      .map((column, i) => `${column} = ${this.placeholder(start + i)}`)
      .join(", ");
  }

  supportsReturning(): boolean {
    return true;
  }
}
