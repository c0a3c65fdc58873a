import type { DialectName } from "../ir/entity.js";
import { UnsupportedDialectError, type Dialect } from "./dialect.js";
import { PostgresDialect } from "./postgres.js";
import { UnsupportedDialect } from "./unsupported.js";

export { UnsupportedDialectError, type Dialect } from "./dialect.js";
export { PostgresDialect } from "./postgres.js";
export { UnsupportedDialect } from "./unsupported.js";

const DIALECTS: Record<DialectName, Dialect> = {
  postgres: new PostgresDialect(),
  clickhouse: new UnsupportedDialect("clickhouse"),
  mongodb: new UnsupportedDialect("mongodb"),
};

export function dialectFor(name: DialectName): Dialect {
  return DIALECTS[name];
}

/** The dialect, or UnsupportedDialectError when it cannot synthesize SQL */
export function requireImplemented(name: DialectName): Dialect {
  const dialect = dialectFor(name);
  if (!dialect.implemented) {
    throw new UnsupportedDialectError(name);
  }
  return dialect;
}
