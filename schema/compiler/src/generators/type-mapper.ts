/**
 * PostgreSQL type mapping
 *
 * (semantic type, column overrides) -> SQL column type. Nullability is
 * tracked beside the rendered name, never inside it.
 */

import type { ColumnOverrides, DialectName } from "../ir/entity.js";
import { isOptional, type TypeExpr } from "../ir/type-expr.js";
import { UnsupportedDialectError } from "../dialects/dialect.js";

export interface SqlType {
  name: string;
  nullable: boolean;
  /** 0 = scalar, 1 = T[], 2 = T[][] */
  arrayDepth: number;
}

export interface TypeMapper {
  map(type: TypeExpr, column: Pick<ColumnOverrides, "sqlType" | "varchar" | "nullable">): SqlType;
}

const POSTGRES_SCALARS: Array<[string, string[]]> = [
  ["UUID", ["uuid"]],
  ["TEXT", ["string", "str", "text"]],
  ["SMALLINT", ["i8", "i16", "u8", "smallint"]],
  ["INTEGER", ["i32", "u16", "int", "integer"]],
  // u64 may overflow BIGINT
  ["BIGINT", ["i64", "u32", "u64", "bigint"]],
  ["REAL", ["f32", "real"]],
  ["DOUBLE PRECISION", ["f64", "double"]],
  ["BOOLEAN", ["bool", "boolean"]],
  ["TIMESTAMPTZ", ["datetime", "timestamptz"]],
  ["DATE", ["naivedate", "date"]],
  ["TIME", ["naivetime", "time"]],
  ["TIMESTAMP", ["naivedatetime", "timestamp"]],
  ["JSONB", ["value", "json", "jsonb"]],
  ["DECIMAL", ["decimal", "bigdecimal", "numeric"]],
  ["INET", ["ipaddr", "ipv4addr", "ipv6addr", "inet"]],
  ["MACADDR", ["macaddr"]],
  ["BYTEA", ["bytes", "blob", "bytea"]],
];

const SCALAR_TABLE = new Map<string, string>(
  POSTGRES_SCALARS.flatMap(([sql, names]) =>
    names.map((name): [string, string] => [name, sql])
  )
);

const TEXT_SCALARS = new Set(["string", "str", "text"]);
const FALLBACK_TYPE = "TEXT";

export function isKnownScalar(name: string): boolean {
  return SCALAR_TABLE.has(name.toLowerCase());
}

function scalarTypeName(name: string, varchar: number | undefined): string {
  const key = name.toLowerCase();
  if (TEXT_SCALARS.has(key) && varchar !== undefined) {
    return `VARCHAR(${varchar})`;
  }
  // Unrecognized names fall back to TEXT without complaint
  return SCALAR_TABLE.get(key) ?? FALLBACK_TYPE;
}

export class PostgresTypeMapper implements TypeMapper {
  map(
    type: TypeExpr,
    column: Pick<ColumnOverrides, "sqlType" | "varchar" | "nullable">
  ): SqlType {
    if (column.sqlType !== undefined) {
      return {
        name: column.sqlType,
        nullable: isOptional(type) || column.nullable,
        arrayDepth: 0,
      };
    }

    switch (type.kind) {
      case "optional": {
        const inner = this.map(type.inner, column);
        return { ...inner, nullable: true };
      }
      case "list": {
        const inner = this.map(type.inner, column);
        return { ...inner, arrayDepth: inner.arrayDepth + 1 };
      }
      case "scalar":
        return {
          name: scalarTypeName(type.name, column.varchar),
          nullable: column.nullable,
          arrayDepth: 0,
        };
    }
  }
}

const postgresMapper = new PostgresTypeMapper();

export function mapType(
  type: TypeExpr,
  column: Pick<ColumnOverrides, "sqlType" | "varchar" | "nullable"> = {
    nullable: false,
  },
  dialect: DialectName = "postgres"
): SqlType {
  if (dialect !== "postgres") {
    throw new UnsupportedDialectError(dialect);
  }
  return postgresMapper.map(type, column);
}

export function renderSqlType(type: SqlType): string {
  return type.name + "[]".repeat(type.arrayDepth);
}
