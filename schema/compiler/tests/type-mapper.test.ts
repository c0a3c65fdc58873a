/**
 * Type Mapper Tests
 */

import { describe, it, expect } from "vitest";
import {
  isKnownScalar,
  mapType,
  PostgresTypeMapper,
  renderSqlType,
} from "../src/generators/type-mapper.js";
import { UnsupportedDialectError } from "../src/dialects/dialect.js";
import { parseTypeExpr } from "../src/ir/type-expr.js";

const map = (type: string, column: { nullable?: boolean; varchar?: number; sqlType?: string } = {}) =>
  mapType(parseTypeExpr(type), { nullable: false, ...column });

describe("PostgresTypeMapper", () => {
  it("should map Optional<List<i32>> to a nullable INTEGER array", () => {
    const type = map("Optional<List<i32>>");
    expect(type).toEqual({ name: "INTEGER", nullable: true, arrayDepth: 1 });
    expect(renderSqlType(type)).toBe("INTEGER[]");
  });

  it("should compose array depth across nested lists", () => {
    const type = map("Vec<Option<Vec<String>>>");
    expect(type).toEqual({ name: "TEXT", nullable: true, arrayDepth: 2 });
    expect(renderSqlType(type)).toBe("TEXT[][]");
  });

  it.each([
    ["Uuid", "UUID"],
    ["String", "TEXT"],
    ["i16", "SMALLINT"],
    ["i32", "INTEGER"],
    ["i64", "BIGINT"],
    ["f32", "REAL"],
    ["f64", "DOUBLE PRECISION"],
    ["bool", "BOOLEAN"],
    ["DateTime", "TIMESTAMPTZ"],
    ["NaiveDate", "DATE"],
    ["NaiveTime", "TIME"],
    ["NaiveDateTime", "TIMESTAMP"],
    ["Value", "JSONB"],
    ["Decimal", "DECIMAL"],
    ["IpAddr", "INET"],
    ["MacAddr", "MACADDR"],
    ["Bytes", "BYTEA"],
  ])("should map %s to %s", (source, sql) => {
    expect(map(source).name).toBe(sql);
  });

  it("should use VARCHAR(n) for bounded text", () => {
    expect(map("String", { varchar: 255 }).name).toBe("VARCHAR(255)");
  });

  it("should ignore varchar on non-text types", () => {
    expect(map("i32", { varchar: 10 }).name).toBe("INTEGER");
  });

  it("should let an explicit sql type win", () => {
    expect(map("Vec<String>", { sqlType: "CITEXT" })).toEqual({
      name: "CITEXT",
      nullable: false,
      arrayDepth: 0,
    });
    expect(map("Option<String>", { sqlType: "CITEXT" }).nullable).toBe(true);
  });

  it("should take nullability from the column override", () => {
    expect(map("i32", { nullable: true }).nullable).toBe(true);
  });

  it("should fall back to TEXT for unknown scalars", () => {
    expect(map("Money")).toEqual({ name: "TEXT", nullable: false, arrayDepth: 0 });
    expect(isKnownScalar("Money")).toBe(false);
    expect(isKnownScalar("uuid")).toBe(true);
  });

  it("should be usable directly as a mapper instance", () => {
    const mapper = new PostgresTypeMapper();
    expect(mapper.map(parseTypeExpr("Option<bool>"), { nullable: false })).toEqual({
      name: "BOOLEAN",
      nullable: true,
      arrayDepth: 0,
    });
  });

  it("should reject dialects without SQL support", () => {
    expect(() => mapType(parseTypeExpr("i32"), { nullable: false }, "clickhouse")).toThrow(
      UnsupportedDialectError
    );
  });
});
