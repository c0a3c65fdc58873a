/**
 * Type Expression Tests
 */

import { describe, it, expect } from "vitest";
import {
  baseScalar,
  isOptional,
  list,
  optional,
  parseTypeExpr,
  renderTypeExpr,
  scalar,
  TypeExprSyntaxError,
} from "../src/ir/type-expr.js";

describe("parseTypeExpr", () => {
  it("should parse a bare scalar", () => {
    expect(parseTypeExpr("Uuid")).toEqual(scalar("Uuid"));
  });

  it("should parse nested wrappers", () => {
    expect(parseTypeExpr("Option<Vec<i32>>")).toEqual(optional(list(scalar("i32"))));
    expect(parseTypeExpr("List<Optional<Array<f64>>>")).toEqual(
      list(optional(list(scalar("f64"))))
    );
  });

  it("should drop generic arguments of non-wrapper types", () => {
    expect(parseTypeExpr("DateTime<Utc>")).toEqual(scalar("DateTime"));
    expect(parseTypeExpr("Option<DateTime<Utc>>")).toEqual(optional(scalar("DateTime")));
  });

  it("should reduce paths to their last segment", () => {
    expect(parseTypeExpr("chrono::NaiveDate")).toEqual(scalar("NaiveDate"));
    expect(parseTypeExpr("Option<serde_json::Value>")).toEqual(optional(scalar("Value")));
  });

  it("should tolerate whitespace", () => {
    expect(parseTypeExpr(" Vec < String > ")).toEqual(list(scalar("String")));
  });

  it("should reject a wrapper with the wrong number of arguments", () => {
    expect(() => parseTypeExpr("Option<i32, i64>")).toThrow(TypeExprSyntaxError);
  });

  it("should reject unbalanced brackets", () => {
    expect(() => parseTypeExpr("Vec<i32")).toThrow(TypeExprSyntaxError);
  });

  it("should reject trailing text", () => {
    expect(() => parseTypeExpr("i32 i64")).toThrow('Unexpected "i64" after type in "i32 i64"');
  });

  it("should reject an empty type", () => {
    expect(() => parseTypeExpr("")).toThrow(TypeExprSyntaxError);
  });
});

describe("type expression helpers", () => {
  it("should render canonical wrapper names", () => {
    expect(renderTypeExpr(parseTypeExpr("List<Optional<i32>>"))).toBe("Vec<Option<i32>>");
  });

  it("should report optional only at the outermost level", () => {
    expect(isOptional(parseTypeExpr("Option<i32>"))).toBe(true);
    expect(isOptional(parseTypeExpr("Vec<Option<i32>>"))).toBe(false);
  });

  it("should find the innermost scalar", () => {
    expect(baseScalar(parseTypeExpr("Option<Vec<Vec<u8>>>"))).toBe("u8");
  });
});
