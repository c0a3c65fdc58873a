/**
 * Entity IR and Builder Tests
 */

import { describe, it, expect } from "vitest";
import { EntityBuilder } from "../src/ir/builder.js";
import { build, field, idField, usersEntity } from "./fixtures.js";

describe("EntityBuilder", () => {
  it("should build an entity with exactly one identity", () => {
    const result = new EntityBuilder("User").table("users").field(idField()).build();
    expect(result.ok).toBe(true);
  });

  it("should fail without an identity field", () => {
    const result = new EntityBuilder("User")
      .table("users")
      .field(field("name", "String"))
      .build();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors).toContainEqual(
      expect.objectContaining({
        message: 'Entity "User" must have exactly one identity field',
        path: "entities.User.fields",
      })
    );
  });

  it("should fail with two identity fields", () => {
    const result = new EntityBuilder("User")
      .table("users")
      .field(idField("id"), ["entities", "User", "fields", 0])
      .field(idField("uuid"), ["entities", "User", "fields", 1])
      .build();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].path).toBe("entities.User.fields[1].identity");
    expect(result.errors[0].message).toBe(
      'Entity "User" must have exactly one identity field, found 2 ("id", "uuid")'
    );
  });

  it("should merge diagnostics raised while reading clauses", () => {
    const result = new EntityBuilder("User")
      .table("users")
      .field(idField())
      .build({
        errors: [{ type: "error", message: "bad clause", path: "x", segments: ["x"] }],
        warnings: [],
      });
    expect(result.ok).toBe(false);
  });
});

describe("EntitySchema", () => {
  const entity = build(
    new EntityBuilder("Account")
      .table("accounts")
      .namespace("billing")
      .field(field("id", "Uuid", { isIdentity: true, expose: ["create", "update"] }))
      .field(field("owner", "String"))
      .field(field("balance", "Decimal", { expose: ["update", "response"] }))
      .field(field("secret", "String", { expose: ["create", "response", "skip"] }))
      .field(field("created_at", "DateTime", { isGenerated: true, expose: ["create", "response"] }))
      .field(field("status", "String", { filter: "eq", expose: [] }))
  );

  it("should keep identity and generated fields out of the write sets", () => {
    for (const f of [...entity.createFields(), ...entity.updateFields()]) {
      expect(f.isIdentity).toBe(false);
      expect(f.isGenerated).toBe(false);
    }
    expect(entity.createFields().map((f) => f.name)).toEqual(["owner"]);
    expect(entity.updateFields().map((f) => f.name)).toEqual(["owner", "balance"]);
  });

  it("should always include the identity in the response", () => {
    expect(entity.responseFields().map((f) => f.name)).toEqual([
      "id",
      "owner",
      "balance",
      "created_at",
    ]);
  });

  it("should let skip override every exposure", () => {
    const names = [
      ...entity.createFields(),
      ...entity.updateFields(),
      ...entity.responseFields(),
    ].map((f) => f.name);
    expect(names).not.toContain("secret");
  });

  it("should expose filter fields separately", () => {
    expect(entity.hasFilters()).toBe(true);
    expect(entity.filterFields().map((f) => f.name)).toEqual(["status"]);
  });

  it("should qualify the table with its namespace", () => {
    expect(entity.tableQualifiedName()).toBe("billing.accounts");
  });

  it("should be frozen all the way down", () => {
    expect(Object.isFrozen(entity)).toBe(true);
    expect(Object.isFrozen(entity.allFields())).toBe(true);
    expect(Object.isFrozen(entity.allFields()[0].column)).toBe(true);
    expect(Object.isFrozen(entity.createFields())).toBe(true);
  });

  it("should not share state with the builder input", () => {
    const column = { unique: false, nullable: false };
    const users = usersEntity((b) => b.field(field("nickname", "String", { column })));
    column.unique = true;
    expect(users.field("nickname")?.column.unique).toBe(false);
  });

  it("should default to the public namespace and full returning", () => {
    const users = usersEntity();
    expect(users.namespace).toBe("public");
    expect(users.returning).toEqual({ mode: "full" });
    expect(users.errorType).toBe("DatabaseError");
    expect(users.identityGeneration).toBe("v7");
  });
});
