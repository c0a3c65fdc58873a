/**
 * Shared builders for entity tests
 */

import { EntityBuilder } from "../src/ir/builder.js";
import type { EntitySchema, FieldSchema } from "../src/ir/entity.js";
import { parseTypeExpr } from "../src/ir/type-expr.js";

export function field(
  name: string,
  type: string,
  overrides: Partial<FieldSchema> = {}
): FieldSchema {
  return {
    name,
    type: parseTypeExpr(type),
    isIdentity: false,
    isGenerated: false,
    expose: ["create", "update", "response"],
    filter: "none",
    column: { unique: false, nullable: false },
    ...overrides,
  };
}

export function idField(name = "id", type = "Uuid"): FieldSchema {
  return field(name, type, { isIdentity: true, expose: ["response"] });
}

/** Build or fail the test with the collected error messages */
export function build(builder: EntityBuilder): EntitySchema {
  const result = builder.build();
  if (!result.ok) {
    throw new Error(result.errors.map((e) => `${e.path}: ${e.message}`).join("\n"));
  }
  return result.entity;
}

/** `users(id, name, email)`, no soft delete */
export function usersEntity(configure: (b: EntityBuilder) => EntityBuilder = (b) => b): EntitySchema {
  return build(
    configure(
      new EntityBuilder("User")
        .table("users")
        .field(idField())
        .field(field("name", "String"))
        .field(field("email", "String"))
    )
  );
}

/** `metrics(id, value, deleted_at)` with soft delete on */
export function metricsEntity(): EntitySchema {
  return build(
    new EntityBuilder("Metric")
      .table("metrics")
      .softDelete(true)
      .field(idField("id", "i64"))
      .field(field("value", "f64"))
      .field(
        field("deleted_at", "Option<DateTime>", { isGenerated: true, expose: [] })
      )
  );
}
