/**
 * Dynamic Filter Query Tests
 */

import { describe, it, expect } from "vitest";
import { CrudSynthesizer } from "../src/generators/crud-generator.js";
import {
  buildFilterQuery,
  escapeLikePattern,
  type FilterQueryPlan,
} from "../src/generators/filter-query.js";
import { EntityBuilder } from "../src/ir/builder.js";
import { build, field, idField, usersEntity } from "./fixtures.js";

const SELECT = "SELECT id, title, status, published_at FROM public.articles";

function articlesPlan(): FilterQueryPlan {
  const entity = build(
    new EntityBuilder("Article")
      .table("articles")
      .softDelete(true)
      .field(idField())
      .field(field("title", "String", { filter: "like" }))
      .field(field("status", "String", { filter: "eq" }))
      .field(field("published_at", "Option<DateTime>", { filter: "range" }))
      .field(field("deleted_at", "Option<DateTime>", { isGenerated: true, expose: [] }))
  );
  const plan = new CrudSynthesizer(entity).synthesize().query;
  if (!plan) throw new Error("query plan missing");
  return plan;
}

describe("planFilterQuery", () => {
  it("should describe every filter input", () => {
    const plan = articlesPlan();
    expect(plan.select).toBe(SELECT);
    expect(plan.fixedConditions).toEqual(["deleted_at IS NULL"]);
    expect(plan.conditions).toEqual([
      { input: "title", field: "title", column: "title", operator: "ILIKE", pattern: "contains" },
      { input: "status", field: "status", column: "status", operator: "=" },
      { input: "published_at_from", field: "published_at", column: "published_at", operator: ">=" },
      { input: "published_at_to", field: "published_at", column: "published_at", operator: "<=" },
    ]);
    expect(plan.defaultLimit).toBe(100);
    expect(plan.defaultOffset).toBe(0);
  });
});

describe("buildFilterQuery", () => {
  it("should keep only the soft-delete term without input", () => {
    const query = buildFilterQuery(articlesPlan());
    expect(query.sql).toBe(
      `${SELECT} WHERE deleted_at IS NULL ORDER BY id DESC LIMIT $1 OFFSET $2`
    );
    expect(query.values).toEqual([100, 0]);
  });

  it("should number placeholders in the order conditions are emitted", () => {
    const query = buildFilterQuery(articlesPlan(), {
      title: "50%_off",
      published_at_to: "2024-12-31",
    });
    expect(query.sql).toBe(
      `${SELECT} WHERE deleted_at IS NULL AND title ILIKE $1 AND published_at <= $2 ORDER BY id DESC LIMIT $3 OFFSET $4`
    );
    expect(query.values).toEqual(["%50\\%\\_off%", "2024-12-31", 100, 0]);
    expect(query.params.map((p) => p.kind)).toEqual(["filter", "filter", "limit", "offset"]);
  });

  it("should bind both range ends independently", () => {
    const query = buildFilterQuery(articlesPlan(), {
      published_at_from: "2024-01-01",
      published_at_to: "2024-12-31",
    });
    expect(query.sql).toBe(
      `${SELECT} WHERE deleted_at IS NULL AND published_at >= $1 AND published_at <= $2 ORDER BY id DESC LIMIT $3 OFFSET $4`
    );
  });

  it("should take caller pagination and treat null as absent", () => {
    const query = buildFilterQuery(articlesPlan(), {
      status: "draft",
      title: null,
      limit: 10,
      offset: 20,
    });
    expect(query.sql).toBe(
      `${SELECT} WHERE deleted_at IS NULL AND status = $1 ORDER BY id DESC LIMIT $2 OFFSET $3`
    );
    expect(query.values).toEqual(["draft", 10, 20]);
  });

  it("should omit WHERE when there are no conditions", () => {
    const entity = usersEntity((b) => b.field(field("role", "String", { filter: "eq" })));
    const plan = new CrudSynthesizer(entity).query();
    expect(buildFilterQuery(plan).sql).toBe(
      "SELECT id, name, email, role FROM public.users ORDER BY id DESC LIMIT $1 OFFSET $2"
    );
  });

  it("should work from a plan that went through JSON", () => {
    const plan = articlesPlan();
    const restored: FilterQueryPlan = JSON.parse(JSON.stringify(plan));
    expect(buildFilterQuery(restored, { status: "live" })).toEqual(
      buildFilterQuery(plan, { status: "live" })
    );
  });
});

describe("escapeLikePattern", () => {
  it("should escape LIKE metacharacters", () => {
    expect(escapeLikePattern("a\\b%c_d")).toBe("a\\\\b\\%c\\_d");
  });
});
