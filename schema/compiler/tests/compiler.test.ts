/**
 * Entity Compiler Tests
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { describe, it, expect } from "vitest";
import {
  compile,
  EntityCompiler,
  SchemaValidationException,
  type CompilerOutput,
} from "../src/index.js";

const blogYAML = readFileSync(
  fileURLToPath(new URL("../examples/blog.yaml", import.meta.url)),
  "utf-8"
);

function compileError(run: () => unknown): SchemaValidationException {
  try {
    run();
  } catch (err) {
    if (err instanceof SchemaValidationException) return err;
    throw err;
  }
  throw new Error("expected a SchemaValidationException");
}

function repositoryOf(output: CompilerOutput, name: string) {
  const repository = output.entities.find((e) => e.entity.name === name)?.repository;
  if (!repository) throw new Error(`no repository for ${name}`);
  return repository;
}

describe("EntityCompiler", () => {
  describe("Blog schema", () => {
    const output = compile(blogYAML, "yaml");

    it("should compile every entity without warnings", () => {
      expect(output.name).toBe("Blog");
      expect(output.version).toBe("1.0");
      expect(output.entities.map((e) => e.entity.name)).toEqual(["User", "Post", "Comment"]);
      expect(output.warnings).toEqual([]);
    });

    it("should generate the users table", () => {
      expect(output.entities[0].up).toBe(
        [
          "CREATE TABLE IF NOT EXISTS public.users (",
          "    id UUID PRIMARY KEY,",
          "    name VARCHAR(100) NOT NULL,",
          "    email VARCHAR(255) NOT NULL UNIQUE,",
          "    password_hash TEXT NOT NULL,",
          "    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()",
          ");",
          "CREATE INDEX IF NOT EXISTS idx_users_name_email ON public.users (name, email);",
          "",
        ].join("\n")
      );
      expect(output.entities[0].down).toBe("DROP TABLE IF EXISTS public.users CASCADE;\n");
    });

    it("should generate foreign keys and indexes for posts", () => {
      const up = output.entities[1].up ?? "";
      expect(up).toContain("    author_id UUID NOT NULL REFERENCES public.users(id) ON DELETE CASCADE,\n");
      expect(up).toContain("    tags TEXT[],\n");
      expect(up).toContain("    deleted_at TIMESTAMPTZ\n);");
      expect(up.split("\n").filter((line) => line.includes("INDEX"))).toEqual([
        "CREATE INDEX IF NOT EXISTS idx_posts_title ON public.posts (title);",
        "CREATE INDEX IF NOT EXISTS idx_posts_tags ON public.posts USING gin (tags);",
        "CREATE INDEX IF NOT EXISTS idx_posts_author_id_created_at ON public.posts (author_id, created_at) WHERE deleted_at IS NULL;",
        "CREATE UNIQUE INDEX IF NOT EXISTS idx_posts_author_id_slug ON public.posts (author_id, slug);",
      ]);
    });

    it("should order migrations by reference", () => {
      expect(output.migrations.order).toEqual(["User", "Post", "Comment"]);
      expect(output.migrations.down).toBe(
        [
          "DROP TABLE IF EXISTS public.comments CASCADE;",
          "DROP TABLE IF EXISTS public.posts CASCADE;",
          "DROP TABLE IF EXISTS public.users CASCADE;",
          "",
        ].join("\n")
      );
    });

    it("should describe repositories with statements", () => {
      const posts = repositoryOf(output, "Post");
      expect(posts.errorType).toBe("BlogError");
      const create = posts.operations.find((op) => op.name === "create");
      expect(create?.statement?.sql).toBe(
        "INSERT INTO public.posts (id, author_id, title, slug, tags, created_at, deleted_at) VALUES ($1, $2, $3, $4, $5, $6, $7) RETURNING id"
      );
      const findUser = posts.operations.find((op) => op.name === "findUser");
      expect(findUser?.statement?.sql).toBe("SELECT * FROM public.users WHERE id = $1");
      const findComments = posts.operations.find((op) => op.name === "findComments");
      expect(findComments?.statement?.sql).toBe(
        "SELECT * FROM public.comments WHERE post_id = $1"
      );
    });

    it("should keep custom RETURNING columns out of the result", () => {
      const comments = repositoryOf(output, "Comment");
      const create = comments.operations.find((op) => op.name === "create");
      expect(create?.statement?.result).toEqual({
        kind: "input-entity",
        discardedColumns: ["id", "created_at"],
      });
    });

    it("should record a manifest entry per entity", () => {
      expect(output.manifest.entities.map((e) => [e.entity, e.table])).toEqual([
        ["User", "public.users"],
        ["Post", "public.posts"],
        ["Comment", "public.comments"],
      ]);
      expect(output.manifest.entities[0].artifacts.map((a) => a.kind)).toEqual([
        "up",
        "down",
        "repository",
      ]);
    });

    it("should produce identical output for identical input", () => {
      expect(JSON.stringify(compile(blogYAML, "yaml"))).toBe(JSON.stringify(output));
    });
  });

  describe("Diagnostics", () => {
    const reservedYAML = `
entities:
  Item:
    table: items
    fields:
      - { name: id, type: i64, identity: true }
      - { name: order, type: i32, expose: [create, response] }
`;

    it("should return warnings in normal mode", () => {
      const output = compile(reservedYAML, "yaml");
      expect(output.warnings.map((w) => w.message)).toEqual([
        'Column name "order" is a reserved SQL keyword',
      ]);
    });

    it("should fail on warnings in strict mode", () => {
      const error = compileError(() => new EntityCompiler({ strict: true }).compile(reservedYAML));
      expect(error.errors).toEqual([
        expect.objectContaining({
          type: "error",
          message: 'Column name "order" is a reserved SQL keyword',
          path: "entities.Item.fields[1].name",
          line: 7,
        }),
      ]);
    });

    it("should throw with every parse error", () => {
      const error = compileError(() =>
        compile(
          `
entities:
  Item:
    fields:
      - { name: id, type: i64 }
`,
          "yaml"
        )
      );
      expect(error.errors.map((e) => e.message)).toEqual([
        'Entity "Item" is missing a table name',
        'Entity "Item" must have exactly one identity field',
      ]);
    });

    it("should report unimplemented dialects on the entity", () => {
      const error = compileError(() =>
        compile(
          `
entities:
  Event:
    table: events
    dialect: clickhouse
    fields:
      - { name: id, type: Uuid, identity: true }
`,
          "yaml"
        )
      );
      expect(error.errors.map((e) => [e.path, e.message])).toEqual([
        [
          "entities.Event.dialect",
          "ClickHouse support is not yet implemented. Use `sql: trait` to generate the repository interface only, then implement it manually.",
        ],
        ["entities.Event.dialect", "Migrations for clickhouse are not yet implemented"],
      ]);
    });

    it("should compile an unimplemented dialect at sql level trait", () => {
      const output = compile(
        `
entities:
  Event:
    table: events
    dialect: clickhouse
    sql: trait
    migrations: false
    fields:
      - { name: id, type: Uuid, identity: true }
`,
        "yaml"
      );
      const [event] = output.entities;
      expect(event.repository?.sqlLevel).toBe("trait");
      expect(event.repository?.dialect).toBe("clickhouse");
      expect(event.up).toBeUndefined();
      expect(output.migrations.order).toEqual([]);
    });
  });

  it("should compile JSON the same way as YAML", () => {
    const json = JSON.stringify({
      entities: {
        Tag: {
          table: "tags",
          fields: [
            { name: "id", type: "i64", identity: true, expose: ["response"] },
            { name: "label", type: "String", expose: ["create", "response"] },
          ],
        },
      },
    });
    const yaml = `
entities:
  Tag:
    table: tags
    fields:
      - { name: id, type: i64, identity: true, expose: [response] }
      - { name: label, type: String, expose: [create, response] }
`;
    expect(compile(json, "json").migrations).toEqual(compile(yaml, "yaml").migrations);
  });

  it("should skip the repository at sql level none", () => {
    const output = compile(`
entities:
  Tag:
    table: tags
    sql: none
    fields:
      - { name: id, type: i64, identity: true }
`);
    expect(output.entities[0].repository).toBeUndefined();
    expect(output.entities[0].up).toContain("CREATE TABLE IF NOT EXISTS public.tags (");
  });
});
