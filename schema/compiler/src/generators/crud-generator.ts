/**
 * CRUD Synthesizer
 *
 * Builds the parameterized statements behind every repository operation of
 * one entity. Synthesis cannot fail for a validated EntitySchema; only an
 * unimplemented dialect is rejected, in the constructor.
 */

import {
  columnName,
  type EntitySchema,
  type FieldSchema,
  type ReturningPolicy,
} from "../ir/entity.js";
import { requireImplemented, type Dialect } from "../dialects/index.js";
import { planFilterQuery, type FilterQueryPlan } from "./filter-query.js";
import { pluralize, toPascalCase } from "./naming.js";
import {
  backReferenceColumn,
  HeuristicRelationResolver,
  type RelationResolver,
} from "./relations.js";
import type {
  BindParam,
  ColumnBinding,
  ResultMapping,
  SqlStatement,
} from "./statements.js";

export interface NamedStatement {
  method: string;
  statement: SqlStatement;
}

export interface RelationStatement extends NamedStatement {
  kind: "belongs_to" | "has_many";
  target: string;
}

export interface CrudStatements {
  create?: SqlStatement;
  findById: SqlStatement;
  update?: SqlStatement;
  delete: SqlStatement;
  list: SqlStatement;
  /** Soft-delete entities only */
  hardDelete?: SqlStatement;
  restore?: SqlStatement;
  findByIdWithDeleted?: SqlStatement;
  listWithDeleted?: SqlStatement;
  /** Present when at least one field is filterable */
  query?: FilterQueryPlan;
  projections: NamedStatement[];
  relations: RelationStatement[];
}

function binding(field: FieldSchema): ColumnBinding {
  return { field: field.name, column: columnName(field) };
}

export class CrudSynthesizer {
  private readonly dialect: Dialect;
  private readonly table: string;
  private readonly identity: FieldSchema;
  private readonly identityColumn: string;

  constructor(
    private readonly entity: EntitySchema,
    private readonly relations: RelationResolver = new HeuristicRelationResolver()
  ) {
    this.dialect = requireImplemented(entity.dialect);
    this.table = entity.tableQualifiedName();
    this.identity = entity.identityField();
    this.identityColumn = columnName(this.identity);
  }

  synthesize(): CrudStatements {
    const statements: CrudStatements = {
      create: this.create(),
      findById: this.findById(),
      update: this.update(),
      delete: this.delete(),
      list: this.list(),
      query: this.entity.hasFilters() ? this.query() : undefined,
      projections: this.projections(),
      relations: this.relationStatements(),
    };

    if (this.entity.softDelete) {
      statements.hardDelete = this.hardDelete();
      statements.restore = this.restore();
      statements.findByIdWithDeleted = this.findById({ withDeleted: true });
      statements.listWithDeleted = this.list({ withDeleted: true });
    }

    return statements;
  }

  /** Inserts every field; identity and generated values are filled before the write */
  create(): SqlStatement | undefined {
    if (this.entity.createFields().length === 0) return undefined;

    const fields = this.entity.allFields();
    const columns = fields.map(columnName);
    const insert =
      `INSERT INTO ${this.table} (${columns.join(", ")}) ` +
      `VALUES (${this.dialect.placeholders(fields.length)})`;
    const params = fields.map((f): BindParam => ({
      kind: "field",
      ...binding(f),
      from: "entity",
    }));

    const policy = this.returningPolicy();
    switch (policy.mode) {
      case "full":
        return {
          sql: `${insert} RETURNING *`,
          params,
          result: { kind: "returned-row", columns: fields.map(binding) },
        };
      case "identity":
        return {
          sql: `${insert} RETURNING ${this.identityColumn}`,
          params,
          result: { kind: "input-entity", discardedColumns: [this.identityColumn] },
        };
      case "none":
        return {
          sql: insert,
          params,
          result: { kind: "input-entity", discardedColumns: [] },
        };
      case "custom":
        // The requested columns are never read back
        return {
          sql: `${insert} RETURNING ${policy.columns.join(", ")}`,
          params,
          result: { kind: "input-entity", discardedColumns: [...policy.columns] },
        };
    }
  }

  findById(options: { withDeleted?: boolean } = {}): SqlStatement {
    const columns = this.entity.responseFields().map(binding);
    return {
      sql:
        `SELECT ${columns.map((c) => c.column).join(", ")} FROM ${this.table} ` +
        `WHERE ${this.identityColumn} = ${this.dialect.placeholder(1)}` +
        this.liveRowFilter(" AND ", options.withDeleted),
      params: [this.identityParam()],
      result: { kind: "optional-row", columns },
    };
  }

  update(): SqlStatement | undefined {
    const fields = this.entity.updateFields();
    if (fields.length === 0) return undefined;

    const update =
      `UPDATE ${this.table} ` +
      `SET ${this.dialect.assignmentClause(fields.map(columnName))} ` +
      `WHERE ${this.identityColumn} = ${this.dialect.placeholder(fields.length + 1)}`;
    const params: BindParam[] = [
      ...fields.map((f): BindParam => ({ kind: "field", ...binding(f), from: "dto" })),
      this.identityParam(),
    ];

    const policy = this.returningPolicy();
    if (policy.mode === "full") {
      return {
        sql: `${update} RETURNING *`,
        params,
        result: { kind: "returned-row", columns: this.entity.allFields().map(binding) },
      };
    }

    const reread: ResultMapping = {
      kind: "reread",
      statement: this.findById(),
      columns: this.entity.responseFields().map(binding),
    };
    return {
      sql: policy.mode === "custom" ? `${update} RETURNING ${policy.columns.join(", ")}` : update,
      params,
      result: reread,
    };
  }

  /** Marks the row deleted when soft delete is on, removes it otherwise */
  delete(): SqlStatement {
    if (!this.entity.softDelete) {
      return this.hardDelete();
    }
    const marker = this.entity.softDeleteColumn;
    return {
      sql:
        `UPDATE ${this.table} SET ${marker} = NOW() ` +
        `WHERE ${this.identityColumn} = ${this.dialect.placeholder(1)} AND ${marker} IS NULL`,
      params: [this.identityParam()],
      result: { kind: "rows-affected" },
    };
  }

  hardDelete(): SqlStatement {
    return {
      sql: `DELETE FROM ${this.table} WHERE ${this.identityColumn} = ${this.dialect.placeholder(1)}`,
      params: [this.identityParam()],
      result: { kind: "rows-affected" },
    };
  }

  restore(): SqlStatement {
    const marker = this.entity.softDeleteColumn;
    return {
      sql:
        `UPDATE ${this.table} SET ${marker} = NULL ` +
        `WHERE ${this.identityColumn} = ${this.dialect.placeholder(1)} AND ${marker} IS NOT NULL`,
      params: [this.identityParam()],
      result: { kind: "rows-affected" },
    };
  }

  list(options: { withDeleted?: boolean } = {}): SqlStatement {
    const columns = this.entity.responseFields().map(binding);
    return {
      sql:
        `SELECT ${columns.map((c) => c.column).join(", ")} FROM ${this.table} ` +
        this.liveRowFilter("WHERE ", options.withDeleted, " ") +
        `ORDER BY ${this.identityColumn} DESC ` +
        `LIMIT ${this.dialect.placeholder(1)} OFFSET ${this.dialect.placeholder(2)}`,
      params: [{ kind: "limit" }, { kind: "offset" }],
      result: { kind: "rows", columns },
    };
  }

  query(): FilterQueryPlan {
    return planFilterQuery(
      this.entity,
      this.entity.responseFields().map(columnName)
    );
  }

  projections(): NamedStatement[] {
    return this.entity.projections().map((projection) => {
      const columns = projection.fields.flatMap((name) => {
        const field = this.entity.field(name);
        return field ? [binding(field)] : [];
      });
      return {
        method: `findById${toPascalCase(projection.name)}`,
        statement: {
          sql:
            `SELECT ${columns.map((c) => c.column).join(", ")} FROM ${this.table} ` +
            `WHERE ${this.identityColumn} = ${this.dialect.placeholder(1)}` +
            this.liveRowFilter(" AND "),
          params: [this.identityParam()],
          result: { kind: "optional-row", columns },
        },
      };
    });
  }

  relationStatements(): RelationStatement[] {
    const belongsTo = this.entity.relationFields().flatMap((field): RelationStatement[] => {
      if (!field.relation) return [];
      const { target } = field.relation;
      const resolved = this.relations.resolve(target, this.entity);
      return [
        {
          kind: "belongs_to",
          target,
          method: `find${toPascalCase(target)}`,
          statement: {
            sql:
              `SELECT * FROM ${resolved.qualifiedTable} ` +
              `WHERE ${resolved.identityColumn} = ${this.dialect.placeholder(1)}`,
            params: [{ kind: "field", ...binding(field), from: "entity" }],
            result: { kind: "related-row", target },
          },
        },
      ];
    });

    const hasMany = this.entity.oneToManyTargets().map((target): RelationStatement => {
      const resolved = this.relations.resolve(target, this.entity);
      return {
        kind: "has_many",
        target,
        method: `find${pluralize(toPascalCase(target))}`,
        statement: {
          sql:
            `SELECT * FROM ${resolved.qualifiedTable} ` +
            `WHERE ${backReferenceColumn(this.entity)} = ${this.dialect.placeholder(1)}`,
          params: [this.identityParam()],
          result: { kind: "related-rows", target },
        },
      };
    });

    return [...belongsTo, ...hasMany];
  }

  private returningPolicy(): ReturningPolicy {
    return this.dialect.supportsReturning() ? this.entity.returning : { mode: "none" };
  }

  private identityParam(): BindParam {
    return { kind: "identity", ...binding(this.identity) };
  }

  private liveRowFilter(prefix: string, withDeleted = false, suffix = ""): string {
    if (!this.entity.softDelete || withDeleted) return "";
    return `${prefix}${this.entity.softDeleteColumn} IS NULL${suffix}`;
  }
}
