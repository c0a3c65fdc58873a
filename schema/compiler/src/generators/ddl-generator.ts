/**
 * DDL Synthesizer
 *
 * CREATE TABLE, CREATE INDEX and DROP TABLE text for one entity. Default and
 * check expressions are emitted verbatim.
 */

import {
  columnName,
  indexName,
  REFERENTIAL_ACTION_SQL,
  type EntitySchema,
  type FieldSchema,
  type IndexKind,
  type IndexSpec,
} from "../ir/entity.js";
import { requireImplemented, type Dialect } from "../dialects/index.js";
import {
  HeuristicRelationResolver,
  type RelationResolver,
} from "./relations.js";
import { renderSqlType } from "./type-mapper.js";

function usingClause(kind: IndexKind): string {
  return kind === "btree" ? "" : ` USING ${kind}`;
}

export class DdlSynthesizer {
  constructor(
    private readonly relations: RelationResolver = new HeuristicRelationResolver()
  ) {}

  createTable(entity: EntitySchema): string {
    const dialect = requireImplemented(entity.dialect);
    const columns = entity
      .allFields()
      .map((field) => this.columnDefinition(entity, field, dialect));

    return `CREATE TABLE IF NOT EXISTS ${entity.tableQualifiedName()} (\n${columns.join(",\n")}\n);`;
  }

  dropTable(entity: EntitySchema): string {
    requireImplemented(entity.dialect);
    return `DROP TABLE IF EXISTS ${entity.tableQualifiedName()} CASCADE;`;
  }

  /** Single-column indexes in field order, then declared composite indexes */
  indexes(entity: EntitySchema): string[] {
    requireImplemented(entity.dialect);
    const table = entity.tableQualifiedName();

    const single = entity.allFields().flatMap((field) => {
      const kind = field.column.index;
      if (kind === undefined) return [];
      const column = columnName(field);
      return [
        `CREATE INDEX IF NOT EXISTS idx_${entity.table}_${column} ON ${table}${usingClause(kind)} (${column});`,
      ];
    });

    const composite = entity.indexes.map((index) =>
      this.compositeIndex(entity, index)
    );

    return [...single, ...composite];
  }

  up(entity: EntitySchema): string {
    return [this.createTable(entity), ...this.indexes(entity)].join("\n") + "\n";
  }

  down(entity: EntitySchema): string {
    return this.dropTable(entity) + "\n";
  }

  private columnDefinition(
    entity: EntitySchema,
    field: FieldSchema,
    dialect: Dialect
  ): string {
    const type = dialect.types.map(field.type, field.column);
    const parts = [`    ${columnName(field)}`, renderSqlType(type)];

    if (field.isIdentity) {
      parts.push("PRIMARY KEY");
    } else if (!type.nullable && type.arrayDepth === 0) {
      parts.push("NOT NULL");
    }
    if (field.column.unique) {
      parts.push("UNIQUE");
    }
    if (field.column.default !== undefined) {
      parts.push(`DEFAULT ${field.column.default}`);
    }
    if (field.column.check !== undefined) {
      parts.push(`CHECK (${field.column.check})`);
    }
    if (field.relation) {
      const target = this.relations.resolve(field.relation.target, entity);
      let reference = `REFERENCES ${target.qualifiedTable}(${target.identityColumn})`;
      if (field.relation.onDelete) {
        reference += ` ON DELETE ${REFERENTIAL_ACTION_SQL[field.relation.onDelete]}`;
      }
      parts.push(reference);
    }

    return parts.join(" ");
  }

  private compositeIndex(entity: EntitySchema, index: IndexSpec): string {
    const unique = index.unique ? "UNIQUE " : "";
    let sql =
      `CREATE ${unique}INDEX IF NOT EXISTS ${indexName(index, entity.table)} ` +
      `ON ${entity.tableQualifiedName()}${usingClause(index.kind)} (${index.columns.join(", ")})`;
    if (index.where !== undefined) {
      sql += ` WHERE ${index.where}`;
    }
    return `${sql};`;
  }
}
