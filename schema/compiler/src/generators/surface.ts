/**
 * Repository surface
 *
 * Structural description of the generated data-access API for one entity:
 * DTO field sets, operation signatures and, at `sql: full`, the statement
 * behind each operation.
 */

import {
  columnName,
  type DialectName,
  type EntitySchema,
  type FieldSchema,
  type IdentityGeneration,
  type SqlLevel,
} from "../ir/entity.js";
import {
  list,
  optional,
  renderTypeExpr,
  scalar,
  type TypeExpr,
} from "../ir/type-expr.js";
import { CrudSynthesizer, type CrudStatements } from "./crud-generator.js";
import type { FilterQueryPlan } from "./filter-query.js";
import { pluralize, toPascalCase } from "./naming.js";
import type { RelationResolver } from "./relations.js";
import type { SqlStatement } from "./statements.js";

export interface DtoField {
  name: string;
  column: string;
  type: string;
}

export interface DtoDescription {
  name: string;
  fields: DtoField[];
}

export interface OperationParam {
  name: string;
  type: string;
}

export interface OperationDescription {
  name: string;
  params: OperationParam[];
  returns: string;
  statement?: SqlStatement;
  plan?: FilterQueryPlan;
}

export interface RepositoryDescription {
  entity: string;
  repository: string;
  table: string;
  dialect: DialectName;
  sqlLevel: Exclude<SqlLevel, "none">;
  errorType: string;
  softDelete: boolean;
  identity: { field: string; column: string; generation: IdentityGeneration };
  dtos: {
    create?: DtoDescription;
    update?: DtoDescription;
    response: DtoDescription;
    query?: DtoDescription;
  };
  operations: OperationDescription[];
}

export interface DescribeOptions {
  relations?: RelationResolver;
}

const BOOL = scalar("bool");
const PAGE = scalar("i64");

function dtoField(field: FieldSchema, type: TypeExpr = field.type): DtoField {
  return { name: field.name, column: columnName(field), type: renderTypeExpr(type) };
}

/** Filter inputs are all optional; range fields split into `_from`/`_to` */
function queryFields(entity: EntitySchema): DtoField[] {
  const fields = entity.filterFields().flatMap((field) => {
    const type = field.type.kind === "optional" ? field.type : optional(field.type);
    if (field.filter === "range") {
      return [
        { ...dtoField(field, type), name: `${field.name}_from` },
        { ...dtoField(field, type), name: `${field.name}_to` },
      ];
    }
    return [dtoField(field, type)];
  });
  return [
    ...fields,
    { name: "limit", column: "", type: renderTypeExpr(optional(PAGE)) },
    { name: "offset", column: "", type: renderTypeExpr(optional(PAGE)) },
  ];
}

export function describeRepository(
  entity: EntitySchema,
  options: DescribeOptions = {}
): RepositoryDescription | undefined {
  const sqlLevel = entity.sqlLevel;
  if (sqlLevel === "none") return undefined;

  const statements: CrudStatements | undefined =
    sqlLevel === "full"
      ? new CrudSynthesizer(entity, options.relations).synthesize()
      : undefined;

  const name = entity.name;
  const identity = entity.identityField();
  const idParam: OperationParam = { name: "id", type: renderTypeExpr(identity.type) };
  const self = scalar(name);

  const createFields = entity.createFields();
  const updateFields = entity.updateFields();

  const dtos: RepositoryDescription["dtos"] = {
    response: {
      name: `${name}Response`,
      fields: entity.responseFields().map((f) => dtoField(f)),
    },
  };
  if (createFields.length > 0) {
    dtos.create = { name: `Create${name}Request`, fields: createFields.map((f) => dtoField(f)) };
  }
  if (updateFields.length > 0) {
    // Every update property is optional; absent means unchanged
    dtos.update = {
      name: `Update${name}Request`,
      fields: updateFields.map((f) =>
        dtoField(f, f.type.kind === "optional" ? f.type : optional(f.type))
      ),
    };
  }
  if (entity.hasFilters()) {
    dtos.query = { name: `${name}Query`, fields: queryFields(entity) };
  }

  const operations: OperationDescription[] = [];
  const op = (
    opName: string,
    params: OperationParam[],
    returns: TypeExpr,
    statement?: SqlStatement
  ): void => {
    operations.push({
      name: opName,
      params,
      returns: renderTypeExpr(returns),
      ...(statement ? { statement } : {}),
    });
  };

  if (dtos.create) {
    op("create", [{ name: "dto", type: dtos.create.name }], self, statements?.create);
  }
  op("findById", [idParam], optional(self), statements?.findById);
  if (dtos.update) {
    op("update", [idParam, { name: "dto", type: dtos.update.name }], self, statements?.update);
  }
  op("delete", [idParam], BOOL, statements?.delete);
  op(
    "list",
    [
      { name: "limit", type: renderTypeExpr(PAGE) },
      { name: "offset", type: renderTypeExpr(PAGE) },
    ],
    list(self),
    statements?.list
  );
  if (dtos.query) {
    operations.push({
      name: "query",
      params: [{ name: "query", type: dtos.query.name }],
      returns: renderTypeExpr(list(self)),
      ...(statements?.query ? { plan: statements.query } : {}),
    });
  }

  if (entity.softDelete) {
    op("hardDelete", [idParam], BOOL, statements?.hardDelete);
    op("restore", [idParam], BOOL, statements?.restore);
    op("findByIdWithDeleted", [idParam], optional(self), statements?.findByIdWithDeleted);
    op(
      "listWithDeleted",
      [
        { name: "limit", type: renderTypeExpr(PAGE) },
        { name: "offset", type: renderTypeExpr(PAGE) },
      ],
      list(self),
      statements?.listWithDeleted
    );
  }

  for (const projection of entity.projections()) {
    const method = `findById${toPascalCase(projection.name)}`;
    const statement = statements?.projections.find((p) => p.method === method)?.statement;
    op(method, [idParam], optional(scalar(`${name}${toPascalCase(projection.name)}`)), statement);
  }

  for (const field of entity.relationFields()) {
    if (!field.relation) continue;
    const { target } = field.relation;
    const method = `find${toPascalCase(target)}`;
    const statement = statements?.relations.find((r) => r.method === method)?.statement;
    op(method, [idParam], optional(scalar(target)), statement);
  }
  for (const target of entity.oneToManyTargets()) {
    const method = `find${pluralize(toPascalCase(target))}`;
    const statement = statements?.relations.find((r) => r.method === method)?.statement;
    op(method, [idParam], list(scalar(target)), statement);
  }

  return {
    entity: name,
    repository: `${name}Repository`,
    table: entity.tableQualifiedName(),
    dialect: entity.dialect,
    sqlLevel,
    errorType: entity.errorType,
    softDelete: entity.softDelete,
    identity: {
      field: identity.name,
      column: columnName(identity),
      generation: entity.identityGeneration,
    },
    dtos,
    operations,
  };
}
