/**
 * Relation target resolution
 *
 * A relation names its target by entity name. When the target is declared in
 * the same document its real table and identity column are used; otherwise
 * the table is guessed as `<namespace>.<pluralized snake_case name>(id)`.
 */

import { columnName, type EntitySchema } from "../ir/entity.js";
import { pluralize, toSnakeCase } from "./naming.js";

export interface RelationTarget {
  qualifiedTable: string;
  identityColumn: string;
  /** false when the table name was derived from the entity name */
  declared: boolean;
}

export interface RelationResolver {
  resolve(target: string, from: EntitySchema): RelationTarget;
}

export class HeuristicRelationResolver implements RelationResolver {
  resolve(target: string, from: EntitySchema): RelationTarget {
    return {
      qualifiedTable: `${from.namespace}.${pluralize(toSnakeCase(target))}`,
      identityColumn: "id",
      declared: false,
    };
  }
}

export class CatalogRelationResolver implements RelationResolver {
  private readonly entities = new Map<string, EntitySchema>();
  private readonly fallback = new HeuristicRelationResolver();

  constructor(entities: Iterable<EntitySchema>) {
    for (const entity of entities) {
      this.entities.set(entity.name, entity);
    }
  }

  resolve(target: string, from: EntitySchema): RelationTarget {
    const entity = this.entities.get(target);
    if (!entity) {
      return this.fallback.resolve(target, from);
    }
    return {
      qualifiedTable: entity.tableQualifiedName(),
      identityColumn: columnName(entity.identityField()),
      declared: true,
    };
  }
}

/** Column on the target table that points back at `entity` in a has_many */
export function backReferenceColumn(entity: EntitySchema): string {
  return `${toSnakeCase(entity.name)}_id`;
}
