/**
 * Migration assembly
 *
 * Concatenates per-entity DDL so that a referenced table is created before
 * the tables pointing at it. Down migrations drop in the reverse order.
 */

import type { EntitySchema } from "../ir/entity.js";
import type { ValidationError } from "../validation-errors.js";
import { DdlSynthesizer } from "./ddl-generator.js";
import { CatalogRelationResolver } from "./relations.js";

export interface MigrationPlan {
  order: string[];
  up: string;
  down: string;
  warnings: ValidationError[];
}

/** Entity name -> names of the declared entities it references */
function dependencyGraph(entities: readonly EntitySchema[]): Map<string, string[]> {
  const declared = new Set(entities.map((e) => e.name));
  const graph = new Map<string, string[]>();

  for (const entity of entities) {
    const targets = entity
      .relationFields()
      .flatMap((f) => (f.relation ? [f.relation.target] : []))
      .filter((target) => target !== entity.name && declared.has(target));
    graph.set(entity.name, Array.from(new Set(targets)));
  }
  return graph;
}

/**
 * Depth-first cycle search over the reference graph. Every cycle is
 * returned as the path that closes it, e.g. `[A, B, A]`.
 */
export function detectCycles(graph: Map<string, string[]>): string[][] {
  const visited = new Set<string>();
  const recStack = new Set<string>();
  const cycles: string[][] = [];

  const dfs = (node: string, path: string[]): void => {
    visited.add(node);
    recStack.add(node);
    path.push(node);

    for (const neighbor of graph.get(node) ?? []) {
      if (!visited.has(neighbor)) {
        dfs(neighbor, [...path]);
      } else if (recStack.has(neighbor)) {
        const cycleStart = path.indexOf(neighbor);
        cycles.push([...path.slice(cycleStart), neighbor]);
      }
    }

    recStack.delete(node);
  };

  for (const node of graph.keys()) {
    if (!visited.has(node)) {
      dfs(node, []);
    }
  }
  return cycles;
}

/**
 * Referenced entities first; ties keep declaration order. With a cycle the
 * declaration order is kept as is.
 */
export function orderEntities(entities: readonly EntitySchema[]): {
  order: EntitySchema[];
  cycles: string[][];
} {
  const graph = dependencyGraph(entities);
  const cycles = detectCycles(graph);
  if (cycles.length > 0) {
    return { order: [...entities], cycles };
  }

  const byName = new Map(entities.map((e) => [e.name, e]));
  const placed = new Set<string>();
  const order: EntitySchema[] = [];

  const place = (name: string): void => {
    if (placed.has(name)) return;
    placed.add(name);
    for (const dependency of graph.get(name) ?? []) {
      place(dependency);
    }
    const entity = byName.get(name);
    if (entity) order.push(entity);
  };

  for (const entity of entities) {
    place(entity.name);
  }
  return { order, cycles };
}

export function assembleMigrations(
  entities: readonly EntitySchema[],
  ddl: DdlSynthesizer = new DdlSynthesizer(new CatalogRelationResolver(entities))
): MigrationPlan {
  const { order, cycles } = orderEntities(entities.filter((e) => e.migrations));

  const warnings = cycles.map(
    (cycle): ValidationError => ({
      type: "warning",
      message: `Circular reference detected: ${cycle.join(" → ")}`,
      path: "entities",
      segments: ["entities"],
      suggestion:
        "Tables are created in declaration order; add the foreign keys of one side in a later migration",
    })
  );

  return {
    order: order.map((e) => e.name),
    up: order.map((e) => ddl.up(e)).join("\n"),
    down: [...order].reverse().map((e) => ddl.down(e)).join(""),
    warnings,
  };
}
