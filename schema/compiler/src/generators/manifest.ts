/**
 * Generation manifest
 *
 * Records which schema produced which artifacts, by content hash. Contains
 * no timestamps so the same input always yields the same manifest.
 */

import { createHash } from "node:crypto";

export const GENERATOR = { name: "entity-sqlgen", version: "0.1.0" } as const;

export type ArtifactKind = "up" | "down" | "repository";

export interface EntityArtifacts {
  entity: string;
  table: string;
  artifacts: Partial<Record<ArtifactKind, string>>;
}

export interface GenerationManifest {
  generator: { name: string; version: string };
  schema: { name?: string; version?: string; sha256: string };
  entities: Array<{
    entity: string;
    table: string;
    artifacts: Array<{ kind: ArtifactKind; sha256: string }>;
  }>;
}

const ARTIFACT_ORDER: ArtifactKind[] = ["up", "down", "repository"];

export function sha256(content: string): string {
  return createHash("sha256").update(content, "utf8").digest("hex");
}

export function buildManifest(input: {
  source: string;
  name?: string;
  version?: string;
  entities: EntityArtifacts[];
}): GenerationManifest {
  return {
    generator: { ...GENERATOR },
    schema: {
      ...(input.name !== undefined ? { name: input.name } : {}),
      ...(input.version !== undefined ? { version: input.version } : {}),
      sha256: sha256(input.source),
    },
    entities: input.entities.map(({ entity, table, artifacts }) => ({
      entity,
      table,
      artifacts: ARTIFACT_ORDER.flatMap((kind) => {
        const content = artifacts[kind];
        return content === undefined ? [] : [{ kind, sha256: sha256(content) }];
      }),
    })),
  };
}
