/**
 * Document and compiler output types
 */

import type { EntitySchema } from "./ir/entity.js";
import type { GenerationManifest } from "./generators/manifest.js";
import type { RepositoryDescription } from "./generators/surface.js";
import type { ValidationError } from "./validation-errors.js";

export type SchemaFormat = "yaml" | "json";

/** Result of reading one schema document */
export interface ParsedSchema {
  name?: string;
  version?: string;
  /** Only entities that validated without errors */
  entities: EntitySchema[];
  errors: ValidationError[];
  warnings: ValidationError[];
}

export interface EntityOutput {
  entity: EntitySchema;
  /** Absent at `sql: none` */
  repository?: RepositoryDescription;
  /** Absent when `migrations: false` */
  up?: string;
  down?: string;
}

export interface CompilerOutput {
  name?: string;
  version?: string;
  entities: EntityOutput[];
  /** All entities' DDL, referenced tables first */
  migrations: { order: string[]; up: string; down: string };
  manifest: GenerationManifest;
  warnings: ValidationError[];
}
