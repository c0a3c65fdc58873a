/**
 * Entity Validator
 *
 * The validation pass every entity goes through before it becomes an
 * EntitySchema. Checks:
 * - Table and identity presence
 * - Identifiers and duplicates
 * - Index, projection and RETURNING references
 * - Generated method names (relations, has_many, projections) must not collide
 * - Write-set and response-set rules
 * - Soft-delete marker and unrecognized scalar types (warnings)
 */

import type { EntityDraft } from "./ir/builder.js";
import { columnName, isSkipped, SOFT_DELETE_COLUMN } from "./ir/entity.js";
import { baseScalar, isOptional } from "./ir/type-expr.js";
import { isKnownScalar } from "./generators/type-mapper.js";
import { pluralize, toPascalCase } from "./generators/naming.js";
import {
  DiagnosticSink,
  type PathSegment,
  type ValidationResult,
} from "./validation-errors.js";

// Words PostgreSQL will not accept as a bare column name
const RESERVED_KEYWORDS = new Set([
  "all",
  "and",
  "any",
  "as",
  "asc",
  "both",
  "case",
  "check",
  "column",
  "constraint",
  "create",
  "default",
  "desc",
  "distinct",
  "do",
  "else",
  "end",
  "false",
  "for",
  "foreign",
  "from",
  "grant",
  "group",
  "having",
  "in",
  "limit",
  "not",
  "null",
  "offset",
  "on",
  "or",
  "order",
  "primary",
  "references",
  "select",
  "table",
  "then",
  "to",
  "true",
  "union",
  "unique",
  "user",
  "using",
  "when",
  "where",
  "with",
]);

const MAX_IDENTIFIER_LENGTH = 63;

export class EntityValidator {
  validate(entity: EntityDraft): ValidationResult {
    const sink = new DiagnosticSink();

    this.validateEntity(entity, sink);
    const columns = this.validateFields(entity, sink);
    this.validateIndexes(entity, columns, sink);
    this.validateProjections(entity, sink);
    this.validateReturning(entity, columns, sink);
    this.validateSoftDelete(entity, sink);

    return sink.toResult();
  }

  private validateEntity(entity: EntityDraft, sink: DiagnosticSink): void {
    this.validateIdentifier(entity.name, entity.segments, sink, "key");

    if (entity.table === undefined || entity.table === "") {
      sink.error(entity.segments, `Entity "${entity.name}" is missing a table name`, {
        suggestion: `Add "table: <name>" to the declaration`,
        target: "key",
      });
    } else {
      this.validateIdentifier(entity.table, [...entity.segments, "table"], sink);
    }

    this.validateIdentifier(entity.namespace, [...entity.segments, "schema"], sink);

    const methods = new Map<string, string>();
    for (const target of entity.oneToManyTargets) {
      this.validateIdentifier(target.target, target.segments, sink);

      const method = `find${pluralize(toPascalCase(target.target))}`;
      const previous = methods.get(method);
      if (previous !== undefined) {
        sink.error(target.segments, `Duplicate has_many target "${target.target}"`, {
          suggestion: `"${previous}" already generates ${method}`,
        });
      } else {
        methods.set(method, target.target);
      }
    }
  }

  /**
   * Returns the set of names an index or RETURNING clause may refer to:
   * column names plus field names.
   */
  private validateFields(entity: EntityDraft, sink: DiagnosticSink): Set<string> {
    const fieldsPath = [...entity.segments, "fields"];
    const known = new Set<string>();

    if (entity.fields.length === 0) {
      sink.error(fieldsPath, `Entity "${entity.name}" must have at least one field`, {
        target: "key",
      });
      return known;
    }

    const fieldNames = new Set<string>();
    const columnNames = new Set<string>();
    const identities = entity.fields.filter((f) => f.isIdentity);
    // find<Target> method -> field that owns it
    const relationMethods = new Map<string, string>();

    for (const field of entity.fields) {
      const column = columnName(field);
      this.validateIdentifier(field.name, [...field.segments, "name"], sink);
      if (field.column.name !== undefined) {
        this.validateIdentifier(field.column.name, [...field.segments, "column", "name"], sink);
      }

      if (fieldNames.has(field.name)) {
        sink.error(
          [...field.segments, "name"],
          `Duplicate field name "${field.name}" in entity "${entity.name}"`
        );
      } else if (columnNames.has(column)) {
        sink.error(
          [...field.segments, "column", "name"],
          `Duplicate column name "${column}" in entity "${entity.name}"`
        );
      }
      fieldNames.add(field.name);
      columnNames.add(column);
      known.add(field.name);
      known.add(column);

      if (RESERVED_KEYWORDS.has(column.toLowerCase())) {
        sink.warn(
          [...field.segments, "name"],
          `Column name "${column}" is a reserved SQL keyword`,
          { suggestion: `Rename the field or set column.name` }
        );
      }

      if (field.isIdentity || field.isGenerated) {
        const role = field.isIdentity ? "identity" : "generated";
        for (const exposure of ["create", "update"] as const) {
          if (field.expose.includes(exposure) && !isSkipped(field)) {
            sink.warn(
              [...field.segments, "expose"],
              `Field "${field.name}" is ${role} and is left out of the ${exposure} DTO`
            );
          }
        }
      }

      if (field.isIdentity && isSkipped(field)) {
        sink.warn(
          [...field.segments, "expose"],
          `"skip" is ignored on identity field "${field.name}"; it stays in the response`
        );
      }

      const scalarName = baseScalar(field.type);
      if (field.column.sqlType === undefined && !isKnownScalar(scalarName)) {
        sink.warn(
          [...field.segments, "type"],
          `Unrecognized type "${scalarName}" on field "${field.name}" is stored as TEXT`,
          { suggestion: `Set column.sql_type to choose the column type` }
        );
      }

      if (field.relation) {
        const { target } = field.relation;
        this.validateIdentifier(target, [...field.segments, "relation"], sink);

        const method = `find${toPascalCase(target)}`;
        const owner = relationMethods.get(method);
        if (owner !== undefined) {
          sink.error(
            [...field.segments, "relation"],
            `Field "${field.name}" relates to "${target}" like field "${owner}"`,
            { suggestion: `Only one relation per target entity; both would generate ${method}` }
          );
        } else {
          relationMethods.set(method, field.name);
        }
      }
    }

    if (identities.length === 0) {
      sink.error(
        fieldsPath,
        `Entity "${entity.name}" must have exactly one identity field`,
        { suggestion: `Mark one field with "identity: true"`, target: "key" }
      );
    } else if (identities.length > 1) {
      const names = identities.map((f) => `"${f.name}"`).join(", ");
      for (const extra of identities.slice(1)) {
        sink.error(
          [...extra.segments, "identity"],
          `Entity "${entity.name}" must have exactly one identity field, found ${identities.length} (${names})`
        );
      }
    }

    return known;
  }

  private validateIndexes(
    entity: EntityDraft,
    columns: Set<string>,
    sink: DiagnosticSink
  ): void {
    for (const index of entity.indexes) {
      if (index.columns.length === 0) {
        sink.error(
          [...index.segments, "columns"],
          "Index must specify at least one column"
        );
        continue;
      }
      if (index.name !== undefined) {
        this.validateIdentifier(index.name, [...index.segments, "name"], sink);
      }

      index.columns.forEach((column, i) => {
        if (!columns.has(column)) {
          sink.error(
            [...index.segments, "columns", i],
            `Index references non-existent column "${column}"`,
            { suggestion: `Available columns: ${Array.from(columns).join(", ")}` }
          );
        }
      });
    }
  }

  private validateProjections(entity: EntityDraft, sink: DiagnosticSink): void {
    const fieldNames = new Set(entity.fields.map((f) => f.name));
    // Projection names collide when they generate the same method
    const seen = new Set<string>();

    for (const projection of entity.projections) {
      this.validateIdentifier(projection.name, projection.segments, sink, "key");
      const method = `findById${toPascalCase(projection.name)}`;
      if (seen.has(method)) {
        sink.error(projection.segments, `Duplicate projection "${projection.name}"`, {
          suggestion: `Another projection already generates ${method}`,
          target: "key",
        });
      }
      seen.add(method);

      if (projection.fields.length === 0) {
        sink.error(
          projection.segments,
          `Projection "${projection.name}" must list at least one field`
        );
      }
      projection.fields.forEach((name, i) => {
        if (!fieldNames.has(name)) {
          sink.error(
            [...projection.segments, i],
            `Projection "${projection.name}" references non-existent field "${name}"`,
            { suggestion: `Available fields: ${Array.from(fieldNames).join(", ")}` }
          );
        }
      });
    }
  }

  private validateReturning(
    entity: EntityDraft,
    columns: Set<string>,
    sink: DiagnosticSink
  ): void {
    if (entity.returning.mode !== "custom") return;

    for (const column of entity.returning.columns) {
      if (!columns.has(column)) {
        sink.warn(
          [...entity.segments, "returning"],
          `RETURNING column "${column}" is not a column of "${entity.name}"`
        );
      }
    }
  }

  private validateSoftDelete(entity: EntityDraft, sink: DiagnosticSink): void {
    if (!entity.softDelete) return;

    const marker = entity.fields.find((f) => columnName(f) === SOFT_DELETE_COLUMN);
    if (!marker) {
      sink.warn(
        [...entity.segments, "soft_delete"],
        `Soft delete is enabled but "${entity.name}" has no "${SOFT_DELETE_COLUMN}" field`,
        { suggestion: `Add a nullable timestamp field "${SOFT_DELETE_COLUMN}"` }
      );
    } else if (!isOptional(marker.type) && !marker.column.nullable) {
      sink.warn(
        [...marker.segments, "type"],
        `Soft delete marker "${SOFT_DELETE_COLUMN}" must be nullable`,
        { suggestion: `Declare it as Option<DateTime>` }
      );
    }
  }

  private validateIdentifier(
    name: string,
    segments: PathSegment[],
    sink: DiagnosticSink,
    target: "key" | "value" = "value"
  ): void {
    // Must start with letter or underscore
    if (!/^[a-zA-Z_]/.test(name)) {
      sink.error(
        segments,
        `Identifier "${name}" must start with a letter or underscore`,
        { target }
      );
    } else if (!/^[a-zA-Z_][a-zA-Z0-9_]*$/.test(name)) {
      sink.error(segments, `Identifier "${name}" contains invalid characters`, {
        suggestion: "Use only letters, numbers, and underscores",
        target,
      });
    }

    if (name.length > MAX_IDENTIFIER_LENGTH) {
      sink.error(
        segments,
        `Identifier "${name}" exceeds maximum length of ${MAX_IDENTIFIER_LENGTH} characters`,
        { target }
      );
    }
  }
}
