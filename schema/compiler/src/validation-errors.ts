/**
 * Validation Error Types
 *
 * Diagnostics produced while parsing and validating entity declarations.
 */

export type ErrorSeverity = "error" | "warning" | "info";

export type PathSegment = string | number;

export interface ValidationError {
  type: ErrorSeverity;
  message: string;
  path: string;
  segments: PathSegment[];
  /** Point at the key of the last segment rather than its value */
  target?: "key" | "value";
  line?: number;
  column?: number;
  suggestion?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationError[];
}

export class SchemaValidationException extends Error {
  constructor(
    public errors: ValidationError[],
    public warnings: ValidationError[] = []
  ) {
    super(`Schema validation failed with ${errors.length} error(s)`);
    this.name = "SchemaValidationException";
  }
}

/**
 * Render path segments the way diagnostics print them:
 * `entities.User.fields[0].name`
 */
export function formatPath(segments: readonly PathSegment[]): string {
  let path = "";
  for (const segment of segments) {
    if (typeof segment === "number") {
      path += `[${segment}]`;
    } else {
      path += path ? `.${segment}` : segment;
    }
  }
  return path;
}

/**
 * Collects diagnostics for one parse or validation pass.
 */
export class DiagnosticSink {
  readonly errors: ValidationError[] = [];
  readonly warnings: ValidationError[] = [];

  error(
    segments: PathSegment[],
    message: string,
    extra: Pick<ValidationError, "suggestion" | "target"> = {}
  ): void {
    this.errors.push({
      type: "error",
      message,
      path: formatPath(segments),
      segments,
      ...extra,
    });
  }

  warn(
    segments: PathSegment[],
    message: string,
    extra: Pick<ValidationError, "suggestion" | "target"> = {}
  ): void {
    this.warnings.push({
      type: "warning",
      message,
      path: formatPath(segments),
      segments,
      ...extra,
    });
  }

  merge(other: { errors: ValidationError[]; warnings: ValidationError[] }): void {
    this.errors.push(...other.errors);
    this.warnings.push(...other.warnings);
  }

  get hasErrors(): boolean {
    return this.errors.length > 0;
  }

  toResult(): ValidationResult {
    return {
      valid: this.errors.length === 0,
      errors: [...this.errors],
      warnings: [...this.warnings],
    };
  }
}

/**
 * One-line rendering used by the CLI: `file:line:col: error: message [path]`
 */
export function formatDiagnostic(
  diagnostic: ValidationError,
  file?: string
): string {
  const location = [file, diagnostic.line, diagnostic.column]
    .filter((part) => part !== undefined)
    .join(":");
  const head = location ? `${location}: ` : "";
  const hint = diagnostic.suggestion ? ` (${diagnostic.suggestion})` : "";
  return `${head}${diagnostic.type}: ${diagnostic.message} [${diagnostic.path}]${hint}`;
}
