/**
 * Semantic field types
 *
 * A field's declared type is a small recursive expression: a named scalar,
 * wrapped any number of times in Optional or List.
 */

export type TypeExpr =
  | { kind: "scalar"; name: string }
  | { kind: "optional"; inner: TypeExpr }
  | { kind: "list"; inner: TypeExpr };

export const scalar = (name: string): TypeExpr => ({ kind: "scalar", name });
export const optional = (inner: TypeExpr): TypeExpr => ({
  kind: "optional",
  inner,
});
export const list = (inner: TypeExpr): TypeExpr => ({ kind: "list", inner });

const OPTIONAL_WRAPPERS = new Set(["Option", "Optional"]);
const LIST_WRAPPERS = new Set(["Vec", "List", "Array"]);

export class TypeExprSyntaxError extends Error {
  constructor(
    message: string,
    public source: string,
    public offset: number
  ) {
    super(message);
    this.name = "TypeExprSyntaxError";
  }
}

/**
 * Parse `Option<Vec<i32>>`-style type text.
 *
 * Generic arguments of anything other than an Optional/List wrapper are
 * accepted and dropped (`DateTime<Utc>` is the scalar `DateTime`), and
 * path prefixes are reduced to their last segment (`chrono::NaiveDate`).
 */
export function parseTypeExpr(source: string): TypeExpr {
  let pos = 0;

  const skipSpace = () => {
    while (pos < source.length && /\s/.test(source[pos])) pos++;
  };

  const fail = (message: string): never => {
    throw new TypeExprSyntaxError(message, source, pos);
  };

  const readPath = (): string => {
    skipSpace();
    const match = /^[A-Za-z_][A-Za-z0-9_]*(?:::[A-Za-z_][A-Za-z0-9_]*)*/.exec(
      source.slice(pos)
    );
    if (!match) {
      return fail(`Expected a type name at offset ${pos} in "${source}"`);
    }
    const path = match[0];
    pos += path.length;
    const segments = path.split("::");
    return segments[segments.length - 1];
  };

  const expect = (char: string) => {
    skipSpace();
    if (source[pos] !== char) {
      fail(`Expected "${char}" at offset ${pos} in "${source}"`);
    }
    pos++;
  };

  const parseArgs = (): TypeExpr[] => {
    const args: TypeExpr[] = [];
    expect("<");
    args.push(parseExpr());
    skipSpace();
    while (source[pos] === ",") {
      pos++;
      args.push(parseExpr());
      skipSpace();
    }
    expect(">");
    return args;
  };

  const parseExpr = (): TypeExpr => {
    const name = readPath();
    skipSpace();
    const args = source[pos] === "<" ? parseArgs() : [];

    if (OPTIONAL_WRAPPERS.has(name) || LIST_WRAPPERS.has(name)) {
      if (args.length !== 1) {
        return fail(`${name} takes exactly one type argument in "${source}"`);
      }
      return OPTIONAL_WRAPPERS.has(name) ? optional(args[0]) : list(args[0]);
    }
    return scalar(name);
  };

  const expr = parseExpr();
  skipSpace();
  if (pos !== source.length) {
    fail(`Unexpected "${source.slice(pos)}" after type in "${source}"`);
  }
  return expr;
}

export function renderTypeExpr(type: TypeExpr): string {
  switch (type.kind) {
    case "scalar":
      return type.name;
    case "optional":
      return `Option<${renderTypeExpr(type.inner)}>`;
    case "list":
      return `Vec<${renderTypeExpr(type.inner)}>`;
  }
}

export function isOptional(type: TypeExpr): boolean {
  return type.kind === "optional";
}

/** The scalar at the bottom of any wrapping */
export function baseScalar(type: TypeExpr): string {
  return type.kind === "scalar" ? type.name : baseScalar(type.inner);
}
