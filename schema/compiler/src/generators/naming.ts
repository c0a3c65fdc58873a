/**
 * Naming helpers for derived table, column and method names
 */

/** `BlogPost` -> `blog_post`, `HTTPRequest` -> `http_request` */
export function toSnakeCase(name: string): string {
  return name
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/[-\s]+/g, "_")
    .toLowerCase();
}

/** `blog_post` or `blog-post` -> `BlogPost` */
export function toPascalCase(name: string): string {
  return name
    .split(/[_\-\s]+/)
    .filter(Boolean)
    .map((part) => part[0].toUpperCase() + part.slice(1))
    .join("");
}

const VOWELS = new Set(["a", "e", "i", "o", "u"]);

/**
 * English plural by suffix rules only. Irregular nouns come out wrong
 * (`person` -> `persons`, `child` -> `childs`).
 */
export function pluralize(noun: string): string {
  if (/(s|x|z|ch|sh)$/.test(noun)) {
    return `${noun}es`;
  }
  if (noun.length > 1 && noun.endsWith("y") && !VOWELS.has(noun[noun.length - 2])) {
    return `${noun.slice(0, -1)}ies`;
  }
  return `${noun}s`;
}
