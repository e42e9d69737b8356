/**
 * Lexical rules of the type-definition mini-language, shared by the
 * permissive parser and the strict validator.
 */

import { SCALAR_KINDS, BOUND_UNITS, type ScalarKind, type BoundUnit } from "../types/type-expression.ts";

export const ENUM_PREFIX = "enum[";
export const LIST_PREFIX = "list[";
export const RANGE_PREFIX = "range(";

/**
 * Body of a compound expression between its prefix and closing delimiter,
 * or undefined when the closing delimiter is missing.
 */
export function compoundBody(
  expr: string,
  prefix: string,
  close: "]" | ")",
): string | undefined {
  if (!expr.startsWith(prefix)) return undefined;
  if (expr.length < prefix.length + 1 || !expr.endsWith(close)) return undefined;
  return expr.slice(prefix.length, -1);
}

/** Split a comma-separated body into trimmed items, ignoring commas inside double quotes */
export function splitItems(body: string): string[] {
  const items: string[] = [];
  let current = "";
  let inQuotes = false;

  for (const char of body) {
    if (char === '"') inQuotes = !inQuotes;
    if (char === "," && !inQuotes) {
      items.push(current.trim());
      current = "";
      continue;
    }
    current += char;
  }
  items.push(current.trim());

  return items;
}

/** True when an item is wrapped in double quotes */
export function isQuoted(item: string): boolean {
  return item.length >= 2 && item.startsWith('"') && item.endsWith('"');
}

/** Strip one pair of surrounding double quotes, if present */
export function unquote(item: string): string {
  return isQuoted(item) ? item.slice(1, -1) : item;
}

export function isScalarKind(token: string): token is ScalarKind {
  return (SCALAR_KINDS as readonly string[]).includes(token);
}

export function isBoundUnit(token: string): token is BoundUnit {
  return token === "K" || token === "M" || token === "B";
}

export function unitMultiplier(unit: BoundUnit): number {
  return BOUND_UNITS[unit];
}
