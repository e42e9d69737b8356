/**
 * Type-expression parser: turns a type-definition string into a
 * TypeExpression descriptor.
 *
 * The parser is permissive: an unrecognized scalar keyword becomes `string`
 * instead of an error. Strictness lives in validator.ts; callers that want
 * malformed input reported run that first. Only a malformed compound
 * expression (missing closing delimiter, wrong range arity, non-numeric
 * bound) throws a TypeExpressionSyntaxError.
 */

import type { NumericBound, TypeExpression } from "../types/type-expression.ts";
import type { PropertySource } from "../types/ontology.ts";
import { TypeExpressionSyntaxError } from "../errors.ts";
import { mapValues } from "../utils/object.ts";
import {
  ENUM_PREFIX,
  LIST_PREFIX,
  RANGE_PREFIX,
  compoundBody,
  isBoundUnit,
  isScalarKind,
  splitItems,
  unitMultiplier,
  unquote,
} from "./lexer.ts";

/** Parse a type-definition string */
export function parseTypeExpression(expr: string): TypeExpression {
  const source = expr.trim();

  if (source.startsWith(ENUM_PREFIX)) {
    const body = requireBody(source, ENUM_PREFIX, "]");
    const values = body.trim() === "" ? [] : splitItems(body).map(unquote);
    return { kind: "enum", values };
  }

  if (source.startsWith(LIST_PREFIX)) {
    const body = requireBody(source, LIST_PREFIX, "]");
    return { kind: "list", items: parseTypeExpression(body) };
  }

  if (source.startsWith(RANGE_PREFIX)) {
    const body = requireBody(source, RANGE_PREFIX, ")");
    const bounds = splitItems(body);
    const [min, max] = bounds;
    if (bounds.length !== 2 || min === undefined || max === undefined) {
      throw new TypeExpressionSyntaxError(source, "Range must have exactly two bounds");
    }
    return { kind: "range", min: parseBound(min), max: parseBound(max) };
  }

  // Unknown keywords fall back to string
  return { kind: "scalar", scalar: isScalarKind(source) ? source : "string" };
}

/** Parse a property's declared type: a string, or a `{ properties }` mapping */
export function parsePropertySource(source: PropertySource): TypeExpression {
  if (typeof source === "string") return parseTypeExpression(source);

  return {
    kind: "object",
    properties: mapValues(source.properties ?? {}, parsePropertySource),
  };
}

/**
 * Parse a property's declared type, or undefined when it is malformed.
 * Renderers that only need a best-effort shape use this.
 */
export function tryParsePropertySource(source: PropertySource): TypeExpression | undefined {
  try {
    return parsePropertySource(source);
  } catch (err) {
    if (err instanceof TypeExpressionSyntaxError) return undefined;
    throw err;
  }
}

/**
 * Parse a range bound such as "500", "100K", "2.5M" or "1B+".
 * A trailing "+" is kept as a marker only; the bound stays the literal value.
 */
export function parseBound(raw: string): NumericBound {
  const text = raw.trim();
  let literal = text;

  const openEnded = literal.endsWith("+");
  if (openEnded) literal = literal.slice(0, -1);

  const suffix = literal.slice(-1);
  const unit = isBoundUnit(suffix) ? suffix : undefined;
  if (unit) literal = literal.slice(0, -1);

  const magnitude = literal.trim() === "" ? Number.NaN : Number(literal);
  if (Number.isNaN(magnitude)) {
    throw new TypeExpressionSyntaxError(text, "Range bound is not numeric");
  }

  return {
    value: unit ? magnitude * unitMultiplier(unit) : magnitude,
    raw: text,
    ...(unit && { unit }),
    openEnded,
  };
}

function requireBody(source: string, prefix: string, close: "]" | ")"): string {
  const body = compoundBody(source, prefix, close);
  if (body === undefined) {
    throw new TypeExpressionSyntaxError(source, `Missing closing '${close}'`);
  }
  return body;
}
