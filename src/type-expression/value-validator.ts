/**
 * Data-against-type validator: checks a concrete value against a declared
 * type. Returns the first violation found, or undefined.
 *
 * Scalars are checked by coercion, not by native representation: "42"
 * satisfies `int`, "true" satisfies `boolean`. Sub-properties of an object
 * type are only checked when present.
 */

import type { TypeExpression, RangeType, ScalarKind } from "../types/type-expression.ts";
import type { PropertySource } from "../types/ontology.ts";
import { finding, type ValidationError } from "../types/validation.ts";
import { TypeExpressionSyntaxError } from "../errors.ts";
import { isRecord } from "../utils/object.ts";
import { parsePropertySource } from "./parser.ts";
import { formatTypeExpression } from "./format.ts";

const FLOAT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;
const INT_PATTERN = /^[+-]?\d+$/;
const BOOLEAN_STRINGS = new Set(["true", "false", "yes", "no", "1", "0"]);

/** Validate a value against a declared property type (string or mapping) */
export function validateValue(
  value: unknown,
  type: PropertySource,
  path: string,
): ValidationError | undefined {
  let expr: TypeExpression;
  try {
    expr = parsePropertySource(type);
  } catch (err) {
    if (err instanceof TypeExpressionSyntaxError) {
      return finding(`Invalid type definition: ${err.message}`, `data.${path}`);
    }
    throw err;
  }
  return checkValue(value, expr, path);
}

/** Validate a value against an already-parsed descriptor */
export function checkValue(
  value: unknown,
  expr: TypeExpression,
  path: string,
): ValidationError | undefined {
  const location = `data.${path}`;

  switch (expr.kind) {
    case "enum":
      if (typeof value === "string" && expr.values.includes(value)) return undefined;
      return finding(
        `Value '${display(value)}' not in enum [${expr.values.map((v) => `'${v}'`).join(", ")}]`,
        location,
      );

    case "list": {
      if (!Array.isArray(value)) {
        return finding(
          `Value must be a list for type ${formatTypeExpression(expr)}`,
          location,
        );
      }
      for (const [i, item] of value.entries()) {
        const itemError = checkValue(item, expr.items, `${path}[${i}]`);
        if (itemError) return itemError;
      }
      return undefined;
    }

    case "range":
      return checkRange(value, expr, location);

    case "scalar":
      return checkScalar(value, expr.scalar, location);

    case "object": {
      if (!isRecord(value)) {
        return finding("Value must be an object for complex type", location);
      }
      for (const [name, subType] of Object.entries(expr.properties)) {
        if (!Object.hasOwn(value, name)) continue;
        const subError = checkValue(value[name], subType, `${path}.${name}`);
        if (subError) return subError;
      }
      return undefined;
    }
  }
}

function checkRange(
  value: unknown,
  expr: RangeType,
  location: string,
): ValidationError | undefined {
  const num = toFloat(value);
  if (num === undefined) {
    return finding("Value must be numeric for range type", location);
  }
  if (!(expr.min.value <= num && num <= expr.max.value)) {
    return finding(
      `Value ${display(value)} not in range [${expr.min.raw}, ${expr.max.raw}]`,
      location,
    );
  }
  return undefined;
}

function checkScalar(
  value: unknown,
  scalar: ScalarKind,
  location: string,
): ValidationError | undefined {
  switch (scalar) {
    case "boolean":
      return isBooleanLike(value)
        ? undefined
        : finding("Value must be boolean for type boolean", location);
    case "int":
      return isIntLike(value)
        ? undefined
        : finding("Value must be integer for type int", location);
    case "float":
      return toFloat(value) !== undefined
        ? undefined
        : finding("Value must be numeric for type float", location);
    case "string":
    case "datetime":
      return undefined;
  }
}

/** Numeric value of a number, boolean, or decimal string */
function toFloat(value: unknown): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string") {
    const text = value.trim();
    return FLOAT_PATTERN.test(text) ? Number(text) : undefined;
  }
  return undefined;
}

function isIntLike(value: unknown): boolean {
  if (typeof value === "number") return Number.isFinite(value);
  if (typeof value === "boolean") return true;
  if (typeof value === "string") return INT_PATTERN.test(value.trim());
  return false;
}

function isBooleanLike(value: unknown): boolean {
  if (typeof value === "boolean") return true;
  if (typeof value === "number") return value === 0 || value === 1;
  if (typeof value === "string") return BOOLEAN_STRINGS.has(value.trim().toLowerCase());
  return false;
}

function display(value: unknown): string {
  if (typeof value === "string") return value;
  return JSON.stringify(value) ?? String(value);
}
