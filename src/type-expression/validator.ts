/**
 * Strict type-expression validator: the gate in front of the permissive
 * parser. Reports every syntactic problem it finds as a finding.
 */

import { finding, type ValidationError } from "../types/validation.ts";
import {
  ENUM_PREFIX,
  LIST_PREFIX,
  RANGE_PREFIX,
  compoundBody,
  isQuoted,
  isScalarKind,
  splitItems,
  unquote,
} from "./lexer.ts";

/** Check a type-definition string for well-formedness */
export function validateTypeExpression(
  expr: string,
  location: string,
): ValidationError[] {
  if (expr.startsWith(ENUM_PREFIX)) return checkEnum(expr, location);
  if (expr.startsWith(LIST_PREFIX)) return checkList(expr, location);
  if (expr.startsWith(RANGE_PREFIX)) return checkRange(expr, location);

  if (!isScalarKind(expr)) {
    return [finding(`Unknown type: ${expr}`, location)];
  }
  return [];
}

function checkEnum(expr: string, location: string): ValidationError[] {
  const body = compoundBody(expr, ENUM_PREFIX, "]");
  if (body === undefined) {
    return [finding(`Invalid enum definition: ${expr}`, location)];
  }
  if (body.trim() === "") {
    return [finding(`Enum must have at least one value: ${expr}`, location)];
  }

  const items = splitItems(body);
  if (!items.every(isQuoted)) {
    return [finding(`Enum values must be quoted: ${expr}`, location)];
  }
  if (items.every((item) => unquote(item) === "")) {
    return [finding(`Enum must have at least one value: ${expr}`, location)];
  }
  return [];
}

function checkList(expr: string, location: string): ValidationError[] {
  const body = compoundBody(expr, LIST_PREFIX, "]");
  if (body === undefined) {
    return [finding(`Invalid list definition: ${expr}`, location)];
  }

  const inner = body.trim();
  if (inner === "") {
    return [finding(`List must specify inner type: ${expr}`, location)];
  }
  return validateTypeExpression(inner, location);
}

function checkRange(expr: string, location: string): ValidationError[] {
  const body = compoundBody(expr, RANGE_PREFIX, ")");
  if (body === undefined) {
    return [finding(`Invalid range definition: ${expr}`, location)];
  }

  // Arity only; bounds are resolved by the parser
  if (splitItems(body).length !== 2) {
    return [finding(`Range must have min and max values: ${expr}`, location)];
  }
  return [];
}
