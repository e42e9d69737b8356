/**
 * Render TypeExpression descriptors back to their source encodings.
 */

import type { TypeExpression } from "../types/type-expression.ts";
import type { PropertySource } from "../types/ontology.ts";
import { mapValues } from "../utils/object.ts";

/** Canonical type-definition string for a descriptor */
export function formatTypeExpression(expr: TypeExpression): string {
  switch (expr.kind) {
    case "scalar":
      return expr.scalar;
    case "enum":
      return `enum[${expr.values.map((v) => `"${v}"`).join(", ")}]`;
    case "list":
      return `list[${formatTypeExpression(expr.items)}]`;
    case "range":
      return `range(${expr.min.raw}, ${expr.max.raw})`;
    case "object":
      return "object";
  }
}

/** The property-source encoding (string, or nested mapping for objects) */
export function toPropertySource(expr: TypeExpression): PropertySource {
  if (expr.kind === "object") {
    return { properties: mapValues(expr.properties, toPropertySource) };
  }
  return formatTypeExpression(expr);
}
