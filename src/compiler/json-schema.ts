/**
 * TypeExpression → JSON Schema (draft-07) mapping.
 */

import type { TypeExpression } from "../types/type-expression.ts";
import type { PropertySource } from "../types/ontology.ts";
import type { JsonSchema } from "../types/targets.ts";
import { mapValues } from "../utils/object.ts";
import { parsePropertySource } from "../type-expression/parser.ts";

export const JSON_SCHEMA_DRAFT = "http://json-schema.org/draft-07/schema#";

/** Convert a descriptor to its JSON Schema node */
export function typeToJsonSchema(expr: TypeExpression): JsonSchema {
  switch (expr.kind) {
    case "enum":
      return { type: "string", enum: [...expr.values] };
    case "list":
      return { type: "array", items: typeToJsonSchema(expr.items) };
    case "range":
      return { type: "number", minimum: expr.min.value, maximum: expr.max.value };
    case "object":
      return { type: "object", properties: mapValues(expr.properties, typeToJsonSchema) };
    case "scalar":
      switch (expr.scalar) {
        case "int":
          return { type: "integer" };
        case "float":
          return { type: "number" };
        case "boolean":
          return { type: "boolean" };
        case "datetime":
          return { type: "string", format: "date-time" };
        case "string":
          return { type: "string" };
      }
  }
}

/** Convert a property mapping to a JSON Schema `properties` object */
export function propertiesToJsonSchema(
  properties: Record<string, PropertySource>,
): Record<string, JsonSchema> {
  return mapValues(properties, (source) => typeToJsonSchema(parsePropertySource(source)));
}
