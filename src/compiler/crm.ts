/**
 * TypeExpression → CRM field metadata (Salesforce custom fields and
 * HubSpot custom properties).
 */

import type { TypeExpression } from "../types/type-expression.ts";
import type { PropertySource } from "../types/ontology.ts";
import type { CrmOptions } from "../types/config.ts";
import type { HubspotProperty, SalesforceField } from "../types/targets.ts";
import { DEFAULT_PROJECT_CONFIG } from "../types/config.ts";
import { tryParsePropertySource } from "../type-expression/parser.ts";

const NUMBER_PRECISION = 18;
const MULTISELECT_VISIBLE_LINES = 4;
const STRING_TYPE: TypeExpression = { kind: "scalar", scalar: "string" };

export const DEFAULT_CRM_OPTIONS: CrmOptions = {
  hubspot: DEFAULT_PROJECT_CONFIG.hubspot,
  salesforce: DEFAULT_PROJECT_CONFIG.salesforce,
};

/** Salesforce custom field for an ontology property; a malformed type maps to Text */
export function toSalesforceField(
  name: string,
  source: PropertySource,
  options: CrmOptions = DEFAULT_CRM_OPTIONS,
): SalesforceField {
  const base = { name, label: humanize(name) };
  const expr = tryParsePropertySource(source) ?? STRING_TYPE;

  switch (expr.kind) {
    case "enum":
      return { ...base, type: "Picklist", values: [...expr.values] };
    case "list":
      if (expr.items.kind === "enum") {
        return {
          ...base,
          type: "MultiselectPicklist",
          values: [...expr.items.values],
          visibleLines: MULTISELECT_VISIBLE_LINES,
        };
      }
      break;
    case "range":
      return { ...base, type: "Number", precision: NUMBER_PRECISION, scale: 2 };
    case "scalar":
      if (expr.scalar === "boolean") return { ...base, type: "Checkbox", defaultValue: "false" };
      if (expr.scalar === "int") return { ...base, type: "Number", precision: NUMBER_PRECISION, scale: 0 };
      if (expr.scalar === "float") return { ...base, type: "Number", precision: NUMBER_PRECISION, scale: 2 };
      if (expr.scalar === "datetime") return { ...base, type: "DateTime" };
      break;
    case "object":
      break;
  }

  return { ...base, type: "Text", length: options.salesforce.textLength };
}

/** HubSpot custom property for an ontology property; a malformed type maps to a text string */
export function toHubspotProperty(
  name: string,
  source: PropertySource,
  options: CrmOptions = DEFAULT_CRM_OPTIONS,
): HubspotProperty {
  const base = {
    name: toSnakeCase(name),
    label: humanize(name),
    groupName: options.hubspot.groupName,
  };
  const expr = tryParsePropertySource(source) ?? STRING_TYPE;

  switch (expr.kind) {
    case "enum":
      return { ...base, type: "enumeration", fieldType: "select", options: toOptions(expr.values) };
    case "list":
      if (expr.items.kind === "enum") {
        return { ...base, type: "enumeration", fieldType: "checkbox", options: toOptions(expr.items.values) };
      }
      break;
    case "range":
      return { ...base, type: "number", fieldType: "number" };
    case "scalar":
      if (expr.scalar === "boolean") return { ...base, type: "boolean", fieldType: "booleancheckbox" };
      if (expr.scalar === "int" || expr.scalar === "float") return { ...base, type: "number", fieldType: "number" };
      if (expr.scalar === "datetime") return { ...base, type: "datetime", fieldType: "date" };
      break;
    case "object":
      break;
  }

  return { ...base, type: "string", fieldType: "text" };
}

/** "annualRevenue" / "annual_revenue" → "Annual Revenue" */
export function humanize(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .split(/[_\s-]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

/** "annualRevenue" → "annual_revenue" */
export function toSnakeCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/[\s-]+/g, "_")
    .toLowerCase();
}

function toOptions(values: string[]) {
  return values.map((value, displayOrder) => ({ label: value, value, displayOrder }));
}
