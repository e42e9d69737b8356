/** salesforce-object and salesforce-validation templates (metadata XML) */

import type { SalesforceField } from "../types/targets.ts";
import type {
  SalesforceObjectBindings,
  SalesforceValidationBindings,
} from "../types/bindings.ts";
import { escapeXml, indent } from "./text.ts";

const XML_HEADER = '<?xml version="1.0" encoding="UTF-8"?>';
const METADATA_NS = "http://soap.sforce.com/2006/04/metadata";

export function renderSalesforceObject(bindings: SalesforceObjectBindings): string {
  const body = [
    element("label", bindings.objectName),
    element("pluralLabel", `${bindings.objectName}s`),
    element("description", bindings.description),
    element("deploymentStatus", "Deployed"),
    element("sharingModel", "ReadWrite"),
    ...bindings.fields.map(renderField),
  ];
  return document("CustomObject", body);
}

export function renderSalesforceValidation(bindings: SalesforceValidationBindings): string {
  const rules = bindings.constraints.map((constraint, i) =>
    block("validationRules", [
      element("fullName", `${bindings.segmentName}_Rule_${i + 1}`),
      element("active", "false"),
      element("description", constraint),
      element("errorConditionFormula", "false"),
      element("errorMessage", constraint),
    ]),
  );
  return document("CustomObject", rules);
}

/** API name of a custom field */
export function salesforceApiName(name: string): string {
  return `${name}__c`;
}

function renderField(field: SalesforceField): string {
  const lines = [
    element("fullName", salesforceApiName(field.name)),
    element("label", field.label),
    element("type", field.type),
  ];
  if (field.length !== undefined) lines.push(element("length", String(field.length)));
  if (field.precision !== undefined) lines.push(element("precision", String(field.precision)));
  if (field.scale !== undefined) lines.push(element("scale", String(field.scale)));
  if (field.visibleLines !== undefined) {
    lines.push(element("visibleLines", String(field.visibleLines)));
  }
  if (field.defaultValue !== undefined) lines.push(element("defaultValue", field.defaultValue));
  if (field.values) {
    const values = field.values.map((value) =>
      block("value", [
        element("fullName", value),
        element("default", "false"),
        element("label", value),
      ]),
    );
    lines.push(
      block("valueSet", [
        element("restricted", "true"),
        block("valueSetDefinition", [element("sorted", "false"), ...values]),
      ]),
    );
  }
  return block("fields", lines);
}

function document(root: string, children: string[]): string {
  return `${XML_HEADER}\n<${root} xmlns="${METADATA_NS}">\n${indent(children.join("\n"), 4)}\n</${root}>\n`;
}

function block(name: string, children: string[]): string {
  return `<${name}>\n${indent(children.join("\n"), 4)}\n</${name}>`;
}

function element(name: string, value: string): string {
  return `<${name}>${escapeXml(value)}</${name}>`;
}
