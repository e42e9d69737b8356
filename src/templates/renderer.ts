/**
 * Template-rendering service. The compiler hands a template id and its
 * bindings to a TemplateRenderer and writes whatever text comes back.
 */

import type { TemplateBindingsMap, TemplateId } from "../types/bindings.ts";
import { renderPydanticModels } from "./pydantic-model.ts";
import { renderTypeScriptInterfaces } from "./typescript-interfaces.ts";
import { renderSalesforceObject, renderSalesforceValidation } from "./salesforce.ts";
import { renderHubspotProperties } from "./hubspot-properties.ts";
import { renderOntologyDocs, renderSegmentDocs } from "./docs.ts";

export interface TemplateRenderer {
  render<K extends TemplateId>(templateId: K, bindings: TemplateBindingsMap[K]): string;
}

export type TemplateFunctions = {
  [K in TemplateId]: (bindings: TemplateBindingsMap[K]) => string;
};

export const TEMPLATES: TemplateFunctions = {
  "pydantic-model": renderPydanticModels,
  "typescript-interfaces": renderTypeScriptInterfaces,
  "salesforce-object": renderSalesforceObject,
  "salesforce-validation": renderSalesforceValidation,
  "hubspot-properties": renderHubspotProperties,
  "ontology-docs": renderOntologyDocs,
  "segment-docs": renderSegmentDocs,
};

/** The built-in renderer; individual templates can be swapped out */
export function createTemplateRenderer(
  overrides: Partial<TemplateFunctions> = {},
): TemplateRenderer {
  const templates: TemplateFunctions = { ...TEMPLATES, ...overrides };
  return {
    render(templateId, bindings) {
      return templates[templateId](bindings);
    },
  };
}
