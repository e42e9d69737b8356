/**
 * Binding contexts handed to the template-rendering service. The compiler
 * builds these; templates only read them.
 */

import type { TypeExpression } from "./type-expression.ts";
import type { JourneyStage } from "./ontology.ts";
import type { HubspotProperty, SalesforceField } from "./targets.ts";

export interface FieldBinding {
  name: string;
  /** Declared type as authored ("object" for nested mappings) */
  source: string;
  type: TypeExpression;
}

export interface SegmentBinding {
  name: string;
  description?: string;
  fields: FieldBinding[];
  constraints: string[];
  journeyStages: JourneyStage[];
}

export interface CampaignBinding {
  name: string;
  description?: string;
  metadata: Record<string, unknown>;
  components: string[];
  constraints: string[];
}

export interface LeadScoringBinding {
  name: string;
  inputs: FieldBinding[];
  output: FieldBinding[];
  weights: Record<string, number>;
  thresholds: Record<string, number>;
  specialRules: string[];
}

export interface TypeBinding {
  name: string;
  description?: string;
  source: string;
  type: TypeExpression;
}

export interface OntologyBindings {
  segments: SegmentBinding[];
  campaigns: CampaignBinding[];
  leadScoring?: LeadScoringBinding;
  types: TypeBinding[];
}

/** Data-model and interface targets: one segment, or everything */
export type SourceModelBindings =
  | { scope: "segment"; segment: SegmentBinding }
  | ({ scope: "ontology" } & OntologyBindings);

export interface SalesforceObjectBindings {
  objectName: string;
  description: string;
  fields: SalesforceField[];
}

export interface SalesforceValidationBindings {
  segmentName: string;
  constraints: string[];
}

export interface HubspotBindings {
  properties: HubspotProperty[];
}

export interface SegmentDocsBindings {
  segment: SegmentBinding;
}

/** Template id → the bindings that template reads */
export interface TemplateBindingsMap {
  "pydantic-model": SourceModelBindings;
  "typescript-interfaces": SourceModelBindings;
  "salesforce-object": SalesforceObjectBindings;
  "salesforce-validation": SalesforceValidationBindings;
  "hubspot-properties": HubspotBindings;
  "ontology-docs": OntologyBindings;
  "segment-docs": SegmentDocsBindings;
}

export type TemplateId = keyof TemplateBindingsMap;
