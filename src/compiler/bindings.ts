/**
 * Binding builders: turn ontology entries into the TypeExpression-carrying
 * contexts the templates render.
 */

import type { Ontology } from "../ontology/ontology.ts";
import type { Campaign, LeadScoringModel, Segment, TypeDeclaration } from "../types/ontology.ts";
import type {
  CampaignBinding,
  FieldBinding,
  LeadScoringBinding,
  OntologyBindings,
  SegmentBinding,
  TypeBinding,
} from "../types/bindings.ts";
import type { TypeExpression } from "../types/type-expression.ts";
import { PropertySourceSchema } from "../ontology/document-schema.ts";
import { tryParsePropertySource } from "../type-expression/parser.ts";

const STRING_TYPE: TypeExpression = { kind: "scalar", scalar: "string" };

/** Bind one declared field; values that are not well-formed type definitions bind as `string` */
export function fieldBinding(name: string, declared: unknown): FieldBinding {
  const parsed = PropertySourceSchema.safeParse(declared);
  if (!parsed.success) {
    return { name, source: String(declared), type: STRING_TYPE };
  }

  const source = parsed.data;
  return {
    name,
    source: typeof source === "string" ? source : "object",
    type: tryParsePropertySource(source) ?? STRING_TYPE,
  };
}

export function fieldBindings(properties: Record<string, unknown>): FieldBinding[] {
  return Object.entries(properties).map(([name, declared]) => fieldBinding(name, declared));
}

export function segmentBinding(segment: Segment): SegmentBinding {
  return {
    name: segment.name,
    ...(segment.description !== undefined && { description: segment.description }),
    fields: fieldBindings(segment.properties),
    constraints: [...segment.constraints],
    journeyStages: Object.values(segment.journeyStages),
  };
}

export function campaignBinding(campaign: Campaign): CampaignBinding {
  return {
    name: campaign.name,
    ...(campaign.description !== undefined && { description: campaign.description }),
    metadata: campaign.metadata,
    components: Object.keys(campaign.components),
    constraints: [...campaign.constraints],
  };
}

export function leadScoringBinding(model: LeadScoringModel): LeadScoringBinding {
  return {
    name: model.name,
    inputs: fieldBindings(model.inputs),
    output: fieldBindings(model.output),
    weights: model.weights ?? {},
    thresholds: model.thresholds ?? {},
    specialRules: [...model.specialRules],
  };
}

export function typeBinding(name: string, declaration: TypeDeclaration): TypeBinding {
  const rawDescription = typeof declaration === "string" ? undefined : declaration["description"];
  const description = typeof rawDescription === "string" ? rawDescription : undefined;

  return {
    name,
    ...(description !== undefined && { description }),
    source: typeof declaration === "string" ? declaration : "object",
    type: tryParsePropertySource(declaration) ?? STRING_TYPE,
  };
}

/** Bindings for everything in the ontology */
export function ontologyBindings(ontology: Ontology): OntologyBindings {
  const leadScoring = ontology.leadScoring;
  return {
    segments: Array.from(ontology.segments.values(), segmentBinding),
    campaigns: Array.from(ontology.campaigns.values(), campaignBinding),
    ...(leadScoring && { leadScoring: leadScoringBinding(leadScoring) }),
    types: Array.from(ontology.types, ([name, declaration]) => typeBinding(name, declaration)),
  };
}
