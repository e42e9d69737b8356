/**
 * Ontology: the aggregate root holding segments, campaigns, the optional
 * lead-scoring model, and free-form type declarations.
 */

import type {
  Campaign,
  JourneyStage,
  LeadScoringModel,
  Segment,
  TypeDeclaration,
} from "../types/ontology.ts";
import { LookupError } from "../errors.ts";
import { mapValues } from "../utils/object.ts";
import type {
  CampaignDocument,
  LeadScoringDocument,
  OntologyDocument,
  SegmentDocument,
} from "./document-schema.ts";

export class Ontology {
  /** Segments keyed by name, in declaration order */
  readonly segments = new Map<string, Segment>();
  readonly campaigns = new Map<string, Campaign>();
  readonly types = new Map<string, TypeDeclaration>();
  /** At most one lead-scoring model per ontology */
  leadScoring: LeadScoringModel | undefined;

  /** Build an ontology from a validated YAML document */
  static fromDocument(doc: OntologyDocument): Ontology {
    const ontology = new Ontology();

    for (const [name, raw] of Object.entries(doc.segments ?? {})) {
      ontology.segments.set(name, toSegment(name, raw));
    }
    for (const [name, raw] of Object.entries(doc.campaigns ?? {})) {
      ontology.campaigns.set(name, toCampaign(name, raw));
    }
    for (const [name, declaration] of Object.entries(doc.types ?? {})) {
      ontology.types.set(name, declaration);
    }
    if (doc.lead_scoring) {
      ontology.leadScoring = toLeadScoring(doc.lead_scoring);
    }

    return ontology;
  }

  /**
   * Shallow merge: entries of `other` replace same-named entries here,
   * and its lead-scoring model (if any) replaces ours wholesale.
   */
  merge(other: Ontology): this {
    for (const [name, segment] of other.segments) this.segments.set(name, segment);
    for (const [name, campaign] of other.campaigns) this.campaigns.set(name, campaign);
    for (const [name, declaration] of other.types) this.types.set(name, declaration);
    if (other.leadScoring) this.leadScoring = other.leadScoring;
    return this;
  }

  getSegment(name: string): Segment | undefined {
    return this.segments.get(name);
  }

  /** Like getSegment, but a missing segment is a LookupError */
  requireSegment(name: string): Segment {
    const segment = this.segments.get(name);
    if (!segment) throw new LookupError("segment", name);
    return segment;
  }

  getCampaign(name: string): Campaign | undefined {
    return this.campaigns.get(name);
  }

  getType(name: string): TypeDeclaration | undefined {
    return this.types.get(name);
  }

  listSegments(): string[] {
    return Array.from(this.segments.keys());
  }

  listCampaigns(): string[] {
    return Array.from(this.campaigns.keys());
  }
}

function toSegment(name: string, raw: SegmentDocument): Segment {
  return {
    name,
    properties: raw.properties,
    constraints: raw.constraints,
    journeyStages: mapValues(raw.journey_stages, (stage, stageName): JourneyStage => ({
      name: stageName,
      ...(stage.duration != null && { duration: stage.duration }),
      ...(stage.touchpoints != null && { touchpoints: stage.touchpoints }),
      ...(stage.success_metrics != null && { successMetrics: stage.success_metrics }),
      ...(stage.description != null && { description: stage.description }),
    })),
    ...(raw.description != null && { description: raw.description }),
  };
}

function toCampaign(name: string, raw: CampaignDocument): Campaign {
  return {
    name,
    metadata: raw.metadata,
    components: raw.components,
    constraints: raw.constraints,
    ...(raw.description != null && { description: raw.description }),
  };
}

function toLeadScoring(raw: LeadScoringDocument): LeadScoringModel {
  return {
    name: raw.name,
    inputs: raw.inputs,
    output: raw.output,
    ...(raw.weights != null && { weights: raw.weights }),
    ...(raw.thresholds != null && { thresholds: raw.thresholds }),
    specialRules: raw.special_rules,
  };
}
