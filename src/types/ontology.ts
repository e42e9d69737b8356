/** Ontology model types: the in-memory shape of the YAML documents */

/** A property's declared type: a type-definition string or a nested mapping */
export type PropertySource = string | ComplexPropertySource;

/** The "complex" property form: `{ properties: { ... } }` plus free-form keys */
export interface ComplexPropertySource {
  properties?: Record<string, PropertySource>;
  [key: string]: unknown;
}

export interface JourneyStage {
  name: string;
  duration?: string;
  touchpoints?: string[];
  successMetrics?: string[];
  description?: string;
}

export interface Segment {
  name: string;
  properties: Record<string, PropertySource>;
  /** Free-text business constraints; never evaluated */
  constraints: string[];
  journeyStages: Record<string, JourneyStage>;
  description?: string;
}

/** Metadata keys every campaign is expected to declare */
export const REQUIRED_CAMPAIGN_METADATA = [
  "owner_team",
  "campaign_type",
  "target_audience",
] as const;

export interface Campaign {
  name: string;
  metadata: Record<string, unknown>;
  components: Record<string, unknown>;
  constraints: string[];
  description?: string;
}

export interface LeadScoringModel {
  name: string;
  inputs: Record<string, unknown>;
  output: Record<string, unknown>;
  weights?: Record<string, number>;
  thresholds?: Record<string, number>;
  specialRules: string[];
}

/** A named free-form type declaration from the `types` section */
export type TypeDeclaration = PropertySource;
