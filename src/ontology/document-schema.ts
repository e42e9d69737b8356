/**
 * Shape of an ontology YAML document, checked after deserialization.
 * Section values may be null in YAML (`segments:` with nothing below);
 * those read as empty.
 */

import { z } from "zod/v4";
import type { PropertySource } from "../types/ontology.ts";

export const PropertySourceSchema: z.ZodType<PropertySource> = z.lazy(() =>
  z.union([z.string(), ComplexPropertySchema]),
);

const ComplexPropertySchema = z.looseObject({
  properties: z.record(z.string(), PropertySourceSchema).optional(),
});

const stringList = z
  .array(z.string())
  .nullish()
  .transform((v) => v ?? []);

const freeFormRecord = z
  .record(z.string(), z.unknown())
  .nullish()
  .transform((v) => v ?? {});

const JourneyStageSchema = z.object({
  duration: z.string().nullish(),
  touchpoints: z.array(z.string()).nullish(),
  success_metrics: z.array(z.string()).nullish(),
  description: z.string().nullish(),
});

const SegmentSchema = z.object({
  properties: z
    .record(z.string(), PropertySourceSchema)
    .nullish()
    .transform((v) => v ?? {}),
  constraints: stringList,
  journey_stages: z
    .record(z.string(), JourneyStageSchema)
    .nullish()
    .transform((v) => v ?? {}),
  description: z.string().nullish(),
});

const CampaignSchema = z.object({
  metadata: freeFormRecord,
  components: freeFormRecord,
  constraints: stringList,
  description: z.string().nullish(),
});

const LeadScoringSchema = z.object({
  name: z.string(),
  inputs: freeFormRecord,
  output: freeFormRecord,
  weights: z.record(z.string(), z.number()).nullish(),
  thresholds: z.record(z.string(), z.number().int()).nullish(),
  special_rules: stringList,
});

export const OntologyDocumentSchema = z.object({
  segments: z.record(z.string(), SegmentSchema).nullish(),
  campaigns: z.record(z.string(), CampaignSchema).nullish(),
  lead_scoring: LeadScoringSchema.nullish(),
  types: z.record(z.string(), PropertySourceSchema).nullish(),
});

export type OntologyDocument = z.output<typeof OntologyDocumentSchema>;
export type SegmentDocument = z.output<typeof SegmentSchema>;
export type CampaignDocument = z.output<typeof CampaignSchema>;
export type LeadScoringDocument = z.output<typeof LeadScoringSchema>;
