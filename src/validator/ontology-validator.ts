/**
 * Ontology validator: naming-convention and structural checks across the
 * whole ontology, plus ad-hoc validation of data records against a segment.
 *
 * Passes run in a fixed order (segments, campaigns, lead scoring, types,
 * constraints, journey stages) and findings keep that order.
 */

import type { Ontology } from "../ontology/ontology.ts";
import {
  REQUIRED_CAMPAIGN_METADATA,
  type JourneyStage,
  type PropertySource,
} from "../types/ontology.ts";
import {
  finding,
  type ValidationError,
  type ValidationSummary,
} from "../types/validation.ts";
import { validateTypeExpression } from "../type-expression/validator.ts";
import { validateValue } from "../type-expression/value-validator.ts";

export const PASCAL_CASE = /^[A-Z][a-zA-Z0-9_]*$/;
export const CAMEL_CASE = /^[a-z][a-zA-Z0-9_]*$/;

/** The lead-scoring `score` output must mention this literal */
export const SCORE_DEFINITION = "int(0, 100)";

const JOURNEY_STAGE_FIELDS: Array<[keyof JourneyStage, string]> = [
  ["duration", "duration"],
  ["touchpoints", "touchpoints"],
  ["successMetrics", "success_metrics"],
];

export class OntologyValidator {
  private errors: ValidationError[] = [];

  constructor(private readonly ontology: Ontology) {}

  /** Run every check and return the findings of this run */
  validateAll(): ValidationError[] {
    this.errors = [];

    this.validateSegments();
    this.validateCampaigns();
    this.validateLeadScoring();
    this.validateTypes();
    this.validateConstraints();
    this.validateJourneyStages();

    return [...this.errors];
  }

  /**
   * Validate a data record against one segment: every declared property
   * must be present and conform; undeclared keys are warnings.
   */
  validateDataAgainstOntology(
    data: Record<string, unknown>,
    segmentName: string,
  ): ValidationError[] {
    const segment = this.ontology.getSegment(segmentName);
    if (!segment) {
      return [finding(`Segment '${segmentName}' not found`)];
    }

    const errors: ValidationError[] = [];

    for (const [propName, propDef] of Object.entries(segment.properties)) {
      if (!Object.hasOwn(data, propName)) {
        errors.push(finding(`Missing required property: ${propName}`, `data.${segmentName}`));
        continue;
      }
      const error = validateValue(data[propName], propDef, propName);
      if (error) errors.push(error);
    }

    for (const propName of Object.keys(data)) {
      if (!Object.hasOwn(segment.properties, propName)) {
        errors.push(finding(`Unknown property: ${propName}`, `data.${segmentName}`, "warning"));
      }
    }

    return errors;
  }

  /** Counts by severity over the last validateAll() run */
  getValidationSummary(): ValidationSummary {
    return summarizeFindings(this.errors);
  }

  private validateSegments(): void {
    for (const [name, segment] of this.ontology.segments) {
      const location = `segments.${name}`;

      if (!PASCAL_CASE.test(name)) {
        this.report(`Segment name '${name}' should be PascalCase`, location);
      }
      if (Object.keys(segment.properties).length === 0) {
        this.report(`Segment '${name}' has no properties`, location);
      }
      for (const [propName, propDef] of Object.entries(segment.properties)) {
        this.validateProperty(propName, propDef, location);
      }
    }
  }

  private validateCampaigns(): void {
    for (const [name, campaign] of this.ontology.campaigns) {
      const location = `campaigns.${name}`;

      if (!PASCAL_CASE.test(name)) {
        this.report(`Campaign name '${name}' should be PascalCase`, location);
      }
      for (const field of REQUIRED_CAMPAIGN_METADATA) {
        if (!Object.hasOwn(campaign.metadata, field)) {
          this.report(
            `Campaign '${name}' missing required metadata: ${field}`,
            `${location}.metadata`,
          );
        }
      }
      if (Object.keys(campaign.components).length === 0) {
        this.report(`Campaign '${name}' has no components`, location);
      }
    }
  }

  private validateLeadScoring(): void {
    const scoring = this.ontology.leadScoring;
    if (!scoring) return;

    if (Object.keys(scoring.inputs).length === 0) {
      this.report("Lead scoring model has no inputs", "lead_scoring");
    }
    if (Object.keys(scoring.output).length === 0) {
      this.report("Lead scoring model has no output", "lead_scoring");
    }

    // Textual check: the score convention is not part of the type grammar
    const score = scoring.output["score"];
    if (typeof score === "string" && !score.includes(SCORE_DEFINITION)) {
      this.report(`Lead score should be ${SCORE_DEFINITION}`, "lead_scoring.output.score");
    }
  }

  private validateTypes(): void {
    for (const [name, declaration] of this.ontology.types) {
      const location = `types.${name}`;

      if (!PASCAL_CASE.test(name)) {
        this.report(`Type name '${name}' should be PascalCase`, location);
      }
      if (typeof declaration !== "string" && declaration.properties) {
        for (const [propName, propDef] of Object.entries(declaration.properties)) {
          this.validateProperty(propName, propDef, location);
        }
      }
    }
  }

  private validateProperty(name: string, def: PropertySource, location: string): void {
    const propLocation = `${location}.${name}`;

    if (!CAMEL_CASE.test(name)) {
      this.report(`Property name '${name}' should be camelCase`, propLocation);
    }

    if (typeof def === "string") {
      this.errors.push(...validateTypeExpression(def, propLocation));
      return;
    }

    if (!def.properties) {
      this.report("Complex property must have 'properties' field", propLocation);
      return;
    }
    for (const [subName, subDef] of Object.entries(def.properties)) {
      this.validateProperty(subName, subDef, `${propLocation}.properties`);
    }
  }

  private validateConstraints(): void {
    for (const [name, segment] of this.ontology.segments) {
      segment.constraints.forEach((constraint, i) => {
        if (constraint.trim().length === 0) {
          this.report("Constraint cannot be empty", `segments.${name}.constraints[${i}]`);
        }
      });
    }
  }

  private validateJourneyStages(): void {
    for (const [segmentName, segment] of this.ontology.segments) {
      for (const [stageName, stage] of Object.entries(segment.journeyStages)) {
        const location = `segments.${segmentName}.journey_stages.${stageName}`;

        if (!CAMEL_CASE.test(stageName)) {
          this.report(`Journey stage name '${stageName}' should be camelCase`, location);
        }
        for (const [key, field] of JOURNEY_STAGE_FIELDS) {
          if (isBlank(stage[key])) {
            this.report(`Journey stage '${stageName}' missing required field: ${field}`, location);
          }
        }
      }
    }
  }

  private report(message: string, location: string): void {
    this.errors.push(finding(message, location));
  }
}

function isBlank(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === "string") return value.trim() === "";
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

/** Counts by severity; only error-severity findings affect validity */
export function summarizeFindings(findings: readonly ValidationError[]): ValidationSummary {
  const count = (severity: ValidationError["severity"]) =>
    findings.filter((f) => f.severity === severity).length;

  const errors = count("error");
  return {
    total_errors: findings.length,
    errors,
    warnings: count("warning"),
    info: count("info"),
    is_valid: errors === 0,
  };
}
