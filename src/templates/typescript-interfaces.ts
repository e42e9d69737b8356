/**
 * typescript-interfaces template: TypeScript declarations for segments,
 * free types, campaigns, and the lead-scoring model.
 */

import type { TypeExpression } from "../types/type-expression.ts";
import type {
  CampaignBinding,
  FieldBinding,
  LeadScoringBinding,
  SegmentBinding,
  SourceModelBindings,
  TypeBinding,
} from "../types/bindings.ts";
import { GENERATED_NOTICE, indent, joinBlocks } from "./text.ts";

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

export function renderTypeScriptInterfaces(bindings: SourceModelBindings): string {
  const blocks = [`// ${GENERATED_NOTICE}`];

  if (bindings.scope === "segment") {
    blocks.push(renderSegment(bindings.segment));
    return joinBlocks(blocks);
  }

  blocks.push(...bindings.types.map(renderType));
  blocks.push(...bindings.segments.map(renderSegment));
  if (bindings.campaigns.length > 0) blocks.push(renderCampaigns(bindings.campaigns));
  if (bindings.leadScoring) blocks.push(renderLeadScoring(bindings.leadScoring));

  return joinBlocks(blocks);
}

/** TypeScript type for a descriptor */
export function tsType(expr: TypeExpression): string {
  switch (expr.kind) {
    case "scalar":
      if (expr.scalar === "int" || expr.scalar === "float") return "number";
      if (expr.scalar === "boolean") return "boolean";
      return "string";
    case "enum":
      return expr.values.length > 0
        ? expr.values.map((v) => JSON.stringify(v)).join(" | ")
        : "string";
    case "list": {
      const inner = tsType(expr.items);
      return IDENTIFIER.test(inner) ? `${inner}[]` : `Array<${inner}>`;
    }
    case "range":
      return "number";
    case "object":
      return objectLiteral(
        Object.entries(expr.properties).map(([name, type]) => `${key(name)}: ${tsType(type)};`),
      );
  }
}

function renderSegment(segment: SegmentBinding): string {
  const doc = docComment([
    ...(segment.description ? [segment.description] : []),
    ...(segment.constraints.length > 0
      ? ["", "Constraints:", ...segment.constraints.map((c) => `- ${c}`)]
      : []),
  ]);
  return `${doc}export interface ${segment.name} ${interfaceBody(segment.fields)}`;
}

function renderType(binding: TypeBinding): string {
  const doc = docComment(binding.description ? [binding.description] : []);
  if (binding.type.kind === "object") {
    return `${doc}export interface ${binding.name} ${tsType(binding.type)}`;
  }
  return `${doc}export type ${binding.name} = ${tsType(binding.type)};`;
}

function renderCampaigns(campaigns: CampaignBinding[]): string {
  const entries = Object.fromEntries(
    campaigns.map((c) => [
      c.name,
      {
        ...(c.description !== undefined && { description: c.description }),
        metadata: c.metadata,
        components: c.components,
        constraints: c.constraints,
      },
    ]),
  );

  return [
    "export interface CampaignDefinition {",
    "  description?: string;",
    "  metadata: Record<string, unknown>;",
    "  components: string[];",
    "  constraints: string[];",
    "}",
    "",
    `export const CAMPAIGNS: Record<string, CampaignDefinition> = ${JSON.stringify(entries, null, 2)};`,
  ].join("\n");
}

function renderLeadScoring(model: LeadScoringBinding): string {
  const blocks = [
    `${docComment([`Inputs of the ${model.name} lead-scoring model`])}export interface LeadScoringInput ${interfaceBody(model.inputs)}`,
    `${docComment([`Output of the ${model.name} lead-scoring model`])}export interface LeadScoringOutput ${interfaceBody(model.output)}`,
    `export const LEAD_SCORING_WEIGHTS: Record<string, number> = ${JSON.stringify(model.weights, null, 2)};`,
    `export const LEAD_SCORING_THRESHOLDS: Record<string, number> = ${JSON.stringify(model.thresholds, null, 2)};`,
  ];
  if (model.specialRules.length > 0) {
    blocks.push(
      `export const LEAD_SCORING_RULES: string[] = ${JSON.stringify(model.specialRules, null, 2)};`,
    );
  }
  return blocks.join("\n\n");
}

function interfaceBody(fields: FieldBinding[]): string {
  return objectLiteral(
    fields.map((f) => {
      const comment = losesDetail(f) ? ` // ${f.source}` : "";
      return `${key(f.name)}: ${tsType(f.type)};${comment}`;
    }),
  );
}

/** Ranges and unrecognized scalars keep their declared form as a comment */
function losesDetail(field: FieldBinding): boolean {
  if (field.type.kind === "range") return true;
  return field.type.kind === "scalar" && field.source !== field.type.scalar;
}

function objectLiteral(lines: string[]): string {
  if (lines.length === 0) return "{}";
  return `{\n${indent(lines.join("\n"), 2)}\n}`;
}

function key(name: string): string {
  return IDENTIFIER.test(name) ? name : JSON.stringify(name);
}

function docComment(lines: string[]): string {
  if (lines.length === 0) return "";
  const body = lines.map((l) => (l ? ` * ${l.replace(/\*\//g, "*\\/")}` : " *"));
  return `/**\n${body.join("\n")}\n */\n`;
}
