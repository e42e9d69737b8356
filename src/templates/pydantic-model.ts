/**
 * pydantic-model template: Python data models with field constraints.
 *
 * Ranges become `Field(ge=..., le=...)`, enums become `Literal[...]`, and
 * property names that are not valid Python identifiers get an alias.
 */

import type { ScalarKind, TypeExpression } from "../types/type-expression.ts";
import type {
  CampaignBinding,
  FieldBinding,
  LeadScoringBinding,
  SegmentBinding,
  SourceModelBindings,
  TypeBinding,
} from "../types/bindings.ts";
import { isRecord } from "../utils/object.ts";
import { formatTypeExpression } from "../type-expression/format.ts";
import { GENERATED_NOTICE } from "./text.ts";

const PY_IDENTIFIER = /^[A-Za-z_]\w*$/;
const PY_KEYWORDS = new Set([
  "and", "as", "assert", "async", "await", "break", "class", "continue",
  "def", "del", "elif", "else", "except", "finally", "for", "from",
  "global", "if", "import", "in", "is", "lambda", "nonlocal", "not", "or",
  "pass", "raise", "return", "try", "while", "with", "yield",
]);

const PY_SCALARS: Record<ScalarKind, string> = {
  string: "str",
  int: "int",
  float: "float",
  boolean: "bool",
  datetime: "datetime",
};

const HEADER = [
  `"""${GENERATED_NOTICE}"""`,
  "",
  "from datetime import datetime",
  "from typing import Any, Dict, List, Literal",
  "",
  "from pydantic import BaseModel, Field",
].join("\n");

export function renderPydanticModels(bindings: SourceModelBindings): string {
  const blocks = [HEADER];
  if (bindings.scope === "segment") {
    blocks.push(renderModel(bindings.segment.name, bindings.segment.fields, docLines(bindings.segment)));
    return blocks.join("\n\n\n") + "\n";
  }

  for (const type of bindings.types) blocks.push(renderType(type));
  for (const segment of bindings.segments) {
    blocks.push(renderModel(segment.name, segment.fields, docLines(segment)));
  }
  if (bindings.campaigns.length > 0) blocks.push(renderCampaigns(bindings.campaigns));
  if (bindings.leadScoring) blocks.push(renderLeadScoring(bindings.leadScoring));

  // Two blank lines between top-level definitions
  return blocks.join("\n\n\n") + "\n";
}

/** Python annotation for a descriptor */
export function pyType(expr: TypeExpression): string {
  switch (expr.kind) {
    case "scalar":
      return PY_SCALARS[expr.scalar];
    case "enum":
      return expr.values.length > 0
        ? `Literal[${expr.values.map(pyString).join(", ")}]`
        : "str";
    case "list":
      return `List[${pyType(expr.items)}]`;
    case "range":
      return "float";
    case "object":
      return "Dict[str, Any]";
  }
}

function renderModel(name: string, fields: FieldBinding[], doc: string[]): string {
  const lines = [`class ${name}(BaseModel):`];
  if (doc.length > 0) lines.push(...docstring(doc));
  if (fields.length === 0) {
    lines.push("    pass");
  } else {
    lines.push(...fields.map(renderField));
  }
  return lines.join("\n");
}

function renderField(field: FieldBinding): string {
  const args: string[] = [];
  const attr = pyAttribute(field.name);
  if (attr !== field.name) args.push(`alias=${pyString(field.name)}`);
  if (field.type.kind === "range") {
    args.push(`ge=${String(field.type.min.value)}`, `le=${String(field.type.max.value)}`);
  }
  const annotation = pyType(field.type);
  const comment = field.type.kind === "scalar" && field.source !== field.type.scalar
    ? `  # ${field.source}`
    : "";
  return args.length > 0
    ? `    ${attr}: ${annotation} = Field(${args.join(", ")})${comment}`
    : `    ${attr}: ${annotation}${comment}`;
}

function renderType(binding: TypeBinding): string {
  if (binding.type.kind === "object") {
    const fields = Object.entries(binding.type.properties).map(([name, type]) => ({
      name,
      source: formatTypeExpression(type),
      type,
    }));
    return renderModel(binding.name, fields, binding.description ? [binding.description] : []);
  }
  return `${binding.name} = ${pyType(binding.type)}`;
}

function renderCampaigns(campaigns: CampaignBinding[]): string {
  const model = [
    "class Campaign(BaseModel):",
    "    name: str",
    "    description: str = \"\"",
    "    metadata: Dict[str, Any] = Field(default_factory=dict)",
    "    components: List[str] = Field(default_factory=list)",
    "    constraints: List[str] = Field(default_factory=list)",
  ].join("\n");

  const entries = campaigns.map((c) => {
    const args = [
      `name=${pyString(c.name)}`,
      `description=${pyString(c.description ?? "")}`,
      `metadata=${pyLiteral(c.metadata)}`,
      `components=${pyLiteral(c.components)}`,
      `constraints=${pyLiteral(c.constraints)}`,
    ];
    return `    ${pyString(c.name)}: Campaign(${args.join(", ")}),`;
  });

  return `${model}\n\n\nCAMPAIGNS: Dict[str, Campaign] = {\n${entries.join("\n")}\n}`;
}

function renderLeadScoring(model: LeadScoringBinding): string {
  return [
    renderModel("LeadScoringInput", model.inputs, [`Inputs of the ${model.name} lead-scoring model.`]),
    renderModel("LeadScoringOutput", model.output, [`Output of the ${model.name} lead-scoring model.`]),
    `LEAD_SCORING_WEIGHTS: Dict[str, float] = ${pyLiteral(model.weights)}`,
    `LEAD_SCORING_THRESHOLDS: Dict[str, int] = ${pyLiteral(model.thresholds)}`,
    `LEAD_SCORING_RULES: List[str] = ${pyLiteral(model.specialRules)}`,
  ].join("\n\n\n");
}

function docLines(segment: SegmentBinding): string[] {
  const lines = segment.description ? [segment.description] : [`${segment.name} segment.`];
  if (segment.constraints.length > 0) {
    lines.push("", "Constraints:", ...segment.constraints.map((c) => `    - ${c}`));
  }
  return lines;
}

function docstring(lines: string[]): string[] {
  const escaped = lines.map((l) =>
    l
      .replace(/\\/g, "\\\\")
      .replace(/"$/, '\\"')
      .replace(/"""/g, '\\"\\"\\"'),
  );
  if (escaped.length === 1) return [`    """${escaped[0]}"""`];
  return [`    """${escaped[0]}`, ...escaped.slice(1).map((l) => (l ? `    ${l}` : "")), '    """'];
}

function pyAttribute(name: string): string {
  let attr = name.replace(/\W/g, "_");
  if (!PY_IDENTIFIER.test(attr)) attr = `_${attr}`;
  if (PY_KEYWORDS.has(attr)) attr = `${attr}_`;
  return attr;
}

function pyString(value: string): string {
  return JSON.stringify(value);
}

/** Python literal for a YAML-shaped value */
export function pyLiteral(value: unknown): string {
  if (value === null || value === undefined) return "None";
  if (typeof value === "boolean") return value ? "True" : "False";
  if (typeof value === "number") return Number.isFinite(value) ? String(value) : "None";
  if (typeof value === "string") return pyString(value);
  if (value instanceof Date) return pyString(value.toISOString());
  if (Array.isArray(value)) return `[${value.map(pyLiteral).join(", ")}]`;
  if (isRecord(value)) {
    const entries = Object.entries(value).map(([k, v]) => `${pyString(k)}: ${pyLiteral(v)}`);
    return `{${entries.join(", ")}}`;
  }
  return pyString(String(value));
}
