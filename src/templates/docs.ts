/** ontology-docs and segment-docs templates (Markdown) */

import type {
  CampaignBinding,
  FieldBinding,
  LeadScoringBinding,
  OntologyBindings,
  SegmentBinding,
  SegmentDocsBindings,
} from "../types/bindings.ts";
import type { JourneyStage } from "../types/ontology.ts";
import { displayValue, joinBlocks, mdCell } from "./text.ts";

export function renderOntologyDocs(bindings: OntologyBindings): string {
  const blocks = [
    "# Business Ontology",
    `_${bindings.segments.length} segment(s), ${bindings.campaigns.length} campaign(s)._`,
  ];

  if (bindings.segments.length > 0) {
    blocks.push("## Customer Segments");
    for (const segment of bindings.segments) {
      blocks.push(...segmentSection(segment, "###"));
    }
  }

  if (bindings.campaigns.length > 0) {
    blocks.push("## Campaigns");
    for (const campaign of bindings.campaigns) {
      blocks.push(...campaignSection(campaign));
    }
  }

  if (bindings.leadScoring) blocks.push(...leadScoringSection(bindings.leadScoring));

  if (bindings.types.length > 0) {
    blocks.push(
      "## Types",
      table(
        ["Type", "Definition", "Description"],
        bindings.types.map((t) => [t.name, `\`${t.source}\``, t.description ?? ""]),
      ),
    );
  }

  return joinBlocks(blocks);
}

export function renderSegmentDocs({ segment }: SegmentDocsBindings): string {
  const blocks = segmentSection(segment, "#");
  if (segment.journeyStages.length > 0) {
    blocks.push("## Customer Journey", ...segment.journeyStages.map(stageSection));
  }
  return joinBlocks(blocks);
}

function segmentSection(segment: SegmentBinding, heading: string): string[] {
  const sub = `${heading}#`;
  const blocks = [`${heading} ${segment.name}`];
  if (segment.description) blocks.push(segment.description);
  blocks.push(`${sub} Properties`, fieldTable(segment.fields));
  if (segment.constraints.length > 0) {
    blocks.push(`${sub} Constraints`, bulletList(segment.constraints));
  }
  return blocks;
}

function campaignSection(campaign: CampaignBinding): string[] {
  const blocks = [`### ${campaign.name}`];
  if (campaign.description) blocks.push(campaign.description);
  const metadata = Object.entries(campaign.metadata);
  if (metadata.length > 0) {
    blocks.push(table(["Field", "Value"], metadata.map(([k, v]) => [k, displayValue(v)])));
  }
  if (campaign.components.length > 0) {
    blocks.push("**Components**", bulletList(campaign.components));
  }
  if (campaign.constraints.length > 0) {
    blocks.push("**Constraints**", bulletList(campaign.constraints));
  }
  return blocks;
}

function leadScoringSection(model: LeadScoringBinding): string[] {
  const blocks = [
    "## Lead Scoring",
    `Model: **${model.name}**`,
    "### Inputs",
    fieldTable(model.inputs),
    "### Output",
    fieldTable(model.output),
  ];
  const weights = Object.entries(model.weights);
  if (weights.length > 0) {
    blocks.push("### Weights", table(["Input", "Weight"], weights.map(([k, v]) => [k, String(v)])));
  }
  const thresholds = Object.entries(model.thresholds);
  if (thresholds.length > 0) {
    blocks.push(
      "### Thresholds",
      table(["Tier", "Minimum Score"], thresholds.map(([k, v]) => [k, String(v)])),
    );
  }
  if (model.specialRules.length > 0) {
    blocks.push("### Special Rules", bulletList(model.specialRules));
  }
  return blocks;
}

function stageSection(stage: JourneyStage): string {
  const lines = [`### ${stage.name}`];
  if (stage.description) lines.push("", stage.description);
  if (stage.duration) lines.push("", `- **Duration:** ${stage.duration}`);
  if (stage.touchpoints && stage.touchpoints.length > 0) {
    lines.push(`- **Touchpoints:** ${stage.touchpoints.join(", ")}`);
  }
  if (stage.successMetrics && stage.successMetrics.length > 0) {
    lines.push(`- **Success metrics:** ${stage.successMetrics.join(", ")}`);
  }
  return lines.join("\n");
}

function fieldTable(fields: FieldBinding[]): string {
  if (fields.length === 0) return "_None declared._";
  return table(["Property", "Type"], fields.map((f) => [f.name, `\`${f.source}\``]));
}

function table(headers: string[], rows: string[][]): string {
  const line = (cells: string[]) => `| ${cells.map(mdCell).join(" | ")} |`;
  return [line(headers), line(headers.map(() => "---")), ...rows.map(line)].join("\n");
}

function bulletList(items: string[]): string {
  return items.map((item) => `- ${item}`).join("\n");
}
