/**
 * Ontology tools: read-only MCP tools over a loaded ontology.
 */

import { z } from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { Ontology } from "../ontology/ontology.ts";
import { OntologyValidator } from "../validator/ontology-validator.ts";
import { OntologyCompiler } from "../compiler/compiler.ts";
import { tryParsePropertySource } from "../type-expression/parser.ts";
import { formatTypeExpression } from "../type-expression/format.ts";
import { OntologyError, errorMessage } from "../errors.ts";

export const TOOL_NAMES = [
  "list_segments",
  "list_campaigns",
  "inspect_segment",
  "validate_ontology",
  "validate_record",
  "compile_json_schema",
] as const;

/** Register all ontology tools on the MCP server */
export function registerOntologyTools(server: McpServer, ontology: Ontology): void {
  registerListSegments(server, ontology);
  registerListCampaigns(server, ontology);
  registerInspectSegment(server, ontology);
  registerValidateOntology(server, ontology);
  registerValidateRecord(server, ontology);
  registerCompileJsonSchema(server, ontology);
}

function registerListSegments(server: McpServer, ontology: Ontology): void {
  server.registerTool("list_segments", {
    title: "List Segments",
    description: "Lists every customer segment with its property and constraint counts.",
  }, async (): Promise<CallToolResult> => {
    return ok(
      Array.from(ontology.segments.values(), (s) => ({
        name: s.name,
        ...(s.description !== undefined && { description: s.description }),
        properties: Object.keys(s.properties).length,
        constraints: s.constraints.length,
      })),
    );
  });
}

function registerListCampaigns(server: McpServer, ontology: Ontology): void {
  server.registerTool("list_campaigns", {
    title: "List Campaigns",
    description: "Lists every marketing campaign with its owner team, type, and component count.",
  }, async (): Promise<CallToolResult> => {
    return ok(
      Array.from(ontology.campaigns.values(), (c) => ({
        name: c.name,
        owner_team: c.metadata["owner_team"] ?? "Unknown",
        campaign_type: c.metadata["campaign_type"] ?? "Unknown",
        components: Object.keys(c.components).length,
      })),
    );
  });
}

/** inspect_segment: properties with their parsed types, constraints, and journey */
function registerInspectSegment(server: McpServer, ontology: Ontology): void {
  server.registerTool("inspect_segment", {
    title: "Inspect Segment",
    description:
      "Returns one segment's properties (declared and canonical type, plus the parsed type kind), constraints, and journey stages.",
    inputSchema: z.object({
      name: z.string().describe("Segment name, e.g. 'EnterpriseCustomer'"),
    }),
  }, async (args: { name: string }): Promise<CallToolResult> => {
    try {
      const segment = ontology.requireSegment(args.name);
      const properties = Object.entries(segment.properties).map(([name, source]) => {
        const declared = typeof source === "string" ? source : "object";
        const type = tryParsePropertySource(source);
        if (!type) return { name, declared, canonical: declared, kind: "invalid" };
        return { name, declared, canonical: formatTypeExpression(type), kind: type.kind };
      });
      return ok({
        name: segment.name,
        ...(segment.description !== undefined && { description: segment.description }),
        properties,
        constraints: segment.constraints,
        journeyStages: Object.values(segment.journeyStages),
      });
    } catch (e) {
      return fail(e);
    }
  });
}

function registerValidateOntology(server: McpServer, ontology: Ontology): void {
  server.registerTool("validate_ontology", {
    title: "Validate Ontology",
    description: "Runs every structural and naming check and returns the findings with a summary.",
  }, async (): Promise<CallToolResult> => {
    const validator = new OntologyValidator(ontology);
    const findings = validator.validateAll();
    return ok({ summary: validator.getValidationSummary(), findings });
  });
}

function registerValidateRecord(server: McpServer, ontology: Ontology): void {
  server.registerTool("validate_record", {
    title: "Validate Record",
    description:
      "Checks a data record against a segment: missing and non-conforming properties are errors, unknown properties are warnings.",
    inputSchema: z.object({
      segment: z.string().describe("Segment to validate against"),
      data: z.record(z.string(), z.unknown()).describe("Property-value pairs"),
    }),
  }, async (args: { segment: string; data: Record<string, unknown> }): Promise<CallToolResult> => {
    const findings = new OntologyValidator(ontology).validateDataAgainstOntology(
      args.data,
      args.segment,
    );
    return ok({
      valid: findings.every((f) => f.severity !== "error"),
      findings,
    });
  });
}

function registerCompileJsonSchema(server: McpServer, ontology: Ontology): void {
  server.registerTool("compile_json_schema", {
    title: "Compile JSON Schema",
    description: "Compiles one segment, or the whole ontology when no segment is given, to JSON Schema.",
    inputSchema: z.object({
      segment: z.string().optional().describe("Segment to compile; omit for all segments"),
    }),
  }, async (args: { segment?: string }): Promise<CallToolResult> => {
    try {
      return ok(new OntologyCompiler(ontology).compileToJsonSchema(args.segment));
    } catch (e) {
      return fail(e);
    }
  });
}

// --- Helpers ---

function ok(data: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
  };
}

function fail(e: unknown): CallToolResult {
  const code = e instanceof OntologyError ? e.code : "error";
  return {
    content: [{ type: "text", text: JSON.stringify({ error: { code, message: errorMessage(e) } }) }],
    isError: true,
  };
}
