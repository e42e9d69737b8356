/**
 * MCP resources: a read-only summary of the loaded ontology so a client
 * has context as soon as it connects.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ReadResourceResult } from "@modelcontextprotocol/sdk/types.js";
import type { Ontology } from "../ontology/ontology.ts";
import { OntologyValidator } from "../validator/ontology-validator.ts";
import { TOOL_NAMES } from "./tools.ts";

export const SUMMARY_URI = "ontology://summary";

export function registerResources(server: McpServer, ontology: Ontology): void {
  server.registerResource(
    "ontology-summary",
    SUMMARY_URI,
    {
      title: "Ontology Summary",
      description:
        "Segments, campaigns, lead scoring, free types, and validation status of the loaded ontology. Read this first.",
      mimeType: "application/json",
    },
    async (uri): Promise<ReadResourceResult> => {
      const validator = new OntologyValidator(ontology);
      validator.validateAll();

      const summary = {
        segments: ontology.listSegments(),
        campaigns: ontology.listCampaigns(),
        leadScoring: ontology.leadScoring?.name ?? null,
        types: Array.from(ontology.types.keys()),
        validation: validator.getValidationSummary(),
        tools: TOOL_NAMES,
      };

      return {
        contents: [
          {
            uri: uri.href,
            mimeType: "application/json",
            text: JSON.stringify(summary, null, 2),
          },
        ],
      };
    },
  );
}
