/**
 * MCP server: exposes a loaded ontology over stdio.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Ontology } from "../ontology/ontology.ts";
import { loadOntology } from "../ontology/loader.ts";
import { VERSION } from "../version.ts";
import { registerOntologyTools, TOOL_NAMES } from "./tools.ts";
import { registerResources } from "./resources.ts";

/** An MCP server with the ontology tools and resources registered */
export function createOntologyServer(ontology: Ontology): McpServer {
  const server = new McpServer(
    { name: "ontoc", version: VERSION },
    { capabilities: { logging: {} } },
  );
  registerOntologyTools(server, ontology);
  registerResources(server, ontology);
  return server;
}

/** Load the ontology at `ontologyPath` and serve it on stdio until the process ends */
export async function runServer(ontologyPath: string): Promise<void> {
  console.error(`[ontoc] Loading ontology from: ${ontologyPath}`);
  const ontology = await loadOntology(ontologyPath);
  console.error(
    `[ontoc] Loaded ${ontology.segments.size} segment(s), ` +
    `${ontology.campaigns.size} campaign(s), ${ontology.types.size} type(s)`,
  );

  const server = createOntologyServer(ontology);
  await server.connect(new StdioServerTransport());
  console.error(`[ontoc] Registered ${TOOL_NAMES.length} tools; MCP server running on stdio`);

  const shutdown = async () => {
    console.error("[ontoc] Shutting down...");
    await server.close();
    process.exit(0);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}
