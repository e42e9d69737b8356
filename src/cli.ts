#!/usr/bin/env tsx
/**
 * ontoc CLI: entry point for the command-line interface.
 *
 * Commands:
 *   ontoc init <project>             Create a new ontology project
 *   ontoc validate [path]            Validate an ontology
 *   ontoc compile [path] --target    Compile to one or more targets
 *   ontoc serve [path]               Serve the ontology over MCP
 */

import { runCli } from "./cli/run.ts";

async function main(): Promise<void> {
  const code = await runCli(process.argv.slice(2));
  // `serve` keeps the process alive on stdio; everything else exits
  if (process.argv[2] !== "serve" || code !== 0) process.exit(code);
}

main().catch((err) => {
  console.error("Error:", err);
  process.exit(1);
});
