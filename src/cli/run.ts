/**
 * Command dispatch for the ontoc CLI. Results go to stdout, diagnostics to
 * stderr; the return value is the process exit code.
 */

import { resolve } from "node:path";
import type { Ontology } from "../ontology/ontology.ts";
import type { ProjectConfig } from "../types/config.ts";
import { loadOntology } from "../ontology/loader.ts";
import { loadProjectConfig } from "../config/loader.ts";
import { OntologyValidator } from "../validator/ontology-validator.ts";
import { OntologyCompiler } from "../compiler/compiler.ts";
import { createDefaultRegistry } from "../compiler/targets.ts";
import { addSegment, initProject } from "../project/scaffold.ts";
import { runServer } from "../server/server.ts";
import { formatFinding } from "../types/validation.ts";
import { errorMessage } from "../errors.ts";
import { VERSION } from "../version.ts";
import { parseArgs, splitList, UsageError, type ParsedArgs } from "./args.ts";

export interface CliOptions {
  /** Directory that relative paths and ontoc.yaml resolve against */
  cwd?: string;
}

interface CommandContext {
  cwd: string;
  args: ParsedArgs;
  config: ProjectConfig;
}

interface Command {
  summary: string;
  options: readonly string[];
  run(ctx: CommandContext): Promise<number>;
}

const COMMANDS: Record<string, Command> = {
  init: {
    summary: "init <project>                      Create a new ontology project",
    options: [],
    run: runInit,
  },
  validate: {
    summary: "validate [path]                     Validate an ontology file or directory",
    options: [],
    run: runValidate,
  },
  compile: {
    summary: "compile [path] --target a,b --output dir [--segment name]",
    options: ["target", "output", "segment"],
    run: runCompile,
  },
  "list-segments": {
    summary: "list-segments [path]                List customer segments",
    options: [],
    run: runListSegments,
  },
  "list-campaigns": {
    summary: "list-campaigns [path]               List marketing campaigns",
    options: [],
    run: runListCampaigns,
  },
  "add-segment": {
    summary: "add-segment <name> [--ontology dir] [--company-size v] [--industry v] [--annual-revenue v]",
    options: ["ontology", "company-size", "industry", "annual-revenue"],
    run: runAddSegment,
  },
  serve: {
    summary: "serve [path]                        Serve the ontology over MCP (stdio)",
    options: [],
    run: runServe,
  },
};

export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  const [name, ...rest] = argv;

  if (!name || name === "help" || name === "--help" || name === "-h") {
    printUsage();
    return 0;
  }
  if (name === "version" || name === "--version" || name === "-v") {
    console.log(`ontoc v${VERSION}`);
    return 0;
  }

  const command = COMMANDS[name];
  if (!command) {
    console.error(`Error: Unknown command '${name}'`);
    printUsage();
    return 1;
  }

  try {
    const args = parseArgs(rest, command.options);
    if (args.options.has("help")) {
      console.log(`Usage: ontoc ${command.summary}`);
      return 0;
    }
    const config = await loadProjectConfig(cwd);
    return await command.run({ cwd, args, config });
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    if (err instanceof UsageError) console.error(`Usage: ontoc ${command.summary}`);
    return 1;
  }
}

// --- Commands ---

async function runInit({ cwd, args }: CommandContext): Promise<number> {
  const [project] = args.positionals;
  if (!project) throw new UsageError("Missing project name");

  const files = await initProject(resolve(cwd, project));
  console.log(`✅ Created ontology project in ./${project}/`);
  for (const file of files) console.log(`   ${file}`);
  console.log();
  console.log("Next steps:");
  console.log(`  1. cd ${project}`);
  console.log("  2. ontoc validate");
  console.log("  3. ontoc compile --target json-schema,pydantic");
  return 0;
}

async function runValidate(ctx: CommandContext): Promise<number> {
  const ontology = await loadFrom(ctx);
  const validator = new OntologyValidator(ontology);
  const findings = validator.validateAll();

  if (findings.length === 0) {
    console.log("✅ Ontology is valid!");
    return 0;
  }

  for (const finding of findings) console.log(formatFinding(finding));
  const summary = validator.getValidationSummary();
  console.log();
  console.log(
    `${summary.errors} error(s), ${summary.warnings} warning(s), ${summary.info} info`,
  );
  return summary.is_valid ? 0 : 1;
}

async function runCompile(ctx: CommandContext): Promise<number> {
  const { cwd, args, config } = ctx;
  const ontology = await loadFrom(ctx);

  const targetOption = args.options.get("target");
  const targets = targetOption !== undefined ? splitList(targetOption) : config.targets;
  const outputDir = resolve(cwd, args.options.get("output") ?? config.outputDir);
  const segment = args.options.get("segment");

  const compiler = new OntologyCompiler(ontology, {
    registry: createDefaultRegistry(),
    crm: { hubspot: config.hubspot, salesforce: config.salesforce },
    onWarning: (message) => console.error(`Warning: ${message}`),
  });
  const report = await compiler.compileAll(outputDir, targets, segment);

  for (const failure of report.failed) {
    console.error(`Error compiling ${failure.target}: ${failure.message}`);
  }
  if (report.failed.length > 0) return 1;

  console.log(`✅ Compiled ${report.written.length} file(s) to ${outputDir}`);
  return 0;
}

async function runListSegments(ctx: CommandContext): Promise<number> {
  const ontology = await loadFrom(ctx);
  const segments = Array.from(ontology.segments.values());
  if (segments.length === 0) {
    console.log("No segments found in ontology");
    return 0;
  }

  printTable(
    ["Segment", "Properties", "Constraints"],
    segments.map((s) => [
      s.name,
      String(Object.keys(s.properties).length),
      String(s.constraints.length),
    ]),
  );
  return 0;
}

async function runListCampaigns(ctx: CommandContext): Promise<number> {
  const ontology = await loadFrom(ctx);
  const campaigns = Array.from(ontology.campaigns.values());
  if (campaigns.length === 0) {
    console.log("No campaigns found in ontology");
    return 0;
  }

  printTable(
    ["Campaign", "Owner Team", "Campaign Type", "Components"],
    campaigns.map((c) => [
      c.name,
      metadataText(c.metadata["owner_team"]),
      metadataText(c.metadata["campaign_type"]),
      String(Object.keys(c.components).length),
    ]),
  );
  return 0;
}

async function runAddSegment({ cwd, args, config }: CommandContext): Promise<number> {
  const [name] = args.positionals;
  if (!name) throw new UsageError("Missing segment name");

  const ontologyDir = resolve(cwd, args.options.get("ontology") ?? config.ontologyPath);
  const companySize = args.options.get("company-size");
  const industry = args.options.get("industry");
  const annualRevenue = args.options.get("annual-revenue");

  await addSegment(ontologyDir, name, {
    ...(companySize !== undefined && { companySize }),
    ...(industry !== undefined && { industry }),
    ...(annualRevenue !== undefined && { annualRevenue }),
  });
  console.log(`✅ Segment '${name}' added to ontology`);
  return 0;
}

async function runServe({ cwd, args, config }: CommandContext): Promise<number> {
  await runServer(resolve(cwd, args.positionals[0] ?? config.ontologyPath));
  return 0;
}

// --- Helpers ---

function loadFrom({ cwd, args, config }: CommandContext): Promise<Ontology> {
  return loadOntology(resolve(cwd, args.positionals[0] ?? config.ontologyPath));
}

function metadataText(value: unknown): string {
  if (value === undefined || value === null) return "Unknown";
  return typeof value === "string" ? value : JSON.stringify(value);
}

function printTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map((row) => (row[i] ?? "").length)),
  );
  const line = (cells: string[]) =>
    cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join("  ").trimEnd();

  console.log(line(headers));
  console.log(line(widths.map((w) => "-".repeat(w))));
  for (const row of rows) console.log(line(row));
}

function printUsage(): void {
  const lines = Object.values(COMMANDS).map((c) => `  ontoc ${c.summary}`);
  console.log(`
ontoc v${VERSION} — business ontology compiler

Usage:
${lines.join("\n")}
  ontoc version                       Print version
  ontoc help                          Show this message

Targets: ${createDefaultRegistry().ids().join(", ")}
  `.trim());
}
