/**
 * Project scaffolding: `init` lays out a new ontology project and
 * `add-segment` appends a segment to the customers file.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { dump, load } from "js-yaml";
import { CONFIG_FILE, DEFAULT_PROJECT_CONFIG } from "../types/config.ts";
import { ScaffoldError, StructuralParseError, errorMessage } from "../errors.ts";
import { pathKind } from "../ontology/loader.ts";
import { validateTypeExpression } from "../type-expression/validator.ts";
import { isRecord } from "../utils/object.ts";

const ONTOLOGY_AREAS = ["customers", "products", "marketing", "sales", "operations"];
const PROJECT_DIRS = ["generated", "models", "tests"];

const STARTER_SEGMENTS = {
  segments: {
    EnterpriseCustomer: {
      properties: {
        company_size: 'enum["1000-5000", "5000+"]',
        industry: 'enum["financial", "healthcare", "retail", "technology"]',
        annual_revenue: "range(10M, 1B+)",
      },
      constraints: [
        "Healthcare companies require HIPAA compliance",
        "Financial companies require SOC2 Type II",
      ],
    },
  },
};

const STARTER_CAMPAIGNS = {
  campaigns: {
    ProductLaunchCampaign: {
      metadata: {
        owner_team: "product_marketing",
        campaign_type: "product_launch",
        target_audience: ["EnterpriseCustomer"],
      },
      components: {
        announcement: {
          channels: ["blog", "email", "social"],
          success_metrics: ["reach", "engagement"],
        },
      },
      constraints: ["All assets must follow brand guidelines"],
    },
  },
};

const STARTER_CONFIG = {
  ontology_path: DEFAULT_PROJECT_CONFIG.ontologyPath,
  output_dir: DEFAULT_PROJECT_CONFIG.outputDir,
  targets: ["json-schema", "pydantic"],
};

export interface SegmentOptions {
  companySize?: string;
  industry?: string;
  /** Range bounds, e.g. "10M, 1B+" */
  annualRevenue?: string;
}

/** Create a project directory with a starter ontology; returns the files written */
export async function initProject(projectDir: string): Promise<string[]> {
  if ((await pathKind(projectDir)) !== undefined) {
    throw new ScaffoldError(`Project directory '${projectDir}' already exists`);
  }

  const ontologyDir = join(projectDir, DEFAULT_PROJECT_CONFIG.ontologyPath);
  for (const area of ONTOLOGY_AREAS) {
    await mkdir(join(ontologyDir, area), { recursive: true });
  }
  for (const dir of PROJECT_DIRS) {
    await mkdir(join(projectDir, dir), { recursive: true });
  }

  const files: Array<[string, unknown]> = [
    [join(ontologyDir, "customers", "segments.yaml"), STARTER_SEGMENTS],
    [join(ontologyDir, "marketing", "campaigns.yaml"), STARTER_CAMPAIGNS],
    [join(projectDir, CONFIG_FILE), STARTER_CONFIG],
  ];
  for (const [path, data] of files) {
    await writeFile(path, toYaml(data), "utf-8");
  }
  return files.map(([path]) => path);
}

/** Segment definition built from the add-segment options */
export function buildSegment(options: SegmentOptions): { properties: Record<string, string> } {
  const properties: Record<string, string> = {};
  if (options.companySize) properties["company_size"] = enumOf(options.companySize);
  if (options.industry) properties["industry"] = enumOf(options.industry);
  if (options.annualRevenue) properties["annual_revenue"] = `range(${options.annualRevenue})`;

  for (const [name, definition] of Object.entries(properties)) {
    const [problem] = validateTypeExpression(definition, name);
    if (problem) throw new ScaffoldError(`Invalid --${name.replace(/_/g, "-")}: ${problem.message}`);
  }
  return { properties };
}

/**
 * Add (or replace) a segment in `<ontologyDir>/customers/segments.yaml`,
 * creating the file when needed. Returns the file path.
 */
export async function addSegment(
  ontologyDir: string,
  name: string,
  options: SegmentOptions = {},
): Promise<string> {
  if ((await pathKind(ontologyDir)) !== "directory") {
    throw new ScaffoldError(`Ontology directory '${ontologyDir}' not found`);
  }

  const segment = buildSegment(options);
  const segmentsFile = join(ontologyDir, "customers", "segments.yaml");
  const data = await readYamlMapping(segmentsFile);

  const segments = isRecord(data["segments"]) ? data["segments"] : {};
  segments[name] = segment;
  data["segments"] = segments;

  await mkdir(join(ontologyDir, "customers"), { recursive: true });
  await writeFile(segmentsFile, toYaml(data), "utf-8");
  return segmentsFile;
}

async function readYamlMapping(path: string): Promise<Record<string, unknown>> {
  if ((await pathKind(path)) !== "file") return {};

  let raw: unknown;
  try {
    raw = load(await readFile(path, "utf-8"));
  } catch (err) {
    throw new StructuralParseError(path, `Invalid YAML in ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  if (raw == null) return {};
  if (!isRecord(raw)) {
    throw new StructuralParseError(path, `Expected a mapping at the top of ${path}`);
  }
  return raw;
}

function enumOf(value: string): string {
  return `enum[${JSON.stringify(value)}]`;
}

function toYaml(data: unknown): string {
  return dump(data, { indent: 2, lineWidth: -1 });
}
