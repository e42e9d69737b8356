/**
 * Config loader: reads ontoc.yaml from the project root. A missing file
 * means the defaults; a file that is present must be well-formed.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { load } from "js-yaml";
import { z } from "zod/v4";
import type { ProjectConfig } from "../types/config.ts";
import { CONFIG_FILE, DEFAULT_PROJECT_CONFIG } from "../types/config.ts";
import { ConfigError, errorMessage } from "../errors.ts";

const defaults = DEFAULT_PROJECT_CONFIG;

const ProjectConfigSchema = z.object({
  ontology_path: z.string().min(1).default(defaults.ontologyPath),
  output_dir: z.string().min(1).default(defaults.outputDir),
  targets: z.array(z.string().min(1)).default(defaults.targets),
  hubspot: z
    .object({ group_name: z.string().min(1).default(defaults.hubspot.groupName) })
    .default({ group_name: defaults.hubspot.groupName }),
  salesforce: z
    .object({
      text_length: z.number().int().positive().max(255).default(defaults.salesforce.textLength),
    })
    .default({ text_length: defaults.salesforce.textLength }),
});

/** Load project configuration from ontoc.yaml */
export async function loadProjectConfig(projectPath: string): Promise<ProjectConfig> {
  const configPath = join(projectPath, CONFIG_FILE);

  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return cloneDefaults();
    throw new ConfigError(`Cannot read ${configPath}: ${errorMessage(err)}`, { cause: err });
  }

  return parseProjectConfig(content, configPath);
}

/** Parse ontoc.yaml content; an empty document yields the defaults */
export function parseProjectConfig(content: string, configPath = CONFIG_FILE): ProjectConfig {
  let raw: unknown;
  try {
    raw = load(content);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${configPath}: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = ProjectConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid ${configPath}: ${issues}`);
  }

  const config = parsed.data;
  return {
    ontologyPath: config.ontology_path,
    outputDir: config.output_dir,
    targets: config.targets,
    hubspot: { groupName: config.hubspot.group_name },
    salesforce: { textLength: config.salesforce.text_length },
  };
}

function cloneDefaults(): ProjectConfig {
  return {
    ...defaults,
    targets: [...defaults.targets],
    hubspot: { ...defaults.hubspot },
    salesforce: { ...defaults.salesforce },
  };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
