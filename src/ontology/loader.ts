/**
 * Ontology loader: reads YAML ontology documents from a file or a
 * directory tree and builds the Ontology aggregate.
 */

import { readdir, readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { load as yamlLoad } from "js-yaml";
import type { ZodError } from "zod/v4";
import { StructuralParseError, errorMessage } from "../errors.ts";
import { OntologyDocumentSchema } from "./document-schema.ts";
import { Ontology } from "./ontology.ts";

export interface DirectoryLoadOptions {
  /**
   * Called for each file that fails to load; the file is skipped and
   * loading continues. Defaults to a warning on stderr.
   */
  onFileError?: (filePath: string, error: unknown) => void;
}

const YAML_EXTENSIONS = [".yaml", ".yml"];

/** Parse one YAML document into an Ontology */
export function parseOntologyDocument(
  content: string,
  sourcePath: string,
): Ontology {
  let data: unknown;
  try {
    data = yamlLoad(content, { filename: sourcePath });
  } catch (err) {
    throw new StructuralParseError(
      sourcePath,
      `Invalid YAML in ${sourcePath}: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  // An empty document is an empty ontology
  if (data === undefined || data === null) return new Ontology();

  const result = OntologyDocumentSchema.safeParse(data);
  if (!result.success) {
    throw new StructuralParseError(
      sourcePath,
      `Invalid ontology document ${sourcePath}: ${formatIssues(result.error)}`,
    );
  }

  return Ontology.fromDocument(result.data);
}

/** Load an ontology from a single YAML file */
export async function loadOntologyFile(filePath: string): Promise<Ontology> {
  if ((await pathKind(filePath)) !== "file") {
    throw new StructuralParseError(filePath, `Ontology file not found: ${filePath}`);
  }
  const content = await readFile(filePath, "utf-8");
  return parseOntologyDocument(content, filePath);
}

/**
 * Load and merge every YAML file under a directory (recursively), in
 * sorted path order. Later files win per key. A file that fails to load
 * is reported and skipped.
 */
export async function loadOntologyDirectory(
  dirPath: string,
  options: DirectoryLoadOptions = {},
): Promise<Ontology> {
  if ((await pathKind(dirPath)) !== "directory") {
    throw new StructuralParseError(dirPath, `Ontology directory not found: ${dirPath}`);
  }

  const onFileError = options.onFileError ?? warnFileError;
  const ontology = new Ontology();

  for (const file of await listYamlFiles(dirPath)) {
    try {
      ontology.merge(await loadOntologyFile(file));
    } catch (err) {
      onFileError(file, err);
    }
  }

  return ontology;
}

/** Load from a path that may be a file or a directory */
export async function loadOntology(
  path: string,
  options: DirectoryLoadOptions = {},
): Promise<Ontology> {
  const kind = await pathKind(path);
  if (kind === "file") return loadOntologyFile(path);
  if (kind === "directory") return loadOntologyDirectory(path, options);
  throw new StructuralParseError(path, `Ontology path '${path}' not found`);
}

/** Recursively list YAML files under a directory, sorted by path */
export async function listYamlFiles(dirPath: string): Promise<string[]> {
  const files: string[] = [];
  const entries = await readdir(dirPath, { withFileTypes: true });

  for (const entry of entries) {
    const entryPath = join(dirPath, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listYamlFiles(entryPath)));
    } else if (entry.isFile() && YAML_EXTENSIONS.some((ext) => entry.name.endsWith(ext))) {
      files.push(entryPath);
    }
  }

  return files.sort();
}

/** Whether a path is a file, a directory, or missing */
export async function pathKind(
  path: string,
): Promise<"file" | "directory" | undefined> {
  try {
    const s = await stat(path);
    if (s.isDirectory()) return "directory";
    if (s.isFile()) return "file";
    return undefined;
  } catch {
    return undefined;
  }
}

function warnFileError(filePath: string, error: unknown): void {
  console.error(`[ontoc] Warning: Failed to load ${filePath}: ${errorMessage(error)}`);
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.map(String).join(".");
      return where ? `${where}: ${issue.message}` : issue.message;
    })
    .join("; ");
}
