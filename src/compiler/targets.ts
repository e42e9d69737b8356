/**
 * Compile-target registry. Each target id maps to a runner that writes its
 * artifacts under a target directory; unregistered ids come back as an
 * explicit "not found" result instead of falling through.
 */

import { join } from "node:path";
import type { OntologyCompiler } from "./compiler.ts";
import { writeArtifact } from "./output.ts";

export interface CompileTarget {
  id: string;
  description: string;
  /** Whether the target honours a segment scope */
  scoped: boolean;
  /** Write the target's artifacts under `outputDir`; returns the paths written */
  run(compiler: OntologyCompiler, outputDir: string, segmentName?: string): Promise<string[]>;
}

export type TargetLookup =
  | { found: true; target: CompileTarget }
  | { found: false; id: string };

export class TargetRegistry {
  private targets = new Map<string, CompileTarget>();

  constructor(targets: CompileTarget[] = []) {
    for (const target of targets) this.register(target);
  }

  /** Add or replace a target */
  register(target: CompileTarget): this {
    this.targets.set(target.id, target);
    return this;
  }

  lookup(id: string): TargetLookup {
    const target = this.targets.get(id);
    return target ? { found: true, target } : { found: false, id };
  }

  ids(): string[] {
    return Array.from(this.targets.keys());
  }

  list(): CompileTarget[] {
    return Array.from(this.targets.values());
  }
}

export const BUILTIN_TARGETS: CompileTarget[] = [
  {
    id: "json-schema",
    description: "JSON Schema (draft-07) document",
    scoped: true,
    run: async (compiler, dir, segment) => [
      await writeArtifact(
        join(dir, "schema.json"),
        JSON.stringify(compiler.compileToJsonSchema(segment), null, 2) + "\n",
      ),
    ],
  },
  {
    id: "pydantic",
    description: "Python data models (pydantic)",
    scoped: true,
    run: async (compiler, dir, segment) => [
      await writeArtifact(join(dir, "models.py"), compiler.compileToPydantic(segment)),
    ],
  },
  {
    id: "typescript",
    description: "TypeScript interface declarations",
    scoped: true,
    run: async (compiler, dir, segment) => [
      await writeArtifact(join(dir, "interfaces.ts"), compiler.compileToTypeScript(segment)),
    ],
  },
  {
    id: "salesforce",
    description: "Salesforce custom object and validation rule metadata",
    scoped: false,
    run: (compiler, dir) => compiler.compileToSalesforce(dir),
  },
  {
    id: "hubspot",
    description: "HubSpot custom property definitions",
    scoped: false,
    run: (compiler, dir) => compiler.compileToHubspot(dir),
  },
  {
    id: "markdown",
    description: "Markdown documentation",
    scoped: false,
    run: (compiler, dir) => compiler.compileToMarkdown(dir),
  },
];

/** A registry holding the built-in targets */
export function createDefaultRegistry(): TargetRegistry {
  return new TargetRegistry(BUILTIN_TARGETS);
}
