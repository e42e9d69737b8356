/**
 * Multi-target compiler. Builds target-native shapes and template bindings
 * from an Ontology; the text itself comes from the TemplateRenderer.
 */

import { join } from "node:path";
import type { Ontology } from "../ontology/ontology.ts";
import type { CrmOptions } from "../types/config.ts";
import type { HubspotProperty, JsonSchema } from "../types/targets.ts";
import type { SourceModelBindings } from "../types/bindings.ts";
import type { TemplateRenderer } from "../templates/renderer.ts";
import { LookupError, TypeExpressionSyntaxError, errorMessage } from "../errors.ts";
import { createTemplateRenderer } from "../templates/renderer.ts";
import { JSON_SCHEMA_DRAFT, propertiesToJsonSchema } from "./json-schema.ts";
import { DEFAULT_CRM_OPTIONS, toHubspotProperty, toSalesforceField } from "./crm.ts";
import { ontologyBindings, segmentBinding } from "./bindings.ts";
import { createDefaultRegistry, type TargetRegistry } from "./targets.ts";
import { writeArtifact } from "./output.ts";

export interface CompilerOptions {
  renderer?: TemplateRenderer;
  registry?: TargetRegistry;
  crm?: CrmOptions;
  /** Receives non-fatal notices such as unknown target ids */
  onWarning?: (message: string) => void;
}

export interface CompileFailure {
  target: string;
  message: string;
}

export interface CompileReport {
  /** Every file written, across all targets */
  written: string[];
  /** Target ids with no registered target */
  skipped: string[];
  failed: CompileFailure[];
}

export class OntologyCompiler {
  private renderer: TemplateRenderer;
  private registry: TargetRegistry;
  private crm: CrmOptions;
  private onWarning: (message: string) => void;

  constructor(
    private ontology: Ontology,
    options: CompilerOptions = {},
  ) {
    this.renderer = options.renderer ?? createTemplateRenderer();
    this.registry = options.registry ?? createDefaultRegistry();
    this.crm = options.crm ?? DEFAULT_CRM_OPTIONS;
    this.onWarning = options.onWarning ?? (() => {});
  }

  compileToJsonSchema(segmentName?: string): JsonSchema {
    if (segmentName !== undefined) {
      const segment = this.ontology.requireSegment(segmentName);
      return {
        $schema: JSON_SCHEMA_DRAFT,
        title: `${segmentName} Schema`,
        ...(segment.description !== undefined && { description: segment.description }),
        type: "object",
        properties: propertiesToJsonSchema(segment.properties),
        required: Object.keys(segment.properties),
      };
    }

    const properties: Record<string, JsonSchema> = {};
    for (const [name, segment] of this.ontology.segments) {
      properties[name] = {
        type: "object",
        title: name,
        ...(segment.description !== undefined && { description: segment.description }),
        properties: propertiesToJsonSchema(segment.properties),
        required: Object.keys(segment.properties),
      };
    }

    return {
      $schema: JSON_SCHEMA_DRAFT,
      title: "Business Ontology Schema",
      type: "object",
      properties,
      required: [],
    };
  }

  compileToPydantic(segmentName?: string): string {
    return this.renderer.render("pydantic-model", this.sourceModelBindings(segmentName));
  }

  compileToTypeScript(segmentName?: string): string {
    return this.renderer.render("typescript-interfaces", this.sourceModelBindings(segmentName));
  }

  /** Custom objects plus validation rules, one directory per segment */
  async compileToSalesforce(outputDir: string): Promise<string[]> {
    const rendered: Array<[string, string]> = [];

    for (const [name, segment] of this.ontology.segments) {
      const fields = Object.entries(segment.properties).map(([prop, source]) =>
        toSalesforceField(prop, source, this.crm),
      );
      rendered.push([
        join(outputDir, "objects", name, `${name}.object-meta.xml`),
        this.renderer.render("salesforce-object", {
          objectName: name,
          description: segment.description ?? `Custom object for ${name}`,
          fields,
        }),
      ]);

      if (segment.constraints.length > 0) {
        rendered.push([
          join(outputDir, "validationRules", name, `${name}_ValidationRule.validationRule-meta.xml`),
          this.renderer.render("salesforce-validation", {
            segmentName: name,
            constraints: segment.constraints,
          }),
        ]);
      }
    }

    return this.writeAll(rendered);
  }

  /** One property list across all segments; the first declaration of a name wins */
  async compileToHubspot(outputDir: string): Promise<string[]> {
    const properties = new Map<string, HubspotProperty>();
    for (const segment of this.ontology.segments.values()) {
      for (const [prop, source] of Object.entries(segment.properties)) {
        const property = toHubspotProperty(prop, source, this.crm);
        if (!properties.has(property.name)) properties.set(property.name, property);
      }
    }

    const content = this.renderer.render("hubspot-properties", {
      properties: Array.from(properties.values()),
    });
    return [await writeArtifact(join(outputDir, "custom_properties.json"), content)];
  }

  async compileToMarkdown(outputDir: string): Promise<string[]> {
    const bindings = ontologyBindings(this.ontology);
    const rendered: Array<[string, string]> = [
      [join(outputDir, "ontology_documentation.md"), this.renderer.render("ontology-docs", bindings)],
    ];
    for (const segment of bindings.segments) {
      rendered.push([
        join(outputDir, `${segment.name}_documentation.md`),
        this.renderer.render("segment-docs", { segment }),
      ]);
    }
    return this.writeAll(rendered);
  }

  /**
   * Compile every requested target into `<outputDir>/<target>/`. Unknown
   * ids are skipped with a warning. A missing segment or a malformed type
   * definition fails only its own target; anything else aborts the run.
   */
  async compileAll(
    outputDir: string,
    targets: string[],
    segmentName?: string,
  ): Promise<CompileReport> {
    const report: CompileReport = { written: [], skipped: [], failed: [] };

    for (const id of targets) {
      const lookup = this.registry.lookup(id);
      if (!lookup.found) {
        this.onWarning(`Unknown target format '${lookup.id}'`);
        report.skipped.push(lookup.id);
        continue;
      }

      const { target } = lookup;
      try {
        const scope = target.scoped ? segmentName : undefined;
        report.written.push(...(await target.run(this, join(outputDir, target.id), scope)));
      } catch (err) {
        if (!(err instanceof LookupError || err instanceof TypeExpressionSyntaxError)) throw err;
        report.failed.push({ target: target.id, message: errorMessage(err) });
      }
    }

    return report;
  }

  private sourceModelBindings(segmentName?: string): SourceModelBindings {
    if (segmentName !== undefined) {
      return { scope: "segment", segment: segmentBinding(this.ontology.requireSegment(segmentName)) };
    }
    return { scope: "ontology", ...ontologyBindings(this.ontology) };
  }

  /** Writes rendered artifacts; callers render everything before the first write */
  private async writeAll(rendered: Array<[string, string]>): Promise<string[]> {
    const written: string[] = [];
    for (const [path, content] of rendered) {
      written.push(await writeArtifact(path, content));
    }
    return written;
  }
}
