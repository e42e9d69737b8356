/**
 * ontoc: business ontology compiler.
 *
 * Loads YAML ontologies (segments, campaigns, lead scoring, free types),
 * validates them, and compiles them to JSON Schema, data models,
 * interface declarations, CRM metadata, and documentation.
 */

export * from "./type-expression/index.ts";
export * from "./ontology/index.ts";
export * from "./validator/index.ts";
export * from "./compiler/index.ts";
export { createTemplateRenderer, TEMPLATES } from "./templates/renderer.ts";
export type { TemplateRenderer, TemplateFunctions } from "./templates/renderer.ts";
export { loadProjectConfig, parseProjectConfig } from "./config/loader.ts";
export { initProject, addSegment, buildSegment, type SegmentOptions } from "./project/scaffold.ts";
export { createOntologyServer, runServer } from "./server/server.ts";
export * from "./errors.ts";
export { finding, formatFinding, SEVERITIES } from "./types/validation.ts";
export type * from "./types/type-expression.ts";
export type * from "./types/ontology.ts";
export type * from "./types/validation.ts";
export type * from "./types/targets.ts";
export type * from "./types/bindings.ts";
export type * from "./types/config.ts";
export { SCALAR_KINDS, BOUND_UNITS } from "./types/type-expression.ts";
export { REQUIRED_CAMPAIGN_METADATA } from "./types/ontology.ts";
export { CONFIG_FILE, DEFAULT_PROJECT_CONFIG } from "./types/config.ts";
export { VERSION } from "./version.ts";
