export { OntologyCompiler } from "./compiler.ts";
export type { CompilerOptions, CompileFailure, CompileReport } from "./compiler.ts";
export { TargetRegistry, BUILTIN_TARGETS, createDefaultRegistry } from "./targets.ts";
export type { CompileTarget, TargetLookup } from "./targets.ts";
export { typeToJsonSchema, propertiesToJsonSchema, JSON_SCHEMA_DRAFT } from "./json-schema.ts";
export { toSalesforceField, toHubspotProperty, humanize, toSnakeCase, DEFAULT_CRM_OPTIONS } from "./crm.ts";
export { writeArtifact } from "./output.ts";
