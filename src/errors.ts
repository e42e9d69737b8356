/**
 * Typed fatal errors. Validation findings are not errors: see
 * types/validation.ts: these are the conditions that abort an operation.
 */

export type OntologyErrorCode =
  | "STRUCTURAL_PARSE_ERROR" // Document unreadable, missing, or wrongly shaped
  | "NOT_FOUND"              // Named segment/campaign/type does not exist
  | "TYPE_SYNTAX_ERROR"      // Malformed compound type expression
  | "CONFIG_ERROR"           // Malformed ontoc.yaml
  | "SCAFFOLD_ERROR";        // Project or segment scaffolding refused

export class OntologyError extends Error {
  readonly code: OntologyErrorCode;

  constructor(code: OntologyErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "OntologyError";
    this.code = code;
  }

  toJSON(): { code: OntologyErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }
}

export class StructuralParseError extends OntologyError {
  /** File or directory the failure belongs to */
  readonly sourcePath: string;

  constructor(sourcePath: string, message: string, options?: ErrorOptions) {
    super("STRUCTURAL_PARSE_ERROR", message, options);
    this.name = "StructuralParseError";
    this.sourcePath = sourcePath;
  }
}

export type LookupKind = "segment" | "campaign" | "type";

export class LookupError extends OntologyError {
  readonly kind: LookupKind;
  readonly lookupName: string;

  constructor(kind: LookupKind, lookupName: string) {
    const label = kind.charAt(0).toUpperCase() + kind.slice(1);
    super("NOT_FOUND", `${label} '${lookupName}' not found`);
    this.name = "LookupError";
    this.kind = kind;
    this.lookupName = lookupName;
  }
}

export class TypeExpressionSyntaxError extends OntologyError {
  readonly expression: string;

  constructor(expression: string, reason: string) {
    super("TYPE_SYNTAX_ERROR", `${reason}: ${expression}`);
    this.name = "TypeExpressionSyntaxError";
    this.expression = expression;
  }
}

export class ConfigError extends OntologyError {
  constructor(message: string, options?: ErrorOptions) {
    super("CONFIG_ERROR", message, options);
    this.name = "ConfigError";
  }
}

export class ScaffoldError extends OntologyError {
  constructor(message: string) {
    super("SCAFFOLD_ERROR", message);
    this.name = "ScaffoldError";
  }
}

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
