/** Validation finding types */

export const SEVERITIES = ["error", "warning", "info"] as const;
export type Severity = (typeof SEVERITIES)[number];

/** A severity-tagged validation finding. Findings are returned, never thrown. */
export interface ValidationError {
  readonly message: string;
  readonly severity: Severity;
  /** Dotted path to the offending element, e.g. "segments.Smb.industry" */
  readonly location?: string;
}

export interface ValidationSummary {
  total_errors: number;
  errors: number;
  warnings: number;
  info: number;
  is_valid: boolean;
}

/** Create a frozen finding (severity defaults to "error") */
export function finding(
  message: string,
  location?: string,
  severity: Severity = "error",
): ValidationError {
  return Object.freeze(
    location === undefined ? { message, severity } : { message, severity, location },
  );
}

/** Render a finding the way the CLI prints it: "ERROR at loc: message" */
export function formatFinding(error: ValidationError): string {
  const where = error.location ? ` at ${error.location}` : "";
  return `${error.severity.toUpperCase()}${where}: ${error.message}`;
}
