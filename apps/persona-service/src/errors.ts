/**
 * Invalid weights, bounds or thresholds.
 * Raised before any record is processed.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * A single malformed record. The pipeline skips the record and reports it.
 */
export class ValidationError extends Error {
  readonly recordId: string | null;
  readonly field: string | null;

  constructor(message: string, params: { recordId?: string | null; field?: string | null } = {}) {
    super(message);
    this.name = "ValidationError";
    this.recordId = params.recordId ?? null;
    this.field = params.field ?? null;
  }
}
