/**
 * Cliniq - Error Taxonomy
 *
 * configuration: deployment mismatch an operator must fix (never defaulted).
 * caller:        a request the builder cannot honour as given.
 * backend:       the live warehouse / server failed or lacks a table.
 */

export type CliniqErrorKind = "configuration" | "caller" | "backend";

export class CliniqError extends Error {
  readonly kind: CliniqErrorKind;

  constructor(kind: CliniqErrorKind, message: string, cause?: unknown) {
    super(message, cause ? { cause } : undefined);
    this.name = "CliniqError";
    this.kind = kind;
  }
}

// ── Configuration ─────────────────────────────────────────────────

export class ProfileNotFoundError extends CliniqError {
  constructor(profile: string, path: string) {
    super("configuration", `Schema profile not found: ${profile} (${path})`);
    this.name = "ProfileNotFoundError";
  }
}

export class ProfileParseError extends CliniqError {
  readonly issues: string[];

  constructor(profile: string, issues: string[], cause?: unknown) {
    super("configuration", `Schema profile ${profile} is malformed: ${issues.join("; ")}`, cause);
    this.name = "ProfileParseError";
    this.issues = issues;
  }
}

export class UnmappedViewError extends CliniqError {
  constructor(profile: string, view: string) {
    super("configuration", `View "${view}" is not mapped in profile ${profile}`);
    this.name = "UnmappedViewError";
  }
}

export class UnmappedColumnError extends CliniqError {
  constructor(profile: string, view: string, column: string) {
    super("configuration", `Column "${view}.${column}" is not mapped in profile ${profile}`);
    this.name = "UnmappedColumnError";
  }
}

export class ToolNotRegisteredError extends CliniqError {
  constructor(toolName: string, skill: string) {
    super("configuration", `Tool ${toolName} not available for skill ${skill}`);
    this.name = "ToolNotRegisteredError";
  }
}

export class FeatureUnsupportedError extends CliniqError {
  constructor(feature: string, profile: string) {
    super("configuration", `Feature ${feature} is not supported by the warehouse behind profile ${profile}`);
    this.name = "FeatureUnsupportedError";
  }
}

// ── Caller ────────────────────────────────────────────────────────

export class QueryBuildError extends CliniqError {
  constructor(message: string) {
    super("caller", message);
    this.name = "QueryBuildError";
  }
}

// ── Backend ───────────────────────────────────────────────────────

export class BackendError extends CliniqError {
  constructor(message: string, cause?: unknown) {
    super("backend", message, cause);
    this.name = "BackendError";
  }
}

export class TableNotFoundError extends CliniqError {
  constructor(table: string) {
    super("backend", `Table not found in warehouse: ${table}`);
    this.name = "TableNotFoundError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
