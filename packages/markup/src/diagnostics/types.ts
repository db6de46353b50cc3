/** UI severity; policy can tune it without code changes. */
export type DiagnosticSeverity = "error" | "warning" | "info";
/** Impact captures the real consequence if ignored, which can differ from severity. */
export type DiagnosticImpact =
  | "blocking" // The document cannot be converted.
  | "degraded" // Output is produced but likely wrong or incomplete.
  | "informational"; // Context only.
/** How safe automation is. */
export type DiagnosticActionability = "autofix" | "guided" | "manual" | "none";
/** Stage that produced the diagnostic. */
export type DiagnosticStage =
  | "structural"
  | "semantic"
  | "enrich"
  | "transform"
  | "serialize"
  | "companion";
/** Some diagnostics need a source location, others apply to the whole document. */
export type DiagnosticSpanRequirement = "span" | "document" | "either";
/** Lifecycle of a code. */
export type DiagnosticStatus = "canonical" | "proposed" | "deprecated";
/** Primary axis for grouping and reporting. */
export type DiagnosticCategory =
  | "markup-syntax"
  | "type-resolution"
  | "mapping"
  | "migration"
  | "serialization"
  | "companion";

/** Single source of truth for severity and presentation metadata. */
export type DiagnosticSpec = {
  readonly category: DiagnosticCategory;
  readonly status: DiagnosticStatus;
  readonly defaultSeverity: DiagnosticSeverity;
  readonly impact: DiagnosticImpact;
  readonly actionability: DiagnosticActionability;
  readonly span: DiagnosticSpanRequirement;
  readonly stages: readonly DiagnosticStage[];
  /** Human-readable explanation for docs and tooling. */
  readonly description: string;
};

/** Preserves literal types (especially stages) without boilerplate in callers. */
export function defineDiagnostic<const TSpec extends DiagnosticSpec>(spec: TSpec): TSpec {
  return spec;
}

export type DiagnosticsCatalog = Record<string, DiagnosticSpec>;

/** One reported issue. Lines and columns are 1-based. */
export interface MigrationDiagnostic {
  readonly code: string;
  readonly message: string;
  readonly severity: DiagnosticSeverity;
  readonly stage: DiagnosticStage | null;
  readonly filePath: string | null;
  readonly line: number | null;
  readonly column: number | null;
}
