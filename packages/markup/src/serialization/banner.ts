import type { DiagnosticCollector } from "../diagnostics/collector.js";
import type { DiagnosticSeverity } from "../diagnostics/types.js";
import type { UnifiedDocument } from "../model/ast.js";
import { collectNodeDiagnostics } from "../visitors/collectors.js";

export const BANNER_TITLE = "WPF to Avalonia Conversion - Manual Review Required:";
export const BANNER_RULE = "=".repeat(70);

export interface BannerEntry {
  readonly severity: DiagnosticSeverity;
  readonly code: string;
  readonly message: string;
  readonly line: number | null;
}

/**
 * Entries for the review banner: the collector's when one is given,
 * otherwise whatever the tree itself carries.
 */
export function bannerEntries(document: UnifiedDocument, diagnostics?: DiagnosticCollector | null): BannerEntry[] {
  if (diagnostics) {
    return diagnostics.diagnostics.map(({ severity, code, message, line }) => ({ severity, code, message, line }));
  }
  const fromTree = [
    ...document.diagnostics,
    ...collectNodeDiagnostics(document).map((located) => located.diagnostic),
  ];
  return fromTree.map(({ severity, code, message, location }) => ({
    severity,
    code,
    message,
    line: location?.line ?? null,
  }));
}

/**
 * Body of the review comment, or null when there is nothing at warning
 * level or above. Each severity lists at most `maxEntries` lines.
 */
export function formatBanner(entries: readonly BannerEntry[], maxEntries: number, newline = "\n"): string | null {
  const errors = entries.filter((entry) => entry.severity === "error");
  const warnings = entries.filter((entry) => entry.severity === "warning");
  if (errors.length === 0 && warnings.length === 0) return null;

  const lines = ["", BANNER_TITLE, BANNER_RULE];
  appendSection(lines, "ERRORS", "errors", errors, maxEntries);
  appendSection(lines, "WARNINGS", "warnings", warnings, maxEntries);
  lines.push("", "Please review and address these issues manually.", BANNER_RULE, "");
  return lines.map(commentSafe).join(newline);
}

function appendSection(
  lines: string[],
  heading: string,
  noun: string,
  entries: readonly BannerEntry[],
  maxEntries: number,
): void {
  if (entries.length === 0) return;
  lines.push("", `${heading} (${entries.length}):`);
  for (const entry of entries.slice(0, maxEntries)) {
    lines.push(`  [${entry.code}] Line ${entry.line ?? "?"}: ${entry.message}`);
  }
  if (entries.length > maxEntries) lines.push(`  ... and ${entries.length - maxEntries} more ${noun}`);
}

/** `--` cannot appear inside a comment, nor can one end in `-`. */
function commentSafe(line: string): string {
  let safe = line;
  while (safe.includes("--")) safe = safe.replace(/--/g, "- -");
  return safe.endsWith("-") ? `${safe} ` : safe;
}
