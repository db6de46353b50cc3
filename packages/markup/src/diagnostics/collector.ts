import type { SourceLocation } from "../model/text.js";
import { diagnosticsCatalog, type DiagnosticCode } from "./catalog.js";
import type { DiagnosticSeverity, DiagnosticStage, MigrationDiagnostic } from "./types.js";

export type EmitDiagnosticInput = {
  message: string;
  /** Overrides the catalog's default severity. */
  severity?: DiagnosticSeverity;
  location?: SourceLocation | null;
  filePath?: string | null;
};

/**
 * Append-only diagnostic sink for one document (or one merged batch).
 *
 * Concurrent per-document pipelines each get their own collector and are
 * merged afterwards with {@link DiagnosticCollector.merge}.
 */
export class DiagnosticCollector {
  readonly #items: MigrationDiagnostic[] = [];

  constructor(readonly filePath: string | null = null) {}

  get diagnostics(): readonly MigrationDiagnostic[] {
    return this.#items;
  }

  get count(): number {
    return this.#items.length;
  }

  /** Report a catalog code; severity and stage come from the catalog entry. */
  emit(code: DiagnosticCode, input: EmitDiagnosticInput): MigrationDiagnostic {
    const spec = diagnosticsCatalog[code];
    return this.#push({
      code,
      message: input.message,
      severity: input.severity ?? spec.defaultSeverity,
      stage: spec.stages[0] ?? null,
      filePath: input.filePath ?? this.filePath,
      line: input.location?.line ?? null,
      column: input.location?.column ?? null,
    });
  }

  addError(code: string, message: string, filePath?: string, line?: number, column?: number): MigrationDiagnostic {
    return this.#add("error", code, message, filePath, line, column);
  }

  addWarning(code: string, message: string, filePath?: string, line?: number, column?: number): MigrationDiagnostic {
    return this.#add("warning", code, message, filePath, line, column);
  }

  addInfo(code: string, message: string, filePath?: string, line?: number, column?: number): MigrationDiagnostic {
    return this.#add("info", code, message, filePath, line, column);
  }

  /** Append everything another collector (or list) holds, in its order. */
  merge(other: DiagnosticCollector | readonly MigrationDiagnostic[]): void {
    const items = other instanceof DiagnosticCollector ? other.diagnostics : other;
    for (const item of items) this.#push(item);
  }

  bySeverity(severity: DiagnosticSeverity): MigrationDiagnostic[] {
    return this.#items.filter((d) => d.severity === severity);
  }

  byFile(filePath: string | null): MigrationDiagnostic[] {
    return this.#items.filter((d) => d.filePath === filePath);
  }

  byCode(code: string): MigrationDiagnostic[] {
    return this.#items.filter((d) => d.code === code);
  }

  get errors(): MigrationDiagnostic[] {
    return this.bySeverity("error");
  }

  get warnings(): MigrationDiagnostic[] {
    return this.bySeverity("warning");
  }

  get infos(): MigrationDiagnostic[] {
    return this.bySeverity("info");
  }

  get hasErrors(): boolean {
    return this.#items.some((d) => d.severity === "error");
  }

  #add(
    severity: DiagnosticSeverity,
    code: string,
    message: string,
    filePath: string | undefined,
    line: number | undefined,
    column: number | undefined,
  ): MigrationDiagnostic {
    return this.#push({
      code,
      message,
      severity,
      stage: stageOf(code),
      filePath: filePath ?? this.filePath,
      line: line ?? null,
      column: column ?? null,
    });
  }

  #push(diagnostic: MigrationDiagnostic): MigrationDiagnostic {
    this.#items.push(diagnostic);
    return diagnostic;
  }
}

function isCatalogCode(code: string): code is DiagnosticCode {
  return Object.hasOwn(diagnosticsCatalog, code);
}

function stageOf(code: string): DiagnosticStage | null {
  return isCatalogCode(code) ? diagnosticsCatalog[code].stages[0] ?? null : null;
}
