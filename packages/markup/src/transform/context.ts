import type { MappingRepository } from "@xamlshift/mappings";

import type { DiagnosticCode } from "../diagnostics/catalog.js";
import type { DiagnosticCollector } from "../diagnostics/collector.js";
import type { DiagnosticSeverity, MigrationDiagnostic } from "../diagnostics/types.js";
import { UnifiedProperty, type UnifiedDocument, type UnifiedElement } from "../model/ast.js";
import type { MarkupExtension } from "../model/markup-extension.js";
import { debug } from "../shared/debug.js";
import type { RuleTargetKind, TransformationRecord } from "./types.js";

export type ReportableNode = UnifiedElement | UnifiedProperty | MarkupExtension;

/**
 * State shared by every rule during one engine run over one document.
 */
export class TransformationContext {
  readonly #trace: TransformationRecord[] = [];

  constructor(
    readonly document: UnifiedDocument,
    readonly mappings: MappingRepository,
    readonly diagnostics: DiagnosticCollector,
  ) {}

  get filePath(): string | null {
    return this.document.filePath;
  }

  /** Applied transformations, in the order they happened. */
  get trace(): readonly TransformationRecord[] {
    return this.#trace;
  }

  recordTransformation(ruleName: string, nodeKind: RuleTargetKind, description: string): void {
    this.#trace.push({ rule: ruleName, nodeKind, description, filePath: this.filePath });
    debug.transform("rule.recorded", { rule: ruleName, node: nodeKind, description });
  }

  /**
   * Report a diagnostic about a node. It goes to the collector and onto the
   * node itself; an extension's diagnostics land on its owning property.
   */
  report(node: ReportableNode, code: DiagnosticCode, message: string, severity?: DiagnosticSeverity): MigrationDiagnostic {
    const diagnostic = this.diagnostics.emit(code, { message, severity, location: node.location, filePath: this.filePath });
    const holder = node.nodeType === "markup-extension" ? owningProperty(node) : node;
    holder?.addDiagnostic(diagnostic.severity, code, message);
    return diagnostic;
  }
}

function owningProperty(extension: MarkupExtension): UnifiedProperty | null {
  let parent = extension.parent;
  while (parent !== null && !(parent instanceof UnifiedProperty)) parent = parent.parent;
  return parent;
}
