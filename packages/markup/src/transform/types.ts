import type { UnifiedDocument, UnifiedElement, UnifiedProperty } from "../model/ast.js";
import type { MarkupExtension } from "../model/markup-extension.js";
import type { TransformationContext } from "./context.js";

/** Node kinds a rule can target, as they appear in the trace. */
export type RuleTargetKind = "document" | "element" | "property" | "markup-extension";

interface NodeRule<TKind extends RuleTargetKind, TNode> {
  readonly kind: TKind;
  readonly name: string;
  /** Higher runs first; equal priorities keep registration order. */
  readonly priority: number;
  canApply(node: TNode): boolean;
  /**
   * Returns the node to keep in place (usually `node` itself, mutated), a
   * replacement, or null to remove the node from its parent.
   */
  apply(node: TNode, context: TransformationContext): TNode | null;
}

export type ElementRule = NodeRule<"element", UnifiedElement>;
export type PropertyRule = NodeRule<"property", UnifiedProperty>;
export type MarkupExtensionRule = NodeRule<"markup-extension", MarkupExtension>;

/**
 * Whole-document rewrite run once before the tree walk. Every applicable
 * document rule runs, in priority order.
 */
export interface DocumentRule {
  readonly kind: "document";
  readonly name: string;
  readonly priority: number;
  canApply(document: UnifiedDocument): boolean;
  apply(document: UnifiedDocument, context: TransformationContext): void;
}

export type TransformationRule = DocumentRule | ElementRule | PropertyRule | MarkupExtensionRule;

/** One entry of the transformation trace. */
export interface TransformationRecord {
  readonly rule: string;
  readonly nodeKind: RuleTargetKind;
  readonly description: string;
  readonly filePath: string | null;
}
