import type { UnifiedDocument, UnifiedElement, UnifiedProperty } from "../model/ast.js";
import { MarkupExtension } from "../model/markup-extension.js";
import { debug } from "../shared/debug.js";
import type { TransformationContext } from "./context.js";
import type {
  DocumentRule,
  ElementRule,
  MarkupExtensionRule,
  PropertyRule,
  RuleTargetKind,
  TransformationRule,
} from "./types.js";

type NodeRule<TNode> = {
  readonly name: string;
  readonly priority: number;
  canApply(node: TNode): boolean;
  apply(node: TNode, context: TransformationContext): TNode | null;
};

/**
 * Applies registered rules to a document.
 *
 * Document rules run first. The tree is then walked depth-first in
 * pre-order; for each node the applicable rule with the highest priority
 * (registration order breaking ties) is applied and no other. Per element:
 * the element rule, then each own property's rule followed by the
 * extension rules of its value (nested arguments included), then the
 * elements held by property values, then the children.
 */
export class RuleEngine {
  readonly #document: DocumentRule[] = [];
  readonly #element: ElementRule[] = [];
  readonly #property: PropertyRule[] = [];
  readonly #extension: MarkupExtensionRule[] = [];

  constructor(rules: Iterable<TransformationRule> = []) {
    for (const rule of rules) this.register(rule);
  }

  register(rule: TransformationRule): this {
    switch (rule.kind) {
      case "document":
        insertByPriority(this.#document, rule);
        break;
      case "element":
        insertByPriority(this.#element, rule);
        break;
      case "property":
        insertByPriority(this.#property, rule);
        break;
      case "markup-extension":
        insertByPriority(this.#extension, rule);
        break;
    }
    return this;
  }

  /** Registered rules, each kind sorted by descending priority. */
  get rules(): readonly TransformationRule[] {
    return [...this.#document, ...this.#element, ...this.#property, ...this.#extension];
  }

  transform(document: UnifiedDocument, context: TransformationContext): void {
    for (const rule of this.#document) {
      if (!rule.canApply(document)) continue;
      try {
        rule.apply(document, context);
        debug.transform("rule.applied", { rule: rule.name, node: "document" });
      } catch (error) {
        this.#ruleFailed(rule.name, "document", error, context);
      }
    }

    const root = document.root;
    if (root) {
      const next = this.#visitElement(root, context);
      if (next !== root) document.root = next;
    }

    document.refreshSymbols();
    debug.transform("engine.finished", { file: document.filePath, applied: context.trace.length });
  }

  #visitElement(element: UnifiedElement, context: TransformationContext): UnifiedElement | null {
    const result = this.#applyFirst(this.#element, element, "element", context);
    if (result === null) return null;

    for (const property of [...result.properties]) {
      const next = this.#visitProperty(property, context);
      if (property.parent !== result) continue;
      if (next === null) result.removeProperty(property);
      else if (next !== property) result.replaceProperty(property, next);
    }

    for (const property of [...result.properties]) {
      const value = property.element;
      if (value === null) continue;
      const next = this.#visitElement(value, context);
      if (next === null) result.removeProperty(property);
      else if (next !== value) property.setElement(next);
    }

    for (const child of [...result.children]) {
      const next = this.#visitElement(child, context);
      if (child.parent !== result) continue;
      if (next === null) result.removeChild(child);
      else if (next !== child) result.replaceChild(child, next);
    }
    return result;
  }

  #visitProperty(property: UnifiedProperty, context: TransformationContext): UnifiedProperty | null {
    const result = this.#applyFirst(this.#property, property, "property", context);
    if (result === null) return null;

    const extension = result.extension;
    if (extension !== null) {
      const next = this.#visitExtension(extension, context);
      // An extension removed from a property takes the property with it.
      if (next === null) return null;
      if (next !== extension) result.setExtension(next);
    }
    return result;
  }

  #visitExtension(extension: MarkupExtension, context: TransformationContext): MarkupExtension | null {
    const result = this.#applyFirst(this.#extension, extension, "markup-extension", context);
    if (result === null) return null;

    const positional = result.positional;
    if (positional instanceof MarkupExtension) {
      const next = this.#visitExtension(positional, context);
      if (next !== positional) result.positional = next;
    }
    for (const [key, value] of [...result.parameters]) {
      if (!(value instanceof MarkupExtension)) continue;
      const next = this.#visitExtension(value, context);
      if (next === null) result.removeParameter(key);
      else if (next !== value) result.setParameter(key, next);
    }
    return result;
  }

  #applyFirst<TNode extends { parent: unknown; clone(): TNode }>(
    rules: readonly NodeRule<TNode>[],
    node: TNode,
    kind: RuleTargetKind,
    context: TransformationContext,
  ): TNode | null {
    for (const rule of rules) {
      if (!rule.canApply(node)) continue;
      let result: TNode | null;
      try {
        result = rule.apply(node, context);
      } catch (error) {
        this.#ruleFailed(rule.name, kind, error, context);
        return node;
      }
      debug.transform("rule.applied", { rule: rule.name, node: kind, removed: result === null });
      // A replacement still owned elsewhere is copied, never moved.
      if (result !== null && result !== node && result.parent !== null) result = result.clone();
      return result;
    }
    return node;
  }

  #ruleFailed(ruleName: string, kind: RuleTargetKind, error: unknown, context: TransformationContext): void {
    const reason = error instanceof Error ? error.message : String(error);
    context.diagnostics.emit("xamlshift/rule-failed", {
      message: `rule '${ruleName}' failed on a ${kind} node: ${reason}`,
      filePath: context.filePath,
    });
    debug.transform("rule.failed", { rule: ruleName, node: kind, reason });
  }
}

function insertByPriority<T extends { readonly priority: number }>(list: T[], rule: T): void {
  let index = list.length;
  while (index > 0) {
    const previous = list[index - 1];
    if (previous === undefined || previous.priority >= rule.priority) break;
    index--;
  }
  list.splice(index, 0, rule);
}
