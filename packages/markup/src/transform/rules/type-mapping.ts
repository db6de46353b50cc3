import type { UnifiedElement } from "../../model/ast.js";
import { AVALONIA_NAMESPACE, WPF_PRESENTATION_NAMESPACE } from "../../model/namespaces.js";
import type { TransformationContext } from "../context.js";
import type { ElementRule } from "../types.js";

/**
 * Fallback element rule: renames through the type mappings. Elements from
 * custom CLR namespaces are left to the author.
 */
export class TypeMappingRule implements ElementRule {
  readonly kind = "element" as const;
  readonly name = "type-mapping";
  readonly priority = 0;

  /** Element namespaces that are looked up; elements carry the target namespace once the namespace rewrite has run. */
  constructor(
    readonly namespaces: ReadonlySet<string | null> = new Set([null, WPF_PRESENTATION_NAMESPACE, AVALONIA_NAMESPACE]),
  ) {}

  canApply(element: UnifiedElement): boolean {
    return !element.isSyntheticCollection && this.namespaces.has(element.namespace);
  }

  apply(element: UnifiedElement, context: TransformationContext): UnifiedElement {
    const source = element.typeName;
    const mapping = context.mappings.findTypeMapping(source);
    if (!mapping) {
      context.report(element, "xamlshift/type-mapping-not-found", `no type mapping for '${source}'; kept as written`);
      return element;
    }
    if (mapping.requiresManualReview) {
      context.report(
        element,
        "xamlshift/manual-review-required",
        `${source} → ${mapping.target}${mapping.note ? `: ${mapping.note}` : ""}`,
      );
    }
    if (mapping.targetNamespace !== undefined) element.namespaceOverride = mapping.targetNamespace;
    if (mapping.target !== source) {
      element.typeName = mapping.target;
      context.recordTransformation(this.name, "element", `${source} → ${mapping.target}`);
    }
    return element;
  }
}
