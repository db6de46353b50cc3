import type { UnifiedDocument } from "../../model/ast.js";
import type { TransformationContext } from "../context.js";
import type { DocumentRule } from "../types.js";

/**
 * Maps every namespace declaration and element namespace through the
 * namespace mappings, and records the root's new default namespace as the
 * document's target namespace. Declared URIs without a mapping are kept;
 * non-CLR ones are reported once each.
 */
export class NamespaceRewriteRule implements DocumentRule {
  readonly kind = "document" as const;
  readonly name = "namespace-rewrite";
  readonly priority = 100;

  canApply(document: UnifiedDocument): boolean {
    return document.root !== null;
  }

  apply(document: UnifiedDocument, context: TransformationContext): void {
    const root = document.root;
    if (!root) return;
    const mapped = new Map<string, string | null>();
    const resolve = (uri: string): string | null => {
      if (!mapped.has(uri)) mapped.set(uri, context.mappings.findNamespaceMapping(uri)?.target ?? null);
      return mapped.get(uri) ?? null;
    };

    const unmapped = new Set<string>();
    for (const element of document.elements()) {
      for (const declaration of element.namespaceDeclarations) {
        const target = resolve(declaration.uri);
        if (target === null) {
          if (!declaration.uri.startsWith("clr-namespace:") && !unmapped.has(declaration.uri)) {
            unmapped.add(declaration.uri);
            context.report(element, "xamlshift/namespace-mapping-not-found", `no mapping for namespace '${declaration.uri}'`);
          }
          continue;
        }
        if (target !== declaration.uri) {
          context.recordTransformation(this.name, "document", `${declaration.uri} → ${target}`);
          declaration.uri = target;
        }
      }
      if (element.namespace !== null) element.namespace = resolve(element.namespace) ?? element.namespace;
    }

    const defaultDeclaration = root.namespaceDeclarations.find((declaration) => declaration.prefix === null);
    const targetNamespace = defaultDeclaration?.uri ?? root.namespace;
    if (targetNamespace !== null) document.metadata.targetNamespace = targetNamespace;
  }
}
