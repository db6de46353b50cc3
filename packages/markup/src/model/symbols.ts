import type { UnifiedElement } from "./ast.js";

/**
 * Derived index over one document: named elements, namespace prefixes and
 * type usages.
 *
 * It is a snapshot. Rules mutate the tree, not the table; the rule engine
 * rebuilds the table once a run completes.
 */
export class SymbolTable {
  readonly namedElements = new Map<string, UnifiedElement>();
  readonly namespacePrefixes = new Map<string, string>();
  readonly typeUsages = new Map<string, UnifiedElement[]>();

  /**
   * Index a finished tree in one walk. Namespace declarations are taken on the
   * way down so outer declarations win; names and type usages are registered
   * on the way back up.
   */
  static build(root: UnifiedElement | null): SymbolTable {
    const table = new SymbolTable();
    if (root) table.#visit(root);
    return table;
  }

  findNamed(name: string): UnifiedElement | null {
    return this.namedElements.get(name) ?? null;
  }

  /** `""` looks up the default namespace. */
  resolvePrefix(prefix: string): string | null {
    return this.namespacePrefixes.get(prefix) ?? null;
  }

  usagesOf(typeName: string): readonly UnifiedElement[] {
    return this.typeUsages.get(typeName) ?? [];
  }

  #visit(element: UnifiedElement): void {
    for (const declaration of element.namespaceDeclarations) {
      const prefix = declaration.prefix ?? "";
      if (!this.namespacePrefixes.has(prefix)) this.namespacePrefixes.set(prefix, declaration.uri);
    }

    for (const property of element.properties) {
      const value = property.element;
      if (value) this.#visit(value);
    }
    for (const child of element.children) this.#visit(child);

    const name = element.name;
    if (name && !this.namedElements.has(name)) this.namedElements.set(name, element);
    if (!element.isSyntheticCollection) {
      const usages = this.typeUsages.get(element.typeName);
      if (usages) usages.push(element);
      else this.typeUsages.set(element.typeName, [element]);
    }
  }
}
