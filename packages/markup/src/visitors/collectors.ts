import type { NodeDiagnostic, UnifiedDocument, UnifiedElement, UnifiedNode } from "../model/ast.js";
import type { MarkupExtension } from "../model/markup-extension.js";
import { traverse } from "./traverse.js";

type Walkable = UnifiedDocument | UnifiedNode;

/** `x:Name` → element; the first occurrence in document order wins. */
export function collectNamedElements(node: Walkable): Map<string, UnifiedElement> {
  const named = new Map<string, UnifiedElement>();
  traverse(node, {
    element(element) {
      const name = element.name;
      if (name && !named.has(name)) named.set(name, element);
      return "continue";
    },
  });
  return named;
}

export interface ResourceReference {
  readonly key: string;
  readonly isDynamic: boolean;
  readonly extension: MarkupExtension;
}

export interface ResourceUsage {
  /** Elements carrying `x:Key`. */
  readonly definitions: Map<string, UnifiedElement>;
  /** `StaticResource` / `DynamicResource` references, nested ones included. */
  readonly references: ResourceReference[];
}

export function collectResources(node: Walkable): ResourceUsage {
  const definitions = new Map<string, UnifiedElement>();
  const references: ResourceReference[] = [];
  traverse(node, {
    element(element) {
      const key = element.key;
      if (key && !definitions.has(key)) definitions.set(key, element);
      return "continue";
    },
    markupExtension(extension) {
      const payload = extension.payload;
      if (payload?.kind === "resource" && payload.resourceKey !== null) {
        references.push({ key: payload.resourceKey, isDynamic: payload.isDynamic, extension });
      }
      return "continue";
    },
  });
  return { definitions, references };
}

/** Every binding-family extension (`Binding`, `MultiBinding`, `TemplateBinding`). */
export function collectBindings(node: Walkable): MarkupExtension[] {
  const bindings: MarkupExtension[] = [];
  traverse(node, {
    markupExtension(extension) {
      if (extension.payload?.kind === "binding") bindings.push(extension);
      return "continue";
    },
  });
  return bindings;
}

export interface LocatedNodeDiagnostic {
  readonly node: UnifiedNode;
  readonly diagnostic: NodeDiagnostic;
}

/** Node-local diagnostics of elements and properties, in traversal order. */
export function collectNodeDiagnostics(node: Walkable): LocatedNodeDiagnostic[] {
  const found: LocatedNodeDiagnostic[] = [];
  traverse(node, {
    element(element) {
      for (const diagnostic of element.diagnostics) found.push({ node: element, diagnostic });
      return "continue";
    },
    property(property) {
      for (const diagnostic of property.diagnostics) found.push({ node: property, diagnostic });
      return "continue";
    },
  });
  return found;
}
