import {
  UnifiedDocument,
  type UnifiedComment,
  type UnifiedElement,
  type UnifiedNode,
  type UnifiedProperty,
} from "../model/ast.js";
import type { MarkupExtension } from "../model/markup-extension.js";

export type VisitResult = "continue" | "skip-children";

/**
 * Capabilities a visitor may implement. Each returns whether traversal
 * descends into the node's contents; a capability left out means continue.
 */
export interface MarkupVisitor {
  element?(element: UnifiedElement): VisitResult;
  property?(property: UnifiedProperty): VisitResult;
  markupExtension?(extension: MarkupExtension): VisitResult;
  comment?(comment: UnifiedComment): VisitResult;
}

/**
 * Depth-first, pre-order walk. An element's properties come before its
 * children and its comments last; a property's value comes before its
 * comments. Collections are copied before descending, so a visitor may
 * detach the node it is visiting.
 */
export function traverse(node: UnifiedDocument | UnifiedNode, visitor: MarkupVisitor): void {
  if (node instanceof UnifiedDocument) {
    for (const comment of [...node.leadingComments]) visitComment(comment, visitor);
    if (node.root) visitElement(node.root, visitor);
    for (const comment of [...node.trailingComments]) visitComment(comment, visitor);
    return;
  }
  switch (node.nodeType) {
    case "element":
      visitElement(node, visitor);
      break;
    case "property":
      visitProperty(node, visitor);
      break;
    case "markup-extension":
      visitExtension(node, visitor);
      break;
    case "comment":
      visitComment(node, visitor);
      break;
  }
}

function visitElement(element: UnifiedElement, visitor: MarkupVisitor): void {
  if ((visitor.element?.(element) ?? "continue") === "skip-children") return;
  for (const property of [...element.properties]) visitProperty(property, visitor);
  for (const child of [...element.children]) visitElement(child, visitor);
  for (const comment of [...element.comments]) visitComment(comment, visitor);
}

function visitProperty(property: UnifiedProperty, visitor: MarkupVisitor): void {
  if ((visitor.property?.(property) ?? "continue") === "skip-children") return;
  const value = property.value;
  if (value.kind === "element") visitElement(value.element, visitor);
  else if (value.kind === "extension") visitExtension(value.extension, visitor);
  for (const comment of [...property.comments]) visitComment(comment, visitor);
}

function visitExtension(extension: MarkupExtension, visitor: MarkupVisitor): void {
  if ((visitor.markupExtension?.(extension) ?? "continue") === "skip-children") return;
  for (const nested of extension.nestedExtensions()) visitExtension(nested, visitor);
}

function visitComment(comment: UnifiedComment, visitor: MarkupVisitor): void {
  visitor.comment?.(comment);
}
