import type { DiagnosticCollector } from "../diagnostics/collector.js";
import { WhitespaceExtractor } from "../formatting/whitespace-extractor.js";
import {
  UnifiedComment,
  UnifiedDocument,
  UnifiedElement,
  UnifiedProperty,
  type NamespaceDeclaration,
  type PropertyValue,
} from "../model/ast.js";
import type { MarkupExtension } from "../model/markup-extension.js";
import { DIRECTIVE_ATTRIBUTES, XAML_LANGUAGE_NAMESPACE, XAML_LANGUAGE_PREFIX } from "../model/namespaces.js";
import type { SourceLocation } from "../model/text.js";
import type { TypeSystem } from "../semantic/type-system.js";
import { debug } from "../shared/debug.js";
import { isMarkupExtensionSyntax, parseMarkupExtension } from "./markup-extension-parser.js";
import type { XmlAttributeNode, XmlCommentNode, XmlDocumentNode, XmlElementNode } from "./structural-reader.js";

export interface StructuralConverterOptions {
  readonly filePath?: string | null;
  readonly diagnostics: DiagnosticCollector;
  /** Used only to look up content properties for the ambiguity check. */
  readonly typeSystem?: TypeSystem | null;
}

/** Build the Unified tree from a structural read. */
export function convertStructure(tree: XmlDocumentNode, options: StructuralConverterOptions): UnifiedDocument {
  return new StructuralConverter(tree, options).convert();
}

/**
 * Generic tree → Unified tree.
 *
 * Namespace declarations and directives leave the property list; `Owner.Name`
 * attributes become attached properties and `Owner.Name` child elements
 * become property-elements. Every node carries the whitespace extractor's
 * hints, and content nodes a shared `sourceOrder` counter per parent.
 */
export class StructuralConverter {
  readonly #tree: XmlDocumentNode;
  readonly #extractor: WhitespaceExtractor;
  readonly #diagnostics: DiagnosticCollector;
  readonly #typeSystem: TypeSystem | null;
  readonly #filePath: string | null;

  constructor(tree: XmlDocumentNode, options: StructuralConverterOptions) {
    this.#tree = tree;
    this.#extractor = new WhitespaceExtractor(tree.source, tree.index);
    this.#diagnostics = options.diagnostics;
    this.#typeSystem = options.typeSystem ?? null;
    this.#filePath = options.filePath ?? null;
  }

  convert(): UnifiedDocument {
    const tree = this.#tree;
    const document = new UnifiedDocument(this.#filePath);
    document.hasByteOrderMark = tree.hasByteOrderMark;
    if (tree.declaration) {
      const { raw, version, encoding, standalone } = tree.declaration;
      document.declaration = { raw, version, encoding, standalone };
    }

    tree.prolog.forEach((comment, i) => document.addComment(this.#convertComment(comment, i), "leading"));
    const root = this.#convertElement(tree.root);
    root.sourceOrder = tree.prolog.length;
    document.root = root;
    tree.epilogue.forEach((comment, i) => document.addComment(this.#convertComment(comment, i), "trailing"));

    for (const dropped of tree.dropped) {
      const label = dropped.kind === "doctype" ? "DOCTYPE declaration" : "processing instruction";
      this.#diagnostics.emit("xamlshift/unsupported-node", {
        message: `${label} is not carried over`,
        location: { line: dropped.line, column: dropped.column },
      });
    }

    const lastEnd = Math.max(tree.root.end, ...tree.epilogue.map((comment) => comment.end));
    document.formatting.trailingWhitespace = this.#extractor.trailingWhitespace(lastEnd);
    document.formatting.rawText = tree.source;

    document.refreshSymbols();
    debug.parse("structural.converted", {
      root,
      named: document.symbols.namedElements.size,
      types: document.symbols.typeUsages.size,
    });
    return document;
  }

  /* ---------- elements ---------- */

  #convertElement(node: XmlElementNode): UnifiedElement {
    const element = new UnifiedElement(node.local, node.uri || null);
    element.prefix = node.prefix || null;
    element.location = { line: node.line, column: node.column };
    element.formatting = this.#extractor.elementFormatting(node);

    node.attributes.forEach((attribute, order) => this.#convertAttribute(attribute, order, node, element));

    let text = "";
    node.children.forEach((child, order) => {
      switch (child.kind) {
        case "text":
          element.formatting.textRuns.push({ order, raw: child.raw, value: child.value });
          text += child.value;
          break;
        case "comment":
          element.addComment(this.#convertComment(child, order));
          break;
        case "element":
          if (isPropertyElementName(child.local)) {
            element.addProperty(this.#convertPropertyElement(child, element, order));
          } else {
            const converted = this.#convertElement(child);
            converted.sourceOrder = order;
            element.addChild(converted);
          }
          break;
      }
    });

    if (/\S/.test(text)) this.#assignText(element, text.trim());
    element.formatting.originalValue = element.textContent;
    return element;
  }

  /** Text content unless a property-element already claims the content property. */
  #assignText(element: UnifiedElement, text: string): void {
    const contentProperty =
      this.#typeSystem?.resolveType(element.namespace, element.typeName)?.contentProperty ?? null;
    const claimant = element.properties.find(
      (property) =>
        property.kind === "property-element" &&
        property.attachedOwnerType === null &&
        (property.name === "Content" || property.name === contentProperty),
    );
    if (!claimant) {
      element.textContent = text;
      return;
    }
    this.#diagnostics.emit("xamlshift/content-ambiguity", {
      message: `<${element.typeName}> has text content and a ${claimant.name} property-element; the property-element is kept`,
      location: element.location,
    });
  }

  #convertAttribute(attribute: XmlAttributeNode, order: number, node: XmlElementNode, element: UnifiedElement): void {
    const formatting = this.#extractor.attributeFormatting(attribute, node);

    if (attribute.prefix === "xmlns" || attribute.name === "xmlns") {
      const declaration: NamespaceDeclaration = {
        prefix: attribute.name === "xmlns" ? null : attribute.local,
        uri: attribute.value,
        order,
        formatting,
      };
      formatting.originalValue = attribute.value;
      element.namespaceDeclarations.push(declaration);
      return;
    }

    const directive = DIRECTIVE_ATTRIBUTES.get(attribute.local);
    const isLanguageAttribute = attribute.uri === XAML_LANGUAGE_NAMESPACE || attribute.prefix === XAML_LANGUAGE_PREFIX;
    if (directive && isLanguageAttribute) {
      formatting.originalValue = attribute.value;
      element.restoreDirective(directive, {
        value: attribute.value,
        prefix: attribute.prefix || XAML_LANGUAGE_PREFIX,
        order,
        formatting,
      });
      return;
    }

    const location = this.#attributeLocation(attribute, node);
    const value = this.#convertValue(attribute.value, location);
    const dot = attribute.local.indexOf(".");
    const property =
      dot > 0
        ? UnifiedProperty.attached(attribute.local.slice(0, dot), attribute.local.slice(dot + 1), value)
        : new UnifiedProperty(attribute.local, "attribute", value);
    property.prefix = attribute.prefix || null;
    property.location = location;
    property.sourceOrder = order;
    property.formatting = formatting;
    property.formatting.originalValue = canonicalValue(value);
    element.addProperty(property);
  }

  #attributeLocation(attribute: XmlAttributeNode, node: XmlElementNode): SourceLocation {
    const offset = this.#extractor.attributeOffset(attribute.name, node);
    return offset === null ? { line: node.line, column: node.column } : this.#tree.index.locationAt(offset);
  }

  /* ---------- property-elements ---------- */

  #convertPropertyElement(node: XmlElementNode, owner: UnifiedElement, order: number): UnifiedProperty {
    const dot = node.local.indexOf(".");
    const ownerType = node.local.slice(0, dot);
    const property = new UnifiedProperty(node.local.slice(dot + 1), "property-element");
    if (ownerType !== owner.typeName) property.attachTo(ownerType);
    property.prefix = node.prefix || null;
    property.location = { line: node.line, column: node.column };
    property.sourceOrder = order;
    property.formatting = this.#extractor.elementFormatting(node);

    if (node.attributes.length > 0) {
      this.#diagnostics.emit("xamlshift/unsupported-node", {
        message: `attributes on property-element <${node.name}> are not carried over`,
        location: property.location,
      });
    }

    const values: UnifiedElement[] = [];
    let text = "";
    node.children.forEach((child, childOrder) => {
      switch (child.kind) {
        case "text":
          property.formatting.textRuns.push({ order: childOrder, raw: child.raw, value: child.value });
          text += child.value;
          break;
        case "comment":
          property.addComment(this.#convertComment(child, childOrder));
          break;
        case "element": {
          const converted = this.#convertElement(child);
          converted.sourceOrder = childOrder;
          values.push(converted);
          break;
        }
      }
    });

    const [single] = values;
    if (values.length > 1) {
      property.setElement(this.#syntheticCollection(node, property, values));
    } else if (single) {
      property.setElement(single);
    } else if (/\S/.test(text)) {
      property.value = this.#convertValue(text.trim(), property.location);
    }
    property.formatting.originalValue = canonicalValue(property.value);
    return property;
  }

  /** Container for a property-element with several children; it has no tag of its own. */
  #syntheticCollection(node: XmlElementNode, property: UnifiedProperty, items: UnifiedElement[]): UnifiedElement {
    const collection = new UnifiedElement(node.local, node.uri || null);
    collection.isSyntheticCollection = true;
    collection.location = property.location;
    for (const item of items) collection.addChild(item);
    return collection;
  }

  /* ---------- values and comments ---------- */

  #convertValue(text: string, location: SourceLocation | null): PropertyValue {
    if (!isMarkupExtensionSyntax(text)) return { kind: "literal", text };
    const result = parseMarkupExtension(text);
    if (result.ok) {
      setExtensionLocation(result.extension, location);
      return { kind: "extension", extension: result.extension };
    }
    this.#diagnostics.emit("xamlshift/invalid-markup-extension", {
      message: `cannot parse markup extension '${text}': ${result.message} (at ${result.offset})`,
      location,
    });
    return { kind: "literal", text };
  }

  #convertComment(node: XmlCommentNode, order: number): UnifiedComment {
    const comment = new UnifiedComment(node.text);
    comment.formatting = this.#extractor.commentFormatting(node);
    comment.location = { line: node.line, column: node.column };
    comment.sourceOrder = order;
    return comment;
  }
}

export function isPropertyElementName(local: string): boolean {
  const dot = local.indexOf(".");
  return dot > 0 && dot < local.length - 1;
}

/** Value text in the form the writer compares against to detect edits. */
export function canonicalValue(value: PropertyValue): string | null {
  switch (value.kind) {
    case "literal":
      return value.text;
    case "extension":
      return value.extension.format();
    case "element":
      return null;
  }
}

function setExtensionLocation(extension: MarkupExtension, location: SourceLocation | null): void {
  extension.location = location;
  for (const nested of extension.nestedExtensions()) setExtensionLocation(nested, location);
}
