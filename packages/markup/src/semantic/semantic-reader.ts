import { DOMParser } from "@xmldom/xmldom";

import type { PropertyDescriptor, TypeDescriptor } from "../model/descriptors.js";
import { MarkupExtension, unquoteExtensionValue, type ExtensionValue } from "../model/markup-extension.js";
import {
  DIRECTIVE_ATTRIBUTES,
  XAML_LANGUAGE_NAMESPACE,
  XMLNS_NAMESPACE,
  splitQualifiedName,
  type DirectiveKind,
} from "../model/namespaces.js";
import { isMarkupExtensionSyntax, parseMarkupExtension } from "../parsing/markup-extension-parser.js";
import { isPropertyElementName } from "../parsing/structural-converter.js";
import { debug } from "../shared/debug.js";
import { ParseErrorCode, SemanticParseError } from "../shared/errors.js";
import type { TypeSystem } from "./type-system.js";

/* =============================================================================
 * OBJECT GRAPH
 * ============================================================================= */

export interface SemanticObjectNode {
  readonly kind: "object";
  /** Local element name, or the extension name as written (`x:Type`). */
  readonly writtenName: string;
  readonly prefix: string | null;
  /**
   * Resolved type name. Unresolved extensions get the conventional
   * `...Extension` suffix; unresolved elements keep their written name.
   */
  readonly typeName: string;
  readonly xmlNamespace: string | null;
  /** Null when the type could not be resolved. */
  readonly type: TypeDescriptor | null;
  readonly isMarkupExtension: boolean;
  readonly directives: ReadonlyMap<DirectiveKind, string>;
  readonly namespaceDeclarations: readonly { prefix: string | null; uri: string }[];
  readonly members: readonly SemanticMemberNode[];
  /** Positional argument of an extension. */
  readonly positional: SemanticValue | null;
  /** Content objects (child elements that are not property-elements). */
  readonly items: readonly SemanticObjectNode[];
  /** Non-whitespace text content, trimmed. */
  readonly text: string | null;
  readonly line: number | null;
  readonly column: number | null;
}

export interface SemanticMemberNode {
  readonly name: string;
  /** Owner written in `Owner.Name` syntax when it differs from the enclosing type. */
  readonly ownerType: string | null;
  readonly descriptor: PropertyDescriptor | null;
  readonly syntax: "attribute" | "property-element" | "parameter";
  readonly value: SemanticValue;
  /** Value text as written, for attribute members and text-only property-elements. */
  readonly raw: string | null;
}

export type SemanticValue =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "object"; readonly object: SemanticObjectNode }
  | { readonly kind: "objects"; readonly objects: readonly SemanticObjectNode[] };

export interface SemanticDocument {
  readonly filePath: string | null;
  readonly root: SemanticObjectNode;
}

/** Produces the type-resolved object graph for one document. */
export interface SemanticReader {
  read(source: string, filePath: string | null): SemanticDocument;
}

/* =============================================================================
 * XMLDOM READER
 * ============================================================================= */

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function nodeLine(node: Node): number | null {
  return "lineNumber" in node && typeof node.lineNumber === "number" ? node.lineNumber : null;
}

function nodeColumn(node: Node): number | null {
  return "columnNumber" in node && typeof node.columnNumber === "number" ? node.columnNumber : null;
}

/**
 * Type-resolving reader on `@xmldom/xmldom`. Whitespace-only text and
 * comments are not part of the graph; any parser error or fatal error fails
 * the whole read with {@link SemanticParseError}.
 */
export class XmldomSemanticReader implements SemanticReader {
  constructor(readonly typeSystem: TypeSystem) {}

  read(source: string, filePath: string | null): SemanticDocument {
    const errors: string[] = [];
    const parser = new DOMParser({
      locator: {},
      errorHandler: {
        warning: (message: string) => debug.semantic("xmldom.warning", { message }),
        error: (message: string) => errors.push(message),
        fatalError: (message: string) => errors.push(message),
      },
    });

    let document: Document;
    try {
      document = parser.parseFromString(source, "text/xml");
    } catch (error) {
      throw new SemanticParseError(
        error instanceof Error ? error.message : String(error),
        ParseErrorCode.SEMANTIC_FAILED,
      );
    }
    const [firstError] = errors;
    if (firstError !== undefined) {
      throw new SemanticParseError(firstError.split("\n")[0] ?? firstError, ParseErrorCode.SEMANTIC_FAILED);
    }
    const rootElement = document.documentElement;
    if (!rootElement) {
      throw new SemanticParseError("document has no root element", ParseErrorCode.NO_ROOT);
    }

    const root = this.#readObject(rootElement);
    debug.semantic("semantic.read", { root: root.typeName, resolved: root.type !== null });
    return { filePath, root };
  }

  #readObject(element: Element): SemanticObjectNode {
    const writtenName = element.localName;
    const xmlNamespace = element.namespaceURI;
    const type = this.typeSystem.resolveType(xmlNamespace, writtenName);

    const directives = new Map<DirectiveKind, string>();
    const namespaceDeclarations: { prefix: string | null; uri: string }[] = [];
    const members: SemanticMemberNode[] = [];

    for (const attribute of Array.from(element.attributes)) {
      if (attribute.namespaceURI === XMLNS_NAMESPACE || attribute.name === "xmlns") {
        namespaceDeclarations.push({ prefix: attribute.name === "xmlns" ? null : attribute.localName, uri: attribute.value });
        continue;
      }
      if (attribute.namespaceURI === XAML_LANGUAGE_NAMESPACE) {
        const directive = DIRECTIVE_ATTRIBUTES.get(attribute.localName);
        if (directive) directives.set(directive, attribute.value);
        continue;
      }
      // Attributes in other namespaces (design-time, compatibility) carry no members.
      if (attribute.namespaceURI !== null) continue;
      members.push(this.#readAttributeMember(attribute, element, type));
    }

    const items: SemanticObjectNode[] = [];
    let text = "";
    for (const child of Array.from(element.childNodes)) {
      if (isElement(child)) {
        if (isPropertyElementName(child.localName)) members.push(this.#readPropertyElement(child, writtenName, type));
        else items.push(this.#readObject(child));
      } else if (child.nodeType === TEXT_NODE || child.nodeType === CDATA_SECTION_NODE) {
        text += child.nodeValue ?? "";
      }
    }

    return {
      kind: "object",
      writtenName,
      prefix: element.prefix,
      typeName: type?.name ?? writtenName,
      xmlNamespace,
      type,
      isMarkupExtension: type?.isMarkupExtension ?? false,
      directives,
      namespaceDeclarations,
      members,
      positional: null,
      items,
      text: text.trim() || null,
      line: nodeLine(element),
      column: nodeColumn(element),
    };
  }

  #readAttributeMember(attribute: Attr, element: Element, type: TypeDescriptor | null): SemanticMemberNode {
    const local = attribute.localName;
    const dot = local.indexOf(".");
    const ownerType = dot > 0 ? local.slice(0, dot) : null;
    const name = dot > 0 ? local.slice(dot + 1) : local;
    const descriptor =
      ownerType !== null ? this.#resolveOwned(element.namespaceURI, ownerType, name) : type ? this.typeSystem.resolveProperty(type, name) : null;
    return {
      name,
      ownerType,
      descriptor,
      syntax: "attribute",
      value: this.#readValue(attribute.value, element),
      raw: attribute.value,
    };
  }

  #readPropertyElement(child: Element, enclosingName: string, enclosingType: TypeDescriptor | null): SemanticMemberNode {
    const local = child.localName;
    const dot = local.indexOf(".");
    const owner = local.slice(0, dot);
    const name = local.slice(dot + 1);
    const ownerType = owner === enclosingName ? null : owner;
    const descriptor =
      ownerType !== null
        ? this.#resolveOwned(child.namespaceURI, ownerType, name)
        : enclosingType
          ? this.typeSystem.resolveProperty(enclosingType, name)
          : null;

    const objects: SemanticObjectNode[] = [];
    let text = "";
    for (const node of Array.from(child.childNodes)) {
      if (isElement(node)) objects.push(this.#readObject(node));
      else if (node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE) text += node.nodeValue ?? "";
    }

    const [single] = objects;
    if (objects.length > 1) {
      return { name, ownerType, descriptor, syntax: "property-element", value: { kind: "objects", objects }, raw: null };
    }
    if (single) {
      return { name, ownerType, descriptor, syntax: "property-element", value: { kind: "object", object: single }, raw: null };
    }
    const raw = text.trim();
    return { name, ownerType, descriptor, syntax: "property-element", value: this.#readValue(raw, child), raw };
  }

  /** `Owner.Name`: an attached property first, then an ordinary member of the owner type. */
  #resolveOwned(xmlNamespace: string | null, ownerType: string, name: string): PropertyDescriptor | null {
    const attached = this.typeSystem.resolveAttachedProperty(ownerType, name);
    if (attached) return attached;
    const owner = this.typeSystem.resolveType(xmlNamespace, ownerType);
    return owner ? this.typeSystem.resolveProperty(owner, name) : null;
  }

  #readValue(text: string, scope: Element): SemanticValue {
    if (!isMarkupExtensionSyntax(text)) return { kind: "text", text };
    const result = parseMarkupExtension(text);
    if (!result.ok) return { kind: "text", text };
    return { kind: "object", object: this.#readExtension(result.extension, scope) };
  }

  #readExtension(extension: MarkupExtension, scope: Element): SemanticObjectNode {
    const { prefix, local } = splitQualifiedName(extension.name);
    // xmldom keys the default namespace as "".
    const xmlNamespace = scope.lookupNamespaceURI(prefix ?? "");
    const type = this.typeSystem.resolveMarkupExtension(xmlNamespace, local);
    const members: SemanticMemberNode[] = [];
    for (const [key, value] of extension.parameters) {
      members.push({
        name: key,
        ownerType: null,
        descriptor: type ? this.typeSystem.resolveProperty(type, key) : null,
        syntax: "parameter",
        value: this.#extensionArgument(value, scope),
        raw: null,
      });
    }
    return {
      kind: "object",
      writtenName: extension.name,
      prefix,
      typeName: type?.name ?? `${local}Extension`,
      xmlNamespace,
      type,
      isMarkupExtension: true,
      directives: new Map(),
      namespaceDeclarations: [],
      members,
      positional: extension.positional === null ? null : this.#extensionArgument(extension.positional, scope),
      items: [],
      text: null,
      line: nodeLine(scope),
      column: nodeColumn(scope),
    };
  }

  #extensionArgument(value: ExtensionValue, scope: Element): SemanticValue {
    if (typeof value === "string") return { kind: "text", text: unquoteExtensionValue(value) };
    return { kind: "object", object: this.#readExtension(value, scope) };
  }
}
