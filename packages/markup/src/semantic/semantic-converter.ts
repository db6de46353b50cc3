import type { DiagnosticCollector } from "../diagnostics/collector.js";
import { UnifiedDocument, UnifiedElement, UnifiedProperty, type PropertyValue } from "../model/ast.js";
import { emptyFormatting } from "../model/formatting.js";
import { MarkupExtension } from "../model/markup-extension.js";
import type { SourceLocation } from "../model/text.js";
import { isMarkupExtensionSyntax, parseMarkupExtension } from "../parsing/markup-extension-parser.js";
import { debug } from "../shared/debug.js";
import type { SemanticDocument, SemanticMemberNode, SemanticObjectNode, SemanticValue } from "./semantic-reader.js";

export interface SemanticConverterOptions {
  readonly diagnostics: DiagnosticCollector;
}

/** Extension objects are recognized by name (`...Extension`) or by their resolved type. */
export function isExtensionObject(object: SemanticObjectNode): boolean {
  return object.typeName.endsWith("Extension") || object.type?.isMarkupExtension === true;
}

/**
 * Semantic graph → Unified tree, either as a fresh tree or by enriching a
 * structural tree in place.
 */
export class SemanticConverter {
  readonly #diagnostics: DiagnosticCollector;
  /** File of the document being converted; stamped on every diagnostic. */
  #filePath: string | null = null;

  constructor(options: SemanticConverterOptions) {
    this.#diagnostics = options.diagnostics;
  }

  /* ---------- (a) fresh conversion ---------- */

  /** Build a new tree from the semantic graph alone. It carries no formatting hints. */
  convert(graph: SemanticDocument): UnifiedDocument {
    this.#filePath = graph.filePath;
    const document = new UnifiedDocument(graph.filePath);
    document.root = this.#freshElement(graph.root);
    document.refreshSymbols();
    return document;
  }

  #freshElement(object: SemanticObjectNode): UnifiedElement {
    const element = new UnifiedElement(object.writtenName, object.xmlNamespace);
    element.prefix = object.prefix;
    element.location = locationOf(object);
    element.resolvedType = object.type;
    this.#reportUnresolved(object);
    for (const [kind, value] of object.directives) element.setDirective(kind, value);
    element.namespaceDeclarations = object.namespaceDeclarations.map((declaration) => ({
      ...declaration,
      order: null,
      formatting: emptyFormatting(),
    }));

    for (const member of object.members) element.addProperty(this.#freshProperty(member, element));
    for (const item of object.items) element.addChild(this.#freshElement(item));
    if (object.text !== null && element.properties.every((property) => property.kind !== "property-element")) {
      element.textContent = object.text;
    }
    return element;
  }

  #freshProperty(member: SemanticMemberNode, owner: UnifiedElement): UnifiedProperty {
    const syntax = member.syntax === "property-element" ? "property-element" : "attribute";
    const property = new UnifiedProperty(member.name, syntax, this.#freshValue(member, owner));
    if (member.ownerType !== null) property.attachTo(member.ownerType);
    property.resolvedProperty = member.descriptor;
    property.location = owner.location;
    return property;
  }

  #freshValue(member: SemanticMemberNode, owner: UnifiedElement): PropertyValue {
    const value = member.value;
    switch (value.kind) {
      case "text":
        return { kind: "literal", text: value.text };
      case "object": {
        if (isExtensionObject(value.object) && member.raw !== null && isMarkupExtensionSyntax(member.raw)) {
          const parsed = parseMarkupExtension(member.raw);
          if (parsed.ok) {
            this.#enrichExtension(parsed.extension, value.object);
            return { kind: "extension", extension: parsed.extension };
          }
        }
        return { kind: "element", element: this.#freshElement(value.object) };
      }
      case "objects": {
        const collection = new UnifiedElement(`${owner.typeName}.${member.name}`, owner.namespace);
        collection.isSyntheticCollection = true;
        for (const object of value.objects) collection.addChild(this.#freshElement(object));
        return { kind: "element", element: collection };
      }
    }
  }

  /* ---------- (b) enrichment ---------- */

  /** Attach resolved types and members to an existing structural tree. */
  enrich(document: UnifiedDocument, graph: SemanticDocument): void {
    const root = document.root;
    if (!root) return;
    this.#filePath = document.filePath;
    this.#enrichElement(root, graph.root);
    debug.semantic("semantic.enriched", { root, resolved: root.resolvedType !== null });
  }

  #enrichElement(element: UnifiedElement, object: SemanticObjectNode): void {
    element.resolvedType = object.type;
    this.#reportUnresolved(object, element.location);

    object.members.forEach((member, slot) => {
      let property = findMatchingProperty(element, member);
      if (!property) {
        property = this.#freshProperty(member, element);
        element.addProperty(property, slot);
      }
      property.resolvedProperty = member.descriptor;
      if (member.descriptor === null && object.type !== null) {
        this.#diagnostics.emit("xamlshift/member-unresolved", {
          message: `'${member.ownerType ? `${member.ownerType}.` : ""}${member.name}' is not a known member of ${object.typeName}`,
          location: property.location,
          filePath: this.#filePath,
        });
      }
      this.#enrichValue(property, member.value);
    });

    this.#enrichChildren(element, object.items);
  }

  #enrichValue(property: UnifiedProperty, value: SemanticValue): void {
    if (value.kind === "text") return;
    const target = property.value;
    if (value.kind === "objects") {
      if (target.kind === "element" && target.element.isSyntheticCollection) {
        this.#enrichChildren(target.element, value.objects);
      }
      return;
    }
    const object = value.object;
    if (target.kind === "extension" && isExtensionObject(object)) {
      // Both layers saw the same `{...}` value: augment, never duplicate.
      this.#enrichExtension(target.extension, object);
    } else if (target.kind === "element") {
      this.#enrichElement(target.element, object);
    }
  }

  /** Children match by position; a count mismatch skips the whole list. */
  #enrichChildren(element: UnifiedElement, objects: readonly SemanticObjectNode[]): void {
    const children = element.children;
    if (children.length !== objects.length) {
      this.#diagnostics.emit("xamlshift/enrichment-mismatch", {
        message: `<${element.typeName}> has ${children.length} children structurally but ${objects.length} semantically; children were not enriched`,
        location: element.location,
        filePath: this.#filePath,
      });
      return;
    }
    children.forEach((child, i) => {
      const object = objects[i];
      if (object) this.#enrichElement(child, object);
    });
  }

  #enrichExtension(extension: MarkupExtension, object: SemanticObjectNode): void {
    extension.resolvedType = object.type;
    this.#reportUnresolved(object, extension.location);
    if (extension.positional instanceof MarkupExtension && object.positional?.kind === "object") {
      this.#enrichExtension(extension.positional, object.positional.object);
    }
    for (const member of object.members) {
      const argument = extension.getParameter(member.name);
      if (argument instanceof MarkupExtension && member.value.kind === "object") {
        this.#enrichExtension(argument, member.value.object);
      }
    }
  }

  #reportUnresolved(object: SemanticObjectNode, location: SourceLocation | null = locationOf(object)): void {
    if (object.type !== null) return;
    this.#diagnostics.emit("xamlshift/type-unresolved", {
      message: `${object.isMarkupExtension ? "markup extension" : "type"} '${object.writtenName}' could not be resolved`,
      location,
      filePath: this.#filePath,
    });
  }
}

function findMatchingProperty(element: UnifiedElement, member: SemanticMemberNode): UnifiedProperty | null {
  return (
    element.properties.find(
      (property) =>
        property.name === member.name &&
        property.attachedOwnerType === member.ownerType &&
        (property.kind === "property-element" || property.prefix === null),
    ) ?? null
  );
}

function locationOf(object: SemanticObjectNode): SourceLocation | null {
  return object.line !== null && object.column !== null ? { line: object.line, column: object.column } : null;
}
