import type { DiagnosticCollector } from "../diagnostics/collector.js";
import { containsLineBreak, normalizeLeadingWhitespace } from "../formatting/whitespace-extractor.js";
import type {
  NamespaceDeclaration,
  UnifiedComment,
  UnifiedDocument,
  UnifiedElement,
  UnifiedProperty,
  XmlDeclaration,
} from "../model/ast.js";
import { emptyFormatting, isRecorded, type FormattingHints } from "../model/formatting.js";
import {
  AVALONIA_NAMESPACE,
  WPF_PRESENTATION_NAMESPACE,
  XAML_LANGUAGE_NAMESPACE,
  XAML_LANGUAGE_PREFIX,
  directiveLocalName,
} from "../model/namespaces.js";
import type { SourceLocation } from "../model/text.js";
import { canonicalValue } from "../parsing/structural-converter.js";
import { debug } from "../shared/debug.js";
import { bannerEntries, formatBanner } from "./banner.js";
import { resolveSerializationOptions, type SerializationOptions } from "./options.js";

/* =============================================================================
 * OUTPUT TREE
 * ============================================================================= */

export interface OutputAttribute {
  readonly name: string;
  /** Whitespace before the name. */
  readonly leading: string;
  readonly equals: string;
  readonly quote: '"' | "'";
  /** Encoded value, ready to sit between the quotes. */
  readonly value: string;
}

export interface OutputElement {
  readonly kind: "element";
  readonly name: string;
  readonly leading: string;
  readonly attributes: readonly OutputAttribute[];
  /** Whitespace between the last attribute and `>` or `/>`. */
  readonly tagEnd: string;
  readonly selfClosing: boolean;
  readonly content: readonly OutputNode[];
  /** Whitespace before the close tag. */
  readonly closing: string;
  /** Whitespace between the close tag's name and `>`. */
  readonly closeTagEnd: string;
}

/** Already-encoded character data. */
export interface OutputText {
  readonly kind: "text";
  readonly raw: string;
}

export interface OutputComment {
  readonly kind: "comment";
  readonly leading: string;
  readonly text: string;
}

export type OutputNode = OutputElement | OutputText | OutputComment;

export interface OutputDocument {
  readonly byteOrderMark: boolean;
  readonly declaration: string | null;
  readonly nodes: readonly OutputNode[];
  readonly trailing: string;
}

/* =============================================================================
 * ENTRY POINTS
 * ============================================================================= */

/**
 * Build the output tree for a document. Never throws: a failing element is
 * reported as `xamlshift/serialization-failed` and written as its source text.
 */
export function serialize(
  document: UnifiedDocument,
  options: Partial<SerializationOptions> = {},
  diagnostics: DiagnosticCollector | null = null,
): OutputDocument {
  return new MarkupWriter(document, resolveSerializationOptions(options), diagnostics).write();
}

export function serializeToText(
  document: UnifiedDocument,
  options: Partial<SerializationOptions> = {},
  diagnostics: DiagnosticCollector | null = null,
): string {
  try {
    return renderOutput(serialize(document, options, diagnostics));
  } catch (error) {
    reportFailure(document, diagnostics, error, null);
    return "";
  }
}

export function renderOutput(output: OutputDocument): string {
  const parts: string[] = [];
  if (output.byteOrderMark) parts.push("\uFEFF");
  if (output.declaration !== null) parts.push(output.declaration);
  for (const node of output.nodes) parts.push(renderNode(node));
  parts.push(output.trailing);
  return parts.join("");
}

export function renderNode(node: OutputNode): string {
  switch (node.kind) {
    case "text":
      return node.raw;
    case "comment":
      return `${node.leading}<!--${node.text}-->`;
    case "element": {
      const attributes = node.attributes
        .map((attr) => `${attr.leading}${attr.name}${attr.equals}${attr.quote}${attr.value}${attr.quote}`)
        .join("");
      const open = `${node.leading}<${node.name}${attributes}${node.tagEnd}`;
      if (node.selfClosing) return `${open}/>`;
      return `${open}>${node.content.map(renderNode).join("")}${node.closing}</${node.name}${node.closeTagEnd}>`;
    }
  }
}

/* =============================================================================
 * WRITER
 * ============================================================================= */

/** Prefix → namespace bindings visible at an element. */
type Scope = Map<string | null, string>;

const XML_NAMESPACE = "http://www.w3.org/XML/1998/namespace";

interface AttributeSource {
  readonly name: string;
  readonly value: string;
  readonly formatting: FormattingHints;
  readonly order: number | null;
}

type ContentItem =
  | { readonly kind: "element"; readonly node: UnifiedElement; readonly order: number | null }
  | { readonly kind: "property"; readonly node: UnifiedProperty; readonly order: number | null }
  | { readonly kind: "comment"; readonly node: UnifiedComment; readonly order: number | null };

/** What an element or property-element holds between its tags. */
interface Container {
  readonly formatting: FormattingHints;
  readonly items: ContentItem[];
  readonly text: string | null;
}

interface WrittenContent {
  readonly content: OutputNode[];
  readonly closing: string;
  readonly selfClosing: boolean;
}

class MarkupWriter {
  readonly #document: UnifiedDocument;
  readonly #options: SerializationOptions;
  readonly #diagnostics: DiagnosticCollector | null;
  readonly #target: string;

  constructor(document: UnifiedDocument, options: SerializationOptions, diagnostics: DiagnosticCollector | null) {
    this.#document = document;
    this.#options = options;
    this.#diagnostics = diagnostics;
    this.#target = options.targetNamespace ?? document.metadata.targetNamespace ?? AVALONIA_NAMESPACE;
  }

  get #preserve(): boolean {
    return this.#options.preserveFormatting;
  }

  write(): OutputDocument {
    const document = this.#document;
    const declaration = document.declaration
      ? this.#preserve
        ? document.declaration.raw
        : formatDeclaration(document.declaration)
      : null;
    const nodes: OutputNode[] = [];
    const separator = (): string => (declaration !== null || nodes.length > 0 ? this.#options.newline : "");

    for (const comment of document.leadingComments) {
      if (this.#keepComment(comment)) nodes.push(this.#comment(comment, this.#recordedLeading(comment.formatting) ?? separator()));
    }
    const root = document.root;
    if (root) {
      const scope: Scope = new Map<string | null, string>([["xml", XML_NAMESPACE]]);
      nodes.push(this.#element(root, 0, scope, this.#recordedLeading(root.formatting) ?? separator()));
    }
    for (const comment of document.trailingComments) {
      if (this.#keepComment(comment)) nodes.push(this.#comment(comment, this.#recordedLeading(comment.formatting) ?? separator()));
    }

    if (this.#options.addDiagnosticComments) {
      const banner = formatBanner(
        bannerEntries(document, this.#diagnostics),
        this.#options.maxDiagnosticEntries,
        this.#options.newline,
      );
      if (banner !== null) nodes.push({ kind: "comment", leading: separator(), text: banner });
    }

    const trailing =
      this.#preserve && isRecorded(document.formatting) ? document.formatting.trailingWhitespace : this.#options.newline;
    debug.write("document.written", { nodes: nodes.length, target: this.#options.useTargetNamespace ? this.#target : null });
    return { byteOrderMark: document.hasByteOrderMark, declaration, nodes, trailing };
  }

  /* ---------- elements ---------- */

  #element(element: UnifiedElement, depth: number, scope: Scope, leading: string): OutputNode {
    try {
      return this.#writeElement(element, depth, scope, leading);
    } catch (error) {
      reportFailure(this.#document, this.#diagnostics, error, element.location);
      const raw = element.formatting.rawText;
      return { kind: "text", raw: raw === null ? "" : `${leading}${raw}` };
    }
  }

  #writeElement(element: UnifiedElement, depth: number, outer: Scope, leading: string): OutputElement {
    const declarations = this.#declarationsFor(element);
    const scope: Scope = new Map(outer);
    for (const declaration of declarations) scope.set(declaration.prefix, declaration.uri);
    const prefix = this.#elementPrefix(element, scope, declarations);
    const name = qualify(prefix, element.typeName);

    const attributes = this.#attributes(element, declarations);
    const written = this.#content(this.#elementContainer(element), depth, scope, prefix);
    return {
      kind: "element",
      name,
      leading,
      attributes,
      tagEnd: this.#tagEnd(element.formatting, written.selfClosing),
      selfClosing: written.selfClosing,
      content: written.content,
      closing: written.closing,
      closeTagEnd: this.#closeTagEnd(element.formatting, written.selfClosing),
    };
  }

  /** The element's own declarations; the root's are rewritten under `useTargetNamespace`. */
  #declarationsFor(element: UnifiedElement): NamespaceDeclaration[] {
    const declarations = element.namespaceDeclarations.map((declaration) => ({ ...declaration }));
    if (!this.#options.useTargetNamespace || element !== this.#document.root) return declarations;
    bindDeclaration(declarations, null, this.#target);
    bindDeclaration(declarations, XAML_LANGUAGE_PREFIX, XAML_LANGUAGE_NAMESPACE);
    return declarations;
  }

  /**
   * Prefix for the element's tag: the target default namespace when
   * `useTargetNamespace` covers it, then the namespace override, then the
   * recorded prefix. A default namespace nothing in scope binds is declared
   * on the element itself.
   */
  #elementPrefix(element: UnifiedElement, scope: Scope, declarations: NamespaceDeclaration[]): string | null {
    if (this.#options.useTargetNamespace && this.#isPresentation(element)) {
      this.#ensureDefault(this.#target, scope, declarations);
      return null;
    }
    const override = element.namespaceOverride;
    if (override !== null) {
      const bound = prefixFor(scope, override);
      if (bound !== undefined) return bound;
      this.#ensureDefault(override, scope, declarations);
      return null;
    }
    if (element.prefix === null && element.namespace !== null) {
      this.#ensureDefault(element.namespace, scope, declarations);
    }
    return element.prefix;
  }

  #isPresentation(element: UnifiedElement): boolean {
    const namespace = element.namespaceOverride ?? element.namespace;
    return namespace === null || namespace === WPF_PRESENTATION_NAMESPACE || namespace === this.#target;
  }

  #ensureDefault(uri: string, scope: Scope, declarations: NamespaceDeclaration[]): void {
    if (scope.get(null) === uri) return;
    bindDeclaration(declarations, null, uri);
    scope.set(null, uri);
  }

  /* ---------- attributes ---------- */

  #attributes(element: UnifiedElement, declarations: readonly NamespaceDeclaration[]): OutputAttribute[] {
    const head: AttributeSource[] = [
      ...declarations.map((declaration) => ({
        name: declaration.prefix === null ? "xmlns" : `xmlns:${declaration.prefix}`,
        value: declaration.uri,
        formatting: declaration.formatting,
        order: declaration.order,
      })),
      ...element.directiveEntries().map(([kind, directive]) => ({
        name: `${directive.prefix}:${directiveLocalName(kind)}`,
        value: directive.value,
        formatting: directive.formatting,
        order: directive.order,
      })),
    ];
    // Recorded declarations and directives keep their relative source order; synthesized ones follow.
    const recorded = head.filter((source) => source.order !== null);
    recorded.sort((a, b) => (a.order ?? 0) - (b.order ?? 0));
    const synthesized = head.filter((source) => source.order === null);

    const properties: AttributeSource[] = element.properties.filter(isAttributeProperty).map((property) => ({
      name: qualify(property.prefix, property.qualifiedName),
      value: canonicalValue(property.value) ?? "",
      formatting: property.formatting,
      order: property.sourceOrder,
    }));
    if (this.#options.sortAttributes) properties.sort((a, b) => compareOrdinal(a.name, b.name));

    const attributes: OutputAttribute[] = [];
    let previousLeading: string | null = null;
    for (const source of [...recorded, ...synthesized, ...properties]) {
      const attribute = this.#attribute(source, previousLeading);
      attributes.push(attribute);
      previousLeading = attribute.leading;
    }
    return attributes;
  }

  #attribute(source: AttributeSource, previousLeading: string | null): OutputAttribute {
    const syntax = this.#preserve ? source.formatting.attribute : null;
    if (syntax === null) {
      const leading = this.#preserve && previousLeading !== null && containsLineBreak(previousLeading) ? previousLeading : " ";
      return { name: source.name, leading, equals: "=", quote: '"', value: escapeAttribute(source.value, '"') };
    }
    const unchanged = source.formatting.originalValue === source.value;
    return {
      name: source.name,
      leading: source.formatting.leadingWhitespace,
      equals: syntax.equals,
      quote: syntax.quote,
      value: unchanged ? syntax.rawValue : escapeAttribute(source.value, syntax.quote),
    };
  }

  /* ---------- content ---------- */

  #elementContainer(element: UnifiedElement): Container {
    const items: ContentItem[] = [
      ...element.properties
        .filter((property) => !isAttributeProperty(property))
        .map((node) => ({ kind: "property" as const, node, order: node.sourceOrder })),
      ...element.children.map((node) => ({ kind: "element" as const, node, order: node.sourceOrder })),
      ...this.#commentItems(element.comments),
    ];
    return { formatting: element.formatting, items: sortByOrder(items), text: nonEmpty(element.textContent) };
  }

  #propertyContainer(property: UnifiedProperty): Container {
    const value = property.element;
    const elements = value === null ? [] : value.isSyntheticCollection ? [...value.children] : [value];
    const items: ContentItem[] = [
      ...elements.map((node) => ({ kind: "element" as const, node, order: node.sourceOrder })),
      ...this.#commentItems(property.comments),
    ];
    return {
      formatting: property.formatting,
      items: sortByOrder(items),
      text: value === null ? nonEmpty(canonicalValue(property.value)) : null,
    };
  }

  #commentItems(comments: readonly UnifiedComment[]): ContentItem[] {
    return comments
      .filter((comment) => this.#keepComment(comment))
      .map((node) => ({ kind: "comment" as const, node, order: node.sourceOrder }));
  }

  #content(container: Container, depth: number, scope: Scope, prefix: string | null): WrittenContent {
    const { formatting, items, text } = container;
    const recorded = this.#preserve && isRecorded(formatting);

    if (text === null && items.length === 0) {
      if (!recorded || formatting.selfClosing) return { content: [], closing: "", selfClosing: true };
      // Whitespace-only content, possibly split by dropped comments or held in CDATA.
      const raw = formatting.textRuns.map((run) => run.raw).join("");
      return { content: raw === "" ? [] : [{ kind: "text", raw }], closing: "", selfClosing: false };
    }

    // Unchanged mixed content goes back out as the recorded runs.
    if (recorded && text !== null && text === formatting.originalValue && formatting.textRuns.some((run) => /\S/.test(run.value))) {
      return this.#rawContent(container, depth, scope, prefix);
    }

    const content: OutputNode[] = [];
    if (text !== null) content.push({ kind: "text", raw: escapeText(text) });
    let previous: string | null = null;
    items.forEach((item, index) => {
      const first = index === 0 && text === null ? formatting : null;
      const leading = this.#itemLeading(itemFormatting(item), previous, first, depth);
      content.push(this.#item(item, depth + 1, scope, prefix, leading));
      previous = leading;
    });

    let closing = "";
    if (items.length > 0) {
      closing = recorded && !formatting.selfClosing ? formatting.closingWhitespace : this.#indentation(depth);
    }
    return { content, closing, selfClosing: false };
  }

  #rawContent(container: Container, depth: number, scope: Scope, prefix: string | null): WrittenContent {
    type Piece = { readonly order: number | null; readonly raw?: string; readonly item?: ContentItem };
    const pieces: Piece[] = [
      ...container.formatting.textRuns.map((run) => ({ order: run.order, raw: run.raw })),
      ...container.items.map((item) => ({ order: item.order, item })),
    ];
    const content: OutputNode[] = [];
    let appended = false;
    for (const piece of sortByOrder(pieces)) {
      if (piece.raw !== undefined) content.push({ kind: "text", raw: piece.raw });
      if (piece.item) {
        if (piece.order === null) appended = true;
        const leading = piece.order === null ? this.#indentation(depth + 1) : "";
        content.push(this.#item(piece.item, depth + 1, scope, prefix, leading));
      }
    }
    return { content, closing: appended ? this.#indentation(depth) : "", selfClosing: false };
  }

  #item(item: ContentItem, depth: number, scope: Scope, ownerPrefix: string | null, leading: string): OutputNode {
    switch (item.kind) {
      case "element":
        return this.#element(item.node, depth, scope, leading);
      case "property":
        return this.#propertyElement(item.node, depth, scope, ownerPrefix, leading);
      case "comment":
        return this.#comment(item.node, leading);
    }
  }

  /** `<Owner.Property>`; the owner is the attached type or the enclosing element's. */
  #propertyElement(
    property: UnifiedProperty,
    depth: number,
    scope: Scope,
    ownerPrefix: string | null,
    leading: string,
  ): OutputElement {
    const owner = property.attachedOwnerType ?? property.parent?.typeName ?? "";
    const prefix = property.attachedOwnerType !== null ? property.prefix : ownerPrefix;
    const written = this.#content(this.#propertyContainer(property), depth, scope, prefix);
    return {
      kind: "element",
      name: qualify(prefix, `${owner}.${property.name}`),
      leading,
      attributes: [],
      tagEnd: this.#tagEnd(property.formatting, written.selfClosing),
      selfClosing: written.selfClosing,
      content: written.content,
      closing: written.closing,
      closeTagEnd: this.#closeTagEnd(property.formatting, written.selfClosing),
    };
  }

  #comment(comment: UnifiedComment, leading: string): OutputComment {
    return { kind: "comment", leading, text: comment.text };
  }

  #keepComment(comment: UnifiedComment): boolean {
    return comment.preserve && this.#options.preserveComments;
  }

  /* ---------- whitespace ---------- */

  #recordedLeading(formatting: FormattingHints): string | null {
    return this.#preserve && isRecorded(formatting) ? formatting.leadingWhitespace : null;
  }

  #itemLeading(
    formatting: FormattingHints,
    previous: string | null,
    container: FormattingHints | null,
    depth: number,
  ): string {
    if (!this.#preserve) return this.#indentation(depth + 1);
    if (isRecorded(formatting)) return formatting.leadingWhitespace;
    if (previous !== null && containsLineBreak(previous)) return previous;
    if (container && containsLineBreak(container.innerWhitespace)) return normalizeLeadingWhitespace(container.innerWhitespace);
    return this.#indentation(depth + 1);
  }

  #tagEnd(formatting: FormattingHints, selfClosing: boolean): string {
    if (this.#preserve && isRecorded(formatting) && formatting.selfClosing === selfClosing) return formatting.tagEndWhitespace;
    return selfClosing ? " " : "";
  }

  #closeTagEnd(formatting: FormattingHints, selfClosing: boolean): string {
    return this.#preserve && isRecorded(formatting) && !selfClosing ? formatting.closeTagWhitespace : "";
  }

  #indentation(depth: number): string {
    return this.#options.newline + this.#options.indent.repeat(depth);
  }
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

function isAttributeProperty(property: UnifiedProperty): boolean {
  return property.kind !== "property-element" && property.value.kind !== "element";
}

function itemFormatting(item: ContentItem): FormattingHints {
  return item.node.formatting;
}

/** Stable sort; items without a source position go last. */
function sortByOrder<T extends { readonly order: number | null }>(items: T[]): T[] {
  return items.sort((a, b) => {
    if (a.order === null) return b.order === null ? 0 : 1;
    if (b.order === null) return -1;
    return a.order - b.order;
  });
}

/** Replace the uri bound to `prefix`, or declare it after the recorded ones. */
function bindDeclaration(declarations: NamespaceDeclaration[], prefix: string | null, uri: string): void {
  const index = declarations.findIndex((declaration) => declaration.prefix === prefix);
  const existing = declarations[index];
  if (existing) {
    declarations[index] = { ...existing, uri };
    return;
  }
  declarations.push({ prefix, uri, order: null, formatting: emptyFormatting() });
}

/** Prefix bound to `uri` (null for the default namespace), or undefined when none is. */
function prefixFor(scope: Scope, uri: string): string | null | undefined {
  if (scope.get(null) === uri) return null;
  for (const [prefix, bound] of scope) {
    if (prefix !== null && bound === uri) return prefix;
  }
  return undefined;
}

function qualify(prefix: string | null, local: string): string {
  return prefix === null ? local : `${prefix}:${local}`;
}

function nonEmpty(text: string | null): string | null {
  return text === null || text === "" ? null : text;
}

function compareOrdinal(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function formatDeclaration(declaration: XmlDeclaration): string {
  const parts = [`version="${declaration.version ?? "1.0"}"`];
  if (declaration.encoding !== null) parts.push(`encoding="${declaration.encoding}"`);
  if (declaration.standalone !== null) parts.push(`standalone="${declaration.standalone}"`);
  return `<?xml ${parts.join(" ")}?>`;
}

export function escapeAttribute(value: string, quote: '"' | "'"): string {
  return value.replace(/[&<"'\t\n\r]/g, (ch) => {
    switch (ch) {
      case "&":
        return "&amp;";
      case "<":
        return "&lt;";
      case "\t":
        return "&#9;";
      case "\n":
        return "&#10;";
      case "\r":
        return "&#13;";
      default:
        if (ch !== quote) return ch;
        return ch === '"' ? "&quot;" : "&apos;";
    }
  });
}

export function escapeText(text: string): string {
  return text.replace(/[&<>]/g, (ch) => (ch === "&" ? "&amp;" : ch === "<" ? "&lt;" : "&gt;"));
}

function reportFailure(
  document: UnifiedDocument,
  diagnostics: DiagnosticCollector | null,
  error: unknown,
  location: SourceLocation | null,
): void {
  const message = `serialization failed: ${error instanceof Error ? error.message : String(error)}`;
  debug.write("write.failed", { message, at: location });
  if (diagnostics) {
    diagnostics.emit("xamlshift/serialization-failed", { message, location, filePath: document.filePath });
  } else {
    document.diagnostics.push({ severity: "error", code: "xamlshift/serialization-failed", message, location });
  }
}
