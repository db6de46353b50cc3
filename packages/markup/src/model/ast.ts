import type { DiagnosticSeverity } from "../diagnostics/types.js";
import type { PropertyDescriptor, TypeDescriptor } from "./descriptors.js";
import { cloneFormatting, emptyFormatting, type FormattingHints } from "./formatting.js";
import { MarkupExtension } from "./markup-extension.js";
import { DIRECTIVE_ORDER, type DirectiveKind } from "./namespaces.js";
import { SymbolTable } from "./symbols.js";
import type { SourceLocation } from "./text.js";

/* =============================================================================
 * SHARED PIECES
 * ============================================================================= */

/** Diagnostic attached to a single node; gathered into the collector after a run. */
export interface NodeDiagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: string;
  readonly message: string;
  readonly location: SourceLocation | null;
}

export interface NamespaceDeclaration {
  /** `null` for the default namespace (`xmlns="..."`). */
  prefix: string | null;
  uri: string;
  /** Attribute position among the element's attributes, or null when synthesized. */
  order: number | null;
  formatting: FormattingHints;
}

export interface DirectiveValue {
  value: string;
  prefix: string;
  order: number | null;
  formatting: FormattingHints;
}

export type PropertyKind = "attribute" | "property-element" | "attached-property";

export type PropertyValue =
  | { readonly kind: "literal"; readonly text: string }
  | { readonly kind: "element"; readonly element: UnifiedElement }
  | { readonly kind: "extension"; readonly extension: MarkupExtension };

export type UnifiedNode = UnifiedElement | UnifiedProperty | MarkupExtension | UnifiedComment;

/* =============================================================================
 * COMMENT
 * ============================================================================= */

export class UnifiedComment {
  readonly nodeType = "comment" as const;
  parent: UnifiedDocument | UnifiedElement | UnifiedProperty | null = null;
  formatting: FormattingHints = emptyFormatting();
  location: SourceLocation | null = null;
  /** Position in the parent's content sequence. */
  sourceOrder: number | null = null;

  /** `preserve = false` marks synthesized comments that only diagnostic output shows. */
  constructor(
    public text: string,
    public preserve = true,
  ) {}

  clone(): UnifiedComment {
    const copy = new UnifiedComment(this.text, this.preserve);
    copy.formatting = cloneFormatting(this.formatting);
    copy.location = this.location ? { ...this.location } : null;
    copy.sourceOrder = this.sourceOrder;
    return copy;
  }
}

/* =============================================================================
 * PROPERTY
 * ============================================================================= */

export class UnifiedProperty {
  readonly nodeType = "property" as const;
  #kind: PropertyKind;
  #attachedOwnerType: string | null = null;
  #value: PropertyValue = { kind: "literal", text: "" };
  readonly #comments: UnifiedComment[] = [];

  parent: UnifiedElement | null = null;
  /** Namespace prefix written on the attribute (`d:`, `mc:`), when any. */
  prefix: string | null = null;
  resolvedProperty: PropertyDescriptor | null = null;
  formatting: FormattingHints = emptyFormatting();
  location: SourceLocation | null = null;
  sourceOrder: number | null = null;
  readonly diagnostics: NodeDiagnostic[] = [];

  constructor(
    public name: string,
    kind: "attribute" | "property-element",
    value: PropertyValue = { kind: "literal", text: "" },
  ) {
    this.#kind = kind;
    this.value = value;
  }

  static attached(ownerType: string, name: string, value: PropertyValue): UnifiedProperty {
    const property = new UnifiedProperty(name, "attribute", value);
    property.attachTo(ownerType);
    return property;
  }

  get kind(): PropertyKind {
    return this.#kind;
  }

  /** Never null when `kind` is `attached-property`. */
  get attachedOwnerType(): string | null {
    return this.#attachedOwnerType;
  }

  /**
   * Qualify the property with an owner type. Attributes become attached
   * properties; property-elements keep their kind and only record the owner.
   */
  attachTo(ownerType: string): void {
    this.#attachedOwnerType = ownerType;
    if (this.#kind === "attribute") this.#kind = "attached-property";
  }

  detach(): void {
    this.#attachedOwnerType = null;
    if (this.#kind === "attached-property") this.#kind = "attribute";
  }

  /** Type that owns the property: the attached owner or the enclosing element's type. */
  get ownerTypeName(): string | null {
    return this.#attachedOwnerType ?? this.parent?.typeName ?? null;
  }

  /** `Owner.Name` for attached or qualified properties, else `Name`. */
  get qualifiedName(): string {
    return this.#attachedOwnerType ? `${this.#attachedOwnerType}.${this.name}` : this.name;
  }

  get value(): PropertyValue {
    return this.#value;
  }

  set value(value: PropertyValue) {
    const previous = this.#value;
    if (previous.kind === "element" && previous.element !== valueNode(value)) previous.element.parent = null;
    if (previous.kind === "extension" && previous.extension !== valueNode(value)) previous.extension.parent = null;
    if (value.kind === "element") {
      if (value.element.parent !== this) detachFromParent(value.element);
      value.element.parent = this;
    }
    if (value.kind === "extension") value.extension.parent = this;
    this.#value = value;
  }

  get literal(): string | null {
    return this.#value.kind === "literal" ? this.#value.text : null;
  }

  get extension(): MarkupExtension | null {
    return this.#value.kind === "extension" ? this.#value.extension : null;
  }

  get element(): UnifiedElement | null {
    return this.#value.kind === "element" ? this.#value.element : null;
  }

  setLiteral(text: string): void {
    this.value = { kind: "literal", text };
  }

  setExtension(extension: MarkupExtension): void {
    this.value = { kind: "extension", extension };
  }

  setElement(element: UnifiedElement): void {
    this.value = { kind: "element", element };
  }

  /** Comments inside a property-element. */
  get comments(): readonly UnifiedComment[] {
    return this.#comments;
  }

  addComment(comment: UnifiedComment): void {
    comment.parent = this;
    this.#comments.push(comment);
  }

  removeComment(comment: UnifiedComment): boolean {
    return removeFrom(this.#comments, comment);
  }

  addDiagnostic(severity: DiagnosticSeverity, code: string, message: string): void {
    this.diagnostics.push({ severity, code, message, location: this.location });
  }

  clone(): UnifiedProperty {
    const kind = this.#kind === "property-element" ? "property-element" : "attribute";
    const copy = new UnifiedProperty(this.name, kind, cloneValue(this.#value));
    if (this.#attachedOwnerType !== null) copy.attachTo(this.#attachedOwnerType);
    copy.prefix = this.prefix;
    copy.resolvedProperty = this.resolvedProperty;
    copy.formatting = cloneFormatting(this.formatting);
    copy.location = this.location ? { ...this.location } : null;
    copy.sourceOrder = this.sourceOrder;
    copy.diagnostics.push(...this.diagnostics);
    for (const comment of this.#comments) copy.addComment(comment.clone());
    return copy;
  }
}

/* =============================================================================
 * ELEMENT
 * ============================================================================= */

export class UnifiedElement {
  readonly nodeType = "element" as const;
  readonly #properties: UnifiedProperty[] = [];
  readonly #children: UnifiedElement[] = [];
  readonly #comments: UnifiedComment[] = [];
  readonly #directives = new Map<DirectiveKind, DirectiveValue>();

  /** Owning element, or the Property when this element is a property value. */
  parent: UnifiedElement | UnifiedProperty | null = null;
  /** Prefix the element was written with. */
  prefix: string | null = null;
  /** Replaces `namespace` when the writer resolves the element name. */
  namespaceOverride: string | null = null;
  namespaceDeclarations: NamespaceDeclaration[] = [];
  textContent: string | null = null;
  resolvedType: TypeDescriptor | null = null;
  formatting: FormattingHints = emptyFormatting();
  location: SourceLocation | null = null;
  sourceOrder: number | null = null;
  /** Container created for a multi-child property-element; has no tag of its own. */
  isSyntheticCollection = false;
  readonly diagnostics: NodeDiagnostic[] = [];

  constructor(
    public typeName: string,
    public namespace: string | null = null,
  ) {}

  /* ---- directives ---- */

  get name(): string | null {
    return this.getDirective("name");
  }

  set name(value: string | null) {
    this.setDirective("name", value);
  }

  get key(): string | null {
    return this.getDirective("key");
  }

  set key(value: string | null) {
    this.setDirective("key", value);
  }

  get className(): string | null {
    return this.getDirective("class");
  }

  set className(value: string | null) {
    this.setDirective("class", value);
  }

  get fieldModifier(): string | null {
    return this.getDirective("fieldModifier");
  }

  set fieldModifier(value: string | null) {
    this.setDirective("fieldModifier", value);
  }

  get shared(): string | null {
    return this.getDirective("shared");
  }

  set shared(value: string | null) {
    this.setDirective("shared", value);
  }

  getDirective(kind: DirectiveKind): string | null {
    return this.#directives.get(kind)?.value ?? null;
  }

  setDirective(kind: DirectiveKind, value: string | null, prefix = "x"): void {
    if (value === null) {
      this.#directives.delete(kind);
      return;
    }
    const existing = this.#directives.get(kind);
    if (existing) existing.value = value;
    else this.#directives.set(kind, { value, prefix, order: null, formatting: emptyFormatting() });
  }

  /** Record a directive read from source, keeping its spelling. */
  restoreDirective(kind: DirectiveKind, directive: DirectiveValue): void {
    this.#directives.set(kind, directive);
  }

  /** Present directives in canonical order; the writer re-sorts by source position. */
  directiveEntries(): [DirectiveKind, DirectiveValue][] {
    const entries: [DirectiveKind, DirectiveValue][] = [];
    for (const kind of DIRECTIVE_ORDER) {
      const directive = this.#directives.get(kind);
      if (directive) entries.push([kind, directive]);
    }
    return entries;
  }

  /* ---- properties ---- */

  get properties(): readonly UnifiedProperty[] {
    return this.#properties;
  }

  getProperty(name: string, ownerType: string | null = null): UnifiedProperty | null {
    return this.#properties.find((p) => p.name === name && p.attachedOwnerType === ownerType) ?? null;
  }

  addProperty(property: UnifiedProperty, index = this.#properties.length): void {
    detachFromParent(property);
    property.parent = this;
    this.#properties.splice(Math.max(0, Math.min(index, this.#properties.length)), 0, property);
  }

  removeProperty(property: UnifiedProperty): boolean {
    const removed = removeFrom(this.#properties, property);
    if (removed) property.parent = null;
    return removed;
  }

  replaceProperty(existing: UnifiedProperty, replacement: UnifiedProperty): void {
    const index = this.#properties.indexOf(existing);
    if (index < 0 || existing === replacement) return;
    detachFromParent(replacement);
    existing.parent = null;
    replacement.parent = this;
    this.#properties.splice(this.#properties.indexOf(existing), 1, replacement);
  }

  /* ---- children ---- */

  get children(): readonly UnifiedElement[] {
    return this.#children;
  }

  addChild(child: UnifiedElement, index = this.#children.length): void {
    detachFromParent(child);
    child.parent = this;
    this.#children.splice(Math.max(0, Math.min(index, this.#children.length)), 0, child);
  }

  removeChild(child: UnifiedElement): boolean {
    const removed = removeFrom(this.#children, child);
    if (removed) child.parent = null;
    return removed;
  }

  replaceChild(existing: UnifiedElement, replacement: UnifiedElement): void {
    const index = this.#children.indexOf(existing);
    if (index < 0 || existing === replacement) return;
    detachFromParent(replacement);
    existing.parent = null;
    replacement.parent = this;
    this.#children.splice(this.#children.indexOf(existing), 1, replacement);
  }

  /** Index among the parent's children; -1 for roots and property values. */
  get siblingIndex(): number {
    return this.parent instanceof UnifiedElement ? this.parent.children.indexOf(this) : -1;
  }

  /** Nearest enclosing element, skipping property-element wrappers. */
  get enclosingElement(): UnifiedElement | null {
    const parent = this.parent;
    if (parent instanceof UnifiedProperty) return parent.parent;
    return parent;
  }

  /* ---- comments ---- */

  get comments(): readonly UnifiedComment[] {
    return this.#comments;
  }

  addComment(comment: UnifiedComment): void {
    comment.parent = this;
    this.#comments.push(comment);
  }

  removeComment(comment: UnifiedComment): boolean {
    return removeFrom(this.#comments, comment);
  }

  addDiagnostic(severity: DiagnosticSeverity, code: string, message: string): void {
    this.diagnostics.push({ severity, code, message, location: this.location });
  }

  /** Elements of this subtree in document order, property values included. */
  *descendants(): Generator<UnifiedElement> {
    yield this;
    for (const property of this.#properties) {
      const value = property.element;
      if (value) yield* value.descendants();
    }
    for (const child of this.#children) yield* child.descendants();
  }

  clone(): UnifiedElement {
    const copy = new UnifiedElement(this.typeName, this.namespace);
    copy.prefix = this.prefix;
    copy.namespaceOverride = this.namespaceOverride;
    copy.namespaceDeclarations = this.namespaceDeclarations.map((decl) => ({
      ...decl,
      formatting: cloneFormatting(decl.formatting),
    }));
    copy.textContent = this.textContent;
    copy.resolvedType = this.resolvedType;
    copy.formatting = cloneFormatting(this.formatting);
    copy.location = this.location ? { ...this.location } : null;
    copy.sourceOrder = this.sourceOrder;
    copy.isSyntheticCollection = this.isSyntheticCollection;
    copy.diagnostics.push(...this.diagnostics);
    for (const [kind, directive] of this.#directives) {
      copy.restoreDirective(kind, { ...directive, formatting: cloneFormatting(directive.formatting) });
    }
    for (const property of this.#properties) copy.addProperty(property.clone());
    for (const child of this.#children) copy.addChild(child.clone());
    for (const comment of this.#comments) copy.addComment(comment.clone());
    return copy;
  }
}

/* =============================================================================
 * DOCUMENT
 * ============================================================================= */

export interface XmlDeclaration {
  version: string | null;
  encoding: string | null;
  standalone: string | null;
  /** Declaration exactly as written. */
  raw: string;
}

/** Link between the document and its companion code unit. */
export interface CompanionLink {
  readonly qualifiedName: string;
  readonly resolved: boolean;
  readonly memberCount: number;
}

export interface DocumentMetadata {
  /** Target default namespace chosen by the namespace rewrite. */
  targetNamespace?: string;
  companion?: CompanionLink;
}

export class UnifiedDocument {
  #root: UnifiedElement | null = null;
  readonly leadingComments: UnifiedComment[] = [];
  readonly trailingComments: UnifiedComment[] = [];
  readonly diagnostics: NodeDiagnostic[] = [];
  declaration: XmlDeclaration | null = null;
  hasByteOrderMark = false;
  symbols: SymbolTable = new SymbolTable();
  metadata: DocumentMetadata = {};
  /** Root leading whitespace and end-of-file trailing whitespace. */
  formatting: FormattingHints = emptyFormatting();

  constructor(public filePath: string | null = null) {}

  get root(): UnifiedElement | null {
    return this.#root;
  }

  set root(element: UnifiedElement | null) {
    if (element) detachFromParent(element);
    this.#root = element;
  }

  addComment(comment: UnifiedComment, position: "leading" | "trailing"): void {
    comment.parent = this;
    (position === "leading" ? this.leadingComments : this.trailingComments).push(comment);
  }

  /** Rebuild the symbol table from the current tree. */
  refreshSymbols(): SymbolTable {
    this.symbols = SymbolTable.build(this.#root);
    return this.symbols;
  }

  *elements(): Generator<UnifiedElement> {
    if (this.#root) yield* this.#root.descendants();
  }

  clone(): UnifiedDocument {
    const copy = new UnifiedDocument(this.filePath);
    copy.declaration = this.declaration ? { ...this.declaration } : null;
    copy.hasByteOrderMark = this.hasByteOrderMark;
    copy.metadata = { ...this.metadata };
    copy.formatting = cloneFormatting(this.formatting);
    copy.diagnostics.push(...this.diagnostics);
    for (const comment of this.leadingComments) copy.addComment(comment.clone(), "leading");
    for (const comment of this.trailingComments) copy.addComment(comment.clone(), "trailing");
    copy.root = this.#root ? this.#root.clone() : null;
    copy.refreshSymbols();
    return copy;
  }
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

function valueNode(value: PropertyValue): UnifiedElement | MarkupExtension | null {
  if (value.kind === "element") return value.element;
  if (value.kind === "extension") return value.extension;
  return null;
}

function cloneValue(value: PropertyValue): PropertyValue {
  switch (value.kind) {
    case "literal":
      return value;
    case "element":
      return { kind: "element", element: value.element.clone() };
    case "extension":
      return { kind: "extension", extension: value.extension.clone() };
  }
}

function removeFrom<T>(list: T[], item: T): boolean {
  const index = list.indexOf(item);
  if (index < 0) return false;
  list.splice(index, 1);
  return true;
}

/** Unlink a node from its current parent so it is never owned twice. */
function detachFromParent(node: UnifiedElement | UnifiedProperty): void {
  const parent = node.parent;
  if (parent === null) return;
  if (node instanceof UnifiedProperty) {
    if (parent instanceof UnifiedElement) parent.removeProperty(node);
    return;
  }
  if (parent instanceof UnifiedElement) parent.removeChild(node);
  else if (parent.element === node) parent.setLiteral("");
}
