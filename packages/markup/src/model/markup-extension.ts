import type { UnifiedProperty } from "./ast.js";
import type { TypeDescriptor } from "./descriptors.js";
import type { SourceLocation } from "./text.js";

/**
 * A markup-extension argument: either text exactly as written (quotes and
 * escapes included) or a nested extension.
 */
export type ExtensionValue = string | MarkupExtension;

/* =============================================================================
 * SPECIALIZED PAYLOADS
 * ============================================================================= */

export interface BindingPayload {
  readonly kind: "binding";
  readonly path: string | null;
  readonly mode: string | null;
  readonly elementName: string | null;
  readonly source: ExtensionValue | null;
  readonly relativeSource: ExtensionValue | null;
  readonly converter: ExtensionValue | null;
  readonly converterParameter: ExtensionValue | null;
  readonly stringFormat: string | null;
  readonly updateSourceTrigger: string | null;
  readonly fallbackValue: ExtensionValue | null;
  readonly targetNullValue: ExtensionValue | null;
}

export interface ResourcePayload {
  readonly kind: "resource";
  readonly resourceKey: string | null;
  readonly isDynamic: boolean;
}

export interface TypeReferencePayload {
  readonly kind: "type";
  readonly typeName: string | null;
}

export interface StaticMemberPayload {
  readonly kind: "static";
  /** `Owner.Member` as written. */
  readonly memberPath: string | null;
  readonly ownerType: string | null;
  readonly memberName: string | null;
}

export type ExtensionPayload = BindingPayload | ResourcePayload | TypeReferencePayload | StaticMemberPayload;
export type ExtensionPayloadKind = ExtensionPayload["kind"];

/** Extension name → payload kind. Anything else carries no payload. */
export const EXTENSION_PAYLOAD_KINDS: ReadonlyMap<string, ExtensionPayloadKind> = new Map([
  ["Binding", "binding"],
  ["MultiBinding", "binding"],
  ["TemplateBinding", "binding"],
  ["StaticResource", "resource"],
  ["DynamicResource", "resource"],
  ["x:Type", "type"],
  ["x:Static", "static"],
]);

/* =============================================================================
 * NODE
 * ============================================================================= */

export class MarkupExtension {
  readonly nodeType = "markup-extension" as const;
  #positional: ExtensionValue | null = null;
  readonly #parameters = new Map<string, ExtensionValue>();

  parent: UnifiedProperty | MarkupExtension | null = null;
  resolvedType: TypeDescriptor | null = null;
  location: SourceLocation | null = null;

  constructor(
    public name: string,
    positional: ExtensionValue | null = null,
    parameters: Iterable<readonly [string, ExtensionValue]> = [],
  ) {
    this.positional = positional;
    for (const [key, value] of parameters) this.setParameter(key, value);
  }

  get positional(): ExtensionValue | null {
    return this.#positional;
  }

  set positional(value: ExtensionValue | null) {
    if (value instanceof MarkupExtension) value.parent = this;
    this.#positional = value;
  }

  /** Named parameters in insertion order. */
  get parameters(): ReadonlyMap<string, ExtensionValue> {
    return this.#parameters;
  }

  getParameter(key: string): ExtensionValue | null {
    return this.#parameters.get(key) ?? null;
  }

  /** Replaces in place when the key exists, so parameter order is kept. */
  setParameter(key: string, value: ExtensionValue): void {
    if (value instanceof MarkupExtension) value.parent = this;
    this.#parameters.set(key, value);
  }

  removeParameter(key: string): boolean {
    const existing = this.#parameters.get(key);
    if (existing instanceof MarkupExtension) existing.parent = null;
    return this.#parameters.delete(key);
  }

  /** Rename a parameter without moving it. */
  renameParameter(from: string, to: string): boolean {
    if (!this.#parameters.has(from) || from === to) return false;
    const entries = [...this.#parameters];
    this.#parameters.clear();
    for (const [key, value] of entries) {
      if (key === to) continue;
      this.#parameters.set(key === from ? to : key, value);
    }
    return true;
  }

  /** Nested extensions in argument order (positional first). */
  nestedExtensions(): MarkupExtension[] {
    const nested: MarkupExtension[] = [];
    if (this.#positional instanceof MarkupExtension) nested.push(this.#positional);
    for (const value of this.#parameters.values()) {
      if (value instanceof MarkupExtension) nested.push(value);
    }
    return nested;
  }

  get payload(): ExtensionPayload | null {
    const kind = EXTENSION_PAYLOAD_KINDS.get(this.name);
    switch (kind) {
      case "binding":
        return this.#bindingPayload();
      case "resource":
        return {
          kind,
          resourceKey: this.#textArgument("ResourceKey"),
          isDynamic: this.name === "DynamicResource",
        };
      case "type":
        return { kind, typeName: this.#textArgument("TypeName") };
      case "static": {
        const memberPath = this.#textArgument("Member");
        const dot = memberPath?.lastIndexOf(".") ?? -1;
        return {
          kind,
          memberPath,
          ownerType: memberPath !== null && dot > 0 ? memberPath.slice(0, dot) : null,
          memberName: memberPath !== null ? memberPath.slice(dot + 1) : null,
        };
      }
      case undefined:
        return null;
    }
  }

  /** Canonical text: `{Name positional, Key=Value, ...}`. */
  format(): string {
    const parts: string[] = [];
    if (this.#positional !== null) parts.push(formatExtensionValue(this.#positional));
    for (const [key, value] of this.#parameters) parts.push(`${key}=${formatExtensionValue(value)}`);
    return parts.length === 0 ? `{${this.name}}` : `{${this.name} ${parts.join(", ")}}`;
  }

  clone(): MarkupExtension {
    const copy = new MarkupExtension(
      this.name,
      cloneExtensionValue(this.#positional),
      [...this.#parameters].map(([key, value]) => [key, cloneExtensionValue(value)] as const),
    );
    copy.resolvedType = this.resolvedType;
    copy.location = this.location ? { ...this.location } : null;
    return copy;
  }

  #bindingPayload(): BindingPayload {
    const isTemplate = this.name === "TemplateBinding";
    return {
      kind: "binding",
      path: this.#textArgument(isTemplate ? "Property" : "Path"),
      mode: this.#text("Mode"),
      elementName: this.#text("ElementName"),
      source: this.getParameter("Source"),
      relativeSource: this.getParameter("RelativeSource"),
      converter: this.getParameter("Converter"),
      converterParameter: this.getParameter("ConverterParameter"),
      stringFormat: this.#text("StringFormat"),
      updateSourceTrigger: this.#text("UpdateSourceTrigger"),
      fallbackValue: this.getParameter("FallbackValue"),
      targetNullValue: this.getParameter("TargetNullValue"),
    };
  }

  /** Positional argument, or the named parameter standing in for it. */
  #textArgument(key: string): string | null {
    const value = this.#positional ?? this.getParameter(key);
    return typeof value === "string" ? unquoteExtensionValue(value) : null;
  }

  #text(key: string): string | null {
    const value = this.getParameter(key);
    return typeof value === "string" ? unquoteExtensionValue(value) : null;
  }
}

export function formatExtensionValue(value: ExtensionValue): string {
  return typeof value === "string" ? value : value.format();
}

function cloneExtensionValue(value: ExtensionValue): ExtensionValue;
function cloneExtensionValue(value: ExtensionValue | null): ExtensionValue | null;
function cloneExtensionValue(value: ExtensionValue | null): ExtensionValue | null {
  return value instanceof MarkupExtension ? value.clone() : value;
}

/** Strip surrounding quotes and backslash escapes from an argument as written. */
export function unquoteExtensionValue(raw: string): string {
  const first = raw[0];
  const quoted = raw.length >= 2 && (first === "'" || first === '"') && raw[raw.length - 1] === first;
  const body = quoted ? raw.slice(1, -1) : raw;
  return body.replace(/\\(.)/g, "$1");
}

/** Quote text for use as an argument when it contains characters the parser treats specially. */
export function quoteExtensionValue(text: string): string {
  if (!/[{},='"\\]/.test(text) && text.trim() === text) return text;
  return `'${text.replace(/['\\]/g, "\\$&")}'`;
}
