import { MarkupExtension, type ExtensionValue } from "../model/markup-extension.js";
import { MarkupExtensionSyntaxError } from "../shared/errors.js";

export type MarkupExtensionParseResult =
  | { readonly ok: true; readonly extension: MarkupExtension }
  | { readonly ok: false; readonly message: string; readonly offset: number };

/** `{Name ...}` that is not escaped with a leading `{}`. */
export function isMarkupExtensionSyntax(value: string): boolean {
  return value.startsWith("{") && !value.startsWith("{}");
}

/**
 * Parse a markup-extension attribute value.
 *
 * Arguments are split on commas at brace depth zero outside quotes. A value
 * starting with `{` (but not `{}`) is a nested extension; quoted values keep
 * their braces literal, so `{Binding StringFormat='{0}'}` has a single
 * `StringFormat` parameter whose value is `'{0}'`.
 */
export function parseMarkupExtension(text: string): MarkupExtensionParseResult {
  try {
    const parser = new ExtensionParser(text);
    const extension = parser.parseExtension();
    parser.skipWhitespace();
    if (!parser.atEnd) parser.fail("unexpected text after closing '}'");
    return { ok: true, extension };
  } catch (error) {
    if (error instanceof MarkupExtensionSyntaxError) {
      return { ok: false, message: error.message, offset: error.offset };
    }
    throw error;
  }
}

/* ---------- Recursive descent ---------- */

const NAME_PATTERN = /^[A-Za-z_][\w.]*(:[A-Za-z_][\w.]*)?$/;

class ExtensionParser {
  #pos = 0;

  constructor(readonly text: string) {}

  get atEnd(): boolean {
    return this.#pos >= this.text.length;
  }

  fail(message: string): never {
    throw new MarkupExtensionSyntaxError(message, this.#pos);
  }

  skipWhitespace(): void {
    while (!this.atEnd && /\s/.test(this.#peek())) this.#pos += 1;
  }

  parseExtension(): MarkupExtension {
    this.#expect("{");
    this.skipWhitespace();
    const nameStart = this.#pos;
    while (!this.atEnd && !/[\s,}]/.test(this.#peek())) this.#pos += 1;
    const name = this.text.slice(nameStart, this.#pos);
    if (!NAME_PATTERN.test(name)) this.fail(name ? `invalid extension name '${name}'` : "missing extension name");

    const extension = new MarkupExtension(name);
    this.skipWhitespace();
    let first = true;
    while (this.#peek() !== "}") {
      if (this.atEnd) this.fail("missing closing '}'");
      if (!first) {
        this.#expect(",");
        this.skipWhitespace();
      }
      this.#parseArgument(extension);
      this.skipWhitespace();
      first = false;
    }
    this.#expect("}");
    return extension;
  }

  #parseArgument(extension: MarkupExtension): void {
    if (this.#startsNested()) {
      this.#setPositional(extension, this.parseExtension());
      return;
    }

    const start = this.#pos;
    const raw = this.#scanRaw(true);
    if (this.#peek() !== "=") {
      if (!raw) this.fail("empty argument");
      this.#setPositional(extension, raw);
      return;
    }

    const key = raw;
    if (!/^[A-Za-z_][\w.:]*$/.test(key)) {
      this.#pos = start;
      this.fail(`invalid parameter name '${key}'`);
    }
    this.#pos += 1; // =
    this.skipWhitespace();
    const value: ExtensionValue = this.#startsNested() ? this.parseExtension() : this.#scanRaw(false);
    if (extension.parameters.has(key)) this.fail(`duplicate parameter '${key}'`);
    extension.setParameter(key, value);
  }

  #setPositional(extension: MarkupExtension, value: ExtensionValue): void {
    if (extension.positional !== null) this.fail("more than one positional argument");
    extension.positional = value;
  }

  #startsNested(): boolean {
    return this.#peek() === "{" && this.text[this.#pos + 1] !== "}";
  }

  /**
   * Text up to the next `,` or `}` at depth zero (and `=` when reading a
   * possible key). Quoted segments and escapes are kept as written; the
   * result is trimmed.
   */
  #scanRaw(stopAtEquals: boolean): string {
    const start = this.#pos;
    let depth = 0;
    while (!this.atEnd) {
      const ch = this.#peek();
      if (ch === "\\") {
        this.#pos += 2;
        continue;
      }
      if (ch === "'" || ch === '"') {
        this.#skipQuoted(ch);
        continue;
      }
      if (ch === "{") depth += 1;
      else if (ch === "}") {
        if (depth === 0) break;
        depth -= 1;
      } else if (depth === 0 && (ch === "," || (stopAtEquals && ch === "="))) break;
      this.#pos += 1;
    }
    if (this.#pos > this.text.length) this.fail("dangling escape");
    return this.text.slice(start, this.#pos).trim();
  }

  #skipQuoted(quote: string): void {
    const open = this.#pos;
    this.#pos += 1;
    while (!this.atEnd && this.#peek() !== quote) {
      this.#pos += this.#peek() === "\\" ? 2 : 1;
    }
    if (this.atEnd) {
      this.#pos = open;
      this.fail("unterminated quoted value");
    }
    this.#pos += 1;
  }

  #expect(ch: string): void {
    if (this.#peek() !== ch) this.fail(this.atEnd ? `expected '${ch}' but reached the end` : `expected '${ch}'`);
    this.#pos += 1;
  }

  #peek(): string {
    return this.text[this.#pos] ?? "";
  }
}
