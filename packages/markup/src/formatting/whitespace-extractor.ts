import { emptyFormatting, type AttributeSyntax, type FormattingHints } from "../model/formatting.js";
import { PositionIndex } from "../model/text.js";
import type { XmlAttributeNode, XmlCommentNode, XmlElementNode } from "../parsing/structural-reader.js";
import { debug } from "../shared/debug.js";

export function isXmlWhitespace(ch: string | undefined): boolean {
  return ch === " " || ch === "\t" || ch === "\r" || ch === "\n";
}

export function containsLineBreak(text: string): boolean {
  return text.includes("\n") || text.includes("\r");
}

/**
 * Keep only the final line break and the indentation after it.
 * Runs without a line break are returned as they are.
 */
export function normalizeLeadingWhitespace(whitespace: string): string {
  const lastBreak = Math.max(whitespace.lastIndexOf("\n"), whitespace.lastIndexOf("\r"));
  if (lastBreak < 0) return whitespace;
  const breakStart = whitespace[lastBreak] === "\n" && whitespace[lastBreak - 1] === "\r" ? lastBreak - 1 : lastBreak;
  return whitespace.slice(breakStart);
}

export interface AttributeWhitespace {
  whitespace: string;
  preserveLineBreak: boolean;
}

interface AttributeMatch {
  /** Offset of the attribute name inside the opening tag. */
  nameStart: number;
  leading: string;
  equals: string;
  quote: '"' | "'";
  rawValue: string;
}

/**
 * Recovers whitespace and spelling around structural nodes from the raw
 * text alone. Every method returns empty hints instead of throwing.
 */
export class WhitespaceExtractor {
  readonly index: PositionIndex;

  constructor(
    readonly source: string,
    index?: PositionIndex,
  ) {
    this.index = index ?? new PositionIndex(source);
  }

  /** Whitespace before `pos`, normalized to its final line break. */
  leadingWhitespace(pos: number): string {
    let start = pos;
    while (start > 0 && isXmlWhitespace(this.source[start - 1])) start -= 1;
    return normalizeLeadingWhitespace(this.source.slice(start, pos));
  }

  /** Whitespace from `pos` on, verbatim. */
  trailingWhitespace(pos: number): string {
    let end = pos;
    while (end < this.source.length && isXmlWhitespace(this.source[end])) end += 1;
    return this.source.slice(pos, end);
  }

  attributeLeadingWhitespace(attributeName: string, parentElement: XmlElementNode): AttributeWhitespace {
    try {
      const match = this.#findAttribute(attributeName, parentElement);
      if (!match) return { whitespace: "", preserveLineBreak: false };
      return { whitespace: match.leading, preserveLineBreak: containsLineBreak(match.leading) };
    } catch (error) {
      this.#failed("attribute-leading", error);
      return { whitespace: "", preserveLineBreak: false };
    }
  }

  /** Absolute offset of the attribute's name, or null when it cannot be located. */
  attributeOffset(attributeName: string, parentElement: XmlElementNode): number | null {
    try {
      const match = this.#findAttribute(attributeName, parentElement);
      return match ? this.tagStart(parentElement) + match.nameStart : null;
    } catch (error) {
      this.#failed("attribute-offset", error);
      return null;
    }
  }

  /**
   * Offset of the element's `<`, mapped back from its tag-name location.
   * Falls back to the reader's own offset when the two disagree.
   */
  tagStart(element: XmlElementNode): number {
    const offset = this.index.characterPosition(element.line, element.column);
    return this.source[offset] === "<" ? offset : element.start;
  }

  elementFormatting(element: XmlElementNode): FormattingHints {
    try {
      const start = this.tagStart(element);
      const hints = emptyFormatting();
      hints.leadingWhitespace = this.leadingWhitespace(start);
      hints.trailingWhitespace = this.trailingWhitespace(element.end);
      hints.preserveLineBreak = containsLineBreak(hints.leadingWhitespace);
      hints.selfClosing = element.selfClosing;
      hints.tagEndWhitespace = this.#tagEndWhitespace(element, start);
      if (element.closeTagStart !== null) {
        hints.innerWhitespace = this.trailingWhitespace(element.openTagEnd);
        hints.closingWhitespace = this.leadingWhitespace(element.closeTagStart);
        hints.closeTagWhitespace = this.#closeTagWhitespace(element, element.closeTagStart);
      }
      hints.rawText = this.source.slice(start, element.end);
      return hints;
    } catch (error) {
      this.#failed("element", error);
      return emptyFormatting();
    }
  }

  attributeFormatting(attribute: XmlAttributeNode, element: XmlElementNode): FormattingHints {
    try {
      const match = this.#findAttribute(attribute.name, element);
      if (!match) return emptyFormatting();
      const hints = emptyFormatting();
      const syntax: AttributeSyntax = { equals: match.equals, quote: match.quote, rawValue: match.rawValue };
      hints.leadingWhitespace = match.leading;
      hints.preserveLineBreak = containsLineBreak(match.leading);
      hints.attribute = syntax;
      hints.rawText = `${attribute.name}${syntax.equals}${syntax.quote}${syntax.rawValue}${syntax.quote}`;
      return hints;
    } catch (error) {
      this.#failed("attribute", error);
      return emptyFormatting();
    }
  }

  commentFormatting(comment: XmlCommentNode): FormattingHints {
    try {
      const hints = emptyFormatting();
      hints.leadingWhitespace = this.leadingWhitespace(comment.start);
      hints.trailingWhitespace = this.trailingWhitespace(comment.end);
      hints.preserveLineBreak = containsLineBreak(hints.leadingWhitespace);
      hints.rawText = this.source.slice(comment.start, comment.end);
      return hints;
    } catch (error) {
      this.#failed("comment", error);
      return emptyFormatting();
    }
  }

  #openTag(element: XmlElementNode): string {
    return this.source.slice(this.tagStart(element), element.openTagEnd);
  }

  #findAttribute(attributeName: string, element: XmlElementNode): AttributeMatch | null {
    const tag = this.#openTag(element);
    // Quoted values are blanked so a name inside another attribute's value never matches.
    const masked = tag.replace(/(["'])[^]*?\1/g, (quoted) => `${quoted[0]}${"#".repeat(quoted.length - 2)}${quoted[0]}`);
    const pattern = new RegExp(`(^|[ \\t\\r\\n])(${escapeRegExp(attributeName)})([ \\t\\r\\n]*=[ \\t\\r\\n]*)(["'])`);
    const match = pattern.exec(masked);
    if (!match) return null;

    const separator = match[1] ?? "";
    const equals = match[3] ?? "";
    const quote = match[4] === "'" ? "'" : '"';
    const nameStart = match.index + separator.length;
    const valueStart = nameStart + attributeName.length + equals.length + 1;
    const valueEnd = tag.indexOf(quote, valueStart);
    if (valueEnd < 0) return null;

    let leadingStart = nameStart;
    while (leadingStart > 0 && isXmlWhitespace(tag[leadingStart - 1])) leadingStart -= 1;

    return {
      nameStart,
      leading: tag.slice(leadingStart, nameStart),
      equals,
      quote,
      rawValue: tag.slice(valueStart, valueEnd),
    };
  }

  #tagEndWhitespace(element: XmlElementNode, tagStart: number): string {
    let end = element.openTagEnd - 1; // at `>`
    if (element.selfClosing && this.source[end - 1] === "/") end -= 1;
    let start = end;
    while (start > tagStart && isXmlWhitespace(this.source[start - 1])) start -= 1;
    return this.source.slice(start, end);
  }

  #closeTagWhitespace(element: XmlElementNode, closeTagStart: number): string {
    const end = element.end - 1; // at `>`
    let start = end;
    while (start > closeTagStart && isXmlWhitespace(this.source[start - 1])) start -= 1;
    return this.source.slice(start, end);
  }

  #failed(kind: string, error: unknown): void {
    debug.parse("whitespace.failed", { kind, message: error instanceof Error ? error.message : String(error) });
  }
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
