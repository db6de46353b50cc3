import * as sax from "sax";

import { PositionIndex } from "../model/text.js";
import { debug } from "../shared/debug.js";
import { ParseErrorCode, StructuralParseError } from "../shared/errors.js";

/* =============================================================================
 * GENERIC TREE
 * ============================================================================= */

export interface XmlAttributeNode {
  /** Qualified name as written. */
  readonly name: string;
  readonly prefix: string;
  readonly local: string;
  readonly uri: string;
  /** Decoded value. */
  readonly value: string;
}

export interface XmlElementNode {
  readonly kind: "element";
  readonly name: string;
  readonly prefix: string;
  readonly local: string;
  readonly uri: string;
  readonly attributes: XmlAttributeNode[];
  readonly children: XmlContentNode[];
  readonly selfClosing: boolean;
  /** 1-based; the column is the tag name's first character. */
  readonly line: number;
  readonly column: number;
  /** Offset of `<`. */
  readonly start: number;
  /** Offset just past the open tag's `>`. */
  openTagEnd: number;
  /** Offset of `</`, null when self-closing. */
  closeTagStart: number | null;
  /** Offset just past the element. */
  end: number;
}

export interface XmlTextNode {
  readonly kind: "text";
  readonly value: string;
  readonly raw: string;
  readonly start: number;
  readonly end: number;
}

export interface XmlCommentNode {
  readonly kind: "comment";
  readonly text: string;
  readonly start: number;
  readonly end: number;
  readonly line: number;
  readonly column: number;
}

export type XmlContentNode = XmlElementNode | XmlTextNode | XmlCommentNode;

export interface XmlDeclarationNode {
  readonly raw: string;
  readonly version: string | null;
  readonly encoding: string | null;
  readonly standalone: string | null;
  readonly end: number;
}

export interface DroppedNode {
  readonly kind: "doctype" | "processing-instruction";
  readonly line: number;
  readonly column: number;
}

export interface XmlDocumentNode {
  readonly source: string;
  readonly index: PositionIndex;
  readonly declaration: XmlDeclarationNode | null;
  readonly hasByteOrderMark: boolean;
  readonly prolog: XmlCommentNode[];
  readonly root: XmlElementNode;
  readonly epilogue: XmlCommentNode[];
  readonly dropped: DroppedNode[];
}

/* =============================================================================
 * READER
 * ============================================================================= */

type MutableElement = XmlElementNode;

function isQualifiedTag(tag: sax.Tag | sax.QualifiedTag): tag is sax.QualifiedTag {
  return "uri" in tag;
}

/**
 * Parse source text into the generic tree with exact offsets.
 *
 * Uses sax in strict, namespace-aware mode, so element and attribute names
 * keep their case and prefixes resolve to URIs. Throws
 * {@link StructuralParseError} on malformed input.
 */
export function readStructure(source: string): XmlDocumentNode {
  const index = new PositionIndex(source);
  const parser = sax.parser(true, { xmlns: true, position: true, trim: false, normalize: false });

  const stack: MutableElement[] = [];
  const prolog: XmlCommentNode[] = [];
  const epilogue: XmlCommentNode[] = [];
  const dropped: DroppedNode[] = [];
  // Assigned from parser callbacks, so kept in an object rather than narrowed locals.
  const state: { root: MutableElement | null; declaration: XmlDeclarationNode | null } = {
    root: null,
    declaration: null,
  };

  // End of the last token; text runs span from here to the next token.
  let cursor = source.charCodeAt(0) === 0xfeff ? 1 : 0;
  let pendingText: string | null = null;

  const tokenStart = (): number => parser.startTagPosition - 1;

  const flushText = (end: number): void => {
    const parent = stack[stack.length - 1];
    if (pendingText !== null && parent) {
      parent.children.push({ kind: "text", value: pendingText, raw: source.slice(cursor, end), start: cursor, end });
    }
    pendingText = null;
  };

  const appendText = (text: string): void => {
    pendingText = (pendingText ?? "") + text;
  };

  parser.onerror = (error: Error) => {
    const message = error.message.split("\n")[0] ?? error.message;
    throw new StructuralParseError(message, ParseErrorCode.MALFORMED, parser.line + 1, parser.column + 1);
  };

  parser.ontext = appendText;
  parser.oncdata = appendText;

  parser.onopentag = (tag) => {
    const start = tokenStart();
    flushText(start);
    if (!isQualifiedTag(tag)) {
      throw new StructuralParseError("namespace information missing", ParseErrorCode.MALFORMED);
    }
    const location = index.locationAt(start + 1);
    const element: MutableElement = {
      kind: "element",
      name: tag.name,
      prefix: tag.prefix,
      local: tag.local,
      uri: tag.uri,
      attributes: Object.values(tag.attributes).map((attr) => ({
        name: attr.name,
        prefix: attr.prefix,
        local: attr.local,
        uri: attr.uri,
        value: attr.value,
      })),
      children: [],
      selfClosing: tag.isSelfClosing,
      line: location.line,
      column: location.column,
      start,
      openTagEnd: parser.position,
      closeTagStart: null,
      end: parser.position,
    };
    const parent = stack[stack.length - 1];
    if (parent) parent.children.push(element);
    else state.root = element;
    stack.push(element);
    cursor = parser.position;
  };

  parser.onclosetag = () => {
    const element = stack[stack.length - 1];
    if (!element) return;
    if (!element.selfClosing) {
      const start = tokenStart();
      flushText(start);
      element.closeTagStart = start;
    }
    stack.pop();
    element.end = parser.position;
    cursor = parser.position;
  };

  // sax reports a comment on its closing `--`, one character before `>`.
  parser.oncomment = (text: string) => {
    const start = tokenStart();
    flushText(start);
    const location = index.locationAt(start);
    const end = parser.position + 1;
    const comment: XmlCommentNode = {
      kind: "comment",
      text,
      start,
      end,
      line: location.line,
      column: location.column,
    };
    const parent = stack[stack.length - 1];
    if (parent) parent.children.push(comment);
    else if (state.root === null) prolog.push(comment);
    else epilogue.push(comment);
    cursor = end;
  };

  parser.onprocessinginstruction = (node: { name: string; body: string }) => {
    const start = tokenStart();
    flushText(start);
    if (node.name === "xml" && state.root === null && state.declaration === null) {
      state.declaration = {
        raw: source.slice(start, parser.position),
        version: pseudoAttribute(node.body, "version"),
        encoding: pseudoAttribute(node.body, "encoding"),
        standalone: pseudoAttribute(node.body, "standalone"),
        end: parser.position,
      };
    } else {
      dropped.push({ kind: "processing-instruction", ...index.locationAt(start) });
    }
    cursor = parser.position;
  };

  parser.ondoctype = () => {
    dropped.push({ kind: "doctype", ...index.locationAt(tokenStart()) });
    pendingText = null;
    cursor = parser.position;
  };

  try {
    parser.write(source).close();
  } catch (error) {
    if (error instanceof StructuralParseError) {
      debug.parse("structural.failed", { message: error.message, line: error.line, column: error.column });
      throw error;
    }
    const message = error instanceof Error ? error.message.split("\n")[0] ?? error.message : String(error);
    throw new StructuralParseError(message, ParseErrorCode.MALFORMED, parser.line + 1, parser.column + 1);
  }

  const finished = state.root;
  if (finished === null) {
    throw new StructuralParseError("document has no root element", ParseErrorCode.NO_ROOT, 1, 1);
  }

  debug.parse("structural.read", { root: finished.name, length: source.length });
  return {
    source,
    index,
    declaration: state.declaration,
    hasByteOrderMark: source.charCodeAt(0) === 0xfeff,
    prolog,
    root: finished,
    epilogue,
    dropped,
  };
}

function pseudoAttribute(body: string, name: string): string | null {
  const match = new RegExp(`${name}\\s*=\\s*(["'])(.*?)\\1`).exec(body);
  return match?.[2] ?? null;
}
