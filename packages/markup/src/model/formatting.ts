/**
 * Source fragments recorded next to a node so the writer can re-emit it
 * byte for byte. Hints with `rawText === null` were not recorded from source
 * (synthesized node or failed extraction).
 */
export interface FormattingHints {
  /** Whitespace before the node, collapsed to its final line break. */
  leadingWhitespace: string;
  /** Whitespace after the node, verbatim. */
  trailingWhitespace: string;
  /** Whitespace between the open tag and the first content. */
  innerWhitespace: string;
  /** Whitespace before the close tag. */
  closingWhitespace: string;
  /** Whitespace between the last attribute and `>` or `/>`. */
  tagEndWhitespace: string;
  /** Whitespace between the close tag's name and `>`. */
  closeTagWhitespace: string;
  /** Leading whitespace contains a line break. */
  preserveLineBreak: boolean;
  selfClosing: boolean;
  /** Raw outer text at parse time. */
  rawText: string | null;
  attribute: AttributeSyntax | null;
  /** Text runs of mixed content, in document order. */
  textRuns: TextRun[];
  /**
   * Canonical form of the node's value when it was parsed. The writer emits
   * raw source only while the current value still has this form.
   */
  originalValue: string | null;
}

/** How an attribute was spelled. */
export interface AttributeSyntax {
  /** Everything between the name and the opening quote, e.g. `=` or ` = `. */
  equals: string;
  quote: '"' | "'";
  /** Value between the quotes, entities still encoded. */
  rawValue: string;
}

export interface TextRun {
  /** Position in the parent's content sequence; shared counter with nodes. */
  order: number;
  raw: string;
  value: string;
}

export function emptyFormatting(): FormattingHints {
  return {
    leadingWhitespace: "",
    trailingWhitespace: "",
    innerWhitespace: "",
    closingWhitespace: "",
    tagEndWhitespace: "",
    closeTagWhitespace: "",
    preserveLineBreak: false,
    selfClosing: false,
    rawText: null,
    attribute: null,
    textRuns: [],
    originalValue: null,
  };
}

export function cloneFormatting(hints: FormattingHints): FormattingHints {
  return {
    ...hints,
    attribute: hints.attribute ? { ...hints.attribute } : null,
    textRuns: hints.textRuns.map((run) => ({ ...run })),
  };
}

export function isRecorded(hints: FormattingHints): boolean {
  return hints.rawText !== null;
}
