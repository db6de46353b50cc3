/* =============================================================================
 * PARSE ERRORS
 * ============================================================================= */

/**
 * Source text is not well-formed markup. Line and column are 1-based when known.
 */
export class StructuralParseError extends Error {
  constructor(
    message: string,
    public readonly code: ParseErrorCodeType,
    public readonly line: number | null = null,
    public readonly column: number | null = null,
  ) {
    super(message);
    this.name = "StructuralParseError";
  }
}

/**
 * The type-resolving parse could not build its object graph.
 */
export class SemanticParseError extends Error {
  constructor(
    message: string,
    public readonly code: ParseErrorCodeType,
    public readonly line: number | null = null,
    public readonly column: number | null = null,
  ) {
    super(message);
    this.name = "SemanticParseError";
  }
}

/** Error codes */
export const ParseErrorCode = {
  MALFORMED: "PARSE_MALFORMED",
  NO_ROOT: "PARSE_NO_ROOT",
  SEMANTIC_FAILED: "PARSE_SEMANTIC_FAILED",
} as const;

export type ParseErrorCodeType = (typeof ParseErrorCode)[keyof typeof ParseErrorCode];

/**
 * A `{...}` value that does not follow markup-extension syntax. `offset` is
 * relative to the start of the value.
 */
export class MarkupExtensionSyntaxError extends Error {
  constructor(
    message: string,
    public readonly offset: number,
  ) {
    super(message);
    this.name = "MarkupExtensionSyntaxError";
  }
}

/**
 * The bundled (or a caller-provided) type catalog could not be loaded.
 */
export class TypeCatalogError extends Error {
  constructor(
    message: string,
    public readonly file?: string,
  ) {
    super(message);
    this.name = "TypeCatalogError";
  }
}
