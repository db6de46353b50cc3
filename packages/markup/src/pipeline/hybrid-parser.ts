import { DiagnosticCollector } from "../diagnostics/collector.js";
import type { UnifiedDocument } from "../model/ast.js";
import { convertStructure } from "../parsing/structural-converter.js";
import { readStructure, type XmlDocumentNode } from "../parsing/structural-reader.js";
import { SemanticConverter } from "../semantic/semantic-converter.js";
import { XmldomSemanticReader, type SemanticDocument, type SemanticReader } from "../semantic/semantic-reader.js";
import { loadPresentationTypeCatalog, type TypeSystem } from "../semantic/type-system.js";
import { debug } from "../shared/debug.js";
import { StructuralParseError } from "../shared/errors.js";
import { NOOP_LOGGER, type Logger } from "../shared/logger.js";

export type HybridParserState =
  | "idle"
  | "structural-parsing"
  | "semantic-parsing"
  | "merging"
  | "done"
  | "structural-only";

export interface HybridParserOptions {
  logger?: Logger;
  /** Defaults to the bundled WPF presentation catalog. */
  typeSystem?: TypeSystem;
  /** Defaults to the xmldom reader over `typeSystem`. */
  semanticReader?: SemanticReader;
  /** Skip the type-resolving parse entirely. */
  structuralOnly?: boolean;
  diagnostics?: DiagnosticCollector;
}

export interface ParseInput {
  source: string;
  filePath?: string | null;
}

export interface HybridParseResult {
  /** Null when the structural parse failed. */
  document: UnifiedDocument | null;
  state: HybridParserState;
  diagnostics: DiagnosticCollector;
}

/**
 * Orchestrates the structural parse, the type-resolving parse and their merge.
 *
 * A structural failure is fatal for the document (null result plus an Error
 * diagnostic). A failure in the semantic parse or the merge degrades to a
 * structural-only tree with a Warning.
 */
export class HybridParser {
  #state: HybridParserState = "idle";
  readonly #logger: Logger;
  readonly #typeSystem: TypeSystem;
  readonly #semanticReader: SemanticReader;
  readonly #structuralOnly: boolean;
  readonly diagnostics: DiagnosticCollector;

  constructor(options: HybridParserOptions = {}) {
    this.#logger = options.logger ?? NOOP_LOGGER;
    this.#typeSystem = options.typeSystem ?? loadPresentationTypeCatalog();
    this.#semanticReader = options.semanticReader ?? new XmldomSemanticReader(this.#typeSystem);
    this.#structuralOnly = options.structuralOnly ?? false;
    this.diagnostics = options.diagnostics ?? new DiagnosticCollector();
  }

  /** State reached by the most recent parse. */
  get state(): HybridParserState {
    return this.#state;
  }

  parse(source: string, filePath: string | null = null): UnifiedDocument | null {
    return this.#run({ source, filePath }, this.diagnostics).document;
  }

  /** Parse with a dedicated collector; the parser's own collector is left untouched. */
  parseDetailed(input: ParseInput): HybridParseResult {
    return this.#run(input, new DiagnosticCollector(input.filePath ?? null));
  }

  /**
   * Independent parses of several documents. Each gets its own collector;
   * they are merged into the parser's collector afterwards, in input order.
   */
  parseGroup(inputs: readonly ParseInput[]): HybridParseResult[] {
    const results = inputs.map((input) => this.parseDetailed(input));
    for (const result of results) this.diagnostics.merge(result.diagnostics);
    debug.parse("hybrid.group", {
      documents: inputs.length,
      failed: results.filter((result) => result.document === null).length,
    });
    return results;
  }

  #run(input: ParseInput, diagnostics: DiagnosticCollector): HybridParseResult {
    const filePath = input.filePath ?? null;
    const label = filePath ?? "<input>";
    this.#state = "structural-parsing";

    let tree: XmlDocumentNode;
    let document: UnifiedDocument;
    try {
      tree = readStructure(input.source);
      document = convertStructure(tree, { filePath, diagnostics, typeSystem: this.#typeSystem });
    } catch (error) {
      if (error instanceof StructuralParseError) {
        diagnostics.emit("xamlshift/malformed-markup", {
          message: error.message,
          location: error.line !== null && error.column !== null ? { line: error.line, column: error.column } : null,
          filePath,
        });
        this.#logger.error(`${label}: ${error.message}`);
      } else {
        const reason = describeError(error);
        diagnostics.emit("xamlshift/structure-conversion-failed", {
          message: `building the document failed: ${reason}`,
          filePath,
        });
        this.#logger.error(`${label}: building the document failed: ${reason}`);
      }
      this.#state = "idle";
      return { document: null, state: "idle", diagnostics };
    }

    if (this.#structuralOnly) return this.#finish(document, "structural-only", diagnostics);

    this.#state = "semantic-parsing";
    let graph: SemanticDocument;
    try {
      graph = this.#semanticReader.read(input.source, filePath);
    } catch (error) {
      const reason = describeError(error);
      diagnostics.emit("xamlshift/semantic-parse-failed", {
        message: `type-resolving parse failed, continuing without resolved types: ${reason}`,
        filePath,
      });
      this.#logger.warn(`${label}: semantic parse failed: ${reason}`);
      return this.#finish(document, "structural-only", diagnostics);
    }

    this.#state = "merging";
    // Findings are staged until the merge completes.
    const staged = new DiagnosticCollector();
    try {
      new SemanticConverter({ diagnostics: staged }).enrich(document, graph);
    } catch (error) {
      const reason = describeError(error);
      diagnostics.emit("xamlshift/merge-failed", {
        message: `attaching resolved types failed, continuing without them: ${reason}`,
        filePath,
      });
      this.#logger.warn(`${label}: merge failed: ${reason}`);
      // Enrichment works in place, so the tree is lowered again from the structural read.
      const fresh = convertStructure(tree, {
        filePath,
        diagnostics: new DiagnosticCollector(),
        typeSystem: this.#typeSystem,
      });
      return this.#finish(fresh, "structural-only", diagnostics);
    }
    diagnostics.merge(staged);
    return this.#finish(document, "done", diagnostics);
  }

  #finish(document: UnifiedDocument, state: HybridParserState, diagnostics: DiagnosticCollector): HybridParseResult {
    this.#state = state;
    debug.parse("hybrid.finished", { state, file: document.filePath, diagnostics: diagnostics.count });
    return { document, state, diagnostics };
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
