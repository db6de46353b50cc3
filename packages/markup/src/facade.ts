// Mapping imports
import { loadDefaultMappings, type MappingRepository } from "@xamlshift/mappings";

// Companion imports
import { validateCompanionLinkage, type CompanionOracle } from "./companion/linkage.js";

// Diagnostics imports
import { DiagnosticCollector } from "./diagnostics/collector.js";

// Model imports
import type { UnifiedDocument } from "./model/ast.js";

// Pipeline imports
import { HybridParser, type HybridParserOptions, type HybridParserState } from "./pipeline/hybrid-parser.js";

// Serialization imports
import type { SerializationOptions } from "./serialization/options.js";
import { serializeToText } from "./serialization/writer.js";

// Shared imports
import { debug } from "./shared/debug.js";
import { NOOP_LOGGER, type Logger } from "./shared/logger.js";

// Transform imports
import { TransformationContext } from "./transform/context.js";
import { RuleEngine } from "./transform/engine.js";
import { createDefaultRules } from "./transform/rules/index.js";
import type { TransformationRecord, TransformationRule } from "./transform/types.js";

export interface ConversionOptions {
  filePath?: string | null;
  /** Defaults to the bundled mapping database. */
  mappings?: MappingRepository;
  /** Defaults to {@link createDefaultRules}. */
  rules?: Iterable<TransformationRule>;
  /** Type system, semantic reader and structural-only switch for the parser. */
  parser?: Omit<HybridParserOptions, "diagnostics" | "logger">;
  /** Companion-code check runs only when an oracle is given. */
  companion?: CompanionOracle | null;
  serialization?: Partial<SerializationOptions>;
  logger?: Logger;
}

export interface ConversionResult {
  /** The structural parse succeeded; diagnostics may still ask for review. */
  success: boolean;
  /** Converted text; null when there was no document to write. */
  output: string | null;
  document: UnifiedDocument | null;
  parserState: HybridParserState;
  diagnostics: DiagnosticCollector;
  trace: readonly TransformationRecord[];
}

/**
 * Parse, check, rewrite and write one markup document.
 *
 * Every stage reports into one collector. Only a structural parse failure
 * stops the run; a later stage that throws is reported and skipped.
 */
export function convertMarkup(source: string, options: ConversionOptions = {}): ConversionResult {
  const filePath = options.filePath ?? null;
  const logger = options.logger ?? NOOP_LOGGER;
  const diagnostics = new DiagnosticCollector(filePath);

  const parser = new HybridParser({ ...options.parser, diagnostics, logger });
  const document = parser.parse(source, filePath);
  if (document === null) {
    debug.convert("convert.failed", { file: filePath, state: parser.state });
    return { success: false, output: null, document, parserState: parser.state, diagnostics, trace: [] };
  }

  if (options.companion) {
    try {
      validateCompanionLinkage(document, options.companion, diagnostics);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      diagnostics.emit("xamlshift/companion-check-failed", {
        message: `companion lookup failed: ${reason}`,
        filePath,
      });
      logger.warn(`${filePath ?? "<input>"}: companion lookup failed: ${reason}`);
    }
  }

  const engine = new RuleEngine(options.rules ?? createDefaultRules());
  const context = new TransformationContext(document, options.mappings ?? loadDefaultMappings(), diagnostics);
  engine.transform(document, context);

  const output = serializeToText(document, options.serialization, diagnostics);
  logger.info(
    `${filePath ?? "<input>"}: ${context.trace.length} transformation(s), ` +
      `${diagnostics.errors.length} error(s), ${diagnostics.warnings.length} warning(s)`,
  );
  debug.convert("convert.finished", {
    file: filePath,
    state: parser.state,
    applied: context.trace.length,
    diagnostics: diagnostics.count,
  });
  return { success: true, output, document, parserState: parser.state, diagnostics, trace: context.trace };
}
