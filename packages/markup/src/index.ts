// Markup package public API
//
// Parse WPF markup into the Unified tree, rewrite it with rules and write it
// back out. Import from here rather than deep paths.

// === Facade ===
export { convertMarkup } from "./facade.js";
export type { ConversionOptions, ConversionResult } from "./facade.js";

// === Model ===
export {
  UnifiedComment,
  UnifiedDocument,
  UnifiedElement,
  UnifiedProperty,
  type CompanionLink,
  type DirectiveValue,
  type DocumentMetadata,
  type NamespaceDeclaration,
  type NodeDiagnostic,
  type PropertyKind,
  type PropertyValue,
  type UnifiedNode,
  type XmlDeclaration,
} from "./model/ast.js";
export {
  MarkupExtension,
  EXTENSION_PAYLOAD_KINDS,
  formatExtensionValue,
  quoteExtensionValue,
  unquoteExtensionValue,
  type BindingPayload,
  type ExtensionPayload,
  type ExtensionValue,
  type ResourcePayload,
  type StaticMemberPayload,
  type TypeReferencePayload,
} from "./model/markup-extension.js";
export { cloneFormatting, emptyFormatting, isRecorded } from "./model/formatting.js";
export type { AttributeSyntax, FormattingHints, TextRun } from "./model/formatting.js";
export {
  AVALONIA_NAMESPACE,
  DIRECTIVE_ORDER,
  WPF_PRESENTATION_NAMESPACE,
  XAML_LANGUAGE_NAMESPACE,
  XAML_LANGUAGE_PREFIX,
  splitQualifiedName,
  type DirectiveKind,
} from "./model/namespaces.js";
export { SymbolTable } from "./model/symbols.js";
export { PositionIndex, computeLineStarts, type SourceLocation } from "./model/text.js";
export type { MemberKind, PropertyDescriptor, TypeDescriptor } from "./model/descriptors.js";

// === Parsing ===
export { readStructure } from "./parsing/structural-reader.js";
export type { XmlDocumentNode, XmlElementNode } from "./parsing/structural-reader.js";
export { StructuralConverter, canonicalValue, convertStructure } from "./parsing/structural-converter.js";
export { isMarkupExtensionSyntax, parseMarkupExtension } from "./parsing/markup-extension-parser.js";
export type { MarkupExtensionParseResult } from "./parsing/markup-extension-parser.js";
export { WhitespaceExtractor, normalizeLeadingWhitespace } from "./formatting/whitespace-extractor.js";

// === Semantic layer ===
export { SemanticConverter } from "./semantic/semantic-converter.js";
export { XmldomSemanticReader, type SemanticDocument, type SemanticReader } from "./semantic/semantic-reader.js";
export {
  CatalogTypeSystem,
  DEFAULT_TYPE_CATALOG_PATH,
  loadPresentationTypeCatalog,
  type TypeSystem,
} from "./semantic/type-system.js";

// === Hybrid parser ===
export { HybridParser } from "./pipeline/hybrid-parser.js";
export type { HybridParseResult, HybridParserOptions, HybridParserState, ParseInput } from "./pipeline/hybrid-parser.js";

// === Visitors ===
export { traverse, type MarkupVisitor, type VisitResult } from "./visitors/traverse.js";
export {
  collectBindings,
  collectNamedElements,
  collectNodeDiagnostics,
  collectResources,
  type ResourceUsage,
} from "./visitors/collectors.js";

// === Transformation ===
export * from "./transform/index.js";

// === Serialization ===
export {
  DEFAULT_SERIALIZATION_OPTIONS,
  resolveSerializationOptions,
  type SerializationOptions,
} from "./serialization/options.js";
export { renderOutput, serialize, serializeToText } from "./serialization/writer.js";
export type { OutputAttribute, OutputComment, OutputDocument, OutputElement, OutputNode, OutputText } from "./serialization/writer.js";
export { formatBanner, type BannerEntry } from "./serialization/banner.js";

// === Companion code ===
export {
  InMemoryCompanionOracle,
  validateCompanionLinkage,
  type CompanionMember,
  type CompanionOracle,
  type CompanionUnit,
} from "./companion/linkage.js";

// === Diagnostics ===
export { DiagnosticCollector, type EmitDiagnosticInput } from "./diagnostics/collector.js";
export { diagnosticsCatalog, type DiagnosticCode } from "./diagnostics/catalog.js";
export type { DiagnosticSeverity, DiagnosticStage, MigrationDiagnostic } from "./diagnostics/types.js";

// === Shared ===
export {
  debug,
  configureDebug,
  refreshDebugChannels,
  DEBUG_CHANNELS,
  type DebugChannel,
  type DebugChannelName,
} from "./shared/debug.js";
export { NOOP_LOGGER, type Logger } from "./shared/logger.js";
export { MarkupExtensionSyntaxError, ParseErrorCode, StructuralParseError, TypeCatalogError } from "./shared/errors.js";
