export type {
  DocumentRule,
  ElementRule,
  MarkupExtensionRule,
  PropertyRule,
  RuleTargetKind,
  TransformationRecord,
  TransformationRule,
} from "./types.js";
export { TransformationContext, type ReportableNode } from "./context.js";
export { RuleEngine } from "./engine.js";
export {
  PropertyRenameRule,
  SimpleTypeRenameRule,
  type PropertyRenameOptions,
  type TypeRenameOptions,
} from "./base-rules.js";
export { VALUE_CONVERSIONS, convertValue, type ConversionOutcome, type ValueConversion } from "./value-conversions.js";
export * from "./rules/index.js";
