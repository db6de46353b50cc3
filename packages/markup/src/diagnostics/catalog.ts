import { defineDiagnostic, type DiagnosticsCatalog } from "./types.js";

export const structuralDiagnostics = {
  "xamlshift/malformed-markup": defineDiagnostic({
    category: "markup-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    actionability: "manual",
    span: "either",
    stages: ["structural"],
    description: "The source is not well-formed markup.",
  }),
  "xamlshift/unsupported-node": defineDiagnostic({
    category: "markup-syntax",
    status: "canonical",
    defaultSeverity: "info",
    impact: "informational",
    actionability: "none",
    span: "span",
    stages: ["structural"],
    description: "A node kind the converter does not carry over (DOCTYPE, processing instruction) was dropped.",
  }),
  "xamlshift/invalid-markup-extension": defineDiagnostic({
    category: "markup-syntax",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    actionability: "manual",
    span: "span",
    stages: ["structural"],
    description: "A brace-delimited value could not be parsed and is kept as literal text.",
  }),
  "xamlshift/content-ambiguity": defineDiagnostic({
    category: "markup-syntax",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    actionability: "manual",
    span: "span",
    stages: ["structural"],
    description: "An element has both text content and a property-element setting its content property.",
  }),
  "xamlshift/structure-conversion-failed": defineDiagnostic({
    category: "markup-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    actionability: "none",
    span: "document",
    stages: ["structural"],
    description: "Well-formed markup could not be turned into a document tree.",
  }),
} as const;

export const semanticDiagnostics = {
  "xamlshift/semantic-parse-failed": defineDiagnostic({
    category: "type-resolution",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    actionability: "none",
    span: "either",
    stages: ["semantic"],
    description: "The type-resolving parse failed; the document continues without resolved types.",
  }),
  "xamlshift/type-unresolved": defineDiagnostic({
    category: "type-resolution",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    actionability: "guided",
    span: "span",
    stages: ["semantic"],
    description: "An element type could not be resolved against the type catalog.",
  }),
  "xamlshift/member-unresolved": defineDiagnostic({
    category: "type-resolution",
    status: "canonical",
    defaultSeverity: "info",
    impact: "informational",
    actionability: "none",
    span: "span",
    stages: ["semantic"],
    description: "A property or event could not be resolved on its owner type.",
  }),
  "xamlshift/enrichment-mismatch": defineDiagnostic({
    category: "type-resolution",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    actionability: "none",
    span: "span",
    stages: ["enrich"],
    description: "Structural and semantic views disagree on an element's child count; its children were not enriched.",
  }),
  "xamlshift/merge-failed": defineDiagnostic({
    category: "type-resolution",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    actionability: "none",
    span: "document",
    stages: ["enrich"],
    description: "Attaching resolved types to the document failed; it continues without resolved types.",
  }),
} as const;

export const transformDiagnostics = {
  "xamlshift/type-mapping-not-found": defineDiagnostic({
    category: "mapping",
    status: "canonical",
    defaultSeverity: "info",
    impact: "informational",
    actionability: "manual",
    span: "span",
    stages: ["transform"],
    description: "No type mapping exists; the element name is left unchanged.",
  }),
  "xamlshift/event-mapping-not-found": defineDiagnostic({
    category: "mapping",
    status: "canonical",
    defaultSeverity: "info",
    impact: "informational",
    actionability: "manual",
    span: "span",
    stages: ["transform"],
    description: "No event mapping exists; the event name is left unchanged.",
  }),
  "xamlshift/namespace-mapping-not-found": defineDiagnostic({
    category: "mapping",
    status: "canonical",
    defaultSeverity: "info",
    impact: "informational",
    actionability: "manual",
    span: "span",
    stages: ["transform"],
    description: "No namespace mapping exists for a declared namespace.",
  }),
  "xamlshift/manual-review-required": defineDiagnostic({
    category: "migration",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    actionability: "manual",
    span: "span",
    stages: ["transform"],
    description: "A mapping was applied but is flagged for manual review.",
  }),
  "xamlshift/unsupported-value": defineDiagnostic({
    category: "migration",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    actionability: "manual",
    span: "span",
    stages: ["transform"],
    description: "A value has no equivalent under a value conversion and is left unchanged.",
  }),
  "xamlshift/unsupported-extension": defineDiagnostic({
    category: "migration",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    actionability: "manual",
    span: "span",
    stages: ["transform"],
    description: "A markup extension has no direct equivalent in the target framework.",
  }),
  "xamlshift/static-reference": defineDiagnostic({
    category: "migration",
    status: "canonical",
    defaultSeverity: "info",
    impact: "informational",
    actionability: "guided",
    span: "span",
    stages: ["transform"],
    description: "A static member reference points into a framework namespace that may not exist in the target.",
  }),
  "xamlshift/rule-failed": defineDiagnostic({
    category: "migration",
    status: "canonical",
    defaultSeverity: "error",
    impact: "degraded",
    actionability: "none",
    span: "span",
    stages: ["transform"],
    description: "A transformation rule threw; the node was left as it was.",
  }),
} as const;

export const serializationDiagnostics = {
  "xamlshift/serialization-failed": defineDiagnostic({
    category: "serialization",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    actionability: "none",
    span: "document",
    stages: ["serialize"],
    description: "Writing the document failed; output is best effort.",
  }),
} as const;

export const companionDiagnostics = {
  "xamlshift/companion-unit-missing": defineDiagnostic({
    category: "companion",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    actionability: "manual",
    span: "span",
    stages: ["companion"],
    description: "The class named by x:Class was not found in the companion code.",
  }),
  "xamlshift/companion-member-missing": defineDiagnostic({
    category: "companion",
    status: "canonical",
    defaultSeverity: "info",
    impact: "informational",
    actionability: "guided",
    span: "span",
    stages: ["companion"],
    description: "A named element has no matching member in the companion class.",
  }),
  "xamlshift/companion-handler-missing": defineDiagnostic({
    category: "companion",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    actionability: "manual",
    span: "span",
    stages: ["companion"],
    description: "An event handler named in markup is not a method of the companion class.",
  }),
  "xamlshift/companion-check-failed": defineDiagnostic({
    category: "companion",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    actionability: "none",
    span: "document",
    stages: ["companion"],
    description: "The companion-code lookup threw; linkage was not checked.",
  }),
} as const;

export const diagnosticsCatalog = {
  ...structuralDiagnostics,
  ...semanticDiagnostics,
  ...transformDiagnostics,
  ...serializationDiagnostics,
  ...companionDiagnostics,
} as const satisfies DiagnosticsCatalog;

export type DiagnosticCode = keyof typeof diagnosticsCatalog;
