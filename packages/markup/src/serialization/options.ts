export interface SerializationOptions {
  /** Re-emit recorded whitespace, attribute spelling and raw values. */
  readonly preserveFormatting: boolean;
  readonly preserveComments: boolean;
  /** Write the root with the target default namespace and the `x` language namespace. */
  readonly useTargetNamespace: boolean;
  /** Target default namespace; falls back to the one the namespace rewrite chose. */
  readonly targetNamespace: string | null;
  /** Sort ordinary attributes by name. Directives and declarations stay first. */
  readonly sortAttributes: boolean;
  /** Indentation unit for content that has no recorded whitespace. */
  readonly indent: string;
  readonly newline: string;
  /** Append a comment listing errors and warnings for manual review. */
  readonly addDiagnosticComments: boolean;
  /** Entries per severity in that comment. */
  readonly maxDiagnosticEntries: number;
}

export const DEFAULT_SERIALIZATION_OPTIONS: SerializationOptions = {
  preserveFormatting: true,
  preserveComments: true,
  useTargetNamespace: false,
  targetNamespace: null,
  sortAttributes: false,
  indent: "    ",
  newline: "\n",
  addDiagnosticComments: false,
  maxDiagnosticEntries: 10,
};

export function resolveSerializationOptions(options: Partial<SerializationOptions> = {}): SerializationOptions {
  const merged = { ...DEFAULT_SERIALIZATION_OPTIONS, ...options };
  return { ...merged, maxDiagnosticEntries: Math.max(0, Math.floor(merged.maxDiagnosticEntries)) };
}
