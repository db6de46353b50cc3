/**
 * Literal value conversions named by `valueConversion` tags in the mapping
 * database. A conversion returns null for a value it does not know.
 */
export type ValueConversion = (value: string) => string | null;

function lookup(table: Readonly<Record<string, string>>): ValueConversion {
  const values = new Map(Object.entries(table));
  return (value) => values.get(value.trim()) ?? null;
}

export const VALUE_CONVERSIONS: ReadonlyMap<string, ValueConversion> = new Map([
  // Hidden keeps its layout slot in WPF; IsVisible has no such state.
  ["visibility-to-boolean", lookup({ Visible: "True", Collapsed: "False", Hidden: "False" })],
  [
    "window-style-to-decorations",
    lookup({ None: "None", ToolWindow: "BorderOnly", SingleBorderWindow: "Full", ThreeDBorderWindow: "Full" }),
  ],
  ["resize-mode-to-boolean", lookup({ NoResize: "False", CanMinimize: "False", CanResize: "True", CanResizeWithGrip: "True" })],
]);

export type ConversionOutcome =
  | { readonly ok: true; readonly value: string }
  | { readonly ok: false; readonly reason: "unknown-conversion" | "unsupported-value" };

export function convertValue(tag: string, value: string): ConversionOutcome {
  const conversion = VALUE_CONVERSIONS.get(tag);
  if (!conversion) return { ok: false, reason: "unknown-conversion" };
  const converted = conversion(value);
  return converted === null ? { ok: false, reason: "unsupported-value" } : { ok: true, value: converted };
}
