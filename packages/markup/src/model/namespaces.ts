export const WPF_PRESENTATION_NAMESPACE = "http://schemas.microsoft.com/winfx/2006/xaml/presentation";
export const XAML_LANGUAGE_NAMESPACE = "http://schemas.microsoft.com/winfx/2006/xaml";
export const AVALONIA_NAMESPACE = "https://github.com/avaloniaui";
export const XMLNS_NAMESPACE = "http://www.w3.org/2000/xmlns/";
export const XAML_LANGUAGE_PREFIX = "x";

export type DirectiveKind = "name" | "key" | "class" | "fieldModifier" | "shared";

/** Directive local names (in the XAML language namespace) → element field. */
export const DIRECTIVE_ATTRIBUTES: ReadonlyMap<string, DirectiveKind> = new Map([
  ["Name", "name"],
  ["Key", "key"],
  ["Class", "class"],
  ["FieldModifier", "fieldModifier"],
  ["Shared", "shared"],
]);

/** Order used for directives that have no recorded source position. */
export const DIRECTIVE_ORDER: readonly DirectiveKind[] = ["class", "key", "name", "fieldModifier", "shared"];

export function directiveLocalName(kind: DirectiveKind): string {
  for (const [local, mapped] of DIRECTIVE_ATTRIBUTES) {
    if (mapped === kind) return local;
  }
  return kind;
}

/** Split `prefix:local` into its parts. */
export function splitQualifiedName(qualified: string): { prefix: string | null; local: string } {
  const colon = qualified.indexOf(":");
  if (colon < 0) return { prefix: null, local: qualified };
  return { prefix: qualified.slice(0, colon), local: qualified.slice(colon + 1) };
}
