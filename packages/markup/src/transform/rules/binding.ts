import { MarkupExtension, quoteExtensionValue, unquoteExtensionValue, type ExtensionValue } from "../../model/markup-extension.js";
import { splitQualifiedName } from "../../model/namespaces.js";
import type { TransformationContext } from "../context.js";
import type { MarkupExtensionRule } from "../types.js";

/** Parameters the target binding does not have. */
const REMOVED_PARAMETERS = ["UpdateSourceTrigger", "IsAsync"];

/** Parameters folded into `EnableDataValidation`. */
const VALIDATION_PARAMETERS = [
  "ValidatesOnDataErrors",
  "ValidatesOnExceptions",
  "ValidatesOnNotifyDataErrors",
  "NotifyOnValidationError",
];

function isBinding(extension: MarkupExtension): boolean {
  return splitQualifiedName(extension.name).local === "Binding";
}

function textOf(value: ExtensionValue | null): string | null {
  return typeof value === "string" ? unquoteExtensionValue(value) : null;
}

/**
 * Binding cleanup: drops parameters with no counterpart, folds the
 * validation switches into `EnableDataValidation` and rewrites
 * `RelativeSource` into a path selector (`$parent[Type]`, `$self`).
 */
export class BindingCleanupRule implements MarkupExtensionRule {
  readonly kind = "markup-extension" as const;
  readonly name = "binding-cleanup";
  readonly priority = 100;

  canApply(extension: MarkupExtension): boolean {
    if (!isBinding(extension)) return false;
    const keys = [...extension.parameters.keys()];
    return keys.some(
      (key) => REMOVED_PARAMETERS.includes(key) || VALIDATION_PARAMETERS.includes(key) || key === "RelativeSource",
    );
  }

  apply(binding: MarkupExtension, context: TransformationContext): MarkupExtension {
    for (const key of REMOVED_PARAMETERS) {
      if (binding.removeParameter(key)) context.recordTransformation(this.name, "markup-extension", `removed ${key}`);
    }
    this.#foldValidation(binding, context);
    rewriteRelativeSource(binding, this.name, context);
    return binding;
  }

  #foldValidation(binding: MarkupExtension, context: TransformationContext): void {
    for (const key of VALIDATION_PARAMETERS) {
      const value = binding.getParameter(key);
      if (value === null) continue;
      const enabled = textOf(value)?.toLowerCase() === "true";
      if (enabled && binding.getParameter("EnableDataValidation") === null) {
        binding.renameParameter(key, "EnableDataValidation");
        binding.setParameter("EnableDataValidation", "True");
      } else {
        binding.removeParameter(key);
      }
      context.recordTransformation(this.name, "markup-extension", `folded ${key} into EnableDataValidation`);
    }
  }
}

/**
 * `{Binding Path=Title, RelativeSource={RelativeSource FindAncestor, AncestorType={x:Type Window}}}`
 * becomes `{Binding $parent[Window].Title}`. Modes without a path selector
 * are reported and left alone.
 */
export function rewriteRelativeSource(binding: MarkupExtension, ruleName: string, context: TransformationContext): void {
  const source = binding.getParameter("RelativeSource");
  if (!(source instanceof MarkupExtension) || splitQualifiedName(source.name).local !== "RelativeSource") return;

  // AncestorType alone implies FindAncestor.
  const mode =
    textOf(source.positional) ??
    textOf(source.getParameter("Mode")) ??
    (source.getParameter("AncestorType") !== null ? "FindAncestor" : null);
  let selector: string;
  switch (mode) {
    case "FindAncestor": {
      const ancestorType = ancestorTypeOf(source);
      if (ancestorType === null) {
        context.report(binding, "xamlshift/manual-review-required", "RelativeSource FindAncestor without AncestorType");
        return;
      }
      const level = Number.parseInt(textOf(source.getParameter("AncestorLevel")) ?? "1", 10);
      selector = level > 1 ? `$parent[${ancestorType};${level - 1}]` : `$parent[${ancestorType}]`;
      break;
    }
    case "Self":
      selector = "$self";
      break;
    case "TemplatedParent":
      context.report(binding, "xamlshift/manual-review-required", "RelativeSource TemplatedParent: use TemplateBinding or $parent");
      return;
    default:
      context.report(binding, "xamlshift/unsupported-value", `RelativeSource mode '${mode ?? ""}' has no path selector`);
      return;
  }

  const written = textOf(binding.positional) ?? textOf(binding.getParameter("Path"));
  const path = written === null || written === "." ? null : written;
  binding.removeParameter("RelativeSource");
  binding.removeParameter("Path");
  binding.positional = quoteExtensionValue(path === null ? selector : `${selector}.${path}`);
  context.recordTransformation(ruleName, "markup-extension", `RelativeSource ${mode} → ${selector}`);
}

function ancestorTypeOf(relativeSource: MarkupExtension): string | null {
  const value = relativeSource.getParameter("AncestorType");
  if (value instanceof MarkupExtension) {
    const payload = value.payload;
    return payload?.kind === "type" ? payload.typeName : null;
  }
  return textOf(value);
}
