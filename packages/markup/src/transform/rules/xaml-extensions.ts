import type { UnifiedElement } from "../../model/ast.js";
import type { MarkupExtension } from "../../model/markup-extension.js";
import { XAML_LANGUAGE_NAMESPACE, XAML_LANGUAGE_PREFIX, splitQualifiedName } from "../../model/namespaces.js";
import type { TransformationContext } from "../context.js";
import type { ElementRule, MarkupExtensionRule } from "../types.js";

/**
 * Base for the language-namespace extensions (`x:Static`, `x:Type`, ...).
 * Matches the written name with or without the `Extension` suffix.
 */
abstract class LanguageExtensionRule implements MarkupExtensionRule {
  readonly kind = "markup-extension" as const;
  abstract readonly name: string;
  readonly priority = 50;

  constructor(readonly extensionName: string) {}

  canApply(extension: MarkupExtension): boolean {
    const { prefix, local } = splitQualifiedName(extension.name);
    if (prefix !== XAML_LANGUAGE_PREFIX) return false;
    return local === this.extensionName || local === `${this.extensionName}Extension`;
  }

  abstract apply(extension: MarkupExtension, context: TransformationContext): MarkupExtension | null;
}

/** Static members resolve against target types, which may not declare them. */
export class StaticReferenceRule extends LanguageExtensionRule {
  override readonly name = "x-static";

  constructor() {
    super("Static");
  }

  override apply(extension: MarkupExtension, context: TransformationContext): MarkupExtension {
    const payload = extension.payload;
    const member = payload?.kind === "static" ? payload.memberPath : null;
    if (member === null) {
      context.report(extension, "xamlshift/manual-review-required", "x:Static without a member");
      return extension;
    }
    context.report(extension, "xamlshift/static-reference", `x:Static ${member} must exist on the target side`);
    return extension;
  }
}

export class TypeReferenceRule extends LanguageExtensionRule {
  override readonly name = "x-type";

  constructor() {
    super("Type");
  }

  override apply(extension: MarkupExtension, context: TransformationContext): MarkupExtension {
    const payload = extension.payload;
    if (payload?.kind !== "type" || payload.typeName === null) {
      context.report(extension, "xamlshift/manual-review-required", "x:Type without a type name");
      return extension;
    }
    const mapping = context.mappings.findTypeMapping(payload.typeName);
    if (!mapping || mapping.target === payload.typeName) return extension;
    if (extension.positional !== null) extension.positional = mapping.target;
    else extension.setParameter("TypeName", mapping.target);
    context.recordTransformation(this.name, "markup-extension", `x:Type ${payload.typeName} → ${mapping.target}`);
    return extension;
  }
}

/** `x:Null` is understood as is. */
export class NullReferenceRule extends LanguageExtensionRule {
  override readonly name = "x-null";

  constructor() {
    super("Null");
  }

  override apply(extension: MarkupExtension, context: TransformationContext): MarkupExtension {
    context.recordTransformation(this.name, "markup-extension", "x:Null kept");
    return extension;
  }
}

const ARRAY_GUIDANCE = "x:Array is not supported; declare the items in a collection resource instead";

/** `x:Array` has no target counterpart. */
export class ArrayReferenceRule extends LanguageExtensionRule {
  override readonly name = "x-array";

  constructor() {
    super("Array");
  }

  override apply(extension: MarkupExtension, context: TransformationContext): MarkupExtension {
    context.report(extension, "xamlshift/unsupported-extension", ARRAY_GUIDANCE);
    return extension;
  }
}

/** `<x:Array>` written as an element. */
export class ArrayElementRule implements ElementRule {
  readonly kind = "element" as const;
  readonly name = "x-array-element";
  readonly priority = 50;

  canApply(element: UnifiedElement): boolean {
    return element.typeName === "Array" && element.namespace === XAML_LANGUAGE_NAMESPACE;
  }

  apply(element: UnifiedElement, context: TransformationContext): UnifiedElement {
    context.report(element, "xamlshift/unsupported-extension", ARRAY_GUIDANCE);
    return element;
  }
}
