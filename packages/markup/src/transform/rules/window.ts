import type { UnifiedElement } from "../../model/ast.js";
import { SimpleTypeRenameRule } from "../base-rules.js";
import type { TransformationContext } from "../context.js";
import { convertValue } from "../value-conversions.js";

/** Window properties whose name and value both change. */
const WINDOW_PROPERTY_CONVERSIONS = [
  { source: "WindowStyle", target: "SystemDecorations", conversion: "window-style-to-decorations" },
  { source: "ResizeMode", target: "CanResize", conversion: "resize-mode-to-boolean" },
] as const;

export class WindowRule extends SimpleTypeRenameRule {
  constructor() {
    super("Window", "Window", { name: "window", priority: 100 });
  }

  protected override transformElementProperties(element: UnifiedElement, context: TransformationContext): void {
    for (const { source, target, conversion } of WINDOW_PROPERTY_CONVERSIONS) {
      const property = element.getProperty(source);
      if (!property || property.prefix !== null) continue;
      property.name = target;
      context.recordTransformation(this.name, "property", `${source} → ${target}`);

      const literal = property.literal;
      if (literal === null) {
        context.report(property, "xamlshift/manual-review-required", `${target} takes a different value type than ${source}`);
        continue;
      }
      const outcome = convertValue(conversion, literal);
      if (outcome.ok) property.setLiteral(outcome.value);
      else context.report(property, "xamlshift/unsupported-value", `'${literal}' has no ${target} equivalent; kept as written`);
    }

    if (element.getProperty("AllowsTransparency")) {
      context.report(
        element,
        "xamlshift/manual-review-required",
        "AllowsTransparency has no direct equivalent; use TransparencyLevelHint",
      );
    }
  }
}

const NAVIGATION_PROPERTIES = ["KeepAlive", "NavigationUIVisibility", "ShowsNavigationUI", "WindowTitle"];

/** Pages become user controls; navigation-only properties are dropped. */
export class PageRule extends SimpleTypeRenameRule {
  constructor() {
    super("Page", "UserControl", { name: "page", priority: 100 });
  }

  protected override transformElementProperties(element: UnifiedElement, context: TransformationContext): void {
    for (const name of NAVIGATION_PROPERTIES) {
      const property = element.getProperty(name);
      if (!property) continue;
      element.removeProperty(property);
      context.recordTransformation(this.name, "property", `removed ${name}`);
    }
    context.report(element, "xamlshift/manual-review-required", "Page → UserControl: navigation hosts differ");
  }
}
