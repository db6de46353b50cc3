import type { UnifiedElement, UnifiedProperty } from "../model/ast.js";
import type { TransformationContext } from "./context.js";
import type { ElementRule, PropertyRule } from "./types.js";

export interface TypeRenameOptions {
  /** Only match elements in this XML namespace. */
  sourceNamespace?: string | null;
  priority?: number;
  name?: string;
}

/**
 * Renames elements of one exact type. Subclasses adjust the element's
 * properties through {@link SimpleTypeRenameRule.transformElementProperties}.
 */
export class SimpleTypeRenameRule implements ElementRule {
  readonly kind = "element" as const;
  readonly name: string;
  readonly priority: number;
  readonly sourceNamespace: string | null;

  constructor(
    readonly sourceType: string,
    readonly targetType: string = sourceType,
    options: TypeRenameOptions = {},
  ) {
    this.name = options.name ?? `rename-type:${sourceType}`;
    this.priority = options.priority ?? 50;
    this.sourceNamespace = options.sourceNamespace ?? null;
  }

  canApply(element: UnifiedElement): boolean {
    if (element.isSyntheticCollection || element.typeName !== this.sourceType) return false;
    return this.sourceNamespace === null || element.namespace === this.sourceNamespace;
  }

  apply(element: UnifiedElement, context: TransformationContext): UnifiedElement | null {
    if (element.typeName !== this.targetType) {
      element.typeName = this.targetType;
      context.recordTransformation(this.name, "element", `${this.sourceType} → ${this.targetType}`);
    }
    this.transformElementProperties(element, context);
    return element;
  }

  protected transformElementProperties(_element: UnifiedElement, _context: TransformationContext): void {}
}

export interface PropertyRenameOptions {
  /** Only match properties owned by this type (attached owner or enclosing element). */
  ownerType?: string | null;
  priority?: number;
  name?: string;
}

/**
 * Renames one property. Subclasses rewrite the value through
 * {@link PropertyRenameRule.transformValue}.
 */
export class PropertyRenameRule implements PropertyRule {
  readonly kind = "property" as const;
  readonly name: string;
  readonly priority: number;
  readonly ownerType: string | null;

  constructor(
    readonly sourceName: string,
    readonly targetName: string,
    options: PropertyRenameOptions = {},
  ) {
    this.ownerType = options.ownerType ?? null;
    this.name = options.name ?? `rename-property:${this.ownerType ? `${this.ownerType}.` : ""}${sourceName}`;
    this.priority = options.priority ?? 50;
  }

  canApply(property: UnifiedProperty): boolean {
    if (property.name !== this.sourceName || property.prefix !== null) return false;
    return this.ownerType === null || property.ownerTypeName === this.ownerType;
  }

  apply(property: UnifiedProperty, context: TransformationContext): UnifiedProperty | null {
    property.name = this.targetName;
    this.transformValue(property, context);
    context.recordTransformation(this.name, "property", `${this.sourceName} → ${this.targetName}`);
    return property;
  }

  protected transformValue(_property: UnifiedProperty, _context: TransformationContext): void {}
}
