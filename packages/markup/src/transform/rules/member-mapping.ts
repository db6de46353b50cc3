import type { EventMapping, PropertyMapping } from "@xamlshift/mappings";

import type { UnifiedProperty } from "../../model/ast.js";
import type { TransformationContext } from "../context.js";
import type { PropertyRule } from "../types.js";
import { convertValue } from "../value-conversions.js";

/**
 * Renames properties through the property mappings and converts literal
 * values where the mapping names a conversion. A member the semantic layer
 * could not resolve is also tried against the event mappings.
 */
export class PropertyMappingRule implements PropertyRule {
  readonly kind = "property" as const;
  readonly name = "property-mapping";
  readonly priority = 10;

  canApply(property: UnifiedProperty): boolean {
    return property.prefix === null && property.resolvedProperty?.kind !== "event";
  }

  apply(property: UnifiedProperty, context: TransformationContext): UnifiedProperty {
    const owner = property.ownerTypeName;
    const mapping = context.mappings.findPropertyMapping(property.name, owner);
    if (mapping) {
      applyPropertyMapping(property, mapping, this.name, context);
      return property;
    }
    if (property.resolvedProperty === null && property.literal !== null) {
      const event = context.mappings.findEventMapping(property.name, owner);
      if (event) applyEventMapping(property, event, this.name, context);
    }
    return property;
  }
}

/** Renames event handler attributes through the event mappings. */
export class EventMappingRule implements PropertyRule {
  readonly kind = "property" as const;
  readonly name = "event-mapping";
  readonly priority = 20;

  canApply(property: UnifiedProperty): boolean {
    return property.prefix === null && property.resolvedProperty?.kind === "event";
  }

  apply(property: UnifiedProperty, context: TransformationContext): UnifiedProperty {
    const mapping = context.mappings.findEventMapping(property.name, property.ownerTypeName);
    if (!mapping) {
      context.report(property, "xamlshift/event-mapping-not-found", `no event mapping for '${property.qualifiedName}'`);
      return property;
    }
    applyEventMapping(property, mapping, this.name, context);
    return property;
  }
}

export function applyPropertyMapping(
  property: UnifiedProperty,
  mapping: PropertyMapping,
  ruleName: string,
  context: TransformationContext,
): void {
  const before = property.qualifiedName;
  const dot = mapping.target.lastIndexOf(".");
  property.name = mapping.target.slice(dot + 1);
  if (dot > 0) property.attachTo(mapping.target.slice(0, dot));
  const after = property.qualifiedName;
  if (after !== before) context.recordTransformation(ruleName, "property", `${before} → ${after}`);

  if (mapping.valueConversion !== undefined) {
    const literal = property.literal;
    if (literal === null) {
      context.report(property, "xamlshift/manual-review-required", `${after} takes a different value type; the value of ${before} needs review`);
    } else {
      const outcome = convertValue(mapping.valueConversion, literal);
      if (outcome.ok) {
        if (outcome.value !== literal) {
          property.setLiteral(outcome.value);
          context.recordTransformation(ruleName, "property", `${after}: '${literal}' → '${outcome.value}'`);
        }
      } else if (outcome.reason === "unknown-conversion") {
        context.report(property, "xamlshift/unsupported-value", `unknown value conversion '${mapping.valueConversion}' for ${before}`);
      } else {
        context.report(property, "xamlshift/unsupported-value", `'${literal}' has no ${after} equivalent; kept as written`);
      }
    }
  } else if (mapping.typeChanged) {
    context.report(property, "xamlshift/manual-review-required", `${after} takes a different value type than ${before}`);
  }

  if (mapping.requiresManualReview) {
    context.report(property, "xamlshift/manual-review-required", `${before} → ${after}${mapping.note ? `: ${mapping.note}` : ""}`);
  }
}

export function applyEventMapping(
  property: UnifiedProperty,
  mapping: EventMapping,
  ruleName: string,
  context: TransformationContext,
): void {
  const before = property.name;
  if (mapping.target !== before) {
    property.name = mapping.target;
    context.recordTransformation(ruleName, "property", `event ${before} → ${mapping.target}`);
  }
  const concerns: string[] = [];
  if (mapping.signatureChanged) concerns.push(`handler '${property.literal ?? "?"}' needs the ${mapping.target} signature`);
  if (mapping.requiresManualReview && mapping.note) concerns.push(mapping.note);
  else if (mapping.requiresManualReview) concerns.push(`review ${before} → ${mapping.target}`);
  if (concerns.length > 0) {
    context.report(property, "xamlshift/manual-review-required", `event ${before}: ${concerns.join("; ")}`);
  }
}
