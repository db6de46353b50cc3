import type { TransformationRule } from "../types.js";
import { BindingCleanupRule } from "./binding.js";
import { EventMappingRule, PropertyMappingRule } from "./member-mapping.js";
import { NamespaceRewriteRule } from "./namespace-rewrite.js";
import { TypeMappingRule } from "./type-mapping.js";
import { PageRule, WindowRule } from "./window.js";
import {
  ArrayElementRule,
  ArrayReferenceRule,
  NullReferenceRule,
  StaticReferenceRule,
  TypeReferenceRule,
} from "./xaml-extensions.js";

export { BindingCleanupRule, rewriteRelativeSource } from "./binding.js";
export { EventMappingRule, PropertyMappingRule, applyEventMapping, applyPropertyMapping } from "./member-mapping.js";
export { NamespaceRewriteRule } from "./namespace-rewrite.js";
export { TypeMappingRule } from "./type-mapping.js";
export { PageRule, WindowRule } from "./window.js";
export {
  ArrayElementRule,
  ArrayReferenceRule,
  NullReferenceRule,
  StaticReferenceRule,
  TypeReferenceRule,
} from "./xaml-extensions.js";

/** The WPF → Avalonia rule set, fresh instances on every call. */
export function createDefaultRules(): TransformationRule[] {
  return [
    new NamespaceRewriteRule(),
    new WindowRule(),
    new PageRule(),
    new ArrayElementRule(),
    new TypeMappingRule(),
    new EventMappingRule(),
    new PropertyMappingRule(),
    new BindingCleanupRule(),
    new StaticReferenceRule(),
    new TypeReferenceRule(),
    new NullReferenceRule(),
    new ArrayReferenceRule(),
  ];
}
