import type { DiagnosticCollector } from "../diagnostics/collector.js";
import type { CompanionLink, UnifiedDocument, UnifiedProperty } from "../model/ast.js";
import { debug } from "../shared/debug.js";
import { collectNamedElements } from "../visitors/collectors.js";
import { traverse } from "../visitors/traverse.js";

export type CompanionMemberKind = "field" | "property" | "method" | "event";

export interface CompanionMember {
  readonly name: string;
  readonly kind: CompanionMemberKind;
  /** Display signature, e.g. `void OnClick(object, RoutedEventArgs)`. */
  readonly signature?: string;
}

/** The class a markup file is compiled together with. */
export interface CompanionUnit {
  readonly qualifiedName: string;
  readonly members: readonly CompanionMember[];
}

/** Read-only view of the companion code, answered by name. */
export interface CompanionOracle {
  findUnit(qualifiedName: string): CompanionUnit | null;
}

/** Oracle over a fixed list of units, for callers without a code model. */
export class InMemoryCompanionOracle implements CompanionOracle {
  readonly #units = new Map<string, CompanionUnit>();

  constructor(units: Iterable<CompanionUnit> = []) {
    for (const unit of units) this.add(unit);
  }

  add(unit: CompanionUnit): this {
    this.#units.set(unit.qualifiedName, unit);
    return this;
  }

  findUnit(qualifiedName: string): CompanionUnit | null {
    return this.#units.get(qualifiedName) ?? null;
  }
}

/**
 * Check the markup against its companion class: the `x:Class` unit exists,
 * every `x:Name` has a member, and every event handler is a method.
 *
 * Stores the outcome in `document.metadata.companion`. Documents without
 * `x:Class` are left alone and return null.
 */
export function validateCompanionLinkage(
  document: UnifiedDocument,
  oracle: CompanionOracle,
  diagnostics: DiagnosticCollector,
): CompanionLink | null {
  const root = document.root;
  const className = root?.className ?? null;
  if (root === null || className === null) return null;

  const unit = oracle.findUnit(className);
  if (unit === null) {
    diagnostics.emit("xamlshift/companion-unit-missing", {
      message: `x:Class '${className}' has no companion class`,
      location: root.location,
      filePath: document.filePath,
    });
    return link(document, { qualifiedName: className, resolved: false, memberCount: 0 });
  }

  const members = new Map(unit.members.map((member) => [member.name, member]));
  for (const [name, element] of collectNamedElements(document)) {
    if (members.has(name)) continue;
    diagnostics.emit("xamlshift/companion-member-missing", {
      message: `'${name}' (${element.typeName}) has no member in ${className}`,
      location: element.location,
      filePath: document.filePath,
    });
  }

  for (const handler of eventHandlers(document)) {
    const name = handler.literal ?? "";
    if (members.get(name)?.kind === "method") continue;
    diagnostics.emit("xamlshift/companion-handler-missing", {
      message: `handler '${name}' for ${handler.qualifiedName} is not a method of ${className}`,
      location: handler.location,
      filePath: document.filePath,
    });
  }

  return link(document, { qualifiedName: className, resolved: true, memberCount: unit.members.length });
}

/** Event properties written as a handler name. */
function eventHandlers(document: UnifiedDocument): UnifiedProperty[] {
  const handlers: UnifiedProperty[] = [];
  traverse(document, {
    property(property) {
      if (property.resolvedProperty?.kind === "event" && property.literal) handlers.push(property);
      return "continue";
    },
  });
  return handlers;
}

function link(document: UnifiedDocument, companion: CompanionLink): CompanionLink {
  document.metadata.companion = companion;
  debug.convert("companion.linked", { ...companion });
  return companion;
}
