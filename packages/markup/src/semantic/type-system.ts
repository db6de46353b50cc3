import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import type { PropertyDescriptor, TypeDescriptor } from "../model/descriptors.js";
import { TypeCatalogError } from "../shared/errors.js";

/**
 * Resolves markup names against the source framework's types. Only what the
 * rewrite needs: types, members, attached members and extension types.
 */
export interface TypeSystem {
  resolveType(xmlNamespace: string | null, name: string): TypeDescriptor | null;
  /** Properties and events, searched along the base-type chain. */
  resolveProperty(type: TypeDescriptor, name: string): PropertyDescriptor | null;
  resolveAttachedProperty(ownerType: string, name: string): PropertyDescriptor | null;
  /** `Binding` resolves to `Binding`, `StaticResource` to `StaticResourceExtension`. */
  resolveMarkupExtension(xmlNamespace: string | null, name: string): TypeDescriptor | null;
}

/* =============================================================================
 * CATALOG
 * ============================================================================= */

export interface CatalogType {
  readonly descriptor: TypeDescriptor;
  readonly properties: ReadonlyMap<string, string>;
  readonly attachedProperties: ReadonlyMap<string, string>;
  readonly events: ReadonlyMap<string, string>;
}

/** Type system backed by a static catalog of type entries. */
export class CatalogTypeSystem implements TypeSystem {
  readonly #byName = new Map<string, CatalogType>();

  constructor(types: Iterable<CatalogType>) {
    for (const type of types) {
      if (!this.#byName.has(type.descriptor.name)) this.#byName.set(type.descriptor.name, type);
    }
  }

  get size(): number {
    return this.#byName.size;
  }

  resolveType(xmlNamespace: string | null, name: string): TypeDescriptor | null {
    const entry = this.#byName.get(name);
    if (!entry || xmlNamespace === null || entry.descriptor.xmlNamespace !== xmlNamespace) return null;
    return entry.descriptor;
  }

  resolveProperty(type: TypeDescriptor, name: string): PropertyDescriptor | null {
    for (const entry of this.#chain(type.name)) {
      const valueType = entry.properties.get(name);
      if (valueType !== undefined) return member(entry, name, valueType, "property", false);
      const handlerType = entry.events.get(name);
      if (handlerType !== undefined) return member(entry, name, handlerType, "event", false);
    }
    return null;
  }

  resolveAttachedProperty(ownerType: string, name: string): PropertyDescriptor | null {
    for (const entry of this.#chain(ownerType)) {
      const valueType = entry.attachedProperties.get(name);
      if (valueType !== undefined) return member(entry, name, valueType, "property", true);
    }
    return null;
  }

  resolveMarkupExtension(xmlNamespace: string | null, name: string): TypeDescriptor | null {
    for (const candidate of [`${name}Extension`, name]) {
      const type = this.resolveType(xmlNamespace, candidate);
      if (type?.isMarkupExtension) return type;
    }
    return null;
  }

  *#chain(typeName: string): Generator<CatalogType> {
    const seen = new Set<string>();
    let current = this.#byName.get(typeName);
    while (current && !seen.has(current.descriptor.name)) {
      seen.add(current.descriptor.name);
      yield current;
      const base = current.descriptor.baseType;
      current = base === null ? undefined : this.#byName.get(base);
    }
  }
}

function member(
  entry: CatalogType,
  name: string,
  valueType: string,
  kind: PropertyDescriptor["kind"],
  isAttached: boolean,
): PropertyDescriptor {
  return { name, declaringType: entry.descriptor.name, valueType, kind, isAttached };
}

/* =============================================================================
 * LOADING
 * ============================================================================= */

export const DEFAULT_TYPE_CATALOG_PATH = fileURLToPath(new URL("../../data/wpf-types.json", import.meta.url));

let cachedDefault: CatalogTypeSystem | null = null;

/**
 * Load the WPF presentation type catalog. The bundled catalog is read once
 * and shared.
 */
export function loadPresentationTypeCatalog(path?: string): CatalogTypeSystem {
  if (path === undefined && cachedDefault) return cachedDefault;
  const file = path ?? DEFAULT_TYPE_CATALOG_PATH;
  let text: string;
  try {
    text = readFileSync(file, "utf8");
  } catch (error) {
    throw new TypeCatalogError(`cannot read type catalog: ${error instanceof Error ? error.message : String(error)}`, file);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new TypeCatalogError(`invalid type catalog JSON: ${error instanceof Error ? error.message : String(error)}`, file);
  }
  const system = new CatalogTypeSystem(parseTypeCatalog(parsed, file));
  if (path === undefined) cachedDefault = system;
  return system;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Narrow parsed catalog JSON into type entries. */
export function parseTypeCatalog(value: unknown, file?: string): CatalogType[] {
  if (!isObject(value)) throw new TypeCatalogError("type catalog must be a JSON object", file);
  const aliases = stringMap(value["namespaces"], "namespaces", file);
  const types = value["types"];
  if (!Array.isArray(types)) throw new TypeCatalogError("'types' must be an array", file);

  return types.map((entry: unknown, i): CatalogType => {
    const where = `types[${i}]`;
    if (!isObject(entry)) throw new TypeCatalogError(`${where} must be an object`, file);
    const name = entry["name"];
    const clrNamespace = entry["clrNamespace"];
    if (typeof name !== "string" || !name) throw new TypeCatalogError(`${where}.name must be a non-empty string`, file);
    if (typeof clrNamespace !== "string") throw new TypeCatalogError(`${where}.clrNamespace must be a string`, file);
    const alias = optionalString(entry, "xmlNamespace", where, file) ?? "presentation";
    const xmlNamespace = aliases.get(alias) ?? alias;
    return {
      descriptor: {
        name,
        fullName: clrNamespace ? `${clrNamespace}.${name}` : name,
        xmlNamespace,
        baseType: optionalString(entry, "baseType", where, file) ?? null,
        contentProperty: optionalString(entry, "contentProperty", where, file) ?? null,
        isMarkupExtension: entry["isMarkupExtension"] === true,
      },
      properties: stringMap(entry["properties"], `${where}.properties`, file),
      attachedProperties: stringMap(entry["attachedProperties"], `${where}.attachedProperties`, file),
      events: stringMap(entry["events"], `${where}.events`, file),
    };
  });
}

function optionalString(entry: JsonObject, key: string, where: string, file: string | undefined): string | undefined {
  const value = entry[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") throw new TypeCatalogError(`${where}.${key} must be a string`, file);
  return value;
}

function stringMap(value: unknown, where: string, file: string | undefined): Map<string, string> {
  const map = new Map<string, string>();
  if (value === undefined) return map;
  if (!isObject(value)) throw new TypeCatalogError(`${where} must be an object`, file);
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== "string") throw new TypeCatalogError(`${where}.${key} must be a string`, file);
    map.set(key, entry);
  }
  return map;
}
