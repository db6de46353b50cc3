import { readFileSync } from "node:fs";

import { MappingLoadError, MappingLoadErrorCode } from "./errors.js";
import { parseMappingDatabase } from "./validate.js";
import type {
  EventMapping,
  MappingDatabase,
  MappingRepository,
  NamespaceMapping,
  PropertyMapping,
  TypeMapping,
} from "./types.js";

/** Number of indexed records per mapping kind. */
export interface MappingRepositoryStats {
  namespaces: number;
  types: number;
  properties: number;
  events: number;
}

/**
 * Mapping repository indexed from a {@link MappingDatabase}.
 *
 * When two records share a key the first one wins, so a caller can prepend
 * overrides to a database before constructing the repository.
 */
export class JsonMappingRepository implements MappingRepository {
  readonly #namespaces = new Map<string, NamespaceMapping>();
  readonly #types = new Map<string, TypeMapping>();
  readonly #properties = new Map<string, PropertyMapping>();
  readonly #ownedProperties = new Map<string, PropertyMapping>();
  readonly #events = new Map<string, EventMapping>();
  readonly #ownedEvents = new Map<string, EventMapping>();

  constructor(readonly database: MappingDatabase) {
    for (const mapping of database.namespaces) addFirst(this.#namespaces, mapping.source, mapping);
    for (const mapping of database.types) addFirst(this.#types, mapping.source, mapping);
    for (const mapping of database.properties) {
      if (mapping.ownerType) addFirst(this.#ownedProperties, ownedKey(mapping.ownerType, mapping.source), mapping);
      else addFirst(this.#properties, mapping.source, mapping);
    }
    for (const mapping of database.events) {
      if (mapping.ownerType) addFirst(this.#ownedEvents, ownedKey(mapping.ownerType, mapping.source), mapping);
      else addFirst(this.#events, mapping.source, mapping);
    }
  }

  static fromJson(text: string, file?: string): JsonMappingRepository {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MappingLoadError(`invalid mapping JSON: ${reason}`, MappingLoadErrorCode.INVALID_JSON, file);
    }
    return new JsonMappingRepository(parseMappingDatabase(parsed, file));
  }

  static fromFile(path: string): JsonMappingRepository {
    let text: string;
    try {
      text = readFileSync(path, "utf-8");
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MappingLoadError(`cannot read mapping file: ${reason}`, MappingLoadErrorCode.READ_FAILED, path);
    }
    return JsonMappingRepository.fromJson(text, path);
  }

  get stats(): MappingRepositoryStats {
    return {
      namespaces: this.#namespaces.size,
      types: this.#types.size,
      properties: this.#properties.size + this.#ownedProperties.size,
      events: this.#events.size + this.#ownedEvents.size,
    };
  }

  findNamespaceMapping(sourceNamespace: string): NamespaceMapping | null {
    return this.#namespaces.get(sourceNamespace) ?? null;
  }

  findTypeMapping(sourceTypeName: string): TypeMapping | null {
    return this.#types.get(sourceTypeName) ?? null;
  }

  findPropertyMapping(sourcePropertyName: string, ownerTypeName?: string | null): PropertyMapping | null {
    if (ownerTypeName) {
      const owned = this.#ownedProperties.get(ownedKey(ownerTypeName, sourcePropertyName));
      if (owned) return owned;
    }
    return this.#properties.get(sourcePropertyName) ?? null;
  }

  findEventMapping(sourceEventName: string, ownerTypeName?: string | null): EventMapping | null {
    if (ownerTypeName) {
      const owned = this.#ownedEvents.get(ownedKey(ownerTypeName, sourceEventName));
      if (owned) return owned;
    }
    return this.#events.get(sourceEventName) ?? null;
  }
}

/** Concatenate databases; earlier databases take precedence on conflicts. */
export function mergeMappingDatabases(...databases: readonly MappingDatabase[]): MappingDatabase {
  return {
    version: databases[0]?.version ?? "1.0.0",
    namespaces: databases.flatMap((db) => db.namespaces),
    types: databases.flatMap((db) => db.types),
    properties: databases.flatMap((db) => db.properties),
    events: databases.flatMap((db) => db.events),
  };
}

function ownedKey(owner: string, name: string): string {
  return `${owner}.${name}`;
}

function addFirst<T>(map: Map<string, T>, key: string, value: T): void {
  if (!map.has(key)) map.set(key, value);
}
