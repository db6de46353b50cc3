import { MappingLoadError, MappingLoadErrorCode } from "./errors.js";
import type {
  EventMapping,
  MappingDatabase,
  MappingRecordBase,
  NamespaceMapping,
  PropertyMapping,
  TypeMapping,
} from "./types.js";

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Narrow parsed JSON into a {@link MappingDatabase}.
 *
 * Missing sections are treated as empty; missing booleans default to false.
 * Anything else that does not match throws {@link MappingLoadError}.
 */
export function parseMappingDatabase(value: unknown, file?: string): MappingDatabase {
  if (!isObject(value)) {
    throw shapeError("mapping database must be a JSON object", file);
  }
  const version = optionalString(value, "version", "database", file) ?? "1.0.0";
  return {
    version,
    namespaces: section(value, "namespaces", file).map((entry, i): NamespaceMapping => readBase(entry, `namespaces[${i}]`, file)),
    types: section(value, "types", file).map((entry, i) => readType(entry, `types[${i}]`, file)),
    properties: section(value, "properties", file).map((entry, i) => readProperty(entry, `properties[${i}]`, file)),
    events: section(value, "events", file).map((entry, i) => readEvent(entry, `events[${i}]`, file)),
  };
}

function section(root: JsonObject, key: string, file: string | undefined): JsonObject[] {
  const raw = root[key];
  if (raw === undefined) return [];
  if (!Array.isArray(raw)) {
    throw shapeError(`'${key}' must be an array`, file);
  }
  return raw.map((entry: unknown, i) => {
    if (!isObject(entry)) throw shapeError(`${key}[${i}] must be an object`, file);
    return entry;
  });
}

function readBase(entry: JsonObject, where: string, file: string | undefined): MappingRecordBase {
  const note = optionalString(entry, "note", where, file);
  return {
    source: requiredString(entry, "source", where, file),
    target: requiredString(entry, "target", where, file),
    ...(note !== undefined && { note }),
    requiresManualReview: optionalBoolean(entry, "requiresManualReview", where, file),
  };
}

function readType(entry: JsonObject, where: string, file: string | undefined): TypeMapping {
  const targetNamespace = optionalString(entry, "targetNamespace", where, file);
  return {
    ...readBase(entry, where, file),
    ...(targetNamespace !== undefined && { targetNamespace }),
  };
}

function readProperty(entry: JsonObject, where: string, file: string | undefined): PropertyMapping {
  const ownerType = optionalString(entry, "ownerType", where, file);
  const valueConversion = optionalString(entry, "valueConversion", where, file);
  return {
    ...readBase(entry, where, file),
    ...(ownerType !== undefined && { ownerType }),
    ...(valueConversion !== undefined && { valueConversion }),
    typeChanged: optionalBoolean(entry, "typeChanged", where, file),
    isAttached: optionalBoolean(entry, "isAttached", where, file),
  };
}

function readEvent(entry: JsonObject, where: string, file: string | undefined): EventMapping {
  const ownerType = optionalString(entry, "ownerType", where, file);
  return {
    ...readBase(entry, where, file),
    ...(ownerType !== undefined && { ownerType }),
    signatureChanged: optionalBoolean(entry, "signatureChanged", where, file),
  };
}

function requiredString(entry: JsonObject, key: string, where: string, file: string | undefined): string {
  const value = entry[key];
  if (typeof value !== "string" || value.length === 0) {
    throw shapeError(`${where}.${key} must be a non-empty string`, file);
  }
  return value;
}

function optionalString(entry: JsonObject, key: string, where: string, file: string | undefined): string | undefined {
  const value = entry[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw shapeError(`${where}.${key} must be a string`, file);
  }
  return value;
}

function optionalBoolean(entry: JsonObject, key: string, where: string, file: string | undefined): boolean {
  const value = entry[key];
  if (value === undefined || value === null) return false;
  if (typeof value !== "boolean") {
    throw shapeError(`${where}.${key} must be a boolean`, file);
  }
  return value;
}

function shapeError(message: string, file: string | undefined): MappingLoadError {
  return new MappingLoadError(message, MappingLoadErrorCode.INVALID_SHAPE, file);
}
