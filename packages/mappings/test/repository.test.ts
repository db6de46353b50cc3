import { describe, test, expect } from "vitest";

import {
  JsonMappingRepository,
  MappingLoadError,
  MappingLoadErrorCode,
  loadDefaultMappings,
  mergeMappingDatabases,
  parseMappingDatabase,
  type MappingDatabase,
} from "../src/index.js";

const database: MappingDatabase = {
  version: "2.0.0",
  namespaces: [
    { source: "urn:src", target: "urn:tgt", requiresManualReview: false },
  ],
  types: [
    { source: "ListView", target: "ListBox", note: "columns", requiresManualReview: true },
  ],
  properties: [
    { source: "Visibility", target: "IsVisible", valueConversion: "visibility-to-boolean", typeChanged: true, isAttached: false, requiresManualReview: false },
    { source: "Header", target: "Title", ownerType: "Window", typeChanged: false, isAttached: false, requiresManualReview: false },
    { source: "Header", target: "Header", typeChanged: false, isAttached: false, requiresManualReview: false },
  ],
  events: [
    { source: "MouseDown", target: "PointerPressed", signatureChanged: true, requiresManualReview: false },
    { source: "MouseDown", target: "Tapped", ownerType: "Border", signatureChanged: true, requiresManualReview: true },
  ],
};

describe("JsonMappingRepository", () => {
  const repository = new JsonMappingRepository(database);

  test("finds namespace and type mappings by exact source", () => {
    expect(repository.findNamespaceMapping("urn:src")?.target).toBe("urn:tgt");
    expect(repository.findNamespaceMapping("urn:other")).toBeNull();
    expect(repository.findTypeMapping("ListView")).toEqual(database.types[0]);
    expect(repository.findTypeMapping("listview")).toBeNull();
  });

  test("prefers owner-specific property mappings and falls back to general ones", () => {
    expect(repository.findPropertyMapping("Header", "Window")?.target).toBe("Title");
    expect(repository.findPropertyMapping("Header", "Expander")?.target).toBe("Header");
    expect(repository.findPropertyMapping("Header")?.target).toBe("Header");
    expect(repository.findPropertyMapping("Visibility", "Button")?.valueConversion).toBe("visibility-to-boolean");
  });

  test("applies the same fallback policy to events", () => {
    expect(repository.findEventMapping("MouseDown", "Border")?.target).toBe("Tapped");
    expect(repository.findEventMapping("MouseDown", "Button")?.target).toBe("PointerPressed");
    expect(repository.findEventMapping("MouseDown", null)?.target).toBe("PointerPressed");
    expect(repository.findEventMapping("Click")).toBeNull();
  });

  test("keeps the first record when keys collide", () => {
    const merged = new JsonMappingRepository(mergeMappingDatabases(
      { ...database, types: [{ source: "ListView", target: "DataGrid", requiresManualReview: false }] },
      database,
    ));
    expect(merged.findTypeMapping("ListView")?.target).toBe("DataGrid");
    expect(merged.stats).toEqual({ namespaces: 1, types: 1, properties: 3, events: 2 });
  });
});

describe("mapping JSON loading", () => {
  test("fills defaults for omitted sections and flags", () => {
    const repository = JsonMappingRepository.fromJson(
      JSON.stringify({ types: [{ source: "Label", target: "TextBlock" }] }),
    );
    expect(repository.database.version).toBe("1.0.0");
    expect(repository.database.namespaces).toEqual([]);
    expect(repository.findTypeMapping("Label")).toEqual({
      source: "Label",
      target: "TextBlock",
      requiresManualReview: false,
    });
  });

  test("rejects malformed JSON text", () => {
    try {
      JsonMappingRepository.fromJson("{ nope", "custom.json");
      expect.unreachable("expected a load error");
    } catch (error) {
      expect(error).toBeInstanceOf(MappingLoadError);
      if (error instanceof MappingLoadError) {
        expect(error.code).toBe(MappingLoadErrorCode.INVALID_JSON);
        expect(error.file).toBe("custom.json");
      }
    }
  });

  test("names the offending field for shape errors", () => {
    expect(() => parseMappingDatabase({ properties: [{ source: "A", target: 3 }] }))
      .toThrow("properties[0].target must be a non-empty string");
    expect(() => parseMappingDatabase({ events: {} })).toThrow("'events' must be an array");
    expect(() => parseMappingDatabase([])).toThrow("mapping database must be a JSON object");
  });

  test("reports unreadable files", () => {
    expect(() => JsonMappingRepository.fromFile("/nonexistent/mappings.json")).toThrow(MappingLoadError);
  });
});

describe("default mappings", () => {
  const defaults = loadDefaultMappings();

  test("map the WPF presentation namespace to Avalonia", () => {
    expect(defaults.findNamespaceMapping("http://schemas.microsoft.com/winfx/2006/xaml/presentation")?.target)
      .toBe("https://github.com/avaloniaui");
  });

  test("convert Visibility into IsVisible", () => {
    const mapping = defaults.findPropertyMapping("Visibility", "Button");
    expect(mapping?.target).toBe("IsVisible");
    expect(mapping?.valueConversion).toBe("visibility-to-boolean");
    expect(mapping?.typeChanged).toBe(true);
  });

  test("flag lossy control mappings for review", () => {
    expect(defaults.findTypeMapping("ListView")?.requiresManualReview).toBe(true);
    expect(defaults.findTypeMapping("Button")?.requiresManualReview).toBe(false);
    expect(defaults.findEventMapping("MouseDown")?.target).toBe("PointerPressed");
  });

  test("are shared between callers", () => {
    expect(loadDefaultMappings()).toBe(defaults);
  });
});
