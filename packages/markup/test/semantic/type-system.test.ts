import { describe, test, expect } from "vitest";

import { CatalogTypeSystem, loadPresentationTypeCatalog, parseTypeCatalog } from "../../src/semantic/type-system.js";
import { TypeCatalogError } from "../../src/shared/errors.js";
import { AVALONIA_NS, WPF_NS, X_NS } from "../_helpers/markup.js";

describe("presentation type catalog", () => {
  const types = loadPresentationTypeCatalog();

  test("is loaded once and shared", () => {
    expect(loadPresentationTypeCatalog()).toBe(types);
    expect(types.size).toBeGreaterThan(100);
  });

  test("types resolve only in their own namespace", () => {
    expect(types.resolveType(WPF_NS, "Button")?.fullName).toBe("System.Windows.Controls.Button");
    expect(types.resolveType(AVALONIA_NS, "Button")).toBeNull();
    expect(types.resolveType(null, "Button")).toBeNull();
    expect(types.resolveType(WPF_NS, "Gauge")).toBeNull();
  });

  test("members are found along the base-type chain", () => {
    const button = types.resolveType(WPF_NS, "Button");
    if (!button) throw new Error("Button missing from catalog");

    expect(types.resolveProperty(button, "Content")).toEqual({
      name: "Content",
      declaringType: "ContentControl",
      valueType: "Object",
      kind: "property",
      isAttached: false,
    });
    expect(types.resolveProperty(button, "Click")).toMatchObject({
      declaringType: "ButtonBase",
      valueType: "RoutedEventHandler",
      kind: "event",
    });
    expect(types.resolveProperty(button, "Visibility")?.declaringType).toBe("UIElement");
    expect(types.resolveProperty(button, "NoSuchMember")).toBeNull();
  });

  test("attached members", () => {
    expect(types.resolveAttachedProperty("Grid", "Row")).toEqual({
      name: "Row",
      declaringType: "Grid",
      valueType: "Int32",
      kind: "property",
      isAttached: true,
    });
    expect(types.resolveAttachedProperty("Grid", "Title")).toBeNull();
  });

  test("extension names resolve with and without the Extension suffix", () => {
    expect(types.resolveMarkupExtension(WPF_NS, "StaticResource")?.name).toBe("StaticResourceExtension");
    expect(types.resolveMarkupExtension(WPF_NS, "Binding")?.name).toBe("Binding");
    expect(types.resolveMarkupExtension(X_NS, "Type")?.name).toBe("TypeExtension");
    expect(types.resolveMarkupExtension(WPF_NS, "Type")).toBeNull();
  });
});

describe("parseTypeCatalog", () => {
  test("namespace aliases expand to URIs", () => {
    const [entry] = parseTypeCatalog({
      namespaces: { ui: "urn:ui" },
      types: [{ name: "Gauge", clrNamespace: "App.Controls", xmlNamespace: "ui", properties: { Value: "Double" } }],
    });
    expect(entry?.descriptor).toEqual({
      name: "Gauge",
      fullName: "App.Controls.Gauge",
      xmlNamespace: "urn:ui",
      baseType: null,
      contentProperty: null,
      isMarkupExtension: false,
    });
    expect(entry?.properties.get("Value")).toBe("Double");
  });

  test.each([
    [[], "type catalog must be a JSON object"],
    [{ types: {} }, "'types' must be an array"],
    [{ types: [{ name: "", clrNamespace: "A" }] }, "types[0].name must be a non-empty string"],
    [{ types: [{ name: "A", clrNamespace: "N", properties: { X: 1 } }] }, "types[0].properties.X must be a string"],
  ])("rejects malformed catalogs (%#)", (value, message) => {
    expect(() => parseTypeCatalog(value)).toThrow(new TypeCatalogError(message));
  });

  test("unreadable catalog files raise a catalog error", () => {
    expect(() => loadPresentationTypeCatalog("/nonexistent/catalog.json")).toThrow(TypeCatalogError);
  });

  test("base-type cycles do not loop", () => {
    const system = new CatalogTypeSystem(
      parseTypeCatalog({
        namespaces: {},
        types: [
          { name: "A", clrNamespace: "", xmlNamespace: "urn:t", baseType: "B" },
          { name: "B", clrNamespace: "", xmlNamespace: "urn:t", baseType: "A" },
        ],
      }),
    );
    const a = system.resolveType("urn:t", "A");
    expect(a?.fullName).toBe("A");
    if (a) expect(system.resolveProperty(a, "Missing")).toBeNull();
  });
});
