import { describe, test, expect } from "vitest";

import { diagnosticsCatalog } from "../../src/diagnostics/catalog.js";
import { DiagnosticCollector } from "../../src/diagnostics/collector.js";

describe("diagnosticsCatalog", () => {
  test("every code is namespaced and names at least one stage", () => {
    for (const [code, spec] of Object.entries(diagnosticsCatalog)) {
      expect(code.startsWith("xamlshift/")).toBe(true);
      expect(spec.stages.length).toBeGreaterThan(0);
      expect(spec.description.length).toBeGreaterThan(0);
    }
  });
});

describe("DiagnosticCollector", () => {
  test("emit takes severity and stage from the catalog", () => {
    const collector = new DiagnosticCollector("Main.xaml");
    const diagnostic = collector.emit("xamlshift/rule-failed", {
      message: "rule threw",
      location: { line: 4, column: 9 },
    });
    expect(diagnostic).toEqual({
      code: "xamlshift/rule-failed",
      message: "rule threw",
      severity: "error",
      stage: "transform",
      filePath: "Main.xaml",
      line: 4,
      column: 9,
    });
  });

  test("emit honours a severity override and an explicit file", () => {
    const collector = new DiagnosticCollector();
    const diagnostic = collector.emit("xamlshift/manual-review-required", {
      message: "check",
      severity: "info",
      filePath: "Other.xaml",
    });
    expect(diagnostic).toMatchObject({ severity: "info", filePath: "Other.xaml", line: null, column: null });
  });

  test("severity helpers and filters", () => {
    const collector = new DiagnosticCollector();
    collector.addError("custom/error", "e", "A.xaml", 1, 2);
    collector.addWarning("xamlshift/type-unresolved", "w");
    collector.addInfo("custom/info", "i", "B.xaml");

    expect(collector.count).toBe(3);
    expect(collector.hasErrors).toBe(true);
    expect(collector.errors.map((d) => d.code)).toEqual(["custom/error"]);
    expect(collector.warnings[0]?.stage).toBe("semantic");
    expect(collector.infos[0]?.stage).toBeNull();
    expect(collector.byFile("B.xaml").map((d) => d.message)).toEqual(["i"]);
    expect(collector.byCode("custom/error")[0]).toMatchObject({ line: 1, column: 2 });
  });

  test("merge appends in order", () => {
    const first = new DiagnosticCollector("A.xaml");
    const second = new DiagnosticCollector("B.xaml");
    first.addInfo("custom/one", "1");
    second.addWarning("custom/two", "2");
    second.addError("custom/three", "3");

    first.merge(second);
    first.merge([{ code: "custom/four", message: "4", severity: "info", stage: null, filePath: null, line: null, column: null }]);

    expect(first.diagnostics.map((d) => [d.code, d.filePath])).toEqual([
      ["custom/one", "A.xaml"],
      ["custom/two", "B.xaml"],
      ["custom/three", "B.xaml"],
      ["custom/four", null],
    ]);
    expect(second.count).toBe(2);
  });
});
