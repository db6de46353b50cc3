import { describe, test, expect } from "vitest";

import { InMemoryCompanionOracle, validateCompanionLinkage } from "../../src/companion/linkage.js";
import { DiagnosticCollector } from "../../src/diagnostics/collector.js";
import type { UnifiedDocument } from "../../src/model/ast.js";
import { HybridParser } from "../../src/pipeline/hybrid-parser.js";
import { WINDOW_XMLNS, parseStructure } from "../_helpers/markup.js";

const MAIN_WINDOW = [
  `<Window ${WINDOW_XMLNS} x:Class="App.MainWindow">`,
  `  <StackPanel>`,
  `    <Button x:Name="ok" Click="OnOk"/>`,
  `    <TextBox x:Name="input" TextChanged="OnText"/>`,
  `  </StackPanel>`,
  `</Window>`,
].join("\n");

function parse(source: string): UnifiedDocument {
  const document = new HybridParser().parse(source, "MainWindow.xaml");
  if (!document) throw new Error("expected a document");
  return document;
}

describe("validateCompanionLinkage", () => {
  test("reports names without members and handlers that are not methods", () => {
    const document = parse(MAIN_WINDOW);
    const oracle = new InMemoryCompanionOracle([
      {
        qualifiedName: "App.MainWindow",
        members: [
          { name: "ok", kind: "field" },
          { name: "OnOk", kind: "method", signature: "void OnOk(object, RoutedEventArgs)" },
          { name: "OnText", kind: "property" },
        ],
      },
    ]);
    const diagnostics = new DiagnosticCollector();

    const link = validateCompanionLinkage(document, oracle, diagnostics);
    expect(link).toEqual({ qualifiedName: "App.MainWindow", resolved: true, memberCount: 3 });
    expect(document.metadata.companion).toEqual(link);
    expect(diagnostics.diagnostics.map((d) => [d.code, d.message, d.line, d.filePath])).toEqual([
      ["xamlshift/companion-member-missing", "'input' (TextBox) has no member in App.MainWindow", 4, "MainWindow.xaml"],
      [
        "xamlshift/companion-handler-missing",
        "handler 'OnText' for TextChanged is not a method of App.MainWindow",
        4,
        "MainWindow.xaml",
      ],
    ]);
  });

  test("a missing unit is reported once and recorded as unresolved", () => {
    const document = parse(MAIN_WINDOW);
    const diagnostics = new DiagnosticCollector();

    const link = validateCompanionLinkage(document, new InMemoryCompanionOracle(), diagnostics);
    expect(link).toEqual({ qualifiedName: "App.MainWindow", resolved: false, memberCount: 0 });
    expect(diagnostics.diagnostics.map((d) => [d.code, d.message])).toEqual([
      ["xamlshift/companion-unit-missing", "x:Class 'App.MainWindow' has no companion class"],
    ]);
  });

  test("documents without x:Class are skipped", () => {
    const document = parseStructure(`<Window ${WINDOW_XMLNS}><Button x:Name="ok"/></Window>`);
    const diagnostics = new DiagnosticCollector();

    expect(validateCompanionLinkage(document, new InMemoryCompanionOracle(), diagnostics)).toBeNull();
    expect(document.metadata.companion).toBeUndefined();
    expect(diagnostics.count).toBe(0);
  });

  test("handlers are only checked once types are resolved", () => {
    const document = parseStructure(MAIN_WINDOW);
    const oracle = new InMemoryCompanionOracle().add({
      qualifiedName: "App.MainWindow",
      members: [
        { name: "ok", kind: "field" },
        { name: "input", kind: "field" },
      ],
    });
    const diagnostics = new DiagnosticCollector();

    validateCompanionLinkage(document, oracle, diagnostics);
    expect(diagnostics.count).toBe(0);
  });
});
