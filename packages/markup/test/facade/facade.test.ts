import { describe, test, expect } from "vitest";

import { InMemoryCompanionOracle } from "../../src/companion/linkage.js";
import { convertMarkup } from "../../src/facade.js";
import { XmldomSemanticReader, type SemanticReader } from "../../src/semantic/semantic-reader.js";
import { loadPresentationTypeCatalog } from "../../src/semantic/type-system.js";
import type { Logger } from "../../src/shared/logger.js";
import { AVALONIA_NS, WINDOW_XMLNS, WPF_NS, X_NS } from "../_helpers/markup.js";

const SOURCE = `<Window ${WINDOW_XMLNS} Title="T">\n  <Button Visibility="Collapsed" Click="OnClick"/>\n</Window>\n`;
const CONVERTED = `<Window xmlns="${AVALONIA_NS}" xmlns:x="${X_NS}" Title="T">\n  <Button IsVisible="False" Click="OnClick"/>\n</Window>\n`;

function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    log: (message) => lines.push(`log: ${message}`),
    info: (message) => lines.push(`info: ${message}`),
    warn: (message) => lines.push(`warn: ${message}`),
    error: (message) => lines.push(`error: ${message}`),
  };
}

describe("convertMarkup", () => {
  test("parses, rewrites and writes a window", () => {
    const logger = recordingLogger();
    const result = convertMarkup(SOURCE, { filePath: "Main.xaml", logger });

    expect(result.success).toBe(true);
    expect(result.parserState).toBe("done");
    expect(result.output).toBe(CONVERTED);
    expect(result.diagnostics.count).toBe(0);
    expect(result.trace.map((entry) => entry.rule)).toEqual(["namespace-rewrite", "property-mapping", "property-mapping"]);
    expect(result.document?.metadata.targetNamespace).toBe(AVALONIA_NS);
    expect(logger.lines).toEqual(["info: Main.xaml: 3 transformation(s), 0 error(s), 0 warning(s)"]);
  });

  test("a structural failure returns no output", () => {
    const logger = recordingLogger();
    const result = convertMarkup("<Window><Button></Window>", { filePath: "Broken.xaml", logger });

    expect(result.success).toBe(false);
    expect(result.output).toBeNull();
    expect(result.document).toBeNull();
    expect(result.parserState).toBe("idle");
    expect(result.trace).toEqual([]);
    expect(result.diagnostics.errors.map((d) => d.code)).toEqual(["xamlshift/malformed-markup"]);
    expect(logger.lines[0]?.startsWith("error: Broken.xaml: ")).toBe(true);
  });

  test("the same input converts to the same output", () => {
    const first = convertMarkup(SOURCE);
    const second = convertMarkup(SOURCE);
    expect(second.output).toBe(first.output);
    expect(second.trace).toEqual(first.trace);
  });

  test("structural-only parsing still converts", () => {
    const result = convertMarkup(SOURCE, { parser: { structuralOnly: true } });
    expect(result.parserState).toBe("structural-only");
    expect(result.output).toBe(CONVERTED);
  });

  test("custom rules and serialization options are honoured", () => {
    const result = convertMarkup(`<Window xmlns="${WPF_NS}"><Button/></Window>`, {
      rules: [],
      serialization: { useTargetNamespace: true },
    });
    expect(result.trace).toEqual([]);
    expect(result.output).toBe(`<Window xmlns="${AVALONIA_NS}" xmlns:x="${X_NS}"><Button/></Window>`);
  });

  test("the companion check reports into the same collector", () => {
    const result = convertMarkup(`<Window ${WINDOW_XMLNS} x:Class="App.Shell"/>`, {
      filePath: "Shell.xaml",
      companion: new InMemoryCompanionOracle(),
    });
    expect(result.success).toBe(true);
    expect(result.document?.metadata.companion).toEqual({ qualifiedName: "App.Shell", resolved: false, memberCount: 0 });
    expect(result.diagnostics.diagnostics.map((d) => [d.code, d.filePath])).toEqual([
      ["xamlshift/companion-unit-missing", "Shell.xaml"],
    ]);
  });

  test("element text survives a conversion with no rules", () => {
    const source = `<Window ${WINDOW_XMLNS}>\n  <Button>Click me</Button>\n  <TextBlock>a <Bold>b</Bold> c</TextBlock>\n</Window>\n`;
    const result = convertMarkup(source, { rules: [] });
    expect(result.parserState).toBe("done");
    expect(result.output).toBe(source);
  });

  test("a failure while attaching types still converts the structural tree", () => {
    const itemsUnreadable: SemanticReader = {
      read(text, filePath) {
        const graph = new XmldomSemanticReader(loadPresentationTypeCatalog()).read(text, filePath);
        return {
          filePath,
          root: {
            ...graph.root,
            get items(): never {
              throw new Error("item list unreadable");
            },
          },
        };
      },
    };
    const result = convertMarkup(SOURCE, { filePath: "Main.xaml", parser: { semanticReader: itemsUnreadable } });

    expect(result.success).toBe(true);
    expect(result.parserState).toBe("structural-only");
    expect(result.output).toBe(CONVERTED);
    expect(result.diagnostics.byCode("xamlshift/merge-failed").map((d) => d.filePath)).toEqual(["Main.xaml"]);
  });

  test("a throwing companion lookup is reported and the conversion goes on", () => {
    const logger = recordingLogger();
    const result = convertMarkup(`<Window ${WINDOW_XMLNS} x:Class="App.Shell"/>`, {
      filePath: "Shell.xaml",
      logger,
      companion: {
        findUnit() {
          throw new Error("index locked");
        },
      },
    });

    expect(result.success).toBe(true);
    expect(result.output).not.toBeNull();
    expect(result.diagnostics.diagnostics.map((d) => [d.code, d.message])).toEqual([
      ["xamlshift/companion-check-failed", "companion lookup failed: index locked"],
    ]);
    expect(logger.lines[0]).toBe("warn: Shell.xaml: companion lookup failed: index locked");
  });
});
