import { describe, test, expect, vi } from "vitest";

import { DiagnosticCollector } from "../../src/diagnostics/collector.js";
import { HybridParser } from "../../src/pipeline/hybrid-parser.js";
import { XmldomSemanticReader, type SemanticReader } from "../../src/semantic/semantic-reader.js";
import { CatalogTypeSystem, loadPresentationTypeCatalog } from "../../src/semantic/type-system.js";
import type { Logger } from "../../src/shared/logger.js";
import { WINDOW_XMLNS } from "../_helpers/markup.js";

const BUTTON_WINDOW = `<Window ${WINDOW_XMLNS}>\n  <Button x:Name="ok" Content="OK"/>\n</Window>`;

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

const failingReader: SemanticReader = {
  read() {
    throw new Error("object graph unavailable");
  },
};

// Reads a real graph whose root refuses to list its content objects.
const unreadableItemsReader: SemanticReader = {
  read(source, filePath) {
    const graph = new XmldomSemanticReader(loadPresentationTypeCatalog()).read(source, filePath);
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

class ThrowingTypeSystem extends CatalogTypeSystem {
  override resolveType(): never {
    throw new Error("catalog offline");
  }
}

describe("HybridParser", () => {
  test("starts idle and reaches done on a clean document", () => {
    const parser = new HybridParser();
    expect(parser.state).toBe("idle");

    const document = parser.parse(BUTTON_WINDOW, "Main.xaml");
    expect(parser.state).toBe("done");
    expect(document?.filePath).toBe("Main.xaml");
    expect(document?.root?.resolvedType?.name).toBe("Window");
    expect(document?.symbols.findNamed("ok")?.resolvedType?.name).toBe("Button");
    expect(parser.diagnostics.count).toBe(0);
  });

  test("structural failure yields no document and an error", () => {
    const logger = recordingLogger();
    const parser = new HybridParser({ logger });

    expect(parser.parse("<Window><Button></Window>", "Broken.xaml")).toBeNull();
    expect(parser.state).toBe("idle");

    const [error] = parser.diagnostics.diagnostics;
    expect(error?.code).toBe("xamlshift/malformed-markup");
    expect(error?.severity).toBe("error");
    expect(error?.filePath).toBe("Broken.xaml");
    expect(error?.line).toBe(1);
    expect(logger.lines).toHaveLength(1);
    expect(logger.lines[0]?.startsWith("error: Broken.xaml: ")).toBe(true);
  });

  test("semantic failure degrades to the structural tree", () => {
    const logger = recordingLogger();
    const parser = new HybridParser({ semanticReader: failingReader, logger });

    const document = parser.parse(BUTTON_WINDOW);
    expect(parser.state).toBe("structural-only");
    expect(document?.root?.children[0]?.name).toBe("ok");
    expect(document?.root?.resolvedType).toBeNull();

    const [warning] = parser.diagnostics.byCode("xamlshift/semantic-parse-failed");
    expect(warning?.severity).toBe("warning");
    expect(warning?.message).toBe(
      "type-resolving parse failed, continuing without resolved types: object graph unavailable",
    );
    expect(logger.lines).toEqual(["warn: <input>: semantic parse failed: object graph unavailable"]);
  });

  test("structuralOnly skips the semantic reader", () => {
    const read = vi.fn<SemanticReader["read"]>();
    const parser = new HybridParser({ semanticReader: { read }, structuralOnly: true });

    expect(parser.parse(BUTTON_WINDOW)?.root?.typeName).toBe("Window");
    expect(parser.state).toBe("structural-only");
    expect(read).not.toHaveBeenCalled();
  });

  test("parses into a caller-provided collector", () => {
    const diagnostics = new DiagnosticCollector("Shared.xaml");
    const parser = new HybridParser({ diagnostics });
    parser.parse("<Broken");
    expect(parser.diagnostics).toBe(diagnostics);
    expect(diagnostics.count).toBe(1);
  });

  test("parseDetailed leaves the parser's collector alone", () => {
    const parser = new HybridParser();
    const result = parser.parseDetailed({ source: "<Broken", filePath: "A.xaml" });

    expect(result.document).toBeNull();
    expect(result.state).toBe("idle");
    expect(result.diagnostics.filePath).toBe("A.xaml");
    expect(result.diagnostics.count).toBe(1);
    expect(parser.diagnostics.count).toBe(0);
  });

  test("parseGroup keeps documents independent and merges diagnostics in order", () => {
    const parser = new HybridParser();
    const results = parser.parseGroup([
      { source: "<Broken", filePath: "A.xaml" },
      { source: BUTTON_WINDOW, filePath: "B.xaml" },
      { source: "<Also></Broken>", filePath: "C.xaml" },
    ]);

    expect(results.map((result) => result.state)).toEqual(["idle", "done", "idle"]);
    expect(results[1]?.document?.root?.typeName).toBe("Window");
    expect(parser.diagnostics.diagnostics.map((d) => d.filePath)).toEqual(["A.xaml", "C.xaml"]);
  });

  test("a failed merge degrades to a freshly lowered structural tree", () => {
    const logger = recordingLogger();
    const parser = new HybridParser({ semanticReader: unreadableItemsReader, logger });

    const document = parser.parse(BUTTON_WINDOW, "Main.xaml");
    expect(parser.state).toBe("structural-only");
    expect(document?.root?.resolvedType).toBeNull();
    expect(document?.root?.children[0]?.name).toBe("ok");
    expect(parser.diagnostics.diagnostics.map((d) => [d.code, d.severity, d.message, d.filePath])).toEqual([
      [
        "xamlshift/merge-failed",
        "warning",
        "attaching resolved types failed, continuing without them: item list unreadable",
        "Main.xaml",
      ],
    ]);
    expect(logger.lines).toEqual(["warn: Main.xaml: merge failed: item list unreadable"]);
  });

  test("an unexpected error while building the tree is reported, not thrown", () => {
    const logger = recordingLogger();
    const parser = new HybridParser({ typeSystem: new ThrowingTypeSystem([]), logger });

    expect(parser.parse(`<Window ${WINDOW_XMLNS}><TextBlock>Hi</TextBlock></Window>`, "Text.xaml")).toBeNull();
    expect(parser.state).toBe("idle");
    expect(parser.diagnostics.diagnostics.map((d) => [d.code, d.severity, d.message])).toEqual([
      ["xamlshift/structure-conversion-failed", "error", "building the document failed: catalog offline"],
    ]);
    expect(logger.lines).toEqual(["error: Text.xaml: building the document failed: catalog offline"]);
  });

  test("enrichment findings carry the file even when the collector has none", () => {
    const parser = new HybridParser();
    parser.parse(`<StackPanel ${WINDOW_XMLNS} Foo="1"/>`, "Panel.xaml");
    expect(parser.diagnostics.filePath).toBeNull();
    expect(parser.diagnostics.diagnostics.map((d) => [d.code, d.filePath])).toEqual([
      ["xamlshift/member-unresolved", "Panel.xaml"],
    ]);
  });
});
