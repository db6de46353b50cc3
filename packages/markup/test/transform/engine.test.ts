import { describe, test, expect } from "vitest";

import { DiagnosticCollector } from "../../src/diagnostics/collector.js";
import { UnifiedElement, type UnifiedDocument } from "../../src/model/ast.js";
import { MarkupExtension } from "../../src/model/markup-extension.js";
import { TransformationContext } from "../../src/transform/context.js";
import { RuleEngine } from "../../src/transform/engine.js";
import type {
  DocumentRule,
  ElementRule,
  MarkupExtensionRule,
  PropertyRule,
  TransformationRule,
} from "../../src/transform/types.js";
import { mappingRepository, parseStructure } from "../_helpers/markup.js";

function run(document: UnifiedDocument, rules: Iterable<TransformationRule>): TransformationContext {
  const context = new TransformationContext(document, mappingRepository(), new DiagnosticCollector(document.filePath));
  new RuleEngine(rules).transform(document, context);
  return context;
}

function elementRule(
  name: string,
  priority: number,
  typeName: string,
  apply: (element: UnifiedElement, context: TransformationContext) => UnifiedElement | null,
): ElementRule {
  return {
    kind: "element",
    name,
    priority,
    canApply: (element) => element.typeName === typeName,
    apply,
  };
}

describe("RuleEngine", () => {
  test("visits element, own properties with their extensions, property values, then children", () => {
    const document = parseStructure(
      `<StackPanel Tag="{Binding T}"><StackPanel.Resources><Brush/></StackPanel.Resources><Button/></StackPanel>`,
    );
    const seen: string[] = [];
    const rules: TransformationRule[] = [
      {
        kind: "element",
        name: "log-element",
        priority: 0,
        canApply: () => true,
        apply: (element) => {
          seen.push(`element:${element.typeName}`);
          return element;
        },
      } satisfies ElementRule,
      {
        kind: "property",
        name: "log-property",
        priority: 0,
        canApply: () => true,
        apply: (property) => {
          seen.push(`property:${property.name}`);
          return property;
        },
      } satisfies PropertyRule,
      {
        kind: "markup-extension",
        name: "log-extension",
        priority: 0,
        canApply: () => true,
        apply: (extension) => {
          seen.push(`extension:${extension.name}`);
          return extension;
        },
      } satisfies MarkupExtensionRule,
    ];

    run(document, rules);
    expect(seen).toEqual([
      "element:StackPanel",
      "property:Tag",
      "extension:Binding",
      "property:Resources",
      "element:Brush",
      "element:Button",
    ]);
  });

  test("only the highest-priority applicable rule runs; ties keep registration order", () => {
    const document = parseStructure("<Grid><Button/></Grid>");
    const applied: string[] = [];
    const track = (name: string) => (element: UnifiedElement) => {
      applied.push(name);
      return element;
    };

    const engine = new RuleEngine([
      elementRule("low", 10, "Button", track("low")),
      elementRule("first-high", 20, "Button", track("first-high")),
      elementRule("second-high", 20, "Button", track("second-high")),
    ]);
    expect(engine.rules.map((rule) => rule.name)).toEqual(["first-high", "second-high", "low"]);

    engine.transform(document, new TransformationContext(document, mappingRepository(), new DiagnosticCollector()));
    expect(applied).toEqual(["first-high"]);
  });

  test("a null result removes the node", () => {
    const document = parseStructure("<StackPanel><Button/><DebugOverlay/><Label/></StackPanel>");
    run(document, [elementRule("drop-debug", 0, "DebugOverlay", () => null)]);
    expect(document.root?.children.map((child) => child.typeName)).toEqual(["Button", "Label"]);
  });

  test("a replacement takes the node's place", () => {
    const document = parseStructure("<StackPanel><Button/><Label/></StackPanel>");
    run(document, [elementRule("swap", 0, "Button", () => new UnifiedElement("RepeatButton"))]);
    expect(document.root?.children.map((child) => child.typeName)).toEqual(["RepeatButton", "Label"]);
  });

  test("a replacement owned elsewhere is copied", () => {
    const document = parseStructure("<StackPanel><Button/><Label/></StackPanel>");
    const label = document.root?.children[1];
    if (!label) throw new Error("expected a label");
    run(document, [elementRule("reuse", 0, "Button", () => label)]);

    const children = document.root?.children ?? [];
    expect(children.map((child) => child.typeName)).toEqual(["Label", "Label"]);
    expect(children[0]).not.toBe(label);
    expect(children[1]).toBe(label);
  });

  test("a failing rule is reported and the node is left unchanged", () => {
    const document = parseStructure("<StackPanel><Button/><Label/></StackPanel>");
    document.filePath = "View.xaml";
    const renamed: string[] = [];
    const context = run(document, [
      elementRule("boom", 0, "Button", () => {
        throw new Error("nope");
      }),
      elementRule("rename-label", 0, "Label", (element) => {
        renamed.push(element.typeName);
        element.typeName = "TextBlock";
        return element;
      }),
    ]);

    expect(document.root?.children.map((child) => child.typeName)).toEqual(["Button", "TextBlock"]);
    expect(renamed).toEqual(["Label"]);
    expect(context.diagnostics.diagnostics).toEqual([
      {
        code: "xamlshift/rule-failed",
        message: "rule 'boom' failed on a element node: nope",
        severity: "error",
        stage: "transform",
        filePath: "View.xaml",
        line: null,
        column: null,
      },
    ]);
  });

  test("document rules all run, before the walk, in priority order", () => {
    const document = parseStructure("<Grid/>");
    const order: string[] = [];
    const documentRule = (name: string, priority: number): DocumentRule => ({
      kind: "document",
      name,
      priority,
      canApply: () => true,
      apply: () => {
        order.push(name);
      },
    });

    run(document, [
      elementRule("element", 100, "Grid", (element) => {
        order.push("element");
        return element;
      }),
      documentRule("late", 1),
      documentRule("early", 5),
    ]);
    expect(order).toEqual(["early", "late", "element"]);
  });

  test("removing an extension removes its property; nested arguments can be dropped alone", () => {
    const document = parseStructure(
      `<Button Content="{x:Null}" Tag="{Binding Path=A, Converter={StaticResource C}}"/>`,
    );
    const dropNull: MarkupExtensionRule = {
      kind: "markup-extension",
      name: "drop-null",
      priority: 0,
      canApply: (extension) => extension.name === "x:Null" || extension.name === "StaticResource",
      apply: () => null,
    };
    run(document, [dropNull]);

    const button = document.root;
    expect(button?.getProperty("Content")).toBeNull();
    expect(button?.getProperty("Tag")?.extension?.format()).toBe("{Binding Path=A}");
  });

  test("the symbol table is rebuilt after the run", () => {
    const document = parseStructure(`<Grid xmlns:x="http://schemas.microsoft.com/winfx/2006/xaml"><Button x:Name="old"/></Grid>`);
    run(document, [
      elementRule("rename", 0, "Button", (element) => {
        element.name = "renamed";
        return element;
      }),
    ]);
    expect(document.symbols.findNamed("old")).toBeNull();
    expect(document.symbols.findNamed("renamed")?.typeName).toBe("Button");
  });
});

describe("TransformationContext", () => {
  test("records the trace with the document's file", () => {
    const document = parseStructure("<Grid/>");
    document.filePath = "Main.xaml";
    const context = new TransformationContext(document, mappingRepository(), new DiagnosticCollector());
    context.recordTransformation("rename", "element", "Grid → Panel");
    expect(context.trace).toEqual([{ rule: "rename", nodeKind: "element", description: "Grid → Panel", filePath: "Main.xaml" }]);
  });

  test("extension diagnostics land on the owning property", () => {
    const document = parseStructure(`<Button Tag="{Binding Path=A, Converter={StaticResource C}}"/>`);
    const context = new TransformationContext(document, mappingRepository(), new DiagnosticCollector());
    const tag = document.root?.getProperty("Tag");
    const converter = tag?.extension?.getParameter("Converter");
    if (!(converter instanceof MarkupExtension)) throw new Error("expected a nested extension");

    const diagnostic = context.report(converter, "xamlshift/unsupported-extension", "check the converter");
    expect(diagnostic.severity).toBe("warning");
    expect(tag?.diagnostics.map((d) => [d.code, d.message])).toEqual([
      ["xamlshift/unsupported-extension", "check the converter"],
    ]);
  });
});
