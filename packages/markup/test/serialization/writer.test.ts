import { describe, test, expect } from "vitest";

import { DiagnosticCollector } from "../../src/diagnostics/collector.js";
import { UnifiedElement } from "../../src/model/ast.js";
import { formatBanner } from "../../src/serialization/banner.js";
import { escapeAttribute, escapeText, serializeToText } from "../../src/serialization/writer.js";
import { AVALONIA_NS, WPF_NS, X_NS, parseStructure } from "../_helpers/markup.js";

const MAIN_WINDOW = [
  `<?xml version="1.0" encoding="utf-8"?>`,
  `<!-- Main window -->`,
  `<Window xmlns="${WPF_NS}"`,
  `        xmlns:x="${X_NS}"`,
  `        x:Class="App.MainWindow"`,
  `        Title = 'Main &amp; more'>`,
  `    <Grid>`,
  `        <Grid.RowDefinitions>`,
  `            <RowDefinition Height="Auto"/>`,
  `        </Grid.RowDefinitions>`,
  `        <Button Grid.Row="1" Content="{Binding Go}" />`,
  `        <!-- note -->`,
  `    </Grid>`,
  `</Window>`,
  ``,
].join("\n");

describe("serializeToText", () => {
  test("an untouched document is written back byte for byte", () => {
    expect(serializeToText(parseStructure(MAIN_WINDOW))).toBe(MAIN_WINDOW);
  });

  test("a changed value is re-encoded with the recorded quote and spacing", () => {
    const document = parseStructure(MAIN_WINDOW);
    document.root?.getProperty("Title")?.setLiteral("New <one>");
    expect(serializeToText(document)).toBe(MAIN_WINDOW.replace("Title = 'Main &amp; more'", "Title = 'New &lt;one>'"));
  });

  test("changed text content is escaped; unchanged text keeps its entities", () => {
    const source = "<TextBlock>a &amp; b</TextBlock>";
    expect(serializeToText(parseStructure(source))).toBe(source);

    const document = parseStructure(source);
    if (document.root) document.root.textContent = "x < y";
    expect(serializeToText(document)).toBe("<TextBlock>x &lt; y</TextBlock>");
  });

  test("a new child borrows the indentation of its previous sibling", () => {
    const document = parseStructure("<StackPanel>\n  <Button/>\n</StackPanel>");
    document.root?.addChild(new UnifiedElement("Label"));
    expect(serializeToText(document)).toBe("<StackPanel>\n  <Button/>\n  <Label />\n</StackPanel>");
  });

  test("without preserved formatting the tree is re-indented", () => {
    const document = parseStructure(`<StackPanel  Margin = "1"><Button/>  <!--c--></StackPanel>`);
    expect(serializeToText(document, { preserveFormatting: false })).toBe(
      `<StackPanel Margin="1">\n    <Button />\n    <!--c-->\n</StackPanel>\n`,
    );
  });

  test("sortAttributes orders properties after declarations and directives", () => {
    const document = parseStructure(`<Button xmlns:x="${X_NS}" Width="2" x:Name="b" Content="A"/>`);
    expect(serializeToText(document, { preserveFormatting: false, sortAttributes: true, indent: "  " })).toBe(
      `<Button xmlns:x="${X_NS}" x:Name="b" Content="A" Width="2" />\n`,
    );
  });

  test("comments can be dropped", () => {
    const document = parseStructure("<!-- a --><Grid><!-- b --></Grid>");
    expect(serializeToText(document, { preserveComments: false })).toBe("<Grid></Grid>");
  });

  test("useTargetNamespace rebinds the root's default namespace and declares x", () => {
    const document = parseStructure(`<Window xmlns="${WPF_NS}"><Button/></Window>`);
    expect(serializeToText(document, { useTargetNamespace: true })).toBe(
      `<Window xmlns="${AVALONIA_NS}" xmlns:x="${X_NS}"><Button/></Window>`,
    );
  });

  test("a namespace override uses a prefix in scope, or declares a default", () => {
    const declared = parseStructure(`<Grid xmlns="${WPF_NS}" xmlns:e="urn:extra"><Button/></Grid>`);
    const bound = declared.root?.children[0];
    if (bound) bound.namespaceOverride = "urn:extra";
    expect(serializeToText(declared)).toBe(`<Grid xmlns="${WPF_NS}" xmlns:e="urn:extra"><e:Button/></Grid>`);

    const undeclared = parseStructure(`<Grid xmlns="${WPF_NS}"><Button/></Grid>`);
    const unbound = undeclared.root?.children[0];
    if (unbound) unbound.namespaceOverride = "urn:extra";
    expect(serializeToText(undeclared)).toBe(`<Grid xmlns="${WPF_NS}"><Button xmlns="urn:extra"/></Grid>`);
  });

  test("the review banner is appended as a trailing comment", () => {
    const diagnostics = new DiagnosticCollector();
    diagnostics.addWarning("custom/check", "look at this", undefined, 1);
    const banner = formatBanner(
      [{ severity: "warning", code: "custom/check", message: "look at this", line: 1 }],
      10,
    );

    const text = serializeToText(parseStructure("<Grid/>"), { addDiagnosticComments: true }, diagnostics);
    expect(text).toBe(`<Grid/>\n<!--${banner ?? ""}-->`);
  });
});

describe("content round trips", () => {
  test.each([
    ["leaf text", "<StackPanel>\n  <TextBlock>Hello</TextBlock>\n</StackPanel>"],
    ["text in a property-element", "<Button><Button.Content>Hi</Button.Content></Button>"],
    ["mixed content", "<TextBlock>Hello <Bold>World</Bold> !</TextBlock>"],
    ["a CDATA section", "<TextBlock><![CDATA[a < b]]></TextBlock>"],
    ["whitespace-only content", "<Grid>\n</Grid>"],
    ["whitespace-only content in a child", "<Grid><Border>\n  </Border></Grid>"],
    ["whitespace inside a close tag", "<Grid>\n  <Button/>\n</Grid >"],
    ["whitespace after a trailing comment", '\uFEFF<?xml version="1.0"?>\n<Grid/>\n<!-- end -->\n'],
  ])("%s is written back unchanged", (_, source) => {
    expect(serializeToText(parseStructure(source))).toBe(source);
  });

  test("edited CDATA text is written as escaped text", () => {
    const document = parseStructure("<TextBlock><![CDATA[a < b]]></TextBlock>");
    if (document.root) document.root.textContent = "a < c";
    expect(serializeToText(document)).toBe("<TextBlock>a &lt; c</TextBlock>");
  });

  test("close-tag whitespace is dropped when formatting is not preserved", () => {
    expect(serializeToText(parseStructure("<Grid>\n  <Button/>\n</Grid >"), { preserveFormatting: false })).toBe(
      "<Grid>\n    <Button />\n</Grid>\n",
    );
  });
});

describe("escaping", () => {
  test("attribute values escape only the quote in use", () => {
    expect(escapeAttribute(`a"b'c&<\n`, '"')).toBe("a&quot;b'c&amp;&lt;&#10;");
    expect(escapeAttribute(`a"b'c`, "'")).toBe(`a"b&apos;c`);
  });

  test("text escapes markup characters", () => {
    expect(escapeText("1 < 2 && 3 > 2")).toBe("1 &lt; 2 &amp;&amp; 3 &gt; 2");
  });
});
