import { describe, test, expect } from "vitest";

import {
  MarkupExtension,
  quoteExtensionValue,
  unquoteExtensionValue,
} from "../../src/model/markup-extension.js";

describe("MarkupExtension", () => {
  test("format writes the positional argument before named parameters", () => {
    const binding = new MarkupExtension("Binding", "Name", [["Mode", "TwoWay"]]);
    expect(binding.format()).toBe("{Binding Name, Mode=TwoWay}");
    expect(new MarkupExtension("x:Null").format()).toBe("{x:Null}");
  });

  test("nested extensions format recursively and point at their parent", () => {
    const converter = new MarkupExtension("StaticResource", "MyConverter");
    const binding = new MarkupExtension("Binding", null, [
      ["Path", "Value"],
      ["Converter", converter],
    ]);
    expect(converter.parent).toBe(binding);
    expect(binding.nestedExtensions()).toEqual([converter]);
    expect(binding.format()).toBe("{Binding Path=Value, Converter={StaticResource MyConverter}}");
  });

  test("renameParameter keeps the parameter's position", () => {
    const extension = new MarkupExtension("Binding", null, [
      ["A", "1"],
      ["B", "2"],
      ["C", "3"],
    ]);
    expect(extension.renameParameter("B", "D")).toBe(true);
    expect([...extension.parameters.keys()]).toEqual(["A", "D", "C"]);
    expect(extension.getParameter("D")).toBe("2");
    expect(extension.renameParameter("Missing", "X")).toBe(false);
  });

  test("setParameter replaces in place", () => {
    const extension = new MarkupExtension("Binding", null, [
      ["Path", "A"],
      ["Mode", "OneWay"],
    ]);
    extension.setParameter("Path", "B");
    expect(extension.format()).toBe("{Binding Path=B, Mode=OneWay}");
  });

  test("removeParameter unlinks nested extensions", () => {
    const source = new MarkupExtension("StaticResource", "Model");
    const binding = new MarkupExtension("Binding", null, [["Source", source]]);
    expect(binding.removeParameter("Source")).toBe(true);
    expect(source.parent).toBeNull();
    expect(binding.format()).toBe("{Binding}");
  });

  test("clone is deep", () => {
    const binding = new MarkupExtension("Binding", null, [["Converter", new MarkupExtension("StaticResource", "C")]]);
    const copy = binding.clone();
    const nested = copy.getParameter("Converter");
    expect(nested).toBeInstanceOf(MarkupExtension);
    expect(nested).not.toBe(binding.getParameter("Converter"));
    expect(copy.format()).toBe(binding.format());
  });
});

describe("payloads", () => {
  test("binding payload reads the path from the positional argument", () => {
    const binding = new MarkupExtension("Binding", "Customer.Name", [
      ["Mode", "TwoWay"],
      ["StringFormat", "'{0:N2}'"],
    ]);
    expect(binding.payload).toMatchObject({
      kind: "binding",
      path: "Customer.Name",
      mode: "TwoWay",
      stringFormat: "{0:N2}",
      converter: null,
    });
  });

  test("template bindings read Property", () => {
    const template = new MarkupExtension("TemplateBinding", null, [["Property", "Background"]]);
    expect(template.payload).toMatchObject({ kind: "binding", path: "Background" });
  });

  test("resource payload marks dynamic lookups", () => {
    expect(new MarkupExtension("StaticResource", "Accent").payload).toEqual({
      kind: "resource",
      resourceKey: "Accent",
      isDynamic: false,
    });
    expect(new MarkupExtension("DynamicResource", null, [["ResourceKey", "Accent"]]).payload).toEqual({
      kind: "resource",
      resourceKey: "Accent",
      isDynamic: true,
    });
  });

  test("static payload splits owner and member", () => {
    expect(new MarkupExtension("x:Static", "local:Colors.Accent").payload).toEqual({
      kind: "static",
      memberPath: "local:Colors.Accent",
      ownerType: "local:Colors",
      memberName: "Accent",
    });
  });

  test("type payload and extensions without one", () => {
    expect(new MarkupExtension("x:Type", "Button").payload).toEqual({ kind: "type", typeName: "Button" });
    expect(new MarkupExtension("x:Null").payload).toBeNull();
  });
});

describe("argument quoting", () => {
  test("quoteExtensionValue leaves plain text alone", () => {
    expect(quoteExtensionValue("$parent[Window].Title")).toBe("$parent[Window].Title");
  });

  test("quoteExtensionValue wraps and escapes special characters", () => {
    expect(quoteExtensionValue("a,b")).toBe("'a,b'");
    expect(quoteExtensionValue("it's")).toBe("'it\\'s'");
    expect(quoteExtensionValue(" padded")).toBe("' padded'");
  });

  test("unquoteExtensionValue strips quotes and escapes", () => {
    expect(unquoteExtensionValue("'it\\'s'")).toBe("it's");
    expect(unquoteExtensionValue('"{0}"')).toBe("{0}");
    expect(unquoteExtensionValue("plain")).toBe("plain");
  });
});
