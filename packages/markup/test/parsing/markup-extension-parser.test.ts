import { describe, test, expect } from "vitest";

import { MarkupExtension } from "../../src/model/markup-extension.js";
import { isMarkupExtensionSyntax, parseMarkupExtension } from "../../src/parsing/markup-extension-parser.js";

function parsed(text: string): MarkupExtension {
  const result = parseMarkupExtension(text);
  if (!result.ok) throw new Error(`parse failed: ${result.message}`);
  return result.extension;
}

describe("isMarkupExtensionSyntax", () => {
  test("braces start an extension unless escaped with {}", () => {
    expect(isMarkupExtensionSyntax("{Binding}")).toBe(true);
    expect(isMarkupExtensionSyntax("{}{0} items")).toBe(false);
    expect(isMarkupExtensionSyntax("Hello")).toBe(false);
  });
});

describe("parseMarkupExtension", () => {
  test("nested extensions round-trip through format", () => {
    const text = "{Binding Path=Value, Converter={StaticResource MyConverter}}";
    const binding = parsed(text);

    expect(binding.name).toBe("Binding");
    expect(binding.getParameter("Path")).toBe("Value");
    const converter = binding.getParameter("Converter");
    expect(converter).toBeInstanceOf(MarkupExtension);
    if (converter instanceof MarkupExtension) {
      expect(converter.name).toBe("StaticResource");
      expect(converter.positional).toBe("MyConverter");
      expect(converter.parent).toBe(binding);
    }
    expect(binding.format()).toBe(text);
  });

  test("quoted braces stay inside a single parameter", () => {
    const binding = parsed("{Binding StringFormat='{0}'}");
    expect([...binding.parameters]).toEqual([["StringFormat", "'{0}'"]]);
    expect(binding.payload).toMatchObject({ kind: "binding", stringFormat: "{0}" });
    expect(binding.format()).toBe("{Binding StringFormat='{0}'}");
  });

  test("positional argument and surrounding whitespace", () => {
    const binding = parsed("{Binding  Name , Mode = TwoWay }");
    expect(binding.positional).toBe("Name");
    expect(binding.getParameter("Mode")).toBe("TwoWay");
    expect(binding.format()).toBe("{Binding Name, Mode=TwoWay}");
  });

  test("prefixed extension names and three levels of nesting", () => {
    const binding = parsed("{Binding RelativeSource={RelativeSource AncestorType={x:Type Window}}, Path=Title}");
    const relative = binding.getParameter("RelativeSource");
    expect(relative).toBeInstanceOf(MarkupExtension);
    if (relative instanceof MarkupExtension) {
      const type = relative.getParameter("AncestorType");
      expect(type).toBeInstanceOf(MarkupExtension);
      if (type instanceof MarkupExtension) {
        expect(type.name).toBe("x:Type");
        expect(type.positional).toBe("Window");
      }
    }
    expect(binding.getParameter("Path")).toBe("Title");
  });

  test("extension without arguments", () => {
    const extension = parsed("{x:Null}");
    expect(extension.name).toBe("x:Null");
    expect(extension.positional).toBeNull();
    expect(extension.parameters.size).toBe(0);
  });

  test.each([
    ["{Binding", "missing closing '}'", 8],
    ["{1Binding}", "invalid extension name '1Binding'", 9],
    ["{Binding A, B}", "more than one positional argument", 13],
    ["{Binding X} extra", "unexpected text after closing '}'", 12],
    ["{Binding StringFormat='abc}", "unterminated quoted value", 22],
  ])("rejects %s", (text, message, offset) => {
    const result = parseMarkupExtension(text);
    expect(result).toEqual({ ok: false, message, offset });
  });

  test("duplicate parameters are rejected", () => {
    const result = parseMarkupExtension("{Binding Mode=OneWay, Mode=TwoWay}");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.message).toBe("duplicate parameter 'Mode'");
  });
});
