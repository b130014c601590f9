import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import {
  extractSegment,
  listSegments,
  parseClassHeader,
} from "../../src/parser/segment-extractor.js";

const extract = (text: string, block: string) =>
  Effect.runSync(extractSegment(text, { block }));

const extractError = (text: string, block: string, file?: string) =>
  Effect.runSync(Effect.flip(extractSegment(text, { block }, { file })));

describe("extractSegment", () => {
  it("returns the block content verbatim", () => {
    const text = 'Class A.B { XData ProductionDefinition { <Production Name="X"/> } }';
    expect(extract(text, "ProductionDefinition")).toBe(' <Production Name="X"/> ');
  });

  it("skips a bracketed keyword list", () => {
    const text = [
      "Class A.Rule Extends Ens.Rule.Definition",
      "{",
      'XData RuleDefinition [ XMLNamespace = "http://example.test/[rule]" ]',
      "{",
      "<ruleDefinition/>",
      "}",
      "}",
    ].join("\n");
    expect(extract(text, "RuleDefinition")).toBe("\n<ruleDefinition/>\n");
  });

  it("ignores braces inside attribute values, comments and CDATA", () => {
    const text = [
      "XData RuleDefinition {",
      '<rule condition="HL7.{MSH:9}=&quot;A01&quot;">',
      "<!-- } -->",
      "<![CDATA[ } ]]>",
      "</rule>",
      "}",
    ].join("\n");
    expect(extract(text, "RuleDefinition")).toBe(
      [
        "",
        '<rule condition="HL7.{MSH:9}=&quot;A01&quot;">',
        "<!-- } -->",
        "<![CDATA[ } ]]>",
        "</rule>",
        "",
      ].join("\n"),
    );
  });

  it("balances nested delimiters in text content", () => {
    const text = "XData Notes { <Note>{a}</Note> } trailing }";
    expect(extract(text, "Notes")).toBe(" <Note>{a}</Note> ");
  });

  it("ignores an unmatched closing brace in element text", () => {
    const text = 'XData Notes {\n<Item><Setting Name="Suffix">}</Setting></Item>\n}\n}';
    expect(extract(text, "Notes")).toBe('\n<Item><Setting Name="Suffix">}</Setting></Item>\n');
  });

  it("ignores an unmatched opening brace in element text", () => {
    const text = 'XData Notes {\n<Item><Setting Name="Prefix">{</Setting><Empty/></Item>\n}';
    expect(extract(text, "Notes")).toBe('\n<Item><Setting Name="Prefix">{</Setting><Empty/></Item>\n');
  });

  it("picks the requested block when several are present", () => {
    const text = "XData First { <a/> }\nXData Second { <b/> }";
    expect(extract(text, "Second")).toBe(" <b/> ");
  });

  it("does not match a block whose name only starts with the marker", () => {
    const error = extractError("XData ProductionDefinitionOld { <a/> }", "ProductionDefinition");
    expect(error.reason).toBe("MissingSegment");
  });

  it("supports custom delimiters", () => {
    const text = "XData Custom ( <a/> (x) )";
    const result = Effect.runSync(
      extractSegment(text, { block: "Custom", open: "(", close: ")" }),
    );
    expect(result).toBe(" <a/> (x) ");
  });

  it("fails with MissingSegment when the block is absent", () => {
    const error = extractError("Class A.B {}", "ProductionDefinition", "A.B.cls");
    expect(error._tag).toBe("ParseError");
    expect(error.reason).toBe("MissingSegment");
    expect(error.file).toBe("A.B.cls");
    expect(error.message).toBe("No XData ProductionDefinition block found in A.B.cls");
  });

  it("fails with InvalidStructure when the block is never closed", () => {
    const error = extractError(
      "XData ProductionDefinition {\n<Production Name=\"X\">",
      "ProductionDefinition",
    );
    expect(error.reason).toBe("InvalidStructure");
    expect(error.message).toBe("XData ProductionDefinition block is never closed");
  });

  it("fails with InvalidStructure when the opening delimiter is missing", () => {
    const error = extractError("XData ProductionDefinition <Production/>", "ProductionDefinition");
    expect(error.reason).toBe("InvalidStructure");
  });

  it("fails with InvalidStructure on an unterminated tag", () => {
    const error = extractError('XData RuleDefinition { <rule name="x }', "RuleDefinition");
    expect(error.reason).toBe("InvalidStructure");
    expect(error.message).toBe("Unterminated markup in XData RuleDefinition");
  });
});

describe("listSegments", () => {
  it("lists block names in order", () => {
    const text = "XData ProductionDefinition { }\nXData RuleDefinition [ X = 1 ] { }";
    expect(listSegments(text)).toEqual(["ProductionDefinition", "RuleDefinition"]);
  });

  it("returns an empty list for plain classes", () => {
    expect(listSegments("Class A.B { ClassMethod X() {} }")).toEqual([]);
  });
});

describe("parseClassHeader", () => {
  it("reads the class name and base class", () => {
    expect(parseClassHeader("/// Doc\nClass Demo.Production Extends Ens.Production\n{")).toEqual({
      name: "Demo.Production",
      extends: "Ens.Production",
    });
  });

  it("reads the first base of a parenthesised list", () => {
    expect(parseClassHeader("Class Demo.X Extends (Ens.Rule.Definition, %XML.Adaptor)")).toEqual({
      name: "Demo.X",
      extends: "Ens.Rule.Definition",
    });
  });

  it("returns undefined without a class header", () => {
    expect(parseClassHeader("XData Foo { }")).toBeUndefined();
  });
});
