import { readFileSync } from "node:fs";
import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import { parseRoutingRules } from "../../src/parser/routing-rule-parser.js";

const FIXTURE = new URL("../fixtures/Demo.ADTRoutingRule.cls", import.meta.url);

const wrap = (markup: string) =>
  `Class Test.Rules Extends Ens.Rule.Definition\n{\nXData RuleDefinition [ XMLNamespace = "http://example.test/rule" ]\n{\n${markup}\n}\n}\n`;

const parse = (text: string) => Effect.runSync(parseRoutingRules(text));
const parseError = (text: string) =>
  Effect.runSync(Effect.flip(parseRoutingRules(text, { sourceFile: "Rules.cls" })));

describe("parseRoutingRules", () => {
  describe("fixture rule set", () => {
    const rules = Effect.runSync(
      parseRoutingRules(readFileSync(FIXTURE, "utf-8"), { sourceFile: "Demo.ADTRoutingRule.cls" }),
    );

    it("yields one rule per rule element in order", () => {
      expect(rules.map((rule) => rule.name)).toEqual(["RouteADT", "Fallback", "Placeholder"]);
    });

    it("reads constraints and the branch condition verbatim", () => {
      const [route] = rules;
      expect(route.constraints).toEqual({ source: "HL7FileService", docCategory: "2.5" });
      expect(route.condition).toBe('HL7.{MSH:MessageType.TriggerEvent}="A01"');
      expect(route.ruleSet).toBe("Demo.ADTRoutingRule");
      expect(route.disabled).toBe(false);
      expect(route.sourceFile).toBe("Demo.ADTRoutingRule.cls");
    });

    it("reads send actions with their params", () => {
      expect(rules[0].actions).toEqual([
        {
          kind: "send",
          target: "HL7FileOperation",
          params: { transform: "" },
          condition: 'HL7.{MSH:MessageType.TriggerEvent}="A01"',
        },
        {
          kind: "send",
          target: "LabOperation",
          params: { transform: "Demo.ADTToLab" },
          condition: 'HL7.{MSH:MessageType.TriggerEvent}="A01"',
        },
      ]);
    });

    it("reads actions from otherwise branches", () => {
      expect(rules[1].condition).toBe("");
      expect(rules[1].actions).toEqual([
        { kind: "send", target: "HL7FileOperation", params: { transform: "" } },
      ]);
    });

    it("keeps rules without actions", () => {
      expect(rules[2].actions).toEqual([]);
    });
  });

  it("names anonymous rules by position", () => {
    const rules = parse(
      wrap('<ruleDefinition><ruleSet><rule name="First"/><rule/><rule name=""/></ruleSet></ruleDefinition>'),
    );
    expect(rules.map((rule) => rule.name)).toEqual(["First", "UnnamedRule2", "UnnamedRule3"]);
  });

  it("accepts a flat layout with the condition on the rule", () => {
    const rules = parse(
      wrap(
        '<RuleDefinition><Rule Name="Direct" Condition="Doc.Type=1"><Send Target="Out"/><Log Message="sent"/></Rule></RuleDefinition>',
      ),
    );
    expect(rules).toEqual([
      {
        name: "Direct",
        condition: "Doc.Type=1",
        constraints: {},
        actions: [
          { kind: "Send", target: "Out", params: {} },
          { kind: "Log", params: { Message: "sent" } },
        ],
        ruleSet: "Test.Rules",
        disabled: false,
      },
    ]);
  });

  it("reads disabled rules", () => {
    const [rule] = parse(wrap('<ruleDefinition><rule name="Off" disabled="true"/></ruleDefinition>'));
    expect(rule.disabled).toBe(true);
  });

  it("yields no rules for an empty rule set", () => {
    expect(parse(wrap("<ruleDefinition><ruleSet/></ruleDefinition>"))).toEqual([]);
  });

  it("fails with MissingRequiredField for a send without a target", () => {
    const error = parseError(wrap('<ruleDefinition><rule name="R"><when condition="1"><send/></when></rule></ruleDefinition>'));
    expect(error.reason).toBe("MissingRequiredField");
    expect(error.message).toBe("send action in rule R has no target in Rules.cls");
  });

  it("fails with InvalidStructure for malformed markup", () => {
    const error = parseError(wrap("<ruleDefinition><rule></ruleDefinition>"));
    expect(error.reason).toBe("InvalidStructure");
  });

  it("fails with MissingSegment without a rule block", () => {
    const error = parseError("Class Test.Other\n{\n}\n");
    expect(error.reason).toBe("MissingSegment");
  });
});
