/**
 * Builds RoutingRules from the RuleDefinition block of a class file.
 *
 * Accepts both the nested layout (`ruleDefinition/ruleSet/rule`) and a
 * flat `RuleDefinition/Rule` layout; every `rule` element found below the
 * root becomes one RoutingRule in document order.
 */

import { Effect } from "effect";
import { ParseError } from "../errors.js";
import {
  type Action,
  type RoutingRule,
  SEND_ACTION,
} from "../model/routing-rule.js";
import {
  attributeOf,
  childrenNamed,
  descendantsNamed,
  isNamed,
  type MarkupElement,
  parseMarkup,
} from "./markup.js";
import { parseBoolean } from "./production-parser.js";
import {
  extractSegment,
  type ParseContext,
  parseClassHeader,
} from "./segment-extractor.js";

export const RULE_BLOCK = "RuleDefinition";

const BRANCHES = ["when", "otherwise"];
const STRUCTURAL = ["constraint", ...BRANCHES];

export interface RoutingRuleParseOptions {
  sourceFile?: string;
}

function toAction(
  element: MarkupElement,
  ruleName: string,
  condition: string | undefined,
  context: ParseContext,
): Effect.Effect<Action, ParseError> {
  const params: Record<string, string> = {};
  let target: string | undefined;

  for (const [key, value] of Object.entries(element.attributes)) {
    if (key.toLowerCase() === "target") {
      target = value.trim() || undefined;
    } else {
      params[key] = value;
    }
  }

  if (element.name.toLowerCase() === SEND_ACTION && !target) {
    const where = context.file ? ` in ${context.file}` : "";
    return Effect.fail(
      new ParseError({
        reason: "MissingRequiredField",
        message: `send action in rule ${ruleName} has no target${where}`,
        file: context.file,
      }),
    );
  }

  return Effect.succeed({
    kind: element.name,
    params,
    ...(target ? { target } : {}),
    ...(condition !== undefined ? { condition } : {}),
  });
}

/**
 * Directive elements of a rule paired with the condition of their branch
 */
function collectDirectives(
  rule: MarkupElement,
): Array<{ element: MarkupElement; condition?: string }> {
  const directives: Array<{ element: MarkupElement; condition?: string }> = [];

  for (const child of rule.children) {
    const name = child.name.toLowerCase();
    if (BRANCHES.includes(name)) {
      const condition = attributeOf(child, "condition");
      for (const element of child.children) {
        directives.push(
          condition !== undefined ? { element, condition } : { element },
        );
      }
    } else if (!STRUCTURAL.includes(name)) {
      directives.push({ element: child });
    }
  }

  return directives;
}

function ruleCondition(rule: MarkupElement): string {
  const own = attributeOf(rule, "condition");
  if (own !== undefined) {
    return own;
  }
  const firstWhen = childrenNamed(rule, "when")[0];
  return firstWhen ? (attributeOf(firstWhen, "condition") ?? "") : "";
}

function parseRule(
  rule: MarkupElement,
  index: number,
  ruleSet: string | undefined,
  options: RoutingRuleParseOptions,
  context: ParseContext,
): Effect.Effect<RoutingRule, ParseError> {
  return Effect.gen(function* () {
    const name = attributeOf(rule, "name")?.trim() || `UnnamedRule${index + 1}`;

    const constraints: Record<string, string> = {};
    for (const constraint of childrenNamed(rule, "constraint")) {
      const key = attributeOf(constraint, "name")?.trim();
      if (key) {
        constraints[key] = attributeOf(constraint, "value") ?? "";
      }
    }

    const actions = yield* Effect.forEach(
      collectDirectives(rule),
      ({ element, condition }) => toAction(element, name, condition, context),
    );

    const routingRule: RoutingRule = {
      name,
      condition: ruleCondition(rule),
      constraints,
      actions,
      disabled: parseBoolean(attributeOf(rule, "disabled")) ?? false,
      ...(ruleSet ? { ruleSet } : {}),
      ...(options.sourceFile ? { sourceFile: options.sourceFile } : {}),
    };
    return routingRule;
  });
}

/**
 * Parse every routing rule declared in a class-definition file
 */
export const parseRoutingRules = (
  text: string,
  options: RoutingRuleParseOptions = {},
): Effect.Effect<RoutingRule[], ParseError> =>
  Effect.gen(function* () {
    const context: ParseContext = { file: options.sourceFile };
    const segment = yield* extractSegment(text, { block: RULE_BLOCK }, context);
    const root = yield* parseMarkup(segment, context);

    const ruleSet = parseClassHeader(text)?.name;
    const elements = isNamed(root, "rule") ? [root] : descendantsNamed(root, "rule");

    const rules = yield* Effect.forEach(elements, (rule, index) =>
      parseRule(rule, index, ruleSet, options, context),
    );

    yield* Effect.logDebug(
      `[RoutingRuleParser] Parsed ${rules.length} rules${ruleSet ? ` from ${ruleSet}` : ""}`,
    );
    return rules;
  });
