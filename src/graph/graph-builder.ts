/**
 * Builds a GraphDocument from a parsed Production and its RoutingRules.
 * Pure and deterministic: the same inputs always give the same document.
 */

import {
  type Component,
  componentRole,
  getSetting,
  type Production,
} from "../model/production.js";
import { isSendAction, type RoutingRule } from "../model/routing-rule.js";
import type { GraphDocument, GraphNode } from "./document.js";
import {
  createRelationship,
  type GraphRelationship,
  type PropertyValue,
} from "./relationship.js";

export interface GraphBuildOptions {
  /** Settings whose comma-separated values produce ROUTES_TO edges */
  targetSettings?: ReadonlyArray<string>;
  /** Setting that names the rule class a router evaluates */
  ruleSetting?: string;
}

export const DEFAULT_TARGET_SETTINGS: ReadonlyArray<string> = [
  "TargetConfigNames",
  "TargetConfigName",
];

export const DEFAULT_RULE_SETTING = "BusinessRuleName";

/**
 * Split a target list such as "A, B,,A" into ["A", "B"]
 */
export function splitTargets(value: string): string[] {
  const targets = value
    .split(",")
    .map((target) => target.trim())
    .filter((target) => target.length > 0);
  return [...new Set(targets)];
}

function nodeFor(
  component: Component,
  production: Production,
  warnings: string[],
): GraphNode {
  const provenance: Record<string, PropertyValue> = {
    source: "production",
    production: production.name,
    role: componentRole(component),
  };
  if (component.enabled !== undefined) provenance.enabled = component.enabled;
  if (component.poolSize !== undefined) provenance.pool_size = component.poolSize;
  if (component.category) provenance.category = component.category;
  if (component.comment) provenance.comment = component.comment;
  if (production.sourceFile) provenance.source_file = production.sourceFile;

  const properties: Record<string, PropertyValue> = {};
  for (const setting of component.settings) {
    if (Object.hasOwn(provenance, setting.name)) {
      warnings.push(
        `Setting ${setting.name} on component ${component.name} is shadowed by the node's ${setting.name} property`,
      );
      continue;
    }
    properties[setting.name] = setting.value;
  }

  return {
    name: component.name,
    type: component.type,
    properties: { ...properties, ...provenance },
  };
}

/**
 * Last declaration of each component name wins; every redeclaration is
 * reported
 */
function dedupeComponents(
  components: ReadonlyArray<Component>,
  warnings: string[],
): Component[] {
  const byName = new Map<string, Component>();
  for (const component of components) {
    const previous = byName.get(component.name);
    if (previous) {
      warnings.push(
        previous.type === component.type
          ? `Component ${component.name} is declared more than once; keeping the last declaration`
          : `Component ${component.name} is declared as both ${previous.type} and ${component.type}; keeping ${component.type}`,
      );
    }
    byName.set(component.name, component);
  }
  return [...byName.values()];
}

/**
 * Name of the component that sends a rule's messages
 */
function resolveRuleSource(
  rule: RoutingRule,
  routers: ReadonlyMap<string, string>,
  warnings: string[],
): string {
  const constrained = rule.constraints.source?.trim();
  if (constrained) {
    return constrained;
  }
  const router = rule.ruleSet ? routers.get(rule.ruleSet) : undefined;
  if (router) {
    return router;
  }
  const fallback = rule.ruleSet ?? rule.name;
  warnings.push(
    `Rule ${rule.name} has no source constraint and no router references it; using ${fallback} as the source`,
  );
  return fallback;
}

/** Constraints copied onto SENDS_TO edges under their own names */
const CONSTRAINT_PROPERTIES: ReadonlyMap<string, string> = new Map([
  ["docCategory", "doc_category"],
  ["docName", "message_types"],
]);

function ruleProperties(
  rule: RoutingRule,
  condition: string | undefined,
  params: Readonly<Record<string, string>>,
): Record<string, PropertyValue> {
  const properties: Record<string, PropertyValue> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value.trim()) properties[key] = value;
  }
  for (const [name, value] of Object.entries(rule.constraints)) {
    if (name === "source" || !value.trim()) continue;
    properties[CONSTRAINT_PROPERTIES.get(name) ?? `constraint_${name}`] = value;
  }
  properties.rule_name = rule.name;
  if (rule.ruleSet) properties.rule_set = rule.ruleSet;
  const effective = condition ?? rule.condition;
  if (effective) properties.condition = effective;
  if (rule.disabled) properties.disabled = true;
  return properties;
}

/**
 * Map a production and its routing rules to nodes and relationships
 */
export function buildGraphDocument(
  production: Production,
  rules: ReadonlyArray<RoutingRule> = [],
  options: GraphBuildOptions = {},
): GraphDocument {
  const targetSettings = options.targetSettings ?? DEFAULT_TARGET_SETTINGS;
  const ruleSetting = options.ruleSetting ?? DEFAULT_RULE_SETTING;
  const warnings: string[] = [];

  const components = dedupeComponents(production.components, warnings);
  const nodes = components.map((component) =>
    nodeFor(component, production, warnings),
  );
  const known = new Set(nodes.map((node) => node.name));
  const relationships: GraphRelationship[] = [];

  const reportUnknown = (relationship: GraphRelationship) => {
    for (const end of [relationship.source, relationship.target]) {
      if (!known.has(end)) {
        warnings.push(
          `${relationship.type} ${relationship.source} -> ${relationship.target} references unknown component ${end}`,
        );
      }
    }
  };

  // ROUTES_TO from target settings
  for (const component of components) {
    for (const setting of targetSettings) {
      const value = getSetting(component, setting);
      if (value === undefined) continue;
      for (const target of splitTargets(value)) {
        const relationship = createRelationship(
          component.name,
          target,
          "ROUTES_TO",
          { setting },
        );
        reportUnknown(relationship);
        relationships.push(relationship);
      }
    }
  }

  // SENDS_TO from routing rule send actions
  const routers = new Map<string, string>();
  for (const component of components) {
    const ruleClass = getSetting(component, ruleSetting)?.trim();
    if (ruleClass && !routers.has(ruleClass)) {
      routers.set(ruleClass, component.name);
    }
  }

  for (const rule of rules) {
    const sends = rule.actions.filter(isSendAction);
    if (sends.length === 0) continue;

    const source = resolveRuleSource(rule, routers, warnings);
    for (const action of sends) {
      const relationship = createRelationship(
        source,
        action.target,
        "SENDS_TO",
        ruleProperties(rule, action.condition, action.params),
      );
      reportUnknown(relationship);
      relationships.push(relationship);
    }
  }

  const sourceFiles = [
    production.sourceFile,
    ...rules.map((rule) => rule.sourceFile),
  ].filter((file): file is string => file !== undefined);

  return {
    nodes,
    relationships,
    metadata: {
      productionName: production.name,
      ...(production.description ? { description: production.description } : {}),
      counts: {
        nodes: nodes.length,
        relationships: relationships.length,
        components: production.components.length,
        rules: rules.length,
      },
      sourceFiles: [...new Set(sourceFiles)],
      warnings,
    },
  };
}
