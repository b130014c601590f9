/**
 * Relationship types between components in the production graph
 */

export type RelationshipType =
  /** A component forwards messages to a target named in its settings */
  | "ROUTES_TO"
  /** A routing rule sends messages to a target component */
  | "SENDS_TO";

export const RELATIONSHIP_TYPES: ReadonlyArray<RelationshipType> = [
  "ROUTES_TO",
  "SENDS_TO",
];

export type PropertyValue = string | number | boolean;

export type Properties = Readonly<Record<string, PropertyValue>>;

/**
 * A directed edge between two component names
 */
export interface GraphRelationship {
  readonly source: string;
  readonly target: string;
  readonly type: RelationshipType;
  /** Includes `rule_name` when the edge comes from a routing rule */
  readonly properties: Properties;
}

export function createRelationship(
  source: string,
  target: string,
  type: RelationshipType,
  properties: Properties = {},
): GraphRelationship {
  return { source, target, type, properties };
}

/**
 * Rule name carried by a relationship, or "" for setting-derived edges
 */
export function ruleKeyOf(relationship: GraphRelationship): string {
  const ruleName = relationship.properties.rule_name;
  return ruleName === undefined ? "" : String(ruleName);
}

/**
 * Identity used when merging relationships into a store
 */
export function relationshipKey(relationship: GraphRelationship): string {
  return [
    relationship.source,
    relationship.type,
    relationship.target,
    ruleKeyOf(relationship),
  ].join("|");
}

export function describeRelationship(type: RelationshipType): string {
  const descriptions: Record<RelationshipType, string> = {
    ROUTES_TO: "routes to",
    SENDS_TO: "sends to",
  };
  return descriptions[type];
}
