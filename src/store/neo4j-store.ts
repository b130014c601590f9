/**
 * Neo4j implementation of the GraphStore capability.
 * Components are stored as `:Component` nodes keyed by `{name, type}`;
 * relationships carry a `rule_key` so edges from different rules coexist.
 */

import neo4j, { type Driver, type Session } from "neo4j-driver";
import { Effect, Layer } from "effect";
import { ConnectivityError, describeCause, StoreError } from "../errors.js";
import type { GraphNode } from "../graph/document.js";
import {
  type GraphRelationship,
  ruleKeyOf,
} from "../graph/relationship.js";
import {
  type EndpointTypes,
  type EntityKind,
  GraphStore,
  type GraphStoreService,
  type StoreSession,
} from "./graph-store.js";

export interface Neo4jStoreConfig {
  uri: string;
  user: string;
  password: string;
  database?: string;
}

const NODE_LABEL = "Component";
const RELATIONSHIP_TYPE_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const Cypher = {
  upsertNode: `MERGE (n:${NODE_LABEL} {name: $name, type: $type})
SET n += $properties`,
  upsertRelationship: (type: string) => `MATCH (s:${NODE_LABEL} {name: $source})
WHERE $sourceType IS NULL OR s.type = $sourceType
WITH s LIMIT 1
MATCH (t:${NODE_LABEL} {name: $target})
WHERE $targetType IS NULL OR t.type = $targetType
WITH s, t LIMIT 1
MERGE (s)-[r:${type} {rule_key: $ruleKey}]->(t)
SET r += $properties
RETURN count(r) AS count`,
  countNodes: `MATCH (n:${NODE_LABEL}) RETURN count(n) AS count`,
  countRelationships: `MATCH (:${NODE_LABEL})-[r]->(:${NODE_LABEL}) RETURN count(r) AS count`,
  nodeTypes: `MATCH (n:${NODE_LABEL}) RETURN n.type AS type, count(*) AS count`,
  relationshipTypes: `MATCH (:${NODE_LABEL})-[r]->(:${NODE_LABEL}) RETURN type(r) AS type, count(*) AS count`,
} as const;

const run = (
  session: Session,
  query: string,
  params: Record<string, unknown> = {},
) =>
  Effect.tryPromise({
    try: () => session.run(query, params),
    catch: (cause) =>
      new StoreError({
        message: `Query failed: ${describeCause(cause)}`,
        cause,
      }),
  });

function makeSession(session: Session): StoreSession {
  const upsertNode = (node: GraphNode) =>
    run(session, Cypher.upsertNode, {
      name: node.name,
      type: node.type,
      properties: { ...node.properties, name: node.name, type: node.type },
    }).pipe(Effect.asVoid);

  const upsertRelationship = (
    relationship: GraphRelationship,
    endpoints: EndpointTypes = {},
  ) =>
    Effect.gen(function* () {
      if (!RELATIONSHIP_TYPE_PATTERN.test(relationship.type)) {
        return yield* Effect.fail(
          new StoreError({
            message: `Refusing relationship type ${relationship.type}`,
          }),
        );
      }
      const result = yield* run(
        session,
        Cypher.upsertRelationship(relationship.type),
        {
          source: relationship.source,
          target: relationship.target,
          sourceType: endpoints.sourceType ?? null,
          targetType: endpoints.targetType ?? null,
          ruleKey: ruleKeyOf(relationship),
          properties: relationship.properties,
        },
      );
      const merged = result.records[0]?.get("count");
      return Number(merged ?? 0) > 0;
    });

  const count = (query: string) =>
    run(session, query).pipe(
      Effect.map((result) => Number(result.records[0]?.get("count") ?? 0)),
    );

  const typeDistribution = (kind: EntityKind) =>
    run(
      session,
      kind === "node" ? Cypher.nodeTypes : Cypher.relationshipTypes,
    ).pipe(
      Effect.map((result) => {
        const distribution: Record<string, number> = {};
        for (const record of result.records) {
          distribution[String(record.get("type"))] = Number(record.get("count"));
        }
        return distribution;
      }),
    );

  return {
    upsertNode,
    upsertRelationship,
    countNodes: count(Cypher.countNodes),
    countRelationships: count(Cypher.countRelationships),
    typeDistribution,
  };
}

/**
 * Wrap an existing driver. The caller owns the driver's lifetime.
 */
export function makeNeo4jGraphStore(
  driver: Driver,
  config: Pick<Neo4jStoreConfig, "uri" | "database">,
): GraphStoreService {
  const verifyConnectivity = Effect.tryPromise({
    try: () => driver.verifyConnectivity({ database: config.database }),
    catch: (cause) =>
      new ConnectivityError({
        message: `Cannot reach graph store at ${config.uri}: ${describeCause(cause)}`,
        uri: config.uri,
        cause,
      }),
  }).pipe(
    Effect.asVoid,
    Effect.tap(() =>
      Effect.logDebug(`[Neo4jGraphStore] Connected to ${config.uri}`),
    ),
  );

  const openSession = Effect.acquireRelease(
    Effect.try({
      try: () =>
        driver.session({
          database: config.database,
          defaultAccessMode: neo4j.session.WRITE,
        }),
      catch: (cause) =>
        new ConnectivityError({
          message: `Cannot open session on ${config.uri}: ${describeCause(cause)}`,
          uri: config.uri,
          cause,
        }),
    }),
    (session) =>
      Effect.tryPromise(() => session.close()).pipe(
        Effect.tap(() => Effect.logDebug("[Neo4jGraphStore] Session closed")),
        Effect.catchAll((error) =>
          Effect.logWarning(
            `[Neo4jGraphStore] Failed to close session: ${describeCause(error)}`,
          ),
        ),
      ),
  ).pipe(Effect.map(makeSession));

  return { verifyConnectivity, openSession };
}

/**
 * GraphStore layer owning a driver for the layer's lifetime
 */
export const Neo4jGraphStoreLive = (config: Neo4jStoreConfig) =>
  Layer.scoped(
    GraphStore,
    Effect.gen(function* () {
      const driver = yield* Effect.acquireRelease(
        Effect.try({
          try: () =>
            neo4j.driver(config.uri, neo4j.auth.basic(config.user, config.password), {
              disableLosslessIntegers: true,
            }),
          catch: (cause) =>
            new ConnectivityError({
              message: `Invalid graph store configuration for ${config.uri}: ${describeCause(cause)}`,
              uri: config.uri,
              cause,
            }),
        }),
        (driver) =>
          Effect.tryPromise(() => driver.close()).pipe(
            Effect.catchAll((error) =>
              Effect.logWarning(
                `[Neo4jGraphStore] Failed to close driver: ${describeCause(error)}`,
              ),
            ),
          ),
      );
      return makeNeo4jGraphStore(driver, config);
    }),
  );
