/**
 * Capability interface for the persistent graph store.
 *
 * Implementations must merge nodes by `(name, type)` and relationships by
 * `(source, target, type, rule_name ?? "")`.
 */

import { Context, type Effect, type Scope } from "effect";
import type { ConnectivityError, StoreError } from "../errors.js";
import type { GraphNode } from "../graph/document.js";
import type { GraphRelationship } from "../graph/relationship.js";

export type EntityKind = "node" | "relationship";

/**
 * Node types of a relationship's endpoints, where the caller knows them.
 * An unknown type matches any node with the endpoint's name.
 */
export interface EndpointTypes {
  sourceType?: string;
  targetType?: string;
}

export interface StoreSession {
  readonly upsertNode: (node: GraphNode) => Effect.Effect<void, StoreError>;
  /**
   * Resolves to false when either endpoint does not exist in the store
   */
  readonly upsertRelationship: (
    relationship: GraphRelationship,
    endpoints?: EndpointTypes,
  ) => Effect.Effect<boolean, StoreError>;
  readonly countNodes: Effect.Effect<number, StoreError>;
  readonly countRelationships: Effect.Effect<number, StoreError>;
  /** Entity type → count */
  readonly typeDistribution: (
    kind: EntityKind,
  ) => Effect.Effect<Record<string, number>, StoreError>;
}

export interface GraphStoreService {
  readonly verifyConnectivity: Effect.Effect<void, ConnectivityError>;
  /** Session released when the surrounding scope closes */
  readonly openSession: Effect.Effect<
    StoreSession,
    ConnectivityError,
    Scope.Scope
  >;
}

export class GraphStore extends Context.Tag("GraphStore")<
  GraphStore,
  GraphStoreService
>() {}
