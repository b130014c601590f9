/**
 * In-process graph store. Backs dry runs and tests, applying the same
 * merge keys as the Neo4j store.
 */

import { Effect, Layer } from "effect";
import { ConnectivityError } from "../errors.js";
import type { GraphNode } from "../graph/document.js";
import {
  type GraphRelationship,
  relationshipKey,
} from "../graph/relationship.js";
import {
  type EndpointTypes,
  type EntityKind,
  GraphStore,
  type GraphStoreService,
  type StoreSession,
} from "./graph-store.js";

const nodeKey = (node: Pick<GraphNode, "name" | "type">): string =>
  `${node.name}|${node.type}`;

export class InMemoryGraphStore {
  private nodes: Map<string, GraphNode> = new Map();
  private relationships: Map<string, GraphRelationship> = new Map();
  /** Node names, for endpoint lookups */
  private names: Map<string, number> = new Map();

  /** Sessions currently open */
  activeSessions = 0;
  /** Sessions opened over the store's lifetime */
  sessionsOpened = 0;

  constructor(private reachable = true) {}

  setReachable(reachable: boolean): void {
    this.reachable = reachable;
  }

  getNodes(): GraphNode[] {
    return Array.from(this.nodes.values());
  }

  getRelationships(): GraphRelationship[] {
    return Array.from(this.relationships.values());
  }

  hasNode(name: string): boolean {
    return (this.names.get(name) ?? 0) > 0;
  }

  clear(): void {
    this.nodes.clear();
    this.relationships.clear();
    this.names.clear();
  }

  private mergeNode(node: GraphNode): void {
    const key = nodeKey(node);
    const existing = this.nodes.get(key);
    if (!existing) {
      this.names.set(node.name, (this.names.get(node.name) ?? 0) + 1);
    }
    this.nodes.set(key, {
      name: node.name,
      type: node.type,
      properties: { ...existing?.properties, ...node.properties },
    });
  }

  private hasEndpoint(name: string, type: string | undefined): boolean {
    return type === undefined ? this.hasNode(name) : this.nodes.has(nodeKey({ name, type }));
  }

  private mergeRelationship(
    relationship: GraphRelationship,
    endpoints: EndpointTypes,
  ): boolean {
    if (
      !this.hasEndpoint(relationship.source, endpoints.sourceType) ||
      !this.hasEndpoint(relationship.target, endpoints.targetType)
    ) {
      return false;
    }
    const key = relationshipKey(relationship);
    const existing = this.relationships.get(key);
    this.relationships.set(key, {
      ...relationship,
      properties: { ...existing?.properties, ...relationship.properties },
    });
    return true;
  }

  private distribution(kind: EntityKind): Record<string, number> {
    const entities: ReadonlyArray<{ type: string }> =
      kind === "node" ? this.getNodes() : this.getRelationships();
    const counts: Record<string, number> = {};
    for (const entity of entities) {
      counts[entity.type] = (counts[entity.type] ?? 0) + 1;
    }
    return counts;
  }

  private session(): StoreSession {
    return {
      upsertNode: (node) => Effect.sync(() => this.mergeNode(node)),
      upsertRelationship: (relationship, endpoints = {}) =>
        Effect.sync(() => this.mergeRelationship(relationship, endpoints)),
      countNodes: Effect.sync(() => this.nodes.size),
      countRelationships: Effect.sync(() => this.relationships.size),
      typeDistribution: (kind) => Effect.sync(() => this.distribution(kind)),
    };
  }

  /**
   * GraphStoreService view of this store
   */
  service(): GraphStoreService {
    const unreachable = () =>
      new ConnectivityError({
        message: "In-memory graph store is unreachable",
        uri: "memory://",
      });

    return {
      verifyConnectivity: Effect.suspend(() =>
        this.reachable ? Effect.void : Effect.fail(unreachable()),
      ),
      openSession: Effect.acquireRelease(
        Effect.suspend(() => {
          if (!this.reachable) {
            return Effect.fail(unreachable());
          }
          this.activeSessions++;
          this.sessionsOpened++;
          return Effect.succeed(this.session());
        }),
        () =>
          Effect.sync(() => {
            this.activeSessions--;
          }),
      ),
    };
  }

  layer(): Layer.Layer<GraphStore> {
    return Layer.succeed(GraphStore, this.service());
  }
}
