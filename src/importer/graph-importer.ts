/**
 * GraphImporter - loads a GraphDocument into the GraphStore.
 *
 * Every node and relationship is upserted on its own, under a timeout.
 * Failed items are counted and reported; they never stop the import.
 * An unreachable store fails the service's construction, so no partial
 * statistics are ever produced for it.
 */

import { Duration, Effect, Either } from "effect";
import {
  type ConnectivityError,
  ImportError,
  type ImportErrorReason,
  type StoreError,
} from "../errors.js";
import type { GraphDocument } from "../graph/document.js";
import { relationshipKey } from "../graph/relationship.js";
import { GraphStore, type StoreSession } from "../store/graph-store.js";

export const DEFAULT_TIMEOUT_MS = 10_000;

export interface ImportOptions {
  /** Timeout for each store call, in milliseconds */
  timeoutMs?: number;
}

export interface ImportStatistics {
  nodesCreated: number;
  nodesFailed: number;
  relationshipsCreated: number;
  relationshipsFailed: number;
}

export interface ImportVerification {
  nodesImported: number;
  relationshipsImported: number;
  /** Relationship type → count */
  typeDistribution: Record<string, number>;
  /** Node type → count */
  nodeTypeDistribution: Record<string, number>;
}

export interface ImportFailure {
  kind: "node" | "relationship";
  key: string;
  reason: ImportErrorReason;
  message: string;
}

export interface ImportResult {
  success: boolean;
  message: string;
  statistics: ImportStatistics;
  verification?: ImportVerification;
  failures: ImportFailure[];
  warnings: string[];
}

const verify = (session: StoreSession) =>
  Effect.all({
    nodesImported: session.countNodes,
    relationshipsImported: session.countRelationships,
    typeDistribution: session.typeDistribution("relationship"),
    nodeTypeDistribution: session.typeDistribution("node"),
  });

export class GraphImporter extends Effect.Service<GraphImporter>()(
  "GraphImporter",
  {
    effect: Effect.gen(function* () {
      const store = yield* GraphStore;

      yield* store.verifyConnectivity;
      yield* Effect.logDebug("[GraphImporter] Graph store is reachable");

      /**
       * Run one store call, turning store errors and timeouts into an
       * UpsertFailed ImportError
       */
      const attempt = <A>(
        key: string,
        call: Effect.Effect<A, StoreError>,
        timeoutMs: number,
      ): Effect.Effect<Either.Either<A, ImportError>> =>
        call.pipe(
          Effect.mapError(
            (error) =>
              new ImportError({
                reason: "UpsertFailed",
                message: error.message,
                key,
                cause: error,
              }),
          ),
          Effect.timeoutFail({
            duration: Duration.millis(timeoutMs),
            onTimeout: () =>
              new ImportError({
                reason: "UpsertFailed",
                message: `Timed out after ${timeoutMs}ms`,
                key,
              }),
          }),
          Effect.either,
        );

      /**
       * Import a document, returning statistics and verification counts
       */
      const importDocument = (
        document: GraphDocument,
        options: ImportOptions = {},
      ): Effect.Effect<ImportResult, ConnectivityError> =>
        Effect.scoped(
          Effect.gen(function* () {
            const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
            const session = yield* store.openSession;

            const statistics: ImportStatistics = {
              nodesCreated: 0,
              nodesFailed: 0,
              relationshipsCreated: 0,
              relationshipsFailed: 0,
            };
            const failures: ImportFailure[] = [];
            const warnings: string[] = [];

            const recordFailure = (
              kind: ImportFailure["kind"],
              error: ImportError,
            ) =>
              Effect.gen(function* () {
                failures.push({
                  kind,
                  key: error.key,
                  reason: error.reason,
                  message: error.message,
                });
                yield* Effect.logWarning(
                  `[GraphImporter] Failed to import ${kind} ${error.key} (${error.reason}): ${error.message}`,
                );
              });

            yield* Effect.logInfo(
              `[GraphImporter] Importing ${document.nodes.length} nodes and ${document.relationships.length} relationships for ${document.metadata.productionName}`,
            );

            for (const node of document.nodes) {
              const key = `${node.name}|${node.type}`;
              const outcome = yield* attempt(key, session.upsertNode(node), timeoutMs);
              if (Either.isRight(outcome)) {
                statistics.nodesCreated++;
              } else {
                statistics.nodesFailed++;
                yield* recordFailure("node", outcome.left);
              }
            }

            const nodeTypes = new Map(
              document.nodes.map((node) => [node.name, node.type]),
            );
            for (const relationship of document.relationships) {
              const key = relationshipKey(relationship);
              const outcome = yield* attempt(
                key,
                session.upsertRelationship(relationship, {
                  sourceType: nodeTypes.get(relationship.source),
                  targetType: nodeTypes.get(relationship.target),
                }),
                timeoutMs,
              );
              if (Either.isRight(outcome) && outcome.right) {
                statistics.relationshipsCreated++;
                continue;
              }
              statistics.relationshipsFailed++;
              yield* recordFailure(
                "relationship",
                Either.isLeft(outcome)
                  ? outcome.left
                  : new ImportError({
                      reason: "DanglingReference",
                      message: `Endpoint ${relationship.source} or ${relationship.target} does not exist`,
                      key,
                    }),
              );
            }

            const verified = yield* attempt(
              "verification",
              verify(session),
              timeoutMs,
            );
            let verification: ImportVerification | undefined;
            if (Either.isRight(verified)) {
              verification = verified.right;
              if (verification.nodesImported < statistics.nodesCreated) {
                warnings.push(
                  `Store reports ${verification.nodesImported} nodes but ${statistics.nodesCreated} were imported`,
                );
              }
              if (
                verification.relationshipsImported <
                statistics.relationshipsCreated
              ) {
                warnings.push(
                  `Store reports ${verification.relationshipsImported} relationships but ${statistics.relationshipsCreated} were imported`,
                );
              }
            } else {
              warnings.push(`Verification failed: ${verified.left.message}`);
            }
            for (const warning of warnings) {
              yield* Effect.logWarning(`[GraphImporter] ${warning}`);
            }

            const failed = statistics.nodesFailed + statistics.relationshipsFailed;
            const success = failed === 0;
            const message = success
              ? `Imported ${statistics.nodesCreated} nodes and ${statistics.relationshipsCreated} relationships`
              : `Import completed with ${failed} failures (${statistics.nodesFailed} nodes, ${statistics.relationshipsFailed} relationships)`;

            yield* Effect.logInfo(`[GraphImporter] ${message}`);

            const result: ImportResult = {
              success,
              message,
              statistics,
              failures,
              warnings,
              ...(verification ? { verification } : {}),
            };
            return result;
          }),
        );

      return { importDocument };
    }),
  },
) {}
