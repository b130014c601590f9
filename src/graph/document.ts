/**
 * The graph document: nodes, relationships and build metadata, plus its
 * JSON encoding.
 */

import { Effect } from "effect";
import { z } from "zod";
import { describeCause, DocumentDecodeError } from "../errors.js";
import type { GraphRelationship, Properties } from "./relationship.js";

export interface GraphNode {
  /** Unique within a document */
  readonly name: string;
  readonly type: string;
  /** Flattened settings plus provenance */
  readonly properties: Properties;
}

export interface GraphCounts {
  readonly nodes: number;
  readonly relationships: number;
  readonly components: number;
  readonly rules: number;
}

export interface GraphMetadata {
  readonly productionName: string;
  readonly description?: string;
  readonly counts: GraphCounts;
  readonly sourceFiles: ReadonlyArray<string>;
  readonly warnings: ReadonlyArray<string>;
}

export interface GraphDocument {
  readonly nodes: ReadonlyArray<GraphNode>;
  readonly relationships: ReadonlyArray<GraphRelationship>;
  readonly metadata: GraphMetadata;
}

const PropertiesSchema = z.record(
  z.union([z.string(), z.number(), z.boolean()]),
);

export const GraphNodeSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  properties: PropertiesSchema,
});

export const GraphRelationshipSchema = z.object({
  source: z.string().min(1),
  target: z.string().min(1),
  type: z.enum(["ROUTES_TO", "SENDS_TO"]),
  properties: PropertiesSchema,
});

export const GraphDocumentSchema = z.object({
  nodes: z.array(GraphNodeSchema),
  relationships: z.array(GraphRelationshipSchema),
  metadata: z.object({
    productionName: z.string(),
    description: z.string().optional(),
    counts: z.object({
      nodes: z.number().int().nonnegative(),
      relationships: z.number().int().nonnegative(),
      components: z.number().int().nonnegative(),
      rules: z.number().int().nonnegative(),
    }),
    sourceFiles: z.array(z.string()),
    warnings: z.array(z.string()),
  }),
});

export function serializeGraphDocument(document: GraphDocument): string {
  return `${JSON.stringify(document, null, 2)}\n`;
}

export const deserializeGraphDocument = (
  text: string,
): Effect.Effect<GraphDocument, DocumentDecodeError> =>
  Effect.gen(function* () {
    const raw = yield* Effect.try({
      try: (): unknown => JSON.parse(text),
      catch: (cause) =>
        new DocumentDecodeError({
          message: `Graph document is not valid JSON: ${describeCause(cause)}`,
          cause,
        }),
    });

    const parsed = GraphDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return yield* Effect.fail(
        new DocumentDecodeError({
          message: `Invalid graph document at ${issue?.path.join(".") || "<root>"}: ${issue?.message ?? "unknown issue"}`,
          cause: parsed.error,
        }),
      );
    }

    const document: GraphDocument = parsed.data;
    return document;
  });
