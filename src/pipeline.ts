/**
 * File-level pipeline: read class files, parse them and build the graph
 * document. Any parse error aborts before the graph is built.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { Effect } from "effect";
import { describeCause, type ParseError, SourceReadError } from "./errors.js";
import { type GraphDocument, serializeGraphDocument } from "./graph/document.js";
import {
  buildGraphDocument,
  type GraphBuildOptions,
} from "./graph/graph-builder.js";
import { parseProduction } from "./parser/production-parser.js";
import { parseRoutingRules } from "./parser/routing-rule-parser.js";

export interface ExtractOptions {
  productionFile: string;
  routingRuleFiles?: ReadonlyArray<string>;
  build?: GraphBuildOptions;
}

export const readSource = (path: string): Effect.Effect<string, SourceReadError> =>
  Effect.tryPromise({
    try: () => readFile(path, "utf-8"),
    catch: (cause) =>
      new SourceReadError({
        message: `Failed to read ${path}: ${describeCause(cause)}`,
        path,
        cause,
      }),
  });

export const writeDocument = (
  path: string,
  document: GraphDocument,
): Effect.Effect<void, SourceReadError> =>
  Effect.tryPromise({
    try: async () => {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, serializeGraphDocument(document), "utf-8");
    },
    catch: (cause) =>
      new SourceReadError({
        message: `Failed to write ${path}: ${describeCause(cause)}`,
        path,
        cause,
      }),
  }).pipe(
    Effect.tap(() => Effect.logInfo(`[Pipeline] Wrote graph document to ${path}`)),
  );

/**
 * Parse the production and rule files and build their graph document
 */
export const extractGraph = (
  options: ExtractOptions,
): Effect.Effect<GraphDocument, ParseError | SourceReadError> =>
  Effect.gen(function* () {
    const productionText = yield* readSource(options.productionFile);
    const production = yield* parseProduction(productionText, {
      sourceFile: options.productionFile,
    });

    const rules = yield* Effect.forEach(
      options.routingRuleFiles ?? [],
      (file) =>
        readSource(file).pipe(
          Effect.flatMap((text) => parseRoutingRules(text, { sourceFile: file })),
        ),
    );

    const document = buildGraphDocument(production, rules.flat(), options.build);
    for (const warning of document.metadata.warnings) {
      yield* Effect.logWarning(`[GraphBuilder] ${warning}`);
    }
    yield* Effect.logInfo(
      `[Pipeline] Built graph for ${production.name}: ${document.nodes.length} nodes, ${document.relationships.length} relationships`,
    );
    return document;
  });
