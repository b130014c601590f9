/**
 * production-graph - turn production and routing rule class files into a
 * property graph and load it into a graph store
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import {
 *   buildGraphDocument,
 *   GraphImporter,
 *   InMemoryGraphStore,
 *   parseProduction,
 *   parseRoutingRules,
 * } from "production-graph";
 *
 * const program = Effect.gen(function* () {
 *   const production = yield* parseProduction(productionText);
 *   const rules = yield* parseRoutingRules(ruleText);
 *   const document = buildGraphDocument(production, rules);
 *
 *   const importer = yield* GraphImporter;
 *   return yield* importer.importDocument(document);
 * });
 *
 * const store = new InMemoryGraphStore();
 * const result = await Effect.runPromise(
 *   program.pipe(
 *     Effect.provide(GraphImporter.Default),
 *     Effect.provide(store.layer()),
 *   ),
 * );
 * console.log(result.statistics);
 * ```
 */

// Errors
export {
  ConnectivityError,
  DocumentDecodeError,
  ImportError,
  type ImportErrorReason,
  ParseError,
  type ParseErrorReason,
  SourceReadError,
  StoreError,
} from "./errors.js";

// Parsed entities
export {
  type Component,
  type ComponentRole,
  componentRole,
  createComponent,
  getSetting,
  type Production,
  type Setting,
} from "./model/production.js";
export {
  type Action,
  isSendAction,
  type RoutingRule,
} from "./model/routing-rule.js";

// Parsers
export {
  extractSegment,
  listSegments,
  parseClassHeader,
  type ClassHeader,
  type ParseContext,
  type SegmentMarker,
} from "./parser/segment-extractor.js";
export {
  attributeOf,
  childrenNamed,
  descendantsNamed,
  type MarkupElement,
  parseMarkup,
} from "./parser/markup.js";
export {
  PRODUCTION_BLOCK,
  parseProduction,
  type ProductionParseOptions,
} from "./parser/production-parser.js";
export {
  RULE_BLOCK,
  parseRoutingRules,
  type RoutingRuleParseOptions,
} from "./parser/routing-rule-parser.js";

// Graph model
export {
  createRelationship,
  type GraphRelationship,
  relationshipKey,
  type RelationshipType,
} from "./graph/relationship.js";
export {
  deserializeGraphDocument,
  type GraphDocument,
  GraphDocumentSchema,
  type GraphMetadata,
  type GraphNode,
  serializeGraphDocument,
} from "./graph/document.js";
export {
  buildGraphDocument,
  type GraphBuildOptions,
  splitTargets,
} from "./graph/graph-builder.js";

// Store and import
export {
  GraphStore,
  type GraphStoreService,
  type StoreSession,
} from "./store/graph-store.js";
export { InMemoryGraphStore } from "./store/memory-store.js";
export {
  makeNeo4jGraphStore,
  type Neo4jStoreConfig,
  Neo4jGraphStoreLive,
} from "./store/neo4j-store.js";
export {
  GraphImporter,
  type ImportOptions,
  type ImportResult,
  type ImportStatistics,
  type ImportVerification,
} from "./importer/graph-importer.js";

// Pipeline and runtime
export { extractGraph, readSource, writeDocument } from "./pipeline.js";
export { type AppConfig, loadConfig } from "./config.js";
export { createLoggerLayer } from "./logger.js";
