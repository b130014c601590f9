/**
 * Import command - parse class files, build the graph and load it into
 * the graph store. Exits non-zero when any item fails to import.
 */

import type { Command } from "commander";
import { Effect, Either, type Layer, LogLevel } from "effect";
import pc from "picocolors";
import { ENV_HELP, loadConfig, parsePositiveInteger } from "../../config.js";
import type { ConnectivityError } from "../../errors.js";
import { GraphImporter } from "../../importer/graph-importer.js";
import { createLoggerLayer } from "../../logger.js";
import { extractGraph, writeDocument } from "../../pipeline.js";
import type { GraphStore } from "../../store/graph-store.js";
import { InMemoryGraphStore } from "../../store/memory-store.js";
import { Neo4jGraphStoreLive } from "../../store/neo4j-store.js";
import { resolveSources, type SourceOptions } from "../loader.js";
import { formatImportResult, formatPipelineError } from "../report.js";

export interface ImportCommandOptions extends SourceOptions {
  output?: string;
  dryRun?: boolean;
  timeout?: number;
  json?: boolean;
  verbose?: boolean;
}

const parsePositiveInt = (value: string): number => {
  const parsed = parsePositiveInteger(value);
  if (parsed === undefined) {
    throw new Error(`Expected a positive integer, got ${value}`);
  }
  return parsed;
};

export function importCommand(program: Command): void {
  program
    .command("import", { isDefault: true })
    .description("Parse class files and import the production graph into the graph store")
    .option("-p, --production-file <path>", "Class file with the production definition")
    .option("-r, --routing-rule-file <paths...>", "Class files with routing rule definitions")
    .option("-d, --dir <path>", "Discover class files under this directory")
    .option("-o, --output <path>", "Also write the graph document to a file")
    .option("--dry-run", "Import into an in-memory store instead of Neo4j")
    .option("--timeout <ms>", "Per-call import timeout in milliseconds", parsePositiveInt)
    .option("--json", "Print the import result as JSON")
    .option("-v, --verbose", "Enable debug logging")
    .action(async (options: ImportCommandOptions) => {
      const configResult = loadConfig(process.env, {
        requireCredentials: !options.dryRun,
      });
      if (Either.isLeft(configResult)) {
        console.error(pc.red("Configuration error:"), configResult.left);
        console.error("");
        console.error("Environment variables:");
        for (const [name, description] of ENV_HELP) {
          console.error(`  ${name.padEnd(24)} ${description}`);
        }
        process.exitCode = 1;
        return;
      }

      const config = configResult.right;
      const sources = await resolveSources(options);
      const level = options.verbose ? LogLevel.Debug : config.logLevel;
      const timeoutMs = options.timeout ?? config.importTimeoutMs;
      const output = options.output;

      const storeLayer: Layer.Layer<GraphStore, ConnectivityError> = options.dryRun
        ? new InMemoryGraphStore().layer()
        : Neo4jGraphStoreLive({
            uri: config.neo4jUri,
            user: config.neo4jUser,
            password: config.neo4jPassword,
            database: config.neo4jDatabase,
          });

      const outcome = await Effect.runPromise(
        Effect.gen(function* () {
          const document = yield* extractGraph(sources);
          if (output) {
            yield* writeDocument(output, document);
          }
          return yield* GraphImporter.pipe(
            Effect.flatMap((importer) =>
              importer.importDocument(document, { timeoutMs }),
            ),
            Effect.provide(GraphImporter.Default),
            Effect.provide(storeLayer),
          );
        }).pipe(Effect.either, Effect.provide(createLoggerLayer(level))),
      );

      if (Either.isLeft(outcome)) {
        console.error(formatPipelineError(outcome.left));
        process.exitCode = 1;
        return;
      }

      const result = outcome.right;
      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        for (const line of formatImportResult(result)) {
          console.log(line);
        }
      }
      process.exitCode = result.success ? 0 : 1;
    });
}
