/**
 * Extract command - parse class files and emit the graph document
 * without touching the graph store
 */

import type { Command } from "commander";
import { Effect, Either, LogLevel } from "effect";
import pc from "picocolors";
import { loadConfig } from "../../config.js";
import { serializeGraphDocument } from "../../graph/document.js";
import { createLoggerLayer } from "../../logger.js";
import { extractGraph, writeDocument } from "../../pipeline.js";
import { resolveSources, type SourceOptions } from "../loader.js";
import { formatDocumentSummary, formatPipelineError } from "../report.js";

export interface ExtractCommandOptions extends SourceOptions {
  output?: string;
  verbose?: boolean;
}

export function extractCommand(program: Command): void {
  program
    .command("extract")
    .description("Parse class files and print the graph document as JSON")
    .option("-p, --production-file <path>", "Class file with the production definition")
    .option("-r, --routing-rule-file <paths...>", "Class files with routing rule definitions")
    .option("-d, --dir <path>", "Discover class files under this directory")
    .option("-o, --output <path>", "Write the graph document to a file instead of stdout")
    .option("-v, --verbose", "Enable debug logging")
    .action(async (options: ExtractCommandOptions) => {
      const config = loadConfig(process.env);
      if (Either.isLeft(config)) {
        console.error(pc.red("Configuration error:"), config.left);
        process.exitCode = 1;
        return;
      }

      const sources = await resolveSources(options);
      const level = options.verbose ? LogLevel.Debug : config.right.logLevel;
      const output = options.output;

      const outcome = await Effect.runPromise(
        extractGraph(sources).pipe(
          Effect.tap((document) =>
            output
              ? writeDocument(output, document)
              : Effect.sync(() => {
                  process.stdout.write(serializeGraphDocument(document));
                }),
          ),
          Effect.either,
          Effect.provide(createLoggerLayer(level)),
        ),
      );

      if (Either.isLeft(outcome)) {
        console.error(formatPipelineError(outcome.left));
        process.exitCode = 1;
        return;
      }

      if (output) {
        for (const line of formatDocumentSummary(outcome.right)) {
          console.log(line);
        }
        console.log(pc.dim(`Wrote ${output}`));
      }
    });
}
