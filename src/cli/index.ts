#!/usr/bin/env node

/**
 * production-graph CLI
 * Extracts production topology from class files and imports it into a graph store
 */

import { Command, CommanderError } from "commander";
import { config as dotenvConfig } from "dotenv";
import pc from "picocolors";
import { extractCommand } from "./commands/extract.js";
import { importCommand } from "./commands/import.js";

dotenvConfig();

const program = new Command();

program
  .name("production-graph")
  .description("Build a routing graph from production and routing rule class files")
  .version("0.1.0");

// Register commands
importCommand(program);
extractCommand(program);

// Global error handling
program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (err) {
  if (err instanceof CommanderError) {
    // Help, version, or a usage error commander already reported
    process.exit(err.exitCode);
  }
  console.error(pc.red("Error:"), err instanceof Error ? err.message : String(err));
  process.exit(1);
}
