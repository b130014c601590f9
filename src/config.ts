/**
 * Runtime configuration
 *
 * Loads configuration from environment variables. A `.env` file in the
 * working directory is read by the CLI before this runs.
 */

import { Either, LogLevel } from "effect";
import { DEFAULT_TIMEOUT_MS } from "./importer/graph-importer.js";

export interface AppConfig {
  /** Bolt URI of the graph store */
  neo4jUri: string;
  neo4jUser: string;
  /** Empty when credentials are not required, e.g. for dry runs */
  neo4jPassword: string;
  /** Database name, driver default when unset */
  neo4jDatabase?: string;
  /** Per-call import timeout in milliseconds */
  importTimeoutMs: number;
  logLevel: LogLevel.LogLevel;
}

export interface LoadConfigOptions {
  /** Fail when NEO4J_PASSWORD is missing */
  requireCredentials?: boolean;
}

export const ENV_HELP: ReadonlyArray<readonly [string, string]> = [
  ["NEO4J_URI", "Graph store URI (default bolt://localhost:7687)"],
  ["NEO4J_USER", "Graph store user (default neo4j)"],
  ["NEO4J_PASSWORD", "Graph store password (required unless --dry-run)"],
  ["NEO4J_DATABASE", "Graph store database (default: server default)"],
  ["GRAPH_IMPORT_TIMEOUT_MS", "Per-call import timeout (default 10000)"],
  ["LOG_LEVEL", "Debug, Info, Warning, Error or None (default Info)"],
];

const LOG_LEVELS: ReadonlyArray<LogLevel.Literal> = [
  "All",
  "Trace",
  "Debug",
  "Info",
  "Warning",
  "Error",
  "Fatal",
  "None",
];

export function parseLogLevel(value: string): LogLevel.LogLevel | undefined {
  const literal = LOG_LEVELS.find(
    (level) => level.toLowerCase() === value.trim().toLowerCase(),
  );
  return literal ? LogLevel.fromLiteral(literal) : undefined;
}

/**
 * Digits only, greater than zero
 */
export function parsePositiveInteger(value: string): number | undefined {
  if (!/^\s*\d+\s*$/.test(value)) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return parsed > 0 ? parsed : undefined;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  options: LoadConfigOptions = {},
): Either.Either<AppConfig, string> {
  const neo4jPassword = env.NEO4J_PASSWORD ?? "";
  if (options.requireCredentials && !neo4jPassword) {
    return Either.left("NEO4J_PASSWORD is required");
  }

  const importTimeoutMs = env.GRAPH_IMPORT_TIMEOUT_MS
    ? parsePositiveInteger(env.GRAPH_IMPORT_TIMEOUT_MS)
    : DEFAULT_TIMEOUT_MS;
  if (importTimeoutMs === undefined) {
    return Either.left(
      `GRAPH_IMPORT_TIMEOUT_MS must be a positive integer, got ${env.GRAPH_IMPORT_TIMEOUT_MS}`,
    );
  }

  const logLevel = parseLogLevel(env.LOG_LEVEL || "Info");
  if (!logLevel) {
    return Either.left(`Unknown LOG_LEVEL ${env.LOG_LEVEL}`);
  }

  const neo4jDatabase = env.NEO4J_DATABASE || undefined;

  return Either.right({
    neo4jUri: env.NEO4J_URI || "bolt://localhost:7687",
    neo4jUser: env.NEO4J_USER || "neo4j",
    neo4jPassword,
    ...(neo4jDatabase ? { neo4jDatabase } : {}),
    importTimeoutMs,
    logLevel,
  });
}
