/**
 * Class file loader - discovers production and routing rule files on disk
 */

import { readFile } from "node:fs/promises";
import { glob } from "glob";
import { PRODUCTION_BLOCK } from "../parser/production-parser.js";
import { RULE_BLOCK } from "../parser/routing-rule-parser.js";
import { listSegments } from "../parser/segment-extractor.js";

/**
 * Patterns for finding class-definition files
 */
const CLASS_PATTERNS = ["**/*.cls"];

/**
 * Patterns to ignore
 */
const IGNORE_PATTERNS = ["**/node_modules/**", "**/dist/**", "**/.git/**"];

export interface DiscoveredFiles {
  productionFiles: string[];
  routingRuleFiles: string[];
  /** Class files declaring neither block */
  skipped: string[];
}

export interface DiscoverOptions {
  patterns?: string[];
  ignore?: string[];
}

/**
 * Find class files under a directory and classify them by the XData
 * blocks they declare
 */
export async function discoverClassFiles(
  dir: string,
  options: DiscoverOptions = {},
): Promise<DiscoveredFiles> {
  const patterns = options.patterns || CLASS_PATTERNS;
  const ignore = options.ignore || IGNORE_PATTERNS;

  const files: string[] = [];
  for (const pattern of patterns) {
    const matches = await glob(pattern, {
      cwd: dir,
      ignore,
      absolute: true,
    });
    files.push(...matches);
  }

  // Deduplicate, stable order across platforms
  const uniqueFiles = [...new Set(files)].sort();

  const result: DiscoveredFiles = {
    productionFiles: [],
    routingRuleFiles: [],
    skipped: [],
  };

  for (const file of uniqueFiles) {
    const segments = listSegments(await readFile(file, "utf-8"));
    const isProduction = segments.includes(PRODUCTION_BLOCK);
    const isRuleSet = segments.includes(RULE_BLOCK);
    if (isProduction) result.productionFiles.push(file);
    if (isRuleSet) result.routingRuleFiles.push(file);
    if (!isProduction && !isRuleSet) result.skipped.push(file);
  }

  return result;
}

export interface SourceOptions {
  productionFile?: string;
  routingRuleFile?: string[];
  dir?: string;
}

export interface ResolvedSources {
  productionFile: string;
  routingRuleFiles: string[];
}

/**
 * Combine explicit file options with directory discovery.
 * Explicit files take precedence over discovered ones.
 */
export async function resolveSources(
  options: SourceOptions,
): Promise<ResolvedSources> {
  const discovered = options.dir
    ? await discoverClassFiles(options.dir)
    : { productionFiles: [], routingRuleFiles: [], skipped: [] };

  let productionFile = options.productionFile;
  if (!productionFile) {
    if (discovered.productionFiles.length > 1) {
      throw new Error(
        `Found ${discovered.productionFiles.length} production files in ${options.dir}; pick one with --production-file`,
      );
    }
    productionFile = discovered.productionFiles[0];
  }
  if (!productionFile) {
    throw new Error("No production file given; use --production-file or --dir");
  }

  const routingRuleFiles = [
    ...new Set([...(options.routingRuleFile ?? []), ...discovered.routingRuleFiles]),
  ];

  return { productionFile, routingRuleFiles };
}
