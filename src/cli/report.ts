import pc from "picocolors";
import type {
  ConnectivityError,
  DocumentDecodeError,
  ParseError,
  SourceReadError,
} from "../errors.js";
import type { GraphDocument } from "../graph/document.js";
import {
  describeRelationship,
  RELATIONSHIP_TYPES,
} from "../graph/relationship.js";
import type { ImportResult } from "../importer/graph-importer.js";

export type PipelineError =
  | ParseError
  | SourceReadError
  | ConnectivityError
  | DocumentDecodeError;

export function formatPipelineError(error: PipelineError): string {
  const label =
    error._tag === "ParseError" ? `${error._tag}(${error.reason})` : error._tag;
  return `${pc.red(`${label}:`)} ${error.message}`;
}

export function formatDocumentSummary(document: GraphDocument): string[] {
  const { metadata } = document;
  const lines = [
    pc.bold(`Production ${metadata.productionName}`),
    `  Components:    ${metadata.counts.components}`,
    `  Rules:         ${metadata.counts.rules}`,
    `  Nodes:         ${metadata.counts.nodes}`,
    `  Relationships: ${metadata.counts.relationships}`,
  ];
  for (const type of RELATIONSHIP_TYPES) {
    const count = document.relationships.filter((r) => r.type === type).length;
    if (count > 0) {
      lines.push(pc.dim(`    ${type} (${describeRelationship(type)}): ${count}`));
    }
  }
  for (const warning of metadata.warnings) {
    lines.push(pc.yellow(`  ! ${warning}`));
  }
  return lines;
}

export function formatImportResult(result: ImportResult): string[] {
  const { statistics, verification } = result;
  const status = result.success ? pc.green("✓") : pc.red("✗");
  const lines = [
    `${status} ${result.message}`,
    `  Nodes:         ${statistics.nodesCreated} imported, ${statistics.nodesFailed} failed`,
    `  Relationships: ${statistics.relationshipsCreated} imported, ${statistics.relationshipsFailed} failed`,
  ];

  if (verification) {
    lines.push(
      pc.dim(
        `  Store now holds ${verification.nodesImported} nodes and ${verification.relationshipsImported} relationships`,
      ),
    );
    for (const [type, count] of Object.entries(verification.typeDistribution)) {
      lines.push(pc.dim(`    ${type}: ${count}`));
    }
  }

  for (const failure of result.failures) {
    lines.push(
      pc.red(`  ✗ ${failure.kind} ${failure.key} (${failure.reason}): ${failure.message}`),
    );
  }
  for (const warning of result.warnings) {
    lines.push(pc.yellow(`  ! ${warning}`));
  }
  return lines;
}
