import { Data } from "effect";

/**
 * Error types for parsing, graph construction and import
 */

export type ParseErrorReason =
  | "MissingSegment"
  | "InvalidStructure"
  | "MissingRequiredField";

/**
 * A class-definition file could not be parsed. Fatal for that file.
 */
export class ParseError extends Data.TaggedError("ParseError")<{
  reason: ParseErrorReason;
  message: string;
  file?: string;
  cause?: unknown;
}> {}

export type ImportErrorReason = "DanglingReference" | "UpsertFailed";

/**
 * A single node or relationship could not be written to the store.
 * Counted per item; never aborts an import.
 */
export class ImportError extends Data.TaggedError("ImportError")<{
  reason: ImportErrorReason;
  message: string;
  /** Node name or relationship key of the failed item */
  key: string;
  cause?: unknown;
}> {}

/**
 * The graph store is unreachable
 */
export class ConnectivityError extends Data.TaggedError("ConnectivityError")<{
  message: string;
  uri?: string;
  cause?: unknown;
}> {}

export class StoreError extends Data.TaggedError("StoreError")<{
  message: string;
  cause?: unknown;
}> {}

export class SourceReadError extends Data.TaggedError("SourceReadError")<{
  message: string;
  path: string;
  cause?: unknown;
}> {}

export class DocumentDecodeError extends Data.TaggedError(
  "DocumentDecodeError",
)<{
  message: string;
  cause?: unknown;
}> {}

export const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);
