/**
 * Locates embedded `XData` blocks inside class-definition text.
 *
 * A block looks like:
 *
 *   XData ProductionDefinition [ XMLNamespace = "..." ]
 *   {
 *   <Production Name="Demo.Production"> ... </Production>
 *   }
 *
 * Delimiters are only counted outside markup: braces inside tags, comments,
 * CDATA sections and element content never open or close the block.
 */

import { Effect } from "effect";
import { ParseError } from "../errors.js";

export interface SegmentMarker {
  /** Block name following the XData keyword */
  block: string;
  open?: string;
  close?: string;
}

export interface ParseContext {
  /** Path of the file being parsed, carried into errors */
  file?: string;
}

export interface ClassHeader {
  name: string;
  extends?: string;
}

const CLASS_HEADER_PATTERN = /^\s*Class\s+([%\w.]+)(?:\s+Extends\s+\(?\s*([%\w.]+))?/m;
const SEGMENT_NAME_PATTERN = /\bXData\s+([%A-Za-z_][\w.%]*)/g;

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Index just past the closing quote-aware `terminator`, or -1
 */
function skipQuoted(text: string, from: number, terminator: string): number {
  let quote: string | null = null;
  for (let i = from; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === terminator) {
      return i + 1;
    }
  }
  return -1;
}

function skipWhitespace(text: string, from: number): number {
  let i = from;
  while (i < text.length && /\s/.test(text[i])) i++;
  return i;
}

/**
 * Index past a markup construct starting at `i`, -1 if unterminated,
 * or null when `i` does not start one.
 */
function skipMarkup(text: string, i: number): number | null {
  if (text.startsWith("<!--", i)) {
    const end = text.indexOf("-->", i + 4);
    return end === -1 ? -1 : end + 3;
  }
  if (text.startsWith("<![CDATA[", i)) {
    const end = text.indexOf("]]>", i + 9);
    return end === -1 ? -1 : end + 3;
  }
  if (text[i] === "<" && /[A-Za-z_/?!]/.test(text[i + 1] ?? "")) {
    return skipQuoted(text, i + 1, ">");
  }
  return null;
}

/**
 * Change in element depth for the tag spanning `text[from..to)`
 */
function elementDepthChange(text: string, from: number, to: number): number {
  if (text.startsWith("<!", from) || text.startsWith("<?", from)) {
    return 0;
  }
  if (text.startsWith("</", from)) {
    return -1;
  }
  return text.startsWith("/>", to - 2) ? 0 : 1;
}

/**
 * Return the content of the named block, exclusive of its delimiters
 */
export function extractSegment(
  text: string,
  marker: SegmentMarker,
  context: ParseContext = {},
): Effect.Effect<string, ParseError> {
  const open = marker.open ?? "{";
  const close = marker.close ?? "}";
  const where = context.file ? ` in ${context.file}` : "";

  const invalid = (message: string) =>
    Effect.fail(
      new ParseError({
        reason: "InvalidStructure",
        message: `${message}${where}`,
        file: context.file,
      }),
    );

  const header = new RegExp(`\\bXData\\s+${escapeRegExp(marker.block)}\\b`).exec(
    text,
  );
  if (!header) {
    return Effect.fail(
      new ParseError({
        reason: "MissingSegment",
        message: `No XData ${marker.block} block found${where}`,
        file: context.file,
      }),
    );
  }

  let pos = skipWhitespace(text, header.index + header[0].length);
  if (text[pos] === "[") {
    const end = skipQuoted(text, pos + 1, "]");
    if (end === -1) {
      return invalid(`Unterminated keyword list on XData ${marker.block}`);
    }
    pos = skipWhitespace(text, end);
  }

  if (!text.startsWith(open, pos)) {
    return invalid(`Expected "${open}" after XData ${marker.block}`);
  }

  const start = pos + open.length;
  let depth = 1;
  let elementDepth = 0;
  let i = start;
  while (i < text.length) {
    const skipped = skipMarkup(text, i);
    if (skipped === -1) {
      return invalid(`Unterminated markup in XData ${marker.block}`);
    }
    if (skipped !== null) {
      elementDepth = Math.max(0, elementDepth + elementDepthChange(text, i, skipped));
      i = skipped;
      continue;
    }
    if (elementDepth > 0) {
      i++;
      continue;
    }
    if (text.startsWith(close, i)) {
      depth--;
      if (depth === 0) {
        return Effect.succeed(text.slice(start, i));
      }
      i += close.length;
      continue;
    }
    if (text.startsWith(open, i)) {
      depth++;
      i += open.length;
      continue;
    }
    i++;
  }

  return invalid(`XData ${marker.block} block is never closed`);
}

/**
 * Names of all XData blocks in document order
 */
export function listSegments(text: string): string[] {
  return Array.from(text.matchAll(SEGMENT_NAME_PATTERN), (m) => m[1]);
}

export function parseClassHeader(text: string): ClassHeader | undefined {
  const match = CLASS_HEADER_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  return match[2] ? { name: match[1], extends: match[2] } : { name: match[1] };
}
