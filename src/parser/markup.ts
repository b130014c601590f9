/**
 * Generic markup stage shared by the production and rule parsers.
 * Turns a segment into a plain element tree; schema-specific parsers
 * only ever see MarkupElement values.
 */

import { DOMParser } from "@xmldom/xmldom";
import { Effect } from "effect";
import { describeCause, ParseError } from "../errors.js";
import type { ParseContext } from "./segment-extractor.js";

export interface MarkupElement {
  /** Local name, without namespace prefix */
  readonly name: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: ReadonlyArray<MarkupElement>;
  /** Direct text and CDATA content, untrimmed */
  readonly text: string;
}

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

const NAME_PATTERN = /^[A-Za-z_][\w.:-]*/;

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

/**
 * Find the first tag balance problem, if any. xmldom recovers silently
 * from unclosed elements, so this runs before it.
 */
export function findBalanceProblem(source: string): string | undefined {
  const stack: string[] = [];
  let roots = 0;
  let i = 0;

  while (i < source.length) {
    const lt = source.indexOf("<", i);
    if (lt === -1) break;

    if (source.startsWith("<!--", lt)) {
      const end = source.indexOf("-->", lt + 4);
      if (end === -1) return "Unterminated comment";
      i = end + 3;
      continue;
    }
    if (source.startsWith("<![CDATA[", lt)) {
      const end = source.indexOf("]]>", lt + 9);
      if (end === -1) return "Unterminated CDATA section";
      i = end + 3;
      continue;
    }
    if (source.startsWith("<?", lt) || source.startsWith("<!", lt)) {
      const end = source.indexOf(">", lt + 2);
      if (end === -1) return "Unterminated declaration";
      i = end + 1;
      continue;
    }

    const end = findTagEnd(source, lt + 1);
    if (end === -1) return `Unterminated tag at offset ${lt}`;
    const body = source.slice(lt + 1, end);
    i = end + 1;

    if (body.startsWith("/")) {
      const name = body.slice(1).trim();
      const open = stack.pop();
      if (open === undefined) return `Unexpected closing tag </${name}>`;
      if (open !== name) return `Expected </${open}> but found </${name}>`;
      continue;
    }

    const match = NAME_PATTERN.exec(body);
    if (!match) return `Malformed tag at offset ${lt}`;
    if (stack.length === 0) {
      roots++;
      if (roots > 1) return `Multiple root elements, second is <${match[0]}>`;
    }
    if (!body.trimEnd().endsWith("/")) {
      stack.push(match[0]);
    }
  }

  if (stack.length > 0) return `Unclosed element <${stack[stack.length - 1]}>`;
  if (roots === 0) return "No root element";
  return undefined;
}

function findTagEnd(source: string, from: number): number {
  let quote: string | null = null;
  for (let i = from; i < source.length; i++) {
    const ch = source[i];
    if (quote) {
      if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === ">") {
      return i;
    } else if (ch === "<") {
      return -1;
    }
  }
  return -1;
}

function toMarkupElement(element: Element): MarkupElement {
  const attributes: Record<string, string> = {};
  for (let i = 0; i < element.attributes.length; i++) {
    const attr = element.attributes.item(i);
    if (!attr || attr.name === "xmlns" || attr.name.startsWith("xmlns:")) {
      continue;
    }
    attributes[attr.localName || attr.name] = attr.value;
  }

  const children: MarkupElement[] = [];
  let text = "";
  for (let i = 0; i < element.childNodes.length; i++) {
    const node = element.childNodes.item(i);
    if (!node) continue;
    if (isElement(node)) {
      children.push(toMarkupElement(node));
    } else if (
      node.nodeType === TEXT_NODE ||
      node.nodeType === CDATA_SECTION_NODE
    ) {
      text += node.nodeValue ?? "";
    }
  }

  return {
    name: element.localName || element.tagName,
    attributes,
    children,
    text,
  };
}

/**
 * Parse a markup segment into its root element
 */
export const parseMarkup = (
  source: string,
  context: ParseContext = {},
): Effect.Effect<MarkupElement, ParseError> =>
  Effect.gen(function* () {
    const where = context.file ? ` in ${context.file}` : "";
    const invalid = (message: string, cause?: unknown) =>
      new ParseError({
        reason: "InvalidStructure",
        message: `${message}${where}`,
        file: context.file,
        cause,
      });

    const problem = findBalanceProblem(source);
    if (problem) {
      return yield* Effect.fail(invalid(problem));
    }

    const problems: string[] = [];
    const parser = new DOMParser({
      errorHandler: {
        warning: () => undefined,
        error: (msg: string) => {
          problems.push(msg);
        },
        fatalError: (msg: string) => {
          problems.push(msg);
        },
      },
    });

    const document = yield* Effect.try({
      try: () => parser.parseFromString(source.trim(), "text/xml"),
      catch: (cause) => invalid(`Malformed markup: ${describeCause(cause)}`, cause),
    });

    if (problems.length > 0) {
      return yield* Effect.fail(invalid(`Malformed markup: ${problems[0]}`));
    }

    const root = document.documentElement;
    if (!root) {
      return yield* Effect.fail(invalid("No root element"));
    }

    yield* Effect.logDebug(`[MarkupReader] Parsed <${root.localName || root.tagName}>${where}`);
    return toMarkupElement(root);
  });

const same = (a: string, b: string): boolean =>
  a.toLowerCase() === b.toLowerCase();

export function attributeOf(
  element: MarkupElement,
  name: string,
): string | undefined {
  for (const [key, value] of Object.entries(element.attributes)) {
    if (same(key, name)) return value;
  }
  return undefined;
}

export function childrenNamed(
  element: MarkupElement,
  name: string,
): MarkupElement[] {
  return element.children.filter((child) => same(child.name, name));
}

export function childNamed(
  element: MarkupElement,
  name: string,
): MarkupElement | undefined {
  return element.children.find((child) => same(child.name, name));
}

/**
 * All descendants with the given name in document order
 */
export function descendantsNamed(
  element: MarkupElement,
  name: string,
): MarkupElement[] {
  const found: MarkupElement[] = [];
  for (const child of element.children) {
    if (same(child.name, name)) {
      found.push(child);
    }
    found.push(...descendantsNamed(child, name));
  }
  return found;
}

export const isNamed = (element: MarkupElement, name: string): boolean =>
  same(element.name, name);
