/**
 * Builds a Production from the ProductionDefinition block of a class file
 */

import { Effect } from "effect";
import { ParseError } from "../errors.js";
import {
  type Component,
  createComponent,
  type Production,
  type Setting,
} from "../model/production.js";
import {
  attributeOf,
  childNamed,
  childrenNamed,
  isNamed,
  type MarkupElement,
  parseMarkup,
} from "./markup.js";
import {
  extractSegment,
  type ParseContext,
  parseClassHeader,
} from "./segment-extractor.js";

export const PRODUCTION_BLOCK = "ProductionDefinition";

export interface ProductionParseOptions {
  sourceFile?: string;
}

export function parseBoolean(value: string | undefined): boolean | undefined {
  switch (value?.trim().toLowerCase()) {
    case "1":
    case "true":
      return true;
    case "0":
    case "false":
      return false;
    default:
      return undefined;
  }
}

export function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^\s*-?\d+\s*$/.test(value)) {
    return undefined;
  }
  return Number.parseInt(value, 10);
}

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

/**
 * Child element text, falling back to an attribute of the same name
 */
function textOrAttribute(
  element: MarkupElement,
  name: string,
): string | undefined {
  const child = childNamed(element, name);
  return nonEmpty(child?.text) ?? nonEmpty(attributeOf(element, name));
}

/**
 * Settings keyed by name; a repeated name keeps its first position and
 * takes the last value
 */
function parseSettings(item: MarkupElement): Setting[] {
  const settings: Setting[] = [];
  const positions = new Map<string, number>();

  for (const element of childrenNamed(item, "Setting")) {
    const name = nonEmpty(attributeOf(element, "Name"));
    if (!name) continue;

    const text = element.text.trim();
    const value = text || (attributeOf(element, "Value") ?? "");
    const target = nonEmpty(attributeOf(element, "Target"));
    const setting: Setting = target ? { name, value, target } : { name, value };

    const existing = positions.get(name);
    if (existing === undefined) {
      positions.set(name, settings.length);
      settings.push(setting);
    } else {
      settings[existing] = setting;
    }
  }

  return settings;
}

function parseItem(
  item: MarkupElement,
  index: number,
  context: ParseContext,
): Effect.Effect<Component, ParseError> {
  const name = nonEmpty(attributeOf(item, "Name"));
  const type = nonEmpty(attributeOf(item, "ClassName"));
  const where = context.file ? ` in ${context.file}` : "";

  if (!name || !type) {
    const missing = !name ? "Name" : "ClassName";
    return Effect.fail(
      new ParseError({
        reason: "MissingRequiredField",
        message: `Item ${index + 1}${name ? ` (${name})` : ""} is missing ${missing}${where}`,
        file: context.file,
      }),
    );
  }

  const enabled = parseBoolean(attributeOf(item, "Enabled"));
  const poolSize = parseInteger(attributeOf(item, "PoolSize"));
  const category = nonEmpty(attributeOf(item, "Category"));
  const comment = nonEmpty(attributeOf(item, "Comment"));

  return Effect.succeed(
    createComponent(name, type, {
      settings: parseSettings(item),
      ...(enabled !== undefined ? { enabled } : {}),
      ...(poolSize !== undefined ? { poolSize } : {}),
      ...(category ? { category } : {}),
      ...(comment ? { comment } : {}),
    }),
  );
}

/**
 * Parse the production declared in a class-definition file
 */
export const parseProduction = (
  text: string,
  options: ProductionParseOptions = {},
): Effect.Effect<Production, ParseError> =>
  Effect.gen(function* () {
    const context: ParseContext = { file: options.sourceFile };
    const where = context.file ? ` in ${context.file}` : "";

    const segment = yield* extractSegment(
      text,
      { block: PRODUCTION_BLOCK },
      context,
    );
    const root = yield* parseMarkup(segment, context);

    if (!isNamed(root, "Production")) {
      return yield* Effect.fail(
        new ParseError({
          reason: "InvalidStructure",
          message: `Expected <Production> root element but found <${root.name}>${where}`,
          file: context.file,
        }),
      );
    }

    const className = parseClassHeader(text)?.name;
    const name = nonEmpty(attributeOf(root, "Name")) ?? className;
    if (!name) {
      return yield* Effect.fail(
        new ParseError({
          reason: "MissingRequiredField",
          message: `Production has no Name${where}`,
          file: context.file,
        }),
      );
    }

    const components = yield* Effect.forEach(
      childrenNamed(root, "Item"),
      (item, index) => parseItem(item, index, context),
    );

    const description = textOrAttribute(root, "Description");
    const actorPoolSize = parseInteger(textOrAttribute(root, "ActorPoolSize"));

    yield* Effect.logDebug(
      `[ProductionParser] Parsed production ${name} with ${components.length} components`,
    );

    const production: Production = {
      name,
      components,
      ...(description ? { description } : {}),
      ...(actorPoolSize !== undefined ? { actorPoolSize } : {}),
      ...(className ? { className } : {}),
      ...(options.sourceFile ? { sourceFile: options.sourceFile } : {}),
    };
    return production;
  });
