/**
 * The Figma document schema, as used for clipboard data and for building
 * messages without a `.fig` container at hand.
 *
 * The schema text ships beside this module as `figma.kiwi` and is parsed on
 * every `createFigmaSchema()` call; callers that need it repeatedly keep the
 * returned instance.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { compileSchema, type CompileOptions, type CompiledSchema } from "./compiler";
import { UnknownTypeError } from "./errors";
import type { KiwiRecord } from "./value";

const FIGMA_SCHEMA_URL = new URL("./figma.kiwi", import.meta.url);

/** Enums exposed as lookup tables by `figmaEnumTables`. */
export const FIGMA_ENUMS = {
  nodeType: "NodeType",
  blendMode: "BlendMode",
  paintType: "PaintType",
  effectType: "EffectType",
} as const;

export interface EnumTable {
  /** Member name to value */
  readonly values: ReadonlyMap<string, number>;
  /** Value to member name */
  readonly names: ReadonlyMap<number, string>;
}

export type FigmaEnumTables = { readonly [K in keyof typeof FIGMA_ENUMS]: EnumTable };

/**
 * Reads the bundled schema text.
 */
export function loadFigmaSchemaText(): string {
  return readFileSync(fileURLToPath(FIGMA_SCHEMA_URL), "utf8");
}

/**
 * Parses and compiles the bundled Figma schema.
 *
 * @example
 * ```typescript
 * const figma = createFigmaSchema();
 * const bytes = encodeFigmaPaint(figma, { type: "SOLID", color: { r: 1, g: 0, b: 0, a: 1 } });
 * ```
 */
export function createFigmaSchema(options: CompileOptions = {}): CompiledSchema {
  return compileSchema(loadFigmaSchemaText(), options);
}

export function encodeFigmaMessage(schema: CompiledSchema, message: KiwiRecord): Uint8Array {
  return schema.encode("Message", message);
}

export function decodeFigmaMessage(schema: CompiledSchema, data: Uint8Array): KiwiRecord {
  return schema.decode("Message", data);
}

export function encodeFigmaNodeChange(schema: CompiledSchema, nodeChange: KiwiRecord): Uint8Array {
  return schema.encode("NodeChange", nodeChange);
}

export function decodeFigmaNodeChange(schema: CompiledSchema, data: Uint8Array): KiwiRecord {
  return schema.decode("NodeChange", data);
}

export function encodeFigmaPaint(schema: CompiledSchema, paint: KiwiRecord): Uint8Array {
  return schema.encode("Paint", paint);
}

export function decodeFigmaPaint(schema: CompiledSchema, data: Uint8Array): KiwiRecord {
  return schema.decode("Paint", data);
}

export function encodeFigmaEffect(schema: CompiledSchema, effect: KiwiRecord): Uint8Array {
  return schema.encode("Effect", effect);
}

export function decodeFigmaEffect(schema: CompiledSchema, data: Uint8Array): KiwiRecord {
  return schema.decode("Effect", data);
}

/**
 * Returns the NodeType, BlendMode, PaintType and EffectType tables.
 *
 * @throws UnknownTypeError if the schema lacks one of the enums
 */
export function figmaEnumTables(schema: CompiledSchema): FigmaEnumTables {
  return {
    nodeType: enumTable(schema, FIGMA_ENUMS.nodeType),
    blendMode: enumTable(schema, FIGMA_ENUMS.blendMode),
    paintType: enumTable(schema, FIGMA_ENUMS.paintType),
    effectType: enumTable(schema, FIGMA_ENUMS.effectType),
  };
}

function enumTable(schema: CompiledSchema, name: string): EnumTable {
  const values = schema.enumValues(name);
  const names = schema.enumNames(name);
  if (values === undefined || names === undefined) {
    throw new UnknownTypeError(name, "not an enum in this schema");
  }
  return { values, names };
}
