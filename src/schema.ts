/**
 * Definition kinds. The numeric values are the kind index used by the binary
 * schema format.
 */
export enum DefinitionKind {
  Enum = 0,
  Struct = 1,
  Message = 2,
}

/**
 * A field of a struct or message, or a member of an enum.
 *
 * For enum members `type` is absent and `id` is the member's value. For struct
 * fields `id` is the 1-based declaration ordinal, which is never written on
 * the wire. For message fields `id` is the wire tag.
 */
export interface Field {
  readonly name: string;
  readonly type?: string;
  readonly isArray: boolean;
  readonly isDeprecated: boolean;
  readonly id: number;
}

/**
 * An enum, struct or message definition.
 */
export interface Definition {
  readonly name: string;
  readonly kind: DefinitionKind;
  readonly fields: readonly Field[];
}

/**
 * A complete schema. Built once by parsing or decoding, never mutated.
 */
export interface Schema {
  readonly package?: string;
  readonly definitions: readonly Definition[];
}

/**
 * Native type names accepted in schema text.
 */
export const NATIVE_TYPES: readonly string[] = [
  "bool",
  "byte",
  "int",
  "uint",
  "int64",
  "uint64",
  "float",
  "string",
];

/**
 * Native types in binary schema order. A field whose type is native is written
 * as the bitwise complement of its index in this table.
 */
export const BINARY_NATIVE_TYPES: readonly string[] = [
  "bool",
  "byte",
  "int",
  "uint",
  "float",
  "string",
  "int64",
  "uint64",
];

/**
 * Names that may not be used for definitions.
 */
export const RESERVED_NAMES: readonly string[] = ["ByteBuffer", "package"];

/**
 * Returns the lowercase keyword for a definition kind.
 */
export function kindKeyword(kind: DefinitionKind): "enum" | "struct" | "message" {
  switch (kind) {
    case DefinitionKind.Enum:
      return "enum";
    case DefinitionKind.Struct:
      return "struct";
    case DefinitionKind.Message:
      return "message";
  }
}

export function isNativeType(name: string): boolean {
  return NATIVE_TYPES.includes(name);
}
