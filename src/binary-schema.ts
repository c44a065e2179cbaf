import { DecodeError, UnknownTypeError } from "./errors";
import { Reader } from "./reader";
import {
  BINARY_NATIVE_TYPES,
  DefinitionKind,
  type Definition,
  type Field,
  type Schema,
} from "./schema";
import { Writer } from "./writer";

const KINDS: readonly DefinitionKind[] = [
  DefinitionKind.Enum,
  DefinitionKind.Struct,
  DefinitionKind.Message,
];

/** Flag bit set on array fields. */
const FLAG_ARRAY = 1;

/**
 * Encodes a schema into its binary form.
 *
 * Layout: `varuint definitionCount`, then per definition
 * `string name, byte kind, varuint fieldCount`, then per field
 * `string name, varint typeCode, byte flags, varuint id`.
 *
 * Native types are written as `~index` into {@link BINARY_NATIVE_TYPES},
 * defined types as their index in the definitions list. Enum members write a
 * placeholder code of 0. Package names and deprecation are not encoded.
 *
 * @throws UnknownTypeError if a field refers to a type that is neither native nor defined
 */
export function encodeBinarySchema(schema: Schema): Uint8Array {
  const writer = new Writer();
  const definitions = schema.definitions;
  const definitionIndex = new Map<string, number>();

  definitions.forEach((definition, i) => definitionIndex.set(definition.name, i));

  writer.writeVarUint(definitions.length);

  for (const definition of definitions) {
    writer.writeString(definition.name);
    writer.writeByte(definition.kind);
    writer.writeVarUint(definition.fields.length);

    for (const field of definition.fields) {
      writer.writeString(field.name);
      writer.writeVarInt(typeCode(field, definition, definitionIndex));
      writer.writeByte(field.isArray ? FLAG_ARRAY : 0);
      writer.writeVarUint(field.id);
    }
  }

  return writer.bytes();
}

function typeCode(
  field: Field,
  definition: Definition,
  definitionIndex: ReadonlyMap<string, number>
): number {
  if (field.type === undefined) {
    return 0;
  }

  const nativeIndex = BINARY_NATIVE_TYPES.indexOf(field.type);
  if (nativeIndex !== -1) {
    return ~nativeIndex;
  }

  const index = definitionIndex.get(field.type);
  if (index === undefined) {
    throw new UnknownTypeError(field.type, `referenced by field "${definition.name}.${field.name}"`);
  }
  return index;
}

interface RawField {
  name: string;
  code: number;
  isArray: boolean;
  id: number;
}

/**
 * Decodes a binary schema.
 *
 * Decoding takes two passes: every definition is read with raw type codes
 * first, then codes are resolved against the complete definitions list, so
 * fields may refer to definitions that come later.
 *
 * @throws DecodeError on an unknown definition kind
 * @throws UnknownTypeError on a type code outside the native table or the definitions list
 * @throws TruncatedError if the input ends early
 */
export function decodeBinarySchema(data: Uint8Array): Schema {
  const reader = new Reader(data);
  const definitionCount = reader.readVarUint();
  const raw: { name: string; kind: DefinitionKind; fields: RawField[] }[] = [];

  for (let i = 0; i < definitionCount; i++) {
    const name = reader.readString();
    const kindOffset = reader.position;
    const kind = KINDS[reader.readByte()];
    if (kind === undefined) {
      throw new DecodeError(`Invalid kind for definition "${name}" at offset ${kindOffset}`);
    }

    const fieldCount = reader.readVarUint();
    const fields: RawField[] = [];
    for (let j = 0; j < fieldCount; j++) {
      fields.push({
        name: reader.readString(),
        code: reader.readVarInt(),
        isArray: (reader.readByte() & FLAG_ARRAY) !== 0,
        id: reader.readVarUint(),
      });
    }

    raw.push({ name, kind, fields });
  }

  // Bind type names now that every definition is known
  const definitions: Definition[] = raw.map((definition) => ({
    name: definition.name,
    kind: definition.kind,
    fields: definition.fields.map((field): Field => {
      const base = { name: field.name, isArray: field.isArray, isDeprecated: false, id: field.id };
      if (definition.kind === DefinitionKind.Enum) {
        return base;
      }
      return { ...base, type: resolveTypeCode(field.code, raw, `${definition.name}.${field.name}`) };
    }),
  }));

  return { definitions };
}

function resolveTypeCode(
  code: number,
  definitions: readonly { name: string }[],
  fieldPath: string
): string {
  if (code < 0) {
    const native = BINARY_NATIVE_TYPES[~code];
    if (native === undefined) {
      throw new UnknownTypeError(String(code), `invalid native type code for field "${fieldPath}"`);
    }
    return native;
  }

  const definition = definitions[code];
  if (definition === undefined) {
    throw new UnknownTypeError(String(code), `definition index out of range for field "${fieldPath}"`);
  }
  return definition.name;
}
