import {
  DecodeError,
  EncodeError,
  InvalidEnumValueError,
  MissingRequiredFieldError,
  UnknownFieldError,
  UnknownTypeError,
} from "./errors";
import { parseSchema } from "./parser";
import { Reader } from "./reader";
import { DefinitionKind, type Definition, type Field, type Schema } from "./schema";
import { isKiwiArray, isKiwiRecord, type KiwiRecord, type KiwiValue } from "./value";
import { assertNoRecursiveStructs } from "./verifier";
import { Writer } from "./writer";

/** Default limit on nested struct and message records. */
export const DEFAULT_MAX_DEPTH = 512;

export interface CompileOptions {
  /** Deepest record nesting accepted by encode and decode. Default: 512 */
  maxDepth?: number;
}

/**
 * A schema compiled into lookup tables for encoding and decoding records.
 *
 * Build it once and share it: a compiled schema is never mutated after
 * construction, and every encode or decode call uses its own Writer or Reader.
 *
 * @example
 * ```typescript
 * const compiled = compileSchema(`
 *   enum T { A = 0; B = 1; }
 *   message M { uint id = 1; T t = 2; }
 * `);
 * const bytes = compiled.encode("M", { id: 5, t: "B" });
 * const record = compiled.decode("M", bytes); // { id: 5, t: "B" }
 * ```
 */
export class CompiledSchema {
  readonly schema: Schema;
  private readonly definitions = new Map<string, Definition>();
  private readonly enumValueMaps = new Map<string, ReadonlyMap<string, number>>();
  private readonly enumNameMaps = new Map<string, ReadonlyMap<number, string>>();
  private readonly fieldsById = new Map<string, ReadonlyMap<number, Field>>();
  private readonly maxDepth: number;

  constructor(schema: Schema, options: CompileOptions = {}) {
    assertNoRecursiveStructs(schema.definitions);
    this.schema = schema;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

    for (const definition of schema.definitions) {
      this.definitions.set(definition.name, definition);

      if (definition.kind === DefinitionKind.Enum) {
        const values = new Map<string, number>();
        const names = new Map<number, string>();
        for (const field of definition.fields) {
          values.set(field.name, field.id);
          names.set(field.id, field.name);
        }
        this.enumValueMaps.set(definition.name, values);
        this.enumNameMaps.set(definition.name, names);
      } else if (definition.kind === DefinitionKind.Message) {
        const byId = new Map<number, Field>();
        for (const field of definition.fields) {
          byId.set(field.id, field);
        }
        this.fieldsById.set(definition.name, byId);
      }
    }
  }

  /**
   * Returns true if the schema defines a type with this name.
   */
  has(typeName: string): boolean {
    return this.definitions.has(typeName);
  }

  /**
   * Returns the definition for a type name.
   */
  definition(typeName: string): Definition | undefined {
    return this.definitions.get(typeName);
  }

  /**
   * Returns the member name to value table of an enum.
   */
  enumValues(enumName: string): ReadonlyMap<string, number> | undefined {
    return this.enumValueMaps.get(enumName);
  }

  /**
   * Returns the value to member name table of an enum.
   */
  enumNames(enumName: string): ReadonlyMap<number, string> | undefined {
    return this.enumNameMaps.get(enumName);
  }

  /**
   * Encodes a record as the given struct or message type.
   *
   * @throws UnknownTypeError if the type is not defined
   * @throws MissingRequiredFieldError if a struct field is absent
   * @throws InvalidEnumValueError if an enum field holds an unknown member name
   * @throws EncodeError if a field holds a value of the wrong kind or records nest past `maxDepth`
   */
  encode(typeName: string, record: KiwiRecord): Uint8Array {
    const definition = this.aggregate(typeName, "encode");
    const writer = new Writer();
    this.encodeRecord(writer, definition, record, 1);
    return writer.bytes();
  }

  /**
   * Decodes bytes as the given struct or message type.
   *
   * @throws UnknownTypeError if the type is not defined
   * @throws UnknownFieldError if a message carries an undeclared field id
   * @throws InvalidEnumValueError if an enum field holds an unknown value
   * @throws TruncatedError if the input ends early
   * @throws DecodeError if records nest past `maxDepth`
   */
  decode(typeName: string, data: Uint8Array): KiwiRecord {
    const definition = this.aggregate(typeName, "decode");
    return this.decodeRecord(new Reader(data), definition, 1);
  }

  private aggregate(typeName: string, operation: "encode" | "decode"): Definition {
    const definition = this.definitions.get(typeName);
    if (definition === undefined) {
      throw new UnknownTypeError(typeName);
    }
    if (definition.kind === DefinitionKind.Enum) {
      const message = `Cannot ${operation} enum "${typeName}" as a top-level type`;
      throw operation === "encode" ? new EncodeError(message) : new DecodeError(message);
    }
    return definition;
  }

  private lookup(typeName: string): Definition {
    const definition = this.definitions.get(typeName);
    if (definition === undefined) {
      throw new UnknownTypeError(typeName);
    }
    return definition;
  }

  // ---------------------------------------------------------------------------
  // Decoding
  // ---------------------------------------------------------------------------

  private decodeRecord(reader: Reader, definition: Definition, depth: number): KiwiRecord {
    if (depth > this.maxDepth) {
      throw new DecodeError(
        `Exceeded maximum nesting depth of ${this.maxDepth} at offset ${reader.position}`
      );
    }
    const result: KiwiRecord = {};

    if (definition.kind === DefinitionKind.Message) {
      const byId = this.fieldsById.get(definition.name);
      for (;;) {
        const offset = reader.position;
        const id = reader.readVarUint();
        if (id === 0) {
          break;
        }

        const field = byId?.get(id);
        if (field === undefined) {
          throw new UnknownFieldError(definition.name, id, offset);
        }

        // Deprecated fields are still read to advance past them
        const value = this.decodeField(reader, field, depth);
        if (!field.isDeprecated) {
          setField(result, field.name, value);
        }
      }
    } else {
      for (const field of definition.fields) {
        setField(result, field.name, this.decodeField(reader, field, depth));
      }
    }

    return result;
  }

  private decodeField(reader: Reader, field: Field, depth: number): KiwiValue {
    const type = fieldType(field);
    if (!field.isArray) {
      return this.decodeValue(reader, type, depth);
    }
    if (type === "byte") {
      return reader.readByteArray();
    }

    const length = reader.readVarUint();
    const values: KiwiValue[] = [];
    for (let i = 0; i < length; i++) {
      values.push(this.decodeValue(reader, type, depth));
    }
    return values;
  }

  private decodeValue(reader: Reader, type: string, depth: number): KiwiValue {
    switch (type) {
      case "bool":
        return reader.readBool();
      case "byte":
        return reader.readByte();
      case "int":
        return reader.readVarInt();
      case "uint":
        return reader.readVarUint();
      case "int64":
        return reader.readVarInt64();
      case "uint64":
        return reader.readVarUint64();
      case "float":
        return reader.readVarFloat();
      case "string":
        return reader.readString();
    }

    const definition = this.lookup(type);
    if (definition.kind === DefinitionKind.Enum) {
      const value = reader.readVarUint();
      const name = this.enumNameMaps.get(type)?.get(value);
      if (name === undefined) {
        throw new InvalidEnumValueError(type, value);
      }
      return name;
    }
    return this.decodeRecord(reader, definition, depth + 1);
  }

  // ---------------------------------------------------------------------------
  // Encoding
  // ---------------------------------------------------------------------------

  private encodeRecord(
    writer: Writer,
    definition: Definition,
    record: KiwiRecord,
    depth: number
  ): void {
    if (depth > this.maxDepth) {
      throw new EncodeError(
        `Exceeded maximum nesting depth of ${this.maxDepth} encoding "${definition.name}"`
      );
    }

    if (definition.kind === DefinitionKind.Message) {
      for (const field of definition.fields) {
        const value = ownField(record, field.name);
        if (value === undefined || value === null) {
          continue;
        }
        writer.writeVarUint(field.id);
        this.encodeField(writer, definition, field, value, depth);
      }
      writer.writeVarUint(0); // End of message
      return;
    }

    for (const field of definition.fields) {
      const value = ownField(record, field.name);
      if (value === undefined || value === null) {
        throw new MissingRequiredFieldError(definition.name, field.name);
      }
      this.encodeField(writer, definition, field, value, depth);
    }
  }

  private encodeField(
    writer: Writer,
    owner: Definition,
    field: Field,
    value: KiwiValue,
    depth: number
  ): void {
    const type = fieldType(field);
    const path = `${owner.name}.${field.name}`;

    if (!field.isArray) {
      this.encodeValue(writer, type, value, path, depth);
      return;
    }

    if (type === "byte") {
      if (!(value instanceof Uint8Array)) {
        throw mismatch(path, "Uint8Array", value);
      }
      writer.writeByteArray(value);
      return;
    }

    if (!isKiwiArray(value)) {
      throw mismatch(path, "array", value);
    }
    writer.writeVarUint(value.length);
    value.forEach((item, i) => this.encodeValue(writer, type, item, `${path}[${i}]`, depth));
  }

  private encodeValue(
    writer: Writer,
    type: string,
    value: KiwiValue,
    path: string,
    depth: number
  ): void {
    switch (type) {
      case "bool":
        if (typeof value !== "boolean") {
          throw mismatch(path, "boolean", value);
        }
        writer.writeBool(value);
        return;
      case "byte":
        writer.writeByte(expectNumber(value, path));
        return;
      case "int":
        writer.writeVarInt(expectNumber(value, path));
        return;
      case "uint":
        writer.writeVarUint(expectNumber(value, path));
        return;
      case "int64":
        writer.writeVarInt64(expectBigInt(value, path));
        return;
      case "uint64":
        writer.writeVarUint64(expectBigInt(value, path));
        return;
      case "float":
        writer.writeVarFloat(expectNumber(value, path));
        return;
      case "string":
        if (typeof value !== "string") {
          throw mismatch(path, "string", value);
        }
        writer.writeString(value);
        return;
    }

    const definition = this.lookup(type);
    if (definition.kind === DefinitionKind.Enum) {
      if (typeof value !== "string") {
        throw mismatch(path, `${type} member name`, value);
      }
      const ordinal = this.enumValueMaps.get(type)?.get(value);
      if (ordinal === undefined) {
        throw new InvalidEnumValueError(type, value);
      }
      writer.writeVarUint(ordinal);
      return;
    }

    if (!isKiwiRecord(value)) {
      throw mismatch(path, `${type} record`, value);
    }
    this.encodeRecord(writer, definition, value, depth + 1);
  }
}

// Field names such as "constructor" or "__proto__" are legal, so records are
// only ever read and written through their own properties.
function ownField(record: KiwiRecord, name: string): KiwiValue | undefined {
  return Object.hasOwn(record, name) ? record[name] : undefined;
}

function setField(record: KiwiRecord, name: string, value: KiwiValue): void {
  Object.defineProperty(record, name, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

function fieldType(field: Field): string {
  if (field.type === undefined) {
    throw new UnknownTypeError("(none)", `field "${field.name}" has no type`);
  }
  return field.type;
}

function describeValue(value: KiwiValue): string {
  if (value === null) {
    return "null";
  }
  if (value instanceof Uint8Array) {
    return "Uint8Array";
  }
  return Array.isArray(value) ? "array" : typeof value;
}

function mismatch(path: string, expected: string, value: KiwiValue): EncodeError {
  return new EncodeError(`Expected ${expected} for field "${path}" but got ${describeValue(value)}`);
}

function expectNumber(value: KiwiValue, path: string): number {
  if (typeof value !== "number") {
    throw mismatch(path, "number", value);
  }
  return value;
}

function expectBigInt(value: KiwiValue, path: string): bigint {
  if (typeof value === "bigint") {
    return value;
  }
  if (typeof value === "number" && Number.isSafeInteger(value)) {
    return BigInt(value);
  }
  throw mismatch(path, "bigint", value);
}

/**
 * Compiles a schema, or schema text, for encoding and decoding.
 *
 * @throws MalformedSyntaxError or SemanticError when given invalid schema text
 * @throws SemanticError if a struct contains itself through non-array fields
 */
export function compileSchema(
  schemaOrText: Schema | string,
  options: CompileOptions = {}
): CompiledSchema {
  const schema = typeof schemaOrText === "string" ? parseSchema(schemaOrText) : schemaOrText;
  return new CompiledSchema(schema, options);
}
