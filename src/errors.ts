/**
 * Base error class for all codec errors.
 */
export class KiwiError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "KiwiError";
  }
}

/**
 * Error thrown when encoding fails.
 */
export class EncodeError extends KiwiError {
  constructor(message: string) {
    super(message);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when decoding fails.
 */
export class DecodeError extends KiwiError {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when a read runs past the end of the buffer.
 */
export class TruncatedError extends DecodeError {
  readonly offset: number;
  readonly needed: number;
  readonly available: number;

  constructor(offset: number, needed: number, available: number) {
    super(
      `Truncated input: needed ${needed} bytes at offset ${offset}, only ${available} available`
    );
    this.name = "TruncatedError";
    this.offset = offset;
    this.needed = needed;
    this.available = available;
  }
}

/**
 * Error thrown by the schema tokenizer and parser.
 */
export class MalformedSyntaxError extends KiwiError {
  readonly line: number;
  readonly column: number;

  constructor(message: string, line: number, column: number) {
    super(`${message} at line ${line}, column ${column}`);
    this.name = "MalformedSyntaxError";
    this.line = line;
    this.column = column;
  }
}

/**
 * Error thrown when a syntactically valid schema breaks a schema rule.
 */
export class SemanticError extends KiwiError {
  readonly line: number;
  readonly column: number;

  constructor(message: string, line: number, column: number) {
    super(line > 0 ? `${message} at line ${line}, column ${column}` : message);
    this.name = "SemanticError";
    this.line = line;
    this.column = column;
  }
}

/**
 * Error thrown when a type name or binary type code cannot be resolved.
 */
export class UnknownTypeError extends KiwiError {
  readonly typeName: string;

  constructor(typeName: string, detail?: string) {
    super(detail ? `Unknown type ${typeName}: ${detail}` : `Unknown type ${typeName}`);
    this.name = "UnknownTypeError";
    this.typeName = typeName;
  }
}

/**
 * Error thrown when a message carries a field id its definition does not declare.
 */
export class UnknownFieldError extends DecodeError {
  readonly typeName: string;
  readonly fieldId: number;
  readonly offset: number;

  constructor(typeName: string, fieldId: number, offset: number) {
    super(`Unknown field id ${fieldId} for message "${typeName}" at offset ${offset}`);
    this.name = "UnknownFieldError";
    this.typeName = typeName;
    this.fieldId = fieldId;
    this.offset = offset;
  }
}

/**
 * Error thrown when a struct is encoded without one of its fields.
 */
export class MissingRequiredFieldError extends EncodeError {
  readonly typeName: string;
  readonly fieldName: string;

  constructor(typeName: string, fieldName: string) {
    super(`Missing required field "${fieldName}" of struct "${typeName}"`);
    this.name = "MissingRequiredFieldError";
    this.typeName = typeName;
    this.fieldName = fieldName;
  }
}

/**
 * Error thrown for an enum name (encoding) or value (decoding) the enum lacks.
 */
export class InvalidEnumValueError extends KiwiError {
  readonly enumName: string;
  readonly value: string | number;

  constructor(enumName: string, value: string | number) {
    super(`Invalid value ${JSON.stringify(value)} for enum "${enumName}"`);
    this.name = "InvalidEnumValueError";
    this.enumName = enumName;
    this.value = value;
  }
}

/**
 * Error thrown when a container has a bad prelude or too few chunks.
 */
export class InvalidContainerFormatError extends DecodeError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidContainerFormatError";
  }
}

/**
 * Error thrown when no decompressor was supplied for a compressed chunk.
 */
export class UnsupportedCompressionError extends KiwiError {
  readonly chunk: string;
  readonly compression: string;

  constructor(chunk: string, compression: string) {
    super(`${chunk} chunk is ${compression} compressed but no ${compression} decompressor was provided`);
    this.name = "UnsupportedCompressionError";
    this.chunk = chunk;
    this.compression = compression;
  }
}

/**
 * Error thrown when a string to encode contains a NUL character.
 */
export class InvalidStringContentError extends EncodeError {
  constructor() {
    super("Cannot encode a string containing the null character");
    this.name = "InvalidStringContentError";
  }
}
