/**
 * fig-kiwi-codec - schema-driven compact binary serialization
 *
 * Parses schema text, encodes and decodes schemas in their binary form,
 * compiles schemas into encoders/decoders for dynamic records, and reads
 * the chunked `.fig` container that carries a binary schema and a message
 * encoded with it.
 *
 * @example
 * ```typescript
 * import { compileSchema } from 'fig-kiwi-codec';
 *
 * const compiled = compileSchema(`
 *   enum T { A = 0; B = 1; }
 *   struct Color { byte r; byte g; byte b; }
 *   message M { uint id = 1; T t = 2; Color c = 3; }
 * `);
 *
 * const data = compiled.encode("M", { id: 5, t: "B", c: { r: 10, g: 20, b: 30 } });
 * const record = compiled.decode("M", data);
 * ```
 */

// Core constants and bit helpers
export {
  MaxVarint32,
  MaxVarint64,
  MinInt64,
  MaxInt64,
  CANONICAL_NAN_BITS,
  zigzagEncode,
  zigzagEncode64,
  zigzagDecode,
  zigzagDecode64,
} from "./types";

// Errors
export {
  KiwiError,
  EncodeError,
  DecodeError,
  TruncatedError,
  MalformedSyntaxError,
  SemanticError,
  UnknownTypeError,
  UnknownFieldError,
  MissingRequiredFieldError,
  InvalidEnumValueError,
  InvalidContainerFormatError,
  UnsupportedCompressionError,
  InvalidStringContentError,
} from "./errors";

// Byte streams
export { Writer } from "./writer";
export { Reader } from "./reader";

// Values
export { isKiwiRecord, isKiwiArray } from "./value";
export type { KiwiValue, KiwiRecord } from "./value";

// Schema model
export {
  DefinitionKind,
  NATIVE_TYPES,
  BINARY_NATIVE_TYPES,
  RESERVED_NAMES,
  isNativeType,
} from "./schema";
export type { Field, Definition, Schema } from "./schema";

// Schema text
export { tokenize } from "./tokenizer";
export type { Token, TokenKind } from "./tokenizer";
export { parseSchema } from "./parser";
export { verifySchema } from "./verifier";
export { prettyPrint } from "./printer";

// Binary schema
export { encodeBinarySchema, decodeBinarySchema } from "./binary-schema";

// Compiled schema
export { CompiledSchema, compileSchema, DEFAULT_MAX_DEPTH } from "./compiler";
export type { CompileOptions } from "./compiler";

// Figma schema
export {
  FIGMA_ENUMS,
  loadFigmaSchemaText,
  createFigmaSchema,
  encodeFigmaMessage,
  decodeFigmaMessage,
  encodeFigmaNodeChange,
  decodeFigmaNodeChange,
  encodeFigmaPaint,
  decodeFigmaPaint,
  encodeFigmaEffect,
  decodeFigmaEffect,
  figmaEnumTables,
} from "./figma";
export type { EnumTable, FigmaEnumTables } from "./figma";

// Container
export {
  FIG_KIWI_MAGIC,
  FIG_KIWIE_MAGIC,
  FIG_JAM_MAGIC,
  Compression,
  detectCompression,
  parseContainerStructure,
  parseContainer,
  getNodeChanges,
  getBlobs,
} from "./container";
export type {
  Decompressor,
  Decompressors,
  ContainerOptions,
  ContainerHeader,
  ContainerChunk,
  ContainerStructure,
  ParsedContainer,
} from "./container";

// Logging
export {
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
} from "./logging";
export type {
  Logger,
  LogLevel,
  LogContext,
  LogEntry,
  LoggerConfig,
  ConsoleLoggerConfig,
  TestLogger,
} from "./logging";

/**
 * Library version.
 */
export const VERSION = "1.0.0";
