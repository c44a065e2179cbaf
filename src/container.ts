/**
 * Parser for the chunked `.fig` container.
 *
 * Layout:
 * - prelude: `fig-kiwi` (8 bytes), `fig-kiwie` (9 bytes) or `fig-jam.`
 * - padding up to the next multiple of 4
 * - chunks: `[size: uint32 LE][data: size bytes]`, at most three
 *   - chunk 0: binary schema (usually raw DEFLATE)
 *   - chunk 1: message data encoded with that schema (ZSTD or DEFLATE)
 *   - chunk 2: preview image (optional)
 *
 * Decompression is not performed here: callers pass one function per
 * compression kind.
 */

import { decodeBinarySchema } from "./binary-schema";
import { compileSchema, type CompiledSchema } from "./compiler";
import { InvalidContainerFormatError, UnsupportedCompressionError } from "./errors";
import { createNoopLogger, type Logger } from "./logging";
import { Reader } from "./reader";
import type { Schema } from "./schema";
import { isKiwiArray, isKiwiRecord, type KiwiRecord } from "./value";

export const FIG_KIWI_MAGIC = "fig-kiwi";
export const FIG_KIWIE_MAGIC = "fig-kiwie";
export const FIG_JAM_MAGIC = "fig-jam.";

/** ZSTD frame magic. */
export const ZSTD_SIGNATURE: readonly number[] = [0x28, 0xb5, 0x2f, 0xfd];

/** First byte of a ZLIB stream (32K window, deflate). */
export const ZLIB_SIGNATURE = 0x78;

/** Second bytes of the common ZLIB headers (fastest, default, best). */
const ZLIB_LEVEL_BYTES: readonly number[] = [0x01, 0x9c, 0xda];

/** Default type decoded from the data chunk. */
const DEFAULT_ROOT_TYPE = "Message";

/** Default number of chunks framed before stopping. */
const DEFAULT_MAX_CHUNKS = 3;

const CHUNK_ALIGNMENT = 4;

/** Bytes needed before a chunk's compression is sniffed. */
const MIN_SNIFF_LENGTH = 4;

/**
 * Compression detected for a chunk.
 */
export enum Compression {
  /** Raw bytes */
  None = "none",
  /** ZSTD (magic 0x28 0xB5 0x2F 0xFD) */
  Zstd = "zstd",
  /** ZLIB (0x78 followed by 0x01, 0x9C or 0xDA) */
  Zlib = "zlib",
  /** Headerless DEFLATE, assumed for the schema chunk */
  Deflate = "deflate",
  /** Not recognised */
  Unknown = "unknown",
}

/**
 * Decompresses a whole chunk.
 */
export type Decompressor = (data: Uint8Array) => Uint8Array;

/**
 * Decompressors supplied by the caller, one per compression kind.
 */
export interface Decompressors {
  zstd?: Decompressor;
  zlib?: Decompressor;
  deflate?: Decompressor;
}

export interface ContainerOptions {
  /** Type name the data chunk is decoded as. Default: "Message" */
  rootType?: string;
  /** Maximum number of chunks to frame. Default: 3 */
  maxChunks?: number;
  /** Deepest record nesting decoded from the data chunk. Default: 512 */
  maxDepth?: number;
  /** Receives framing diagnostics. Default: no-op */
  logger?: Logger;
}

export interface ContainerHeader {
  /** The prelude as read: `fig-kiwi`, `fig-kiwie` or `fig-jam.` */
  readonly prelude: string;
  readonly isFigKiwi: boolean;
  readonly isFigJam: boolean;
}

export interface ContainerChunk {
  /** Chunk bytes, copied out of the container */
  readonly data: Uint8Array;
  readonly compression: Compression;
  /** Offset of the chunk's size field in the container */
  readonly offset: number;
}

export interface ContainerStructure {
  readonly header: ContainerHeader;
  readonly chunks: readonly ContainerChunk[];
  readonly schemaChunk: ContainerChunk;
  readonly dataChunk: ContainerChunk;
  readonly previewChunk?: ContainerChunk;
}

export interface ParsedContainer {
  readonly header: ContainerHeader;
  readonly schema: Schema;
  readonly compiledSchema: CompiledSchema;
  readonly message: KiwiRecord;
  readonly preview?: Uint8Array;
}

/**
 * Classifies a chunk by its leading bytes. Nothing is decompressed.
 *
 * Chunks shorter than four bytes are always `Unknown`. The schema chunk is
 * never prefixed, so an unrecognised schema chunk is taken to be raw DEFLATE.
 */
export function detectCompression(data: Uint8Array, isSchemaChunk = false): Compression {
  if (data.length < MIN_SNIFF_LENGTH) {
    return Compression.Unknown;
  }
  if (ZSTD_SIGNATURE.every((b, i) => data[i] === b)) {
    return Compression.Zstd;
  }
  if (data[0] === ZLIB_SIGNATURE && ZLIB_LEVEL_BYTES.includes(data[1])) {
    return Compression.Zlib;
  }
  return isSchemaChunk ? Compression.Deflate : Compression.Unknown;
}

function readPrelude(reader: Reader): string {
  if (reader.remaining < FIG_KIWI_MAGIC.length) {
    throw new InvalidContainerFormatError(
      `Container too short: expected at least ${FIG_KIWI_MAGIC.length} bytes, got ${reader.remaining}`
    );
  }

  const prelude = String.fromCharCode(...reader.readBytes(FIG_KIWI_MAGIC.length));
  if (prelude === FIG_KIWI_MAGIC) {
    // "fig-kiwie" shares the first eight bytes
    if (reader.peekByte() === 0x65) {
      reader.skip(1);
      return FIG_KIWIE_MAGIC;
    }
    return prelude;
  }
  if (prelude === FIG_JAM_MAGIC) {
    return prelude;
  }
  throw new InvalidContainerFormatError(`Invalid container prelude: ${JSON.stringify(prelude)}`);
}

/**
 * Parses the container framing: prelude and chunks. No decompression or
 * decoding takes place.
 *
 * @throws InvalidContainerFormatError on an unknown prelude or fewer than two chunks
 */
export function parseContainerStructure(
  data: Uint8Array,
  options: ContainerOptions = {}
): ContainerStructure {
  const logger = options.logger ?? createNoopLogger();
  const maxChunks = options.maxChunks ?? DEFAULT_MAX_CHUNKS;
  const reader = new Reader(data);

  const prelude = readPrelude(reader);
  reader.alignTo(CHUNK_ALIGNMENT);

  const header: ContainerHeader = {
    prelude,
    isFigKiwi: prelude === FIG_KIWI_MAGIC || prelude === FIG_KIWIE_MAGIC,
    isFigJam: prelude === FIG_JAM_MAGIC,
  };
  logger.debug("Read container prelude", { operation: "parseContainerStructure", prelude });

  const chunks: ContainerChunk[] = [];
  while (reader.remaining >= 4 && chunks.length < maxChunks) {
    const offset = reader.position;
    const size = reader.readFixed32();
    if (size === 0) {
      break;
    }
    if (size > reader.remaining) {
      logger.warn("Chunk size overruns container, stopping", {
        operation: "parseContainerStructure",
        offset,
        size,
        available: reader.remaining,
      });
      break;
    }

    const chunk = reader.readBytes(size);
    const compression = detectCompression(chunk, chunks.length === 0);
    chunks.push({ data: chunk, compression, offset });
    logger.debug("Framed chunk", {
      operation: "parseContainerStructure",
      index: chunks.length - 1,
      offset,
      bytesProcessed: size,
      compression,
    });
  }

  const [schemaChunk, dataChunk, previewChunk] = chunks;
  if (schemaChunk === undefined || dataChunk === undefined) {
    throw new InvalidContainerFormatError(
      `Expected at least 2 chunks (schema + data), found ${chunks.length}`
    );
  }

  return previewChunk === undefined
    ? { header, chunks, schemaChunk, dataChunk }
    : { header, chunks, schemaChunk, dataChunk, previewChunk };
}

function decompressChunk(
  chunk: ContainerChunk,
  label: string,
  decompressors: Decompressors,
  logger: Logger
): Uint8Array {
  switch (chunk.compression) {
    case Compression.Zstd:
      return requireDecompressor(decompressors.zstd, label, chunk.compression)(chunk.data);
    case Compression.Zlib:
      return requireDecompressor(decompressors.zlib, label, chunk.compression)(chunk.data);
    case Compression.Deflate:
      return requireDecompressor(decompressors.deflate, label, chunk.compression)(chunk.data);
    case Compression.Unknown:
      logger.warn("Unrecognised chunk compression, using bytes as they are", {
        operation: "parseContainer",
        chunk: label,
        offset: chunk.offset,
      });
      return chunk.data;
    case Compression.None:
      return chunk.data;
  }
}

function requireDecompressor(
  decompressor: Decompressor | undefined,
  label: string,
  compression: Compression
): Decompressor {
  if (decompressor === undefined) {
    throw new UnsupportedCompressionError(label, compression);
  }
  return decompressor;
}

/**
 * Parses a `.fig` container end to end: frames the chunks, decompresses the
 * schema and data chunks, decodes the binary schema, compiles it and decodes
 * the data chunk as the root type.
 *
 * @example
 * ```typescript
 * import { inflateRawSync } from "node:zlib";
 *
 * const parsed = parseContainer(bytes, {
 *   deflate: (data) => inflateRawSync(data),
 *   zstd: (data) => myZstd.decompress(data),
 * });
 * console.log(getNodeChanges(parsed.message).length);
 * ```
 *
 * @throws InvalidContainerFormatError on bad framing or a `fig-jam.` container
 * @throws UnsupportedCompressionError if a needed decompressor is missing
 */
export function parseContainer(
  data: Uint8Array,
  decompressors: Decompressors,
  options: ContainerOptions = {}
): ParsedContainer {
  const logger = options.logger ?? createNoopLogger();
  const structure = parseContainerStructure(data, options);

  if (structure.header.isFigJam) {
    throw new InvalidContainerFormatError(
      `Decoding ${JSON.stringify(FIG_JAM_MAGIC)} containers is not supported`
    );
  }

  const schemaBytes = decompressChunk(structure.schemaChunk, "Schema", decompressors, logger);
  const messageBytes = decompressChunk(structure.dataChunk, "Data", decompressors, logger);

  const schema = decodeBinarySchema(schemaBytes);
  const compiledSchema = compileSchema(schema, { maxDepth: options.maxDepth });
  const message = compiledSchema.decode(options.rootType ?? DEFAULT_ROOT_TYPE, messageBytes);

  logger.info("Decoded container", {
    operation: "parseContainer",
    definitions: schema.definitions.length,
    bytesProcessed: data.length,
  });

  const preview = structure.previewChunk?.data;
  return preview === undefined
    ? { header: structure.header, schema, compiledSchema, message }
    : { header: structure.header, schema, compiledSchema, message, preview };
}

function recordsAt(message: KiwiRecord, key: string): KiwiRecord[] {
  const value = message[key];
  return isKiwiArray(value) ? value.filter(isKiwiRecord) : [];
}

/**
 * Returns the node change records of a decoded Figma message.
 */
export function getNodeChanges(message: KiwiRecord): KiwiRecord[] {
  return recordsAt(message, "nodeChanges");
}

/**
 * Returns the blob records of a decoded Figma message.
 */
export function getBlobs(message: KiwiRecord): KiwiRecord[] {
  return recordsAt(message, "blobs");
}
