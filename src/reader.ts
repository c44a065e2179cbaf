import { TruncatedError } from "./errors";
import { bitsToFloat32, unrotateFloatBits, zigzagDecode, zigzagDecode64 } from "./types";

const textDecoder = new TextDecoder();

/**
 * Reader decodes values from a binary buffer.
 *
 * Values returned as byte arrays are copies; the source buffer may be reused
 * once decoding returns.
 */
export class Reader {
  private buffer: Uint8Array;
  private pos: number;
  private end: number;

  constructor(data: Uint8Array) {
    this.buffer = data;
    this.pos = 0;
    this.end = data.length;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.end - this.pos;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.pos < this.end;
  }

  /**
   * Checks if there are enough bytes available.
   */
  private checkAvailable(needed: number): void {
    if (this.pos + needed > this.end) {
      throw new TruncatedError(this.pos, needed, this.remaining);
    }
  }

  /**
   * Reads a raw byte.
   */
  readByte(): number {
    this.checkAvailable(1);
    return this.buffer[this.pos++];
  }

  /**
   * Returns the next byte without consuming it, or undefined at the end.
   */
  peekByte(): number | undefined {
    return this.pos < this.end ? this.buffer[this.pos] : undefined;
  }

  /**
   * Reads a boolean stored as a single byte.
   */
  readBool(): boolean {
    return this.readByte() !== 0;
  }

  /**
   * Reads `length` raw bytes into a new array.
   */
  readBytes(length: number): Uint8Array {
    this.checkAvailable(length);
    // Copy through the constructor: slice() on a Node Buffer returns a view
    const bytes = new Uint8Array(this.buffer.subarray(this.pos, this.pos + length));
    this.pos += length;
    return bytes;
  }

  /**
   * Reads length-prefixed bytes into a new array.
   */
  readByteArray(): Uint8Array {
    const length = this.readVarUint();
    return this.readBytes(length);
  }

  /**
   * Advances the cursor by `length` bytes.
   */
  skip(length: number): void {
    this.checkAvailable(length);
    this.pos += length;
  }

  /**
   * Advances the cursor to the next multiple of `alignment`, stopping at the
   * end of the buffer.
   */
  alignTo(alignment: number): void {
    while (this.pos % alignment !== 0 && this.pos < this.end) {
      this.pos++;
    }
  }

  /**
   * Reads an unsigned 32-bit varint.
   *
   * At most five bytes are consumed; bits beyond the 32nd are dropped.
   */
  readVarUint(): number {
    let result = 0;
    let shift = 0;
    let b: number;

    do {
      b = this.readByte();
      result |= (b & 0x7f) << shift;
      shift += 7;
    } while ((b & 0x80) !== 0 && shift < 35);

    return result >>> 0; // Ensure unsigned
  }

  /**
   * Reads a signed 32-bit varint using ZigZag decoding.
   */
  readVarInt(): number {
    return zigzagDecode(this.readVarUint());
  }

  /**
   * Reads an unsigned 64-bit varint.
   *
   * Eight 7-bit groups with continuation bits, then an optional ninth byte
   * carrying the top eight bits.
   */
  readVarUint64(): bigint {
    let result = 0n;
    let shift = 0n;
    let b: number;

    do {
      b = this.readByte();
      result |= BigInt(b & 0x7f) << shift;
      shift += 7n;
    } while ((b & 0x80) !== 0 && shift < 56n);

    if ((b & 0x80) !== 0) {
      result |= BigInt(this.readByte()) << shift;
    }

    return result;
  }

  /**
   * Reads a signed 64-bit varint using ZigZag decoding.
   */
  readVarInt64(): bigint {
    return zigzagDecode64(this.readVarUint64());
  }

  /**
   * Reads a 32-bit float in the packed varfloat layout.
   */
  readVarFloat(): number {
    this.checkAvailable(1);
    if (this.buffer[this.pos] === 0) {
      this.pos++;
      return 0;
    }

    this.checkAvailable(4);
    const rotated =
      (this.buffer[this.pos] |
        (this.buffer[this.pos + 1] << 8) |
        (this.buffer[this.pos + 2] << 16) |
        (this.buffer[this.pos + 3] << 24)) >>>
      0;
    this.pos += 4;

    return bitsToFloat32(unrotateFloatBits(rotated));
  }

  /**
   * Reads a fixed 32-bit unsigned value (little-endian).
   */
  readFixed32(): number {
    this.checkAvailable(4);
    const value =
      (this.buffer[this.pos] |
        (this.buffer[this.pos + 1] << 8) |
        (this.buffer[this.pos + 2] << 16) |
        (this.buffer[this.pos + 3] << 24)) >>>
      0;
    this.pos += 4;
    return value;
  }

  /**
   * Reads a NUL-terminated UTF-8 string.
   */
  readString(): string {
    const start = this.pos;
    let terminator = start;
    while (terminator < this.end && this.buffer[terminator] !== 0) {
      terminator++;
    }
    if (terminator >= this.end) {
      throw new TruncatedError(start, terminator - start + 1, this.end - start);
    }
    this.pos = terminator + 1;
    return textDecoder.decode(this.buffer.subarray(start, terminator));
  }
}
