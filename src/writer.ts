import { InvalidStringContentError } from "./errors";
import {
  MaxVarint64,
  float32ToBits,
  rotateFloatBits,
  zigzagEncode,
  zigzagEncode64,
} from "./types";

const INITIAL_CAPACITY = 256;
const GROWTH_FACTOR = 2;

// Module-level singleton to avoid repeated instantiation
const textEncoder = new TextEncoder();

/**
 * Writer encodes values into a growable binary buffer.
 */
export class Writer {
  private buffer: Uint8Array;
  private pos: number;

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(1, initialCapacity));
    this.pos = 0;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Resets the writer for reuse.
   */
  reset(): void {
    this.pos = 0;
  }

  /**
   * Ensures the buffer has room for `needed` more bytes.
   */
  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }

    let newCapacity = this.buffer.length * GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.buffer.subarray(0, this.pos));
    this.buffer = newBuffer;
  }

  /**
   * Writes a raw byte.
   */
  writeByte(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.pos++] = value & 0xff;
  }

  /**
   * Writes a boolean as a single byte.
   */
  writeBool(value: boolean): void {
    this.writeByte(value ? 1 : 0);
  }

  /**
   * Writes raw bytes with no length prefix.
   */
  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.pos);
    this.pos += data.length;
  }

  /**
   * Writes length-prefixed bytes.
   */
  writeByteArray(data: Uint8Array): void {
    this.writeVarUint(data.length);
    this.writeBytes(data);
  }

  /**
   * Writes an unsigned 32-bit varint. Values wrap modulo 2^32.
   */
  writeVarUint(value: number): void {
    let v = value >>> 0;
    this.ensureCapacity(5);
    do {
      const b = v & 0x7f;
      v >>>= 7;
      this.buffer[this.pos++] = v !== 0 ? b | 0x80 : b;
    } while (v !== 0);
  }

  /**
   * Writes a signed 32-bit varint using ZigZag encoding.
   */
  writeVarInt(value: number): void {
    this.writeVarUint(zigzagEncode(value));
  }

  /**
   * Writes an unsigned 64-bit varint.
   *
   * At most nine bytes: eight 7-bit groups with continuation bits, and a
   * final byte holding the top eight bits.
   * @throws RangeError if value is outside [0, 2^64 - 1]
   */
  writeVarUint64(value: bigint): void {
    if (value < 0n || value > MaxVarint64) {
      throw new RangeError(`BigInt value ${value} is outside valid uint64 range [0, ${MaxVarint64}]`);
    }
    this.ensureCapacity(9);
    let v = value;
    for (let i = 0; v > 0x7fn && i < 8; i++) {
      this.buffer[this.pos++] = Number(v & 0x7fn) | 0x80;
      v >>= 7n;
    }
    this.buffer[this.pos++] = Number(v);
  }

  /**
   * Writes a signed 64-bit varint using ZigZag encoding.
   */
  writeVarInt64(value: bigint): void {
    this.writeVarUint64(zigzagEncode64(value));
  }

  /**
   * Writes a 32-bit float in the packed varfloat layout.
   *
   * Zero and subnormal values take a single 0x00 byte; every other value
   * takes four bytes with the exponent rotated into the first byte.
   */
  writeVarFloat(value: number): void {
    const rotated = rotateFloatBits(float32ToBits(value));

    if ((rotated & 0xff) === 0) {
      this.writeByte(0);
      return;
    }

    this.ensureCapacity(4);
    this.buffer[this.pos++] = rotated & 0xff;
    this.buffer[this.pos++] = (rotated >>> 8) & 0xff;
    this.buffer[this.pos++] = (rotated >>> 16) & 0xff;
    this.buffer[this.pos++] = (rotated >>> 24) & 0xff;
  }

  /**
   * Writes a fixed 32-bit unsigned value (little-endian).
   */
  writeFixed32(value: number): void {
    const v = value >>> 0;
    this.ensureCapacity(4);
    this.buffer[this.pos++] = v & 0xff;
    this.buffer[this.pos++] = (v >>> 8) & 0xff;
    this.buffer[this.pos++] = (v >>> 16) & 0xff;
    this.buffer[this.pos++] = (v >>> 24) & 0xff;
  }

  /**
   * Writes a NUL-terminated UTF-8 string.
   * @throws InvalidStringContentError if the string contains U+0000
   */
  writeString(value: string): void {
    if (value.includes("\0")) {
      throw new InvalidStringContentError();
    }
    const bytes = textEncoder.encode(value);
    this.ensureCapacity(bytes.length + 1);
    this.buffer.set(bytes, this.pos);
    this.pos += bytes.length;
    this.buffer[this.pos++] = 0;
  }
}
