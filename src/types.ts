/**
 * Maximum values for varint encoding.
 */
export const MaxVarint32 = 0xffffffff;
export const MaxVarint64 = BigInt("0xffffffffffffffff");

/**
 * Signed 64-bit integer bounds.
 */
export const MinInt64 = BigInt("-9223372036854775808"); // -2^63
export const MaxInt64 = BigInt("9223372036854775807"); // 2^63 - 1

/**
 * Bit pattern written for every NaN, whatever its sign or payload.
 */
export const CANONICAL_NAN_BITS = 0x7fc00000;

/**
 * Encode a signed 32-bit integer using ZigZag encoding.
 * The result is an unsigned 32-bit value.
 */
export function zigzagEncode(n: number): number {
  return ((n << 1) ^ (n >> 31)) >>> 0;
}

/**
 * Encode a signed bigint using ZigZag encoding.
 * @throws RangeError if n is outside the valid 64-bit signed integer range
 */
export function zigzagEncode64(n: bigint): bigint {
  if (n < MinInt64 || n > MaxInt64) {
    throw new RangeError(
      `BigInt value ${n} is outside valid 64-bit signed integer range [${MinInt64}, ${MaxInt64}]`
    );
  }
  return (n << 1n) ^ (n >> 63n);
}

/**
 * Decode a ZigZag encoded 32-bit integer.
 */
export function zigzagDecode(n: number): number {
  return (n >>> 1) ^ -(n & 1);
}

/**
 * Decode a ZigZag encoded bigint.
 */
export function zigzagDecode64(n: bigint): bigint {
  return (n >> 1n) ^ -(n & 1n);
}

// Shared scratch space for float <-> bit pattern conversion.
const floatScratch = new Float32Array(1);
const bitsScratch = new Uint32Array(floatScratch.buffer);

/**
 * Returns the IEEE-754 single precision bit pattern of a number.
 * NaN always maps to {@link CANONICAL_NAN_BITS}.
 */
export function float32ToBits(value: number): number {
  if (Number.isNaN(value)) {
    return CANONICAL_NAN_BITS;
  }
  floatScratch[0] = value;
  return bitsScratch[0];
}

/**
 * Reinterprets a 32-bit pattern as a single precision float.
 */
export function bitsToFloat32(bits: number): number {
  bitsScratch[0] = bits >>> 0;
  return floatScratch[0];
}

/**
 * Moves the sign and exponent (9 bits) into the low bits so that the first
 * byte on the wire is zero exactly when the exponent field is zero.
 */
export function rotateFloatBits(bits: number): number {
  return ((bits >>> 23) | (bits << 9)) >>> 0;
}

/**
 * Inverse of {@link rotateFloatBits}.
 */
export function unrotateFloatBits(rotated: number): number {
  return ((rotated << 23) | (rotated >>> 9)) >>> 0;
}
