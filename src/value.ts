/**
 * Dynamic values produced by decoding and accepted by encoding.
 *
 * - `bool` fields map to `boolean`
 * - `byte`, `int`, `uint` and `float` fields map to `number`
 * - `int64` and `uint64` fields map to `bigint`
 * - `string` fields and enum members map to `string`
 * - `byte[]` fields map to `Uint8Array`, other arrays to arrays
 * - struct and message fields map to nested records
 */
export type KiwiValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | readonly KiwiValue[]
  | KiwiRecord;

/**
 * A decoded struct or message, keyed by field name.
 */
export interface KiwiRecord {
  [field: string]: KiwiValue | undefined;
}

/**
 * Narrows a value to a nested record.
 */
export function isKiwiRecord(value: KiwiValue | undefined): value is KiwiRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array)
  );
}

/**
 * Narrows a value to an array of values (excluding byte arrays).
 */
export function isKiwiArray(value: KiwiValue | undefined): value is readonly KiwiValue[] {
  return Array.isArray(value);
}
