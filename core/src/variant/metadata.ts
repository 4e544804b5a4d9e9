/**
 * Variant Metadata Encoding
 *
 * Encodes a set of object field names as a variant metadata dictionary:
 *
 * ```
 * header (1 byte) | dictionary_size | offsets[dictionary_size + 1] | bytes
 * ```
 *
 * The header holds the format version in bits 0-3, the `sorted_strings`
 * flag in bit 4 and `offset_size - 1` in bits 6-7. Every integer after the
 * header is little-endian and `offset_size` bytes wide.
 *
 * @see https://github.com/apache/parquet-format/blob/master/VariantEncoding.md
 */

import { MetadataEncodingError } from '../errors.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Turns a set of field names into canonical variant metadata bytes.
 * The result must depend only on the set of names, not on their order.
 */
export type VariantMetadataEncoder = (fieldNames: readonly string[]) => Uint8Array;

// ============================================================================
// Constants
// ============================================================================

export const VARIANT_METADATA_VERSION = 1;

/** Header bit marking the dictionary as sorted and unique */
export const SORTED_STRINGS_FLAG = 0x10;

const MAX_OFFSET_SIZE = 4;

/** Unpaired high or low surrogate */
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

// ============================================================================
// Helpers
// ============================================================================

function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return (a[i] ?? 0) - (b[i] ?? 0);
    }
  }
  return a.length - b.length;
}

/**
 * Smallest number of bytes (1-4) that can hold `value`.
 */
function offsetSizeFor(value: number): number {
  for (let size = 1; size <= MAX_OFFSET_SIZE; size++) {
    if (value < 2 ** (8 * size)) {
      return size;
    }
  }
  throw new MetadataEncodingError(
    `Metadata dictionary of ${value} bytes exceeds ${MAX_OFFSET_SIZE}-byte offsets`
  );
}

function writeUnsigned(target: Uint8Array, position: number, value: number, size: number): number {
  let remaining = value;
  for (let i = 0; i < size; i++) {
    target[position + i] = remaining % 256;
    remaining = Math.floor(remaining / 256);
  }
  return position + size;
}

// ============================================================================
// Encoder
// ============================================================================

/**
 * Encode field names as a sorted variant metadata dictionary.
 *
 * Names are de-duplicated and ordered by their UTF-8 bytes, so any ordering
 * of the same set yields identical output.
 *
 * @throws MetadataEncodingError if a name holds an unpaired surrogate
 *
 * @example
 * ```ts
 * encodeVariantMetadata(['b', 'a']);
 * // Uint8Array [0x11, 0x02, 0x00, 0x01, 0x02, 0x61, 0x62]
 * ```
 */
export function encodeVariantMetadata(fieldNames: Iterable<string>): Uint8Array {
  const textEncoder = new TextEncoder();
  const unique = new Map<string, Uint8Array>();

  for (const name of fieldNames) {
    if (unique.has(name)) continue;
    if (LONE_SURROGATE.test(name)) {
      throw new MetadataEncodingError(
        `Field name ${JSON.stringify(name)} is not well-formed UTF-16`
      );
    }
    unique.set(name, textEncoder.encode(name));
  }

  const entries = [...unique.values()].sort(compareBytes);
  const totalBytes = entries.reduce((sum, entry) => sum + entry.length, 0);
  const offsetSize = offsetSizeFor(Math.max(entries.length, totalBytes));

  const output = new Uint8Array(1 + offsetSize * (entries.length + 2) + totalBytes);
  output[0] = VARIANT_METADATA_VERSION | SORTED_STRINGS_FLAG | ((offsetSize - 1) << 6);

  let position = writeUnsigned(output, 1, entries.length, offsetSize);
  position = writeUnsigned(output, position, 0, offsetSize);
  let offset = 0;
  for (const entry of entries) {
    offset += entry.length;
    position = writeUnsigned(output, position, offset, offsetSize);
  }
  for (const entry of entries) {
    output.set(entry, position);
    position += entry.length;
  }

  return output;
}
