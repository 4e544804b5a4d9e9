/**
 * Tests for Variant Metadata Encoding
 *
 * @see https://github.com/apache/parquet-format/blob/master/VariantEncoding.md
 */

import { describe, it, expect } from 'vitest';
import {
  encodeVariantMetadata,
  MetadataEncodingError,
  SORTED_STRINGS_FLAG,
  VARIANT_METADATA_VERSION,
} from '../../../src/index.js';

describe('encodeVariantMetadata', () => {
  describe('header', () => {
    it('should set the version and sorted flag', () => {
      expect(VARIANT_METADATA_VERSION).toBe(1);
      expect(SORTED_STRINGS_FLAG).toBe(0x10);
      expect(encodeVariantMetadata([])[0]).toBe(0x11);
    });
  });

  describe('dictionary layout', () => {
    it('should encode an empty set', () => {
      expect(encodeVariantMetadata([])).toEqual(new Uint8Array([0x11, 0x00, 0x00]));
    });

    it('should encode a single name', () => {
      expect(encodeVariantMetadata(['id'])).toEqual(
        new Uint8Array([0x11, 0x01, 0x00, 0x02, 0x69, 0x64])
      );
    });

    it('should sort names and write cumulative offsets', () => {
      expect(encodeVariantMetadata(['b', 'a'])).toEqual(
        new Uint8Array([0x11, 0x02, 0x00, 0x01, 0x02, 0x61, 0x62])
      );
    });

    it('should drop duplicate names', () => {
      expect(encodeVariantMetadata(['a', 'a'])).toEqual(
        new Uint8Array([0x11, 0x01, 0x00, 0x01, 0x61])
      );
    });

    it('should accept any iterable of names', () => {
      expect(encodeVariantMetadata(new Set(['b', 'a']))).toEqual(encodeVariantMetadata(['a', 'b']));
    });

    it('should not depend on the order of the names', () => {
      const names = ['title', 'year', 'rating', 'genres', 'director'];
      const reversed = [...names].reverse();

      expect(encodeVariantMetadata(names)).toEqual(encodeVariantMetadata(reversed));
    });
  });

  describe('ordering', () => {
    it('should order names by UTF-8 bytes', () => {
      expect(encodeVariantMetadata(['\u00E9', 'z'])).toEqual(
        new Uint8Array([0x11, 0x02, 0x00, 0x01, 0x03, 0x7a, 0xc3, 0xa9])
      );
    });

    it('should place supplementary characters after the rest of the BMP', () => {
      // UTF-16 would put U+1F600 (a surrogate pair) before U+FF61
      expect(encodeVariantMetadata(['\u{1F600}', '\uFF61'])).toEqual(
        new Uint8Array([0x11, 0x02, 0x00, 0x03, 0x07, 0xef, 0xbd, 0xa1, 0xf0, 0x9f, 0x98, 0x80])
      );
    });
  });

  describe('offset size', () => {
    it('should widen offsets once the dictionary passes 255 bytes', () => {
      const metadata = encodeVariantMetadata(['a'.repeat(300)]);

      expect(metadata[0]).toBe(0x51);
      expect(metadata.length).toBe(307);
      expect([...metadata.slice(1, 7)]).toEqual([0x01, 0x00, 0x00, 0x00, 0x2c, 0x01]);
    });

    it('should widen offsets for dictionaries with more than 255 names', () => {
      const names = Array.from({ length: 256 }, (_, i) => String.fromCharCode(0x100 + i));
      const metadata = encodeVariantMetadata(names);

      // 256 names of 2 UTF-8 bytes each
      expect(metadata[0]).toBe(0x51);
      expect(metadata.length).toBe(1 + 2 * 258 + 512);
      expect([...metadata.slice(1, 3)]).toEqual([0x00, 0x01]);
    });
  });

  describe('errors', () => {
    it('should reject an unpaired high surrogate', () => {
      expect(() => encodeVariantMetadata(['ok', 'bad\uD800'])).toThrow(MetadataEncodingError);
    });

    it('should reject an unpaired low surrogate', () => {
      expect(() => encodeVariantMetadata(['\uDC00x'])).toThrow(MetadataEncodingError);
    });

    it('should accept a well-formed surrogate pair', () => {
      expect(() => encodeVariantMetadata(['\u{1F600}'])).not.toThrow();
    });
  });
});
