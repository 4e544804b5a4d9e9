/**
 * Tests for Shredding Error Classes
 */

import { describe, it, expect } from 'vitest';
import {
  InvalidSchemaError,
  MetadataEncodingError,
  MetadataNotComputedError,
  ShreddingError,
  isInvalidSchemaError,
  isMetadataEncodingError,
  isShreddingError,
  wrapError,
} from '../src/index.js';

describe('Error Classes', () => {
  describe('ShreddingError', () => {
    it('should default the code', () => {
      const error = new ShreddingError('boom');

      expect(error.message).toBe('boom');
      expect(error.code).toBe('SHREDDING_ERROR');
      expect(error.name).toBe('ShreddingError');
      expect(error).toBeInstanceOf(Error);
    });
  });

  describe('InvalidSchemaError', () => {
    it('should carry its code and field name', () => {
      const error = new InvalidSchemaError('duplicate', 'DUPLICATE_FIELD_NAME', { fieldName: 'a' });

      expect(error.code).toBe('DUPLICATE_FIELD_NAME');
      expect(error.fieldName).toBe('a');
      expect(error.name).toBe('InvalidSchemaError');
      expect(error).toBeInstanceOf(ShreddingError);
    });

    it('should leave the field name undefined when not given', () => {
      expect(new InvalidSchemaError('bad', 'INVALID_FIELD_COUNT').fieldName).toBeUndefined();
    });
  });

  describe('MetadataEncodingError', () => {
    it('should keep the cause', () => {
      const cause = new RangeError('too long');
      const error = new MetadataEncodingError('failed', { cause });

      expect(error.code).toBe('METADATA_ENCODING_ERROR');
      expect(error.cause).toBe(cause);
      expect(error.name).toBe('MetadataEncodingError');
    });
  });

  describe('MetadataNotComputedError', () => {
    it('should have a default message', () => {
      const error = new MetadataNotComputedError();

      expect(error.message).toBe('Metadata has not been computed for this schema node');
      expect(error.code).toBe('METADATA_NOT_COMPUTED');
    });
  });

  describe('type guards', () => {
    it('should narrow by class', () => {
      const schemaError = new InvalidSchemaError('bad', 'INVALID_SLOT_INDEX');
      const encodingError = new MetadataEncodingError('failed');

      expect(isShreddingError(schemaError)).toBe(true);
      expect(isShreddingError(new Error('plain'))).toBe(false);
      expect(isInvalidSchemaError(schemaError)).toBe(true);
      expect(isInvalidSchemaError(encodingError)).toBe(false);
      expect(isMetadataEncodingError(encodingError)).toBe(true);
      expect(isMetadataEncodingError('failed')).toBe(false);
    });
  });

  describe('wrapError', () => {
    it('should return shredding errors unchanged', () => {
      const error = new MetadataNotComputedError();

      expect(wrapError(error)).toBe(error);
    });

    it('should wrap plain errors', () => {
      const wrapped = wrapError(new TypeError('nope'));

      expect(wrapped).toBeInstanceOf(ShreddingError);
      expect(wrapped.code).toBe('WRAPPED_ERROR');
      expect(wrapped.message).toBe('nope');
    });

    it('should wrap non-error values', () => {
      expect(wrapError('text').message).toBe('text');
      expect(wrapError('').message).toBe('Unknown error');
      expect(wrapError('', 'fallback').code).toBe('UNKNOWN_ERROR');
    });
  });
});
