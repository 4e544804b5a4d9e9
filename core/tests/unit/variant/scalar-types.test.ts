/**
 * Tests for shredded scalar types
 */

import { describe, it, expect } from 'vitest';
import type { ScalarType } from '../../../src/index.js';
import {
  InvalidSchemaError,
  MAX_DECIMAL_PRECISION,
  binaryType,
  booleanType,
  byteType,
  dateType,
  decimalType,
  doubleType,
  floatType,
  formatScalarType,
  intType,
  integralType,
  longType,
  parseScalarType,
  scalarTypesEqual,
  shortType,
  stringType,
  timestampNtzType,
  timestampType,
  tryParseScalarType,
  uuidType,
  validateScalarType,
} from '../../../src/index.js';

describe('Scalar Types', () => {
  describe('factories', () => {
    it('should create integral types for every supported width', () => {
      expect(byteType()).toEqual({ kind: 'integral', width: 8 });
      expect(shortType()).toEqual({ kind: 'integral', width: 16 });
      expect(intType()).toEqual({ kind: 'integral', width: 32 });
      expect(longType()).toEqual({ kind: 'integral', width: 64 });
    });

    it('should reject unsupported integral widths', () => {
      expect(() => integralType(24)).toThrow(InvalidSchemaError);
      expect(() => integralType(128)).toThrow('Integral width must be one of 8, 16, 32, 64, got 128');
    });

    it('should create decimal types', () => {
      expect(decimalType(10, 2)).toEqual({ kind: 'decimal', precision: 10, scale: 2 });
      expect(decimalType(MAX_DECIMAL_PRECISION, MAX_DECIMAL_PRECISION)).toEqual({
        kind: 'decimal',
        precision: 38,
        scale: 38,
      });
      expect(decimalType(1, 0)).toEqual({ kind: 'decimal', precision: 1, scale: 0 });
    });

    it('should reject decimal precision outside 1..38', () => {
      expect(() => decimalType(0, 0)).toThrow('Decimal precision must be an integer in 1..38, got 0');
      expect(() => decimalType(39, 0)).toThrow(InvalidSchemaError);
      expect(() => decimalType(10.5, 0)).toThrow(InvalidSchemaError);
    });

    it('should reject decimal scale outside 0..precision', () => {
      expect(() => decimalType(5, 6)).toThrow('Decimal scale must be an integer in 0..5, got 6');
      expect(() => decimalType(5, -1)).toThrow(InvalidSchemaError);
    });

    it('should return frozen values', () => {
      expect(Object.isFrozen(stringType())).toBe(true);
      expect(Object.isFrozen(decimalType(4, 1))).toBe(true);
    });
  });

  describe('validateScalarType', () => {
    it('should accept every parameterless kind', () => {
      const types: ScalarType[] = [
        stringType(),
        floatType(),
        doubleType(),
        booleanType(),
        binaryType(),
        dateType(),
        timestampType(),
        timestampNtzType(),
        uuidType(),
      ];
      for (const type of types) {
        expect(() => validateScalarType(type)).not.toThrow();
      }
    });

    it('should reject hand-built types with bad parameters', () => {
      expect(() => validateScalarType({ kind: 'decimal', precision: 40, scale: 2 })).toThrow(
        InvalidSchemaError
      );
    });
  });

  describe('naming', () => {
    it.each([
      { type: stringType(), name: 'string' },
      { type: byteType(), name: 'byte' },
      { type: shortType(), name: 'short' },
      { type: intType(), name: 'int' },
      { type: longType(), name: 'long' },
      { type: floatType(), name: 'float' },
      { type: doubleType(), name: 'double' },
      { type: booleanType(), name: 'boolean' },
      { type: binaryType(), name: 'binary' },
      { type: decimalType(10, 2), name: 'decimal(10,2)' },
      { type: dateType(), name: 'date' },
      { type: timestampType(), name: 'timestamptz' },
      { type: timestampNtzType(), name: 'timestamp' },
      { type: uuidType(), name: 'uuid' },
    ])('should name $name', ({ type, name }) => {
      expect(formatScalarType(type)).toBe(name);
      expect(parseScalarType(name)).toEqual(type);
    });

    it('should parse names case-insensitively with surrounding spaces', () => {
      expect(parseScalarType('  LONG ')).toEqual(longType());
      expect(parseScalarType('Decimal( 12 , 4 )')).toEqual(decimalType(12, 4));
    });

    it('should return undefined for unknown names', () => {
      expect(tryParseScalarType('varchar')).toBeUndefined();
      expect(tryParseScalarType('decimal(10)')).toBeUndefined();
      expect(tryParseScalarType('decimal(2,5)')).toBeUndefined();
    });

    it('should throw for unknown names in parseScalarType', () => {
      expect(() => parseScalarType('varchar')).toThrow("Unknown scalar type name 'varchar'");
    });
  });

  describe('scalarTypesEqual', () => {
    it('should compare parameters', () => {
      expect(scalarTypesEqual(intType(), intType())).toBe(true);
      expect(scalarTypesEqual(intType(), longType())).toBe(false);
      expect(scalarTypesEqual(decimalType(10, 2), decimalType(10, 2))).toBe(true);
      expect(scalarTypesEqual(decimalType(10, 2), decimalType(10, 3))).toBe(false);
      expect(scalarTypesEqual(timestampType(), timestampNtzType())).toBe(false);
      expect(scalarTypesEqual(stringType(), stringType())).toBe(true);
    });
  });
});
