/**
 * Scalar Types for Shredded Variant Values
 *
 * The closed set of primitive representations a `typed_value` slot can hold
 * when it is not an array or an object.
 *
 * @see https://github.com/apache/parquet-format/blob/master/VariantShredding.md
 */

import { InvalidSchemaError } from '../errors.js';

// ============================================================================
// Types
// ============================================================================

/** Bit widths of integral scalar types */
export type IntegralWidth = 8 | 16 | 32 | 64;

export interface StringScalar {
  readonly kind: 'string';
}

export interface IntegralScalar {
  readonly kind: 'integral';
  readonly width: IntegralWidth;
}

/** 32-bit IEEE 754 float */
export interface FloatScalar {
  readonly kind: 'float';
}

/** 64-bit IEEE 754 float */
export interface DoubleScalar {
  readonly kind: 'double';
}

export interface BooleanScalar {
  readonly kind: 'boolean';
}

export interface BinaryScalar {
  readonly kind: 'binary';
}

export interface DecimalScalar {
  readonly kind: 'decimal';
  readonly precision: number;
  readonly scale: number;
}

export interface DateScalar {
  readonly kind: 'date';
}

/** Timestamp adjusted to UTC */
export interface TimestampScalar {
  readonly kind: 'timestamp';
}

/** Timestamp without timezone */
export interface TimestampNtzScalar {
  readonly kind: 'timestamp_ntz';
}

export interface UuidScalar {
  readonly kind: 'uuid';
}

/**
 * The concrete primitive type of a scalar `typed_value`.
 */
export type ScalarType =
  | StringScalar
  | IntegralScalar
  | FloatScalar
  | DoubleScalar
  | BooleanScalar
  | BinaryScalar
  | DecimalScalar
  | DateScalar
  | TimestampScalar
  | TimestampNtzScalar
  | UuidScalar;

export type ScalarKind = ScalarType['kind'];

/** Highest decimal precision a variant can carry (decimal16) */
export const MAX_DECIMAL_PRECISION = 38;

const INTEGRAL_WIDTHS: readonly IntegralWidth[] = [8, 16, 32, 64];

// ============================================================================
// Factories
// ============================================================================

export function stringType(): StringScalar {
  return Object.freeze({ kind: 'string' });
}

/**
 * Create an integral type of the given bit width.
 *
 * @throws InvalidSchemaError if the width is not 8, 16, 32 or 64
 */
export function integralType(width: number): IntegralScalar {
  const checked = INTEGRAL_WIDTHS.find((w) => w === width);
  if (checked === undefined) {
    throw new InvalidSchemaError(
      `Integral width must be one of ${INTEGRAL_WIDTHS.join(', ')}, got ${width}`,
      'INVALID_SCALAR_TYPE'
    );
  }
  return Object.freeze({ kind: 'integral', width: checked });
}

export function byteType(): IntegralScalar {
  return integralType(8);
}

export function shortType(): IntegralScalar {
  return integralType(16);
}

export function intType(): IntegralScalar {
  return integralType(32);
}

export function longType(): IntegralScalar {
  return integralType(64);
}

export function floatType(): FloatScalar {
  return Object.freeze({ kind: 'float' });
}

export function doubleType(): DoubleScalar {
  return Object.freeze({ kind: 'double' });
}

export function booleanType(): BooleanScalar {
  return Object.freeze({ kind: 'boolean' });
}

export function binaryType(): BinaryScalar {
  return Object.freeze({ kind: 'binary' });
}

/**
 * Create a decimal type.
 *
 * @throws InvalidSchemaError if precision is outside 1..38 or scale outside 0..precision
 */
export function decimalType(precision: number, scale: number): DecimalScalar {
  const decimal: DecimalScalar = { kind: 'decimal', precision, scale };
  validateScalarType(decimal);
  return Object.freeze(decimal);
}

export function dateType(): DateScalar {
  return Object.freeze({ kind: 'date' });
}

export function timestampType(): TimestampScalar {
  return Object.freeze({ kind: 'timestamp' });
}

export function timestampNtzType(): TimestampNtzScalar {
  return Object.freeze({ kind: 'timestamp_ntz' });
}

export function uuidType(): UuidScalar {
  return Object.freeze({ kind: 'uuid' });
}

// ============================================================================
// Validation
// ============================================================================

function assertNever(value: never): never {
  throw new InvalidSchemaError(`Unknown scalar type: ${JSON.stringify(value)}`, 'INVALID_SCALAR_TYPE');
}

/**
 * Check the parameters of a scalar type that was not built by a factory.
 *
 * @throws InvalidSchemaError describing the first violated rule
 */
export function validateScalarType(type: ScalarType): void {
  switch (type.kind) {
    case 'integral':
      if (!INTEGRAL_WIDTHS.includes(type.width)) {
        throw new InvalidSchemaError(
          `Integral width must be one of ${INTEGRAL_WIDTHS.join(', ')}, got ${type.width}`,
          'INVALID_SCALAR_TYPE'
        );
      }
      return;
    case 'decimal':
      if (
        !Number.isInteger(type.precision) ||
        type.precision < 1 ||
        type.precision > MAX_DECIMAL_PRECISION
      ) {
        throw new InvalidSchemaError(
          `Decimal precision must be an integer in 1..${MAX_DECIMAL_PRECISION}, got ${type.precision}`,
          'INVALID_SCALAR_TYPE'
        );
      }
      if (!Number.isInteger(type.scale) || type.scale < 0 || type.scale > type.precision) {
        throw new InvalidSchemaError(
          `Decimal scale must be an integer in 0..${type.precision}, got ${type.scale}`,
          'INVALID_SCALAR_TYPE'
        );
      }
      return;
    case 'string':
    case 'float':
    case 'double':
    case 'boolean':
    case 'binary':
    case 'date':
    case 'timestamp':
    case 'timestamp_ntz':
    case 'uuid':
      return;
    default:
      return assertNever(type);
  }
}

// ============================================================================
// Naming
// ============================================================================

const INTEGRAL_NAMES: Readonly<Record<IntegralWidth, string>> = {
  8: 'byte',
  16: 'short',
  32: 'int',
  64: 'long',
};

const DECIMAL_PATTERN = /^decimal\(\s*(\d+)\s*,\s*(\d+)\s*\)$/;

/**
 * Format a scalar type as the name used in table properties.
 *
 * @example
 * ```ts
 * formatScalarType(decimalType(10, 2)); // 'decimal(10,2)'
 * formatScalarType(timestampNtzType()); // 'timestamp'
 * ```
 */
export function formatScalarType(type: ScalarType): string {
  switch (type.kind) {
    case 'integral':
      return INTEGRAL_NAMES[type.width];
    case 'decimal':
      return `decimal(${type.precision},${type.scale})`;
    case 'timestamp':
      return 'timestamptz';
    case 'timestamp_ntz':
      return 'timestamp';
    case 'string':
    case 'float':
    case 'double':
    case 'boolean':
    case 'binary':
    case 'date':
    case 'uuid':
      return type.kind;
    default:
      return assertNever(type);
  }
}

/**
 * Parse a type name produced by {@link formatScalarType}.
 * Returns undefined for unknown names.
 */
export function tryParseScalarType(name: string): ScalarType | undefined {
  const normalized = name.trim().toLowerCase();
  switch (normalized) {
    case 'string':
      return stringType();
    case 'byte':
      return byteType();
    case 'short':
      return shortType();
    case 'int':
      return intType();
    case 'long':
      return longType();
    case 'float':
      return floatType();
    case 'double':
      return doubleType();
    case 'boolean':
      return booleanType();
    case 'binary':
      return binaryType();
    case 'date':
      return dateType();
    case 'timestamptz':
      return timestampType();
    case 'timestamp':
      return timestampNtzType();
    case 'uuid':
      return uuidType();
  }

  const match = DECIMAL_PATTERN.exec(normalized);
  if (!match) {
    return undefined;
  }
  try {
    return decimalType(Number(match[1]), Number(match[2]));
  } catch (error) {
    if (error instanceof InvalidSchemaError) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Parse a type name produced by {@link formatScalarType}.
 *
 * @throws InvalidSchemaError for unknown names or out-of-range decimals
 */
export function parseScalarType(name: string): ScalarType {
  const type = tryParseScalarType(name);
  if (type === undefined) {
    throw new InvalidSchemaError(`Unknown scalar type name '${name}'`, 'INVALID_SCALAR_TYPE');
  }
  return type;
}

/**
 * Structural equality of two scalar types.
 */
export function scalarTypesEqual(a: ScalarType, b: ScalarType): boolean {
  if (a.kind === 'integral' && b.kind === 'integral') {
    return a.width === b.width;
  }
  if (a.kind === 'decimal' && b.kind === 'decimal') {
    return a.precision === b.precision && a.scale === b.scale;
  }
  return a.kind === b.kind;
}
