/**
 * Shredding Error Classes
 *
 * Centralized error definitions for the variant shredding schema.
 * All custom errors extend the base ShreddingError class for consistent error handling.
 *
 * @example
 * ```ts
 * import { InvalidSchemaError, VariantSchema } from '@variant-shredding/core';
 *
 * try {
 *   new VariantSchema({ valueSlotIndex: 0, fieldCount: 2 });
 * } catch (error) {
 *   if (error instanceof InvalidSchemaError) {
 *     console.log(`Invalid schema (${error.code}): ${error.message}`);
 *   }
 * }
 * ```
 */

// ============================================================================
// Base Error
// ============================================================================

/**
 * Base error class for all shredding-related errors.
 * Provides a consistent structure with error codes for programmatic handling.
 */
export class ShreddingError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  constructor(message: string, code: string = 'SHREDDING_ERROR') {
    super(message);
    this.name = 'ShreddingError';
    this.code = code;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ============================================================================
// Schema Errors
// ============================================================================

/**
 * Error codes for structural schema violations.
 */
export type InvalidSchemaCode =
  | 'INVALID_FIELD_COUNT'
  | 'INVALID_SLOT_INDEX'
  | 'FIELD_COUNT_MISMATCH'
  | 'DUPLICATE_SLOT_INDEX'
  | 'CONFLICTING_TYPED_SCHEMA'
  | 'MISSING_TYPED_SLOT'
  | 'INVALID_SCALAR_TYPE'
  | 'NESTED_METADATA'
  | 'DUPLICATE_FIELD_NAME'
  | 'SHARED_CHILD'
  | 'INVALID_TRANSITION'
  | 'INVALID_CONFIG';

/**
 * Error thrown when a schema node (or the configuration it is derived from)
 * breaks a structural rule. Indicates a caller bug; never recovered locally.
 */
export class InvalidSchemaError extends ShreddingError {
  /** Specific schema error code */
  readonly code: InvalidSchemaCode;
  /** Object field the error relates to (if applicable) */
  readonly fieldName?: string;

  constructor(message: string, code: InvalidSchemaCode, options?: { fieldName?: string }) {
    super(message, code);
    this.name = 'InvalidSchemaError';
    this.code = code;
    this.fieldName = options?.fieldName;
  }
}

// ============================================================================
// Metadata Errors
// ============================================================================

/**
 * Error thrown when a field-name dictionary cannot be encoded as variant metadata.
 */
export class MetadataEncodingError extends ShreddingError {
  readonly code: 'METADATA_ENCODING_ERROR';
  /** Original error raised by the encoder */
  readonly cause?: Error;

  constructor(message: string, options?: { cause?: Error }) {
    super(message, 'METADATA_ENCODING_ERROR');
    this.name = 'MetadataEncodingError';
    this.code = 'METADATA_ENCODING_ERROR';
    this.cause = options?.cause;
  }
}

/**
 * Error thrown when metadata is read from a node that was never promoted.
 */
export class MetadataNotComputedError extends ShreddingError {
  readonly code: 'METADATA_NOT_COMPUTED';

  constructor(message: string = 'Metadata has not been computed for this schema node') {
    super(message, 'METADATA_NOT_COMPUTED');
    this.name = 'MetadataNotComputedError';
    this.code = 'METADATA_NOT_COMPUTED';
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Type guard to check if an error is a ShreddingError.
 */
export function isShreddingError(error: unknown): error is ShreddingError {
  return error instanceof ShreddingError;
}

/**
 * Type guard to check if an error is an InvalidSchemaError.
 */
export function isInvalidSchemaError(error: unknown): error is InvalidSchemaError {
  return error instanceof InvalidSchemaError;
}

/**
 * Type guard to check if an error is a MetadataEncodingError.
 */
export function isMetadataEncodingError(error: unknown): error is MetadataEncodingError {
  return error instanceof MetadataEncodingError;
}

/**
 * Wrap an unknown error in a ShreddingError if it isn't already one.
 */
export function wrapError(error: unknown, defaultMessage: string = 'Unknown error'): ShreddingError {
  if (error instanceof ShreddingError) {
    return error;
  }
  if (error instanceof Error) {
    const wrapped = new ShreddingError(error.message, 'WRAPPED_ERROR');
    wrapped.stack = error.stack;
    return wrapped;
  }
  return new ShreddingError(String(error) || defaultMessage, 'UNKNOWN_ERROR');
}
