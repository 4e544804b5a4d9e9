/**
 * @variant-shredding/core
 *
 * Shredding schemas for the variant semi-structured value format.
 * Describes, level by level, how a variant value is split into a generic
 * value column, strongly-typed columns and a top-level metadata dictionary.
 *
 * @example
 * ```ts
 * import {
 *   buildVariantSchema,
 *   objectShape,
 *   scalarShape,
 *   arrayShape,
 *   longType,
 *   stringType,
 * } from '@variant-shredding/core';
 *
 * const schema = buildVariantSchema(
 *   objectShape({
 *     id: scalarShape(longType()),
 *     tags: arrayShape(scalarShape(stringType())),
 *   })
 * );
 *
 * schema.fieldPosition('tags'); // 1
 * schema.objectField('tags')?.schema.arrayChild?.scalarType; // { kind: 'string' }
 * ```
 *
 * @see https://github.com/apache/parquet-format/blob/master/VariantShredding.md
 */

// ============================================================================
// Variant Shredding Exports
// ============================================================================

export * from './variant/index.js';

// ============================================================================
// Error Classes Exports
// ============================================================================

export {
  // Base error
  ShreddingError,
  // Schema errors
  InvalidSchemaError,
  type InvalidSchemaCode,
  // Metadata errors
  MetadataEncodingError,
  MetadataNotComputedError,
  // Type guards
  isShreddingError,
  isInvalidSchemaError,
  isMetadataEncodingError,
  wrapError,
} from './errors.js';

// ============================================================================
// Logging Exports
// ============================================================================

export type {
  LogLevel,
  LogContextValue,
  LogContext,
  LogEntry,
  Logger,
  LoggerConfig,
  ConsoleLoggerConfig,
  TestLogger,
} from './logging.js';

export {
  isLevelAtLeast,
  createLogger,
  formatLogEntry,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  withContext,
} from './logging.js';
