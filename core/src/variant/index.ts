/**
 * Variant Shredding Module
 *
 * The shredding schema of a variant column: which of the value, typed_value
 * and metadata slots exist at each nesting level, and the typed schema of
 * scalars, arrays and objects below it.
 *
 * @module variant
 * @see https://github.com/apache/parquet-format/blob/master/VariantShredding.md
 */

// ============================================================================
// Scalar Types
// ============================================================================

export type {
  IntegralWidth,
  ScalarType,
  ScalarKind,
  StringScalar,
  IntegralScalar,
  FloatScalar,
  DoubleScalar,
  BooleanScalar,
  BinaryScalar,
  DecimalScalar,
  DateScalar,
  TimestampScalar,
  TimestampNtzScalar,
  UuidScalar,
} from './scalar-types.js';

export {
  MAX_DECIMAL_PRECISION,
  stringType,
  integralType,
  byteType,
  shortType,
  intType,
  longType,
  floatType,
  doubleType,
  booleanType,
  binaryType,
  decimalType,
  dateType,
  timestampType,
  timestampNtzType,
  uuidType,
  validateScalarType,
  formatScalarType,
  parseScalarType,
  tryParseScalarType,
  scalarTypesEqual,
} from './scalar-types.js';

// ============================================================================
// Schema Node
// ============================================================================

export type {
  ObjectField,
  VariantSchemaInit,
  PromoteOptions,
  SchemaState,
  TypedKind,
} from './schema.js';

export { VariantSchema } from './schema.js';

// ============================================================================
// Metadata Encoding
// ============================================================================

export type { VariantMetadataEncoder } from './metadata.js';

export { encodeVariantMetadata, VARIANT_METADATA_VERSION, SORTED_STRINGS_FLAG } from './metadata.js';

// ============================================================================
// Builder
// ============================================================================

export type {
  ShreddingShape,
  VariantShape,
  ScalarShape,
  ArrayShape,
  ObjectShape,
  ShreddedFieldShape,
  BuildVariantSchemaOptions,
} from './builder.js';

export {
  variantShape,
  scalarShape,
  arrayShape,
  objectShape,
  buildVariantSchema,
} from './builder.js';

// ============================================================================
// Paths
// ============================================================================

export type { ShreddedFieldInfo } from './types.js';

export { getMetadataPath, getValuePath, getTypedValuePath, listShreddedFields } from './types.js';

// ============================================================================
// Configuration
// ============================================================================

export type {
  VariantShredPropertyConfig,
  ShredConfigValidationResult,
  BuildVariantSchemasOptions,
} from './config.js';

export {
  VARIANT_SHRED_COLUMNS_KEY,
  VARIANT_SHRED_FIELDS_KEY_PREFIX,
  VARIANT_SHRED_FIELDS_KEY_SUFFIX,
  VARIANT_FIELD_TYPES_KEY_SUFFIX,
  getShredFieldsKey,
  getFieldTypesKey,
  parseShredColumnsProperty,
  parseShredFieldsProperty,
  parseFieldTypesProperty,
  extractVariantShredConfig,
  formatShredColumnsProperty,
  formatShredFieldsProperty,
  formatFieldTypesProperty,
  toTableProperties,
  validateShredConfig,
  shapeFromShredConfig,
  buildVariantSchemas,
} from './config.js';
