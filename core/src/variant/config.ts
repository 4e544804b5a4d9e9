/**
 * Variant Shredding Configuration
 *
 * Defines table property keys and utilities for configuring which variant
 * columns are shredded, which top-level fields are extracted, and the scalar
 * type each extracted field is stored as.
 *
 * @example
 * ```
 * write.variant.shred-columns      = $data
 * write.variant.$data.shred-fields = title,year,price
 * write.variant.$data.field-types  = title:string,year:int,price:decimal(10,2)
 * ```
 */

import { InvalidSchemaError } from '../errors.js';
import { withContext, type Logger } from '../logging.js';
import {
  buildVariantSchema,
  objectShape,
  scalarShape,
  variantShape,
  type ObjectShape,
  type ShreddingShape,
} from './builder.js';
import { tryParseScalarType } from './scalar-types.js';
import type { VariantSchema } from './schema.js';

// ============================================================================
// Property Key Constants
// ============================================================================

/**
 * Table property key that lists which variant columns should be shredded.
 * Value is a comma-separated list of column names.
 */
export const VARIANT_SHRED_COLUMNS_KEY = 'write.variant.shred-columns';

/**
 * Prefix for variant column-specific properties.
 * Combined with column name and suffix to form full property keys.
 */
export const VARIANT_SHRED_FIELDS_KEY_PREFIX = 'write.variant.';

/**
 * Suffix for the shred-fields property of a specific column.
 *
 * @example
 * Full key: 'write.variant.$data.shred-fields' = 'title,year,rating'
 */
export const VARIANT_SHRED_FIELDS_KEY_SUFFIX = '.shred-fields';

/**
 * Suffix for the field-types property of a specific column.
 *
 * @example
 * Full key: 'write.variant.$data.field-types' = 'title:string,year:int'
 */
export const VARIANT_FIELD_TYPES_KEY_SUFFIX = '.field-types';

// ============================================================================
// Types
// ============================================================================

/**
 * Shredding configuration of a single variant column as stored in table properties.
 */
export interface VariantShredPropertyConfig {
  readonly columnName: string;
  /** Top-level fields to extract from the variant */
  readonly fields: readonly string[];
  /** Scalar type names by field (see formatScalarType) */
  readonly fieldTypes: Readonly<Record<string, string>>;
}

export interface ShredConfigValidationResult {
  readonly valid: boolean;
  /** List of validation errors (empty if valid) */
  readonly errors: readonly string[];
}

export interface BuildVariantSchemasOptions {
  /** Passed to buildVariantSchema for every column */
  readonly typedOnly?: boolean;
  readonly logger?: Logger;
}

// ============================================================================
// Key Generation Functions
// ============================================================================

/**
 * @returns Property key like 'write.variant.$data.shred-fields'
 */
export function getShredFieldsKey(columnName: string): string {
  return `${VARIANT_SHRED_FIELDS_KEY_PREFIX}${columnName}${VARIANT_SHRED_FIELDS_KEY_SUFFIX}`;
}

/**
 * @returns Property key like 'write.variant.$data.field-types'
 */
export function getFieldTypesKey(columnName: string): string {
  return `${VARIANT_SHRED_FIELDS_KEY_PREFIX}${columnName}${VARIANT_FIELD_TYPES_KEY_SUFFIX}`;
}

// ============================================================================
// Parsing Functions
// ============================================================================

/**
 * Split on commas that are not inside parentheses, so that
 * `price:decimal(10,2)` stays one entry.
 */
function splitTopLevel(value: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < value.length; i++) {
    const char = value[i];
    if (char === '(') {
      depth++;
    } else if (char === ')') {
      depth = Math.max(0, depth - 1);
    } else if (char === ',' && depth === 0) {
      parts.push(value.substring(start, i));
      start = i + 1;
    }
  }
  parts.push(value.substring(start));
  return parts;
}

function parseList(value: string | undefined): string[] {
  if (!value || value.trim() === '') {
    return [];
  }
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Parse the shred-columns property value into an array of column names.
 */
export function parseShredColumnsProperty(value: string | undefined): string[] {
  return parseList(value);
}

/**
 * Parse a shred-fields property value into an array of field names.
 */
export function parseShredFieldsProperty(value: string | undefined): string[] {
  return parseList(value);
}

/**
 * Parse a field-types property value into a record of field names to type names.
 * Entries without a colon are skipped; type names are not checked here
 * (see {@link validateShredConfig}).
 */
export function parseFieldTypesProperty(value: string | undefined): Record<string, string> {
  if (!value || value.trim() === '') {
    return {};
  }

  const entries: [string, string][] = [];

  for (const pair of splitTopLevel(value)) {
    const trimmed = pair.trim();
    if (!trimmed) continue;

    const colonIndex = trimmed.lastIndexOf(':');
    if (colonIndex === -1) continue;

    const fieldName = trimmed.substring(0, colonIndex).trim();
    const typeName = trimmed.substring(colonIndex + 1).trim();

    if (fieldName && typeName) {
      entries.push([fieldName, typeName]);
    }
  }

  // fromEntries defines own properties, so '__proto__' is kept as a field name
  return Object.fromEntries(entries);
}

/**
 * Extract variant shred configurations from table properties.
 *
 * @example
 * ```ts
 * const configs = extractVariantShredConfig(table.properties);
 * // configs[0] = {
 * //   columnName: '$data',
 * //   fields: ['title', 'year'],
 * //   fieldTypes: { title: 'string', year: 'int' }
 * // }
 * ```
 */
export function extractVariantShredConfig(
  properties: Readonly<Record<string, string>>
): VariantShredPropertyConfig[] {
  const columns = parseShredColumnsProperty(properties[VARIANT_SHRED_COLUMNS_KEY]);

  return columns.map((columnName) => ({
    columnName,
    fields: parseShredFieldsProperty(properties[getShredFieldsKey(columnName)]),
    fieldTypes: parseFieldTypesProperty(properties[getFieldTypesKey(columnName)]),
  }));
}

// ============================================================================
// Serialization Functions
// ============================================================================

export function formatShredColumnsProperty(configs: readonly VariantShredPropertyConfig[]): string {
  return configs.map((c) => c.columnName).join(',');
}

export function formatShredFieldsProperty(fields: readonly string[]): string {
  return fields.join(',');
}

/**
 * Format a field types record into a field-types property value.
 *
 * @returns Comma-separated "field:type" pairs
 */
export function formatFieldTypesProperty(fieldTypes: Readonly<Record<string, string>>): string {
  return Object.entries(fieldTypes)
    .map(([field, type]) => `${field}:${type}`)
    .join(',');
}

/**
 * Convert variant shred configurations to table properties.
 *
 * @example
 * ```ts
 * toTableProperties([{ columnName: '$data', fields: ['title', 'year'], fieldTypes: { year: 'int' } }]);
 * // {
 * //   'write.variant.shred-columns': '$data',
 * //   'write.variant.$data.shred-fields': 'title,year',
 * //   'write.variant.$data.field-types': 'year:int'
 * // }
 * ```
 */
export function toTableProperties(
  configs: readonly VariantShredPropertyConfig[]
): Record<string, string> {
  if (configs.length === 0) {
    return {};
  }

  const properties: Record<string, string> = {
    [VARIANT_SHRED_COLUMNS_KEY]: formatShredColumnsProperty(configs),
  };

  for (const config of configs) {
    properties[getShredFieldsKey(config.columnName)] = formatShredFieldsProperty(config.fields);

    // Only include field-types if non-empty
    const fieldTypesValue = formatFieldTypesProperty(config.fieldTypes);
    if (fieldTypesValue) {
      properties[getFieldTypesKey(config.columnName)] = fieldTypesValue;
    }
  }

  return properties;
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate a variant shred configuration.
 *
 * Returns a validation result object instead of throwing errors,
 * allowing callers to handle validation failures as they see fit.
 */
export function validateShredConfig(config: VariantShredPropertyConfig): ShredConfigValidationResult {
  const errors: string[] = [];
  const inColumn = config.columnName ? ` in column '${config.columnName}'` : '';

  if (!config.columnName || config.columnName.trim() === '') {
    errors.push('Column name is required');
  }

  if (config.fields.length === 0) {
    errors.push(`At least one field is required${inColumn}`);
  }

  const declaredFields = new Set<string>();
  for (const field of config.fields) {
    if (declaredFields.has(field)) {
      errors.push(`Field '${field}' is declared more than once${inColumn}`);
    }
    declaredFields.add(field);
  }

  for (const [fieldName, typeName] of Object.entries(config.fieldTypes)) {
    if (tryParseScalarType(typeName) === undefined) {
      errors.push(`Invalid field type '${typeName}' for field '${fieldName}'${inColumn}`);
    }

    if (!declaredFields.has(fieldName)) {
      errors.push(
        `Field type declared for field '${fieldName}' which is not declared in fields array${inColumn}`
      );
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

// ============================================================================
// Schema Derivation
// ============================================================================

/**
 * Describe a column's configuration as an object shape: typed fields become
 * scalar shapes, fields without a type stay in their own value column.
 *
 * @throws InvalidSchemaError if a field type name is unknown
 */
export function shapeFromShredConfig(config: VariantShredPropertyConfig): ObjectShape {
  const fields: { name: string; shape: ShreddingShape }[] = config.fields.map((name) => {
    const typeName = Object.hasOwn(config.fieldTypes, name) ? config.fieldTypes[name] : undefined;
    if (typeName === undefined) {
      return { name, shape: variantShape() };
    }
    const type = tryParseScalarType(typeName);
    if (type === undefined) {
      throw new InvalidSchemaError(
        `Invalid field type '${typeName}' for field '${name}'`,
        'INVALID_SCALAR_TYPE',
        { fieldName: name }
      );
    }
    return { name, shape: scalarShape(type) };
  });
  return objectShape(fields);
}

/**
 * Build the shredding schema of every variant column configured in table properties.
 *
 * @throws InvalidSchemaError with code INVALID_CONFIG listing every validation error
 *
 * @example
 * ```ts
 * const schemas = buildVariantSchemas({
 *   'write.variant.shred-columns': '$data',
 *   'write.variant.$data.shred-fields': 'title,year',
 *   'write.variant.$data.field-types': 'title:string,year:int',
 * });
 * schemas.get('$data')?.fieldPosition('year'); // 1
 * ```
 */
export function buildVariantSchemas(
  properties: Readonly<Record<string, string>>,
  options: BuildVariantSchemasOptions = {}
): Map<string, VariantSchema> {
  const configs = extractVariantShredConfig(properties);
  const errors = configs.flatMap((config) => validateShredConfig(config).errors);
  if (errors.length > 0) {
    options.logger?.error('Invalid variant shredding configuration', undefined, {
      operation: 'buildVariantSchemas',
      errorCode: 'INVALID_CONFIG',
      errors,
    });
    throw new InvalidSchemaError(
      `Invalid variant shredding configuration: ${errors.join('; ')}`,
      'INVALID_CONFIG'
    );
  }

  const schemas = new Map<string, VariantSchema>();
  for (const config of configs) {
    const logger =
      options.logger && withContext(options.logger, { column: config.columnName });
    schemas.set(
      config.columnName,
      buildVariantSchema(shapeFromShredConfig(config), { typedOnly: options.typedOnly, logger })
    );
  }

  options.logger?.info('Built variant shredding schemas', {
    operation: 'buildVariantSchemas',
    columns: [...schemas.keys()],
  });

  return schemas;
}
