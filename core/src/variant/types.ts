/**
 * Variant Column Paths
 *
 * Dotted column paths for the physical parts of a shredded variant column,
 * and enumeration of the scalar leaves a shredding schema produces.
 *
 * @see https://github.com/apache/parquet-format/blob/master/VariantShredding.md
 */

import type { ScalarType } from './scalar-types.js';
import type { VariantSchema } from './schema.js';

// ============================================================================
// Core Types
// ============================================================================

/**
 * Information about a single shredded scalar field of a variant column.
 *
 * @example
 * ```ts
 * const fieldInfo: ShreddedFieldInfo = {
 *   path: 'address.city',
 *   type: stringType(),
 *   statisticsPath: '$data.typed_value.address.typed_value.city.typed_value',
 * };
 * ```
 */
export interface ShreddedFieldInfo {
  /** The dotted field path within the variant (e.g., "address.city") */
  readonly path: string;
  readonly type: ScalarType;
  /** The column path that holds the typed values (and their statistics) */
  readonly statisticsPath: string;
}

// ============================================================================
// Path Generation Functions
// ============================================================================

/**
 * Get the metadata path for a variant column.
 *
 * @returns The metadata path (e.g., "$data.metadata")
 */
export function getMetadataPath(columnName: string): string {
  return `${columnName}.metadata`;
}

/**
 * Get the value path for a variant column.
 *
 * @returns The value path (e.g., "$data.value")
 */
export function getValuePath(columnName: string): string {
  return `${columnName}.value`;
}

/**
 * Get the typed value path for a specific field in a variant column.
 *
 * @returns The typed value path (e.g., "$data.typed_value.titleType.typed_value")
 */
export function getTypedValuePath(columnName: string, fieldName: string): string {
  return `${columnName}.typed_value.${fieldName}.typed_value`;
}

// ============================================================================
// Schema Walking
// ============================================================================

/**
 * List the scalar leaves reachable from a schema through object fields.
 * Array elements are not descended into.
 *
 * @example
 * ```ts
 * listShreddedFields('$data', buildVariantSchema(objectShape({ year: scalarShape(intType()) })));
 * // [{ path: 'year', type: { kind: 'integral', width: 32 }, statisticsPath: '$data.typed_value.year.typed_value' }]
 * ```
 */
export function listShreddedFields(columnName: string, schema: VariantSchema): ShreddedFieldInfo[] {
  const result: ShreddedFieldInfo[] = [];

  const walk = (node: VariantSchema, path: readonly string[], columnPath: string): void => {
    if (node.typedSlotIndex === undefined) return;

    if (node.scalarType !== undefined && path.length > 0) {
      result.push({
        path: path.join('.'),
        type: node.scalarType,
        statisticsPath: `${columnPath}.typed_value`,
      });
      return;
    }

    for (const field of node.objectFields ?? []) {
      walk(field.schema, [...path, field.fieldName], `${columnPath}.typed_value.${field.fieldName}`);
    }
  };

  walk(schema, [], columnName);
  return result;
}
