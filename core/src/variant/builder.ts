/**
 * Shredding Schema Builder
 *
 * Derives a {@link VariantSchema} tree from a declarative shredding shape,
 * assigning slot indices in the physical column order
 * `metadata, value, typed_value`.
 */

import type { Logger } from '../logging.js';
import type { ScalarType } from './scalar-types.js';
import { VariantSchema, type ObjectField } from './schema.js';

// ============================================================================
// Shapes
// ============================================================================

/** Kept entirely in the value column */
export interface VariantShape {
  readonly kind: 'variant';
}

export interface ScalarShape {
  readonly kind: 'scalar';
  readonly type: ScalarType;
}

export interface ArrayShape {
  readonly kind: 'array';
  readonly element: ShreddingShape;
}

export interface ShreddedFieldShape {
  readonly name: string;
  readonly shape: ShreddingShape;
}

export interface ObjectShape {
  readonly kind: 'object';
  readonly fields: readonly ShreddedFieldShape[];
}

/**
 * What a variant value (or a nested part of one) is shredded into.
 */
export type ShreddingShape = VariantShape | ScalarShape | ArrayShape | ObjectShape;

export function variantShape(): VariantShape {
  return { kind: 'variant' };
}

export function scalarShape(type: ScalarType): ScalarShape {
  return { kind: 'scalar', type };
}

export function arrayShape(element: ShreddingShape): ArrayShape {
  return { kind: 'array', element };
}

/**
 * Create an object shape. Fields keep the record's key order; pass an array
 * of field shapes where that order matters for integer-like names.
 */
export function objectShape(
  fields: Readonly<Record<string, ShreddingShape>> | readonly ShreddedFieldShape[]
): ObjectShape {
  if (isFieldShapeList(fields)) {
    return { kind: 'object', fields: [...fields] };
  }
  return {
    kind: 'object',
    fields: Object.entries(fields).map(([name, shape]) => ({ name, shape })),
  };
}

function isFieldShapeList(
  fields: Readonly<Record<string, ShreddingShape>> | readonly ShreddedFieldShape[]
): fields is readonly ShreddedFieldShape[] {
  return Array.isArray(fields);
}

// ============================================================================
// Builder
// ============================================================================

export interface BuildVariantSchemaOptions {
  /**
   * Omit the value slot below the top level for shapes that have a typed
   * representation. The top level always keeps its value slot.
   */
  readonly typedOnly?: boolean;
  readonly logger?: Logger;
}

type TypedPayload = Pick<VariantSchema, 'scalarType' | 'objectFields' | 'arrayChild'>;

function buildPayload(shape: ShreddingShape, options: BuildVariantSchemaOptions): Partial<TypedPayload> {
  switch (shape.kind) {
    case 'variant':
      return {};
    case 'scalar':
      return { scalarType: shape.type };
    case 'array':
      return { arrayChild: buildNested(shape.element, options) };
    case 'object': {
      const objectFields: ObjectField[] = shape.fields.map((field) => ({
        fieldName: field.name,
        schema: buildNested(field.shape, options),
      }));
      return { objectFields };
    }
  }
}

function buildNested(shape: ShreddingShape, options: BuildVariantSchemaOptions): VariantSchema {
  if (shape.kind === 'variant') {
    return new VariantSchema({ valueSlotIndex: 0, fieldCount: 1 });
  }
  const payload = buildPayload(shape, options);
  if (options.typedOnly) {
    return new VariantSchema({ typedSlotIndex: 0, fieldCount: 1, ...payload });
  }
  return new VariantSchema({ valueSlotIndex: 0, typedSlotIndex: 1, fieldCount: 2, ...payload });
}

/**
 * Build a top-level shredding schema from a shape.
 *
 * The root gets `metadata` at 0 and `value` at 1, plus `typed_value` at 2
 * unless the shape is `variant`. Nested levels get `value` at 0 and
 * `typed_value` at 1 (or only `typed_value` at 0 with `typedOnly`).
 *
 * @throws InvalidSchemaError if the shape describes an invalid schema (e.g. duplicate field names)
 *
 * @example
 * ```ts
 * const schema = buildVariantSchema(
 *   objectShape({ a: scalarShape(longType()), b: arrayShape(scalarShape(stringType())) })
 * );
 * schema.fieldPosition('b'); // 1
 * ```
 */
export function buildVariantSchema(
  shape: ShreddingShape,
  options: BuildVariantSchemaOptions = {}
): VariantSchema {
  const schema =
    shape.kind === 'variant'
      ? new VariantSchema({ topLevelMetadataIndex: 0, valueSlotIndex: 1, fieldCount: 2 })
      : new VariantSchema({
          topLevelMetadataIndex: 0,
          valueSlotIndex: 1,
          typedSlotIndex: 2,
          fieldCount: 3,
          ...buildPayload(shape, options),
        });

  options.logger?.debug('Built variant shredding schema', {
    operation: 'buildVariantSchema',
    kind: shape.kind,
    fieldCount: schema.fieldCount,
  });

  return schema;
}
