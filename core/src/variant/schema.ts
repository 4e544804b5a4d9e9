/**
 * Variant Shredding Schema
 *
 * A shredding schema describes how a variant value is split into a generic
 * `value` column and an optional strongly-typed `typed_value` column. When
 * `typed_value` is an array or an object, it recursively holds its own
 * shredding schema for the elements or fields. The `metadata` column (the
 * field-name dictionary) exists only at the top level.
 *
 * Slot indices are positions among the slots that are physically present,
 * so present indices are always exactly `0..fieldCount - 1`.
 *
 * @see https://github.com/apache/parquet-format/blob/master/VariantShredding.md
 */

import { InvalidSchemaError, MetadataEncodingError, MetadataNotComputedError } from '../errors.js';
import type { Logger } from '../logging.js';
import { encodeVariantMetadata, type VariantMetadataEncoder } from './metadata.js';
import { formatScalarType, validateScalarType, type ScalarType } from './scalar-types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * One named field of an object in the shredding schema.
 */
export interface ObjectField {
  readonly fieldName: string;
  readonly schema: VariantSchema;
}

/**
 * Constructor input for a schema node. Absent slots and payloads are left undefined.
 *
 * @example
 * ```ts
 * // Top-level column with metadata, value and a typed long
 * const init: VariantSchemaInit = {
 *   topLevelMetadataIndex: 0,
 *   valueSlotIndex: 1,
 *   typedSlotIndex: 2,
 *   fieldCount: 3,
 *   scalarType: longType(),
 * };
 * ```
 */
export interface VariantSchemaInit {
  readonly typedSlotIndex?: number;
  readonly valueSlotIndex?: number;
  /** Only set on the root of a schema tree */
  readonly topLevelMetadataIndex?: number;
  /** Number of present slots among value, typed_value and metadata */
  readonly fieldCount: number;
  readonly scalarType?: ScalarType;
  readonly objectFields?: readonly ObjectField[];
  readonly arrayChild?: VariantSchema;
}

export interface PromoteOptions {
  /** Metadata encoder (defaults to {@link encodeVariantMetadata}) */
  readonly metadataEncoder?: VariantMetadataEncoder;
  readonly logger?: Logger;
}

/** 'generic' while the value slot is present, 'typed' once it is gone */
export type SchemaState = 'generic' | 'typed';

export type TypedKind = 'scalar' | 'array' | 'object';

// ============================================================================
// Validation Helpers
// ============================================================================

function isSlotIndex(index: number, fieldCount: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < fieldCount;
}

/**
 * Check that the present slots form the contiguous range 0..fieldCount-1.
 */
function validateLayout(
  slots: Readonly<Record<'typed' | 'value' | 'metadata', number | undefined>>,
  fieldCount: number
): void {
  if (!Number.isInteger(fieldCount) || fieldCount < 1 || fieldCount > 3) {
    throw new InvalidSchemaError(
      `fieldCount must be an integer in 1..3, got ${fieldCount}`,
      'INVALID_FIELD_COUNT'
    );
  }

  const present: number[] = [];
  for (const [slot, index] of Object.entries(slots)) {
    if (index === undefined) continue;
    if (!isSlotIndex(index, fieldCount)) {
      throw new InvalidSchemaError(
        `${slot} slot index ${index} is outside 0..${fieldCount - 1}`,
        'INVALID_SLOT_INDEX'
      );
    }
    present.push(index);
  }

  if (present.length !== fieldCount) {
    throw new InvalidSchemaError(
      `fieldCount is ${fieldCount} but ${present.length} slot(s) are present`,
      'FIELD_COUNT_MISMATCH'
    );
  }
  if (new Set(present).size !== present.length) {
    throw new InvalidSchemaError(
      `Slot indices must be distinct, got ${present.join(', ')}`,
      'DUPLICATE_SLOT_INDEX'
    );
  }
}

function assertNested(child: VariantSchema, location: string): void {
  if (child.topLevelMetadataIndex !== undefined) {
    throw new InvalidSchemaError(
      `${location} must not have a metadata slot; metadata exists only at the top level`,
      'NESTED_METADATA'
    );
  }
}

// ============================================================================
// VariantSchema
// ============================================================================

/**
 * One node of a shredding schema tree.
 *
 * Nodes are built bottom-up and are immutable apart from
 * {@link VariantSchema.promoteToTyped}, which drops the value slot once.
 * A node can be the child of one parent only.
 *
 * @example
 * ```ts
 * const element = new VariantSchema({ valueSlotIndex: 0, typedSlotIndex: 1, fieldCount: 2, scalarType: stringType() });
 * const tags = new VariantSchema({ valueSlotIndex: 0, typedSlotIndex: 1, fieldCount: 2, arrayChild: element });
 * const root = new VariantSchema({
 *   topLevelMetadataIndex: 0,
 *   valueSlotIndex: 1,
 *   typedSlotIndex: 2,
 *   fieldCount: 3,
 *   objectFields: [{ fieldName: 'tags', schema: tags }],
 * });
 * root.fieldPosition('tags'); // 0
 * ```
 */
export class VariantSchema {
  readonly topLevelMetadataIndex: number | undefined;
  readonly scalarType: ScalarType | undefined;
  readonly objectFields: readonly ObjectField[] | undefined;
  readonly arrayChild: VariantSchema | undefined;

  private _typedSlotIndex: number | undefined;
  private _valueSlotIndex: number | undefined;
  private _fieldCount: number;
  /** Field name -> position in objectFields */
  private readonly objectFieldIndex: ReadonlyMap<string, number> | undefined;
  private metadataBytes: Uint8Array | undefined;
  /** Set once a parent node takes this node as a field or array element */
  private attached = false;

  constructor(init: VariantSchemaInit) {
    validateLayout(
      {
        typed: init.typedSlotIndex,
        value: init.valueSlotIndex,
        metadata: init.topLevelMetadataIndex,
      },
      init.fieldCount
    );

    const payloads = [init.scalarType, init.objectFields, init.arrayChild].filter(
      (payload) => payload !== undefined
    ).length;
    if (payloads > 1) {
      throw new InvalidSchemaError(
        'Only one of scalarType, objectFields and arrayChild may be set',
        'CONFLICTING_TYPED_SCHEMA'
      );
    }
    if (payloads === 1 && init.typedSlotIndex === undefined) {
      throw new InvalidSchemaError(
        'A typed schema requires a typed_value slot',
        'MISSING_TYPED_SLOT'
      );
    }

    if (init.scalarType !== undefined) {
      validateScalarType(init.scalarType);
    }
    if (init.arrayChild !== undefined) {
      assertNested(init.arrayChild, 'Array element schema');
    }

    let objectFields: readonly ObjectField[] | undefined;
    let objectFieldIndex: Map<string, number> | undefined;
    if (init.objectFields !== undefined) {
      const fields: ObjectField[] = [];
      objectFieldIndex = new Map();
      for (const [position, field] of init.objectFields.entries()) {
        if (objectFieldIndex.has(field.fieldName)) {
          throw new InvalidSchemaError(
            `Duplicate object field name '${field.fieldName}'`,
            'DUPLICATE_FIELD_NAME',
            { fieldName: field.fieldName }
          );
        }
        assertNested(field.schema, `Schema of field '${field.fieldName}'`);
        objectFieldIndex.set(field.fieldName, position);
        fields.push(Object.freeze({ fieldName: field.fieldName, schema: field.schema }));
      }
      objectFields = Object.freeze(fields);
    }

    const children = [
      ...(init.arrayChild === undefined ? [] : [init.arrayChild]),
      ...(objectFields ?? []).map((field) => field.schema),
    ];
    const seen = new Set<VariantSchema>();
    for (const child of children) {
      if (child.attached || seen.has(child)) {
        const owner = objectFields?.find((field) => field.schema === child);
        throw new InvalidSchemaError(
          owner === undefined
            ? 'Array element schema already belongs to another parent'
            : `Schema of field '${owner.fieldName}' already belongs to another parent`,
          'SHARED_CHILD',
          owner === undefined ? undefined : { fieldName: owner.fieldName }
        );
      }
      seen.add(child);
    }
    for (const child of children) {
      child.attached = true;
    }

    this._typedSlotIndex = init.typedSlotIndex;
    this._valueSlotIndex = init.valueSlotIndex;
    this.topLevelMetadataIndex = init.topLevelMetadataIndex;
    this._fieldCount = init.fieldCount;
    this.scalarType = init.scalarType;
    this.objectFields = objectFields;
    this.objectFieldIndex = objectFieldIndex;
    this.arrayChild = init.arrayChild;
  }

  // --------------------------------------------------------------------------
  // Slot accessors
  // --------------------------------------------------------------------------

  get typedSlotIndex(): number | undefined {
    return this._typedSlotIndex;
  }

  get valueSlotIndex(): number | undefined {
    return this._valueSlotIndex;
  }

  get fieldCount(): number {
    return this._fieldCount;
  }

  get isRoot(): boolean {
    return this.topLevelMetadataIndex !== undefined;
  }

  get state(): SchemaState {
    return this._valueSlotIndex === undefined ? 'typed' : 'generic';
  }

  /** Which payload the typed slot carries, if any */
  get typedKind(): TypedKind | undefined {
    if (this.scalarType !== undefined) return 'scalar';
    if (this.arrayChild !== undefined) return 'array';
    if (this.objectFields !== undefined) return 'object';
    return undefined;
  }

  // --------------------------------------------------------------------------
  // Transition
  // --------------------------------------------------------------------------

  /**
   * Make this node exclusively typed: set the typed slot, drop the value slot
   * and compute the metadata dictionary from the object field names (an empty
   * set for scalar, array and untyped nodes).
   *
   * The node is left untouched if any step fails.
   *
   * @throws InvalidSchemaError if the value slot is already gone or the new layout is not contiguous
   * @throws MetadataEncodingError if the metadata encoder fails
   */
  promoteToTyped(typedSlotIndex: number, options: PromoteOptions = {}): void {
    if (this._valueSlotIndex === undefined) {
      throw new InvalidSchemaError(
        'Schema node is already typed; the value slot cannot be dropped twice',
        'INVALID_TRANSITION'
      );
    }

    const fieldCount = this.topLevelMetadataIndex === undefined ? 1 : 2;
    if (!isSlotIndex(typedSlotIndex, fieldCount) || typedSlotIndex === this.topLevelMetadataIndex) {
      throw new InvalidSchemaError(
        `typed slot index ${typedSlotIndex} does not fit a ${fieldCount}-slot layout` +
          (this.topLevelMetadataIndex === undefined
            ? ''
            : ` with metadata at ${this.topLevelMetadataIndex}`),
        'INVALID_SLOT_INDEX'
      );
    }

    const encoder = options.metadataEncoder ?? encodeVariantMetadata;
    const fieldNames = (this.objectFields ?? []).map((field) => field.fieldName);
    let metadataBytes: Uint8Array;
    try {
      metadataBytes = encoder(fieldNames);
    } catch (error) {
      if (error instanceof MetadataEncodingError) {
        throw error;
      }
      throw new MetadataEncodingError(
        `Failed to encode metadata for ${fieldNames.length} field name(s)`,
        { cause: error instanceof Error ? error : new Error(String(error)) }
      );
    }

    this._typedSlotIndex = typedSlotIndex;
    this._valueSlotIndex = undefined;
    this._fieldCount = fieldCount;
    this.metadataBytes = metadataBytes;

    options.logger?.debug('Promoted variant schema node to typed', {
      operation: 'promoteToTyped',
      typedSlotIndex,
      fieldCount,
      objectFieldCount: fieldNames.length,
      metadataBytes: metadataBytes.length,
    });
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  /**
   * The metadata dictionary computed by the last promotion.
   *
   * @throws MetadataNotComputedError if the node was never promoted
   */
  metadata(): Uint8Array {
    if (this.metadataBytes === undefined) {
      throw new MetadataNotComputedError();
    }
    return this.metadataBytes.slice();
  }

  hasMetadata(): boolean {
    return this.metadataBytes !== undefined;
  }

  /**
   * Whether the whole value lives in the top-level value column with no shredding.
   */
  isUnshredded(): boolean {
    return (
      this.topLevelMetadataIndex !== undefined &&
      this._valueSlotIndex !== undefined &&
      this._typedSlotIndex === undefined
    );
  }

  /**
   * Position of a field in {@link objectFields}, or undefined if the node is
   * not an object or has no such field.
   */
  fieldPosition(name: string): number | undefined {
    return this.objectFieldIndex?.get(name);
  }

  objectField(name: string): ObjectField | undefined {
    const position = this.fieldPosition(name);
    return position === undefined ? undefined : this.objectFields?.[position];
  }

  toString(): string {
    const parts = [
      `typedSlotIndex=${this._typedSlotIndex ?? -1}`,
      `valueSlotIndex=${this._valueSlotIndex ?? -1}`,
      `topLevelMetadataIndex=${this.topLevelMetadataIndex ?? -1}`,
      `fieldCount=${this._fieldCount}`,
    ];
    if (this.scalarType !== undefined) {
      parts.push(`scalarType=${formatScalarType(this.scalarType)}`);
    }
    if (this.objectFields !== undefined) {
      const fields = this.objectFields.map((f) => `${f.fieldName}: ${f.schema.toString()}`);
      parts.push(`objectFields=[${fields.join(', ')}]`);
    }
    if (this.arrayChild !== undefined) {
      parts.push(`arrayChild=${this.arrayChild.toString()}`);
    }
    return `VariantSchema{${parts.join(', ')}}`;
  }
}
