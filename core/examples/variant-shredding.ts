/**
 * Variant Shredding Examples
 *
 * Builds shredding schemas by hand, from shapes and from table properties,
 * then promotes a column to typed-only and prints its metadata dictionary.
 *
 * Run this example:
 *   npx tsx examples/variant-shredding.ts
 */

import type { VariantShredPropertyConfig } from '../src/index.js';
import {
  VariantSchema,
  arrayShape,
  buildVariantSchema,
  buildVariantSchemas,
  createConsoleLogger,
  decimalType,
  listShreddedFields,
  longType,
  objectShape,
  scalarShape,
  stringType,
  toTableProperties,
  validateShredConfig,
} from '../src/index.js';

const logger = createConsoleLogger({ format: 'pretty', minLevel: 'debug' });

// ============================================================================
// Example 1: Building a Schema by Hand
// ============================================================================

console.log('='.repeat(60));
console.log('Example 1: Building a Schema by Hand');
console.log('='.repeat(60));

const element = new VariantSchema({
  valueSlotIndex: 0,
  typedSlotIndex: 1,
  fieldCount: 2,
  scalarType: stringType(),
});
const tags = new VariantSchema({ valueSlotIndex: 0, typedSlotIndex: 1, fieldCount: 2, arrayChild: element });
const manual = new VariantSchema({
  topLevelMetadataIndex: 0,
  valueSlotIndex: 1,
  typedSlotIndex: 2,
  fieldCount: 3,
  objectFields: [{ fieldName: 'tags', schema: tags }],
});

console.log(manual.toString());
console.log('Position of "tags":', manual.fieldPosition('tags'));

// ============================================================================
// Example 2: Building a Schema from a Shape
// ============================================================================

console.log('\n' + '='.repeat(60));
console.log('Example 2: Building a Schema from a Shape');
console.log('='.repeat(60));

const orders = buildVariantSchema(
  objectShape({
    id: scalarShape(longType()),
    total: scalarShape(decimalType(12, 2)),
    items: arrayShape(objectShape({ sku: scalarShape(stringType()) })),
  }),
  { logger }
);

for (const field of listShreddedFields('order', orders)) {
  console.log(`  ${field.path} -> ${field.statisticsPath}`);
}

// ============================================================================
// Example 3: Schemas from Table Properties
// ============================================================================

console.log('\n' + '='.repeat(60));
console.log('Example 3: Schemas from Table Properties');
console.log('='.repeat(60));

const config: VariantShredPropertyConfig = {
  columnName: '$data',
  fields: ['title', 'year', 'price'],
  fieldTypes: { title: 'string', year: 'int', price: 'decimal(10,2)' },
};

const validation = validateShredConfig(config);
console.log('Config valid:', validation.valid);

const properties = toTableProperties([config]);
console.log('Table properties:', properties);

const schemas = buildVariantSchemas(properties, { logger });
const data = schemas.get('$data');

// ============================================================================
// Example 4: Promoting to Typed
// ============================================================================

console.log('\n' + '='.repeat(60));
console.log('Example 4: Promoting to Typed');
console.log('='.repeat(60));

if (data) {
  data.promoteToTyped(1, { logger });
  console.log(data.toString());
  console.log('Metadata bytes:', Array.from(data.metadata(), (b) => b.toString(16).padStart(2, '0')).join(' '));
}
