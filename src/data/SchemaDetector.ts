/**
 * Schema inference for input records
 * Derives an ordered column list from one sample record
 */

import type { Column, DataType, Result } from '../core/types';
import { err, ok } from '../core/types';
import { SchemaError, describeValue } from '../core/errors';
import { createColumn } from '../table/Column';
import { getFormatterByName } from '../table/Formatters';
import { parseFieldConfig } from './FieldConfig';
import { isValidDate } from './DateParser';
import { classifyRecord, readField, type FieldDescriptor } from './Records';

const INTEGER_TYPES = [
  'int',
  'int8',
  'int16',
  'int32',
  'int64',
  'uint',
  'uint8',
  'uint16',
  'uint32',
  'uint64',
  'integer',
  'bigint',
  'long',
  'short',
];

const FLOAT_TYPES = ['float', 'float32', 'float64', 'double', 'decimal', 'number', 'real'];

const BOOLEAN_TYPES = ['bool', 'boolean'];

const DATE_TYPES = ['date', 'time', 'datetime', 'timestamp'];

/**
 * Map a declared field type to a semantic DataType
 *
 * Unrecognised declarations map to 'text'.
 */
export function mapDeclaredType(declared: string): DataType {
  const normalized = declared.toLowerCase().trim();

  if (INTEGER_TYPES.includes(normalized)) return 'integer';
  if (FLOAT_TYPES.includes(normalized)) return 'float';
  if (BOOLEAN_TYPES.includes(normalized)) return 'boolean';
  if (DATE_TYPES.includes(normalized)) return 'date';
  return 'text';
}

/**
 * Map a runtime value to a semantic DataType
 */
export function mapRuntimeType(value: unknown): DataType {
  if (typeof value === 'bigint') return 'integer';
  if (typeof value === 'number') {
    if (Number.isInteger(value)) return 'integer';
    // NaN and the infinities are not meaningful numbers here
    return Number.isFinite(value) ? 'float' : 'text';
  }
  if (typeof value === 'boolean') return 'boolean';
  if (isValidDate(value)) return 'date';
  return 'text';
}

/**
 * Build a column from a field declaration and its configuration string
 */
function columnFromDescriptor(field: FieldDescriptor): Column {
  const config = field.tag ? parseFieldConfig(field.tag) : {};
  return createColumn({
    key: field.name,
    header: config.header ?? field.name,
    type: mapDeclaredType(field.type),
    width: config.width,
    sortable: config.sortable,
    searchable: config.searchable,
    formatter: config.format ? getFormatterByName(config.format) : undefined,
  });
}

/**
 * Infer an ordered column list from one sample record
 *
 * Described records yield one column per non-internal field, in declaration
 * order, configured from the field's tag. Map records yield one column per
 * key, in key order, typed from the key's value.
 *
 * @example
 * ```typescript
 * const result = inferColumns({ id: 1, name: 'Alice', active: true });
 * if (result.ok) {
 *   result.value.map((c) => c.type); // ['integer', 'text', 'boolean']
 * }
 * ```
 */
export function inferColumns(sample: unknown): Result<Column[], SchemaError> {
  const shape = classifyRecord(sample);

  switch (shape.kind) {
    case 'unsupported':
      return err(
        new SchemaError(
          'unsupported-record',
          `Cannot infer columns from ${describeValue(sample)} (${shape.reason})`
        )
      );

    case 'described': {
      const columns: Column[] = [];
      const seen = new Set<string>();
      for (const field of shape.fields) {
        if (field.internal) continue;
        if (seen.has(field.name)) {
          return err(new SchemaError('duplicate-key', `Field "${field.name}" is declared twice`));
        }
        seen.add(field.name);
        columns.push(columnFromDescriptor(field));
      }
      return ok(columns);
    }

    case 'map':
      return ok(
        shape.keys.map((key) => {
          const lookup = readField(sample, key);
          return createColumn({
            key,
            type: mapRuntimeType(lookup.found ? lookup.value : undefined),
          });
        })
      );
  }
}
