/**
 * Column construction
 */

import type { Accessor, Column, DataType, Formatter } from '../core/types';
import { defaultFormatter } from './Formatters';

/**
 * Options for createColumn; everything but the key is optional
 */
export interface ColumnOptions {
  key: string;
  /** Display label (default: the key) */
  header?: string;
  /** Semantic type (default: 'text') */
  type?: DataType;
  /** Display width hint (default: depends on the type) */
  width?: number;
  /** default: true */
  sortable?: boolean;
  /** default: true */
  searchable?: boolean;
  formatter?: Formatter;
  accessor?: Accessor;
}

/**
 * Default display width for a semantic type
 */
export function defaultWidth(type: DataType): number {
  switch (type) {
    case 'integer':
    case 'boolean':
      return 8;
    case 'float':
      return 10;
    case 'date':
      return 12;
    case 'text':
      return 15;
  }
}

/**
 * Create a column, filling in defaults
 *
 * @example
 * ```typescript
 * const salary = createColumn({
 *   key: 'salary',
 *   header: 'Salary',
 *   type: 'float',
 *   formatter: currencyFormatter,
 * });
 * ```
 */
export function createColumn(options: ColumnOptions): Column {
  const type = options.type ?? 'text';
  const column: Column = {
    key: options.key,
    header: options.header ?? options.key,
    type,
    width: options.width ?? defaultWidth(type),
    sortable: options.sortable ?? true,
    searchable: options.searchable ?? true,
    formatter: options.formatter ?? defaultFormatter,
  };
  if (options.accessor) {
    return { ...column, accessor: options.accessor };
  }
  return column;
}
