/**
 * Headless Table Engine
 *
 * A UI-agnostic data table core: schema inference from arbitrary records,
 * typed cells, stable type-aware sorting, substring filtering and
 * pagination. Rendering and input handling are left to the host.
 */

export const VERSION = '0.1.0';

// Core types
export * from './core/types';
export * from './core/errors';

// Core classes
export { EventEmitter } from './core/EventEmitter';
export type { Listener } from './core/EventEmitter';

// Signals and reactive state
export { createSignal, computed } from './core/Signal';
export type { Signal, Computed, Equals, Observable } from './core/Signal';

// View state
export { createViewState, resetPosition, resetViewState } from './core/State';
export type { ViewState } from './core/State';

// View actions
export { TableActions, DEFAULT_PAGE_SIZE_STEP } from './core/Actions';
export type { TableActionsOptions, TableActionEvents } from './core/Actions';

// Table
export { DataTable, DEFAULT_PAGE_SIZE, clampPageSize } from './table/DataTable';
export type { DataTableOptions } from './table/DataTable';

export { createColumn, defaultWidth } from './table/Column';
export type { ColumnOptions } from './table/Column';

export { toCellValue, createCell, cellValueText, compareCells, EMPTY_TEXT } from './table/Cell';

// Formatters
export {
  defaultFormatter,
  currencyFormatter,
  percentFormatter,
  dateFormatter,
  timeFormatter,
  booleanFormatter,
  numberWithCommasFormatter,
  truncateFormatter,
  prefixFormatter,
  suffixFormatter,
  getFormatterByName,
  hasFormatter,
  FORMATTER_NAMES,
} from './table/Formatters';

// Schema inference
export { inferColumns, mapDeclaredType, mapRuntimeType } from './data/SchemaDetector';
export { parseFieldConfig } from './data/FieldConfig';
export type { FieldConfig } from './data/FieldConfig';
export { classifyRecord, describeRecord, isDescribable, readField } from './data/Records';
export type { Describable, FieldDescriptor, FieldLookup, RecordShape } from './data/Records';

// Date parsing
export { parseDate, formatDate, formatDateTime, isValidDate, DATE_LAYOUTS } from './data/DateParser';
