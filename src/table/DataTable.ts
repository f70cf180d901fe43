/**
 * DataTable - in-memory table engine
 *
 * Holds a column schema and an arena of immutable rows. The current view
 * (`rows`) and the ingestion order (`naturalOrder`) are both permutations of
 * arena indices, so sorting only ever reorders indices and clearing a sort
 * copies the natural permutation back.
 *
 * All operations are synchronous. Failures are returned as `Result`s.
 */

import type { Cell, Column, Result, Row } from '../core/types';
import { err, ok } from '../core/types';
import { IngestionError, SchemaError, SortError, describeValue } from '../core/errors';
import { inferColumns } from '../data/SchemaDetector';
import { readField } from '../data/Records';
import { compareCells, createCell } from './Cell';
import { defaultFormatter } from './Formatters';

export const DEFAULT_PAGE_SIZE = 10;

/**
 * Options for constructing a DataTable
 */
export interface DataTableOptions {
  /** Explicit columns; inferred from the first record when omitted */
  columns?: readonly Column[];
  /** Rows per page (default: 10, clamped to at least 1) */
  pageSize?: number;
}

/**
 * Clamp a requested page size to a whole number >= 1
 */
export function clampPageSize(size: number): number {
  if (!Number.isFinite(size)) return 1;
  return Math.max(1, Math.floor(size));
}

function findDuplicateKey(columns: readonly Column[]): string | null {
  const seen = new Set<string>();
  for (const column of columns) {
    if (seen.has(column.key)) return column.key;
    seen.add(column.key);
  }
  return null;
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, Symbol.iterator) === 'function'
  );
}

/**
 * Turn SetData input into a list, or null if it is not a collection.
 * A Map is a single keyed record, not a collection of records.
 */
function toRecordList(records: unknown): readonly unknown[] | null {
  if (Array.isArray(records)) return records;
  if (records instanceof Map) return null;
  if (isIterable(records)) return Array.from(records);
  return null;
}

/**
 * DataTable ingests records and exposes sort, filter and pagination over
 * the resulting rows.
 *
 * @example
 * ```typescript
 * const table = new DataTable({ pageSize: 10 });
 * table.setData([
 *   { id: 2, name: 'Bob' },
 *   { id: 1, name: 'Alice' },
 * ]);
 *
 * table.sortByColumn(0, false);
 * table.getCellDisplayValue(0, 1); // "Alice"
 *
 * const bobs = table.filter('bob');
 * bobs.totalRowCount; // 1
 * ```
 */
export class DataTable {
  private _columns: readonly Column[];
  /** Row storage; indices into it are stable for the table's lifetime */
  private arena: Row[] = [];
  /** Current view, as arena indices */
  private order: number[] = [];
  /** Ingestion order, as arena indices */
  private natural: number[] = [];
  private _sortColumnIndex: number | null = null;
  private _sortDescending = false;
  private _pageSize: number;

  /**
   * @throws SchemaError if two columns share a key
   */
  constructor(options: DataTableOptions = {}) {
    const columns = options.columns ?? [];
    const duplicate = findDuplicateKey(columns);
    if (duplicate !== null) {
      throw new SchemaError('duplicate-key', `Duplicate column key "${duplicate}"`);
    }
    this._columns = [...columns];
    this._pageSize = clampPageSize(options.pageSize ?? DEFAULT_PAGE_SIZE);
  }

  // =========================================
  // State
  // =========================================

  get columns(): readonly Column[] {
    return this._columns;
  }

  /** Rows in current (possibly sorted) order */
  get rows(): readonly Row[] {
    return this.order.map((index) => this.arena[index]);
  }

  /** Rows in ingestion order */
  get naturalOrder(): readonly Row[] {
    return this.natural.map((index) => this.arena[index]);
  }

  /** Index of the sorted column, or null when unsorted */
  get sortColumnIndex(): number | null {
    return this._sortColumnIndex;
  }

  get sortDescending(): boolean {
    return this._sortDescending;
  }

  get pageSize(): number {
    return this._pageSize;
  }

  get totalRowCount(): number {
    return this.order.length;
  }

  /**
   * Column headers in display order
   */
  getColumnNames(): string[] {
    return this._columns.map((column) => column.header);
  }

  // =========================================
  // Configuration
  // =========================================

  /**
   * Replace the column list. Existing rows no longer line up with the new
   * columns, so they are dropped and the sort is cleared.
   */
  setColumns(columns: readonly Column[]): Result<void, SchemaError> {
    const duplicate = findDuplicateKey(columns);
    if (duplicate !== null) {
      return err(new SchemaError('duplicate-key', `Duplicate column key "${duplicate}"`));
    }
    this._columns = [...columns];
    this.clearRows();
    return ok();
  }

  /**
   * Set rows per page; values below 1 are clamped to 1
   */
  setPageSize(size: number): void {
    this._pageSize = clampPageSize(size);
  }

  // =========================================
  // Ingestion
  // =========================================

  /**
   * Replace all rows with rows built from `records`.
   *
   * Prior rows are cleared before the input is validated, so a failed call
   * leaves the table empty. Columns are inferred from the first record when
   * none are set. Fields missing from a record become empty text cells.
   */
  setData(records: unknown): Result<void, IngestionError | SchemaError> {
    this.clearRows();

    const list = toRecordList(records);
    if (list === null) {
      return err(
        new IngestionError(
          'not-a-collection',
          `Expected a collection of records, got ${describeValue(records)}`
        )
      );
    }

    if (this._columns.length === 0 && list.length > 0) {
      const inferred = inferColumns(list[0]);
      if (!inferred.ok) {
        return inferred;
      }
      this._columns = inferred.value;
    }

    // Indexed so holes in a sparse array still become (empty) rows
    for (let id = 0; id < list.length; id++) {
      this.appendRow(this.buildRow(list[id], id));
    }
    return ok();
  }

  /**
   * Append one row from positional values, one per column
   */
  addRow(...values: unknown[]): Result<void, IngestionError> {
    if (values.length !== this._columns.length) {
      return err(
        new IngestionError(
          'arity-mismatch',
          `Expected ${this._columns.length} values, got ${values.length}`
        )
      );
    }

    const cells = this._columns.map((column, i) => createCell(values[i], column.type));
    this.appendRow(
      Object.freeze({ id: this.arena.length, cells: Object.freeze(cells), source: values })
    );
    return ok();
  }

  private clearRows(): void {
    this.arena = [];
    this.order = [];
    this.natural = [];
    this._sortColumnIndex = null;
    this._sortDescending = false;
  }

  private appendRow(row: Row): void {
    const index = this.arena.length;
    this.arena.push(row);
    this.order.push(index);
    this.natural.push(index);
  }

  private buildRow(record: unknown, id: number): Row {
    const cells = this._columns.map((column): Cell => {
      if (column.accessor) {
        return createCell(column.accessor(record), column.type);
      }
      // A missing field reads as undefined, which becomes empty text
      const lookup = readField(record, column.key);
      return createCell(lookup.found ? lookup.value : undefined, column.type);
    });
    return Object.freeze({ id, cells: Object.freeze(cells), source: record });
  }

  // =========================================
  // Sorting
  // =========================================

  /**
   * Sort rows in place by one column.
   *
   * The sort is stable: rows that compare equal keep their current relative
   * order in either direction.
   */
  sortByColumn(columnIndex: number, descending: boolean): Result<void, SortError> {
    const column = Number.isInteger(columnIndex) ? this._columns[columnIndex] : undefined;
    if (column === undefined) {
      return err(
        new SortError('invalid-index', columnIndex, `Invalid column index: ${columnIndex}`)
      );
    }
    if (!column.sortable) {
      return err(
        new SortError('not-sortable', columnIndex, `Column ${column.header} is not sortable`)
      );
    }

    this._sortColumnIndex = columnIndex;
    this._sortDescending = descending;

    const arena = this.arena;
    this.order.sort((a, b) => {
      const result = compareCells(arena[a].cells[columnIndex], arena[b].cells[columnIndex]);
      return descending ? -result : result;
    });
    return ok();
  }

  /**
   * Restore ingestion order and forget the sort column
   */
  clearSort(): void {
    this._sortColumnIndex = null;
    this._sortDescending = false;
    this.order = [...this.natural];
  }

  // =========================================
  // Filtering
  // =========================================

  /**
   * Derive a table holding the rows where any searchable column's display
   * text contains `needle`, ignoring case.
   *
   * An empty needle returns this same instance. Otherwise the result is
   * independent of this table: it shares the (immutable) columns and rows
   * but owns its ordering, and its natural order is the filtered order.
   */
  filter(needle: string): DataTable {
    if (needle === '') {
      return this;
    }

    const term = needle.toLowerCase();
    const derived = new DataTable({ pageSize: this._pageSize });
    derived._columns = this._columns;
    derived._sortColumnIndex = this._sortColumnIndex;
    derived._sortDescending = this._sortDescending;

    for (const index of this.order) {
      const row = this.arena[index];
      if (this.rowMatches(row, term)) {
        derived.appendRow(row);
      }
    }
    return derived;
  }

  private rowMatches(row: Row, term: string): boolean {
    return this._columns.some(
      (column, i) =>
        column.searchable && this.formatCell(row.cells[i], column).toLowerCase().includes(term)
    );
  }

  // =========================================
  // Pagination
  // =========================================

  /**
   * Rows on a page (0-based). Pages past the end are empty.
   */
  getPage(pageIndex: number): Row[] {
    if (!Number.isInteger(pageIndex) || pageIndex < 0) {
      return [];
    }
    const start = pageIndex * this._pageSize;
    if (start >= this.order.length) {
      return [];
    }
    const end = Math.min(this.order.length, start + this._pageSize);
    return this.order.slice(start, end).map((index) => this.arena[index]);
  }

  /**
   * Number of pages; an empty table still has one (empty) page
   */
  getTotalPages(): number {
    if (this.order.length === 0) {
      return 1;
    }
    return Math.ceil(this.order.length / this._pageSize);
  }

  // =========================================
  // Cell access
  // =========================================

  /**
   * Cell at a position in the current row order
   */
  getCell(rowIndex: number, columnIndex: number): Cell | undefined {
    const arenaIndex = this.order[rowIndex];
    if (arenaIndex === undefined) return undefined;
    return this.arena[arenaIndex].cells[columnIndex];
  }

  /**
   * Display text of a cell, formatted by its column.
   * Out-of-range positions give an empty string.
   */
  getCellDisplayValue(rowIndex: number, columnIndex: number): string {
    const column = this._columns[columnIndex];
    const cell = this.getCell(rowIndex, columnIndex);
    if (column === undefined || cell === undefined) {
      return '';
    }
    return this.formatCell(cell, column);
  }

  private formatCell(cell: Cell, column: Column): string {
    return (column.formatter ?? defaultFormatter)(cell.value);
  }
}
