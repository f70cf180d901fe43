/**
 * View Actions
 *
 * Headless controller over a DataTable. It owns what the table leaves to
 * its caller: the current page and selection, the three-state sort cycle,
 * and the filtered table produced by a search. Input handling and rendering
 * stay outside; they call these methods and read `state`.
 */

import type { Result, Row } from './types';
import { ok } from './types';
import type { IngestionError, SchemaError, SortError } from './errors';
import { EventEmitter } from './EventEmitter';
import { computed, type Computed } from './Signal';
import { createViewState, resetPosition, resetViewState, type ViewState } from './State';
import { DataTable, clampPageSize } from '../table/DataTable';

export const DEFAULT_PAGE_SIZE_STEP = 5;

/**
 * Options for TableActions
 */
export interface TableActionsOptions {
  /** Rows per page (default: the table's page size) */
  pageSize?: number;
  /** Amount growPageSize/shrinkPageSize change the page size by (default: 5) */
  pageSizeStep?: number;
  /** Allow toggleSort/clearSort (default: true) */
  sorting?: boolean;
  /** Allow search (default: true) */
  search?: boolean;
}

/**
 * Events raised by TableActions
 */
export interface TableActionEvents {
  select: { row: Row; pageIndex: number; rowIndex: number };
  sort: { columnIndex: number | null; descending: boolean };
  search: { term: string; matches: number };
  refresh: { rowCount: number };
}

/**
 * TableActions drives a DataTable on behalf of an interactive view
 *
 * @example
 * ```typescript
 * const actions = new TableActions(new DataTable(), { pageSize: 20 });
 * actions.setData(records);
 * actions.events.on('sort', ({ columnIndex, descending }) => { ... });
 *
 * actions.toggleSort(1); // ascending
 * actions.toggleSort(1); // descending
 * actions.toggleSort(1); // back to natural order
 * ```
 */
export class TableActions {
  readonly state: ViewState;
  readonly events = new EventEmitter<TableActionEvents>();
  /** Page count of the current (possibly filtered) table */
  readonly totalPages: Computed<number>;

  private filtered: DataTable | null = null;
  private readonly pageSizeStep: number;
  private readonly sortingEnabled: boolean;
  private readonly searchEnabled: boolean;

  constructor(
    private readonly table: DataTable,
    options: TableActionsOptions = {}
  ) {
    this.pageSizeStep = Math.max(1, options.pageSizeStep ?? DEFAULT_PAGE_SIZE_STEP);
    this.sortingEnabled = options.sorting ?? true;
    this.searchEnabled = options.search ?? true;

    const pageSize = clampPageSize(options.pageSize ?? table.pageSize);
    table.setPageSize(pageSize);
    this.state = createViewState(pageSize);
    this.syncSortState();

    this.totalPages = computed(
      () => this.currentTable().getTotalPages(),
      [this.state.revision, this.state.searchTerm, this.state.pageSize]
    );
  }

  // =========================================
  // Tables
  // =========================================

  /**
   * The underlying, unfiltered table
   */
  getTable(): DataTable {
    return this.table;
  }

  /**
   * The filtered table while searching, otherwise the underlying table
   */
  currentTable(): DataTable {
    return this.filtered ?? this.table;
  }

  isSearching(): boolean {
    return this.filtered !== null;
  }

  // =========================================
  // Data Loading
  // =========================================

  /**
   * Load new records, dropping any search and moving back to the first page
   */
  setData(records: unknown): Result<void, IngestionError | SchemaError> {
    const result = this.table.setData(records);
    if (!result.ok) {
      console.error('[TableActions] Failed to load data:', result.error.message);
    }

    // The table is emptied even on failure, so the view resets either way
    this.filtered = null;
    resetViewState(this.state);
    return result;
  }

  /**
   * Reload records and notify `refresh` listeners
   */
  refresh(records: unknown): Result<void, IngestionError | SchemaError> {
    const result = this.setData(records);
    this.events.emit('refresh', { rowCount: this.table.totalRowCount });
    return result;
  }

  // =========================================
  // Sort Actions
  // =========================================

  /**
   * Advance the sort cycle for a column:
   * unsorted → ascending → descending → unsorted.
   * A column other than the sorted one starts at ascending.
   */
  toggleSort(columnIndex: number): Result<void, SortError> {
    if (!this.sortingEnabled) {
      return ok();
    }

    const table = this.table;
    let result: Result<void, SortError>;
    if (table.sortColumnIndex === columnIndex && table.sortDescending) {
      table.clearSort();
      result = ok();
    } else {
      result = table.sortByColumn(columnIndex, table.sortColumnIndex === columnIndex);
    }

    if (!result.ok) {
      console.warn(`[TableActions] ${result.error.message}`);
      return result;
    }

    this.afterSortChange();
    return result;
  }

  /**
   * Restore natural order
   */
  clearSort(): void {
    if (!this.sortingEnabled) {
      return;
    }
    this.table.clearSort();
    this.afterSortChange();
  }

  private afterSortChange(): void {
    // Re-derive so the filtered rows follow the new order
    const term = this.state.searchTerm.get();
    if (this.filtered !== null) {
      this.filtered = this.table.filter(term);
    }

    this.syncSortState();
    this.rowsChanged();
    this.events.emit('sort', {
      columnIndex: this.table.sortColumnIndex,
      descending: this.table.sortDescending,
    });
  }

  private syncSortState(): void {
    this.state.sortColumn.set(this.table.sortColumnIndex);
    this.state.sortDescending.set(this.table.sortDescending);
  }

  // =========================================
  // Search Actions
  // =========================================

  /**
   * Show only rows containing `term` (case-insensitive); an empty term
   * shows every row again
   */
  search(term: string): void {
    if (!this.searchEnabled) {
      return;
    }

    const result = this.table.filter(term);
    // filter('') hands back the table itself: no filter is active
    this.filtered = result === this.table ? null : result;
    this.state.searchTerm.set(term);
    this.rowsChanged();
    this.events.emit('search', { term, matches: this.currentTable().totalRowCount });
  }

  clearSearch(): void {
    this.search('');
  }

  // =========================================
  // Paging Actions
  // =========================================

  /**
   * Rows on the current page
   */
  getPageRows(): Row[] {
    return this.currentTable().getPage(this.state.currentPage.get());
  }

  /**
   * Go to a page, clamped to the valid range
   */
  goToPage(pageIndex: number): void {
    const last = this.totalPages.get() - 1;
    const target = Math.min(Math.max(0, Math.floor(pageIndex)), last);
    this.state.currentPage.set(Number.isFinite(target) ? target : 0);
    this.state.selectedRow.set(0);
  }

  /**
   * @returns false if already on the last page
   */
  nextPage(): boolean {
    const page = this.state.currentPage.get();
    if (page >= this.totalPages.get() - 1) {
      return false;
    }
    this.goToPage(page + 1);
    return true;
  }

  /**
   * @returns false if already on the first page
   */
  previousPage(): boolean {
    const page = this.state.currentPage.get();
    if (page <= 0) {
      return false;
    }
    this.goToPage(page - 1);
    return true;
  }

  firstPage(): void {
    this.goToPage(0);
  }

  lastPage(): void {
    this.goToPage(this.totalPages.get() - 1);
  }

  /**
   * Set rows per page and go back to the first page
   */
  setPageSize(size: number): void {
    const pageSize = clampPageSize(size);
    this.table.setPageSize(pageSize);
    this.filtered?.setPageSize(pageSize);
    this.state.pageSize.set(pageSize);
    resetPosition(this.state);
  }

  growPageSize(): void {
    this.setPageSize(this.state.pageSize.get() + this.pageSizeStep);
  }

  /**
   * Shrink the page size by one step, unless that would leave less than
   * one step
   */
  shrinkPageSize(): void {
    const size = this.state.pageSize.get();
    if (size > this.pageSizeStep) {
      this.setPageSize(size - this.pageSizeStep);
    }
  }

  // =========================================
  // Row Selection Actions
  // =========================================

  /**
   * Move the selection within the current page, stopping at its edges
   */
  moveSelection(delta: number): void {
    const count = this.getPageRows().length;
    const next = this.state.selectedRow.get() + delta;
    this.state.selectedRow.set(Math.max(0, Math.min(next, count - 1)));
  }

  /**
   * The selected row, if the current page has one at the selected position
   */
  getSelectedRow(): Row | undefined {
    return this.getPageRows()[this.state.selectedRow.get()];
  }

  /**
   * Notify `select` listeners of the selected row
   *
   * @returns The selected row, or undefined if there is none
   */
  select(): Row | undefined {
    const row = this.getSelectedRow();
    if (row !== undefined) {
      this.events.emit('select', {
        row,
        pageIndex: this.state.currentPage.get(),
        rowIndex: this.state.selectedRow.get(),
      });
    }
    return row;
  }

  /**
   * Release subscriptions held by this controller
   */
  dispose(): void {
    this.totalPages.dispose();
    this.events.removeAllListeners();
  }

  private rowsChanged(): void {
    resetPosition(this.state);
    this.state.revision.update((n) => n + 1);
  }
}
