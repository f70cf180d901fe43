/**
 * View State Store
 *
 * Reactive state a caller keeps next to a DataTable while presenting it:
 * which page is shown, which row is selected, the active search and sort.
 * The table itself never reads these; TableActions keeps them in sync.
 */

import { createSignal, type Signal } from './Signal';

/**
 * ViewState interface - all reactive state of one table view
 */
export interface ViewState {
  // Position
  /** Current page index (0-based) */
  currentPage: Signal<number>;
  /** Selected row, relative to the current page */
  selectedRow: Signal<number>;

  // Paging
  /** Rows per page */
  pageSize: Signal<number>;

  // Search
  /** Active search term; empty when not searching */
  searchTerm: Signal<string>;

  // Sorting
  /** Sorted column index, or null when unsorted */
  sortColumn: Signal<number | null>;
  sortDescending: Signal<boolean>;

  // Data
  /** Incremented whenever the visible rows change */
  revision: Signal<number>;
}

/**
 * Create a new ViewState with default values
 *
 * @example
 * ```typescript
 * const state = createViewState(25);
 * state.currentPage.subscribe(page => console.log('Page:', page));
 * state.currentPage.set(2);
 * ```
 */
export function createViewState(pageSize: number): ViewState {
  return {
    currentPage: createSignal(0),
    selectedRow: createSignal(0),
    pageSize: createSignal(pageSize),
    searchTerm: createSignal(''),
    sortColumn: createSignal<number | null>(null),
    sortDescending: createSignal(false),
    revision: createSignal(0),
  };
}

/**
 * Move back to the first row of the first page
 */
export function resetPosition(state: ViewState): void {
  state.currentPage.set(0);
  state.selectedRow.set(0);
}

/**
 * Reset everything except the page size, as after loading new data
 */
export function resetViewState(state: ViewState): void {
  resetPosition(state);
  state.searchTerm.set('');
  state.sortColumn.set(null);
  state.sortDescending.set(false);
  state.revision.update((n) => n + 1);
}
