/**
 * Core type definitions for the headless table engine
 */

// Semantic column types; they govern comparison and default formatting
export type DataType = 'text' | 'integer' | 'float' | 'date' | 'boolean';

/**
 * Typed cell value.
 *
 * Integers beyond the safe range are kept as `bigint`. Numbers read from
 * text keep that text in `text` when it differs from the canonical form
 * (`'007'`, `'1e3'`). `unparsed` holds raw text that could not be read as
 * the column's type.
 */
export type CellValue =
  | { kind: 'text'; value: string }
  | { kind: 'integer'; value: number | bigint; text?: string }
  | { kind: 'float'; value: number; text?: string }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'date'; value: Date }
  | { kind: 'unparsed'; raw: string };

// Turns a cell value into display text
export type Formatter = (value: CellValue) => string;

// Extracts a raw value from an input record, bypassing name lookup
export type Accessor = (record: unknown) => unknown;

// Column schema
export interface Column {
  /** Stable identifier used for lookup; unique within a table */
  readonly key: string;
  /** Display label */
  readonly header: string;
  readonly type: DataType;
  /** Display width hint; presentation layers may adjust it */
  width: number;
  readonly sortable: boolean;
  readonly searchable: boolean;
  readonly formatter: Formatter;
  readonly accessor?: Accessor;
}

export interface Cell {
  readonly value: CellValue;
  /** Mirrored from the column when the cell was created */
  readonly type: DataType;
}

export interface Row {
  /** Ingestion sequence number; for traceability only */
  readonly id: number;
  /** Aligned positionally with the table's columns */
  readonly cells: readonly Cell[];
  /** The record that produced this row */
  readonly source: unknown;
}

/**
 * Outcome of an operation that can fail.
 */
export type Result<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok(): Result<void, never>;
export function ok<T>(value: T): Result<T, never>;
export function ok<T>(value?: T): Result<T | undefined, never> {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): Result<never, E> {
  return { ok: false, error };
}
