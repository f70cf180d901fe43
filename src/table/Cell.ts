/**
 * Cell values - normalisation and comparison
 *
 * Raw record values are normalised into a typed `CellValue` according to the
 * column's semantic type. Values that cannot be read as that type are kept
 * as `unparsed` text, and the comparator degrades to lexical ordering for
 * them instead of failing.
 */

import type { Cell, CellValue, DataType } from '../core/types';
import { formatDate, isValidDate, parseDate } from '../data/DateParser';

/** Value used for fields that cannot be resolved on a record */
export const EMPTY_TEXT: CellValue = Object.freeze<CellValue>({ kind: 'text', value: '' });

const INTEGER_PATTERN = /^[+-]?\d+$/;
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\d*\.?\d+)([eE][+-]?\d+)?$/;

/**
 * Plain text for a raw value, used when it cannot be typed
 */
function rawText(raw: unknown): string {
  if (typeof raw === 'string') return raw;
  if (isValidDate(raw)) return formatDate(raw);
  return String(raw);
}

type NumericValue = Extract<CellValue, { kind: 'integer' | 'float' }>;

function numericFromText(trimmed: string, integral: boolean): NumericValue | null {
  if (!NUMBER_PATTERN.test(trimmed)) return null;
  const n = Number(trimmed);
  if (!Number.isFinite(n)) return null;

  let value: NumericValue;
  if (integral && INTEGER_PATTERN.test(trimmed) && !Number.isSafeInteger(n)) {
    value = { kind: 'integer', value: BigInt(trimmed) };
  } else if (integral && Number.isInteger(n)) {
    value = { kind: 'integer', value: n };
  } else {
    value = { kind: 'float', value: n };
  }

  // Keep the text as written when it differs from the canonical form
  return cellValueText(value) === trimmed ? value : { ...value, text: trimmed };
}

function toNumeric(raw: unknown, integral: boolean): CellValue {
  if (typeof raw === 'bigint') {
    if (!integral) return { kind: 'float', value: Number(raw) };
    const n = Number(raw);
    return { kind: 'integer', value: Number.isSafeInteger(n) ? n : raw };
  }

  if (typeof raw === 'number' && Number.isFinite(raw)) {
    if (integral && Number.isInteger(raw)) {
      return { kind: 'integer', value: raw };
    }
    return { kind: 'float', value: raw };
  }

  if (typeof raw === 'string') {
    const value = numericFromText(raw.trim(), integral);
    if (value) return value;
  }

  return { kind: 'unparsed', raw: rawText(raw) };
}

function toBoolean(raw: unknown): CellValue {
  if (typeof raw === 'boolean') {
    return { kind: 'boolean', value: raw };
  }
  if (typeof raw === 'string') {
    const lower = raw.trim().toLowerCase();
    if (lower === 'true') return { kind: 'boolean', value: true };
    if (lower === 'false') return { kind: 'boolean', value: false };
  }
  return { kind: 'unparsed', raw: rawText(raw) };
}

function toDateValue(raw: unknown): CellValue {
  // Copied so later changes to the caller's Date do not reach the cell
  if (isValidDate(raw)) {
    return { kind: 'date', value: new Date(raw.getTime()) };
  }
  // Epoch milliseconds
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    return { kind: 'date', value: new Date(raw) };
  }
  if (typeof raw === 'string') {
    const parsed = parseDate(raw);
    if (parsed) return { kind: 'date', value: parsed };
  }
  return { kind: 'unparsed', raw: rawText(raw) };
}

/**
 * Normalise a raw record value into a typed cell value
 *
 * @example
 * ```typescript
 * toCellValue('42', 'integer');   // { kind: 'integer', value: 42 }
 * toCellValue('007', 'integer');  // { kind: 'integer', value: 7, text: '007' }
 * toCellValue('N/A', 'float');    // { kind: 'unparsed', raw: 'N/A' }
 * toCellValue(undefined, 'date'); // { kind: 'text', value: '' }
 * ```
 */
export function toCellValue(raw: unknown, type: DataType): CellValue {
  if (raw === null || raw === undefined) {
    return EMPTY_TEXT;
  }

  switch (type) {
    case 'integer':
      return toNumeric(raw, true);
    case 'float':
      return toNumeric(raw, false);
    case 'boolean':
      return toBoolean(raw);
    case 'date':
      return toDateValue(raw);
    case 'text':
      return { kind: 'text', value: rawText(raw) };
  }
}

/**
 * Create a cell for a column of the given type
 */
export function createCell(raw: unknown, type: DataType): Cell {
  return Object.freeze({ value: toCellValue(raw, type), type });
}

/**
 * Canonical text of a cell value (no display formatting applied)
 */
export function cellValueText(value: CellValue): string {
  switch (value.kind) {
    case 'text':
      return value.value;
    case 'integer':
    case 'float':
      return value.text ?? String(value.value);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'date':
      return formatDate(value.value);
    case 'unparsed':
      return value.raw;
  }
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareNumbers(a: number, b: number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareBigInts(a: bigint, b: bigint): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Exact comparison of a bigint with a finite number
 */
function compareBigIntToNumber(big: bigint, n: number): number {
  const whole = Math.trunc(n);
  const result = compareBigInts(big, BigInt(whole));
  if (result !== 0) return result;
  // Same whole part: the fraction decides
  return compareNumbers(0, n - whole);
}

function compareNumeric(a: number | bigint, b: number | bigint): number {
  if (typeof a === 'bigint') {
    return typeof b === 'bigint' ? compareBigInts(a, b) : compareBigIntToNumber(a, b);
  }
  return typeof b === 'bigint' ? 0 - compareBigIntToNumber(b, a) : compareNumbers(a, b);
}

/**
 * Compare two values of a typed column.
 *
 * Values `extract` can read are compared with `compare`; values it cannot
 * read order after them and compare lexically among themselves.
 */
function compareTyped<T>(
  a: CellValue,
  b: CellValue,
  extract: (value: CellValue) => T | null,
  compare: (x: T, y: T) => number
): number {
  const x = extract(a);
  const y = extract(b);

  if (x !== null && y !== null) return compare(x, y);
  if (x === null && y === null) return compareText(cellValueText(a), cellValueText(b));
  return x !== null ? -1 : 1;
}

const numericOf = (value: CellValue): number | bigint | null =>
  value.kind === 'integer' || value.kind === 'float' ? value.value : null;

const booleanOf = (value: CellValue): number | null =>
  value.kind === 'boolean' ? Number(value.value) : null;

const timeOf = (value: CellValue): number | null =>
  value.kind === 'date' ? value.value.getTime() : null;

/**
 * Compare two cells of the same column.
 *
 * @returns Negative if a sorts before b, positive if after, 0 if equal
 */
export function compareCells(a: Cell, b: Cell): number {
  switch (a.type) {
    case 'text':
      return compareText(
        cellValueText(a.value).toLowerCase(),
        cellValueText(b.value).toLowerCase()
      );
    case 'integer':
    case 'float':
      return compareTyped(a.value, b.value, numericOf, compareNumeric);
    case 'boolean':
      return compareTyped(a.value, b.value, booleanOf, compareNumbers);
    case 'date':
      return compareTyped(a.value, b.value, timeOf, compareNumbers);
  }
}
