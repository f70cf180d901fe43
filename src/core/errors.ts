/**
 * Error types returned by table operations.
 *
 * They travel inside a `Result`. The one exception is the DataTable
 * constructor, which throws a SchemaError for duplicate column keys.
 */

export type IngestionErrorKind = 'not-a-collection' | 'arity-mismatch';

export class IngestionError extends Error {
  readonly kind: IngestionErrorKind;

  constructor(kind: IngestionErrorKind, message: string) {
    super(message);
    this.name = 'IngestionError';
    this.kind = kind;
  }
}

export type SchemaErrorKind = 'unsupported-record' | 'duplicate-key';

export class SchemaError extends Error {
  readonly kind: SchemaErrorKind;

  constructor(kind: SchemaErrorKind, message: string) {
    super(message);
    this.name = 'SchemaError';
    this.kind = kind;
  }
}

export type SortErrorKind = 'invalid-index' | 'not-sortable';

export class SortError extends Error {
  readonly kind: SortErrorKind;
  /** Column index the sort was requested for */
  readonly columnIndex: number;

  constructor(kind: SortErrorKind, columnIndex: number, message: string) {
    super(message);
    this.name = 'SortError';
    this.kind = kind;
    this.columnIndex = columnIndex;
  }
}

/**
 * Describe the runtime shape of a value for error messages
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Map) return 'Map';
  if (typeof value === 'object') {
    const name = value.constructor?.name;
    return name ? name : 'object';
  }
  return typeof value;
}
