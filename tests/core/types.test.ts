import { describe, it, expect } from 'vitest';
import { ok, err, type CellValue, type Result } from '@/core/types';
import { IngestionError, SchemaError, SortError, describeValue } from '@/core/errors';

describe('Core Types', () => {
  it('should build a successful result', () => {
    const result: Result<number> = ok(3);
    expect(result).toEqual({ ok: true, value: 3 });
  });

  it('should build a void result', () => {
    expect(ok()).toEqual({ ok: true, value: undefined });
  });

  it('should build a failed result', () => {
    const error = new SortError('invalid-index', 7, 'Invalid column index: 7');
    const result = err(error);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe(error);
    }
  });

  it('should allow every cell value kind', () => {
    const values: CellValue[] = [
      { kind: 'text', value: 'a' },
      { kind: 'integer', value: 1 },
      { kind: 'float', value: 1.5 },
      { kind: 'boolean', value: true },
      { kind: 'date', value: new Date(0) },
      { kind: 'unparsed', raw: 'N/A' },
    ];
    expect(values.map((v) => v.kind)).toEqual([
      'text',
      'integer',
      'float',
      'boolean',
      'date',
      'unparsed',
    ]);
  });
});

describe('Errors', () => {
  it('should carry kind and name', () => {
    const ingestion = new IngestionError('not-a-collection', 'bad input');
    const schema = new SchemaError('duplicate-key', 'dup');
    const sort = new SortError('not-sortable', 2, 'no');

    expect(ingestion).toBeInstanceOf(Error);
    expect(ingestion.name).toBe('IngestionError');
    expect(ingestion.kind).toBe('not-a-collection');
    expect(schema.name).toBe('SchemaError');
    expect(schema.kind).toBe('duplicate-key');
    expect(sort.name).toBe('SortError');
    expect(sort.columnIndex).toBe(2);
    expect(sort.message).toBe('no');
  });

  it('should describe runtime shapes', () => {
    expect(describeValue(null)).toBe('null');
    expect(describeValue([1])).toBe('array');
    expect(describeValue(new Map())).toBe('Map');
    expect(describeValue({})).toBe('Object');
    expect(describeValue(Object.create(null))).toBe('object');
    expect(describeValue(42)).toBe('number');
    expect(describeValue('x')).toBe('string');
  });
});
