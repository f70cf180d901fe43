import { describe, it, expect } from 'vitest';
import { createColumn, defaultWidth } from '@/table/Column';
import { currencyFormatter, defaultFormatter } from '@/table/Formatters';

describe('Column', () => {
  describe('createColumn', () => {
    it('should fill in defaults', () => {
      const column = createColumn({ key: 'name' });

      expect(column.header).toBe('name');
      expect(column.type).toBe('text');
      expect(column.width).toBe(15);
      expect(column.sortable).toBe(true);
      expect(column.searchable).toBe(true);
      expect(column.formatter).toBe(defaultFormatter);
      expect('accessor' in column).toBe(false);
    });

    it('should keep given options', () => {
      const accessor = (record: unknown) => String(record);
      const column = createColumn({
        key: 'salary',
        header: 'Salary',
        type: 'float',
        width: 14,
        sortable: false,
        searchable: false,
        formatter: currencyFormatter,
        accessor,
      });

      expect(column).toEqual({
        key: 'salary',
        header: 'Salary',
        type: 'float',
        width: 14,
        sortable: false,
        searchable: false,
        formatter: currencyFormatter,
        accessor,
      });
    });

    it('should size the width by type', () => {
      expect(createColumn({ key: 'd', type: 'date' }).width).toBe(12);
    });
  });

  describe('defaultWidth', () => {
    it('should return a width per type', () => {
      expect(defaultWidth('integer')).toBe(8);
      expect(defaultWidth('boolean')).toBe(8);
      expect(defaultWidth('float')).toBe(10);
      expect(defaultWidth('date')).toBe(12);
      expect(defaultWidth('text')).toBe(15);
    });
  });
});
