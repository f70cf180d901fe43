import { describe, it, expect } from 'vitest';
import { EMPTY_TEXT, cellValueText, compareCells, createCell, toCellValue } from '@/table/Cell';

describe('Cell', () => {
  describe('toCellValue', () => {
    it('should map null and undefined to empty text', () => {
      expect(toCellValue(undefined, 'date')).toBe(EMPTY_TEXT);
      expect(toCellValue(null, 'integer')).toBe(EMPTY_TEXT);
      expect(EMPTY_TEXT).toEqual({ kind: 'text', value: '' });
    });

    describe('integer columns', () => {
      it('should read numbers and numeric text', () => {
        expect(toCellValue(42, 'integer')).toEqual({ kind: 'integer', value: 42 });
        expect(toCellValue('42', 'integer')).toEqual({ kind: 'integer', value: 42 });
        expect(toCellValue(' -7 ', 'integer')).toEqual({ kind: 'integer', value: -7 });
        expect(toCellValue(10n, 'integer')).toEqual({ kind: 'integer', value: 10 });
      });

      it('should keep integers beyond the safe range exact', () => {
        expect(toCellValue(9007199254740993n, 'integer')).toEqual({
          kind: 'integer',
          value: 9007199254740993n,
        });
        expect(toCellValue('12345678901234567890', 'integer')).toEqual({
          kind: 'integer',
          value: 12345678901234567890n,
        });
      });

      it('should keep numeric text as written', () => {
        expect(toCellValue('007', 'integer')).toEqual({ kind: 'integer', value: 7, text: '007' });
        expect(toCellValue(' +5 ', 'integer')).toEqual({ kind: 'integer', value: 5, text: '+5' });
        expect(toCellValue('1e3', 'integer')).toEqual({ kind: 'integer', value: 1000, text: '1e3' });
      });

      it('should keep fractional values as floats', () => {
        expect(toCellValue('4.5', 'integer')).toEqual({ kind: 'float', value: 4.5 });
      });

      it('should keep unreadable values as unparsed text', () => {
        expect(toCellValue('abc', 'integer')).toEqual({ kind: 'unparsed', raw: 'abc' });
        expect(toCellValue(true, 'integer')).toEqual({ kind: 'unparsed', raw: 'true' });
      });
    });

    describe('float columns', () => {
      it('should read numbers and numeric text', () => {
        expect(toCellValue(3, 'float')).toEqual({ kind: 'float', value: 3 });
        expect(toCellValue('3.5', 'float')).toEqual({ kind: 'float', value: 3.5 });
        expect(toCellValue('1e3', 'float')).toEqual({ kind: 'float', value: 1000, text: '1e3' });
        expect(toCellValue('.5', 'float')).toEqual({ kind: 'float', value: 0.5, text: '.5' });
      });

      it('should read bigints as floats', () => {
        expect(toCellValue(10n, 'float')).toEqual({ kind: 'float', value: 10 });
      });

      it('should keep non-finite and unreadable values as unparsed text', () => {
        expect(toCellValue('N/A', 'float')).toEqual({ kind: 'unparsed', raw: 'N/A' });
        expect(toCellValue(NaN, 'float')).toEqual({ kind: 'unparsed', raw: 'NaN' });
        expect(toCellValue('', 'float')).toEqual({ kind: 'unparsed', raw: '' });
      });
    });

    describe('boolean columns', () => {
      it('should read booleans and true/false text in any case', () => {
        expect(toCellValue(true, 'boolean')).toEqual({ kind: 'boolean', value: true });
        expect(toCellValue('TRUE', 'boolean')).toEqual({ kind: 'boolean', value: true });
        expect(toCellValue(' False ', 'boolean')).toEqual({ kind: 'boolean', value: false });
      });

      it('should keep other values as unparsed text', () => {
        expect(toCellValue('yes', 'boolean')).toEqual({ kind: 'unparsed', raw: 'yes' });
        expect(toCellValue(1, 'boolean')).toEqual({ kind: 'unparsed', raw: '1' });
      });
    });

    describe('date columns', () => {
      it('should keep valid dates', () => {
        const date = new Date(Date.UTC(2024, 0, 15));
        expect(toCellValue(date, 'date')).toEqual({ kind: 'date', value: date });
      });

      it('should copy the source date', () => {
        const date = new Date(Date.UTC(2024, 0, 1));
        const value = toCellValue(date, 'date');

        date.setUTCFullYear(2030);

        expect(value.kind).toBe('date');
        if (value.kind === 'date') {
          expect(value.value).not.toBe(date);
          expect(value.value.getTime()).toBe(Date.UTC(2024, 0, 1));
        }
      });

      it('should read epoch milliseconds', () => {
        expect(toCellValue(0, 'date')).toEqual({ kind: 'date', value: new Date(0) });
      });

      it('should parse date text', () => {
        const value = toCellValue('2024-01-15 09:30:00', 'date');
        expect(value.kind).toBe('date');
        if (value.kind === 'date') {
          expect(value.value.getTime()).toBe(Date.UTC(2024, 0, 15, 9, 30, 0));
        }
      });

      it('should keep impossible dates as unparsed text', () => {
        expect(toCellValue('2024-02-30', 'date')).toEqual({ kind: 'unparsed', raw: '2024-02-30' });
        expect(toCellValue(new Date(NaN), 'date')).toEqual({
          kind: 'unparsed',
          raw: 'Invalid Date',
        });
      });
    });

    describe('text columns', () => {
      it('should stringify any value', () => {
        expect(toCellValue('Alice', 'text')).toEqual({ kind: 'text', value: 'Alice' });
        expect(toCellValue(42, 'text')).toEqual({ kind: 'text', value: '42' });
        expect(toCellValue(false, 'text')).toEqual({ kind: 'text', value: 'false' });
      });

      it('should print dates as YYYY-MM-DD', () => {
        expect(toCellValue(new Date(Date.UTC(2023, 11, 1)), 'text')).toEqual({
          kind: 'text',
          value: '2023-12-01',
        });
      });
    });
  });

  describe('createCell', () => {
    it('should create a frozen cell carrying the column type', () => {
      const cell = createCell('7', 'integer');
      expect(cell).toEqual({ value: { kind: 'integer', value: 7 }, type: 'integer' });
      expect(Object.isFrozen(cell)).toBe(true);
    });
  });

  describe('cellValueText', () => {
    it('should give the canonical text of each kind', () => {
      expect(cellValueText({ kind: 'text', value: 'x' })).toBe('x');
      expect(cellValueText({ kind: 'integer', value: 12 })).toBe('12');
      expect(cellValueText({ kind: 'integer', value: 12345678901234567890n })).toBe(
        '12345678901234567890'
      );
      expect(cellValueText({ kind: 'integer', value: 7, text: '007' })).toBe('007');
      expect(cellValueText({ kind: 'float', value: 2.5 })).toBe('2.5');
      expect(cellValueText({ kind: 'boolean', value: true })).toBe('true');
      expect(cellValueText({ kind: 'date', value: new Date(Date.UTC(2024, 5, 9)) })).toBe(
        '2024-06-09'
      );
      expect(cellValueText({ kind: 'unparsed', raw: 'N/A' })).toBe('N/A');
    });
  });

  describe('compareCells', () => {
    it('should compare text case-insensitively', () => {
      expect(compareCells(createCell('apple', 'text'), createCell('Banana', 'text'))).toBe(-1);
      expect(compareCells(createCell('ABC', 'text'), createCell('abc', 'text'))).toBe(0);
    });

    it('should compare numbers numerically', () => {
      expect(compareCells(createCell('9', 'integer'), createCell('10', 'integer'))).toBe(-1);
      expect(compareCells(createCell(2.5, 'float'), createCell(2.25, 'float'))).toBe(1);
      expect(compareCells(createCell(4, 'integer'), createCell(4, 'integer'))).toBe(0);
    });

    it('should compare integers beyond the safe range exactly', () => {
      const larger = createCell(9007199254740993n, 'integer');
      const smaller = createCell(9007199254740992n, 'integer');
      expect(compareCells(larger, smaller)).toBe(1);
      expect(compareCells(smaller, larger)).toBe(-1);
      expect(compareCells(larger, createCell('9007199254740993', 'integer'))).toBe(0);
    });

    it('should compare bigints with plain numbers', () => {
      const big = createCell(9007199254740993n, 'integer');
      const plain = createCell(9007199254740992, 'integer');
      expect(compareCells(big, plain)).toBe(1);
      expect(compareCells(plain, big)).toBe(-1);
      const negative = createCell('-9007199254740993', 'integer');
      expect(compareCells(negative, createCell(-1.5, 'integer'))).toBe(-1);
    });

    it('should compare dates chronologically', () => {
      const earlier = createCell('12/31/2023', 'date');
      const later = createCell('2024-01-01', 'date');
      expect(compareCells(earlier, later)).toBe(-1);
      expect(compareCells(later, earlier)).toBe(1);
    });

    it('should order false before true', () => {
      expect(compareCells(createCell(false, 'boolean'), createCell(true, 'boolean'))).toBe(-1);
    });

    it('should order parsed values before unparsed ones', () => {
      const parsed = createCell('3.5', 'float');
      const unparsed = createCell('N/A', 'float');
      expect(compareCells(parsed, unparsed)).toBe(-1);
      expect(compareCells(unparsed, parsed)).toBe(1);
    });

    it('should compare unparsed values lexically', () => {
      expect(compareCells(createCell('N/A', 'float'), createCell('abc', 'float'))).toBe(-1);
      expect(compareCells(createCell('n/a', 'date'), createCell('n/a', 'date'))).toBe(0);
    });

    it('should order missing values after present ones', () => {
      expect(compareCells(createCell(undefined, 'integer'), createCell(1, 'integer'))).toBe(1);
    });
  });
});
