import { describe, it, expect } from 'vitest';
import { DATE_LAYOUTS, formatDate, formatDateTime, isValidDate, parseDate } from '@/data/DateParser';

const utc = (...parts: [number, number, number, number?, number?, number?]) =>
  Date.UTC(parts[0], parts[1] - 1, parts[2], parts[3] ?? 0, parts[4] ?? 0, parts[5] ?? 0);

describe('DateParser', () => {
  describe('parseDate', () => {
    it('should parse every supported layout', () => {
      expect(parseDate('2024-03-05')?.getTime()).toBe(utc(2024, 3, 5));
      expect(parseDate('2024-03-05 14:07:09')?.getTime()).toBe(utc(2024, 3, 5, 14, 7, 9));
      expect(parseDate('03/05/2024')?.getTime()).toBe(utc(2024, 3, 5));
      expect(parseDate('03-05-2024')?.getTime()).toBe(utc(2024, 3, 5));
      expect(parseDate('2024/03/05')?.getTime()).toBe(utc(2024, 3, 5));
    });

    it('should ignore surrounding whitespace', () => {
      expect(parseDate('  2024-03-05 ')?.getTime()).toBe(utc(2024, 3, 5));
    });

    it('should accept leap days only in leap years', () => {
      expect(parseDate('2024-02-29')?.getTime()).toBe(utc(2024, 2, 29));
      expect(parseDate('2023-02-29')).toBeNull();
    });

    it('should reject out-of-range components', () => {
      expect(parseDate('13/01/2024')).toBeNull();
      expect(parseDate('2024-04-31')).toBeNull();
      expect(parseDate('2024-01-15 24:00:00')).toBeNull();
    });

    it('should keep two-digit years as written', () => {
      const date = parseDate('0099-01-01');
      expect(date).not.toBeNull();
      expect(date?.getUTCFullYear()).toBe(99);
    });

    it('should reject text that is not a date', () => {
      expect(parseDate('N/A')).toBeNull();
      expect(parseDate('')).toBeNull();
      expect(parseDate('2024-3-5')).toBeNull();
    });
  });

  describe('DATE_LAYOUTS', () => {
    it('should list layouts in the order they are tried', () => {
      expect(DATE_LAYOUTS).toEqual([
        'YYYY-MM-DD',
        'YYYY-MM-DD hh:mm:ss',
        'MM/DD/YYYY',
        'MM-DD-YYYY',
        'YYYY/MM/DD',
      ]);
    });
  });

  describe('isValidDate', () => {
    it('should accept only real dates', () => {
      expect(isValidDate(new Date(0))).toBe(true);
      expect(isValidDate(new Date(NaN))).toBe(false);
      expect(isValidDate('2024-01-01')).toBe(false);
    });
  });

  describe('formatDate and formatDateTime', () => {
    it('should print UTC components with padding', () => {
      const date = new Date(utc(2024, 1, 5, 3, 4, 5));
      expect(formatDate(date)).toBe('2024-01-05');
      expect(formatDateTime(date)).toBe('2024-01-05 03:04:05');
    });

    it('should pad short years', () => {
      const date = new Date(0);
      date.setUTCFullYear(7);
      expect(formatDate(date)).toBe('0007-01-01');
    });
  });
});
