/**
 * Date parsing for date-typed cells
 *
 * Text is matched against a fixed, ordered list of formats; the first format
 * that yields a real calendar date wins. All dates are interpreted and
 * printed in UTC so results do not depend on the host time zone.
 */

/**
 * A supported textual date format
 */
interface DateFormat {
  /** Human-readable layout, e.g. "YYYY-MM-DD" */
  layout: string;
  regex: RegExp;
  /** Map regex groups to [year, month, day, hours, minutes, seconds] */
  fields: (match: RegExpMatchArray) => number[];
}

const num = (s: string | undefined): number => parseInt(s ?? '0', 10);

// Order matters: the first successful format wins
const DATE_FORMATS: readonly DateFormat[] = [
  {
    layout: 'YYYY-MM-DD',
    regex: /^(\d{4})-(\d{2})-(\d{2})$/,
    fields: (m) => [num(m[1]), num(m[2]), num(m[3]), 0, 0, 0],
  },
  {
    layout: 'YYYY-MM-DD hh:mm:ss',
    regex: /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/,
    fields: (m) => [num(m[1]), num(m[2]), num(m[3]), num(m[4]), num(m[5]), num(m[6])],
  },
  {
    layout: 'MM/DD/YYYY',
    regex: /^(\d{2})\/(\d{2})\/(\d{4})$/,
    fields: (m) => [num(m[3]), num(m[1]), num(m[2]), 0, 0, 0],
  },
  {
    layout: 'MM-DD-YYYY',
    regex: /^(\d{2})-(\d{2})-(\d{4})$/,
    fields: (m) => [num(m[3]), num(m[1]), num(m[2]), 0, 0, 0],
  },
  {
    layout: 'YYYY/MM/DD',
    regex: /^(\d{4})\/(\d{2})\/(\d{2})$/,
    fields: (m) => [num(m[1]), num(m[2]), num(m[3]), 0, 0, 0],
  },
];

/**
 * Layouts accepted by parseDate, in the order they are tried
 */
export const DATE_LAYOUTS: readonly string[] = DATE_FORMATS.map((f) => f.layout);

/**
 * Build a UTC date, rejecting out-of-range components such as Feb 30
 */
function buildDate(
  year: number,
  month: number,
  day: number,
  hours: number,
  minutes: number,
  seconds: number
): Date | null {
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > 31) return null;
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  // Date.UTC maps years 0-99 to 1900-1999
  date.setUTCFullYear(year);

  // Rolled over into the next month: the day does not exist
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Parse text against the accepted date formats
 *
 * @returns The parsed date, or null if no format matches
 *
 * @example
 * ```typescript
 * parseDate('2024-03-05')?.toISOString(); // "2024-03-05T00:00:00.000Z"
 * parseDate('03/05/2024')?.toISOString(); // "2024-03-05T00:00:00.000Z"
 * parseDate('N/A'); // null
 * ```
 */
export function parseDate(text: string): Date | null {
  const trimmed = text.trim();
  for (const format of DATE_FORMATS) {
    const match = trimmed.match(format.regex);
    if (!match) continue;

    const [year, month, day, hours, minutes, seconds] = format.fields(match);
    const date = buildDate(year, month, day, hours, minutes, seconds);
    if (date) return date;
  }
  return null;
}

/**
 * Check that a Date holds a real instant
 */
export function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !isNaN(value.getTime());
}

const pad = (n: number, width = 2): string => String(n).padStart(width, '0');

/**
 * Format a date as "YYYY-MM-DD" (UTC)
 */
export function formatDate(date: Date): string {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/**
 * Format a date as "YYYY-MM-DD hh:mm:ss" (UTC)
 */
export function formatDateTime(date: Date): string {
  const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  return `${formatDate(date)} ${time}`;
}
