/**
 * Formatter registry
 *
 * Pure functions that turn a typed cell value into display text. Columns
 * pick one explicitly, or by name through a `format:name` field option.
 */

import type { CellValue, Formatter } from '../core/types';
import { formatDate, formatDateTime, parseDate } from '../data/DateParser';
import { cellValueText } from './Cell';

// Fixed locale so separators do not depend on the host
const wholeNumberFormat = new Intl.NumberFormat('en-US', {
  maximumFractionDigits: 0,
  useGrouping: true,
});

/**
 * Default formatter: floats get two decimals, dates print as YYYY-MM-DD,
 * everything else prints as-is.
 */
export const defaultFormatter: Formatter = (value) => {
  switch (value.kind) {
    case 'float':
      return value.value.toFixed(2);
    case 'date':
      return formatDate(value.value);
    default:
      return cellValueText(value);
  }
};

/**
 * Format numbers as dollar amounts: 12.5 → "$12.50", 12 → "$12.00"
 */
export const currencyFormatter: Formatter = (value) => {
  switch (value.kind) {
    case 'float':
      return `$${value.value.toFixed(2)}`;
    case 'integer':
      return `$${value.value}.00`;
    default: {
      const text = cellValueText(value);
      return text !== '' ? `$${text}` : '$0.00';
    }
  }
};

/**
 * Format fractions as percentages: 0.125 → "12.5%"
 *
 * Integers are taken to already be percentages: 5 → "5%".
 */
export const percentFormatter: Formatter = (value) => {
  if (value.kind === 'float') {
    return `${(value.value * 100).toFixed(1)}%`;
  }
  return `${cellValueText(value)}%`;
};

function reformatDate(value: CellValue, format: (date: Date) => string): string {
  if (value.kind === 'date') {
    return format(value.value);
  }
  const text = cellValueText(value);
  const parsed = parseDate(text);
  return parsed ? format(parsed) : text;
}

/**
 * Format dates as YYYY-MM-DD, reformatting parseable date text
 */
export const dateFormatter: Formatter = (value) => reformatDate(value, formatDate);

/**
 * Format dates with their time of day: "2024-01-15 09:30:00"
 */
export const timeFormatter: Formatter = (value) => reformatDate(value, formatDateTime);

/**
 * Create a formatter that prints booleans with custom labels
 *
 * Text reading "true", "1" or "yes" counts as true; anything else is false.
 *
 * @example
 * ```typescript
 * const yesNo = booleanFormatter('Yes', 'No');
 * yesNo({ kind: 'boolean', value: true }); // "Yes"
 * ```
 */
export function booleanFormatter(trueText: string, falseText: string): Formatter {
  return (value) => {
    switch (value.kind) {
      case 'boolean':
        return value.value ? trueText : falseText;
      case 'text':
      case 'unparsed': {
        const text = cellValueText(value);
        return text === 'true' || text === '1' || text === 'yes' ? trueText : falseText;
      }
      default:
        return falseText;
    }
  };
}

/**
 * Format numbers rounded to whole units with thousand separators:
 * 1234567 → "1,234,567"
 */
export const numberWithCommasFormatter: Formatter = (value) => {
  if (value.kind === 'integer' || value.kind === 'float') {
    return wholeNumberFormat.format(value.value);
  }
  return cellValueText(value);
};

/**
 * Create a formatter that cuts text to `maxLength` characters, ending in
 * "..." when there is room for it
 */
export function truncateFormatter(maxLength: number): Formatter {
  return (value) => {
    const text = cellValueText(value);
    if (text.length <= maxLength) return text;
    if (maxLength <= 3) return text.slice(0, Math.max(0, maxLength));
    return `${text.slice(0, maxLength - 3)}...`;
  };
}

/**
 * Create a formatter that prepends `prefix`
 */
export function prefixFormatter(prefix: string): Formatter {
  return (value) => prefix + cellValueText(value);
}

/**
 * Create a formatter that appends `suffix`
 */
export function suffixFormatter(suffix: string): Formatter {
  return (value) => cellValueText(value) + suffix;
}

const NAMED_FORMATTERS: Readonly<Record<string, Formatter>> = {
  currency: currencyFormatter,
  date: dateFormatter,
  time: timeFormatter,
  percent: percentFormatter,
  number: numberWithCommasFormatter,
  boolean: booleanFormatter('yes', 'no'),
};

/**
 * Names accepted by getFormatterByName
 */
export const FORMATTER_NAMES: readonly string[] = Object.keys(NAMED_FORMATTERS);

/**
 * Check whether a formatter is registered under `name`
 */
export function hasFormatter(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(NAMED_FORMATTERS, name);
}

/**
 * Look up a formatter by name
 *
 * Unknown names resolve to the default formatter.
 */
export function getFormatterByName(name: string): Formatter {
  if (!hasFormatter(name)) {
    console.warn(`[Formatters] Unknown formatter "${name}", using default`);
    return defaultFormatter;
  }
  return NAMED_FORMATTERS[name];
}
