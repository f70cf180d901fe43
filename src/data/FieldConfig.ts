/**
 * Per-field column configuration
 *
 * Described records may attach a configuration string to a field using the
 * grammar `header[,opt]*`, where an option is one of `sortable`,
 * `!sortable`, `searchable`, `!searchable`, `width:N` or `format:name`.
 *
 * @example
 * ```typescript
 * parseFieldConfig('Salary,!searchable,width:12,format:currency');
 * // { header: 'Salary', searchable: false, width: 12, format: 'currency' }
 * ```
 */

/**
 * Typed result of parsing a field configuration string.
 * Options absent from the string are left undefined.
 */
export interface FieldConfig {
  header?: string;
  sortable?: boolean;
  searchable?: boolean;
  width?: number;
  format?: string;
}

const FLAG_OPTIONS = new Map<string, Pick<FieldConfig, 'sortable' | 'searchable'>>([
  ['sortable', { sortable: true }],
  ['!sortable', { sortable: false }],
  ['searchable', { searchable: true }],
  ['!searchable', { searchable: false }],
]);

/**
 * Parse a field configuration string
 *
 * Malformed options are skipped with a warning; parsing never fails.
 */
export function parseFieldConfig(tag: string): FieldConfig {
  const [first, ...options] = tag.split(',');
  const config: FieldConfig = {};

  const header = first.trim();
  if (header !== '') {
    config.header = header;
  }

  for (const raw of options) {
    const option = raw.trim();
    if (option === '') continue;

    const flag = FLAG_OPTIONS.get(option);
    if (flag) {
      Object.assign(config, flag);
      continue;
    }

    if (option.startsWith('width:')) {
      const value = option.slice('width:'.length).trim();
      if (/^\d+$/.test(value)) {
        config.width = parseInt(value, 10);
      } else {
        console.warn(`[FieldConfig] Invalid width "${value}" in "${tag}"`);
      }
      continue;
    }

    if (option.startsWith('format:')) {
      const format = option.slice('format:'.length).trim();
      if (format !== '') {
        config.format = format;
      }
      continue;
    }

    console.warn(`[FieldConfig] Unknown option "${option}" in "${tag}"`);
  }

  return config;
}
