/**
 * Input record shapes and field lookup
 *
 * Two shapes are understood:
 * - described records, which list their fields (with declared types and
 *   optional configuration strings) through `describeFields()`
 * - map records: `Map`s with string keys and other non-array objects,
 *   whose own keys are the fields
 */

/**
 * Declaration of one field of a described record
 */
export interface FieldDescriptor {
  /** Property name on the record */
  name: string;
  /** Declared type, e.g. 'int', 'float', 'boolean', 'date', 'string' */
  type: string;
  /** Column configuration string: `header[,opt]*` */
  tag?: string;
  /** Internal fields get no column */
  internal?: boolean;
}

/**
 * A record that declares its own fields
 *
 * @example
 * ```typescript
 * class Employee implements Describable {
 *   constructor(public id: number, public name: string) {}
 *
 *   describeFields(): FieldDescriptor[] {
 *     return [
 *       { name: 'id', type: 'int', tag: 'ID,width:5' },
 *       { name: 'name', type: 'string', tag: 'Name' },
 *     ];
 *   }
 * }
 * ```
 */
export interface Describable {
  describeFields(): readonly FieldDescriptor[];
}

/**
 * Classified record
 */
export type RecordShape =
  | { kind: 'described'; fields: readonly FieldDescriptor[] }
  | { kind: 'map'; keys: string[] }
  | { kind: 'unsupported'; reason: string };

/**
 * Check whether a value implements Describable
 */
export function isDescribable(value: unknown): value is Describable {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'describeFields') === 'function'
  );
}

/**
 * Attach field declarations to a plain object
 */
export function describeRecord<T extends object>(
  record: T,
  fields: readonly FieldDescriptor[]
): T & Describable {
  return Object.assign(record, { describeFields: () => fields });
}

/**
 * Work out which shape a record has
 */
export function classifyRecord(record: unknown): RecordShape {
  if (isDescribable(record)) {
    return { kind: 'described', fields: record.describeFields() };
  }

  if (record instanceof Map) {
    const keys: string[] = [];
    for (const key of record.keys()) {
      if (typeof key !== 'string') {
        return { kind: 'unsupported', reason: `Map key of type ${typeof key}` };
      }
      keys.push(key);
    }
    return { kind: 'map', keys };
  }

  if (typeof record !== 'object' || record === null) {
    return { kind: 'unsupported', reason: record === null ? 'null' : typeof record };
  }
  if (Array.isArray(record)) {
    return { kind: 'unsupported', reason: 'array' };
  }
  return { kind: 'map', keys: Object.keys(record) };
}

/**
 * Result of looking a field up on a record
 */
export type FieldLookup = { found: true; value: unknown } | { found: false };

const MISSING: FieldLookup = { found: false };

function hasProperty(target: object, key: string): boolean {
  if (Object.prototype.hasOwnProperty.call(target, key)) return true;
  // Accessors declared on a class prototype
  return key in target && !(key in Object.prototype);
}

/**
 * Candidate field names for the case-insensitive fallback
 */
function fieldNames(record: Describable & object): string[] {
  const names = record.describeFields().map((field) => field.name);
  for (const key of Object.keys(record)) {
    if (key !== 'describeFields' && !names.includes(key)) names.push(key);
  }
  return names;
}

/**
 * Read a field from a record by name
 *
 * Maps need an exact key. Described records fall back to a
 * case-insensitive match on their field names.
 */
export function readField(record: unknown, key: string): FieldLookup {
  if (record instanceof Map) {
    return record.has(key) ? { found: true, value: record.get(key) } : MISSING;
  }
  if (typeof record !== 'object' || record === null) {
    return MISSING;
  }

  if (hasProperty(record, key)) {
    return { found: true, value: Reflect.get(record, key) };
  }

  if (isDescribable(record)) {
    const lower = key.toLowerCase();
    const match = fieldNames(record).find((name) => name.toLowerCase() === lower);
    if (match !== undefined && hasProperty(record, match)) {
      return { found: true, value: Reflect.get(record, match) };
    }
  }

  return MISSING;
}
