import { describe, it, expect } from 'vitest';
import {
  VERSION,
  DataTable,
  TableActions,
  createColumn,
  describeRecord,
  getFormatterByName,
} from '../src/index';

describe('Headless Table Engine', () => {
  it('should export VERSION', () => {
    expect(VERSION).toBe('0.1.0');
  });

  it('should run the basic table workflow through the public entry point', () => {
    const table = new DataTable({ pageSize: 10 });
    table.setData([
      { ID: 2, Name: 'Bob' },
      { ID: 1, Name: 'Alice' },
    ]);

    expect(table.getPage(0)).toHaveLength(2);
    expect(table.sortByColumn(0, false).ok).toBe(true);
    expect(table.getCellDisplayValue(0, 1)).toBe('Alice');

    const bobs = table.filter('Bob');
    expect(bobs.totalRowCount).toBe(1);
    expect(bobs.getCellDisplayValue(0, 1)).toBe('Bob');
  });

  it('should export the column, record and formatter helpers', () => {
    const table = new DataTable({
      columns: [
        createColumn({ key: 'total', type: 'float', formatter: getFormatterByName('currency') }),
      ],
    });
    table.setData([describeRecord({ total: 9.5 }, [{ name: 'total', type: 'float' }])]);

    const actions = new TableActions(table);
    expect(actions.getPageRows()).toHaveLength(1);
    expect(table.getCellDisplayValue(0, 0)).toBe('$9.50');
  });
});
