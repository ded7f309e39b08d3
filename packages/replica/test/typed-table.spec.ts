/* packages/replica/test/typed-table.spec.ts */
import { describe, it, expect } from 'vitest';
import { TypedTable, toJsonCell } from '../src';

const table = new TypedTable(
  [
    { name: 'page_id', type: 'int64', values: [1n, 9007199254740993n] },
    { name: 'page_title', type: 'binary', values: [Buffer.from('Foo'), null] },
    { name: 'cl_timestamp', type: 'datetime', values: [new Date('2024-01-02T03:04:05Z'), null] },
    { name: 'page_title', type: 'string', values: ['a', 'b'] }
  ],
  2
);

describe('TypedTable', () => {
  it('reads rows across columns', () => {
    expect(table.row(1)).toEqual([9007199254740993n, null, null, 'b']);
    expect(table.rows()).toHaveLength(2);
  });

  it('finds the first column of a duplicated name', () => {
    expect(table.column('page_title')?.type).toBe('binary');
    expect(table.column(3)?.type).toBe('string');
    expect(table.column('missing')).toBeUndefined();
  });

  it('rejects out-of-range rows', () => {
    expect(() => table.row(2)).toThrow(RangeError);
  });

  it('keys records by name, later duplicates winning', () => {
    expect(table.toRecords()[0]).toEqual({
      page_id: 1n,
      page_title: 'a',
      cl_timestamp: new Date('2024-01-02T03:04:05Z')
    });
  });

  it('serializes to JSON-safe cells', () => {
    expect(JSON.parse(JSON.stringify(table))).toEqual({
      columns: [
        { name: 'page_id', type: 'int64' },
        { name: 'page_title', type: 'binary' },
        { name: 'cl_timestamp', type: 'datetime' },
        { name: 'page_title', type: 'string' }
      ],
      rows: [
        [1, 'Rm9v', '2024-01-02T03:04:05.000Z', 'a'],
        ['9007199254740993', null, null, 'b']
      ]
    });
  });
});

describe('toJsonCell', () => {
  it('passes plain JSON values through', () => {
    expect(toJsonCell('x')).toBe('x');
    expect(toJsonCell(1.5)).toBe(1.5);
    expect(toJsonCell(true)).toBe(true);
    expect(toJsonCell(undefined)).toBeNull();
  });
});
