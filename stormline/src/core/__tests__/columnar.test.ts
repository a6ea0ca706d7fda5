import { describe, it, expect, vi } from 'vitest';
import {
  dropColumns,
  findUninformativeColumns,
  fromColumnar,
  toColumnar,
  type ColumnSchema,
} from '../columnar.js';

type Key = 'id' | 'basin' | 'wind' | 'lat';

const SCHEMA: ColumnSchema<Key>[] = [
  { name: 'id', type: 'text', nullable: false },
  { name: 'basin', type: 'text', nullable: false },
  { name: 'wind', type: 'integer', nullable: true },
  { name: 'lat', type: 'real', nullable: false },
];

const ROWS = [
  { id: 'a', basin: 'AL', wind: 80, lat: 28.3 },
  { id: 'b', basin: 'AL', wind: null, lat: -12.5 },
  { id: 'c', basin: 'AL', wind: 45, lat: 30 },
];

describe('toColumnar', () => {
  it('lays rows out column by column in schema order', () => {
    const dataset = toColumnar(ROWS, SCHEMA);
    expect(dataset.rowCount).toBe(3);
    expect(dataset.schema.map((c) => c.name)).toEqual(['id', 'basin', 'wind', 'lat']);
    expect(dataset.columns).toEqual({
      id: ['a', 'b', 'c'],
      basin: ['AL', 'AL', 'AL'],
      wind: [80, null, 45],
      lat: [28.3, -12.5, 30],
    });
  });

  it('rejects nulls in non-nullable columns', () => {
    const rows = [{ id: 'a', basin: 'AL', wind: 1, lat: null }];
    expect(() => toColumnar(rows, SCHEMA)).toThrow('Column "lat" row 0: null in non-nullable column');
  });

  it('rejects non-integers in integer columns', () => {
    const rows = [{ id: 'a', basin: 'AL', wind: 1.5, lat: 1 }];
    expect(() => toColumnar(rows, SCHEMA)).toThrow('Column "wind" row 0: expected integer (got 1.5)');
  });

  it('round-trips through fromColumnar', () => {
    expect(fromColumnar(toColumnar(ROWS, SCHEMA))).toEqual(ROWS);
  });
});

describe('uninformative columns', () => {
  it('flags columns with a single distinct value', () => {
    const dataset = toColumnar(ROWS, SCHEMA);
    expect(findUninformativeColumns(dataset)).toEqual(['basin']);
  });

  it('treats an all-null column as uninformative', () => {
    const rows = ROWS.map((r) => ({ ...r, wind: null }));
    expect(findUninformativeColumns(toColumnar(rows, SCHEMA))).toEqual(['basin', 'wind']);
  });

  it('respects the keep list', () => {
    const dataset = toColumnar(ROWS, SCHEMA);
    expect(findUninformativeColumns(dataset, { keep: ['basin'] })).toEqual([]);
  });

  it('finds nothing in an empty dataset', () => {
    expect(findUninformativeColumns(toColumnar([], SCHEMA))).toEqual([]);
  });

  it('drops columns only when asked, and logs them', () => {
    const logger = { log: vi.fn(), warn: vi.fn() };
    const dataset = toColumnar(ROWS, SCHEMA);
    const dropped = dropColumns(dataset, ['basin'], logger);

    expect(dropped.schema.map((c) => c.name)).toEqual(['id', 'wind', 'lat']);
    expect(dropped.columns).not.toHaveProperty('basin');
    expect(dataset.columns).toHaveProperty('basin');
    expect(logger.log).toHaveBeenCalledWith('Dropping 1 column(s): basin');
  });
});
