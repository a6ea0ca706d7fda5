/**
 * Ordered, column-major dataset with a declared schema.
 * This is the hand-off format for the storage writer.
 */
import { defaultLogger, type Logger } from './logger.js';

export type ColumnType = 'integer' | 'real' | 'text';

export type ColumnValue = number | string | null;

export interface ColumnSchema<K extends string = string> {
  name: K;
  type: ColumnType;
  nullable: boolean;
}

export interface ColumnarDataset {
  schema: ColumnSchema[];
  columns: Record<string, ColumnValue[]>;
  rowCount: number;
}

const COLUMN_TYPES: readonly ColumnType[] = ['integer', 'real', 'text'];

export function isColumnType(value: unknown): value is ColumnType {
  return typeof value === 'string' && (COLUMN_TYPES as readonly string[]).includes(value);
}

/**
 * Check one value against its column declaration; returns a problem or null.
 */
export function checkColumnValue(column: ColumnSchema, value: unknown): string | null {
  if (value === null) {
    return column.nullable ? null : 'null in non-nullable column';
  }
  switch (column.type) {
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value) ? null : 'expected integer';
    case 'real':
      return typeof value === 'number' && Number.isFinite(value) ? null : 'expected real';
    case 'text':
      return typeof value === 'string' ? null : 'expected text';
  }
}

export function toColumnar<K extends string>(
  rows: readonly Record<K, ColumnValue>[],
  schema: readonly ColumnSchema<K>[]
): ColumnarDataset {
  const columns: Record<string, ColumnValue[]> = {};
  for (const column of schema) {
    columns[column.name] = [];
  }

  rows.forEach((row, index) => {
    for (const column of schema) {
      const value = row[column.name];
      const problem = checkColumnValue(column, value);
      if (problem) {
        throw new Error(`Column "${column.name}" row ${index}: ${problem} (got ${String(value)})`);
      }
      columns[column.name].push(value);
    }
  });

  return { schema: [...schema], columns, rowCount: rows.length };
}

/**
 * Rebuild row objects, keyed by column name, in dataset order.
 */
export function fromColumnar(dataset: ColumnarDataset): Record<string, ColumnValue>[] {
  const rows: Record<string, ColumnValue>[] = [];
  for (let i = 0; i < dataset.rowCount; i++) {
    const row: Record<string, ColumnValue> = {};
    for (const column of dataset.schema) {
      row[column.name] = dataset.columns[column.name][i];
    }
    rows.push(row);
  }
  return rows;
}

// ============================================================================
// Dataset-level analysis (explicit post-processing only)
// ============================================================================

/**
 * Columns holding a single distinct value (null included) across every row.
 * An empty dataset has no uninformative columns.
 */
export function findUninformativeColumns(
  dataset: ColumnarDataset,
  options: { keep?: string[] } = {}
): string[] {
  if (dataset.rowCount === 0) return [];
  const keep = new Set(options.keep ?? []);

  return dataset.schema
    .filter((column) => !keep.has(column.name))
    .filter((column) => new Set(dataset.columns[column.name]).size <= 1)
    .map((column) => column.name);
}

export function dropColumns(
  dataset: ColumnarDataset,
  names: string[],
  logger: Logger = defaultLogger
): ColumnarDataset {
  const drop = new Set(names);
  const schema = dataset.schema.filter((column) => !drop.has(column.name));
  const columns: Record<string, ColumnValue[]> = {};
  for (const column of schema) {
    columns[column.name] = dataset.columns[column.name];
  }

  if (drop.size > 0) {
    logger.log(`Dropping ${drop.size} column(s): ${[...drop].join(', ')}`);
  }
  return { schema, columns, rowCount: dataset.rowCount };
}
