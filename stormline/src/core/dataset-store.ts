/**
 * SQLite store for columnar datasets.
 * Each dataset becomes a typed table (one column per schema entry, in order) plus
 * a metadata row holding the declared schema, so a read returns the same columns,
 * types and nullability that were written.
 */
import Database from 'better-sqlite3';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
  checkColumnValue,
  isColumnType,
  type ColumnarDataset,
  type ColumnSchema,
  type ColumnType,
  type ColumnValue,
} from './columnar.js';

// ============================================================================
// Types
// ============================================================================

export interface DatasetMetadata {
  name: string;
  schema: ColumnSchema[];
  rowCount: number;
  writtenAt: string;
}

const SQL_TYPES: Record<ColumnType, string> = {
  integer: 'INTEGER',
  real: 'REAL',
  text: 'TEXT',
};

const ROW_INDEX = 'row_index';
const RESERVED = new Set([ROW_INDEX, 'datasets']);

// SQLite identifiers are case-insensitive
function assertIdentifier(name: string): void {
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name) || RESERVED.has(name.toLowerCase())) {
    throw new Error(`Invalid dataset or column name: ${name}`);
  }
}

function parseSchema(json: string): ColumnSchema[] {
  const value: unknown = JSON.parse(json);
  if (!Array.isArray(value)) {
    throw new Error('Stored schema is not an array');
  }

  return value.map((entry: unknown) => {
    if (
      typeof entry !== 'object' ||
      entry === null ||
      !('name' in entry) ||
      !('type' in entry) ||
      !('nullable' in entry) ||
      typeof entry.name !== 'string' ||
      !isColumnType(entry.type) ||
      typeof entry.nullable !== 'boolean'
    ) {
      throw new Error(`Stored schema has an invalid column: ${JSON.stringify(entry)}`);
    }
    return { name: entry.name, type: entry.type, nullable: entry.nullable };
  });
}

// ============================================================================
// Store Implementation
// ============================================================================

export class DatasetStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.init();
  }

  private init(): void {
    this.db.pragma('journal_mode = WAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS datasets (
        name TEXT PRIMARY KEY,
        schema TEXT NOT NULL,
        row_count INTEGER NOT NULL,
        written_at TEXT NOT NULL
      );
    `);
  }

  /**
   * Replace a dataset with new contents. Runs in one transaction.
   */
  writeDataset(name: string, dataset: ColumnarDataset): void {
    assertIdentifier(name);
    dataset.schema.forEach((column) => assertIdentifier(column.name));

    const columnDefs = dataset.schema
      .map((c) => `"${c.name}" ${SQL_TYPES[c.type]}${c.nullable ? '' : ' NOT NULL'}`)
      .join(',\n        ');
    const columnList = dataset.schema.map((c) => `"${c.name}"`).join(', ');
    const placeholders = dataset.schema.map(() => '?').join(', ');

    const write = this.db.transaction(() => {
      this.db.exec(`DROP TABLE IF EXISTS "${name}"`);
      this.db.exec(`
        CREATE TABLE "${name}" (
        ${ROW_INDEX} INTEGER PRIMARY KEY,
        ${columnDefs}
        )
      `);

      const insert = this.db.prepare(
        `INSERT INTO "${name}" (${ROW_INDEX}${columnList ? `, ${columnList}` : ''})
         VALUES (?${placeholders ? `, ${placeholders}` : ''})`
      );
      for (let i = 0; i < dataset.rowCount; i++) {
        insert.run(i, ...dataset.schema.map((c) => dataset.columns[c.name][i]));
      }

      this.db
        .prepare(
          `INSERT INTO datasets (name, schema, row_count, written_at)
           VALUES (?, ?, ?, datetime('now'))
           ON CONFLICT(name) DO UPDATE SET
             schema = excluded.schema,
             row_count = excluded.row_count,
             written_at = excluded.written_at`
        )
        .run(name, JSON.stringify(dataset.schema), dataset.rowCount);
    });

    write();
  }

  getMetadata(name: string): DatasetMetadata | null {
    const row = this.db
      .prepare(`SELECT name, schema, row_count, written_at FROM datasets WHERE name = ?`)
      .get(name) as
      | { name: string; schema: string; row_count: number; written_at: string }
      | undefined;

    if (!row) return null;

    return {
      name: row.name,
      schema: parseSchema(row.schema),
      rowCount: row.row_count,
      writtenAt: row.written_at,
    };
  }

  /**
   * Read a dataset back in row order.
   */
  readDataset(name: string): ColumnarDataset {
    const meta = this.getMetadata(name);
    if (!meta) {
      throw new Error(`Unknown dataset: ${name}`);
    }

    const rows = this.db
      .prepare(`SELECT * FROM "${name}" ORDER BY ${ROW_INDEX}`)
      .all() as Record<string, unknown>[];

    const columns: Record<string, ColumnValue[]> = {};
    for (const column of meta.schema) {
      columns[column.name] = rows.map((row, i) => {
        const value = row[column.name];
        if (typeof value !== 'number' && typeof value !== 'string' && value !== null) {
          throw new Error(`Dataset ${name}, column "${column.name}" row ${i}: unsupported value`);
        }
        const problem = checkColumnValue(column, value);
        if (problem) {
          throw new Error(`Dataset ${name}, column "${column.name}" row ${i}: ${problem}`);
        }
        return value;
      });
    }

    return { schema: meta.schema, columns, rowCount: rows.length };
  }

  listDatasets(): DatasetMetadata[] {
    const rows = this.db.prepare(`SELECT name FROM datasets ORDER BY name`).all() as {
      name: string;
    }[];
    return rows.flatMap((row) => this.getMetadata(row.name) ?? []);
  }

  deleteDataset(name: string): void {
    assertIdentifier(name);
    this.db.transaction(() => {
      this.db.exec(`DROP TABLE IF EXISTS "${name}"`);
      this.db.prepare(`DELETE FROM datasets WHERE name = ?`).run(name);
    })();
  }

  close(): void {
    this.db.close();
  }
}

// ============================================================================
// Factory
// ============================================================================

export async function openDatasetStore(dbPath: string): Promise<DatasetStore> {
  await mkdir(dirname(dbPath), { recursive: true });
  return new DatasetStore(dbPath);
}
