import type { DatabaseClient } from '../shared/db';
import type { Identifier } from '../shared/types';

export interface TableInserterOptions<T> {
  /** Column returned by `RETURNING`. Defaults to `id`. */
  idColumn?: string;
  /** Maps a record to column values. Defaults to the record's own fields. */
  toRow?: (record: T) => Record<string, unknown>;
}

/** Double-quote an SQL identifier, doubling embedded quotes. */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function toParam(value: unknown): unknown {
  if (value === null || value instanceof Date || Buffer.isBuffer(value)) return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return value;
}

/**
 * Build the INSERT statement for one row.
 * Fields set to `undefined` are left out so column defaults apply.
 */
export function buildInsert(
  table: string,
  row: Record<string, unknown>,
  idColumn = 'id',
): { sql: string; values: unknown[] } {
  const columns: string[] = [];
  const values: unknown[] = [];

  for (const [column, value] of Object.entries(row)) {
    if (value === undefined) continue;
    columns.push(quoteIdentifier(column));
    values.push(toParam(value));
  }

  const returning = `RETURNING ${quoteIdentifier(idColumn)}`;
  if (columns.length === 0) {
    return { sql: `INSERT INTO ${quoteIdentifier(table)} DEFAULT VALUES ${returning}`, values };
  }

  const placeholders = values.map((_, i) => `$${i + 1}`).join(', ');
  return {
    sql: `INSERT INTO ${quoteIdentifier(table)} (${columns.join(', ')}) VALUES (${placeholders}) ${returning}`,
    values,
  };
}

/**
 * Insert function for `DatabaseSeeder.populateAsync` that writes each record
 * as one row of `table` and returns the generated id.
 */
export function createTableInserter<T extends object>(
  db: DatabaseClient,
  table: string,
  options: TableInserterOptions<T> = {},
): (record: T) => Promise<Identifier> {
  const idColumn = options.idColumn ?? 'id';
  const toRow =
    options.toRow ??
    ((record: T): Record<string, unknown> => Object.fromEntries(Object.entries(record)));

  return async (record) => {
    const { sql, values } = buildInsert(table, toRow(record), idColumn);
    const result = await db.query<Record<string, unknown>>(sql, values);
    const id = result.rows[0]?.[idColumn];

    if (typeof id === 'string' || typeof id === 'number' || typeof id === 'bigint') {
      return id;
    }
    throw new Error(`INSERT INTO ${table} returned no \`${idColumn}\``);
  };
}
