import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import {
  buildInsert,
  createTableInserter,
  quoteIdentifier,
} from '../../src/storage/table-inserter';
import { DatabaseSeeder } from '../../src/seeder/database-seeder';
import { createYamlDecoder } from '../../src/loader/yaml-decoder';
import type { DatabaseClient } from '../../src/shared/db';
import { SEEDS_DIR, itemSchema } from '../helpers/seed-helpers';

function fakeDb(rows: Array<Record<string, unknown>>) {
  const query = vi.fn().mockResolvedValue({ rows: [], rowCount: 0 });
  for (const row of rows) {
    query.mockResolvedValueOnce({ rows: [row], rowCount: 1 });
  }
  const db: DatabaseClient = { query, transaction: vi.fn(), end: vi.fn() };
  return { db, query };
}

describe('quoteIdentifier', () => {
  it('double-quotes and escapes embedded quotes', () => {
    expect(quoteIdentifier('items')).toBe('"items"');
    expect(quoteIdentifier('we"ird')).toBe('"we""ird"');
  });
});

describe('buildInsert', () => {
  it('builds a parameterised INSERT returning the id column', () => {
    expect(buildInsert('items', { name: 'melon', price: 500 })).toEqual({
      sql: 'INSERT INTO "items" ("name", "price") VALUES ($1, $2) RETURNING "id"',
      values: ['melon', 500],
    });
  });

  it('skips undefined fields and JSON-encodes objects and arrays', () => {
    const when = new Date('2024-01-02T03:04:05Z');
    const { sql, values } = buildInsert(
      'customers',
      { name: 'Bob', nickname: undefined, emails: ['bob@example.com'], plan: { family: 4 }, since: when, note: null },
      'customer_id',
    );

    expect(sql).toBe(
      'INSERT INTO "customers" ("name", "emails", "plan", "since", "note") VALUES ($1, $2, $3, $4, $5) RETURNING "customer_id"',
    );
    expect(values).toEqual(['Bob', '["bob@example.com"]', '{"family":4}', when, null]);
  });

  it('uses DEFAULT VALUES for an empty row', () => {
    expect(buildInsert('events', {})).toEqual({
      sql: 'INSERT INTO "events" DEFAULT VALUES RETURNING "id"',
      values: [],
    });
  });
});

describe('createTableInserter', () => {
  it('returns the generated id', async () => {
    const { db, query } = fakeDb([{ id: 7 }]);
    const insert = createTableInserter(db, 'items');

    await expect(insert({ name: 'melon', price: 500 })).resolves.toBe(7);
    expect(query).toHaveBeenCalledWith(
      'INSERT INTO "items" ("name", "price") VALUES ($1, $2) RETURNING "id"',
      ['melon', 500],
    );
  });

  it('maps records with toRow and a custom id column', async () => {
    const { db, query } = fakeDb([{ item_id: 'abc' }]);
    const insert = createTableInserter(db, 'items', {
      idColumn: 'item_id',
      toRow: (item: { name: string; price: number }) => ({ title: item.name.toUpperCase() }),
    });

    await expect(insert({ name: 'melon', price: 500 })).resolves.toBe('abc');
    expect(query).toHaveBeenCalledWith(
      'INSERT INTO "items" ("title") VALUES ($1) RETURNING "item_id"',
      ['MELON'],
    );
  });

  it('rejects when no row comes back', async () => {
    const { db } = fakeDb([]);
    const insert = createTableInserter(db, 'items');

    await expect(insert({ name: 'melon' })).rejects.toThrow('INSERT INTO items returned no `id`');
  });

  it('feeds ids into the seeder registry', async () => {
    const { db, query } = fakeDb([{ id: 1 }, { id: 2 }, { id: 3 }, { id: 4 }]);
    const seeder = new DatabaseSeeder({ baseDir: SEEDS_DIR, logger: pino({ level: 'silent' }) });

    const ids = await seeder.populateAsync(
      'items.yml',
      createYamlDecoder(itemSchema),
      createTableInserter(db, 'items'),
    );

    expect(ids).toEqual([1, 2, 3, 4]);
    expect(seeder.lookup('Carrot')).toBe('4');
    expect(query).toHaveBeenLastCalledWith(
      'INSERT INTO "items" ("name", "price") VALUES ($1, $2) RETURNING "id"',
      ['carrot', 150],
    );
  });
});
