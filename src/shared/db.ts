import { Pool, type QueryResult } from 'pg';
import { createLogger } from './logger';

export interface QueryOutcome<T> {
  rows: T[];
  rowCount: number;
}

/**
 * The slice of PostgreSQL the seeder needs. Fixture inserts go through
 * `query`; callers that want a file to land atomically wrap their populate
 * call in `transaction`.
 */
export interface DatabaseClient {
  query<T>(sql: string, params?: unknown[]): Promise<QueryOutcome<T>>;
  transaction<T>(fn: (client: DatabaseClient) => Promise<T>): Promise<T>;
  end(): Promise<void>;
}

export interface DatabaseClientOptions {
  connectionString: string;
  maxConnections?: number;
}

const log = createLogger({ component: 'db' });

function toOutcome<T>(result: QueryResult): QueryOutcome<T> {
  return { rows: result.rows as T[], rowCount: result.rowCount ?? 0 };
}

export function createDatabaseClient(options: DatabaseClientOptions): DatabaseClient {
  const pool = new Pool({
    connectionString: options.connectionString,
    max: options.maxConnections ?? 1,
    idleTimeoutMillis: 10_000,
    connectionTimeoutMillis: 5_000,
  });

  pool.on('error', (err) => {
    log.error({ err }, 'Unexpected PostgreSQL pool error');
  });

  return {
    async query<T>(sql: string, params?: unknown[]): Promise<QueryOutcome<T>> {
      return toOutcome<T>(await pool.query(sql, params));
    },

    async transaction<T>(fn: (client: DatabaseClient) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      // Seeding inside a transaction reuses it: nested calls join the outer one.
      const txClient: DatabaseClient = {
        async query<U>(sql: string, params?: unknown[]): Promise<QueryOutcome<U>> {
          return toOutcome<U>(await client.query(sql, params));
        },
        transaction<U>(inner: (tx: DatabaseClient) => Promise<U>): Promise<U> {
          return inner(txClient);
        },
        async end(): Promise<void> {
          throw new Error('Cannot end the pool inside a transaction');
        },
      };

      try {
        await client.query('BEGIN');
        const result = await fn(txClient);
        await client.query('COMMIT');
        return result;
      } catch (err) {
        log.warn({ err }, 'Rolling back seed transaction');
        await client.query('ROLLBACK');
        throw err;
      } finally {
        client.release();
      }
    },

    async end(): Promise<void> {
      await pool.end();
    },
  };
}
