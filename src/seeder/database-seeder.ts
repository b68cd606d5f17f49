import type { Logger } from 'pino';
import { loadNamedRecords } from '../loader/named-records';
import { NameRegistry, type NameLookup } from '../registry/name-registry';
import { environmentFrom } from '../tags';
import { loadSeederConfig } from '../config';
import { createLogger, createRootLogger } from '../shared/logger';
import { FixtureError, FixtureErrorCodes } from '../shared/types';
import type {
  AsyncInsertFn,
  Environment,
  FileReader,
  Identifier,
  NamedRecords,
  RecordDecoder,
  SyncInsertFn,
} from '../shared/types';

export interface DatabaseSeederOptions {
  baseDir?: string;
  reader?: FileReader;
  env?: Environment;
  logger?: Logger;
}

/**
 * Persists fixture records through caller-supplied insert functions.
 *
 * Every identifier returned by an insert is registered under the record's
 * label, so files populated later can point at it with `${{ REF(label) }}`.
 * Populate files in dependency order.
 *
 * Labels are shared across all files of one seeder: a label seen twice keeps
 * the identifier of the latest insert. A failing insert stops the current file,
 * but labels registered before the failure stay registered.
 *
 * @example
 * const seeder = new DatabaseSeeder({ baseDir: 'fixtures' });
 * await seeder.populateAsync('users.yml', createYamlDecoder(userSchema), (user) => users.insert(user));
 * await seeder.populateAsync('posts.yml', createYamlDecoder(postSchema), (post) => posts.insert(post));
 */
export class DatabaseSeeder {
  readonly filenames: string[] = [];
  private _baseDir: string;
  private readonly names = new NameRegistry();
  private readonly reader?: FileReader;
  private readonly env?: Environment;
  private readonly log: Logger;

  constructor(options: DatabaseSeederOptions = {}) {
    this._baseDir = options.baseDir ?? '';
    this.reader = options.reader;
    this.env = options.env;
    this.log = options.logger ?? createLogger({ component: 'database-seeder' });
  }

  /** Seeder configured from FIXTURES_DIR and LOG_LEVEL; ENV tags read the same record. */
  static fromEnv(env: Record<string, string | undefined> = process.env): DatabaseSeeder {
    const config = loadSeederConfig(env);
    return new DatabaseSeeder({
      baseDir: config.fixtures_dir,
      env: environmentFrom(env),
      logger: createRootLogger(undefined, config.log_level).child({ component: 'database-seeder' }),
    });
  }

  get baseDir(): string {
    return this._baseDir;
  }

  get registry(): NameLookup {
    return this.names;
  }

  setDir(baseDir: string): void {
    this._baseDir = baseDir;
  }

  lookup(label: string): string | undefined {
    return this.names.lookup(label);
  }

  /** Populate one file with a synchronous insert function. Returns the ids in record order. */
  populate<T, U extends Identifier>(
    filename: string,
    decoder: RecordDecoder<T>,
    insert: SyncInsertFn<T, U>,
  ): U[] {
    const records = this.loadRecords(filename, decoder);
    const ids: U[] = [];

    for (const [label, record] of records) {
      let id: U;
      try {
        id = insert(record);
      } catch (err) {
        throw this.insertFailure(filename, label, err);
      }
      this.register(filename, label, id);
      ids.push(id);
    }
    return ids;
  }

  /**
   * Populate one file with an insert function that may return a promise.
   * Each insert settles before the next record is handled.
   */
  async populateAsync<T, U extends Identifier>(
    filename: string,
    decoder: RecordDecoder<T>,
    insert: AsyncInsertFn<T, U>,
  ): Promise<U[]> {
    const records = this.loadRecords(filename, decoder);
    const ids: U[] = [];

    for (const [label, record] of records) {
      let id: U;
      try {
        id = await insert(record);
      } catch (err) {
        throw this.insertFailure(filename, label, err);
      }
      this.register(filename, label, id);
      ids.push(id);
    }
    return ids;
  }

  private loadRecords<T>(filename: string, decoder: RecordDecoder<T>): NamedRecords<T> {
    this.log.info({ filename, baseDir: this._baseDir }, 'populating fixture file');
    try {
      const records = loadNamedRecords(filename, decoder, {
        baseDir: this._baseDir,
        registry: this.names,
        reader: this.reader,
        env: this.env,
      });
      this.filenames.push(filename);
      return records;
    } catch (err) {
      this.log.error({ err, filename }, 'failed to load fixture file');
      throw err;
    }
  }

  private register(filename: string, label: string, id: Identifier): void {
    if (this.names.has(label)) {
      this.log.debug({ filename, label }, 'overwriting previously registered label');
    }
    this.names.insert(label, String(id));
    this.log.debug({ filename, label }, 'record inserted');
  }

  private insertFailure(filename: string, label: string, err: unknown): FixtureError {
    this.log.error({ err, filename, label }, 'insert failed');
    const reason = err instanceof Error ? err.message : String(err);
    return new FixtureError({
      code: FixtureErrorCodes.INSERT_FAILED,
      message: `${filename}: inserting record \`${label}\` failed: ${reason}`,
      context: { filename, label },
      cause: err,
    });
  }
}
