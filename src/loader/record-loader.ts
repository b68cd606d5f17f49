import type { Logger } from 'pino';
import { loadNamedRecords } from './named-records';
import { NameRegistry, type NameLookup } from '../registry/name-registry';
import { createLogger } from '../shared/logger';
import { FixtureError, FixtureErrorCodes } from '../shared/types';
import type { Environment, FileReader, NamedRecords, RecordDecoder } from '../shared/types';

export interface RecordLoaderOptions {
  baseDir?: string;
  reader?: FileReader;
  env?: Environment;
  logger?: Logger;
}

/**
 * Loads one fixture file into memory for point queries by label, without
 * inserting anything. A loader can be loaded exactly once.
 *
 * @example
 * const loader = new RecordLoader('items.yml', createYamlDecoder(itemSchema), { baseDir: 'fixtures' });
 * loader.load();
 * const melon = loader.get('Melon');
 */
export class RecordLoader<T> {
  readonly filename: string;
  readonly baseDir?: string;
  private records: NamedRecords<T> | null = null;
  private readonly log: Logger;

  constructor(
    filename: string,
    private readonly decoder: RecordDecoder<T>,
    private readonly options: RecordLoaderOptions = {},
  ) {
    this.filename = filename;
    this.baseDir = options.baseDir;
    this.log = options.logger ?? createLogger({ component: 'record-loader' });
  }

  get isLoaded(): boolean {
    return this.records !== null;
  }

  /** Read, substitute and decode the file. REF tags resolve against `dependencies`. */
  load(dependencies: NameLookup = new NameRegistry()): this {
    this.log.info({ filename: this.filename }, `loading ${this.filename}...`);

    if (this.records !== null) {
      throw new FixtureError({
        code: FixtureErrorCodes.ALREADY_LOADED,
        message: `${this.filename}: the records have been loaded already`,
        context: { filename: this.filename },
      });
    }

    this.records = loadNamedRecords(this.filename, this.decoder, {
      baseDir: this.baseDir,
      registry: dependencies,
      reader: this.options.reader,
      env: this.options.env,
    });
    return this;
  }

  get(label: string): T {
    const record = this.loadedRecords().get(label);
    if (record === undefined) {
      throw new FixtureError({
        code: FixtureErrorCodes.RECORD_NOT_FOUND,
        message: `${this.filename}: no record was found for the label \`${label}\``,
        context: { filename: this.filename, label },
      });
    }
    return record;
  }

  getAll(): ReadonlyMap<string, T> {
    return this.loadedRecords();
  }

  private loadedRecords(): NamedRecords<T> {
    if (this.records === null) {
      throw new FixtureError({
        code: FixtureErrorCodes.NOT_LOADED,
        message: `${this.filename}: no records have been loaded yet`,
        context: { filename: this.filename },
      });
    }
    return this.records;
  }
}
