export { DatabaseSeeder } from './seeder/database-seeder';
export type { DatabaseSeederOptions } from './seeder/database-seeder';

export { RecordLoader } from './loader/record-loader';
export type { RecordLoaderOptions } from './loader/record-loader';
export { loadNamedRecords } from './loader/named-records';
export type { LoadOptions } from './loader/named-records';
export { decodeYamlMapping, createYamlDecoder } from './loader/yaml-decoder';

export { NameRegistry } from './registry/name-registry';
export type { NameLookup } from './registry/name-registry';

export {
  scanTag,
  resolveDirective,
  substituteTags,
  processEnvironment,
  environmentFrom,
} from './tags';
export type { TagMatch, ResolveContext } from './tags';

export { readFixtureFile } from './shared/reader';
export { createDatabaseClient } from './shared/db';
export type { DatabaseClient, DatabaseClientOptions, QueryOutcome } from './shared/db';
export { createTableInserter, buildInsert, quoteIdentifier } from './storage/table-inserter';
export type { TableInserterOptions } from './storage/table-inserter';

export { loadSeederConfig } from './config';
export { createRootLogger, createLogger } from './shared/logger';

export { FixtureError, FixtureErrorCodes } from './shared/types';
export type {
  AsyncInsertFn,
  Environment,
  ErrorContext,
  FileReader,
  FixtureErrorCode,
  Identifier,
  NamedRecords,
  RecordDecoder,
  SeederConfig,
  SyncInsertFn,
} from './shared/types';
