// === Identifiers and capabilities ===

/** Value returned by an insertion callback; stored in the registry as text. */
export type Identifier = string | number | bigint;

/** Ordered label → record mapping produced by a decoder. */
export type NamedRecords<T> = Map<string, T>;

/** Reads the raw text of a fixture file. Throws when the file cannot be read. */
export type FileReader = (filename: string, baseDir?: string) => string;

/** Decodes substituted text into labelled records, in file order. */
export type RecordDecoder<T> = (text: string) => NamedRecords<T>;

/** Environment variable lookup. `undefined` means the variable is not set. */
export type Environment = (key: string) => string | undefined;

export type SyncInsertFn<T, U extends Identifier> = (record: T) => U;

export type AsyncInsertFn<T, U extends Identifier> = (record: T) => U | Promise<U>;

// === Error Type ===

export const FixtureErrorCodes = {
  NOT_FOUND: 'FIXTURE_E101',
  UNSUPPORTED_DIRECTIVE: 'FIXTURE_E201',
  MISSING_ENV_VAR: 'FIXTURE_E202',
  UNRESOLVED_REFERENCE: 'FIXTURE_E203',
  DECODE_FAILED: 'FIXTURE_E301',
  INSERT_FAILED: 'FIXTURE_E401',
  ALREADY_LOADED: 'FIXTURE_E501',
  NOT_LOADED: 'FIXTURE_E502',
  RECORD_NOT_FOUND: 'FIXTURE_E503',
  INVALID_CONFIG: 'FIXTURE_E601',
} as const;

export type FixtureErrorCode = (typeof FixtureErrorCodes)[keyof typeof FixtureErrorCodes];

export interface ErrorContext {
  filename?: string;
  path?: string;
  label?: string;
  key?: string;
  directive?: string;
}

export class FixtureError extends Error {
  readonly code: FixtureErrorCode;
  readonly context: ErrorContext;
  readonly retryable: boolean;

  constructor(opts: {
    code: FixtureErrorCode;
    message: string;
    context?: ErrorContext;
    cause?: unknown;
    retryable?: boolean;
  }) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'FixtureError';
    this.code = opts.code;
    this.context = opts.context ?? {};
    this.retryable = opts.retryable ?? false;
  }

  /**
   * Copy of this error with extra context merged in.
   * Existing context keys win so the innermost location is kept.
   */
  withContext(context: ErrorContext): FixtureError {
    return new FixtureError({
      code: this.code,
      message: this.message,
      context: { ...context, ...this.context },
      cause: this.cause,
      retryable: this.retryable,
    });
  }
}

// === Seeder Configuration ===

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface SeederConfig {
  fixtures_dir: string;
  log_level: LogLevel;
}
