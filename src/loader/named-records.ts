import { substituteTags, processEnvironment } from '../tags';
import { readFixtureFile } from '../shared/reader';
import { FixtureError, FixtureErrorCodes } from '../shared/types';
import type { Environment, FileReader, NamedRecords, RecordDecoder } from '../shared/types';
import type { NameLookup } from '../registry/name-registry';

export interface LoadOptions {
  baseDir?: string;
  /** Identifiers that REF tags may point at. */
  registry: NameLookup;
  reader?: FileReader;
  env?: Environment;
}

/**
 * Read one fixture file, replace its embedded tags, then decode it.
 *
 * 1. Read raw text (NOT_FOUND on failure)
 * 2. Substitute ENV/REF tags against `registry`
 * 3. Decode into labelled records (DECODE_FAILED on failure)
 *
 * Nothing is written anywhere; errors carry the filename.
 */
export function loadNamedRecords<T>(
  filename: string,
  decoder: RecordDecoder<T>,
  options: LoadOptions,
): NamedRecords<T> {
  const reader = options.reader ?? readFixtureFile;
  const env = options.env ?? processEnvironment;

  let rawText: string;
  try {
    rawText = reader(filename, options.baseDir);
  } catch (err) {
    if (err instanceof FixtureError) throw err.withContext({ filename });
    throw new FixtureError({
      code: FixtureErrorCodes.NOT_FOUND,
      message: `can't open the file: ${filename}`,
      context: { filename },
      cause: err,
    });
  }

  let parsedText: string;
  try {
    parsedText = substituteTags(rawText, { registry: options.registry, env });
  } catch (err) {
    if (err instanceof FixtureError) throw err.withContext({ filename });
    throw err;
  }

  try {
    return decoder(parsedText);
  } catch (err) {
    if (err instanceof FixtureError) throw err.withContext({ filename });
    throw new FixtureError({
      code: FixtureErrorCodes.DECODE_FAILED,
      message: `decoding failed, check the file: ${filename}`,
      context: { filename },
      cause: err,
    });
  }
}
