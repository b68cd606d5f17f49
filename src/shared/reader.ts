import fs from 'fs';
import path from 'path';
import { FixtureError, FixtureErrorCodes } from './types';

/**
 * Read a fixture file as utf-8.
 * Relative paths resolve against `baseDir`, which itself resolves against the
 * working directory. An absolute `filename` ignores `baseDir`.
 */
export function readFixtureFile(filename: string, baseDir = ''): string {
  const fullPath = path.resolve(baseDir, filename);
  try {
    return fs.readFileSync(fullPath, 'utf-8');
  } catch (err) {
    throw new FixtureError({
      code: FixtureErrorCodes.NOT_FOUND,
      message: `can't open the file: ${fullPath}`,
      context: { filename, path: fullPath },
      cause: err,
    });
  }
}
