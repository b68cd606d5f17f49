import { describe, it, expect } from 'vitest';
import * as path from 'node:path';
import { readFixtureFile } from '../../src/shared/reader';
import { FixtureError, FixtureErrorCodes } from '../../src/shared/types';
import { SEEDS_DIR, catchFixtureError } from '../helpers/seed-helpers';

describe('readFixtureFile', () => {
  it('reads a file relative to the base directory', () => {
    expect(readFixtureFile('items.yml', SEEDS_DIR).startsWith('Melon:\n  name: melon\n')).toBe(true);
  });

  it('ignores the base directory for an absolute filename', () => {
    const text = readFixtureFile(path.join(SEEDS_DIR, 'items.yml'), '/does/not/exist');
    expect(text.startsWith('Melon:')).toBe(true);
  });

  it('throws NOT_FOUND with the resolved path', () => {
    const err = catchFixtureError(() => readFixtureFile('missing.yml', SEEDS_DIR));

    expect(err).toBeInstanceOf(FixtureError);
    expect(err.code).toBe(FixtureErrorCodes.NOT_FOUND);
    expect(err.context).toEqual({
      filename: 'missing.yml',
      path: path.join(SEEDS_DIR, 'missing.yml'),
    });
    expect(err.retryable).toBe(false);
  });
});
