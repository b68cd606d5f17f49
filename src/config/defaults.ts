import { z } from 'zod';
import { FixtureError, FixtureErrorCodes } from '../shared/types';
import type { SeederConfig } from '../shared/types';

const seederConfigSchema = z.object({
  FIXTURES_DIR: z.string().default(''),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export function loadSeederConfig(
  env: Record<string, string | undefined> = process.env,
): SeederConfig {
  const result = seederConfigSchema.safeParse(env);

  if (!result.success) {
    const invalid = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new FixtureError({
      code: FixtureErrorCodes.INVALID_CONFIG,
      message: `Invalid environment variables: ${invalid}`,
      cause: result.error,
    });
  }

  const parsed = result.data;

  return {
    fixtures_dir: parsed.FIXTURES_DIR,
    log_level: parsed.LOG_LEVEL,
  };
}
