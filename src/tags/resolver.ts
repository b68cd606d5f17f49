import { FixtureError, FixtureErrorCodes } from '../shared/types';
import type { Environment } from '../shared/types';
import type { NameLookup } from '../registry/name-registry';

export interface ResolveContext {
  registry: NameLookup;
  env: Environment;
}

/** Reads `process.env` at call time. */
export const processEnvironment: Environment = (key) =>
  Object.prototype.hasOwnProperty.call(process.env, key) ? process.env[key] : undefined;

/** Environment capability backed by a plain record, e.g. a test fixture. */
export function environmentFrom(vars: Record<string, string | undefined>): Environment {
  return (key) => (Object.prototype.hasOwnProperty.call(vars, key) ? vars[key] : undefined);
}

function resolveEnv(key: string, fallback: string | undefined, env: Environment): string {
  const value = env(key);
  if (value !== undefined) return value;
  if (fallback !== undefined) return fallback;

  throw new FixtureError({
    code: FixtureErrorCodes.MISSING_ENV_VAR,
    message: `environment variable \`${key}\` is not set and no default was given`,
    context: { directive: 'ENV', key },
  });
}

function resolveRef(key: string, registry: NameLookup): string {
  const value = registry.lookup(key);
  if (value !== undefined) return value;

  throw new FixtureError({
    code: FixtureErrorCodes.UNRESOLVED_REFERENCE,
    message: `no record has been registered under the label \`${key}\``,
    context: { directive: 'REF', key },
  });
}

/**
 * Produce the replacement text for one tag.
 *
 * - ENV(key[:-default]): environment value, then the default.
 * - REF(label): identifier registered for the label. Defaults are ignored.
 */
export function resolveDirective(
  directive: string,
  key: string,
  fallback: string | undefined,
  ctx: ResolveContext,
): string {
  switch (directive) {
    case 'ENV':
      return resolveEnv(key, fallback, ctx.env);
    case 'REF':
      return resolveRef(key, ctx.registry);
    default:
      throw new FixtureError({
        code: FixtureErrorCodes.UNSUPPORTED_DIRECTIVE,
        message: `the directive \`${directive}\` is not supported`,
        context: { directive, key },
      });
  }
}
