/**
 * Barrel export for the tags module.
 */
export { scanTag } from './scanner';
export type { TagMatch } from './scanner';

export { resolveDirective, processEnvironment, environmentFrom } from './resolver';
export type { ResolveContext } from './resolver';

export { substituteTags } from './assembler';
