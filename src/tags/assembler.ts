import { scanTag } from './scanner';
import { resolveDirective, type ResolveContext } from './resolver';

/**
 * Replace every embedded tag in `rawText`.
 *
 * Scans the unconsumed suffix for the leftmost tag, copies the literal text in
 * front of it, then appends the resolved value. The first resolution failure is
 * thrown as-is and no partial text is returned.
 */
export function substituteTags(rawText: string, ctx: ResolveContext): string {
  let cursor = 0;
  let output = '';

  while (cursor < rawText.length) {
    const rest = rawText.slice(cursor);
    const tag = scanTag(rest);

    if (!tag) {
      output += rest;
      break;
    }

    const replacement = resolveDirective(tag.directive, tag.key, tag.default, ctx);
    output += rest.slice(0, tag.start) + replacement;
    cursor += tag.end;
  }

  return output;
}
