/**
 * Scanner for embedded fixture tags.
 *
 * Tag syntax: ${{ DIRECTIVE(KEY) }} or ${{ DIRECTIVE(KEY:-DEFAULT) }}
 *
 * Whitespace (including non-ASCII spaces) is allowed around every token.
 * Anything that does not match the full pattern is left alone as literal text.
 */

export interface TagMatch {
  /** Operation selector, e.g. ENV or REF. */
  directive: string;
  /** Environment variable name or record label. */
  key: string;
  /** Fallback after `:-`. A quoted default keeps its quotes. */
  default?: string;
  /** Offset of the leading `$` (UTF-16 code units). */
  start: number;
  /** Offset just past the closing `}}`. */
  end: number;
}

/**
 * DIRECTIVE: ASCII alphanumerics.
 * KEY: ASCII alphanumerics, `_` and `-`.
 * DEFAULT: ASCII alphanumerics, or a double-quoted run with no `"` and no control characters.
 * Whitespace is Unicode White_Space.
 */
const TAG_PATTERN =
  /\$\{\{\p{White_Space}*([A-Za-z0-9]+)\p{White_Space}*\(\p{White_Space}*([A-Za-z0-9_-]+)(?:\p{White_Space}*:-\p{White_Space}*([A-Za-z0-9]+|"[^"\u0000-\u001F\u007F]+"))?\p{White_Space}*\)\p{White_Space}*\}\}/u;

/**
 * Find the leftmost well-formed tag in `text`.
 * Returns null when the text holds no tag.
 */
export function scanTag(text: string): TagMatch | null {
  const match = TAG_PATTERN.exec(text);
  if (!match) return null;

  const [whole, directive, key, fallback] = match;
  const tag: TagMatch = {
    directive,
    key,
    start: match.index,
    end: match.index + whole.length,
  };
  if (fallback !== undefined) {
    tag.default = fallback;
  }
  return tag;
}
