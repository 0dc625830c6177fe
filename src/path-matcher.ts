import picomatch from 'picomatch';

const GLOB_OPTIONS = { dot: true };

/**
 * Tests one changed path against one interest pattern.
 *
 * The pattern is a shell glob (`*` and `?` stay within a segment, `**` spans
 * segments). A pattern that matches a leading directory of the path also
 * matches, so `docs` and `docs/*` both match `docs/guide/intro.md`.
 */
export function matchesPattern(pattern: string, path: string): boolean {
  const normalized = pattern.replace(/\/+$/, '');
  if (normalized === '') return false;
  if (normalized === path) return true;

  const isMatch = picomatch(normalized, GLOB_OPTIONS);
  if (isMatch(path)) return true;

  const segments = path.split('/');
  for (let depth = 1; depth < segments.length; depth++) {
    if (isMatch(segments.slice(0, depth).join('/'))) return true;
  }
  return false;
}

/**
 * True when any pattern matches any changed path, or when there are no
 * patterns at all (no filter). This is a whole-change decision: a mixed
 * change set is reported in full as soon as one file is interesting.
 */
export function anyMatch(patterns: readonly string[], changedPaths: readonly string[]): boolean {
  const effective = patterns.filter((pattern) => pattern.trim() !== '');
  if (effective.length === 0) return true;
  return effective.some((pattern) => changedPaths.some((path) => matchesPattern(pattern, path)));
}
