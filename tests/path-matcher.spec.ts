import { describe, it, expect } from 'vitest';
import { anyMatch, matchesPattern } from '../src/path-matcher.js';

describe('matchesPattern', () => {
  it('matches an exact path', () => {
    expect(matchesPattern('README.md', 'README.md')).toBe(true);
  });

  it('treats a pattern as a directory prefix', () => {
    expect(matchesPattern('docs', 'docs/readme.md')).toBe(true);
    expect(matchesPattern('docs/', 'docs/guide/intro.md')).toBe(true);
    expect(matchesPattern('docs', 'documentation/readme.md')).toBe(false);
  });

  it('keeps * and ? within one path segment', () => {
    expect(matchesPattern('*.md', 'README.md')).toBe(true);
    expect(matchesPattern('*.md', 'docs/readme.md')).toBe(false);
    expect(matchesPattern('src/?.ts', 'src/a.ts')).toBe(true);
    expect(matchesPattern('src/?.ts', 'src/ab.ts')).toBe(false);
  });

  it('lets ** span directories', () => {
    expect(matchesPattern('**/*.md', 'docs/guide/intro.md')).toBe(true);
    expect(matchesPattern('src/**/*.go', 'src/cmd/main.go')).toBe(true);
  });

  it('applies globs to leading directories too', () => {
    expect(matchesPattern('packages/*', 'packages/core/src/index.ts')).toBe(true);
  });

  it('matches dot files', () => {
    expect(matchesPattern('.github', '.github/workflows/ci.yml')).toBe(true);
  });
});

describe('anyMatch', () => {
  it('is true for an empty pattern list', () => {
    expect(anyMatch([], ['src/main.go'])).toBe(true);
    expect(anyMatch([], [])).toBe(true);
  });

  it('ignores blank patterns', () => {
    expect(anyMatch(['', '  '], ['src/main.go'])).toBe(true);
  });

  it('matches a directory pattern against a file below it', () => {
    expect(anyMatch(['docs'], ['docs/readme.md'])).toBe(true);
  });

  it('rejects paths outside every pattern', () => {
    expect(anyMatch(['docs'], ['src/main.go'])).toBe(false);
    expect(anyMatch(['docs'], [])).toBe(false);
  });

  it('needs only one pattern to match one path', () => {
    expect(anyMatch(['docs', 'Makefile'], ['src/main.go', 'Makefile'])).toBe(true);
  });
});
