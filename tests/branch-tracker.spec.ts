import { describe, it, expect } from 'vitest';
import { advanceWatermark, getBranchIfTracked, observe } from '../src/branch-tracker.js';
import type { RepositoryConfig } from '../src/types.js';

function repoWith(watermark: string): RepositoryConfig {
  return {
    name: 'demo',
    url: 'https://example.test/demo.git',
    branches: {
      main: { name: 'main', lastSeenCommit: watermark, interestPatterns: [] },
    },
  };
}

describe('getBranchIfTracked', () => {
  it('strips the remote prefix', () => {
    const repo = repoWith('');
    expect(getBranchIfTracked(repo, 'origin/main')).toBe(repo.branches['main']);
    expect(getBranchIfTracked(repo, 'main')).toBe(repo.branches['main']);
  });

  it('returns undefined for other branches and object keys', () => {
    const repo = repoWith('');
    expect(getBranchIfTracked(repo, 'origin/develop')).toBeUndefined();
    expect(getBranchIfTracked(repo, 'origin/toString')).toBeUndefined();
    expect(getBranchIfTracked(repo, 'upstream/main')).toBeUndefined();
  });
});

describe('observe', () => {
  it('ignores untracked refs', () => {
    expect(observe(repoWith('aaaa1111'), 'origin/feature', 'bbbb2222')).toEqual({ kind: 'untracked' });
  });

  it('records a first observation and moves the watermark', () => {
    const repo = repoWith('');
    const observation = observe(repo, 'origin/main', 'bbbb2222');

    expect(observation.kind).toBe('first-seen');
    expect(repo.branches['main']?.lastSeenCommit).toBe('bbbb2222');
  });

  it('reports an unchanged branch', () => {
    expect(observe(repoWith('aaaa1111'), 'origin/main', 'aaaa1111').kind).toBe('unchanged');
  });

  it('reports a change without moving the watermark yet', () => {
    const repo = repoWith('aaaa1111');
    const observation = observe(repo, 'origin/main', 'bbbb2222');

    expect(observation).toMatchObject({ kind: 'changed', from: 'aaaa1111', to: 'bbbb2222' });
    expect(repo.branches['main']?.lastSeenCommit).toBe('aaaa1111');
  });

  it('sees the same change again until the watermark is advanced', () => {
    const repo = repoWith('aaaa1111');
    observe(repo, 'origin/main', 'bbbb2222');
    expect(observe(repo, 'origin/main', 'bbbb2222').kind).toBe('changed');

    const branch = repo.branches['main'];
    if (branch) advanceWatermark(branch, 'bbbb2222');
    expect(observe(repo, 'origin/main', 'bbbb2222').kind).toBe('unchanged');
  });
});
