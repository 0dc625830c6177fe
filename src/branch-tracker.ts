import type { BranchConfig, Observation, RepositoryConfig } from './types.js';

export const DEFAULT_REMOTE = 'origin';

/**
 * Returns the tracked branch for a short ref name such as `origin/main`,
 * or undefined when the branch is not listed in the repository config.
 */
export function getBranchIfTracked(repo: RepositoryConfig, refName: string): BranchConfig | undefined {
  const prefix = `${DEFAULT_REMOTE}/`;
  const branchName = refName.startsWith(prefix) ? refName.slice(prefix.length) : refName;
  return Object.hasOwn(repo.branches, branchName) ? repo.branches[branchName] : undefined;
}

/**
 * Classifies one remote ref against the stored watermark.
 *
 * A first observation moves the watermark immediately; a change does not,
 * the caller commits it with {@link advanceWatermark} once the notification
 * decision is made.
 */
export function observe(repo: RepositoryConfig, refName: string, commit: string): Observation {
  const branch = getBranchIfTracked(repo, refName);
  if (!branch) return { kind: 'untracked' };

  if (branch.lastSeenCommit === '') {
    branch.lastSeenCommit = commit;
    return { kind: 'first-seen', branch, commit };
  }

  if (branch.lastSeenCommit === commit) {
    return { kind: 'unchanged', branch };
  }

  return { kind: 'changed', branch, from: branch.lastSeenCommit, to: commit };
}

export function advanceWatermark(branch: BranchConfig, commit: string): void {
  branch.lastSeenCommit = commit;
}
