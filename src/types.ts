export interface BranchConfig {
  name: string;
  // last commit that's been processed, empty when the branch was never observed
  lastSeenCommit: string;
  // if non empty, only changes touching these files (or directories) are reported
  interestPatterns: string[];
}

export interface RepositoryConfig {
  name: string;
  url: string;
  branches: Record<string, BranchConfig>;
}

export type WatchSet = Record<string, RepositoryConfig>;

export interface GithubCredentials {
  user: string;
  token: string;
}

export interface FeedSettings {
  path: string;
  title: string;
  maxItems: number;
}

export interface WatchConfig {
  reposDir: string;
  intervalMinutes: number;
  feed?: FeedSettings;
  github?: GithubCredentials;
  repos: WatchSet;
}

export type ChangeType = 'Added' | 'Modified' | 'Deleted' | 'Renamed' | 'Copied';

export interface ChangeRecord {
  changeType: ChangeType;
  path: string;
}

export interface NotificationPayload {
  // stable per repository and commit: `<repo>@<new-commit>`
  id: string;
  title: string;
  body: string;
  link: string;
}

export type Observation =
  | { kind: 'untracked' }
  | { kind: 'first-seen'; branch: BranchConfig; commit: string }
  | { kind: 'unchanged'; branch: BranchConfig }
  | { kind: 'changed'; branch: BranchConfig; from: string; to: string };

export interface RemoteConfig {
  name: string;
  url: string;
}

export interface RefInfo {
  // short name, e.g. "origin/main"
  name: string;
  commitId: string;
  isRemote: boolean;
}

export interface FetchAuth {
  username: string;
  password: string;
}

export interface FetchOptions {
  auth?: FetchAuth;
  signal?: AbortSignal;
}

export type FetchOutcome = 'fetched' | 'up-to-date';

/** An opened local mirror, as handed out by a {@link VcsEngine}. */
export interface Mirror {
  readonly path: string;
  remotes(): Promise<RemoteConfig[]>;
  addRemote(name: string, url: string): Promise<void>;
  fetch(remote: string, options?: FetchOptions): Promise<FetchOutcome>;
  listRefs(): Promise<RefInfo[]>;
  /** Raw `--name-status` output between two commits, run inside the mirror directory. */
  diffNameStatus(from: string, to: string, signal?: AbortSignal): Promise<string>;
}

export interface VcsEngine {
  /** Rejects with `MirrorNotFoundError` when nothing exists at `dir`. */
  openMirror(dir: string): Promise<Mirror>;
  initMirror(dir: string): Promise<Mirror>;
  removeMirror(dir: string): Promise<void>;
}

export interface Publisher {
  /** `id` identifies the notification across retries; publishers that keep history dedupe on it. */
  publish(title: string, body: string, link: string, id?: string): Promise<void>;
}

export type ExecOptions = {
  cwd?: string;
  env?: Record<string, string>;
  timeout?: number;
  signal?: AbortSignal;
};

export type ExecResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type ExecCommand = (command: string, args: string[], options?: ExecOptions) => Promise<ExecResult>;
