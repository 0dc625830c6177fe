import path from 'path';
import { DEFAULT_REMOTE, getBranchIfTracked } from './branch-tracker.js';
import { describeError, FetchError, MirrorCorruptedError, MirrorInitError, MirrorNotFoundError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import type {
  FetchAuth,
  FetchOutcome,
  GithubCredentials,
  Mirror,
  RefInfo,
  RemoteConfig,
  RepositoryConfig,
  VcsEngine,
} from './types.js';

export const GITHUB_HOST = 'github.com';

export function isGithubRemote(url: string): boolean {
  try {
    return new URL(url).host === GITHUB_HOST;
  } catch {
    // scp-like ssh remotes (git@github.com:owner/repo.git) authenticate with keys
    return false;
  }
}

/** Token auth applies only to GitHub remotes, and only with both user and token set. */
export function selectAuth(url: string, credentials?: GithubCredentials): FetchAuth | undefined {
  if (!credentials || !credentials.user || !credentials.token) return undefined;
  if (!isGithubRemote(url)) return undefined;
  return { username: credentials.user, password: credentials.token };
}

export function validateRemotes(dir: string, remotes: RemoteConfig[], url: string): void {
  if (remotes.length === 0) {
    throw new MirrorCorruptedError(dir, 'no remote configured');
  }
  if (remotes.length > 1) {
    throw new MirrorCorruptedError(dir, 'only one remote expected');
  }
  if (remotes[0]?.url !== url) {
    throw new MirrorCorruptedError(dir, 'remote URL is different from the one in the config');
  }
}

export interface RepositoryMirrorOptions {
  vcs: VcsEngine;
  reposDir: string;
  credentials?: () => GithubCredentials | undefined;
  logger?: Logger;
}

/**
 * Owns the bare local mirror of one configured repository.
 */
export class RepositoryMirror {
  private handle?: Mirror;
  private openedUrl?: string;
  private readonly logger: Logger;

  constructor(
    readonly name: string,
    private readonly options: RepositoryMirrorOptions,
  ) {
    this.logger = options.logger ?? createLogger(`[mirror:${name}] `);
  }

  get storageDir(): string {
    return path.join(this.options.reposDir, this.name);
  }

  /**
   * Returns the open mirror, (re)opening it when it was never opened or when
   * the configured URL changed since.
   */
  async ensureOpen(config: RepositoryConfig, signal?: AbortSignal): Promise<Mirror> {
    if (this.handle && this.openedUrl === config.url) return this.handle;
    return this.openOrInit(config, signal);
  }

  async openOrInit(config: RepositoryConfig, signal?: AbortSignal): Promise<Mirror> {
    const existing = await this.tryOpen(config);
    if (existing) {
      this.remember(existing, config.url);
      return existing;
    }

    let mirror: Mirror;
    try {
      mirror = await this.options.vcs.initMirror(this.storageDir);
      await mirror.addRemote(DEFAULT_REMOTE, config.url);
      this.logger.debug('initial fetch');
      await this.fetchWith(mirror, config, signal);
    } catch (error) {
      throw await this.abandonInit(config, error);
    }

    // the first watermark comes from the initial fetch, so no change is reported for it
    let refs: RefInfo[];
    try {
      refs = await mirror.listRefs();
    } catch (error) {
      throw await this.abandonInit(config, error);
    }
    for (const ref of refs) {
      if (!ref.isRemote) continue;
      const branch = getBranchIfTracked(config, ref.name);
      if (branch) branch.lastSeenCommit = ref.commitId;
    }

    this.remember(mirror, config.url);
    return mirror;
  }

  async fetch(config: RepositoryConfig, signal?: AbortSignal): Promise<FetchOutcome> {
    const mirror = await this.ensureOpen(config, signal);
    return this.fetchWith(mirror, config, signal);
  }

  private async fetchWith(mirror: Mirror, config: RepositoryConfig, signal?: AbortSignal): Promise<FetchOutcome> {
    const auth = selectAuth(config.url, this.options.credentials?.());
    try {
      const outcome = await mirror.fetch(DEFAULT_REMOTE, { auth, signal });
      this.logger.debug(outcome === 'up-to-date' ? `already up to date: ${config.url}` : `fetched ${config.url}`);
      return outcome;
    } catch (error) {
      throw new FetchError(config.name, error);
    }
  }

  private async tryOpen(config: RepositoryConfig): Promise<Mirror | undefined> {
    const dir = this.storageDir;
    try {
      const mirror = await this.options.vcs.openMirror(dir);
      validateRemotes(dir, await this.readRemotes(mirror), config.url);
      return mirror;
    } catch (error) {
      if (error instanceof MirrorNotFoundError) return undefined;
      if (error instanceof MirrorCorruptedError) {
        this.logger.warn(`${error.reason}, rebuilding mirror at ${dir}`);
        await this.discard();
        return undefined;
      }
      throw new MirrorInitError(config.name, error);
    }
  }

  // a half-built mirror would pass validation next time and skip the first watermarks
  private async abandonInit(config: RepositoryConfig, cause: unknown): Promise<MirrorInitError> {
    try {
      await this.discard();
    } catch (error) {
      this.logger.warn(`could not remove ${this.storageDir}: ${describeError(error)}`);
    }
    return new MirrorInitError(config.name, cause);
  }

  private async readRemotes(mirror: Mirror): Promise<RemoteConfig[]> {
    try {
      return await mirror.remotes();
    } catch (error) {
      throw new MirrorCorruptedError(mirror.path, `cannot read remotes: ${describeError(error)}`);
    }
  }

  private remember(mirror: Mirror, url: string): void {
    this.handle = mirror;
    this.openedUrl = url;
  }

  private async discard(): Promise<void> {
    this.handle = undefined;
    this.openedUrl = undefined;
    await this.options.vcs.removeMirror(this.storageDir);
  }
}
