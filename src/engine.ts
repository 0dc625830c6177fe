import { advanceWatermark, observe } from './branch-tracker.js';
import { parseNameStatus } from './diff-parser.js';
import { describeError, DiffSubprocessError, PollError, PollTimeoutError } from './errors.js';
import { KeyedLock } from './keyed-lock.js';
import { createLogger, type Logger } from './logger.js';
import { RepositoryMirror } from './mirror.js';
import { NotificationBuilder } from './notification.js';
import { anyMatch } from './path-matcher.js';
import type {
  BranchConfig,
  FetchOutcome,
  GithubCredentials,
  Mirror,
  Publisher,
  RepositoryConfig,
  VcsEngine,
  WatchSet,
} from './types.js';

export type PollResult =
  | {
      ok: true;
      repository: string;
      fetch: FetchOutcome;
      firstSeen: string[];
      published: string[];
      suppressed: string[];
    }
  | { ok: false; repository: string; error: PollError };

export interface EngineOptions {
  vcs: VcsEngine;
  publisher: Publisher;
  reposDir: string;
  credentials?: () => GithubCredentials | undefined;
  // 0 disables the per-repository timeout
  timeoutMs?: number;
  logger?: Logger;
}

export const DEFAULT_POLL_TIMEOUT_MS = 120_000;

export class ChangeDetectionEngine {
  private readonly mirrors: Map<string, RepositoryMirror> = new Map();
  private readonly lock = new KeyedLock();
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(private readonly options: EngineOptions) {
    this.logger = options.logger ?? createLogger('[engine] ');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_POLL_TIMEOUT_MS;
  }

  /**
   * Runs one poll cycle for one repository. Never rejects: failures come
   * back as `{ ok: false }` and leave the uncommitted watermarks untouched.
   */
  pollOnce(repo: RepositoryConfig): Promise<PollResult> {
    return this.lock.runExclusive<PollResult>(repo.name, async () => {
      const controller = new AbortController();
      const timer =
        this.timeoutMs > 0
          ? setTimeout(() => controller.abort(new PollTimeoutError(repo.name, this.timeoutMs)), this.timeoutMs)
          : undefined;

      try {
        return await this.poll(repo, controller.signal);
      } catch (error) {
        const cause = controller.signal.aborted ? controller.signal.reason : error;
        const pollError = new PollError(repo.name, cause);
        this.logger.error(pollError.message);
        return { ok: false, repository: repo.name, error: pollError };
      } finally {
        clearTimeout(timer);
      }
    });
  }

  /** Polls every repository concurrently; one failure does not stop the others. */
  pollAll(watchSet: WatchSet): Promise<PollResult[]> {
    return Promise.all(Object.values(watchSet).map((repo) => this.pollOnce(repo)));
  }

  /** Drops the cached mirror handle, e.g. after the repository was removed from the watch set. */
  forget(name: string): void {
    this.mirrors.delete(name);
  }

  private mirrorFor(repo: RepositoryConfig): RepositoryMirror {
    let mirror = this.mirrors.get(repo.name);
    if (!mirror) {
      mirror = new RepositoryMirror(repo.name, {
        vcs: this.options.vcs,
        reposDir: this.options.reposDir,
        credentials: this.options.credentials,
        logger: createLogger(`[${repo.name}] `),
      });
      this.mirrors.set(repo.name, mirror);
    }
    return mirror;
  }

  private async poll(repo: RepositoryConfig, signal: AbortSignal): Promise<PollResult> {
    const repositoryMirror = this.mirrorFor(repo);
    const mirror = await repositoryMirror.ensureOpen(repo, signal);
    signal.throwIfAborted();
    const fetch = await repositoryMirror.fetch(repo, signal);

    const firstSeen: string[] = [];
    const published: string[] = [];
    const suppressed: string[] = [];

    for (const ref of await mirror.listRefs()) {
      if (!ref.isRemote) continue;
      signal.throwIfAborted();

      const observation = observe(repo, ref.name, ref.commitId);
      switch (observation.kind) {
        case 'untracked':
        case 'unchanged':
          break;
        case 'first-seen':
          this.logger.debug(`${repo.name}/${observation.branch.name}: first observation at ${observation.commit}`);
          firstSeen.push(observation.branch.name);
          break;
        case 'changed': {
          this.logger.debug(`${observation.from} != ${observation.to}`);
          const reported = await this.processChange(repo, mirror, observation.branch, observation.from, observation.to, signal);
          (reported ? published : suppressed).push(observation.branch.name);
          break;
        }
      }
    }

    return { ok: true, repository: repo.name, fetch, firstSeen, published, suppressed };
  }

  /**
   * Diffs, filters and publishes one branch change, then commits the
   * watermark. A diff failure throws before the watermark moves; a publish
   * failure does not stop it from moving.
   */
  private async processChange(
    repo: RepositoryConfig,
    mirror: Mirror,
    branch: BranchConfig,
    from: string,
    to: string,
    signal: AbortSignal,
  ): Promise<boolean> {
    let output: string;
    try {
      output = await mirror.diffNameStatus(from, to, signal);
    } catch (error) {
      throw new DiffSubprocessError(repo.name, from, to, error);
    }

    const changes = parseNameStatus(output);
    for (const change of changes) {
      this.logger.debug(`${change.changeType} - ${change.path}`);
    }

    const report = anyMatch(
      branch.interestPatterns,
      changes.map((change) => change.path),
    );

    if (report) {
      const payload = new NotificationBuilder({ repository: repo.name, url: repo.url, branch: branch.name, from, to, changes }).toPayload();
      try {
        await this.options.publisher.publish(payload.title, payload.body, payload.link, payload.id);
      } catch (error) {
        this.logger.warn(`publishing ${payload.title} failed: ${describeError(error)}`);
      }
    } else {
      this.logger.debug(`${repo.name}/${branch.name}: no interesting files in ${from}..${to}`);
    }

    advanceWatermark(branch, to);
    return report;
  }
}
