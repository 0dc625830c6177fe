import { watch, type FSWatcher } from 'chokidar';
import { ConfigManager } from './config.js';
import { ChangeDetectionEngine, type PollResult } from './engine.js';
import { describeError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import type { RepositoryConfig } from './types.js';

// watermarks in memory are at least as recent as the ones this process last wrote
function carryWatermarks(from: RepositoryConfig, to: RepositoryConfig): void {
  for (const [name, branch] of Object.entries(to.branches)) {
    const previous = Object.hasOwn(from.branches, name) ? from.branches[name] : undefined;
    if (previous?.lastSeenCommit) branch.lastSeenCommit = previous.lastSeenCommit;
  }
}

export interface RepoWatcherOptions {
  intervalMinutes: number;
  // reload the watch set when the config file is edited
  watchConfigFile?: boolean;
  logger?: Logger;
}

/**
 * Drives poll cycles on a timer and writes the updated watermarks back to
 * the config file after every repository poll.
 */
export class RepoWatcher {
  private intervalTimer?: NodeJS.Timeout;
  private configWatcher?: FSWatcher;
  private currentCycle?: Promise<PollResult[]>;
  // full and single-repository cycles still in flight
  private runningCycles = 0;
  private reloadPending = false;
  private readonly logger: Logger;

  constructor(
    private readonly engine: ChangeDetectionEngine,
    private readonly configManager: ConfigManager,
    private readonly options: RepoWatcherOptions,
  ) {
    this.logger = options.logger ?? createLogger('[watcher] ');
  }

  /**
   * Polls every watched repository (or only `repoName`) once. A cycle that is
   * already running is joined rather than started twice.
   */
  public runCycle(repoName?: string): Promise<PollResult[]> {
    if (this.currentCycle && !repoName) return this.currentCycle;

    this.runningCycles++;
    const cycle = this.pollRepositories(repoName).finally(() => {
      this.runningCycles--;
      if (this.currentCycle === cycle) this.currentCycle = undefined;
      // cycles still running keep advancing the watch set loaded before the reload
      if (this.reloadPending && this.runningCycles === 0) this.reloadConfig();
    });
    if (!repoName) this.currentCycle = cycle;
    return cycle;
  }

  private async pollRepositories(repoName?: string): Promise<PollResult[]> {
    const watchSet = this.configManager.getWatchSet();
    const repos = Object.values(watchSet).filter((repo) => !repoName || repo.name === repoName);

    return Promise.all(
      repos.map(async (repo) => {
        const result = await this.engine.pollOnce(repo);
        this.persist();
        if (result.ok && result.published.length > 0) {
          this.logger.info(`${repo.name}: published changes for ${result.published.join(', ')}`);
        }
        return result;
      }),
    );
  }

  private persist(): void {
    try {
      // an edit made during the cycle is merged on reload instead of overwritten
      if (this.configManager.hasExternalChanges()) {
        this.reloadPending = true;
        return;
      }
      this.configManager.saveConfig();
    } catch (error) {
      this.logger.error(`Error saving config: ${describeError(error)}`);
    }
  }

  public async start(): Promise<PollResult[]> {
    // Check for changes on startup
    const first = await this.runCycle();

    this.intervalTimer = setInterval(() => {
      this.runCycle().catch((error: unknown) => {
        this.logger.error(`Poll cycle failed: ${describeError(error)}`);
      });
    }, this.options.intervalMinutes * 60 * 1000);

    if (this.options.watchConfigFile) {
      this.configWatcher = watch(this.configManager.configPath, {
        persistent: true,
        ignoreInitial: true,
      });
      this.configWatcher.on('change', () => this.handleConfigChange());
    }

    return first;
  }

  private handleConfigChange(): void {
    // our own saves after each poll also fire here
    if (!this.configManager.hasExternalChanges()) return;
    if (this.runningCycles > 0) {
      // a running cycle still writes into the old watch set; reload once it is done
      this.reloadPending = true;
      return;
    }
    this.reloadConfig();
  }

  private reloadConfig(): void {
    this.reloadPending = false;
    const previous = this.configManager.getWatchSet();
    try {
      const config = this.configManager.reload();
      for (const [name, repo] of Object.entries(previous)) {
        const reloaded = Object.hasOwn(config.repos, name) ? config.repos[name] : undefined;
        if (!reloaded) {
          this.engine.forget(name);
        } else if (reloaded.url === repo.url) {
          carryWatermarks(repo, reloaded);
        }
      }
      this.configManager.saveConfig();
      this.logger.info(`Reloaded ${this.configManager.configPath} (${Object.keys(config.repos).length} repositories)`);
    } catch (error) {
      this.logger.error(`Keeping previous configuration: ${describeError(error)}`);
    }
  }

  public async dispose(): Promise<void> {
    if (this.intervalTimer) {
      clearInterval(this.intervalTimer);
      this.intervalTimer = undefined;
    }
    if (this.configWatcher) {
      await this.configWatcher.close();
      this.configWatcher = undefined;
    }
    await this.currentCycle;
  }
}
