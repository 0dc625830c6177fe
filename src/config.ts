import fs from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { BranchConfig, GithubCredentials, RepositoryConfig, WatchConfig, WatchSet } from './types.js';

export const DEFAULT_INTERVAL_MINUTES = 10;

const repositoryNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9._-]+$/, 'repository names may only contain letters, digits, ".", "_" and "-"')
  .refine((name) => name !== '.' && name !== '..', 'repository name cannot be "." or ".."');

const branchSchema = z.object({
  commit: z.string().optional(),
  files: z.array(z.string()).optional(),
});

const repoSchema = z.object({
  url: z.string().min(1),
  branches: z.record(z.string().min(1), branchSchema).default({}),
});

const configFileSchema = z.object({
  reposDir: z.string().optional(),
  intervalMinutes: z.number().positive().optional(),
  feed: z
    .object({
      path: z.string().min(1),
      title: z.string().default('branch-watch'),
      maxItems: z.number().int().positive().default(50),
    })
    .optional(),
  github: z.object({ user: z.string(), token: z.string() }).optional(),
  repos: z.record(repositoryNameSchema, repoSchema).default({}),
});

type ConfigFile = z.infer<typeof configFileSchema>;

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env['BRANCH_WATCH_CONFIG'] || path.join(os.homedir(), '.branch-watch.json');
}

/** Parses a numeric command-line option such as `--timeout 0` or `--interval 5`. */
export function parseIntegerOption(value: string, name: string, min: number): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed < min) {
    throw new ConfigError(`--${name}`, [`expected an integer of at least ${min}, got "${value}"`]);
  }
  return parsed;
}

export function validateRepositoryName(name: string): void {
  const result = repositoryNameSchema.safeParse(name);
  if (!result.success) {
    throw new ConfigError('repository name', result.error.issues.map((issue) => issue.message));
  }
}

function toBranchConfig(name: string, branch: z.infer<typeof branchSchema>): BranchConfig {
  return { name, lastSeenCommit: branch.commit ?? '', interestPatterns: branch.files ?? [] };
}

function toRepositoryConfig(name: string, repo: z.infer<typeof repoSchema>): RepositoryConfig {
  const branches: Record<string, BranchConfig> = {};
  for (const [branchName, branch] of Object.entries(repo.branches)) {
    branches[branchName] = toBranchConfig(branchName, branch);
  }
  return { name, url: repo.url, branches };
}

/**
 * Loads and persists the watch set. Only the engine mutates commits; every
 * other change goes through the methods below, which save immediately.
 */
export class ConfigManager {
  readonly configPath: string;
  private config: WatchConfig;
  private lastSynced?: string;

  constructor(configPath: string = defaultConfigPath()) {
    this.configPath = path.resolve(configPath);
    this.config = this.loadConfig();
  }

  private loadConfig(): WatchConfig {
    let raw: unknown = {};
    let content: string | undefined;
    if (fs.existsSync(this.configPath)) {
      try {
        content = fs.readFileSync(this.configPath, 'utf-8');
        raw = JSON.parse(content);
      } catch (error) {
        throw new ConfigError(this.configPath, [error instanceof Error ? error.message : String(error)]);
      }
    }

    const parsed = configFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(
        this.configPath,
        parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      );
    }
    // a rejected file stays "external" so it is not overwritten by the next save
    this.lastSynced = content;
    return this.fromFile(parsed.data);
  }

  private fromFile(file: ConfigFile): WatchConfig {
    const baseDir = path.dirname(this.configPath);
    const repos: WatchSet = {};
    for (const [name, repo] of Object.entries(file.repos)) {
      repos[name] = toRepositoryConfig(name, repo);
    }

    return {
      reposDir: file.reposDir
        ? path.resolve(baseDir, file.reposDir)
        : path.join(os.homedir(), '.branch-watch', 'repos'),
      intervalMinutes: file.intervalMinutes ?? DEFAULT_INTERVAL_MINUTES,
      feed: file.feed ? { ...file.feed, path: path.resolve(baseDir, file.feed.path) } : undefined,
      github: file.github,
      repos,
    };
  }

  private toFile(): ConfigFile {
    const repos: ConfigFile['repos'] = {};
    for (const [name, repo] of Object.entries(this.config.repos)) {
      const branches: ConfigFile['repos'][string]['branches'] = {};
      for (const [branchName, branch] of Object.entries(repo.branches)) {
        branches[branchName] = {
          ...(branch.lastSeenCommit ? { commit: branch.lastSeenCommit } : {}),
          ...(branch.interestPatterns.length > 0 ? { files: branch.interestPatterns } : {}),
        };
      }
      repos[name] = { url: repo.url, branches };
    }

    return {
      reposDir: this.config.reposDir,
      intervalMinutes: this.config.intervalMinutes,
      feed: this.config.feed,
      github: this.config.github,
      repos,
    };
  }

  public saveConfig(): void {
    fs.mkdirSync(path.dirname(this.configPath), { recursive: true });
    const content = JSON.stringify(this.toFile(), null, 2) + '\n';
    fs.writeFileSync(this.configPath, content);
    this.lastSynced = content;
  }

  /** True when the file on disk differs from what was last loaded or saved. */
  public hasExternalChanges(): boolean {
    if (!fs.existsSync(this.configPath)) return this.lastSynced !== undefined;
    return fs.readFileSync(this.configPath, 'utf-8') !== this.lastSynced;
  }

  /** Re-reads the file, replacing the in-memory watch set. */
  public reload(): WatchConfig {
    this.config = this.loadConfig();
    return this.config;
  }

  public getConfig(): WatchConfig {
    return this.config;
  }

  public getWatchSet(): WatchSet {
    return this.config.repos;
  }

  public getRepository(name: string): RepositoryConfig | undefined {
    return Object.hasOwn(this.config.repos, name) ? this.config.repos[name] : undefined;
  }

  public setGithubCredentials(user: string, token: string): void {
    this.config.github = { user, token };
    this.saveConfig();
  }

  public addRepository(name: string, url: string, branches: string[], patterns: string[] = []): RepositoryConfig {
    validateRepositoryName(name);
    if (this.getRepository(name)) {
      throw new ConfigError(this.configPath, [`repository "${name}" is already watched`]);
    }

    const repo: RepositoryConfig = { name, url, branches: {} };
    for (const branch of branches) {
      repo.branches[branch] = { name: branch, lastSeenCommit: '', interestPatterns: [...patterns] };
    }
    this.config.repos[name] = repo;
    this.saveConfig();
    return repo;
  }

  public removeRepository(name: string): boolean {
    if (!this.getRepository(name)) return false;
    delete this.config.repos[name];
    this.saveConfig();
    return true;
  }

  public trackBranch(repoName: string, branch: string, patterns: string[] = []): BranchConfig {
    const repo = this.requireRepository(repoName);
    const existing = Object.hasOwn(repo.branches, branch) ? repo.branches[branch] : undefined;
    const tracked: BranchConfig = {
      name: branch,
      lastSeenCommit: existing?.lastSeenCommit ?? '',
      interestPatterns: [...patterns],
    };
    repo.branches[branch] = tracked;
    this.saveConfig();
    return tracked;
  }

  public untrackBranch(repoName: string, branch: string): boolean {
    const repo = this.requireRepository(repoName);
    if (!Object.hasOwn(repo.branches, branch)) return false;
    delete repo.branches[branch];
    this.saveConfig();
    return true;
  }

  private requireRepository(name: string): RepositoryConfig {
    const repo = this.getRepository(name);
    if (!repo) {
      throw new ConfigError(this.configPath, [`repository "${name}" is not watched`]);
    }
    return repo;
  }
}

/**
 * GitHub credentials for fetching: the environment wins over the config file.
 */
export function resolveCredentials(
  env: NodeJS.ProcessEnv,
  config: Pick<WatchConfig, 'github'>,
): GithubCredentials | undefined {
  const user = env['GITHUB_USER'];
  const token = env['GITHUB_TOKEN'];
  if (user && token) return { user, token };
  if (config.github?.user && config.github.token) return config.github;
  return undefined;
}
