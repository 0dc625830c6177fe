import { execFile } from 'child_process';
import { access, mkdir, rm } from 'fs/promises';
import path from 'path';
import { GitCommandError, MirrorCorruptedError, MirrorNotFoundError } from './errors.js';
import type {
  ExecCommand,
  ExecOptions,
  ExecResult,
  FetchOptions,
  FetchOutcome,
  Mirror,
  RefInfo,
  RemoteConfig,
  VcsEngine,
} from './types.js';

const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Runs a command without a shell. A non-zero exit resolves with its exit code;
 * spawn failures, timeouts and aborts reject.
 */
export const execCommand: ExecCommand = (command, args, options = {}) =>
  new Promise<ExecResult>((resolve, reject) => {
    execFile(
      command,
      args,
      {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        timeout: options.timeout,
        signal: options.signal,
        maxBuffer: MAX_BUFFER,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
        } else if (typeof error.code === 'number') {
          resolve({ exitCode: error.code, stdout, stderr });
        } else {
          reject(error);
        }
      },
    );
  });

export interface GitClientOptions {
  execCommand?: ExecCommand;
  gitBinary?: string;
  // per-command timeout, on top of any AbortSignal passed in
  timeoutMs?: number;
}

function basicAuthHeader(username: string, password: string): string {
  return `Authorization: Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}

class GitMirror implements Mirror {
  constructor(
    readonly path: string,
    private readonly client: GitClient,
  ) {}

  async remotes(): Promise<RemoteConfig[]> {
    const result = await this.client.git(this.path, ['config', '--get-regexp', '^remote\\..*\\.url$']);
    // exit code 1: no remote configured
    if (result.exitCode === 1) return [];
    this.client.assertSuccess(['config'], result);

    return result.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line !== '')
      .map((line) => {
        const [key = '', ...rest] = line.split(' ');
        return { name: key.replace(/^remote\./, '').replace(/\.url$/, ''), url: rest.join(' ') };
      });
  }

  async addRemote(name: string, url: string): Promise<void> {
    const args = ['remote', 'add', name, url];
    this.client.assertSuccess(args, await this.client.git(this.path, args));
  }

  async fetch(remote: string, options: FetchOptions = {}): Promise<FetchOutcome> {
    const env: Record<string, string> = { GIT_TERMINAL_PROMPT: '0' };
    if (options.auth) {
      // passed through the environment so the token never lands in argv or the mirror config
      env['GIT_CONFIG_COUNT'] = '1';
      env['GIT_CONFIG_KEY_0'] = 'http.extraHeader';
      env['GIT_CONFIG_VALUE_0'] = basicAuthHeader(options.auth.username, options.auth.password);
    }

    const args = ['fetch', '--prune', remote, `+refs/heads/*:refs/remotes/${remote}/*`];
    const result = await this.client.git(this.path, args, { env, signal: options.signal });
    this.client.assertSuccess(args, result);

    return result.stderr.includes('->') ? 'fetched' : 'up-to-date';
  }

  async listRefs(): Promise<RefInfo[]> {
    const args = ['for-each-ref', '--format=%(objectname) %(refname)'];
    const result = await this.client.git(this.path, args);
    this.client.assertSuccess(args, result);

    const refs: RefInfo[] = [];
    for (const line of result.stdout.split('\n')) {
      const [commitId, refName] = line.trim().split(' ');
      if (!commitId || !refName) continue;

      if (refName.startsWith('refs/remotes/')) {
        const name = refName.slice('refs/remotes/'.length);
        if (name.endsWith('/HEAD')) continue;
        refs.push({ name, commitId, isRemote: true });
      } else if (refName.startsWith('refs/heads/')) {
        refs.push({ name: refName.slice('refs/heads/'.length), commitId, isRemote: false });
      }
    }
    return refs;
  }

  async diffNameStatus(from: string, to: string, signal?: AbortSignal): Promise<string> {
    const args = ['-c', 'core.quotePath=false', 'diff', '--name-status', from, to];
    const result = await this.client.git(this.path, args, { signal });
    this.client.assertSuccess(args, result);
    return result.stdout;
  }
}

/**
 * {@link VcsEngine} backed by the git executable. Every command runs with the
 * mirror directory as an explicit working directory.
 */
export class GitClient implements VcsEngine {
  private readonly exec: ExecCommand;
  private readonly gitBinary: string;
  private readonly timeoutMs?: number;

  constructor(options: GitClientOptions = {}) {
    this.exec = options.execCommand ?? execCommand;
    this.gitBinary = options.gitBinary ?? 'git';
    this.timeoutMs = options.timeoutMs;
  }

  git(cwd: string, args: string[], options: ExecOptions = {}): Promise<ExecResult> {
    return this.exec(this.gitBinary, args, { timeout: this.timeoutMs, ...options, cwd });
  }

  assertSuccess(args: string[], result: ExecResult): void {
    if (result.exitCode !== 0) {
      throw new GitCommandError(args, result.exitCode, result.stderr);
    }
  }

  async openMirror(dir: string): Promise<Mirror> {
    try {
      await access(dir);
    } catch {
      throw new MirrorNotFoundError(dir);
    }

    const result = await this.git(dir, ['rev-parse', '--git-dir']);
    // a bare repository reports itself as "."; anything else belongs to an enclosing repository
    if (result.exitCode !== 0 || result.stdout.trim() !== '.') {
      throw new MirrorCorruptedError(dir, 'not a bare git repository');
    }
    return new GitMirror(path.resolve(dir), this);
  }

  async initMirror(dir: string): Promise<Mirror> {
    await mkdir(dir, { recursive: true });
    const args = ['init', '--bare', '--quiet'];
    this.assertSuccess(args, await this.git(dir, args));
    return new GitMirror(path.resolve(dir), this);
  }

  async removeMirror(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
  }
}
