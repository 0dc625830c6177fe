/**
 * Error classes raised while mirroring and polling repositories.
 *
 * Every poll failure reaches the caller as a {@link PollError} whose `cause`
 * is one of the more specific errors below.
 */

export class WatchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WatchError';
    Object.setPrototypeOf(this, WatchError.prototype);
  }
}

/**
 * A git subprocess exited with a non-zero status.
 */
export class GitCommandError extends WatchError {
  public readonly args: string[];
  public readonly exitCode: number;
  public readonly stderr: string;

  constructor(args: string[], exitCode: number, stderr: string) {
    super(`git ${args[0] ?? ''} exited with code ${exitCode}: ${stderr.trim()}`);
    this.name = 'GitCommandError';
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }
}

export class MirrorNotFoundError extends WatchError {
  public readonly dir: string;

  constructor(dir: string) {
    super(`No mirror found at ${dir}`);
    this.name = 'MirrorNotFoundError';
    this.dir = dir;
    Object.setPrototypeOf(this, MirrorNotFoundError.prototype);
  }
}

/**
 * The mirror on disk does not point at the configured remote.
 * Recovered by deleting the mirror and initializing a new one.
 */
export class MirrorCorruptedError extends WatchError {
  public readonly dir: string;
  public readonly reason: string;

  constructor(dir: string, reason: string) {
    super(`Mirror at ${dir} is unusable: ${reason}`);
    this.name = 'MirrorCorruptedError';
    this.dir = dir;
    this.reason = reason;
    Object.setPrototypeOf(this, MirrorCorruptedError.prototype);
  }
}

export class MirrorInitError extends WatchError {
  public readonly repository: string;

  constructor(repository: string, cause: unknown) {
    super(`Failed to initialize mirror for ${repository}: ${describeError(cause)}`, { cause });
    this.name = 'MirrorInitError';
    this.repository = repository;
    Object.setPrototypeOf(this, MirrorInitError.prototype);
  }
}

export class FetchError extends WatchError {
  public readonly repository: string;

  constructor(repository: string, cause: unknown) {
    super(`Failed to fetch ${repository}: ${describeError(cause)}`, { cause });
    this.name = 'FetchError';
    this.repository = repository;
    Object.setPrototypeOf(this, FetchError.prototype);
  }
}

export class DiffSubprocessError extends WatchError {
  public readonly repository: string;
  public readonly from: string;
  public readonly to: string;

  constructor(repository: string, from: string, to: string, cause: unknown) {
    super(`Failed to diff ${repository} ${from}..${to}: ${describeError(cause)}`, { cause });
    this.name = 'DiffSubprocessError';
    this.repository = repository;
    this.from = from;
    this.to = to;
    Object.setPrototypeOf(this, DiffSubprocessError.prototype);
  }
}

export class PublishError extends WatchError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'PublishError';
    Object.setPrototypeOf(this, PublishError.prototype);
  }
}

export class PollTimeoutError extends WatchError {
  public readonly timeoutMs: number;

  constructor(repository: string, timeoutMs: number) {
    super(`Polling ${repository} timed out after ${timeoutMs}ms`);
    this.name = 'PollTimeoutError';
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, PollTimeoutError.prototype);
  }
}

export class PollError extends WatchError {
  public readonly repository: string;

  constructor(repository: string, cause: unknown) {
    super(`Poll failed for ${repository}: ${describeError(cause)}`, { cause });
    this.name = 'PollError';
    this.repository = repository;
    Object.setPrototypeOf(this, PollError.prototype);
  }
}

export class ConfigError extends WatchError {
  public readonly path: string;
  public readonly issues: string[];

  constructor(path: string, issues: string[]) {
    super(`Invalid configuration in ${path}: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.path = path;
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export class CredentialsError extends WatchError {
  constructor(message: string) {
    super(message);
    this.name = 'CredentialsError';
    Object.setPrototypeOf(this, CredentialsError.prototype);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
