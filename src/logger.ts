import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly prefix: string,
    private readonly level?: LogLevel,
  ) {}

  // resolved per call so loggers created at import time follow a later setDefaultLogLevel
  private shouldLog(level: LogLevel): boolean {
    const current = this.level ?? resolveLevel();
    return current !== 'silent' && LEVELS.indexOf(current) <= LEVELS.indexOf(level);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      console.log(chalk.gray(`${this.prefix}${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(chalk.yellow(`${this.prefix}${message}`), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(chalk.red(`${this.prefix}${message}`), ...args);
    }
  }
}

let defaultLevel: LogLevel | undefined;

/** Overrides the level of every logger created without one (the CLI's `--verbose`). */
export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

function resolveLevel(): LogLevel {
  if (defaultLevel) return defaultLevel;
  const fromEnv = process.env['BRANCH_WATCH_LOG_LEVEL'];
  if (isLogLevel(fromEnv)) return fromEnv;
  return process.env['NODE_ENV'] === 'test' ? 'silent' : 'info';
}

export function createLogger(prefix: string = '', level?: LogLevel): Logger {
  return new ConsoleLogger(prefix, level);
}
