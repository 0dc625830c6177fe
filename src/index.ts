export { ChangeDetectionEngine, DEFAULT_POLL_TIMEOUT_MS } from './engine.js';
export type { EngineOptions, PollResult } from './engine.js';
export { RepositoryMirror, isGithubRemote, selectAuth, validateRemotes } from './mirror.js';
export { observe, advanceWatermark, getBranchIfTracked, DEFAULT_REMOTE } from './branch-tracker.js';
export { parseNameStatus } from './diff-parser.js';
export { anyMatch, matchesPattern } from './path-matcher.js';
export { NotificationBuilder, escapeHtml, shortCommit } from './notification.js';
export type { DetectedChange } from './notification.js';
export { GitClient, execCommand } from './git-client.js';
export { ConfigManager, defaultConfigPath, parseIntegerOption, resolveCredentials } from './config.js';
export { ConsolePublisher, JsonFeedPublisher, MultiPublisher } from './publisher.js';
export type { Feed, FeedItem } from './publisher.js';
export { RepoWatcher } from './watcher.js';
export { KeyedLock } from './keyed-lock.js';
export { createLogger, setDefaultLogLevel } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export * from './errors.js';
export type * from './types.js';
