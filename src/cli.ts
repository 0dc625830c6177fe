#!/usr/bin/env node

import { Command } from 'commander';
import inquirer from 'inquirer';
import chalk from 'chalk';
import { ConfigManager, defaultConfigPath, parseIntegerOption, resolveCredentials } from './config.js';
import { ChangeDetectionEngine, DEFAULT_POLL_TIMEOUT_MS, type PollResult } from './engine.js';
import { describeError } from './errors.js';
import { GitClient } from './git-client.js';
import { GithubAccount } from './github.js';
import { setDefaultLogLevel } from './logger.js';
import { ConsolePublisher, JsonFeedPublisher, MultiPublisher } from './publisher.js';
import type { Publisher } from './types.js';
import { RepoWatcher } from './watcher.js';

type GlobalOptions = {
	config?: string;
	verbose?: boolean;
	feed?: string;
};

const program = new Command();

program
	.name('branch-watch')
	.description('Watch git branches and publish a feed entry when they change')
	.version('1.0.0')
	.option('-c, --config <path>', 'Path to the watch configuration file')
	.option('--feed <path>', 'Write notifications to this JSON feed file')
	.option('-v, --verbose', 'Print debug output');

program.hook('preAction', () => {
	if (program.opts<GlobalOptions>().verbose) setDefaultLogLevel('debug');
});

function loadConfigManager(): ConfigManager {
	return new ConfigManager(program.opts<GlobalOptions>().config ?? defaultConfigPath());
}

function createEngine(configManager: ConfigManager, timeoutMs: number = DEFAULT_POLL_TIMEOUT_MS): ChangeDetectionEngine {
	const config = configManager.getConfig();
	const feedPath = program.opts<GlobalOptions>().feed;
	const feed = feedPath ? { path: feedPath, title: config.feed?.title ?? 'branch-watch' } : config.feed;
	const publisher: Publisher = feed
		? new MultiPublisher([new ConsolePublisher(), new JsonFeedPublisher(feed)])
		: new ConsolePublisher();

	return new ChangeDetectionEngine({
		vcs: new GitClient(),
		publisher,
		reposDir: config.reposDir,
		credentials: () => resolveCredentials(process.env, configManager.getConfig()),
		timeoutMs,
	});
}

function reportResults(results: PollResult[]): boolean {
	let allOk = true;
	for (const result of results) {
		if (result.ok) {
			const summary = [
				result.published.length > 0 ? `changed: ${result.published.join(', ')}` : '',
				result.suppressed.length > 0 ? `filtered: ${result.suppressed.join(', ')}` : '',
				result.firstSeen.length > 0 ? `first seen: ${result.firstSeen.join(', ')}` : '',
			].filter(Boolean);
			console.log(chalk.green(`[ok] ${result.repository}`) + chalk.gray(summary.length > 0 ? ` (${summary.join('; ')})` : ' (no changes)'));
		} else {
			allOk = false;
			console.error(chalk.red(`[failed] ${result.repository}: ${describeError(result.error.cause)}`));
		}
	}
	return allOk;
}

program
	.command('config')
	.description('Configure GitHub credentials used to fetch private repositories')
	.action(async () => {
		const { user, token } = await inquirer.prompt<{ user: string; token: string }>([
			{
				type: 'input',
				name: 'user',
				message: 'Enter your GitHub user name:',
				validate: (input: string) => input.length > 0
			},
			{
				type: 'password',
				name: 'token',
				message: 'Enter your GitHub personal access token:',
				validate: (input: string) => input.length > 0
			}
		]);

		const login = await new GithubAccount(token).verify(user);
		loadConfigManager().setGithubCredentials(login, token);
		console.log(chalk.green(`GitHub credentials for ${login} configured successfully!`));
	});

program
	.command('add')
	.description('Watch a repository')
	.argument('<name>', 'Unique name, also used for the local mirror directory')
	.argument('<url>', 'Remote URL')
	.argument('[branches...]', 'Branches to track', ['main'])
	.option('-f, --files <patterns...>', 'Only report changes touching these files or directories')
	.action((name: string, url: string, branches: string[], options: { files?: string[] }) => {
		const repo = loadConfigManager().addRepository(name, url, branches, options.files ?? []);
		console.log(chalk.green(`Repository "${repo.name}" added, tracking ${Object.keys(repo.branches).join(', ')}`));
	});

program
	.command('remove')
	.description('Stop watching a repository')
	.argument('<name>')
	.action((name: string) => {
		if (!loadConfigManager().removeRepository(name)) {
			console.log(chalk.yellow(`Repository "${name}" is not watched.`));
			return;
		}
		console.log(chalk.green(`Repository "${name}" removed successfully!`));
	});

program
	.command('track')
	.description('Track a branch of a watched repository')
	.argument('<name>')
	.argument('<branch>')
	.option('-f, --files <patterns...>', 'Only report changes touching these files or directories')
	.action((name: string, branch: string, options: { files?: string[] }) => {
		loadConfigManager().trackBranch(name, branch, options.files ?? []);
		console.log(chalk.green(`Tracking ${name}/${branch}`));
	});

program
	.command('untrack')
	.description('Stop tracking a branch')
	.argument('<name>')
	.argument('<branch>')
	.action((name: string, branch: string) => {
		if (!loadConfigManager().untrackBranch(name, branch)) {
			console.log(chalk.yellow(`${name}/${branch} is not tracked.`));
			return;
		}
		console.log(chalk.green(`Stopped tracking ${name}/${branch}`));
	});

program
	.command('list')
	.description('List watched repositories')
	.action(() => {
		const repos = Object.values(loadConfigManager().getWatchSet());
		if (repos.length === 0) {
			console.log(chalk.yellow('No repositories watched.'));
			return;
		}

		console.log(chalk.blue('\nWatched repositories:'));
		for (const repo of repos) {
			console.log(chalk.green(`\n${repo.name}:`));
			console.log(chalk.gray(`URL: ${repo.url}`));
			for (const branch of Object.values(repo.branches)) {
				const commit = branch.lastSeenCommit ? branch.lastSeenCommit.slice(0, 8) : 'never fetched';
				console.log(chalk.yellow(`- ${branch.name} (${commit})`));
				branch.interestPatterns.forEach(pattern => console.log(chalk.gray(`    ${pattern}`)));
			}
		}
	});

program
	.command('poll')
	.description('Poll watched repositories once')
	.option('-r, --repo <name>', 'Only poll this repository')
	.option('-t, --timeout <seconds>', 'Give up on a repository after this many seconds (0 waits forever)', '120')
	.action(async (options: { repo?: string; timeout: string }) => {
		const configManager = loadConfigManager();
		if (options.repo && !configManager.getRepository(options.repo)) {
			console.log(chalk.red(`Repository "${options.repo}" is not watched.`));
			process.exitCode = 1;
			return;
		}

		const engine = createEngine(configManager, parseIntegerOption(options.timeout, 'timeout', 0) * 1000);
		const watcher = new RepoWatcher(engine, configManager, { intervalMinutes: configManager.getConfig().intervalMinutes });
		const results = await watcher.runCycle(options.repo);
		if (!reportResults(results)) process.exitCode = 1;
	});

program
	.command('watch')
	.description('Poll watched repositories on an interval')
	.option('-i, --interval <minutes>', 'Check for changes every N minutes')
	.option('-t, --timeout <seconds>', 'Give up on a repository after this many seconds (0 waits forever)', '120')
	.action(async (options: { interval?: string; timeout: string }) => {
		const configManager = loadConfigManager();
		if (Object.keys(configManager.getWatchSet()).length === 0) {
			console.log(chalk.yellow('No repositories watched. Add one first.'));
			return;
		}

		const intervalMinutes = options.interval
			? parseIntegerOption(options.interval, 'interval', 1)
			: configManager.getConfig().intervalMinutes;
		const engine = createEngine(configManager, parseIntegerOption(options.timeout, 'timeout', 0) * 1000);
		const watcher = new RepoWatcher(engine, configManager, { intervalMinutes, watchConfigFile: true });

		reportResults(await watcher.start());
		console.log(chalk.blue(`\nRepositories are being polled every ${intervalMinutes} minutes... Press Ctrl+C to stop.`));

		process.on('SIGINT', () => {
			watcher.dispose().then(
				() => {
					console.log(chalk.yellow('\nStopped watching.'));
					process.exit(0);
				},
				(error: unknown) => {
					console.error(chalk.red('Error while stopping:'), error);
					process.exit(1);
				},
			);
		});
	});

program.parseAsync().catch((error: unknown) => {
	console.error(chalk.red(describeError(error)));
	process.exit(1);
});
