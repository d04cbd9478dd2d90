import { join } from 'node:path';
import { parseArgs } from 'node:util';

import { FolderManager, getInstalledVersions, logsDirectory, networkCacheDirectory, type PathProvider } from '../../Utils/Folder.js';
import type { LaunchOutcome } from '../../Types/Core/Launcher.js';
import { describeError } from '../Core/Errors.js';
import { Launcher } from '../Core/Launcher.js';
import { DocumentCache } from '../Core/Utils/Cache.js';
import type { HttpClient } from '../Core/Utils/Http.js';
import { LauncherLogger, isLogLevel } from '../Logger/LauncherLogger.js';
import { CONFIG_FILE_NAME, ConfigManager, createConfigManager } from './ConfigManager.js';

export const USAGE = [
	'Usage: ametrine <command> [options]',
	'',
	'Commands:',
	'  list [--snapshots]      Show the available versions',
	'  launch [versionId]      Download and start a version (latest release by default)',
	'',
	'Options:',
	'  --java <path>           Java binary, overrides Java.Path',
	'  --username <name>       Offline player name, overrides Launcher.Username',
	'  -h, --help              Show this help',
].join('\n');

export interface CliContext {
	paths?: PathProvider | undefined;
	client?: HttpClient | undefined;
	/** Replaces the logger built from the configuration */
	logger?: LauncherLogger | undefined;
	signal?: AbortSignal | undefined;
	stdout?: ((line: string) => void) | undefined;
	stderr?: ((line: string) => void) | undefined;
}

const CLI_OPTIONS = {
	snapshots: { type: 'boolean', default: false },
	java: { type: 'string' },
	username: { type: 'string' },
	help: { type: 'boolean', short: 'h', default: false },
} as const;

function parseCommandLine(argv: readonly string[]) {
	return parseArgs({ args: [...argv], allowPositionals: true, options: CLI_OPTIONS });
}

interface CommandFlags {
	snapshots: boolean;
	java?: string | undefined;
	username?: string | undefined;
}

function createLogger(config: ConfigManager, paths: PathProvider): LauncherLogger {
	const level = config.getString('Logging.Level') ?? 'info';
	return new LauncherLogger({
		logDir: logsDirectory(paths),
		level: isLogLevel(level) ? level : 'info',
		console: config.getBoolean('Logging.Console') ?? true,
	});
}

interface DownloaderSettings {
	concurrency?: number | undefined;
	timeoutMs?: number | undefined;
}

/** Throws a RangeError naming the offending key */
function readDownloaderSettings(config: ConfigManager): DownloaderSettings {
	const concurrency = config.getNumber('Downloader.Concurrency');
	if (concurrency !== undefined && (!Number.isInteger(concurrency) || concurrency < 1)) {
		throw new RangeError(`Downloader.Concurrency must be a positive integer, got ${concurrency}`);
	}
	const timeoutMs = config.getNumber('Downloader.TimeoutMs');
	if (timeoutMs !== undefined && (!Number.isInteger(timeoutMs) || timeoutMs < 0)) {
		throw new RangeError(`Downloader.TimeoutMs must be a non-negative integer, got ${timeoutMs}`);
	}
	return { concurrency, timeoutMs };
}

export function summarizeLaunch(outcome: LaunchOutcome): string[] {
	const { report, version, pid } = outcome;
	const lines = [
		`Downloaded ${report.succeeded} of ${report.scheduled} files, ${report.skipped} already present`,
		...report.failed.map((failure) => `Failed: ${failure.error.message}`),
	];
	if (report.indexError) lines.push(`Failed: ${report.indexError.message}`);
	lines.push(`Started ${version.id}${pid === undefined ? '' : ` (pid ${pid})`}`);
	return lines;
}

export async function runCli(argv: readonly string[], context: CliContext = {}): Promise<number> {
	const out = context.stdout ?? ((line: string) => console.log(line));
	const err = context.stderr ?? ((line: string) => console.error(line));

	let parsed: ReturnType<typeof parseCommandLine>;
	try {
		parsed = parseCommandLine(argv);
	} catch (error) {
		err(describeError(error));
		err(USAGE);
		return 1;
	}

	const { values, positionals } = parsed;
	const [command, ...rest] = positionals;
	if (values.help) {
		out(USAGE);
		return 0;
	}
	if ((command !== 'list' && command !== 'launch') || rest.length > (command === 'launch' ? 1 : 0)) {
		err(command === undefined ? 'Missing command' : `Unexpected arguments: ${positionals.join(' ')}`);
		err(USAGE);
		return 1;
	}

	const paths = context.paths ?? new FolderManager();
	const config = createConfigManager(join(paths.getDataRoot(), CONFIG_FILE_NAME), context.logger);
	const logger = context.logger ?? createLogger(config, paths);
	const flags: CommandFlags = { snapshots: values.snapshots === true, java: values.java, username: values.username };

	let downloader: DownloaderSettings;
	try {
		downloader = readDownloaderSettings(config);
	} catch (error) {
		err(`Error: ${describeError(error)}`);
		logger.flush();
		return 1;
	}

	const launcher = new Launcher({
		paths,
		client: context.client,
		cache: new DocumentCache(networkCacheDirectory(paths), logger),
		javaPath: flags.java ?? config.getString('Java.Path'),
		concurrency: downloader.concurrency,
		timeoutMs: downloader.timeoutMs,
		signal: context.signal,
		identity: {
			username: flags.username ?? config.getString('Launcher.Username'),
			brand: config.getString('Launcher.Brand'),
			launcherVersion: config.getString('Launcher.Version'),
		},
		logger,
	});

	try {
		if (command === 'list') {
			const manifest = await launcher.fetchManifest();
			const installed = new Set(await getInstalledVersions(paths));
			out(`Latest release: ${manifest.latestRelease}`);
			out(`Latest snapshot: ${manifest.latestSnapshot}`);
			for (const version of manifest.versions) {
				if (!flags.snapshots && version.type !== 'release') continue;
				out(`${version.id}\t${version.type}${installed.has(version.id) ? '\tinstalled' : ''}`);
			}
			return 0;
		}

		const outcome = await launcher.launch(rest[0]);
		for (const line of summarizeLaunch(outcome)) out(line);
		return 0;
	} catch (error) {
		logger.error(error instanceof Error ? error : describeError(error));
		err(`Error: ${describeError(error)}`);
		return 1;
	} finally {
		logger.flush();
	}
}
