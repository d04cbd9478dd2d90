import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs/promises';

import type { LauncherLayout } from '../Types/Core/Download.js';

const APP_NAME = 'ametrine';

/** Supplies the two roots every other path is derived from */
export interface PathProvider {
	getDataRoot(): string;
	getCacheRoot(): string;
}

export interface FolderManagerOptions {
	appName?: string;
	platform?: NodeJS.Platform;
	env?: NodeJS.ProcessEnv;
	homeDir?: string;
}

export class FolderManager implements PathProvider {
	private readonly appName: string;
	private readonly platform: NodeJS.Platform;
	private readonly env: NodeJS.ProcessEnv;
	private readonly homeDir: string;

	constructor(options: FolderManagerOptions = {}) {
		this.appName = options.appName ?? APP_NAME;
		this.platform = options.platform ?? process.platform;
		this.env = options.env ?? process.env;
		this.homeDir = options.homeDir ?? os.homedir();
	}

	public getDataRoot(): string {
		switch (this.platform) {
			case 'win32': {
				const localAppData = this.env.LOCALAPPDATA || path.join(this.homeDir, 'AppData', 'Local');
				return path.join(localAppData, this.appName);
			}
			case 'darwin':
				return path.join(this.homeDir, 'Library', 'Application Support', this.appName);
			default: {
				const dataHome = this.env.XDG_DATA_HOME || path.join(this.homeDir, '.local', 'share');
				return path.join(dataHome, this.appName);
			}
		}
	}

	public getCacheRoot(): string {
		switch (this.platform) {
			case 'win32':
				return path.join(this.getDataRoot(), 'cache');
			case 'darwin':
				return path.join(this.homeDir, 'Library', 'Caches', this.appName);
			default: {
				const cacheHome = this.env.XDG_CACHE_HOME || path.join(this.homeDir, '.cache');
				return path.join(cacheHome, this.appName);
			}
		}
	}
}

async function pathExists(target: string): Promise<boolean> {
	try {
		await fs.access(target);
		return true;
	} catch (error) {
		if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false;
		throw error;
	}
}

export function versionsDirectory(provider: PathProvider): string {
	return path.join(provider.getDataRoot(), 'versions');
}

/** Ids whose client jar is already on disk */
export async function getInstalledVersions(provider: PathProvider): Promise<string[]> {
	const versionsDir = versionsDirectory(provider);
	if (!(await pathExists(versionsDir))) return [];

	const entries = await fs.readdir(versionsDir, { withFileTypes: true });
	const installed: string[] = [];
	for (const entry of entries) {
		// a directory without client.jar is an interrupted download
		if (entry.isDirectory() && (await pathExists(path.join(versionsDir, entry.name, 'client.jar')))) {
			installed.push(entry.name);
		}
	}
	return installed.sort();
}

export function resolveLayout(provider: PathProvider, versionId: string): LauncherLayout {
	const dataRoot = provider.getDataRoot();
	const cacheRoot = provider.getCacheRoot();
	return {
		dataRoot,
		cacheRoot,
		librariesRoot: path.join(dataRoot, 'libraries'),
		assetsRoot: path.join(dataRoot, 'assets'),
		versionRoot: path.join(dataRoot, 'versions', versionId),
		instanceRoot: path.join(dataRoot, 'instances', versionId, 'minecraft'),
		nativesRoot: path.join(cacheRoot, 'natives'),
	};
}

export function networkCacheDirectory(provider: PathProvider): string {
	return path.join(provider.getCacheRoot(), 'network');
}

export function logsDirectory(provider: PathProvider): string {
	return path.join(provider.getDataRoot(), 'logs');
}
