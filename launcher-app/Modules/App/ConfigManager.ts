import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

import type { ConfigValue, ConfigObject, ConfigOptions } from '../../Types/App/Config.js';
import { LauncherLogger, silentLogger } from '../Logger/LauncherLogger.js';
import { describeError } from '../Core/Errors.js';

export const CONFIG_FILE_NAME = 'configuration.json';

export const LAUNCHER_DEFAULTS = {
	Java: { Path: 'java' },
	Downloader: { Concurrency: 16, TimeoutMs: 60_000 },
	Launcher: { Brand: 'Ametrine', Version: '0.1.0', Username: 'Player' },
	Logging: { Level: 'info', Console: true },
} satisfies ConfigObject;

function isConfigObject(value: ConfigValue | undefined): value is ConfigObject {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isConfigValue(value: unknown): value is ConfigValue {
	if (value === null) return true;
	switch (typeof value) {
		case 'string':
		case 'number':
		case 'boolean':
			return true;
		case 'object':
			if (Array.isArray(value)) return value.every(isConfigValue);
			return Object.values(value).every(isConfigValue);
		default:
			return false;
	}
}

function cloneObject(value: ConfigObject): ConfigObject {
	return structuredClone(value);
}

/** Recursively overlays `override` on `base`; arrays and scalars replace */
function mergeConfig(base: ConfigObject, override: ConfigObject): ConfigObject {
	const merged = cloneObject(base);
	for (const [key, value] of Object.entries(override)) {
		const current = merged[key];
		merged[key] = isConfigObject(current) && isConfigObject(value) ? mergeConfig(current, value) : value;
	}
	return merged;
}

function lookup(root: ConfigObject, path: string): ConfigValue | undefined {
	let current: ConfigValue | undefined = root;
	for (const key of path.split('.')) {
		if (!isConfigObject(current) || !(key in current)) return undefined;
		current = current[key];
	}
	return current;
}

export class ConfigManager {
	private readonly configPath: string;
	private config: ConfigObject;
	private readonly options: Required<ConfigOptions>;
	private isLoaded = false;
	private readonly logger: LauncherLogger;

	constructor(configPath: string, options: ConfigOptions = {}, logger: LauncherLogger = silentLogger) {
		this.configPath = resolve(configPath);
		this.logger = logger.child('Config');

		this.options = {
			createDirs: options.createDirs ?? true,
			prettyPrint: options.prettyPrint ?? true,
			encoding: options.encoding ?? 'utf-8',
			defaultConfig: options.defaultConfig ?? {},
			readOnly: options.readOnly ?? false,
		};

		this.config = this.loadConfig();
	}

	private loadConfig(): ConfigObject {
		const defaults = cloneObject(this.options.defaultConfig);
		if (!existsSync(this.configPath)) {
			this.isLoaded = false;
			this.saveConfig(defaults);
			return defaults;
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(readFileSync(this.configPath, this.options.encoding));
		} catch (error) {
			this.logger.error(`Could not read ${this.configPath}, using defaults: ${describeError(error)}`);
			this.isLoaded = false;
			return defaults;
		}

		if (!isConfigValue(parsed) || !isConfigObject(parsed)) {
			this.logger.error(`${this.configPath} does not hold a JSON object, using defaults`);
			this.isLoaded = false;
			return defaults;
		}

		this.isLoaded = true;
		return mergeConfig(defaults, parsed);
	}

	private saveConfig(config: ConfigObject): void {
		if (this.options.readOnly) return;

		const dir = dirname(this.configPath);
		if (this.options.createDirs && !existsSync(dir)) {
			mkdirSync(dir, { recursive: true });
		}

		const content = this.options.prettyPrint ? JSON.stringify(config, null, 2) : JSON.stringify(config);
		writeFileSync(this.configPath, content, this.options.encoding);
	}

	get(path: string): ConfigValue | undefined;
	get(path: string, defaultValue: ConfigValue): ConfigValue;
	get(path: string, defaultValue?: ConfigValue): ConfigValue | undefined {
		return lookup(this.config, path) ?? defaultValue;
	}

	/** The stored string, or the default when missing or of another type */
	getString(path: string): string | undefined {
		const value = this.get(path);
		if (typeof value === 'string') return value;
		return this.defaultOf(path, (v): v is string => typeof v === 'string');
	}

	getNumber(path: string): number | undefined {
		const value = this.get(path);
		if (typeof value === 'number' && Number.isFinite(value)) return value;
		return this.defaultOf(path, (v): v is number => typeof v === 'number');
	}

	getBoolean(path: string): boolean | undefined {
		const value = this.get(path);
		if (typeof value === 'boolean') return value;
		return this.defaultOf(path, (v): v is boolean => typeof v === 'boolean');
	}

	private defaultOf<T extends ConfigValue>(path: string, guard: (value: ConfigValue) => value is T): T | undefined {
		const fallback = lookup(this.options.defaultConfig, path);
		if (fallback === undefined) return undefined;
		if (lookup(this.config, path) !== undefined) {
			this.logger.warn(`Ignoring ${path} in ${this.configPath}: unexpected type`);
		}
		return guard(fallback) ? fallback : undefined;
	}

	edit(path: string, value: ConfigValue): this {
		if (this.options.readOnly) {
			this.logger.warn('ConfigManager is read-only, change discarded');
			return this;
		}

		const keys = path.split('.');
		const last = keys.pop();
		if (last === undefined || last === '') throw new Error(`Invalid configuration path "${path}"`);

		let current = this.config;
		for (const key of keys) {
			const next = current[key];
			if (isConfigObject(next)) {
				current = next;
			} else {
				const created: ConfigObject = {};
				current[key] = created;
				current = created;
			}
		}

		current[last] = value;
		this.saveConfig(this.config);
		return this;
	}

	delete(path: string): boolean {
		if (this.options.readOnly) {
			this.logger.warn('ConfigManager is read-only, change discarded');
			return false;
		}

		const keys = path.split('.');
		const last = keys.pop();
		if (last === undefined) return false;
		const parent = keys.length === 0 ? this.config : lookup(this.config, keys.join('.'));
		if (!isConfigObject(parent) || !(last in parent)) return false;

		delete parent[last];
		this.saveConfig(this.config);
		return true;
	}

	getAll(): ConfigObject {
		return cloneObject(this.config);
	}

	reset(): this {
		if (this.options.readOnly) {
			this.logger.warn('ConfigManager is read-only, change discarded');
			return this;
		}

		this.config = cloneObject(this.options.defaultConfig);
		this.saveConfig(this.config);
		return this;
	}

	getConfigPath(): string {
		return this.configPath;
	}

	wasLoadedFromFile(): boolean {
		return this.isLoaded;
	}

	reload(): this {
		this.config = this.loadConfig();
		return this;
	}
}

export function createConfigManager(configPath: string, logger?: LauncherLogger, options?: ConfigOptions): ConfigManager {
	return new ConfigManager(configPath, { defaultConfig: LAUNCHER_DEFAULTS, ...options }, logger);
}

export default ConfigManager;
