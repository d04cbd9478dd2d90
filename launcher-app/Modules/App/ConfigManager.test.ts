import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigManager, LAUNCHER_DEFAULTS, createConfigManager } from './ConfigManager.js';

let dir: string;
let file: string;

beforeEach(() => {
	dir = mkdtempSync(join(tmpdir(), 'ametrine-config-'));
	file = join(dir, 'nested', 'configuration.json');
});

afterEach(() => {
	rmSync(dir, { recursive: true, force: true });
});

describe('ConfigManager', () => {
	it('writes the defaults when the file does not exist', () => {
		const config = createConfigManager(file);
		expect(config.wasLoadedFromFile()).toBe(false);
		expect(JSON.parse(readFileSync(file, 'utf-8'))).toEqual(LAUNCHER_DEFAULTS);
		expect(config.getNumber('Downloader.Concurrency')).toBe(16);
		expect(config.getString('Java.Path')).toBe('java');
	});

	it('merges stored values over the defaults', () => {
		createConfigManager(file);
		writeFileSync(file, JSON.stringify({ Java: { Path: '/opt/jdk/bin/java' }, Extra: [1, 2] }));
		const config = createConfigManager(file);
		expect(config.wasLoadedFromFile()).toBe(true);
		expect(config.getString('Java.Path')).toBe('/opt/jdk/bin/java');
		expect(config.getNumber('Downloader.TimeoutMs')).toBe(60000);
		expect(config.get('Extra')).toEqual([1, 2]);
	});

	it('falls back to the default when a value has the wrong type', () => {
		createConfigManager(file);
		writeFileSync(file, JSON.stringify({ Downloader: { Concurrency: 'many' }, Logging: { Console: 'yes' } }));
		const config = createConfigManager(file);
		expect(config.getNumber('Downloader.Concurrency')).toBe(16);
		expect(config.getBoolean('Logging.Console')).toBe(true);
		expect(config.get('Downloader.Concurrency')).toBe('many');
	});

	it('uses defaults for a file that is not JSON and leaves it untouched', () => {
		createConfigManager(file);
		writeFileSync(file, '{ broken');
		const config = createConfigManager(file);
		expect(config.wasLoadedFromFile()).toBe(false);
		expect(config.getString('Logging.Level')).toBe('info');
		expect(readFileSync(file, 'utf-8')).toBe('{ broken');
	});

	it('edits nested paths and persists them', () => {
		const config = createConfigManager(file);
		config.edit('Window.Size.Width', 1280).edit('Java.Path', '/usr/bin/java');
		const stored = JSON.parse(readFileSync(file, 'utf-8'));
		expect(stored.Window).toEqual({ Size: { Width: 1280 } });
		expect(stored.Java).toEqual({ Path: '/usr/bin/java' });
		expect(config.reload().getNumber('Window.Size.Width')).toBe(1280);
	});

	it('deletes keys and reports missing ones', () => {
		const config = createConfigManager(file);
		expect(config.delete('Java.Path')).toBe(true);
		expect(config.get('Java.Path')).toBeUndefined();
		expect(config.getString('Java.Path')).toBe('java');
		expect(config.delete('Java.Path')).toBe(false);
		expect(config.delete('Nope.Deeper')).toBe(false);
	});

	it('resets to the defaults', () => {
		const config = createConfigManager(file);
		config.edit('Logging.Level', 'debug');
		config.reset();
		expect(config.getAll()).toEqual(LAUNCHER_DEFAULTS);
	});

	it('never writes in read-only mode', () => {
		const config = new ConfigManager(file, { readOnly: true, defaultConfig: { A: 1 } });
		config.edit('A', 2);
		expect(existsSync(file)).toBe(false);
		expect(config.get('A')).toBe(1);
		expect(config.delete('A')).toBe(false);
	});

	it('returns a copy from getAll', () => {
		const config = createConfigManager(file);
		const all = config.getAll();
		all.Java = 'changed';
		expect(config.getString('Java.Path')).toBe('java');
	});
});
