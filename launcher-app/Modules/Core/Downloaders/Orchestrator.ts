import { access, mkdir, writeFile } from "node:fs/promises";
import { EventEmitter } from "node:events";
import { dirname, join } from "node:path";

import type {
	DownloadFailure,
	DownloadProgress,
	DownloadReport,
	DownloadTask,
	LauncherLayout,
} from "../../../Types/Core/Download.js";
import type { AssetIndex, VersionInfo } from "../../../Types/Core/Version.js";
import { DownloadTaskFailure, PersistenceError, describeError } from "../Errors.js";
import { LauncherLogger, silentLogger } from "../../Logger/LauncherLogger.js";
import { createHttpClient, fetchBuffer, type HttpClient } from "../Utils/Http.js";
import { createTaskLimiter } from "../Utils/Index.js";

export const LIBRARIES_ENDPOINT = "https://libraries.minecraft.net/";
export const RESOURCES_ENDPOINT = "https://resources.download.minecraft.net/";

export interface DownloadOrchestratorOptions {
	client?: HttpClient | undefined;
	/** Simultaneous downloads, 16 by default */
	concurrency?: number | undefined;
	/** Per-task timeout, 60 s by default; 0 disables it */
	timeoutMs?: number | undefined;
	signal?: AbortSignal | undefined;
	logger?: LauncherLogger | undefined;
}

/** One task per distinct local path, libraries first, then assets, then the client jar */
export function buildDownloadTasks(version: VersionInfo, assetIndex: AssetIndex, layout: LauncherLayout): DownloadTask[] {
	const tasks = new Map<string, DownloadTask>();
	const add = (task: DownloadTask) => {
		if (!tasks.has(task.localPath)) tasks.set(task.localPath, task);
	};

	for (const relativePath of version.libraries) {
		add({
			kind: "library",
			remoteUrl: LIBRARIES_ENDPOINT + relativePath,
			localPath: join(layout.librariesRoot, relativePath),
		});
	}
	for (const { hash } of Object.values(assetIndex.objects)) {
		const prefix = hash.slice(0, 2);
		add({
			kind: "asset",
			remoteUrl: `${RESOURCES_ENDPOINT}${prefix}/${hash}`,
			localPath: join(layout.assetsRoot, "objects", prefix, hash),
		});
	}
	add({ kind: "client", remoteUrl: version.clientJarUrl, localPath: join(layout.versionRoot, "client.jar") });

	return [...tasks.values()];
}

export function assetIndexPath(version: VersionInfo, layout: LauncherLayout): string {
	return join(layout.assetsRoot, "indexes", `${version.assetsId || version.id}.json`);
}

/** true when present, false when absent, the error when the check itself failed */
async function checkPresence(path: string): Promise<boolean | PersistenceError> {
	try {
		await access(path);
		return true;
	} catch (error) {
		// ENOTDIR: some parent is a regular file
		if (error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR")) return false;
		return new PersistenceError(path, { cause: error });
	}
}

interface PendingTask {
	task: DownloadTask;
	/** Set when the presence check failed; the task is reported without a download */
	blocked?: PersistenceError | undefined;
}

/**
 * Brings the local layout up to date for one version.
 *
 * Events: `Start` (counts), `FileStart` (task), `FileSuccess` (task, bytes),
 * `FileError` (failure), `Bytes` (n), `Progress` (progress), `Done` (report).
 */
export class DownloadOrchestrator extends EventEmitter {
	private readonly client: HttpClient;
	private readonly concurrency: number;
	private readonly timeoutMs: number;
	private readonly signal: AbortSignal | undefined;
	private readonly logger: LauncherLogger;

	constructor(options: DownloadOrchestratorOptions = {}) {
		super();
		this.client = options.client ?? createHttpClient();
		this.concurrency = options.concurrency ?? 16;
		this.timeoutMs = options.timeoutMs ?? 60_000;
		this.signal = options.signal;
		this.logger = (options.logger ?? silentLogger).child("Downloader");
	}

	public async run(version: VersionInfo, assetIndex: AssetIndex, layout: LauncherLayout): Promise<DownloadReport> {
		this.signal?.throwIfAborted();
		const all = buildDownloadTasks(version, assetIndex, layout);
		const checks = await Promise.all(all.map((task) => checkPresence(task.localPath)));
		const pending: PendingTask[] = [];
		all.forEach((task, i) => {
			const check = checks[i];
			if (check === true) return;
			pending.push({ task, blocked: check instanceof PersistenceError ? check : undefined });
		});

		const total = all.length;
		const scheduled = pending.length;
		this.logger.info(`${scheduled} of ${total} files need downloading for ${version.id}`);
		this.emit("Start", { total, scheduled, skipped: total - scheduled });

		const failed: DownloadFailure[] = [];
		let succeeded = 0;
		let completed = 0;
		const limit = createTaskLimiter(this.concurrency);

		const settle = () => {
			completed++;
			const progress: DownloadProgress = { completed, remaining: scheduled - completed, total: scheduled };
			this.emit("Progress", progress);
		};

		await Promise.allSettled(
			pending.map(({ task, blocked }) =>
				limit(async () => {
					const failure = blocked ? { task, error: blocked } : await this.download(task);
					if (failure) {
						failed.push(failure);
						this.logger.warn(failure.error.message, { kind: task.kind });
						this.emit("FileError", failure);
					} else {
						succeeded++;
					}
					settle();
				}, this.signal),
			),
		);

		this.signal?.throwIfAborted();

		const indexPath = assetIndexPath(version, layout);
		const report: DownloadReport = { total, scheduled, skipped: total - scheduled, succeeded, failed, indexPath };
		try {
			await mkdir(dirname(indexPath), { recursive: true });
			await writeFile(indexPath, assetIndex.raw);
		} catch (error) {
			report.indexError = new PersistenceError(indexPath, { cause: error });
			this.logger.error(report.indexError);
		}

		this.logger.info(`Downloads finished: ${succeeded} succeeded, ${failed.length} failed`);
		this.emit("Done", report);
		return report;
	}

	private async download(task: DownloadTask): Promise<DownloadFailure | undefined> {
		this.emit("FileStart", task);
		let body: Buffer;
		try {
			body = await fetchBuffer(this.client, task.remoteUrl, { signal: this.signal, timeoutMs: this.timeoutMs });
		} catch (error) {
			return { task, error: new DownloadTaskFailure(task, describeError(error), { cause: error }) };
		}

		try {
			await mkdir(dirname(task.localPath), { recursive: true });
			await writeFile(task.localPath, body);
		} catch (error) {
			return { task, error: new PersistenceError(task.localPath, { cause: error }) };
		}

		this.logger.debug(`Saved ${task.localPath}`);
		this.emit("Bytes", body.length);
		this.emit("FileSuccess", task, body.length);
		return undefined;
	}
}
