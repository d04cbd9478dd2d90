import { EventEmitter } from "node:events";
import { mkdir } from "node:fs/promises";

import type { LaunchOutcome, LaunchStage, LauncherOptions } from "../../Types/Core/Launcher.js";
import type { PlatformDescriptor, VersionManifest } from "../../Types/Core/Version.js";
import { resolveLayout } from "../../Utils/Folder.js";
import { LauncherLogger, silentLogger } from "../Logger/LauncherLogger.js";
import { DownloadOrchestrator } from "./Downloaders/Orchestrator.js";
import { fetchAssetIndex } from "./Manifest/AssetIndex.js";
import { fetchVersionManifest } from "./Manifest/Manifest.js";
import { resolveVersion } from "./Manifest/Version.js";
import { buildLaunchArguments } from "./Runtime/Argument.js";
import { launchProcess } from "./Runtime/Launch.js";
import { detectPlatform } from "./Runtime/Utils/Platform.js";
import { createHttpClient, type HttpClient } from "./Utils/Http.js";

const FORWARDED_EVENTS = ["Start", "FileStart", "FileSuccess", "FileError", "Bytes", "Progress", "Done"] as const;

/**
 * Runs manifest, version, asset index, downloads, arguments and process
 * strictly in that order. Emits `Stage` before each one and forwards the
 * downloader's events unchanged.
 */
export class Launcher extends EventEmitter {
	public readonly platform: PlatformDescriptor;
	private readonly options: LauncherOptions;
	private readonly client: HttpClient;
	private readonly logger: LauncherLogger;

	constructor(options: LauncherOptions) {
		super();
		this.options = options;
		this.platform = options.platform ?? detectPlatform();
		this.client = options.client ?? createHttpClient();
		this.logger = (options.logger ?? silentLogger).child("Launcher");
	}

	private stage(stage: LaunchStage): void {
		this.options.signal?.throwIfAborted();
		this.logger.debug(`Stage ${stage}`);
		this.emit("Stage", stage);
	}

	public async fetchManifest(): Promise<VersionManifest> {
		this.stage("manifest");
		return fetchVersionManifest({
			client: this.client,
			signal: this.options.signal,
			timeoutMs: this.options.timeoutMs,
		});
	}

	public async launch(versionId?: string): Promise<LaunchOutcome> {
		const { signal, timeoutMs, cache } = this.options;
		const manifest = await this.fetchManifest();
		const id = versionId ?? manifest.latestRelease;
		this.logger.info(`Preparing ${id}${versionId ? "" : " (latest release)"}`);

		this.stage("version");
		const version = await resolveVersion(manifest, id, {
			platform: this.platform,
			client: this.client,
			cache,
			signal,
			timeoutMs,
			logger: this.options.logger,
		});

		if (version.javaMajorVersion > 0) {
			this.logger.info(`${version.id} expects Java ${version.javaMajorVersion}`);
		}

		this.stage("assetIndex");
		const assetIndex = await fetchAssetIndex(version, { client: this.client, cache, signal, timeoutMs, logger: this.options.logger });

		this.stage("download");
		const layout = resolveLayout(this.options.paths, version.id);
		const orchestrator = new DownloadOrchestrator({
			client: this.client,
			concurrency: this.options.concurrency,
			timeoutMs,
			signal,
			logger: this.options.logger,
		});
		for (const event of FORWARDED_EVENTS) {
			orchestrator.on(event, (...args: unknown[]) => this.emit(event, ...args));
		}
		const report = await orchestrator.run(version, assetIndex, layout);
		if (report.failed.length > 0) {
			this.logger.warn(`${report.failed.length} downloads failed, launching anyway`);
		}

		this.stage("arguments");
		const launch = buildLaunchArguments(version, layout, this.platform, this.options.identity);

		this.stage("process");
		await mkdir(layout.nativesRoot, { recursive: true });
		await mkdir(layout.instanceRoot, { recursive: true });
		const { pid } = launchProcess(this.options.javaPath ?? "java", launch.arguments, { cwd: layout.instanceRoot }, this.options.logger);

		return { version, layout, report, launch, pid };
	}
}
