import type { LauncherLogger } from "../../Modules/Logger/LauncherLogger.js";
import type { DocumentCache } from "../../Modules/Core/Utils/Cache.js";
import type { HttpClient } from "../../Modules/Core/Utils/Http.js";
import type { PathProvider } from "../../Utils/Folder.js";
import type { LaunchArguments, LaunchIdentity } from "../../Modules/Core/Runtime/Types/Arguments.js";
import type { DownloadReport, LauncherLayout } from "./Download.js";
import type { PlatformDescriptor, VersionInfo } from "./Version.js";

export type LaunchStage = "manifest" | "version" | "assetIndex" | "download" | "arguments" | "process";

export interface LauncherOptions {
	paths: PathProvider;
	/** Detected from the host when omitted */
	platform?: PlatformDescriptor | undefined;
	client?: HttpClient | undefined;
	/** Prefer-cache store for version and asset index documents; none when omitted */
	cache?: DocumentCache | undefined;
	javaPath?: string | undefined;
	concurrency?: number | undefined;
	timeoutMs?: number | undefined;
	signal?: AbortSignal | undefined;
	identity?: LaunchIdentity | undefined;
	logger?: LauncherLogger | undefined;
}

export interface LaunchOutcome {
	version: VersionInfo;
	layout: LauncherLayout;
	report: DownloadReport;
	launch: LaunchArguments;
	pid: number | undefined;
}
