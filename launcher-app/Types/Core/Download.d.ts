import type { DownloadTaskFailure, PersistenceError } from "../../Modules/Core/Errors.js";

export type DownloadKind = "library" | "asset" | "client";

export interface DownloadTask {
	kind: DownloadKind;
	remoteUrl: string;
	localPath: string;
}

export interface DownloadFailure {
	task: DownloadTask;
	error: DownloadTaskFailure | PersistenceError;
}

export interface DownloadReport {
	/** scheduled + skipped */
	total: number;
	scheduled: number;
	skipped: number;
	succeeded: number;
	failed: DownloadFailure[];
	indexPath: string;
	indexError?: PersistenceError;
}

export interface DownloadProgress {
	completed: number;
	remaining: number;
	total: number;
}

export interface LauncherLayout {
	dataRoot: string;
	cacheRoot: string;
	librariesRoot: string;
	assetsRoot: string;
	versionRoot: string;
	instanceRoot: string;
	nativesRoot: string;
}
