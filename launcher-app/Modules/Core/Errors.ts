import type { DownloadTask } from "../../Types/Core/Download.js";

export class LauncherError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "LauncherError";
	}
}

/** Transport failure, non-2xx status or unreadable body on a document request */
export class FetchError extends LauncherError {
	constructor(
		message: string,
		public readonly url: string,
		public readonly status?: number,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "FetchError";
	}
}

export class UnknownVersionError extends LauncherError {
	constructor(public readonly versionId: string) {
		super(`Version ${versionId} not found in manifest`);
		this.name = "UnknownVersionError";
	}
}

export class MalformedVersionError extends LauncherError {
	constructor(
		public readonly versionId: string,
		public readonly field: string,
	) {
		super(`Version document for ${versionId} is missing required field "${field}"`);
		this.name = "MalformedVersionError";
	}
}

export class DownloadTaskFailure extends LauncherError {
	constructor(
		public readonly task: DownloadTask,
		message: string,
		options?: { cause?: unknown },
	) {
		super(`Failed to download ${task.remoteUrl}: ${message}`, options);
		this.name = "DownloadTaskFailure";
	}
}

export class PersistenceError extends LauncherError {
	constructor(
		public readonly path: string,
		options?: { cause?: unknown },
	) {
		super(`Failed to write ${path}: ${describeError(options?.cause)}`, options);
		this.name = "PersistenceError";
	}
}

export function describeError(error: unknown): string {
	if (error instanceof Error) return error.message;
	return String(error);
}
