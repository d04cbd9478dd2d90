import { FetchError, describeError } from "../Errors.js";

export const DEFAULT_USER_AGENT = "Ametrine/0.1.0";

export type HttpClient = (input: string, init?: RequestInit) => Promise<Response>;

export interface RequestOptions {
	signal?: AbortSignal | undefined;
	/** Aborts the request after this many milliseconds; 0, a negative value or undefined disables it */
	timeoutMs?: number | undefined;
}

export interface FetchedDocument {
	raw: Buffer;
	json: unknown;
}

export function createHttpClient(userAgent: string = DEFAULT_USER_AGENT): HttpClient {
	return (input, init) => {
		const headers = new Headers(init?.headers);
		if (!headers.has("User-Agent")) headers.set("User-Agent", userAgent);
		return fetch(input, { ...init, headers, redirect: "follow" });
	};
}

class TimeoutError extends Error {
	constructor(timeoutMs: number) {
		super(`Timed out after ${timeoutMs} ms`);
		this.name = "TimeoutError";
	}
}

/**
 * Derives a signal that aborts with the parent or after `timeoutMs`.
 * `dispose` must be called once the request settles.
 */
function linkSignal(options: RequestOptions): { signal: AbortSignal | undefined; dispose: () => void } {
	const { signal: parent, timeoutMs } = options;
	if (timeoutMs === undefined || timeoutMs <= 0) return { signal: parent, dispose: () => {} };

	const controller = new AbortController();
	const onAbort = () => controller.abort(parent?.reason);
	if (parent?.aborted) controller.abort(parent.reason);
	else parent?.addEventListener("abort", onAbort, { once: true });

	const timer = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);
	return {
		signal: controller.signal,
		dispose: () => {
			clearTimeout(timer);
			parent?.removeEventListener("abort", onAbort);
		},
	};
}

export async function fetchBuffer(client: HttpClient, url: string, options: RequestOptions = {}): Promise<Buffer> {
	const { signal, dispose } = linkSignal(options);
	try {
		let response: Response;
		try {
			response = await client(url, { signal });
		} catch (error) {
			throw new FetchError(`Request to ${url} failed: ${describeError(error)}`, url, undefined, { cause: error });
		}
		if (!response.ok) {
			throw new FetchError(`Request to ${url} failed: HTTP ${response.status}`, url, response.status);
		}
		try {
			return Buffer.from(await response.arrayBuffer());
		} catch (error) {
			throw new FetchError(`Reading body of ${url} failed: ${describeError(error)}`, url, response.status, { cause: error });
		}
	} finally {
		dispose();
	}
}

export function parseJsonDocument(url: string, raw: Buffer): unknown {
	try {
		return JSON.parse(raw.toString("utf-8"));
	} catch (error) {
		throw new FetchError(`Response from ${url} is not valid JSON`, url, undefined, { cause: error });
	}
}

export async function fetchJsonDocument(client: HttpClient, url: string, options: RequestOptions = {}): Promise<FetchedDocument> {
	const raw = await fetchBuffer(client, url, options);
	return { raw, json: parseJsonDocument(url, raw) };
}
