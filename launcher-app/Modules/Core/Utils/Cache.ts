import { createHash, randomBytes } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { describeError } from "../Errors.js";
import { LauncherLogger, silentLogger } from "../../Logger/LauncherLogger.js";
import {
	createHttpClient,
	fetchJsonDocument,
	parseJsonDocument,
	type FetchedDocument,
	type HttpClient,
	type RequestOptions,
} from "./Http.js";

/**
 * Disk cache for documents whose URL never changes content (per-version
 * descriptors and asset indexes are addressed by their hash upstream).
 * A cached copy is always preferred over the network, unless it no longer
 * parses, in which case it is dropped and fetched again.
 */
export class DocumentCache {
	private readonly directory: string;
	private readonly logger: LauncherLogger;

	constructor(directory: string, logger: LauncherLogger = silentLogger) {
		this.directory = directory;
		this.logger = logger.child("DocumentCache");
	}

	public pathFor(url: string): string {
		const key = createHash("sha1").update(url).digest("hex");
		return join(this.directory, key);
	}

	public async read(url: string): Promise<Buffer | undefined> {
		try {
			return await readFile(this.pathFor(url));
		} catch (error) {
			if (isNotFound(error)) return undefined;
			throw error;
		}
	}

	/** Written beside the entry, then renamed over it */
	public async store(url: string, body: Buffer): Promise<void> {
		await mkdir(this.directory, { recursive: true });
		const path = this.pathFor(url);
		const temporary = `${path}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;
		try {
			await writeFile(temporary, body);
			await rename(temporary, path);
		} catch (error) {
			await rm(temporary, { force: true });
			throw error;
		}
	}

	public async discard(url: string): Promise<void> {
		await rm(this.pathFor(url), { force: true });
	}

	public async load(client: HttpClient, url: string, options: RequestOptions = {}): Promise<FetchedDocument> {
		const cached = await this.read(url);
		if (cached) {
			try {
				const json = parseJsonDocument(url, cached);
				this.logger.debug(`Cache hit for ${url}`);
				return { raw: cached, json };
			} catch (error) {
				this.logger.warn(`Dropping cached copy of ${url}: ${describeError(error)}`);
				await this.discard(url);
			}
		}
		const fetched = await fetchJsonDocument(client, url, options);
		try {
			await this.store(url, fetched.raw);
		} catch (error) {
			this.logger.warn(`Could not cache ${url}: ${describeError(error)}`);
		}
		return fetched;
	}
}

function isNotFound(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export interface DocumentOptions extends RequestOptions {
	client?: HttpClient | undefined;
	cache?: DocumentCache | undefined;
}

/** Fetches a JSON document, through `cache` when one is given */
export async function loadDocument(url: string, options: DocumentOptions = {}): Promise<FetchedDocument> {
	const client = options.client ?? createHttpClient();
	if (!options.cache) return fetchJsonDocument(client, url, options);
	return options.cache.load(client, url, options);
}
