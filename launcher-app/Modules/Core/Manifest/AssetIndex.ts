import type { AssetIndex, AssetObject, VersionInfo } from "../../../Types/Core/Version.js";
import { FetchError } from "../Errors.js";
import { LauncherLogger, silentLogger } from "../../Logger/LauncherLogger.js";
import { loadDocument, type DocumentOptions } from "../Utils/Cache.js";
import { isFiniteNumber, isNonEmptyString, isObject, pick } from "../Utils/Guards.js";

export interface AssetIndexOptions extends DocumentOptions {
	logger?: LauncherLogger | undefined;
}

const HASH_PATTERN = /^[0-9a-f]{2,}$/i;

export function parseAssetObjects(json: unknown, url: string): Record<string, AssetObject> {
	const objects = pick(json, "objects");
	if (!isObject(objects)) throw new FetchError(`Asset index from ${url} has no objects`, url);

	const parsed: Record<string, AssetObject> = {};
	for (const [name, entry] of Object.entries(objects)) {
		if (!isObject(entry) || !isNonEmptyString(entry.hash) || !HASH_PATTERN.test(entry.hash)) {
			throw new FetchError(`Asset index from ${url} has a malformed entry for ${name}`, url);
		}
		parsed[name] = { hash: entry.hash, size: isFiniteNumber(entry.size) ? entry.size : 0 };
	}
	return parsed;
}

export async function fetchAssetIndex(version: VersionInfo, options: AssetIndexOptions = {}): Promise<AssetIndex> {
	const url = version.assetIndexUrl;
	if (!url) throw new FetchError(`Version ${version.id} has no asset index url`, url);

	const logger = (options.logger ?? silentLogger).child("AssetIndex");
	const { raw, json } = await loadDocument(url, options);
	const objects = parseAssetObjects(json, url);
	logger.info(`Asset index ${version.assetsId || version.id} lists ${Object.keys(objects).length} objects`);
	return { objects: Object.freeze(objects), raw: new Uint8Array(raw) };
}
