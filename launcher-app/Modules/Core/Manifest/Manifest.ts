import type { VersionManifest, VersionSummary } from "../../../Types/Core/Version.js";
import { FetchError } from "../Errors.js";
import { loadDocument, type DocumentOptions } from "../Utils/Cache.js";
import { isNonEmptyString, isObject, pickArray, pickString } from "../Utils/Guards.js";

export const VERSION_MANIFEST_URL = "https://piston-meta.mojang.com/mc/game/version_manifest_v2.json";

export function parseVersionManifest(json: unknown, url: string = VERSION_MANIFEST_URL): VersionManifest {
	const latestRelease = pickString(json, "latest", "release");
	const latestSnapshot = pickString(json, "latest", "snapshot");
	const entries = pickArray(json, "versions");
	if (latestRelease === undefined || latestSnapshot === undefined || entries === undefined) {
		throw new FetchError(`Version manifest from ${url} is not well-formed`, url);
	}

	const versionUrls = new Map<string, string>();
	const versions: VersionSummary[] = [];
	for (const entry of entries) {
		if (!isObject(entry) || !isNonEmptyString(entry.id) || !isNonEmptyString(entry.url)) {
			throw new FetchError(`Version manifest from ${url} has a malformed version entry`, url);
		}
		// first occurrence wins, as the catalog lists newest first
		if (versionUrls.has(entry.id)) continue;
		versionUrls.set(entry.id, entry.url);
		versions.push({
			id: entry.id,
			url: entry.url,
			type: pickString(entry, "type") ?? "",
			releaseTime: pickString(entry, "releaseTime") ?? "",
		});
	}

	return Object.freeze({ latestRelease, latestSnapshot, versionUrls, versions: Object.freeze(versions) });
}

/** The manifest is always fetched from the network, never from the document cache */
export async function fetchVersionManifest(options: Omit<DocumentOptions, "cache"> = {}): Promise<VersionManifest> {
	const { json } = await loadDocument(VERSION_MANIFEST_URL, { ...options, cache: undefined });
	return parseVersionManifest(json);
}
