import { posix, win32 } from "node:path";

import type {
	LibraryEntry,
	PlatformDescriptor,
	RuleClause,
	VersionInfo,
	VersionManifest,
} from "../../../Types/Core/Version.js";
import { MalformedVersionError, UnknownVersionError } from "../Errors.js";
import { LauncherLogger, silentLogger } from "../../Logger/LauncherLogger.js";
import { isLibraryIncluded } from "../Runtime/Rules.js";
import { loadDocument, type DocumentOptions } from "../Utils/Cache.js";
import { isNonEmptyString, isObject, pick, pickArray, pickNumber, pickString } from "../Utils/Guards.js";

export interface ResolveOptions extends DocumentOptions {
	platform: PlatformDescriptor;
	logger?: LauncherLogger | undefined;
}

function parseRule(value: unknown): RuleClause | undefined {
	if (!isObject(value)) return undefined;
	const action = value.action;
	// clauses with any other action never constrain the library
	if (action !== "allow" && action !== "disallow") return undefined;

	const os = pick(value, "os");
	if (!isObject(os)) return { action };
	const clause: RuleClause = { action, os: {} };
	if (typeof os.name === "string") clause.os = { ...clause.os, name: os.name };
	if (typeof os.arch === "string") clause.os = { ...clause.os, arch: os.arch };
	return clause;
}

function staysInside(relativePath: string): boolean {
	if (posix.isAbsolute(relativePath) || win32.isAbsolute(relativePath)) return false;
	const normalized = posix.normalize(relativePath.replaceAll("\\", "/"));
	return normalized !== ".." && !normalized.startsWith("../");
}

/**
 * Entries without an artifact path (natives-only) yield undefined, as do
 * paths that would resolve outside the libraries root.
 */
export function parseLibrary(value: unknown): LibraryEntry | undefined {
	const relativePath = pickString(value, "downloads", "artifact", "path");
	if (!isNonEmptyString(relativePath) || !staysInside(relativePath)) return undefined;
	const rules = (pickArray(value, "rules") ?? [])
		.map(parseRule)
		.filter((rule): rule is RuleClause => rule !== undefined);
	return { relativePath, rules };
}

function requireString(json: unknown, versionId: string, field: string, ...keys: string[]): string {
	const value = pickString(json, ...keys);
	if (!isNonEmptyString(value)) throw new MalformedVersionError(versionId, field);
	return value;
}

export function parseVersionInfo(json: unknown, requestedId: string, platform: PlatformDescriptor): VersionInfo {
	const id = requireString(json, requestedId, "id", "id");
	const mainClass = requireString(json, id, "mainClass", "mainClass");
	const clientJarUrl = requireString(json, id, "downloads.client.url", "downloads", "client", "url");

	const libraries: string[] = [];
	for (const entry of pickArray(json, "libraries") ?? []) {
		const library = parseLibrary(entry);
		if (library && isLibraryIncluded(library.rules, platform)) libraries.push(library.relativePath);
	}

	return {
		id,
		type: pickString(json, "type") ?? "",
		mainClass,
		assetsId: pickString(json, "assets") || pickString(json, "assetIndex", "id") || "",
		assetIndexUrl: pickString(json, "assetIndex", "url") ?? "",
		clientJarUrl,
		javaMajorVersion: pickNumber(json, "javaVersion", "majorVersion") ?? 0,
		libraries,
	};
}

export async function resolveVersion(manifest: VersionManifest, versionId: string, options: ResolveOptions): Promise<VersionInfo> {
	const url = manifest.versionUrls.get(versionId);
	if (url === undefined) throw new UnknownVersionError(versionId);

	const logger = (options.logger ?? silentLogger).child("Version");
	logger.debug(`Resolving ${versionId} from ${url}`);
	const { json } = await loadDocument(url, options);
	const version = parseVersionInfo(json, versionId, options.platform);
	logger.info(`Resolved ${version.id}: ${version.libraries.length} libraries for ${options.platform.name}/${options.platform.architecture}`);
	return version;
}
