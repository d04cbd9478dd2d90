export type OSName = "windows" | "osx" | "linux";

export interface PlatformDescriptor {
	name: OSName;
	/** Upstream vocabulary: x86, x86_64, arm64, arm32 */
	architecture: string;
}

export interface RuleClause {
	action: "allow" | "disallow";
	os?: {
		name?: string;
		arch?: string;
	};
}

export interface LibraryEntry {
	relativePath: string;
	rules: RuleClause[];
}

export interface VersionSummary {
	id: string;
	type: string;
	url: string;
	releaseTime: string;
}

export interface VersionManifest {
	latestRelease: string;
	latestSnapshot: string;
	versionUrls: ReadonlyMap<string, string>;
	/** Upstream order, newest first */
	versions: readonly VersionSummary[];
}

export interface VersionInfo {
	id: string;
	/** release, snapshot, old_beta, old_alpha... empty when the document omits it */
	type: string;
	mainClass: string;
	assetsId: string;
	assetIndexUrl: string;
	clientJarUrl: string;
	/** 0 when the document has no javaVersion */
	javaMajorVersion: number;
	/** Filtered subsequence of the document's libraries, in document order */
	libraries: string[];
}

export interface AssetObject {
	hash: string;
	size: number;
}

export interface AssetIndex {
	objects: Readonly<Record<string, AssetObject>>;
	/** Exact bytes received, written back verbatim */
	raw: Uint8Array;
}
