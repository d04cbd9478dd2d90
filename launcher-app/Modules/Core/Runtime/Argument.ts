import { join } from "node:path";

import type { LauncherLayout } from "../../../Types/Core/Download.js";
import type { PlatformDescriptor, VersionInfo } from "../../../Types/Core/Version.js";
import type { LaunchArguments, LaunchIdentity } from "./Types/Arguments.js";
import { OS_TYPES, classpathSeparator } from "./Utils/Platform.js";

export const DEFAULT_USERNAME = "Player";
export const DEFAULT_BRAND = "Ametrine";
export const DEFAULT_LAUNCHER_VERSION = "0.1.0";

const WINDOWS_HEAP_DUMP = "-XX:HeapDumpPath=MojangTricksIntelDriversForPerformance_javaw.exe_minecraft.exe.heapdump";

export function platformFlags(platform: PlatformDescriptor): string[] {
	const flags: string[] = [];
	if (platform.name === OS_TYPES.osx) flags.push("-XstartOnFirstThread");
	if (platform.name === OS_TYPES.windows) flags.push(WINDOWS_HEAP_DUMP);
	if (platform.architecture === "x86") flags.push("-Xss1M");
	return flags;
}

/** Libraries in resolved order, client jar always last */
export function buildClasspath(version: VersionInfo, layout: LauncherLayout, platform: PlatformDescriptor): string {
	const entries = version.libraries.map((relativePath) => join(layout.librariesRoot, relativePath));
	entries.push(join(layout.versionRoot, "client.jar"));
	return entries.join(classpathSeparator(platform));
}

export function buildLaunchArguments(
	version: VersionInfo,
	layout: LauncherLayout,
	platform: PlatformDescriptor,
	identity: LaunchIdentity = {},
): LaunchArguments {
	const classpath = buildClasspath(version, layout, platform);
	const natives = layout.nativesRoot;

	const jvmArgs = [
		...platformFlags(platform),
		`-Djava.library.path=${natives}`,
		`-Djna.tmpdir=${natives}`,
		`-Dorg.lwjgl.system.SharedLibraryExtractPath=${natives}`,
		`-Dio.netty.native.workdir=${natives}`,
		`-Dminecraft.launcher.brand=${identity.brand ?? DEFAULT_BRAND}`,
		`-Dminecraft.launcher.version=${identity.launcherVersion ?? DEFAULT_LAUNCHER_VERSION}`,
		"-cp",
		classpath,
	];

	// offline session: no uuid, client id, xuid or user type
	const gameArgs = [
		"--username", identity.username ?? DEFAULT_USERNAME,
		"--version", version.id,
		"--gameDir", layout.instanceRoot,
		"--assetsDir", layout.assetsRoot,
		"--assetIndex", version.assetsId,
		"--accessToken", "",
		"--versionType", version.type,
	];

	return { classpath, arguments: [...jvmArgs, version.mainClass, ...gameArgs] };
}
