import { join } from "node:path";
import { describe, expect, it } from "vitest";

import type { LauncherLayout } from "../../../Types/Core/Download.js";
import type { PlatformDescriptor, VersionInfo } from "../../../Types/Core/Version.js";
import { buildClasspath, buildLaunchArguments, platformFlags } from "./Argument.js";

const layout: LauncherLayout = {
	dataRoot: join("/data"),
	cacheRoot: join("/cache"),
	librariesRoot: join("/data", "libraries"),
	assetsRoot: join("/data", "assets"),
	versionRoot: join("/data", "versions", "1.21"),
	instanceRoot: join("/data", "instances", "1.21", "minecraft"),
	nativesRoot: join("/cache", "natives"),
};

const version: VersionInfo = {
	id: "1.21",
	type: "release",
	mainClass: "net.minecraft.client.main.Main",
	assetsId: "17",
	assetIndexUrl: "https://example.test/17.json",
	clientJarUrl: "https://example.test/client.jar",
	javaMajorVersion: 21,
	libraries: ["com/example/a.jar", "com/example/b.jar"],
};

const linux: PlatformDescriptor = { name: "linux", architecture: "x86_64" };
const natives = join("/cache", "natives");
const clientJar = join("/data", "versions", "1.21", "client.jar");

describe("buildClasspath", () => {
	it("keeps library order and ends with the client jar", () => {
		expect(buildClasspath(version, layout, linux)).toBe(
			[join("/data", "libraries", "com/example/a.jar"), join("/data", "libraries", "com/example/b.jar"), clientJar].join(":"),
		);
	});

	it("uses a semicolon on windows", () => {
		const classpath = buildClasspath(version, layout, { name: "windows", architecture: "x86_64" });
		expect(classpath.split(";")).toHaveLength(3);
		expect(classpath.endsWith(`;${clientJar}`)).toBe(true);
	});

	it("is only the client jar without libraries", () => {
		expect(buildClasspath({ ...version, libraries: [] }, layout, linux)).toBe(clientJar);
	});
});

describe("platformFlags", () => {
	it("adds the flags for each platform", () => {
		expect(platformFlags(linux)).toEqual([]);
		expect(platformFlags({ name: "osx", architecture: "arm64" })).toEqual(["-XstartOnFirstThread"]);
		expect(platformFlags({ name: "windows", architecture: "x86" })).toEqual([
			"-XX:HeapDumpPath=MojangTricksIntelDriversForPerformance_javaw.exe_minecraft.exe.heapdump",
			"-Xss1M",
		]);
	});
});

describe("buildLaunchArguments", () => {
	it("emits the arguments in launch order", () => {
		const { classpath, arguments: args } = buildLaunchArguments(version, layout, linux);
		expect(args).toEqual([
			`-Djava.library.path=${natives}`,
			`-Djna.tmpdir=${natives}`,
			`-Dorg.lwjgl.system.SharedLibraryExtractPath=${natives}`,
			`-Dio.netty.native.workdir=${natives}`,
			"-Dminecraft.launcher.brand=Ametrine",
			"-Dminecraft.launcher.version=0.1.0",
			"-cp",
			classpath,
			"net.minecraft.client.main.Main",
			"--username", "Player",
			"--version", "1.21",
			"--gameDir", join("/data", "instances", "1.21", "minecraft"),
			"--assetsDir", join("/data", "assets"),
			"--assetIndex", "17",
			"--accessToken", "",
			"--versionType", "release",
		]);
	});

	it("puts platform flags first", () => {
		const { arguments: args } = buildLaunchArguments(version, layout, { name: "osx", architecture: "x86" });
		expect(args.slice(0, 3)).toEqual(["-XstartOnFirstThread", "-Xss1M", `-Djava.library.path=${natives}`]);
	});

	it("applies the identity overrides", () => {
		const { arguments: args } = buildLaunchArguments(version, layout, linux, {
			username: "Tester",
			brand: "Custom",
			launcherVersion: "2.0.0",
		});
		expect(args).toContain("-Dminecraft.launcher.brand=Custom");
		expect(args).toContain("-Dminecraft.launcher.version=2.0.0");
		expect(args[args.indexOf("--username") + 1]).toBe("Tester");
	});

	it("never emits authentication arguments", () => {
		const { arguments: args } = buildLaunchArguments(version, layout, linux);
		for (const flag of ["--uuid", "--clientId", "--xuid", "--userType"]) expect(args).not.toContain(flag);
	});

	it("is deterministic", () => {
		expect(buildLaunchArguments(version, layout, linux)).toEqual(buildLaunchArguments(version, layout, linux));
	});
});
