import { EventEmitter } from "node:events";
import { mkdtemp, readFile, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const { spawnMock } = vi.hoisted(() => ({ spawnMock: vi.fn() }));
vi.mock("node:child_process", () => ({ spawn: spawnMock }));

import type { PlatformDescriptor } from "../../Types/Core/Version.js";
import type { PathProvider } from "../../Utils/Folder.js";
import { UnknownVersionError } from "./Errors.js";
import { Launcher } from "./Launcher.js";
import { VERSION_MANIFEST_URL } from "./Manifest/Manifest.js";
import type { HttpClient } from "./Utils/Http.js";

const linux: PlatformDescriptor = { name: "linux", architecture: "x86_64" };

const assetIndexBody = JSON.stringify({
	objects: {
		"minecraft/sounds/a.ogg": { hash: "0a0a0a", size: 4 },
		"minecraft/lang/en.json": { hash: "1b1b1b", size: 4 },
		"icons/icon.png": { hash: "2c2c2c", size: 4 },
	},
});

const documents: Record<string, string> = {
	[VERSION_MANIFEST_URL]: JSON.stringify({
		latest: { release: "1.21", snapshot: "24w40a" },
		versions: [
			{ id: "24w40a", type: "snapshot", url: "https://example.test/24w40a.json" },
			{ id: "1.21", type: "release", url: "https://example.test/1.21.json" },
		],
	}),
	"https://example.test/1.21.json": JSON.stringify({
		id: "1.21",
		type: "release",
		mainClass: "net.minecraft.client.main.Main",
		assetIndex: { id: "17", url: "https://example.test/indexes/17.json" },
		downloads: { client: { url: "https://example.test/1.21/client.jar" } },
		libraries: [
			{ downloads: { artifact: { path: "com/example/first/1.0/first-1.0.jar" } } },
			{
				downloads: { artifact: { path: "com/example/windows-only/1.0/windows-only-1.0.jar" } },
				rules: [{ action: "disallow", os: { name: "linux" } }],
			},
			{ downloads: { artifact: { path: "com/example/last/1.0/last-1.0.jar" } } },
		],
	}),
	"https://example.test/indexes/17.json": assetIndexBody,
};

function createClient() {
	return vi.fn<HttpClient>(async (input) => {
		const document = documents[input];
		return new Response(document ?? `binary ${input}`);
	});
}

let root: string;
let paths: PathProvider;

beforeEach(async () => {
	root = await mkdtemp(join(tmpdir(), "ametrine-launcher-"));
	paths = { getDataRoot: () => join(root, "data"), getCacheRoot: () => join(root, "cache") };
	spawnMock.mockReset();
	spawnMock.mockImplementation(() => Object.assign(new EventEmitter(), { pid: 1234 }));
});

afterEach(async () => {
	await rm(root, { recursive: true, force: true });
});

describe("Launcher", () => {
	it("launches the latest release end to end", async () => {
		const client = createClient();
		const launcher = new Launcher({ paths, platform: linux, client, javaPath: "/opt/java/bin/java" });
		const stages: unknown[] = [];
		launcher.on("Stage", (stage) => stages.push(stage));

		const outcome = await launcher.launch();

		expect(stages).toEqual(["manifest", "version", "assetIndex", "download", "arguments", "process"]);
		expect(outcome.version.libraries).toEqual([
			"com/example/first/1.0/first-1.0.jar",
			"com/example/last/1.0/last-1.0.jar",
		]);
		expect(outcome.report).toMatchObject({ total: 6, scheduled: 6, skipped: 0, succeeded: 6, failed: [] });
		expect(outcome.pid).toBe(1234);

		const instanceRoot = join(root, "data", "instances", "1.21", "minecraft");
		expect(spawnMock).toHaveBeenCalledTimes(1);
		expect(spawnMock.mock.calls[0]?.[0]).toBe("/opt/java/bin/java");
		expect(spawnMock.mock.calls[0]?.[1]).toEqual(outcome.launch.arguments);
		expect(spawnMock.mock.calls[0]?.[2]).toMatchObject({ cwd: instanceRoot, stdio: "inherit" });
		expect((await stat(instanceRoot)).isDirectory()).toBe(true);
		expect((await stat(join(root, "cache", "natives"))).isDirectory()).toBe(true);

		expect(outcome.launch.classpath.split(":")).toEqual([
			join(root, "data", "libraries", "com/example/first/1.0/first-1.0.jar"),
			join(root, "data", "libraries", "com/example/last/1.0/last-1.0.jar"),
			join(root, "data", "versions", "1.21", "client.jar"),
		]);
		expect(await readFile(join(root, "data", "assets", "indexes", "17.json"), "utf-8")).toBe(assetIndexBody);
		expect(await readFile(join(root, "data", "versions", "1.21", "client.jar"), "utf-8")).toBe(
			"binary https://example.test/1.21/client.jar",
		);
	});

	it("downloads nothing on a second launch", async () => {
		await new Launcher({ paths, platform: linux, client: createClient() }).launch("1.21");
		const client = createClient();
		const outcome = await new Launcher({ paths, platform: linux, client }).launch("1.21");

		expect(outcome.report).toMatchObject({ total: 6, scheduled: 0, skipped: 6, succeeded: 0 });
		expect(client.mock.calls.map(([url]) => url)).toEqual([
			VERSION_MANIFEST_URL,
			"https://example.test/1.21.json",
			"https://example.test/indexes/17.json",
		]);
	});

	it("fails before downloading for an unknown version", async () => {
		const client = createClient();
		await expect(new Launcher({ paths, platform: linux, client }).launch("0.0.1")).rejects.toBeInstanceOf(UnknownVersionError);
		expect(client).toHaveBeenCalledTimes(1);
		expect(spawnMock).not.toHaveBeenCalled();
	});

	it("launches even when some downloads fail", async () => {
		const client = vi.fn<HttpClient>(async (input) => {
			if (input.startsWith("https://resources.download.minecraft.net/")) return new Response("", { status: 500 });
			return new Response(documents[input] ?? "jar");
		});
		const outcome = await new Launcher({ paths, platform: linux, client }).launch();
		expect(outcome.report.failed.map((f) => f.task.kind)).toEqual(["asset", "asset", "asset"]);
		expect(spawnMock).toHaveBeenCalledTimes(1);
	});

	it("forwards download progress", async () => {
		const launcher = new Launcher({ paths, platform: linux, client: createClient(), concurrency: 1 });
		const progress: unknown[] = [];
		launcher.on("Progress", (p) => progress.push(p));
		await launcher.launch();
		expect(progress).toHaveLength(6);
		expect(progress[5]).toEqual({ completed: 6, remaining: 0, total: 6 });
	});

	it("stops at the next stage once cancelled", async () => {
		const controller = new AbortController();
		const launcher = new Launcher({ paths, platform: linux, client: createClient(), signal: controller.signal });
		launcher.on("Stage", (stage) => {
			if (stage === "assetIndex") controller.abort(new Error("user cancelled"));
		});
		await expect(launcher.launch()).rejects.toThrow("user cancelled");
		expect(spawnMock).not.toHaveBeenCalled();
	});
});
