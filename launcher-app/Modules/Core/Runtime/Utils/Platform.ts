import type { OSName, PlatformDescriptor } from "../../../../Types/Core/Version.js";

export const OS_TYPES = { windows: "windows", linux: "linux", osx: "osx" } as const satisfies Record<string, OSName>;

const ARCH_NAMES: Partial<Record<string, string>> = {
	ia32: "x86",
	x64: "x86_64",
	arm64: "arm64",
	arm: "arm32",
};

export function toOSName(platform: NodeJS.Platform): OSName {
	switch (platform) {
		case "win32": return OS_TYPES.windows;
		case "darwin": return OS_TYPES.osx;
		default: return OS_TYPES.linux;
	}
}

export function toArchitecture(arch: string): string {
	return ARCH_NAMES[arch] ?? arch;
}

export function detectPlatform(platform: NodeJS.Platform = process.platform, arch: string = process.arch): PlatformDescriptor {
	return Object.freeze({ name: toOSName(platform), architecture: toArchitecture(arch) });
}

export function classpathSeparator(platform: PlatformDescriptor): string {
	return platform.name === OS_TYPES.windows ? ";" : ":";
}
