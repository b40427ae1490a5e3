/**
 * Compiler location per host platform.
 */
import { ConfigurationError, type PlatformTarget } from "@serbench/core";

/** Compiler paths, relative to the build root. */
export const COMPILER_PATHS: Readonly<Record<PlatformTarget, string>> = {
	windows: "../../../bin/compiler/Windows-Debug/bebopc.exe",
	unix: "../../../bin/compiler/Linux-Debug/bebopc",
};

const UNIX_PLATFORMS: ReadonlySet<NodeJS.Platform> = new Set<NodeJS.Platform>([
	"linux",
	"darwin",
	"freebsd",
	"openbsd",
	"netbsd",
	"sunos",
	"aix",
]);

/** Map a Node.js platform identifier to the compiler's platform family. */
export function detectPlatformTarget(platform: NodeJS.Platform): PlatformTarget {
	if (platform === "win32") return "windows";
	if (UNIX_PLATFORMS.has(platform)) return "unix";
	throw new ConfigurationError(`Unsupported build platform: ${platform}`);
}

export function resolveToolPath(target: PlatformTarget): string {
	return COMPILER_PATHS[target];
}
