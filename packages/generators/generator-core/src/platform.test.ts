import { ConfigurationError, PlatformTargetSchema } from "@serbench/core";
import { describe, expect, it } from "vitest";
import { COMPILER_PATHS, detectPlatformTarget, resolveToolPath } from "./platform";

describe("detectPlatformTarget", () => {
	it("maps win32 to windows", () => {
		expect(detectPlatformTarget("win32")).toBe("windows");
	});

	it.each(["linux", "darwin", "freebsd", "openbsd", "netbsd", "sunos", "aix"] as const)(
		"maps %s to unix",
		(platform) => {
			expect(detectPlatformTarget(platform)).toBe("unix");
		},
	);

	it("rejects platforms without a compiler build", () => {
		expect(() => detectPlatformTarget("android")).toThrow(ConfigurationError);
		expect(() => detectPlatformTarget("cygwin")).toThrow("Unsupported build platform: cygwin");
	});
});

describe("resolveToolPath", () => {
	it("covers every platform target", () => {
		for (const target of PlatformTargetSchema.options) {
			expect(resolveToolPath(target)).not.toBe("");
		}
		expect(Object.keys(COMPILER_PATHS).sort()).toEqual([...PlatformTargetSchema.options].sort());
	});

	it("returns the Windows build of the compiler", () => {
		expect(resolveToolPath("windows")).toBe("../../../bin/compiler/Windows-Debug/bebopc.exe");
	});

	it("returns the Linux build of the compiler", () => {
		expect(resolveToolPath("unix")).toBe("../../../bin/compiler/Linux-Debug/bebopc");
	});

	it("gives the same answer on every call", () => {
		expect(resolveToolPath("unix")).toBe(resolveToolPath("unix"));
	});
});
