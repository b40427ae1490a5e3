import { constants } from "node:fs";
import { access, mkdir, readdir, rm, stat } from "node:fs/promises";
import { isAbsolute, relative } from "node:path";
import { IOError, type OutputPolicy, ToolNotFoundError } from "@serbench/core";
import { SPAWN_ERROR_CODES } from "./exec-runner";

/**
 * Check that `toolPath` is an executable file. On Windows `X_OK` only checks
 * existence, so the file check carries most of the weight there.
 */
export async function assertExecutable(tool: string, toolPath: string): Promise<void> {
	try {
		const info = await stat(toolPath);
		if (!info.isFile()) {
			throw new ToolNotFoundError(tool, toolPath);
		}
		await access(toolPath, constants.X_OK);
	} catch (err) {
		if (err instanceof ToolNotFoundError) throw err;
		throw new ToolNotFoundError(tool, toolPath, { cause: err });
	}
}

/** Fail with `IOError` unless `dir` is a readable directory. */
export async function assertReadableDir(dir: string): Promise<void> {
	try {
		const info = await stat(dir);
		if (!info.isDirectory()) {
			throw new Error("not a directory");
		}
		await access(dir, constants.R_OK);
	} catch (err) {
		throw new IOError("read directory", dir, { cause: err });
	}
}

/** True when `child` is `parent` or lies somewhere below it. */
export function isWithin(parent: string, child: string): boolean {
	const rel = relative(parent, child);
	return rel === "" || (!rel.startsWith("..") && !isAbsolute(rel));
}

/**
 * Make `dir` ready for generated output. `clean` removes it first so files
 * from schemas that no longer exist do not survive the build.
 */
export async function prepareOutputDir(dir: string, policy: OutputPolicy): Promise<void> {
	if (policy === "clean") {
		try {
			await rm(dir, { recursive: true, force: true });
		} catch (err) {
			throw new IOError("clean output directory", dir, { cause: err });
		}
	}
	try {
		await mkdir(dir, { recursive: true });
	} catch (err) {
		throw new IOError("create output directory", dir, { cause: err });
	}
}

/** Names of the regular files directly inside `dir`, sorted. */
export async function listFiles(dir: string): Promise<string[]> {
	try {
		const entries = await readdir(dir, { withFileTypes: true });
		return entries
			.filter((e) => e.isFile())
			.map((e) => e.name)
			.sort();
	} catch (err) {
		throw new IOError("list directory", dir, { cause: err });
	}
}

/**
 * Translate an error thrown while starting a tool. A missing or
 * non-executable binary is `ToolNotFoundError`; anything else is `IOError`.
 */
export function toSpawnError(tool: string, toolPath: string, err: unknown): Error {
	if (
		err instanceof Error &&
		"code" in err &&
		typeof err.code === "string" &&
		SPAWN_ERROR_CODES.has(err.code)
	) {
		return new ToolNotFoundError(tool, toolPath, { cause: err });
	}
	return new IOError(`run ${tool} at`, toolPath, { cause: err });
}
