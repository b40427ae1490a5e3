import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";
import type { ZodIssue } from "zod";
import { ConfigurationError, IOError } from "./errors";
import { type BuildConfig, BuildConfigSchema } from "./schemas/build-config";

export const CONFIG_FILE_NAME = "serbench.config.json";
export const CONFIG_ENV_VAR = "SERBENCH_CODEGEN_CONFIG";

export interface LoadBuildConfigOptions {
	/** Directory every relative path resolves against. Defaults to `process.cwd()`. */
	rootDir?: string;
	configPath?: string;
	env?: NodeJS.ProcessEnv;
}

export interface LoadedBuildConfig {
	config: BuildConfig;
	rootDir: string;
	/** Absolute path of the file the config came from, `null` for built-in defaults. */
	source: string | null;
}

function toIssues(issues: ZodIssue[]) {
	return issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));
}

/** Validate a raw config object (already parsed from JSON) and apply defaults. */
export function parseBuildConfig(raw: unknown, source = "config"): BuildConfig {
	const result = BuildConfigSchema.safeParse(raw);
	if (!result.success) {
		throw new ConfigurationError(`Invalid ${source}`, toIssues(result.error.issues));
	}
	return result.data;
}

/**
 * Load the build configuration.
 *
 * Config file resolution order:
 * 1. Explicit `configPath` option
 * 2. `SERBENCH_CODEGEN_CONFIG` env var
 * 3. `serbench.config.json` in the root directory, if present
 * 4. Built-in defaults
 */
export async function loadBuildConfig(
	options: LoadBuildConfigOptions = {},
): Promise<LoadedBuildConfig> {
	const rootDir = resolve(options.rootDir ?? process.cwd());
	const env = options.env ?? process.env;
	const requested = options.configPath ?? env[CONFIG_ENV_VAR];

	let source: string | null = null;
	if (requested) {
		source = isAbsolute(requested) ? requested : resolve(rootDir, requested);
	} else if (existsSync(join(rootDir, CONFIG_FILE_NAME))) {
		source = join(rootDir, CONFIG_FILE_NAME);
	}

	if (!source) {
		return { config: parseBuildConfig({}), rootDir, source };
	}

	let text: string;
	try {
		text = await readFile(source, "utf-8");
	} catch (err) {
		throw new IOError("read config file", source, { cause: err });
	}

	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (err) {
		throw new ConfigurationError(
			`Config file ${source} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
		);
	}

	return { config: parseBuildConfig(raw, `config file ${source}`), rootDir, source };
}

/**
 * Resolve every path in the config against `rootDir`. Bare command names
 * (`protoc`) are left alone so they are still looked up on PATH. The protoc
 * plugin is passed through as written; protoc runs with `rootDir` as cwd.
 */
export function resolveConfigPaths(config: BuildConfig, rootDir: string): BuildConfig {
	const abs = (p: string) => resolve(rootDir, p);
	const command = (p: string) => (/[\\/]/.test(p) ? abs(p) : p);
	return {
		...config,
		compiler: {
			...config.compiler,
			path: config.compiler.path === undefined ? undefined : abs(config.compiler.path),
		},
		batch: {
			...config.batch,
			sourceDir: abs(config.batch.sourceDir),
			outDir: abs(config.batch.outDir),
		},
		codegen: {
			...config.codegen,
			path: command(config.codegen.path),
			outDir: abs(config.codegen.outDir),
			inputs: config.codegen.inputs.map(abs),
			includes: config.codegen.includes.map(abs),
		},
	};
}
