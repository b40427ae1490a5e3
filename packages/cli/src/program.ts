import { resolve } from "node:path";
import {
	type BuildConfig,
	type CommandRunner,
	type LoadedBuildConfig,
	loadBuildConfig,
	resolveConfigPaths,
} from "@serbench/core";
import { detectPlatformTarget } from "@serbench/generator-core";
import { EventBus, createOrchestrator, resolveCompilerPath } from "@serbench/orchestrator";
import { Command, InvalidArgumentError } from "commander";
import { LOG_TAG, type LogFn, attachReporter, formatError } from "./reporter";

export interface ProgramIO {
	log: LogFn;
	error: LogFn;
	exit: (code: number) => void;
	env: NodeJS.ProcessEnv;
	platform: NodeJS.Platform;
	runner?: CommandRunner;
}

interface ConfigOptions {
	config?: string;
	root?: string;
}

function parseTimeout(value: string): number {
	const ms = Number(value);
	if (!Number.isInteger(ms) || ms <= 0) {
		throw new InvalidArgumentError("Timeout must be a positive integer (milliseconds).");
	}
	return ms;
}

async function load(options: ConfigOptions, io: ProgramIO): Promise<LoadedBuildConfig> {
	return loadBuildConfig({
		configPath: options.config,
		rootDir: options.root ? resolve(options.root) : undefined,
		env: io.env,
	});
}

/** Apply command-line overrides on top of the file configuration. */
function withOverrides(
	config: BuildConfig,
	overrides: { concurrent?: boolean; timeout?: number },
): BuildConfig {
	return {
		...config,
		concurrent: overrides.concurrent ?? config.concurrent,
		compiler: {
			...config.compiler,
			timeoutMs: overrides.timeout ?? config.compiler.timeoutMs,
		},
		codegen: {
			...config.codegen,
			timeoutMs: overrides.timeout ?? config.codegen.timeoutMs,
		},
	};
}

export function buildProgram(io: ProgramIO): Command {
	const program = new Command();

	program
		.name("serbench-codegen")
		.description("Generate serialization benchmark sources with bebopc and protoc")
		.version("0.1.0");

	program
		.command("generate", { isDefault: true })
		.description("Compile the Bebop schema directory, then run protoc")
		.option("-c, --config <path>", "Config file (default: serbench.config.json)")
		.option("-r, --root <dir>", "Build root that relative paths resolve against")
		.option("--concurrent", "Run bebopc and protoc at the same time")
		.option("-t, --timeout <ms>", "Kill a tool that runs longer than this", parseTimeout)
		.option("-q, --quiet", "Only print failures")
		.action(
			async (options: ConfigOptions & { concurrent?: boolean; timeout?: number; quiet?: boolean }) => {
				try {
					const loaded = await load(options, io);
					const eventBus = new EventBus();
					if (!options.quiet) {
						attachReporter(eventBus, loaded.rootDir, io.log);
					}
					const orchestrator = createOrchestrator(
						{ config: withOverrides(loaded.config, options), rootDir: loaded.rootDir },
						{ eventBus, platform: io.platform, runner: io.runner },
					);
					await orchestrator.run();
				} catch (err) {
					for (const line of formatError(err)) io.error(line);
					io.error(`${LOG_TAG} build failed`);
					io.exit(1);
				}
			},
		);

	program
		.command("resolve-tool")
		.description("Print the compiler path for this platform")
		.option("-c, --config <path>", "Config file (default: serbench.config.json)")
		.option("-r, --root <dir>", "Build root that relative paths resolve against")
		.action(async (options: ConfigOptions) => {
			try {
				const loaded = await load(options, io);
				const target = detectPlatformTarget(io.platform);
				const config = resolveConfigPaths(loaded.config, loaded.rootDir);
				io.log(`platform: ${target}`);
				io.log(`compiler: ${resolveCompilerPath(config, loaded.rootDir, target)}`);
			} catch (err) {
				for (const line of formatError(err)) io.error(line);
				io.exit(1);
			}
		});

	program
		.command("print-config")
		.description("Print the effective configuration as JSON")
		.option("-c, --config <path>", "Config file (default: serbench.config.json)")
		.option("-r, --root <dir>", "Build root that relative paths resolve against")
		.action(async (options: ConfigOptions) => {
			try {
				const loaded = await load(options, io);
				io.log(
					JSON.stringify(
						{
							source: loaded.source,
							rootDir: loaded.rootDir,
							config: resolveConfigPaths(loaded.config, loaded.rootDir),
						},
						null,
						2,
					),
				);
			} catch (err) {
				for (const line of formatError(err)) io.error(line);
				io.exit(1);
			}
		});

	return program;
}
