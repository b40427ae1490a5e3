import { type CommandRunner, type LoadedBuildConfig, resolveConfigPaths } from "@serbench/core";
import { BebopCompiler } from "@serbench/generator-bebop";
import { ExecFileRunner } from "@serbench/generator-core";
import { ProtocCodegen } from "@serbench/generator-protoc";
import type { EventBus } from "./event-bus";
import { Orchestrator } from "./orchestrator";

export interface CreateOrchestratorOptions {
	runner?: CommandRunner;
	eventBus?: EventBus;
	platform?: NodeJS.Platform;
}

/**
 * Wire an orchestrator from a loaded configuration: paths are resolved
 * against the root, and both tools run with the root as working directory.
 */
export function createOrchestrator(
	loaded: Pick<LoadedBuildConfig, "config" | "rootDir">,
	options: CreateOrchestratorOptions = {},
): Orchestrator {
	const { rootDir } = loaded;
	const config = resolveConfigPaths(loaded.config, rootDir);
	const runner = options.runner ?? new ExecFileRunner();

	const compiler = new BebopCompiler({
		runner,
		args: config.compiler.args,
		schemaExtensions: config.compiler.schemaExtensions,
		outputExtension: config.compiler.outputExtension,
		outputPolicy: config.batch.outputPolicy,
		index: config.batch.index,
		timeoutMs: config.compiler.timeoutMs,
		cwd: rootDir,
	});

	const codegen = new ProtocCodegen({
		runner,
		toolPath: config.codegen.path,
		outFlag: config.codegen.outFlag,
		plugin: config.codegen.plugin,
		extraArgs: config.codegen.extraArgs,
		outputPolicy: config.codegen.outputPolicy,
		timeoutMs: config.codegen.timeoutMs,
		cwd: rootDir,
	});

	return new Orchestrator({
		rootDir,
		config,
		compiler,
		codegen,
		eventBus: options.eventBus,
		platform: options.platform,
	});
}
