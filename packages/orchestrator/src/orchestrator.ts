import { resolve } from "node:path";
import {
	type BuildConfig,
	type BuildState,
	type CodegenRequest,
	ConfigurationError,
	type ConfigurationIssue,
	type PlatformTarget,
} from "@serbench/core";
import {
	type BatchCompileRequest,
	type BatchResult,
	type CodegenResult,
	type IBatchCompiler,
	type ICodegenInvoker,
	detectPlatformTarget,
	isWithin,
	resolveToolPath,
} from "@serbench/generator-core";
import { EventBus } from "./event-bus";

export interface OrchestratorOptions {
	/** Build root; the per-platform compiler path is relative to it. */
	rootDir: string;
	/** Configuration with every path already absolute (see `resolveConfigPaths`). */
	config: BuildConfig;
	compiler: IBatchCompiler;
	codegen: ICodegenInvoker;
	eventBus?: EventBus;
	/** Host platform; defaults to `process.platform`. */
	platform?: NodeJS.Platform;
}

export interface BuildReport {
	platform: PlatformTarget;
	toolPath: string;
	batch: BatchResult;
	codegen: CodegenResult;
	durationMs: number;
}

/**
 * Compiler path for a build: the configured path when set, otherwise the
 * platform table entry resolved against the build root.
 */
export function resolveCompilerPath(
	config: BuildConfig,
	rootDir: string,
	platform: PlatformTarget,
): string {
	return config.compiler.path ?? resolve(rootDir, resolveToolPath(platform));
}

/**
 * Reject layouts where cleaning one step's output directory would delete
 * the other step's sources or output.
 */
export function checkOutputLayout(config: BuildConfig): void {
	const { batch, codegen } = config;
	const issues: ConfigurationIssue[] = [];

	if (batch.outputPolicy === "clean" || codegen.outputPolicy === "clean") {
		if (isWithin(batch.outDir, codegen.outDir) || isWithin(codegen.outDir, batch.outDir)) {
			issues.push({
				path: "codegen.outDir",
				message: `overlaps the batch output directory ${batch.outDir}`,
			});
		}
	}
	if (batch.outputPolicy === "clean") {
		for (const path of [...codegen.inputs, ...codegen.includes]) {
			if (isWithin(batch.outDir, path)) {
				issues.push({ path: "batch.outDir", message: `contains protoc source ${path}` });
			}
		}
	}
	if (codegen.outputPolicy === "clean" && isWithin(codegen.outDir, batch.sourceDir)) {
		issues.push({
			path: "codegen.outDir",
			message: `contains the schema directory ${batch.sourceDir}`,
		});
	}

	if (issues.length > 0) {
		throw new ConfigurationError("Cleaning an output directory would delete build inputs", issues);
	}
}

/**
 * Runs one build: resolve the compiler, compile the schema directory, then
 * run protoc. The first error ends the build and is rethrown as is.
 *
 * States: not-started -> resolving -> generating-batch -> generating-single -> done.
 * In concurrent mode both generation steps run under `generating-all`.
 * Any failure moves to `failed`; `done` and `failed` are both final.
 */
export class Orchestrator {
	readonly eventBus: EventBus;
	private currentState: BuildState = "not-started";

	constructor(private readonly options: OrchestratorOptions) {
		this.eventBus = options.eventBus ?? new EventBus();
	}

	get state(): BuildState {
		return this.currentState;
	}

	async run(): Promise<BuildReport> {
		if (this.currentState !== "not-started") {
			throw new ConfigurationError(`Build already ran (state: ${this.currentState})`);
		}
		const startedAt = Date.now();
		const { config } = this.options;

		let report: BuildReport;
		try {
			this.transition("resolving");
			checkOutputLayout(config);
			const platform = detectPlatformTarget(this.options.platform ?? process.platform);
			const toolPath = resolveCompilerPath(config, this.options.rootDir, platform);
			this.eventBus.emit("tool.resolved", { platform, toolPath });

			const batchRequest: BatchCompileRequest = {
				toolPath,
				sourceDir: config.batch.sourceDir,
				outDir: config.batch.outDir,
				onCompiled: (artifact) => this.eventBus.emit("schema.compiled", artifact),
			};
			const codegenRequest: CodegenRequest = {
				outDir: config.codegen.outDir,
				inputs: config.codegen.inputs,
				includes: config.codegen.includes,
			};

			const [batch, codegen] = config.concurrent
				? await this.generateConcurrently(batchRequest, codegenRequest)
				: await this.generateSequentially(batchRequest, codegenRequest);

			report = { platform, toolPath, batch, codegen, durationMs: Date.now() - startedAt };
		} catch (err) {
			const failedIn = this.currentState;
			this.transition("failed");
			this.eventBus.emit("build.failed", { state: failedIn, error: err });
			throw err;
		}

		// `done` is final: errors thrown by its subscribers propagate as is.
		this.transition("done");
		this.eventBus.emit("build.completed", report);
		return report;
	}

	private async generateSequentially(
		batchRequest: BatchCompileRequest,
		codegenRequest: CodegenRequest,
	): Promise<[BatchResult, CodegenResult]> {
		this.transition("generating-batch");
		const batch = await this.runBatch(batchRequest);
		this.transition("generating-single");
		const codegen = await this.runCodegen(codegenRequest);
		return [batch, codegen];
	}

	/**
	 * Both steps write to disjoint directories and share nothing, so they can
	 * overlap. Both are awaited; a batch failure wins over a codegen failure.
	 */
	private async generateConcurrently(
		batchRequest: BatchCompileRequest,
		codegenRequest: CodegenRequest,
	): Promise<[BatchResult, CodegenResult]> {
		this.transition("generating-all");
		const [batch, codegen] = await Promise.allSettled([
			this.runBatch(batchRequest),
			this.runCodegen(codegenRequest),
		]);
		if (batch.status === "rejected") throw batch.reason;
		if (codegen.status === "rejected") throw codegen.reason;
		return [batch.value, codegen.value];
	}

	private async runBatch(request: BatchCompileRequest): Promise<BatchResult> {
		const result = await this.options.compiler.compileDir(request);
		this.eventBus.emit("batch.completed", result);
		return result;
	}

	private async runCodegen(request: CodegenRequest): Promise<CodegenResult> {
		const result = await this.options.codegen.run(request);
		this.eventBus.emit("codegen.completed", result);
		return result;
	}

	private transition(to: BuildState): void {
		const from = this.currentState;
		this.currentState = to;
		this.eventBus.emit("build.state", { from, to });
	}
}
