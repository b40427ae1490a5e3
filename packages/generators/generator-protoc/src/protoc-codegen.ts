import { access } from "node:fs/promises";
import {
	CodegenFailedError,
	type CodegenRequest,
	CodegenRequestSchema,
	type CommandResult,
	type CommandRunner,
	ConfigurationError,
	IOError,
	type OutputPolicy,
	succeeded,
} from "@serbench/core";
import {
	type CodegenResult,
	ExecFileRunner,
	type ICodegenInvoker,
	isWithin,
	listFiles,
	prepareOutputDir,
	toSpawnError,
} from "@serbench/generator-core";

export interface ProtocCodegenOptions {
	runner?: CommandRunner;
	/** Executable name or path. Defaults to `protoc` on PATH. */
	toolPath?: string;
	/** Output flag selecting the language plugin, e.g. `--ts_out`. */
	outFlag?: string;
	/** Passed as `--plugin=<value>`. */
	plugin?: string;
	extraArgs?: readonly string[];
	outputPolicy?: OutputPolicy;
	timeoutMs?: number;
	cwd?: string;
}

/**
 * protoc command line for a request:
 * `[--plugin=P] --proto_path=I... <outFlag>=<outDir> [extra...] <inputs...>`
 */
export function buildProtocArgs(
	request: CodegenRequest,
	options: Pick<ProtocCodegenOptions, "outFlag" | "plugin" | "extraArgs"> = {},
): string[] {
	const args: string[] = [];
	if (options.plugin) {
		args.push(`--plugin=${options.plugin}`);
	}
	for (const include of request.includes) {
		args.push(`--proto_path=${include}`);
	}
	args.push(`${options.outFlag ?? "--ts_out"}=${request.outDir}`);
	args.push(...(options.extraArgs ?? []));
	args.push(...request.inputs);
	return args;
}

export class ProtocCodegen implements ICodegenInvoker {
	readonly tool = "protoc";

	private readonly runner: CommandRunner;
	private readonly toolPath: string;

	constructor(private readonly options: ProtocCodegenOptions = {}) {
		this.runner = options.runner ?? new ExecFileRunner();
		this.toolPath = options.toolPath ?? "protoc";
	}

	/**
	 * Run protoc once over every input in the request. Files already in the
	 * output directory are left alone unless the output policy is `clean`.
	 */
	async run(request: CodegenRequest): Promise<CodegenResult> {
		const parsed = CodegenRequestSchema.safeParse(request);
		if (!parsed.success) {
			throw new ConfigurationError(
				"Invalid codegen request",
				parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
			);
		}
		const { outDir, inputs } = parsed.data;
		if (inputs.length === 0) {
			throw new ConfigurationError("Codegen request names no input files");
		}

		for (const input of inputs) {
			try {
				await access(input);
			} catch (err) {
				throw new IOError("read schema", input, { cause: err });
			}
		}

		const outputPolicy = this.options.outputPolicy ?? "overwrite";
		if (outputPolicy === "clean") {
			const source = [...inputs, ...parsed.data.includes].find((p) => isWithin(outDir, p));
			if (source !== undefined) {
				throw new ConfigurationError(`Refusing to clean ${outDir}: it contains ${source}`);
			}
		}

		await prepareOutputDir(outDir, outputPolicy);

		let result: CommandResult;
		try {
			result = await this.runner.run(this.toolPath, buildProtocArgs(parsed.data, this.options), {
				cwd: this.options.cwd,
				timeoutMs: this.options.timeoutMs,
			});
		} catch (err) {
			throw toSpawnError(this.tool, this.toolPath, err);
		}

		if (!succeeded(result)) {
			throw new CodegenFailedError(this.tool, inputs, result);
		}

		return {
			outDir,
			inputs,
			files: await listFiles(outDir),
			stdout: result.stdout,
			stderr: result.stderr,
		};
	}
}
