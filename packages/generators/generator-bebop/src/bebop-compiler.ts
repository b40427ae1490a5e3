import { writeFile } from "node:fs/promises";
import { extname, join } from "node:path";
import {
	type CommandResult,
	type CommandRunner,
	CompilationFailedError,
	ConfigurationError,
	DEFAULT_COMPILER_ARGS,
	IOError,
	type OutputPolicy,
	succeeded,
} from "@serbench/core";
import {
	type BatchCompileRequest,
	type BatchResult,
	type CompiledSchema,
	ExecFileRunner,
	type IBatchCompiler,
	assertExecutable,
	assertReadableDir,
	fileStem,
	isWithin,
	listFiles,
	moduleIdentifier,
	prepareOutputDir,
	toSpawnError,
} from "@serbench/generator-core";

export interface BebopCompilerOptions {
	runner?: CommandRunner;
	/** Argument template; `{schema}` and `{output}` are replaced per schema. */
	args?: readonly string[];
	schemaExtensions?: readonly string[];
	outputExtension?: string;
	outputPolicy?: OutputPolicy;
	/** Write a barrel module re-exporting every generated file. */
	index?: boolean;
	timeoutMs?: number;
	/** Working directory for the compiler process. */
	cwd?: string;
}

const INDEX_HEADER = "// This file is generated. Do not edit.\n\n";

/** Substitute `{schema}` and `{output}` into the argument template. */
export function expandArgs(template: readonly string[], schema: string, output: string): string[] {
	return template.map((arg) => arg.replaceAll("{schema}", schema).replaceAll("{output}", output));
}

/** Barrel source for the given schema stems. */
export function renderIndex(stems: readonly string[]): string {
	const lines = [...stems]
		.sort()
		.map((stem) => `export * as ${moduleIdentifier(stem)} from "./${stem}";`);
	return `${INDEX_HEADER}${lines.join("\n")}\n`;
}

export class BebopCompiler implements IBatchCompiler {
	readonly tool = "bebopc";

	private readonly runner: CommandRunner;
	private readonly args: readonly string[];
	private readonly schemaExtensions: ReadonlySet<string>;
	private readonly outputExtension: string;
	private readonly outputPolicy: OutputPolicy;
	private readonly writeIndex: boolean;

	constructor(private readonly options: BebopCompilerOptions = {}) {
		this.runner = options.runner ?? new ExecFileRunner();
		this.args = options.args ?? DEFAULT_COMPILER_ARGS;
		this.schemaExtensions = new Set(options.schemaExtensions ?? [".bop"]);
		this.outputExtension = options.outputExtension ?? ".ts";
		this.outputPolicy = options.outputPolicy ?? "clean";
		this.writeIndex = options.index ?? false;

		if (!this.args.some((arg) => arg.includes("{schema}"))) {
			throw new ConfigurationError("Compiler argument template must reference {schema}");
		}
	}

	/**
	 * Schema files directly inside `sourceDir`, sorted by name so that
	 * compile order (and therefore the first reported failure) is stable.
	 */
	async findSchemas(sourceDir: string): Promise<string[]> {
		await assertReadableDir(sourceDir);
		const names = await listFiles(sourceDir);
		return names
			.filter((name) => this.schemaExtensions.has(extname(name)))
			.map((name) => join(sourceDir, name));
	}

	/**
	 * Compile every schema in `sourceDir` into `outDir`. Stops at the first
	 * schema the compiler rejects; nothing after it is compiled.
	 */
	async compileDir(request: BatchCompileRequest): Promise<BatchResult> {
		const { toolPath, sourceDir, outDir } = request;

		const schemas = await this.findSchemas(sourceDir);
		this.checkOutputNames(schemas);
		if (this.outputPolicy === "clean" && isWithin(outDir, sourceDir)) {
			throw new ConfigurationError(
				`Refusing to clean ${outDir}: it contains the schema directory ${sourceDir}`,
			);
		}

		// Nothing runs the compiler for an empty directory, so it need not exist.
		if (schemas.length > 0) {
			await assertExecutable(this.tool, toolPath);
		}

		await prepareOutputDir(outDir, this.outputPolicy);

		const artifacts: CompiledSchema[] = [];
		for (const schema of schemas) {
			const artifact = await this.compileSchema(toolPath, schema, outDir);
			artifacts.push(artifact);
			request.onCompiled?.(artifact);
		}

		let indexFile: string | null = null;
		if (this.writeIndex && artifacts.length > 0) {
			indexFile = join(outDir, `index${this.outputExtension}`);
			const source = renderIndex(artifacts.map((a) => fileStem(a.schema)));
			try {
				await writeFile(indexFile, source, "utf-8");
			} catch (err) {
				throw new IOError("write", indexFile, { cause: err });
			}
		}

		return { outDir, artifacts, indexFile };
	}

	private async compileSchema(
		toolPath: string,
		schema: string,
		outDir: string,
	): Promise<CompiledSchema> {
		const output = join(outDir, `${fileStem(schema)}${this.outputExtension}`);
		let result: CommandResult;
		try {
			result = await this.runner.run(toolPath, expandArgs(this.args, schema, output), {
				cwd: this.options.cwd,
				timeoutMs: this.options.timeoutMs,
			});
		} catch (err) {
			throw toSpawnError(this.tool, toolPath, err);
		}

		if (!succeeded(result)) {
			throw new CompilationFailedError(schema, result);
		}
		return { schema, output, stdout: result.stdout, stderr: result.stderr };
	}

	/** Two schemas with the same stem would overwrite each other's output. */
	private checkOutputNames(schemas: readonly string[]): void {
		const seen = new Map<string, string>();
		for (const schema of schemas) {
			const stem = fileStem(schema);
			if (this.writeIndex && stem === "index") {
				throw new ConfigurationError(`Schema ${schema} collides with the generated index module`);
			}
			const previous = seen.get(stem);
			if (previous) {
				throw new ConfigurationError(
					`Schemas ${previous} and ${schema} would both generate ${stem}${this.outputExtension}`,
				);
			}
			seen.set(stem, schema);
		}
	}
}
