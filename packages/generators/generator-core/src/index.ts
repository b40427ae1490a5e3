import type { CodegenRequest } from "@serbench/core";

export { COMPILER_PATHS, detectPlatformTarget, resolveToolPath } from "./platform";
export { ExecFileRunner, SPAWN_ERROR_CODES } from "./exec-runner";
export {
	assertExecutable,
	assertReadableDir,
	isWithin,
	listFiles,
	prepareOutputDir,
	toSpawnError,
} from "./fs-utils";
export { fileStem, moduleIdentifier } from "./naming";

export interface CompiledSchema {
	/** Absolute path of the schema file. */
	schema: string;
	/** Absolute path of the generated file. */
	output: string;
	stdout: string;
	stderr: string;
}

export interface BatchCompileRequest {
	toolPath: string;
	sourceDir: string;
	outDir: string;
	/** Called after each schema compiles, in compile order. */
	onCompiled?: (artifact: CompiledSchema) => void;
}

export interface BatchResult {
	outDir: string;
	artifacts: CompiledSchema[];
	/** Barrel module path when one was written. */
	indexFile: string | null;
}

export interface CodegenResult {
	outDir: string;
	inputs: string[];
	/** Files present in the output directory after the run, sorted. */
	files: string[];
	stdout: string;
	stderr: string;
}

/** Compiles every schema in a directory, one tool process per schema. */
export interface IBatchCompiler {
	readonly tool: string;

	compileDir(request: BatchCompileRequest): Promise<BatchResult>;
}

/** Runs a code generator once over an explicit list of inputs. */
export interface ICodegenInvoker {
	readonly tool: string;

	run(request: CodegenRequest): Promise<CodegenResult>;
}
