import type { CommandResult } from "./process";

export type CodegenErrorCode =
	| "TOOL_NOT_FOUND"
	| "COMPILATION_FAILED"
	| "CODEGEN_FAILED"
	| "CONFIGURATION_ERROR"
	| "IO_ERROR";

export abstract class CodegenError extends Error {
	abstract readonly code: CodegenErrorCode;
}

export class ToolNotFoundError extends CodegenError {
	readonly code = "TOOL_NOT_FOUND" as const;

	constructor(
		readonly tool: string,
		readonly toolPath: string,
		options?: { cause?: unknown },
	) {
		super(`${tool} not found or not executable: ${toolPath}`, options);
		this.name = "ToolNotFoundError";
	}
}

/** Summary line for a failed run: exit code, signal or timeout. */
export function describeOutcome(result: CommandResult): string {
	if (result.timedOut) return "timed out";
	if (result.signal) return `killed by ${result.signal}`;
	return `exited with code ${result.exitCode ?? "unknown"}`;
}

export class CompilationFailedError extends CodegenError {
	readonly code = "COMPILATION_FAILED" as const;
	readonly exitCode: number | null;
	readonly signal: string | null;
	readonly stdout: string;
	readonly stderr: string;

	constructor(
		readonly schemaFile: string,
		result: CommandResult,
	) {
		super(`Failed to compile schema ${schemaFile}: compiler ${describeOutcome(result)}`);
		this.name = "CompilationFailedError";
		this.exitCode = result.exitCode;
		this.signal = result.signal;
		this.stdout = result.stdout;
		this.stderr = result.stderr;
	}
}

export class CodegenFailedError extends CodegenError {
	readonly code = "CODEGEN_FAILED" as const;
	readonly exitCode: number | null;
	readonly signal: string | null;
	readonly stdout: string;
	readonly stderr: string;

	constructor(
		readonly tool: string,
		readonly inputs: readonly string[],
		result: CommandResult,
	) {
		super(`Codegen failed for ${inputs.join(", ")}: ${tool} ${describeOutcome(result)}`);
		this.name = "CodegenFailedError";
		this.exitCode = result.exitCode;
		this.signal = result.signal;
		this.stdout = result.stdout;
		this.stderr = result.stderr;
	}
}

export interface ConfigurationIssue {
	path: string;
	message: string;
}

export class ConfigurationError extends CodegenError {
	readonly code = "CONFIGURATION_ERROR" as const;

	constructor(
		message: string,
		readonly issues: ConfigurationIssue[] = [],
	) {
		super(
			issues.length > 0
				? `${message}\n${issues.map((i) => `  ${i.path || "(root)"}: ${i.message}`).join("\n")}`
				: message,
		);
		this.name = "ConfigurationError";
	}
}

export class IOError extends CodegenError {
	readonly code = "IO_ERROR" as const;

	constructor(
		readonly operation: string,
		readonly path: string,
		options?: { cause?: unknown },
	) {
		const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
		super(`Could not ${operation} ${path}${reason}`, options);
		this.name = "IOError";
	}
}

export function isCodegenError(err: unknown): err is CodegenError {
	return err instanceof CodegenError;
}
