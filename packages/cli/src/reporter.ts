import { relative } from "node:path";
import {
	CodegenFailedError,
	CompilationFailedError,
	ToolNotFoundError,
	isCodegenError,
} from "@serbench/core";
import type { EventBus } from "@serbench/orchestrator";

export const LOG_TAG = "[serbench-codegen]";

export type LogFn = (line: string) => void;

function streamLines(label: string, output: string): string[] {
	return output
		.split(/\r?\n/)
		.filter((line) => line.trim() !== "")
		.map((line) => `  ${label}: ${line}`);
}

/**
 * Lines describing a failed build. Tool output is reproduced verbatim,
 * one line per output line, so nothing the compiler said is lost.
 */
export function formatError(err: unknown): string[] {
	if (err instanceof CompilationFailedError || err instanceof CodegenFailedError) {
		return [
			`${LOG_TAG} ${err.message}`,
			...streamLines("STDOUT", err.stdout),
			...streamLines("STDERR", err.stderr),
		];
	}
	if (err instanceof ToolNotFoundError && err.cause instanceof Error) {
		return [`${LOG_TAG} ${err.message}`, `  cause: ${err.cause.message}`];
	}
	if (isCodegenError(err)) {
		return [`${LOG_TAG} ${err.message}`];
	}
	if (err instanceof Error) {
		return [`${LOG_TAG} Unexpected error: ${err.stack ?? err.message}`];
	}
	return [`${LOG_TAG} Unexpected error: ${String(err)}`];
}

/** Print build progress as the orchestrator publishes it. */
export function attachReporter(eventBus: EventBus, rootDir: string, log: LogFn): void {
	const rel = (p: string) => relative(rootDir, p) || ".";

	eventBus.on("tool.resolved", ({ data }) => {
		log(`${LOG_TAG} compiler (${data.platform}): ${rel(data.toolPath)}`);
	});
	eventBus.on("schema.compiled", ({ data }) => {
		log(`${LOG_TAG} compiled ${rel(data.schema)} -> ${rel(data.output)}`);
	});
	eventBus.on("batch.completed", ({ data }) => {
		log(`${LOG_TAG} bebopc: ${data.artifacts.length} schema(s) -> ${rel(data.outDir)}`);
	});
	eventBus.on("codegen.completed", ({ data }) => {
		log(
			`${LOG_TAG} protoc: ${data.inputs.map(rel).join(", ")} -> ${rel(data.outDir)} (${data.files.length} file(s))`,
		);
	});
	eventBus.on("build.completed", ({ data }) => {
		log(`${LOG_TAG} done in ${data.durationMs}ms`);
	});
}
