import { execFile as execFileCb } from "node:child_process";
import { promisify } from "node:util";
import type { CommandResult, CommandRunner, RunCommandOptions } from "@serbench/core";

const execFile = promisify(execFileCb);

/** Maximum buffer size (bytes) for compiler stdout/stderr (~16 MB). */
const MAX_BUFFER = 16 * 1024 * 1024;

interface ExecFailure extends Error {
	code?: unknown;
	signal?: unknown;
	killed?: unknown;
	stdout?: unknown;
	stderr?: unknown;
}

function text(value: unknown): string {
	if (typeof value === "string") return value;
	if (Buffer.isBuffer(value)) return value.toString("utf-8");
	return "";
}

/** Error codes meaning the process was never started. */
export const SPAWN_ERROR_CODES: ReadonlySet<string> = new Set(["ENOENT", "EACCES", "EPERM"]);

/**
 * Runs tools through `execFile`, so arguments are never interpreted by a shell.
 * Any run that started resolves with the captured output, including one killed
 * for overflowing the output buffer; spawn errors reject with the original error.
 */
export class ExecFileRunner implements CommandRunner {
	async run(
		command: string,
		args: string[],
		options: RunCommandOptions = {},
	): Promise<CommandResult> {
		try {
			const { stdout, stderr } = await execFile(command, args, {
				cwd: options.cwd,
				timeout: options.timeoutMs ?? 0,
				maxBuffer: MAX_BUFFER,
				windowsHide: true,
			});
			return { exitCode: 0, signal: null, timedOut: false, stdout, stderr };
		} catch (err) {
			if (!(err instanceof Error)) throw err;
			const failure: ExecFailure = err;
			if (typeof failure.code === "string" && SPAWN_ERROR_CODES.has(failure.code)) throw err;
			const signal = typeof failure.signal === "string" ? failure.signal : null;
			// Other string codes (ERR_CHILD_PROCESS_STDIO_MAXBUFFER) kill the child themselves.
			const killedByNode = typeof failure.code === "string";
			return {
				exitCode: typeof failure.code === "number" ? failure.code : null,
				signal,
				timedOut:
					!killedByNode &&
					failure.killed === true &&
					options.timeoutMs !== undefined &&
					signal !== null,
				stdout: text(failure.stdout),
				stderr: text(failure.stderr),
			};
		}
	}
}
