/**
 * What an external compiler run left behind. Output streams are kept verbatim
 * so failures can be reported with the tool's own diagnostics.
 */
export interface CommandResult {
	/** `null` when the process was terminated by a signal. */
	exitCode: number | null;
	signal: string | null;
	timedOut: boolean;
	stdout: string;
	stderr: string;
}

export interface RunCommandOptions {
	cwd?: string;
	timeoutMs?: number;
}

export interface CommandRunner {
	/**
	 * Run `command` with `args` and wait for it to exit.
	 * Resolves for any exit status; rejects only when the process could not be started.
	 */
	run(command: string, args: string[], options?: RunCommandOptions): Promise<CommandResult>;
}

export function succeeded(result: CommandResult): boolean {
	return result.exitCode === 0 && !result.timedOut;
}
