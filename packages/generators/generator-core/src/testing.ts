/**
 * In-process stand-ins for bebopc and protoc, for tests that need the
 * generators to produce files without running real tools.
 */
import { existsSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import type { CommandResult, CommandRunner, RunCommandOptions } from "@serbench/core";
import { fileStem } from "./naming";

export interface RecordedCall {
	command: string;
	args: string[];
	options: RunCommandOptions;
}

export type CommandHandler = (
	command: string,
	args: string[],
	options: RunCommandOptions,
) => CommandResult | Promise<CommandResult>;

export function ok(stdout = "", stderr = ""): CommandResult {
	return { exitCode: 0, signal: null, timedOut: false, stdout, stderr };
}

export function fail(exitCode: number, stderr: string, stdout = ""): CommandResult {
	return { exitCode, signal: null, timedOut: false, stdout, stderr };
}

/** Records every call and hands it to `handler`. */
export class FakeRunner implements CommandRunner {
	readonly calls: RecordedCall[] = [];

	constructor(private readonly handler: CommandHandler) {}

	async run(
		command: string,
		args: string[],
		options: RunCommandOptions = {},
	): Promise<CommandResult> {
		this.calls.push({ command, args, options });
		return this.handler(command, args, options);
	}
}

/** A spawn failure the way Node reports it. */
export function spawnError(code: "ENOENT" | "EACCES", command: string): Error {
	return Object.assign(new Error(`spawn ${command} ${code}`), { code });
}

function flagValue(args: string[], flag: string): string | undefined {
	const i = args.indexOf(flag);
	return i >= 0 ? args[i + 1] : undefined;
}

/**
 * Behaves like `bebopc --files <schema> --ts <output>`: a schema containing
 * `ERROR` is rejected, anything else is copied to the output behind a header.
 */
export const bebopcHandler: CommandHandler = async (_command, args) => {
	const schema = flagValue(args, "--files");
	const output = flagValue(args, "--ts");
	if (!schema || !output) {
		return fail(2, "usage: bebopc --files <schema> --ts <output>");
	}
	const source = await readFile(schema, "utf-8");
	if (source.includes("ERROR")) {
		return fail(1, `${basename(schema)}:1:1 unexpected token`, "Compiling 1 schema");
	}
	await mkdir(dirname(output), { recursive: true });
	await writeFile(output, `// generated from ${basename(schema)}\n${source}`);
	return ok(`Compiled ${basename(schema)}`);
};

/**
 * Behaves like `protoc --proto_path=... --ts_out=<dir> <inputs...>`.
 * `import "x.proto";` lines must resolve through an include directory.
 */
export const protocHandler: CommandHandler = async (_command, args) => {
	const includes = args
		.filter((a) => a.startsWith("--proto_path="))
		.map((a) => a.slice("--proto_path=".length));
	const outArg = args.find((a) => /^--\w+_out=/.test(a));
	const inputs = args.filter((a) => !a.startsWith("--"));
	if (!outArg || inputs.length === 0) {
		return fail(1, "Missing output directives.");
	}
	const outDir = outArg.slice(outArg.indexOf("=") + 1);

	const generated: Array<{ path: string; content: string }> = [];
	for (const input of inputs) {
		const source = await readFile(input, "utf-8");
		for (const match of source.matchAll(/^import "([^"]+)";/gm)) {
			const imported = match[1];
			if (!includes.some((dir) => existsSync(join(dir, imported)))) {
				return fail(
					1,
					`${imported}: File not found.\n${basename(input)}: Import "${imported}" was not found or had errors.`,
				);
			}
		}
		generated.push({
			path: join(outDir, `${fileStem(input)}.ts`),
			content: `// protoc ${basename(input)}\n`,
		});
	}
	// protoc writes nothing when any input fails
	for (const file of generated) {
		await writeFile(file.path, file.content);
	}
	return ok();
};
