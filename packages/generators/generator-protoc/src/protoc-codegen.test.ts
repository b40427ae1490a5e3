import { existsSync } from "node:fs";
import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CodegenFailedError, ConfigurationError, IOError, ToolNotFoundError } from "@serbench/core";
import { FakeRunner, fail, protocHandler, spawnError } from "@serbench/generator-core/testing";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ProtocCodegen, buildProtocArgs } from "./protoc-codegen";

describe("buildProtocArgs", () => {
	it("puts includes and the output flag before the inputs", () => {
		expect(
			buildProtocArgs({
				outDir: "src/protos",
				inputs: ["schemas/jazz.proto"],
				includes: ["schemas"],
			}),
		).toEqual(["--proto_path=schemas", "--ts_out=src/protos", "schemas/jazz.proto"]);
	});

	it("adds the plugin and extra arguments", () => {
		expect(
			buildProtocArgs(
				{ outDir: "out", inputs: ["a.proto", "b.proto"], includes: ["x", "y"] },
				{
					plugin: "protoc-gen-es=bin/protoc-gen-es",
					outFlag: "--es_out",
					extraArgs: ["--es_opt=target=ts"],
				},
			),
		).toEqual([
			"--plugin=protoc-gen-es=bin/protoc-gen-es",
			"--proto_path=x",
			"--proto_path=y",
			"--es_out=out",
			"--es_opt=target=ts",
			"a.proto",
			"b.proto",
		]);
	});
});

describe("ProtocCodegen", () => {
	let root: string;
	let schemas: string;
	let outDir: string;

	beforeEach(async () => {
		root = await mkdtemp(join(tmpdir(), "serbench-protoc-"));
		schemas = join(root, "schemas");
		outDir = join(root, "src", "protos");
		await mkdir(schemas);
		await writeFile(join(schemas, "common.proto"), 'syntax = "proto3";\nmessage Empty {}\n');
		await writeFile(
			join(schemas, "jazz.proto"),
			'syntax = "proto3";\nimport "common.proto";\nmessage Song { string title = 1; }\n',
		);
	});

	afterEach(async () => {
		await rm(root, { recursive: true, force: true });
	});

	it("runs protoc once and lists the generated files", async () => {
		const runner = new FakeRunner(protocHandler);
		const result = await new ProtocCodegen({ runner }).run({
			outDir,
			inputs: [join(schemas, "jazz.proto")],
			includes: [schemas],
		});

		expect(runner.calls).toHaveLength(1);
		expect(runner.calls[0].command).toBe("protoc");
		expect(result.files).toEqual(["jazz.ts"]);
		expect(result.inputs).toEqual([join(schemas, "jazz.proto")]);
		expect(result.outDir).toBe(outDir);
	});

	it("batches several inputs into one process", async () => {
		const runner = new FakeRunner(protocHandler);
		const result = await new ProtocCodegen({ runner }).run({
			outDir,
			inputs: [join(schemas, "jazz.proto"), join(schemas, "common.proto")],
			includes: [schemas],
		});
		expect(runner.calls).toHaveLength(1);
		expect(result.files).toEqual(["common.ts", "jazz.ts"]);
	});

	it("rejects an empty input list before starting protoc", async () => {
		const runner = new FakeRunner(protocHandler);
		await expect(
			new ProtocCodegen({ runner }).run({ outDir, inputs: [], includes: [schemas] }),
		).rejects.toBeInstanceOf(ConfigurationError);
		expect(runner.calls).toHaveLength(0);
	});

	it("fails with IOError for a missing input", async () => {
		const runner = new FakeRunner(protocHandler);
		await expect(
			new ProtocCodegen({ runner }).run({
				outDir,
				inputs: [join(schemas, "missing.proto")],
				includes: [],
			}),
		).rejects.toBeInstanceOf(IOError);
		expect(runner.calls).toHaveLength(0);
	});

	it("carries protoc's diagnostics on failure", async () => {
		const runner = new FakeRunner(protocHandler);
		const err = await new ProtocCodegen({ runner })
			.run({ outDir, inputs: [join(schemas, "jazz.proto")], includes: [] })
			.catch((e: unknown) => e);

		expect(err).toBeInstanceOf(CodegenFailedError);
		expect(err).toMatchObject({
			exitCode: 1,
			stderr:
				'common.proto: File not found.\njazz.proto: Import "common.proto" was not found or had errors.',
		});
	});

	it("reports a timeout as a codegen failure", async () => {
		const runner = new FakeRunner(() => ({
			exitCode: null,
			signal: "SIGTERM",
			timedOut: true,
			stdout: "",
			stderr: "",
		}));
		const input = join(schemas, "jazz.proto");
		const err = await new ProtocCodegen({ runner, timeoutMs: 100 })
			.run({ outDir, inputs: [input], includes: [schemas] })
			.catch((e: unknown) => e);
		expect(err).toBeInstanceOf(CodegenFailedError);
		expect(err).toMatchObject({ message: `Codegen failed for ${input}: protoc timed out` });
	});

	it("fails with ToolNotFoundError when protoc cannot be started", async () => {
		const runner = new FakeRunner((command) => {
			throw spawnError("ENOENT", command);
		});
		const err = await new ProtocCodegen({ runner, toolPath: "/opt/protoc/bin/protoc" })
			.run({ outDir, inputs: [join(schemas, "jazz.proto")], includes: [schemas] })
			.catch((e: unknown) => e);
		expect(err).toBeInstanceOf(ToolNotFoundError);
		expect(err).toMatchObject({ tool: "protoc", toolPath: "/opt/protoc/bin/protoc" });
	});

	it("leaves unrelated files in place by default", async () => {
		await mkdir(outDir, { recursive: true });
		await writeFile(join(outDir, "old.ts"), "");
		const result = await new ProtocCodegen({ runner: new FakeRunner(protocHandler) }).run({
			outDir,
			inputs: [join(schemas, "jazz.proto")],
			includes: [schemas],
		});
		expect(result.files).toEqual(["jazz.ts", "old.ts"]);
	});

	it("clears the output directory under the clean policy", async () => {
		await mkdir(outDir, { recursive: true });
		await writeFile(join(outDir, "old.ts"), "");
		await new ProtocCodegen({
			runner: new FakeRunner(protocHandler),
			outputPolicy: "clean",
		}).run({ outDir, inputs: [join(schemas, "jazz.proto")], includes: [schemas] });
		expect(await readdir(outDir)).toEqual(["jazz.ts"]);
	});

	it("refuses to clean a directory that holds its inputs", async () => {
		const runner = new FakeRunner(protocHandler);
		const input = join(schemas, "jazz.proto");
		await expect(
			new ProtocCodegen({ runner, outputPolicy: "clean" }).run({
				outDir: root,
				inputs: [input],
				includes: [],
			}),
		).rejects.toThrow(`Refusing to clean ${root}: it contains ${input}`);
		expect(existsSync(input)).toBe(true);
		expect(runner.calls).toHaveLength(0);
	});

	it("refuses to clean a directory that holds an include path", async () => {
		const include = join(outDir, "vendor");
		await mkdir(include, { recursive: true });
		await expect(
			new ProtocCodegen({ runner: new FakeRunner(protocHandler), outputPolicy: "clean" }).run({
				outDir,
				inputs: [join(schemas, "jazz.proto")],
				includes: [include],
			}),
		).rejects.toBeInstanceOf(ConfigurationError);
		expect(existsSync(include)).toBe(true);
	});

	it("runs in the configured working directory", async () => {
		const runner = new FakeRunner(() => fail(1, "boom"));
		await new ProtocCodegen({ runner, cwd: root })
			.run({ outDir, inputs: [join(schemas, "jazz.proto")], includes: [schemas] })
			.catch(() => undefined);
		expect(runner.calls[0].options.cwd).toBe(root);
	});
});
