import { describe, expect, it } from "vitest";
import {
	CodegenFailedError,
	CompilationFailedError,
	ConfigurationError,
	IOError,
	ToolNotFoundError,
	describeOutcome,
	isCodegenError,
} from "./errors";
import type { CommandResult } from "./process";

function result(overrides?: Partial<CommandResult>): CommandResult {
	return {
		exitCode: 1,
		signal: null,
		timedOut: false,
		stdout: "",
		stderr: "",
		...overrides,
	};
}

describe("describeOutcome", () => {
	it("reports the exit code", () => {
		expect(describeOutcome(result({ exitCode: 3 }))).toBe("exited with code 3");
	});

	it("reports a signal", () => {
		expect(describeOutcome(result({ exitCode: null, signal: "SIGKILL" }))).toBe(
			"killed by SIGKILL",
		);
	});

	it("reports a timeout ahead of the signal", () => {
		expect(describeOutcome(result({ exitCode: null, signal: "SIGTERM", timedOut: true }))).toBe(
			"timed out",
		);
	});
});

describe("error taxonomy", () => {
	it("keeps compiler output verbatim on CompilationFailedError", () => {
		const err = new CompilationFailedError(
			"/s/a.bop",
			result({ exitCode: 1, stdout: "Compiling\n", stderr: "a.bop:3:1 unexpected }\n" }),
		);
		expect(err.code).toBe("COMPILATION_FAILED");
		expect(err.message).toBe("Failed to compile schema /s/a.bop: compiler exited with code 1");
		expect(err.schemaFile).toBe("/s/a.bop");
		expect(err.stdout).toBe("Compiling\n");
		expect(err.stderr).toBe("a.bop:3:1 unexpected }\n");
	});

	it("names every input on CodegenFailedError", () => {
		const err = new CodegenFailedError("protoc", ["a.proto", "b.proto"], result({ exitCode: 1 }));
		expect(err.code).toBe("CODEGEN_FAILED");
		expect(err.message).toBe("Codegen failed for a.proto, b.proto: protoc exited with code 1");
		expect(err.inputs).toEqual(["a.proto", "b.proto"]);
	});

	it("lists issues under the ConfigurationError message", () => {
		const err = new ConfigurationError("Invalid config", [
			{ path: "batch.outDir", message: "Required" },
			{ path: "", message: "Expected object" },
		]);
		expect(err.message).toBe("Invalid config\n  batch.outDir: Required\n  (root): Expected object");
	});

	it("includes the cause in IOError messages", () => {
		const err = new IOError("create output directory", "/out", {
			cause: new Error("EACCES: permission denied"),
		});
		expect(err.message).toBe("Could not create output directory /out: EACCES: permission denied");
		expect(err.code).toBe("IO_ERROR");
	});

	it("recognises every subclass as a CodegenError", () => {
		expect(isCodegenError(new ToolNotFoundError("bebopc", "/bin/bebopc"))).toBe(true);
		expect(isCodegenError(new ConfigurationError("x"))).toBe(true);
		expect(isCodegenError(new Error("x"))).toBe(false);
		expect(isCodegenError("x")).toBe(false);
	});
});
