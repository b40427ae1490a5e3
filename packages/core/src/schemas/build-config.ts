import { z } from "zod";
import { OutputPolicySchema } from "./enums";

export const DEFAULT_COMPILER_ARGS: readonly string[] = ["--files", "{schema}", "--ts", "{output}"];

const ExtensionSchema = z.string().regex(/^\.[^./\\]+$/, "Expected an extension such as .bop");

export const CompilerConfigSchema = z.object({
	path: z
		.string()
		.min(1)
		.optional()
		.describe("Compiler executable; replaces the per-platform default when set"),
	args: z
		.array(z.string())
		.min(1)
		.default(() => [...DEFAULT_COMPILER_ARGS])
		.describe("Argument template; {schema} and {output} are substituted per schema file"),
	schemaExtensions: z.array(ExtensionSchema).min(1).default([".bop"]),
	outputExtension: ExtensionSchema.default(".ts"),
	timeoutMs: z.number().int().positive().optional().describe("Kill the compiler after this long"),
});

export const BatchConfigSchema = z.object({
	sourceDir: z.string().min(1).default("schemas"),
	outDir: z.string().min(1).default("src/bebops"),
	outputPolicy: OutputPolicySchema.default("clean"),
	index: z.boolean().default(false).describe("Write an index.ts re-exporting every generated module"),
});

export const ProtocConfigSchema = z.object({
	path: z.string().min(1).default("protoc"),
	outDir: z.string().min(1).default("src/protos"),
	inputs: z.array(z.string().min(1)).default(["schemas/jazz.proto"]),
	includes: z.array(z.string().min(1)).default(["schemas"]),
	outFlag: z
		.string()
		.regex(/^--[\w-]+_out$/, "Expected a protoc output flag such as --ts_out")
		.default("--ts_out"),
	plugin: z.string().min(1).optional().describe("Passed to protoc as --plugin=<value>"),
	extraArgs: z.array(z.string()).default([]),
	outputPolicy: OutputPolicySchema.default("overwrite"),
	timeoutMs: z.number().int().positive().optional(),
});

export const BuildConfigSchema = z.object({
	compiler: CompilerConfigSchema.default({}),
	batch: BatchConfigSchema.default({}),
	codegen: ProtocConfigSchema.default({}),
	concurrent: z
		.boolean()
		.default(false)
		.describe("Run the batch and protoc steps together instead of one after the other"),
});

export type CompilerConfig = z.infer<typeof CompilerConfigSchema>;
export type BatchConfig = z.infer<typeof BatchConfigSchema>;
export type ProtocConfig = z.infer<typeof ProtocConfigSchema>;
export type BuildConfig = z.infer<typeof BuildConfigSchema>;
export type BuildConfigInput = z.input<typeof BuildConfigSchema>;
