export {
	BuildStateSchema,
	OutputPolicySchema,
	PlatformTargetSchema,
	type BuildState,
	type OutputPolicy,
	type PlatformTarget,
} from "./schemas/enums";
export {
	BatchConfigSchema,
	BuildConfigSchema,
	CompilerConfigSchema,
	DEFAULT_COMPILER_ARGS,
	ProtocConfigSchema,
	type BatchConfig,
	type BuildConfig,
	type BuildConfigInput,
	type CompilerConfig,
	type ProtocConfig,
} from "./schemas/build-config";
export { CodegenRequestSchema, type CodegenRequest } from "./schemas/codegen-request";
export {
	CodegenError,
	CodegenFailedError,
	CompilationFailedError,
	ConfigurationError,
	IOError,
	ToolNotFoundError,
	describeOutcome,
	isCodegenError,
} from "./errors";
export type { CodegenErrorCode, ConfigurationIssue } from "./errors";
export { succeeded } from "./process";
export type { CommandResult, CommandRunner, RunCommandOptions } from "./process";
export {
	CONFIG_ENV_VAR,
	CONFIG_FILE_NAME,
	loadBuildConfig,
	parseBuildConfig,
	resolveConfigPaths,
} from "./load-config";
export type { LoadBuildConfigOptions, LoadedBuildConfig } from "./load-config";
export { generateBuildConfigJsonSchema } from "./schema-export";
