import { z } from "zod";

export const PlatformTargetSchema = z.enum(["windows", "unix"]);
export type PlatformTarget = z.infer<typeof PlatformTargetSchema>;

export const OutputPolicySchema = z
	.enum(["clean", "overwrite"])
	.describe("clean removes the output directory before generating; overwrite leaves unrelated files");
export type OutputPolicy = z.infer<typeof OutputPolicySchema>;

export const BuildStateSchema = z.enum([
	"not-started",
	"resolving",
	"generating-batch",
	"generating-single",
	"generating-all",
	"done",
	"failed",
]);
export type BuildState = z.infer<typeof BuildStateSchema>;
