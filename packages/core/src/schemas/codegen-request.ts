import { z } from "zod";

export const CodegenRequestSchema = z.object({
	outDir: z.string().min(1),
	inputs: z.array(z.string().min(1)),
	includes: z.array(z.string().min(1)).default([]),
});

export type CodegenRequest = z.infer<typeof CodegenRequestSchema>;
