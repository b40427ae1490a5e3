import { zodToJsonSchema } from "zod-to-json-schema";
import { BuildConfigSchema } from "./schemas/build-config";

const SCHEMA_BASE_URL = "https://serbench.dev/schemas";

export function generateBuildConfigJsonSchema() {
	const schema = zodToJsonSchema(BuildConfigSchema, {
		name: "BuildConfig",
		$refStrategy: "none",
	});
	return {
		...schema,
		$schema: "https://json-schema.org/draft/2020-12/schema",
		$id: `${SCHEMA_BASE_URL}/codegen-config.v1.json`,
	};
}
