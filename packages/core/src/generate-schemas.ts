import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { generateBuildConfigJsonSchema } from "./schema-export";

const __dirname = dirname(fileURLToPath(import.meta.url));
const schemaDir = join(__dirname, "..", "..", "..", "schema");

if (!existsSync(schemaDir)) {
	mkdirSync(schemaDir, { recursive: true });
}

const path = join(schemaDir, "codegen-config.v1.json");
writeFileSync(path, `${JSON.stringify(generateBuildConfigJsonSchema(), null, 2)}\n`);
console.log(`Generated ${path}`);
