import { writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { buildExceptionTablesJsonSchema, buildGenerationReportJsonSchema } from "./jsonSchema.js";

const outputDir = resolve(process.cwd(), process.argv[2] ?? ".");
const targets = [
  ["exceptions.schema.json", buildExceptionTablesJsonSchema()],
  ["report.schema.json", buildGenerationReportJsonSchema()]
] as const;

for (const [fileName, schema] of targets) {
  const outputPath = resolve(outputDir, fileName);
  writeFileSync(outputPath, `${JSON.stringify(schema, null, 2)}\n`);
  console.log(`JSON Schema written to ${outputPath}`);
}
