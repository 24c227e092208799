import { zodToJsonSchema } from "zod-to-json-schema";
import { ExceptionTablesSchema, GenerationReportSchema } from "./index.js";

export function buildExceptionTablesJsonSchema() {
  return zodToJsonSchema(ExceptionTablesSchema, {
    name: "ExceptionTables",
    $refStrategy: "none"
  });
}

export function buildGenerationReportJsonSchema() {
  return zodToJsonSchema(GenerationReportSchema, {
    name: "GenerationReport",
    $refStrategy: "none"
  });
}
