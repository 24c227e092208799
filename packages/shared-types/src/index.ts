import { z } from "zod";

export const ProgramNameSchema = z.string().regex(/^\w+$/);
export const PackageNameSchema = z.string().regex(/^ucsc-[a-z0-9_]+$/);

export const PACKAGE_PREFIX = "ucsc-";

export function packageNameFor(program: string): string {
  return `${PACKAGE_PREFIX}${program.toLowerCase()}`;
}

export const ExceptionTablesSchema = z
  .object({
    sourceNameOverrides: z.record(ProgramNameSchema, ProgramNameSchema).default({}),
    headerSummaryOverrides: z.record(ProgramNameSchema, ProgramNameSchema).default({}),
    manualDescriptions: z.record(ProgramNameSchema, z.string().min(1)).default({}),
    skip: z.array(ProgramNameSchema).default([]),
    customBuildTemplates: z
      .record(ProgramNameSchema, z.string().regex(/^[\w.-]+$/))
      .default({})
  })
  .strict();

export const ManifestBlockSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("header"),
    program: z.string().min(1)
  }),
  z.object({
    kind: z.literal("summary"),
    program: z.string().min(1),
    summaryName: z.string().min(1),
    description: z.string()
  })
]);

export const SkipReasonSchema = z.enum(["skip-list", "no-source"]);

export const SkippedProgramSchema = z.object({
  program: z.string().min(1),
  reason: SkipReasonSchema
});

export const WrittenRecipeSchema = z.object({
  program: ProgramNameSchema,
  package: PackageNameSchema,
  directory: z.string().min(1),
  source_dir: z.string().min(1).optional(),
  build_template: z.string().min(1)
});

export const GenerationReportSchema = z.object({
  version: z.string().min(1),
  recipes_dir: z.string().min(1),
  written: z.array(WrittenRecipeSchema),
  skipped: z.array(SkippedProgramSchema)
});

export const ErrorEnvelopeSchema = z.object({
  ok: z.literal(false),
  error: z.object({
    code: z.string().min(1),
    message: z.string().min(1),
    details: z.record(z.unknown()).optional()
  })
});

export type ExceptionTablesInput = z.input<typeof ExceptionTablesSchema>;
export type ExceptionTables = Readonly<z.infer<typeof ExceptionTablesSchema>>;
export type ManifestBlock = z.infer<typeof ManifestBlockSchema>;
export type SkipReason = z.infer<typeof SkipReasonSchema>;
export type SkippedProgram = z.infer<typeof SkippedProgramSchema>;
export type WrittenRecipe = z.infer<typeof WrittenRecipeSchema>;
export type GenerationReport = z.infer<typeof GenerationReportSchema>;
export type ErrorEnvelope = z.infer<typeof ErrorEnvelopeSchema>;
