import { copyFileSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import {
  packageNameFor,
  type ExceptionTables,
  type GenerationReport,
  type ManifestBlock,
  type SkippedProgram,
  type WrittenRecipe
} from "@ucsc-recipes/shared-types";
import { findSourceDir, listArchive, programSourceDir, type ArchiveEntry } from "./archive.js";
import { loadExceptionTables, type RuntimeConfig } from "./config.js";
import { fetchSources } from "./download.js";
import { log } from "./log.js";
import { readManifest } from "./manifest.js";
import { resolveBlock } from "./resolver.js";
import {
  BUILD_TEMPLATE,
  loadTemplates,
  renderRecipe,
  type RecipeFields,
  type RenderedRecipe,
  type TemplateSet
} from "./templates.js";

export interface RecipePlan extends RecipeFields {
  sourcePath?: string;
}

export interface RecipePlanSet {
  plans: RecipePlan[];
  skipped: SkippedProgram[];
}

/**
 * Resolves every manifest block into a recipe plan without touching the
 * output tree, so a name mismatch or a missing description stops the run
 * before the first file is written.
 */
export function planRecipes(
  blocks: Iterable<ManifestBlock>,
  entries: readonly ArchiveEntry[],
  tables: ExceptionTables
): RecipePlanSet {
  const plans: RecipePlan[] = [];
  const skipped: SkippedProgram[] = [];

  for (const block of blocks) {
    const resolution = resolveBlock(block, tables);
    if (resolution.status === "skipped") {
      skipped.push({ program: resolution.program, reason: "skip-list" });
      continue;
    }

    const { program, description } = resolution.value;
    const customTemplate = Object.prototype.hasOwnProperty.call(tables.customBuildTemplates, program)
      ? tables.customBuildTemplates[program]
      : undefined;
    const sourcePath = findSourceDir(program, entries);
    if (sourcePath === undefined && customTemplate === undefined) {
      log(`Skipping ${program}`);
      skipped.push({ program, reason: "no-source" });
      continue;
    }

    plans.push({
      program,
      packageName: packageNameFor(program),
      description,
      sourcePath,
      programSourceDir: sourcePath === undefined ? undefined : programSourceDir(sourcePath),
      buildTemplate: customTemplate ?? BUILD_TEMPLATE
    });
  }

  return { plans, skipped };
}

export function writeRecipe(
  plan: RecipePlan,
  rendered: RenderedRecipe,
  recipesDir: string,
  patchPath: string
): WrittenRecipe {
  const directory = join(recipesDir, plan.packageName);
  mkdirSync(directory, { recursive: true });

  writeFileSync(join(directory, "meta.yaml"), rendered.meta);
  writeFileSync(join(directory, "build.sh"), rendered.build);
  writeFileSync(join(directory, "run_test.sh"), rendered.test);
  copyFileSync(patchPath, join(directory, "include.patch"));

  return {
    program: plan.program,
    package: plan.packageName,
    directory,
    source_dir: plan.programSourceDir,
    build_template: plan.buildTemplate
  };
}

export interface RenderInputs {
  blocks: Iterable<ManifestBlock>;
  entries: readonly ArchiveEntry[];
  tables: ExceptionTables;
  templates: TemplateSet;
  version: string;
  recipesDir: string;
}

export function writeRecipes(inputs: RenderInputs): GenerationReport {
  const { plans, skipped } = planRecipes(inputs.blocks, inputs.entries, inputs.tables);
  // Render everything up front too: a template error must not leave half the packages written.
  const rendered = plans.map((plan) => renderRecipe(plan, inputs.templates, inputs.version));
  const written = plans.map((plan, index) =>
    writeRecipe(plan, rendered[index], inputs.recipesDir, inputs.templates.patchPath)
  );

  return {
    version: inputs.version,
    recipes_dir: inputs.recipesDir,
    written,
    skipped
  };
}

export async function generateRecipes(
  config: RuntimeConfig,
  options: { offline?: boolean } = {}
): Promise<GenerationReport> {
  const tables = loadExceptionTables(config.exceptionsPath);
  const templates = loadTemplates(config.templatesDir, tables);
  const sources = await fetchSources(config.workDir, config.version, options);
  const entries = await listArchive(sources.tarball);

  return writeRecipes({
    blocks: readManifest(sources.footer),
    entries,
    tables,
    templates,
    version: config.version,
    recipesDir: config.recipesDir
  });
}
