import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import type { ExceptionTables } from "@ucsc-recipes/shared-types";
import { CliError } from "./errors.js";

export const META_TEMPLATE = "template-meta.yaml";
export const BUILD_TEMPLATE = "template-build.sh";
export const TEST_TEMPLATE = "template-run_test.sh";
export const PATCH_FILE = "include.patch";

export interface TemplateSet {
  readonly meta: string;
  readonly test: string;
  readonly build: ReadonlyMap<string, string>;
  readonly patchPath: string;
}

export interface RenderedRecipe {
  meta: string;
  build: string;
  test: string;
}

export interface RecipeFields {
  program: string;
  packageName: string;
  description: string;
  programSourceDir?: string;
  buildTemplate: string;
}

const PLACEHOLDER_PATTERN = /\{\{|\}\}|\{(\w+)\}/g;

/**
 * Brace substitution over a template: `{name}` takes `values[name]`, while
 * `{{` and `}}` stand for literal braces so Jinja expressions in meta.yaml
 * survive rendering.
 */
export function fillTemplate(template: string, values: Readonly<Record<string, string | undefined>>) {
  return template.replace(PLACEHOLDER_PATTERN, (match: string, name: string | undefined) => {
    if (match === "{{") {
      return "{";
    }
    if (match === "}}") {
      return "}";
    }
    const value =
      name !== undefined && Object.prototype.hasOwnProperty.call(values, name) ? values[name] : undefined;
    if (value === undefined) {
      throw new CliError("TEMPLATE_ERROR", `No value for template placeholder '${match}'`, 1, {
        placeholder: name
      });
    }
    return value;
  });
}

function readTemplate(dir: string, fileName: string) {
  try {
    return readFileSync(join(dir, fileName), "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : "unreadable";
    throw new CliError("TEMPLATE_ERROR", `Cannot read template ${fileName}: ${message}`, 1, {
      templates_dir: dir
    });
  }
}

export function loadTemplates(dir: string, tables: ExceptionTables): TemplateSet {
  const buildNames = new Set([BUILD_TEMPLATE, ...Object.values(tables.customBuildTemplates)]);
  const build = new Map<string, string>();
  for (const fileName of [...buildNames].sort()) {
    build.set(fileName, readTemplate(dir, fileName));
  }

  const patchPath = join(dir, PATCH_FILE);
  if (!existsSync(patchPath)) {
    throw new CliError("TEMPLATE_ERROR", `Missing ${PATCH_FILE} in ${dir}`, 1, { templates_dir: dir });
  }

  return {
    meta: readTemplate(dir, META_TEMPLATE),
    test: readTemplate(dir, TEST_TEMPLATE),
    build,
    patchPath
  };
}

export function renderRecipe(fields: RecipeFields, templates: TemplateSet, version: string): RenderedRecipe {
  const buildTemplate = templates.build.get(fields.buildTemplate);
  if (buildTemplate === undefined) {
    throw new CliError("TEMPLATE_ERROR", `Build template ${fields.buildTemplate} was not loaded`, 1, {
      program: fields.program
    });
  }

  return {
    meta: fillTemplate(templates.meta, {
      program: fields.program,
      package: fields.packageName,
      summary: fields.description,
      version
    }),
    build: fillTemplate(buildTemplate, {
      program: fields.program,
      program_source_dir: fields.programSourceDir
    }),
    test: fillTemplate(templates.test, { program: fields.program })
  };
}
