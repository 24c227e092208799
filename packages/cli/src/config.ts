import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { ExceptionTablesSchema, type ExceptionTables } from "@ucsc-recipes/shared-types";
import { CliError } from "./errors.js";

// Last userApps release published under http://hgdownload.cse.ucsc.edu/admin/exe/
export const DEFAULT_UCSC_VERSION = "324";

const PACKAGE_DIR = resolve(dirname(fileURLToPath(import.meta.url)), "..");

export const BUNDLED_TEMPLATES_DIR = resolve(PACKAGE_DIR, "templates");
export const BUNDLED_EXCEPTIONS_PATH = resolve(PACKAGE_DIR, "config", "exceptions.json");

export interface RuntimeConfig {
  version: string;
  workDir: string;
  recipesDir: string;
  templatesDir: string;
  exceptionsPath: string;
}

export type ConfigOverrides = Partial<RuntimeConfig>;

function normalize(value?: string) {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function resolveRuntimeConfig(
  overrides: ConfigOverrides,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): RuntimeConfig {
  const version =
    normalize(overrides.version) ?? normalize(env.UCSC_RECIPES_VERSION) ?? DEFAULT_UCSC_VERSION;
  if (!/^\d+$/.test(version)) {
    throw new CliError("CONFIG_ERROR", `UCSC version must be numeric, got '${version}'`, 1);
  }

  const pathSetting = (override: string | undefined, envValue: string | undefined, fallback: string) =>
    resolve(cwd, normalize(override) ?? normalize(envValue) ?? fallback);

  return {
    version,
    workDir: pathSetting(overrides.workDir, env.UCSC_RECIPES_WORK_DIR, "."),
    recipesDir: pathSetting(overrides.recipesDir, env.UCSC_RECIPES_DIR, "recipes"),
    templatesDir: pathSetting(overrides.templatesDir, env.UCSC_RECIPES_TEMPLATES_DIR, BUNDLED_TEMPLATES_DIR),
    exceptionsPath: pathSetting(overrides.exceptionsPath, env.UCSC_RECIPES_EXCEPTIONS, BUNDLED_EXCEPTIONS_PATH)
  };
}

export function loadExceptionTables(path: string): ExceptionTables {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : "unreadable";
    throw new CliError("CONFIG_ERROR", `Cannot read exception tables from ${path}: ${message}`, 1);
  }

  const parsed = ExceptionTablesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CliError("CONFIG_ERROR", `Invalid exception tables in ${path}`, 1, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    });
  }
  return Object.freeze(parsed.data);
}
