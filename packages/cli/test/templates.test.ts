import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ExceptionTablesSchema } from "@ucsc-recipes/shared-types";
import { describe, expect, it } from "vitest";
import { BUNDLED_TEMPLATES_DIR } from "../src/config.js";
import { BUILD_TEMPLATE, fillTemplate, loadTemplates, renderRecipe } from "../src/templates.js";

const customTables = ExceptionTablesSchema.parse({
  customBuildTemplates: { fetchChromSizes: "template-build-fetchChromSizes.sh" }
});

function templateDir() {
  const dir = mkdtempSync(join(tmpdir(), "ucsc-templates-"));
  writeFileSync(join(dir, "template-meta.yaml"), "name: {package}\nversion: {version}\nsummary: {summary}\nprogram: {program}\n");
  writeFileSync(join(dir, "template-build.sh"), "cd {program_source_dir} && make {program}\n");
  writeFileSync(join(dir, "template-build-fetchChromSizes.sh"), "cp {program} $PREFIX/bin\n");
  writeFileSync(join(dir, "template-run_test.sh"), "{program} || true\n");
  writeFileSync(join(dir, "include.patch"), "--- a\n+++ b\n");
  return dir;
}

describe("template filling", () => {
  it("substitutes named placeholders", () => {
    expect(fillTemplate("which {program}", { program: "addCols" })).toBe("which addCols");
  });

  it("turns doubled braces into literal braces", () => {
    expect(fillTemplate("{{{{ compiler('c') }}}} ${{PREFIX}}/bin/{program}", { program: "faSize" })).toBe(
      "{{ compiler('c') }} ${PREFIX}/bin/faSize"
    );
  });

  it("keeps an escaped placeholder literal", () => {
    expect(fillTemplate("{{program}}", { program: "faSize" })).toBe("{program}");
  });

  it("fails on a placeholder without a value", () => {
    expect(() => fillTemplate("cd {program_source_dir}", { program_source_dir: undefined })).toThrowError(
      "No value for template placeholder '{program_source_dir}'"
    );
  });

  it("does not substitute replacement patterns inside values", () => {
    expect(fillTemplate("summary: {summary}", { summary: "costs $& and $1" })).toBe("summary: costs $& and $1");
  });
});

describe("recipe rendering", () => {
  it("renders the three recipe files from the default templates", () => {
    const templates = loadTemplates(templateDir(), customTables);

    const rendered = renderRecipe(
      {
        program: "addCols",
        packageName: "ucsc-addcols",
        description: "Sum columns in a text file.",
        programSourceDir: "kent/src/utils/addCols",
        buildTemplate: BUILD_TEMPLATE
      },
      templates,
      "324"
    );

    expect(rendered).toEqual({
      meta: "name: ucsc-addcols\nversion: 324\nsummary: Sum columns in a text file.\nprogram: addCols\n",
      build: "cd kent/src/utils/addCols && make addCols\n",
      test: "addCols || true\n"
    });
  });

  it("uses a program-specific build template without a source directory", () => {
    const templates = loadTemplates(templateDir(), customTables);

    const rendered = renderRecipe(
      {
        program: "fetchChromSizes",
        packageName: "ucsc-fetchchromsizes",
        description: "fetch chrom sizes",
        buildTemplate: "template-build-fetchChromSizes.sh"
      },
      templates,
      "324"
    );

    expect(rendered.build).toBe("cp fetchChromSizes $PREFIX/bin\n");
  });

  it("fails when a configured build template is missing", () => {
    const tables = ExceptionTablesSchema.parse({ customBuildTemplates: { faSize: "template-build-faSize.sh" } });

    expect(() => loadTemplates(templateDir(), tables)).toThrow(/template-build-faSize\.sh/);
  });

  it("ships templates that render with the bundled placeholders", () => {
    const templates = loadTemplates(BUNDLED_TEMPLATES_DIR, customTables);

    const rendered = renderRecipe(
      {
        program: "addCols",
        packageName: "ucsc-addcols",
        description: "Sum columns in a text file.",
        programSourceDir: "kent/src/utils/addCols",
        buildTemplate: BUILD_TEMPLATE
      },
      templates,
      "324"
    );

    expect(rendered.meta.split("\n")).toContain("    - {{ compiler('c') }}");
    expect(rendered.meta.split("\n")).toContain("  name: ucsc-addcols");
    expect(rendered.build.split("\n")).toContain("(cd kent/src/utils/addCols && make)");
    expect(rendered.test).toBe("#!/bin/bash\naddCols 2> /dev/null || [[ \"$?\" == 255 ]]\n");
  });
});
