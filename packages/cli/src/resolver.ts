import type { ExceptionTables, ManifestBlock } from "@ucsc-recipes/shared-types";
import { CliError } from "./errors.js";

export interface ResolvedProgram {
  program: string;
  description: string;
}

export type Resolution =
  | { status: "resolved"; value: ResolvedProgram }
  | { status: "skipped"; program: string };

// "bedGraphToBigWig v 4 - Convert a bedGraph file" names the program by its first word only.
export function summaryProgramName(nameField: string): string {
  return nameField.trim().split(/\s+/)[0] ?? "";
}

function lookup(table: Readonly<Record<string, string>>, key: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

export function resolveBlock(block: ManifestBlock, tables: ExceptionTables): Resolution {
  const skipped = (program: string): Resolution => ({ status: "skipped", program });

  if (block.kind === "header") {
    if (tables.skip.includes(block.program)) {
      return skipped(block.program);
    }
    const description = lookup(tables.manualDescriptions, block.program);
    if (description === undefined) {
      throw new CliError(
        "MISSING_DESCRIPTION",
        `No summary line found for '${block.program}' and no manual description is configured`,
        1,
        { program: block.program }
      );
    }
    return { status: "resolved", value: { program: block.program, description } };
  }

  let program = lookup(tables.sourceNameOverrides, block.program) ?? block.program;
  if (tables.skip.includes(program)) {
    return skipped(program);
  }

  const summaryProgram = summaryProgramName(block.summaryName);
  if (program !== summaryProgram) {
    const override = lookup(tables.headerSummaryOverrides, program);
    if (override === undefined) {
      throw new CliError(
        "NAME_MISMATCH",
        `mismatch in header and summary. header: '${program}'; summary: '${summaryProgram}'`,
        1,
        { header: program, summary: summaryProgram }
      );
    }
    program = override;
  }

  if (tables.skip.includes(program)) {
    return skipped(program);
  }
  return { status: "resolved", value: { program, description: block.description } };
}
