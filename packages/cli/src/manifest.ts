import { readFileSync } from "node:fs";
import type { ManifestBlock } from "@ucsc-recipes/shared-types";

// e.g. "========   addCols   ===================================="
export const HEADER_PATTERN = /^=+\s+(\w+)(?:\s+=+)?\s*$/;

// e.g. "addCols - Sum columns in a text file."
export const SUMMARY_PATTERN = /^(\w.*?) - (.*)$/;

/**
 * Walks the FOOTER listing and yields one block per program header.
 *
 * A header followed by a summary line yields a `summary` block; a header with
 * no summary before the next header (or the end of input) yields a `header`
 * block whose description has to be supplied by hand. Summary lines that do
 * not follow a header, and every other line, are dropped.
 */
export function* parseManifest(lines: Iterable<string>): Generator<ManifestBlock, void, undefined> {
  let pending: string | undefined;

  for (const line of lines) {
    const header = HEADER_PATTERN.exec(line);
    if (header) {
      if (pending !== undefined) {
        yield { kind: "header", program: pending };
      }
      pending = header[1];
      continue;
    }

    const summary = SUMMARY_PATTERN.exec(line);
    if (summary && pending !== undefined) {
      yield {
        kind: "summary",
        program: pending,
        summaryName: summary[1],
        description: summary[2]
      };
      pending = undefined;
    }
  }

  if (pending !== undefined) {
    yield { kind: "header", program: pending };
  }
}

export function parseManifestText(text: string) {
  return parseManifest(text.split(/\r?\n/));
}

export function readManifest(path: string) {
  return parseManifestText(readFileSync(path, "utf-8"));
}
