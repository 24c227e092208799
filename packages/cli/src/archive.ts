import { existsSync } from "node:fs";
import { list, type ReadEntry } from "tar";
import { CliError } from "./errors.js";

export interface ArchiveEntry {
  path: string;
  isDirectory: boolean;
}

export const KENT_SOURCE_PREFIX = "userApps/kent/src";

function withoutDotSlash(path: string) {
  return path.startsWith("./") ? path.slice(2) : path;
}

function withoutTrailingSlash(path: string) {
  return path.replace(/\/+$/, "");
}

export function isKentSourcePath(path: string) {
  return withoutDotSlash(path).startsWith(KENT_SOURCE_PREFIX);
}

/**
 * Lists every entry of a gzipped source tarball that lives under the kent
 * source tree. Paths are reported the way the archive stores them, minus any
 * trailing slash on directory entries.
 */
export async function listArchive(tarball: string): Promise<ArchiveEntry[]> {
  if (!existsSync(tarball)) {
    throw new CliError("ARCHIVE_ERROR", `Source archive not found: ${tarball}`, 1, { path: tarball });
  }

  const entries: ArchiveEntry[] = [];
  try {
    await list({
      file: tarball,
      onReadEntry: (entry: ReadEntry) => {
        if (isKentSourcePath(entry.path)) {
          entries.push({
            path: withoutTrailingSlash(entry.path),
            isDirectory: entry.type === "Directory"
          });
        }
      }
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unreadable archive";
    throw new CliError("ARCHIVE_ERROR", `Failed to read ${tarball}: ${message}`, 1, { path: tarball });
  }
  return entries;
}

/**
 * Picks the directory a program is built from: the lexicographically first
 * directory whose path contains the program name anywhere. A short name can
 * match a longer sibling's path; the ordering only makes the pick stable.
 */
export function findSourceDir(program: string, entries: readonly ArchiveEntry[]): string | undefined {
  const hits = entries
    .filter((entry) => entry.isDirectory && entry.path.includes(program))
    .map((entry) => entry.path)
    .sort();
  return hits[0];
}

// "./userApps/kent/src/utils/addCols" -> "kent/src/utils/addCols"
export function programSourceDir(path: string) {
  return withoutTrailingSlash(withoutDotSlash(path)).replace(/^userApps\//, "");
}
