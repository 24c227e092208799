import { existsSync, mkdirSync, renameSync, writeFileSync } from "node:fs";
import { randomBytes } from "node:crypto";
import { basename, dirname, join } from "node:path";
import { CliError } from "./errors.js";
import { log } from "./log.js";

export const UCSC_DOWNLOAD_BASE_URL = "http://hgdownload.cse.ucsc.edu/admin/exe";
export const FOOTER_URL = `${UCSC_DOWNLOAD_BASE_URL}/linux.x86_64/FOOTER`;
export const FOOTER_FILE = "FOOTER";

export function tarballUrl(version: string) {
  return `${UCSC_DOWNLOAD_BASE_URL}/userApps.v${version}.src.tgz`;
}

export interface SourcePaths {
  tarball: string;
  footer: string;
}

export async function downloadFile(url: string, destination: string): Promise<void> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: {
        "user-agent": "ucsc-recipes/1.0"
      }
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : `Unable to reach ${url}`;
    throw new CliError("DOWNLOAD_FAILED", message, 2, { url });
  }

  if (!response.ok) {
    throw new CliError("DOWNLOAD_FAILED", `Download failed (${response.status}) for ${url}`, 2, {
      url,
      status_code: response.status
    });
  }

  const body = Buffer.from(await response.arrayBuffer());
  mkdirSync(dirname(destination), { recursive: true });
  // A half-written tarball would be reused by the next run, so land it under a temporary name first.
  const tmpPath = `${destination}.${randomBytes(4).toString("hex")}.tmp`;
  writeFileSync(tmpPath, body);
  renameSync(tmpPath, destination);
}

/**
 * Makes the source tarball and FOOTER available in `workDir`. The tarball is
 * fetched only when absent; FOOTER is refreshed on every run unless `offline`
 * is set, in which case a local copy must already exist.
 */
export async function fetchSources(
  workDir: string,
  version: string,
  options: { offline?: boolean } = {}
): Promise<SourcePaths> {
  const url = tarballUrl(version);
  const tarball = join(workDir, basename(url));
  const footer = join(workDir, FOOTER_FILE);

  if (!existsSync(tarball)) {
    if (options.offline) {
      throw new CliError("DOWNLOAD_FAILED", `Offline mode but ${tarball} is missing`, 2, { url });
    }
    log(`Downloading ${url}`);
    await downloadFile(url, tarball);
  }

  if (options.offline) {
    if (!existsSync(footer)) {
      throw new CliError("DOWNLOAD_FAILED", `Offline mode but ${footer} is missing`, 2, { url: FOOTER_URL });
    }
  } else {
    log(`Downloading ${FOOTER_URL}`);
    await downloadFile(FOOTER_URL, footer);
  }

  return { tarball, footer };
}
