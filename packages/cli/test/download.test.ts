import { existsSync, mkdtempSync, readFileSync, readdirSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { downloadFile, fetchSources, FOOTER_URL, tarballUrl } from "../src/download.js";

const originalFetch = global.fetch;

describe("source downloads", () => {
  afterEach(() => {
    global.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  it("builds the tarball URL from the release number", () => {
    expect(tarballUrl("324")).toBe("http://hgdownload.cse.ucsc.edu/admin/exe/userApps.v324.src.tgz");
  });

  it("classifies network failures as DOWNLOAD_FAILED", async () => {
    global.fetch = vi.fn().mockRejectedValue(new Error("getaddrinfo ENOTFOUND hgdownload.cse.ucsc.edu")) as typeof fetch;
    const dir = mkdtempSync(join(tmpdir(), "ucsc-download-"));

    await expect(downloadFile(FOOTER_URL, join(dir, "FOOTER"))).rejects.toMatchObject({
      code: "DOWNLOAD_FAILED",
      exitCode: 2,
      details: { url: FOOTER_URL }
    });
  });

  it("rejects non-2xx responses without leaving a file behind", async () => {
    global.fetch = vi.fn().mockResolvedValue(new Response("missing", { status: 404 })) as typeof fetch;
    const dir = mkdtempSync(join(tmpdir(), "ucsc-download-"));

    await expect(downloadFile(FOOTER_URL, join(dir, "FOOTER"))).rejects.toMatchObject({
      code: "DOWNLOAD_FAILED",
      details: { status_code: 404 }
    });
    expect(readdirSync(dir)).toEqual([]);
  });

  it("downloads the tarball only when absent but always refreshes FOOTER", async () => {
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const fetchMock = vi.fn().mockImplementation(async (url: string) => new Response(`body of ${url}`));
    global.fetch = fetchMock as typeof fetch;
    const dir = mkdtempSync(join(tmpdir(), "ucsc-download-"));
    writeFileSync(join(dir, "userApps.v324.src.tgz"), "cached tarball");
    writeFileSync(join(dir, "FOOTER"), "stale footer");

    const paths = await fetchSources(dir, "324");

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe(FOOTER_URL);
    expect(paths).toEqual({ tarball: join(dir, "userApps.v324.src.tgz"), footer: join(dir, "FOOTER") });
    expect(readFileSync(paths.tarball, "utf-8")).toBe("cached tarball");
    expect(readFileSync(paths.footer, "utf-8")).toBe(`body of ${FOOTER_URL}`);
  });

  it("fetches a missing tarball under its URL basename", async () => {
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    global.fetch = vi.fn().mockImplementation(async () => new Response("payload")) as typeof fetch;
    const dir = mkdtempSync(join(tmpdir(), "ucsc-download-"));

    await fetchSources(dir, "400");

    expect(readdirSync(dir).sort()).toEqual(["FOOTER", "userApps.v400.src.tgz"]);
  });

  it("requires local copies in offline mode", async () => {
    const fetchMock = vi.fn();
    global.fetch = fetchMock as typeof fetch;
    const dir = mkdtempSync(join(tmpdir(), "ucsc-download-"));
    writeFileSync(join(dir, "userApps.v324.src.tgz"), "cached tarball");

    await expect(fetchSources(dir, "324", { offline: true })).rejects.toMatchObject({
      code: "DOWNLOAD_FAILED"
    });
    expect(fetchMock).not.toHaveBeenCalled();
    expect(existsSync(join(dir, "FOOTER"))).toBe(false);
  });
});
