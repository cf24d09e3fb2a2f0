import { strToU8, zipSync } from "fflate";
import { describe, expect, it } from "vitest";

import { runCli } from "../src/cli.js";
import type { SubsceneClient } from "../src/domain/providers/subscene.js";
import type { SearchResultSet, SubtitleRecord } from "../src/domain/types.js";

class BufferWriter {
  public chunks: string[] = [];

  public write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  public read(): string {
    return this.chunks.join("");
  }
}

const TITLE_URL = "https://subscene.test/subtitles/night-harbor-2019";
const DOWNLOAD_URL = "https://subscene.test/subtitles/english-text/TeStToKeN1001";
const SRT_TEXT = "1\n00:00:01,000 --> 00:00:02,000\nHarbor lights\n";

const RESULTS: SearchResultSet = {
  exact: [{ url: TITLE_URL, displayTitle: "Night Harbor (2019)" }],
};

const SUBTITLES: SubtitleRecord[] = [
  { url: `${TITLE_URL}/english/1001`, name: "Night.Harbor.2019.1080p.BluRay.x264-TEST", rating: "positive" },
  { url: `${TITLE_URL}/english/1002`, name: "Night.Harbor.2019.720p.WEBRip.x264-TEST", rating: "neutral" },
];

function createFakeSite(): { site: SubsceneClient; calls: string[] } {
  const calls: string[] = [];
  const site: SubsceneClient = {
    baseUrl: "https://subscene.test/",
    async searchTitles(query) {
      calls.push(`search ${query}`);
      return RESULTS;
    },
    async listSubtitles(titleUrl, filters) {
      calls.push(`list ${titleUrl} ${filters.languageId}`);
      return SUBTITLES;
    },
    async findDownloadUrl(subtitleUrl) {
      calls.push(`link ${subtitleUrl}`);
      return DOWNLOAD_URL;
    },
    async downloadArchive(downloadUrl) {
      calls.push(`archive ${downloadUrl}`);
      return zipSync({ "Night.Harbor.2019.srt": strToU8(SRT_TEXT) });
    },
  };

  return { site, calls };
}

const FIXED_DEPS = {
  clock: () => 1000,
  now: () => new Date("2026-02-18T12:00:00.000Z"),
};

describe("CLI JSON contract", () => {
  it("returns success envelope for languages", async () => {
    const stdout = new BufferWriter();
    const stderr = new BufferWriter();

    const exitCode = await runCli(["languages", "--json"], {
      ...FIXED_DEPS,
      stdout,
      stderr,
      requestIdFactory: () => "req-languages",
    });

    expect(exitCode).toBe(0);
    const payload = JSON.parse(stdout.read());
    expect(payload).toEqual({
      ok: true,
      data: expect.objectContaining({ total: 76 }),
      meta: {
        command: "languages",
        requestId: "req-languages",
        startedAt: "2026-02-18T12:00:00.000Z",
        finishedAt: "2026-02-18T12:00:00.000Z",
        durationMs: 0,
        verbose: false,
      },
    });
    expect(payload.data.languages[12]).toEqual({ id: 13, code: "en", name: "English" });
    expect(stderr.read()).toBe("");
  });

  it("returns success envelope for search", async () => {
    const stdout = new BufferWriter();
    const stderr = new BufferWriter();
    const { site, calls } = createFakeSite();

    const exitCode = await runCli(
      ["search", "--title", "Night Harbor", "--year", "2019", "--json"],
      {
        ...FIXED_DEPS,
        site,
        stdout,
        stderr,
        requestIdFactory: () => "req-search-json",
      },
    );

    expect(exitCode).toBe(0);
    expect(calls).toEqual(["search Night Harbor"]);
    expect(JSON.parse(stdout.read())).toMatchObject({
      ok: true,
      data: {
        query: { title: "Night Harbor", year: "2019" },
        total: 1,
        resolved: { url: TITLE_URL, category: "exact", title: "Night Harbor", year: "2019" },
      },
      meta: {
        command: "search",
        requestId: "req-search-json",
      },
    });
  });

  it("returns success envelope for subtitles", async () => {
    const stdout = new BufferWriter();
    const { site } = createFakeSite();

    const exitCode = await runCli(
      [
        "subtitles",
        "--movie",
        "Night Harbor (2019)",
        "--lang",
        "eng",
        "--tags",
        "x264,1080P",
        "--limit",
        "5",
        "--json",
      ],
      { ...FIXED_DEPS, site, stdout, stderr: new BufferWriter() },
    );

    expect(exitCode).toBe(0);
    expect(JSON.parse(stdout.read())).toMatchObject({
      ok: true,
      data: {
        request: { tags: ["x264", "1080p"], language: { code: "eng" } },
        total: 2,
        matched: 1,
        returned: 1,
        items: [{ url: `${TITLE_URL}/english/1001` }],
      },
    });
  });

  it("writes the fetched subtitle and reports it", async () => {
    const stdout = new BufferWriter();
    const { site, calls } = createFakeSite();
    const writes: Array<{ path: string; text: string }> = [];

    const exitCode = await runCli(
      [
        "fetch",
        "--title",
        "Night Harbor",
        "--year",
        "2019",
        "--lang",
        "en",
        "--output",
        "/nonexistent-subscene-dl/out.srt",
        "--json",
      ],
      {
        ...FIXED_DEPS,
        site,
        stdout,
        stderr: new BufferWriter(),
        fileWriter: async (path, content) => {
          writes.push({ path, text: new TextDecoder().decode(content) });
        },
      },
    );

    expect(exitCode).toBe(0);
    expect(calls).toEqual([
      "search Night Harbor",
      `list ${TITLE_URL} 13`,
      `link ${TITLE_URL}/english/1001`,
      `archive ${DOWNLOAD_URL}`,
    ]);
    expect(writes).toEqual([{ path: "/nonexistent-subscene-dl/out.srt", text: SRT_TEXT }]);
    expect(JSON.parse(stdout.read())).toMatchObject({
      ok: true,
      data: {
        outputPath: "/nonexistent-subscene-dl/out.srt",
        fileName: "Night Harbor (2019).en.srt",
        archiveEntry: "Night.Harbor.2019.srt",
        encoding: "utf-8",
        dryRun: false,
        bytesWritten: new TextEncoder().encode(SRT_TEXT).byteLength,
        selected: { url: `${TITLE_URL}/english/1001` },
      },
      meta: { command: "fetch" },
    });
  });

  it("returns error envelope for argument failures", async () => {
    const stdout = new BufferWriter();
    const stderr = new BufferWriter();

    const exitCode = await runCli(["download", "--lang", "en", "--json"], {
      ...FIXED_DEPS,
      stdout,
      stderr,
      requestIdFactory: () => "req-error-json",
    });

    expect(exitCode).toBe(2);
    expect(JSON.parse(stdout.read())).toMatchObject({
      ok: false,
      error: {
        code: "E_ARG_MISSING",
        message: "--url is required",
        details: { arg: "url" },
      },
      meta: {
        command: "download",
        requestId: "req-error-json",
      },
    });
    expect(stderr.read()).toBe("");
  });

  it("reports the version", async () => {
    const stdout = new BufferWriter();

    const exitCode = await runCli(["--version"], { stdout, stderr: new BufferWriter() });

    expect(exitCode).toBe(0);
    expect(stdout.read()).toBe("subscene-dl 0.1.0\n");
  });
});
