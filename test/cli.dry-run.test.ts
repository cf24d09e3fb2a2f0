import { describe, expect, it } from "vitest";

import { runCli } from "../src/cli.js";
import type { SubsceneClient } from "../src/domain/providers/subscene.js";

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
const SUBTITLE_URL = `${TITLE_URL}/english/1001`;
const DOWNLOAD_URL = "https://subscene.test/subtitles/english-text/TeStToKeN1001";

interface CallCounts {
  search: number;
  list: number;
  link: number;
  archive: number;
  write: number;
}

function createCountingSite(counts: CallCounts): SubsceneClient {
  return {
    baseUrl: "https://subscene.test/",
    async searchTitles() {
      counts.search += 1;
      return { exact: [{ url: TITLE_URL, displayTitle: "Night Harbor (2019)" }] };
    },
    async listSubtitles() {
      counts.list += 1;
      return [{ url: SUBTITLE_URL, name: "Night.Harbor.2019.1080p.BluRay.x264-TEST", rating: "positive" }];
    },
    async findDownloadUrl() {
      counts.link += 1;
      return DOWNLOAD_URL;
    },
    async downloadArchive() {
      counts.archive += 1;
      return new Uint8Array();
    },
  };
}

function createCounts(): CallCounts {
  return { search: 0, list: 0, link: 0, archive: 0, write: 0 };
}

describe("dry-run behavior", () => {
  it("download --dry-run does not write files", async () => {
    const counts = createCounts();
    const stdout = new BufferWriter();
    const stderr = new BufferWriter();

    const exitCode = await runCli(
      [
        "download",
        "--url",
        SUBTITLE_URL,
        "--lang",
        "en",
        "--output",
        "/nonexistent-subscene-dl/out.srt",
        "--dry-run",
      ],
      {
        site: createCountingSite(counts),
        stdout,
        stderr,
        fileWriter: async () => {
          counts.write += 1;
        },
      },
    );

    expect(exitCode).toBe(0);
    expect(counts).toEqual({ search: 0, list: 0, link: 1, archive: 0, write: 0 });
    expect(stdout.read()).toBe(
      [
        `Subtitle: ${SUBTITLE_URL}`,
        `Source: ${DOWNLOAD_URL}`,
        "Output: /nonexistent-subscene-dl/out.srt",
        "Dry run: yes",
        "Bytes written: 0",
        "",
      ].join("\n"),
    );
    expect(stderr.read()).toBe("");
  });

  it("fetch --dry-run does not write files", async () => {
    const counts = createCounts();
    const stdout = new BufferWriter();
    const stderr = new BufferWriter();

    const exitCode = await runCli(
      ["fetch", "--file", "/nonexistent-movies/Night Harbor (2019).mkv", "--lang", "en", "--dry-run", "--json"],
      {
        site: createCountingSite(counts),
        stdout,
        stderr,
        cwd: () => "/nonexistent-cwd",
        fileWriter: async () => {
          counts.write += 1;
        },
      },
    );

    expect(exitCode).toBe(0);
    expect(counts).toEqual({ search: 1, list: 1, link: 1, archive: 0, write: 0 });
    expect(JSON.parse(stdout.read())).toMatchObject({
      ok: true,
      data: {
        dryRun: true,
        bytesWritten: 0,
        downloadUrl: DOWNLOAD_URL,
        outputPath: "/nonexistent-movies/Night Harbor (2019).en.srt",
        selected: {
          url: SUBTITLE_URL,
        },
      },
    });
    expect(stderr.read()).toBe("");
  });

  it("fetch without --file or --output targets the working directory", async () => {
    const counts = createCounts();
    const stdout = new BufferWriter();

    const exitCode = await runCli(
      ["fetch", "--movie", "Night Harbor (2019)", "--lang", "3", "--dry-run", "--json"],
      {
        site: createCountingSite(counts),
        stdout,
        stderr: new BufferWriter(),
        cwd: () => "/nonexistent-cwd",
      },
    );

    expect(exitCode).toBe(0);
    expect(JSON.parse(stdout.read())).toMatchObject({
      data: {
        outputPath: "/nonexistent-cwd/Night Harbor (2019).3.srt",
        fileName: "Night Harbor (2019).3.srt",
      },
    });
  });
});
