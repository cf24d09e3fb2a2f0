import { readFileSync } from "node:fs";

import { strToU8, zipSync } from "fflate";
import { describe, expect, it } from "vitest";

import { runSubtitlePipeline, selectSubtitleCandidates } from "../src/domain/pipeline.js";
import { createSubsceneClient } from "../src/domain/providers/subscene.js";
import { normalizeSubtitleRequest } from "../src/domain/request-normalization.js";

type FetchImpl = typeof fetch;

type MockCall = {
  method: string;
  url: URL;
  body: string;
  headers: Headers;
};

function createMockFetch(handler: (call: MockCall) => Response | Promise<Response>): {
  fetchImpl: FetchImpl;
  calls: MockCall[];
} {
  const calls: MockCall[] = [];

  const fetchImpl: FetchImpl = async (input, init) => {
    const request = new Request(input, init);
    const body = request.body === null ? "" : await request.text();

    const call: MockCall = {
      method: request.method,
      url: new URL(request.url),
      body,
      headers: new Headers(request.headers),
    };

    calls.push(call);
    return handler(call);
  };

  return { fetchImpl, calls };
}

function readFixture(name: string): string {
  return readFileSync(new URL(`./fixtures/subscene/${name}`, import.meta.url), "utf8");
}

const SRT_TEXT = "1\n00:00:01,000 --> 00:00:02,000\nHarbor lights\n";

function createSiteHandler(archive: Uint8Array): (call: MockCall) => Response {
  return (call) => {
    const html = { "content-type": "text/html; charset=utf-8" };

    if (call.method === "POST" && call.url.pathname === "/subtitles/searchbytitle") {
      const headers = new Headers(html);
      headers.append("set-cookie", "session=test-session; Path=/; HttpOnly");
      return new Response(readFixture("search.html"), { status: 200, headers });
    }

    if (call.method === "GET" && call.url.pathname === "/subtitles/night-harbor-2019") {
      return new Response(readFixture("title.html"), { status: 200, headers: html });
    }

    if (call.method === "GET" && call.url.pathname === "/subtitles/night-harbor-2019/english/1001") {
      return new Response(readFixture("subtitle.html"), { status: 200, headers: html });
    }

    if (call.method === "GET" && call.url.pathname === "/subtitles/english-text/TeStToKeN1001") {
      return new Response(archive, {
        status: 200,
        headers: { "content-type": "application/x-zip-compressed" },
      });
    }

    return new Response("not found", { status: 404 });
  };
}

const REQUEST = normalizeSubtitleRequest({
  title: "Night Harbor",
  year: "2019",
  language: "en",
  tags: ["1080p"],
});

describe("subtitle pipeline (mocked upstream)", () => {
  it("searches, filters, downloads and decodes the first candidate", async () => {
    const archive = zipSync({ "Night.Harbor.2019.1080p.BluRay.x264-TEST.srt": strToU8(SRT_TEXT) });
    const { fetchImpl, calls } = createMockFetch(createSiteHandler(archive));
    const site = createSubsceneClient({ baseUrl: "https://subscene.test", fetchImpl });

    const outcome = await runSubtitlePipeline(site, REQUEST);

    expect(outcome).toMatchObject({
      status: "ok",
      fileName: "Night.Harbor.2019.1080p.BluRay.x264-TEST.srt",
      encoding: "utf-8",
      text: SRT_TEXT,
      downloadUrl: "https://subscene.test/subtitles/english-text/TeStToKeN1001",
      total: 3,
      title: { url: "https://subscene.test/subtitles/night-harbor-2019", category: "exact" },
      selected: {
        url: "https://subscene.test/subtitles/night-harbor-2019/english/1001",
        rating: "positive",
      },
    });
    expect(calls.map((call) => `${call.method} ${call.url.pathname}`)).toEqual([
      "POST /subtitles/searchbytitle",
      "GET /subtitles/night-harbor-2019",
      "GET /subtitles/night-harbor-2019/english/1001",
      "GET /subtitles/english-text/TeStToKeN1001",
    ]);
  });

  it("sends the search form and the per-request filter cookies", async () => {
    const { fetchImpl, calls } = createMockFetch(createSiteHandler(zipSync({})));
    const site = createSubsceneClient({ baseUrl: "https://subscene.test", fetchImpl });

    await selectSubtitleCandidates(site, REQUEST);

    const [search, titlePage] = calls;
    expect(search?.body).toBe("query=Night+Harbor&l=");
    expect(search?.headers.get("content-type")).toBe("application/x-www-form-urlencoded");
    expect(search?.headers.get("referer")).toBe("https://subscene.test/subtitles/searchbytitle");
    expect(search?.headers.get("origin")).toBe("https://subscene.test");
    expect(search?.headers.get("cookie")).toBeNull();

    expect(titlePage?.headers.get("cookie")).toBe(
      "session=test-session; LanguageFilter=13; HearingImpaired=2; ForeignOnly=False; SortSubtitlesByDate=false",
    );
  });

  it("keeps filter cookies out of later requests", async () => {
    const { fetchImpl, calls } = createMockFetch(createSiteHandler(zipSync({})));
    const site = createSubsceneClient({ baseUrl: "https://subscene.test", fetchImpl });

    await runSubtitlePipeline(site, REQUEST, { dryRun: true });

    const subtitlePage = calls[2];
    expect(subtitlePage?.headers.get("cookie")).toBe("session=test-session");
    expect(subtitlePage?.headers.get("referer")).toBe(
      "https://subscene.test/subtitles/night-harbor-2019",
    );
  });

  it("stops at the download link on a dry run", async () => {
    const { fetchImpl, calls } = createMockFetch(createSiteHandler(zipSync({})));
    const site = createSubsceneClient({ baseUrl: "https://subscene.test", fetchImpl });

    const outcome = await runSubtitlePipeline(site, REQUEST, { dryRun: true });

    expect(outcome).toMatchObject({
      status: "planned",
      downloadUrl: "https://subscene.test/subtitles/english-text/TeStToKeN1001",
    });
    expect(calls).toHaveLength(3);
  });

  it("reports a search without a matching title", async () => {
    const { fetchImpl, calls } = createMockFetch(createSiteHandler(zipSync({})));
    const site = createSubsceneClient({ baseUrl: "https://subscene.test", fetchImpl });

    const outcome = await runSubtitlePipeline(site, { ...REQUEST, year: "2021" });

    expect(outcome.status).toBe("no-match");
    expect(calls).toHaveLength(1);
  });

  it("reports subtitles removed by the filters", async () => {
    const { fetchImpl } = createMockFetch(createSiteHandler(zipSync({})));
    const site = createSubsceneClient({ baseUrl: "https://subscene.test", fetchImpl });

    const outcome = await runSubtitlePipeline(site, { ...REQUEST, tags: ["2160p"] });

    expect(outcome).toMatchObject({ status: "none-after-filter", total: 3 });
  });
});
