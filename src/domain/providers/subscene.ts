import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, silentLogger, type Logger } from "../../core/index.js";

import type { HearingImpairedFilter, SearchResultSet, SubtitleFilters, SubtitleRecord } from "../types.js";

import {
  assertNotRateLimited,
  parseSearchResults,
  parseSubtitlePage,
  parseTitlePage,
} from "./subscene-parser.js";
import { UpstreamClient } from "./upstream-client.js";

export interface SubsceneClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  userAgent?: string;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

/**
 * The site's endpoints. Each call is one request; filter state travels with
 * the request that needs it instead of living in the session.
 */
export interface SubsceneClient {
  readonly baseUrl: string;
  searchTitles(query: string): Promise<SearchResultSet>;
  listSubtitles(titleUrl: string, filters: SubtitleFilters): Promise<SubtitleRecord[]>;
  findDownloadUrl(subtitleUrl: string): Promise<string | null>;
  downloadArchive(downloadUrl: string, subtitleUrl: string): Promise<Uint8Array>;
}

const SEARCH_PATH = "/subtitles/searchbytitle";

const HEARING_IMPAIRED_COOKIE: Record<HearingImpairedFilter, string> = {
  any: "2",
  only: "1",
  none: "0",
};

export function createSubsceneClient(options: SubsceneClientOptions = {}): SubsceneClient {
  const baseUrl = normalizeBaseUrl(options.baseUrl);
  const logger = options.logger ?? silentLogger;
  const client = new UpstreamClient({
    providerId: "subscene",
    baseUrl,
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    fetchImpl: options.fetchImpl,
    userAgent: options.userAgent,
    logger,
  });
  const searchUrl = client.resolve(SEARCH_PATH).toString();

  return {
    baseUrl,

    async searchTitles(query: string): Promise<SearchResultSet> {
      const html = await client.requestText({
        pathOrUrl: SEARCH_PATH,
        method: "POST",
        headers: {
          "content-type": "application/x-www-form-urlencoded",
          origin: client.origin,
          referer: searchUrl,
        },
        body: new URLSearchParams({ query, l: "" }).toString(),
      });

      return parseSearchResults(html, baseUrl);
    },

    async listSubtitles(titleUrl: string, filters: SubtitleFilters): Promise<SubtitleRecord[]> {
      const html = await client.requestText({
        pathOrUrl: titleUrl,
        headers: { referer: searchUrl },
        cookies: toFilterCookies(filters),
      });

      return parseTitlePage(html, baseUrl);
    },

    async findDownloadUrl(subtitleUrl: string): Promise<string | null> {
      const html = await client.requestText({
        pathOrUrl: subtitleUrl,
        headers: { referer: titlePageOf(subtitleUrl) },
      });

      return parseSubtitlePage(html, baseUrl);
    },

    async downloadArchive(downloadUrl: string, subtitleUrl: string): Promise<Uint8Array> {
      const bytes = await client.requestBinary({
        pathOrUrl: downloadUrl,
        headers: { referer: subtitleUrl },
      });
      logger.debug("archive downloaded", { bytes: bytes.byteLength });
      if (!startsWithZipSignature(bytes)) {
        // A throttled download still answers 200, with an HTML page in place of the zip.
        assertNotRateLimited(new TextDecoder("utf-8").decode(bytes), "archive");
      }
      return bytes;
    },
  };
}

const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04] as const;

function startsWithZipSignature(bytes: Uint8Array): boolean {
  return ZIP_SIGNATURE.every((byte, index) => bytes[index] === byte);
}

export function toFilterCookies(filters: SubtitleFilters): Record<string, string> {
  return {
    LanguageFilter: String(filters.languageId),
    HearingImpaired: HEARING_IMPAIRED_COOKIE[filters.hearingImpaired],
    ForeignOnly: filters.foreignOnly ? "True" : "False",
    SortSubtitlesByDate: "false",
  };
}

/** `…/subtitles/<title>/<language>/<id>` → `…/subtitles/<title>` */
export function titlePageOf(subtitleUrl: string): string {
  return subtitleUrl.split("/").slice(0, -2).join("/");
}

function normalizeBaseUrl(value: string | undefined): string {
  if (typeof value !== "string") {
    return `${DEFAULT_BASE_URL}/`;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return `${DEFAULT_BASE_URL}/`;
  }

  return trimmed.endsWith("/") ? trimmed : `${trimmed}/`;
}
