import * as cheerio from "cheerio";

import { CliAppError } from "../../core/index.js";

import { parseRatingClass } from "../rating.js";
import { parseDisplayTitle } from "../title-resolver.js";
import {
  SEARCH_CATEGORIES,
  type SearchResultSet,
  type SubtitleRecord,
  type TitleRecord,
} from "../types.js";

export type PageKind = "search-results" | "title-page" | "subtitle-page";

export interface SearchResultsPage {
  kind: "search-results";
  results: SearchResultSet;
}

export interface TitlePage {
  kind: "title-page";
  subtitles: SubtitleRecord[];
}

export interface SubtitlePage {
  kind: "subtitle-page";
  downloadUrl: string | null;
}

export type ExtractedPage = SearchResultsPage | TitlePage | SubtitlePage;

/** Anything the site answers with, including the archive download. */
export type ThrottledResource = PageKind | "archive";

const THROTTLE_PATTERN = /\btoo?\s+many\s+requests\b/iu;

const SEARCH_SECTION_SELECTOR = ".search-result";
const TITLE_EMPTY_SELECTOR = ".subtitles.byFilm tbody tr td.empty";
const TITLE_ROW_SELECTOR = ".subtitles.byFilm tbody td.a1";
const DOWNLOAD_LINK_SELECTOR = ".download a";

export function extractPage(kind: "search-results", html: string, baseUrl: string): SearchResultsPage;
export function extractPage(kind: "title-page", html: string, baseUrl: string): TitlePage;
export function extractPage(kind: "subtitle-page", html: string, baseUrl: string): SubtitlePage;
export function extractPage(kind: PageKind, html: string, baseUrl: string): ExtractedPage;
export function extractPage(kind: PageKind, html: string, baseUrl: string): ExtractedPage {
  switch (kind) {
    case "search-results":
      return { kind, results: parseSearchResults(html, baseUrl) };
    case "title-page":
      return { kind, subtitles: parseTitlePage(html, baseUrl) };
    case "subtitle-page":
      return { kind, downloadUrl: parseSubtitlePage(html, baseUrl) };
  }
}

/** Matches the throttle phrase in the raw markup or in its decoded text (`Too&nbsp;many requests`). */
export function detectRateLimit(html: string): boolean {
  return isThrottled(html, cheerio.load(html));
}

export function assertNotRateLimited(html: string, kind: ThrottledResource): void {
  assertPageNotThrottled(html, cheerio.load(html), kind);
}

function isThrottled(html: string, $: cheerio.CheerioAPI): boolean {
  return THROTTLE_PATTERN.test(html) || THROTTLE_PATTERN.test($.root().text());
}

function assertPageNotThrottled(html: string, $: cheerio.CheerioAPI, kind: ThrottledResource): void {
  if (isThrottled(html, $)) {
    throw new CliAppError({
      code: "E_UPSTREAM_RATE_LIMITED",
      message: "subscene rate limited the request (too many requests)",
      details: {
        provider: "subscene",
        page: kind,
        classification: "rate-limit",
      },
    });
  }
}

export function parseSearchResults(html: string, baseUrl: string): SearchResultSet {
  const $ = cheerio.load(html);
  assertPageNotThrottled(html, $, "search-results");
  const results: SearchResultSet = {};

  for (const category of SEARCH_CATEGORIES) {
    const list = $(`${SEARCH_SECTION_SELECTOR} .${category} + ul`).first();
    if (list.length === 0) {
      continue;
    }

    results[category] = list
      .find("li")
      .toArray()
      .map((item, index): TitleRecord => {
        const anchor = $(item).find(".title a").first();
        const href = anchor.attr("href");
        if (anchor.length === 0 || href === undefined) {
          throw createMalformedPageError("search-results", "search result item has no title link", {
            category,
            index,
          });
        }

        const displayTitle = normalizeWhitespace(anchor.text());
        const { year } = parseDisplayTitle(displayTitle);
        return year === undefined
          ? { url: resolveLink(href, baseUrl), displayTitle }
          : { url: resolveLink(href, baseUrl), displayTitle, year };
      });
  }

  return results;
}

export function parseTitlePage(html: string, baseUrl: string): SubtitleRecord[] {
  const $ = cheerio.load(html);
  assertPageNotThrottled(html, $, "title-page");

  // The site keeps rendering ad rows around an empty table.
  if ($(TITLE_EMPTY_SELECTOR).length > 0) {
    return [];
  }

  const rows = $(TITLE_ROW_SELECTOR).toArray();
  if (rows.length === 0) {
    throw createMalformedPageError("title-page", "subtitle table not found", {});
  }

  return rows.map((row, index): SubtitleRecord => {
    const cell = $(row);
    const href = cell.find("a").first().attr("href");
    if (href === undefined) {
      throw createMalformedPageError("title-page", "subtitle row has no link", { index });
    }

    const ratingClass = cell.find("span:first-child").first().attr("class");
    const rating = ratingClass === undefined ? undefined : parseRatingClass(ratingClass);
    if (rating === undefined) {
      throw createMalformedPageError("title-page", "unrecognized rating icon", {
        index,
        className: ratingClass ?? null,
      });
    }

    return {
      url: resolveLink(href, baseUrl),
      name: normalizeWhitespace(cell.find("span:last-child").first().text()),
      rating,
    };
  });
}

export function parseSubtitlePage(html: string, baseUrl: string): string | null {
  const $ = cheerio.load(html);
  assertPageNotThrottled(html, $, "subtitle-page");
  const href = $(DOWNLOAD_LINK_SELECTOR).first().attr("href");
  if (href === undefined || href.trim().length === 0) {
    return null;
  }

  return resolveLink(href, baseUrl);
}

/** Newlines become spaces, runs of two or more whitespace characters collapse. */
export function normalizeWhitespace(value: string): string {
  return value
    .trim()
    .replace(/\r?\n/gu, " ")
    .replace(/\s{2,}/gu, " ");
}

function resolveLink(href: string, baseUrl: string): string {
  return new URL(href.trim(), baseUrl).toString();
}

function createMalformedPageError(
  page: PageKind,
  reason: string,
  details: Record<string, unknown>,
): CliAppError {
  return new CliAppError({
    code: "E_UPSTREAM_MALFORMED_PAGE",
    message: `subscene ${page} markup changed: ${reason}`,
    details: {
      provider: "subscene",
      page,
      reason,
      ...details,
    },
  });
}
