import { jaroWinklerSimilarity } from "./similarity.js";
import type {
  ParsedTitle,
  ResolvedTitle,
  SearchResultSet,
  TitleQuery,
  TitleRecord,
} from "./types.js";

const DISPLAY_TITLE_PATTERN = /^(.+)\s+\(([12][0-9]{3})\)$/u;

export function parseDisplayTitle(displayTitle: string): ParsedTitle {
  const match = DISPLAY_TITLE_PATTERN.exec(displayTitle.trim());
  if (match?.[1] === undefined || match[2] === undefined) {
    return { title: displayTitle.trim() };
  }

  return { title: match[1], year: match[2] };
}

/**
 * Picks the title matching `query` out of a search result set.
 *
 * A single exact hit wins outright. Several exact hits (remakes share a
 * display title) are told apart by year, and none with the query year is no
 * match. Close hits are only looked at when there is no exact hit; they are
 * restricted to the query year before they are scored. Popular suggestions
 * are never considered.
 */
export function resolveTitle(query: TitleQuery, results: SearchResultSet): ResolvedTitle | null {
  const exact = results.exact ?? [];

  if (exact.length === 1 && exact[0] !== undefined) {
    return toResolved(exact[0], "exact");
  }

  if (exact.length > 1) {
    const match = exact.find((record) => yearOf(record) === query.year);
    return match === undefined ? null : toResolved(match, "exact");
  }

  const close = results.close ?? [];
  if (close.length > 0) {
    return pickClosest(query, close);
  }

  return null;
}

export function scoreTitle(queryTitle: string, candidateTitle: string): number {
  return jaroWinklerSimilarity(
    normalizeForComparison(queryTitle),
    normalizeForComparison(candidateTitle),
  );
}

function pickClosest(query: TitleQuery, records: TitleRecord[]): ResolvedTitle | null {
  let best: ResolvedTitle | null = null;

  for (const record of records) {
    if (yearOf(record) !== query.year) {
      continue;
    }

    const parsed = parseDisplayTitle(record.displayTitle);
    const score = scoreTitle(query.title, parsed.title);
    if (best === null || (best.score ?? 0) < score) {
      best = { ...toResolved(record, "close"), score };
    }
  }

  return best;
}

function toResolved(record: TitleRecord, category: ResolvedTitle["category"]): ResolvedTitle {
  const parsed = parseDisplayTitle(record.displayTitle);
  return { ...record, title: parsed.title, year: yearOf(record), category };
}

function yearOf(record: TitleRecord): string | undefined {
  return record.year ?? parseDisplayTitle(record.displayTitle).year;
}

function normalizeForComparison(value: string): string {
  return value.replace(/\s+/gu, " ").trim().toLowerCase();
}
