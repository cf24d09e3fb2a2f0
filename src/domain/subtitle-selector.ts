import { DEFAULT_MIN_RATING, meetsMinimumRating } from "./rating.js";
import type { Rating, ReleaseSource, SelectionOptions, SubtitleRecord } from "./types.js";

export const RELEASE_SOURCES: Record<ReleaseSource, readonly string[]> = {
  bluray: ["bluray", "brrip", "bdrip"],
  web: ["webrip", "web-dl"],
};

export function filterByTags(subtitles: SubtitleRecord[], tags: string[]): SubtitleRecord[] {
  const needles = tags.map((tag) => tag.trim().toLowerCase()).filter((tag) => tag.length > 0);
  if (needles.length === 0) {
    return [...subtitles];
  }

  return subtitles.filter((subtitle) => {
    const name = subtitle.name.toLowerCase();
    return needles.every((needle) => name.includes(needle));
  });
}

export function filterByRating(
  subtitles: SubtitleRecord[],
  minRating: Rating = DEFAULT_MIN_RATING,
): SubtitleRecord[] {
  return subtitles.filter((subtitle) => meetsMinimumRating(subtitle.rating, minRating));
}

export function filterBySource(
  subtitles: SubtitleRecord[],
  source: ReleaseSource | undefined,
): SubtitleRecord[] {
  if (source === undefined) {
    return [...subtitles];
  }

  const markers = RELEASE_SOURCES[source];
  return subtitles.filter((subtitle) => {
    const name = subtitle.name.toLowerCase();
    return markers.some((marker) => name.includes(marker));
  });
}

/**
 * Applies tag, source and rating filters without reordering. The site's own
 * order is the ranking: the first element is the one to download.
 */
export function selectSubtitles(
  subtitles: SubtitleRecord[],
  options: SelectionOptions = {},
): SubtitleRecord[] {
  const byTags = filterByTags(subtitles, options.tags ?? []);
  const bySource = filterBySource(byTags, options.source);
  return filterByRating(bySource, options.minRating ?? DEFAULT_MIN_RATING);
}
