export const RATINGS = ["bad", "neutral", "positive"] as const;

export type Rating = (typeof RATINGS)[number];

export const SEARCH_CATEGORIES = ["exact", "close", "popular"] as const;

export type SearchCategory = (typeof SEARCH_CATEGORIES)[number];

export type HearingImpairedFilter = "any" | "only" | "none";

export type ReleaseSource = "bluray" | "web";

export interface TitleRecord {
  url: string;
  /** Title as shown by the site, usually suffixed with ` (YYYY)`. */
  displayTitle: string;
  /** Four-digit year split off `displayTitle`; absent when the site shows none. */
  year?: string;
}

/**
 * Categories missing from the search page are missing here too; a category
 * whose list exists but is empty is present with `[]`.
 */
export type SearchResultSet = Partial<Record<SearchCategory, TitleRecord[]>>;

export interface ParsedTitle {
  title: string;
  year?: string;
}

export interface TitleQuery {
  title: string;
  year: string;
}

export interface ResolvedTitle extends TitleRecord {
  title: string;
  year?: string;
  category: Exclude<SearchCategory, "popular">;
  score?: number;
}

export interface SubtitleRecord {
  url: string;
  /** Free-text release name, e.g. `Movie.2019.1080p.BluRay.x264-GROUP`. */
  name: string;
  rating: Rating;
}

export interface LanguageEntry {
  id: number;
  code: string | null;
  name: string;
}

export interface ResolvedLanguage {
  entry: LanguageEntry;
  /** Code the caller used, or the table code for id lookups. */
  code: string | null;
}

export interface SubtitleFilters {
  languageId: number;
  hearingImpaired: HearingImpairedFilter;
  foreignOnly: boolean;
}

export interface SelectionOptions {
  tags?: string[];
  minRating?: Rating;
  source?: ReleaseSource;
}

export interface SubtitleFetchRequest {
  title: string;
  year: string;
  language: ResolvedLanguage;
  tags: string[];
  minRating: Rating;
  source?: ReleaseSource;
  hearingImpaired: HearingImpairedFilter;
  foreignOnly: boolean;
}
