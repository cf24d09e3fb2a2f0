import { basename, dirname, extname } from "node:path";

import { CliAppError } from "../core/index.js";

import { resolveLanguage } from "./languages.js";
import { DEFAULT_MIN_RATING, parseRatingArgument } from "./rating.js";
import { extractReleaseTags } from "./release-tags.js";
import type {
  HearingImpairedFilter,
  ReleaseSource,
  ResolvedLanguage,
  SubtitleFetchRequest,
  TitleQuery,
} from "./types.js";

const MOVIE_TITLE_PATTERN = /^(.+)\s+\(([12][0-9]{3})\)$/u;

const HEARING_IMPAIRED_VALUES: readonly HearingImpairedFilter[] = ["any", "only", "none"];
const RELEASE_SOURCE_VALUES: readonly ReleaseSource[] = ["bluray", "web"];

export interface SubtitleRequestInput {
  title: string;
  year: string | number;
  language: string | number;
  tags?: string[];
  release?: string;
  minRating?: string;
  source?: string;
  hearingImpaired?: string;
  foreignOnly?: boolean;
}

export interface MovieFile extends TitleQuery {
  directory: string;
  fileName: string;
}

/** `"Parasite (Gisaengchung) (2019)"` → `{ title: "Parasite (Gisaengchung)", year: "2019" }` */
export function parseMovieTitle(value: string, arg = "movie"): TitleQuery {
  const match = MOVIE_TITLE_PATTERN.exec(collapseWhitespace(value));
  if (match?.[1] === undefined || match[2] === undefined) {
    throw new CliAppError({
      code: "E_ARG_INVALID",
      message: `--${arg} must look like "Title (Year)"`,
      details: {
        arg,
        value,
      },
    });
  }

  return { title: match[1], year: match[2] };
}

/** Reads title and year from a movie file named like `Title (Year).mkv`. */
export function parseMovieFileName(path: string): MovieFile {
  const fileName = basename(path);
  const stem = basename(fileName, extname(fileName));
  const query = parseMovieTitle(stem, "file");

  return {
    ...query,
    directory: dirname(path),
    fileName,
  };
}

export function normalizeSubtitleRequest(input: SubtitleRequestInput): SubtitleFetchRequest {
  const title = collapseWhitespace(input.title);
  if (title.length === 0) {
    throw new CliAppError({
      code: "E_ARG_MISSING",
      message: "--title is required",
      details: { arg: "title" },
    });
  }

  const tags = normalizeTags([
    ...(input.tags ?? []),
    ...(input.release === undefined ? [] : extractReleaseTags(input.release)),
  ]);

  return {
    title,
    year: normalizeYear(input.year),
    language: resolveLanguage(input.language),
    tags,
    minRating:
      input.minRating === undefined ? DEFAULT_MIN_RATING : parseRatingArgument(input.minRating),
    source: input.source === undefined ? undefined : parseChoice(input.source, "source", RELEASE_SOURCE_VALUES),
    hearingImpaired:
      input.hearingImpaired === undefined
        ? "any"
        : parseChoice(input.hearingImpaired, "hi", HEARING_IMPAIRED_VALUES),
    foreignOnly: input.foreignOnly ?? false,
  };
}

export function normalizeYear(value: string | number): string {
  const text = String(value).trim();
  if (!/^[12][0-9]{3}$/u.test(text)) {
    throw new CliAppError({
      code: "E_ARG_INVALID",
      message: "--year must be a four-digit year",
      details: {
        arg: "year",
        value,
      },
    });
  }

  return text;
}

export function normalizeTags(values: string[]): string[] {
  const deduped = new Set<string>();

  for (const value of values) {
    const normalized = value.trim().toLowerCase();
    if (normalized.length > 0) {
      deduped.add(normalized);
    }
  }

  return [...deduped];
}

/** `"{title} ({year}).{code}.srt"`, using the site id when the language has no code. */
export function buildSubtitleFileName(input: {
  title: string;
  year: string;
  language: ResolvedLanguage;
}): string {
  const languageTag = input.language.code ?? String(input.language.entry.id);
  const title = input.title.replace(/[\\/:*?"<>|]/gu, " ").replace(/\s+/gu, " ").trim();
  return `${title} (${input.year}).${languageTag}.srt`;
}

function parseChoice<T extends string>(value: string, arg: string, allowed: readonly T[]): T {
  const normalized = value.trim().toLowerCase();
  const match = allowed.find((item) => item === normalized);
  if (match !== undefined) {
    return match;
  }

  throw new CliAppError({
    code: "E_ARG_INVALID",
    message: `--${arg} must be one of: ${allowed.join(", ")}`,
    details: {
      arg,
      value,
      allowed: [...allowed],
    },
  });
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}
