import { CliAppError } from "../core/index.js";

import { RATINGS, type Rating } from "./types.js";

const RATING_RANK: Record<Rating, number> = {
  bad: 0,
  neutral: 1,
  positive: 2,
};

const RATING_ICON_PATTERN = /^.*?(positive|neutral|bad)-icon/iu;

export const DEFAULT_MIN_RATING: Rating = "neutral";

export function ratingRank(rating: Rating): number {
  return RATING_RANK[rating];
}

export function meetsMinimumRating(rating: Rating, minimum: Rating): boolean {
  return ratingRank(rating) >= ratingRank(minimum);
}

export function isRating(value: string): value is Rating {
  return RATINGS.some((item) => item === value);
}

/**
 * Reads the rating out of an icon class such as `l r positive-icon`.
 * Returns undefined when the class carries no known rating token.
 */
export function parseRatingClass(className: string): Rating | undefined {
  const token = RATING_ICON_PATTERN.exec(className)?.[1]?.toLowerCase();
  if (token === undefined || !isRating(token)) {
    return undefined;
  }

  return token;
}

export function parseRatingArgument(value: string, arg = "min-rating"): Rating {
  const normalized = value.trim().toLowerCase();
  if (isRating(normalized)) {
    return normalized;
  }

  throw new CliAppError({
    code: "E_ARG_INVALID",
    message: `--${arg} must be one of: ${RATINGS.join(", ")}`,
    details: {
      arg,
      value,
      allowed: [...RATINGS],
    },
  });
}
