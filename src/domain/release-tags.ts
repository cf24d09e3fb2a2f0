export type ReleaseTagCategory = "resolution" | "edition" | "type";

const RELEASE_TAG_PATTERNS: ReadonlyArray<readonly [ReleaseTagCategory, RegExp]> = [
  ["resolution", /\b(?:\d{3,4}p|4k)\b/iu],
  ["edition", /\b(?:unrated|director'?s[ ._-]?cut|extended|3d|2d|nf)\b/iu],
  [
    "type",
    /\b(?:hdcam|camrip|cam|telesync|hdts|ts(?!c)|dvdscr|screener|scr|r5|dvdrip|bdrip|brrip|hdrip|webrip|web-?dl|blu-?ray|hdtv)\b/iu,
  ],
];

export type ReleaseTags = Partial<Record<ReleaseTagCategory, string>>;

/**
 * Pulls at most one resolution, edition and release-type tag out of a
 * release name such as `Movie.2019.1080p.EXTENDED.BluRay.x264-GROUP`.
 */
export function parseReleaseTags(text: string): ReleaseTags {
  const tags: ReleaseTags = {};

  for (const [category, pattern] of RELEASE_TAG_PATTERNS) {
    const match = pattern.exec(text);
    if (match !== null) {
      tags[category] = match[0].toLowerCase();
    }
  }

  return tags;
}

/** Tags in category order: resolution, edition, type. */
export function extractReleaseTags(text: string): string[] {
  const tags = parseReleaseTags(text);

  return RELEASE_TAG_PATTERNS.flatMap(([category]) => {
    const tag = tags[category];
    return tag === undefined ? [] : [tag];
  });
}
