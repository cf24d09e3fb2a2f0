import { silentLogger, type Logger } from "../core/index.js";

import { retrieveSubtitle, type PayloadOutcome } from "./payload.js";
import type { SubsceneClient } from "./providers/subscene.js";
import { selectSubtitles } from "./subtitle-selector.js";
import { resolveTitle } from "./title-resolver.js";
import type {
  ResolvedTitle,
  SearchResultSet,
  SubtitleFetchRequest,
  SubtitleRecord,
} from "./types.js";

export interface PipelineOptions {
  /** Stop once the download link is known; nothing is downloaded. */
  dryRun?: boolean;
  logger?: Logger;
}

export interface SubtitleSelection {
  title: ResolvedTitle;
  /** Subtitles listed for the title before any filtering. */
  total: number;
  candidates: SubtitleRecord[];
}

export type SelectionOutcome =
  | { status: "no-match"; results: SearchResultSet }
  | { status: "no-subtitles"; title: ResolvedTitle }
  | { status: "none-after-filter"; title: ResolvedTitle; total: number }
  | ({ status: "selected" } & SubtitleSelection);

export type PipelineOutcome =
  | Exclude<SelectionOutcome, { status: "selected" }>
  | ({ status: "planned"; selected: SubtitleRecord; downloadUrl: string } & SubtitleSelection)
  | (PayloadOutcome & { selected: SubtitleRecord } & SubtitleSelection);

/**
 * Search → resolve title → list and filter subtitles. Rate limiting and
 * markup changes surface as thrown errors; every "nothing found" case is an
 * outcome.
 */
export async function selectSubtitleCandidates(
  site: SubsceneClient,
  request: SubtitleFetchRequest,
  options: Pick<PipelineOptions, "logger"> = {},
): Promise<SelectionOutcome> {
  const logger = options.logger ?? silentLogger;

  const results = await site.searchTitles(request.title);
  logger.debug("search results", {
    exact: results.exact?.length,
    close: results.close?.length,
    popular: results.popular?.length,
  });

  const title = resolveTitle({ title: request.title, year: request.year }, results);
  if (title === null) {
    return { status: "no-match", results };
  }
  logger.debug("title resolved", { url: title.url, category: title.category, score: title.score });

  const subtitles = await site.listSubtitles(title.url, {
    languageId: request.language.entry.id,
    hearingImpaired: request.hearingImpaired,
    foreignOnly: request.foreignOnly,
  });
  if (subtitles.length === 0) {
    return { status: "no-subtitles", title };
  }

  const candidates = selectSubtitles(subtitles, {
    tags: request.tags,
    minRating: request.minRating,
    source: request.source,
  });
  logger.debug("subtitles filtered", { total: subtitles.length, remaining: candidates.length });

  if (candidates.length === 0) {
    return { status: "none-after-filter", title, total: subtitles.length };
  }

  return { status: "selected", title, total: subtitles.length, candidates };
}

export async function runSubtitlePipeline(
  site: SubsceneClient,
  request: SubtitleFetchRequest,
  options: PipelineOptions = {},
): Promise<PipelineOutcome> {
  const selection = await selectSubtitleCandidates(site, request, options);
  if (selection.status !== "selected") {
    return selection;
  }

  const { title, total, candidates } = selection;
  const [selected] = candidates;
  if (selected === undefined) {
    return { status: "none-after-filter", title, total };
  }

  if (options.dryRun === true) {
    const downloadUrl = await site.findDownloadUrl(selected.url);
    if (downloadUrl === null) {
      return {
        status: "no-download-link",
        subtitleUrl: selected.url,
        selected,
        title,
        total,
        candidates,
      };
    }

    return { status: "planned", selected, downloadUrl, title, total, candidates };
  }

  const payload = await retrieveSubtitle(site, selected.url, request.language.entry, {
    logger: options.logger,
  });

  return { ...payload, selected, title, total, candidates };
}
