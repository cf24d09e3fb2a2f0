import { CliAppError, type Logger } from "../core/index.js";

import { selectSubtitleCandidates } from "../domain/pipeline.js";
import type { SubsceneClient } from "../domain/providers/subscene.js";
import type { ResolvedTitle, SubtitleFetchRequest, SubtitleRecord } from "../domain/types.js";

import { outcomeToError } from "./outcomes.js";

export interface SubtitlesCommandInput {
  site: SubsceneClient;
  request: SubtitleFetchRequest;
  limit: number;
  logger?: Logger;
}

export interface SubtitlesCommandOutput {
  request: SubtitleFetchRequest;
  title: ResolvedTitle;
  total: number;
  matched: number;
  returned: number;
  items: SubtitleRecord[];
}

export async function runSubtitlesCommand(
  input: SubtitlesCommandInput,
): Promise<SubtitlesCommandOutput> {
  if (!Number.isInteger(input.limit) || input.limit <= 0) {
    throw new CliAppError({
      code: "E_ARG_INVALID",
      message: "--limit must be a positive integer",
      details: {
        arg: "limit",
        value: input.limit,
      },
    });
  }

  const outcome = await selectSubtitleCandidates(input.site, input.request, {
    logger: input.logger,
  });
  if (outcome.status !== "selected") {
    throw outcomeToError(outcome);
  }

  const items = outcome.candidates.slice(0, input.limit);

  return {
    request: input.request,
    title: outcome.title,
    total: outcome.total,
    matched: outcome.candidates.length,
    returned: items.length,
    items,
  };
}

export function renderSubtitlesOutput(output: SubtitlesCommandOutput): string {
  const lines: string[] = [
    `Title: ${output.title.displayTitle} | ${output.title.url}`,
    `Language: ${output.request.language.entry.name}`,
    `Matched: ${output.matched}/${output.total} (showing ${output.returned})`,
  ];

  output.items.forEach((item, index) => {
    lines.push(`${index + 1}. [${item.rating}] ${item.name} | ${item.url}`);
  });

  return lines.join("\n");
}
