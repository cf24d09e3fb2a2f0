import { join } from "node:path";

import { CliAppError, type Logger } from "../core/index.js";

import { runSubtitlePipeline } from "../domain/pipeline.js";
import type { SubsceneClient } from "../domain/providers/subscene.js";
import { buildSubtitleFileName } from "../domain/request-normalization.js";
import type { ResolvedTitle, SubtitleFetchRequest, SubtitleRecord } from "../domain/types.js";

import { outcomeToError } from "./outcomes.js";
import { writeSubtitleFile, type FileWriter, type OutputPathResolver } from "./output.js";

export interface FetchCommandInput {
  site: SubsceneClient;
  request: SubtitleFetchRequest;
  /** Explicit file or directory; defaults to the generated name inside `outputDirectory`. */
  outputPath?: string;
  outputDirectory: string;
  dryRun: boolean;
  limit: number;
  writeFile: FileWriter;
  resolveOutputPath?: OutputPathResolver;
  logger?: Logger;
}

export interface FetchCommandOutput {
  request: SubtitleFetchRequest;
  title: ResolvedTitle;
  selected: SubtitleRecord;
  candidates: SubtitleRecord[];
  total: number;
  outputPath: string;
  fileName: string;
  archiveEntry?: string;
  encoding?: string;
  downloadUrl: string;
  dryRun: boolean;
  bytesWritten: number;
}

export async function runFetchCommand(input: FetchCommandInput): Promise<FetchCommandOutput> {
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

  const resolveOutputPath = input.resolveOutputPath ?? (async (path: string) => path);
  const fileName = buildSubtitleFileName({
    title: input.request.title,
    year: input.request.year,
    language: input.request.language,
  });
  const outputPath = await resolveOutputPath(
    input.outputPath ?? join(input.outputDirectory, fileName),
    fileName,
  );

  const outcome = await runSubtitlePipeline(input.site, input.request, {
    dryRun: input.dryRun,
    logger: input.logger,
  });

  if (outcome.status === "planned") {
    return {
      request: input.request,
      title: outcome.title,
      selected: outcome.selected,
      candidates: outcome.candidates.slice(0, input.limit),
      total: outcome.total,
      outputPath,
      fileName,
      downloadUrl: outcome.downloadUrl,
      dryRun: true,
      bytesWritten: 0,
    };
  }

  if (outcome.status !== "ok") {
    throw outcomeToError(outcome);
  }

  const bytesWritten = await writeSubtitleFile(input.writeFile, outputPath, outcome.text);

  return {
    request: input.request,
    title: outcome.title,
    selected: outcome.selected,
    candidates: outcome.candidates.slice(0, input.limit),
    total: outcome.total,
    outputPath,
    fileName,
    archiveEntry: outcome.fileName,
    encoding: outcome.encoding,
    downloadUrl: outcome.downloadUrl,
    dryRun: false,
    bytesWritten,
  };
}

export function renderFetchOutput(output: FetchCommandOutput): string {
  return [
    `Title: ${output.title.displayTitle} | ${output.title.url}`,
    `Language: ${output.request.language.entry.name}`,
    `Selected: ${output.selected.name} [${output.selected.rating}] (${output.candidates.length} of ${output.total} shown)`,
    `Source: ${output.downloadUrl}`,
    ...(output.archiveEntry === undefined ? [] : [`Archive entry: ${output.archiveEntry}`]),
    ...(output.encoding === undefined ? [] : [`Encoding: ${output.encoding}`]),
    `Output: ${output.outputPath}`,
    `Dry run: ${output.dryRun ? "yes" : "no"}`,
    `Bytes written: ${output.bytesWritten}`,
  ].join("\n");
}
