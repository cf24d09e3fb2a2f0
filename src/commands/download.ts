import { CliAppError, type Logger } from "../core/index.js";

import { retrieveSubtitle } from "../domain/payload.js";
import type { SubsceneClient } from "../domain/providers/subscene.js";
import type { ResolvedLanguage } from "../domain/types.js";

import { outcomeToError } from "./outcomes.js";
import { writeSubtitleFile, type FileWriter, type OutputPathResolver } from "./output.js";

export interface DownloadCommandInput {
  site: SubsceneClient;
  subtitleUrl: string;
  language: ResolvedLanguage;
  outputPath: string;
  dryRun: boolean;
  writeFile: FileWriter;
  resolveOutputPath?: OutputPathResolver;
  logger?: Logger;
}

export interface DownloadCommandOutput {
  subtitleUrl: string;
  downloadUrl: string;
  outputPath: string;
  fileName?: string;
  encoding?: string;
  dryRun: boolean;
  bytesWritten: number;
}

export async function runDownloadCommand(
  input: DownloadCommandInput,
): Promise<DownloadCommandOutput> {
  if (input.subtitleUrl.trim().length === 0) {
    throw new CliAppError({
      code: "E_ARG_MISSING",
      message: "--url is required",
      details: {
        arg: "url",
      },
    });
  }

  if (input.outputPath.trim().length === 0) {
    throw new CliAppError({
      code: "E_ARG_MISSING",
      message: "--output is required",
      details: {
        arg: "output",
      },
    });
  }

  const resolveOutputPath = input.resolveOutputPath ?? (async (path: string) => path);

  if (input.dryRun) {
    const downloadUrl = await input.site.findDownloadUrl(input.subtitleUrl);
    if (downloadUrl === null) {
      throw outcomeToError({ status: "no-download-link", subtitleUrl: input.subtitleUrl });
    }

    return {
      subtitleUrl: input.subtitleUrl,
      downloadUrl,
      outputPath: await resolveOutputPath(input.outputPath, defaultFileName(input.subtitleUrl)),
      dryRun: true,
      bytesWritten: 0,
    };
  }

  const payload = await retrieveSubtitle(input.site, input.subtitleUrl, input.language.entry, {
    logger: input.logger,
  });
  if (payload.status !== "ok") {
    throw outcomeToError(payload);
  }

  const outputPath = await resolveOutputPath(input.outputPath, payload.fileName);
  const bytesWritten = await writeSubtitleFile(input.writeFile, outputPath, payload.text);

  return {
    subtitleUrl: input.subtitleUrl,
    downloadUrl: payload.downloadUrl,
    outputPath,
    fileName: payload.fileName,
    encoding: payload.encoding,
    dryRun: false,
    bytesWritten,
  };
}

export function renderDownloadOutput(output: DownloadCommandOutput): string {
  return [
    `Subtitle: ${output.subtitleUrl}`,
    `Source: ${output.downloadUrl}`,
    ...(output.fileName === undefined ? [] : [`File: ${output.fileName}`]),
    ...(output.encoding === undefined ? [] : [`Encoding: ${output.encoding}`]),
    `Output: ${output.outputPath}`,
    `Dry run: ${output.dryRun ? "yes" : "no"}`,
    `Bytes written: ${output.bytesWritten}`,
  ].join("\n");
}

function defaultFileName(subtitleUrl: string): string {
  const id = subtitleUrl.split("/").filter((segment) => segment.length > 0).at(-1);
  return `${id ?? "subtitle"}.srt`;
}
