import { unzipSync } from "fflate";

import { CliAppError, silentLogger, type Logger } from "../core/index.js";

import { isArabic } from "./languages.js";
import type { SubsceneClient } from "./providers/subscene.js";
import type { LanguageEntry } from "./types.js";

export const SUBTITLE_FILE_SUFFIXES = [
  ".srt",
  ".srt.style",
  ".sub",
  ".txt",
  ".ssa",
  ".ass",
  ".smi",
] as const;

/** Tried after UTF-8 fails, for Arabic uploads only. */
const ARABIC_FALLBACK_ENCODINGS = ["windows-1256", "utf-16le"] as const;

export interface SubtitleEntry {
  name: string;
  content: Uint8Array;
}

export interface DecodedSubtitle {
  text: string;
  encoding: string;
}

export type PayloadOutcome =
  | {
      status: "ok";
      subtitleUrl: string;
      downloadUrl: string;
      fileName: string;
      encoding: string;
      text: string;
    }
  | { status: "no-download-link"; subtitleUrl: string }
  | { status: "no-subtitle-file"; subtitleUrl: string; downloadUrl: string; entries: string[] }
  | { status: "multi-file-pack"; subtitleUrl: string; downloadUrl: string; files: string[] };

export type PayloadSite = Pick<SubsceneClient, "findDownloadUrl" | "downloadArchive">;

export interface RetrieveSubtitleOptions {
  logger?: Logger;
}

export async function retrieveSubtitle(
  site: PayloadSite,
  subtitleUrl: string,
  language: LanguageEntry,
  options: RetrieveSubtitleOptions = {},
): Promise<PayloadOutcome> {
  const logger = options.logger ?? silentLogger;

  const downloadUrl = await site.findDownloadUrl(subtitleUrl);
  if (downloadUrl === null) {
    return { status: "no-download-link", subtitleUrl };
  }

  const archive = await site.downloadArchive(downloadUrl, subtitleUrl);
  const { entries, names } = readArchive(archive, downloadUrl);
  logger.debug("archive opened", { entries: names.length, subtitles: entries.length });

  const [entry] = entries;
  if (entry === undefined) {
    return { status: "no-subtitle-file", subtitleUrl, downloadUrl, entries: names };
  }

  if (entries.length > 1) {
    return {
      status: "multi-file-pack",
      subtitleUrl,
      downloadUrl,
      files: entries.map((item) => item.name),
    };
  }

  const decoded = decodeSubtitleText(entry.content, language);
  logger.debug("subtitle decoded", { file: entry.name, encoding: decoded.encoding });

  return {
    status: "ok",
    subtitleUrl,
    downloadUrl,
    fileName: entry.name,
    encoding: decoded.encoding,
    text: decoded.text,
  };
}

export function isSubtitleFileName(name: string): boolean {
  return SUBTITLE_FILE_SUFFIXES.some((suffix) => name.endsWith(suffix));
}

export function extractSubtitleEntries(archive: Uint8Array): SubtitleEntry[] {
  return readArchive(archive).entries;
}

/**
 * UTF-8 first (a BOM is dropped). Arabic uploads are often in the Windows
 * Arabic code page or UTF-16, so only Arabic gets the fallback chain.
 */
export function decodeSubtitleText(bytes: Uint8Array, language: LanguageEntry): DecodedSubtitle {
  const attempts: string[] = ["utf-8"];
  if (isArabic(language)) {
    attempts.push(...ARABIC_FALLBACK_ENCODINGS);
  }

  const failures: Array<{ encoding: string; reason: string }> = [];

  for (const encoding of attempts) {
    try {
      const decoder = new TextDecoder(encoding, { fatal: true });
      return { text: decoder.decode(bytes), encoding };
    } catch (error) {
      failures.push({
        encoding,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  throw new CliAppError({
    code: "E_PAYLOAD_DECODE",
    message: `Unable to decode subtitle text (tried ${attempts.join(", ")})`,
    details: {
      language: language.code ?? language.id,
      failures,
    },
  });
}

function readArchive(
  archive: Uint8Array,
  source?: string,
): { entries: SubtitleEntry[]; names: string[] } {
  let files: Record<string, Uint8Array>;
  try {
    files = unzipSync(archive);
  } catch (error) {
    throw new CliAppError({
      code: "E_PAYLOAD_BAD_ARCHIVE",
      message: "Downloaded subtitle archive is not a readable zip file",
      details: {
        source,
        bytes: archive.byteLength,
        reason: error instanceof Error ? error.message : String(error),
      },
      cause: error,
    });
  }

  const names = Object.keys(files).filter((name) => !name.endsWith("/"));
  const entries = names.flatMap((name) => {
    const content = files[name];
    return content !== undefined && isSubtitleFileName(name) ? [{ name, content }] : [];
  });

  return { entries, names };
}
