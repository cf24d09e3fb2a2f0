import { CliAppError } from "../core/index.js";

import type { PayloadOutcome } from "../domain/payload.js";
import type { SelectionOutcome } from "../domain/pipeline.js";

type SoftSelectionOutcome = Exclude<SelectionOutcome, { status: "selected" }>;
type SoftPayloadOutcome = Exclude<PayloadOutcome, { status: "ok" }>;

/** Turns an anticipated "nothing found" outcome into the CLI's not-found error. */
export function outcomeToError(outcome: SoftSelectionOutcome | SoftPayloadOutcome): CliAppError {
  switch (outcome.status) {
    case "no-match":
      return new CliAppError({
        code: "E_NOT_FOUND_TITLE",
        message: "No title matched the search",
        details: {
          categories: {
            exact: outcome.results.exact?.length ?? null,
            close: outcome.results.close?.length ?? null,
            popular: outcome.results.popular?.length ?? null,
          },
        },
      });
    case "no-subtitles":
      return new CliAppError({
        code: "E_NOT_FOUND_SUBTITLES",
        message: `No subtitles are listed for ${outcome.title.displayTitle} in this language`,
        details: { title: outcome.title.url },
      });
    case "none-after-filter":
      return new CliAppError({
        code: "E_NOT_FOUND_FILTERED",
        message: `None of the ${outcome.total} subtitles for ${outcome.title.displayTitle} passed the tag and rating filters`,
        details: { title: outcome.title.url, total: outcome.total },
      });
    case "no-download-link":
      return new CliAppError({
        code: "E_NOT_FOUND_DOWNLOAD_LINK",
        message: "Subtitle page has no download link",
        details: { subtitleUrl: outcome.subtitleUrl },
      });
    case "no-subtitle-file":
      return new CliAppError({
        code: "E_NOT_FOUND_SUBTITLE_FILE",
        message: "Subtitle archive contains no subtitle file",
        details: { downloadUrl: outcome.downloadUrl, entries: outcome.entries },
      });
    case "multi-file-pack":
      return new CliAppError({
        code: "E_PAYLOAD_MULTI_FILE",
        message: `Subtitle archive contains ${outcome.files.length} subtitle files; multi-file packs are not supported`,
        details: { downloadUrl: outcome.downloadUrl, files: outcome.files },
      });
  }
}
