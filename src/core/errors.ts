export const CLI_ERROR_CODES = [
  "E_ARG_INVALID",
  "E_ARG_MISSING",
  "E_ARG_CONFLICT",
  "E_ARG_UNSUPPORTED",
  "E_CONFIG_INVALID",
  "E_NOT_FOUND_TITLE",
  "E_NOT_FOUND_SUBTITLES",
  "E_NOT_FOUND_FILTERED",
  "E_NOT_FOUND_DOWNLOAD_LINK",
  "E_NOT_FOUND_SUBTITLE_FILE",
  "E_UPSTREAM_NETWORK",
  "E_UPSTREAM_TIMEOUT",
  "E_UPSTREAM_BAD_RESPONSE",
  "E_UPSTREAM_RATE_LIMITED",
  "E_UPSTREAM_MALFORMED_PAGE",
  "E_PAYLOAD_BAD_ARCHIVE",
  "E_PAYLOAD_MULTI_FILE",
  "E_PAYLOAD_DECODE",
  "E_UNKNOWN",
] as const;

export type CliErrorCode = (typeof CLI_ERROR_CODES)[number];

export interface CliAppErrorOptions {
  code: CliErrorCode;
  message: string;
  details?: unknown;
  cause?: unknown;
}

export class CliAppError extends Error {
  public readonly code: CliErrorCode;
  public readonly details?: unknown;

  public constructor(options: CliAppErrorOptions) {
    super(options.message, { cause: options.cause });
    this.name = "CliAppError";
    this.code = options.code;
    this.details = options.details;
  }
}

export function isCliAppError(value: unknown): value is CliAppError {
  return value instanceof CliAppError;
}

export function toCliAppError(value: unknown): CliAppError {
  if (isCliAppError(value)) {
    return value;
  }

  if (value instanceof Error) {
    return new CliAppError({
      code: "E_UNKNOWN",
      message: value.message,
      details: { name: value.name },
      cause: value,
    });
  }

  return new CliAppError({
    code: "E_UNKNOWN",
    message: "Unknown error",
    details: value,
  });
}
