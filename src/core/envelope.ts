import type { CliErrorCode } from "./errors.js";

export interface Meta {
  command: string;
  requestId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  verbose: boolean;
}

export interface CliSuccess<T> {
  ok: true;
  data: T;
  meta: Meta;
}

export interface CliError {
  ok: false;
  error: {
    code: CliErrorCode;
    message: string;
    details?: unknown;
  };
  meta?: Meta;
}

export type CliEnvelope<T> = CliSuccess<T> | CliError;

export function createSuccessEnvelope<T>(data: T, meta: Meta): CliSuccess<T> {
  return { ok: true, data, meta };
}

export function createErrorEnvelope(
  code: CliErrorCode,
  message: string,
  details?: unknown,
  meta?: Meta,
): CliError {
  const error = details === undefined ? { code, message } : { code, message, details };

  if (meta === undefined) {
    return { ok: false, error };
  }

  return { ok: false, error, meta };
}
