import { CliAppError } from "./errors.js";

export interface SubsceneConfig {
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
}

export type ConfigEnv = Record<string, string | undefined>;

export const DEFAULT_BASE_URL = "https://subscene.com";
export const DEFAULT_TIMEOUT_MS = 12_000;
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export function loadConfig(env: ConfigEnv = process.env): SubsceneConfig {
  return {
    baseUrl: readBaseUrl(env.SUBSCENE_BASE_URL),
    timeoutMs: readTimeout(env.SUBSCENE_TIMEOUT_MS),
    userAgent: readString(env.SUBSCENE_USER_AGENT) ?? DEFAULT_USER_AGENT,
  };
}

function readBaseUrl(value: string | undefined): string {
  const raw = readString(value);
  if (raw === undefined) {
    return DEFAULT_BASE_URL;
  }

  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch (error) {
    throw new CliAppError({
      code: "E_CONFIG_INVALID",
      message: "SUBSCENE_BASE_URL must be an absolute http(s) URL",
      details: { variable: "SUBSCENE_BASE_URL", value: raw },
      cause: error,
    });
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new CliAppError({
      code: "E_CONFIG_INVALID",
      message: "SUBSCENE_BASE_URL must be an absolute http(s) URL",
      details: { variable: "SUBSCENE_BASE_URL", value: raw },
    });
  }

  return raw.replace(/\/+$/u, "");
}

function readTimeout(value: string | undefined): number {
  const raw = readString(value);
  if (raw === undefined) {
    return DEFAULT_TIMEOUT_MS;
  }

  const parsed = Number.parseInt(raw, 10);
  if (!/^\d+$/u.test(raw) || parsed <= 0) {
    throw new CliAppError({
      code: "E_CONFIG_INVALID",
      message: "SUBSCENE_TIMEOUT_MS must be a positive integer",
      details: { variable: "SUBSCENE_TIMEOUT_MS", value: raw },
    });
  }

  return parsed;
}

function readString(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}
