import { CliAppError, silentLogger, type Logger } from "../../core/index.js";
import { detectRateLimit } from "./subscene-parser.js";

export interface UpstreamClientOptions {
  providerId: string;
  baseUrl: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  userAgent?: string;
  logger?: Logger;
}

export interface UpstreamRequestOptions {
  pathOrUrl: string;
  method?: "GET" | "POST";
  headers?: RequestInit["headers"];
  body?: RequestInit["body"];
  /** Cookies for this request only; they are never stored in the session. */
  cookies?: Record<string, string>;
}

export interface ClassifiedResponseErrorDetails {
  provider: string;
  url: string;
  status: number;
  classification: "rate-limit" | "anti-bot" | "bad-response";
  snippet?: string;
}

/**
 * One session against the upstream site. Cookies the server sets are kept for
 * later requests to the same origin; nothing is ever retried.
 */
export class UpstreamClient {
  private readonly providerId: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly userAgent: string;
  private readonly logger: Logger;
  private readonly cookieJar = new Map<string, string>();
  private readonly baseOrigin: string;

  public constructor(options: UpstreamClientOptions) {
    this.providerId = options.providerId;
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.timeoutMs = normalizePositiveInt(options.timeoutMs, 12_000);
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch;
    this.userAgent = options.userAgent ?? "subscene-dl";
    this.logger = options.logger ?? silentLogger;
    this.baseOrigin = new URL(this.baseUrl).origin;

    if (typeof this.fetchImpl !== "function") {
      throw new CliAppError({
        code: "E_UNKNOWN",
        message: "Global fetch is unavailable. Use Node 20+ or provide fetchImpl.",
      });
    }
  }

  public get origin(): string {
    return this.baseOrigin;
  }

  public resolve(pathOrUrl: string): URL {
    return resolveUrl(this.baseUrl, pathOrUrl);
  }

  public async requestText(options: UpstreamRequestOptions): Promise<string> {
    const response = await this.request(options);
    return response.text();
  }

  public async requestBinary(options: UpstreamRequestOptions): Promise<Uint8Array> {
    const response = await this.request(options);
    const buffer = await response.arrayBuffer();
    return new Uint8Array(buffer);
  }

  public async request(options: UpstreamRequestOptions): Promise<Response> {
    const url = this.resolve(options.pathOrUrl);
    const method = options.method ?? "GET";
    this.logger.debug("upstream request", { provider: this.providerId, method, url: url.toString() });

    let response: Response;
    try {
      response = await this.fetchWithTimeout(url, options);
    } catch (error) {
      throw mapFetchError(error, this.providerId, url, this.timeoutMs);
    }

    this.mergeResponseCookies(url, response.headers);
    this.logger.debug("upstream response", { provider: this.providerId, status: response.status });

    if (response.ok) {
      return response;
    }

    const snippet = await readSnippet(response);
    throw classifyResponseError(this.providerId, url, response.status, snippet);
  }

  private async fetchWithTimeout(url: URL, options: UpstreamRequestOptions): Promise<Response> {
    const headers = new Headers(options.headers);
    if (!headers.has("user-agent")) {
      headers.set("user-agent", this.userAgent);
    }

    if (url.origin === this.baseOrigin) {
      const cookie = this.serializeCookies(options.cookies);
      if (cookie.length > 0) {
        headers.set("cookie", cookie);
      }
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await this.fetchImpl(url, {
        method: options.method ?? "GET",
        headers,
        body: options.body,
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  private mergeResponseCookies(url: URL, headers: Headers): void {
    if (url.origin !== this.baseOrigin) {
      return;
    }

    for (const cookie of headers.getSetCookie()) {
      mergeCookie(this.cookieJar, cookie);
    }
  }

  private serializeCookies(extra: Record<string, string> | undefined): string {
    const merged = new Map(this.cookieJar);
    for (const [name, value] of Object.entries(extra ?? {})) {
      merged.set(name, value);
    }

    return Array.from(merged.entries())
      .map(([name, value]) => `${name}=${value}`)
      .join("; ");
  }
}

export function classifyResponseError(
  providerId: string,
  url: URL,
  status: number,
  snippet: string,
): CliAppError {
  const classification = classifyResponse(status, snippet);

  return new CliAppError({
    code: classification === "rate-limit" ? "E_UPSTREAM_RATE_LIMITED" : "E_UPSTREAM_BAD_RESPONSE",
    message: `${providerId} upstream returned HTTP ${status}`,
    details: {
      provider: providerId,
      url: url.toString(),
      status,
      classification,
      snippet,
    } satisfies ClassifiedResponseErrorDetails,
  });
}

export function classifyResponse(
  status: number,
  snippet: string,
): ClassifiedResponseErrorDetails["classification"] {
  if (status === 429 || detectRateLimit(snippet)) {
    return "rate-limit";
  }

  if (status === 403 || status === 401 || looksLikeAntiBotChallenge(snippet)) {
    return "anti-bot";
  }

  return "bad-response";
}

export function looksLikeAntiBotChallenge(text: string): boolean {
  const snippet = text.toLowerCase();
  return [
    "challenge-platform",
    "cf-challenge",
    "captcha",
    "attention required",
    "just a moment",
  ].some((needle) => snippet.includes(needle));
}

function mapFetchError(
  error: unknown,
  providerId: string,
  url: URL,
  timeoutMs: number,
): CliAppError {
  if (error instanceof CliAppError) {
    return error;
  }

  if (isAbortError(error)) {
    return new CliAppError({
      code: "E_UPSTREAM_TIMEOUT",
      message: `${providerId} upstream request timed out after ${timeoutMs}ms`,
      details: {
        provider: providerId,
        url: url.toString(),
        timeoutMs,
      },
      cause: error,
    });
  }

  return new CliAppError({
    code: "E_UPSTREAM_NETWORK",
    message: `Failed to reach ${providerId} upstream`,
    details: {
      provider: providerId,
      url: url.toString(),
      reason: error instanceof Error ? error.message : String(error),
    },
    cause: error,
  });
}

function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  return error.name === "AbortError" || error.name === "TimeoutError";
}

function normalizeBaseUrl(value: string): string {
  const normalized = value.trim();
  if (normalized.length === 0) {
    return "https://subscene.com/";
  }

  return normalized.endsWith("/") ? normalized : `${normalized}/`;
}

function resolveUrl(baseUrl: string, pathOrUrl: string): URL {
  if (/^https?:\/\//iu.test(pathOrUrl)) {
    return new URL(pathOrUrl);
  }

  return new URL(pathOrUrl, baseUrl);
}

function normalizePositiveInt(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }

  return Math.floor(value);
}

async function readSnippet(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return collapseWhitespace(text).slice(0, 320);
  } catch {
    return "";
  }
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function mergeCookie(cookieJar: Map<string, string>, raw: string): void {
  const firstSegment = raw.split(";", 1)[0]?.trim();
  if (firstSegment === undefined || firstSegment.length === 0) {
    return;
  }

  const eqIndex = firstSegment.indexOf("=");
  if (eqIndex <= 0) {
    return;
  }

  const name = firstSegment.slice(0, eqIndex).trim();
  const value = firstSegment.slice(eqIndex + 1).trim();

  if (name.length === 0) {
    return;
  }

  if (value.length === 0 || value === "deleted") {
    cookieJar.delete(name);
    return;
  }

  cookieJar.set(name, value);
}
