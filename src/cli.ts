import { stat, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { createRequire } from "node:module";

import {
  CliAppError,
  createCommandContext,
  createErrorEnvelope,
  createSuccessEnvelope,
  EXIT_CODES,
  loadConfig,
  mapErrorCodeToExitCode,
  toCliAppError,
  type ConfigEnv,
  type Logger,
} from "./core/index.js";

import { renderDownloadOutput, runDownloadCommand } from "./commands/download.js";
import { renderFetchOutput, runFetchCommand } from "./commands/fetch.js";
import { renderLanguagesOutput, runLanguagesCommand } from "./commands/languages.js";
import { isErrnoException } from "./commands/output.js";
import { renderSearchOutput, runSearchCommand } from "./commands/search.js";
import { renderSubtitlesOutput, runSubtitlesCommand } from "./commands/subtitles.js";
import { listLanguages, resolveLanguage } from "./domain/languages.js";
import { createSubsceneClient, type SubsceneClient } from "./domain/providers/subscene.js";
import {
  normalizeSubtitleRequest,
  normalizeYear,
  parseMovieFileName,
  parseMovieTitle,
} from "./domain/request-normalization.js";
import type { SubtitleFetchRequest, TitleQuery } from "./domain/types.js";

type FlagValue = string | string[] | boolean;

interface WritableLike {
  write(chunk: string): unknown;
}

export interface SubsceneCliDeps {
  site?: SubsceneClient;
  fetchImpl?: typeof fetch;
  env?: ConfigEnv;
  cwd?: () => string;
  stdout?: WritableLike;
  stderr?: WritableLike;
  fileWriter?: (path: string, content: Uint8Array) => Promise<void>;
  clock?: () => number;
  now?: () => Date;
  requestIdFactory?: () => string;
}

interface ParsedArgs {
  command: string | undefined;
  flags: Map<string, FlagValue>;
  positional: string[];
}

interface HelpTarget {
  command?: string;
}

interface VersionInfo {
  name: string;
  version: string;
}

interface DispatchResult {
  data: unknown;
  humanOutput: string;
}

interface TitleInput extends TitleQuery {
  directory?: string;
}

const SHORT_FLAG_ALIASES: Record<string, string> = {
  "-h": "help",
  "-V": "version",
  "-v": "verbose",
};

const DEFAULT_SUBTITLES_LIMIT = 10;
const DEFAULT_FETCH_LIMIT = 5;
const CLI_VERSION = loadVersionInfo();

export async function runCli(argv: string[], deps: SubsceneCliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const parsed = parseArgs(argv);
  const json = getBooleanFlag(parsed.flags, "json");
  const verbose = getBooleanFlag(parsed.flags, "verbose");

  const context = createCommandContext({
    command: parsed.command,
    clock: deps.clock,
    now: deps.now,
    requestIdFactory: deps.requestIdFactory,
    verbose,
    logStream: stderr,
  });

  if (hasFlag(parsed.flags, "version") || parsed.command === "version") {
    if (json) {
      stdout.write(`${JSON.stringify(createSuccessEnvelope(CLI_VERSION, context.toMeta()))}\n`);
    } else {
      stdout.write(`${CLI_VERSION.name} ${CLI_VERSION.version}\n`);
    }
    return EXIT_CODES.SUCCESS;
  }

  if (parsed.command === undefined || parsed.command === "help" || hasFlag(parsed.flags, "help")) {
    const helpTarget = resolveHelpTarget(parsed);
    const help = renderHelp(helpTarget.command);
    if (json) {
      const payload: Record<string, unknown> = {
        help,
      };
      if (helpTarget.command) {
        payload.command = helpTarget.command;
      }
      stdout.write(`${JSON.stringify(createSuccessEnvelope(payload, context.toMeta()))}\n`);
    } else {
      stdout.write(`${help}\n`);
    }
    return EXIT_CODES.SUCCESS;
  }

  try {
    const result = await dispatch(parsed, {
      getSite: createSiteFactory(deps, context.logger),
      fileWriter: deps.fileWriter ?? writeFile,
      cwd: deps.cwd ?? (() => process.cwd()),
      logger: context.logger,
    });

    if (json) {
      stdout.write(`${JSON.stringify(createSuccessEnvelope(result.data, context.toMeta()))}\n`);
    } else {
      stdout.write(`${result.humanOutput}\n`);
    }

    return EXIT_CODES.SUCCESS;
  } catch (error) {
    const appError = toCliAppError(error);
    const exitCode = mapErrorCodeToExitCode(appError.code);

    if (json) {
      stdout.write(
        `${JSON.stringify(
          createErrorEnvelope(appError.code, appError.message, appError.details, context.toMeta()),
        )}\n`,
      );
    } else {
      stderr.write(formatHumanError(appError));
    }

    return exitCode;
  }
}

interface DispatchDeps {
  getSite: () => SubsceneClient;
  fileWriter: (path: string, content: Uint8Array) => Promise<void>;
  cwd: () => string;
  logger: Logger;
}

async function dispatch(parsed: ParsedArgs, deps: DispatchDeps): Promise<DispatchResult> {
  if (parsed.positional.length > 0) {
    throw createArgumentError(
      "E_ARG_UNSUPPORTED",
      `${parsed.command ?? "command"} does not accept positional arguments`,
      {
        positional: parsed.positional,
      },
    );
  }

  switch (parsed.command) {
    case "languages":
      return dispatchLanguages();
    case "search":
      return dispatchSearch(parsed, deps);
    case "subtitles":
      return dispatchSubtitles(parsed, deps);
    case "download":
      return dispatchDownload(parsed, deps);
    case "fetch":
      return dispatchFetch(parsed, deps);
    default:
      throw createArgumentError("E_ARG_UNSUPPORTED", `Unknown command: ${parsed.command}`, {
        command: parsed.command,
      });
  }
}

function dispatchLanguages(): DispatchResult {
  const output = runLanguagesCommand(listLanguages());
  return {
    data: output,
    humanOutput: renderLanguagesOutput(output),
  };
}

async function dispatchSearch(parsed: ParsedArgs, deps: DispatchDeps): Promise<DispatchResult> {
  const title = getRequiredString(parsed.flags, "title");
  const yearValue = getOptionalString(parsed.flags, "year");
  const year = yearValue === undefined ? undefined : normalizeYear(yearValue);

  const output = await runSearchCommand({
    site: deps.getSite(),
    title: title.trim(),
    year,
  });

  return {
    data: output,
    humanOutput: renderSearchOutput(output),
  };
}

async function dispatchSubtitles(parsed: ParsedArgs, deps: DispatchDeps): Promise<DispatchResult> {
  const titleInput = getTitleInput(parsed.flags);
  const request = buildRequest(parsed.flags, titleInput);
  const limit = getPositiveInteger(parsed.flags, "limit", DEFAULT_SUBTITLES_LIMIT);

  const output = await runSubtitlesCommand({
    site: deps.getSite(),
    request,
    limit,
    logger: deps.logger,
  });

  return {
    data: output,
    humanOutput: renderSubtitlesOutput(output),
  };
}

async function dispatchDownload(parsed: ParsedArgs, deps: DispatchDeps): Promise<DispatchResult> {
  const subtitleUrl = getRequiredString(parsed.flags, "url");
  const language = resolveLanguage(getRequiredString(parsed.flags, "lang"));
  const outputPath = getRequiredString(parsed.flags, "output");
  const dryRun = getBooleanFlag(parsed.flags, "dry-run");

  const output = await runDownloadCommand({
    site: deps.getSite(),
    subtitleUrl,
    language,
    outputPath,
    dryRun,
    writeFile: deps.fileWriter,
    resolveOutputPath: resolveDownloadOutputPath,
    logger: deps.logger,
  });

  return {
    data: output,
    humanOutput: renderDownloadOutput(output),
  };
}

async function dispatchFetch(parsed: ParsedArgs, deps: DispatchDeps): Promise<DispatchResult> {
  const titleInput = getTitleInput(parsed.flags);
  const request = buildRequest(parsed.flags, titleInput);
  const outputPath = getOptionalString(parsed.flags, "output");
  const dryRun = getBooleanFlag(parsed.flags, "dry-run");
  const limit = getPositiveInteger(parsed.flags, "limit", DEFAULT_FETCH_LIMIT);

  const output = await runFetchCommand({
    site: deps.getSite(),
    request,
    outputPath,
    outputDirectory: titleInput.directory ?? deps.cwd(),
    dryRun,
    limit,
    writeFile: deps.fileWriter,
    resolveOutputPath: resolveDownloadOutputPath,
    logger: deps.logger,
  });

  return {
    data: output,
    humanOutput: renderFetchOutput(output),
  };
}

function createSiteFactory(deps: SubsceneCliDeps, logger: Logger): () => SubsceneClient {
  let site = deps.site;

  return () => {
    if (site === undefined) {
      const config = loadConfig(deps.env ?? process.env);
      site = createSubsceneClient({
        baseUrl: config.baseUrl,
        timeoutMs: config.timeoutMs,
        userAgent: config.userAgent,
        fetchImpl: deps.fetchImpl,
        logger,
      });
    }

    return site;
  };
}

function getTitleInput(flags: Map<string, FlagValue>): TitleInput {
  const title = getOptionalString(flags, "title");
  const movie = getOptionalString(flags, "movie");
  const file = getOptionalString(flags, "file");
  const provided = [
    title === undefined ? undefined : "title",
    movie === undefined ? undefined : "movie",
    file === undefined ? undefined : "file",
  ].filter((item): item is string => item !== undefined);

  if (provided.length > 1) {
    throw createArgumentError("E_ARG_CONFLICT", "Use only one of --title, --movie or --file", {
      args: provided,
    });
  }

  if (movie !== undefined) {
    return parseMovieTitle(movie);
  }

  if (file !== undefined) {
    const parsed = parseMovieFileName(file);
    return { title: parsed.title, year: parsed.year, directory: parsed.directory };
  }

  if (title === undefined) {
    throw createArgumentError("E_ARG_MISSING", "--title, --movie or --file is required", {
      arg: "title",
    });
  }

  return { title, year: getRequiredString(flags, "year") };
}

function buildRequest(flags: Map<string, FlagValue>, titleInput: TitleInput): SubtitleFetchRequest {
  return normalizeSubtitleRequest({
    title: titleInput.title,
    year: titleInput.year,
    language: getRequiredString(flags, "lang"),
    tags: splitCommaSeparated(getStringValues(flags, "tags")),
    release: getOptionalString(flags, "release"),
    minRating: getOptionalString(flags, "min-rating"),
    source: getOptionalString(flags, "source"),
    hearingImpaired: getOptionalString(flags, "hi"),
    foreignOnly: getBooleanFlag(flags, "foreign-only"),
  });
}

async function resolveDownloadOutputPath(path: string, fileName: string): Promise<string> {
  try {
    const fileStat = await stat(path);
    if (fileStat.isDirectory()) {
      return join(path, basename(fileName));
    }
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "ENOENT") {
      throw error;
    }
  }

  return path;
}

function parseArgs(argv: string[]): ParsedArgs {
  let command: string | undefined;
  const flags = new Map<string, FlagValue>();
  const positional: string[] = [];

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (token === undefined) {
      continue;
    }

    const shortAlias = SHORT_FLAG_ALIASES[token];
    if (shortAlias !== undefined) {
      flags.set(shortAlias, true);
      continue;
    }

    if (token.startsWith("--")) {
      const stripped = token.slice(2);
      const eqIndex = stripped.indexOf("=");
      if (eqIndex >= 0) {
        const key = stripped.slice(0, eqIndex);
        const value = stripped.slice(eqIndex + 1);
        appendFlagValue(flags, key, value);
        continue;
      }

      const next = argv[index + 1];
      if (next !== undefined && !next.startsWith("-")) {
        appendFlagValue(flags, stripped, next);
        index += 1;
        continue;
      }

      flags.set(stripped, true);
      continue;
    }

    if (command === undefined) {
      command = token;
      continue;
    }

    positional.push(token);
  }

  return {
    command,
    flags,
    positional,
  };
}

function hasFlag(flags: Map<string, FlagValue>, key: string): boolean {
  return flags.has(key);
}

function appendFlagValue(flags: Map<string, FlagValue>, key: string, value: string): void {
  const previous = flags.get(key);
  if (previous === undefined) {
    flags.set(key, value);
    return;
  }

  if (Array.isArray(previous)) {
    flags.set(key, [...previous, value]);
    return;
  }

  if (typeof previous === "string") {
    flags.set(key, [previous, value]);
    return;
  }

  flags.set(key, value);
}

function getBooleanFlag(flags: Map<string, FlagValue>, key: string): boolean {
  const value = flags.get(key);
  if (value === undefined) {
    return false;
  }

  if (typeof value === "boolean") {
    return value;
  }

  const candidate = Array.isArray(value) ? value.at(-1) : value;
  if (candidate === "true") {
    return true;
  }

  if (candidate === "false") {
    return false;
  }

  throw createArgumentError("E_ARG_INVALID", `--${key} must be true or false`, {
    arg: key,
    value: candidate,
  });
}

function getRequiredString(flags: Map<string, FlagValue>, key: string): string {
  const value = getOptionalString(flags, key);
  if (value === undefined || value.trim().length === 0) {
    throw createArgumentError("E_ARG_MISSING", `--${key} is required`, {
      arg: key,
    });
  }

  return value;
}

function getOptionalString(flags: Map<string, FlagValue>, key: string): string | undefined {
  const value = flags.get(key);

  if (value === undefined || typeof value === "boolean") {
    return undefined;
  }

  if (Array.isArray(value)) {
    const candidate = value.at(-1);
    return candidate !== undefined && candidate.trim().length > 0 ? candidate : undefined;
  }

  return value.trim().length > 0 ? value : undefined;
}

function getStringValues(flags: Map<string, FlagValue>, key: string): string[] {
  const value = flags.get(key);

  if (value === undefined || typeof value === "boolean") {
    return [];
  }

  const values = Array.isArray(value) ? value : [value];
  return values.filter((item) => item.trim().length > 0);
}

function getPositiveInteger(flags: Map<string, FlagValue>, key: string, fallback: number): number {
  const value = getOptionalString(flags, key);
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw createArgumentError("E_ARG_INVALID", `--${key} must be a positive integer`, {
      arg: key,
      value,
    });
  }

  return parsed;
}

function splitCommaSeparated(values: string[]): string[] {
  return values
    .flatMap((item) => item.split(","))
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function resolveHelpTarget(parsed: ParsedArgs): HelpTarget {
  if (parsed.command === "help") {
    return {
      command: parsed.positional[0],
    };
  }

  if (hasFlag(parsed.flags, "help")) {
    return {
      command: parsed.command,
    };
  }

  return {};
}

const TITLE_USAGE = '(--title <text> --year <yyyy> | --movie "<Title (Year)>" | --file <movie file>)';
const FILTER_USAGE =
  "--lang <code|id> [--tags <a,b>] [--release <name>] [--source bluray|web] [--min-rating bad|neutral|positive] [--hi any|only|none] [--foreign-only]";

function renderHelp(command?: string): string {
  if (command === "search") {
    return [
      "subscene-dl search",
      "",
      "Usage:",
      "  subscene-dl search --title <text> [--year <yyyy>] [--json]",
    ].join("\n");
  }

  if (command === "subtitles") {
    return [
      "subscene-dl subtitles",
      "",
      "Usage:",
      `  subscene-dl subtitles ${TITLE_USAGE} ${FILTER_USAGE} [--limit <n, default 10>] [--json]`,
    ].join("\n");
  }

  if (command === "fetch") {
    return [
      "subscene-dl fetch",
      "",
      "Usage:",
      `  subscene-dl fetch ${TITLE_USAGE} ${FILTER_USAGE} [--output <path|directory>] [--limit <n, default 5>] [--dry-run] [--json]`,
      "Notes:",
      "  fetch = search + title match + filtered subtitle list + download of the first candidate",
      '  default output: "<Title> (<Year>).<lang>.srt" next to --file, else in the working directory',
    ].join("\n");
  }

  if (command === "download") {
    return [
      "subscene-dl download",
      "",
      "Usage:",
      "  subscene-dl download --url <subtitle page url> --lang <code|id> --output <path|directory> [--dry-run] [--json]",
    ].join("\n");
  }

  if (command === "languages") {
    return ["subscene-dl languages", "", "Usage:", "  subscene-dl languages [--json]"].join("\n");
  }

  if (command === "version") {
    return ["subscene-dl version", "", "Usage:", "  subscene-dl version [--json]"].join("\n");
  }

  return [
    "subscene-dl",
    "",
    "Usage:",
    "  subscene-dl [--help|-h] [--version|-V]",
    "  subscene-dl help [command]",
    "  subscene-dl version [--json]",
    "  subscene-dl languages [--json]",
    "  subscene-dl search --title <text> [--year <yyyy>] [--json]",
    `  subscene-dl subtitles ${TITLE_USAGE} ${FILTER_USAGE} [--limit <n>] [--json]`,
    `  subscene-dl fetch ${TITLE_USAGE} ${FILTER_USAGE} [--output <path|directory>] [--dry-run] [--json]`,
    "  subscene-dl download --url <subtitle page url> --lang <code|id> --output <path|directory> [--dry-run] [--json]",
    "",
    "Flags:",
    "  -h, --help      Show help",
    "  -V, --version   Show CLI version",
    "  --json          Output CliEnvelope JSON",
    "  --dry-run       Resolve the download link without downloading or writing files",
    "  -v, --verbose   Log each step to stderr",
    "",
    "Environment:",
    "  SUBSCENE_BASE_URL, SUBSCENE_TIMEOUT_MS, SUBSCENE_USER_AGENT (also read from .env)",
  ].join("\n");
}

function loadVersionInfo(): VersionInfo {
  try {
    const require = createRequire(import.meta.url);
    const pkg: unknown = require("../package.json");
    const name: unknown = typeof pkg === "object" && pkg !== null ? Reflect.get(pkg, "name") : undefined;
    const version: unknown =
      typeof pkg === "object" && pkg !== null ? Reflect.get(pkg, "version") : undefined;
    return {
      name: typeof name === "string" ? name : "subscene-dl",
      version: typeof version === "string" ? version : "0.0.0",
    };
  } catch {
    return {
      name: "subscene-dl",
      version: "0.0.0",
    };
  }
}

function createArgumentError(
  code: "E_ARG_INVALID" | "E_ARG_MISSING" | "E_ARG_CONFLICT" | "E_ARG_UNSUPPORTED",
  message: string,
  details?: unknown,
): CliAppError {
  return new CliAppError({
    code,
    message,
    details,
  });
}

function formatHumanError(error: CliAppError): string {
  const details = error.details === undefined ? "" : `\nDetails: ${JSON.stringify(error.details)}`;
  return `Error (${error.code}): ${error.message}${details}\n`;
}
