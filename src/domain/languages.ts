import { readFileSync } from "node:fs";

import { iso6393 } from "iso-639-3";

import { CliAppError } from "../core/index.js";

import type { LanguageEntry, ResolvedLanguage } from "./types.js";

const LANGUAGE_TABLE_URL = new URL("../../data/languages.json", import.meta.url);

/** Brazilian Portuguese has no ISO 639 code of its own on the site. */
const REGIONAL_ALIASES: Record<string, string> = {
  "pt-br": "pt-br",
  pt_br: "pt-br",
};

export const ARABIC_LANGUAGE_ID = 2;

const LANGUAGES: readonly LanguageEntry[] = loadLanguageTable();
const BY_ID = new Map(LANGUAGES.map((entry) => [entry.id, entry]));
const BY_CODE = new Map(
  LANGUAGES.flatMap((entry) => (entry.code === null ? [] : [[entry.code, entry] as const])),
);

const ISO_639_2B_TO_1 = new Map(
  iso6393.flatMap((language) =>
    language.iso6392B === undefined
      ? []
      : [[language.iso6392B, language.iso6391 ?? language.iso6392B] as const],
  ),
);

const ISO_639_1 = new Set(
  iso6393.flatMap((language) => (language.iso6391 === undefined ? [] : [language.iso6391])),
);

export function listLanguages(): LanguageEntry[] {
  return [...LANGUAGES];
}

export function findLanguageById(id: number): LanguageEntry | undefined {
  return BY_ID.get(id);
}

export function findLanguageByCode(code: string): LanguageEntry | undefined {
  return BY_CODE.get(code.trim().toLowerCase());
}

/**
 * Accepts a site language id, an ISO 639-1 code, an ISO 639-2/B code or
 * `pt-br`.
 */
export function resolveLanguage(input: string | number): ResolvedLanguage {
  if (typeof input === "number") {
    return resolveLanguageId(input, String(input));
  }

  const normalized = input.trim().toLowerCase();

  if (/^\d+$/u.test(normalized)) {
    return resolveLanguageId(Number.parseInt(normalized, 10), input);
  }

  const regional = REGIONAL_ALIASES[normalized];
  if (regional !== undefined) {
    return { entry: requireCode(regional, input), code: regional };
  }

  if (/^[a-z]{2}$/u.test(normalized) && ISO_639_1.has(normalized)) {
    return { entry: requireCode(normalized, input), code: normalized };
  }

  if (/^[a-z]{3}$/u.test(normalized)) {
    const part1 = ISO_639_2B_TO_1.get(normalized);
    if (part1 !== undefined) {
      return { entry: requireCode(part1, input), code: normalized };
    }
  }

  throw new CliAppError({
    code: "E_ARG_INVALID",
    message: "The language code is not a valid ISO 639-1 or ISO 639-2/B code",
    details: {
      arg: "lang",
      value: input,
    },
  });
}

export function isArabic(language: LanguageEntry): boolean {
  return language.id === ARABIC_LANGUAGE_ID;
}

function resolveLanguageId(id: number, input: string): ResolvedLanguage {
  const entry = findLanguageById(id);
  if (entry === undefined) {
    throw new CliAppError({
      code: "E_ARG_UNSUPPORTED",
      message: `Unknown subscene language id: ${input}`,
      details: {
        arg: "lang",
        value: input,
      },
    });
  }

  return { entry, code: entry.code };
}

function requireCode(code: string, input: string): LanguageEntry {
  const entry = BY_CODE.get(code);
  if (entry === undefined) {
    throw new CliAppError({
      code: "E_ARG_UNSUPPORTED",
      message: "The language code is not supported by subscene.com",
      details: {
        arg: "lang",
        value: input,
      },
    });
  }

  return entry;
}

function loadLanguageTable(): LanguageEntry[] {
  const raw: unknown = JSON.parse(readFileSync(LANGUAGE_TABLE_URL, "utf8"));
  if (!Array.isArray(raw)) {
    throw new Error("languages.json must contain an array");
  }

  return raw.map((item: unknown, index) => {
    if (!isLanguageEntry(item)) {
      throw new Error(`languages.json entry ${index} is malformed`);
    }

    return { id: item.id, code: item.code, name: item.name };
  });
}

function isLanguageEntry(value: unknown): value is LanguageEntry {
  if (typeof value !== "object" || value === null) {
    return false;
  }

  const id: unknown = Reflect.get(value, "id");
  const code: unknown = Reflect.get(value, "code");
  const name: unknown = Reflect.get(value, "name");

  return (
    typeof id === "number" &&
    Number.isInteger(id) &&
    (code === null || typeof code === "string") &&
    typeof name === "string"
  );
}
