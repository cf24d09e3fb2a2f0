import { describe, expect, it } from "vitest";

import {
  findLanguageByCode,
  isArabic,
  listLanguages,
  resolveLanguage,
} from "../src/domain/languages.js";

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }

  throw new Error("expected the call to throw");
}

describe("language table", () => {
  it("loads every site language with unique ids", () => {
    const languages = listLanguages();
    const ids = new Set(languages.map((language) => language.id));

    expect(languages).toHaveLength(76);
    expect(ids.size).toBe(76);
    expect(languages[0]).toEqual({ id: 1, code: "sq", name: "Albanian" });
  });

  it("finds entries by code", () => {
    expect(findLanguageByCode("EN")).toEqual({ id: 13, code: "en", name: "English" });
    expect(findLanguageByCode("xx")).toBeUndefined();
  });
});

describe("language resolution", () => {
  it("resolves ISO 639-1 codes", () => {
    expect(resolveLanguage("en")).toEqual({
      entry: { id: 13, code: "en", name: "English" },
      code: "en",
    });
    expect(resolveLanguage(" HE ").entry.name).toBe("Hebrew");
  });

  it("resolves ISO 639-2/B codes and keeps the caller's code", () => {
    expect(resolveLanguage("eng")).toEqual({
      entry: { id: 13, code: "en", name: "English" },
      code: "eng",
    });
    expect(resolveLanguage("ara").entry.id).toBe(2);
    expect(resolveLanguage("mni")).toEqual({
      entry: { id: 65, code: "mni", name: "Manipuri" },
      code: "mni",
    });
  });

  it("resolves Brazilian Portuguese by its regional code", () => {
    expect(resolveLanguage("pt-BR")).toEqual({
      entry: { id: 4, code: "pt-br", name: "Brazilian Portuguese" },
      code: "pt-br",
    });
    expect(resolveLanguage("pt").entry.id).toBe(32);
  });

  it("passes site ids through", () => {
    expect(resolveLanguage(13).code).toBe("en");
    expect(resolveLanguage("3")).toEqual({
      entry: { id: 3, code: null, name: "Big 5 code" },
      code: null,
    });
  });

  it("rejects ids the site does not have", () => {
    expect(captureError(() => resolveLanguage("14"))).toMatchObject({
      code: "E_ARG_UNSUPPORTED",
      details: { arg: "lang", value: "14" },
    });
  });

  it("rejects valid codes the site does not offer", () => {
    expect(captureError(() => resolveLanguage("zu"))).toMatchObject({
      code: "E_ARG_UNSUPPORTED",
      message: "The language code is not supported by subscene.com",
    });
  });

  it("rejects text that is not a language code", () => {
    for (const value of ["zz", "english", "e"]) {
      expect(captureError(() => resolveLanguage(value))).toMatchObject({
        code: "E_ARG_INVALID",
        message: "The language code is not a valid ISO 639-1 or ISO 639-2/B code",
      });
    }
  });

  it("recognizes Arabic", () => {
    expect(isArabic(resolveLanguage("ar").entry)).toBe(true);
    expect(isArabic(resolveLanguage("fa").entry)).toBe(false);
  });
});
