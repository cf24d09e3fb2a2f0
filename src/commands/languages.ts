import type { LanguageEntry } from "../domain/types.js";

export interface LanguagesCommandOutput {
  total: number;
  languages: LanguageEntry[];
}

export function runLanguagesCommand(languages: LanguageEntry[]): LanguagesCommandOutput {
  return {
    total: languages.length,
    languages,
  };
}

export function renderLanguagesOutput(output: LanguagesCommandOutput): string {
  const lines = output.languages.map(
    (language) => `${String(language.id).padStart(3, " ")}  ${(language.code ?? "-").padEnd(6, " ")}${language.name}`,
  );

  return [`Languages: ${output.total}`, ...lines].join("\n");
}
