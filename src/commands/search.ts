import { resolveTitle } from "../domain/title-resolver.js";
import type { SubsceneClient } from "../domain/providers/subscene.js";
import {
  SEARCH_CATEGORIES,
  type ResolvedTitle,
  type SearchResultSet,
  type TitleQuery,
} from "../domain/types.js";

export interface SearchCommandInput {
  site: SubsceneClient;
  title: string;
  year?: string;
}

export interface SearchCommandOutput {
  query: Partial<TitleQuery>;
  results: SearchResultSet;
  total: number;
  resolved: ResolvedTitle | null;
}

export async function runSearchCommand(input: SearchCommandInput): Promise<SearchCommandOutput> {
  const results = await input.site.searchTitles(input.title);
  const total = SEARCH_CATEGORIES.reduce(
    (count, category) => count + (results[category]?.length ?? 0),
    0,
  );

  const resolved =
    input.year === undefined ? null : resolveTitle({ title: input.title, year: input.year }, results);

  return {
    query: { title: input.title, year: input.year },
    results,
    total,
    resolved,
  };
}

export function renderSearchOutput(output: SearchCommandOutput): string {
  const lines: string[] = [
    `Query: ${output.query.title}${output.query.year === undefined ? "" : ` (${output.query.year})`}`,
    `Results: ${output.total}`,
  ];

  for (const category of SEARCH_CATEGORIES) {
    const records = output.results[category];
    if (records === undefined) {
      continue;
    }

    lines.push(`[${category}]`);
    for (const record of records) {
      lines.push(`  ${record.displayTitle} | ${record.url}`);
    }
  }

  if (output.query.year !== undefined) {
    lines.push(
      output.resolved === null
        ? "Match: none"
        : `Match: ${output.resolved.displayTitle} (${output.resolved.category}) | ${output.resolved.url}`,
    );
  }

  return lines.join("\n");
}
