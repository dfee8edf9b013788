import type { Finding, Source } from "../types/job";
import type { SearchOutcome } from "./searchExecutor";

/** Snippets must be longer than this to count as a finding. */
export const MIN_SNIPPET_LENGTH = 30;

export const MAX_FINDINGS = 25;

export interface AggregatedFindings {
  findings: Finding[];
  sources: Source[];
}

function dedupKey(title: string, link: string) {
  const normalized = title.trim().toLowerCase();
  return normalized || `link:${link.trim().toLowerCase()}`;
}

/**
 * Flattens per-query results into findings with stable 1-based source
 * indices. Duplicate titles (case-insensitive) keep their first occurrence.
 */
export function aggregateFindings(
  outcomes: SearchOutcome[],
  maxPerQuery: number,
  maxFindings = MAX_FINDINGS,
): AggregatedFindings {
  const findings: Finding[] = [];
  const sources: Source[] = [];
  const seen = new Set<string>();

  for (const outcome of outcomes) {
    for (const item of outcome.items.slice(0, Math.max(0, maxPerQuery))) {
      const title = (item.title ?? "").trim();
      const snippet = (item.snippet ?? "").trim();
      const link = (item.link ?? "").trim();
      if (snippet.length <= MIN_SNIPPET_LENGTH) {
        continue;
      }
      const key = dedupKey(title, link);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      const sourceIndex = sources.length + 1;
      findings.push({ title, snippet, link, sourceIndex });
      sources.push({ index: sourceIndex, title, link });
    }
  }

  return {
    findings: findings.slice(0, maxFindings),
    sources: sources.slice(0, maxFindings),
  };
}
