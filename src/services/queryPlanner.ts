import { prompts, QueryTemplates } from "../prompts";
import type { ResearchSettings } from "../types/settings";

/** Upper bound on planned queries, independent of settings. */
export const MAX_QUERIES = 16;

/** Domain-specific variants appended for one matching category at most. */
const MAX_DOMAIN_QUERIES = 2;

const SHORT_KEYWORD_LENGTH = 4;

type PlannerSettings = Pick<ResearchSettings, "deepAnalysis" | "language">;

/**
 * Expands a topic into an ordered list of distinct search queries:
 * base templates, then deep-analysis templates, then domain variants.
 * Pure and deterministic.
 */
export function planQueries(
  topic: string,
  settings: PlannerSettings,
  templates: QueryTemplates = prompts.queryTemplates,
): string[] {
  const subject = topic.trim().replace(/\s+/g, " ");
  const lang = settings.language;
  const planned = [...templates.base[lang]];

  if (settings.deepAnalysis) {
    planned.push(...templates.deep[lang]);
  }

  const domain = templates.domains.find((entry) => matchesAnyKeyword(subject, entry.keywords));
  if (domain) {
    planned.push(...domain.templates[lang].slice(0, MAX_DOMAIN_QUERIES));
  }

  const seen = new Set<string>();
  const queries: string[] = [];
  for (const template of planned) {
    const query = template.split("{topic}").join(subject);
    const key = query.toLowerCase();
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    queries.push(query);
  }
  return queries.slice(0, MAX_QUERIES);
}

function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

export function matchesAnyKeyword(topic: string, keywords: string[]) {
  const words = tokenize(topic);
  const normalized = words.join(" ");
  return keywords.some((keyword) => {
    const parts = tokenize(keyword);
    if (!parts.length) {
      return false;
    }
    if (parts.length > 1) {
      return ` ${normalized} `.includes(` ${parts.join(" ")} `);
    }
    const [needle] = parts;
    if (needle.length < SHORT_KEYWORD_LENGTH) {
      return words.includes(needle);
    }
    return words.some((word) => word.startsWith(needle));
  });
}
