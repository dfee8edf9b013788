import type { Finding, Source } from "../types/job";
import type { ReportLanguage } from "../types/settings";

export const GENERATOR_NAME = "Research Bot v2.0";

export interface ReportFindingEntry {
  ordinal: number;
  title: string;
  snippet: string;
  sourceIndex: number;
  link: string;
}

export interface ReportSourceEntry {
  index: number;
  title: string;
  link: string;
}

/** Format-agnostic report; renderers decide how each section looks. */
export interface ReportDocument {
  language: ReportLanguage;
  header: {
    topic: string;
    generatedAt: string;
    sourceCount: number;
    findingCount: number;
  };
  narrative: string;
  findings: ReportFindingEntry[];
  sources: ReportSourceEntry[];
  footer: {
    queriesExecuted: number;
    uniqueSources: number;
    generatedAt: string;
    generator: string;
  };
}

export interface AssembleInput {
  topic?: string | null;
  narrative?: string | null;
  findings?: Partial<Finding>[] | null;
  sources?: Partial<Source>[] | null;
  counts: { queries: number };
  language: ReportLanguage;
  generatedAt: Date;
}

export function assembleReport(input: AssembleInput): ReportDocument {
  const generatedAt = input.generatedAt.toISOString();
  const findings = (input.findings ?? []).map((finding, idx) => ({
    ordinal: idx + 1,
    title: finding.title ?? "",
    snippet: finding.snippet ?? "",
    sourceIndex: finding.sourceIndex ?? idx + 1,
    link: finding.link ?? "",
  }));
  const sources = (input.sources ?? []).map((source, idx) => ({
    index: source.index ?? idx + 1,
    title: source.title ?? "",
    link: source.link ?? "",
  }));

  return {
    language: input.language,
    header: {
      topic: input.topic ?? "",
      generatedAt,
      sourceCount: sources.length,
      findingCount: findings.length,
    },
    narrative: input.narrative ?? "",
    findings,
    sources,
    footer: {
      queriesExecuted: input.counts.queries,
      uniqueSources: sources.length,
      generatedAt,
      generator: GENERATOR_NAME,
    },
  };
}
