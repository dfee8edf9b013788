import type { Finding } from "./job";
import type { ReportLanguage } from "./settings";

export interface SearchItem {
  title: string;
  snippet: string;
  link: string;
}

export type SearchType = "search" | "news";

export interface SearchRequestOptions {
  type?: SearchType;
  count: number;
  language?: ReportLanguage;
  signal?: AbortSignal;
}

/** Web search provider. Implementations retry transient faults internally. */
export interface SearchGateway {
  search(query: string, options: SearchRequestOptions): Promise<SearchItem[]>;
}

export interface SynthesisOptions {
  language: ReportLanguage;
  instructions?: string;
  signal?: AbortSignal;
}

export interface ReportSynthesizer {
  generate(findings: Finding[], topic: string, options: SynthesisOptions): Promise<string>;
}
