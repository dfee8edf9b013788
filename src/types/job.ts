import type { ResearchSettings } from "./settings";

export type JobStatus = "pending" | "running" | "done" | "cancelled" | "error";

export const TERMINAL_STATUSES: readonly JobStatus[] = ["done", "cancelled", "error"];

export function isTerminalStatus(status: JobStatus) {
  return TERMINAL_STATUSES.includes(status);
}

export interface Finding {
  title: string;
  snippet: string;
  link: string;
  /** 1-based, shared with the Source introduced by this finding. */
  sourceIndex: number;
}

export interface Source {
  index: number;
  title: string;
  link: string;
}

export interface ProgressCursor {
  step: number;
  totalSteps: number;
  label: string;
}

export interface ReportAssets {
  markdown_url: string;
  pdf_url: string | null;
  checksums: {
    markdown: string;
    pdf: string | null;
  };
}

export interface ResearchJob {
  userId: string;
  topic: string;
  status: JobStatus;
  createdAt: string;
  durationSeconds: number | null;
  settings: ResearchSettings;
  queries: string[];
  findings: Finding[];
  sources: Source[];
  report: string | null;
  progress: ProgressCursor | null;
  error: string | null;
  reportAssets: ReportAssets | null;
}

/** Read-only view handed out by the lifecycle manager. */
export interface JobSnapshot extends ResearchJob {
  elapsedSeconds: number;
}
