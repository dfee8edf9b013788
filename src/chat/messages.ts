import type { JobSnapshot, JobStatus, ProgressCursor, Source } from "../types/job";
import type { ResearchSettings, SettingKey } from "../types/settings";
import { formatDuration } from "../utils/text";
import { MIN_TOPIC_LENGTH } from "./commands";

export const PROGRESS_CELLS = 20;
export const SECONDS_PER_STEP = 15;
export const MAX_LISTED_SOURCES = 30;
const SOURCE_TITLE_LIMIT = 80;

export function progressPercent(step: number, totalSteps: number) {
  return Math.min(100, Math.floor((step * 100) / Math.max(1, totalSteps)));
}

export function progressBar(step: number, totalSteps: number) {
  const filled = Math.min(PROGRESS_CELLS, Math.floor(progressPercent(step, totalSteps) / 5));
  return "■".repeat(filled) + "□".repeat(PROGRESS_CELLS - filled);
}

export function progressText({ step, totalSteps, label }: ProgressCursor) {
  const eta = Math.max(1, (totalSteps - step) * SECONDS_PER_STEP);
  return [
    "Research in progress",
    "",
    "Current stage:",
    label,
    "",
    `Progress: ${progressPercent(step, totalSteps)}% (${step}/${totalSteps})`,
    progressBar(step, totalSteps),
    "",
    `Estimated time left: ${eta} s`,
  ].join("\n");
}

/** Short line sent when the progress message cannot be edited. */
export function progressFallbackText({ step, totalSteps, label }: ProgressCursor) {
  return `${label} - ${progressPercent(step, totalSteps)}%`;
}

const onOff = (value: boolean) => (value ? "on" : "off");

export function startText(topic: string, settings: ResearchSettings) {
  return [
    "Starting research",
    "",
    `Topic: ${topic}`,
    `Sources per query: up to ${settings.maxResults}`,
    `Deep analysis: ${onOff(settings.deepAnalysis)}`,
    "",
    "Preparing search queries...",
  ].join("\n");
}

const STATUS_LABELS: Record<JobStatus, string> = {
  pending: "pending",
  running: "running",
  done: "done",
  cancelled: "cancelled",
  error: "error",
};

export function statusText(snapshot: JobSnapshot | null) {
  if (!snapshot) {
    return "No research yet.\n\nSend a topic to start one.";
  }
  const lines = [
    "Research status",
    "",
    `Topic: ${snapshot.topic}`,
    `Time: ${formatDuration(snapshot.elapsedSeconds)}`,
    `Status: ${STATUS_LABELS[snapshot.status]}`,
  ];
  if (snapshot.status === "running" && snapshot.progress) {
    const { step, totalSteps, label } = snapshot.progress;
    lines.push(`Stage: ${label} (${step}/${totalSteps})`);
  }
  if (snapshot.status === "error" && snapshot.error) {
    lines.push(`Error: ${snapshot.error}`);
  }
  return lines.join("\n");
}

export function completedText(snapshot: JobSnapshot) {
  return [
    "Research completed",
    "",
    `Topic: ${snapshot.topic}`,
    `Duration: ${formatDuration(snapshot.elapsedSeconds)}`,
    `Sources: ${snapshot.sources.length}`,
  ].join("\n");
}

export function failedText(snapshot: JobSnapshot) {
  return `Research failed\n\n${snapshot.error ?? "Unknown error"}`;
}

export const TEXTS = {
  welcome: [
    "Research Bot - your personal analyst",
    "",
    "Send me a topic and I will search the web, collect sources and write a structured report.",
    "",
    "Commands:",
    "/research <topic> - start a research",
    "/status - status of the current research",
    "/cancel - cancel the research",
    "/settings - bot settings",
    "/sources - list of sources",
    "/help - detailed help",
  ].join("\n"),
  help: [
    "Research Bot help",
    "",
    "1. Send a topic, for example: Artificial intelligence in medicine",
    "2. Follow the progress in real time",
    "3. Receive the report as Markdown and PDF",
    "",
    "Settings:",
    "/settings sources 25 - sources per query (1-50)",
    "/settings depth on - deep analysis (on/off)",
    "/settings lang en - report language (ru/en)",
    "",
    "Other commands:",
    "/status - current progress",
    "/sources - sources found",
    "/cancel - stop the research",
  ].join("\n"),
  researchUsage: "Specify a research topic.\n\nExample: /research artificial intelligence in medicine",
  topicTooShort: `Topic is too short.\n\nDescribe it in more detail (at least ${MIN_TOPIC_LENGTH} characters).`,
  alreadyActive: "You already have an active research.\n\nWait for it to finish or cancel it with /cancel",
  noActiveJob: "No active research to cancel.",
  cancelling: "Cancelling research, waiting for running searches to finish...",
  cancelled: "Research cancelled.",
  pdfUnavailable: "PDF version is unavailable. Use the Markdown file.",
  noSourceData: "No source data yet.\n\nRun a research first.",
  noSources: "No sources found yet.",
  sourcesCaption: "Research sources",
  settingsUsage: "Specify a setting and a value.\n\nExample: /settings sources 25",
};

export function settingsText(settings: ResearchSettings) {
  return [
    "Current settings",
    "",
    `Sources per query: ${settings.maxResults}`,
    `Deep analysis: ${onOff(settings.deepAnalysis)}`,
    `Report language: ${settings.language.toUpperCase()}`,
    "",
    "Change with:",
    "/settings sources 25",
    "/settings depth on",
    "/settings lang en",
  ].join("\n");
}

export function settingUpdatedText(key: SettingKey, settings: ResearchSettings) {
  switch (key) {
    case "maxResults":
      return `Sources per query: ${settings.maxResults}`;
    case "deepAnalysis":
      return `Deep analysis: ${onOff(settings.deepAnalysis)}`;
    case "language":
      return `Report language: ${settings.language.toUpperCase()}`;
  }
}

/** Plain-text body of the `/sources` file. */
export function sourcesFileText(topic: string, sources: Source[]) {
  const lines = [`Sources for: ${topic}`, ""];
  sources.slice(0, MAX_LISTED_SOURCES).forEach((source, position) => {
    const title = (source.title || "Untitled").slice(0, SOURCE_TITLE_LIMIT);
    lines.push(`${position + 1}. ${title}`, `   ${source.link}`, "");
  });
  return lines.join("\n");
}
