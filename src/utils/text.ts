import type { ReportLanguage } from "../types/settings";

const DURATION_UNITS: Record<ReportLanguage, { s: string; m: string; h: string }> = {
  en: { s: "s", m: "min", h: "h" },
  ru: { s: "сек", m: "мин", h: "ч" },
};

export function formatDuration(totalSeconds: number, language: ReportLanguage = "en") {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const units = DURATION_UNITS[language];
  if (seconds < 60) {
    return `${seconds} ${units.s}`;
  }
  if (seconds < 3600) {
    return `${Math.floor(seconds / 60)} ${units.m} ${seconds % 60} ${units.s}`;
  }
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours} ${units.h} ${minutes} ${units.m}`;
}

export function truncate(text: string, maxLength: number) {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength)}...`;
}

/** File-name friendly form of a topic: whitespace becomes `_`, path separators dropped. */
export function slugify(text: string, maxLength: number) {
  return text
    .trim()
    .replace(/[\\/:*?"<>|]+/g, "")
    .replace(/\s+/g, "_")
    .slice(0, maxLength);
}

export function collapseWhitespace(text: string) {
  return text.replace(/\s+/g, " ").trim();
}
