import { z } from "zod";

export const LANGUAGES = ["ru", "en"] as const;

export type ReportLanguage = (typeof LANGUAGES)[number];

export const MAX_RESULTS_RANGE = { min: 1, max: 50 } as const;

export const settingsSchema = z.object({
  maxResults: z.number().int().min(MAX_RESULTS_RANGE.min).max(MAX_RESULTS_RANGE.max),
  deepAnalysis: z.boolean(),
  language: z.enum(LANGUAGES),
});

/**
 * Per-user research preferences.
 *
 * `maxResults` caps the organic items taken from each query (1–50),
 * `deepAnalysis` widens the query plan and `language` selects the query
 * templates and the report language.
 */
export type ResearchSettings = z.infer<typeof settingsSchema>;

export type SettingKey = keyof ResearchSettings;
