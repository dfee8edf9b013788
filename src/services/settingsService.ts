import { SettingsValidationError } from "../errors";
import { LANGUAGES, MAX_RESULTS_RANGE, ResearchSettings, SettingKey, settingsSchema } from "../types/settings";
import type { SettingsStore } from "../types/stores";

const KEY_ALIASES: Record<string, SettingKey> = {
  sources: "maxResults",
  source: "maxResults",
  max: "maxResults",
  max_results: "maxResults",
  maxresults: "maxResults",
  depth: "deepAnalysis",
  deep: "deepAnalysis",
  analysis: "deepAnalysis",
  deep_analysis: "deepAnalysis",
  deepanalysis: "deepAnalysis",
  lang: "language",
  language: "language",
};

const TRUE_WORDS = new Set(["on", "true", "1", "yes", "вкл"]);
const FALSE_WORDS = new Set(["off", "false", "0", "no", "выкл"]);

export function resolveSettingKey(raw: string): SettingKey | null {
  return KEY_ALIASES[raw.trim().toLowerCase()] ?? null;
}

/**
 * Parses a user-supplied value for `key`. Throws `SettingsValidationError`
 * with a message suitable for showing to the user.
 */
export function parseSettingValue(key: SettingKey, raw: string | number | boolean) {
  const value = typeof raw === "string" ? raw.trim().toLowerCase() : raw;
  switch (key) {
    case "maxResults": {
      const num = typeof value === "number" ? value : Number(value);
      if (
        typeof value === "boolean" ||
        value === "" ||
        !Number.isInteger(num) ||
        num < MAX_RESULTS_RANGE.min ||
        num > MAX_RESULTS_RANGE.max
      ) {
        throw new SettingsValidationError(
          `Source count must be a whole number from ${MAX_RESULTS_RANGE.min} to ${MAX_RESULTS_RANGE.max}`,
        );
      }
      return { maxResults: num };
    }
    case "deepAnalysis": {
      if (typeof value === "boolean") {
        return { deepAnalysis: value };
      }
      const word = String(value);
      if (TRUE_WORDS.has(word)) {
        return { deepAnalysis: true };
      }
      if (FALSE_WORDS.has(word)) {
        return { deepAnalysis: false };
      }
      throw new SettingsValidationError("Deep analysis takes on or off");
    }
    case "language": {
      const lang = LANGUAGES.find((entry) => entry === value);
      if (!lang) {
        throw new SettingsValidationError(`Supported languages: ${LANGUAGES.join(", ")}`);
      }
      return { language: lang };
    }
  }
}

export class SettingsService {
  constructor(
    private readonly store: SettingsStore,
    private readonly defaults: ResearchSettings,
  ) {}

  /** Current settings; first access persists the defaults. */
  async get(userId: string): Promise<ResearchSettings> {
    const stored = await this.store.load(userId);
    if (stored) {
      return stored;
    }
    const initial = settingsSchema.parse({ ...this.defaults });
    await this.store.save(userId, initial);
    return initial;
  }

  async update(userId: string, rawKey: string, rawValue: string | number | boolean) {
    const key = resolveSettingKey(rawKey);
    if (!key) {
      throw new SettingsValidationError("Unknown setting. Use: sources, depth, lang");
    }
    const current = await this.get(userId);
    const next = settingsSchema.parse({ ...current, ...parseSettingValue(key, rawValue) });
    await this.store.save(userId, next);
    return { key, settings: next };
  }
}
