import type { Pool } from "pg";
import { logger } from "../logger";
import { ResearchSettings, settingsSchema } from "../types/settings";
import type { SettingsStore } from "../types/stores";

export class PgSettingsRepository implements SettingsStore {
  constructor(private readonly pool: Pool) {}

  async load(userId: string): Promise<ResearchSettings | null> {
    const { rows } = await this.pool.query<{ settings: unknown }>(
      "SELECT settings FROM user_settings WHERE user_id = $1",
      [userId],
    );
    if (!rows[0]) {
      return null;
    }
    const parsed = settingsSchema.safeParse(rows[0].settings);
    if (!parsed.success) {
      logger.warn({ userId, issues: parsed.error.issues }, "Stored settings invalid, using defaults");
      return null;
    }
    return parsed.data;
  }

  async save(userId: string, settings: ResearchSettings) {
    await this.pool.query(
      `INSERT INTO user_settings (user_id, settings, updated_at)
       VALUES ($1, $2, now())
       ON CONFLICT (user_id) DO UPDATE SET settings = EXCLUDED.settings, updated_at = now()`,
      [userId, JSON.stringify(settings)],
    );
  }
}
