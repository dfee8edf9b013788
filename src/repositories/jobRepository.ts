import type { Pool } from "pg";
import { z } from "zod";
import { logger } from "../logger";
import type { ResearchJob } from "../types/job";
import { settingsSchema } from "../types/settings";
import type { JobStore } from "../types/stores";

const jobSnapshotSchema = z.object({
  userId: z.string(),
  topic: z.string(),
  status: z.enum(["pending", "running", "done", "cancelled", "error"]),
  createdAt: z.string(),
  durationSeconds: z.number().nullable().default(null),
  settings: settingsSchema,
  queries: z.array(z.string()).default([]),
  findings: z
    .array(
      z.object({
        title: z.string(),
        snippet: z.string(),
        link: z.string(),
        sourceIndex: z.number().int(),
      }),
    )
    .default([]),
  sources: z
    .array(z.object({ index: z.number().int(), title: z.string(), link: z.string() }))
    .default([]),
  report: z.string().nullable().default(null),
  progress: z
    .object({ step: z.number(), totalSteps: z.number(), label: z.string() })
    .nullable()
    .default(null),
  error: z.string().nullable().default(null),
  reportAssets: z
    .object({
      markdown_url: z.string(),
      pdf_url: z.string().nullable(),
      checksums: z.object({ markdown: z.string(), pdf: z.string().nullable() }),
    })
    .nullable()
    .default(null),
});

/** Validates a stored snapshot; malformed rows are logged and skipped. */
export function parseJobSnapshot(raw: unknown): ResearchJob | null {
  const parsed = jobSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn({ issues: parsed.error.issues }, "Discarding malformed job snapshot");
    return null;
  }
  return parsed.data;
}

/** One row per user holding the latest job snapshot as JSONB. */
export class PgJobRepository implements JobStore {
  constructor(private readonly pool: Pool) {}

  async save(job: ResearchJob) {
    await this.pool.query(
      `INSERT INTO research_jobs (user_id, topic, status, snapshot, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, now())
       ON CONFLICT (user_id) DO UPDATE
         SET topic = EXCLUDED.topic,
             status = EXCLUDED.status,
             snapshot = EXCLUDED.snapshot,
             created_at = EXCLUDED.created_at,
             updated_at = now()`,
      [job.userId, job.topic, job.status, JSON.stringify(job), job.createdAt],
    );
  }

  async load(userId: string) {
    const { rows } = await this.pool.query<{ snapshot: unknown }>(
      "SELECT snapshot FROM research_jobs WHERE user_id = $1",
      [userId],
    );
    return rows[0] ? parseJobSnapshot(rows[0].snapshot) : null;
  }

  async listUnfinished() {
    const { rows } = await this.pool.query<{ snapshot: unknown }>(
      `SELECT snapshot FROM research_jobs
       WHERE status IN ('pending', 'running')
       ORDER BY created_at`,
    );
    return rows
      .map((row) => parseJobSnapshot(row.snapshot))
      .filter((job): job is ResearchJob => job !== null);
  }
}
