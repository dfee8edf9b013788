import fs from "node:fs";
import path from "node:path";
import type { Pool } from "pg";
import { loadConfig } from "./config";
import { createPool } from "./db";
import { logger } from "./logger";

/** Applies pending `migrations/*.sql` files in name order; returns the ids applied. */
export async function runMigrations(pool: Pool) {
  const migrationsDir = path.resolve(__dirname, "..", "migrations");
  const files = fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith(".sql"))
    .sort();

  await pool.query(
    "CREATE TABLE IF NOT EXISTS schema_migrations (id TEXT PRIMARY KEY, run_at TIMESTAMPTZ NOT NULL DEFAULT now())",
  );

  const applied: string[] = [];
  for (const file of files) {
    const id = file.replace(/\.sql$/, "");
    const exists = await pool.query("SELECT 1 FROM schema_migrations WHERE id = $1", [id]);
    if (exists.rowCount) {
      continue;
    }

    const sql = fs.readFileSync(path.join(migrationsDir, file), "utf8");
    logger.info({ migration: id }, "Applying migration");
    await applyMigration(pool, id, sql);
    applied.push(id);
  }
  return applied;
}

/** Runs one migration and records it in the same transaction. */
async function applyMigration(pool: Pool, id: string, sql: string) {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    await client.query(sql);
    await client.query("INSERT INTO schema_migrations(id) VALUES ($1)", [id]);
    await client.query("COMMIT");
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}

if (require.main === module) {
  const pool = createPool(loadConfig().database);
  runMigrations(pool)
    .then((applied) => {
      logger.info({ applied }, "Migrations complete");
    })
    .catch((err) => {
      logger.error({ err }, "Migration failed");
      process.exitCode = 1;
    })
    .finally(async () => {
      await pool.end();
    });
}
