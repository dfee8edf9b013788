import { ResearchBot } from "./chat/researchBot";
import { TelegramTransport } from "./chat/telegramTransport";
import { loadConfig } from "./config";
import { createPool } from "./db";
import { logger } from "./logger";
import { runMigrations } from "./migrate";
import { PgJobRepository } from "./repositories/jobRepository";
import { PgSettingsRepository } from "./repositories/settingsRepository";
import { buildServer } from "./server";
import { JobManager } from "./services/jobManager";
import { JobRegistry } from "./services/jobRegistry";
import { LlmReportSynthesizer } from "./services/llmClient";
import { S3ReportStorage } from "./services/objectStorage";
import { PandocPdfRenderer } from "./services/reportBuilder";
import { SerperSearchGateway } from "./services/searchClient";
import { SettingsService } from "./services/settingsService";

async function main() {
  const config = loadConfig();
  const pool = createPool(config.database);
  await runMigrations(pool);

  const settings = new SettingsService(new PgSettingsRepository(pool), config.defaults);
  const storage = config.storage ? new S3ReportStorage(config.storage) : null;
  const manager = new JobManager({
    registry: new JobRegistry(),
    jobStore: new PgJobRepository(pool),
    settings,
    gateway: new SerperSearchGateway({ ...config.search, retry: config.retry }),
    synthesizer: new LlmReportSynthesizer({ ...config.llm, retry: config.retry }),
    options: config.research,
    pdfRenderer: config.pdf.enabled ? new PandocPdfRenderer(config.pdf.pandocPath) : null,
    storage,
  });
  const bot = new ResearchBot(manager, settings, new TelegramTransport(config.telegram));
  manager.setNotifier(bot);

  await manager.recoverInterrupted();

  const app = await buildServer({
    manager,
    settings,
    bot,
    storage,
    apiKey: config.apiKey,
    webhookSecret: config.telegram.webhookSecret,
    logLevel: config.logLevel,
  });

  const stop = async (signal: string) => {
    logger.info({ signal }, "Shutting down");
    await app.close();
    await manager.shutdown();
    await pool.end();
  };
  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.once(signal, () => {
      stop(signal)
        .catch((err) => {
          logger.error({ err }, "Shutdown failed");
          process.exitCode = 1;
        })
        .finally(() => {
          process.exit();
        });
    });
  }

  const address = await app.listen({ port: config.port, host: "0.0.0.0" });
  app.log.info(`Server listening on ${address}`);
}

main().catch((err) => {
  logger.error({ err }, "Failed to start server");
  process.exit(1);
});
