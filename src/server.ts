import Fastify, { FastifyInstance, FastifyReply } from "fastify";
import sensible from "@fastify/sensible";
import { z, ZodError } from "zod";
import type { ResearchBot } from "./chat/researchBot";
import { MIN_TOPIC_LENGTH } from "./chat/commands";
import { AlreadyActiveError, NoActiveJobError, SettingsValidationError, describeError } from "./errors";
import { metricsRegistry } from "./metrics";
import type { JobManager } from "./services/jobManager";
import type { ReportStorage } from "./services/objectStorage";
import type { SettingsService } from "./services/settingsService";
import type { JobSnapshot } from "./types/job";

export interface ServerDeps {
  manager: JobManager;
  settings: SettingsService;
  bot: ResearchBot;
  storage: ReportStorage | null;
  apiKey: string;
  webhookSecret?: string;
  logLevel?: string;
}

const PUBLIC_PREFIXES = ["/healthz", "/metrics", "/telegram/"];
const TELEGRAM_SECRET_HEADER = "x-telegram-bot-api-secret-token";

const createSchema = z.object({
  user_id: z.union([z.string().min(1), z.number().int()]).transform(String),
  topic: z.string().trim().min(MIN_TOPIC_LENGTH),
});
const userParamSchema = z.object({ userId: z.string().min(1) });
const reportParamSchema = userParamSchema.extend({
  format: z.enum(["markdown", "pdf"] as const),
});
const settingsPatchSchema = z.object({
  key: z.string().min(1),
  value: z.union([z.string(), z.number(), z.boolean()]),
});
const telegramUpdateSchema = z
  .object({
    update_id: z.number(),
    message: z
      .object({
        chat: z.object({ id: z.union([z.number(), z.string()]) }),
        text: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

type ReportFormat = z.infer<typeof reportParamSchema>["format"];

const REPORT_FORMATS: Record<ReportFormat, { field: "markdown_url" | "pdf_url"; contentType: string; extension: string }> = {
  markdown: { field: "markdown_url", contentType: "text/markdown; charset=utf-8", extension: "md" },
  pdf: { field: "pdf_url", contentType: "application/pdf", extension: "pdf" },
};

export async function buildServer(deps: ServerDeps) {
  const app = Fastify({
    logger: {
      level: deps.logLevel ?? "info",
    },
  });
  await app.register(sensible);

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send({ error: "Invalid request", issues: error.issues });
    }
    if (error instanceof SettingsValidationError) {
      return reply.status(400).send({ error: error.message });
    }
    if (error instanceof AlreadyActiveError) {
      return reply.status(409).send({ error: error.message });
    }
    if (error instanceof NoActiveJobError) {
      return reply.status(404).send({ error: error.message });
    }
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, "Request failed");
      return reply.status(statusCode).send({ error: "Internal Server Error" });
    }
    return reply.status(statusCode).send({ error: error.message });
  });

  app.addHook("onRequest", async (request) => {
    if (PUBLIC_PREFIXES.some((prefix) => request.url.startsWith(prefix))) {
      return;
    }
    if (request.headers["x-api-key"] !== deps.apiKey) {
      throw app.httpErrors.unauthorized("Unauthorized");
    }
  });

  app.get("/healthz", async () => ({ status: "ok" }));
  app.get("/metrics", async (_, reply) => {
    reply.header("content-type", metricsRegistry.contentType);
    return metricsRegistry.metrics();
  });

  app.post("/telegram/webhook", async (request) => {
    if (deps.webhookSecret && request.headers[TELEGRAM_SECRET_HEADER] !== deps.webhookSecret) {
      throw app.httpErrors.unauthorized("Invalid webhook secret");
    }
    const update = telegramUpdateSchema.parse(request.body ?? {});
    const message = update.message;
    if (message?.text) {
      // Telegram retries slow webhooks, so the update is handled after the ack.
      deps.bot
        .handleMessage({ chatId: String(message.chat.id), text: message.text })
        .catch((error) => {
          request.log.error(
            { updateId: update.update_id, error: describeError(error) },
            "Failed to handle chat update",
          );
        });
    }
    return { ok: true };
  });

  app.post("/research", async (request, reply) => {
    const body = createSchema.parse(request.body ?? {});
    const snapshot = await deps.manager.start(body.user_id, body.topic);
    reply.code(202);
    return toJobResponse(snapshot);
  });

  app.get("/research/:userId", async (request) => {
    const { userId } = userParamSchema.parse(request.params);
    const snapshot = await deps.manager.status(userId);
    if (!snapshot) {
      throw app.httpErrors.notFound("No research for this user");
    }
    return {
      ...toJobResponse(snapshot),
      download_urls: await signedDownloadUrls(deps.storage, snapshot),
    };
  });

  app.post("/research/:userId/cancel", async (request) => {
    const { userId } = userParamSchema.parse(request.params);
    return toJobResponse(await deps.manager.cancel(userId));
  });

  app.get("/research/:userId/sources", async (request) => {
    const { userId } = userParamSchema.parse(request.params);
    return { user_id: userId, sources: await deps.manager.listSources(userId) };
  });

  app.get("/research/:userId/report/:format", async (request, reply) => {
    const { userId, format } = reportParamSchema.parse(request.params);
    return sendReport(app, deps, userId, format, reply);
  });

  app.get("/settings/:userId", async (request) => {
    const { userId } = userParamSchema.parse(request.params);
    return { user_id: userId, settings: await deps.settings.get(userId) };
  });

  app.patch("/settings/:userId", async (request) => {
    const { userId } = userParamSchema.parse(request.params);
    const body = settingsPatchSchema.parse(request.body ?? {});
    const { key, settings } = await deps.settings.update(userId, body.key, body.value);
    return { user_id: userId, updated: key, settings };
  });

  return app;
}

function toJobResponse(snapshot: JobSnapshot) {
  return {
    user_id: snapshot.userId,
    topic: snapshot.topic,
    status: snapshot.status,
    created_at: snapshot.createdAt,
    elapsed_seconds: snapshot.elapsedSeconds,
    duration_seconds: snapshot.durationSeconds,
    settings: snapshot.settings,
    progress: snapshot.progress,
    queries: snapshot.queries,
    findings_count: snapshot.findings.length,
    sources_count: snapshot.sources.length,
    has_report: snapshot.report !== null,
    assets: snapshot.reportAssets,
    error: snapshot.error,
  };
}

async function signedDownloadUrls(storage: ReportStorage | null, snapshot: JobSnapshot) {
  const assets = snapshot.reportAssets;
  if (!storage || !assets) {
    return null;
  }
  return {
    markdown: await storage.getSignedUrlForStoredObject(assets.markdown_url),
    pdf: assets.pdf_url ? await storage.getSignedUrlForStoredObject(assets.pdf_url) : null,
  };
}

/** Streams the archived report; without an archive the Markdown is served from the job. */
async function sendReport(
  app: FastifyInstance,
  deps: ServerDeps,
  userId: string,
  format: ReportFormat,
  reply: FastifyReply,
) {
  const snapshot = await deps.manager.status(userId);
  if (!snapshot || snapshot.status !== "done") {
    throw app.httpErrors.notFound("Report not available");
  }
  const descriptor = REPORT_FORMATS[format];
  const filename = `report.${descriptor.extension}`;
  const assetUrl = snapshot.reportAssets?.[descriptor.field] ?? null;

  if (assetUrl && deps.storage) {
    try {
      const object = await deps.storage.getObjectStream(assetUrl);
      reply.header("Content-Type", object.contentType ?? descriptor.contentType);
      if (object.contentLength !== undefined) {
        reply.header("Content-Length", String(object.contentLength));
      }
      reply.header("Content-Disposition", `attachment; filename=${filename}`);
      return reply.send(object.stream);
    } catch (error) {
      app.log.error({ error: describeError(error), userId, format }, "Failed to stream report asset");
      throw app.httpErrors.internalServerError("Unable to download report asset");
    }
  }

  if (format === "markdown" && snapshot.report !== null) {
    reply.header("Content-Type", descriptor.contentType);
    reply.header("Content-Disposition", `attachment; filename=${filename}`);
    return reply.send(snapshot.report);
  }
  throw app.httpErrors.notFound("Requested asset not available");
}
