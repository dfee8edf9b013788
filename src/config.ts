import { z } from "zod";

const booleanFlag = (fallback: "true" | "false") =>
  z
    .string()
    .optional()
    .transform((value) => (value ?? fallback).trim().toLowerCase() === "true");

const envSchema = z.object({
  NODE_ENV: z.string().optional().default("development"),
  PORT: z.coerce.number().optional().default(8080),
  LOG_LEVEL: z.string().optional().default("info"),
  API_KEY: z.string(),
  PGHOST: z.string(),
  PGPORT: z.coerce.number().default(5432),
  POSTGRES_USER: z.string(),
  POSTGRES_PASSWORD: z.string(),
  POSTGRES_DB: z.string(),
  TELEGRAM_BOT_TOKEN: z.string(),
  TELEGRAM_API_BASE_URL: z.string().optional().default("https://api.telegram.org"),
  TELEGRAM_WEBHOOK_SECRET: z.string().optional(),
  SERPER_API_KEY: z.string(),
  SERPER_BASE_URL: z.string().optional().default("https://google.serper.dev"),
  SERPER_REQ_TIMEOUT: z.coerce.number().positive().optional().default(15),
  MISTRAL_API_KEY: z.string(),
  MISTRAL_BASE_URL: z.string().optional().default("https://api.mistral.ai/v1"),
  MISTRAL_MODEL: z.string().optional().default("mistral-large-latest"),
  MISTRAL_REQ_TIMEOUT: z.coerce.number().positive().optional().default(45),
  MAX_RESULTS_PER_QUERY: z.coerce.number().int().min(1).max(50).optional().default(20),
  MAX_CONCURRENT_SEARCHES: z.coerce.number().int().min(1).optional().default(4),
  DEEP_ANALYSIS_ENABLED: booleanFlag("true"),
  DEFAULT_LANG: z.enum(["ru", "en"]).optional().default("ru"),
  SEARCH_CALL_PAUSE_MS: z.coerce.number().min(0).optional().default(300),
  SEARCH_BATCH_PAUSE_MS: z.coerce.number().min(0).optional().default(1500),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).optional().default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().min(0).optional().default(1000),
  RETRY_MULTIPLIER: z.coerce.number().min(1).optional().default(2),
  PDF_RENDERING_ENABLED: booleanFlag("true"),
  PANDOC_PATH: z.string().optional().default("pandoc"),
  REPORT_STORAGE_ENDPOINT: z.string().optional(),
  REPORT_STORAGE_ACCESS_KEY: z.string().optional(),
  REPORT_STORAGE_SECRET_KEY: z.string().optional(),
  REPORT_STORAGE_BUCKET: z.string().optional().default("research-reports"),
  REPORT_STORAGE_USE_SSL: booleanFlag("false"),
  REPORT_STORAGE_SIGNED_URL_TTL: z.coerce.number().optional().default(3600),
});

export function loadConfig(source: NodeJS.ProcessEnv = process.env) {
  const env = envSchema.parse(source);
  const storageConfigured = Boolean(
    env.REPORT_STORAGE_ENDPOINT && env.REPORT_STORAGE_ACCESS_KEY && env.REPORT_STORAGE_SECRET_KEY,
  );

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    apiKey: env.API_KEY,
    database: {
      host: env.PGHOST,
      port: env.PGPORT,
      user: env.POSTGRES_USER,
      password: env.POSTGRES_PASSWORD,
      database: env.POSTGRES_DB,
    },
    telegram: {
      token: env.TELEGRAM_BOT_TOKEN,
      baseUrl: env.TELEGRAM_API_BASE_URL.replace(/\/$/, ""),
      webhookSecret: env.TELEGRAM_WEBHOOK_SECRET,
    },
    search: {
      apiKey: env.SERPER_API_KEY,
      baseUrl: env.SERPER_BASE_URL.replace(/\/$/, ""),
      requestTimeoutMs: env.SERPER_REQ_TIMEOUT * 1000,
    },
    llm: {
      apiKey: env.MISTRAL_API_KEY,
      baseUrl: env.MISTRAL_BASE_URL.replace(/\/$/, ""),
      model: env.MISTRAL_MODEL,
      requestTimeoutMs: env.MISTRAL_REQ_TIMEOUT * 1000,
      maxTokens: 4000,
      temperature: 0.3,
    },
    retry: {
      maxAttempts: env.RETRY_MAX_ATTEMPTS,
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
      multiplier: env.RETRY_MULTIPLIER,
      maxDelayMs: 10_000,
    },
    research: {
      concurrency: env.MAX_CONCURRENT_SEARCHES,
      // Hard bound on one query including the gateway's retries: a timed-out
      // attempt leaves about 5 s, so retries only absorb fast failures (429, 5xx, resets).
      searchCallTimeoutMs: env.SERPER_REQ_TIMEOUT * 1000 + 5000,
      synthesisTimeoutMs: env.MISTRAL_REQ_TIMEOUT * 1000 + 10_000,
      callPauseMs: env.SEARCH_CALL_PAUSE_MS,
      batchPauseMs: env.SEARCH_BATCH_PAUSE_MS,
    },
    defaults: {
      maxResults: env.MAX_RESULTS_PER_QUERY,
      deepAnalysis: env.DEEP_ANALYSIS_ENABLED,
      language: env.DEFAULT_LANG,
    },
    pdf: {
      enabled: env.PDF_RENDERING_ENABLED,
      pandocPath: env.PANDOC_PATH,
    },
    storage: storageConfigured
      ? {
          endpoint: env.REPORT_STORAGE_ENDPOINT ?? "",
          accessKey: env.REPORT_STORAGE_ACCESS_KEY ?? "",
          secretKey: env.REPORT_STORAGE_SECRET_KEY ?? "",
          bucket: env.REPORT_STORAGE_BUCKET,
          useSSL: env.REPORT_STORAGE_USE_SSL,
          signedUrlTTL: env.REPORT_STORAGE_SIGNED_URL_TTL,
        }
      : null,
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;
export type StorageConfig = NonNullable<AppConfig["storage"]>;
