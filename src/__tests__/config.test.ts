import { describe, expect, it } from "vitest";
import { loadConfig } from "../config";

const REQUIRED = {
  API_KEY: "test-key",
  PGHOST: "localhost",
  POSTGRES_USER: "research",
  POSTGRES_PASSWORD: "test-password",
  POSTGRES_DB: "research",
  TELEGRAM_BOT_TOKEN: "test-token",
  SERPER_API_KEY: "test-key",
  MISTRAL_API_KEY: "test-key",
};

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ ...REQUIRED });

    expect(config.port).toBe(8080);
    expect(config.defaults).toEqual({ maxResults: 20, deepAnalysis: true, language: "ru" });
    expect(config.search.requestTimeoutMs).toBe(15_000);
    expect(config.research.searchCallTimeoutMs).toBe(20_000);
    expect(config.research.synthesisTimeoutMs).toBe(55_000);
    expect(config.pdf).toEqual({ enabled: true, pandocPath: "pandoc" });
    expect(config.storage).toBeNull();
  });

  it("parses flags and strips trailing slashes", () => {
    const config = loadConfig({
      ...REQUIRED,
      DEEP_ANALYSIS_ENABLED: " FALSE ",
      PDF_RENDERING_ENABLED: "false",
      TELEGRAM_API_BASE_URL: "https://tg.test/",
      DEFAULT_LANG: "en",
    });

    expect(config.defaults.deepAnalysis).toBe(false);
    expect(config.defaults.language).toBe("en");
    expect(config.pdf.enabled).toBe(false);
    expect(config.telegram.baseUrl).toBe("https://tg.test");
  });

  it("enables storage only when endpoint and credentials are all set", () => {
    const partial = loadConfig({ ...REQUIRED, REPORT_STORAGE_ENDPOINT: "http://minio:9000" });
    const full = loadConfig({
      ...REQUIRED,
      REPORT_STORAGE_ENDPOINT: "http://minio:9000",
      REPORT_STORAGE_ACCESS_KEY: "test-access",
      REPORT_STORAGE_SECRET_KEY: "test-secret",
    });

    expect(partial.storage).toBeNull();
    expect(full.storage).toEqual({
      endpoint: "http://minio:9000",
      accessKey: "test-access",
      secretKey: "test-secret",
      bucket: "research-reports",
      useSSL: false,
      signedUrlTTL: 3600,
    });
  });

  it("bounds each query, retries included, at one attempt timeout plus five seconds", () => {
    const config = loadConfig({ ...REQUIRED, SERPER_REQ_TIMEOUT: "10", RETRY_MAX_ATTEMPTS: "5" });

    expect(config.search.requestTimeoutMs).toBe(10_000);
    expect(config.retry.maxAttempts).toBe(5);
    expect(config.research.searchCallTimeoutMs).toBe(15_000);
  });

  it("rejects a missing API key", () => {
    const { API_KEY: _omitted, ...rest } = REQUIRED;

    expect(() => loadConfig(rest)).toThrow();
  });
});
