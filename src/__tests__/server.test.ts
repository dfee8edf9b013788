import type { FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ResearchBot } from "../chat/researchBot";
import { TEXTS } from "../chat/messages";
import { buildServer } from "../server";
import { JobManager } from "../services/jobManager";
import { JobRegistry } from "../services/jobRegistry";
import { SettingsService } from "../services/settingsService";
import {
  createDeferred,
  type Deferred,
  FakeTransport,
  FAST_OPTIONS,
  InMemoryJobStore,
  InMemorySettingsStore,
  StubGateway,
  TEST_SETTINGS,
  threeItemsPerQuery,
} from "./support/fakes";

const API_KEY = "test-secret";
const WEBHOOK_SECRET = "test-webhook-secret";
const auth = { "x-api-key": API_KEY };

describe("HTTP server", () => {
  let app: FastifyInstance;
  let manager: JobManager;
  let transport: FakeTransport;
  let searchGate: Deferred<void>;
  let holdSearches: boolean;

  beforeEach(async () => {
    searchGate = createDeferred<void>();
    holdSearches = false;
    const settings = new SettingsService(new InMemorySettingsStore(), TEST_SETTINGS);
    manager = new JobManager({
      registry: new JobRegistry(),
      jobStore: new InMemoryJobStore(),
      settings,
      gateway: new StubGateway(async (query) => {
        if (holdSearches) {
          await searchGate.promise;
        }
        return threeItemsPerQuery(query);
      }),
      synthesizer: { generate: async () => "SUMMARY" },
      options: FAST_OPTIONS,
    });
    transport = new FakeTransport();
    const bot = new ResearchBot(manager, settings, transport);
    app = await buildServer({
      manager,
      settings,
      bot,
      storage: null,
      apiKey: API_KEY,
      webhookSecret: WEBHOOK_SECRET,
      logLevel: "silent",
    });
  });

  afterEach(async () => {
    searchGate.resolve();
    await app.close();
    await manager.shutdown();
  });

  async function finishResearch(userId: string) {
    const started = await app.inject({
      method: "POST",
      url: "/research",
      headers: auth,
      payload: { user_id: userId, topic: "quantum computing" },
    });
    expect(started.statusCode).toBe(202);
    await vi.waitFor(async () => {
      expect((await manager.status(userId))?.status).toBe("done");
    });
  }

  it("serves health and metrics without an API key", async () => {
    const health = await app.inject({ method: "GET", url: "/healthz" });
    const metrics = await app.inject({ method: "GET", url: "/metrics" });

    expect(health.json()).toEqual({ status: "ok" });
    expect(metrics.statusCode).toBe(200);
    expect(metrics.body).toContain("research_jobs_total");
  });

  it("requires the API key elsewhere", async () => {
    const response = await app.inject({ method: "GET", url: "/settings/42" });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ error: "Unauthorized" });
  });

  it("starts a research and rejects a concurrent one", async () => {
    holdSearches = true;
    const first = await app.inject({
      method: "POST",
      url: "/research",
      headers: auth,
      payload: { user_id: 42, topic: "quantum computing" },
    });
    const second = await app.inject({
      method: "POST",
      url: "/research",
      headers: auth,
      payload: { user_id: "42", topic: "solar energy storage" },
    });

    expect(first.statusCode).toBe(202);
    expect(first.json()).toMatchObject({ user_id: "42", topic: "quantum computing", status: "running" });
    expect(second.statusCode).toBe(409);

    searchGate.resolve();
    await vi.waitFor(async () => {
      expect((await manager.status("42"))?.topic).toBe("quantum computing");
      expect((await manager.status("42"))?.status).toBe("done");
    });
  });

  it("validates the research payload", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/research",
      headers: auth,
      payload: { user_id: "42", topic: "ai" },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe("Invalid request");
  });

  it("maps missing jobs to 404", async () => {
    const status = await app.inject({ method: "GET", url: "/research/nobody", headers: auth });
    const cancel = await app.inject({ method: "POST", url: "/research/nobody/cancel", headers: auth });

    expect(status.statusCode).toBe(404);
    expect(cancel.statusCode).toBe(404);
    expect(cancel.json()).toEqual({ error: "No active research job for this user" });
  });

  it("exposes status, sources and the markdown report of a finished job", async () => {
    await finishResearch("42");

    const status = await app.inject({ method: "GET", url: "/research/42", headers: auth });
    const sources = await app.inject({ method: "GET", url: "/research/42/sources", headers: auth });
    const markdown = await app.inject({ method: "GET", url: "/research/42/report/markdown", headers: auth });
    const pdf = await app.inject({ method: "GET", url: "/research/42/report/pdf", headers: auth });

    expect(status.json()).toMatchObject({
      status: "done",
      sources_count: 24,
      findings_count: 24,
      has_report: true,
      download_urls: null,
    });
    expect(sources.json().sources).toHaveLength(24);
    expect(markdown.statusCode).toBe(200);
    expect(markdown.headers["content-type"]).toBe("text/markdown; charset=utf-8");
    expect(markdown.body).toContain("SUMMARY");
    expect(pdf.statusCode).toBe(404);
  });

  it("reads and updates settings", async () => {
    const initial = await app.inject({ method: "GET", url: "/settings/7", headers: auth });
    const updated = await app.inject({
      method: "PATCH",
      url: "/settings/7",
      headers: auth,
      payload: { key: "depth", value: "on" },
    });
    const invalid = await app.inject({
      method: "PATCH",
      url: "/settings/7",
      headers: auth,
      payload: { key: "lang", value: "de" },
    });

    expect(initial.json()).toEqual({ user_id: "7", settings: TEST_SETTINGS });
    expect(updated.json()).toEqual({
      user_id: "7",
      updated: "deepAnalysis",
      settings: { ...TEST_SETTINGS, deepAnalysis: true },
    });
    expect(invalid.statusCode).toBe(400);
    expect(invalid.json()).toEqual({ error: "Supported languages: ru, en" });
  });

  it("checks the webhook secret and hands messages to the bot", async () => {
    const update = { update_id: 1, message: { message_id: 5, chat: { id: 1001 }, text: "/start" } };

    const rejected = await app.inject({ method: "POST", url: "/telegram/webhook", payload: update });
    const accepted = await app.inject({
      method: "POST",
      url: "/telegram/webhook",
      headers: { "x-telegram-bot-api-secret-token": WEBHOOK_SECRET },
      payload: update,
    });

    expect(rejected.statusCode).toBe(401);
    expect(accepted.json()).toEqual({ ok: true });
    await vi.waitFor(() => {
      expect(transport.messages).toEqual([{ chatId: "1001", text: TEXTS.welcome, messageId: 100 }]);
    });
  });
});
