import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MockAgent } from "undici";
import { GatewayFailureError } from "../../errors";
import { SerperSearchGateway } from "../searchClient";

const BASE_URL = "https://search.test";
const FAST_RETRY = { maxAttempts: 3, baseDelayMs: 1, multiplier: 2, maxDelayMs: 5 };

describe("SerperSearchGateway", () => {
  let agent: MockAgent;
  let gateway: SerperSearchGateway;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    gateway = new SerperSearchGateway({
      apiKey: "test-key",
      baseUrl: BASE_URL,
      requestTimeoutMs: 1000,
      retry: FAST_RETRY,
      dispatcher: agent,
    });
  });

  afterEach(async () => {
    await agent.close();
  });

  it("posts the query and maps organic results", async () => {
    let requestBody: unknown;
    agent
      .get(BASE_URL)
      .intercept({ path: "/search", method: "POST", headers: { "x-api-key": "test-key" } })
      .reply((options) => {
        requestBody = JSON.parse(String(options.body));
        return {
          statusCode: 200,
          data: { organic: [{ title: "Qubits", snippet: "About qubits", link: "https://q.test" }, { title: "No link" }] },
        };
      });

    const items = await gateway.search("quantum computing overview", { count: 5, language: "en" });

    expect(requestBody).toEqual({ q: "quantum computing overview", num: 5, hl: "en", gl: "en" });
    expect(items).toEqual([
      { title: "Qubits", snippet: "About qubits", link: "https://q.test" },
      { title: "No link", snippet: "", link: "" },
    ]);
  });

  it("retries server errors and returns the later success", async () => {
    const pool = agent.get(BASE_URL);
    pool.intercept({ path: "/search", method: "POST" }).reply(503, "busy");
    pool.intercept({ path: "/search", method: "POST" }).reply(200, { organic: [] });

    await expect(gateway.search("topic", { count: 3 })).resolves.toEqual([]);
  });

  it("fails fast on client errors other than 429", async () => {
    let calls = 0;
    agent
      .get(BASE_URL)
      .intercept({ path: "/search", method: "POST" })
      .reply(() => {
        calls += 1;
        return { statusCode: 403, data: "forbidden" };
      })
      .persist();

    const failure = await gateway.search("topic", { count: 3 }).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(GatewayFailureError);
    expect(failure).toMatchObject({ transient: false, status: 403 });
    expect(calls).toBe(1);
  });

  it("reads news results from the news endpoint", async () => {
    agent
      .get(BASE_URL)
      .intercept({ path: "/news", method: "POST" })
      .reply(200, { news: [{ title: "Headline", snippet: "Story", link: "https://n.test" }] });

    const items = await gateway.search("topic", { type: "news", count: 3 });

    expect(items).toEqual([{ title: "Headline", snippet: "Story", link: "https://n.test" }]);
  });
});
