import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MockAgent } from "undici";
import { TelegramApiError, TelegramTransport } from "../telegramTransport";

const BASE_URL = "https://tg.test";

describe("TelegramTransport", () => {
  let agent: MockAgent;
  let transport: TelegramTransport;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    transport = new TelegramTransport({ token: "test-token", baseUrl: BASE_URL, dispatcher: agent });
  });

  afterEach(async () => {
    await agent.close();
  });

  it("sends a message and returns its id", async () => {
    let payload: unknown;
    agent
      .get(BASE_URL)
      .intercept({ path: "/bottest-token/sendMessage", method: "POST" })
      .reply((options) => {
        payload = JSON.parse(String(options.body));
        return { statusCode: 200, data: { ok: true, result: { message_id: 7 } } };
      });

    await expect(transport.sendMessage("1001", "hello")).resolves.toBe(7);
    expect(payload).toEqual({ chat_id: "1001", text: "hello", disable_web_page_preview: true });
  });

  it("raises the API description when an edit is rejected", async () => {
    agent
      .get(BASE_URL)
      .intercept({ path: "/bottest-token/editMessageText", method: "POST" })
      .reply(400, { ok: false, description: "Bad Request: message is not modified" });

    const failure = await transport.editMessage("1001", 7, "same text").catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TelegramApiError);
    expect(failure).toMatchObject({
      message: "Telegram editMessageText failed (400): Bad Request: message is not modified",
    });
  });

  it("uploads documents as multipart form data", async () => {
    agent
      .get(BASE_URL)
      .intercept({ path: "/bottest-token/sendDocument", method: "POST" })
      .reply(200, { ok: true, result: { message_id: 8 } });

    await expect(
      transport.sendDocument("1001", {
        fileName: "report_topic_1.md",
        content: "# report",
        contentType: "text/markdown",
        caption: "Markdown report",
      }),
    ).resolves.toBeUndefined();
  });
});
