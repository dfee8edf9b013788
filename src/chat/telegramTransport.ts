import { Dispatcher, fetch, FormData } from "undici";
import { Blob } from "node:buffer";
import { logger } from "../logger";
import { recordToolError, startToolTimer } from "../metrics";

export interface OutgoingDocument {
  fileName: string;
  content: Buffer | string;
  contentType: string;
  caption?: string;
}

/** Outbound side of the chat surface. */
export interface ChatTransport {
  /** Returns the id of the message that was sent. */
  sendMessage(chatId: string, text: string): Promise<number>;
  editMessage(chatId: string, messageId: number, text: string): Promise<void>;
  sendDocument(chatId: string, document: OutgoingDocument): Promise<void>;
}

export interface TelegramTransportOptions {
  token: string;
  baseUrl: string;
  dispatcher?: Dispatcher;
}

interface TelegramResponse<T> {
  ok: boolean;
  result?: T;
  description?: string;
  error_code?: number;
}

export class TelegramApiError extends Error {
  constructor(readonly method: string, readonly status: number, description?: string) {
    super(`Telegram ${method} failed (${status})${description ? `: ${description}` : ""}`);
    this.name = "TelegramApiError";
  }
}

/** Telegram Bot API over undici fetch. */
export class TelegramTransport implements ChatTransport {
  constructor(private readonly options: TelegramTransportOptions) {}

  async sendMessage(chatId: string, text: string) {
    const result = await this.call<{ message_id: number }>("sendMessage", {
      json: { chat_id: chatId, text, disable_web_page_preview: true },
    });
    return result.message_id;
  }

  async editMessage(chatId: string, messageId: number, text: string) {
    await this.call<unknown>("editMessageText", {
      json: { chat_id: chatId, message_id: messageId, text, disable_web_page_preview: true },
    });
  }

  async sendDocument(chatId: string, document: OutgoingDocument) {
    const form = new FormData();
    form.append("chat_id", chatId);
    if (document.caption) {
      form.append("caption", document.caption);
    }
    form.append(
      "document",
      new Blob([document.content], { type: document.contentType }),
      document.fileName,
    );
    await this.call<unknown>("sendDocument", { form });
  }

  private async call<T>(method: string, body: { json?: unknown; form?: FormData }): Promise<T> {
    const url = `${this.options.baseUrl}/bot${this.options.token}/${method}`;
    const stopTimer = startToolTimer("telegram");
    try {
      const response = await fetch(url, {
        method: "POST",
        headers: body.json !== undefined ? { "content-type": "application/json" } : undefined,
        body: body.form ?? JSON.stringify(body.json),
        dispatcher: this.options.dispatcher,
      });
      const data = (await response.json()) as TelegramResponse<T>;
      if (!response.ok || !data.ok || data.result === undefined) {
        logger.warn({ method, status: response.status, description: data.description }, "Telegram call failed");
        recordToolError("telegram", method);
        throw new TelegramApiError(method, response.status, data.description);
      }
      return data.result;
    } finally {
      stopTimer();
    }
  }
}
