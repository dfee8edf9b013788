import { Dispatcher, fetch } from "undici";
import { GatewayFailureError } from "../errors";
import { logger } from "../logger";
import { recordToolError, startToolTimer } from "../metrics";
import type { SearchGateway, SearchItem, SearchRequestOptions } from "../types/gateways";
import type { ReportLanguage } from "../types/settings";
import { TimeoutError, withTimeout } from "../utils/async";
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from "../utils/retry";

interface SerperOrganicItem {
  title?: string;
  snippet?: string;
  link?: string;
}

interface SerperResponse {
  organic?: SerperOrganicItem[];
  news?: SerperOrganicItem[];
}

export interface SerperClientOptions {
  apiKey: string;
  baseUrl: string;
  requestTimeoutMs: number;
  language?: ReportLanguage;
  retry?: RetryPolicy;
  dispatcher?: Dispatcher;
}

export function isTransientStatus(status: number) {
  return status === 408 || status === 429 || status >= 500;
}

/** Search Gateway backed by the Serper Google Search API. */
export class SerperSearchGateway implements SearchGateway {
  private readonly retry: RetryPolicy;

  constructor(private readonly options: SerperClientOptions) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
  }

  async search(query: string, request: SearchRequestOptions): Promise<SearchItem[]> {
    return withRetry(() => this.searchOnce(query, request), this.retry, {
      signal: request.signal,
      shouldRetry: (error) => !(error instanceof GatewayFailureError) || error.transient,
      onRetry: (error, attempt, delayMs) => {
        logger.warn({ query, attempt, delayMs, error: String(error) }, "Retrying search request");
      },
    });
  }

  private async searchOnce(query: string, request: SearchRequestOptions): Promise<SearchItem[]> {
    const type = request.type ?? "search";
    const url = `${this.options.baseUrl}/${type}`;
    const lang = request.language ?? this.options.language ?? "ru";
    const stopTimer = startToolTimer("serper");
    try {
      const data = await withTimeout(
        async (signal) => {
          const response = await fetch(url, {
            method: "POST",
            headers: {
              "content-type": "application/json",
              "x-api-key": this.options.apiKey,
            },
            body: JSON.stringify({ q: query, num: request.count, hl: lang, gl: lang }),
            signal,
            dispatcher: this.options.dispatcher,
          });
          if (!response.ok) {
            const text = await response.text();
            logger.error({ url, status: response.status, text }, "Serper search failed");
            recordToolError("serper", "http");
            throw new GatewayFailureError(`Serper search failed (${response.status})`, {
              transient: isTransientStatus(response.status),
              status: response.status,
            });
          }
          return (await response.json()) as SerperResponse;
        },
        this.options.requestTimeoutMs,
        request.signal,
      );

      const items = (type === "news" ? data.news : data.organic) ?? [];
      return items.map((item) => ({
        title: item.title ?? "",
        snippet: item.snippet ?? "",
        link: item.link ?? "",
      }));
    } catch (error) {
      if (error instanceof GatewayFailureError) {
        throw error;
      }
      recordToolError("serper", error instanceof TimeoutError ? "timeout" : "network");
      throw new GatewayFailureError(`Serper request error: ${String(error)}`, {
        transient: true,
        cause: error,
      });
    } finally {
      stopTimer();
    }
  }
}
