import { Dispatcher, fetch } from "undici";
import { SynthesisFailureError } from "../errors";
import { logger } from "../logger";
import { recordToolError, startToolTimer } from "../metrics";
import { prompts } from "../prompts";
import type { Finding } from "../types/job";
import type { ReportSynthesizer, SynthesisOptions } from "../types/gateways";
import { TimeoutError, withTimeout } from "../utils/async";
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from "../utils/retry";
import { isTransientStatus } from "./searchClient";

type Message = { role: "system" | "user" | "assistant"; content: string };

/** Findings beyond this are left out of the prompt. */
export const MAX_PROMPT_FINDINGS = 20;

export interface LlmClientOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  requestTimeoutMs: number;
  maxTokens: number;
  temperature: number;
  retry?: RetryPolicy;
  dispatcher?: Dispatcher;
}

interface ChatCompletionResponse {
  choices?: { message?: { content?: string }; text?: string }[];
}

export async function chatCompletion(
  client: LlmClientOptions,
  messages: Message[],
  signal?: AbortSignal,
): Promise<string> {
  const body = {
    model: client.model,
    messages,
    max_tokens: client.maxTokens,
    temperature: client.temperature,
  };

  const stopTimer = startToolTimer("llm");
  try {
    const data = await withTimeout(
      async (attemptSignal) => {
        const response = await fetch(`${client.baseUrl}/chat/completions`, {
          method: "POST",
          headers: {
            "content-type": "application/json",
            accept: "application/json",
            authorization: `Bearer ${client.apiKey}`,
          },
          body: JSON.stringify(body),
          signal: attemptSignal,
          dispatcher: client.dispatcher,
        });

        if (!response.ok) {
          const text = await response.text();
          logger.error({ status: response.status, text }, "LLM request failed");
          recordToolError("llm", "http");
          throw new SynthesisFailureError(`LLM request failed (${response.status})`, {
            transient: isTransientStatus(response.status),
            status: response.status,
          });
        }
        return (await response.json()) as ChatCompletionResponse;
      },
      client.requestTimeoutMs,
      signal,
    );

    const choice = data.choices?.[0];
    const content = choice?.message?.content ?? choice?.text;
    if (!content) {
      throw new SynthesisFailureError("LLM response contained no content", { transient: false });
    }
    return content;
  } catch (error) {
    if (error instanceof SynthesisFailureError) {
      throw error;
    }
    recordToolError("llm", error instanceof TimeoutError ? "timeout" : "network");
    throw new SynthesisFailureError(`LLM request error: ${String(error)}`, {
      transient: true,
      cause: error,
    });
  } finally {
    stopTimer();
  }
}

export function formatFindingsForPrompt(findings: Finding[]) {
  return findings
    .slice(0, MAX_PROMPT_FINDINGS)
    .map(
      (finding) =>
        `**${finding.title}**\n${finding.snippet}\n[${finding.sourceIndex}]: ${finding.link}`,
    )
    .join("\n\n");
}

/** Report Synthesizer backed by an OpenAI-compatible chat completions API (Mistral). */
export class LlmReportSynthesizer implements ReportSynthesizer {
  private readonly retry: RetryPolicy;

  constructor(private readonly client: LlmClientOptions) {
    this.retry = client.retry ?? DEFAULT_RETRY_POLICY;
  }

  async generate(findings: Finding[], topic: string, options: SynthesisOptions) {
    const system = options.instructions ?? prompts.synthesizer[options.language];
    const user = prompts.reportRequest[options.language]
      .split("{{TOPIC}}")
      .join(topic)
      .split("{{FINDINGS}}")
      .join(formatFindingsForPrompt(findings));

    const messages: Message[] = [
      { role: "system", content: system },
      { role: "user", content: user },
    ];

    return withRetry(() => chatCompletion(this.client, messages, options.signal), this.retry, {
      signal: options.signal,
      shouldRetry: (error) => !(error instanceof SynthesisFailureError) || error.transient,
      onRetry: (error, attempt, delayMs) => {
        logger.warn({ topic, attempt, delayMs, error: String(error) }, "Retrying report synthesis");
      },
    });
  }
}
