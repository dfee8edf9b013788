import { GatewayTimeoutError, describeError } from "../errors";
import { logger } from "../logger";
import { recordToolError } from "../metrics";
import type { ProgressCursor } from "../types/job";
import type { SearchGateway, SearchItem } from "../types/gateways";
import type { ReportLanguage } from "../types/settings";
import { sleep, TimeoutError, withTimeout } from "../utils/async";
import { CancellationToken } from "../utils/cancellation";
import { truncate } from "../utils/text";

export interface SearchOutcome {
  query: string;
  /** Empty when the call failed or timed out. */
  items: SearchItem[];
  failed: boolean;
}

export type ProgressListener = (cursor: ProgressCursor) => Promise<void> | void;

export interface ExecuteSearchOptions {
  gateway: SearchGateway;
  concurrency: number;
  callTimeoutMs: number;
  resultsPerQuery: number;
  language?: ReportLanguage;
  callPauseMs: number;
  batchPauseMs: number;
  token: CancellationToken;
  /** Offset and total used to number the progress ticks. */
  progress?: { startStep: number; totalSteps: number; onProgress: ProgressListener };
}

export function partitionBatches<T>(items: T[], size: number): T[][] {
  const batchSize = Math.max(1, Math.floor(size));
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    batches.push(items.slice(i, i + batchSize));
  }
  return batches;
}

/**
 * Runs the planned queries in consecutive batches of `concurrency`. A failed
 * or timed-out call becomes an empty outcome; the batch always completes.
 * Outcomes are returned in query order.
 */
export async function executeSearches(
  queries: string[],
  options: ExecuteSearchOptions,
): Promise<SearchOutcome[]> {
  const { token } = options;
  const outcomes: SearchOutcome[] = [];
  const batches = partitionBatches(queries, options.concurrency);
  let step = options.progress?.startStep ?? 0;

  const tick = async (query: string) => {
    if (!options.progress) {
      return;
    }
    step += 1;
    await options.progress.onProgress({
      step,
      totalSteps: options.progress.totalSteps,
      label: `Searching: ${truncate(query, 50)}`,
    });
  };

  for (let batchIndex = 0; batchIndex < batches.length; batchIndex += 1) {
    const batch = batches[batchIndex];
    token.throwIfCancelled("search");

    const settled = await Promise.all(
      batch.map(async (query, position) => {
        if (position > 0) {
          await sleep(options.callPauseMs * position, token.signal);
        }
        if (token.isCancelled) {
          return { query, items: [], failed: true };
        }
        const outcome = await runSingleSearch(query, options);
        await tick(query);
        return outcome;
      }),
    );
    outcomes.push(...settled);

    token.throwIfCancelled("search");
    if (batchIndex < batches.length - 1) {
      await sleep(options.batchPauseMs, token.signal);
    }
  }

  token.throwIfCancelled("search");
  return outcomes;
}

async function runSingleSearch(query: string, options: ExecuteSearchOptions): Promise<SearchOutcome> {
  try {
    const items = await withTimeout(
      (signal) =>
        options.gateway.search(query, {
          count: options.resultsPerQuery,
          language: options.language,
          signal,
        }),
      options.callTimeoutMs,
    );
    return { query, items, failed: false };
  } catch (error) {
    if (error instanceof TimeoutError) {
      const timeout = new GatewayTimeoutError(query, options.callTimeoutMs);
      recordToolError("search", "timeout");
      logger.warn({ query, timeoutMs: timeout.timeoutMs }, timeout.message);
    } else {
      recordToolError("search", "call");
      logger.error({ query, error: describeError(error) }, "Search call failed");
    }
    return { query, items: [], failed: true };
  }
}
