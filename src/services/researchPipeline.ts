import {
  PipelineCancelledError,
  PipelineFaultError,
  SynthesisFailureError,
  SynthesisTimeoutError,
  describeError,
} from "../errors";
import { logger } from "../logger";
import type { ResearchJob } from "../types/job";
import type { ReportSynthesizer, SearchGateway } from "../types/gateways";
import type { ReportLanguage } from "../types/settings";
import { TimeoutError, withTimeout } from "../utils/async";
import { CancellationToken } from "../utils/cancellation";
import { aggregateFindings } from "./findingAggregator";
import { planQueries } from "./queryPlanner";
import { assembleReport, ReportDocument } from "./reportAssembler";
import { renderMarkdown } from "./reportBuilder";
import { executeSearches, ProgressListener } from "./searchExecutor";

/** Fixed stages after the searches: filtering, synthesis, assembly. */
export const TRAILING_STAGES = 3;

export interface PipelineOptions {
  concurrency: number;
  searchCallTimeoutMs: number;
  synthesisTimeoutMs: number;
  callPauseMs: number;
  batchPauseMs: number;
}

export interface PipelineDeps {
  gateway: SearchGateway;
  synthesizer: ReportSynthesizer;
  options: PipelineOptions;
  now?: () => Date;
}

export interface PipelineResult {
  narrative: string;
  document: ReportDocument;
  markdown: string;
}

const STAGE_LABELS = {
  filter: "Processing and filtering results",
  synthesis: "Generating analytical report",
  assembly: "Preparing final report",
};

const SYNTHESIS_FALLBACK: Record<ReportLanguage, { timeout: string; failure: string }> = {
  en: {
    timeout: "Report generation timed out. Please try again later or narrow the topic.",
    failure: "Report generation failed:",
  },
  ru: {
    timeout: "Превышено время ожидания ответа от AI. Попробуйте позже или упростите тему.",
    failure: "Ошибка при создании отчёта:",
  },
};

/**
 * Runs one research job end to end, filling `job.queries`, `job.findings`
 * and `job.sources` as it goes. Throws `PipelineCancelledError` when the
 * token is observed, `PipelineFaultError` for anything unexpected.
 */
export async function runResearchPipeline(
  job: ResearchJob,
  deps: PipelineDeps,
  token: CancellationToken,
  onProgress: ProgressListener,
): Promise<PipelineResult> {
  const now = deps.now ?? (() => new Date());
  let stage = "planning";
  try {
    const queries = planQueries(job.topic, job.settings);
    job.queries = queries;
    const totalSteps = queries.length + TRAILING_STAGES;

    stage = "search";
    const outcomes = await executeSearches(queries, {
      gateway: deps.gateway,
      concurrency: deps.options.concurrency,
      callTimeoutMs: deps.options.searchCallTimeoutMs,
      resultsPerQuery: job.settings.maxResults,
      language: job.settings.language,
      callPauseMs: deps.options.callPauseMs,
      batchPauseMs: deps.options.batchPauseMs,
      token,
      progress: { startStep: 0, totalSteps, onProgress },
    });

    stage = "filter";
    const aggregated = aggregateFindings(outcomes, job.settings.maxResults);
    job.findings.push(...aggregated.findings);
    job.sources.push(...aggregated.sources);
    await onProgress({ step: queries.length + 1, totalSteps, label: STAGE_LABELS.filter });

    token.throwIfCancelled("synthesis");
    stage = "synthesis";
    await onProgress({ step: queries.length + 2, totalSteps, label: STAGE_LABELS.synthesis });
    const narrative = await synthesize(job, deps);
    token.throwIfCancelled("assembly");

    stage = "assembly";
    await onProgress({ step: totalSteps, totalSteps, label: STAGE_LABELS.assembly });
    const document = assembleReport({
      topic: job.topic,
      narrative,
      findings: job.findings,
      sources: job.sources,
      counts: { queries: queries.length },
      language: job.settings.language,
      generatedAt: now(),
    });
    return { narrative, document, markdown: renderMarkdown(document) };
  } catch (error) {
    if (error instanceof PipelineCancelledError || error instanceof PipelineFaultError) {
      throw error;
    }
    throw new PipelineFaultError(stage, error);
  }
}

/** Never throws: timeouts and failures become a placeholder narrative. */
async function synthesize(job: ResearchJob, deps: PipelineDeps) {
  const fallback = SYNTHESIS_FALLBACK[job.settings.language];
  const timeoutMs = deps.options.synthesisTimeoutMs;
  try {
    return await withTimeout(
      (signal) =>
        deps.synthesizer.generate(job.findings, job.topic, {
          language: job.settings.language,
          signal,
        }),
      timeoutMs,
    );
  } catch (error) {
    if (error instanceof TimeoutError) {
      const timeout = new SynthesisTimeoutError(timeoutMs);
      logger.warn({ userId: job.userId, timeoutMs }, timeout.message);
      return fallback.timeout;
    }
    const failure =
      error instanceof SynthesisFailureError
        ? error
        : new SynthesisFailureError(describeError(error), { transient: false, cause: error });
    logger.error({ userId: job.userId, error: failure.message }, "Report synthesis failed");
    return `${fallback.failure} ${failure.message}`;
  }
}
