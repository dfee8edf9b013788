import { NoActiveJobError, PipelineCancelledError, PipelineFaultError, describeError } from "../errors";
import { logger } from "../logger";
import { jobDurationHistogram, jobInterruptedCounter, jobStatusCounter } from "../metrics";
import type { JobSnapshot, JobStatus, ProgressCursor, ReportAssets, ResearchJob } from "../types/job";
import { isTerminalStatus } from "../types/job";
import type { ReportSynthesizer, SearchGateway } from "../types/gateways";
import type { JobStore } from "../types/stores";
import { CancellationToken } from "../utils/cancellation";
import { slugify } from "../utils/text";
import { JobRegistry } from "./jobRegistry";
import type { ReportStorage } from "./objectStorage";
import { archiveReport, PdfRenderer, renderPdfSafely } from "./reportBuilder";
import { PipelineOptions, runResearchPipeline } from "./researchPipeline";
import { SettingsService } from "./settingsService";

export const INTERRUPTED_MESSAGE = "interrupted by restart";

export interface CompletionArtifacts {
  markdown: string;
  /** `null` when PDF rendering is disabled or failed. */
  pdf: Buffer | null;
  /** `report_<topic>_<unix seconds>`, without extension. */
  fileStem: string;
}

/** Receives lifecycle events after the matching state has been persisted. */
export interface JobNotifier {
  onProgress(snapshot: JobSnapshot): Promise<void>;
  onCompleted(snapshot: JobSnapshot, artifacts: CompletionArtifacts): Promise<void>;
  onCancelled(snapshot: JobSnapshot): Promise<void>;
  onFailed(snapshot: JobSnapshot): Promise<void>;
}

export interface JobManagerDeps {
  registry: JobRegistry;
  jobStore: JobStore;
  settings: SettingsService;
  gateway: SearchGateway;
  synthesizer: ReportSynthesizer;
  options: PipelineOptions;
  pdfRenderer?: PdfRenderer | null;
  storage?: ReportStorage | null;
  notifier?: JobNotifier | null;
  now?: () => Date;
}

export function reportFileStem(topic: string, at: Date) {
  return `report_${slugify(topic, 40)}_${Math.floor(at.getTime() / 1000)}`;
}

/**
 * Owns the research job lifecycle: one background unit per user, cooperative
 * cancellation, persistence on every status transition.
 */
export class JobManager {
  private notifier: JobNotifier | null;
  private readonly units = new Set<Promise<void>>();
  private readonly now: () => Date;

  constructor(private readonly deps: JobManagerDeps) {
    this.notifier = deps.notifier ?? null;
    this.now = deps.now ?? (() => new Date());
  }

  setNotifier(notifier: JobNotifier | null) {
    this.notifier = notifier;
  }

  hasActive(userId: string) {
    return this.deps.registry.hasActive(userId);
  }

  async start(userId: string, topic: string): Promise<JobSnapshot> {
    const { registry } = this.deps;
    const handle = registry.reserve(userId);
    const settings = await this.deps.settings.get(userId).catch((error: unknown) => {
      registry.release(userId);
      throw error;
    });
    const job: ResearchJob = {
      userId,
      topic: topic.trim(),
      status: "pending",
      createdAt: this.now().toISOString(),
      durationSeconds: null,
      settings,
      queries: [],
      findings: [],
      sources: [],
      report: null,
      progress: null,
      error: null,
      reportAssets: null,
    };
    registry.setJob(job);
    await this.persist(job);
    await this.transition(job, "running");
    logger.info({ userId, topic: job.topic, settings: job.settings }, "Research job started");

    const unit = this.execute(job, handle.token)
      .catch((error) => {
        logger.error({ userId, error: describeError(error) }, "Research unit crashed");
        this.deps.registry.release(userId);
      })
      .finally(() => {
        this.units.delete(unit);
      });
    this.units.add(unit);
    return this.snapshot(job);
  }

  /** Signals cancellation and resolves once the job is in a terminal state. */
  async cancel(userId: string): Promise<JobSnapshot> {
    const handle = this.deps.registry.getHandle(userId);
    if (!handle) {
      throw new NoActiveJobError(userId);
    }
    handle.token.cancel();
    logger.info({ userId }, "Research job cancellation requested");
    await handle.completion;
    const job = this.deps.registry.getJob(userId);
    if (!job) {
      throw new NoActiveJobError(userId);
    }
    return this.snapshot(job);
  }

  async status(userId: string): Promise<JobSnapshot | null> {
    const job = await this.latestJob(userId);
    return job ? this.snapshot(job) : null;
  }

  async listSources(userId: string) {
    const job = await this.latestJob(userId);
    return job ? job.sources.map((source) => ({ ...source })) : [];
  }

  /** Cancels every active unit and waits for all of them. */
  async shutdown() {
    const { registry } = this.deps;
    for (const userId of registry.activeUserIds()) {
      registry.getHandle(userId)?.token.cancel();
    }
    logger.info({ active: this.units.size }, "Waiting for research jobs to stop");
    await Promise.allSettled([...this.units]);
  }

  /** Closes jobs a previous process left unfinished; returns how many. */
  async recoverInterrupted() {
    const unfinished = await this.deps.jobStore.listUnfinished();
    for (const job of unfinished) {
      job.status = "error";
      job.error = INTERRUPTED_MESSAGE;
      job.durationSeconds = this.secondsSince(job.createdAt);
      await this.persist(job);
      jobInterruptedCounter.inc();
    }
    if (unfinished.length) {
      logger.warn({ count: unfinished.length }, "Marked interrupted research jobs as failed");
    }
    return unfinished.length;
  }

  private async execute(job: ResearchJob, token: CancellationToken) {
    const stopTimer = jobDurationHistogram.startTimer();
    let outcome: JobStatus = "error";
    try {
      const result = await runResearchPipeline(
        job,
        {
          gateway: this.deps.gateway,
          synthesizer: this.deps.synthesizer,
          options: this.deps.options,
          now: this.now,
        },
        token,
        (cursor) => this.reportProgress(job, cursor),
      );
      const fileStem = reportFileStem(job.topic, this.now());
      const pdf = await renderPdfSafely(this.deps.pdfRenderer ?? null, result.markdown, fileStem);
      token.throwIfCancelled("delivery");

      job.report = result.markdown;
      job.reportAssets = await this.archive(job, fileStem, result.markdown, pdf);
      outcome = "done";
      await this.transition(job, "done");
      logger.info(
        { userId: job.userId, sources: job.sources.length, durationSeconds: job.durationSeconds },
        "Research job completed",
      );
      await this.notify(job, (notifier, snapshot) =>
        notifier.onCompleted(snapshot, { markdown: result.markdown, pdf, fileStem }),
      );
    } catch (error) {
      if (error instanceof PipelineCancelledError) {
        outcome = "cancelled";
        await this.transition(job, "cancelled");
        logger.info({ userId: job.userId, stage: error.stage }, "Research job cancelled");
        await this.notify(job, (notifier, snapshot) => notifier.onCancelled(snapshot));
      } else {
        outcome = "error";
        job.error = describeError(error);
        await this.transition(job, "error");
        logger.error(
          {
            userId: job.userId,
            topic: job.topic,
            stage: error instanceof PipelineFaultError ? error.stage : undefined,
            error: job.error,
          },
          "Research job failed",
        );
        await this.notify(job, (notifier, snapshot) => notifier.onFailed(snapshot));
      }
    } finally {
      stopTimer({ status: outcome });
    }
  }

  /**
   * Applies a status change, persists it, and on terminal states releases the
   * user's slot. Terminal jobs never move again.
   */
  private async transition(job: ResearchJob, status: JobStatus) {
    if (isTerminalStatus(job.status)) {
      return;
    }
    job.status = status;
    if (isTerminalStatus(status)) {
      job.durationSeconds = this.secondsSince(job.createdAt);
    }
    jobStatusCounter.labels(status).inc();
    await this.persist(job);
    if (isTerminalStatus(status)) {
      this.deps.registry.release(job.userId);
    }
  }

  private async reportProgress(job: ResearchJob, cursor: ProgressCursor) {
    job.progress = { ...cursor };
    await this.notify(job, (notifier, snapshot) => notifier.onProgress(snapshot));
  }

  private async archive(
    job: ResearchJob,
    fileStem: string,
    markdown: string,
    pdf: Buffer | null,
  ): Promise<ReportAssets | null> {
    if (!this.deps.storage) {
      return null;
    }
    try {
      return await archiveReport(this.deps.storage, `${job.userId}/${fileStem}`, markdown, pdf);
    } catch (error) {
      logger.warn({ userId: job.userId, error: describeError(error) }, "Report archive upload failed");
      return null;
    }
  }

  private async persist(job: ResearchJob) {
    try {
      await this.deps.jobStore.save(job);
    } catch (error) {
      logger.error(
        { userId: job.userId, status: job.status, error: describeError(error) },
        "Failed to persist research job",
      );
    }
  }

  /** Delivery is best-effort; failures are logged and never reach the pipeline. */
  private async notify(
    job: ResearchJob,
    deliver: (notifier: JobNotifier, snapshot: JobSnapshot) => Promise<void>,
  ) {
    if (!this.notifier) {
      return;
    }
    try {
      await deliver(this.notifier, this.snapshot(job));
    } catch (error) {
      logger.warn({ userId: job.userId, error: describeError(error) }, "Job notification failed");
    }
  }

  private async latestJob(userId: string) {
    return this.deps.registry.getJob(userId) ?? (await this.deps.jobStore.load(userId));
  }

  private snapshot(job: ResearchJob): JobSnapshot {
    const elapsedSeconds =
      isTerminalStatus(job.status) && job.durationSeconds !== null
        ? job.durationSeconds
        : this.secondsSince(job.createdAt);
    return { ...structuredClone(job), elapsedSeconds };
  }

  private secondsSince(iso: string) {
    const started = new Date(iso).getTime();
    if (Number.isNaN(started)) {
      return 0;
    }
    return Math.max(0, Math.round((this.now().getTime() - started) / 1000));
  }
}
