import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export const metricsRegistry = new Registry();
collectDefaultMetrics({ register: metricsRegistry });

export const jobStatusCounter = new Counter({
  name: "research_jobs_total",
  help: "Research jobs by lifecycle status",
  labelNames: ["status"],
  registers: [metricsRegistry],
});

export const jobDurationHistogram = new Histogram({
  name: "research_job_duration_seconds",
  help: "End-to-end research job duration in seconds",
  buckets: [10, 30, 60, 120, 300, 600],
  labelNames: ["status"],
  registers: [metricsRegistry],
});

export const toolLatencyHistogram = new Histogram({
  name: "research_tool_latency_seconds",
  help: "Latency for external tool calls",
  buckets: [0.25, 0.5, 1, 2, 5, 10, 20, 45],
  labelNames: ["tool"],
  registers: [metricsRegistry],
});

export const toolErrorsCounter = new Counter({
  name: "research_tool_errors_total",
  help: "External tool failures by tool and stage",
  labelNames: ["tool", "stage"],
  registers: [metricsRegistry],
});

export const reportUploadsCounter = new Counter({
  name: "research_report_uploads_total",
  help: "Report archive uploads by status",
  labelNames: ["status"],
  registers: [metricsRegistry],
});

export const jobInterruptedCounter = new Counter({
  name: "research_jobs_interrupted_total",
  help: "Jobs found unfinished at startup and closed as interrupted",
  registers: [metricsRegistry],
});

export function startToolTimer(tool: string) {
  return toolLatencyHistogram.startTimer({ tool });
}

export function recordToolError(tool: string, stage: string) {
  toolErrorsCounter.labels(tool, stage).inc();
}

export function recordReportUpload(status: "success" | "error") {
  reportUploadsCounter.labels(status).inc();
}
