import { describe, expect, it } from "vitest";
import type { JobSnapshot } from "../../types/job";
import { TEST_SETTINGS } from "../../__tests__/support/fakes";
import { parseCommand } from "../commands";
import { progressBar, progressFallbackText, progressText, sourcesFileText, statusText } from "../messages";

describe("parseCommand", () => {
  it("treats plain text as an implicit research request", () => {
    expect(parseCommand("  quantum computing ")).toEqual({ kind: "research", topic: "quantum computing" });
  });

  it("joins research arguments into the topic", () => {
    expect(parseCommand("/research AI   in medicine")).toEqual({ kind: "research", topic: "AI in medicine" });
    expect(parseCommand("/research")).toEqual({ kind: "research", topic: "" });
  });

  it("strips the bot mention and ignores case", () => {
    expect(parseCommand("/STATUS@research_bot")).toEqual({ kind: "status" });
  });

  it("passes settings arguments through", () => {
    expect(parseCommand("/settings depth on")).toEqual({ kind: "settings", args: ["depth", "on"] });
    expect(parseCommand("/settings")).toEqual({ kind: "settings", args: [] });
  });

  it("ignores unknown commands and blank text", () => {
    expect(parseCommand("/launch rockets")).toEqual({ kind: "ignored" });
    expect(parseCommand("   ")).toEqual({ kind: "ignored" });
  });
});

describe("progress messages", () => {
  it("fills one cell per five percent", () => {
    expect(progressBar(0, 10)).toBe("□".repeat(20));
    expect(progressBar(5, 10)).toBe("■".repeat(10) + "□".repeat(10));
    expect(progressBar(12, 10)).toBe("■".repeat(20));
  });

  it("shows percentage, step and time left", () => {
    expect(progressText({ step: 3, totalSteps: 11, label: "Searching: solar" })).toBe(
      [
        "Research in progress",
        "",
        "Current stage:",
        "Searching: solar",
        "",
        "Progress: 27% (3/11)",
        "■".repeat(5) + "□".repeat(15),
        "",
        "Estimated time left: 120 s",
      ].join("\n"),
    );
    expect(progressFallbackText({ step: 11, totalSteps: 11, label: "Preparing final report" })).toBe(
      "Preparing final report - 100%",
    );
  });
});

describe("statusText", () => {
  const snapshot: JobSnapshot = {
    userId: "42",
    topic: "solar power",
    status: "running",
    createdAt: "2024-03-05T14:07:00.000Z",
    durationSeconds: null,
    settings: TEST_SETTINGS,
    queries: [],
    findings: [],
    sources: [],
    report: null,
    progress: { step: 2, totalSteps: 11, label: "Searching: solar power overview" },
    error: null,
    reportAssets: null,
    elapsedSeconds: 75,
  };

  it("describes a running job with its stage", () => {
    expect(statusText(snapshot)).toBe(
      [
        "Research status",
        "",
        "Topic: solar power",
        "Time: 1 min 15 s",
        "Status: running",
        "Stage: Searching: solar power overview (2/11)",
      ].join("\n"),
    );
  });

  it("reports when there is no job", () => {
    expect(statusText(null)).toBe("No research yet.\n\nSend a topic to start one.");
  });
});

describe("sourcesFileText", () => {
  it("lists at most thirty sources with shortened titles", () => {
    const sources = Array.from({ length: 35 }, (_, i) => ({
      index: i + 1,
      title: i === 0 ? "x".repeat(100) : `Source ${i + 1}`,
      link: `https://s.test/${i + 1}`,
    }));

    const lines = sourcesFileText("solar", sources).split("\n");

    expect(lines[0]).toBe("Sources for: solar");
    expect(lines[2]).toBe(`1. ${"x".repeat(80)}`);
    expect(lines[3]).toBe("   https://s.test/1");
    expect(lines.filter((line) => line.startsWith("   https://"))).toHaveLength(30);
  });
});
