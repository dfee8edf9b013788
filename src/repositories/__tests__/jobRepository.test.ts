import { describe, expect, it } from "vitest";
import { parseJobSnapshot } from "../jobRepository";

describe("parseJobSnapshot", () => {
  it("fills optional fields of older snapshots", () => {
    const job = parseJobSnapshot({
      userId: "42",
      topic: "solar power",
      status: "done",
      createdAt: "2024-03-05T14:07:00.000Z",
      settings: { maxResults: 5, deepAnalysis: false, language: "en" },
    });

    expect(job).toEqual({
      userId: "42",
      topic: "solar power",
      status: "done",
      createdAt: "2024-03-05T14:07:00.000Z",
      durationSeconds: null,
      settings: { maxResults: 5, deepAnalysis: false, language: "en" },
      queries: [],
      findings: [],
      sources: [],
      report: null,
      progress: null,
      error: null,
      reportAssets: null,
    });
  });

  it("discards rows that do not describe a job", () => {
    expect(parseJobSnapshot({ userId: "42", status: "exploded" })).toBeNull();
    expect(parseJobSnapshot("not json")).toBeNull();
  });
});
