import { describe, expect, it } from "vitest";
import type { QueryTemplates } from "../../prompts";
import { MAX_QUERIES, matchesAnyKeyword, planQueries } from "../queryPlanner";

describe("planQueries", () => {
  it("returns the eight base templates when deep analysis is off", () => {
    const queries = planQueries("quantum computing", { deepAnalysis: false, language: "en" });

    expect(queries).toHaveLength(8);
    expect(queries[0]).toBe("quantum computing overview");
    expect(queries.every((query) => query.includes("quantum computing"))).toBe(true);
  });

  it("appends deep templates after the base ones", () => {
    const base = planQueries("quantum computing", { deepAnalysis: false, language: "en" });
    const deep = planQueries("quantum computing", { deepAnalysis: true, language: "en" });

    expect(deep).toHaveLength(14);
    expect(deep.slice(0, base.length)).toEqual(base);
    expect(deep[8]).toBe("quantum computing case study practical examples");
  });

  it("adds two variants from the first matching domain", () => {
    const queries = planQueries("AI in medicine", { deepAnalysis: true, language: "en" });

    expect(queries).toHaveLength(16);
    expect(queries.slice(-2)).toEqual([
      "AI in medicine adoption use cases",
      "AI in medicine startups leading companies",
    ]);
  });

  it("uses the templates of the selected language", () => {
    const queries = planQueries("рынок электромобилей", { deepAnalysis: false, language: "ru" });

    expect(queries[0]).toBe("рынок электромобилей обзор");
  });

  it("collapses whitespace in the topic", () => {
    const [first] = planQueries("  solar   panels ", { deepAnalysis: false, language: "en" });

    expect(first).toBe("solar panels overview");
  });

  it("never exceeds the cap and drops duplicate queries", () => {
    const templates: QueryTemplates = {
      base: { ru: ["{topic}"], en: Array.from({ length: 12 }, (_, i) => `{topic} base ${i}`) },
      deep: { ru: ["{topic}"], en: ["{topic} base 0", ...Array.from({ length: 10 }, (_, i) => `{topic} deep ${i}`)] },
      domains: [],
    };

    const queries = planQueries("topic", { deepAnalysis: true, language: "en" }, templates);

    expect(queries).toHaveLength(MAX_QUERIES);
    expect(new Set(queries.map((query) => query.toLowerCase())).size).toBe(queries.length);
    expect(queries[12]).toBe("topic deep 0");
  });
});

describe("matchesAnyKeyword", () => {
  it("matches short keywords only as whole words", () => {
    expect(matchesAnyKeyword("AI in medicine", ["ai"])).toBe(true);
    expect(matchesAnyKeyword("sustainable agriculture", ["ai"])).toBe(false);
  });

  it("matches longer keywords as word prefixes", () => {
    expect(matchesAnyKeyword("Technological change", ["technolog"])).toBe(true);
    expect(matchesAnyKeyword("biotech", ["tech"])).toBe(false);
  });

  it("matches multi-word keywords as a phrase", () => {
    expect(matchesAnyKeyword("Machine learning at scale", ["machine learning"])).toBe(true);
    expect(matchesAnyKeyword("learning machine", ["machine learning"])).toBe(false);
  });
});
