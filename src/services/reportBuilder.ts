import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import crypto from "node:crypto";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { ReportAssets } from "../types/job";
import type { ReportLanguage } from "../types/settings";
import type { ReportDocument } from "./reportAssembler";
import type { ReportStorage } from "./objectStorage";
import { logger } from "../logger";
import { describeError } from "../errors";
import { startToolTimer, recordToolError } from "../metrics";
import { collapseWhitespace } from "../utils/text";

const execFileAsync = promisify(execFile);

const LABELS: Record<ReportLanguage, Record<string, string>> = {
  en: {
    title: "Research report",
    created: "Created",
    sources: "Sources analysed",
    findings: "Key findings",
    narrative: "Analytical report",
    noNarrative: "Report was not generated",
    details: "Detailed findings",
    description: "Description",
    source: "Source",
    sourceList: "Sources",
    untitled: "Untitled",
    about: "About this report",
    queries: "Search queries executed",
    unique: "Unique sources found",
    generatedAt: "Generated at",
    generator: "Generator",
  },
  ru: {
    title: "Исследовательский отчёт",
    created: "Дата создания",
    sources: "Источников проанализировано",
    findings: "Ключевых находок",
    narrative: "Аналитический отчёт",
    noNarrative: "Отчёт не сгенерирован",
    details: "Детальные находки",
    description: "Описание",
    source: "Источник",
    sourceList: "Источники",
    untitled: "Без названия",
    about: "Информация о создании",
    queries: "Поисковых запросов выполнено",
    unique: "Уникальных источников найдено",
    generatedAt: "Время создания",
    generator: "Генератор",
  },
};

/** `dd.mm.yyyy HH:MM UTC`; unparseable input is returned unchanged. */
export function formatTimestamp(iso: string) {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    return iso;
  }
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${pad(date.getUTCDate())}.${pad(date.getUTCMonth() + 1)}.${date.getUTCFullYear()} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())} UTC`
  );
}

export function renderMarkdown(document: ReportDocument) {
  const t = LABELS[document.language];
  const sections: string[] = [];

  sections.push(`# ${t.title}: ${document.header.topic}`);
  sections.push(
    [
      `**${t.created}:** ${formatTimestamp(document.header.generatedAt)}`,
      `**${t.sources}:** ${document.header.sourceCount}`,
      `**${t.findings}:** ${document.header.findingCount}`,
    ].join("  \n"),
  );
  sections.push("---");

  sections.push(`## ${t.narrative}`);
  sections.push(document.narrative.trim() || t.noNarrative);
  sections.push("---");

  if (document.findings.length) {
    sections.push(`## ${t.details}`);
    for (const finding of document.findings) {
      sections.push(`### ${finding.ordinal}. ${finding.title || t.untitled}`);
      sections.push(`**${t.description}:** ${collapseWhitespace(finding.snippet)}`);
      sections.push(`**${t.source}:** [${finding.sourceIndex}] ${finding.link}`);
    }
    sections.push("---");
  }

  if (document.sources.length) {
    sections.push(`## ${t.sourceList}`);
    sections.push(
      document.sources
        .map((source) => {
          const title = source.title || t.untitled;
          const link = source.link ? `[${source.link}](${source.link})` : "";
          return `${source.index}. **${title}**  \n   ${link}`.trimEnd();
        })
        .join("\n"),
    );
    sections.push("---");
  }

  sections.push(`## ${t.about}`);
  sections.push(
    [
      `- **${t.queries}:** ${document.footer.queriesExecuted}`,
      `- **${t.unique}:** ${document.footer.uniqueSources}`,
      `- **${t.generatedAt}:** ${formatTimestamp(document.footer.generatedAt)}`,
      `- **${t.generator}:** ${document.footer.generator}`,
    ].join("\n"),
  );

  return `${sections.join("\n\n")}\n`;
}

export interface PdfRenderer {
  render(markdown: string, jobKey: string): Promise<Buffer>;
}

/** Converts Markdown to PDF by shelling out to pandoc. */
export class PandocPdfRenderer implements PdfRenderer {
  private pandocCheck: Promise<void> | null = null;

  constructor(private readonly pandocPath = "pandoc") {}

  async render(markdown: string, jobKey: string) {
    await this.ensureAvailable();
    const tmpDir = path.join(os.tmpdir(), "research-reports", `${jobKey}-${crypto.randomUUID()}`);
    await fs.mkdir(tmpDir, { recursive: true });
    const stopTimer = startToolTimer("pandoc");
    try {
      const mdPath = path.join(tmpDir, "report.md");
      const pdfPath = path.join(tmpDir, "report.pdf");
      await fs.writeFile(mdPath, markdown, "utf8");
      await execFileAsync(this.pandocPath, [
        mdPath,
        "-o",
        pdfPath,
        "--from",
        "markdown",
        "--pdf-engine=xelatex",
        "-V",
        "mainfont=DejaVu Sans",
      ]);
      return await fs.readFile(pdfPath);
    } catch (error) {
      recordToolError("pandoc", "convert");
      throw new Error(`pandoc conversion failed: ${describeError(error)}`, { cause: error });
    } finally {
      stopTimer();
      await fs.rm(tmpDir, { recursive: true, force: true });
    }
  }

  private ensureAvailable() {
    if (!this.pandocCheck) {
      this.pandocCheck = execFileAsync(this.pandocPath, ["--version"])
        .then(() => undefined)
        .catch((error) => {
          this.pandocCheck = null;
          recordToolError("pandoc", "missing");
          throw new Error("pandoc binary missing or unusable", { cause: error });
        });
    }
    return this.pandocCheck;
  }
}

/** PDF output is optional: any failure yields `null`. */
export async function renderPdfSafely(
  renderer: PdfRenderer | null,
  markdown: string,
  jobKey: string,
): Promise<Buffer | null> {
  if (!renderer) {
    return null;
  }
  try {
    return await renderer.render(markdown, jobKey);
  } catch (error) {
    logger.warn({ jobKey, error: describeError(error) }, "PDF rendering unavailable");
    return null;
  }
}

export async function archiveReport(
  storage: ReportStorage,
  keyPrefix: string,
  markdown: string,
  pdf: Buffer | null,
): Promise<ReportAssets> {
  const mdBuffer = Buffer.from(markdown, "utf8");
  const markdownUrl = await storage.putObject(
    `reports/${keyPrefix}/report.md`,
    mdBuffer,
    "text/markdown; charset=utf-8",
  );
  const pdfUrl = pdf
    ? await storage.putObject(`reports/${keyPrefix}/report.pdf`, pdf, "application/pdf")
    : null;

  return {
    markdown_url: markdownUrl,
    pdf_url: pdfUrl,
    checksums: {
      markdown: sha256(mdBuffer),
      pdf: pdf ? sha256(pdf) : null,
    },
  };
}

function sha256(buffer: Buffer) {
  return crypto.createHash("sha256").update(buffer).digest("hex");
}
