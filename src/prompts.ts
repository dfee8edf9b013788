import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { ReportLanguage } from "./types/settings";

const promptsDir = path.resolve(__dirname, "..", "prompts");

function loadPrompt(name: string) {
  return fs.readFileSync(path.join(promptsDir, `${name}.md`), "utf8").trim();
}

function byLanguage(name: string): Record<ReportLanguage, string> {
  return { ru: loadPrompt(`${name}.ru`), en: loadPrompt(`${name}.en`) };
}

const localizedList = z.object({
  ru: z.array(z.string().includes("{topic}")).min(1),
  en: z.array(z.string().includes("{topic}")).min(1),
});

const queryTemplatesSchema = z.object({
  base: localizedList,
  deep: localizedList,
  domains: z.array(
    z.object({
      name: z.string(),
      keywords: z.array(z.string().min(1)).min(1),
      templates: localizedList,
    }),
  ),
});

export type QueryTemplates = z.infer<typeof queryTemplatesSchema>;

function loadQueryTemplates(): QueryTemplates {
  const raw = fs.readFileSync(path.join(promptsDir, "query-templates.json"), "utf8");
  return queryTemplatesSchema.parse(JSON.parse(raw));
}

export const prompts = {
  synthesizer: byLanguage("synthesizer"),
  reportRequest: byLanguage("report-request"),
  queryTemplates: loadQueryTemplates(),
};
