import type { ResearchJob } from "./job";
import type { ResearchSettings } from "./settings";

/** Latest job snapshot per user. */
export interface JobStore {
  save(job: ResearchJob): Promise<void>;
  load(userId: string): Promise<ResearchJob | null>;
  listUnfinished(): Promise<ResearchJob[]>;
}

export interface SettingsStore {
  load(userId: string): Promise<ResearchSettings | null>;
  save(userId: string, settings: ResearchSettings): Promise<void>;
}
