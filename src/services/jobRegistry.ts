import { AlreadyActiveError } from "../errors";
import type { ResearchJob } from "../types/job";
import { CancellationToken } from "../utils/cancellation";

export interface JobHandle {
  token: CancellationToken;
  /** Resolves when the handle is released, i.e. the job reached a terminal state. */
  completion: Promise<void>;
}

interface HandleEntry extends JobHandle {
  settle: () => void;
}

/**
 * Process-wide per-user state: running handles, and the latest job each user
 * started. Handles are removed on terminal transition; jobs stay for display.
 */
export class JobRegistry {
  private readonly handles = new Map<string, HandleEntry>();
  private readonly jobs = new Map<string, ResearchJob>();

  /** Claims the user's single slot; synchronous so two starts cannot interleave. */
  reserve(userId: string): JobHandle {
    if (this.handles.has(userId)) {
      throw new AlreadyActiveError(userId);
    }
    let settle: () => void = () => undefined;
    const completion = new Promise<void>((resolve) => {
      settle = resolve;
    });
    const entry: HandleEntry = { token: new CancellationToken(), completion, settle };
    this.handles.set(userId, entry);
    return { token: entry.token, completion };
  }

  release(userId: string) {
    const entry = this.handles.get(userId);
    if (entry) {
      this.handles.delete(userId);
      entry.settle();
    }
  }

  getHandle(userId: string): JobHandle | null {
    const entry = this.handles.get(userId);
    return entry ? { token: entry.token, completion: entry.completion } : null;
  }

  hasActive(userId: string) {
    return this.handles.has(userId);
  }

  activeUserIds() {
    return [...this.handles.keys()];
  }

  setJob(job: ResearchJob) {
    this.jobs.set(job.userId, job);
  }

  getJob(userId: string) {
    return this.jobs.get(userId) ?? null;
  }
}
