import { PipelineCancelledError } from "../errors";

/**
 * Cooperative cancellation flag. Work checks it at its own suspension points;
 * nothing in flight is interrupted.
 */
export class CancellationToken {
  private readonly controller = new AbortController();

  get isCancelled() {
    return this.controller.signal.aborted;
  }

  /** Fires when cancellation is requested; used to cut pauses short. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  cancel() {
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
  }

  throwIfCancelled(stage: string) {
    if (this.isCancelled) {
      throw new PipelineCancelledError(stage);
    }
  }
}
