/**
 * Error taxonomy for the research pipeline. User-facing errors carry the
 * affected user id; per-call faults carry the tool that raised them.
 */

export class AlreadyActiveError extends Error {
  readonly userId: string;

  constructor(userId: string) {
    super("A research job is already running for this user");
    this.name = "AlreadyActiveError";
    this.userId = userId;
  }
}

export class NoActiveJobError extends Error {
  readonly userId: string;

  constructor(userId: string) {
    super("No active research job for this user");
    this.name = "NoActiveJobError";
    this.userId = userId;
  }
}

export class GatewayTimeoutError extends Error {
  constructor(readonly query: string, readonly timeoutMs: number) {
    super(`Search timed out after ${timeoutMs}ms`);
    this.name = "GatewayTimeoutError";
  }
}

export class GatewayFailureError extends Error {
  /** False for faults that retrying cannot fix (4xx other than 429). */
  readonly transient: boolean;
  readonly status?: number;

  constructor(message: string, opts: { transient: boolean; status?: number; cause?: unknown }) {
    super(message, { cause: opts.cause });
    this.name = "GatewayFailureError";
    this.transient = opts.transient;
    this.status = opts.status;
  }
}

export class SynthesisTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Report synthesis timed out after ${timeoutMs}ms`);
    this.name = "SynthesisTimeoutError";
  }
}

export class SynthesisFailureError extends Error {
  readonly transient: boolean;
  readonly status?: number;

  constructor(message: string, opts: { transient: boolean; status?: number; cause?: unknown }) {
    super(message, { cause: opts.cause });
    this.name = "SynthesisFailureError";
    this.transient = opts.transient;
    this.status = opts.status;
  }
}

export class PipelineCancelledError extends Error {
  constructor(readonly stage: string) {
    super(`Research cancelled during ${stage}`);
    this.name = "PipelineCancelledError";
  }
}

export class PipelineFaultError extends Error {
  constructor(readonly stage: string, cause: unknown) {
    super(`Research failed during ${stage}: ${describeError(cause)}`, { cause });
    this.name = "PipelineFaultError";
  }
}

export class SettingsValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SettingsValidationError";
  }
}

export function describeError(error: unknown) {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
