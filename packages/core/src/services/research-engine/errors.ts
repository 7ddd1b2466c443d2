/**
 * Research engine error taxonomy
 *
 * Every error raised by the engine carries a stable `code` so adapters (the
 * HTTP API, the terminal driver) can map it without string matching.
 */

import type { PipelineStage, RunStatus } from "../../models/run-state";

export type ResearchErrorCode =
  | "provider_error"
  | "delivery_error"
  | "invalid_transition"
  | "answer_mismatch"
  | "invalid_request"
  | "run_not_found"
  | "run_cancelled"
  | "stream_consumed";

export class ResearchError extends Error {
  readonly code: ResearchErrorCode;
  readonly stage?: PipelineStage;

  constructor(
    code: ResearchErrorCode,
    message: string,
    options?: { cause?: unknown; stage?: PipelineStage }
  ) {
    super(message, { cause: options?.cause });
    this.name = new.target.name;
    this.code = code;
    this.stage = options?.stage;
  }
}

/**
 * A completion or search provider failed: timeout, malformed output,
 * rate limit, network or provider-side error
 */
export class ProviderError extends ResearchError {
  constructor(
    message: string,
    options?: { cause?: unknown; stage?: PipelineStage }
  ) {
    super("provider_error", message, options);
  }
}

/**
 * The notifier failed. Never fatal to a run.
 */
export class DeliveryError extends ResearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("delivery_error", message, { ...options, stage: "deliver" });
  }
}

/**
 * An operation was invoked in a state that does not allow it
 */
export class InvalidTransitionError extends ResearchError {
  readonly status: RunStatus;

  constructor(operation: string, status: RunStatus, detail?: string) {
    super(
      "invalid_transition",
      `Cannot ${operation} while run is ${status}${detail ? ` (${detail})` : ""}`
    );
    this.status = status;
  }
}

/**
 * Supplied answers do not match the pending questions one to one
 */
export class AnswerMismatchError extends ResearchError {
  readonly missing: string[];
  readonly unknown: string[];
  readonly duplicated: string[];

  constructor(mismatch: {
    missing: string[];
    unknown: string[];
    duplicated: string[];
  }) {
    const parts: string[] = [];
    if (mismatch.missing.length > 0) {
      parts.push(`missing answers for ${mismatch.missing.join(", ")}`);
    }
    if (mismatch.unknown.length > 0) {
      parts.push(`unknown question ids ${mismatch.unknown.join(", ")}`);
    }
    if (mismatch.duplicated.length > 0) {
      parts.push(`duplicate answers for ${mismatch.duplicated.join(", ")}`);
    }
    super("answer_mismatch", `Answers do not match pending questions: ${parts.join("; ")}`);
    this.missing = mismatch.missing;
    this.unknown = mismatch.unknown;
    this.duplicated = mismatch.duplicated;
  }
}

export class InvalidRequestError extends ResearchError {
  constructor(message: string) {
    super("invalid_request", message);
  }
}

export class RunNotFoundError extends ResearchError {
  constructor(runId: string) {
    super("run_not_found", `Research run ${runId} not found`);
  }
}

/**
 * Raised inside a run when work is abandoned because the run was cancelled
 */
export class RunCancelledError extends ResearchError {
  constructor(runId: string) {
    super("run_cancelled", `Research run ${runId} was cancelled`);
  }
}

/**
 * A run's event stream already has its consumer
 */
export class StreamConsumedError extends ResearchError {
  constructor() {
    super("stream_consumed", "Event stream can only be consumed once");
  }
}

/**
 * Human-readable message for any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
