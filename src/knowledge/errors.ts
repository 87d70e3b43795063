// src/knowledge/errors.ts
// Error taxonomy for the query pipeline.
//
// Empty context and missing graph matches are not errors: they shape the
// verdict and are recorded in the reasoning steps instead.

export type PipelineStage =
  | "classifying"
  | "retrieving"
  | "merging"
  | "generating"
  | "validating";

/** Rejected before any pipeline work starts (empty question, bad top_k) */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

/** A single capability attempt exceeded its time budget */
export class CapabilityTimeoutError extends Error {
  constructor(action: string, timeoutMs: number) {
    super(`${action} timed out after ${timeoutMs}ms`);
    this.name = "CapabilityTimeoutError";
  }
}

/** A capability kept failing after its retry */
export class CapabilityUnavailableError extends Error {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, cause: unknown) {
    super(`Capability unavailable during ${stage}: ${errorMessage(cause)}`, { cause });
    this.name = "CapabilityUnavailableError";
    this.stage = stage;
  }
}

/** The run's deadline elapsed or the caller went away */
export class PipelineTimeoutError extends Error {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, reason: string) {
    super(`Pipeline aborted during ${stage}: ${reason}`);
    this.name = "PipelineTimeoutError";
    this.stage = stage;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Error thrown by an aborted signal, or a generic one */
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error("Operation aborted");
}
