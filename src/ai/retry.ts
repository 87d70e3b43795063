// src/ai/retry.ts
// Timeout + retry helpers for capability calls.
//
// Every attempt gets its own AbortSignal, linked to the caller's signal, so a
// timed-out or cancelled attempt stops the underlying HTTP request instead of
// leaving it in flight.

import { CapabilityTimeoutError, abortReason } from "../knowledge/errors";

/**
 * Run `run` with a deadline. The signal handed to `run` aborts when the
 * deadline passes or when `parent` aborts; the returned promise rejects with
 * CapabilityTimeoutError or the parent's abort reason respectively.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  action: string,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) throw abortReason(parent);

  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener("abort", onParentAbort, { once: true });

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      "abort",
      () => reject(abortReason(controller.signal)),
      { once: true }
    );
  });

  const timeoutId = setTimeout(
    () => controller.abort(new CapabilityTimeoutError(action, timeoutMs)),
    timeoutMs
  );

  try {
    return await Promise.race([run(controller.signal), aborted]);
  } finally {
    clearTimeout(timeoutId);
    parent?.removeEventListener("abort", onParentAbort);
  }
}

/** Resolve after `ms`, or reject early when `signal` aborts */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(abortReason(signal));
  if (ms <= 0) return Promise.resolve();

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new Error("Operation aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Settle with `work`, or reject with the abort reason as soon as `signal`
 * aborts. `work` itself is left to finish on its own.
 */
export function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(abortReason(signal));

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

export interface RetryOptions {
  /** Label used in timeout errors and logs */
  action: string;
  /** Additional attempts after the first (the pipeline uses 1) */
  retries: number;
  /** Delay before the first retry, doubled for each further one */
  backoffMs: number;
  /** Per-attempt deadline */
  timeoutMs: number;
  signal?: AbortSignal;
  onRetry?: (err: unknown, attempt: number) => void;
}

/**
 * Call `run` with a per-attempt timeout, retrying transport failures with
 * exponential backoff. Caller aborts are never retried.
 */
export async function callWithRetry<T>(
  run: (signal: AbortSignal) => Promise<T>,
  opts: RetryOptions
): Promise<T> {
  let lastError: unknown = new Error(`${opts.action} was not attempted`);

  for (let attempt = 0; attempt <= opts.retries; attempt++) {
    if (attempt > 0) {
      opts.onRetry?.(lastError, attempt);
      await sleep(opts.backoffMs * 2 ** (attempt - 1), opts.signal);
    }

    try {
      return await withTimeout(run, opts.timeoutMs, opts.action, opts.signal);
    } catch (err) {
      if (opts.signal?.aborted) throw abortReason(opts.signal);
      lastError = err;
    }
  }

  throw lastError;
}
