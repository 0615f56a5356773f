/**
 * Retry with exponential backoff for transient ServiceNow failures.
 *
 * Only rate limiting, timeouts and connection failures are retried; every
 * other error propagates on the first attempt. The delay doubles from
 * `initialDelayMs`. `jitterMs` adds up to that many random milliseconds per
 * wait and defaults to 0.
 */

import {
  ServiceNowConnectionError,
  ServiceNowRateLimitError,
  ServiceNowTimeoutError,
} from "../errors";

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryPolicyOptions {
  maxRetries: number;
  initialDelayMs: number;
  jitterMs?: number;
  sleep?: SleepFn;
  random?: () => number;
}

export interface RetryExecuteOptions {
  signal?: AbortSignal;
  label?: string;
}

export function isTransientError(error: unknown): boolean {
  return (
    error instanceof ServiceNowRateLimitError ||
    error instanceof ServiceNowTimeoutError ||
    error instanceof ServiceNowConnectionError
  );
}

/**
 * setTimeout-based sleep that rejects with the signal's reason when aborted
 */
export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export class RetryPolicy {
  readonly maxRetries: number;
  readonly initialDelayMs: number;
  private readonly jitterMs: number;
  private readonly sleep: SleepFn;
  private readonly random: () => number;

  constructor(options: RetryPolicyOptions) {
    this.maxRetries = Math.max(0, Math.floor(options.maxRetries));
    this.initialDelayMs = Math.max(0, options.initialDelayMs);
    this.jitterMs = Math.max(0, options.jitterMs ?? 0);
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Run `operation` until it succeeds, fails with a non-transient error, or
   * runs out of attempts. Cancellation is observed after every attempt and
   * during each backoff wait; the signal's reason is thrown as-is.
   */
  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryExecuteOptions = {},
  ): Promise<T> {
    const { signal, label = "request" } = options;
    const maxAttempts = this.maxRetries + 1;
    let lastError: unknown;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      signal?.throwIfAborted();

      try {
        return await operation(attempt);
      } catch (error) {
        signal?.throwIfAborted();

        if (!isTransientError(error)) {
          throw error;
        }
        lastError = error;

        if (attempt < maxAttempts - 1) {
          const delay = this.calculateRetryDelay(attempt);
          console.warn(
            `[ServiceNow Retry] ${label} failed (attempt ${attempt + 1}/${maxAttempts}), retrying in ${delay}ms`,
            { error: error instanceof Error ? error.message : String(error) },
          );
          await this.sleep(delay, signal);
        } else {
          console.error(`[ServiceNow Retry] ${label} failed after ${maxAttempts} attempts`);
        }
      }
    }

    throw lastError;
  }

  calculateRetryDelay(attempt: number): number {
    const exponentialDelay = this.initialDelayMs * Math.pow(2, attempt);
    const jitter = this.jitterMs > 0 ? Math.round(this.random() * this.jitterMs) : 0;
    return exponentialDelay + jitter;
  }
}
