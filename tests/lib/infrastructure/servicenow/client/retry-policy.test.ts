/**
 * Unit Tests for RetryPolicy
 */

import { describe, it, expect, vi } from "vitest";
import { RetryPolicy, isTransientError, sleep } from "@/infrastructure/servicenow/client/retry-policy";
import {
  ServiceNowAuthError,
  ServiceNowClientError,
  ServiceNowConnectionError,
  ServiceNowRateLimitError,
  ServiceNowTimeoutError,
  ServiceNowValidationError,
} from "@/infrastructure/servicenow/errors";

function createPolicy(overrides: { maxRetries?: number; jitterMs?: number; random?: () => number } = {}) {
  const sleepFn = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  const policy = new RetryPolicy({
    maxRetries: overrides.maxRetries ?? 3,
    initialDelayMs: 1000,
    jitterMs: overrides.jitterMs,
    random: overrides.random,
    sleep: sleepFn,
  });
  return { policy, sleepFn };
}

describe("isTransientError", () => {
  it("treats rate limiting, timeouts and connection failures as transient", () => {
    expect(isTransientError(new ServiceNowRateLimitError("slow down"))).toBe(true);
    expect(isTransientError(new ServiceNowTimeoutError("timeout"))).toBe(true);
    expect(isTransientError(new ServiceNowConnectionError("refused"))).toBe(true);
  });

  it("treats everything else as permanent", () => {
    expect(isTransientError(new ServiceNowAuthError("denied"))).toBe(false);
    expect(isTransientError(new ServiceNowValidationError("bad"))).toBe(false);
    expect(isTransientError(new ServiceNowClientError("HTTP 500", 500))).toBe(false);
    expect(isTransientError(new Error("boom"))).toBe(false);
  });
});

describe("RetryPolicy", () => {
  it("returns the first successful result without waiting", async () => {
    const { policy, sleepFn } = createPolicy();
    const operation = vi.fn(async () => "ok");

    await expect(policy.execute(operation)).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleepFn).not.toHaveBeenCalled();
  });

  it("retries transient failures with exponential backoff", async () => {
    const { policy, sleepFn } = createPolicy();
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new ServiceNowRateLimitError("slow down"))
      .mockRejectedValueOnce(new ServiceNowTimeoutError("timeout"))
      .mockResolvedValueOnce("ok");

    await expect(policy.execute(operation)).resolves.toBe("ok");
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([0, 1, 2]);
    expect(sleepFn.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
  });

  it("makes at most maxRetries + 1 attempts and throws the last error", async () => {
    const { policy, sleepFn } = createPolicy({ maxRetries: 3 });
    const lastError = new ServiceNowConnectionError("refused again");
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new ServiceNowConnectionError("refused"))
      .mockRejectedValueOnce(new ServiceNowConnectionError("refused"))
      .mockRejectedValueOnce(new ServiceNowConnectionError("refused"))
      .mockRejectedValueOnce(lastError);

    await expect(policy.execute(operation)).rejects.toBe(lastError);
    expect(operation).toHaveBeenCalledTimes(4);
    expect(sleepFn.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000, 4000]);
  });

  it("does not retry when maxRetries is 0", async () => {
    const { policy, sleepFn } = createPolicy({ maxRetries: 0 });
    const operation = vi.fn(async () => {
      throw new ServiceNowRateLimitError("slow down");
    });

    await expect(policy.execute(operation)).rejects.toBeInstanceOf(ServiceNowRateLimitError);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleepFn).not.toHaveBeenCalled();
  });

  it("propagates permanent failures immediately", async () => {
    const { policy, sleepFn } = createPolicy();
    const operation = vi.fn(async () => {
      throw new ServiceNowAuthError("Authentication failed for read operation");
    });

    await expect(policy.execute(operation)).rejects.toBeInstanceOf(ServiceNowAuthError);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleepFn).not.toHaveBeenCalled();
  });

  it("stops before the next attempt once the signal is aborted", async () => {
    const controller = new AbortController();
    const reason = new Error("cancelled by caller");
    const sleepFn = vi.fn(async () => {
      controller.abort(reason);
    });
    const policy = new RetryPolicy({ maxRetries: 3, initialDelayMs: 1000, sleep: sleepFn });
    const operation = vi.fn(async () => {
      throw new ServiceNowTimeoutError("timeout");
    });

    await expect(policy.execute(operation, { signal: controller.signal })).rejects.toBe(reason);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("never starts when the signal is already aborted", async () => {
    const { policy } = createPolicy();
    const controller = new AbortController();
    controller.abort(new Error("too late"));
    const operation = vi.fn(async () => "ok");

    await expect(policy.execute(operation, { signal: controller.signal })).rejects.toThrow("too late");
    expect(operation).not.toHaveBeenCalled();
  });

  it("adds bounded jitter to each delay", () => {
    const { policy } = createPolicy({ jitterMs: 200, random: () => 0.5 });
    expect(policy.calculateRetryDelay(0)).toBe(1100);
    expect(policy.calculateRetryDelay(2)).toBe(4100);
  });

  it("uses no jitter by default", () => {
    const { policy } = createPolicy({ random: () => 0.99 });
    expect(policy.calculateRetryDelay(1)).toBe(2000);
  });
});

describe("sleep", () => {
  it("rejects with the signal's reason when aborted", async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort(new Error("stop waiting"));

    await expect(pending).rejects.toThrow("stop waiting");
  });

  it("resolves after the delay", async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });
});
