import { describe, expect, it, vi } from "vitest";
import { RetryPolicy, sleep } from "../retryPolicy";

describe("RetryPolicy", () => {
  it("retries until an attempt succeeds", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("flaky")).mockResolvedValueOnce("ok");
    const policy = new RetryPolicy({ maxAttempts: 3, initialDelay: 0, jitter: false });

    await expect(policy.execute(fn)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(fn).toHaveBeenNthCalledWith(2, 2);
  });

  it("stops at maxAttempts and rethrows the last error", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("down"));
    const policy = new RetryPolicy({ maxAttempts: 2, initialDelay: 0, jitter: false });

    await expect(policy.execute(fn)).rejects.toThrow("down");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry when the condition rejects the error", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("fatal"));
    const policy = new RetryPolicy({ maxAttempts: 5, initialDelay: 0, retryCondition: () => false });

    await expect(policy.execute(fn)).rejects.toThrow("fatal");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("grows the delay exponentially up to the cap", () => {
    const policy = new RetryPolicy({ initialDelay: 100, maxDelay: 300, factor: 2, jitter: false });

    expect([1, 2, 3].map((attempt) => policy.calculateDelay(attempt))).toEqual([100, 200, 300]);
  });

  it("stops waiting between attempts once the signal aborts", async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockRejectedValue(new Error("flaky"));
    const policy = new RetryPolicy({ maxAttempts: 3, initialDelay: 10_000, jitter: false });

    const run = policy.execute(fn, { signal: controller.signal });
    setTimeout(() => controller.abort(new Error("stop")), 10);

    await expect(run).rejects.toThrow("stop");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("sleep", () => {
  it("rejects immediately on an aborted signal", async () => {
    await expect(sleep(1000, AbortSignal.abort(new Error("gone")))).rejects.toThrow("gone");
  });
});
