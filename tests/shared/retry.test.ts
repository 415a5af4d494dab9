import { describe, expect, it, vi } from "vitest";
import { backoffDelay, retryWithBackoff } from "../../src/shared/utils/retry";

describe("retryWithBackoff", () => {
  it("returns the first successful result", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("flaky")).mockResolvedValue("ok");

    await expect(retryWithBackoff(fn, { maxAttempts: 3, initialDelayMs: 1 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("rethrows the last error once attempts run out", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("down"));

    await expect(retryWithBackoff(fn, { maxAttempts: 2, initialDelayMs: 1 })).rejects.toThrow("down");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("stops early when the error is not worth retrying", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("not found"));

    await expect(
      retryWithBackoff(fn, { maxAttempts: 5, initialDelayMs: 1, shouldRetry: () => false })
    ).rejects.toThrow("not found");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("backoffDelay", () => {
  it("grows by the factor on each attempt", () => {
    expect(backoffDelay(1, 100, 2, 0.2, 0.5)).toBe(100);
    expect(backoffDelay(2, 100, 2, 0.2, 0.5)).toBe(200);
    expect(backoffDelay(3, 100, 2, 0.2, 0.5)).toBe(400);
  });

  it("spreads by the jitter ratio", () => {
    expect(backoffDelay(1, 100, 2, 0.2, 0)).toBe(80);
    expect(backoffDelay(1, 100, 2, 0.2, 0.75)).toBe(110);
  });
});
