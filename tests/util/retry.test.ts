import { describe, it, expect, vi } from "vitest";
import { EmbeddingError, GenerationError } from "../../src/errors.js";
import { isTransientError, withRetry } from "../../src/util/retry.js";

describe("isTransientError", () => {
  it("treats rate limits, server errors and timeouts as transient", () => {
    expect(isTransientError(new GenerationError("rate limited", 429))).toBe(true);
    expect(isTransientError(new EmbeddingError("unavailable", 503))).toBe(true);
    expect(isTransientError(new EmbeddingError("request timeout", 408))).toBe(true);
    expect(isTransientError(new DOMException("The operation timed out.", "TimeoutError"))).toBe(true);
    expect(isTransientError(new TypeError("fetch failed"))).toBe(true);
  });

  it("treats client errors and non-errors as permanent", () => {
    expect(isTransientError(new GenerationError("bad request", 400))).toBe(false);
    expect(isTransientError(new Error("invalid input"))).toBe(false);
    expect(isTransientError("ECONNRESET")).toBe(false);
  });
});

describe("withRetry", () => {
  it("returns the first success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");
    expect(await withRetry(fn, { attempts: 1, initialDelayMs: 0 })).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries up to `attempts` extra times and passes the attempt number", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new GenerationError("busy", 503))
      .mockRejectedValueOnce(new GenerationError("busy", 503))
      .mockResolvedValue("done");

    expect(await withRetry(fn, { attempts: 2, initialDelayMs: 0 })).toBe("done");
    expect(fn.mock.calls.map((call) => call[0])).toEqual([0, 1, 2]);
  });

  it("honours a custom shouldRetry", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("nope"));
    await expect(withRetry(fn, { attempts: 3, initialDelayMs: 0, shouldRetry: () => false })).rejects.toThrow("nope");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("waits longer before each retry", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new GenerationError("busy", 503))
      .mockRejectedValueOnce(new GenerationError("busy", 503))
      .mockResolvedValue("done");

    const startedAt = Date.now();
    expect(await withRetry(fn, { attempts: 2, initialDelayMs: 20 })).toBe("done");

    // 20ms then 40ms
    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(55);
  });
});
