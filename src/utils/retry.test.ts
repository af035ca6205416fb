import { describe, it, expect, vi } from "vitest";
import { TimeoutError, formatRetryMessage, withRetry, withTimeout } from "./retry.js";

function untilAborted(signal: AbortSignal): Promise<string> {
  return new Promise((_resolve, reject) => {
    if (signal.aborted) {
      reject(new Error("aborted"));
      return;
    }
    signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

describe("withTimeout", () => {
  it("rejects with TimeoutError and aborts the attempt", async () => {
    let seen: AbortSignal | undefined;

    const error = await withTimeout(
      (signal) => {
        seen = signal;
        return untilAborted(signal);
      },
      10,
      "Search"
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error instanceof Error ? error.message : "").toBe("Search operation timed out after 10ms");
    expect(seen?.aborted).toBe(true);
  });

  it("forwards the caller's abort", async () => {
    const outer = new AbortController();
    const pending = withTimeout((signal) => untilAborted(signal), undefined, "Chat", outer.signal);

    outer.abort();

    await expect(pending).rejects.toThrow("aborted");
  });

  it("resolves with the result before the deadline", async () => {
    await expect(withTimeout(async () => "done", 1000)).resolves.toBe("done");
  });
});

describe("withRetry", () => {
  it("retries retryable errors with backoff", async () => {
    const onRetry = vi.fn();
    const fn = vi
      .fn<[AbortSignal], Promise<string>>()
      .mockRejectedValueOnce(new Error("HTTP 503: busy"))
      .mockResolvedValueOnce("ok");

    const result = await withRetry(fn, { initialDelayMs: 1, onRetry });

    expect(result).toMatchObject({ success: true, result: "ok", attempts: 2 });
    expect(onRetry).toHaveBeenCalledWith(1, expect.any(Error), 1);
  });

  it("stops on errors that are not retryable", async () => {
    const fn = vi.fn<[AbortSignal], Promise<string>>().mockRejectedValue(new Error("HTTP 401: denied"));

    const result = await withRetry(fn, { initialDelayMs: 1 });

    expect(result.success).toBe(false);
    expect(result.attempts).toBe(1);
  });

  it("does not retry once the caller aborted", async () => {
    const outer = new AbortController();
    const fn = vi.fn((signal: AbortSignal) => {
      outer.abort();
      return untilAborted(signal);
    });

    const result = await withRetry(fn, {
      initialDelayMs: 1,
      signal: outer.signal,
      isRetryable: () => true,
    });

    expect(result.success).toBe(false);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("formatRetryMessage", () => {
  it("describes the attempt or the final failure", () => {
    expect(formatRetryMessage(1, 3, "STT server")).toBe("STT server not responding, attempt 1 of 3");
    expect(formatRetryMessage(3, 3, "STT server")).toBe("STT server gave up after 3 attempts");
  });
});
