import { describe, expect, it } from "vitest";
import { backoffDelay, sleep, withRetry } from "../src/utils/retry.js";

describe("backoffDelay", () => {
  it("doubles per attempt up to the cap", () => {
    expect([1, 2, 3, 4].map((n) => backoffDelay(n, 100, 500))).toEqual([100, 200, 400, 500]);
  });
});

describe("withRetry", () => {
  it("retries thrown errors with exponential delays", async () => {
    const attempts: number[] = [];
    const retries: Array<{ attempt: number; delayMs: number }> = [];
    const value = await withRetry(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 3) throw new Error(`fail ${attempt}`);
        return "ok";
      },
      {
        maxAttempts: 3,
        baseDelayMs: 1,
        maxDelayMs: 100,
        onRetry: ({ attempt, delayMs }) => {
          retries.push({ attempt, delayMs });
        },
      },
    );

    expect(value).toBe("ok");
    expect(attempts).toEqual([1, 2, 3]);
    expect(retries).toEqual([
      { attempt: 1, delayMs: 1 },
      { attempt: 2, delayMs: 2 },
    ]);
  });

  it("throws the last error once attempts run out", async () => {
    let calls = 0;
    await expect(
      withRetry(
        async (attempt) => {
          calls++;
          throw new Error(`fail ${attempt}`);
        },
        { maxAttempts: 2, baseDelayMs: 1 },
      ),
    ).rejects.toThrow("fail 2");
    expect(calls).toBe(2);
  });

  it("stops at once when shouldRetry says no", async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error("bad request");
        },
        { maxAttempts: 5, baseDelayMs: 1, shouldRetry: () => false },
      ),
    ).rejects.toThrow("bad request");
    expect(calls).toBe(1);
  });

  it("retries resolved values that retryOn rejects and returns the last one", async () => {
    const reasons: unknown[] = [];
    const value = await withRetry(async (attempt) => ({ ok: false, attempt }), {
      maxAttempts: 3,
      baseDelayMs: 1,
      retryOn: (v) => !v.ok,
      onRetry: ({ reason }) => {
        reasons.push(reason);
      },
    });

    expect(value).toEqual({ ok: false, attempt: 3 });
    expect(reasons).toEqual([
      { ok: false, attempt: 1 },
      { ok: false, attempt: 2 },
    ]);
  });

  it("does not retry after the signal aborts", async () => {
    const controller = new AbortController();
    let calls = 0;
    const value = await withRetry(
      async () => {
        calls++;
        controller.abort();
        return "timeout";
      },
      { maxAttempts: 3, baseDelayMs: 1, retryOn: () => true, signal: controller.signal },
    );
    expect(value).toBe("timeout");
    expect(calls).toBe(1);
  });
});

describe("sleep", () => {
  it("resolves early when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const start = Date.now();
    await sleep(10_000, controller.signal);
    expect(Date.now() - start).toBeLessThan(1_000);
  });
});
