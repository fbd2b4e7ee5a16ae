import { describe, expect, it } from "vitest";
import { RateLimiter } from "@/lib/broker/rateLimiter";
import { UpstreamUnavailable } from "@/lib/errors";
import { backoffDelay, withRetry, type RetryPolicy } from "@/lib/server/retry";

const policy: RetryPolicy = { maxAttempts: 3, baseDelayMs: 500, multiplier: 2, maxDelayMs: 5_000 };

describe("retry policy", () => {
  it("grows the delay geometrically up to the cap", () => {
    expect(backoffDelay(policy, 1)).toBe(500);
    expect(backoffDelay(policy, 2)).toBe(1_000);
    expect(backoffDelay(policy, 3)).toBe(2_000);
    expect(backoffDelay(policy, 5)).toBe(5_000);
  });

  it("returns the value with the attempt it took", async () => {
    const delays: number[] = [];
    const outcome = await withRetry(
      async (attempt) => {
        if (attempt < 3) throw new UpstreamUnavailable("flaky", { retryable: true });
        return "quote";
      },
      {
        policy,
        isRetryable: () => true,
        sleep: async (ms) => {
          delays.push(ms);
        },
      },
    );
    expect(outcome).toEqual({ ok: true, value: "quote", attempts: 3 });
    expect(delays).toEqual([500, 1_000]);
  });

  it("does not retry errors the caller marks permanent", async () => {
    let calls = 0;
    const permanent = new UpstreamUnavailable("unauthorized", { status: 401 });
    const outcome = await withRetry(
      async () => {
        calls += 1;
        throw permanent;
      },
      { policy, isRetryable: () => false, sleep: async () => {} },
    );
    expect(outcome).toEqual({ ok: false, error: permanent, attempts: 1 });
    expect(calls).toBe(1);
  });

  it("returns the last error once attempts run out", async () => {
    const retries: number[] = [];
    const outcome = await withRetry(
      async (attempt) => {
        throw new Error(`attempt ${attempt}`);
      },
      { policy, isRetryable: () => true, sleep: async () => {}, onRetry: ({ attempt }) => retries.push(attempt) },
    );
    expect(outcome.ok).toBe(false);
    expect(outcome.attempts).toBe(3);
    if (!outcome.ok) expect(outcome.error).toEqual(new Error("attempt 3"));
    expect(retries).toEqual([1, 2]);
  });
});

describe("rate limiter", () => {
  function fakeTime() {
    const state = { now: 0, waits: [] as number[] };
    return {
      state,
      clock: () => state.now,
      wait: async (ms: number) => {
        state.waits.push(ms);
        state.now += ms;
      },
    };
  }

  it("spaces concurrent acquisitions", async () => {
    const time = fakeTime();
    const limiter = new RateLimiter(100, time.clock, time.wait);
    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);
    expect(time.state.waits).toEqual([100, 100]);
    expect(time.state.now).toBe(200);
  });

  it("holds callers through a cooldown", async () => {
    const time = fakeTime();
    const limiter = new RateLimiter(100, time.clock, time.wait);
    await limiter.acquire();
    limiter.penalize(500);
    expect(limiter.cooldownRemainingMs).toBe(500);
    await limiter.acquire();
    expect(time.state.waits).toEqual([500]);
    expect(limiter.cooldownRemainingMs).toBe(0);
  });
});
