import { describe, expect, it, vi } from "vitest";
import type { FetchImpl } from "@/lib/broker/quoteFetcher";
import { RateLimiter } from "@/lib/broker/rateLimiter";
import { TastytradeQuoteFetcher } from "@/lib/broker/tastytrade";
import { SymbolNotFound, UpstreamUnavailable } from "@/lib/errors";
import type { Contract } from "@/lib/options/contract";

const OBSERVED_AT = new Date("2026-10-16T14:00:00.000Z");
const call: Contract = { symbol: "AAPL", expiration: "2027-01-15", strike: 100, optionType: "call" };

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { "Content-Type": "application/json" }, ...init });
}

const marketData = {
  data: {
    items: [
      { symbol: "AAPL", "instrument-type": "Equity", bid: "105.40", ask: "105.60", last: "105.50", mark: "105.50" },
      { symbol: "AAPL  270115C00100000", "instrument-type": "Equity Option", bid: "6.00", ask: "6.20", last: 6.1, mark: null },
    ],
  },
};

function fetcherWith(fetchImpl: FetchImpl, limiter = new RateLimiter(0)) {
  return new TastytradeQuoteFetcher({
    baseUrl: "https://api.example.test/",
    sessionToken: "test-token",
    timeoutMs: 1_000,
    rateLimiter: limiter,
    fetchImpl,
    clock: () => OBSERVED_AT,
  });
}

describe("tastytrade quote fetcher", () => {
  it("requests the option and its underlying in one call", async () => {
    const fetchImpl = vi.fn<FetchImpl>(async () => jsonResponse(marketData));
    const snapshot = await fetcherWith(fetchImpl).fetch(call);

    expect(snapshot).toEqual({
      contractId: "AAPL  270115C00100000",
      underlyingPrice: 105.5,
      bid: 6,
      ask: 6.2,
      last: 6.1,
      observedAt: OBSERVED_AT,
    });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("https://api.example.test/market-data/by-type?equity=AAPL&equity-option=AAPL%20%20270115C00100000");
    expect(init?.method).toBe("GET");
    expect(init?.headers).toEqual({ Accept: "application/json", Authorization: "test-token" });
  });

  it("falls back to the underlying mark, then the mid", async () => {
    const noLast = {
      data: {
        items: [
          { symbol: "AAPL", bid: 104, ask: 106, last: null, mark: null },
          { symbol: "AAPL270115C00100000", bid: 6, ask: 6.2 },
        ],
      },
    };
    const snapshot = await fetcherWith(async () => jsonResponse(noLast)).fetch(call);
    expect(snapshot.underlyingPrice).toBe(105);
    expect(snapshot.last).toBeNull();
  });

  it("maps 404 and missing items to SymbolNotFound", async () => {
    await expect(fetcherWith(async () => new Response("", { status: 404 })).fetch(call)).rejects.toThrow(SymbolNotFound);
    const onlyUnderlying = { data: { items: [marketData.data.items[0]] } };
    await expect(fetcherWith(async () => jsonResponse(onlyUnderlying)).fetch(call)).rejects.toMatchObject({
      code: "SYMBOL_NOT_FOUND",
      message: "No market data for AAPL 270115C00100000.",
    });
  });

  it("backs the shared limiter off on 429", async () => {
    const limiter = new RateLimiter(0, () => 1_000);
    const fetchImpl = async () => new Response("", { status: 429, headers: { "Retry-After": "2" } });
    await expect(fetcherWith(fetchImpl, limiter).fetch(call)).rejects.toMatchObject({
      code: "UPSTREAM_UNAVAILABLE",
      status: 429,
      retryable: true,
    });
    expect(limiter.cooldownRemainingMs).toBe(2_000);
  });

  it("caps the cooldown an upstream Retry-After can impose", async () => {
    const time = { now: 0, waits: [] as number[] };
    const limiter = new RateLimiter(
      0,
      () => time.now,
      async (ms) => {
        time.waits.push(ms);
        time.now += ms;
      },
    );
    const fetcher = fetcherWith(async () => new Response("", { status: 429, headers: { "Retry-After": "86400" } }), limiter);

    await expect(fetcher.fetch(call)).rejects.toMatchObject({ status: 429 });
    expect(limiter.cooldownRemainingMs).toBe(60_000);
    await expect(fetcher.fetch(call)).rejects.toMatchObject({ status: 429 });
    expect(time.waits).toEqual([60_000]);
  });

  it("honors a configured cooldown ceiling", async () => {
    const limiter = new RateLimiter(0, () => 0);
    const fetcher = new TastytradeQuoteFetcher({
      baseUrl: "https://api.example.test",
      sessionToken: "test-token",
      timeoutMs: 1_000,
      rateLimiter: limiter,
      maxCooldownMs: 5_000,
      fetchImpl: async () => new Response("", { status: 429, headers: { "Retry-After": "30" } }),
    });
    await expect(fetcher.fetch(call)).rejects.toMatchObject({ status: 429 });
    expect(limiter.cooldownRemainingMs).toBe(5_000);
  });

  it("matches share-class underlyings written with a slash", async () => {
    const brk: Contract = { symbol: "BRK.B", expiration: "2027-01-15", strike: 500, optionType: "call" };
    const body = {
      data: {
        items: [
          { symbol: "BRK/B", last: "480.25" },
          { symbol: "BRK.B 270115C00500000", bid: "20.10", ask: "20.50" },
        ],
      },
    };
    const snapshot = await fetcherWith(async () => jsonResponse(body)).fetch(brk);
    expect(snapshot).toMatchObject({ contractId: "BRK.B 270115C00500000", underlyingPrice: 480.25, bid: 20.1, ask: 20.5 });
  });

  it("marks server errors retryable and auth errors final", async () => {
    await expect(fetcherWith(async () => new Response("", { status: 503 })).fetch(call)).rejects.toMatchObject({
      message: "Brokerage API error (503).",
      retryable: true,
    });
    await expect(fetcherWith(async () => new Response("", { status: 401 })).fetch(call)).rejects.toMatchObject({
      status: 401,
      retryable: false,
    });
  });

  it("wraps network failures", async () => {
    const fetchImpl = async (): Promise<Response> => {
      throw new TypeError("fetch failed");
    };
    const failure = fetcherWith(fetchImpl).fetch(call);
    await expect(failure).rejects.toThrow(UpstreamUnavailable);
    await expect(failure).rejects.toMatchObject({ message: "Quote request failed.", retryable: true });
  });

  it("rejects bodies that do not match the market-data shape", async () => {
    await expect(fetcherWith(async () => jsonResponse({ items: [] })).fetch(call)).rejects.toMatchObject({
      message: "Brokerage response did not match the market-data shape.",
      retryable: false,
    });
  });
});
