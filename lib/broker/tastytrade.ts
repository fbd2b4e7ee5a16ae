import { z } from "zod";
import { SymbolNotFound, UpstreamUnavailable } from "@/lib/errors";
import { contractId, normalizeContract, type Contract, type QuoteSnapshot } from "@/lib/options/contract";
import type { FetchImpl, QuoteFetcher } from "@/lib/broker/quoteFetcher";
import { RateLimiter } from "@/lib/broker/rateLimiter";

const numeric = z
  .union([z.number(), z.string(), z.null()])
  .optional()
  .transform((value) => {
    if (value == null || value === "") return null;
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  });

const marketDataItemSchema = z.object({
  symbol: z.string(),
  "instrument-type": z.string().optional(),
  bid: numeric,
  ask: numeric,
  last: numeric,
  mark: numeric,
});

const marketDataResponseSchema = z.object({
  data: z.object({
    items: z.array(marketDataItemSchema),
  }),
});

type MarketDataItem = z.infer<typeof marketDataItemSchema>;

export type TastytradeQuoteFetcherOptions = {
  baseUrl: string;
  sessionToken: string;
  timeoutMs: number;
  rateLimiter: RateLimiter;
  fetchImpl?: FetchImpl;
  clock?: () => Date;
  defaultCooldownMs?: number;
  maxCooldownMs?: number;
};

export const DEFAULT_COOLDOWN_MS = 1_000;
export const MAX_COOLDOWN_MS = 60_000;

// Share classes come back as "BRK/B" or "BRK.B" depending on the endpoint.
function compactSymbol(symbol: string): string {
  return symbol.replace(/\s+/g, "").replace(/\//g, ".").toUpperCase();
}

function retryAfterMs(header: string | null, fallbackMs: number, maxMs: number): number {
  const seconds = header ? Number(header) : Number.NaN;
  const requested = Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : fallbackMs;
  return Math.min(requested, maxMs);
}

export class TastytradeQuoteFetcher implements QuoteFetcher {
  private readonly opts: TastytradeQuoteFetcherOptions;
  private readonly fetchImpl: FetchImpl;

  constructor(opts: TastytradeQuoteFetcherOptions) {
    this.opts = opts;
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async fetch(contract: Contract): Promise<QuoteSnapshot> {
    const c = normalizeContract(contract);
    const occ = contractId(c);
    const url =
      `${this.opts.baseUrl.replace(/\/+$/, "")}/market-data/by-type` +
      `?equity=${encodeURIComponent(c.symbol)}&equity-option=${encodeURIComponent(occ)}`;

    await this.opts.rateLimiter.acquire();

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: "GET",
        headers: {
          Accept: "application/json",
          Authorization: this.opts.sessionToken,
        },
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });
    } catch (err) {
      const timedOut = err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
      throw new UpstreamUnavailable(
        timedOut ? `Quote request timed out after ${this.opts.timeoutMs}ms.` : "Quote request failed.",
        { retryable: true, cause: err },
      );
    }

    if (res.status === 404) throw new SymbolNotFound(occ);
    if (res.status === 429) {
      this.opts.rateLimiter.penalize(
        retryAfterMs(
          res.headers.get("retry-after"),
          this.opts.defaultCooldownMs ?? DEFAULT_COOLDOWN_MS,
          this.opts.maxCooldownMs ?? MAX_COOLDOWN_MS,
        ),
      );
      throw new UpstreamUnavailable("Brokerage rate limit hit.", { status: 429, retryable: true });
    }
    if (res.status === 401 || res.status === 403) {
      throw new UpstreamUnavailable("Brokerage rejected the session token.", { status: res.status, retryable: false });
    }
    if (!res.ok) {
      throw new UpstreamUnavailable(`Brokerage API error (${res.status}).`, {
        status: res.status,
        retryable: res.status >= 500,
      });
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new UpstreamUnavailable("Brokerage returned a non-JSON body.", { status: res.status, retryable: true, cause: err });
    }
    const parsed = marketDataResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamUnavailable("Brokerage response did not match the market-data shape.", { status: res.status });
    }

    const bySymbol = new Map<string, MarketDataItem>(parsed.data.data.items.map((item) => [compactSymbol(item.symbol), item]));
    const option = bySymbol.get(compactSymbol(occ));
    const underlying = bySymbol.get(compactSymbol(c.symbol));
    if (!option || !underlying) throw new SymbolNotFound(occ);

    const underlyingPrice =
      underlying.last ?? underlying.mark ?? (underlying.bid != null && underlying.ask != null ? (underlying.bid + underlying.ask) / 2 : null);

    return {
      contractId: occ,
      underlyingPrice: underlyingPrice ?? Number.NaN,
      bid: option.bid ?? 0,
      ask: option.ask ?? 0,
      last: option.last,
      observedAt: this.opts.clock ? this.opts.clock() : new Date(),
    };
  }
}
