import type { Contract, QuoteSnapshot } from "@/lib/options/contract";

/**
 * Leaf adapter over the brokerage API. Implementations apply their own timeout and never retry;
 * they fail with UpstreamUnavailable or SymbolNotFound.
 */
export type QuoteFetcher = {
  fetch: (contract: Contract) => Promise<QuoteSnapshot>;
};

export type FetchImpl = (input: string, init?: RequestInit) => Promise<Response>;
