import { ConvergenceFailure, InvalidQuote } from "@/lib/errors";
import { contractId, timeToExpiryYears, type Contract, type QuoteSnapshot } from "@/lib/options/contract";
import {
  blackScholesGreeks,
  solveImpliedVolatility,
  type ImpliedVolOptions,
  type PricingInputs,
} from "@/lib/options/pricing";

export type RiskMetrics = {
  contractId: string;
  impliedVolatility: number;
  delta: number;
  gamma: number;
  theta: number;
  vega: number;
  rho: number;
  mid: number;
  timeToExpiryYears: number;
  computedAt: Date;
};

export const METRIC_NAMES = ["impliedVolatility", "delta", "gamma", "theta", "vega", "rho"] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

export type RiskCalculatorOptions = {
  riskFreeRate?: number;
  dividendYield?: number;
  now?: Date;
  solver?: ImpliedVolOptions;
};

export const DEFAULT_RISK_FREE_RATE = 0.04;

function finite(value: number | null): boolean {
  return value == null || Number.isFinite(value);
}

export function assertUsableQuote(snapshot: QuoteSnapshot): void {
  const { underlyingPrice, bid, ask, last } = snapshot;
  const details = { contractId: snapshot.contractId, underlyingPrice, bid, ask };
  if (![underlyingPrice, bid, ask].every(Number.isFinite) || !finite(last)) {
    throw new InvalidQuote("Quote contains non-finite values.", details);
  }
  if (underlyingPrice <= 0) throw new InvalidQuote("Underlying price is not positive.", details);
  if (bid <= 0 || ask <= 0) throw new InvalidQuote("Bid/ask must both be positive.", details);
  if (bid > ask) throw new InvalidQuote("Bid/ask is crossed.", details);
}

/**
 * Implied volatility from the bid/ask mid, then Greeks at that volatility.
 * Pure: the same contract, snapshot and options always give the same metrics.
 */
export function computeRiskMetrics(
  contract: Contract,
  snapshot: QuoteSnapshot,
  options: RiskCalculatorOptions = {},
): RiskMetrics {
  assertUsableQuote(snapshot);

  const now = options.now ?? snapshot.observedAt;
  const id = contractId(contract);
  const timeYears = timeToExpiryYears(contract.expiration, now);
  if (timeYears == null || timeYears <= 0) {
    throw new InvalidQuote("Contract has expired or has no valid expiration.", { contractId: id, expiration: contract.expiration });
  }

  const mid = (snapshot.bid + snapshot.ask) / 2;
  const inputs: PricingInputs = {
    spot: snapshot.underlyingPrice,
    strike: contract.strike,
    timeYears,
    rate: options.riskFreeRate ?? DEFAULT_RISK_FREE_RATE,
    dividendYield: options.dividendYield ?? 0,
    optionType: contract.optionType,
  };

  const solved = solveImpliedVolatility(mid, inputs, options.solver);
  if (!solved.converged) {
    throw new ConvergenceFailure(`Implied volatility did not converge (${solved.reason}).`, {
      contractId: id,
      mid,
      reason: solved.reason,
      iterations: solved.iterations,
    });
  }
  const iv = solved.volatility;
  if (!Number.isFinite(iv) || iv <= 0) {
    throw new ConvergenceFailure("Implied volatility solver returned an unusable value.", { contractId: id, mid, iv });
  }

  const greeks = blackScholesGreeks(inputs, iv);
  if (!Object.values(greeks).every(Number.isFinite)) {
    throw new ConvergenceFailure("Greeks are not finite at the solved volatility.", { contractId: id, iv });
  }

  return {
    contractId: id,
    impliedVolatility: iv,
    ...greeks,
    mid,
    timeToExpiryYears: timeYears,
    computedAt: now,
  };
}

export function metricValue(metrics: RiskMetrics, metric: MetricName): number {
  return metrics[metric];
}
