import type { OptionType } from "@/lib/options/contract";

export type PricingInputs = {
  spot: number;
  strike: number;
  timeYears: number;
  rate: number;
  dividendYield: number;
  optionType: OptionType;
};

export type Greeks = {
  delta: number;
  gamma: number;
  theta: number; // per calendar day
  vega: number; // per 1.00 of volatility
  rho: number; // per 1.00 of rate
};

export type ImpliedVolResult =
  | { converged: true; volatility: number; iterations: number }
  | { converged: false; reason: "BELOW_INTRINSIC" | "ABOVE_UPPER_BOUND" | "MAX_ITERATIONS" | "INVALID_INPUT"; iterations: number };

export type ImpliedVolOptions = {
  maxIterations?: number;
  priceTolerance?: number;
  minVolatility?: number;
  maxVolatility?: number;
};

export const DEFAULT_IV_MAX_ITERATIONS = 100;
export const DEFAULT_IV_PRICE_TOLERANCE = 1e-6;
export const IV_SEARCH_MIN = 1e-4;
export const IV_SEARCH_MAX = 5;

function erf(x: number): number {
  const sign = x < 0 ? -1 : 1;
  const absX = Math.abs(x);
  const a1 = 0.254829592;
  const a2 = -0.284496736;
  const a3 = 1.421413741;
  const a4 = -1.453152027;
  const a5 = 1.061405429;
  const p = 0.3275911;
  const t = 1 / (1 + p * absX);
  const y = 1 - (((((a5 * t + a4) * t + a3) * t + a2) * t + a1) * t * Math.exp(-absX * absX));
  return sign * y;
}

export function normalCdf(x: number): number {
  return 0.5 * (1 + erf(x / Math.SQRT2));
}

export function normalPdf(x: number): number {
  return Math.exp(-0.5 * x * x) / Math.sqrt(2 * Math.PI);
}

function d1d2(inputs: PricingInputs, sigma: number): { d1: number; d2: number; sqrtT: number } {
  const { spot, strike, timeYears, rate, dividendYield } = inputs;
  const sqrtT = Math.sqrt(timeYears);
  const d1 = (Math.log(spot / strike) + (rate - dividendYield + 0.5 * sigma * sigma) * timeYears) / (sigma * sqrtT);
  return { d1, d2: d1 - sigma * sqrtT, sqrtT };
}

export function blackScholesPrice(inputs: PricingInputs, sigma: number): number {
  const { spot, strike, timeYears, rate, dividendYield, optionType } = inputs;
  const { d1, d2 } = d1d2(inputs, sigma);
  const discSpot = spot * Math.exp(-dividendYield * timeYears);
  const discStrike = strike * Math.exp(-rate * timeYears);
  return optionType === "call"
    ? discSpot * normalCdf(d1) - discStrike * normalCdf(d2)
    : discStrike * normalCdf(-d2) - discSpot * normalCdf(-d1);
}

export function blackScholesGreeks(inputs: PricingInputs, sigma: number): Greeks {
  const { spot, strike, timeYears, rate, dividendYield, optionType } = inputs;
  const { d1, d2, sqrtT } = d1d2(inputs, sigma);
  const divDisc = Math.exp(-dividendYield * timeYears);
  const discStrike = strike * Math.exp(-rate * timeYears);
  const pdf = normalPdf(d1);
  const isCall = optionType === "call";

  const delta = isCall ? divDisc * normalCdf(d1) : divDisc * (normalCdf(d1) - 1);
  const gamma = (divDisc * pdf) / (spot * sigma * sqrtT);
  const decay = -(spot * divDisc * pdf * sigma) / (2 * sqrtT);
  const thetaAnnual = isCall
    ? decay - rate * discStrike * normalCdf(d2) + dividendYield * spot * divDisc * normalCdf(d1)
    : decay + rate * discStrike * normalCdf(-d2) - dividendYield * spot * divDisc * normalCdf(-d1);
  const vega = spot * divDisc * pdf * sqrtT;
  const rho = isCall ? timeYears * discStrike * normalCdf(d2) : -timeYears * discStrike * normalCdf(-d2);

  return { delta, gamma, theta: thetaAnnual / 365, vega, rho };
}

/** No-arbitrage price band for a European option. */
export function priceBounds(inputs: PricingInputs): { lower: number; upper: number } {
  const discSpot = inputs.spot * Math.exp(-inputs.dividendYield * inputs.timeYears);
  const discStrike = inputs.strike * Math.exp(-inputs.rate * inputs.timeYears);
  if (inputs.optionType === "call") {
    return { lower: Math.max(discSpot - discStrike, 0), upper: discSpot };
  }
  return { lower: Math.max(discStrike - discSpot, 0), upper: discStrike };
}

/**
 * Safeguarded Newton-Raphson on vega inside a shrinking bisection bracket.
 * Reports non-convergence instead of returning a best guess.
 */
export function solveImpliedVolatility(
  targetPrice: number,
  inputs: PricingInputs,
  opts: ImpliedVolOptions = {},
): ImpliedVolResult {
  const maxIterations = opts.maxIterations ?? DEFAULT_IV_MAX_ITERATIONS;
  const tolerance = opts.priceTolerance ?? DEFAULT_IV_PRICE_TOLERANCE;
  let lo = opts.minVolatility ?? IV_SEARCH_MIN;
  let hi = opts.maxVolatility ?? IV_SEARCH_MAX;

  const valid =
    [targetPrice, inputs.spot, inputs.strike, inputs.timeYears, inputs.rate, inputs.dividendYield].every(Number.isFinite) &&
    targetPrice > 0 &&
    inputs.spot > 0 &&
    inputs.strike > 0 &&
    inputs.timeYears > 0;
  if (!valid) return { converged: false, reason: "INVALID_INPUT", iterations: 0 };

  const bounds = priceBounds(inputs);
  if (targetPrice <= bounds.lower) return { converged: false, reason: "BELOW_INTRINSIC", iterations: 0 };
  if (targetPrice >= bounds.upper) return { converged: false, reason: "ABOVE_UPPER_BOUND", iterations: 0 };
  if (blackScholesPrice(inputs, lo) > targetPrice + tolerance) {
    return { converged: false, reason: "BELOW_INTRINSIC", iterations: 0 };
  }
  if (blackScholesPrice(inputs, hi) < targetPrice - tolerance) {
    return { converged: false, reason: "ABOVE_UPPER_BOUND", iterations: 0 };
  }

  // Brenner-Subrahmanyam seed, clamped into the bracket.
  let sigma = Math.sqrt((2 * Math.PI) / inputs.timeYears) * (targetPrice / inputs.spot);
  if (!Number.isFinite(sigma) || sigma <= lo || sigma >= hi) sigma = 0.3;

  for (let iteration = 1; iteration <= maxIterations; iteration += 1) {
    const diff = blackScholesPrice(inputs, sigma) - targetPrice;
    if (Math.abs(diff) <= tolerance) return { converged: true, volatility: sigma, iterations: iteration };

    if (diff > 0) hi = sigma;
    else lo = sigma;
    if (hi - lo < 1e-12) return { converged: true, volatility: (hi + lo) / 2, iterations: iteration };

    const { vega } = blackScholesGreeks(inputs, sigma);
    const newton = vega > 1e-10 ? sigma - diff / vega : Number.NaN;
    sigma = Number.isFinite(newton) && newton > lo && newton < hi ? newton : (lo + hi) / 2;
  }

  return { converged: false, reason: "MAX_ITERATIONS", iterations: maxIterations };
}
