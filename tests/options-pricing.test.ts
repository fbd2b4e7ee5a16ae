import { describe, expect, it } from "vitest";
import {
  blackScholesGreeks,
  blackScholesPrice,
  normalCdf,
  priceBounds,
  solveImpliedVolatility,
  type PricingInputs,
} from "@/lib/options/pricing";

const atmCall: PricingInputs = {
  spot: 100,
  strike: 100,
  timeYears: 0.5,
  rate: 0.04,
  dividendYield: 0,
  optionType: "call",
};

describe("lib/options/pricing", () => {
  it("normal cdf sanity", () => {
    expect(normalCdf(0)).toBeCloseTo(0.5, 6);
    expect(normalCdf(1.96)).toBeCloseTo(0.975, 3);
    expect(normalCdf(-1.96)).toBeCloseTo(0.025, 3);
  });

  it("satisfies put-call parity", () => {
    const call = blackScholesPrice(atmCall, 0.25);
    const put = blackScholesPrice({ ...atmCall, optionType: "put" }, 0.25);
    expect(call - put).toBeCloseTo(100 - 100 * Math.exp(-0.04 * 0.5), 8);
  });

  it("keeps call and put gamma/vega equal and offsets delta by one", () => {
    const call = blackScholesGreeks(atmCall, 0.25);
    const put = blackScholesGreeks({ ...atmCall, optionType: "put" }, 0.25);
    expect(call.delta).toBeGreaterThan(0.5);
    expect(call.delta).toBeLessThan(1);
    expect(put.delta).toBeCloseTo(call.delta - 1, 12);
    expect(put.gamma).toBeCloseTo(call.gamma, 12);
    expect(put.vega).toBeCloseTo(call.vega, 12);
    expect(call.theta).toBeLessThan(0);
    expect(call.rho).toBeGreaterThan(0);
    expect(put.rho).toBeLessThan(0);
  });

  it("vega matches a finite-difference of price", () => {
    const h = 1e-4;
    const numeric = (blackScholesPrice(atmCall, 0.25 + h) - blackScholesPrice(atmCall, 0.25 - h)) / (2 * h);
    expect(numeric).toBeCloseTo(blackScholesGreeks(atmCall, 0.25).vega, 1);
  });

  it("reports theta per calendar day", () => {
    const greeks = blackScholesGreeks(atmCall, 0.25);
    const dayLater = blackScholesPrice({ ...atmCall, timeYears: atmCall.timeYears - 1 / 365 }, 0.25);
    expect(dayLater - blackScholesPrice(atmCall, 0.25)).toBeCloseTo(greeks.theta, 3);
  });

  it("recovers the volatility a price was generated with", () => {
    for (const optionType of ["call", "put"] as const) {
      const inputs = { ...atmCall, strike: 110, optionType };
      const price = blackScholesPrice(inputs, 0.32);
      const solved = solveImpliedVolatility(price, inputs);
      expect(solved.converged).toBe(true);
      if (solved.converged) {
        expect(solved.volatility).toBeCloseTo(0.32, 5);
        expect(solved.iterations).toBeLessThanOrEqual(100);
      }
    }
  });

  it("rejects prices outside the no-arbitrage band", () => {
    const deepItm: PricingInputs = { ...atmCall, spot: 120 };
    const { lower, upper } = priceBounds(deepItm);
    expect(lower).toBeCloseTo(120 - 100 * Math.exp(-0.02), 10);
    expect(upper).toBe(120);
    expect(solveImpliedVolatility(20, deepItm)).toEqual({ converged: false, reason: "BELOW_INTRINSIC", iterations: 0 });
    expect(solveImpliedVolatility(130, deepItm)).toEqual({ converged: false, reason: "ABOVE_UPPER_BOUND", iterations: 0 });
  });

  it("rejects unusable inputs", () => {
    expect(solveImpliedVolatility(0, atmCall)).toEqual({ converged: false, reason: "INVALID_INPUT", iterations: 0 });
    expect(solveImpliedVolatility(5, { ...atmCall, timeYears: 0 })).toEqual({
      converged: false,
      reason: "INVALID_INPUT",
      iterations: 0,
    });
    expect(solveImpliedVolatility(Number.NaN, atmCall).converged).toBe(false);
  });

  it("gives up after the iteration cap instead of guessing", () => {
    const inputs = { ...atmCall, strike: 120 };
    const price = blackScholesPrice(inputs, 0.3);
    expect(solveImpliedVolatility(price, inputs, { maxIterations: 1 })).toEqual({
      converged: false,
      reason: "MAX_ITERATIONS",
      iterations: 1,
    });
  });
});
