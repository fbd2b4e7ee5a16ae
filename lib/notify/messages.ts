import { describeContract, type Contract } from "@/lib/options/contract";
import type { RiskMetrics } from "@/lib/engine/riskCalculator";
import { describeRule, type AlertRule, type AlertStatus } from "@/lib/alerts/rules";

function fmt(value: number, digits = 4): string {
  return Number.isFinite(value) ? value.toFixed(digits) : "-";
}

export function formatTransitionMessage(params: {
  contract: Contract;
  rule: AlertRule;
  newState: AlertStatus;
  metrics: RiskMetrics;
  metricValue: number;
}): string {
  const { contract, rule, newState, metrics } = params;
  const header = newState === "firing" ? "ALERT FIRING" : "ALERT CLEARED";
  return [
    `${header}: ${describeContract(contract)}`,
    `Rule: ${describeRule(rule)}`,
    `Value: ${fmt(params.metricValue)}`,
    `IV: ${fmt(metrics.impliedVolatility * 100, 2)}%`,
    `Delta: ${fmt(metrics.delta)}  Gamma: ${fmt(metrics.gamma)}`,
    `Theta/day: ${fmt(metrics.theta)}  Vega: ${fmt(metrics.vega)}  Rho: ${fmt(metrics.rho)}`,
    `Mid: ${fmt(metrics.mid, 2)}`,
    `Time: ${metrics.computedAt.toISOString()}`,
  ].join("\n");
}

export function formatLifecycleMessage(event: "started" | "stopped", detail: { contracts: number; intervalSec: number }): string {
  return event === "started"
    ? `Monitor started. Tracking ${detail.contracts} contract(s) every ${detail.intervalSec}s.`
    : "Monitor stopped.";
}
