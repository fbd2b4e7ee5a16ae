import { ValidationError } from "@/lib/errors";
import { contractId, type Contract } from "@/lib/options/contract";
import { metricValue, type RiskMetrics } from "@/lib/engine/riskCalculator";
import { compare, type AlertRule, type AlertState, type AlertStatus } from "@/lib/alerts/rules";

export type Evaluation = {
  newState: AlertStatus;
  transitioned: boolean;
  metricValue: number;
};

/**
 * Level at which a firing rule lets go. With deadband 0 this is the threshold itself,
 * so the rule clears the moment the condition stops holding.
 */
export function releaseThreshold(rule: Pick<AlertRule, "operator" | "threshold" | "deadband">): number {
  const band = rule.deadband > 0 ? rule.deadband : 0;
  return rule.operator === ">" || rule.operator === ">=" ? rule.threshold - band : rule.threshold + band;
}

/** Edge-triggered: only cleared->firing and firing->cleared report a transition. */
export function evaluateRule(
  contract: Contract,
  rule: AlertRule,
  metrics: RiskMetrics,
  priorState: Pick<AlertState, "state">,
): Evaluation {
  const id = contractId(contract);
  if (rule.contractId !== id || metrics.contractId !== id) {
    throw new ValidationError("Rule and metrics must belong to the evaluated contract.", [
      `contract=${id}`,
      `rule=${rule.contractId}`,
      `metrics=${metrics.contractId}`,
    ]);
  }

  const value = metricValue(metrics, rule.metric);
  if (priorState.state === "cleared") {
    const firing = compare(rule.operator, value, rule.threshold);
    return { newState: firing ? "firing" : "cleared", transitioned: firing, metricValue: value };
  }

  const holding = compare(rule.operator, value, releaseThreshold(rule));
  return { newState: holding ? "firing" : "cleared", transitioned: !holding, metricValue: value };
}
