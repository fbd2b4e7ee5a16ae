import { METRIC_NAMES, type MetricName } from "@/lib/engine/riskCalculator";

export const COMPARISON_OPERATORS = [">", ">=", "<", "<="] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export type AlertRule = {
  ruleId: string;
  contractId: string;
  metric: MetricName;
  operator: ComparisonOperator;
  threshold: number;
  deadband: number;
};

export type NewAlertRule = {
  ruleId?: string;
  metric: MetricName;
  operator: ComparisonOperator;
  threshold: number;
  deadband?: number;
};

export type AlertStatus = "firing" | "cleared";

export type AlertState = {
  contractId: string;
  ruleId: string;
  state: AlertStatus;
  lastTransitionAt: Date | null;
  version: number;
};

export function clearedState(contractId: string, ruleId: string): AlertState {
  return { contractId, ruleId, state: "cleared", lastTransitionAt: null, version: 0 };
}

export function compare(operator: ComparisonOperator, value: number, threshold: number): boolean {
  switch (operator) {
    case ">":
      return value > threshold;
    case ">=":
      return value >= threshold;
    case "<":
      return value < threshold;
    case "<=":
      return value <= threshold;
  }
}

export function ruleIssues(rule: NewAlertRule): string[] {
  const issues: string[] = [];
  if (!METRIC_NAMES.includes(rule.metric)) issues.push(`unknown metric "${rule.metric}"`);
  if (!COMPARISON_OPERATORS.includes(rule.operator)) issues.push(`unknown operator "${rule.operator}"`);
  if (!Number.isFinite(rule.threshold)) issues.push("threshold must be a finite number");
  if (rule.deadband != null && (!Number.isFinite(rule.deadband) || rule.deadband < 0)) {
    issues.push("deadband must be a non-negative number");
  }
  if (rule.ruleId != null && rule.ruleId.trim() === "") issues.push("ruleId must not be blank");
  return issues;
}

export function describeRule(rule: Pick<AlertRule, "metric" | "operator" | "threshold">): string {
  return `${rule.metric} ${rule.operator} ${rule.threshold}`;
}
