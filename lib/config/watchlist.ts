import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { ValidationError, describeError } from "@/lib/errors";
import { contractId, type Contract } from "@/lib/options/contract";
import { COMPARISON_OPERATORS, type AlertRule, type NewAlertRule } from "@/lib/alerts/rules";
import { METRIC_NAMES } from "@/lib/engine/riskCalculator";
import type { PositionStore } from "@/lib/server/positionStore";
import type { Logger } from "@/lib/server/logger";

const ruleSchema = z.object({
  id: z.string().trim().min(1).optional(),
  metric: z.enum(METRIC_NAMES),
  operator: z.enum(COMPARISON_OPERATORS),
  threshold: z.number().finite(),
  deadband: z.number().finite().min(0).default(0),
});

const positionSchema = z.object({
  symbol: z.string().trim().min(1).transform((s) => s.toUpperCase()),
  expiration: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expiration must be YYYY-MM-DD"),
  strike: z.number().finite().positive(),
  optionType: z.enum(["call", "put"]),
  rules: z.array(ruleSchema).default([]),
});

export const watchlistSchema = z.object({
  positions: z.array(positionSchema).default([]),
});

export type WatchlistConfig = z.infer<typeof watchlistSchema>;
export type WatchlistPosition = WatchlistConfig["positions"][number];

export function parseWatchlist(raw: unknown): WatchlistConfig {
  const result = watchlistSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      "Invalid watchlist.",
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  return result.data;
}

export function loadWatchlist(filePath: string): WatchlistConfig {
  if (!existsSync(filePath)) return { positions: [] };
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new ValidationError(`Watchlist ${filePath} is not valid JSON.`, [describeError(err).message]);
  }
  return parseWatchlist(raw);
}

function toContract(position: WatchlistPosition): Contract {
  return {
    symbol: position.symbol,
    expiration: position.expiration,
    strike: position.strike,
    optionType: position.optionType,
  };
}

function toNewRule(rule: WatchlistPosition["rules"][number]): NewAlertRule {
  return {
    ruleId: rule.id,
    metric: rule.metric,
    operator: rule.operator,
    threshold: rule.threshold,
    deadband: rule.deadband,
  };
}

export type SyncResult = {
  registered: string[];
  rulesAdded: number;
  diverged: Array<{ contractId: string; ruleId: string }>;
  rejected: Array<{ contractId: string; message: string }>;
};

function sameCondition(stored: AlertRule, rule: NewAlertRule): boolean {
  return stored.metric === rule.metric && stored.operator === rule.operator && stored.threshold === rule.threshold;
}

/**
 * Registers watchlist contracts the store doesn't know yet and adds rules missing from known ones.
 * Never removes or rewrites anything: a stored rule that no longer matches its watchlist entry is
 * reported as diverged and left alone.
 */
export function syncWatchlist(store: PositionStore, config: WatchlistConfig, logger: Logger, now: Date = new Date()): SyncResult {
  const result: SyncResult = { registered: [], rulesAdded: 0, diverged: [], rejected: [] };

  for (const position of config.positions) {
    const contract = toContract(position);
    const id = contractId(contract);
    const rules = position.rules.map(toNewRule);
    try {
      const existing = store.getPosition(id);
      if (!existing) {
        store.registerPosition(contract, rules, now);
        result.registered.push(id);
        continue;
      }
      for (const rule of rules) {
        const known = existing.rules.find((r) => (rule.ruleId ? r.ruleId === rule.ruleId : sameCondition(r, rule)));
        if (!known) {
          store.addRule(id, rule);
          result.rulesAdded += 1;
          continue;
        }
        if (sameCondition(known, rule) && known.deadband === (rule.deadband ?? 0)) continue;
        result.diverged.push({ contractId: id, ruleId: known.ruleId });
        logger.warn("watchlist_rule_diverged", {
          contract_id: id,
          rule_id: known.ruleId,
          stored: { metric: known.metric, operator: known.operator, threshold: known.threshold, deadband: known.deadband },
          configured: { metric: rule.metric, operator: rule.operator, threshold: rule.threshold, deadband: rule.deadband ?? 0 },
        });
      }
    } catch (err) {
      const { message } = describeError(err);
      result.rejected.push({ contractId: id, message });
      logger.warn("watchlist_entry_rejected", { contract_id: id, message });
    }
  }

  return result;
}
