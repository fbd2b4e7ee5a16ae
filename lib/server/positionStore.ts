import { randomUUID } from "node:crypto";
import { mkdirSync } from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { StoreConflict, ValidationError } from "@/lib/errors";
import { contractId, contractIssues, normalizeContract, type Contract, type OptionType } from "@/lib/options/contract";
import {
  clearedState,
  ruleIssues,
  type AlertRule,
  type AlertState,
  type AlertStatus,
  type ComparisonOperator,
  type NewAlertRule,
} from "@/lib/alerts/rules";
import type { MetricName } from "@/lib/engine/riskCalculator";

export type TrackedPosition = {
  contractId: string;
  contract: Contract;
  rules: AlertRule[];
  createdAt: Date;
};

export type AlertTransitionRecord = {
  id: number;
  contractId: string;
  ruleId: string;
  fromState: AlertStatus;
  toState: AlertStatus;
  metricValue: number;
  threshold: number;
  occurredAt: Date;
  delivered: boolean | null;
};

export type TransitionInput = {
  contractId: string;
  ruleId: string;
  fromState: AlertStatus;
  toState: AlertStatus;
  metricValue: number;
  threshold: number;
  occurredAt: Date;
};

type PositionRow = {
  contract_id: string;
  symbol: string;
  expiration: string;
  strike: number;
  option_type: OptionType;
  created_at: string;
};

type RuleRow = {
  rule_id: string;
  contract_id: string;
  metric: MetricName;
  operator: ComparisonOperator;
  threshold: number;
  deadband: number;
};

type StateRow = {
  contract_id: string;
  rule_id: string;
  state: AlertStatus;
  last_transition_at: string | null;
  version: number;
};

type TransitionRow = {
  id: number;
  contract_id: string;
  rule_id: string;
  from_state: AlertStatus;
  to_state: AlertStatus;
  metric_value: number;
  threshold: number;
  occurred_at: string;
  delivered: number | null;
};

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS tracked_position (
    contract_id TEXT PRIMARY KEY,
    symbol TEXT NOT NULL,
    expiration TEXT NOT NULL,
    strike REAL NOT NULL,
    option_type TEXT NOT NULL CHECK (option_type IN ('call', 'put')),
    created_at TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS alert_rule (
    rule_id TEXT PRIMARY KEY,
    contract_id TEXT NOT NULL REFERENCES tracked_position(contract_id) ON DELETE CASCADE,
    metric TEXT NOT NULL,
    operator TEXT NOT NULL,
    threshold REAL NOT NULL,
    deadband REAL NOT NULL DEFAULT 0
  );
  CREATE INDEX IF NOT EXISTS idx_alert_rule_contract ON alert_rule(contract_id);
  CREATE TABLE IF NOT EXISTS alert_state (
    contract_id TEXT NOT NULL REFERENCES tracked_position(contract_id) ON DELETE CASCADE,
    rule_id TEXT NOT NULL REFERENCES alert_rule(rule_id) ON DELETE CASCADE,
    state TEXT NOT NULL CHECK (state IN ('firing', 'cleared')),
    last_transition_at TEXT,
    version INTEGER NOT NULL,
    PRIMARY KEY (contract_id, rule_id)
  );
  CREATE TABLE IF NOT EXISTS alert_transition (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    contract_id TEXT NOT NULL REFERENCES tracked_position(contract_id) ON DELETE CASCADE,
    rule_id TEXT NOT NULL REFERENCES alert_rule(rule_id) ON DELETE CASCADE,
    from_state TEXT NOT NULL,
    to_state TEXT NOT NULL,
    metric_value REAL NOT NULL,
    threshold REAL NOT NULL,
    occurred_at TEXT NOT NULL,
    delivered INTEGER
  );
  CREATE INDEX IF NOT EXISTS idx_alert_transition_contract ON alert_transition(contract_id, id);
`;

function toRule(row: RuleRow): AlertRule {
  return {
    ruleId: row.rule_id,
    contractId: row.contract_id,
    metric: row.metric,
    operator: row.operator,
    threshold: row.threshold,
    deadband: row.deadband,
  };
}

function toContract(row: PositionRow): Contract {
  return { symbol: row.symbol, expiration: row.expiration, strike: row.strike, optionType: row.option_type };
}

function toTransition(row: TransitionRow): AlertTransitionRecord {
  return {
    id: row.id,
    contractId: row.contract_id,
    ruleId: row.rule_id,
    fromState: row.from_state,
    toState: row.to_state,
    metricValue: row.metric_value,
    threshold: row.threshold,
    occurredAt: new Date(row.occurred_at),
    delivered: row.delivered == null ? null : row.delivered === 1,
  };
}

/**
 * Sole owner of tracked positions, their rules, alert state and transition history.
 * Alert-state writes are version-checked so two writers can never both win.
 */
export class PositionStore {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA);
  }

  static open(filename: string): PositionStore {
    if (filename !== ":memory:") {
      mkdirSync(path.dirname(filename), { recursive: true });
    }
    const db = new Database(filename);
    if (filename !== ":memory:") db.pragma("journal_mode = WAL");
    return new PositionStore(db);
  }

  close(): void {
    this.db.close();
  }

  registerPosition(contract: Contract, rules: NewAlertRule[] = [], now: Date = new Date()): TrackedPosition {
    const normalized = normalizeContract(contract);
    const issues = contractIssues(normalized, now);
    rules.forEach((rule, index) => {
      for (const issue of ruleIssues(rule)) issues.push(`rule[${index}]: ${issue}`);
    });
    const givenIds = rules.map((r) => r.ruleId).filter((id): id is string => id != null);
    if (new Set(givenIds).size !== givenIds.length) issues.push("rule ids must be unique");
    if (issues.length > 0) throw new ValidationError("Invalid position.", issues);

    const id = contractId(normalized);
    const register = this.db.transaction(() => {
      if (this.positionRow(id)) throw new ValidationError(`Contract ${id.replace(/\s+/g, " ")} is already tracked.`);
      this.db
        .prepare(
          `INSERT INTO tracked_position (contract_id, symbol, expiration, strike, option_type, created_at)
           VALUES (@contractId, @symbol, @expiration, @strike, @optionType, @createdAt)`,
        )
        .run({
          contractId: id,
          symbol: normalized.symbol,
          expiration: normalized.expiration,
          strike: normalized.strike,
          optionType: normalized.optionType,
          createdAt: now.toISOString(),
        });
      for (const rule of rules) this.insertRule(id, rule);
    });
    register();

    const position = this.getPosition(id);
    if (!position) throw new ValidationError(`Contract ${id} vanished after registration.`);
    return position;
  }

  addRule(contractIdValue: string, rule: NewAlertRule): AlertRule {
    const issues = ruleIssues(rule);
    if (issues.length > 0) throw new ValidationError("Invalid alert rule.", issues);
    const add = this.db.transaction(() => {
      if (!this.positionRow(contractIdValue)) throw new ValidationError(`Contract ${contractIdValue} is not tracked.`);
      return this.insertRule(contractIdValue, rule);
    });
    return add();
  }

  removeRule(contractIdValue: string, ruleId: string): boolean {
    const info = this.db
      .prepare<[string, string]>("DELETE FROM alert_rule WHERE rule_id = ? AND contract_id = ?")
      .run(ruleId, contractIdValue);
    return info.changes > 0;
  }

  getPosition(contractIdValue: string): TrackedPosition | null {
    const row = this.positionRow(contractIdValue);
    if (!row) return null;
    return {
      contractId: row.contract_id,
      contract: toContract(row),
      rules: this.rulesFor(row.contract_id),
      createdAt: new Date(row.created_at),
    };
  }

  listPositions(): TrackedPosition[] {
    const rows = this.db
      .prepare<[], PositionRow>("SELECT * FROM tracked_position ORDER BY created_at, contract_id")
      .all();
    const rules = this.db.prepare<[], RuleRow>("SELECT * FROM alert_rule ORDER BY rowid").all();
    const byContract = new Map<string, AlertRule[]>();
    for (const rule of rules) {
      const list = byContract.get(rule.contract_id) ?? [];
      list.push(toRule(rule));
      byContract.set(rule.contract_id, list);
    }
    return rows.map((row) => ({
      contractId: row.contract_id,
      contract: toContract(row),
      rules: byContract.get(row.contract_id) ?? [],
      createdAt: new Date(row.created_at),
    }));
  }

  /** Removes the position with its rules, alert state and transition history. */
  unregisterPosition(contractIdValue: string): boolean {
    const info = this.db
      .prepare<[string]>("DELETE FROM tracked_position WHERE contract_id = ?")
      .run(contractIdValue);
    return info.changes > 0;
  }

  getAlertState(contractIdValue: string, ruleId: string): AlertState {
    const row = this.db
      .prepare<[string, string], StateRow>("SELECT * FROM alert_state WHERE contract_id = ? AND rule_id = ?")
      .get(contractIdValue, ruleId);
    if (!row) return clearedState(contractIdValue, ruleId);
    return {
      contractId: row.contract_id,
      ruleId: row.rule_id,
      state: row.state,
      lastTransitionAt: row.last_transition_at ? new Date(row.last_transition_at) : null,
      version: row.version,
    };
  }

  /**
   * Conditional write: succeeds only if the stored version still equals `expectedVersion`
   * (0 meaning "no row yet"). Returns the new version; throws StoreConflict otherwise.
   */
  setAlertState(
    contractIdValue: string,
    ruleId: string,
    next: { state: AlertStatus; lastTransitionAt: Date | null },
    expectedVersion: number,
  ): number {
    const write = this.db.transaction(() => this.writeState(contractIdValue, ruleId, next, expectedVersion));
    return write();
  }

  recordTransition(input: TransitionInput): AlertTransitionRecord {
    const info = this.db
      .prepare(
        `INSERT INTO alert_transition (contract_id, rule_id, from_state, to_state, metric_value, threshold, occurred_at, delivered)
         VALUES (@contractId, @ruleId, @fromState, @toState, @metricValue, @threshold, @occurredAt, NULL)`,
      )
      .run({ ...input, occurredAt: input.occurredAt.toISOString() });
    return { ...input, id: Number(info.lastInsertRowid), delivered: null };
  }

  /** State write and audit row in one transaction. */
  applyTransition(input: TransitionInput & { expectedVersion: number }): { version: number; transition: AlertTransitionRecord } {
    const apply = this.db.transaction(() => {
      const version = this.writeState(
        input.contractId,
        input.ruleId,
        { state: input.toState, lastTransitionAt: input.occurredAt },
        input.expectedVersion,
      );
      const transition = this.recordTransition({
        contractId: input.contractId,
        ruleId: input.ruleId,
        fromState: input.fromState,
        toState: input.toState,
        metricValue: input.metricValue,
        threshold: input.threshold,
        occurredAt: input.occurredAt,
      });
      return { version, transition };
    });
    return apply();
  }

  markDelivered(transitionId: number, delivered: boolean): void {
    this.db
      .prepare<[number, number]>("UPDATE alert_transition SET delivered = ? WHERE id = ?")
      .run(delivered ? 1 : 0, transitionId);
  }

  listTransitions(opts: { contractId?: string; limit?: number } = {}): AlertTransitionRecord[] {
    const limit = Math.max(1, opts.limit ?? 50);
    const rows = opts.contractId
      ? this.db
          .prepare<[string, number], TransitionRow>("SELECT * FROM alert_transition WHERE contract_id = ? ORDER BY id DESC LIMIT ?")
          .all(opts.contractId, limit)
      : this.db.prepare<[number], TransitionRow>("SELECT * FROM alert_transition ORDER BY id DESC LIMIT ?").all(limit);
    return rows.map(toTransition);
  }

  private positionRow(contractIdValue: string): PositionRow | undefined {
    return this.db
      .prepare<[string], PositionRow>("SELECT * FROM tracked_position WHERE contract_id = ?")
      .get(contractIdValue);
  }

  private rulesFor(contractIdValue: string): AlertRule[] {
    return this.db
      .prepare<[string], RuleRow>("SELECT * FROM alert_rule WHERE contract_id = ? ORDER BY rowid")
      .all(contractIdValue)
      .map(toRule);
  }

  private insertRule(contractIdValue: string, rule: NewAlertRule): AlertRule {
    const ruleId = rule.ruleId?.trim() || randomUUID();
    const taken = this.db.prepare<[string], { rule_id: string }>("SELECT rule_id FROM alert_rule WHERE rule_id = ?").get(ruleId);
    if (taken) throw new ValidationError(`Rule id ${ruleId} is already in use.`);
    const row: RuleRow = {
      rule_id: ruleId,
      contract_id: contractIdValue,
      metric: rule.metric,
      operator: rule.operator,
      threshold: rule.threshold,
      deadband: rule.deadband ?? 0,
    };
    this.db
      .prepare(
        `INSERT INTO alert_rule (rule_id, contract_id, metric, operator, threshold, deadband)
         VALUES (@rule_id, @contract_id, @metric, @operator, @threshold, @deadband)`,
      )
      .run(row);
    return toRule(row);
  }

  private writeState(
    contractIdValue: string,
    ruleId: string,
    next: { state: AlertStatus; lastTransitionAt: Date | null },
    expectedVersion: number,
  ): number {
    const rule = this.db
      .prepare<[string, string], { rule_id: string }>("SELECT rule_id FROM alert_rule WHERE rule_id = ? AND contract_id = ?")
      .get(ruleId, contractIdValue);
    if (!rule) throw new ValidationError(`Rule ${ruleId} does not belong to a tracked contract ${contractIdValue}.`);

    const params = {
      contractId: contractIdValue,
      ruleId,
      state: next.state,
      lastTransitionAt: next.lastTransitionAt ? next.lastTransitionAt.toISOString() : null,
      version: expectedVersion + 1,
    };
    const info =
      expectedVersion === 0
        ? this.db
            .prepare(
              `INSERT INTO alert_state (contract_id, rule_id, state, last_transition_at, version)
               VALUES (@contractId, @ruleId, @state, @lastTransitionAt, @version)
               ON CONFLICT (contract_id, rule_id) DO NOTHING`,
            )
            .run(params)
        : this.db
            .prepare(
              `UPDATE alert_state SET state = @state, last_transition_at = @lastTransitionAt, version = @version
               WHERE contract_id = @contractId AND rule_id = @ruleId AND version = @expected`,
            )
            .run({ ...params, expected: expectedVersion });
    if (info.changes === 0) throw new StoreConflict(contractIdValue, ruleId, expectedVersion);
    return params.version;
  }
}
