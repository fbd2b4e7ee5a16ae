import { randomUUID } from "node:crypto";
import { StoreConflict, describeError, isMonitorError, type MonitorErrorCode } from "@/lib/errors";
import type { QuoteSnapshot } from "@/lib/options/contract";
import type { QuoteFetcher } from "@/lib/broker/quoteFetcher";
import { computeRiskMetrics, type RiskMetrics } from "@/lib/engine/riskCalculator";
import { evaluateRule, type Evaluation } from "@/lib/alerts/alertEvaluator";
import type { AlertRule, AlertState } from "@/lib/alerts/rules";
import { formatLifecycleMessage, formatTransitionMessage } from "@/lib/notify/messages";
import type { Notifier } from "@/lib/notify/notifier";
import type { PositionStore, TrackedPosition } from "@/lib/server/positionStore";
import type { Logger } from "@/lib/server/logger";
import { DEFAULT_FETCH_RETRY, withRetry, type RetryPolicy, type Sleep } from "@/lib/server/retry";
import { KeyedLock } from "@/lib/engine/keyedLock";
import { runPool } from "@/lib/engine/workerPool";

export type CyclePhase = "idle" | "fetching" | "calculating" | "evaluating" | "persisting" | "notifying";

export type CycleStage = "fetch" | "calculate" | "evaluate" | "persist";

export type ContractFailure = {
  contractId: string;
  stage: CycleStage;
  code: MonitorErrorCode | "UNKNOWN";
  message: string;
};

export type CycleReport = {
  cycleId: string;
  startedAt: Date;
  finishedAt: Date;
  storeAvailable: boolean;
  contracts: number;
  succeeded: number;
  skipped: number;
  failed: ContractFailure[];
  transitions: number;
  notificationsSent: number;
  deliveryFailures: number;
};

export type OrchestratorOptions = {
  store: PositionStore;
  fetcher: QuoteFetcher;
  notifier: Notifier;
  logger: Logger;
  intervalMs: number;
  concurrency?: number;
  fetchRetry?: RetryPolicy;
  riskFreeRate?: number;
  dividendYield?: number;
  storeFailureAlarmThreshold?: number;
  clock?: () => Date;
  sleep?: Sleep;
};

type Measured = { position: TrackedPosition; snapshot: QuoteSnapshot; metrics: RiskMetrics };

type Decision = Measured & { rule: AlertRule; prior: AlertState; evaluation: Evaluation };

type PendingNotice = Decision & { transitionId: number };

type RunToken = { stopped: boolean };

export class PollingOrchestrator {
  private readonly opts: OrchestratorOptions;
  private readonly lock = new KeyedLock();
  private currentPhase: CyclePhase = "idle";
  private stopRequested = false;
  private paused = false;
  private loop: Promise<void> | null = null;
  private run: RunToken | null = null;
  private wake: (() => void) | null = null;
  private consecutiveStoreFailures = 0;
  private storeAlarmRaised = false;

  constructor(opts: OrchestratorOptions) {
    this.opts = opts;
  }

  get phase(): CyclePhase {
    return this.currentPhase;
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  pause(): void {
    this.paused = true;
    this.opts.logger.info("monitor_paused");
  }

  resume(): void {
    this.paused = false;
    this.opts.logger.info("monitor_resumed");
  }

  /**
   * Starts the tick loop; resolves once the loop has exited after stop().
   * Starting while a stopped loop is still draining queues a fresh run behind it.
   */
  start(): Promise<void> {
    if (this.loop && this.run && !this.run.stopped) return this.loop;
    const token: RunToken = { stopped: false };
    this.run = token;
    this.stopRequested = false;
    const draining = this.loop ?? Promise.resolve();
    const loop: Promise<void> = draining
      .then(() => this.runLoop(token))
      .finally(() => {
        if (this.loop === loop) this.loop = null;
      });
    this.loop = loop;
    return loop;
  }

  /** Lets in-flight contracts finish, starts no new ones and waits for the loop to exit. */
  async stop(): Promise<void> {
    this.stopRequested = true;
    if (this.run) this.run.stopped = true;
    this.wake?.();
    if (this.loop) await this.loop;
  }

  runCycle(): Promise<CycleReport> {
    return this.cycle(() => this.stopRequested);
  }

  private async cycle(shouldStop: () => boolean): Promise<CycleReport> {
    const cycleId = randomUUID();
    const log = this.opts.logger.child({ cycle_id: cycleId });
    const report: CycleReport = {
      cycleId,
      startedAt: this.now(),
      finishedAt: this.now(),
      storeAvailable: true,
      contracts: 0,
      succeeded: 0,
      skipped: 0,
      failed: [],
      transitions: 0,
      notificationsSent: 0,
      deliveryFailures: 0,
    };

    let positions: TrackedPosition[];
    try {
      positions = this.opts.store.listPositions();
      this.markStoreHealthy(log);
    } catch (err) {
      this.markStoreFailure(log, err);
      report.storeAvailable = false;
      report.finishedAt = this.now();
      return report;
    }
    report.contracts = positions.length;

    const failedIds = new Set<string>();
    const fail = (contractId: string, stage: CycleStage, err: unknown) => {
      if (failedIds.has(contractId)) return;
      failedIds.add(contractId);
      const { code, message } = describeError(err);
      report.failed.push({ contractId, stage, code, message });
      log.warn("contract_failed", { contract_id: contractId, stage, code, message });
    };

    try {
      this.currentPhase = "fetching";
      const fetched = await runPool(
        positions,
        this.concurrency,
        (position) => this.fetchQuote(position, log),
        shouldStop,
      );
      const quoted: Array<{ position: TrackedPosition; snapshot: QuoteSnapshot }> = [];
      fetched.forEach((result, index) => {
        const position = positions[index];
        if (result.status === "fulfilled") quoted.push({ position, snapshot: result.value });
        else if (result.status === "rejected") fail(position.contractId, "fetch", result.reason);
        else report.skipped += 1;
      });

      this.currentPhase = "calculating";
      const measured: Measured[] = [];
      for (const item of quoted) {
        try {
          const metrics = computeRiskMetrics(item.position.contract, item.snapshot, {
            riskFreeRate: this.opts.riskFreeRate,
            dividendYield: this.opts.dividendYield,
          });
          log.debug("metrics_computed", { contract_id: item.position.contractId, ...metrics });
          measured.push({ ...item, metrics });
        } catch (err) {
          fail(item.position.contractId, "calculate", err);
        }
      }

      this.currentPhase = "evaluating";
      const decisions = new Map<string, Decision[]>();
      for (const item of measured) {
        try {
          const rows = item.position.rules.map((rule) => {
            const prior = this.opts.store.getAlertState(item.position.contractId, rule.ruleId);
            const evaluation = evaluateRule(item.position.contract, rule, item.metrics, prior);
            return { ...item, rule, prior, evaluation };
          });
          decisions.set(item.position.contractId, rows.filter((row) => row.evaluation.transitioned));
        } catch (err) {
          fail(item.position.contractId, "evaluate", err);
        }
      }

      this.currentPhase = "persisting";
      const pending: PendingNotice[] = [];
      await runPool(Array.from(decisions.entries()), this.concurrency, ([contractId, rows]) =>
        this.lock.run(contractId, async () => {
          for (const row of rows) {
            try {
              const notice = this.persistDecision(row);
              if (notice) pending.push(notice);
            } catch (err) {
              fail(contractId, "persist", err);
            }
          }
        }),
      );
      report.transitions = pending.length;

      this.currentPhase = "notifying";
      const deliveries = await runPool(pending, this.concurrency, (notice) => this.deliver(notice, log));
      for (const result of deliveries) {
        if (result.status === "fulfilled" && result.value) report.notificationsSent += 1;
        else report.deliveryFailures += 1;
      }
    } finally {
      this.currentPhase = "idle";
    }

    report.succeeded = report.contracts - report.failed.length - report.skipped;
    report.finishedAt = this.now();
    log.info("cycle_complete", {
      contracts: report.contracts,
      succeeded: report.succeeded,
      failed: report.failed.length,
      skipped: report.skipped,
      transitions: report.transitions,
      notifications_sent: report.notificationsSent,
      delivery_failures: report.deliveryFailures,
      duration_ms: report.finishedAt.getTime() - report.startedAt.getTime(),
    });
    return report;
  }

  private get concurrency(): number {
    return Math.max(1, this.opts.concurrency ?? 4);
  }

  private now(): Date {
    return this.opts.clock ? this.opts.clock() : new Date();
  }

  private async fetchQuote(position: TrackedPosition, log: Logger): Promise<QuoteSnapshot> {
    const outcome = await withRetry(() => this.opts.fetcher.fetch(position.contract), {
      policy: this.opts.fetchRetry ?? DEFAULT_FETCH_RETRY,
      isRetryable: (err) => isMonitorError(err) && err.retryable,
      sleep: this.opts.sleep,
      onRetry: ({ attempt, delayMs, error }) =>
        log.debug("fetch_retry", { contract_id: position.contractId, attempt, delay_ms: delayMs, ...describeError(error) }),
    });
    if (!outcome.ok) throw outcome.error;
    return outcome.value;
  }

  /**
   * Conditional write of one transition. A version conflict gets exactly one re-read and re-evaluation;
   * if the fresh state no longer transitions, someone else already recorded it and nothing is sent.
   */
  private persistDecision(decision: Decision): PendingNotice | null {
    const { store } = this.opts;
    const apply = (row: Decision) =>
      store.applyTransition({
        contractId: row.position.contractId,
        ruleId: row.rule.ruleId,
        fromState: row.prior.state,
        toState: row.evaluation.newState,
        metricValue: row.evaluation.metricValue,
        threshold: row.rule.threshold,
        occurredAt: row.metrics.computedAt,
        expectedVersion: row.prior.version,
      });

    try {
      const { transition } = apply(decision);
      return { ...decision, transitionId: transition.id };
    } catch (err) {
      if (!(err instanceof StoreConflict)) throw err;
    }

    const prior = store.getAlertState(decision.position.contractId, decision.rule.ruleId);
    const evaluation = evaluateRule(decision.position.contract, decision.rule, decision.metrics, prior);
    if (!evaluation.transitioned) return null;
    const retry: Decision = { ...decision, prior, evaluation };
    const { transition } = apply(retry);
    return { ...retry, transitionId: transition.id };
  }

  private async deliver(notice: PendingNotice, log: Logger): Promise<boolean> {
    const text = formatTransitionMessage({
      contract: notice.position.contract,
      rule: notice.rule,
      newState: notice.evaluation.newState,
      metrics: notice.metrics,
      metricValue: notice.evaluation.metricValue,
    });
    const result = await this.opts.notifier.send(text);
    try {
      this.opts.store.markDelivered(notice.transitionId, result.ok);
    } catch (err) {
      log.warn("delivery_mark_failed", { transition_id: notice.transitionId, ...describeError(err) });
    }
    log.info("alert_transition", {
      contract_id: notice.position.contractId,
      rule_id: notice.rule.ruleId,
      from: notice.prior.state,
      to: notice.evaluation.newState,
      value: notice.evaluation.metricValue,
      delivered: result.ok,
    });
    return result.ok;
  }

  private markStoreHealthy(log: Logger): void {
    if (this.storeAlarmRaised) log.info("store_recovered", { failed_cycles: this.consecutiveStoreFailures });
    this.consecutiveStoreFailures = 0;
    this.storeAlarmRaised = false;
  }

  private markStoreFailure(log: Logger, err: unknown): void {
    this.consecutiveStoreFailures += 1;
    log.error("store_unavailable", { consecutive_failures: this.consecutiveStoreFailures, ...describeError(err) });
    const threshold = this.opts.storeFailureAlarmThreshold ?? 3;
    if (!this.storeAlarmRaised && this.consecutiveStoreFailures >= threshold) {
      this.storeAlarmRaised = true;
      log.error("store_unavailable_alarm", { consecutive_failures: this.consecutiveStoreFailures });
    }
  }

  private async runLoop(token: RunToken): Promise<void> {
    if (token.stopped) return;
    const { logger, notifier, intervalMs } = this.opts;
    let contracts = 0;
    try {
      contracts = this.opts.store.listPositions().length;
    } catch (err) {
      logger.warn("startup_store_read_failed", describeError(err));
    }
    logger.info("monitor_started", { interval_ms: intervalMs, contracts });
    await notifier.send(formatLifecycleMessage("started", { contracts, intervalSec: Math.round(intervalMs / 1000) }));

    const anchor = this.now().getTime();
    while (!token.stopped) {
      if (this.paused) {
        logger.debug("cycle_skipped_paused");
      } else {
        try {
          await this.cycle(() => token.stopped);
        } catch (err) {
          logger.error("cycle_crashed", describeError(err));
        }
      }
      if (token.stopped) break;
      // Stay on the anchor's grid so slow cycles don't push every later tick back.
      const elapsed = this.now().getTime() - anchor;
      await this.waitForTick(intervalMs - (elapsed % intervalMs));
    }

    logger.info("monitor_stopped");
    await notifier.send(formatLifecycleMessage("stopped", { contracts, intervalSec: Math.round(intervalMs / 1000) }));
  }

  private waitForTick(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
      const timer = setTimeout(done, Math.max(0, ms));
      this.wake = done;
    });
  }
}
