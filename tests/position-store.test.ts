import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StoreConflict, ValidationError } from "@/lib/errors";
import type { Contract } from "@/lib/options/contract";
import { PositionStore } from "@/lib/server/positionStore";

const NOW = new Date("2026-10-16T14:00:00.000Z");
const call: Contract = { symbol: "aapl", expiration: "2027-01-15", strike: 100, optionType: "call" };
const ID = "AAPL  270115C00100000";

let store: PositionStore;

beforeEach(() => {
  store = PositionStore.open(":memory:");
});

afterEach(() => {
  store.close();
});

function firingTransition(expectedVersion: number) {
  return {
    contractId: ID,
    ruleId: "delta-high",
    fromState: "cleared" as const,
    toState: "firing" as const,
    metricValue: 0.72,
    threshold: 0.6,
    occurredAt: NOW,
    expectedVersion,
  };
}

describe("position store", () => {
  it("registers a normalized contract with its rules", () => {
    const position = store.registerPosition(
      call,
      [
        { ruleId: "delta-high", metric: "delta", operator: ">", threshold: 0.6 },
        { metric: "theta", operator: "<", threshold: -0.05, deadband: 0.01 },
      ],
      NOW,
    );
    expect(position.contractId).toBe(ID);
    expect(position.contract).toEqual({ symbol: "AAPL", expiration: "2027-01-15", strike: 100, optionType: "call" });
    expect(position.createdAt).toEqual(NOW);
    expect(position.rules).toHaveLength(2);
    expect(position.rules[0]).toEqual({
      ruleId: "delta-high",
      contractId: ID,
      metric: "delta",
      operator: ">",
      threshold: 0.6,
      deadband: 0,
    });
    expect(position.rules[1].ruleId).toMatch(/^[0-9a-f-]{36}$/);
    expect(position.rules[1].deadband).toBe(0.01);
    expect(store.listPositions()).toEqual([position]);
  });

  it("rejects invalid or duplicate registrations", () => {
    expect(() => store.registerPosition({ ...call, expiration: "2026-01-16" }, [], NOW)).toThrowError(
      "Invalid position. expiration 2026-01-16 is not in the future",
    );
    expect(() => store.registerPosition({ ...call, strike: -5 }, [], NOW)).toThrow(ValidationError);
    expect(() =>
      store.registerPosition(
        call,
        [
          { ruleId: "a", metric: "delta", operator: ">", threshold: 0.6 },
          { ruleId: "a", metric: "gamma", operator: ">", threshold: 0.1 },
        ],
        NOW,
      ),
    ).toThrowError("Invalid position. rule ids must be unique");

    store.registerPosition(call, [], NOW);
    expect(() => store.registerPosition(call, [], NOW)).toThrowError(`Contract AAPL 270115C00100000 is already tracked.`);
    expect(store.listPositions()).toHaveLength(1);
  });

  it("adds and removes rules on a tracked contract", () => {
    store.registerPosition(call, [], NOW);
    const rule = store.addRule(ID, { ruleId: "iv", metric: "impliedVolatility", operator: ">=", threshold: 0.5 });
    expect(store.getPosition(ID)?.rules).toEqual([rule]);
    expect(() => store.addRule(ID, { ruleId: "iv", metric: "delta", operator: ">", threshold: 0.5 })).toThrowError(
      "Rule id iv is already in use.",
    );
    expect(() => store.addRule("MSFT  270115C00100000", { metric: "delta", operator: ">", threshold: 0.5 })).toThrowError(
      "Contract MSFT  270115C00100000 is not tracked.",
    );
    expect(store.removeRule(ID, "iv")).toBe(true);
    expect(store.removeRule(ID, "iv")).toBe(false);
    expect(store.getPosition(ID)?.rules).toEqual([]);
  });

  it("defaults alert state to cleared at version zero", () => {
    store.registerPosition(call, [{ ruleId: "delta-high", metric: "delta", operator: ">", threshold: 0.6 }], NOW);
    expect(store.getAlertState(ID, "delta-high")).toEqual({
      contractId: ID,
      ruleId: "delta-high",
      state: "cleared",
      lastTransitionAt: null,
      version: 0,
    });
  });

  it("only accepts alert-state writes against the current version", () => {
    store.registerPosition(call, [{ ruleId: "delta-high", metric: "delta", operator: ">", threshold: 0.6 }], NOW);
    expect(store.setAlertState(ID, "delta-high", { state: "firing", lastTransitionAt: NOW }, 0)).toBe(1);
    expect(() => store.setAlertState(ID, "delta-high", { state: "cleared", lastTransitionAt: NOW }, 0)).toThrow(StoreConflict);
    expect(() => store.setAlertState(ID, "delta-high", { state: "cleared", lastTransitionAt: NOW }, 5)).toThrow(StoreConflict);
    expect(store.setAlertState(ID, "delta-high", { state: "cleared", lastTransitionAt: NOW }, 1)).toBe(2);
    expect(store.getAlertState(ID, "delta-high")).toMatchObject({ state: "cleared", version: 2, lastTransitionAt: NOW });
  });

  it("refuses state for a rule that is not on the contract", () => {
    store.registerPosition(call, [], NOW);
    expect(() => store.setAlertState(ID, "nope", { state: "firing", lastTransitionAt: NOW }, 0)).toThrow(ValidationError);
  });

  it("writes state and audit row together and leaves neither on conflict", () => {
    store.registerPosition(call, [{ ruleId: "delta-high", metric: "delta", operator: ">", threshold: 0.6 }], NOW);
    const { version, transition } = store.applyTransition(firingTransition(0));
    expect(version).toBe(1);
    expect(transition).toMatchObject({ contractId: ID, ruleId: "delta-high", toState: "firing", delivered: null });

    expect(() => store.applyTransition(firingTransition(0))).toThrow(StoreConflict);
    expect(store.listTransitions()).toHaveLength(1);

    store.markDelivered(transition.id, true);
    expect(store.listTransitions({ contractId: ID })).toEqual([{ ...transition, delivered: true }]);
  });

  it("forgets alert history when a contract is unregistered and re-registered", () => {
    const rules = [{ ruleId: "delta-high", metric: "delta" as const, operator: ">" as const, threshold: 0.6 }];
    store.registerPosition(call, rules, NOW);
    store.applyTransition(firingTransition(0));
    expect(store.getAlertState(ID, "delta-high").state).toBe("firing");

    expect(store.unregisterPosition(ID)).toBe(true);
    expect(store.getPosition(ID)).toBeNull();
    expect(store.listTransitions()).toEqual([]);

    store.registerPosition(call, rules, NOW);
    expect(store.getAlertState(ID, "delta-high")).toMatchObject({ state: "cleared", version: 0 });
  });

  it("lists transitions newest first", () => {
    store.registerPosition(call, [{ ruleId: "delta-high", metric: "delta", operator: ">", threshold: 0.6 }], NOW);
    store.applyTransition(firingTransition(0));
    store.applyTransition({ ...firingTransition(1), fromState: "firing", toState: "cleared", metricValue: 0.55 });
    const history = store.listTransitions({ limit: 10 });
    expect(history.map((t) => t.toState)).toEqual(["cleared", "firing"]);
    expect(store.listTransitions({ limit: 1 })).toHaveLength(1);
  });
});
