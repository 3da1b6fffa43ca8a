import { describe, expect, test } from "vitest";

import { RuntimePolicyService } from "../services/runtimePolicyService";

class InMemoryPolicyStore {
  private readonly data = new Map<string, string>();

  getAppState(key: string): unknown {
    const value = this.data.get(key);
    if (!value) return null;
    return JSON.parse(value);
  }

  setAppState(key: string, payload: unknown): void {
    this.data.set(key, JSON.stringify(payload));
  }
}

describe("RuntimePolicyService", () => {
  test("starts from the configured defaults", () => {
    const policy = new RuntimePolicyService().getPolicy();

    expect(policy).toMatchObject({
      rsiOversold: 30,
      rsiOverbought: 70,
      stopLossPct: 0.003,
      takeProfitPct: 0.007,
      signalThrottleMs: 5_000,
      maxOpenPositions: 5,
      maxTradesPerDay: 10,
      maxDailyLossPct: 0.03
    });
  });

  test("clamps updates to the guideline bounds and rounds integer settings", () => {
    const service = new RuntimePolicyService();
    const updated = service.updatePolicy({ rsiOversold: 2, rsiOverbought: 99, maxOpenPositions: 3.6, stopLossPct: 0.004 });

    expect(updated.rsiOversold).toBe(5);
    expect(updated.rsiOverbought).toBe(95);
    expect(updated.maxOpenPositions).toBe(4);
    expect(updated.stopLossPct).toBe(0.004);
    expect(updated.takeProfitPct).toBe(0.007);
  });

  test("getPolicy hands out copies", () => {
    const service = new RuntimePolicyService();
    const policy = service.getPolicy();
    policy.maxOpenPositions = 40;
    expect(service.getPolicy().maxOpenPositions).toBe(5);
  });

  test("loads previously persisted values on startup", () => {
    const store = new InMemoryPolicyStore();
    new RuntimePolicyService(store).updatePolicy({ rsiOversold: 25, signalThrottleMs: 12_000 });

    const reloaded = new RuntimePolicyService(store).getPolicy();
    expect(reloaded.rsiOversold).toBe(25);
    expect(reloaded.signalThrottleMs).toBe(12_000);
  });

  test("reset restores and persists the defaults", () => {
    const store = new InMemoryPolicyStore();
    const service = new RuntimePolicyService(store);
    service.updatePolicy({ maxTradesPerDay: 3 });
    expect(service.resetPolicy().maxTradesPerDay).toBe(10);
    expect(new RuntimePolicyService(store).getPolicy().maxTradesPerDay).toBe(10);
  });

  test("ignores unreadable persisted state", () => {
    const store = new InMemoryPolicyStore();
    store.setAppState("runtime_policy_v1", { rsiOversold: "low" });
    expect(new RuntimePolicyService(store).getPolicy().rsiOversold).toBe(30);
  });

  test("every setting has a guideline", () => {
    const service = new RuntimePolicyService();
    expect(Object.keys(service.getGuidelines()).sort()).toEqual(Object.keys(service.getPolicy()).sort());
  });
});
