import { afterEach, describe, expect, test } from "vitest";

import { RiskEngine } from "../services/riskEngine";
import { RuntimePolicyService } from "../services/runtimePolicyService";
import { type TempAuditStore, makeSignal, tempAuditStore } from "./fixtures";

class InMemoryRiskStore {
  private readonly data = new Map<string, string>();
  readonly events: Array<{ eventType: string; payload: Record<string, unknown> }> = [];

  getAppState(key: string): unknown {
    const value = this.data.get(key);
    return value === undefined ? null : JSON.parse(value);
  }

  setAppState(key: string, payload: unknown): void {
    this.data.set(key, JSON.stringify(payload));
  }

  logEvent(eventType: string, payload: Record<string, unknown>): void {
    this.events.push({ eventType, payload });
  }
}

const startedEngine = (policy = new RuntimePolicyService(), store?: InMemoryRiskStore): RiskEngine => {
  const engine = new RiskEngine(policy, store, 100_000);
  engine.startSession(100_000, "session-1");
  return engine;
};

describe("RiskEngine", () => {
  let temp: TempAuditStore | null = null;

  afterEach(() => {
    temp?.cleanup();
    temp = null;
  });

  test("sizes by the smaller of the risk budget and the notional cap", () => {
    const engine = startedEngine();

    expect(engine.sizePosition({ entryPrice: 100, stopPrice: 99.7 })).toBe(100);
    expect(engine.sizePosition({ entryPrice: 100, stopPrice: 50 })).toBe(40);
    expect(engine.sizePosition({ entryPrice: 100, stopPrice: 99.7 }, 30)).toBe(90);
    expect(engine.sizePosition({ entryPrice: 100, stopPrice: 100 })).toBe(0);
    expect(engine.sizePosition({ entryPrice: 20_000, stopPrice: 19_000 })).toBe(0);
  });

  test("rejects everything before a session is started", () => {
    const engine = new RiskEngine(new RuntimePolicyService(), undefined, 100_000);
    const decision = engine.evaluate(makeSignal("SBIN"));

    expect(decision).toEqual({ allowed: false, size: 100, reasons: ["session_not_started"] });
    expect(engine.getRiskState().halted).toBe(true);
  });

  test("reserves the slot before returning so back-to-back signals respect the cap", () => {
    const policy = new RuntimePolicyService();
    policy.updatePolicy({ maxOpenPositions: 2 });
    const engine = startedEngine(policy);

    const first = engine.evaluate(makeSignal("SBIN"));
    const second = engine.evaluate(makeSignal("ITC"));
    const third = engine.evaluate(makeSignal("TCS"));

    expect(first.allowed).toBe(true);
    expect(second.allowed).toBe(true);
    expect(third).toMatchObject({ allowed: false, reasons: ["max_open_positions_reached"] });

    const state = engine.getRiskState();
    expect(state.openPositions).toBe(2);
    expect(state.pendingReservations).toBe(2);
    expect(state.tradesToday).toBe(2);
  });

  test("one active position per instrument", () => {
    const engine = startedEngine();
    expect(engine.evaluate(makeSignal("SBIN")).allowed).toBe(true);
    expect(engine.evaluate(makeSignal("SBIN", { direction: "SELL", stopPrice: 100.3 }))).toMatchObject({
      allowed: false,
      reasons: ["instrument_already_active"]
    });
  });

  test("caps entries per session", () => {
    const policy = new RuntimePolicyService();
    policy.updatePolicy({ maxTradesPerDay: 1 });
    const engine = startedEngine(policy);

    const first = engine.evaluate(makeSignal("SBIN"));
    if (!first.allowed) throw new Error("expected a reservation");
    engine.commit(first.reservation.id);
    engine.closePosition(first.reservation.id, 50);

    expect(engine.evaluate(makeSignal("ITC"))).toMatchObject({
      allowed: false,
      reasons: ["max_trades_per_day_reached"]
    });
  });

  test("release returns the slot and the trade", () => {
    const engine = startedEngine();
    const decision = engine.evaluate(makeSignal("SBIN"));
    if (!decision.allowed) throw new Error("expected a reservation");

    expect(engine.release(decision.reservation.id, "broker_rejected")).toBe(true);
    expect(engine.release(decision.reservation.id, "broker_rejected")).toBe(false);
    expect(engine.commit(decision.reservation.id)).toBe(false);
    expect(engine.getRiskState()).toMatchObject({ openPositions: 0, tradesToday: 0 });
  });

  test("only committed slots can be closed and losses accumulate toward the daily halt", () => {
    const engine = startedEngine();
    const decision = engine.evaluate(makeSignal("SBIN"));
    if (!decision.allowed) throw new Error("expected a reservation");
    const reservationId = decision.reservation.id;

    expect(engine.closePosition(reservationId, -3_500)).toBe(false);
    expect(engine.commit(reservationId)).toBe(true);
    expect(engine.getReservation(reservationId)?.status).toBe("COMMITTED");
    expect(engine.closePosition(reservationId, -3_500)).toBe(true);

    const state = engine.getRiskState();
    expect(state).toMatchObject({
      openPositions: 0,
      tradesToday: 1,
      realizedPnl: -3_500,
      sessionLoss: 3_500,
      halted: true,
      haltReasons: ["daily_loss_limit_reached"]
    });
    expect(engine.evaluate(makeSignal("ITC"))).toMatchObject({
      allowed: false,
      reasons: ["daily_loss_limit_reached"]
    });
  });

  test("gains do not offset the session loss", () => {
    const engine = startedEngine();
    for (const [instrumentId, pnl] of [
      ["SBIN", -2_000],
      ["ITC", 5_000],
      ["TCS", -999]
    ] as const) {
      const decision = engine.evaluate(makeSignal(instrumentId));
      if (!decision.allowed) throw new Error(`expected a reservation for ${instrumentId}`);
      engine.commit(decision.reservation.id);
      engine.closePosition(decision.reservation.id, pnl);
    }

    const state = engine.getRiskState();
    expect(state.realizedPnl).toBe(2_001);
    expect(state.sessionLoss).toBe(2_999);
    expect(state.halted).toBe(false);
  });

  test("the kill switch halts entries and survives a restart", () => {
    const store = new InMemoryRiskStore();
    const engine = startedEngine(new RuntimePolicyService(), store);

    engine.setKillSwitch(true);
    expect(engine.evaluate(makeSignal("SBIN"))).toMatchObject({ allowed: false, reasons: ["kill_switch_active"] });

    const restarted = new RiskEngine(new RuntimePolicyService(), store, 100_000);
    expect(restarted.getKillSwitchState().enabled).toBe(true);
    restarted.setKillSwitch(false);
    restarted.startSession(100_000, "session-2");
    expect(restarted.evaluate(makeSignal("SBIN")).allowed).toBe(true);
  });

  test("journals every transition with the session id", () => {
    const store = new InMemoryRiskStore();
    const engine = startedEngine(new RuntimePolicyService(), store);
    const decision = engine.evaluate(makeSignal("SBIN"));
    if (!decision.allowed) throw new Error("expected a reservation");
    engine.commit(decision.reservation.id);
    engine.closePosition(decision.reservation.id, 12.5);

    expect(store.events.map((event) => event.eventType)).toEqual([
      "risk_session_started",
      "risk_reserved",
      "risk_committed",
      "risk_slot_closed"
    ]);
    expect(store.events.every((event) => event.payload.sessionId === "session-1")).toBe(true);
  });

  test("a new session keeps live slots but resets the counters", () => {
    const engine = startedEngine();
    const decision = engine.evaluate(makeSignal("SBIN"));
    if (!decision.allowed) throw new Error("expected a reservation");
    engine.commit(decision.reservation.id);

    const state = engine.startSession(150_000, "session-2");
    expect(state).toMatchObject({ sessionId: "session-2", capital: 150_000, openPositions: 1, tradesToday: 0 });
    expect(engine.closePosition(decision.reservation.id, -10)).toBe(true);
    expect(engine.getRiskState()).toMatchObject({ openPositions: 0, tradesToday: 0, sessionLoss: 10 });
  });

  test("restores counters from the audit journal and halts on unresolved reservations", () => {
    temp = tempAuditStore();
    const engine = new RiskEngine(new RuntimePolicyService(), temp.store, 100_000);
    engine.startSession(100_000, "session-7");

    const a = engine.evaluate(makeSignal("SBIN"));
    const b = engine.evaluate(makeSignal("ITC"));
    if (!a.allowed || !b.allowed) throw new Error("expected reservations");
    engine.commit(a.reservation.id);
    engine.release(b.reservation.id, "broker_rejected");
    const c = engine.evaluate(makeSignal("TCS"));
    if (!c.allowed) throw new Error("expected a reservation");

    const replay = temp.store.replaySession();
    if (!replay) throw new Error("expected a replay");
    expect(replay.sessionId).toBe("session-7");
    expect(replay.tradesToday).toBe(2);
    expect(replay.reservations.map((reservation) => [reservation.instrumentId, reservation.status])).toEqual([
      ["SBIN", "COMMITTED"],
      ["TCS", "RESERVED"]
    ]);

    const restored = new RiskEngine(new RuntimePolicyService(), temp.store, 100_000);
    const state = restored.restore(replay);
    expect(state).toMatchObject({
      sessionId: "session-7",
      openPositions: 2,
      pendingReservations: 1,
      tradesToday: 2,
      halted: true,
      haltReasons: ["unresolved_reservations_after_restart"]
    });
    expect(restored.closePosition(a.reservation.id, -500)).toBe(true);
    expect(temp.store.replaySession("session-7")).toMatchObject({ realizedPnl: -500, sessionLoss: 500 });
  });

  test("carried reservations do not count toward the new session's trades", () => {
    temp = tempAuditStore();
    const engine = new RiskEngine(new RuntimePolicyService(), temp.store, 100_000);
    engine.startSession(100_000, "day-1");
    const decision = engine.evaluate(makeSignal("SBIN"));
    if (!decision.allowed) throw new Error("expected a reservation");
    engine.startSession(100_000, "day-2");
    engine.release(decision.reservation.id, "entry_not_filled");

    expect(engine.getRiskState().tradesToday).toBe(0);
    expect(temp.store.replaySession()).toMatchObject({ sessionId: "day-2", tradesToday: 0, reservations: [] });
  });
});
