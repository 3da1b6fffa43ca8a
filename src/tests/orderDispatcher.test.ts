import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { PaperBroker, type PaperBrokerOptions } from "../adapters/paperBroker";
import type { ClosePositionRequest, CloseResult, OrderStatusReport } from "../adapters/types";
import { EngineEvents, type ExecutionRejectedEvent } from "../services/engineEvents";
import { OrderDispatcher, computePnl } from "../services/orderDispatcher";
import { RiskEngine } from "../services/riskEngine";
import { RuntimePolicyService } from "../services/runtimePolicyService";
import type { Position, Signal } from "../types/models";
import { type TempAuditStore, instrument, makeSignal, tempAuditStore } from "./fixtures";

class FlakyCloseBroker extends PaperBroker {
  failCloses = 1;

  override async closePosition(request: ClosePositionRequest): Promise<CloseResult> {
    if (this.failCloses > 0) {
      this.failCloses -= 1;
      throw new Error("exchange unavailable");
    }
    return await super.closePosition(request);
  }
}

/** The exchange matches the entry before a cancel request lands. */
class FillsDespiteCancelBroker extends PaperBroker {
  cancelRequests = 0;

  constructor() {
    super({ fillMode: "never" });
  }

  override async cancel(_orderId: string): Promise<void> {
    this.cancelRequests += 1;
  }

  override async getStatus(orderId: string): Promise<OrderStatusReport> {
    if (this.cancelRequests > 0) this.fillEntry(orderId);
    return await super.getStatus(orderId);
  }
}

describe("OrderDispatcher", () => {
  let temp: TempAuditStore;
  let policy: RuntimePolicyService;
  let risk: RiskEngine;
  let events: EngineEvents;

  beforeEach(() => {
    temp = tempAuditStore();
    policy = new RuntimePolicyService();
    risk = new RiskEngine(policy, temp.store, 100_000);
    risk.startSession(100_000, "session-1");
    events = new EngineEvents();
  });

  afterEach(() => {
    temp.cleanup();
  });

  const dispatcherFor = (broker: PaperBroker, overrides: Partial<{ ackTimeoutMs: number; fillTimeoutMs: number }> = {}) =>
    new OrderDispatcher(broker, risk, temp.store, policy, events, {
      ackTimeoutMs: overrides.ackTimeoutMs ?? 200,
      fillTimeoutMs: overrides.fillTimeoutMs ?? 200,
      fillPollIntervalMs: 5
    });

  const submit = async (dispatcher: OrderDispatcher, signal: Signal): Promise<Position | null> => {
    const decision = risk.evaluate(signal);
    if (!decision.allowed) throw new Error(`risk rejected: ${decision.reasons.join(", ")}`);
    return await dispatcher.dispatch(signal, decision.reservation, instrument(signal.instrumentId));
  };

  const closedPosition = (): Position | undefined => temp.store.listPositions({ status: "closed" })[0];

  test("a filled entry opens the position and commits the reservation", async () => {
    const broker = new PaperBroker();
    const dispatcher = dispatcherFor(broker);
    const position = await submit(dispatcher, makeSignal("SBIN", { entryPrice: 100.02 }));

    expect(position).toMatchObject({ lifecycle: "OPEN", status: "open", brokerOrderId: "paper-1", size: 99 });
    expect(broker.submittedOrders()[0]).toMatchObject({ entryPrice: 100, stopPrice: 99.7, targetPrice: 100.7 });
    expect(risk.listReservations().map((reservation) => reservation.status)).toEqual(["COMMITTED"]);
    expect(temp.store.listPositions({ status: "open" }).map((entry) => entry.lifecycle)).toEqual(["OPEN"]);
  });

  test("a broker rejection releases the reservation", async () => {
    const rejected: ExecutionRejectedEvent[] = [];
    events.subscribe("execution_rejected", (event) => rejected.push(event));
    const dispatcher = dispatcherFor(new PaperBroker({ rejectReason: "insufficient margin" }));

    expect(await submit(dispatcher, makeSignal("SBIN"))).toBeNull();
    expect(risk.getRiskState()).toMatchObject({ openPositions: 0, tradesToday: 0 });
    expect(rejected.map((event) => event.reason)).toEqual(["broker_rejected"]);

    const [record] = temp.store.listAuditRecords({ eventTypes: ["execution_rejected"] });
    expect(record?.payload).toMatchObject({ reason: "broker_rejected", detail: "insufficient margin" });
  });

  test("a missing acknowledgment releases the slot and cancels the late order", async () => {
    const options: PaperBrokerOptions = { ackDelayMs: 60 };
    const dispatcher = dispatcherFor(new PaperBroker(options), { ackTimeoutMs: 10 });

    expect(await submit(dispatcher, makeSignal("SBIN"))).toBeNull();
    expect(risk.getRiskState().openPositions).toBe(0);

    await dispatcher.drain();
    expect(dispatcher.pendingCount()).toBe(0);
    const [rejected] = temp.store.listAuditRecords({ eventTypes: ["execution_rejected"] });
    expect(rejected?.payload.reason).toBe("ack_timeout");
    const [late] = temp.store.listAuditRecords({ eventTypes: ["late_ack_cancelled"] });
    expect(late?.payload.orderId).toBe("paper-1");
  });

  test("an entry that never fills is cancelled after the fill timeout", async () => {
    const broker = new PaperBroker({ fillMode: "never" });
    const dispatcher = dispatcherFor(broker, { fillTimeoutMs: 30 });
    const position = await submit(dispatcher, makeSignal("SBIN"));

    expect(position).toMatchObject({
      lifecycle: "CLOSED",
      status: "entry_cancelled",
      exitReason: "entry_not_filled",
      realizedPnl: 0
    });
    expect(await broker.getStatus("paper-1")).toEqual({ status: "cancelled", fillPrice: null });
    expect(risk.getRiskState()).toMatchObject({ openPositions: 0, tradesToday: 0 });
    const [released] = temp.store.listAuditRecords({ eventTypes: ["risk_released"] });
    expect(released?.payload.reason).toBe("fill_timeout");
    expect(dispatcher.listPositions()).toEqual([]);
  });

  test("a price at the target closes a long position", async () => {
    const dispatcher = dispatcherFor(new PaperBroker());
    await submit(dispatcher, makeSignal("SBIN"));

    dispatcher.onPrice("SBIN", 100.7, null);
    await dispatcher.drain();

    const closed = closedPosition();
    expect(closed).toMatchObject({ exitReason: "target", status: "closed_by_target", exitPrice: 100.7 });
    expect(closed?.realizedPnl).toBeCloseTo(70, 6);
    expect(risk.getRiskState().realizedPnl).toBeCloseTo(70, 6);
    expect(risk.getRiskState().openPositions).toBe(0);
  });

  test("a price through the stop closes a long position at a loss", async () => {
    const dispatcher = dispatcherFor(new PaperBroker());
    await submit(dispatcher, makeSignal("SBIN"));

    dispatcher.onPrice("SBIN", 99.6, 100.2);
    await dispatcher.drain();

    expect(closedPosition()).toMatchObject({ exitReason: "stop", status: "closed_by_stop" });
    expect(risk.getRiskState().sessionLoss).toBeCloseTo(40, 6);
  });

  test("a short position exits at its target below entry", async () => {
    const dispatcher = dispatcherFor(new PaperBroker());
    await submit(dispatcher, makeSignal("ITC", { direction: "SELL", stopPrice: 100.3, targetPrice: 99.3 }));

    dispatcher.onPrice("ITC", 99.5, null);
    expect(dispatcher.listPositions()[0]?.lifecycle).toBe("OPEN");
    dispatcher.onPrice("ITC", 99.3, null);
    await dispatcher.drain();

    expect(closedPosition()).toMatchObject({ direction: "SELL", exitReason: "target" });
    expect(closedPosition()?.realizedPnl).toBeCloseTo(70, 6);
  });

  test("a profitable return to the reference price wins over the target", async () => {
    const dispatcher = dispatcherFor(new PaperBroker());
    await submit(dispatcher, makeSignal("SBIN"));

    dispatcher.onPrice("SBIN", 100.8, 100.8);
    await dispatcher.drain();

    expect(closedPosition()).toMatchObject({ exitReason: "reference_return", status: "closed_by_target" });
  });

  test("the reference exit needs the minimum profit", async () => {
    const dispatcher = dispatcherFor(new PaperBroker());
    await submit(dispatcher, makeSignal("SBIN"));

    dispatcher.onPrice("SBIN", 100.1, 100.1);
    await dispatcher.drain();

    expect(dispatcher.listPositions()[0]?.lifecycle).toBe("OPEN");
  });

  test("positions held past the max hold time are closed", async () => {
    const dispatcher = dispatcherFor(new PaperBroker());
    await submit(dispatcher, makeSignal("SBIN"));

    dispatcher.onPrice("SBIN", 100.1, null, Date.now() + 121 * 60_000);
    await dispatcher.drain();

    expect(closedPosition()).toMatchObject({ exitReason: "max_hold", status: "closed_by_timeout" });
  });

  test("a failed close puts the position back to OPEN", async () => {
    const dispatcher = dispatcherFor(new FlakyCloseBroker());
    await submit(dispatcher, makeSignal("SBIN"));

    dispatcher.onPrice("SBIN", 100.7, null);
    await dispatcher.drain();

    expect(dispatcher.listPositions()[0]?.lifecycle).toBe("OPEN");
    const [failure] = temp.store.listAuditRecords({ eventTypes: ["position_close_failed"] });
    expect(failure?.payload).toMatchObject({ reason: "target", error: "exchange unavailable" });

    dispatcher.onPrice("SBIN", 100.75, null);
    await dispatcher.drain();
    expect(dispatcher.listPositions()).toEqual([]);
  });

  test("closeAll squares off every open position", async () => {
    const dispatcher = dispatcherFor(new PaperBroker());
    await submit(dispatcher, makeSignal("SBIN"));
    await submit(dispatcher, makeSignal("ITC"));
    dispatcher.onPrice("ITC", 100.3, null);

    expect(await dispatcher.closeAll("session_close")).toBe(2);
    expect(dispatcher.listPositions()).toEqual([]);

    const closed = temp.store.listPositions({ status: "closed" });
    expect(closed.map((position) => position.status)).toEqual(["closed_by_timeout", "closed_by_timeout"]);
    const itc = closed.find((position) => position.instrumentId === "ITC");
    expect(itc?.exitPrice).toBe(100.3);
    expect(risk.getRiskState()).toMatchObject({ openPositions: 0, tradesToday: 2 });
  });

  test("closeAll leaves no position open when a pending entry fills during the square-off", async () => {
    const broker = new FillsDespiteCancelBroker();
    const dispatcher = dispatcherFor(broker, { fillTimeoutMs: 5_000 });
    const signal = makeSignal("SBIN");
    const decision = risk.evaluate(signal);
    if (!decision.allowed) throw new Error("expected a reservation");
    const dispatched = dispatcher.dispatch(signal, decision.reservation, instrument("SBIN"));
    await vi.waitFor(() => {
      expect(dispatcher.listPositions().map((position) => position.lifecycle)).toEqual(["PENDING_ENTRY"]);
    });

    expect(await dispatcher.closeAll("session_close")).toBe(1);
    await dispatched;

    expect(broker.cancelRequests).toBe(1);
    expect(dispatcher.listPositions()).toEqual([]);
    expect(closedPosition()).toMatchObject({ exitReason: "session_close", status: "closed_by_timeout" });
    expect(risk.getRiskState()).toMatchObject({ openPositions: 0, tradesToday: 1 });
  });

  test("closeAll withdraws entries that have not filled", async () => {
    const broker = new PaperBroker({ fillMode: "never" });
    const dispatcher = dispatcherFor(broker, { fillTimeoutMs: 5_000 });
    const signal = makeSignal("SBIN");
    const decision = risk.evaluate(signal);
    if (!decision.allowed) throw new Error("expected a reservation");
    const dispatched = dispatcher.dispatch(signal, decision.reservation, instrument("SBIN"));
    await vi.waitFor(() => {
      expect(dispatcher.listPositions()).toHaveLength(1);
    });

    expect(await dispatcher.closeAll("session_close")).toBe(0);
    expect(await dispatched).toMatchObject({ lifecycle: "CLOSED", status: "entry_cancelled" });
    expect(dispatcher.listPositions()).toEqual([]);
    expect(risk.getRiskState()).toMatchObject({ openPositions: 0, tradesToday: 0 });
    const [released] = temp.store.listAuditRecords({ eventTypes: ["risk_released"] });
    expect(released?.payload.reason).toBe("broker_cancelled");
  });

  test("an entry fill reported by the broker opens the position before the next poll", async () => {
    const broker = new PaperBroker({ fillMode: "never" });
    const dispatcher = dispatcherFor(broker, { fillTimeoutMs: 5_000 });
    const signal = makeSignal("SBIN");
    const decision = risk.evaluate(signal);
    if (!decision.allowed) throw new Error("expected a reservation");
    const dispatched = dispatcher.dispatch(signal, decision.reservation, instrument("SBIN"));
    await vi.waitFor(() => {
      expect(dispatcher.listPositions()).toHaveLength(1);
    });

    broker.fillEntry("paper-1", 100.05);
    expect(dispatcher.listPositions()[0]).toMatchObject({ lifecycle: "OPEN", entryPrice: 100.05 });
    expect(await dispatched).toMatchObject({ lifecycle: "OPEN", entryPrice: 100.05 });
    expect(risk.listReservations().map((reservation) => reservation.status)).toEqual(["COMMITTED"]);
  });

  test("a bracket leg filled at the broker closes the position without a price tick", async () => {
    const broker = new PaperBroker();
    const dispatcher = dispatcherFor(broker);
    await submit(dispatcher, makeSignal("SBIN"));

    broker.fillExit("paper-1", "stop");

    const closed = closedPosition();
    expect(closed).toMatchObject({ exitReason: "stop", status: "closed_by_stop", exitPrice: 99.7 });
    expect(closed?.realizedPnl).toBeCloseTo(-30, 6);
    expect(dispatcher.listPositions()).toEqual([]);
    expect(risk.getRiskState().openPositions).toBe(0);

    await submit(dispatcher, makeSignal("ITC"));
    dispatcher.dispose();
    broker.fillExit("paper-2", "target");
    expect(dispatcher.listPositions().map((position) => position.instrumentId)).toEqual(["ITC"]);
  });

  test("restore re-adopts positions that were open or closing", () => {
    const dispatcher = dispatcherFor(new PaperBroker());
    const base: Position = {
      id: "pos-1",
      instrumentId: "SBIN",
      direction: "BUY",
      entryPrice: 100,
      size: 10,
      stopPrice: 99.7,
      targetPrice: 100.7,
      referencePrice: 100.2,
      openedAt: new Date().toISOString(),
      lifecycle: "CLOSING",
      status: "open",
      exitReason: null,
      exitPrice: null,
      closedAt: null,
      realizedPnl: null,
      brokerOrderId: "paper-9",
      reservationId: "res-1",
      signalId: "sig-1"
    };
    dispatcher.restore([base, { ...base, id: "pos-2", lifecycle: "PENDING_ENTRY" }], [instrument("SBIN")]);

    expect(dispatcher.listPositions().map((position) => [position.id, position.lifecycle])).toEqual([["pos-1", "OPEN"]]);
  });

  test("pnl is signed by direction", () => {
    expect(computePnl({ direction: "BUY", entryPrice: 100, size: 10 }, 103)).toBe(30);
    expect(computePnl({ direction: "SELL", entryPrice: 100, size: 10 }, 103)).toBe(-30);
  });
});
