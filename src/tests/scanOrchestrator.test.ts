import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { PaperBroker } from "../adapters/paperBroker";
import type { HistoricalBarSource } from "../adapters/types";
import { EngineEvents } from "../services/engineEvents";
import { FeedConnection } from "../services/feedConnection";
import { IndicatorEngine } from "../services/indicatorEngine";
import { OrderDispatcher } from "../services/orderDispatcher";
import { RiskEngine } from "../services/riskEngine";
import { RuntimePolicyService } from "../services/runtimePolicyService";
import { ScanOrchestrator } from "../services/scanOrchestrator";
import { SignalDetector } from "../services/signalDetector";
import type { HistoricalBar, Instrument, Signal } from "../types/models";
import { FakeFeed, type TempAuditStore, instrument, tempAuditStore } from "./fixtures";

const MINUTE = 60_000;
// 09:15 IST on a Wednesday.
const BASE = Date.UTC(2026, 0, 7, 3, 45);

class RisingBars implements HistoricalBarSource {
  failures = 0;

  async fetchRecentBars(_target: Instrument, count: number, intervalMs: number): Promise<HistoricalBar[]> {
    if (this.failures > 0) {
      this.failures -= 1;
      throw new Error("historical data farm unavailable");
    }
    return Array.from({ length: count }, (_, index) => {
      const close = 100 + index * 0.1;
      return {
        start: BASE + index * intervalMs,
        open: close - 0.05,
        high: close + 0.05,
        low: close - 0.1,
        close,
        volume: 1_000
      };
    });
  }
}

describe("ScanOrchestrator", () => {
  let temp: TempAuditStore;
  let feed: FakeFeed;
  let connection: FeedConnection;
  let scanner: ScanOrchestrator | null;
  let now: number;
  let policy: RuntimePolicyService;
  let risk: RiskEngine;
  let dispatcher: OrderDispatcher;
  let events: EngineEvents;

  beforeEach(() => {
    temp = tempAuditStore();
    feed = new FakeFeed();
    events = new EngineEvents();
    connection = new FeedConnection(feed, events, { baseDelayMs: 20, maxDelayMs: 100, maxReconnectAttempts: 1 });
    policy = new RuntimePolicyService();
    risk = new RiskEngine(policy, temp.store, 100_000);
    risk.startSession(100_000, "session-1");
    dispatcher = new OrderDispatcher(new PaperBroker(), risk, temp.store, policy, events, {
      ackTimeoutMs: 200,
      fillTimeoutMs: 200,
      fillPollIntervalMs: 5
    });
    now = BASE;
    scanner = null;
  });

  afterEach(async () => {
    await scanner?.stop();
    scanner?.dispose();
    connection.dispose();
    temp.cleanup();
  });

  const build = (options: { historical?: HistoricalBarSource | null; detector?: SignalDetector; warmupBars?: number } = {}) => {
    scanner = new ScanOrchestrator({
      instruments: [instrument("SBIN"), instrument("ITC")],
      feed: connection,
      historical: options.historical ?? null,
      indicatorEngine: new IndicatorEngine(),
      detector: options.detector ?? new SignalDetector(policy),
      riskEngine: risk,
      dispatcher,
      events,
      journal: temp.store,
      runtimePolicy: policy,
      options: {
        candleIntervalMs: MINUTE,
        historySize: 300,
        warmupBars: options.warmupBars ?? 0,
        sessionTimezone: "Asia/Kolkata",
        poller: { intervalMs: 60_000, minIntervalMs: 60_000, barsPerPoll: 2, candleIntervalMs: MINUTE, session: null }
      },
      clock: () => now
    });
    return scanner;
  };

  test("throttles evaluations per instrument", async () => {
    const orchestrator = build();
    await orchestrator.start();

    feed.emitTick({ instrumentId: "SBIN", price: 100, quantity: 1, timestamp: BASE });
    now += 1_000;
    feed.emitTick({ instrumentId: "SBIN", price: 100.05, quantity: 1, timestamp: BASE + 1_000 });
    feed.emitTick({ instrumentId: "ITC", price: 400, quantity: 1, timestamp: BASE + 1_000 });
    now += 5_000;
    feed.emitTick({ instrumentId: "SBIN", price: 100.1, quantity: 1, timestamp: BASE + 6_000 });

    expect(orchestrator.status().counters).toMatchObject({
      ticksRouted: 4,
      candleUpdates: 4,
      evaluations: 3,
      throttledTriggers: 1,
      signals: 0
    });
  });

  test("counts ticks for unknown or malformed data without evaluating", async () => {
    const orchestrator = build();
    await orchestrator.start();

    feed.emitTick({ instrumentId: "WIPRO", price: 500, quantity: 1, timestamp: BASE });
    feed.emitTick({ instrumentId: "SBIN", price: -1, quantity: 1, timestamp: BASE });

    const status = orchestrator.status();
    expect(status.counters).toMatchObject({ ticksRouted: 2, unknownInstrumentTicks: 1, evaluations: 0 });
    expect(status.dataQuality).toEqual({ lateTicks: 0, rejectedTicks: 1 });
  });

  test("warm-up history feeds the indicators and a tick drives a trade through to its exit", async () => {
    const signals: Signal[] = [];
    events.subscribe("signal", (signal) => signals.push(signal));
    const orchestrator = build({
      historical: new RisingBars(),
      detector: new SignalDetector(policy, []),
      warmupBars: 60
    });
    await orchestrator.start();
    expect(orchestrator.status().counters.evaluations).toBe(0);
    expect(orchestrator.candles("SBIN")?.history).toHaveLength(59);

    now += MINUTE;
    feed.emitTick({ instrumentId: "SBIN", price: 106.5, quantity: 10, timestamp: BASE + 60 * MINUTE });
    await dispatcher.drain();

    expect(signals.map((signal) => [signal.instrumentId, signal.direction, signal.entryPrice])).toEqual([
      ["SBIN", "BUY", 106.5]
    ]);
    expect(dispatcher.listPositions()).toMatchObject([{ instrumentId: "SBIN", lifecycle: "OPEN", size: 93 }]);

    now += 10_000;
    feed.emitTick({ instrumentId: "SBIN", price: 107.3, quantity: 10, timestamp: BASE + 60 * MINUTE + 10_000 });
    await dispatcher.drain();

    const [closed] = temp.store.listPositions({ status: "closed" });
    expect(closed).toMatchObject({ exitReason: "target", exitPrice: 107.3, entryPrice: 106.5, size: 93 });
    expect(orchestrator.status().counters).toMatchObject({ evaluations: 2, signals: 1, dispatched: 1 });
    expect(temp.store.listAuditRecords({ eventTypes: ["signal_emitted"] })).toHaveLength(1);
  });

  test("risk rejections are counted and nothing is dispatched", async () => {
    risk.setKillSwitch(true);
    const orchestrator = build({
      historical: new RisingBars(),
      detector: new SignalDetector(policy, []),
      warmupBars: 60
    });
    await orchestrator.start();

    now += MINUTE;
    feed.emitTick({ instrumentId: "SBIN", price: 106.5, quantity: 10, timestamp: BASE + 60 * MINUTE });

    expect(orchestrator.status().counters).toMatchObject({ signals: 1, riskRejections: 1, dispatched: 0 });
    expect(dispatcher.listPositions()).toEqual([]);
  });

  test("a failed warm-up is journaled and the scanner still starts", async () => {
    const bars = new RisingBars();
    bars.failures = 1;
    const orchestrator = build({ historical: bars, warmupBars: 10 });
    await orchestrator.start();

    expect(orchestrator.isRunning()).toBe(true);
    const failures = temp.store.listAuditRecords({ eventTypes: ["warmup_failed"] });
    expect(failures.map((record) => record.payload.instrumentId)).toEqual(["SBIN"]);
    expect(orchestrator.candles("ITC")?.history).toHaveLength(9);
  });

  test("a degraded feed hands over to polling until the stream returns", async () => {
    feed.failNextConnects(1);
    const orchestrator = build({ historical: new RisingBars() });
    await orchestrator.start();

    expect(orchestrator.status().poller?.running).toBe(true);
    await vi.waitFor(() => {
      expect(temp.store.listAuditRecords({ eventTypes: ["fallback_poll"] })).toHaveLength(1);
    });
    expect(orchestrator.candles("SBIN")?.current?.close).toBeCloseTo(100.1, 9);

    await vi.waitFor(() => {
      expect(connection.getStatus().state).toBe("SUBSCRIBED");
    });
    feed.emitTick({ instrumentId: "SBIN", price: 100.2, quantity: 1, timestamp: BASE + 2 * MINUTE });

    expect(orchestrator.status().poller?.running).toBe(false);
    expect(
      temp.store.listAuditRecords({ eventTypes: ["feed_degraded", "feed_restored"] }).map((record) => record.eventType)
    ).toEqual(["feed_degraded", "feed_restored"]);
  });

  test("a stop during warm-up leaves the scanner idle and unsubscribed", async () => {
    let openGate = (): void => undefined;
    const gate = new Promise<void>((resolve) => {
      openGate = resolve;
    });
    const bars = new RisingBars();
    const gated: HistoricalBarSource = {
      fetchRecentBars: async (target, count, intervalMs) => {
        await gate;
        return await bars.fetchRecentBars(target, count, intervalMs);
      }
    };
    const orchestrator = build({ historical: gated, warmupBars: 5 });

    const starting = orchestrator.start();
    const stopping = orchestrator.stop();
    openGate();
    await stopping;
    await starting;

    expect(orchestrator.status()).toMatchObject({ running: false, routing: false, feed: { state: "DISCONNECTED" } });
    expect(feed.connectCalls).toBe(0);
    expect(feed.subscribed).toEqual([]);
    expect(temp.store.listAuditRecords({ eventTypes: ["scanner_started"] })).toEqual([]);
    feed.emitTick({ instrumentId: "SBIN", price: 101, quantity: 1, timestamp: BASE + 10 * MINUTE });
    expect(orchestrator.status().counters.ticksRouted).toBe(0);

    await orchestrator.start();
    expect(orchestrator.status()).toMatchObject({ running: true, routing: true, feed: { state: "SUBSCRIBED" } });
    expect(feed.subscribed).toEqual(["SBIN", "ITC"]);
    expect(feed.connectCalls).toBe(1);
  });

  test("stop halts routing and waits for in-flight orders", async () => {
    const slowDispatcher = new OrderDispatcher(new PaperBroker({ ackDelayMs: 30 }), risk, temp.store, policy, events, {
      ackTimeoutMs: 200,
      fillTimeoutMs: 200,
      fillPollIntervalMs: 5
    });
    dispatcher = slowDispatcher;
    const orchestrator = build({
      historical: new RisingBars(),
      detector: new SignalDetector(policy, []),
      warmupBars: 60
    });
    await orchestrator.start();

    now += MINUTE;
    feed.emitTick({ instrumentId: "SBIN", price: 106.5, quantity: 10, timestamp: BASE + 60 * MINUTE });
    expect(orchestrator.status().inFlightOrders).toBe(1);

    await orchestrator.stop();
    expect(orchestrator.status()).toMatchObject({ running: false, routing: false, inFlightOrders: 0 });
    expect(slowDispatcher.listPositions().map((position) => position.lifecycle)).toEqual(["OPEN"]);

    orchestrator.handleTick({ instrumentId: "SBIN", price: 120, quantity: 1, timestamp: BASE + 61 * MINUTE });
    expect(orchestrator.status().counters.ticksRouted).toBe(1);
    expect(temp.store.listAuditRecords({ eventTypes: ["scanner_stopped"] })).toHaveLength(1);
  });
});
