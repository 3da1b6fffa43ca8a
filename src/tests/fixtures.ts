import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { DisconnectListener, MarketDataFeed, TickListener } from "../adapters/types";
import { AuditStore } from "../storage/auditStore";
import type { Instrument, Signal, Tick } from "../types/models";

export const instrument = (id: string, overrides: Partial<Instrument> = {}): Instrument => ({
  id,
  exchange: "NSE",
  currency: "INR",
  lotSize: 1,
  tickSize: 0.05,
  ...overrides
});

let signalSequence = 0;

export const makeSignal = (instrumentId: string, overrides: Partial<Signal> = {}): Signal => {
  signalSequence += 1;
  return {
    id: `signal-${signalSequence}`,
    instrumentId,
    direction: "BUY",
    strength: 1,
    conditions: [],
    entryPrice: 100,
    stopPrice: 99.7,
    targetPrice: 100.7,
    referencePrice: 100.2,
    candleStart: Date.UTC(2026, 0, 7, 5, 0),
    candleRevision: 1,
    generatedAt: "2026-01-07T05:00:00.000Z",
    rationale: "test",
    ...overrides
  };
};

export interface TempAuditStore {
  store: AuditStore;
  dir: string;
  cleanup(): void;
}

export const tempAuditStore = (): TempAuditStore => {
  const dir = mkdtempSync(join(tmpdir(), "signal-engine-"));
  const store = new AuditStore(join(dir, "audit.sqlite"), join(dir, "audit.jsonl"));
  return {
    store,
    dir,
    cleanup: () => {
      store.close();
      rmSync(dir, { recursive: true, force: true });
    }
  };
};

/** Scriptable feed: connect outcomes are queued, ticks and drops are pushed by the test. */
export class FakeFeed implements MarketDataFeed {
  readonly name = "fake";
  connectCalls = 0;
  subscribed: string[] = [];
  private readonly failures: Error[] = [];
  private readonly tickListeners = new Set<TickListener>();
  private readonly disconnectListeners = new Set<DisconnectListener>();

  failNextConnects(count: number, message = "connection refused"): void {
    for (let index = 0; index < count; index += 1) this.failures.push(new Error(message));
  }

  async connect(): Promise<void> {
    this.connectCalls += 1;
    const failure = this.failures.shift();
    if (failure) throw failure;
  }

  async disconnect(): Promise<void> {
    this.subscribed = [];
  }

  subscribe(instruments: Instrument[]): void {
    this.subscribed = instruments.map((entry) => entry.id);
  }

  unsubscribeAll(): void {
    this.subscribed = [];
  }

  onTick(listener: TickListener): () => void {
    this.tickListeners.add(listener);
    return () => {
      this.tickListeners.delete(listener);
    };
  }

  onDisconnect(listener: DisconnectListener): () => void {
    this.disconnectListeners.add(listener);
    return () => {
      this.disconnectListeners.delete(listener);
    };
  }

  emitTick(tick: Tick): void {
    for (const listener of this.tickListeners) listener(tick);
  }

  drop(message = "socket closed"): void {
    for (const listener of this.disconnectListeners) listener(new Error(message));
  }
}
