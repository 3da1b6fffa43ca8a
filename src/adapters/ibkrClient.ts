import {
  BarSizeSetting,
  ConnectionState,
  IBApiNext,
  IBApiTickType,
  SecType,
  WhatToShow,
  type Bar,
  type Contract,
  type OpenOrder,
  type Order
} from "@stoqey/ib";

import { TransportError, toError } from "../core/errors";
import { logger } from "../core/logger";
import type { Instrument } from "../types/models";
import { withTimeout } from "../utils/async";

export interface IbkrClientOptions {
  host: string;
  port: number;
  clientId: number;
  timeoutMs: number;
}

export interface IbkrQuote {
  last?: number;
  lastSize?: number;
  volume?: number;
}

export interface IbkrOrderSnapshot {
  orderId: number;
  parentId: number | null;
  status: string;
  filled: number;
  avgFillPrice: number | null;
}

export interface IbkrExecution {
  orderId: number;
  shares: number;
  price: number;
}

interface Subscription {
  unsubscribe(): void;
}

const log = logger.child("ibkr");

const clampClientId = (value: number): number => {
  if (!Number.isFinite(value)) return 1;
  const normalized = Math.floor(value);
  if (normalized < 1) return 1;
  if (normalized > 2_147_483_647) return 2_147_483_647;
  return normalized;
};

const buildClientIdCandidates = (baseClientId: number): number[] => {
  const base = clampClientId(baseClientId);
  return [...new Set([base, base + 1, base + 10, base + 100].map(clampClientId))];
};

const tickValue = (ticks: ReadonlyMap<number, { value?: number }>, tickType: number): number | undefined => {
  const tick = ticks.get(tickType);
  return typeof tick?.value === "number" && Number.isFinite(tick.value) ? tick.value : undefined;
};

const finiteOrNull = (value: number | undefined): number | null =>
  typeof value === "number" && Number.isFinite(value) && value > 0 ? value : null;

const BAR_SIZE_BY_MINUTES: Record<number, string> = {
  1: "1 min",
  2: "2 mins",
  3: "3 mins",
  5: "5 mins",
  15: "15 mins",
  30: "30 mins",
  60: "1 hour"
};

export const barSizeFor = (intervalMs: number): BarSizeSetting => {
  const label = BAR_SIZE_BY_MINUTES[Math.round(intervalMs / 60_000)];
  const setting = Object.values(BarSizeSetting).find((value) => value === label);
  if (!setting) throw new TransportError(`No IBKR bar size for a ${intervalMs}ms candle interval`);
  return setting;
};

/** Duration string long enough to cover `count` bars of `intervalMs`, padded for the overnight gap. */
export const durationFor = (count: number, intervalMs: number): string => {
  const seconds = Math.ceil((count * intervalMs) / 1000);
  if (seconds <= 23_400) return `${Math.max(seconds, 60)} S`;
  const sessionDays = Math.ceil(seconds / 23_400) + 1;
  return `${Math.min(sessionDays, 30)} D`;
};

const tradesWhatToShow = (): WhatToShow => {
  const value = Object.values(WhatToShow).find((entry) => entry === "TRADES");
  if (!value) throw new TransportError("IBKR client does not expose TRADES history");
  return value;
};

export const stockContract = (instrument: Instrument): Contract => ({
  symbol: instrument.id,
  secType: SecType.STK,
  exchange: instrument.exchange,
  currency: instrument.currency
});

/** Thin wrapper around IBApiNext: connection with client-id failover plus the calls the engine makes. */
export class IbkrClient {
  private readonly api: IBApiNext;
  private readonly clientIdCandidates: number[];
  private activeClientId: number;
  private connectPromise: Promise<void> | null = null;
  private stateSubscription: Subscription | null = null;
  private wasConnected = false;
  private readonly disconnectListeners = new Set<(error: Error) => void>();

  constructor(private readonly options: IbkrClientOptions) {
    this.activeClientId = clampClientId(options.clientId);
    this.clientIdCandidates = buildClientIdCandidates(options.clientId);
    this.api = new IBApiNext({
      host: options.host,
      port: options.port,
      reconnectInterval: 0,
      maxReqPerSec: 25
    });
  }

  get isConnected(): boolean {
    return this.api.isConnected;
  }

  getEffectiveClientId(): number {
    return this.activeClientId;
  }

  onDisconnect(listener: (error: Error) => void): () => void {
    this.disconnectListeners.add(listener);
    return () => {
      this.disconnectListeners.delete(listener);
    };
  }

  async connect(): Promise<void> {
    if (this.api.isConnected) return;
    if (this.connectPromise) {
      await this.connectPromise;
      return;
    }

    const pending = (async () => {
      const candidates = [
        this.activeClientId,
        ...this.clientIdCandidates.filter((candidate) => candidate !== this.activeClientId)
      ];
      let lastError: Error | null = null;
      for (const candidate of candidates) {
        try {
          await this.connectWithClientId(candidate);
          this.activeClientId = candidate;
          this.watchConnection();
          log.info(`Connected to ${this.options.host}:${this.options.port} as client ${candidate}`);
          return;
        } catch (error) {
          lastError = toError(error);
        }
      }
      throw new TransportError(`IBKR connect failed: ${lastError?.message ?? "unknown"}`, { cause: lastError });
    })();

    this.connectPromise = pending;
    try {
      await pending;
    } finally {
      if (this.connectPromise === pending) this.connectPromise = null;
    }
  }

  disconnect(): void {
    this.stateSubscription?.unsubscribe();
    this.stateSubscription = null;
    this.wasConnected = false;
    this.api.disconnect();
  }

  /** Streams last-trade updates; the returned function cancels the subscription. */
  streamQuotes(instrument: Instrument, onQuote: (quote: IbkrQuote) => void, onError: (error: Error) => void): () => void {
    const subscription = this.api.getMarketData(stockContract(instrument), "", false, false).subscribe({
      next: (update) => {
        onQuote({
          last: tickValue(update.all, IBApiTickType.LAST),
          lastSize: tickValue(update.all, IBApiTickType.LAST_SIZE),
          volume: tickValue(update.all, IBApiTickType.VOLUME)
        });
      },
      error: (error: unknown) => onError(toError(error))
    });
    return () => subscription.unsubscribe();
  }

  async getBars(instrument: Instrument, count: number, intervalMs: number): Promise<Bar[]> {
    await this.connect();
    return await withTimeout(
      this.api.getHistoricalData(
        stockContract(instrument),
        undefined,
        durationFor(count, intervalMs),
        barSizeFor(intervalMs),
        tradesWhatToShow(),
        1,
        2
      ),
      Math.max(this.options.timeoutMs, 10_000),
      "historical data"
    );
  }

  async nextOrderId(): Promise<number> {
    await this.connect();
    return await withTimeout(this.api.getNextValidOrderId(), this.options.timeoutMs, "next order id");
  }

  async placeOrder(orderId: number, contract: Contract, order: Order): Promise<void> {
    await this.connect();
    await Promise.resolve(this.api.placeOrder(orderId, contract, order));
  }

  async cancelOrder(orderId: number): Promise<void> {
    await this.connect();
    this.api.cancelOrder(orderId);
  }

  async openOrders(): Promise<IbkrOrderSnapshot[]> {
    await this.connect();
    const rows = await withTimeout(
      this.api.getAllOpenOrders(),
      Math.max(this.options.timeoutMs, 8_000),
      "open orders"
    );
    return rows.map((row) => this.toSnapshot(row));
  }

  /** Open-order stream; status changes of known orders, fills included, arrive as updates. */
  watchOrders(onOrder: (snapshot: IbkrOrderSnapshot) => void, onError: (error: Error) => void): () => void {
    const subscription = this.api.getOpenOrders().subscribe({
      next: (update) => {
        for (const row of update.all) onOrder(this.toSnapshot(row));
      },
      error: (error: unknown) => onError(toError(error))
    });
    return () => subscription.unsubscribe();
  }

  /** Today's executions; an order that left the open-orders list is still found here. */
  async executions(): Promise<IbkrExecution[]> {
    await this.connect();
    const details = await withTimeout(
      this.api.getExecutionDetails({}),
      Math.max(this.options.timeoutMs, 8_000),
      "execution details"
    );
    const executions: IbkrExecution[] = [];
    for (const { execution } of details) {
      const { orderId, shares, price } = execution;
      if (typeof orderId !== "number" || typeof shares !== "number" || typeof price !== "number") continue;
      executions.push({ orderId, shares, price });
    }
    return executions;
  }

  private toSnapshot(row: OpenOrder): IbkrOrderSnapshot {
    const parentId = row.order.parentId;
    return {
      orderId: row.orderId,
      parentId: typeof parentId === "number" && parentId > 0 ? parentId : null,
      status: String(row.orderStatus?.status ?? row.orderState.status ?? "Unknown"),
      filled: row.orderStatus?.filled ?? 0,
      avgFillPrice: finiteOrNull(row.orderStatus?.avgFillPrice)
    };
  }

  private watchConnection(): void {
    this.stateSubscription?.unsubscribe();
    this.wasConnected = true;
    this.stateSubscription = this.api.connectionState.subscribe({
      next: (state) => {
        if (state !== ConnectionState.Disconnected || !this.wasConnected) return;
        this.wasConnected = false;
        const error = new TransportError("IBKR connection dropped");
        for (const listener of this.disconnectListeners) listener(error);
      }
    });
  }

  private async connectWithClientId(clientId: number): Promise<void> {
    this.api.disconnect();

    await new Promise<void>((resolve, reject) => {
      let settled = false;
      let sawConnected = false;
      let stableTimer: ReturnType<typeof setTimeout> | null = null;
      let subscription: Subscription | null = null;

      const finish = (error?: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(connectTimeout);
        if (stableTimer) clearTimeout(stableTimer);
        subscription?.unsubscribe();
        if (error) {
          this.api.disconnect();
          reject(error);
        } else {
          resolve();
        }
      };

      const connectTimeout = setTimeout(
        () => finish(new TransportError(`client ${clientId} timed out`)),
        this.options.timeoutMs
      );
      subscription = this.api.connectionState.subscribe({
        next: (state) => {
          if (state === ConnectionState.Connected) {
            sawConnected = true;
            if (stableTimer) clearTimeout(stableTimer);
            // TWS accepts then drops a duplicate client id; wait for the connection to hold.
            stableTimer = setTimeout(() => finish(), 500);
            return;
          }
          if (state === ConnectionState.Disconnected && sawConnected) {
            finish(new TransportError(`client ${clientId} disconnected immediately after connect`));
          }
        },
        error: (error: unknown) => finish(toError(error))
      });

      try {
        this.api.connect(clientId);
      } catch (error) {
        finish(toError(error));
      }
    });
  }
}
