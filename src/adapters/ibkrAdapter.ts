import { OrderAction, OrderType, type Order } from "@stoqey/ib";

import { settings } from "../core/config";
import { ExecutionError } from "../core/errors";
import { logger } from "../core/logger";
import type { Direction, HistoricalBar, Instrument } from "../types/models";
import { historicalBarSchema } from "../types/schemas";
import { IbkrClient, type IbkrExecution, type IbkrOrderSnapshot, type IbkrQuote, stockContract } from "./ibkrClient";
import type {
  BracketOrderRequest,
  BrokerGateway,
  BrokerOrderEvent,
  BrokerOrderListener,
  BrokerOrderStatus,
  ClosePositionRequest,
  CloseResult,
  DisconnectListener,
  HistoricalBarSource,
  MarketDataFeed,
  OrderStatusReport,
  SubmitResult,
  TickListener
} from "./types";

const log = logger.child("ibkr");

export const createIbkrClient = (): IbkrClient =>
  new IbkrClient({
    host: settings.ibkrHost,
    port: settings.ibkrPort,
    clientId: settings.ibkrClientId,
    timeoutMs: settings.ibkrClientTimeoutMs
  });

const actionFor = (direction: Direction): OrderAction => (direction === "BUY" ? OrderAction.BUY : OrderAction.SELL);
const exitActionFor = (direction: Direction): OrderAction =>
  direction === "BUY" ? OrderAction.SELL : OrderAction.BUY;

export const mapIbkrStatus = (status: string): BrokerOrderStatus => {
  switch (status) {
    case "Filled":
      return "filled";
    case "Cancelled":
    case "ApiCancelled":
      return "cancelled";
    case "Inactive":
      return "rejected";
    default:
      return "pending";
  }
};

const parseOrderId = (orderId: string): number => {
  const parsed = Number.parseInt(orderId, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ExecutionError("unknown_order", `Not an IBKR order id: ${orderId}`);
  }
  return parsed;
};

export class IbkrMarketFeed implements MarketDataFeed {
  readonly name = "ibkr";
  private readonly tickListeners = new Set<TickListener>();
  private readonly disconnectListeners = new Set<DisconnectListener>();
  private readonly subscriptions = new Map<string, () => void>();
  private readonly lastSeen = new Map<string, { key: string; volume: number | undefined }>();

  constructor(private readonly client: IbkrClient) {
    client.onDisconnect((error) => this.emitDisconnect(error));
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  async disconnect(): Promise<void> {
    this.unsubscribeAll();
    this.client.disconnect();
  }

  subscribe(instruments: Instrument[]): void {
    for (const instrument of instruments) {
      if (this.subscriptions.has(instrument.id)) continue;
      const cancel = this.client.streamQuotes(
        instrument,
        (quote) => this.handleQuote(instrument.id, quote),
        (error) => {
          log.warn(`Market data stream for ${instrument.id} failed`, error.message);
          this.subscriptions.delete(instrument.id);
          this.emitDisconnect(error);
        }
      );
      this.subscriptions.set(instrument.id, cancel);
    }
  }

  unsubscribeAll(): void {
    for (const cancel of this.subscriptions.values()) cancel();
    this.subscriptions.clear();
    this.lastSeen.clear();
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

  /** Quote updates also arrive for bid/ask changes; only a new trade print becomes a tick. */
  private handleQuote(instrumentId: string, quote: IbkrQuote): void {
    if (quote.last === undefined || quote.last <= 0) return;
    const key = `${quote.last}:${quote.lastSize ?? ""}:${quote.volume ?? ""}`;
    const previous = this.lastSeen.get(instrumentId);
    if (previous?.key === key) return;
    this.lastSeen.set(instrumentId, { key, volume: quote.volume });

    const volumeDelta =
      quote.volume !== undefined && previous?.volume !== undefined ? quote.volume - previous.volume : undefined;
    const quantity = volumeDelta !== undefined && volumeDelta > 0 ? volumeDelta : quote.lastSize ?? 0;
    if (quantity <= 0) return;

    const tick = {
      instrumentId,
      price: quote.last,
      quantity,
      timestamp: Date.now(),
      ...(quote.volume !== undefined ? { cumulativeVolume: quote.volume } : {})
    };
    for (const listener of this.tickListeners) listener(tick);
  }

  private emitDisconnect(error: Error): void {
    for (const listener of this.disconnectListeners) listener(error);
  }
}

interface BracketLegs {
  takeProfitId: number;
  stopId: number;
  size: number;
  entryPrice: number;
  targetPrice: number;
  stopPrice: number;
}

type ExitLeg = "stop" | "target";

export type IbkrOrderClient = Pick<
  IbkrClient,
  "nextOrderId" | "placeOrder" | "cancelOrder" | "openOrders" | "watchOrders" | "executions"
>;

const TERMINAL: ReadonlySet<BrokerOrderStatus> = new Set<BrokerOrderStatus>(["filled", "cancelled", "rejected"]);

const reportOf = (row: IbkrOrderSnapshot): OrderStatusReport => ({
  status: mapIbkrStatus(row.status),
  fillPrice: row.avgFillPrice
});

/**
 * Bracket entries (parent limit, take-profit limit, stop) against TWS or IB Gateway.
 * TWS drops filled orders from the open-orders list, so every status seen on the order stream is
 * kept, and an order missing from the list is looked up in the day's executions.
 */
export class IbkrBroker implements BrokerGateway {
  readonly name = "ibkr";
  private readonly brackets = new Map<number, BracketLegs>();
  private readonly legOwners = new Map<number, { parentId: number; leg: ExitLeg }>();
  private readonly statuses = new Map<number, OrderStatusReport>();
  private readonly listeners = new Set<BrokerOrderListener>();
  private stopWatching: (() => void) | null = null;

  constructor(private readonly client: IbkrOrderClient) {}

  onOrderEvent(listener: BrokerOrderListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async submit(request: BracketOrderRequest): Promise<SubmitResult> {
    if (request.size <= 0) return { accepted: false, reason: "size must be positive" };
    if (request.entryStyle === "LIMIT" && request.entryPrice <= 0) {
      return { accepted: false, reason: "limit price must be positive" };
    }

    const parentId = await this.client.nextOrderId();
    const legs: BracketLegs = {
      takeProfitId: parentId + 1,
      stopId: parentId + 2,
      size: request.size,
      entryPrice: request.entryPrice,
      targetPrice: request.targetPrice,
      stopPrice: request.stopPrice
    };
    const contract = stockContract(request.instrument);
    const exitAction = exitActionFor(request.direction);

    const parent: Order = {
      orderId: parentId,
      action: actionFor(request.direction),
      orderType: request.entryStyle === "LIMIT" ? OrderType.LMT : OrderType.MKT,
      totalQuantity: request.size,
      orderRef: request.clientOrderId,
      transmit: false,
      ...(request.entryStyle === "LIMIT" ? { lmtPrice: request.entryPrice } : {})
    };
    const takeProfit: Order = {
      orderId: legs.takeProfitId,
      parentId,
      action: exitAction,
      orderType: OrderType.LMT,
      totalQuantity: request.size,
      lmtPrice: request.targetPrice,
      transmit: false
    };
    const stop: Order = {
      orderId: legs.stopId,
      parentId,
      action: exitAction,
      orderType: OrderType.STP,
      totalQuantity: request.size,
      auxPrice: request.stopPrice,
      transmit: true
    };

    this.brackets.set(parentId, legs);
    this.legOwners.set(legs.takeProfitId, { parentId, leg: "target" });
    this.legOwners.set(legs.stopId, { parentId, leg: "stop" });
    this.watchOrders();

    await this.client.placeOrder(parentId, contract, parent);
    await this.client.placeOrder(legs.takeProfitId, contract, takeProfit);
    await this.client.placeOrder(legs.stopId, contract, stop);
    log.info(`Bracket ${parentId} placed: ${request.direction} ${request.size} ${request.instrument.id}`);
    return { accepted: true, orderId: String(parentId) };
  }

  async getStatus(orderId: string): Promise<OrderStatusReport> {
    const id = parseOrderId(orderId);
    const known = this.statuses.get(id);
    if (known && TERMINAL.has(known.status)) return { ...known };

    const row = (await this.client.openOrders()).find((entry) => entry.orderId === id);
    if (row) return { ...this.record(id, reportOf(row)) };

    const executed = this.fillFrom(await this.client.executions(), id);
    if (executed) return { ...this.record(id, executed) };
    return known ? { ...known } : { status: "pending", fillPrice: null };
  }

  async cancel(orderId: string): Promise<void> {
    await this.client.cancelOrder(parseOrderId(orderId));
  }

  /** A bracket leg that already filled closes the position; otherwise the legs are cancelled and a market exit sent. */
  async closePosition(request: ClosePositionRequest): Promise<CloseResult> {
    const parentId = request.parentOrderId ? parseOrderId(request.parentOrderId) : null;
    const legs = parentId !== null ? this.brackets.get(parentId) : undefined;

    if (parentId !== null && legs) {
      const filled = await this.filledLeg(legs);
      if (filled) {
        this.forget(parentId, legs);
        return filled;
      }
      await this.client.cancelOrder(legs.takeProfitId);
      await this.client.cancelOrder(legs.stopId);
      this.forget(parentId, legs);
    }

    const orderId = await this.client.nextOrderId();
    await this.client.placeOrder(orderId, stockContract(request.instrument), {
      orderId,
      action: exitActionFor(request.direction),
      orderType: OrderType.MKT,
      totalQuantity: request.size,
      orderRef: `close:${request.reason}`,
      transmit: true
    });
    log.info(`Market exit ${orderId} sent for ${request.instrument.id} (${request.reason})`);
    return { orderId: String(orderId), fillPrice: null };
  }

  private watchOrders(): void {
    if (this.stopWatching) return;
    this.stopWatching = this.client.watchOrders(
      (snapshot) => {
        this.record(snapshot.orderId, reportOf(snapshot));
      },
      (error) => {
        log.warn("Order status stream failed", error.message);
        this.stopWatching = null;
      }
    );
  }

  /** Terminal statuses are final; a fill is announced once. */
  private record(orderId: number, report: OrderStatusReport): OrderStatusReport {
    const previous = this.statuses.get(orderId);
    if (previous && TERMINAL.has(previous.status)) return previous;
    this.statuses.set(orderId, report);
    if (report.status === "filled") this.announceFill(orderId, report.fillPrice);
    return report;
  }

  private announceFill(orderId: number, fillPrice: number | null): void {
    const bracket = this.brackets.get(orderId);
    if (bracket) {
      this.emit({ kind: "entry_filled", orderId: String(orderId), fillPrice: fillPrice ?? bracket.entryPrice });
      return;
    }

    const owner = this.legOwners.get(orderId);
    const legs = owner ? this.brackets.get(owner.parentId) : undefined;
    if (!owner || !legs) return;
    const price = fillPrice ?? (owner.leg === "stop" ? legs.stopPrice : legs.targetPrice);
    this.emit({ kind: "exit_filled", parentOrderId: String(owner.parentId), leg: owner.leg, fillPrice: price });
  }

  private async filledLeg(legs: BracketLegs): Promise<CloseResult | null> {
    const legIds = [legs.takeProfitId, legs.stopId];
    const filledFromCache = (): CloseResult | null => {
      for (const legId of legIds) {
        const known = this.statuses.get(legId);
        if (known?.status === "filled") return { orderId: String(legId), fillPrice: known.fillPrice };
      }
      return null;
    };

    const cached = filledFromCache();
    if (cached) return cached;

    for (const row of await this.client.openOrders()) {
      if (legIds.includes(row.orderId)) this.record(row.orderId, reportOf(row));
    }
    const listed = filledFromCache();
    if (listed) return listed;

    const executions = await this.client.executions();
    for (const legId of legIds) {
      const executed = this.fillFrom(executions, legId);
      if (!executed) continue;
      this.record(legId, executed);
      return { orderId: String(legId), fillPrice: executed.fillPrice };
    }
    return null;
  }

  /** Filled once the executions cover the order's full size. */
  private fillFrom(executions: IbkrExecution[], orderId: number): OrderStatusReport | null {
    let shares = 0;
    let notional = 0;
    for (const execution of executions) {
      if (execution.orderId !== orderId) continue;
      shares += execution.shares;
      notional += execution.shares * execution.price;
    }
    const size = this.sizeOf(orderId);
    if (shares <= 0 || (size !== null && shares < size)) return null;
    return { status: "filled", fillPrice: notional / shares };
  }

  private sizeOf(orderId: number): number | null {
    const parentId = this.legOwners.get(orderId)?.parentId ?? orderId;
    return this.brackets.get(parentId)?.size ?? null;
  }

  private forget(parentId: number, legs: BracketLegs): void {
    this.brackets.delete(parentId);
    this.legOwners.delete(legs.takeProfitId);
    this.legOwners.delete(legs.stopId);
  }

  private emit(event: BrokerOrderEvent): void {
    for (const listener of this.listeners) listener(event);
  }
}

export class IbkrHistoricalSource implements HistoricalBarSource {
  constructor(private readonly client: IbkrClient) {}

  async fetchRecentBars(instrument: Instrument, count: number, intervalMs: number): Promise<HistoricalBar[]> {
    const raw = await this.client.getBars(instrument, count, intervalMs);
    const bars: HistoricalBar[] = [];
    let dropped = 0;
    for (const bar of raw) {
      const parsed = historicalBarSchema.safeParse({
        start: Number(bar.time) * 1000,
        open: bar.open,
        high: bar.high,
        low: bar.low,
        close: bar.close,
        volume: bar.volume ?? 0
      });
      if (parsed.success) bars.push(parsed.data);
      else dropped += 1;
    }
    if (dropped > 0) log.debug(`Dropped ${dropped} malformed bar(s) for ${instrument.id}`);
    return bars.slice(-count);
  }
}
