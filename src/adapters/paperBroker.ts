import { ExecutionError } from "../core/errors";
import { logger } from "../core/logger";
import { sleep } from "../utils/async";
import type {
  BracketOrderRequest,
  BrokerGateway,
  BrokerOrderEvent,
  BrokerOrderListener,
  ClosePositionRequest,
  CloseResult,
  OrderStatusReport,
  SubmitResult
} from "./types";

export interface PaperBrokerOptions {
  /** Delay before acknowledging a submission. */
  ackDelayMs?: number;
  /** When set, every submission is rejected with this reason. */
  rejectReason?: string;
  /** "never" leaves entries pending until cancelled. */
  fillMode?: "immediate" | "never";
}

interface PaperOrder {
  request: BracketOrderRequest;
  report: OrderStatusReport;
}

const log = logger.child("paper-broker");

/** Dry-run execution: entries fill at the requested price, exits at the expected price. */
export class PaperBroker implements BrokerGateway {
  readonly name = "paper";
  private readonly orders = new Map<string, PaperOrder>();
  private readonly listeners = new Set<BrokerOrderListener>();
  private sequence = 0;

  constructor(private readonly options: PaperBrokerOptions = {}) {}

  async submit(request: BracketOrderRequest): Promise<SubmitResult> {
    if (this.options.ackDelayMs) await sleep(this.options.ackDelayMs);
    if (this.options.rejectReason) return { accepted: false, reason: this.options.rejectReason };
    if (request.size <= 0) return { accepted: false, reason: "size must be positive" };

    const orderId = this.nextId();
    const filled = (this.options.fillMode ?? "immediate") === "immediate";
    this.orders.set(orderId, {
      request,
      report: filled ? { status: "filled", fillPrice: request.entryPrice } : { status: "pending", fillPrice: null }
    });
    log.info(`Paper ${request.direction} ${request.size} ${request.instrument.id} @ ${request.entryPrice} (${orderId})`);
    return { accepted: true, orderId };
  }

  async getStatus(orderId: string): Promise<OrderStatusReport> {
    return { ...this.find(orderId).report };
  }

  async cancel(orderId: string): Promise<void> {
    const order = this.find(orderId);
    if (order.report.status === "pending") order.report = { status: "cancelled", fillPrice: null };
  }

  async closePosition(request: ClosePositionRequest): Promise<CloseResult> {
    const orderId = this.nextId();
    log.info(`Paper close ${request.instrument.id} @ ${request.expectedPrice} (${request.reason})`);
    return { orderId, fillPrice: request.expectedPrice };
  }

  onOrderEvent(listener: BrokerOrderListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Fills a pending entry as if the exchange matched it, and reports the fill. */
  fillEntry(orderId: string, fillPrice?: number): void {
    const order = this.find(orderId);
    if (order.report.status !== "pending") return;
    const price = fillPrice ?? order.request.entryPrice;
    order.report = { status: "filled", fillPrice: price };
    this.emit({ kind: "entry_filled", orderId, fillPrice: price });
  }

  /** Reports a bracket leg filling at the broker. */
  fillExit(parentOrderId: string, leg: "stop" | "target", fillPrice?: number): void {
    const { request } = this.find(parentOrderId);
    const price = fillPrice ?? (leg === "stop" ? request.stopPrice : request.targetPrice);
    this.emit({ kind: "exit_filled", parentOrderId, leg, fillPrice: price });
  }

  submittedOrders(): BracketOrderRequest[] {
    return [...this.orders.values()].map((order) => order.request);
  }

  private find(orderId: string): PaperOrder {
    const order = this.orders.get(orderId);
    if (!order) throw new ExecutionError("unknown_order", `Unknown paper order ${orderId}`);
    return order;
  }

  private emit(event: BrokerOrderEvent): void {
    for (const listener of this.listeners) listener(event);
  }

  private nextId(): string {
    this.sequence += 1;
    return `paper-${this.sequence}`;
  }
}
