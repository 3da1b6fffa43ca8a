import type { Direction, HistoricalBar, Instrument, Tick } from "../types/models";

export type TickListener = (tick: Tick) => void;
export type DisconnectListener = (error: Error) => void;

/** Streaming quotes. Reconnecting resumes the stream; history is never replayed. */
export interface MarketDataFeed {
  readonly name: string;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  subscribe(instruments: Instrument[]): void;
  unsubscribeAll(): void;
  onTick(listener: TickListener): () => void;
  onDisconnect(listener: DisconnectListener): () => void;
}

export type EntryStyle = "MARKET" | "LIMIT";

export interface BracketOrderRequest {
  clientOrderId: string;
  instrument: Instrument;
  direction: Direction;
  size: number;
  entryStyle: EntryStyle;
  entryPrice: number;
  stopPrice: number;
  targetPrice: number;
}

export type SubmitResult = { accepted: true; orderId: string } | { accepted: false; reason: string };

export type BrokerOrderStatus = "pending" | "filled" | "rejected" | "cancelled";

export interface OrderStatusReport {
  status: BrokerOrderStatus;
  fillPrice: number | null;
}

export interface ClosePositionRequest {
  parentOrderId: string | null;
  instrument: Instrument;
  direction: Direction;
  size: number;
  expectedPrice: number;
  reason: string;
}

export interface CloseResult {
  orderId: string;
  fillPrice: number | null;
}

/** Fills the broker reports on its own, outside a status poll. */
export type BrokerOrderEvent =
  | { kind: "entry_filled"; orderId: string; fillPrice: number }
  | { kind: "exit_filled"; parentOrderId: string; leg: "stop" | "target"; fillPrice: number };

export type BrokerOrderListener = (event: BrokerOrderEvent) => void;

export interface BrokerGateway {
  readonly name: string;
  submit(request: BracketOrderRequest): Promise<SubmitResult>;
  getStatus(orderId: string): Promise<OrderStatusReport>;
  cancel(orderId: string): Promise<void>;
  closePosition(request: ClosePositionRequest): Promise<CloseResult>;
  onOrderEvent(listener: BrokerOrderListener): () => void;
}

export interface HistoricalBarSource {
  fetchRecentBars(instrument: Instrument, count: number, intervalMs: number): Promise<HistoricalBar[]>;
}
