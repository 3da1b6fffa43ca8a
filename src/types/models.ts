export type Direction = "BUY" | "SELL";
export type Trend = "UP" | "DOWN" | "NONE";

export interface Instrument {
  id: string;
  exchange: string;
  currency: string;
  lotSize: number;
  tickSize: number;
}

export interface Tick {
  instrumentId: string;
  price: number;
  quantity: number;
  cumulativeVolume?: number;
  timestamp: number;
}

export interface HistoricalBar {
  start: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface Candle {
  instrumentId: string;
  start: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  revision: number;
  closed: boolean;
}

export interface CandleUpdate {
  instrumentId: string;
  revision: number;
  candleStart: number;
  closedCandle?: Candle;
}

export interface IndicatorValues {
  ready: true;
  revision: number;
  candleStart: number;
  close: number;
  trendEma: number;
  shortEma: number;
  rsi: number;
  vwap: number;
  vwapUpperBand: number;
  vwapLowerBand: number;
  emaSeparation: number;
  macd: number;
  macdSignal: number;
  macdHistogram: number;
  volumeAverage: number;
}

export interface IndicatorsNotReady {
  ready: false;
  reason: "insufficient_history";
  required: number;
  available: number;
}

export type IndicatorSnapshot = IndicatorValues | IndicatorsNotReady;

export interface ConditionEvaluation {
  name: string;
  mandatory: boolean;
  passed: boolean;
  observed: number;
  threshold: number;
  detail: string;
}

export interface Signal {
  id: string;
  instrumentId: string;
  direction: Direction;
  strength: number;
  conditions: ConditionEvaluation[];
  entryPrice: number;
  stopPrice: number;
  targetPrice: number;
  referencePrice: number;
  candleStart: number;
  candleRevision: number;
  generatedAt: string;
  rationale: string;
}

export type DetectorState = "IDLE" | "CANDIDATE" | "CONFIRMED" | "EMITTED";

export interface Decision {
  instrumentId: string;
  state: DetectorState;
  trend: Trend;
  conditions: ConditionEvaluation[];
  signal: Signal | null;
  reason: string;
}

export interface RiskState {
  sessionId: string;
  sessionStartedAt: string;
  capital: number;
  openPositions: number;
  pendingReservations: number;
  tradesToday: number;
  realizedPnl: number;
  unrealizedPnl: number;
  sessionLoss: number;
  halted: boolean;
  haltReasons: string[];
}

export type ReservationStatus = "RESERVED" | "COMMITTED" | "RELEASED";

export interface Reservation {
  id: string;
  signalId: string;
  instrumentId: string;
  direction: Direction;
  size: number;
  entryPrice: number;
  createdAt: string;
  status: ReservationStatus;
}

export type PositionLifecycle = "PENDING_ENTRY" | "OPEN" | "CLOSING" | "CLOSED";
export type PositionStatus =
  | "open"
  | "closed_by_target"
  | "closed_by_stop"
  | "closed_by_timeout"
  | "entry_cancelled";
export type ExitReason =
  | "reference_return"
  | "target"
  | "stop"
  | "max_hold"
  | "session_close"
  | "manual"
  | "entry_not_filled";

export interface Position {
  id: string;
  instrumentId: string;
  direction: Direction;
  entryPrice: number;
  size: number;
  stopPrice: number;
  targetPrice: number;
  referencePrice: number;
  openedAt: string;
  lifecycle: PositionLifecycle;
  status: PositionStatus;
  exitReason: ExitReason | null;
  exitPrice: number | null;
  closedAt: string | null;
  realizedPnl: number | null;
  brokerOrderId: string | null;
  reservationId: string;
  signalId: string;
}

export interface AuditRecord {
  id: string;
  timestamp: string;
  eventType: string;
  payload: Record<string, unknown>;
}

export type FeedState = "DISCONNECTED" | "CONNECTING" | "SUBSCRIBED" | "STREAMING";

export interface FeedStateChange {
  state: FeedState;
  previous: FeedState;
  degraded: boolean;
  attempt: number;
  at: string;
  reason?: string;
}
