import { logger } from "../core/logger";
import type { Candle, CandleUpdate, HistoricalBar, Tick } from "../types/models";
import { historicalBarSchema, tickSchema } from "../types/schemas";
import { clamp } from "../utils/statistics";
import { floorToInterval } from "../utils/time";

export type IngestOutcome = "updated" | "opened" | "late" | "rejected";
export type CandleListener = (update: CandleUpdate) => void;

export interface CandleAggregatorOptions {
  intervalMs: number;
  capacity: number;
}

export interface AggregatorStats {
  instrumentId: string;
  acceptedTicks: number;
  lateTicks: number;
  rejectedTicks: number;
  closedCandles: number;
  retainedCandles: number;
  lastTickAt: number | null;
}

export const MIN_HISTORY_CAPACITY = 100;
export const MAX_HISTORY_CAPACITY = 500;

const log = logger.child("candles");

export class CandleAggregator {
  private readonly intervalMs: number;
  private readonly capacity: number;
  private readonly closed: Candle[] = [];
  private open: Candle | null = null;
  private readonly listeners = new Set<CandleListener>();
  private acceptedTicks = 0;
  private lateTicks = 0;
  private rejectedTicks = 0;
  private closedCandles = 0;
  private lastTickAt: number | null = null;

  constructor(
    readonly instrumentId: string,
    options: CandleAggregatorOptions
  ) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      throw new RangeError(`Candle interval must be positive (got ${options.intervalMs}).`);
    }
    this.intervalMs = options.intervalMs;
    this.capacity = clamp(Math.round(options.capacity), MIN_HISTORY_CAPACITY, MAX_HISTORY_CAPACITY);
  }

  onUpdate(listener: CandleListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  ingest(tick: Tick): IngestOutcome {
    const parsed = tickSchema.safeParse(tick);
    if (!parsed.success || parsed.data.instrumentId !== this.instrumentId) {
      this.rejectedTicks += 1;
      return "rejected";
    }

    const { price, quantity, timestamp } = parsed.data;
    const start = floorToInterval(timestamp, this.intervalMs);
    const open = this.open;

    if (open && start < open.start) {
      this.lateTicks += 1;
      return "late";
    }

    this.acceptedTicks += 1;
    this.lastTickAt = timestamp;

    if (open && start === open.start) {
      open.high = Math.max(open.high, price);
      open.low = Math.min(open.low, price);
      open.close = price;
      open.volume += quantity;
      open.revision += 1;
      this.emit({ instrumentId: this.instrumentId, revision: open.revision, candleStart: open.start });
      return "updated";
    }

    const closedCandle = this.freezeOpen();
    this.open = {
      instrumentId: this.instrumentId,
      start,
      open: price,
      high: price,
      low: price,
      close: price,
      volume: quantity,
      revision: 1,
      closed: false
    };
    this.emit({
      instrumentId: this.instrumentId,
      revision: 1,
      candleStart: start,
      ...(closedCandle ? { closedCandle } : {})
    });
    return "opened";
  }

  /** Folds an authoritative bar from warm-up or fallback polling. */
  absorbBar(bar: HistoricalBar): IngestOutcome {
    const parsed = historicalBarSchema.safeParse(bar);
    if (!parsed.success) {
      this.rejectedTicks += 1;
      return "rejected";
    }

    const start = floorToInterval(parsed.data.start, this.intervalMs);
    const open = this.open;
    if (open && start < open.start) return "late";

    if (open && start === open.start) {
      open.open = parsed.data.open;
      open.high = parsed.data.high;
      open.low = parsed.data.low;
      open.close = parsed.data.close;
      open.volume = parsed.data.volume;
      open.revision += 1;
      this.emit({ instrumentId: this.instrumentId, revision: open.revision, candleStart: open.start });
      return "updated";
    }

    const closedCandle = this.freezeOpen();
    this.open = {
      instrumentId: this.instrumentId,
      start,
      open: parsed.data.open,
      high: parsed.data.high,
      low: parsed.data.low,
      close: parsed.data.close,
      volume: parsed.data.volume,
      revision: 1,
      closed: false
    };
    this.emit({
      instrumentId: this.instrumentId,
      revision: 1,
      candleStart: start,
      ...(closedCandle ? { closedCandle } : {})
    });
    return "opened";
  }

  current(): Candle | null {
    return this.open ? { ...this.open } : null;
  }

  history(): Candle[] {
    return [...this.closed];
  }

  /** Closed history followed by a copy of the open candle. */
  window(): Candle[] {
    return this.open ? [...this.closed, { ...this.open }] : [...this.closed];
  }

  stats(): AggregatorStats {
    return {
      instrumentId: this.instrumentId,
      acceptedTicks: this.acceptedTicks,
      lateTicks: this.lateTicks,
      rejectedTicks: this.rejectedTicks,
      closedCandles: this.closedCandles,
      retainedCandles: this.closed.length + (this.open ? 1 : 0),
      lastTickAt: this.lastTickAt
    };
  }

  private freezeOpen(): Candle | null {
    if (!this.open) return null;
    const frozen = Object.freeze({ ...this.open, closed: true });
    this.closed.push(frozen);
    this.closedCandles += 1;
    while (this.closed.length > this.capacity) this.closed.shift();
    this.open = null;
    return frozen;
  }

  private emit(update: CandleUpdate): void {
    for (const listener of this.listeners) {
      try {
        listener(update);
      } catch (error) {
        log.error(`Candle listener failed for ${this.instrumentId}`, error);
      }
    }
  }
}
