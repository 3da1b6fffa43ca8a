import type {
  Candle,
  ConditionEvaluation,
  Decision,
  Direction,
  IndicatorSnapshot,
  IndicatorValues,
  Signal,
  Trend
} from "../types/models";
import { makeId } from "../utils/id";
import { nowIso } from "../utils/time";
import type { EnginePolicy } from "./runtimePolicyService";

export type DetectorThresholds = Pick<
  EnginePolicy,
  | "rsiOversold"
  | "rsiOverbought"
  | "vwapBandPct"
  | "minEmaSeparationPct"
  | "volumeMultiplier"
  | "minCandleRangePct"
  | "stopLossPct"
  | "takeProfitPct"
>;

export interface FilterContext {
  /** Latest candle of the window, usually still forming. */
  candle: Candle;
  /** Most recent closed candle; shape filters read this one. */
  closedCandle: Candle | null;
  snapshot: IndicatorValues;
  direction: Direction;
  thresholds: DetectorThresholds;
}

export interface FilterOutcome {
  passed: boolean;
  observed: number;
  threshold: number;
  detail: string;
}

export interface SignalFilter {
  name: string;
  mandatory: boolean;
  evaluate: (context: FilterContext) => FilterOutcome;
}

interface PolicySource {
  getPolicy(): DetectorThresholds;
}

const pct = (value: number): string => `${(value * 100).toFixed(2)}%`;
const num = (value: number): string => value.toFixed(2);

export const classifyTrend = (close: number, trendEma: number): Trend => {
  if (close > trendEma) return "UP";
  if (close < trendEma) return "DOWN";
  return "NONE";
};

const trendFilter: SignalFilter = {
  name: "trend",
  mandatory: true,
  evaluate: ({ candle, snapshot, direction }) => {
    const passed = direction === "BUY" ? candle.close > snapshot.trendEma : candle.close < snapshot.trendEma;
    return {
      passed,
      observed: candle.close,
      threshold: snapshot.trendEma,
      detail: `close ${num(candle.close)} ${direction === "BUY" ? ">" : "<"} EMA50 ${num(snapshot.trendEma)}`
    };
  }
};

const extremumFilter: SignalFilter = {
  name: "extremum",
  mandatory: true,
  evaluate: ({ snapshot, direction, thresholds }) => {
    if (direction === "BUY") {
      return {
        passed: snapshot.rsi < thresholds.rsiOversold,
        observed: snapshot.rsi,
        threshold: thresholds.rsiOversold,
        detail: `RSI ${num(snapshot.rsi)} < ${thresholds.rsiOversold}`
      };
    }
    return {
      passed: snapshot.rsi > thresholds.rsiOverbought,
      observed: snapshot.rsi,
      threshold: thresholds.rsiOverbought,
      detail: `RSI ${num(snapshot.rsi)} > ${thresholds.rsiOverbought}`
    };
  }
};

const meanReversionFilter: SignalFilter = {
  name: "meanReversion",
  mandatory: true,
  evaluate: ({ candle, snapshot, direction, thresholds }) => {
    if (direction === "BUY") {
      const lower = snapshot.vwap * (1 - thresholds.vwapBandPct);
      return {
        passed: candle.close >= lower && candle.close <= snapshot.vwap,
        observed: candle.close,
        threshold: lower,
        detail: `close ${num(candle.close)} within [${num(lower)}, ${num(snapshot.vwap)}] below VWAP`
      };
    }
    const upper = snapshot.vwap * (1 + thresholds.vwapBandPct);
    return {
      passed: candle.close >= snapshot.vwap && candle.close <= upper,
      observed: candle.close,
      threshold: upper,
      detail: `close ${num(candle.close)} within [${num(snapshot.vwap)}, ${num(upper)}] above VWAP`
    };
  }
};

const NO_CLOSED_CANDLE: FilterOutcome = { passed: false, observed: 0, threshold: 0, detail: "no closed candle yet" };

const reversalCandleFilter: SignalFilter = {
  name: "reversalCandle",
  mandatory: true,
  evaluate: ({ closedCandle: candle, direction }) => {
    if (!candle) return NO_CLOSED_CANDLE;
    const body = candle.close - candle.open;
    return {
      passed: direction === "BUY" ? body > 0 : body < 0,
      observed: body,
      threshold: 0,
      detail: direction === "BUY" ? "bullish candle (close > open)" : "bearish candle (close < open)"
    };
  }
};

const volumeFilter: SignalFilter = {
  name: "volume",
  mandatory: false,
  evaluate: ({ closedCandle: candle, snapshot, thresholds }) => {
    if (!candle) return NO_CLOSED_CANDLE;
    const required = snapshot.volumeAverage * thresholds.volumeMultiplier;
    return {
      passed: candle.volume >= required,
      observed: candle.volume,
      threshold: required,
      detail: `volume ${candle.volume} >= ${thresholds.volumeMultiplier}x average ${num(snapshot.volumeAverage)}`
    };
  }
};

const momentumFilter: SignalFilter = {
  name: "momentum",
  mandatory: false,
  evaluate: ({ snapshot, direction }) => ({
    passed: direction === "BUY" ? snapshot.macd > snapshot.macdSignal : snapshot.macd < snapshot.macdSignal,
    observed: snapshot.macd,
    threshold: snapshot.macdSignal,
    detail: `MACD ${snapshot.macd.toFixed(4)} ${direction === "BUY" ? ">" : "<"} signal ${snapshot.macdSignal.toFixed(4)}`
  })
};

const trendStrengthFilter: SignalFilter = {
  name: "trendStrength",
  mandatory: false,
  evaluate: ({ snapshot, thresholds }) => ({
    passed: snapshot.emaSeparation >= thresholds.minEmaSeparationPct,
    observed: snapshot.emaSeparation,
    threshold: thresholds.minEmaSeparationPct,
    detail: `EMA separation ${pct(snapshot.emaSeparation)} >= ${pct(thresholds.minEmaSeparationPct)}`
  })
};

const candleRangeFilter: SignalFilter = {
  name: "candleRange",
  mandatory: false,
  evaluate: ({ closedCandle: candle, thresholds }) => {
    if (!candle) return NO_CLOSED_CANDLE;
    const range = candle.close > 0 ? (candle.high - candle.low) / candle.close : 0;
    return {
      passed: range >= thresholds.minCandleRangePct,
      observed: range,
      threshold: thresholds.minCandleRangePct,
      detail: `candle range ${pct(range)} >= ${pct(thresholds.minCandleRangePct)}`
    };
  }
};

/** Mandatory filters first, in evaluation order; the trend filter must lead. */
export const DEFAULT_FILTERS: readonly SignalFilter[] = [
  trendFilter,
  extremumFilter,
  meanReversionFilter,
  reversalCandleFilter,
  volumeFilter,
  momentumFilter,
  trendStrengthFilter,
  candleRangeFilter
];

const lastClosed = (window: readonly Candle[]): Candle | null => {
  for (let index = window.length - 1; index >= 0; index -= 1) {
    const candle = window[index];
    if (candle?.closed) return candle;
  }
  return null;
};

export class SignalDetector {
  private readonly lastEmittedCandle = new Map<string, number>();

  constructor(
    private readonly policy: PolicySource,
    private readonly filters: readonly SignalFilter[] = DEFAULT_FILTERS
  ) {}

  evaluate(
    instrumentId: string,
    window: readonly Candle[],
    snapshot: IndicatorSnapshot,
    generatedAt: string = nowIso()
  ): Decision {
    const candle = window[window.length - 1];
    if (!snapshot.ready || !candle) {
      return {
        instrumentId,
        state: "IDLE",
        trend: "NONE",
        conditions: [],
        signal: null,
        reason: "insufficient_history"
      };
    }

    const trend = classifyTrend(candle.close, snapshot.trendEma);
    if (trend === "NONE") {
      return {
        instrumentId,
        state: "IDLE",
        trend,
        conditions: [
          {
            name: "trend",
            mandatory: true,
            passed: false,
            observed: candle.close,
            threshold: snapshot.trendEma,
            detail: "close equals EMA50"
          }
        ],
        signal: null,
        reason: "no_trend"
      };
    }

    const direction: Direction = trend === "UP" ? "BUY" : "SELL";
    const thresholds = this.policy.getPolicy();
    const context: FilterContext = { candle, closedCandle: lastClosed(window), snapshot, direction, thresholds };
    const conditions: ConditionEvaluation[] = [];

    for (const filter of this.filters) {
      if (!filter.mandatory) continue;
      const outcome = filter.evaluate(context);
      conditions.push({ name: filter.name, mandatory: true, ...outcome });
      if (!outcome.passed) {
        return {
          instrumentId,
          state: "CANDIDATE",
          trend,
          conditions,
          signal: null,
          reason: `${filter.name}_failed`
        };
      }
    }

    const optional = this.filters.filter((filter) => !filter.mandatory);
    for (const filter of optional) {
      conditions.push({ name: filter.name, mandatory: false, ...filter.evaluate(context) });
    }

    if (this.lastEmittedCandle.get(instrumentId) === candle.start) {
      return {
        instrumentId,
        state: "CONFIRMED",
        trend,
        conditions,
        signal: null,
        reason: "signal_already_emitted_for_candle"
      };
    }

    const passedOptional = conditions.filter((entry) => !entry.mandatory && entry.passed);
    const strength = optional.length > 0 ? passedOptional.length / optional.length : 1;
    const entryPrice = candle.close;
    const stopPrice =
      direction === "BUY" ? entryPrice * (1 - thresholds.stopLossPct) : entryPrice * (1 + thresholds.stopLossPct);
    const targetPrice =
      direction === "BUY" ? entryPrice * (1 + thresholds.takeProfitPct) : entryPrice * (1 - thresholds.takeProfitPct);

    const signal: Signal = {
      id: makeId(),
      instrumentId,
      direction,
      strength,
      conditions,
      entryPrice,
      stopPrice,
      targetPrice,
      referencePrice: snapshot.vwap,
      candleStart: candle.start,
      candleRevision: candle.revision,
      generatedAt,
      rationale: [
        `${direction} ${instrumentId} @ ${num(entryPrice)}`,
        ...conditions.filter((entry) => entry.mandatory).map((entry) => entry.detail),
        `optional ${passedOptional.length}/${optional.length}` +
          (passedOptional.length > 0 ? ` (${passedOptional.map((entry) => entry.name).join(", ")})` : "")
      ].join("; ")
    };

    this.lastEmittedCandle.set(instrumentId, candle.start);
    return { instrumentId, state: "EMITTED", trend, conditions, signal, reason: "signal_emitted" };
  }

  forget(instrumentId: string): void {
    this.lastEmittedCandle.delete(instrumentId);
  }
}
