import type { Candle, IndicatorSnapshot } from "../types/models";
import { mean } from "../utils/statistics";

export const TREND_EMA_PERIOD = 50;
export const SHORT_EMA_PERIOD = 20;
export const RSI_PERIOD = 14;
export const MACD_FAST_PERIOD = 12;
export const MACD_SLOW_PERIOD = 26;
export const MACD_SIGNAL_PERIOD = 9;
export const VOLUME_AVERAGE_PERIOD = 20;

export const MIN_INDICATOR_HISTORY = Math.max(
  TREND_EMA_PERIOD,
  MACD_SLOW_PERIOD + MACD_SIGNAL_PERIOD,
  RSI_PERIOD + 1,
  VOLUME_AVERAGE_PERIOD
);

export type SessionKeyFn = (candleStartMs: number) => string;

const utcDateKey: SessionKeyFn = (candleStartMs) => new Date(candleStartMs).toISOString().slice(0, 10);

export class IndicatorEngine {
  emaSeries(values: number[], period: number): number[] {
    if (values.length === 0) return [];
    const alpha = 2 / (period + 1);
    const out: number[] = [values[0]];
    for (let index = 1; index < values.length; index += 1) {
      out.push(alpha * values[index] + (1 - alpha) * out[index - 1]);
    }
    return out;
  }

  ema(values: number[], period: number): number {
    const series = this.emaSeries(values, period);
    return series.length > 0 ? series[series.length - 1] : 0;
  }

  /** Simple rolling means of gains and losses over the last `period` changes. */
  rsi(values: number[], period = RSI_PERIOD): number {
    if (values.length <= period) return 50;
    const changes = values.slice(-(period + 1));
    let gains = 0;
    let losses = 0;
    for (let index = 1; index < changes.length; index += 1) {
      const change = changes[index] - changes[index - 1];
      if (change > 0) gains += change;
      else losses -= change;
    }

    const avgGain = gains / period;
    const avgLoss = losses / period;
    if (avgLoss === 0) return avgGain === 0 ? 50 : 100;
    const rs = avgGain / avgLoss;
    return 100 - 100 / (1 + rs);
  }

  macd(values: number[]): { macd: number; signal: number; histogram: number } {
    const fast = this.emaSeries(values, MACD_FAST_PERIOD);
    const slow = this.emaSeries(values, MACD_SLOW_PERIOD);
    const line = fast.map((value, index) => value - slow[index]);
    const signalSeries = this.emaSeries(line, MACD_SIGNAL_PERIOD);
    const macd = line.length > 0 ? line[line.length - 1] : 0;
    const signal = signalSeries.length > 0 ? signalSeries[signalSeries.length - 1] : 0;
    return { macd, signal, histogram: macd - signal };
  }

  /** Typical-price VWAP over the candles sharing the latest candle's session, with a one-sigma band. */
  sessionVwap(
    candles: Candle[],
    sessionKeyOf: SessionKeyFn
  ): { vwap: number; upperBand: number; lowerBand: number } {
    const latest = candles[candles.length - 1];
    if (!latest) return { vwap: 0, upperBand: 0, lowerBand: 0 };

    const sessionKey = sessionKeyOf(latest.start);
    const session = candles.filter((candle) => sessionKeyOf(candle.start) === sessionKey);

    let weighted = 0;
    let volume = 0;
    for (const candle of session) {
      const typical = (candle.high + candle.low + candle.close) / 3;
      weighted += typical * candle.volume;
      volume += candle.volume;
    }
    if (volume <= 0) {
      return { vwap: latest.close, upperBand: latest.close, lowerBand: latest.close };
    }

    const vwap = weighted / volume;
    let dispersion = 0;
    for (const candle of session) {
      const typical = (candle.high + candle.low + candle.close) / 3;
      dispersion += candle.volume * (typical - vwap) ** 2;
    }
    const sigma = Math.sqrt(dispersion / volume);
    return { vwap, upperBand: vwap + sigma, lowerBand: vwap - sigma };
  }

  compute(candles: readonly Candle[], sessionKeyOf: SessionKeyFn = utcDateKey): IndicatorSnapshot {
    if (candles.length < MIN_INDICATOR_HISTORY) {
      return {
        ready: false,
        reason: "insufficient_history",
        required: MIN_INDICATOR_HISTORY,
        available: candles.length
      };
    }

    const window = [...candles];
    const latest = window[window.length - 1];
    const closes = window.map((candle) => candle.close);
    const trendEma = this.ema(closes, TREND_EMA_PERIOD);
    const shortEma = this.ema(closes, SHORT_EMA_PERIOD);
    const { macd, signal, histogram } = this.macd(closes);
    const { vwap, upperBand, lowerBand } = this.sessionVwap(window, sessionKeyOf);
    const volumeAverage = mean(window.slice(-VOLUME_AVERAGE_PERIOD).map((candle) => candle.volume));

    return {
      ready: true,
      revision: latest.revision,
      candleStart: latest.start,
      close: latest.close,
      trendEma,
      shortEma,
      rsi: this.rsi(closes, RSI_PERIOD),
      vwap,
      vwapUpperBand: upperBand,
      vwapLowerBand: lowerBand,
      emaSeparation: trendEma > 0 ? Math.abs(shortEma - trendEma) / trendEma : 0,
      macd,
      macdSignal: signal,
      macdHistogram: histogram,
      volumeAverage
    };
  }
}
