import { settings } from "../core/config";
import { enginePolicySchema } from "../types/schemas";
import { clamp } from "../utils/statistics";

export interface EnginePolicy {
  rsiOversold: number;
  rsiOverbought: number;
  vwapBandPct: number;
  minEmaSeparationPct: number;
  volumeMultiplier: number;
  minCandleRangePct: number;
  stopLossPct: number;
  takeProfitPct: number;
  referenceExitMinProfitPct: number;
  referenceExitProximityPct: number;
  signalThrottleMs: number;
  riskPerTradePct: number;
  maxPositionNotionalPct: number;
  maxOpenPositions: number;
  maxTradesPerDay: number;
  maxDailyLossPct: number;
  maxHoldMinutes: number;
}

interface PolicyGuideline {
  label: string;
  description: string;
  min: number;
  max: number;
  integer?: boolean;
}

const GUIDELINES: Record<keyof EnginePolicy, PolicyGuideline> = {
  rsiOversold: {
    label: "RSI Oversold",
    description: "BUY setups need RSI below this level.",
    min: 5,
    max: 50
  },
  rsiOverbought: {
    label: "RSI Overbought",
    description: "SELL setups need RSI above this level.",
    min: 50,
    max: 95
  },
  vwapBandPct: {
    label: "VWAP Band %",
    description: "How far on the favourable side of VWAP the close may sit.",
    min: 0.0001,
    max: 0.05
  },
  minEmaSeparationPct: {
    label: "Min EMA Separation %",
    description: "Trend-strength filter: |EMA20 - EMA50| / EMA50.",
    min: 0,
    max: 0.05
  },
  volumeMultiplier: {
    label: "Volume Multiplier",
    description: "Candle volume must reach this multiple of the 20-candle average.",
    min: 0.5,
    max: 5
  },
  minCandleRangePct: {
    label: "Min Candle Range %",
    description: "(high - low) / close of the signal candle.",
    min: 0,
    max: 0.05
  },
  stopLossPct: {
    label: "Stop Loss %",
    description: "Distance from entry to the protective stop.",
    min: 0.0005,
    max: 0.05
  },
  takeProfitPct: {
    label: "Take Profit %",
    description: "Distance from entry to the profit target.",
    min: 0.0005,
    max: 0.1
  },
  referenceExitMinProfitPct: {
    label: "VWAP Exit Min Profit %",
    description: "Profit required before a return to VWAP closes the position.",
    min: 0,
    max: 0.05
  },
  referenceExitProximityPct: {
    label: "VWAP Exit Proximity %",
    description: "How close to VWAP price must be for the VWAP-return exit.",
    min: 0,
    max: 0.05
  },
  signalThrottleMs: {
    label: "Signal Throttle (ms)",
    description: "Minimum time between evaluations of one instrument.",
    min: 0,
    max: 600_000,
    integer: true
  },
  riskPerTradePct: {
    label: "Risk Per Trade %",
    description: "Capital risked between entry and stop on one trade.",
    min: 0.001,
    max: 0.1
  },
  maxPositionNotionalPct: {
    label: "Max Position Notional %",
    description: "Cap on a single position's notional as a share of capital.",
    min: 0.01,
    max: 1
  },
  maxOpenPositions: {
    label: "Max Open Positions",
    description: "Open positions plus pending reservations.",
    min: 1,
    max: 50,
    integer: true
  },
  maxTradesPerDay: {
    label: "Max Trades Per Day",
    description: "Entries accepted per session.",
    min: 1,
    max: 200,
    integer: true
  },
  maxDailyLossPct: {
    label: "Max Daily Loss %",
    description: "New entries stop once realised session losses reach this share of capital.",
    min: 0.005,
    max: 0.5
  },
  maxHoldMinutes: {
    label: "Max Hold (minutes)",
    description: "Positions older than this are closed.",
    min: 1,
    max: 480,
    integer: true
  }
};

const POLICY_KEYS = Object.keys(GUIDELINES).filter((key): key is keyof EnginePolicy => key in GUIDELINES);

interface PolicyPersistenceStore {
  getAppState(key: string): unknown;
  setAppState(key: string, payload: unknown): void;
}

export class RuntimePolicyService {
  private static readonly policyStateKey = "runtime_policy_v1";
  private readonly defaults: EnginePolicy;
  private policy: EnginePolicy;

  constructor(private readonly persistence?: PolicyPersistenceStore) {
    this.defaults = this.buildPolicy(
      {
        rsiOversold: 30,
        rsiOverbought: 70,
        vwapBandPct: 0.002,
        minEmaSeparationPct: 0.005,
        volumeMultiplier: 1.2,
        minCandleRangePct: 0.0015,
        stopLossPct: settings.stopLossPct,
        takeProfitPct: settings.takeProfitPct,
        referenceExitMinProfitPct: 0.002,
        referenceExitProximityPct: 0.001,
        signalThrottleMs: settings.signalThrottleMs,
        riskPerTradePct: settings.riskPerTradePct,
        maxPositionNotionalPct: settings.maxPositionNotionalPct,
        maxOpenPositions: settings.maxOpenPositions,
        maxTradesPerDay: settings.maxTradesPerDay,
        maxDailyLossPct: settings.maxDailyLossPct,
        maxHoldMinutes: settings.maxHoldMinutes
      },
      {}
    );
    this.policy = { ...this.defaults };
    this.loadPersistedPolicy();
  }

  private buildPolicy(current: EnginePolicy, patch: Partial<EnginePolicy>): EnginePolicy {
    const next = { ...current };
    for (const key of POLICY_KEYS) {
      const guideline = GUIDELINES[key];
      const raw = patch[key] ?? current[key];
      const value = guideline.integer ? Math.round(raw) : raw;
      next[key] = clamp(value, guideline.min, guideline.max);
    }
    return next;
  }

  private persistPolicy(): void {
    if (!this.persistence) return;
    this.persistence.setAppState(RuntimePolicyService.policyStateKey, this.policy);
  }

  private loadPersistedPolicy(): void {
    if (!this.persistence) return;
    const persisted = enginePolicySchema
      .partial()
      .safeParse(this.persistence.getAppState(RuntimePolicyService.policyStateKey));
    if (!persisted.success) return;
    this.policy = this.buildPolicy(this.defaults, persisted.data);
  }

  getPolicy(): EnginePolicy {
    return { ...this.policy };
  }

  getGuidelines(): Record<keyof EnginePolicy, PolicyGuideline> {
    return GUIDELINES;
  }

  updatePolicy(patch: Partial<EnginePolicy>): EnginePolicy {
    this.policy = this.buildPolicy(this.getPolicy(), patch);
    this.persistPolicy();
    return this.getPolicy();
  }

  resetPolicy(): EnginePolicy {
    this.policy = { ...this.defaults };
    this.persistPolicy();
    return this.getPolicy();
  }
}
