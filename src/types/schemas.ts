import { z } from "zod";

import type { Position, Reservation, Signal } from "./models";

export const tickSchema = z.object({
  instrumentId: z.string().min(1),
  price: z.number().finite().positive(),
  quantity: z.number().finite().positive(),
  cumulativeVolume: z.number().finite().nonnegative().optional(),
  timestamp: z.number().finite().nonnegative()
});

export const historicalBarSchema = z
  .object({
    start: z.number().finite().nonnegative(),
    open: z.number().finite().positive(),
    high: z.number().finite().positive(),
    low: z.number().finite().positive(),
    close: z.number().finite().positive(),
    volume: z.number().finite().nonnegative()
  })
  .refine((bar) => bar.high >= Math.max(bar.open, bar.close) && bar.low <= Math.min(bar.open, bar.close), {
    message: "bar high/low do not bound open/close"
  });

export const instrumentSchema = z.object({
  id: z
    .string()
    .min(1)
    .transform((value) => value.trim().toUpperCase()),
  exchange: z.string().min(1).default("SMART"),
  currency: z.string().length(3).default("USD"),
  lotSize: z.number().int().positive().default(1),
  tickSize: z.number().positive().default(0.01)
});

export const instrumentFileSchema = z.object({
  instruments: z.array(instrumentSchema).min(1)
});

export const enginePolicySchema = z.object({
  rsiOversold: z.number(),
  rsiOverbought: z.number(),
  vwapBandPct: z.number(),
  minEmaSeparationPct: z.number(),
  volumeMultiplier: z.number(),
  minCandleRangePct: z.number(),
  stopLossPct: z.number(),
  takeProfitPct: z.number(),
  referenceExitMinProfitPct: z.number(),
  referenceExitProximityPct: z.number(),
  signalThrottleMs: z.number(),
  riskPerTradePct: z.number(),
  maxPositionNotionalPct: z.number(),
  maxOpenPositions: z.number(),
  maxTradesPerDay: z.number(),
  maxDailyLossPct: z.number(),
  maxHoldMinutes: z.number()
});

export const policyPatchSchema = enginePolicySchema.partial().strict();

export const killSwitchRequestSchema = z.object({
  enabled: z.boolean()
});

export const persistedKillSwitchSchema = z.object({
  enabled: z.boolean(),
  updatedAt: z.string().nullable().optional()
});

export const sessionResetRequestSchema = z.object({
  capital: z.number().positive().optional(),
  force: z.boolean().default(false)
});

export const recentQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50)
});

export const auditQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(2_000).default(200),
  eventTypes: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? "")
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0)
    )
});

export const positionsQuerySchema = z.object({
  status: z.enum(["open", "closed", "all"]).default("all"),
  limit: z.coerce.number().int().min(1).max(500).default(100)
});

const directionSchema = z.enum(["BUY", "SELL"]);

export const reservationSchema: z.ZodType<Reservation> = z.object({
  id: z.string(),
  signalId: z.string(),
  instrumentId: z.string(),
  direction: directionSchema,
  size: z.number(),
  entryPrice: z.number(),
  createdAt: z.string(),
  status: z.enum(["RESERVED", "COMMITTED", "RELEASED"])
});

export const positionSchema: z.ZodType<Position> = z.object({
  id: z.string(),
  instrumentId: z.string(),
  direction: directionSchema,
  entryPrice: z.number(),
  size: z.number(),
  stopPrice: z.number(),
  targetPrice: z.number(),
  referencePrice: z.number(),
  openedAt: z.string(),
  lifecycle: z.enum(["PENDING_ENTRY", "OPEN", "CLOSING", "CLOSED"]),
  status: z.enum(["open", "closed_by_target", "closed_by_stop", "closed_by_timeout", "entry_cancelled"]),
  exitReason: z
    .enum(["reference_return", "target", "stop", "max_hold", "session_close", "manual", "entry_not_filled"])
    .nullable(),
  exitPrice: z.number().nullable(),
  closedAt: z.string().nullable(),
  realizedPnl: z.number().nullable(),
  brokerOrderId: z.string().nullable(),
  reservationId: z.string(),
  signalId: z.string()
});

const conditionSchema = z.object({
  name: z.string(),
  mandatory: z.boolean(),
  passed: z.boolean(),
  observed: z.number(),
  threshold: z.number(),
  detail: z.string()
});

export const signalSchema: z.ZodType<Signal> = z.object({
  id: z.string(),
  instrumentId: z.string(),
  direction: directionSchema,
  strength: z.number(),
  conditions: z.array(conditionSchema),
  entryPrice: z.number(),
  stopPrice: z.number(),
  targetPrice: z.number(),
  referencePrice: z.number(),
  candleStart: z.number(),
  candleRevision: z.number(),
  generatedAt: z.string(),
  rationale: z.string()
});

export const sessionStartedEventSchema = z.object({
  sessionId: z.string(),
  capital: z.number(),
  startedAt: z.string()
});

export const reservationEventSchema = z.object({
  sessionId: z.string(),
  reservation: reservationSchema,
  carried: z.boolean().optional()
});

export const reservationTransitionEventSchema = z.object({
  sessionId: z.string(),
  reservationId: z.string()
});

export const slotClosedEventSchema = z.object({
  sessionId: z.string(),
  reservationId: z.string(),
  realizedPnl: z.number()
});

