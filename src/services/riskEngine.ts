import { settings } from "../core/config";
import { logger } from "../core/logger";
import type { Reservation, RiskState, Signal } from "../types/models";
import { persistedKillSwitchSchema } from "../types/schemas";
import { makeId } from "../utils/id";
import { nowIso } from "../utils/time";
import type { EnginePolicy } from "./runtimePolicyService";

interface RiskPersistenceStore {
  getAppState(key: string): unknown;
  setAppState(key: string, payload: unknown): void;
  logEvent(eventType: string, payload: Record<string, unknown>): unknown;
}

interface PolicySource {
  getPolicy(): EnginePolicy;
}

export interface SessionReplay {
  sessionId: string;
  capital: number;
  startedAt: string;
  reservations: Reservation[];
  carriedReservationIds: string[];
  tradesToday: number;
  realizedPnl: number;
  sessionLoss: number;
}

export type RiskDecision =
  | { allowed: true; size: number; reservation: Reservation }
  | { allowed: false; size: number; reasons: string[] };

const log = logger.child("risk");

export class RiskEngine {
  private static readonly killSwitchStateKey = "kill_switch_v1";
  private killSwitch = false;
  private killSwitchUpdatedAt: string | null = null;

  private sessionId = "";
  private sessionStartedAt = "";
  private capital: number;
  private tradesToday = 0;
  private realizedPnl = 0;
  private unrealizedPnl = 0;
  private sessionLoss = 0;
  private recoveryHaltReasons: string[] = [];
  private readonly active = new Map<string, Reservation>();
  private readonly carried = new Set<string>();

  constructor(
    private readonly runtimePolicy: PolicySource,
    private readonly persistence?: RiskPersistenceStore,
    capital = settings.accountCapital
  ) {
    this.capital = capital;
    this.loadPersistedKillSwitch();
  }

  private persistKillSwitch(): void {
    if (!this.persistence) return;
    this.persistence.setAppState(RiskEngine.killSwitchStateKey, {
      enabled: this.killSwitch,
      updatedAt: this.killSwitchUpdatedAt
    });
  }

  private loadPersistedKillSwitch(): void {
    if (!this.persistence) return;
    const persisted = persistedKillSwitchSchema.safeParse(
      this.persistence.getAppState(RiskEngine.killSwitchStateKey)
    );
    if (!persisted.success) return;
    this.killSwitch = persisted.data.enabled;
    this.killSwitchUpdatedAt = persisted.data.updatedAt ?? null;
  }

  private journal(eventType: string, payload: Record<string, unknown>): void {
    this.persistence?.logEvent(eventType, { sessionId: this.sessionId, ...payload });
  }

  setKillSwitch(enabled: boolean): { enabled: boolean; updatedAt: string } {
    this.killSwitch = enabled;
    const updatedAt = nowIso();
    this.killSwitchUpdatedAt = updatedAt;
    this.persistKillSwitch();
    this.journal("kill_switch_changed", { enabled, updatedAt });
    return { enabled, updatedAt };
  }

  getKillSwitchState(): { enabled: boolean; updatedAt: string | null } {
    return {
      enabled: this.killSwitch,
      updatedAt: this.killSwitchUpdatedAt
    };
  }

  /** Opens a new session boundary. Slots still held by live positions carry over. */
  startSession(capital = this.capital, sessionId = makeId()): RiskState {
    this.sessionId = sessionId;
    this.sessionStartedAt = nowIso();
    this.capital = capital;
    this.tradesToday = 0;
    this.realizedPnl = 0;
    this.unrealizedPnl = 0;
    this.sessionLoss = 0;
    this.recoveryHaltReasons = [];
    this.carried.clear();
    for (const reservationId of this.active.keys()) this.carried.add(reservationId);

    this.journal("risk_session_started", { capital, startedAt: this.sessionStartedAt });
    for (const reservation of this.active.values()) {
      this.journal("risk_reserved", { reservation: { ...reservation }, carried: true });
    }
    log.info(`Risk session ${sessionId} started with capital ${capital}`);
    return this.getRiskState();
  }

  /** Rebuilds counters from an audit replay; reservations left unresolved halt the session. */
  restore(replay: SessionReplay): RiskState {
    this.sessionId = replay.sessionId;
    this.sessionStartedAt = replay.startedAt;
    this.capital = replay.capital;
    this.tradesToday = replay.tradesToday;
    this.realizedPnl = replay.realizedPnl;
    this.sessionLoss = replay.sessionLoss;
    this.unrealizedPnl = 0;
    this.active.clear();
    this.carried.clear();
    this.recoveryHaltReasons = [];

    for (const reservation of replay.reservations) {
      if (reservation.status === "RELEASED") continue;
      this.active.set(reservation.id, { ...reservation });
    }
    for (const reservationId of replay.carriedReservationIds) {
      if (this.active.has(reservationId)) this.carried.add(reservationId);
    }

    const unresolved = replay.reservations.filter((reservation) => reservation.status === "RESERVED");
    if (unresolved.length > 0) {
      this.recoveryHaltReasons.push("unresolved_reservations_after_restart");
      log.warn(`Session ${replay.sessionId} restored with ${unresolved.length} unresolved reservation(s); halted`);
    }
    return this.getRiskState();
  }

  getRiskState(): RiskState {
    const haltReasons = this.haltReasons();
    let pendingReservations = 0;
    for (const reservation of this.active.values()) {
      if (reservation.status === "RESERVED") pendingReservations += 1;
    }

    return {
      sessionId: this.sessionId,
      sessionStartedAt: this.sessionStartedAt,
      capital: this.capital,
      openPositions: this.active.size,
      pendingReservations,
      tradesToday: this.tradesToday,
      realizedPnl: this.realizedPnl,
      unrealizedPnl: this.unrealizedPnl,
      sessionLoss: this.sessionLoss,
      halted: haltReasons.length > 0,
      haltReasons
    };
  }

  listReservations(): Reservation[] {
    return [...this.active.values()].map((reservation) => ({ ...reservation }));
  }

  getReservation(reservationId: string): Reservation | null {
    const reservation = this.active.get(reservationId);
    return reservation ? { ...reservation } : null;
  }

  sizePosition(signal: Pick<Signal, "entryPrice" | "stopPrice">, lotSize = 1): number {
    const policy = this.runtimePolicy.getPolicy();
    const perUnitRisk = Math.abs(signal.entryPrice - signal.stopPrice);
    if (perUnitRisk <= 0 || signal.entryPrice <= 0 || this.capital <= 0 || lotSize <= 0) return 0;

    const riskBudget = this.capital * policy.riskPerTradePct;
    const byRisk = Math.floor(riskBudget / perUnitRisk / lotSize) * lotSize;
    const notionalCap = this.capital * policy.maxPositionNotionalPct;
    const byNotional = Math.floor(notionalCap / signal.entryPrice / lotSize) * lotSize;
    return Math.max(0, Math.min(byRisk, byNotional));
  }

  /** Checks limits and, when they allow it, reserves the slot before returning. */
  evaluate(signal: Signal, lotSize = 1): RiskDecision {
    const policy = this.runtimePolicy.getPolicy();
    const reasons = this.haltReasons();

    if (this.active.size >= policy.maxOpenPositions) reasons.push("max_open_positions_reached");
    if (this.tradesToday >= policy.maxTradesPerDay) reasons.push("max_trades_per_day_reached");
    for (const reservation of this.active.values()) {
      if (reservation.instrumentId === signal.instrumentId) {
        reasons.push("instrument_already_active");
        break;
      }
    }

    const size = this.sizePosition(signal, lotSize);
    if (size <= 0) reasons.push("position_size_zero");

    if (reasons.length > 0) {
      this.journal("risk_rejected", {
        signalId: signal.id,
        instrumentId: signal.instrumentId,
        direction: signal.direction,
        size,
        reasons
      });
      return { allowed: false, size, reasons };
    }

    const reservation: Reservation = {
      id: makeId(),
      signalId: signal.id,
      instrumentId: signal.instrumentId,
      direction: signal.direction,
      size,
      entryPrice: signal.entryPrice,
      createdAt: nowIso(),
      status: "RESERVED"
    };
    this.active.set(reservation.id, reservation);
    this.tradesToday += 1;
    this.journal("risk_reserved", { reservation: { ...reservation } });
    return { allowed: true, size, reservation: { ...reservation } };
  }

  release(reservationId: string, reason: string): boolean {
    const reservation = this.active.get(reservationId);
    if (!reservation || reservation.status !== "RESERVED") return false;
    this.active.delete(reservationId);
    // A released slot never traded and is handed back; a carried slot stays counted by the session that made it.
    if (!this.carried.delete(reservationId)) this.tradesToday = Math.max(0, this.tradesToday - 1);
    this.journal("risk_released", { reservationId, instrumentId: reservation.instrumentId, reason });
    return true;
  }

  commit(reservationId: string): boolean {
    const reservation = this.active.get(reservationId);
    if (!reservation || reservation.status !== "RESERVED") return false;
    reservation.status = "COMMITTED";
    this.journal("risk_committed", { reservationId, instrumentId: reservation.instrumentId });
    return true;
  }

  closePosition(reservationId: string, realizedPnl: number): boolean {
    const reservation = this.active.get(reservationId);
    if (!reservation || reservation.status !== "COMMITTED") return false;
    this.active.delete(reservationId);
    this.carried.delete(reservationId);
    this.realizedPnl += realizedPnl;
    if (realizedPnl < 0) this.sessionLoss += -realizedPnl;
    this.journal("risk_slot_closed", {
      reservationId,
      instrumentId: reservation.instrumentId,
      realizedPnl
    });
    return true;
  }

  setUnrealizedPnl(value: number): void {
    this.unrealizedPnl = value;
  }

  private haltReasons(): string[] {
    const policy = this.runtimePolicy.getPolicy();
    const reasons: string[] = [];
    if (this.killSwitch) reasons.push("kill_switch_active");
    if (!this.sessionId) reasons.push("session_not_started");
    reasons.push(...this.recoveryHaltReasons);
    if (this.capital > 0 && this.sessionLoss >= policy.maxDailyLossPct * this.capital) {
      reasons.push("daily_loss_limit_reached");
    }
    return reasons;
  }
}
