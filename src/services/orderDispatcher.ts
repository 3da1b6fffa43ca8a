import type { BrokerGateway, BrokerOrderEvent, SubmitResult } from "../adapters/types";
import { settings } from "../core/config";
import { errorMessage } from "../core/errors";
import { logger } from "../core/logger";
import type { AuditStore } from "../storage/auditStore";
import type {
  ExitReason,
  Instrument,
  Position,
  PositionStatus,
  Reservation,
  Signal
} from "../types/models";
import { TimeoutError, sleep, withTimeout } from "../utils/async";
import { makeId } from "../utils/id";
import { roundToTick } from "../utils/statistics";
import { minutesBetween, nowIso } from "../utils/time";
import type { EngineEvents } from "./engineEvents";
import type { RiskEngine } from "./riskEngine";
import type { EnginePolicy } from "./runtimePolicyService";

export interface DispatcherOptions {
  ackTimeoutMs: number;
  fillTimeoutMs: number;
  fillPollIntervalMs: number;
}

interface PolicySource {
  getPolicy(): EnginePolicy;
}

type ExecutionJournal = Pick<AuditStore, "logEvent" | "savePosition">;

const STATUS_BY_EXIT: Record<ExitReason, PositionStatus> = {
  reference_return: "closed_by_target",
  target: "closed_by_target",
  stop: "closed_by_stop",
  max_hold: "closed_by_timeout",
  session_close: "closed_by_timeout",
  manual: "closed_by_timeout",
  entry_not_filled: "entry_cancelled"
};

const log = logger.child("dispatcher");

export const computePnl = (position: Pick<Position, "direction" | "entryPrice" | "size">, exitPrice: number): number =>
  position.direction === "BUY"
    ? (exitPrice - position.entryPrice) * position.size
    : (position.entryPrice - exitPrice) * position.size;

export class OrderDispatcher {
  private readonly positions = new Map<string, Position>();
  private readonly instruments = new Map<string, Instrument>();
  private readonly lastPrices = new Map<string, number>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly detachBroker: () => void;

  constructor(
    private readonly broker: BrokerGateway,
    private readonly riskEngine: RiskEngine,
    private readonly journal: ExecutionJournal,
    private readonly runtimePolicy: PolicySource,
    private readonly events: EngineEvents,
    private readonly options: DispatcherOptions = {
      ackTimeoutMs: settings.orderAckTimeoutMs,
      fillTimeoutMs: settings.fillTimeoutMs,
      fillPollIntervalMs: settings.fillPollIntervalMs
    }
  ) {
    this.detachBroker = broker.onOrderEvent((event) => this.onBrokerEvent(event));
  }

  dispose(): void {
    this.detachBroker();
  }

  /** Starts the submission in the background; the returned promise is tracked for drain(). */
  dispatch(signal: Signal, reservation: Reservation, instrument: Instrument): Promise<Position | null> {
    const task = this.runDispatch(signal, reservation, instrument);
    this.track(task.then(() => undefined));
    return task;
  }

  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  pendingCount(): number {
    return this.inFlight.size;
  }

  listPositions(): Position[] {
    return [...this.positions.values()].map((position) => ({ ...position }));
  }

  /** Re-adopts live positions after a restart so exits keep being evaluated. */
  restore(positions: Position[], instruments: Instrument[]): void {
    for (const instrument of instruments) this.instruments.set(instrument.id, instrument);
    for (const position of positions) {
      if (position.lifecycle !== "OPEN" && position.lifecycle !== "CLOSING") continue;
      this.positions.set(position.id, { ...position, lifecycle: "OPEN" });
    }
  }

  onPrice(instrumentId: string, price: number, referencePrice: number | null, at = Date.now()): void {
    this.lastPrices.set(instrumentId, price);
    const policy = this.runtimePolicy.getPolicy();

    for (const position of this.positions.values()) {
      if (position.instrumentId !== instrumentId || position.lifecycle !== "OPEN") continue;
      const reason = this.exitReasonFor(position, price, referencePrice, at, policy);
      if (reason) this.beginClose(position, reason, price);
    }
    this.refreshUnrealized();
  }

  /** A bracket leg filled at the broker; an entry whose fill was not seen yet opens first. */
  private onExternalExit(brokerOrderId: string, exitPrice: number, kind: "stop" | "target"): boolean {
    for (const position of this.positions.values()) {
      if (position.brokerOrderId !== brokerOrderId) continue;
      if (position.lifecycle === "CLOSED") return false;
      if (position.lifecycle === "PENDING_ENTRY") this.markOpen(position, position.entryPrice);
      this.finalizeClose(position, kind, exitPrice);
      return true;
    }
    return false;
  }

  private notifyEntryFilled(brokerOrderId: string, fillPrice: number): boolean {
    for (const position of this.positions.values()) {
      if (position.brokerOrderId !== brokerOrderId || position.lifecycle !== "PENDING_ENTRY") continue;
      this.markOpen(position, fillPrice);
      return true;
    }
    return false;
  }

  /**
   * Square-off, e.g. at the session close. Entries still waiting for a fill are cancelled at the
   * broker; any that fill anyway are closed once their fill lands.
   */
  async closeAll(reason: Extract<ExitReason, "session_close" | "manual">): Promise<number> {
    for (const position of this.positions.values()) {
      if (position.lifecycle === "PENDING_ENTRY") this.track(this.withdrawEntry(position));
    }

    const attempted = new Set<string>();
    let count = 0;
    do {
      for (const position of this.positions.values()) {
        if (position.lifecycle !== "OPEN" || attempted.has(position.id)) continue;
        attempted.add(position.id);
        const price = this.lastPrices.get(position.instrumentId) ?? position.entryPrice;
        this.beginClose(position, reason, price);
        count += 1;
      }
      await this.drain();
    } while ([...this.positions.values()].some((position) => position.lifecycle === "OPEN" && !attempted.has(position.id)));
    return count;
  }

  private onBrokerEvent(event: BrokerOrderEvent): void {
    const handled =
      event.kind === "entry_filled"
        ? this.notifyEntryFilled(event.orderId, event.fillPrice)
        : this.onExternalExit(event.parentOrderId, event.fillPrice, event.leg);
    if (!handled) log.debug(`Broker ${event.kind} matched no live position`, event);
  }

  private exitReasonFor(
    position: Position,
    price: number,
    referencePrice: number | null,
    at: number,
    policy: EnginePolicy
  ): ExitReason | null {
    const isLong = position.direction === "BUY";
    const profitPct = isLong
      ? (price - position.entryPrice) / position.entryPrice
      : (position.entryPrice - price) / position.entryPrice;

    if (referencePrice !== null && referencePrice > 0) {
      const distance = Math.abs(price - referencePrice) / referencePrice;
      if (profitPct >= policy.referenceExitMinProfitPct && distance <= policy.referenceExitProximityPct) {
        return "reference_return";
      }
    }
    if (isLong ? price >= position.targetPrice : price <= position.targetPrice) return "target";
    if (isLong ? price <= position.stopPrice : price >= position.stopPrice) return "stop";
    if (minutesBetween(position.openedAt, at) >= policy.maxHoldMinutes) return "max_hold";
    return null;
  }

  private async runDispatch(signal: Signal, reservation: Reservation, instrument: Instrument): Promise<Position | null> {
    this.instruments.set(instrument.id, instrument);
    const submission = this.broker.submit({
      clientOrderId: reservation.id,
      instrument,
      direction: signal.direction,
      size: reservation.size,
      entryStyle: "LIMIT",
      entryPrice: roundToTick(signal.entryPrice, instrument.tickSize),
      stopPrice: roundToTick(signal.stopPrice, instrument.tickSize),
      targetPrice: roundToTick(signal.targetPrice, instrument.tickSize)
    });

    let result: SubmitResult;
    try {
      result = await withTimeout(submission, this.options.ackTimeoutMs, "order acknowledgment");
    } catch (error) {
      const reason = error instanceof TimeoutError ? "ack_timeout" : "submit_failed";
      if (reason === "ack_timeout") this.cancelLateAcknowledgment(submission, reservation);
      this.rejectExecution(signal, reservation, reason, errorMessage(error));
      return null;
    }

    if (!result.accepted) {
      this.rejectExecution(signal, reservation, "broker_rejected", result.reason);
      return null;
    }

    const position: Position = {
      id: makeId(),
      instrumentId: signal.instrumentId,
      direction: signal.direction,
      entryPrice: signal.entryPrice,
      size: reservation.size,
      stopPrice: signal.stopPrice,
      targetPrice: signal.targetPrice,
      referencePrice: signal.referencePrice,
      openedAt: nowIso(),
      lifecycle: "PENDING_ENTRY",
      status: "open",
      exitReason: null,
      exitPrice: null,
      closedAt: null,
      realizedPnl: null,
      brokerOrderId: result.orderId,
      reservationId: reservation.id,
      signalId: signal.id
    };
    this.positions.set(position.id, position);
    this.persist(position, "position_pending_entry");

    await this.awaitFill(position);
    return { ...position };
  }

  private async awaitFill(position: Position): Promise<void> {
    const orderId = position.brokerOrderId;
    if (!orderId) return;
    const deadline = Date.now() + this.options.fillTimeoutMs;

    while (position.lifecycle === "PENDING_ENTRY") {
      try {
        const report = await withTimeout(this.broker.getStatus(orderId), this.options.ackTimeoutMs, "order status");
        if (position.lifecycle !== "PENDING_ENTRY") return;
        if (report.status === "filled") {
          this.markOpen(position, report.fillPrice ?? position.entryPrice);
          return;
        }
        if (report.status === "rejected" || report.status === "cancelled") {
          this.cancelEntry(position, `broker_${report.status}`);
          return;
        }
      } catch (error) {
        log.warn(`Status poll for ${orderId} failed`, errorMessage(error));
      }

      if (Date.now() >= deadline) {
        try {
          await this.broker.cancel(orderId);
        } catch (error) {
          log.warn(`Cancel of unfilled entry ${orderId} failed`, errorMessage(error));
        }
        if (position.lifecycle === "PENDING_ENTRY") this.cancelEntry(position, "fill_timeout");
        return;
      }
      await sleep(this.options.fillPollIntervalMs);
    }
  }

  /** The fill poll settles the outcome: a cancelled entry releases its slot, a late fill opens normally. */
  private async withdrawEntry(position: Position): Promise<void> {
    const orderId = position.brokerOrderId;
    if (!orderId) return;
    try {
      await this.broker.cancel(orderId);
      this.journal.logEvent("entry_withdrawn", { positionId: position.id, orderId });
    } catch (error) {
      log.warn(`Cancel of pending entry ${orderId} failed`, errorMessage(error));
    }
  }

  private markOpen(position: Position, fillPrice: number): void {
    position.lifecycle = "OPEN";
    position.entryPrice = fillPrice;
    position.openedAt = nowIso();
    this.riskEngine.commit(position.reservationId);
    this.persist(position, "position_opened");
  }

  private cancelEntry(position: Position, reason: string): void {
    position.lifecycle = "CLOSED";
    position.status = "entry_cancelled";
    position.exitReason = "entry_not_filled";
    position.closedAt = nowIso();
    position.realizedPnl = 0;
    this.riskEngine.release(position.reservationId, reason);
    this.positions.delete(position.id);
    this.persist(position, "position_entry_cancelled", { reason });
  }

  private beginClose(position: Position, reason: ExitReason, price: number): void {
    position.lifecycle = "CLOSING";
    this.persist(position, "position_closing", { reason, triggerPrice: price });
    this.track(this.submitClose(position, reason, price));
  }

  private async submitClose(position: Position, reason: ExitReason, price: number): Promise<void> {
    const instrument = this.instruments.get(position.instrumentId);
    if (!instrument) {
      log.error(`No instrument for ${position.instrumentId}; closing locally`);
      this.finalizeClose(position, reason, price);
      return;
    }

    try {
      const closed = await withTimeout(
        this.broker.closePosition({
          parentOrderId: position.brokerOrderId,
          instrument,
          direction: position.direction,
          size: position.size,
          expectedPrice: price,
          reason
        }),
        this.options.ackTimeoutMs,
        "close acknowledgment"
      );
      if (position.lifecycle !== "CLOSING") return;
      this.finalizeClose(position, reason, closed.fillPrice ?? price);
    } catch (error) {
      if (position.lifecycle !== "CLOSING") return;
      position.lifecycle = "OPEN";
      this.persist(position, "position_close_failed", { reason, error: errorMessage(error) });
    }
  }

  private finalizeClose(position: Position, reason: ExitReason, exitPrice: number): void {
    const realizedPnl = computePnl(position, exitPrice);
    position.lifecycle = "CLOSED";
    position.status = STATUS_BY_EXIT[reason];
    position.exitReason = reason;
    position.exitPrice = exitPrice;
    position.closedAt = nowIso();
    position.realizedPnl = realizedPnl;
    this.riskEngine.closePosition(position.reservationId, realizedPnl);
    this.positions.delete(position.id);
    this.persist(position, "position_closed");
    this.refreshUnrealized();
  }

  private rejectExecution(signal: Signal, reservation: Reservation, reason: string, detail: string): void {
    this.riskEngine.release(reservation.id, reason);
    this.journal.logEvent("execution_rejected", {
      signalId: signal.id,
      instrumentId: signal.instrumentId,
      reservationId: reservation.id,
      reason,
      detail
    });
    this.events.publish("execution_rejected", {
      signalId: signal.id,
      instrumentId: signal.instrumentId,
      reservationId: reservation.id,
      reason
    });
    log.warn(`Execution rejected for ${signal.instrumentId}: ${reason}`, detail);
  }

  private cancelLateAcknowledgment(submission: Promise<SubmitResult>, reservation: Reservation): void {
    const late = submission.then(
      async (result) => {
        if (!result.accepted) return;
        this.journal.logEvent("late_ack_cancelled", {
          reservationId: reservation.id,
          orderId: result.orderId
        });
        await this.broker.cancel(result.orderId);
      },
      (error: unknown) => {
        log.debug("Late submission settled with an error", errorMessage(error));
      }
    );
    this.track(late);
  }

  private refreshUnrealized(): void {
    let total = 0;
    for (const position of this.positions.values()) {
      if (position.lifecycle !== "OPEN" && position.lifecycle !== "CLOSING") continue;
      const price = this.lastPrices.get(position.instrumentId);
      if (price === undefined) continue;
      total += computePnl(position, price);
    }
    this.riskEngine.setUnrealizedPnl(total);
  }

  private persist(position: Position, eventType: string, extra: Record<string, unknown> = {}): void {
    this.journal.savePosition(position);
    this.journal.logEvent(eventType, { positionId: position.id, ...extra, position: { ...position } });
    this.events.publish("position", { ...position });
  }

  private track(task: Promise<void>): void {
    const guarded: Promise<void> = task
      .catch((error: unknown) => {
        log.error("Background execution task failed", error);
      })
      .finally(() => {
        this.inFlight.delete(guarded);
      });
    this.inFlight.add(guarded);
  }
}
