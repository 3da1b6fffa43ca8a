import type { HistoricalBarSource } from "../adapters/types";
import { settings } from "../core/config";
import { errorMessage } from "../core/errors";
import { logger } from "../core/logger";
import type { HistoricalBar, Instrument } from "../types/models";
import { type SessionWindow, isWithinSession, minutesToSessionClose, sessionKeyOf } from "../utils/marketSession";

type Journal = { logEvent(eventType: string, payload: Record<string, unknown>): unknown };

export interface PollTarget {
  instruments(): Instrument[];
  absorbBars(instrumentId: string, bars: HistoricalBar[]): void;
}

export interface FallbackPollerOptions {
  intervalMs: number;
  minIntervalMs: number;
  barsPerPoll: number;
  candleIntervalMs: number;
  session: SessionWindow | null;
}

export interface LoopStatus {
  running: boolean;
  intervalMs: number;
  inFlight: boolean;
  lastRunStartedAt: string | null;
  lastRunFinishedAt: string | null;
  lastRunStatus: "idle" | "running" | "success" | "error";
  lastRunError: string | null;
  nextRunAt: string | null;
  nextRunInMs: number | null;
}

const log = logger.child("scheduler");

abstract class IntervalLoop {
  private timer: ReturnType<typeof setInterval> | null = null;
  protected intervalMs = 0;
  private nextRunAtMs: number | null = null;
  private lastRunStartedAtMs: number | null = null;
  private lastRunFinishedAtMs: number | null = null;
  private lastRunError: string | null = null;
  private runInFlight: Promise<void> | null = null;

  protected abstract readonly label: string;
  protected abstract resolveIntervalMs(): number;
  protected abstract runInternal(nowMs: number): Promise<void>;

  start(options: { runImmediately?: boolean } = {}): void {
    if (this.timer) return;
    this.intervalMs = this.resolveIntervalMs();
    this.nextRunAtMs = Date.now() + this.intervalMs;
    this.timer = setInterval(() => {
      this.trigger();
    }, this.intervalMs);
    log.info(`${this.label} started: every ${this.intervalMs}ms`);
    if (options.runImmediately) this.trigger();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.nextRunAtMs = null;
    log.info(`${this.label} stopped`);
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /** Runs one pass now; overlapping passes share the pass already in flight. */
  async runOnce(nowMs = Date.now()): Promise<void> {
    if (this.runInFlight) {
      await this.runInFlight;
      return;
    }

    const pending = this.execute(nowMs);
    this.runInFlight = pending;
    try {
      await pending;
    } finally {
      if (this.runInFlight === pending) this.runInFlight = null;
    }
  }

  async settle(): Promise<void> {
    if (this.runInFlight) await this.runInFlight;
  }

  getRuntimeStatus(nowMs = Date.now()): LoopStatus {
    const running = this.timer !== null;
    const lastRunStatus = this.runInFlight
      ? "running"
      : this.lastRunError
        ? "error"
        : this.lastRunFinishedAtMs
          ? "success"
          : "idle";

    return {
      running,
      intervalMs: this.intervalMs,
      inFlight: this.runInFlight !== null,
      lastRunStartedAt:
        this.lastRunStartedAtMs !== null ? new Date(this.lastRunStartedAtMs).toISOString() : null,
      lastRunFinishedAt:
        this.lastRunFinishedAtMs !== null ? new Date(this.lastRunFinishedAtMs).toISOString() : null,
      lastRunStatus,
      lastRunError: this.lastRunError,
      nextRunAt: running && this.nextRunAtMs !== null ? new Date(this.nextRunAtMs).toISOString() : null,
      nextRunInMs: running && this.nextRunAtMs !== null ? Math.max(0, this.nextRunAtMs - nowMs) : null
    };
  }

  private trigger(): void {
    this.runOnce().catch((error: unknown) => {
      log.error(`${this.label} pass crashed`, error);
    });
  }

  private async execute(nowMs: number): Promise<void> {
    this.lastRunStartedAtMs = Date.now();
    if (this.intervalMs > 0) this.nextRunAtMs = this.lastRunStartedAtMs + this.intervalMs;

    try {
      await this.runInternal(nowMs);
      this.lastRunError = null;
    } catch (error) {
      this.lastRunError = errorMessage(error);
      log.error(`${this.label} pass failed`, error);
    } finally {
      this.lastRunFinishedAtMs = Date.now();
    }
  }
}

/** Periodic full-universe bar fetch used while the streaming feed is degraded. */
export class FallbackPoller extends IntervalLoop {
  protected readonly label = "Fallback poller";
  private polledBars = 0;

  constructor(
    private readonly source: HistoricalBarSource,
    private readonly target: PollTarget,
    private readonly journal: Journal,
    private readonly options: FallbackPollerOptions = {
      intervalMs: settings.pollIntervalMs,
      minIntervalMs: 60_000,
      barsPerPoll: 3,
      candleIntervalMs: settings.candleIntervalMs,
      session: { timezone: settings.sessionTimezone, open: settings.sessionOpen, close: settings.sessionClose }
    }
  ) {
    super();
  }

  barsAbsorbed(): number {
    return this.polledBars;
  }

  protected resolveIntervalMs(): number {
    return Math.max(this.options.intervalMs, this.options.minIntervalMs);
  }

  protected async runInternal(nowMs: number): Promise<void> {
    if (this.options.session && !isWithinSession(nowMs, this.options.session)) {
      this.journal.logEvent("fallback_poll_skipped", { reason: "market_closed" });
      return;
    }

    const failures: string[] = [];
    for (const instrument of this.target.instruments()) {
      try {
        const bars = await this.source.fetchRecentBars(
          instrument,
          this.options.barsPerPoll,
          this.options.candleIntervalMs
        );
        this.target.absorbBars(instrument.id, bars);
        this.polledBars += bars.length;
      } catch (error) {
        failures.push(`${instrument.id}: ${errorMessage(error)}`);
      }
    }

    this.journal.logEvent("fallback_poll", {
      instruments: this.target.instruments().length,
      failures
    });
    if (failures.length > 0) {
      throw new Error(`Fallback poll failed for ${failures.length} instrument(s)`);
    }
  }
}

export interface SessionHooks {
  currentSessionKey(): string | null;
  startSession(sessionKey: string): void;
  squareOff(): Promise<number>;
}

/** Rolls the risk session at the trading-date boundary and squares off before the close. */
export class SessionSupervisor extends IntervalLoop {
  protected readonly label = "Session supervisor";
  private squaredOffFor: string | null = null;

  constructor(
    private readonly hooks: SessionHooks,
    private readonly session: SessionWindow,
    private readonly squareOffBeforeCloseMinutes = settings.squareOffBeforeCloseMinutes,
    private readonly checkIntervalMs = 30_000
  ) {
    super();
  }

  protected resolveIntervalMs(): number {
    return this.checkIntervalMs;
  }

  protected async runInternal(nowMs: number): Promise<void> {
    const sessionKey = sessionKeyOf(nowMs, this.session.timezone);
    if (isWithinSession(nowMs, this.session) && this.hooks.currentSessionKey() !== sessionKey) {
      this.hooks.startSession(sessionKey);
    }

    const remaining = minutesToSessionClose(nowMs, this.session);
    if (remaining === null || remaining > this.squareOffBeforeCloseMinutes) return;
    if (this.squaredOffFor === sessionKey) return;

    this.squaredOffFor = sessionKey;
    const closed = await this.hooks.squareOff();
    log.info(`Session square-off closed ${closed} position(s)`);
  }
}
