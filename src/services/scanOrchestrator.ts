import type { HistoricalBarSource } from "../adapters/types";
import { settings } from "../core/config";
import { errorMessage } from "../core/errors";
import { logger } from "../core/logger";
import type { CandleUpdate, FeedStateChange, HistoricalBar, Instrument, Signal, Tick } from "../types/models";
import { sessionKeyOf } from "../utils/marketSession";
import { CandleAggregator } from "./candleAggregator";
import type { EngineEvents } from "./engineEvents";
import type { FeedConnection } from "./feedConnection";
import type { IndicatorEngine } from "./indicatorEngine";
import type { OrderDispatcher } from "./orderDispatcher";
import type { RiskEngine } from "./riskEngine";
import type { EnginePolicy } from "./runtimePolicyService";
import { FallbackPoller, type FallbackPollerOptions } from "./scheduler";
import type { SignalDetector } from "./signalDetector";

type Journal = { logEvent(eventType: string, payload: Record<string, unknown>): unknown };

export interface ScanOrchestratorOptions {
  candleIntervalMs: number;
  historySize: number;
  warmupBars: number;
  sessionTimezone: string;
  poller?: FallbackPollerOptions;
}

export interface ScanOrchestratorDeps {
  instruments: Instrument[];
  feed: FeedConnection;
  historical: HistoricalBarSource | null;
  indicatorEngine: IndicatorEngine;
  detector: SignalDetector;
  riskEngine: RiskEngine;
  dispatcher: OrderDispatcher;
  events: EngineEvents;
  journal: Journal;
  runtimePolicy: { getPolicy(): EnginePolicy };
  options?: ScanOrchestratorOptions;
  clock?: () => number;
}

export interface ScanCounters {
  ticksRouted: number;
  unknownInstrumentTicks: number;
  candleUpdates: number;
  evaluations: number;
  throttledTriggers: number;
  signals: number;
  riskRejections: number;
  dispatched: number;
  evaluationErrors: number;
}

const log = logger.child("scanner");

export class ScanOrchestrator {
  private readonly instrumentsById = new Map<string, Instrument>();
  private readonly aggregators = new Map<string, CandleAggregator>();
  private readonly lastCheckedAt = new Map<string, number>();
  private readonly lastReference = new Map<string, number>();
  private readonly poller: FallbackPoller | null;
  private readonly options: ScanOrchestratorOptions;
  private readonly clock: () => number;
  private readonly detachers: Array<() => void> = [];
  private routing = false;
  private running = false;
  private warmingUp = false;
  private startGeneration = 0;
  private starting: Promise<void> | null = null;
  private startedAt: string | null = null;
  private readonly counters: ScanCounters = {
    ticksRouted: 0,
    unknownInstrumentTicks: 0,
    candleUpdates: 0,
    evaluations: 0,
    throttledTriggers: 0,
    signals: 0,
    riskRejections: 0,
    dispatched: 0,
    evaluationErrors: 0
  };

  constructor(private readonly deps: ScanOrchestratorDeps) {
    this.options = deps.options ?? {
      candleIntervalMs: settings.candleIntervalMs,
      historySize: settings.candleHistorySize,
      warmupBars: settings.warmupBars,
      sessionTimezone: settings.sessionTimezone
    };
    this.clock = deps.clock ?? Date.now;

    for (const instrument of deps.instruments) {
      this.instrumentsById.set(instrument.id, instrument);
      const aggregator = new CandleAggregator(instrument.id, {
        intervalMs: this.options.candleIntervalMs,
        capacity: this.options.historySize
      });
      aggregator.onUpdate((update) => this.onCandleUpdated(update));
      this.aggregators.set(instrument.id, aggregator);
    }

    this.poller = deps.historical
      ? new FallbackPoller(
          deps.historical,
          {
            instruments: () => this.instruments(),
            absorbBars: (instrumentId, bars) => this.absorbBars(instrumentId, bars)
          },
          deps.journal,
          this.options.poller
        )
      : null;

    this.detachers.push(deps.feed.onTick((tick) => this.handleTick(tick)));
    this.detachers.push(deps.feed.onStateChange((change) => this.onFeedState(change)));
  }

  instruments(): Instrument[] {
    return [...this.instrumentsById.values()];
  }

  isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.startGeneration += 1;
    const pending = this.begin(this.startGeneration);
    this.starting = pending;
    try {
      await pending;
    } finally {
      if (this.starting === pending) this.starting = null;
    }
  }

  /** Tick routing stops first; in-flight orders still finish and settle their reservations. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.startGeneration += 1;
    this.routing = false;
    if (this.starting) {
      await this.starting.catch((error: unknown) => {
        log.warn("Scanner start failed while stopping", errorMessage(error));
      });
    }
    this.poller?.stop();
    await this.poller?.settle();
    await this.deps.feed.stop();
    await this.deps.dispatcher.drain();
    this.running = false;
    this.deps.journal.logEvent("scanner_stopped", { ...this.counters });
  }

  dispose(): void {
    for (const detach of this.detachers.splice(0)) detach();
  }

  handleTick(tick: Tick): void {
    if (!this.routing) return;
    this.counters.ticksRouted += 1;
    const aggregator = this.aggregators.get(tick.instrumentId);
    if (!aggregator) {
      this.counters.unknownInstrumentTicks += 1;
      return;
    }

    const outcome = aggregator.ingest(tick);
    if (outcome === "rejected" || outcome === "late") return;

    try {
      this.deps.dispatcher.onPrice(
        tick.instrumentId,
        tick.price,
        this.lastReference.get(tick.instrumentId) ?? null,
        tick.timestamp
      );
    } catch (error) {
      this.containError("exit_evaluation_failed", tick.instrumentId, error);
    }
  }

  absorbBars(instrumentId: string, bars: HistoricalBar[]): void {
    const aggregator = this.aggregators.get(instrumentId);
    if (!aggregator) return;
    for (const bar of bars) aggregator.absorbBar(bar);

    const latest = aggregator.current();
    if (!latest || this.warmingUp || !this.routing) return;
    try {
      this.deps.dispatcher.onPrice(instrumentId, latest.close, this.lastReference.get(instrumentId) ?? null, this.clock());
    } catch (error) {
      this.containError("exit_evaluation_failed", instrumentId, error);
    }
  }

  candles(instrumentId: string): { current: ReturnType<CandleAggregator["current"]>; history: ReturnType<CandleAggregator["history"]> } | null {
    const aggregator = this.aggregators.get(instrumentId);
    if (!aggregator) return null;
    return { current: aggregator.current(), history: aggregator.history() };
  }

  status(): {
    running: boolean;
    routing: boolean;
    startedAt: string | null;
    instruments: number;
    counters: ScanCounters;
    dataQuality: { lateTicks: number; rejectedTicks: number };
    feed: ReturnType<FeedConnection["getStatus"]>;
    poller: ReturnType<FallbackPoller["getRuntimeStatus"]> | null;
    inFlightOrders: number;
  } {
    let lateTicks = 0;
    let rejectedTicks = 0;
    for (const aggregator of this.aggregators.values()) {
      const stats = aggregator.stats();
      lateTicks += stats.lateTicks;
      rejectedTicks += stats.rejectedTicks;
    }

    return {
      running: this.running,
      routing: this.routing,
      startedAt: this.startedAt,
      instruments: this.instrumentsById.size,
      counters: { ...this.counters },
      dataQuality: { lateTicks, rejectedTicks },
      feed: this.deps.feed.getStatus(),
      poller: this.poller ? this.poller.getRuntimeStatus() : null,
      inFlightOrders: this.deps.dispatcher.pendingCount()
    };
  }

  /** A stop() during warm-up bumps the generation; the superseded start then never routes or subscribes. */
  private async begin(generation: number): Promise<void> {
    this.startedAt = new Date(this.clock()).toISOString();
    await this.warmUp();
    if (generation !== this.startGeneration) return;
    this.routing = true;
    this.deps.journal.logEvent("scanner_started", { instruments: this.instrumentsById.size });
    await this.deps.feed.start(this.instruments());
  }

  private async warmUp(): Promise<void> {
    const source = this.deps.historical;
    if (!source || this.options.warmupBars <= 0) return;

    this.warmingUp = true;
    try {
      for (const instrument of this.instrumentsById.values()) {
        try {
          const bars = await source.fetchRecentBars(instrument, this.options.warmupBars, this.options.candleIntervalMs);
          this.absorbBars(instrument.id, bars);
        } catch (error) {
          log.warn(`Warm-up failed for ${instrument.id}`, errorMessage(error));
          this.deps.journal.logEvent("warmup_failed", { instrumentId: instrument.id, error: errorMessage(error) });
        }
      }
    } finally {
      this.warmingUp = false;
    }
  }

  private onCandleUpdated(update: CandleUpdate): void {
    this.counters.candleUpdates += 1;
    if (this.warmingUp) return;

    const now = this.clock();
    const throttleMs = this.deps.runtimePolicy.getPolicy().signalThrottleMs;
    const lastChecked = this.lastCheckedAt.get(update.instrumentId);
    if (lastChecked !== undefined && now - lastChecked < throttleMs) {
      this.counters.throttledTriggers += 1;
      return;
    }
    this.lastCheckedAt.set(update.instrumentId, now);

    try {
      this.evaluate(update.instrumentId);
    } catch (error) {
      this.containError("evaluation_failed", update.instrumentId, error);
    }
  }

  private evaluate(instrumentId: string): void {
    const aggregator = this.aggregators.get(instrumentId);
    if (!aggregator) return;

    const window = aggregator.window();
    const timezone = this.options.sessionTimezone;
    const snapshot = this.deps.indicatorEngine.compute(window, (start) => sessionKeyOf(start, timezone));
    if (snapshot.ready) this.lastReference.set(instrumentId, snapshot.vwap);

    const decision = this.deps.detector.evaluate(instrumentId, window, snapshot);
    this.counters.evaluations += 1;
    this.deps.events.publish("decision", decision);
    if (decision.signal) this.handleSignal(decision.signal);
  }

  private handleSignal(signal: Signal): void {
    this.counters.signals += 1;
    this.deps.journal.logEvent("signal_emitted", { signal });
    this.deps.events.publish("signal", signal);

    const instrument = this.instrumentsById.get(signal.instrumentId);
    if (!instrument) return;

    const decision = this.deps.riskEngine.evaluate(signal, instrument.lotSize);
    if (!decision.allowed) {
      this.counters.riskRejections += 1;
      this.deps.events.publish("risk_rejected", { signal, reasons: decision.reasons });
      log.info(`Signal ${signal.direction} ${signal.instrumentId} rejected by risk gate`, decision.reasons);
      return;
    }

    this.counters.dispatched += 1;
    this.deps.dispatcher.dispatch(signal, decision.reservation, instrument).catch((error: unknown) => {
      log.error(`Dispatch for ${signal.instrumentId} failed`, error);
    });
  }

  private onFeedState(change: FeedStateChange): void {
    if (!this.poller || !this.running) return;
    if (change.degraded && !this.poller.isRunning()) {
      this.deps.journal.logEvent("feed_degraded", { attempt: change.attempt, reason: change.reason ?? null });
      this.poller.start({ runImmediately: true });
      return;
    }
    if (change.state === "STREAMING" && this.poller.isRunning()) {
      this.poller.stop();
      this.deps.journal.logEvent("feed_restored", { attempt: change.attempt });
    }
  }

  private containError(eventType: string, instrumentId: string, error: unknown): void {
    this.counters.evaluationErrors += 1;
    log.error(`${eventType} for ${instrumentId}`, error);
    this.deps.journal.logEvent(eventType, { instrumentId, error: errorMessage(error) });
  }
}
