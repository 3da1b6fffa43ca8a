import type { MarketDataFeed, TickListener } from "../adapters/types";
import { settings } from "../core/config";
import { TransportError, errorMessage } from "../core/errors";
import { logger } from "../core/logger";
import type { FeedState, FeedStateChange, Instrument, Tick } from "../types/models";
import { nowIso } from "../utils/time";
import type { EngineEvents } from "./engineEvents";

export interface FeedConnectionOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  maxReconnectAttempts: number;
}

export type FeedStateListener = (change: FeedStateChange) => void;

export const backoffDelay = (attempt: number, options: Pick<FeedConnectionOptions, "baseDelayMs" | "maxDelayMs">): number => {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(options.baseDelayMs * 2 ** exponent, options.maxDelayMs);
};

const log = logger.child("feed");

/**
 * DISCONNECTED -> CONNECTING -> SUBSCRIBED -> STREAMING, with exponential backoff between
 * attempts. After `maxReconnectAttempts` consecutive failures the connection reports itself
 * degraded and keeps retrying; the first tick after resubscribing clears it.
 */
export class FeedConnection {
  private state: FeedState = "DISCONNECTED";
  private degraded = false;
  private attempts = 0;
  private instruments: Instrument[] = [];
  private running = false;
  private connecting = false;
  private retryTimer: ReturnType<typeof setTimeout> | null = null;
  private lastError: string | null = null;
  private readonly tickListeners = new Set<TickListener>();
  private readonly stateListeners = new Set<FeedStateListener>();
  private readonly detachFeed: Array<() => void> = [];

  constructor(
    private readonly feed: MarketDataFeed,
    private readonly events?: EngineEvents,
    private readonly options: FeedConnectionOptions = {
      baseDelayMs: settings.feedReconnectBaseDelayMs,
      maxDelayMs: settings.feedReconnectMaxDelayMs,
      maxReconnectAttempts: settings.feedMaxReconnectAttempts
    }
  ) {
    this.detachFeed.push(feed.onTick((tick) => this.handleTick(tick)));
    this.detachFeed.push(feed.onDisconnect((error) => this.handleDisconnect(error)));
  }

  onTick(listener: TickListener): () => void {
    this.tickListeners.add(listener);
    return () => {
      this.tickListeners.delete(listener);
    };
  }

  onStateChange(listener: FeedStateListener): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  getStatus(): {
    feed: string;
    state: FeedState;
    degraded: boolean;
    attempts: number;
    lastError: string | null;
    subscribedInstruments: number;
  } {
    return {
      feed: this.feed.name,
      state: this.state,
      degraded: this.degraded,
      attempts: this.attempts,
      lastError: this.lastError,
      subscribedInstruments: this.instruments.length
    };
  }

  async start(instruments: Instrument[]): Promise<void> {
    this.instruments = [...instruments];
    this.running = true;
    await this.attempt();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
    try {
      this.feed.unsubscribeAll();
      await this.feed.disconnect();
    } catch (error) {
      log.warn(`Feed ${this.feed.name} did not disconnect cleanly`, errorMessage(error));
    }
    this.attempts = 0;
    this.degraded = false;
    this.transition("DISCONNECTED", "stopped");
  }

  dispose(): void {
    for (const detach of this.detachFeed.splice(0)) detach();
  }

  private async attempt(): Promise<void> {
    if (!this.running || this.connecting) return;
    this.connecting = true;
    this.transition("CONNECTING");
    try {
      await this.feed.connect();
      if (!this.running) return;
      this.feed.subscribe(this.instruments);
      this.attempts = 0;
      this.lastError = null;
      this.transition("SUBSCRIBED");
    } catch (error) {
      this.onFailure(new TransportError(`Feed ${this.feed.name} connect failed: ${errorMessage(error)}`, { cause: error }));
    } finally {
      this.connecting = false;
    }
  }

  private handleTick(tick: Tick): void {
    if (!this.running) return;
    if (this.state === "SUBSCRIBED") {
      this.degraded = false;
      this.transition("STREAMING");
    }
    for (const listener of this.tickListeners) listener(tick);
  }

  private handleDisconnect(error: Error): void {
    if (!this.running || this.state === "DISCONNECTED" || this.state === "CONNECTING") return;
    this.onFailure(new TransportError(`Feed ${this.feed.name} disconnected: ${error.message}`, { cause: error }));
  }

  private onFailure(error: TransportError): void {
    this.attempts += 1;
    this.lastError = error.message;
    if (this.attempts >= this.options.maxReconnectAttempts) this.degraded = true;
    this.transition("DISCONNECTED", error.message);
    if (!this.running) return;

    const delay = backoffDelay(this.attempts, this.options);
    log.warn(`${error.message}; retry ${this.attempts} in ${delay}ms${this.degraded ? " (degraded)" : ""}`);
    if (this.retryTimer) clearTimeout(this.retryTimer);
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      this.attempt().catch((retryError: unknown) => {
        log.error("Feed reconnect attempt crashed", retryError);
      });
    }, delay);
  }

  private transition(next: FeedState, reason?: string): void {
    const previous = this.state;
    this.state = next;
    const change: FeedStateChange = {
      state: next,
      previous,
      degraded: this.degraded,
      attempt: this.attempts,
      at: nowIso(),
      ...(reason ? { reason } : {})
    };
    this.events?.publish("feed_state", change);
    for (const listener of this.stateListeners) {
      try {
        listener(change);
      } catch (listenerError) {
        log.error("Feed state listener failed", listenerError);
      }
    }
  }
}
