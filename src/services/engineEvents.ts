import { EventEmitter } from "node:events";

import { logger } from "../core/logger";
import type { Decision, FeedStateChange, Position, Signal } from "../types/models";

export interface RiskRejectedEvent {
  signal: Signal;
  reasons: string[];
}

export interface ExecutionRejectedEvent {
  signalId: string;
  instrumentId: string;
  reservationId: string;
  reason: string;
}

export interface EngineEventMap {
  signal: Signal;
  decision: Decision;
  position: Position;
  risk_rejected: RiskRejectedEvent;
  execution_rejected: ExecutionRejectedEvent;
  feed_state: FeedStateChange;
}

export type EngineEventName = keyof EngineEventMap;

const log = logger.child("events");

/** In-process notification bus; dashboards and alert channels subscribe here. */
export class EngineEvents {
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  publish<K extends EngineEventName>(name: K, payload: EngineEventMap[K]): void {
    this.emitter.emit(name, payload);
  }

  subscribe<K extends EngineEventName>(name: K, listener: (payload: EngineEventMap[K]) => void): () => void {
    const guarded = (payload: EngineEventMap[K]): void => {
      try {
        listener(payload);
      } catch (error) {
        log.error(`Listener for ${name} failed`, error);
      }
    };
    this.emitter.on(name, guarded);
    return () => {
      this.emitter.off(name, guarded);
    };
  }

  listenerCount(name: EngineEventName): number {
    return this.emitter.listenerCount(name);
  }
}
