import { createIbkrClient, IbkrBroker, IbkrHistoricalSource, IbkrMarketFeed } from "../adapters/ibkrAdapter";
import type { IbkrClient } from "../adapters/ibkrClient";
import { loadInstrumentUniverse } from "../adapters/instrumentCatalog";
import { PaperBroker } from "../adapters/paperBroker";
import type { BrokerGateway, HistoricalBarSource, MarketDataFeed } from "../adapters/types";
import { settings } from "../core/config";
import { logger } from "../core/logger";
import { AuditStore } from "../storage/auditStore";
import type { Instrument, RiskState } from "../types/models";
import { type SessionWindow, sessionKeyOf } from "../utils/marketSession";
import { EngineEvents } from "./engineEvents";
import { FeedConnection } from "./feedConnection";
import { IndicatorEngine } from "./indicatorEngine";
import { OrderDispatcher } from "./orderDispatcher";
import { RiskEngine } from "./riskEngine";
import { RuntimePolicyService } from "./runtimePolicyService";
import { ScanOrchestrator } from "./scanOrchestrator";
import { SessionSupervisor } from "./scheduler";
import { SignalDetector } from "./signalDetector";

export interface ContainerOverrides {
  auditStore?: AuditStore;
  instruments?: Instrument[];
  feed?: MarketDataFeed;
  broker?: BrokerGateway;
  historical?: HistoricalBarSource | null;
  autoStart?: boolean;
}

export type SessionResetResult =
  | { reset: true; closedPositions: number; riskState: RiskState }
  | { reset: false; openPositions: number; riskState: RiskState };

export interface ServiceContainer {
  auditStore: AuditStore;
  instruments: Instrument[];
  events: EngineEvents;
  runtimePolicy: RuntimePolicyService;
  riskEngine: RiskEngine;
  broker: BrokerGateway;
  feed: FeedConnection;
  dispatcher: OrderDispatcher;
  scanner: ScanOrchestrator;
  sessionSupervisor: SessionSupervisor;
  resetSession(options: { capital?: number; force: boolean }): Promise<SessionResetResult>;
  shutdown(): Promise<void>;
}

const log = logger.child("container");

export const buildContainer = (overrides: ContainerOverrides = {}): ServiceContainer => {
  const ownsAuditStore = !overrides.auditStore;
  const auditStore = overrides.auditStore ?? new AuditStore();
  const instruments =
    overrides.instruments ?? loadInstrumentUniverse(settings.instrumentsPath, settings.universeSymbols);
  const session: SessionWindow = {
    timezone: settings.sessionTimezone,
    open: settings.sessionOpen,
    close: settings.sessionClose
  };

  let ibkrClient: IbkrClient | null = null;
  const ibkr = (): IbkrClient => {
    ibkrClient ??= createIbkrClient();
    return ibkrClient;
  };

  const events = new EngineEvents();
  const runtimePolicy = new RuntimePolicyService(auditStore);
  const riskEngine = new RiskEngine(runtimePolicy, auditStore);
  const broker = overrides.broker ?? (settings.brokerMode === "ibkr" ? new IbkrBroker(ibkr()) : new PaperBroker());
  const historical = overrides.historical === undefined ? new IbkrHistoricalSource(ibkr()) : overrides.historical;
  const feed = new FeedConnection(overrides.feed ?? new IbkrMarketFeed(ibkr()), events);
  const dispatcher = new OrderDispatcher(broker, riskEngine, auditStore, runtimePolicy, events);
  const scanner = new ScanOrchestrator({
    instruments,
    feed,
    historical,
    indicatorEngine: new IndicatorEngine(),
    detector: new SignalDetector(runtimePolicy),
    riskEngine,
    dispatcher,
    events,
    journal: auditStore,
    runtimePolicy
  });

  const replay = auditStore.replaySession();
  if (replay) {
    riskEngine.restore(replay);
    dispatcher.restore(auditStore.listPositions({ status: "open" }), instruments);
    log.info(`Restored risk session ${replay.sessionId}`);
  } else {
    riskEngine.startSession();
  }

  const sessionSupervisor = new SessionSupervisor(
    {
      currentSessionKey: () => {
        const startedAt = Date.parse(riskEngine.getRiskState().sessionStartedAt);
        return Number.isFinite(startedAt) ? sessionKeyOf(startedAt, session.timezone) : null;
      },
      startSession: (sessionKey) => {
        riskEngine.startSession();
        auditStore.logEvent("session_rolled", { sessionKey });
      },
      squareOff: async () => await dispatcher.closeAll("session_close")
    },
    session
  );

  const resetSession = async (options: { capital?: number; force: boolean }): Promise<SessionResetResult> => {
    const live = dispatcher.listPositions().filter((position) => position.lifecycle !== "CLOSED");
    if (live.length > 0 && !options.force) {
      return { reset: false, openPositions: live.length, riskState: riskEngine.getRiskState() };
    }

    const closedPositions = live.length > 0 ? await dispatcher.closeAll("manual") : 0;
    const riskState = riskEngine.startSession(options.capital ?? riskEngine.getRiskState().capital);
    auditStore.logEvent("session_reset", { closedPositions, capital: riskState.capital, force: options.force });
    return { reset: true, closedPositions, riskState };
  };

  const shutdown = async (): Promise<void> => {
    sessionSupervisor.stop();
    await scanner.stop();
    scanner.dispose();
    await dispatcher.drain();
    dispatcher.dispose();
    feed.dispose();
    if (ownsAuditStore) auditStore.close();
  };

  if (overrides.autoStart ?? settings.autoStartScanner) {
    sessionSupervisor.start({ runImmediately: true });
    scanner.start().catch((error: unknown) => {
      log.error("Scanner failed to start", error);
    });
  }

  return {
    auditStore,
    instruments,
    events,
    runtimePolicy,
    riskEngine,
    broker,
    feed,
    dispatcher,
    scanner,
    sessionSupervisor,
    resetSession,
    shutdown
  };
};
