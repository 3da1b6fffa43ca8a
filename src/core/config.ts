import { mkdirSync } from "node:fs";
import { dirname } from "node:path";

const parseBool = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) return fallback;
  return ["1", "true", "yes", "y", "on"].includes(value.toLowerCase());
};

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parseCsv = (value: string | undefined, fallback: string[]): string[] => {
  if (!value) return fallback;
  return value
    .split(",")
    .map((v) => v.trim().toUpperCase())
    .filter(Boolean);
};

const parseAppEnv = (value: string | undefined): "dev" | "test" | "prod" => {
  const normalized = (value ?? "dev").toLowerCase();
  if (normalized === "test" || normalized === "prod") return normalized;
  return "dev";
};

const parseBrokerMode = (value: string | undefined): "paper" | "ibkr" => {
  if (!value) return "paper";
  return value.toLowerCase() === "ibkr" ? "ibkr" : "paper";
};

const parseClock = (value: string | undefined, fallback: string): string => {
  if (!value) return fallback;
  return /^\d{2}:\d{2}$/.test(value.trim()) ? value.trim() : fallback;
};

export const isTestRuntime = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const appEnv = (env.APP_ENV ?? "").toLowerCase();
  const nodeEnv = (env.NODE_ENV ?? "").toLowerCase();
  return appEnv === "test" || nodeEnv === "test" || Boolean(env.VITEST);
};

const buildSettings = (env: NodeJS.ProcessEnv) => {
  const testRuntime = isTestRuntime(env);

  return {
    appName: env.APP_NAME ?? "signal-engine",
    appHost: env.APP_HOST ?? "127.0.0.1",
    appPort: parseNumber(env.APP_PORT, 8000),
    appEnv: parseAppEnv(env.APP_ENV),

    dbPath: env.DB_PATH ?? (testRuntime ? "./data/signal_engine.test.sqlite" : "./data/signal_engine.sqlite"),
    jsonlAuditPath:
      env.JSONL_AUDIT_PATH ?? (testRuntime ? "./data/audit.test.jsonl" : "./data/audit.jsonl"),
    instrumentsPath: env.INSTRUMENTS_PATH ?? "./config/instruments.json",
    universeSymbols: parseCsv(env.UNIVERSE_SYMBOLS, []),

    sessionTimezone: env.SESSION_TIMEZONE ?? "Asia/Kolkata",
    sessionOpen: parseClock(env.SESSION_OPEN, "09:15"),
    sessionClose: parseClock(env.SESSION_CLOSE, "15:30"),
    squareOffBeforeCloseMinutes: parseNumber(env.SQUARE_OFF_BEFORE_CLOSE_MINUTES, 10),

    candleIntervalMs: parseNumber(env.CANDLE_INTERVAL_MS, 5 * 60_000),
    candleHistorySize: parseNumber(env.CANDLE_HISTORY_SIZE, 300),
    warmupBars: parseNumber(env.WARMUP_BARS, 150),
    signalThrottleMs: parseNumber(env.SIGNAL_THROTTLE_MS, 5_000),

    brokerMode: parseBrokerMode(env.BROKER_MODE),
    ibkrHost: env.IBKR_HOST ?? "127.0.0.1",
    ibkrPort: parseNumber(env.IBKR_PORT, 7497),
    ibkrClientId: parseNumber(env.IBKR_CLIENT_ID, 137),
    ibkrClientTimeoutMs: parseNumber(env.IBKR_CLIENT_TIMEOUT_MS, 6_000),

    feedReconnectBaseDelayMs: parseNumber(env.FEED_RECONNECT_BASE_DELAY_MS, 1_000),
    feedReconnectMaxDelayMs: parseNumber(env.FEED_RECONNECT_MAX_DELAY_MS, 30_000),
    feedMaxReconnectAttempts: parseNumber(env.FEED_MAX_RECONNECT_ATTEMPTS, 5),
    pollIntervalMs: parseNumber(env.POLL_INTERVAL_MS, 60_000),

    orderAckTimeoutMs: parseNumber(env.ORDER_ACK_TIMEOUT_MS, 5_000),
    fillTimeoutMs: parseNumber(env.FILL_TIMEOUT_MS, 30_000),
    fillPollIntervalMs: parseNumber(env.FILL_POLL_INTERVAL_MS, 1_000),

    accountCapital: parseNumber(env.ACCOUNT_CAPITAL, 100_000),
    riskPerTradePct: parseNumber(env.RISK_PER_TRADE_PCT, 0.02),
    maxPositionNotionalPct: parseNumber(env.MAX_POSITION_NOTIONAL_PCT, 0.1),
    maxOpenPositions: parseNumber(env.MAX_OPEN_POSITIONS, 5),
    maxTradesPerDay: parseNumber(env.MAX_TRADES_PER_DAY, 10),
    maxDailyLossPct: parseNumber(env.MAX_DAILY_LOSS_PCT, 0.03),
    stopLossPct: parseNumber(env.STOP_LOSS_PCT, 0.003),
    takeProfitPct: parseNumber(env.TAKE_PROFIT_PCT, 0.007),
    maxHoldMinutes: parseNumber(env.MAX_HOLD_MINUTES, 120),
    autoStartScanner: parseBool(env.AUTO_START_SCANNER, !testRuntime)
  };
};

export type AppSettings = ReturnType<typeof buildSettings>;

const ensureStoragePaths = (config: AppSettings): void => {
  mkdirSync(dirname(config.dbPath), { recursive: true });
  mkdirSync(dirname(config.jsonlAuditPath), { recursive: true });
};

export const settings: AppSettings = buildSettings(process.env);
ensureStoragePaths(settings);
