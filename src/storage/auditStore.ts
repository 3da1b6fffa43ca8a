import { appendFileSync } from "node:fs";
import Database from "better-sqlite3";
import { z } from "zod";

import { settings } from "../core/config";
import { logger } from "../core/logger";
import type { SessionReplay } from "../services/riskEngine";
import type { AuditRecord, Position, Reservation } from "../types/models";
import {
  positionSchema,
  reservationEventSchema,
  reservationTransitionEventSchema,
  sessionStartedEventSchema,
  slotClosedEventSchema
} from "../types/schemas";
import { makeId } from "../utils/id";
import { nowIso } from "../utils/time";

interface AuditRow {
  seq: number;
  id: string;
  timestamp: string;
  event_type: string;
  payload: string;
}

const REPLAY_EVENT_TYPES = [
  "risk_session_started",
  "risk_reserved",
  "risk_released",
  "risk_committed",
  "risk_slot_closed"
];

const payloadSchema = z.record(z.unknown());

const parsePayload = (raw: string): Record<string, unknown> => {
  try {
    const parsed = payloadSchema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
  } catch (error) {
    logger.warn("Unreadable audit payload", error);
  }
  return {};
};

export class AuditStore {
  private readonly db: Database.Database;

  constructor(dbPath = settings.dbPath, private readonly jsonlPath = settings.jsonlAuditPath) {
    this.db = new Database(dbPath);
    this.init();
  }

  private init(): void {
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS audit_records (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        timestamp TEXT NOT NULL,
        event_type TEXT NOT NULL,
        payload TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_audit_records_event_type ON audit_records (event_type);

      CREATE TABLE IF NOT EXISTS positions (
        id TEXT PRIMARY KEY,
        opened_at TEXT NOT NULL,
        instrument_id TEXT NOT NULL,
        lifecycle TEXT NOT NULL,
        reservation_id TEXT NOT NULL,
        payload TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS app_state (
        key TEXT PRIMARY KEY,
        payload TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
  }

  close(): void {
    this.db.close();
  }

  logEvent(eventType: string, payload: Record<string, unknown>): AuditRecord {
    const record: AuditRecord = {
      id: makeId(),
      timestamp: nowIso(),
      eventType,
      payload
    };

    this.db
      .prepare<[string, string, string, string]>(
        "INSERT INTO audit_records (id, timestamp, event_type, payload) VALUES (?, ?, ?, ?)"
      )
      .run(record.id, record.timestamp, record.eventType, JSON.stringify(record.payload));

    appendFileSync(this.jsonlPath, `${JSON.stringify(record)}\n`, { encoding: "utf8" });
    return record;
  }

  listAuditRecords(params?: { eventTypes?: string[]; limit?: number; sinceTimestamp?: string }): AuditRecord[] {
    const limit = Math.max(1, Math.min(params?.limit ?? 500, 10_000));
    const eventTypes = (params?.eventTypes ?? [])
      .map((eventType) => eventType.trim())
      .filter((eventType) => eventType.length > 0);
    const sinceTimestamp = params?.sinceTimestamp?.trim();

    const clauses: string[] = [];
    const values: Array<string | number> = [];
    if (eventTypes.length > 0) {
      clauses.push(`event_type IN (${eventTypes.map(() => "?").join(", ")})`);
      values.push(...eventTypes);
    }
    if (sinceTimestamp) {
      clauses.push("timestamp >= ?");
      values.push(sinceTimestamp);
    }
    const whereClause = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";

    const rows = this.db
      .prepare<Array<string | number>, AuditRow>(
        `SELECT seq, id, timestamp, event_type, payload
         FROM audit_records
         ${whereClause}
         ORDER BY seq DESC
         LIMIT ?`
      )
      .all(...values, limit);

    return rows
      .map((row) => ({
        id: row.id,
        timestamp: row.timestamp,
        eventType: row.event_type,
        payload: parsePayload(row.payload)
      }))
      .reverse();
  }

  savePosition(position: Position): void {
    this.db
      .prepare<[string, string, string, string, string, string]>(
        `INSERT OR REPLACE INTO positions
         (id, opened_at, instrument_id, lifecycle, reservation_id, payload)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(
        position.id,
        position.openedAt,
        position.instrumentId,
        position.lifecycle,
        position.reservationId,
        JSON.stringify(position)
      );
  }

  getPosition(positionId: string): Position | null {
    const row = this.db
      .prepare<[string], { payload: string }>("SELECT payload FROM positions WHERE id = ?")
      .get(positionId);
    return row ? this.parsePosition(row.payload) : null;
  }

  listPositions(params?: { status?: "open" | "closed" | "all"; limit?: number }): Position[] {
    const limit = Math.max(1, Math.min(params?.limit ?? 100, 2_000));
    const status = params?.status ?? "all";
    const whereClause =
      status === "open" ? "WHERE lifecycle != 'CLOSED'" : status === "closed" ? "WHERE lifecycle = 'CLOSED'" : "";

    const rows = this.db
      .prepare<[number], { payload: string }>(
        `SELECT payload FROM positions ${whereClause} ORDER BY opened_at DESC LIMIT ?`
      )
      .all(limit);

    return rows
      .map((row) => this.parsePosition(row.payload))
      .filter((position): position is Position => position !== null);
  }

  setAppState(key: string, payload: unknown): void {
    this.db
      .prepare<[string, string, string]>(
        "INSERT OR REPLACE INTO app_state (key, payload, updated_at) VALUES (?, ?, ?)"
      )
      .run(key, JSON.stringify(payload), nowIso());
  }

  getAppState(key: string): unknown {
    const row = this.db
      .prepare<[string], { payload: string }>("SELECT payload FROM app_state WHERE key = ?")
      .get(key);
    if (!row) return null;

    try {
      const parsed: unknown = JSON.parse(row.payload);
      return parsed;
    } catch (error) {
      logger.warn(`Unreadable app state for ${key}`, error);
      return null;
    }
  }

  /**
   * Folds the risk journal of one session (the latest when no id is given) back into
   * counters and the reservations still holding a slot.
   */
  replaySession(sessionId?: string): SessionReplay | null {
    const starts = this.db
      .prepare<[], AuditRow>(
        `SELECT seq, id, timestamp, event_type, payload
         FROM audit_records
         WHERE event_type = 'risk_session_started'
         ORDER BY seq DESC`
      )
      .all();

    let startSeq = 0;
    let started: { sessionId: string; capital: number; startedAt: string } | null = null;
    for (const row of starts) {
      const parsed = sessionStartedEventSchema.safeParse(parsePayload(row.payload));
      if (!parsed.success) continue;
      if (sessionId && parsed.data.sessionId !== sessionId) continue;
      started = parsed.data;
      startSeq = row.seq;
      break;
    }
    if (!started) return null;

    const rows = this.db
      .prepare<[number, ...string[]], AuditRow>(
        `SELECT seq, id, timestamp, event_type, payload
         FROM audit_records
         WHERE seq > ? AND event_type IN (${REPLAY_EVENT_TYPES.map(() => "?").join(", ")})
         ORDER BY seq ASC`
      )
      .all(startSeq, ...REPLAY_EVENT_TYPES);

    const reservations = new Map<string, Reservation>();
    const carried = new Set<string>();
    let tradesToday = 0;
    let realizedPnl = 0;
    let sessionLoss = 0;

    for (const row of rows) {
      const payload = parsePayload(row.payload);
      if (payload.sessionId !== started.sessionId) continue;

      if (row.event_type === "risk_reserved") {
        const event = reservationEventSchema.safeParse(payload);
        if (!event.success) continue;
        reservations.set(event.data.reservation.id, { ...event.data.reservation });
        if (event.data.carried) carried.add(event.data.reservation.id);
        else tradesToday += 1;
      } else if (row.event_type === "risk_released") {
        const event = reservationTransitionEventSchema.safeParse(payload);
        if (!event.success) continue;
        if (reservations.delete(event.data.reservationId) && !carried.has(event.data.reservationId)) {
          tradesToday = Math.max(0, tradesToday - 1);
        }
      } else if (row.event_type === "risk_committed") {
        const event = reservationTransitionEventSchema.safeParse(payload);
        if (!event.success) continue;
        const reservation = reservations.get(event.data.reservationId);
        if (reservation) reservation.status = "COMMITTED";
      } else if (row.event_type === "risk_slot_closed") {
        const event = slotClosedEventSchema.safeParse(payload);
        if (!event.success) continue;
        reservations.delete(event.data.reservationId);
        realizedPnl += event.data.realizedPnl;
        if (event.data.realizedPnl < 0) sessionLoss += -event.data.realizedPnl;
      }
    }

    return {
      sessionId: started.sessionId,
      capital: started.capital,
      startedAt: started.startedAt,
      reservations: [...reservations.values()],
      carriedReservationIds: [...carried].filter((id) => reservations.has(id)),
      tradesToday,
      realizedPnl,
      sessionLoss
    };
  }

  private parsePosition(raw: string): Position | null {
    const parsed = positionSchema.safeParse(parsePayload(raw));
    if (!parsed.success) {
      logger.warn("Skipping unreadable position row", parsed.error.flatten());
      return null;
    }
    return parsed.data;
  }
}
