import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type {
  AuditFilters,
  AuditKind,
  AuditRecord,
  CausalEvent,
  ChainStats,
  ChainVerificationResult,
  EventFilters,
  NewAuditRecord,
} from "../types.js";
import { AUDIT_KINDS } from "../types.js";
import type { EventDraft, EventStoreAdapter } from "./types.js";
import { computeEventHash } from "../hashing.js";
import { computeStats, verifyEvents } from "./chain-integrity.js";

export class SqliteAdapter implements EventStoreAdapter {
  private db: Database.Database;
  private sequence = 0;

  constructor(dbPath: string = "causeway.sqlite") {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(resolve(dbPath)), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.initialize();
  }

  // --- Schema ---

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        sequence       INTEGER PRIMARY KEY,
        action_id      TEXT    NOT NULL UNIQUE,
        agent_id       TEXT    NOT NULL,
        scope          TEXT    NOT NULL,
        event_type     TEXT    NOT NULL,
        nonce          INTEGER NOT NULL,
        timestamp      INTEGER NOT NULL,
        payload_digest TEXT    NOT NULL,
        value          REAL,
        recipient      TEXT,
        prev_hash      TEXT,
        event_hash     TEXT    NOT NULL UNIQUE
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS audit (
        id        INTEGER PRIMARY KEY AUTOINCREMENT,
        action_id TEXT    NOT NULL,
        agent_id  TEXT    NOT NULL,
        scope     TEXT    NOT NULL,
        kind      TEXT    NOT NULL,
        detail    TEXT    NOT NULL,
        timestamp INTEGER NOT NULL
      )
    `);

    this.db.exec(
      "CREATE INDEX IF NOT EXISTS idx_events_scope ON events(scope, sequence)"
    );
    this.db.exec(
      "CREATE INDEX IF NOT EXISTS idx_events_agent ON events(agent_id)"
    );
    this.db.exec(
      "CREATE INDEX IF NOT EXISTS idx_audit_action ON audit(action_id)"
    );

    // Restore state from existing chain
    const last = this.db
      .prepare("SELECT MAX(sequence) AS sequence FROM events")
      .get() as { sequence: number | null } | undefined;

    this.sequence = last?.sequence ?? 0;
  }

  // --- Append ---

  async appendEvent(draft: EventDraft): Promise<CausalEvent> {
    const tail = this.getScopeTail(draft.scope);
    const nextSequence = this.sequence + 1;

    const eventData = {
      ...draft,
      sequence: nextSequence,
      prev_hash: tail ? tail.event_hash : null,
    };
    const event: CausalEvent = {
      ...eventData,
      event_hash: computeEventHash(eventData),
    };

    this.db
      .prepare(
        `INSERT INTO events (
          sequence, action_id, agent_id, scope, event_type,
          nonce, timestamp, payload_digest, value, recipient,
          prev_hash, event_hash
        ) VALUES (
          @sequence, @action_id, @agent_id, @scope, @event_type,
          @nonce, @timestamp, @payload_digest, @value, @recipient,
          @prev_hash, @event_hash
        )`
      )
      .run({
        sequence: event.sequence,
        action_id: event.action_id,
        agent_id: event.agent_id,
        scope: event.scope,
        event_type: event.event_type,
        nonce: event.nonce,
        timestamp: event.timestamp,
        payload_digest: event.payload_digest,
        value: event.value ?? null,
        recipient: event.recipient ?? null,
        prev_hash: event.prev_hash,
        event_hash: event.event_hash,
      });

    this.sequence = nextSequence;
    return event;
  }

  async appendAudit(record: NewAuditRecord): Promise<AuditRecord> {
    const info = this.db
      .prepare(
        `INSERT INTO audit (action_id, agent_id, scope, kind, detail, timestamp)
         VALUES (@action_id, @agent_id, @scope, @kind, @detail, @timestamp)`
      )
      .run({
        action_id: record.action_id,
        agent_id: record.agent_id,
        scope: record.scope,
        kind: record.kind,
        detail: JSON.stringify(record.detail),
        timestamp: record.timestamp,
      });

    return { ...record, id: Number(info.lastInsertRowid) };
  }

  // --- Verify ---

  async verifyChain(): Promise<ChainVerificationResult> {
    const rows = this.db
      .prepare("SELECT * FROM events ORDER BY sequence ASC")
      .all() as RawEventRow[];
    const events = rows.map(rowToEvent);
    return verifyEvents(events, this.statsFor(events));
  }

  // --- Queries ---

  getScopeTail(scope: string): CausalEvent | null {
    const row = this.db
      .prepare(
        "SELECT * FROM events WHERE scope = ? ORDER BY sequence DESC LIMIT 1"
      )
      .get(scope) as RawEventRow | undefined;
    return row ? rowToEvent(row) : null;
  }

  getChain(scope: string, beforeSequence?: number): CausalEvent[] {
    const rows =
      beforeSequence === undefined
        ? (this.db
            .prepare("SELECT * FROM events WHERE scope = ? ORDER BY sequence ASC")
            .all(scope) as RawEventRow[])
        : (this.db
            .prepare(
              "SELECT * FROM events WHERE scope = ? AND sequence < ? ORDER BY sequence ASC"
            )
            .all(scope, beforeSequence) as RawEventRow[]);
    return rows.map(rowToEvent);
  }

  getEvents(filters?: EventFilters): CausalEvent[] {
    let sql = "SELECT * FROM events WHERE 1=1";
    const params: Record<string, string | number> = {};

    if (filters?.scope) {
      sql += " AND scope = @scope";
      params.scope = filters.scope;
    }
    if (filters?.agent_id) {
      sql += " AND agent_id = @agent_id";
      params.agent_id = filters.agent_id;
    }
    if (filters?.event_type) {
      sql += " AND event_type = @event_type";
      params.event_type = filters.event_type;
    }
    if (filters?.before_sequence !== undefined) {
      sql += " AND sequence < @before_sequence";
      params.before_sequence = filters.before_sequence;
    }

    sql += " ORDER BY sequence DESC";

    if (filters?.limit) {
      sql += " LIMIT @limit";
      params.limit = filters.limit;
    }
    if (filters?.offset) {
      if (!filters.limit) sql += " LIMIT -1";
      sql += " OFFSET @offset";
      params.offset = filters.offset;
    }

    const rows = this.db.prepare(sql).all(params) as RawEventRow[];
    return rows.map(rowToEvent);
  }

  getEventByActionId(actionId: string): CausalEvent | null {
    const row = this.db
      .prepare("SELECT * FROM events WHERE action_id = ?")
      .get(actionId) as RawEventRow | undefined;
    return row ? rowToEvent(row) : null;
  }

  getEventBySequence(sequence: number): CausalEvent | null {
    const row = this.db
      .prepare("SELECT * FROM events WHERE sequence = ?")
      .get(sequence) as RawEventRow | undefined;
    return row ? rowToEvent(row) : null;
  }

  getAuditRecords(filters?: AuditFilters): AuditRecord[] {
    let sql = "SELECT * FROM audit WHERE 1=1";
    const params: Record<string, string | number> = {};

    if (filters?.action_id) {
      sql += " AND action_id = @action_id";
      params.action_id = filters.action_id;
    }
    if (filters?.agent_id) {
      sql += " AND agent_id = @agent_id";
      params.agent_id = filters.agent_id;
    }
    if (filters?.kind) {
      sql += " AND kind = @kind";
      params.kind = filters.kind;
    }

    sql += " ORDER BY id DESC";

    if (filters?.limit) {
      sql += " LIMIT @limit";
      params.limit = filters.limit;
    }

    const rows = this.db.prepare(sql).all(params) as RawAuditRow[];
    return rows.map(rowToAudit);
  }

  getChainStats(): ChainStats {
    const rows = this.db
      .prepare("SELECT * FROM events ORDER BY sequence ASC")
      .all() as RawEventRow[];
    return this.statsFor(rows.map(rowToEvent));
  }

  getEventCount(): number {
    const result = this.db
      .prepare("SELECT COUNT(*) AS count FROM events")
      .get() as { count: number };
    return result.count;
  }

  getLastSequence(): number {
    return this.sequence;
  }

  close(): void {
    this.db.close();
  }

  private statsFor(events: CausalEvent[]): ChainStats {
    const auditRows = this.db
      .prepare("SELECT * FROM audit ORDER BY id ASC")
      .all() as RawAuditRow[];
    return computeStats(events, auditRows.map(rowToAudit));
  }
}

// --- Row <-> Record conversion ---

interface RawEventRow {
  sequence: number;
  action_id: string;
  agent_id: string;
  scope: string;
  event_type: string;
  nonce: number;
  timestamp: number;
  payload_digest: string;
  value: number | null;
  recipient: string | null;
  prev_hash: string | null;
  event_hash: string;
}

interface RawAuditRow {
  id: number;
  action_id: string;
  agent_id: string;
  scope: string;
  kind: string;
  detail: string;
  timestamp: number;
}

function rowToEvent(row: RawEventRow): CausalEvent {
  const event: CausalEvent = {
    sequence: row.sequence,
    action_id: row.action_id,
    agent_id: row.agent_id,
    scope: row.scope,
    event_type: row.event_type,
    nonce: row.nonce,
    timestamp: row.timestamp,
    payload_digest: row.payload_digest,
    prev_hash: row.prev_hash,
    event_hash: row.event_hash,
  };
  if (row.value !== null) event.value = row.value;
  if (row.recipient !== null) event.recipient = row.recipient;
  return event;
}

function rowToAudit(row: RawAuditRow): AuditRecord {
  return {
    id: row.id,
    action_id: row.action_id,
    agent_id: row.agent_id,
    scope: row.scope,
    kind: toAuditKind(row.kind),
    detail: JSON.parse(row.detail) as Record<string, unknown>,
    timestamp: row.timestamp,
  };
}

function toAuditKind(value: string): AuditKind {
  const kind = AUDIT_KINDS.find((k) => k === value);
  if (!kind) throw new Error(`Unknown audit kind '${value}' in store`);
  return kind;
}
