/**
 * @file src/logger/audit.ts
 *
 * Append-only SQLite audit log of authorization decisions, unlock attempts and
 * wallet operations, for review from the wallet UI.
 *
 * The default location is ':memory:', so nothing outlives the process unless
 * an explicit path is configured.
 *
 * SECURITY: `details_json` must never contain passwords or session tokens.
 * sanitiseDetails() strips credential-bearing field names before serialisation.
 */

import Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';

// ── Types ─────────────────────────────────────────────────────────────────────

export const AUDIT_EVENT_TYPES = [
  'auth_requested',
  'auth_approved',
  'auth_denied',
  'auth_expired',
  'session_revoked',
  'session_expired',
  'unlock_succeeded',
  'unlock_failed',
  'unlock_rejected',
  'wallet_locked',
  'tx_submitted',
  'tx_failed',
  'message_signed',
  'token_added',
] as const;

export type AuditEventType = (typeof AUDIT_EVENT_TYPES)[number];

export interface AuditEvent {
  /** ISO 8601 timestamp. */
  ts: string;
  event: AuditEventType;
  /** DApp the event concerns, if any. */
  appName?: string | null;
  /** Caller address, e.g. the unlock source. */
  source?: string | null;
  requestId?: string | null;
  /** Arbitrary structured details, sanitised before storage. */
  details: Record<string, unknown>;
}

export interface AuditRow {
  id: number;
  ts: string;
  event: string;
  app_name: string | null;
  source: string | null;
  request_id: string | null;
  details_json: string;
}

export interface QueryOptions {
  event?: AuditEventType;
  appName?: string;
  requestId?: string;
  limit?: number;
  before?: string; // ISO timestamp
}

// ── Forbidden field names ─────────────────────────────────────────────────────

const FORBIDDEN_FIELD_PATTERNS = [
  /^password$/i,
  /^token$/i,
  /^session_?token$/i,
  /^admin_?token$/i,
  /^authorization$/i,
  /^secret_?key$/i,
  /^private_?key$/i,
];

// ── AuditDb class ─────────────────────────────────────────────────────────────

export class AuditDb {
  private db: InstanceType<typeof Database>;
  private insertStmt: ReturnType<InstanceType<typeof Database>['prepare']>;
  private closed = false;

  constructor(dbPath = ':memory:') {
    const inMemory = dbPath === ':memory:';
    if (!inMemory) {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    if (!inMemory) {
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
    }

    this.migrate();

    this.insertStmt = this.db.prepare(`
      INSERT INTO events (ts, event, app_name, source, request_id, details_json)
      VALUES (@ts, @event, @appName, @source, @requestId, @detailsJson)
    `);
  }

  // ── Schema migration ────────────────────────────────────────────────────────

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        id           INTEGER PRIMARY KEY AUTOINCREMENT,
        ts           TEXT    NOT NULL,
        event        TEXT    NOT NULL,
        app_name     TEXT,
        source       TEXT,
        request_id   TEXT,
        details_json TEXT    NOT NULL DEFAULT '{}'
      );

      CREATE INDEX IF NOT EXISTS idx_event ON events (event, ts);
      CREATE INDEX IF NOT EXISTS idx_app ON events (app_name, ts);
      CREATE INDEX IF NOT EXISTS idx_request ON events (request_id);
    `);
  }

  // ── Write ───────────────────────────────────────────────────────────────────

  insert(event: AuditEvent): void {
    if (this.closed) throw new Error('AuditDb: attempted write after close()');

    this.insertStmt.run({
      ts: event.ts,
      event: event.event,
      appName: event.appName ?? null,
      source: event.source ?? null,
      requestId: event.requestId ?? null,
      detailsJson: JSON.stringify(sanitiseDetails(event.details)),
    });
  }

  /** Convenience: insert with current timestamp. */
  log(
    eventType: AuditEventType,
    details: Record<string, unknown> = {},
    context: { appName?: string | null; source?: string | null; requestId?: string | null } = {},
  ): void {
    this.insert({
      ts: new Date().toISOString(),
      event: eventType,
      appName: context.appName ?? null,
      source: context.source ?? null,
      requestId: context.requestId ?? null,
      details,
    });
  }

  // ── Query ───────────────────────────────────────────────────────────────────

  /** Returns the most recent N events, newest first, optionally filtered. */
  query(opts: QueryOptions = {}): AuditRow[] {
    const { event, appName, requestId, limit = 50, before } = opts;

    const conditions: string[] = [];
    const params: Record<string, unknown> = {};

    if (event) { conditions.push('event = @event'); params['event'] = event; }
    if (appName) { conditions.push('app_name = @appName'); params['appName'] = appName; }
    if (requestId) { conditions.push('request_id = @requestId'); params['requestId'] = requestId; }
    if (before) { conditions.push('ts < @before'); params['before'] = before; }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    const sql = `SELECT * FROM events ${where} ORDER BY id DESC LIMIT @limit`;
    params['limit'] = limit;

    return this.db.prepare(sql).all(params) as AuditRow[];
  }

  /** Returns event counts grouped by event type. */
  summarise(): Array<{ event: string; count: number }> {
    return this.db
      .prepare('SELECT event, COUNT(*) as count FROM events GROUP BY event ORDER BY event')
      .all() as Array<{ event: string; count: number }>;
  }

  count(event?: AuditEventType): number {
    const row = (event
      ? this.db.prepare('SELECT COUNT(*) as n FROM events WHERE event = ?').get(event)
      : this.db.prepare('SELECT COUNT(*) as n FROM events').get()) as { n: number };
    return row.n;
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────────

  close(): void {
    if (this.closed) return;
    this.db.close();
    this.closed = true;
  }

  get isClosed(): boolean { return this.closed; }
}

// ── Sanitisation ──────────────────────────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Recursively removes any field whose name matches a credential pattern.
 * Returns a new object; the input is not mutated.
 */
export function sanitiseDetails(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (FORBIDDEN_FIELD_PATTERNS.some((re) => re.test(key))) {
      continue;
    }

    if (isPlainObject(value)) {
      result[key] = sanitiseDetails(value);
    } else if (Array.isArray(value)) {
      result[key] = value.map((item: unknown) => (isPlainObject(item) ? sanitiseDetails(item) : item));
    } else {
      result[key] = value;
    }
  }

  return result;
}
