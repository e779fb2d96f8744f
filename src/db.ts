import Database from 'better-sqlite3';
import config from 'config';
import fs from 'node:fs';
import path from 'node:path';
import type { EventRecord, EventSeverity } from './types.js';

const IN_MEMORY = ':memory:';

const dbPath = config.get<string>('database.path');
if (dbPath !== IN_MEMORY) {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
}

const db = new Database(dbPath);

export const databasePath = dbPath === IN_MEMORY ? IN_MEMORY : path.resolve(dbPath);

db.exec(`
  CREATE TABLE IF NOT EXISTS events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    ts INTEGER NOT NULL,
    source TEXT NOT NULL,
    detector TEXT NOT NULL,
    severity TEXT NOT NULL,
    message TEXT NOT NULL,
    meta TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_events_ts ON events (ts);
  CREATE INDEX IF NOT EXISTS idx_events_source_detector ON events (source, detector);
  CREATE INDEX IF NOT EXISTS idx_events_test ON events (json_extract(meta, '$.test'));
`);

type EventRow = {
  id: number;
  ts: number;
  source: string;
  detector: string;
  severity: string;
  message: string;
  meta: string | null;
};

type InsertParams = {
  ts: number;
  source: string;
  detector: string;
  severity: EventSeverity;
  message: string;
  meta: string | null;
};

const insertStatement = db.prepare<InsertParams>(
  'INSERT INTO events (ts, source, detector, severity, message, meta) VALUES (@ts, @source, @detector, @severity, @message, @meta)'
);

const deleteOlderThanStatement = db.prepare<{ cutoff: number }>('DELETE FROM events WHERE ts < @cutoff');

const getEventStatement = db.prepare<{ id: number }, EventRow>(
  'SELECT id, ts, source, detector, severity, message, meta FROM events WHERE id = @id'
);

export type EventRecordWithId = EventRecord & { id: number };

export interface ListEventsOptions {
  limit?: number;
  offset?: number;
  detector?: string;
  source?: string;
  severity?: EventSeverity;
  test?: string;
  since?: number;
  until?: number;
}

export interface PaginatedEvents {
  items: EventRecordWithId[];
  total: number;
}

/** Returns the new row id, or null when SQLite reports one past the safe integer range. */
export function storeEvent({ meta, ...fields }: EventRecord): number | null {
  const { lastInsertRowid } = insertStatement.run({ ...fields, meta: meta ? JSON.stringify(meta) : null });
  const id = Number(lastInsertRowid);
  return Number.isSafeInteger(id) ? id : null;
}

type FilterValue = string | number;

interface ColumnFilter {
  key: Exclude<keyof ListEventsOptions, 'limit' | 'offset'>;
  clause: string;
}

const COLUMN_FILTERS: readonly ColumnFilter[] = [
  { key: 'detector', clause: 'detector = @detector' },
  { key: 'source', clause: 'source = @source' },
  { key: 'severity', clause: 'severity = @severity' },
  { key: 'test', clause: "json_extract(meta, '$.test') = @test" },
  { key: 'since', clause: 'ts >= @since' },
  { key: 'until', clause: 'ts <= @until' }
];

function buildWhere(options: ListEventsOptions) {
  const clauses: string[] = [];
  const params: Record<string, FilterValue> = {};
  for (const { key, clause } of COLUMN_FILTERS) {
    const value = options[key];
    // empty strings mean "no filter", zero timestamps do not
    if (value === undefined || value === '') {
      continue;
    }
    clauses.push(clause);
    params[key] = value;
  }
  return { sql: clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '', params };
}

/** Newest results first; `total` counts every match regardless of paging. */
export function listEvents(options: ListEventsOptions = {}): PaginatedEvents {
  const where = buildWhere(options);
  const rows = db
    .prepare<Record<string, FilterValue>, EventRow>(
      `SELECT id, ts, source, detector, severity, message, meta FROM events ${where.sql}
       ORDER BY ts DESC, id DESC LIMIT @limit OFFSET @offset`
    )
    .all({ ...where.params, limit: clampLimit(options.limit), offset: clampOffset(options.offset) });
  const counted = db
    .prepare<Record<string, FilterValue>, { count: number }>(`SELECT COUNT(*) AS count FROM events ${where.sql}`)
    .get(where.params);

  return { items: rows.map(fromRow), total: counted?.count ?? 0 };
}

export function getEventById(id: number): EventRecordWithId | null {
  const row = getEventStatement.get({ id });
  return row ? fromRow(row) : null;
}

export function clearEvents() {
  db.prepare('DELETE FROM events').run();
}

export function pruneEventsOlderThan(cutoffTs: number): number {
  return deleteOlderThanStatement.run({ cutoff: cutoffTs }).changes;
}

function fromRow({ severity, meta, ...rest }: EventRow): EventRecordWithId {
  return { ...rest, severity: toSeverity(severity), meta: meta === null ? undefined : parseMeta(meta) };
}

function toSeverity(value: string): EventSeverity {
  return value === 'critical' || value === 'warning' ? value : 'info';
}

function parseMeta(raw: string): Record<string, unknown> | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(parsed));
}

function clampLimit(limit?: number) {
  if (typeof limit !== 'number' || !Number.isFinite(limit)) {
    return 100;
  }
  return Math.min(Math.max(Math.floor(limit), 1), 1000);
}

function clampOffset(offset?: number) {
  if (typeof offset !== 'number' || !Number.isFinite(offset)) {
    return 0;
  }
  return Math.max(Math.floor(offset), 0);
}

export default db;
