import Database from 'better-sqlite3';
import config from 'config';
import fs from 'node:fs';
import path from 'node:path';
import { isAlertLevel, type Alert, type AlertLevel } from './types.js';

type AlertRow = {
  id: number;
  alertId: number;
  message: string;
  level: string;
  ts: number;
  meta: string | null;
};

export type ArchivedAlert = {
  id: number;
  alertId: number;
  message: string;
  level: AlertLevel;
  timestamp: number;
  meta?: Record<string, unknown>;
};

export interface ListArchivedAlertsOptions {
  limit?: number;
  offset?: number;
  level?: AlertLevel;
  since?: number;
}

export interface PaginatedAlerts {
  alerts: ArchivedAlert[];
  total: number;
}

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

let db: Database.Database | null = null;

function resolveDatabasePath() {
  return config.has('dashboard.database.path')
    ? config.get<string>('dashboard.database.path')
    : 'data/dashboard.sqlite';
}

function open(): Database.Database {
  if (db) {
    return db;
  }
  const dbPath = resolveDatabasePath();
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }
  const connection = new Database(dbPath);
  connection.pragma('journal_mode = WAL');
  connection.exec(`
    CREATE TABLE IF NOT EXISTS alerts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      alert_id INTEGER NOT NULL,
      message TEXT NOT NULL,
      level TEXT NOT NULL,
      ts INTEGER NOT NULL,
      meta TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_alerts_ts ON alerts (ts DESC, id DESC);
  `);
  db = connection;
  return connection;
}

function clampLimit(limit?: number) {
  if (typeof limit !== 'number' || !Number.isFinite(limit) || limit <= 0) {
    return DEFAULT_LIMIT;
  }
  return Math.min(MAX_LIMIT, Math.floor(limit));
}

function clampOffset(offset?: number) {
  if (typeof offset !== 'number' || !Number.isFinite(offset) || offset < 0) {
    return 0;
  }
  return Math.floor(offset);
}

function parseMeta(raw: string | null): Record<string, unknown> | undefined {
  if (!raw) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return { ...parsed };
    }
  } catch {
    return undefined;
  }
  return undefined;
}

function mapRow(row: AlertRow): ArchivedAlert {
  const meta = parseMeta(row.meta);
  return {
    id: row.id,
    alertId: row.alertId,
    message: row.message,
    level: isAlertLevel(row.level) ? row.level : 'info',
    timestamp: row.ts,
    ...(meta ? { meta } : {})
  };
}

export function storeAlert(alert: Alert) {
  open()
    .prepare<{ alertId: number; message: string; level: string; ts: number; meta: string | null }>(
      'INSERT INTO alerts (alert_id, message, level, ts, meta) VALUES (@alertId, @message, @level, @ts, @meta)'
    )
    .run({
      alertId: alert.id,
      message: alert.message,
      level: alert.level,
      ts: alert.timestamp,
      meta: alert.meta ? JSON.stringify(alert.meta) : null
    });
}

export function listArchivedAlerts(options: ListArchivedAlertsOptions = {}): PaginatedAlerts {
  const connection = open();
  const filters: string[] = [];
  const params: { level?: string; since?: number } = {};

  if (options.level) {
    filters.push('level = @level');
    params.level = options.level;
  }

  if (typeof options.since === 'number') {
    filters.push('ts >= @since');
    params.since = options.since;
  }

  const whereClause = filters.length > 0 ? `WHERE ${filters.join(' AND ')}` : '';
  const limit = clampLimit(options.limit);
  const offset = clampOffset(options.offset);

  const rows = connection
    .prepare<typeof params & { limit: number; offset: number }, AlertRow>(
      `SELECT id, alert_id AS alertId, message, level, ts, meta
       FROM alerts
       ${whereClause}
       ORDER BY ts DESC, id DESC
       LIMIT @limit OFFSET @offset`
    )
    .all({ ...params, limit, offset });
  const totalRow = connection
    .prepare<typeof params, { count: number }>(`SELECT COUNT(*) AS count FROM alerts ${whereClause}`)
    .get(params);

  return {
    alerts: rows.map(row => mapRow(row)),
    total: totalRow?.count ?? 0
  };
}

export function clearArchivedAlerts() {
  open().prepare('DELETE FROM alerts').run();
}

export function closeDatabase() {
  if (db) {
    db.close();
    db = null;
  }
}
