// src/results/store.ts
// Deduplicating sink for handler output, keyed by (source, external_id).
import type Database from 'better-sqlite3';
import type { JsonObject } from '../queue/types.js';

export interface ResultRow {
  id: number;
  source: string;
  external_id: string;
  task_id: number | null;
  record: string;
  created_at: string;
}

export interface ResultRecord {
  id: number;
  source: string;
  externalId: string;
  taskId: number | null;
  record: JsonObject;
  createdAt: string;
}

export interface SaveResult {
  id: number;
  inserted: boolean;
}

export interface ResultQuery {
  since?: Date;
  until?: Date;
  limit?: number;
}

function toRecord(row: ResultRow): ResultRecord {
  const record: unknown = JSON.parse(row.record);
  return {
    id: row.id,
    source: row.source,
    externalId: row.external_id,
    taskId: row.task_id,
    record: typeof record === 'object' && record !== null && !Array.isArray(record) ? { ...record } : { value: record },
    createdAt: row.created_at,
  };
}

export class ResultStore {
  private db: Database.Database;
  private clock: () => number;

  constructor(db: Database.Database, clock: () => number = Date.now) {
    this.db = db;
    this.clock = clock;
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS results (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        source TEXT NOT NULL,
        external_id TEXT NOT NULL,
        task_id INTEGER,
        record TEXT NOT NULL,
        created_at TEXT NOT NULL,
        UNIQUE (source, external_id)
      );

      CREATE INDEX IF NOT EXISTS idx_results_source_created ON results(source, created_at);
    `);
  }

  /** Stores `record` unless the pair is already present; returns the stored id either way. */
  save(source: string, externalId: string, record: JsonObject, taskId?: number): number {
    return this.saveWithStatus(source, externalId, record, taskId).id;
  }

  saveWithStatus(source: string, externalId: string, record: JsonObject, taskId?: number): SaveResult {
    const info = this.db.prepare(
      `INSERT INTO results (source, external_id, task_id, record, created_at)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(source, external_id) DO NOTHING`
    ).run(source, externalId, taskId ?? null, JSON.stringify(record), new Date(this.clock()).toISOString());

    if (info.changes > 0) {
      return { id: Number(info.lastInsertRowid), inserted: true };
    }

    const existing = this.db
      .prepare<[string, string], { id: number }>('SELECT id FROM results WHERE source = ? AND external_id = ?')
      .get(source, externalId);
    if (!existing) {
      throw new Error(`Result ${source}/${externalId} conflicted but could not be read back`);
    }
    return { id: existing.id, inserted: false };
  }

  get(source: string, externalId: string): ResultRecord | null {
    const row = this.db
      .prepare<[string, string], ResultRow>('SELECT * FROM results WHERE source = ? AND external_id = ?')
      .get(source, externalId);
    return row ? toRecord(row) : null;
  }

  query(source: string, range: ResultQuery = {}): ResultRecord[] {
    const conditions = ['source = ?'];
    const values: unknown[] = [source];

    if (range.since) {
      conditions.push('created_at >= ?');
      values.push(range.since.toISOString());
    }
    if (range.until) {
      conditions.push('created_at < ?');
      values.push(range.until.toISOString());
    }
    values.push(range.limit ?? 1000);

    return this.db
      .prepare<unknown[], ResultRow>(
        `SELECT * FROM results WHERE ${conditions.join(' AND ')} ORDER BY created_at ASC, id ASC LIMIT ?`
      )
      .all(...values)
      .map(toRecord);
  }

  count(source?: string): number {
    const row = source
      ? this.db.prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM results WHERE source = ?').get(source)
      : this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM results').get();
    return row?.count ?? 0;
  }
}
