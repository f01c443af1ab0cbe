import Database from 'better-sqlite3';

export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS tasks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      type TEXT NOT NULL,
      priority INTEGER NOT NULL DEFAULT 5,
      payload TEXT NOT NULL,
      constraints TEXT,
      region TEXT,
      status TEXT NOT NULL DEFAULT 'queued',
      attempts INTEGER NOT NULL DEFAULT 0,
      max_attempts INTEGER NOT NULL DEFAULT 3,
      not_before TEXT NOT NULL,
      lease_expires_at TEXT,
      claimed_by TEXT,
      claimed_at TEXT,
      result TEXT,
      error TEXT,
      idempotency_key TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      completed_at TEXT,
      CHECK (priority BETWEEN 1 AND 10),
      CHECK (attempts <= max_attempts),
      CHECK (status IN ('queued', 'processing', 'completed', 'failed', 'cancelled'))
    );

    CREATE TABLE IF NOT EXISTS workers (
      worker_id TEXT PRIMARY KEY,
      capabilities TEXT NOT NULL DEFAULT '{}',
      strategy TEXT,
      tasks_processed INTEGER NOT NULL DEFAULT 0,
      tasks_failed INTEGER NOT NULL DEFAULT 0,
      current_task_id INTEGER,
      started_at TEXT NOT NULL,
      last_heartbeat_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS task_logs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      task_id INTEGER NOT NULL REFERENCES tasks(id),
      worker_id TEXT,
      level TEXT NOT NULL,
      event TEXT,
      message TEXT NOT NULL,
      detail TEXT,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_tasks_claiming ON tasks(status, not_before, priority, created_at);
    CREATE INDEX IF NOT EXISTS idx_tasks_type_status ON tasks(type, status);
    CREATE UNIQUE INDEX IF NOT EXISTS idx_tasks_idempotency ON tasks(idempotency_key);
    CREATE INDEX IF NOT EXISTS idx_tasks_region ON tasks(region, status);
    CREATE INDEX IF NOT EXISTS idx_tasks_lease ON tasks(status, lease_expires_at);
    CREATE INDEX IF NOT EXISTS idx_task_logs_task ON task_logs(task_id, created_at);
    CREATE INDEX IF NOT EXISTS idx_workers_heartbeat ON workers(last_heartbeat_at);
  `);
}
