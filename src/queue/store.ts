// src/queue/store.ts
import Database, { type Database as DatabaseType } from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { Logger } from 'winston';
import { z } from 'zod';
import { NotFoundError, StoreBusyError, ValidationError } from '../errors.js';
import { runMigrations } from './migrations.js';
import { matchesCapabilities, type SchedulingStrategy } from './strategies.js';
import {
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_PRIORITY,
  MAX_PRIORITY,
  MIN_PRIORITY,
  type Capabilities,
  type ClaimOptions,
  type EnqueueParams,
  type EnqueueResult,
  type FailTaskParams,
  type FailTaskResult,
  type JsonObject,
  type ListTasksFilter,
  type QueueStats,
  type TaskEventType,
  type TaskLogLevel,
  type TaskLogRecord,
  type TaskRecord,
  type TaskStatus,
  type TaskStatusView,
  type WorkerHeartbeat,
  type WorkerRecord,
} from './types.js';

export interface QueueStoreConfig {
  /** SQLite file on local disk, or ':memory:'. */
  path: string;
  logger: Logger;
  /** Bounded wait on a locked file before StoreBusyError surfaces. */
  busyTimeoutMs?: number;
  clock?: () => number;
}

export interface AppendLogOptions {
  event?: TaskEventType;
  workerId?: string;
  detail?: JsonObject;
}

const enqueueSchema = z.object({
  type: z.string().min(1, 'task type is required'),
  payload: z.record(z.unknown()),
  priority: z.number().int().min(MIN_PRIORITY).max(MAX_PRIORITY).default(DEFAULT_PRIORITY),
  notBefore: z.date().optional(),
  idempotencyKey: z.string().min(1).optional(),
  maxAttempts: z.number().int().min(1).max(100).default(DEFAULT_MAX_ATTEMPTS),
  constraints: z.record(z.unknown()).optional(),
});

type ParsedEnqueue = z.infer<typeof enqueueSchema>;

interface ClaimantRow {
  id: number;
  claimed_by: string | null;
}

function iso(ms: number): string {
  return new Date(ms).toISOString();
}

function isBusyError(err: unknown): boolean {
  return err instanceof Database.SqliteError && /^SQLITE_(BUSY|LOCKED)/.test(err.code);
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJsonObject(text: string | null): JsonObject | null {
  if (text === null) return null;
  const value: unknown = JSON.parse(text);
  return isJsonObject(value) ? value : null;
}

function serialize(field: string, value: JsonObject): string {
  try {
    return JSON.stringify(value);
  } catch (err) {
    throw new ValidationError(`${field} is not serializable`, [
      `${field}: ${err instanceof Error ? err.message : String(err)}`,
    ]);
  }
}

function deriveRegion(payload: JsonObject, constraints: JsonObject | undefined): string | null {
  const region = payload.region ?? constraints?.region;
  return typeof region === 'string' ? region : null;
}

function* compatible(rows: Iterable<TaskRecord>, capabilities: Capabilities): Generator<TaskRecord> {
  for (const row of rows) {
    if (matchesCapabilities(parseJsonObject(row.constraints), capabilities)) {
      yield row;
    }
  }
}

export class QueueStore {
  private db: DatabaseType;
  private logger: Logger;
  private clock: () => number;
  private dbPath: string;

  constructor(config: QueueStoreConfig) {
    this.logger = config.logger;
    this.clock = config.clock ?? Date.now;
    this.dbPath = config.path;

    if (config.path !== ':memory:') {
      fs.mkdirSync(path.dirname(config.path), { recursive: true });
    }

    this.db = new Database(config.path, { timeout: config.busyTimeoutMs ?? 5000 });

    // WAL lets readers proceed while a single writer holds the reserved lock
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('temp_store = MEMORY');

    runMigrations(this.db);

    this.logger.info('QueueStore opened', { path: this.dbPath });
  }

  getDatabase(): DatabaseType {
    return this.db;
  }

  close(): void {
    this.db.close();
  }

  private now(): number {
    return this.clock();
  }

  /** Maps lock contention that outlived the busy timeout to StoreBusyError. */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (isBusyError(err)) {
        this.logger.warn('Queue store busy', { operation });
        throw new StoreBusyError(operation, err);
      }
      throw err;
    }
  }

  private insertLog(
    taskId: number,
    level: TaskLogLevel,
    event: TaskEventType | null,
    message: string,
    workerId: string | null,
    detail: JsonObject | null,
  ): void {
    this.db.prepare(
      `INSERT INTO task_logs (task_id, worker_id, level, event, message, detail, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`
    ).run(taskId, workerId, level, event, message, detail ? JSON.stringify(detail) : null, iso(this.now()));
  }

  private getRow(taskId: number): TaskRecord | undefined {
    return this.db.prepare<[number], TaskRecord>('SELECT * FROM tasks WHERE id = ?').get(taskId);
  }

  // ── Producer API ────────────────────────────────────────────────

  enqueue(params: EnqueueParams): number {
    return this.enqueueWithStatus(params).taskId;
  }

  /**
   * Inserts a queued task. A known idempotency key returns the existing task
   * id, whatever its status, and writes nothing.
   */
  enqueueWithStatus(params: EnqueueParams): EnqueueResult {
    const parsed = enqueueSchema.safeParse(params);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new ValidationError(`Invalid enqueue request: ${issues.join('; ')}`, issues);
    }
    const p: ParsedEnqueue = parsed.data;
    const payload = serialize('payload', p.payload);
    const constraints = p.constraints ? serialize('constraints', p.constraints) : null;

    const insert = this.db.transaction((): EnqueueResult => {
      if (p.idempotencyKey !== undefined) {
        const existing = this.db
          .prepare<[string], { id: number }>('SELECT id FROM tasks WHERE idempotency_key = ?')
          .get(p.idempotencyKey);
        if (existing) return { taskId: existing.id, created: false };
      }

      const now = this.now();
      const info = this.db.prepare(
        `INSERT INTO tasks (
           type, priority, payload, constraints, region, status, attempts, max_attempts,
           not_before, idempotency_key, created_at, updated_at
         ) VALUES (
           @type, @priority, @payload, @constraints, @region, 'queued', 0, @max_attempts,
           @not_before, @idempotency_key, @created_at, @updated_at
         )`
      ).run({
        type: p.type,
        priority: p.priority,
        payload,
        constraints,
        region: deriveRegion(p.payload, p.constraints),
        max_attempts: p.maxAttempts,
        not_before: iso(p.notBefore ? p.notBefore.getTime() : now),
        idempotency_key: p.idempotencyKey ?? null,
        created_at: iso(now),
        updated_at: iso(now),
      });

      const taskId = Number(info.lastInsertRowid);
      this.insertLog(taskId, 'info', 'enqueued', `Task enqueued (type: ${p.type}, priority: ${p.priority})`, null, null);
      return { taskId, created: true };
    });

    const result = this.guard('enqueue', () => insert.immediate());
    if (result.created) {
      this.logger.debug('Task enqueued', { taskId: result.taskId, type: p.type });
    } else {
      this.logger.debug('Duplicate enqueue ignored', { taskId: result.taskId, idempotencyKey: p.idempotencyKey });
    }
    return result;
  }

  getTask(taskId: number): TaskRecord | null {
    return this.guard('getTask', () => this.getRow(taskId) ?? null);
  }

  getStatus(taskId: number): TaskStatusView | null {
    const task = this.getTask(taskId);
    if (!task) return null;

    const view: TaskStatusView = { status: task.status, attempts: task.attempts };
    if (task.result !== null) view.result = JSON.parse(task.result);
    if (task.error !== null) view.error = task.error;
    return view;
  }

  /** Only a queued task can be cancelled. */
  cancel(taskId: number): boolean {
    const cancel = this.db.transaction((): boolean => {
      const nowIso = iso(this.now());
      const info = this.db.prepare(
        `UPDATE tasks
         SET status = 'cancelled', completed_at = ?, updated_at = ?
         WHERE id = ? AND status = 'queued'`
      ).run(nowIso, nowIso, taskId);
      if (info.changes === 0) return false;
      this.insertLog(taskId, 'info', 'cancelled', 'Task cancelled', null, null);
      return true;
    });
    return this.guard('cancel', () => cancel.immediate());
  }

  listTasks(filter: ListTasksFilter = {}): TaskRecord[] {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (filter.type) {
      conditions.push('type = ?');
      values.push(filter.type);
    }
    if (filter.status) {
      conditions.push('status = ?');
      values.push(filter.status);
    }
    if (filter.region) {
      conditions.push('region = ?');
      values.push(filter.region);
    }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    values.push(filter.limit ?? 50, filter.offset ?? 0);

    return this.guard('listTasks', () =>
      this.db
        .prepare<unknown[], TaskRecord>(`SELECT * FROM tasks ${where} ORDER BY id DESC LIMIT ? OFFSET ?`)
        .all(...values)
    );
  }

  // ── Task logs ───────────────────────────────────────────────────

  appendLog(taskId: number, level: TaskLogLevel, message: string, options: AppendLogOptions = {}): void {
    this.guard('appendLog', () => {
      if (!this.getRow(taskId)) throw new NotFoundError('Task', taskId);
      this.insertLog(taskId, level, options.event ?? null, message, options.workerId ?? null, options.detail ?? null);
    });
  }

  getTaskLogs(taskId: number): TaskLogRecord[] {
    return this.guard('getTaskLogs', () =>
      this.db
        .prepare<[number], TaskLogRecord>('SELECT * FROM task_logs WHERE task_id = ? ORDER BY created_at ASC, id ASC')
        .all(taskId)
    );
  }

  // ── Workers ─────────────────────────────────────────────────────

  upsertWorker(workerId: string, capabilities: Capabilities, options: { strategy?: string } = {}): void {
    const nowIso = iso(this.now());
    this.guard('upsertWorker', () =>
      this.db.prepare(
        `INSERT INTO workers (worker_id, capabilities, strategy, started_at, last_heartbeat_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(worker_id) DO UPDATE SET
           capabilities = excluded.capabilities,
           strategy = COALESCE(excluded.strategy, workers.strategy),
           last_heartbeat_at = excluded.last_heartbeat_at`
      ).run(workerId, serialize('capabilities', capabilities), options.strategy ?? null, nowIso, nowIso)
    );
  }

  recordHeartbeat(workerId: string, heartbeat: WorkerHeartbeat): void {
    const nowIso = iso(this.now());
    this.guard('recordHeartbeat', () =>
      this.db.prepare(
        `INSERT INTO workers (worker_id, tasks_processed, tasks_failed, current_task_id, started_at, last_heartbeat_at)
         VALUES (@worker_id, @tasks_processed, @tasks_failed, @current_task_id, @now, @now)
         ON CONFLICT(worker_id) DO UPDATE SET
           tasks_processed = excluded.tasks_processed,
           tasks_failed = excluded.tasks_failed,
           current_task_id = excluded.current_task_id,
           last_heartbeat_at = excluded.last_heartbeat_at`
      ).run({
        worker_id: workerId,
        tasks_processed: heartbeat.tasksProcessed,
        tasks_failed: heartbeat.tasksFailed,
        current_task_id: heartbeat.currentTaskId,
        now: nowIso,
      })
    );
  }

  getWorker(workerId: string): WorkerRecord | null {
    return this.guard('getWorker', () =>
      this.db.prepare<[string], WorkerRecord>('SELECT * FROM workers WHERE worker_id = ?').get(workerId) ?? null
    );
  }

  listWorkers(): WorkerRecord[] {
    return this.guard('listWorkers', () =>
      this.db.prepare<[], WorkerRecord>('SELECT * FROM workers ORDER BY worker_id').all()
    );
  }

  // ── Worker API ──────────────────────────────────────────────────

  /**
   * Selects the next eligible task per `strategy` and marks it processing
   * under `workerId`, inside one IMMEDIATE transaction. Two claimants can never
   * observe the same row as next.
   */
  claimNext(
    workerId: string,
    capabilities: Capabilities,
    strategy: SchedulingStrategy,
    options: ClaimOptions,
  ): TaskRecord | null {
    const types = options.types;
    if (types && types.length === 0) return null;

    const claim = this.db.transaction((): TaskRecord | null => {
      const now = this.now();
      const nowIso = iso(now);
      const typeFilter = types ? ` AND type IN (${types.map(() => '?').join(', ')})` : '';

      const eligible = this.db
        .prepare<unknown[], TaskRecord>(
          `SELECT * FROM tasks
           WHERE status = 'queued' AND not_before <= ?${typeFilter}
           ORDER BY ${strategy.orderBy}`
        )
        .iterate(nowIso, ...(types ?? []));

      const picked = strategy.choose(compatible(eligible, capabilities));
      if (!picked) return null;

      const leaseExpiresAt = iso(now + options.leaseMs);
      this.db.prepare(
        `UPDATE tasks
         SET status = 'processing', claimed_by = ?, claimed_at = ?, lease_expires_at = ?, updated_at = ?
         WHERE id = ? AND status = 'queued'`
      ).run(workerId, nowIso, leaseExpiresAt, nowIso, picked.id);

      this.insertLog(
        picked.id, 'info', 'claimed', `Task claimed by ${workerId} using ${strategy.name}`,
        workerId, { leaseExpiresAt },
      );
      return this.getRow(picked.id) ?? null;
    });

    const task = this.guard('claimNext', () => claim.immediate());
    if (task) {
      this.logger.debug('Task claimed', { taskId: task.id, workerId, strategy: strategy.name });
    }
    return task;
  }

  /**
   * Extends the lease of a task held by `workerId`. With `maxHoldMs` the lease
   * never reaches past `claimed_at + maxHoldMs`, so a hung handler still
   * loses the task. Returns false when the task is no longer held.
   */
  renewLease(taskId: number, workerId: string, leaseMs: number, maxHoldMs?: number): boolean {
    const renew = this.db.transaction((): boolean => {
      const row = this.getRow(taskId);
      if (!row || row.status !== 'processing' || row.claimed_by !== workerId) return false;

      const now = this.now();
      let expiresAt = now + leaseMs;
      if (maxHoldMs !== undefined && row.claimed_at) {
        const holdLimit = Date.parse(row.claimed_at) + maxHoldMs;
        if (holdLimit < expiresAt) {
          expiresAt = holdLimit;
          this.logger.warn('Lease renewal capped at max hold time', {
            taskId, workerId, leaseExpiresAt: iso(expiresAt),
          });
        }
      }

      this.db.prepare(
        'UPDATE tasks SET lease_expires_at = ?, updated_at = ? WHERE id = ?'
      ).run(iso(expiresAt), iso(now), taskId);
      return true;
    });
    return this.guard('renewLease', () => renew.immediate());
  }

  /** Returns false when the task is no longer processing under `workerId`. */
  completeTask(taskId: number, workerId: string, result: JsonObject): boolean {
    const complete = this.db.transaction((): boolean => {
      const nowIso = iso(this.now());
      const info = this.db.prepare(
        `UPDATE tasks
         SET status = 'completed', result = ?, error = NULL, lease_expires_at = NULL,
             completed_at = ?, updated_at = ?
         WHERE id = ? AND status = 'processing' AND claimed_by = ?`
      ).run(JSON.stringify(result), nowIso, nowIso, taskId, workerId);
      if (info.changes === 0) return false;
      this.insertLog(taskId, 'info', 'completed', 'Task completed', workerId, result);
      return true;
    });
    return this.guard('completeTask', () => complete.immediate());
  }

  /**
   * Records a failed attempt. The task returns to the queue after
   * `retryDelayMs` while attempts remain, otherwise it fails for good.
   */
  failTask(taskId: number, workerId: string, params: FailTaskParams): FailTaskResult {
    const fail = this.db.transaction((): FailTaskResult => {
      const row = this.getRow(taskId);
      if (!row || row.status !== 'processing' || row.claimed_by !== workerId) {
        return { state: 'lost' };
      }

      const now = this.now();
      const nowIso = iso(now);
      const attempts = row.attempts + 1;

      if (!params.retryable || attempts >= row.max_attempts) {
        this.db.prepare(
          `UPDATE tasks
           SET status = 'failed', attempts = ?, error = ?, lease_expires_at = NULL,
               completed_at = ?, updated_at = ?
           WHERE id = ?`
        ).run(attempts, params.error, nowIso, nowIso, taskId);
        this.insertLog(
          taskId, 'error', 'failed', `Task failed after ${attempts} attempt(s): ${params.error}`,
          workerId, { attempts, retryable: params.retryable },
        );
        return { state: 'failed', attempts };
      }

      const notBefore = iso(now + params.retryDelayMs);
      this.db.prepare(
        `UPDATE tasks
         SET status = 'queued', attempts = ?, error = ?, not_before = ?,
             claimed_by = NULL, claimed_at = NULL, lease_expires_at = NULL, updated_at = ?
         WHERE id = ?`
      ).run(attempts, params.error, notBefore, nowIso, taskId);
      this.insertLog(
        taskId, 'warn', 'retried', `Task retry scheduled (attempt ${attempts}/${row.max_attempts}): ${params.error}`,
        workerId, { attempts, notBefore, retryDelayMs: params.retryDelayMs },
      );
      return { state: 'retrying', attempts, notBefore };
    });
    return this.guard('failTask', () => fail.immediate());
  }

  private requeue(rows: ClaimantRow[], reason: string): number[] {
    const nowIso = iso(this.now());
    const update = this.db.prepare(
      `UPDATE tasks
       SET status = 'queued', claimed_by = NULL, claimed_at = NULL, lease_expires_at = NULL, updated_at = ?
       WHERE id = ? AND status = 'processing'`
    );
    const ids: number[] = [];
    for (const row of rows) {
      if (update.run(nowIso, row.id).changes === 0) continue;
      this.insertLog(row.id, 'warn', 'reclaimed', `Task reclaimed: ${reason}`, null, { previousClaimant: row.claimed_by });
      ids.push(row.id);
    }
    return ids;
  }

  /**
   * Returns processing tasks whose lease has passed to the queue. Attempts are
   * left alone: an abandoned run is not a failed one.
   */
  reclaimExpired(): number[] {
    const reclaim = this.db.transaction((): number[] => {
      const rows = this.db
        .prepare<[string], ClaimantRow>(
          `SELECT id, claimed_by FROM tasks WHERE status = 'processing' AND lease_expires_at <= ?`
        )
        .all(iso(this.now()));
      return this.requeue(rows, 'lease expired');
    });

    const ids = this.guard('reclaimExpired', () => reclaim.immediate());
    if (ids.length > 0) {
      this.logger.info('Reclaimed expired tasks', { count: ids.length, taskIds: ids });
    }
    return ids;
  }

  /** Requeues tasks held by workers whose heartbeat is older than `workerTimeoutMs`. */
  reclaimFromDeadWorkers(workerTimeoutMs: number): number[] {
    const reclaim = this.db.transaction((): number[] => {
      const rows = this.db
        .prepare<[string], ClaimantRow>(
          `SELECT t.id, t.claimed_by FROM tasks t
           JOIN workers w ON w.worker_id = t.claimed_by
           WHERE t.status = 'processing' AND w.last_heartbeat_at < ?`
        )
        .all(iso(this.now() - workerTimeoutMs));
      return this.requeue(rows, 'worker heartbeat timed out');
    });

    const ids = this.guard('reclaimFromDeadWorkers', () => reclaim.immediate());
    if (ids.length > 0) {
      this.logger.warn('Reclaimed tasks from dead workers', { count: ids.length, taskIds: ids });
    }
    return ids;
  }

  // ── Maintenance ─────────────────────────────────────────────────

  /** Deletes worker rows silent for `olderThanMs` that hold no processing task. */
  pruneStaleWorkers(olderThanMs: number): number {
    const info = this.guard('pruneStaleWorkers', () =>
      this.db.prepare(
        `DELETE FROM workers
         WHERE last_heartbeat_at < ?
           AND worker_id NOT IN (
             SELECT claimed_by FROM tasks WHERE status = 'processing' AND claimed_by IS NOT NULL
           )`
      ).run(iso(this.now() - olderThanMs))
    );
    return info.changes;
  }

  getStats(activeWindowMs = 180000): QueueStats {
    return this.guard('getStats', () => {
      const statusCounts: Partial<Record<TaskStatus, number>> = {};
      const rows = this.db
        .prepare<[], { status: TaskStatus; count: number }>('SELECT status, COUNT(*) AS count FROM tasks GROUP BY status')
        .all();
      for (const row of rows) statusCounts[row.status] = row.count;

      const active = this.db
        .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM workers WHERE last_heartbeat_at >= ?')
        .get(iso(this.now() - activeWindowMs));

      const size = this.db
        .prepare<[], { size: number }>('SELECT page_count * page_size AS size FROM pragma_page_count(), pragma_page_size()')
        .get();
      const dbSizeBytes = size?.size ?? 0;

      return {
        statusCounts,
        activeWorkers: active?.count ?? 0,
        dbSizeBytes,
        dbSizeMb: Math.round((dbSizeBytes / (1024 * 1024)) * 100) / 100,
      };
    });
  }

  /** Flushes the write-ahead log into the main database file. */
  checkpoint(): void {
    this.guard('checkpoint', () => this.db.pragma('wal_checkpoint(TRUNCATE)'));
    this.logger.info('WAL checkpoint completed', { path: this.dbPath });
  }

  vacuum(): void {
    this.guard('vacuum', () => this.db.exec('VACUUM'));
    this.logger.info('Queue database vacuumed', { path: this.dbPath });
  }
}
