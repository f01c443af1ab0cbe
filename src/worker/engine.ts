import { EventEmitter } from 'events';
import { Logger } from 'winston';
import { HandlerError, errorMessage } from '../errors.js';
import type { HandlerRegistry } from '../handlers/registry.js';
import type { HandlerRecord, TaskHandler } from '../handlers/types.js';
import { parseJsonObject, type QueueStore } from '../queue/store.js';
import { LifoStrategy, type SchedulingStrategy } from '../queue/strategies.js';
import {
  DEFAULT_RETRY_POLICY,
  type Capabilities,
  type JsonObject,
  type RetryPolicy,
  type TaskRecord,
} from '../queue/types.js';
import type { ResultStore } from '../results/store.js';
import { IdleBackoff, computeRetryDelayMs } from './backoff.js';
import { WorkerMetrics } from './metrics.js';

export interface WorkerEngineConfig {
  workerId: string;
  store: QueueStore;
  results: ResultStore;
  registry: HandlerRegistry;
  logger: Logger;
  strategy?: SchedulingStrategy;
  capabilities?: Capabilities;
  leaseMs?: number;
  /** Upper bound on how long heartbeats may keep one task leased. */
  maxLeaseMs?: number;
  heartbeatIntervalMs?: number;
  pollIntervalMs?: number;
  maxIdleBackoffMs?: number;
  idleBackoffMultiplier?: number;
  retry?: RetryPolicy;
  /** Per-type handler config, keyed by task type. */
  handlerConfig?: Record<string, JsonObject>;
  metrics?: WorkerMetrics;
}

export type TaskOutcome =
  | { ok: true; records: HandlerRecord[] }
  | { ok: false; error: string; retryable: boolean };

export type ReportResult = 'completed' | 'retrying' | 'failed' | 'lost';

export interface ResultSummary extends JsonObject {
  records: number;
  inserted: number;
  duplicates: number;
}

export interface WorkerEngineStats {
  workerId: string;
  strategy: string;
  running: boolean;
  tasksProcessed: number;
  tasksFailed: number;
  currentTaskId: number | null;
  metrics: Record<string, number>;
}

const DEFAULT_LEASE_MS = 120000;
const DEFAULT_MAX_LEASE_MS = 3600000;
const DEFAULT_HEARTBEAT_INTERVAL_MS = 30000;
const DEFAULT_POLL_INTERVAL_MS = 5000;
const DEFAULT_MAX_IDLE_BACKOFF_MS = 60000;
const DEFAULT_IDLE_BACKOFF_MULTIPLIER = 1.5;

/**
 * Claim → execute → report loop for a single worker.
 *
 * Events: `taskClaimed` (task), `taskCompleted` (task, summary),
 * `taskRetrying` (task, notBefore), `taskFailed` (task, error), `taskLost` (task).
 */
export class WorkerEngine extends EventEmitter {
  readonly workerId: string;
  private store: QueueStore;
  private results: ResultStore;
  private registry: HandlerRegistry;
  private logger: Logger;
  private strategy: SchedulingStrategy;
  private capabilities: Capabilities;
  private leaseMs: number;
  private maxLeaseMs: number;
  private heartbeatIntervalMs: number;
  private retry: RetryPolicy;
  private handlerConfig: Record<string, JsonObject>;
  private metrics: WorkerMetrics;
  private backoff: IdleBackoff;
  private handlers: Map<string, TaskHandler> = new Map();

  private running = false;
  private loopPromise: Promise<void> | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private sleepTimer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;
  private currentTask: TaskRecord | null = null;
  private tasksProcessed = 0;
  private tasksFailed = 0;

  constructor(config: WorkerEngineConfig) {
    super();
    this.workerId = config.workerId;
    this.store = config.store;
    this.results = config.results;
    this.registry = config.registry;
    this.logger = config.logger;
    this.strategy = config.strategy ?? new LifoStrategy();
    this.capabilities = config.capabilities ?? {};
    this.leaseMs = config.leaseMs ?? DEFAULT_LEASE_MS;
    this.maxLeaseMs = config.maxLeaseMs ?? DEFAULT_MAX_LEASE_MS;
    this.heartbeatIntervalMs = config.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
    this.retry = config.retry ?? DEFAULT_RETRY_POLICY;
    this.handlerConfig = config.handlerConfig ?? {};
    this.metrics = config.metrics ?? new WorkerMetrics();
    this.backoff = new IdleBackoff({
      pollIntervalMs: config.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
      maxIdleBackoffMs: config.maxIdleBackoffMs ?? DEFAULT_MAX_IDLE_BACKOFF_MS,
      multiplier: config.idleBackoffMultiplier ?? DEFAULT_IDLE_BACKOFF_MULTIPLIER,
    });
  }

  /** Upserts this worker's registration row. */
  register(): void {
    this.store.upsertWorker(this.workerId, this.capabilities, { strategy: this.strategy.name });
  }

  claimNext(): TaskRecord | null {
    const task = this.store.claimNext(this.workerId, this.capabilities, this.strategy, {
      leaseMs: this.leaseMs,
      types: this.registry.getSupportedTypes(),
    });
    if (task) {
      this.metrics.increment('tasks.claimed');
      this.logger.info('Task claimed', { taskId: task.id, type: task.type, workerId: this.workerId });
      this.emit('taskClaimed', task);
    }
    return task;
  }

  private getHandler(taskType: string): TaskHandler {
    let handler = this.handlers.get(taskType);
    if (!handler) {
      handler = this.registry.create(taskType, {
        config: this.handlerConfig[taskType] ?? {},
        results: this.results,
        metrics: this.metrics,
        logger: this.logger.child({ handler: taskType }),
      });
      this.handlers.set(taskType, handler);
    }
    return handler;
  }

  /**
   * Runs the task's handler. Never throws for handler problems: an unknown
   * type or invalid payload is a permanent failure, a thrown error a
   * retryable one.
   */
  async execute(task: TaskRecord): Promise<TaskOutcome> {
    let handler: TaskHandler;
    let payload: JsonObject;
    try {
      handler = this.getHandler(task.type);
      const parsed = parseJsonObject(task.payload);
      if (!parsed || !handler.validate(parsed)) {
        return { ok: false, error: `Invalid payload for task type ${task.type}`, retryable: false };
      }
      payload = parsed;
    } catch (err) {
      return { ok: false, error: errorMessage(err), retryable: false };
    }

    this.store.appendLog(task.id, 'info', `Started by ${handler.metadata.name} v${handler.metadata.version}`, {
      event: 'started',
      workerId: this.workerId,
    });

    try {
      const records = await handler.execute(payload);
      return { ok: true, records };
    } catch (err) {
      const error = new HandlerError(task.type, err);
      this.logger.warn('Handler failed', { taskId: task.id, type: task.type, error: error.message });
      return { ok: false, error: error.message, retryable: true };
    }
  }

  /** Writes the outcome back to the queue and forwards output to the result store. */
  report(task: TaskRecord, outcome: TaskOutcome): ReportResult {
    if (outcome.ok) {
      const summary: ResultSummary = { records: outcome.records.length, inserted: 0, duplicates: 0 };
      try {
        for (const record of outcome.records) {
          const saved = this.results.saveWithStatus(record.source, record.externalId, record.data, task.id);
          if (saved.inserted) summary.inserted++;
          else summary.duplicates++;
        }
      } catch (err) {
        return this.report(task, { ok: false, error: `Failed to store results: ${errorMessage(err)}`, retryable: true });
      }
      this.metrics.increment('results.inserted', summary.inserted);
      this.metrics.increment('results.duplicates', summary.duplicates);

      if (!this.store.completeTask(task.id, this.workerId, summary)) {
        return this.lost(task);
      }
      this.tasksProcessed++;
      this.metrics.increment('tasks.completed');
      this.logger.info('Task completed', { taskId: task.id, type: task.type, ...summary });
      this.emit('taskCompleted', task, summary);
      return 'completed';
    }

    const retryDelayMs = computeRetryDelayMs(task.attempts, this.retry);
    const result = this.store.failTask(task.id, this.workerId, {
      error: outcome.error,
      retryable: outcome.retryable,
      retryDelayMs,
    });

    switch (result.state) {
      case 'lost':
        return this.lost(task);
      case 'retrying':
        this.tasksFailed++;
        this.metrics.increment('tasks.retried');
        this.logger.warn('Task retry scheduled', {
          taskId: task.id,
          attempts: result.attempts,
          notBefore: result.notBefore,
          error: outcome.error,
        });
        this.emit('taskRetrying', task, result.notBefore);
        return 'retrying';
      case 'failed':
        this.tasksFailed++;
        this.metrics.increment('tasks.failed');
        this.logger.error('Task failed', { taskId: task.id, attempts: result.attempts, error: outcome.error });
        this.emit('taskFailed', task, outcome.error);
        return 'failed';
    }
  }

  private lost(task: TaskRecord): ReportResult {
    this.metrics.increment('tasks.lost');
    this.logger.warn('Lease lost before report, outcome discarded', { taskId: task.id, workerId: this.workerId });
    this.emit('taskLost', task);
    return 'lost';
  }

  /** Refreshes liveness and the in-flight task's lease. Never throws. */
  heartbeat(): void {
    try {
      this.store.recordHeartbeat(this.workerId, {
        tasksProcessed: this.tasksProcessed,
        tasksFailed: this.tasksFailed,
        currentTaskId: this.currentTask?.id ?? null,
      });
      const task = this.currentTask;
      if (task && !this.store.renewLease(task.id, this.workerId, this.leaseMs, this.maxLeaseMs)) {
        this.logger.warn('Could not renew lease for in-flight task', { taskId: task.id });
      }
    } catch (err) {
      this.logger.warn('Failed to send heartbeat', { workerId: this.workerId, error: errorMessage(err) });
    }
  }

  reclaimExpired(): number[] {
    const ids = this.store.reclaimExpired();
    this.metrics.increment('tasks.reclaimed', ids.length);
    return ids;
  }

  /** One claim/execute/report cycle. Resolves false when the queue had nothing eligible. */
  async runOnce(): Promise<boolean> {
    const task = this.claimNext();
    if (!task) {
      this.metrics.increment('polls.idle');
      return false;
    }

    this.currentTask = task;
    try {
      const outcome = await this.execute(task);
      this.report(task, outcome);
      return true;
    } finally {
      this.currentTask = null;
    }
  }

  start(): void {
    if (this.running) {
      this.logger.warn('Worker already running', { workerId: this.workerId });
      return;
    }
    this.running = true;
    this.register();

    this.heartbeatTimer = setInterval(() => this.heartbeat(), this.heartbeatIntervalMs);
    this.loopPromise = this.loop();

    this.logger.info('Worker started', {
      workerId: this.workerId,
      strategy: this.strategy.name,
      types: this.registry.getSupportedTypes(),
    });
  }

  /** Stops polling and waits for the in-flight task, if any, to be reported. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    this.wake?.();
    this.wake = null;

    await this.loopPromise;
    this.loopPromise = null;
    this.heartbeat();

    this.logger.info('Worker stopped', {
      workerId: this.workerId,
      processed: this.tasksProcessed,
      failed: this.tasksFailed,
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): WorkerEngineStats {
    return {
      workerId: this.workerId,
      strategy: this.strategy.name,
      running: this.running,
      tasksProcessed: this.tasksProcessed,
      tasksFailed: this.tasksFailed,
      currentTaskId: this.currentTask?.id ?? null,
      metrics: this.metrics.snapshot(),
    };
  }

  private async loop(): Promise<void> {
    while (this.running) {
      let processed = false;
      try {
        processed = await this.runOnce();
      } catch (err) {
        this.logger.error('Worker iteration failed', { workerId: this.workerId, error: errorMessage(err) });
      }
      if (!this.running) break;

      if (processed) {
        this.backoff.reset();
        // Let timers (heartbeat) run between back-to-back tasks
        await new Promise<void>((resolve) => setImmediate(resolve));
        continue;
      }

      this.logger.debug('No task available, backing off', { workerId: this.workerId, delayMs: this.backoff.delayMs });
      await this.sleep(this.backoff.delayMs);
      this.backoff.increase();
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      this.wake = resolve;
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wake = null;
        resolve();
      }, ms);
    });
  }
}
