export type TaskStatus = 'queued' | 'processing' | 'completed' | 'failed' | 'cancelled';
export type TaskLogLevel = 'debug' | 'info' | 'warn' | 'error';
export type TaskEventType =
  | 'enqueued'
  | 'claimed'
  | 'started'
  | 'retried'
  | 'completed'
  | 'failed'
  | 'reclaimed'
  | 'cancelled';

export const MIN_PRIORITY = 1;
export const MAX_PRIORITY = 10;
export const DEFAULT_PRIORITY = 5;
export const DEFAULT_MAX_ATTEMPTS = 3;

export type JsonObject = Record<string, unknown>;

/** Declared worker capabilities, matched against task constraints when claiming. */
export type Capabilities = JsonObject;

export interface TaskRecord {
  id: number;
  type: string;
  priority: number;
  payload: string;
  constraints: string | null;
  region: string | null;
  status: TaskStatus;
  attempts: number;
  max_attempts: number;
  not_before: string;
  lease_expires_at: string | null;
  claimed_by: string | null;
  claimed_at: string | null;
  result: string | null;
  error: string | null;
  idempotency_key: string | null;
  created_at: string;
  updated_at: string;
  completed_at: string | null;
}

export interface WorkerRecord {
  worker_id: string;
  capabilities: string;
  strategy: string | null;
  tasks_processed: number;
  tasks_failed: number;
  current_task_id: number | null;
  started_at: string;
  last_heartbeat_at: string;
}

export interface TaskLogRecord {
  id: number;
  task_id: number;
  worker_id: string | null;
  level: TaskLogLevel;
  event: TaskEventType | null;
  message: string;
  detail: string | null;
  created_at: string;
}

export interface EnqueueParams {
  type: string;
  payload: JsonObject;
  priority?: number;
  /** Earliest time the task may be claimed. Defaults to now. */
  notBefore?: Date;
  idempotencyKey?: string;
  maxAttempts?: number;
  constraints?: JsonObject;
}

export interface EnqueueResult {
  taskId: number;
  created: boolean;
}

export interface ListTasksFilter {
  type?: string;
  status?: TaskStatus;
  region?: string;
  limit?: number;
  offset?: number;
}

export interface TaskStatusView {
  status: TaskStatus;
  attempts: number;
  result?: unknown;
  error?: string;
}

export interface ClaimOptions {
  leaseMs: number;
  /** Only claim tasks of these types. Omit to claim any type. */
  types?: readonly string[];
}

export interface FailTaskParams {
  error: string;
  retryable: boolean;
  retryDelayMs: number;
}

export type FailTaskResult =
  | { state: 'retrying'; attempts: number; notBefore: string }
  | { state: 'failed'; attempts: number }
  | { state: 'lost' };

export interface WorkerHeartbeat {
  tasksProcessed: number;
  tasksFailed: number;
  currentTaskId: number | null;
}

export interface QueueStats {
  statusCounts: Partial<Record<TaskStatus, number>>;
  activeWorkers: number;
  dbSizeBytes: number;
  dbSizeMb: number;
}

export interface RetryPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  baseDelayMs: 5000,
  maxDelayMs: 300000,
};
