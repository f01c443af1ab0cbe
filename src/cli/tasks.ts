/**
 * taskhive-ctl task commands: enqueue, status, cancel, list, logs.
 */

import chalk from 'chalk';
import { ValidationError } from '../errors.js';
import type { QueueStore } from '../queue/store.js';
import type { EnqueueResult, JsonObject, TaskRecord, TaskStatus } from '../queue/types.js';

const TASK_STATUSES: readonly TaskStatus[] = ['queued', 'processing', 'completed', 'failed', 'cancelled'];

export function formatState(status: string): string {
  switch (status) {
    case 'completed': return chalk.green(status);
    case 'processing': return chalk.cyan(status);
    case 'queued': return chalk.yellow(status);
    case 'failed': return chalk.red(status);
    case 'cancelled': return chalk.dim(status);
    default: return status;
  }
}

export function formatTime(iso: string | null): string {
  if (!iso) return '-';
  return new Date(iso).toLocaleString(undefined, {
    month: 'short', day: '2-digit',
    hour: '2-digit', minute: '2-digit', second: '2-digit',
    hour12: false,
  });
}

export function parseJsonObjectOption(name: string, value: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new ValidationError(`--${name} is not valid JSON`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError(`--${name} must be a JSON object`);
  }
  return { ...parsed };
}

export function parseIntOption(name: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new ValidationError(`--${name} must be an integer, got "${value}"`);
  }
  return n;
}

export function parseTaskId(value: string): number {
  const id = parseIntOption('id', value);
  if (id < 1) throw new ValidationError(`Task id must be positive, got ${id}`);
  return id;
}

function parseStatus(value: string): TaskStatus {
  const status = TASK_STATUSES.find((s) => s === value);
  if (!status) {
    throw new ValidationError(`Unknown status "${value}"`, [`expected one of ${TASK_STATUSES.join(', ')}`]);
  }
  return status;
}

export interface EnqueueOpts {
  payload: string;
  priority?: string;
  key?: string;
  maxAttempts?: string;
  delayMs?: string;
  constraints?: string;
}

export function runTasksEnqueue(store: QueueStore, type: string, opts: EnqueueOpts): EnqueueResult {
  const delayMs = opts.delayMs !== undefined ? parseIntOption('delay-ms', opts.delayMs) : 0;
  const result = store.enqueueWithStatus({
    type,
    payload: parseJsonObjectOption('payload', opts.payload),
    priority: opts.priority !== undefined ? parseIntOption('priority', opts.priority) : undefined,
    idempotencyKey: opts.key,
    maxAttempts: opts.maxAttempts !== undefined ? parseIntOption('max-attempts', opts.maxAttempts) : undefined,
    notBefore: delayMs > 0 ? new Date(Date.now() + delayMs) : undefined,
    constraints: opts.constraints !== undefined ? parseJsonObjectOption('constraints', opts.constraints) : undefined,
  });

  if (result.created) {
    console.log(chalk.green(`✓ Enqueued task ${result.taskId}`));
  } else {
    console.log(chalk.yellow(`Task ${result.taskId} already exists for key ${opts.key}`));
  }
  return result;
}

export function runTasksStatus(store: QueueStore, id: string): TaskRecord {
  const taskId = parseTaskId(id);
  const task = store.getTask(taskId);
  if (!task) throw new ValidationError(`Task ${taskId} not found`);

  console.log(chalk.bold(`\n  Task ${task.id}\n`));
  console.log(`  Type:      ${task.type}`);
  console.log(`  State:     ${formatState(task.status)}`);
  console.log(`  Priority:  ${task.priority}`);
  console.log(`  Attempts:  ${task.attempts}/${task.max_attempts}`);
  console.log(`  Worker:    ${task.claimed_by ?? '-'}`);
  console.log(`  Created:   ${formatTime(task.created_at)}`);
  console.log(`  Eligible:  ${formatTime(task.not_before)}`);
  console.log(`  Completed: ${formatTime(task.completed_at)}`);
  if (task.region) {
    console.log(`  Region:    ${task.region}`);
  }
  if (task.error) {
    console.log(`  Error:     ${chalk.red(task.error)}`);
  }
  if (task.result) {
    console.log(chalk.dim('\n  ── result ──'));
    console.log(`  ${task.result}`);
  }
  console.log();
  return task;
}

export function runTasksCancel(store: QueueStore, id: string): boolean {
  const taskId = parseTaskId(id);
  const cancelled = store.cancel(taskId);
  if (cancelled) {
    console.log(chalk.green(`Task ${taskId} cancelled`));
  } else {
    console.error(chalk.red(`Task ${taskId} could not be cancelled (not queued)`));
  }
  return cancelled;
}

export interface ListOpts {
  status?: string;
  type?: string;
  region?: string;
  limit: string;
}

export function runTasksList(store: QueueStore, opts: ListOpts): TaskRecord[] {
  const rows = store.listTasks({
    status: opts.status !== undefined ? parseStatus(opts.status) : undefined,
    type: opts.type,
    region: opts.region,
    limit: parseIntOption('limit', opts.limit),
  });

  if (rows.length === 0) {
    console.log(chalk.dim('  No tasks found.'));
    return rows;
  }

  const W = { id: 8, type: 16, status: 12, prio: 6, tries: 8, worker: 18 };
  console.log(chalk.dim(
    '  ' + 'ID'.padEnd(W.id) + 'TYPE'.padEnd(W.type) + 'STATUS'.padEnd(W.status) +
    'PRIO'.padEnd(W.prio) + 'TRIES'.padEnd(W.tries) + 'WORKER'.padEnd(W.worker) + 'CREATED'
  ));
  console.log(chalk.dim('  ' + '─'.repeat(86)));

  for (const row of rows) {
    // Pad raw text, then colorize
    const status = formatState(row.status) + ' '.repeat(Math.max(0, W.status - row.status.length));
    console.log(
      '  ' +
      String(row.id).padEnd(W.id) +
      row.type.slice(0, W.type - 1).padEnd(W.type) +
      status +
      String(row.priority).padEnd(W.prio) +
      `${row.attempts}/${row.max_attempts}`.padEnd(W.tries) +
      (row.claimed_by ?? '-').slice(0, W.worker - 1).padEnd(W.worker) +
      formatTime(row.created_at)
    );
  }

  console.log(chalk.dim(`\n  ${rows.length} task(s) shown`));
  return rows;
}

export function runTasksLogs(store: QueueStore, id: string): number {
  const taskId = parseTaskId(id);
  if (!store.getTask(taskId)) throw new ValidationError(`Task ${taskId} not found`);

  const logs = store.getTaskLogs(taskId);
  for (const log of logs) {
    const level = log.level === 'error' ? chalk.red(log.level)
      : log.level === 'warn' ? chalk.yellow(log.level)
      : chalk.dim(log.level);
    const event = log.event ? chalk.cyan(`[${log.event}]`) : '';
    const worker = log.worker_id ? chalk.dim(` (${log.worker_id})`) : '';
    console.log(`  ${formatTime(log.created_at)} ${level} ${event} ${log.message}${worker}`);
  }
  return logs.length;
}
