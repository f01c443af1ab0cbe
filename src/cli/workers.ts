/**
 * taskhive-ctl queue administration: workers, stats, reclaim, maintain.
 */

import chalk from 'chalk';
import { Logger } from 'winston';
import type { QueueStore } from '../queue/store.js';
import type { QueueStats, WorkerRecord } from '../queue/types.js';
import type { ResultStore } from '../results/store.js';
import { Reaper, type ReaperCycleResult } from '../worker/reaper.js';
import { formatState } from './tasks.js';

function formatAge(iso: string, now: number): string {
  const age = now - Date.parse(iso);
  if (age < 1000) return `${age}ms`;
  if (age < 60000) return `${(age / 1000).toFixed(1)}s`;
  if (age < 3600000) return `${(age / 60000).toFixed(1)}m`;
  return `${(age / 3600000).toFixed(1)}h`;
}

export function runWorkers(store: QueueStore, activeWindowMs: number): WorkerRecord[] {
  const workers = store.listWorkers();
  if (workers.length === 0) {
    console.log(chalk.dim('  No workers registered.'));
    return workers;
  }

  const now = Date.now();
  const W = { id: 22, strategy: 17, done: 8, failed: 8, task: 8 };
  console.log(chalk.dim(
    '  ' + 'WORKER'.padEnd(W.id) + 'STRATEGY'.padEnd(W.strategy) + 'DONE'.padEnd(W.done) +
    'FAILED'.padEnd(W.failed) + 'TASK'.padEnd(W.task) + 'HEARTBEAT'
  ));
  console.log(chalk.dim('  ' + '─'.repeat(76)));

  for (const w of workers) {
    const line =
      '  ' +
      w.worker_id.slice(0, W.id - 1).padEnd(W.id) +
      (w.strategy ?? '-').padEnd(W.strategy) +
      String(w.tasks_processed).padEnd(W.done) +
      String(w.tasks_failed).padEnd(W.failed) +
      (w.current_task_id !== null ? String(w.current_task_id) : '-').padEnd(W.task) +
      `${formatAge(w.last_heartbeat_at, now)} ago`;

    const alive = now - Date.parse(w.last_heartbeat_at) <= activeWindowMs;
    console.log(alive ? line : chalk.dim(line));
  }
  return workers;
}

export function runStats(store: QueueStore, results: ResultStore, activeWindowMs: number): QueueStats {
  const stats = store.getStats(activeWindowMs);

  console.log(chalk.bold('\n  Queue'));
  const statuses = Object.entries(stats.statusCounts);
  if (statuses.length === 0) {
    console.log(chalk.dim('    (empty)'));
  }
  for (const [status, count] of statuses) {
    console.log(`    ${formatState(status)}${' '.repeat(Math.max(1, 12 - status.length))}${count}`);
  }
  console.log(`\n  Active workers: ${stats.activeWorkers}`);
  console.log(`  Results:        ${results.count()}`);
  console.log(`  Database size:  ${stats.dbSizeMb} MB`);
  console.log();
  return stats;
}

export function runReclaim(
  store: QueueStore,
  logger: Logger,
  opts: { workerTimeoutMs: number; pruneAfterMs: number }
): ReaperCycleResult {
  const reaper = new Reaper({ store, logger, ...opts });
  const result = reaper.runCycle();
  console.log(`  Expired leases reclaimed:      ${result.expired.length}`);
  console.log(`  Reclaimed from dead workers:   ${result.fromDeadWorkers.length}`);
  console.log(`  Stale worker rows pruned:      ${result.prunedWorkers}`);
  return result;
}

export function runMaintain(store: QueueStore, opts: { vacuum?: boolean }): void {
  store.checkpoint();
  console.log(chalk.green('✓ WAL checkpoint completed'));
  if (opts.vacuum) {
    store.vacuum();
    console.log(chalk.green('✓ Database vacuumed'));
  }
}
