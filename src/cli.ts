#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, type TaskHiveConfig } from './config/index.js';
import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { openStores, type Stores } from './runtime.js';
import {
  runTasksCancel,
  runTasksEnqueue,
  runTasksList,
  runTasksLogs,
  runTasksStatus,
  type EnqueueOpts,
  type ListOpts,
} from './cli/tasks.js';
import { runMaintain, runReclaim, runStats, runWorkers } from './cli/workers.js';

// The CLI only surfaces errors; progress goes to stdout via chalk
const logger = createLogger({ level: 'error', format: 'simple' });

async function withStores(
  configPath: string | undefined,
  fn: (stores: Stores, config: TaskHiveConfig) => boolean | void
): Promise<void> {
  let stores: Stores | null = null;
  try {
    const config = await loadConfig(configPath);
    stores = openStores(config, logger);
    if (fn(stores, config) === false) {
      process.exitCode = 1;
    }
  } catch (err) {
    console.error(chalk.red(`Error: ${errorMessage(err)}`));
    process.exitCode = 1;
  } finally {
    stores?.close();
  }
}

const program = new Command();

program
  .name('taskhive-ctl')
  .description('Inspect and manage the taskhive work queue')
  .version('0.1.0')
  .option('-c, --config <path>', 'Path to configuration file');

function configPath(): string | undefined {
  const opts = program.opts<{ config?: string }>();
  return opts.config;
}

// ── taskhive-ctl enqueue ──────────────────────────────────
program
  .command('enqueue')
  .argument('<type>', 'Task type')
  .description('Add a task to the queue')
  .requiredOption('-p, --payload <json>', 'Task payload (JSON object)')
  .option('--priority <n>', 'Priority 1 (most urgent) to 10')
  .option('-k, --key <key>', 'Idempotency key')
  .option('--max-attempts <n>', 'Attempts before the task is marked failed')
  .option('--delay-ms <ms>', 'Delay before the task becomes eligible')
  .option('--constraints <json>', 'Capabilities a worker must offer (JSON object)')
  .action(async (type: string, opts: EnqueueOpts) => {
    await withStores(configPath(), ({ queue }) => {
      runTasksEnqueue(queue, type, opts);
    });
  });

// ── taskhive-ctl status ───────────────────────────────────
program
  .command('status')
  .argument('<id>', 'Task id')
  .description('Show a task')
  .action(async (id: string) => {
    await withStores(configPath(), ({ queue }) => {
      runTasksStatus(queue, id);
    });
  });

// ── taskhive-ctl cancel ───────────────────────────────────
program
  .command('cancel')
  .argument('<id>', 'Task id')
  .description('Cancel a queued task')
  .action(async (id: string) => {
    await withStores(configPath(), ({ queue }) => runTasksCancel(queue, id));
  });

// ── taskhive-ctl list ─────────────────────────────────────
program
  .command('list')
  .description('List recent tasks')
  .option('-s, --status <status>', 'Filter by status')
  .option('-t, --type <type>', 'Filter by task type')
  .option('-r, --region <region>', 'Filter by region')
  .option('-l, --limit <n>', 'Maximum rows', '50')
  .action(async (opts: ListOpts) => {
    await withStores(configPath(), ({ queue }) => {
      runTasksList(queue, opts);
    });
  });

// ── taskhive-ctl logs ─────────────────────────────────────
program
  .command('logs')
  .argument('<id>', 'Task id')
  .description('Show the lifecycle log of a task')
  .action(async (id: string) => {
    await withStores(configPath(), ({ queue }) => {
      runTasksLogs(queue, id);
    });
  });

// ── taskhive-ctl workers ──────────────────────────────────
program
  .command('workers')
  .description('List registered workers')
  .action(async () => {
    await withStores(configPath(), ({ queue }, config) => {
      runWorkers(queue, config.reaper.workerTimeoutMs);
    });
  });

// ── taskhive-ctl stats ────────────────────────────────────
program
  .command('stats')
  .description('Show queue statistics')
  .action(async () => {
    await withStores(configPath(), ({ queue, results }, config) => {
      runStats(queue, results, config.reaper.workerTimeoutMs);
    });
  });

// ── taskhive-ctl reclaim ──────────────────────────────────
program
  .command('reclaim')
  .description('Run one reaper cycle now')
  .action(async () => {
    await withStores(configPath(), ({ queue }, config) => {
      runReclaim(queue, logger, {
        workerTimeoutMs: config.reaper.workerTimeoutMs,
        pruneAfterMs: config.reaper.pruneAfterMs,
      });
    });
  });

// ── taskhive-ctl maintain ─────────────────────────────────
program
  .command('maintain')
  .description('Checkpoint the WAL, optionally vacuum')
  .option('--vacuum', 'Rebuild the database file')
  .action(async (opts: { vacuum?: boolean }) => {
    await withStores(configPath(), ({ queue }) => {
      runMaintain(queue, opts);
    });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.red(`Error: ${errorMessage(err)}`));
  process.exit(1);
});
