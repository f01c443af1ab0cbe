#!/usr/bin/env node

import { EventEmitter } from 'events';
import * as os from 'os';
import { randomUUID } from 'crypto';
import { Command } from 'commander';
import chalk from 'chalk';
import winston from 'winston';

import { parseJsonObjectOption } from './cli/tasks.js';
import { loadConfig, type TaskHiveConfig } from './config/index.js';
import { ValidationError, errorMessage } from './errors.js';
import { registerBuiltinHandlers } from './handlers/builtin.js';
import { HandlerRegistry } from './handlers/registry.js';
import { createLogger } from './logger.js';
import { getStrategy, STRATEGY_NAMES } from './queue/strategies.js';
import { openStores, type Stores } from './runtime.js';
import { WorkerEngine, type WorkerEngineStats } from './worker/engine.js';
import { WorkerMetrics } from './worker/metrics.js';
import { Reaper } from './worker/reaper.js';

export interface TaskHiveOptions {
  workerId?: string;
  /** Registry to serve from. Built-in handlers are registered when omitted. */
  registry?: HandlerRegistry;
  logger?: winston.Logger;
  clock?: () => number;
}

/**
 * One worker process: queue and result stores, a worker engine and, unless
 * disabled, the reaper.
 */
export class TaskHive extends EventEmitter {
  private config: TaskHiveConfig;
  private logger: winston.Logger;
  private workerId: string;
  private registry: HandlerRegistry;
  private clock: () => number;

  private stores: Stores | null = null;
  private engine: WorkerEngine | null = null;
  private reaper: Reaper | null = null;
  private running = false;

  constructor(config: TaskHiveConfig, options: TaskHiveOptions = {}) {
    super();
    this.config = config;
    this.workerId = options.workerId ?? config.worker.id ?? `${os.hostname()}-${randomUUID().slice(0, 8)}`;
    this.logger = options.logger ?? createLogger(config.logging);
    this.clock = options.clock ?? Date.now;

    if (options.registry) {
      this.registry = options.registry;
    } else {
      this.registry = new HandlerRegistry();
      registerBuiltinHandlers(this.registry);
    }
  }

  async start(): Promise<void> {
    if (this.running) {
      this.logger.warn('Worker process already running');
      return;
    }

    this.logger.info('Starting taskhive worker', {
      workerId: this.workerId,
      queue: this.config.queue.path,
      types: this.registry.getSupportedTypes(),
    });

    try {
      this.stores = openStores(this.config, this.logger, this.clock);
      const worker = this.config.worker;

      this.engine = new WorkerEngine({
        workerId: this.workerId,
        store: this.stores.queue,
        results: this.stores.results,
        registry: this.registry,
        logger: this.logger,
        strategy: getStrategy(worker.strategy, { sampleSize: worker.weightedSampleSize }),
        capabilities: worker.capabilities,
        leaseMs: worker.leaseMs,
        maxLeaseMs: worker.maxLeaseMs,
        heartbeatIntervalMs: worker.heartbeatIntervalMs,
        pollIntervalMs: worker.pollIntervalMs,
        maxIdleBackoffMs: worker.maxIdleBackoffMs,
        idleBackoffMultiplier: worker.idleBackoffMultiplier,
        retry: this.config.retry,
        handlerConfig: this.config.handlers,
        metrics: new WorkerMetrics(),
      });

      for (const event of ['taskCompleted', 'taskRetrying', 'taskFailed', 'taskLost']) {
        this.engine.on(event, (...args: unknown[]) => this.emit(event, ...args));
      }

      if (this.config.reaper.enabled) {
        this.reaper = new Reaper({
          store: this.stores.queue,
          logger: this.logger,
          intervalMs: this.config.reaper.intervalMs,
          workerTimeoutMs: this.config.reaper.workerTimeoutMs,
          pruneAfterMs: this.config.reaper.pruneAfterMs,
        });
        this.reaper.runCycle();
        this.reaper.start();
      }

      this.engine.start();
      this.running = true;
      this.logger.info('taskhive worker started', { workerId: this.workerId });
      this.emit('started');
    } catch (error) {
      this.logger.error('Failed to start worker', { error: errorMessage(error) });
      await this.stop();
      throw error;
    }
  }

  async stop(): Promise<void> {
    this.logger.info('Stopping taskhive worker', { workerId: this.workerId });

    if (this.reaper) {
      this.reaper.stop();
      this.reaper = null;
    }

    if (this.engine) {
      await this.engine.stop();
      this.engine = null;
    }

    if (this.stores) {
      this.stores.close();
      this.stores = null;
    }

    this.running = false;
    this.logger.info('taskhive worker stopped');
    this.emit('stopped');
  }

  getWorkerId(): string {
    return this.workerId;
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): WorkerEngineStats | null {
    return this.engine?.getStats() ?? null;
  }
}

interface DaemonOptions {
  config?: string;
  workerId?: string;
  strategy?: string;
  capabilities?: string;
  reaper: boolean;
  verbose?: boolean;
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('taskhive')
    .description('Worker daemon for the taskhive SQLite work queue')
    .version('0.1.0')
    .option('-c, --config <path>', 'Path to configuration file')
    .option('-w, --worker-id <id>', 'Stable worker id (defaults to hostname plus a random suffix)')
    .option('-s, --strategy <name>', `Scheduling strategy (${STRATEGY_NAMES.join(', ')})`)
    .option('--capabilities <json>', 'Worker capabilities as a JSON object')
    .option('--no-reaper', 'Do not run the lease reaper in this process')
    .option('-v, --verbose', 'Enable verbose logging')
    .parse(process.argv);

  const options = program.opts<DaemonOptions>();

  const config = await loadConfig(options.config);

  // Apply CLI options to config
  if (options.strategy) {
    const strategy = STRATEGY_NAMES.find((name) => name === options.strategy?.toLowerCase());
    if (!strategy) {
      throw new ValidationError(`Unknown scheduling strategy: ${options.strategy}`);
    }
    config.worker.strategy = strategy;
  }
  if (options.capabilities) {
    config.worker.capabilities = parseJsonObjectOption('capabilities', options.capabilities);
  }
  if (!options.reaper) {
    config.reaper.enabled = false;
  }
  if (options.verbose) {
    config.logging.level = 'debug';
  }

  const hive = new TaskHive(config, { workerId: options.workerId });

  const shutdown = (signal: string): void => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);
    hive.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(chalk.red(`Shutdown failed: ${errorMessage(err)}`));
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await hive.start();
  console.log(chalk.green(`\ntaskhive worker ${hive.getWorkerId()} ready. Press Ctrl+C to exit.\n`));
}

export { TaskHive as default };
export { loadConfig, parseConfig, type TaskHiveConfig } from './config/index.js';
export * from './errors.js';
export { HandlerRegistry } from './handlers/registry.js';
export { registerBuiltinHandlers, EchoHandler, NoopHandler } from './handlers/builtin.js';
export type { HandlerConstructor, HandlerDependencies, HandlerMetadata, HandlerRecord, TaskHandler } from './handlers/types.js';
export { createLogger } from './logger.js';
export { QueueStore } from './queue/store.js';
export * from './queue/strategies.js';
export * from './queue/types.js';
export { ResultStore } from './results/store.js';
export { openStores, type Stores } from './runtime.js';
export { WorkerEngine, type TaskOutcome, type ReportResult, type ResultSummary } from './worker/engine.js';
export { WorkerMetrics } from './worker/metrics.js';
export { Reaper, type ReaperCycleResult } from './worker/reaper.js';

// Run if executed directly
const isMain = process.argv[1]?.endsWith('index.js') || process.argv[1]?.endsWith('index.ts');
if (isMain) {
  main().catch((error: unknown) => {
    console.error(chalk.red(`Fatal error: ${errorMessage(error)}`));
    process.exit(1);
  });
}
