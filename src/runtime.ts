import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import { Logger } from 'winston';
import type { TaskHiveConfig } from './config/index.js';
import { QueueStore } from './queue/store.js';
import { ResultStore } from './results/store.js';

export interface Stores {
  queue: QueueStore;
  results: ResultStore;
  close(): void;
}

/**
 * Opens the queue database and the result store. Results share the queue
 * connection unless `results.path` names a separate file.
 */
export function openStores(config: TaskHiveConfig, logger: Logger, clock: () => number = Date.now): Stores {
  const queue = new QueueStore({
    path: config.queue.path,
    busyTimeoutMs: config.queue.busyTimeoutMs,
    logger,
    clock,
  });

  const resultsPath = config.results.path;
  if (!resultsPath || resultsPath === config.queue.path) {
    return {
      queue,
      results: new ResultStore(queue.getDatabase(), clock),
      close: () => queue.close(),
    };
  }

  if (resultsPath !== ':memory:') {
    fs.mkdirSync(path.dirname(resultsPath), { recursive: true });
  }
  const resultsDb = new Database(resultsPath, { timeout: config.queue.busyTimeoutMs });
  resultsDb.pragma('journal_mode = WAL');
  resultsDb.pragma('synchronous = NORMAL');
  logger.info('Result store opened', { path: resultsPath });

  return {
    queue,
    results: new ResultStore(resultsDb, clock),
    close: () => {
      resultsDb.close();
      queue.close();
    },
  };
}
