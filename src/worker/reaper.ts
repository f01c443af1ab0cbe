import { Logger } from 'winston';
import { errorMessage } from '../errors.js';
import type { QueueStore } from '../queue/store.js';

export interface ReaperConfig {
  store: QueueStore;
  logger: Logger;
  intervalMs?: number;
  /** A worker with no heartbeat for this long is considered dead. */
  workerTimeoutMs?: number;
  /** Worker rows idle for this long are deleted. */
  pruneAfterMs?: number;
}

export interface ReaperCycleResult {
  expired: number[];
  fromDeadWorkers: number[];
  prunedWorkers: number;
}

/**
 * Periodic sweep that returns abandoned tasks to the queue and drops worker
 * rows nobody has heard from in a long time.
 */
export class Reaper {
  private store: QueueStore;
  private logger: Logger;
  private intervalMs: number;
  private workerTimeoutMs: number;
  private pruneAfterMs: number;
  private timer: NodeJS.Timeout | null = null;

  constructor(config: ReaperConfig) {
    this.store = config.store;
    this.logger = config.logger;
    this.intervalMs = config.intervalMs ?? 60000;
    this.workerTimeoutMs = config.workerTimeoutMs ?? 180000;
    this.pruneAfterMs = config.pruneAfterMs ?? 86400000;
  }

  runCycle(): ReaperCycleResult {
    const expired = this.store.reclaimExpired();
    const fromDeadWorkers = this.store.reclaimFromDeadWorkers(this.workerTimeoutMs);
    const prunedWorkers = this.store.pruneStaleWorkers(this.pruneAfterMs);

    if (expired.length > 0 || fromDeadWorkers.length > 0 || prunedWorkers > 0) {
      this.logger.info('Reaper cycle', {
        expired: expired.length,
        fromDeadWorkers: fromDeadWorkers.length,
        prunedWorkers,
      });
    }

    return { expired, fromDeadWorkers, prunedWorkers };
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      try {
        this.runCycle();
      } catch (err) {
        this.logger.error('Reaper cycle failed', { error: errorMessage(err) });
      }
    }, this.intervalMs);
    this.logger.info('Reaper started', { intervalMs: this.intervalMs, workerTimeoutMs: this.workerTimeoutMs });
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.logger.info('Reaper stopped');
  }
}
