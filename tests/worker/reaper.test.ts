import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { QueueStore } from '../../src/queue/store.js';
import { FifoStrategy } from '../../src/queue/strategies.js';
import { Reaper } from '../../src/worker/reaper.js';
import { FakeClock, memoryStore, silentLogger } from '../helpers.js';

describe('Reaper', () => {
  let clock: FakeClock;
  let store: QueueStore;

  beforeEach(() => {
    clock = new FakeClock();
    store = memoryStore(clock);
  });

  afterEach(() => {
    vi.useRealTimers();
    store.close();
  });

  it('reclaims expired leases, dead workers and prunes stale rows in one cycle', () => {
    store.upsertWorker('w-short', {});
    store.upsertWorker('w-dead', {});
    store.upsertWorker('w-gone', {});
    store.enqueue({ type: 'fetch', payload: {} });
    store.enqueue({ type: 'fetch', payload: {} });
    store.claimNext('w-short', {}, new FifoStrategy(), { leaseMs: 1000 });
    store.claimNext('w-dead', {}, new FifoStrategy(), { leaseMs: 3600000 });

    clock.advance(200000);
    const reaper = new Reaper({ store, logger: silentLogger(), workerTimeoutMs: 180000, pruneAfterMs: 150000 });
    const result = reaper.runCycle();

    expect(result).toEqual({ expired: [1], fromDeadWorkers: [2], prunedWorkers: 3 });
    expect(store.listTasks({ status: 'queued' }).map((t) => t.id)).toEqual([2, 1]);
    expect(store.listWorkers()).toEqual([]);
  });

  it('does nothing when every lease and worker is healthy', () => {
    store.upsertWorker('w1', {});
    store.enqueue({ type: 'fetch', payload: {} });
    store.claimNext('w1', {}, new FifoStrategy(), { leaseMs: 60000 });

    const reaper = new Reaper({ store, logger: silentLogger() });
    expect(reaper.runCycle()).toEqual({ expired: [], fromDeadWorkers: [], prunedWorkers: 0 });
    expect(store.getTask(1)?.status).toBe('processing');
  });

  it('runs on its interval until stopped', () => {
    vi.useFakeTimers();
    const reaper = new Reaper({ store, logger: silentLogger(), intervalMs: 1000 });
    const cycle = vi.spyOn(reaper, 'runCycle');

    reaper.start();
    reaper.start();
    vi.advanceTimersByTime(3500);
    expect(cycle).toHaveBeenCalledTimes(3);

    reaper.stop();
    vi.advanceTimersByTime(5000);
    expect(cycle).toHaveBeenCalledTimes(3);
  });

  it('logs and survives a failing cycle', () => {
    vi.useFakeTimers();
    const logger = silentLogger();
    const error = vi.spyOn(logger, 'error');
    const reaper = new Reaper({ store, logger, intervalMs: 1000 });
    vi.spyOn(reaper, 'runCycle').mockImplementation(() => {
      throw new Error('disk I/O error');
    });

    reaper.start();
    vi.advanceTimersByTime(2000);
    reaper.stop();

    expect(error).toHaveBeenCalledTimes(2);
    expect(error).toHaveBeenCalledWith('Reaper cycle failed', { error: 'disk I/O error' });
  });
});
