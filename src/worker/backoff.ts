import type { RetryPolicy } from '../queue/types.js';

/**
 * Delay before a failed task becomes eligible again:
 * baseDelayMs * 2^attempts, capped at maxDelayMs. `attempts` is the count
 * before this failure is recorded.
 */
export function computeRetryDelayMs(attempts: number, policy: RetryPolicy): number {
  const raw = policy.baseDelayMs * Math.pow(2, Math.max(0, attempts));
  return Math.min(raw, policy.maxDelayMs);
}

export interface IdleBackoffOptions {
  pollIntervalMs: number;
  maxIdleBackoffMs: number;
  multiplier: number;
}

/** Poll delay that grows while the queue stays empty and resets on a claim. */
export class IdleBackoff {
  private current: number;
  private options: IdleBackoffOptions;

  constructor(options: IdleBackoffOptions) {
    this.options = options;
    this.current = options.pollIntervalMs;
  }

  get delayMs(): number {
    return this.current;
  }

  increase(): void {
    this.current = Math.min(this.current * this.options.multiplier, this.options.maxIdleBackoffMs);
  }

  reset(): void {
    this.current = this.options.pollIntervalMs;
  }
}
