import { ValidationError } from '../errors.js';
import type { Capabilities, JsonObject, TaskRecord } from './types.js';

export const STRATEGY_NAMES = ['fifo', 'lifo', 'priority', 'weighted_random'] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

/**
 * A task selection policy. `orderBy` is applied to the eligible-task query and
 * `choose` receives the matching rows in that order, already filtered for the
 * claiming worker's capabilities. Strategies hold no queue state.
 */
export interface SchedulingStrategy {
  readonly name: StrategyName;
  readonly orderBy: string;
  choose(candidates: Iterable<TaskRecord>): TaskRecord | null;
}

function first(candidates: Iterable<TaskRecord>): TaskRecord | null {
  for (const task of candidates) return task;
  return null;
}

/** Oldest eligible task first. */
export class FifoStrategy implements SchedulingStrategy {
  readonly name = 'fifo';
  readonly orderBy = 'created_at ASC, id ASC';

  choose(candidates: Iterable<TaskRecord>): TaskRecord | null {
    return first(candidates);
  }
}

/** Newest eligible task first. Old tasks can starve. */
export class LifoStrategy implements SchedulingStrategy {
  readonly name = 'lifo';
  readonly orderBy = 'created_at DESC, id DESC';

  choose(candidates: Iterable<TaskRecord>): TaskRecord | null {
    return first(candidates);
  }
}

/** Lowest priority value first, oldest within a band. No fairness across bands. */
export class PriorityStrategy implements SchedulingStrategy {
  readonly name = 'priority';
  readonly orderBy = 'priority ASC, created_at ASC, id ASC';

  choose(candidates: Iterable<TaskRecord>): TaskRecord | null {
    return first(candidates);
  }
}

export interface WeightedRandomOptions {
  /** Caps the eligible rows considered per draw. Unset means every eligible row. */
  sampleSize?: number;
  random?: () => number;
}

/**
 * Draws one task with probability proportional to 1 / priority, so urgent
 * tasks win more often without starving the rest outright. A single pass
 * over the candidates: each row replaces the current pick with probability
 * weight / running total.
 */
export class WeightedRandomStrategy implements SchedulingStrategy {
  readonly name = 'weighted_random';
  readonly orderBy = 'priority ASC, created_at ASC, id ASC';
  private sampleSize: number;
  private random: () => number;

  constructor(options: WeightedRandomOptions = {}) {
    this.sampleSize = options.sampleSize ?? Infinity;
    this.random = options.random ?? Math.random;
  }

  static weight(priority: number): number {
    return 1 / Math.max(priority, 1);
  }

  choose(candidates: Iterable<TaskRecord>): TaskRecord | null {
    let picked: TaskRecord | null = null;
    let total = 0;
    let seen = 0;
    for (const task of candidates) {
      const weight = WeightedRandomStrategy.weight(task.priority);
      total += weight;
      if (this.random() < weight / total) picked = task;
      if (++seen >= this.sampleSize) break;
    }
    return picked;
  }
}

export function getStrategy(name: string, options: WeightedRandomOptions = {}): SchedulingStrategy {
  switch (name.toLowerCase()) {
    case 'fifo':
      return new FifoStrategy();
    case 'lifo':
      return new LifoStrategy();
    case 'priority':
      return new PriorityStrategy();
    case 'weighted_random':
      return new WeightedRandomStrategy(options);
    default:
      throw new ValidationError(`Unknown scheduling strategy: ${name}`, [
        `expected one of ${STRATEGY_NAMES.join(', ')}`,
      ]);
  }
}

function satisfiesValue(required: unknown, offered: unknown): boolean {
  if (Array.isArray(offered)) {
    return offered.some((v) => v === required);
  }
  return offered === required;
}

/**
 * True when every constraint key is met by the worker's capabilities. Scalar
 * constraints need an equal capability (or membership when the capability is a
 * list); list constraints are any-of.
 */
export function matchesCapabilities(constraints: JsonObject | null, capabilities: Capabilities): boolean {
  if (!constraints) return true;

  for (const [key, required] of Object.entries(constraints)) {
    if (!(key in capabilities)) return false;
    const offered = capabilities[key];

    if (Array.isArray(required)) {
      if (required.length > 0 && !required.some((r) => satisfiesValue(r, offered))) {
        return false;
      }
    } else if (!satisfiesValue(required, offered)) {
      return false;
    }
  }
  return true;
}
