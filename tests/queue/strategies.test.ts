import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../src/errors.js';
import {
  FifoStrategy,
  LifoStrategy,
  PriorityStrategy,
  WeightedRandomStrategy,
  getStrategy,
  matchesCapabilities,
} from '../../src/queue/strategies.js';
import type { TaskRecord } from '../../src/queue/types.js';

// --- helpers ---

function makeTask(overrides: Partial<TaskRecord> = {}): TaskRecord {
  return {
    id: overrides.id ?? 1,
    type: overrides.type ?? 'fetch',
    priority: overrides.priority ?? 5,
    payload: overrides.payload ?? '{}',
    constraints: overrides.constraints ?? null,
    region: overrides.region ?? null,
    status: overrides.status ?? 'queued',
    attempts: overrides.attempts ?? 0,
    max_attempts: overrides.max_attempts ?? 3,
    not_before: overrides.not_before ?? '2026-03-01T12:00:00.000Z',
    lease_expires_at: overrides.lease_expires_at ?? null,
    claimed_by: overrides.claimed_by ?? null,
    claimed_at: overrides.claimed_at ?? null,
    result: overrides.result ?? null,
    error: overrides.error ?? null,
    idempotency_key: overrides.idempotency_key ?? null,
    created_at: overrides.created_at ?? '2026-03-01T12:00:00.000Z',
    updated_at: overrides.updated_at ?? '2026-03-01T12:00:00.000Z',
    completed_at: overrides.completed_at ?? null,
  };
}

/** Deterministic PRNG (mulberry32) so distribution checks are repeatable. */
function seeded(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe('ordering strategies', () => {
  it('take the first candidate of their ordered view', () => {
    const rows = [makeTask({ id: 3 }), makeTask({ id: 1 })];
    expect(new FifoStrategy().choose(rows)?.id).toBe(3);
    expect(new LifoStrategy().choose(rows)?.id).toBe(3);
    expect(new PriorityStrategy().choose(rows)?.id).toBe(3);
  });

  it('return null for an empty view', () => {
    expect(new FifoStrategy().choose([])).toBeNull();
    expect(new WeightedRandomStrategy().choose([])).toBeNull();
  });

  it('expose the ORDER BY clause for the eligible query', () => {
    expect(new FifoStrategy().orderBy).toBe('created_at ASC, id ASC');
    expect(new LifoStrategy().orderBy).toBe('created_at DESC, id DESC');
    expect(new PriorityStrategy().orderBy).toBe('priority ASC, created_at ASC, id ASC');
  });

  it('stop consuming candidates after the pick', () => {
    let pulled = 0;
    function* rows(): Generator<TaskRecord> {
      for (let id = 1; id <= 5; id++) {
        pulled++;
        yield makeTask({ id });
      }
    }
    new FifoStrategy().choose(rows());
    expect(pulled).toBe(1);
  });
});

describe('WeightedRandomStrategy', () => {
  const pool = [
    makeTask({ id: 1, priority: 1 }),
    makeTask({ id: 2, priority: 2 }),
    makeTask({ id: 3, priority: 4 }),
  ];

  it('weights each task by 1/priority', () => {
    expect(WeightedRandomStrategy.weight(1)).toBe(1);
    expect(WeightedRandomStrategy.weight(4)).toBe(0.25);
    expect(WeightedRandomStrategy.weight(0)).toBe(1);
  });

  it('replaces the pick with probability weight over running total', () => {
    // running shares: 1/1 → 1, 0.5/1.5 → 2, 0.25/1.75 → 3
    const pick = (r: number) => new WeightedRandomStrategy({ random: () => r }).choose(pool)?.id;
    expect(pick(0)).toBe(3);
    expect(pick(0.1)).toBe(3);
    expect(pick(0.2)).toBe(2);
    expect(pick(0.5)).toBe(1);
    expect(pick(0.99)).toBe(1);
  });

  it('considers every candidate unless capped', () => {
    const backlog = Array.from({ length: 150 }, (_, i) => makeTask({ id: i + 1, priority: 1 }));
    backlog.push(makeTask({ id: 151, priority: 10 }));

    expect(new WeightedRandomStrategy({ random: () => 0.0005 }).choose(backlog)?.id).toBe(151);
    expect(new WeightedRandomStrategy({ sampleSize: 100, random: () => 0.0005 }).choose(backlog)?.id).toBe(100);
  });

  it('stops reading candidates at sampleSize', () => {
    let pulled = 0;
    function* rows(): Generator<TaskRecord> {
      for (const task of pool) {
        pulled++;
        yield task;
      }
    }
    expect(new WeightedRandomStrategy({ sampleSize: 2, random: () => 0 }).choose(rows())?.id).toBe(2);
    expect(pulled).toBe(2);
  });

  it('favours urgent tasks without starving the rest', () => {
    const strategy = new WeightedRandomStrategy({ random: seeded(42) });
    const candidates = [makeTask({ id: 1, priority: 1 }), makeTask({ id: 2, priority: 10 })];
    const counts = { 1: 0, 2: 0 };

    for (let i = 0; i < 2000; i++) {
      const id = strategy.choose(candidates)?.id;
      if (id === 1 || id === 2) counts[id]++;
    }

    expect(counts[1] + counts[2]).toBe(2000);
    expect(counts[2]).toBeGreaterThan(0);
    expect(counts[1]).toBeGreaterThan(counts[2] * 5);
  });
});

describe('getStrategy', () => {
  it('resolves names case-insensitively', () => {
    expect(getStrategy('FIFO')).toBeInstanceOf(FifoStrategy);
    expect(getStrategy('lifo')).toBeInstanceOf(LifoStrategy);
    expect(getStrategy('Priority')).toBeInstanceOf(PriorityStrategy);
    expect(getStrategy('weighted_random').name).toBe('weighted_random');
  });

  it('rejects unknown names', () => {
    expect(() => getStrategy('round_robin')).toThrow(ValidationError);
    expect(() => getStrategy('round_robin')).toThrow('Unknown scheduling strategy: round_robin');
  });
});

describe('matchesCapabilities', () => {
  it('accepts tasks without constraints', () => {
    expect(matchesCapabilities(null, {})).toBe(true);
    expect(matchesCapabilities({}, { region: 'eu' })).toBe(true);
  });

  it('requires every constrained key to be offered', () => {
    expect(matchesCapabilities({ region: 'eu' }, {})).toBe(false);
    expect(matchesCapabilities({ region: 'eu', gpu: true }, { region: 'eu' })).toBe(false);
    expect(matchesCapabilities({ region: 'eu', gpu: true }, { region: 'eu', gpu: true })).toBe(true);
  });

  it('compares scalars by equality or list membership', () => {
    expect(matchesCapabilities({ region: 'eu' }, { region: 'us' })).toBe(false);
    expect(matchesCapabilities({ region: 'eu' }, { region: ['us', 'eu'] })).toBe(true);
    expect(matchesCapabilities({ tier: 2 }, { tier: '2' })).toBe(false);
  });

  it('treats list constraints as any-of', () => {
    expect(matchesCapabilities({ platform: ['reddit', 'hn'] }, { platform: 'hn' })).toBe(true);
    expect(matchesCapabilities({ platform: ['reddit', 'hn'] }, { platform: ['rss', 'reddit'] })).toBe(true);
    expect(matchesCapabilities({ platform: ['reddit', 'hn'] }, { platform: 'rss' })).toBe(false);
    expect(matchesCapabilities({ platform: [] }, { platform: 'rss' })).toBe(true);
  });
});
