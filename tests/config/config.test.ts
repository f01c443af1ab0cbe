import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { loadConfig, parseConfig } from '../../src/config/index.js';
import { ConfigError } from '../../src/errors.js';
import { makeTempDir } from '../helpers.js';

const DEFAULT_YAML = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../config/default.yaml');

describe('parseConfig', () => {
  it('fills every section from defaults', () => {
    const config = parseConfig({});
    expect(config.queue).toEqual({ path: 'data/taskhive.db', busyTimeoutMs: 5000 });
    expect(config.worker).toMatchObject({ strategy: 'lifo', leaseMs: 120000, maxLeaseMs: 3600000, pollIntervalMs: 5000, capabilities: {} });
    expect(config.worker.weightedSampleSize).toBeUndefined();
    expect(config.retry).toEqual({ baseDelayMs: 5000, maxDelayMs: 300000 });
    expect(config.reaper).toEqual({ enabled: true, intervalMs: 60000, workerTimeoutMs: 180000, pruneAfterMs: 86400000 });
    expect(config.logging).toEqual({ level: 'info', format: 'simple' });
    expect(config.handlers).toEqual({});
  });

  it('treats an empty document as all defaults', () => {
    expect(parseConfig(null)).toEqual(parseConfig({}));
  });

  it('merges partial sections over defaults', () => {
    const config = parseConfig({ worker: { strategy: 'priority' }, retry: { baseDelayMs: 100 } });
    expect(config.worker.strategy).toBe('priority');
    expect(config.worker.leaseMs).toBe(120000);
    expect(config.retry).toEqual({ baseDelayMs: 100, maxDelayMs: 300000 });
  });

  it('lists every invalid path', () => {
    try {
      parseConfig({ worker: { strategy: 'random', leaseMs: -1 }, queue: { extra: true } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      const message = err instanceof Error ? err.message : '';
      expect(message).toMatch(/^Invalid configuration: /);
      expect(message).toContain('worker.strategy: ');
      expect(message).toContain('worker.leaseMs: ');
      expect(message).toContain('queue: ');
    }
  });

  it('rejects a retry cap below the base delay', () => {
    expect(() => parseConfig({ retry: { baseDelayMs: 1000, maxDelayMs: 10 } })).toThrow(
      'Invalid configuration: retry.maxDelayMs: maxDelayMs must be >= baseDelayMs'
    );
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('config');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads YAML from the given path', async () => {
    const file = path.join(dir, 'hive.yaml');
    fs.writeFileSync(file, 'queue:\n  path: /tmp/q.db\nhandlers:\n  echo:\n    prefix: "t:"\n');

    const config = await loadConfig(file);
    expect(config.queue.path).toBe('/tmp/q.db');
    expect(config.handlers).toEqual({ echo: { prefix: 't:' } });
  });

  it('accepts the shipped default file', async () => {
    const config = await loadConfig(DEFAULT_YAML);
    expect(config).toEqual({ ...parseConfig({}), handlers: { echo: { prefix: '' } } });
  });

  it('fails on a missing explicit path', async () => {
    await expect(loadConfig(path.join(dir, 'nope.yaml'))).rejects.toThrow(ConfigError);
  });

  it('fails on malformed YAML', async () => {
    const file = path.join(dir, 'bad.yaml');
    fs.writeFileSync(file, 'queue: [unclosed\n');
    await expect(loadConfig(file)).rejects.toThrow(/^Failed to parse YAML in /);
  });
});
