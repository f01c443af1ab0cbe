import * as fs from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';
import { STRATEGY_NAMES } from '../queue/strategies.js';

export const DEFAULT_CONFIG_PATH = 'config/default.yaml';

const queueSchema = z
  .object({
    path: z.string().min(1).default('data/taskhive.db'),
    busyTimeoutMs: z.number().int().min(0).default(5000),
  })
  .strict();

const resultsSchema = z
  .object({
    /** Separate database file for results. Shares the queue connection when unset. */
    path: z.string().min(1).optional(),
  })
  .strict();

const workerSchema = z
  .object({
    id: z.string().min(1).optional(),
    strategy: z.enum(STRATEGY_NAMES).default('lifo'),
    capabilities: z.record(z.unknown()).default({}),
    leaseMs: z.number().int().positive().default(120000),
    maxLeaseMs: z.number().int().positive().default(3600000),
    heartbeatIntervalMs: z.number().int().positive().default(30000),
    pollIntervalMs: z.number().int().positive().default(5000),
    maxIdleBackoffMs: z.number().int().positive().default(60000),
    idleBackoffMultiplier: z.number().min(1).default(1.5),
    weightedSampleSize: z.number().int().positive().optional(),
  })
  .strict();

const retrySchema = z
  .object({
    baseDelayMs: z.number().int().min(0).default(5000),
    maxDelayMs: z.number().int().min(0).default(300000),
  })
  .strict()
  .refine((r) => r.maxDelayMs >= r.baseDelayMs, {
    message: 'maxDelayMs must be >= baseDelayMs',
    path: ['maxDelayMs'],
  });

const reaperSchema = z
  .object({
    enabled: z.boolean().default(true),
    intervalMs: z.number().int().positive().default(60000),
    workerTimeoutMs: z.number().int().positive().default(180000),
    pruneAfterMs: z.number().int().positive().default(86400000),
  })
  .strict();

const loggingSchema = z
  .object({
    level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    format: z.enum(['json', 'simple']).default('simple'),
    file: z.string().min(1).optional(),
  })
  .strict();

export const configSchema = z
  .object({
    queue: queueSchema.default({}),
    results: resultsSchema.default({}),
    worker: workerSchema.default({}),
    retry: retrySchema.default({}),
    reaper: reaperSchema.default({}),
    logging: loggingSchema.default({}),
    /** Handler config by task type, handed to each handler on creation. */
    handlers: z.record(z.record(z.unknown())).default({}),
  })
  .strict();

export type TaskHiveConfig = z.infer<typeof configSchema>;

/**
 * Validates a parsed config document, filling in defaults for every omitted
 * section and field. Throws ConfigError listing each offending path.
 */
export function parseConfig(raw: unknown): TaskHiveConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }
  return result.data;
}

/**
 * Loads YAML config from `configPath`. Without a path the default location is
 * tried, and built-in defaults are used if nothing is there.
 */
export async function loadConfig(configPath?: string): Promise<TaskHiveConfig> {
  const target = configPath ?? DEFAULT_CONFIG_PATH;

  let text: string;
  try {
    text = await fs.readFile(target, 'utf-8');
  } catch (err) {
    if (!configPath && isMissingFile(err)) {
      return parseConfig({});
    }
    throw new ConfigError(`Failed to read config from ${target}: ${errorMessage(err)}`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new ConfigError(`Failed to parse YAML in ${target}: ${errorMessage(err)}`);
  }
  return parseConfig(raw);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
