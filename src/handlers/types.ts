import { Logger } from 'winston';
import type { JsonObject } from '../queue/types.js';
import type { ResultStore } from '../results/store.js';
import type { WorkerMetrics } from '../worker/metrics.js';

export interface HandlerMetadata {
  name: string;
  taskType: string;
  version: string;
  description?: string;
}

/** One unit of handler output, deduplicated by (source, externalId). */
export interface HandlerRecord {
  source: string;
  externalId: string;
  data: JsonObject;
}

/**
 * Executes one task type. Handlers know nothing about claiming, leases or
 * retries; a thrown error is recorded as a failed attempt.
 */
export interface TaskHandler {
  readonly metadata: HandlerMetadata;
  validate(payload: JsonObject): boolean;
  execute(payload: JsonObject): Promise<HandlerRecord[]>;
}

export interface HandlerDependencies {
  /** The handler's own `handlers.<type>` config section. */
  config: JsonObject;
  results: ResultStore;
  metrics: WorkerMetrics;
  logger: Logger;
}

export type HandlerConstructor = new (deps: HandlerDependencies) => TaskHandler;
