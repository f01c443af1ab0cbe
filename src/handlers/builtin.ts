import { z } from 'zod';
import type { JsonObject } from '../queue/types.js';
import type { HandlerRegistry } from './registry.js';
import type { HandlerDependencies, HandlerMetadata, HandlerRecord, TaskHandler } from './types.js';

/** Accepts anything and produces nothing. Useful for probing a worker. */
export class NoopHandler implements TaskHandler {
  readonly metadata: HandlerMetadata = {
    name: 'No-op',
    taskType: 'noop',
    version: '1.0.0',
    description: 'Completes immediately without output',
  };

  constructor(_deps: HandlerDependencies) {}

  validate(_payload: JsonObject): boolean {
    return true;
  }

  async execute(_payload: JsonObject): Promise<HandlerRecord[]> {
    return [];
  }
}

export const echoPayloadSchema = z.object({
  source: z.string().min(1),
  items: z.array(
    z.object({ id: z.union([z.string().min(1), z.number()]) }).passthrough()
  ),
  /** Makes the handler throw, to exercise the retry path end to end. */
  fail: z.string().optional(),
});

/**
 * Returns each payload item as a result record keyed by its id. Stands in for
 * a collector when smoke-testing a deployment.
 */
export class EchoHandler implements TaskHandler {
  readonly metadata: HandlerMetadata = {
    name: 'Echo',
    taskType: 'echo',
    version: '1.0.0',
    description: 'Emits payload items as result records',
  };

  private deps: HandlerDependencies;

  constructor(deps: HandlerDependencies) {
    this.deps = deps;
  }

  validate(payload: JsonObject): boolean {
    return echoPayloadSchema.safeParse(payload).success;
  }

  async execute(payload: JsonObject): Promise<HandlerRecord[]> {
    const { source, items, fail } = echoPayloadSchema.parse(payload);
    if (fail) throw new Error(fail);

    const prefix = typeof this.deps.config.prefix === 'string' ? this.deps.config.prefix : '';
    this.deps.metrics.increment('echo.items', items.length);

    return items.map((item) => {
      const data: JsonObject = { ...item };
      return { source: `${prefix}${source}`, externalId: String(item.id), data };
    });
  }
}

export function registerBuiltinHandlers(registry: HandlerRegistry): void {
  registry.register('noop', NoopHandler);
  registry.register('echo', EchoHandler);
}
