import { DuplicateRegistrationError, UnknownTypeError } from '../errors.js';
import type { HandlerConstructor, HandlerDependencies, TaskHandler } from './types.js';

/**
 * Maps task types to handler constructors. One instance is built at startup
 * and handed to each WorkerEngine.
 */
export class HandlerRegistry {
  private handlers: Map<string, HandlerConstructor> = new Map();

  /**
   * Binds `taskType` to `ctor`. Repeating an identical registration is a
   * no-op; binding a different constructor to a taken type throws.
   */
  register(taskType: string, ctor: HandlerConstructor): void {
    const existing = this.handlers.get(taskType);
    if (existing === ctor) return;
    if (existing) throw new DuplicateRegistrationError(taskType);
    this.handlers.set(taskType, ctor);
  }

  unregister(taskType: string): boolean {
    return this.handlers.delete(taskType);
  }

  has(taskType: string): boolean {
    return this.handlers.has(taskType);
  }

  getSupportedTypes(): string[] {
    return [...this.handlers.keys()].sort();
  }

  create(taskType: string, deps: HandlerDependencies): TaskHandler {
    const Ctor = this.handlers.get(taskType);
    if (!Ctor) throw new UnknownTypeError(taskType);
    return new Ctor(deps);
  }
}
