import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import winston from 'winston';
import { QueueStore } from '../src/queue/store.js';

export const T0 = Date.parse('2026-03-01T12:00:00.000Z');

/** Mutable clock shared by every store in a test. */
export class FakeClock {
  ms: number;

  constructor(start = T0) {
    this.ms = start;
  }

  now = (): number => this.ms;

  advance(ms: number): void {
    this.ms += ms;
  }
}

export function silentLogger(): winston.Logger {
  return winston.createLogger({ silent: true });
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `taskhive-${prefix}-`));
}

export function memoryStore(clock: FakeClock = new FakeClock()): QueueStore {
  return new QueueStore({ path: ':memory:', logger: silentLogger(), clock: clock.now });
}
