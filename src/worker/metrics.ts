/** In-process counters for one worker, shared with its handlers. */
export class WorkerMetrics {
  private counters: Map<string, number> = new Map();

  increment(name: string, by = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + by);
  }

  get(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries([...this.counters.entries()].sort(([a], [b]) => a.localeCompare(b)));
  }

  reset(): void {
    this.counters.clear();
  }
}
