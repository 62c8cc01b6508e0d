export interface OperationTiming {
  calls: number;
  totalMs: number;
  lastMs: number;
}

/**
 * Per-operation wall clock timings for map loads and queries
 */
export class QueryProfiler {
  private timings = new Map<string, OperationTiming>();

  public measure<R>(operation: string, fn: () => R): R {
    const start = performance.now();
    try {
      return fn();
    } finally {
      this.record(operation, performance.now() - start);
    }
  }

  public record(operation: string, elapsedMs: number): void {
    const timing = this.timings.get(operation) ?? { calls: 0, totalMs: 0, lastMs: 0 };
    timing.calls++;
    timing.totalMs += elapsedMs;
    timing.lastMs = elapsedMs;
    this.timings.set(operation, timing);
  }

  public get(operation: string): OperationTiming | undefined {
    const timing = this.timings.get(operation);
    return timing ? { ...timing } : undefined;
  }

  public snapshot(): Record<string, OperationTiming> {
    const out: Record<string, OperationTiming> = {};
    for (const [operation, timing] of this.timings) {
      out[operation] = { ...timing };
    }
    return out;
  }

  public reset(): void {
    this.timings.clear();
  }
}
