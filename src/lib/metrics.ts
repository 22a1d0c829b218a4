export interface MetricsRecorder {
  increment(name: string, by?: number): void;
}

/**
 * In-process counters. Owned by whoever runs the batch and passed down to the
 * pipeline; the pipeline itself never holds a registry.
 */
export class CounterMetrics implements MetricsRecorder {
  private readonly counters = new Map<string, number>();

  increment(name: string, by = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + by);
  }

  get(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries([...this.counters.entries()].sort(([a], [b]) => a.localeCompare(b)));
  }
}

export const noopMetrics: MetricsRecorder = {
  increment: () => undefined,
};
