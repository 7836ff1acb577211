/**
 * In-memory counters for the memory layer.
 */

export type MemoryMetric =
  | "evicted.age"
  | "evicted.count"
  | "evicted.tokens"
  | "estimate.precise"
  | "estimate.heuristic"
  | "turns.completed"
  | "turns.failed";

export interface MetricsSnapshot {
  counters: Partial<Record<MemoryMetric, number>>;
  timestamp: number;
}

export interface MetricsCollector {
  increment(name: MemoryMetric, delta?: number): void;
  get(name: MemoryMetric): number;
  snapshot(): MetricsSnapshot;
  reset(): void;
}

export function createMetricsCollector(): MetricsCollector {
  const counters = new Map<MemoryMetric, number>();

  return {
    increment(name: MemoryMetric, delta = 1): void {
      if (delta === 0) return;
      counters.set(name, (counters.get(name) ?? 0) + delta);
    },

    get(name: MemoryMetric): number {
      return counters.get(name) ?? 0;
    },

    snapshot(): MetricsSnapshot {
      return {
        counters: Object.fromEntries(counters),
        timestamp: Date.now(),
      };
    },

    reset(): void {
      counters.clear();
    },
  };
}
