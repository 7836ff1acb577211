export { createMetricsCollector } from "./metrics.js";
export type { MetricsCollector, MetricsSnapshot, MemoryMetric } from "./metrics.js";
