// Memory
export {
  createConversationMemory,
  createTokenEstimator,
  heuristicTokenCount,
  createEvictionPolicy,
  filterByAge,
  capCount,
  createConversationStore,
  createContextAssembler,
  DEFAULT_HISTORY_FETCH_LIMIT,
} from "./memory/index.js";
export type {
  ConversationMemory,
  ConversationMemoryOptions,
  TokenEstimatorOptions,
  EvictionLimits,
  EvictionPolicyOptions,
  ConversationStoreOptions,
  ContextAssemblerOptions,
} from "./memory/index.js";

// Execution
export { createChannelSerializer } from "./execution/channel-queue.js";
export type { ChannelSerializer } from "./execution/channel-queue.js";
export { createChatResponder } from "./execution/responder.js";
export type { ChatResponder, ChatResponderDeps } from "./execution/responder.js";
export { withTimeout } from "./execution/timeout.js";

// Observability
export { createMetricsCollector } from "./observability/index.js";
export type { MetricsCollector, MetricsSnapshot, MemoryMetric } from "./observability/index.js";
