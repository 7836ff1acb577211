/**
 * Wires estimator, eviction policy, store and assembler from one memory config.
 */

import type {
  IContextAssembler,
  IConversationStore,
  IEvictionPolicy,
  IHistorySource,
  ITokenCounter,
  ITokenEstimator,
} from "@parley/sdk";
import type { MemoryConfig } from "@parley/shared";
import type { MetricsCollector } from "../observability/index.js";
import { createTokenEstimator } from "./token-estimator.js";
import { createEvictionPolicy } from "./eviction.js";
import { createConversationStore } from "./conversation-store.js";
import { createContextAssembler } from "./context.js";

export interface ConversationMemoryOptions {
  config: MemoryConfig;
  counter: ITokenCounter;
  source: IHistorySource;
  metrics?: MetricsCollector;
  now?: () => number;
}

export interface ConversationMemory {
  estimator: ITokenEstimator;
  policy: IEvictionPolicy;
  store: IConversationStore;
  assembler: IContextAssembler;
}

export function createConversationMemory(options: ConversationMemoryOptions): ConversationMemory {
  const { config, counter, source, metrics, now } = options;

  const estimator = createTokenEstimator({
    counter,
    timeoutMs: config.estimatorTimeoutMs,
    metrics,
  });
  const policy = createEvictionPolicy({
    maxAgeMs: config.maxAgeMinutes * 60_000,
    maxMessages: config.maxMessages,
    tokenLimit: config.tokenLimit,
    estimator,
    metrics,
  });
  const store = createConversationStore({ policy, now });
  const assembler = createContextAssembler({
    store,
    source,
    historyFetchLimit: config.historyFetchLimit,
    fetchTimeoutMs: config.historyFetchTimeoutMs,
  });

  return { estimator, policy, store, assembler };
}

export { createTokenEstimator, heuristicTokenCount } from "./token-estimator.js";
export type { TokenEstimatorOptions } from "./token-estimator.js";
export { createEvictionPolicy, filterByAge, capCount } from "./eviction.js";
export type { EvictionLimits, EvictionPolicyOptions } from "./eviction.js";
export { createConversationStore } from "./conversation-store.js";
export type { ConversationStoreOptions } from "./conversation-store.js";
export { createContextAssembler, DEFAULT_HISTORY_FETCH_LIMIT } from "./context.js";
export type { ContextAssemblerOptions } from "./context.js";
