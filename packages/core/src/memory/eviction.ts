/**
 * EvictionPolicy - keeps a channel log inside its age, count and token limits.
 *
 * Three passes, always in this order, each on the output of the previous:
 *   1. age filter: drop records older than maxAgeMs
 *   2. count cap: keep the newest maxMessages records
 *   3. token trim: drop the oldest record until the estimate fits tokenLimit
 *
 * Only the token pass calls the estimator. Every pass removes from the
 * old end, so newer records always outlive older ones.
 */

import type { ConversationRecord, IEvictionPolicy, ITokenEstimator } from "@parley/sdk";
import { createLogger } from "@parley/shared";
import type { Logger } from "@parley/shared";
import type { MetricsCollector } from "../observability/index.js";

export interface EvictionLimits {
  maxAgeMs: number;
  maxMessages: number;
  tokenLimit: number;
}

export interface EvictionPolicyOptions extends EvictionLimits {
  estimator: ITokenEstimator;
  metrics?: MetricsCollector;
  logger?: Logger;
}

export function filterByAge(
  records: readonly ConversationRecord[],
  now: number,
  maxAgeMs: number,
): ConversationRecord[] {
  return records.filter((r) => now - r.timestamp <= maxAgeMs);
}

export function capCount(
  records: readonly ConversationRecord[],
  maxMessages: number,
): ConversationRecord[] {
  if (records.length <= maxMessages) return [...records];
  return records.slice(records.length - maxMessages);
}

export function createEvictionPolicy(options: EvictionPolicyOptions): IEvictionPolicy {
  const { maxAgeMs, maxMessages, tokenLimit, estimator, metrics } = options;
  const logger = options.logger ?? createLogger("EvictionPolicy");

  async function trimToBudget(records: ConversationRecord[]): Promise<ConversationRecord[]> {
    let start = 0;
    while (start < records.length) {
      const { tokens } = await estimator.estimate(
        records.slice(start).map((r) => r.content),
      );
      if (tokens <= tokenLimit) break;
      start++;
    }
    return records.slice(start);
  }

  return {
    async apply(records, now) {
      const fresh = filterByAge(records, now, maxAgeMs);
      const capped = capCount(fresh, maxMessages);
      const kept = await trimToBudget(capped);

      const byAge = records.length - fresh.length;
      const byCount = fresh.length - capped.length;
      const byTokens = capped.length - kept.length;
      metrics?.increment("evicted.age", byAge);
      metrics?.increment("evicted.count", byCount);
      metrics?.increment("evicted.tokens", byTokens);

      if (byAge + byCount + byTokens > 0) {
        logger.debug("Evicted records", { byAge, byCount, byTokens, kept: kept.length });
      }
      return kept;
    },
  };
}
