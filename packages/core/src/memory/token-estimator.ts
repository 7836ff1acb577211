/**
 * TokenEstimator - precise counts from a counting service, with a
 * character-count fallback whenever the service cannot answer.
 *
 * The estimate is tagged with the path that produced it so callers
 * (and tests) can tell a real count from the heuristic.
 */

import type { ITokenCounter, ITokenEstimator, TokenEstimate } from "@parley/sdk";
import { ErrorCode, ProviderError } from "@parley/sdk";
import { createLogger, describeError } from "@parley/shared";
import type { Logger } from "@parley/shared";
import type { MetricsCollector } from "../observability/index.js";
import { withTimeout } from "../execution/timeout.js";

export interface TokenEstimatorOptions {
  counter: ITokenCounter;
  /** A counting call still pending after this long counts as a failure. */
  timeoutMs?: number;
  metrics?: MetricsCollector;
  logger?: Logger;
}

/** Sum of Unicode code points across all texts. */
export function heuristicTokenCount(texts: readonly string[]): number {
  let total = 0;
  for (const text of texts) {
    total += Array.from(text).length;
  }
  return total;
}

function isTokenCount(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

export function createTokenEstimator(options: TokenEstimatorOptions): ITokenEstimator {
  const { counter, timeoutMs, metrics } = options;
  const logger = options.logger ?? createLogger("TokenEstimator");

  async function countPrecisely(texts: readonly string[]): Promise<number> {
    const count: unknown = await withTimeout(
      counter.count(texts),
      timeoutMs,
      () =>
        new ProviderError(counter.id, `token count timed out after ${timeoutMs}ms`, {
          code: ErrorCode.PROVIDER_TIMEOUT,
        }),
    );
    if (!isTokenCount(count)) {
      throw new ProviderError(counter.id, `malformed token count: ${String(count)}`);
    }
    return count;
  }

  return {
    async estimate(texts: readonly string[]): Promise<TokenEstimate> {
      if (texts.length === 0) {
        return { kind: "precise", tokens: 0 };
      }

      try {
        const tokens = await countPrecisely(texts);
        metrics?.increment("estimate.precise");
        return { kind: "precise", tokens };
      } catch (err) {
        const reason = describeError(err);
        const tokens = heuristicTokenCount(texts);
        logger.warn("Token count failed, using character count", {
          counter: counter.id,
          error: reason,
          texts: texts.length,
          tokens,
        });
        metrics?.increment("estimate.heuristic");
        return { kind: "heuristic", tokens, reason };
      }
    },
  };
}
