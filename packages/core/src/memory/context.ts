/**
 * ContextAssembler - the ordered context handed to the generation backend.
 *
 * Short-term history from the store comes first (oldest → newest), then the
 * most recent platform messages for the same channel, reordered from the
 * platform's newest-first delivery to oldest-first. The two segments are
 * concatenated as they are; an exchange present in both appears twice.
 */

import type {
  ChannelId,
  ContextEntry,
  IContextAssembler,
  IConversationStore,
  IHistorySource,
  PlatformMessage,
} from "@parley/sdk";
import { ErrorCode, PlatformError, roleFromAuthor } from "@parley/sdk";
import { createLogger, describeError } from "@parley/shared";
import type { Logger } from "@parley/shared";
import { withTimeout } from "../execution/timeout.js";

export const DEFAULT_HISTORY_FETCH_LIMIT = 5;

export interface ContextAssemblerOptions {
  store: IConversationStore;
  source: IHistorySource;
  /** Platform messages read per build. 0 skips the fetch. */
  historyFetchLimit?: number;
  fetchTimeoutMs?: number;
  logger?: Logger;
}

export function createContextAssembler(options: ContextAssemblerOptions): IContextAssembler {
  const { store, source, fetchTimeoutMs } = options;
  const limit = options.historyFetchLimit ?? DEFAULT_HISTORY_FETCH_LIMIT;
  const logger = options.logger ?? createLogger("ContextAssembler");

  async function readRecent(messages: AsyncIterator<PlatformMessage>): Promise<ContextEntry[]> {
    const newestFirst: ContextEntry[] = [];
    let seen = 0;
    let exhausted = false;
    while (seen < limit) {
      const step = await messages.next();
      if (step.done) {
        exhausted = true;
        break;
      }
      seen++;
      const content = step.value.cleanedText.trim();
      if (content) {
        newestFirst.push({ role: roleFromAuthor(step.value.authorIsBot), content });
      }
    }
    if (!exhausted) await messages.return?.();
    return newestFirst.reverse();
  }

  /** Release a fetch abandoned by the timeout. Its next() may never settle, so this is not awaited. */
  function abandon(messages: AsyncIterator<PlatformMessage>): void {
    messages.return?.().catch((err: unknown) => {
      logger.warn("Closing abandoned history fetch failed", {
        platform: source.platform,
        error: describeError(err),
      });
    });
  }

  async function fetchLongTerm(channelId: ChannelId): Promise<ContextEntry[]> {
    if (limit === 0) return [];
    try {
      const messages = source.fetchRecent(channelId, limit)[Symbol.asyncIterator]();
      return await withTimeout(readRecent(messages), fetchTimeoutMs, () => {
        abandon(messages);
        return new PlatformError(source.platform, `history fetch timed out after ${fetchTimeoutMs}ms`, {
          code: ErrorCode.PLATFORM_TIMEOUT,
        });
      });
    } catch (err) {
      if (err instanceof PlatformError) throw err;
      throw new PlatformError(source.platform, "history fetch failed", { cause: err });
    }
  }

  return {
    async build(channelId: ChannelId): Promise<ContextEntry[]> {
      const shortTerm = store.getHistory(channelId);
      const longTerm = await fetchLongTerm(channelId);
      logger.debug("Context assembled", {
        channelId,
        shortTerm: shortTerm.length,
        longTerm: longTerm.length,
      });
      return [...shortTerm, ...longTerm];
    },
  };
}
