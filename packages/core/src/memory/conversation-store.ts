/**
 * ConversationStore - bounded short-term history, one log per channel.
 *
 * Appends are synchronous. Cleanup runs the eviction policy on a snapshot
 * and then removes exactly the evicted records from the live log, because
 * the token pass may suspend: records appended meanwhile survive, and a
 * log cleared meanwhile stays empty.
 */

import type {
  ChannelId,
  ContextEntry,
  ConversationRecord,
  IConversationStore,
  IEvictionPolicy,
} from "@parley/sdk";
import { ConversationRole, toConversationRole } from "@parley/sdk";
import { createLogger } from "@parley/shared";
import type { Logger } from "@parley/shared";

export interface ConversationStoreOptions {
  policy: IEvictionPolicy;
  /** Clock in epoch milliseconds. Defaults to Date.now. */
  now?: () => number;
  logger?: Logger;
}

export function createConversationStore(options: ConversationStoreOptions): IConversationStore {
  const { policy } = options;
  const now = options.now ?? Date.now;
  const logger = options.logger ?? createLogger("ConversationStore");
  const logs = new Map<ChannelId, ConversationRecord[]>();

  function append(channelId: ChannelId, entries: Array<[ConversationRole, string]>): void {
    const log = logs.get(channelId) ?? [];
    const last = log[log.length - 1];
    // A clock that steps backwards must not break timestamp order.
    const timestamp = last ? Math.max(now(), last.timestamp) : now();
    for (const [role, content] of entries) {
      log.push({ channelId, role, content, timestamp });
    }
    logs.set(channelId, log);
  }

  async function cleanup(channelId: ChannelId): Promise<void> {
    const snapshot = [...(logs.get(channelId) ?? [])];
    const kept = new Set(await policy.apply(snapshot, now()));
    const evicted = new Set(snapshot.filter((r) => !kept.has(r)));
    if (evicted.size === 0) return;

    const live = logs.get(channelId);
    if (!live) return;
    logs.set(channelId, live.filter((r) => !evicted.has(r)));
    logger.debug("Channel log trimmed", {
      channelId,
      evicted: evicted.size,
      remaining: live.length - evicted.size,
    });
  }

  return {
    async addMessage(channelId, role, content) {
      append(channelId, [[toConversationRole(role), content]]);
      await cleanup(channelId);
    },

    async addTurn(channelId, userContent, assistantContent) {
      append(channelId, [
        [ConversationRole.User, userContent],
        [ConversationRole.Assistant, assistantContent],
      ]);
      await cleanup(channelId);
    },

    clear(channelId?: ChannelId): void {
      if (channelId === undefined) {
        for (const id of logs.keys()) logs.set(id, []);
        logger.info("All channel logs cleared", { channels: logs.size });
        return;
      }
      if (!logs.has(channelId)) return;
      logs.set(channelId, []);
      logger.info("Channel log cleared", { channelId });
    },

    getHistory(channelId: ChannelId): ContextEntry[] {
      return (logs.get(channelId) ?? []).map(({ role, content }) => ({ role, content }));
    },

    channels(): ChannelId[] {
      return [...logs.keys()];
    },
  };
}
