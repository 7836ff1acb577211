/**
 * ChannelSerializer - one FIFO chain of async tasks per channel.
 *
 * Tasks for the same channel start only after the previous one settled;
 * tasks for different channels never wait on each other. A rejected task
 * does not stop the chain.
 */

import type { ChannelId } from "@parley/sdk";

export interface ChannelSerializer {
  run<T>(channelId: ChannelId, task: () => Promise<T>): Promise<T>;
  /** Tasks queued or running for the channel. */
  pending(channelId: ChannelId): number;
}

interface ChannelChain {
  tail: Promise<void>;
  size: number;
}

export function createChannelSerializer(): ChannelSerializer {
  const chains = new Map<ChannelId, ChannelChain>();

  return {
    run<T>(channelId: ChannelId, task: () => Promise<T>): Promise<T> {
      const chain = chains.get(channelId) ?? { tail: Promise.resolve(), size: 0 };
      chains.set(channelId, chain);
      chain.size++;

      const result = chain.tail.then(task);
      chain.tail = result.then(
        () => undefined,
        () => undefined,
      ).finally(() => {
        chain.size--;
        if (chain.size === 0 && chains.get(channelId) === chain) {
          chains.delete(channelId);
        }
      });
      return result;
    },

    pending(channelId: ChannelId): number {
      return chains.get(channelId)?.size ?? 0;
    },
  };
}
