/**
 * ChatResponder - runs one inbound turn end to end.
 *
 *   build context → generate → append user + assistant records together
 *
 * Nothing is written to the store unless the reply was produced, so a
 * failed turn never leaves half an exchange behind. With a serializer,
 * turns on the same channel run strictly one after another; without one,
 * two overlapping turns may each build from a history that lacks the
 * other's exchange.
 */

import type {
  ChannelId,
  IContextAssembler,
  IConversationStore,
  IGenerationBackend,
} from "@parley/sdk";
import { ResponderError } from "@parley/sdk";
import { createLogger, describeError, generateId } from "@parley/shared";
import type { Logger } from "@parley/shared";
import type { MetricsCollector } from "../observability/index.js";
import type { ChannelSerializer } from "./channel-queue.js";

export interface ChatResponderDeps {
  store: IConversationStore;
  assembler: IContextAssembler;
  backend: IGenerationBackend;
  serializer?: ChannelSerializer;
  metrics?: MetricsCollector;
  logger?: Logger;
}

export interface ChatResponder {
  /**
   * Produce a reply for `input`. Resolves undefined for blank input.
   * The reply may be an empty string if the backend returned nothing.
   */
  respond(channelId: ChannelId, input: string): Promise<string | undefined>;
}

export function createChatResponder(deps: ChatResponderDeps): ChatResponder {
  const { store, assembler, backend, serializer, metrics } = deps;
  const baseLogger = deps.logger ?? createLogger("ChatResponder");

  async function runTurn(channelId: ChannelId, input: string): Promise<string> {
    const logger = baseLogger.child("turn");
    logger.setContext({ channelId, turnId: generateId() });
    const stop = logger.time("turn");

    try {
      let reply: string;
      try {
        const history = await assembler.build(channelId);
        reply = (await backend.generate({ history, input })).trim();
      } catch (err) {
        metrics?.increment("turns.failed");
        logger.error("Turn failed, store left unchanged", {
          backend: backend.id,
          error: describeError(err),
        });
        throw new ResponderError(channelId, describeError(err), { cause: err });
      }

      await store.addTurn(channelId, input, reply);
      metrics?.increment("turns.completed");
      logger.info("Turn completed", { inputLength: input.length, replyLength: reply.length });
      return reply;
    } finally {
      stop();
    }
  }

  return {
    async respond(channelId: ChannelId, input: string): Promise<string | undefined> {
      const text = input.trim();
      if (!text) return undefined;
      if (serializer) {
        return serializer.run(channelId, () => runTurn(channelId, text));
      }
      return runTurn(channelId, text);
    },
  };
}
