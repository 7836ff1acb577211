/**
 * Conversation memory interfaces - what the backend sees and how it is kept bounded.
 */

import type {
  ChannelId,
  ContextEntry,
  ConversationRecord,
} from "../types/message.js";

/** Result of a token estimate, tagged with the path that produced it. */
export type TokenEstimate =
  | { kind: "precise"; tokens: number }
  | { kind: "heuristic"; tokens: number; reason: string };

export interface ITokenEstimator {
  /** Never rejects. Empty input is a precise zero. */
  estimate(texts: readonly string[]): Promise<TokenEstimate>;
}

export interface IEvictionPolicy {
  /** Age filter, count cap, then token-budget trim. Returns a new array. */
  apply(records: readonly ConversationRecord[], now: number): Promise<ConversationRecord[]>;
}

/** Bounded per-channel short-term history. */
export interface IConversationStore {
  addMessage(channelId: ChannelId, role: string, content: string): Promise<void>;
  /** Append a user record and an assistant record together, then clean up once. */
  addTurn(channelId: ChannelId, userContent: string, assistantContent: string): Promise<void>;
  /** Without an argument every channel is emptied. */
  clear(channelId?: ChannelId): void;
  getHistory(channelId: ChannelId): ContextEntry[];
  channels(): ChannelId[];
}

/** Builds the ordered context for one turn. */
export interface IContextAssembler {
  build(channelId: ChannelId): Promise<ContextEntry[]>;
}
