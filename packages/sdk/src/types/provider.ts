/**
 * Provider interfaces - the external collaborators the core consumes.
 */

import type { ChannelId, ContextEntry, PlatformMessage } from "./message.js";

/** Precise token counting, e.g. a model's count endpoint. May reject. */
export interface ITokenCounter {
  id: string;
  count(texts: readonly string[]): Promise<number>;
}

/** A generation request: prior context plus the new user turn. */
export interface GenerationRequest {
  history: ContextEntry[];
  input: string;
}

/** Text generation backend. May reject. */
export interface IGenerationBackend {
  id: string;
  generate(request: GenerationRequest): Promise<string>;
}

/** Live platform history for a channel. */
export interface IHistorySource {
  /** Platform name used in errors and logs, e.g. "discord". */
  platform: string;
  /** Yields up to `limit` most recent messages, newest first. */
  fetchRecent(channelId: ChannelId, limit: number): AsyncIterable<PlatformMessage>;
}
