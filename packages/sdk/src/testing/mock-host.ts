/**
 * In-process stand-ins for the external collaborators, for unit tests.
 *
 * - MockTokenCounter: counts words, or fails on demand
 * - MockHistorySource: per-channel platform history, delivered newest first
 * - MockGenerationBackend: queued replies and failures, with call capture
 */

import type {
  ChannelId,
  GenerationRequest,
  IGenerationBackend,
  IHistorySource,
  ITokenCounter,
  PlatformMessage,
} from "../index.js";

export type CountFn = (texts: readonly string[]) => number;

/** Whitespace-separated words across all texts. */
export const countWords: CountFn = (texts) =>
  texts.reduce((sum, text) => sum + text.split(/\s+/).filter(Boolean).length, 0);

export class MockTokenCounter implements ITokenCounter {
  id = "mock-counter";

  private failure: Error | null = null;
  private countFn: CountFn;
  private calls: string[][] = [];

  constructor(countFn: CountFn = countWords) {
    this.countFn = countFn;
  }

  /** Make every following call reject with `error`. Pass null to recover. */
  failWith(error: Error | null): void {
    this.failure = error;
  }

  async count(texts: readonly string[]): Promise<number> {
    this.calls.push([...texts]);
    if (this.failure) throw this.failure;
    return this.countFn(texts);
  }

  getCalls(): string[][] {
    return this.calls.map((c) => [...c]);
  }
}

export class MockHistorySource implements IHistorySource {
  platform = "mock";

  private channels = new Map<ChannelId, PlatformMessage[]>();
  private failure: Error | null = null;
  private requests: Array<{ channelId: ChannelId; limit: number }> = [];

  /** Append a message as the newest in the channel. */
  post(channelId: ChannelId, cleanedText: string, authorIsBot = false): void {
    const list = this.channels.get(channelId) ?? [];
    list.push({ authorIsBot, cleanedText });
    this.channels.set(channelId, list);
  }

  failWith(error: Error | null): void {
    this.failure = error;
  }

  async *fetchRecent(channelId: ChannelId, limit: number): AsyncIterable<PlatformMessage> {
    this.requests.push({ channelId, limit });
    if (this.failure) throw this.failure;
    const list = this.channels.get(channelId) ?? [];
    const newestFirst = [...list].reverse().slice(0, limit);
    for (const message of newestFirst) {
      yield { ...message };
    }
  }

  getRequests(): Array<{ channelId: ChannelId; limit: number }> {
    return [...this.requests];
  }
}

export class MockGenerationBackend implements IGenerationBackend {
  id = "mock-backend";

  private queue: Array<string | Error> = [];
  private callHistory: GenerationRequest[] = [];

  setNextResponse(text: string): void {
    this.queue.push(text);
  }

  setNextFailure(error: Error): void {
    this.queue.push(error);
  }

  async generate(request: GenerationRequest): Promise<string> {
    this.callHistory.push({ history: [...request.history], input: request.input });
    const next = this.queue.shift();
    if (next instanceof Error) throw next;
    return next ?? `echo: ${request.input}`;
  }

  getCallHistory(): GenerationRequest[] {
    return [...this.callHistory];
  }
}
