/**
 * Console channel - the terminal stands in for a chat channel.
 *
 * Every line typed and every reply printed is kept in a per-channel
 * transcript, which then serves as the platform history.
 */

import type { ChannelId, IHistorySource, PlatformMessage } from "@parley/sdk";

const DEFAULT_TRANSCRIPT_SIZE = 100;

export class ConsoleChannel implements IHistorySource {
  readonly platform = "console";
  private readonly transcripts = new Map<ChannelId, PlatformMessage[]>();

  constructor(private readonly maxEntries: number = DEFAULT_TRANSCRIPT_SIZE) {}

  /** Record a line as it appeared in the channel. */
  record(channelId: ChannelId, text: string, authorIsBot: boolean): void {
    let transcript = this.transcripts.get(channelId);
    if (!transcript) {
      transcript = [];
      this.transcripts.set(channelId, transcript);
    }
    transcript.push({ authorIsBot, cleanedText: text });
    if (transcript.length > this.maxEntries) {
      transcript.splice(0, transcript.length - this.maxEntries);
    }
  }

  async *fetchRecent(channelId: ChannelId, limit: number): AsyncIterable<PlatformMessage> {
    const transcript = this.transcripts.get(channelId) ?? [];
    let yielded = 0;
    for (let i = transcript.length - 1; i >= 0 && yielded < limit; i--) {
      yield transcript[i];
      yielded++;
    }
  }
}
