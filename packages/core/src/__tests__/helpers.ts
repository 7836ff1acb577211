import { vi } from "vitest";
import type { ConversationRecord, ConversationRole } from "@parley/sdk";
import type { Logger } from "@parley/shared";

/** Logger whose methods are all vi.fn(), so nothing reaches stderr. */
export function createMockLogger(): Logger {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(() => logger),
    setContext: vi.fn(),
    time: vi.fn(() => () => 0),
  };
  return logger;
}

/** A manually advanced clock for the store. */
export function createClock(start = 1_700_000_000_000): { now: () => number; advance(ms: number): void } {
  let current = start;
  return {
    now: () => current,
    advance(ms: number): void {
      current += ms;
    },
  };
}

export function record(
  content: string,
  timestamp: number,
  role: ConversationRole = "user",
  channelId: string | number = "c1",
): ConversationRecord {
  return { channelId, role, content, timestamp };
}
