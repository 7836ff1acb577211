/**
 * Core conversation types shared by the store, the assembler and providers.
 */

/** Canonical roles. Every caller vocabulary is mapped onto these two. */
export const ConversationRole = {
  User: "user",
  Assistant: "assistant",
} as const;

export type ConversationRole = (typeof ConversationRole)[keyof typeof ConversationRole];

/** Stable identifier of a conversation destination on the messaging platform. */
export type ChannelId = string | number;

/** A stored exchange. Never mutated after creation. */
export interface ConversationRecord {
  readonly channelId: ChannelId;
  readonly role: ConversationRole;
  readonly content: string;
  /** Epoch milliseconds. */
  readonly timestamp: number;
}

/** What the generation backend sees for one prior message. */
export interface ContextEntry {
  role: ConversationRole;
  content: string;
}

/** A message as delivered by the platform history fetch. */
export interface PlatformMessage {
  authorIsBot: boolean;
  cleanedText: string;
}

const ASSISTANT_LABELS = new Set(["assistant", "model"]);

/**
 * Map a caller's role label onto the canonical roles.
 * "assistant" and "model" become Assistant; anything else is User.
 */
export function toConversationRole(label: string): ConversationRole {
  return ASSISTANT_LABELS.has(label.trim().toLowerCase())
    ? ConversationRole.Assistant
    : ConversationRole.User;
}

/** Map the platform's author flag onto the canonical roles. */
export function roleFromAuthor(authorIsBot: boolean): ConversationRole {
  return authorIsBot ? ConversationRole.Assistant : ConversationRole.User;
}
