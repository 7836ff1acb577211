/**
 * Gemini adapters: the token counter and the generation backend both talk
 * to one GenerativeModel.
 */

import { GoogleGenerativeAI } from "@google/generative-ai";
import type { Content } from "@google/generative-ai";
import type {
  ContextEntry,
  GenerationRequest,
  IGenerationBackend,
  ITokenCounter,
} from "@parley/sdk";
import { ConversationRole, ProviderError } from "@parley/sdk";

/** The slice of GenerativeModel the adapters call. */
export interface GeminiModel {
  countTokens(request: string[]): Promise<{ totalTokens: number }>;
  startChat(params: { history: Content[] }): {
    sendMessage(text: string): Promise<{ response: { text(): string } }>;
  };
}

export interface GeminiProviders {
  counter: ITokenCounter;
  backend: IGenerationBackend;
}

/**
 * Convert context entries to Gemini chat history.
 * Gemini rejects empty text parts and requires the history to open with a
 * user turn, so empty entries and leading assistant entries are dropped.
 */
export function toGeminiHistory(entries: readonly ContextEntry[]): Content[] {
  const nonEmpty = entries.filter((e) => e.content !== "");
  const firstUser = nonEmpty.findIndex((e) => e.role === ConversationRole.User);
  if (firstUser === -1) return [];

  return nonEmpty.slice(firstUser).map((entry) => ({
    role: entry.role === ConversationRole.Assistant ? "model" : "user",
    parts: [{ text: entry.content }],
  }));
}

export class GeminiTokenCounter implements ITokenCounter {
  readonly id: string;

  constructor(private readonly model: GeminiModel, modelName: string) {
    this.id = `gemini:${modelName}`;
  }

  async count(texts: readonly string[]): Promise<number> {
    try {
      const { totalTokens } = await this.model.countTokens([...texts]);
      return totalTokens;
    } catch (err) {
      throw new ProviderError(this.id, "countTokens failed", { cause: err });
    }
  }
}

export class GeminiBackend implements IGenerationBackend {
  readonly id: string;

  constructor(private readonly model: GeminiModel, modelName: string) {
    this.id = `gemini:${modelName}`;
  }

  async generate(request: GenerationRequest): Promise<string> {
    try {
      const chat = this.model.startChat({ history: toGeminiHistory(request.history) });
      const result = await chat.sendMessage(request.input);
      return result.response.text();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ProviderError(this.id, message, { cause: err });
    }
  }
}

export function createGeminiProviders(apiKey: string, modelName: string): GeminiProviders {
  const model = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model: modelName });
  return {
    counter: new GeminiTokenCounter(model, modelName),
    backend: new GeminiBackend(model, modelName),
  };
}
