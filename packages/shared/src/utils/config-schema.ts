/**
 * Zod schema for parley.json runtime validation.
 *
 * Every field has a default, so an empty object (or no file at all)
 * yields the deployed configuration.
 */

import { z } from "zod";

export const MemoryConfigSchema = z.object({
  maxAgeMinutes: z.number().positive("maxAgeMinutes must be positive").default(10),
  maxMessages: z.number().int().positive("maxMessages must be at least 1").default(20),
  tokenLimit: z.number().int().positive("tokenLimit must be at least 1").default(7168),
  historyFetchLimit: z.number().int().nonnegative().default(5),
  estimatorTimeoutMs: z.number().int().positive().optional(),
  historyFetchTimeoutMs: z.number().int().positive().optional(),
});

export const CognitionConfigSchema = z.object({
  provider: z.literal("gemini").default("gemini"),
  model: z.string().min(1, "Model name must not be empty").default("gemini-1.5-flash"),
  apiKeyEnv: z.string().min(1).default("GEMINI_API_KEY"),
});

export const DispatchConfigSchema = z.object({
  serializePerChannel: z.boolean().default(true),
});

export const ChannelConfigSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]).default("console"),
});

export const ResponderConfigSchema = z.object({
  memory: MemoryConfigSchema.default({}),
  cognition: CognitionConfigSchema.default({}),
  dispatch: DispatchConfigSchema.default({}),
  channel: ChannelConfigSchema.default({}),
});

export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;
export type CognitionConfig = z.infer<typeof CognitionConfigSchema>;
export type ResponderConfig = z.infer<typeof ResponderConfigSchema>;
