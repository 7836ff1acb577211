/**
 * Start command - run the responder on a console channel.
 *
 * Each line read from the input is one inbound message; the reply is
 * written to the output. Ends on EOF, SIGINT or SIGTERM.
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { createInterface } from "node:readline";
import { ConfigError, ErrorCode } from "@parley/sdk";
import {
  createChannelSerializer,
  createChatResponder,
  createConversationMemory,
  createMetricsCollector,
} from "@parley/core";
import type { ChatResponder } from "@parley/core";
import type { ResponderConfig } from "@parley/shared";
import type { CliCommand, ParsedArgs } from "./base.js";
import { validateConfig } from "../utils/config-validator.js";
import type { ConfigValidationError } from "../utils/config-validator.js";
import { createGeminiProviders } from "../providers/gemini.js";
import type { GeminiProviders } from "../providers/gemini.js";
import { ConsoleChannel } from "../channel/console-channel.js";
import { DEFAULT_ENV_FILE, loadEnvFile } from "../utils/env-file.js";

export const DEFAULT_CONFIG_FILE = "parley.json";
export const EMPTY_REPLY = "Hmm…";

export interface StartCommandDeps {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  env?: NodeJS.ProcessEnv;
  createProviders?: (apiKey: string, model: string) => GeminiProviders;
}

export class StartCommand implements CliCommand {
  name = "start";
  description = "Answer messages typed on the console";

  constructor(private readonly deps: StartCommandDeps = {}) {}

  async execute(args: ParsedArgs): Promise<number> {
    const configPath = typeof args.flags.config === "string" ? resolve(args.flags.config) : undefined;
    const envFilePath = typeof args.flags["env-file"] === "string" ? resolve(args.flags["env-file"]) : undefined;
    const env = this.deps.env ?? process.env;

    try {
      await this.loadEnv(envFilePath, env);
    } catch (err) {
      console.error(
        `[cli] Failed to load env file ${envFilePath ?? DEFAULT_ENV_FILE}: ${err instanceof Error ? err.message : String(err)}`,
      );
      return 1;
    }

    let raw: unknown;
    try {
      raw = await this.loadConfig(configPath);
    } catch (err) {
      console.error(
        `[cli] Failed to load config ${configPath ?? DEFAULT_CONFIG_FILE}: ${err instanceof Error ? err.message : String(err)}`,
      );
      return 1;
    }

    const validation = validateConfig(raw, env);
    if (!validation.valid || !validation.config) {
      this.printValidationErrors(validation.errors ?? []);
      return 1;
    }
    for (const w of validation.errors ?? []) {
      console.warn(`[cli] Warning: ${w.message} (${w.path})`);
    }

    let assembled: { responder: ChatResponder; channel: ConsoleChannel };
    try {
      assembled = this.assemble(validation.config, env);
    } catch (err) {
      console.error(`[cli] ${err instanceof Error ? err.message : String(err)}`);
      return 1;
    }

    return this.serve(validation.config, assembled.responder, assembled.channel);
  }

  /**
   * Read the config file. An explicit path must exist; otherwise
   * ./parley.json is used when present, and defaults when not.
   */
  private async loadConfig(configPath: string | undefined): Promise<unknown> {
    const target = configPath ?? resolve(DEFAULT_CONFIG_FILE);
    if (!configPath && !existsSync(target)) {
      return {};
    }
    const text = await readFile(target, "utf-8");
    const json: unknown = JSON.parse(text);
    return json;
  }

  /**
   * Apply an env file to `env`. An explicit path must exist; otherwise
   * ./.env is read when present.
   */
  private async loadEnv(envFilePath: string | undefined, env: NodeJS.ProcessEnv): Promise<void> {
    const target = envFilePath ?? resolve(DEFAULT_ENV_FILE);
    if (!envFilePath && !existsSync(target)) return;
    const applied = await loadEnvFile(target, env);
    if (applied.length > 0) {
      console.error(`[cli] Loaded ${applied.length} variable(s) from ${target}`);
    }
  }

  private assemble(
    config: ResponderConfig,
    env: NodeJS.ProcessEnv,
  ): { responder: ChatResponder; channel: ConsoleChannel } {
    const apiKey = env[config.cognition.apiKeyEnv];
    if (!apiKey) {
      throw new ConfigError(`Environment variable ${config.cognition.apiKeyEnv} is not set`, {
        code: ErrorCode.CONFIG_MISSING_API_KEY,
      });
    }

    const makeProviders = this.deps.createProviders ?? createGeminiProviders;
    const { counter, backend } = makeProviders(apiKey, config.cognition.model);
    const channel = new ConsoleChannel();
    const metrics = createMetricsCollector();
    const { store, assembler } = createConversationMemory({
      config: config.memory,
      counter,
      source: channel,
      metrics,
    });

    const responder = createChatResponder({
      store,
      assembler,
      backend,
      metrics,
      serializer: config.dispatch.serializePerChannel ? createChannelSerializer() : undefined,
    });
    return { responder, channel };
  }

  private async serve(
    config: ResponderConfig,
    responder: ChatResponder,
    channel: ConsoleChannel,
  ): Promise<number> {
    const output = this.deps.output ?? process.stdout;
    const rl = createInterface({ input: this.deps.input ?? process.stdin, terminal: false });
    const channelId = config.channel.id;

    const shutdown = (signal: string): void => {
      console.error(`\n[cli] Shutting down (${signal})...`);
      rl.close();
    };
    const onSigint = (): void => shutdown("SIGINT");
    const onSigterm = (): void => shutdown("SIGTERM");
    process.on("SIGINT", onSigint);
    process.on("SIGTERM", onSigterm);

    try {
      for await (const line of rl) {
        const text = line.trim();
        if (!text) continue;

        // The line is part of the channel before the reply is composed.
        channel.record(channelId, text, false);
        try {
          const reply = await responder.respond(channelId, text);
          const shown = reply ? reply : EMPTY_REPLY;
          channel.record(channelId, shown, true);
          output.write(`${shown}\n`);
        } catch (err) {
          output.write(`Sorry, something went wrong: ${err instanceof Error ? err.message : String(err)}\n`);
        }
      }
    } finally {
      process.off("SIGINT", onSigint);
      process.off("SIGTERM", onSigterm);
    }
    return 0;
  }

  private printValidationErrors(errors: ConfigValidationError[]): void {
    console.error("[cli] Config validation failed:\n");

    for (const err of errors) {
      console.error(`${err.severity.toUpperCase()}: ${err.path}`);
      console.error(`  ${err.message}`);
      if (err.suggestion) {
        console.error(`  Suggestion: ${err.suggestion}`);
      }
      console.error("");
    }

    console.error("Fix these errors and try again.");
  }
}
