/**
 * Structured logger with JSON output support.
 *
 * Features:
 * - JSON-structured log entries (when LOG_FORMAT=json)
 * - Log level filtering via LOG_LEVEL env var
 * - channel_id and turn_id fields so one turn can be followed across modules
 * - Child loggers inherit context
 *
 * Everything goes to stderr; stdout belongs to the console channel.
 */

import { performance } from "node:perf_hooks";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogContext {
  channelId?: string | number;
  turnId?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(name: string): Logger;
  /** Set persistent context fields (channelId, turnId, ...) */
  setContext(ctx: LogContext): void;
  /** Start a timer. Returns a stop function that logs elapsed time and returns duration in ms. */
  time(label: string): () => number;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

/** Resolve min log level from environment. */
function resolveMinLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  const env = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(env) ? env : "info";
}

function isJsonFormat(): boolean {
  return process.env.LOG_FORMAT?.toLowerCase() === "json";
}

/** Render an unknown thrown value for the `error` field of a log entry. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createLogger(
  name: string,
  minLevel?: LogLevel,
  parentContext?: LogContext,
): Logger {
  const minPriority = LEVEL_PRIORITY[resolveMinLevel(minLevel)];
  const useJson = isJsonFormat();
  let context: LogContext = { ...parentContext };

  function log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const timestamp = new Date().toISOString();
    const hasData = data !== undefined && Object.keys(data).length > 0;

    if (useJson) {
      const entry: Record<string, unknown> = {
        timestamp,
        level,
        module: name,
        message,
      };
      if (context.channelId !== undefined) entry.channel_id = context.channelId;
      if (context.turnId) entry.turn_id = context.turnId;
      if (hasData) Object.assign(entry, data);
      console.error(JSON.stringify(entry));
      return;
    }

    const scope = context.channelId !== undefined ? ` [#${context.channelId}]` : "";
    const prefix = `[${timestamp}] [${level.toUpperCase()}] [${name}]${scope}`;
    console.error(hasData ? `${prefix} ${message} ${JSON.stringify(data)}` : `${prefix} ${message}`);
  }

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
    child: (childName) =>
      createLogger(`${name}:${childName}`, resolveMinLevel(minLevel), {
        ...context,
      }),
    setContext(ctx: LogContext): void {
      context = { ...context, ...ctx };
    },
    time(label: string): () => number {
      const start = performance.now();
      return () => {
        const durationMs = Math.round((performance.now() - start) * 100) / 100;
        log("debug", `${label} completed`, { label, durationMs });
        return durationMs;
      };
    },
  };
}
