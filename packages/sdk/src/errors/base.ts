/**
 * Error hierarchy for the responder.
 */

import type { ChannelId } from "../types/message.js";

export class ParleyError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ParleyError";
  }
}

export class ProviderError extends ParleyError {
  constructor(
    public readonly providerId: string,
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(`Provider "${providerId}" error: ${message}`, options?.code ?? "PROVIDER_ERROR", options);
    this.name = "ProviderError";
  }
}

export class PlatformError extends ParleyError {
  constructor(
    public readonly platform: string,
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(`Platform "${platform}" error: ${message}`, options?.code ?? "PLATFORM_ERROR", options);
    this.name = "PlatformError";
  }
}

/**
 * A turn that could not be completed. The store is left as it was
 * before the turn started.
 */
export class ResponderError extends ParleyError {
  constructor(
    public readonly channelId: ChannelId,
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(`Turn in channel "${channelId}" failed: ${message}`, options?.code ?? "TURN_FAILED", options);
    this.name = "ResponderError";
  }
}

export class ConfigError extends ParleyError {
  constructor(
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(message, options?.code ?? "CONFIG_ERROR", options);
    this.name = "ConfigError";
  }
}
