export const ErrorCode = {
  PROVIDER_ERROR: "PROVIDER_ERROR",
  PROVIDER_TIMEOUT: "PROVIDER_TIMEOUT",
  PLATFORM_ERROR: "PLATFORM_ERROR",
  PLATFORM_TIMEOUT: "PLATFORM_TIMEOUT",
  TURN_FAILED: "TURN_FAILED",
  CONFIG_ERROR: "CONFIG_ERROR",
  CONFIG_VALIDATION_ERROR: "CONFIG_VALIDATION_ERROR",
  CONFIG_MISSING_API_KEY: "CONFIG_MISSING_API_KEY",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
