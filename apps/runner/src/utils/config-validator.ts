/**
 * Config validation with detailed error reporting.
 *
 * Validates parley.json using the Zod schema, then checks what the
 * schema cannot see (the environment, limits that fight each other).
 */

import type { ResponderConfig } from "@parley/shared";
import { ResponderConfigSchema } from "@parley/shared";

/**
 * Individual validation error with context.
 */
export interface ConfigValidationError {
  /** Error path (e.g., "memory.maxMessages") */
  path: string;

  message: string;

  severity: "error" | "warning";

  suggestion?: string;
}

export interface ConfigValidationResult {
  valid: boolean;

  /** Validated config with defaults applied (only if valid) */
  config?: ResponderConfig;

  /** Errors, or warnings on a valid config */
  errors?: ConfigValidationError[];
}

export function validateConfig(
  config: unknown,
  env: NodeJS.ProcessEnv = process.env,
): ConfigValidationResult {
  const result = ResponderConfigSchema.safeParse(config);
  if (!result.success) {
    return {
      valid: false,
      errors: parseZodErrors(result.error),
    };
  }

  const allErrors = validateSemantics(result.data, env);

  const hasErrors = allErrors.some(e => e.severity === "error");
  if (hasErrors) {
    return {
      valid: false,
      errors: allErrors,
    };
  }

  return {
    valid: true,
    config: result.data,
    errors: allErrors.length > 0 ? allErrors : undefined,
  };
}

function validateSemantics(config: ResponderConfig, env: NodeJS.ProcessEnv): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];
  const { apiKeyEnv } = config.cognition;

  if (!env[apiKeyEnv]) {
    errors.push({
      path: "cognition.apiKeyEnv",
      message: `Environment variable ${apiKeyEnv} is not set`,
      severity: "error",
      suggestion: `export ${apiKeyEnv}=<your API key>`,
    });
  }

  // A turn appends two records; a cap of one evicts the user half immediately.
  if (config.memory.maxMessages < 2) {
    errors.push({
      path: "memory.maxMessages",
      message: "maxMessages below 2 cannot hold a single exchange",
      severity: "warning",
      suggestion: "Use at least 2",
    });
  }

  if (config.memory.historyFetchLimit > config.memory.maxMessages) {
    errors.push({
      path: "memory.historyFetchLimit",
      message: "historyFetchLimit exceeds maxMessages; fetched history will dominate the context",
      severity: "warning",
    });
  }

  return errors;
}

function parseZodErrors(zodError: { issues: Array<{ path: Array<string | number>; message: string }> }): ConfigValidationError[] {
  return zodError.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
    severity: "error" as const,
  }));
}
