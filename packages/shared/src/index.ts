export { createLogger, describeError } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { generateId } from "./utils/uuid.js";
export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export {
  ResponderConfigSchema,
  MemoryConfigSchema,
  CognitionConfigSchema,
  DispatchConfigSchema,
  ChannelConfigSchema,
} from "./utils/config-schema.js";
export type { ResponderConfig, MemoryConfig, CognitionConfig } from "./utils/config-schema.js";
