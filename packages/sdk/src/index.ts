// Types
export type {
  ChannelId,
  ConversationRecord,
  ContextEntry,
  PlatformMessage,
} from "./types/message.js";

export { ConversationRole, toConversationRole, roleFromAuthor } from "./types/message.js";

export type {
  ITokenCounter,
  IGenerationBackend,
  IHistorySource,
  GenerationRequest,
} from "./types/provider.js";

// Errors
export {
  ParleyError,
  ProviderError,
  PlatformError,
  ResponderError,
  ConfigError,
} from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";

// Interfaces
export type {
  TokenEstimate,
  ITokenEstimator,
  IEvictionPolicy,
  IConversationStore,
  IContextAssembler,
} from "./interfaces/context.js";
