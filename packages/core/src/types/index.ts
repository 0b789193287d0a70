// Barrel export: the public type surface of @wayfarer/core types

export type {
  ChatRole,
  ChatMessage,
  SystemMessage,
  UserMessage,
  AssistantMessage,
  ToolMessage,
} from "./message";

export type {
  Provider,
  ChatRequest,
  LLMResponse,
  ProviderUsage,
  ProviderErrorCode,
} from "./provider";
export { hasToolCalls } from "./provider";

export type {
  JsonSchema,
  ToolDefinition,
  ToolCall,
  Tool,
  ContextualTool,
  ToolOutcome,
} from "./tool";
export { isContextualTool } from "./tool";

export type {
  InboundMessage,
  OutboundMessage,
  MessageBus,
  Channel,
} from "./channel";
export { SYSTEM_CHANNEL, sessionKeyOf } from "./channel";

export type { SessionStore } from "./session";

export type { MemoryStore, HistoryEntry } from "./memory";

export type {
  Lifecycle,
  LifecycleStatus,
} from "./lifecycle";

export type {
  Logger,
  LogLevel,
  LogWriter,
} from "./logger";
export { ConsoleLogger, LOG_LEVELS } from "./logger";

export {
  WayfarerError,
  ProviderError,
  MemoryError,
  ChannelError,
  ConfigError,
  SessionError,
  ok,
  err,
  errorMessage,
} from "./errors";
export type { Result } from "./errors";
