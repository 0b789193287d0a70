// @wayfarer/core: agent loop, tool dispatch, sessions and memory consolidation
// Re-exports all types, interfaces, and core logic

// Types
export * from "./types";

// Events
export { type WayfarerEvents, type EventBus, SimpleEventBus } from "./events";

// Message bus
export { AsyncQueue, InMemoryMessageBus } from "./message-bus";

// Sessions
export { Session, type SessionRecord, type SessionRole, type SessionInit } from "./session";
export { InMemorySessionManager } from "./session-manager";

// Tools
export {
  type ToolHandler,
  type ToolSpec,
  defineTool,
  validateSchema,
  stringArg,
  numberArg,
} from "./tool-schema";
export { ToolRegistry, outcomeText } from "./tool-registry";

// Context builder
export {
  type ContextBuilderOptions,
  type BuildMessagesInput,
  ContextBuilder,
  DEFAULT_SYSTEM_PROMPT,
} from "./context-builder";

// Background jobs
export { type SpawnOptions, type TaskSupervisorOptions, TaskSupervisor } from "./task-supervisor";
export {
  type MemoryConsolidatorDeps,
  type ConsolidateOptions,
  type ConsolidationReply,
  MemoryConsolidator,
  formatTranscript,
  buildConsolidationPrompt,
  parseConsolidationReply,
} from "./consolidation";

// Agent
export {
  type AgentLoopDeps,
  type IterationResult,
  type DirectOptions,
  AgentLoop,
  parseOrigin,
  FALLBACK_REPLY,
  SYSTEM_FALLBACK_REPLY,
  APOLOGY_REPLY,
  NEW_SESSION_REPLY,
  REFLECT_PROMPT,
} from "./agent";
