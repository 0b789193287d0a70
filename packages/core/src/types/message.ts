// Provider-facing chat messages

import type { ToolCall } from "./tool";

export type ChatRole = "system" | "user" | "assistant" | "tool";

export interface SystemMessage {
  readonly role: "system";
  readonly content: string;
}

export interface UserMessage {
  readonly role: "user";
  readonly content: string;
}

export interface AssistantMessage {
  readonly role: "assistant";
  readonly content: string | null;
  /** Tool calls requested by the model in this turn */
  readonly toolCalls?: ToolCall[];
  /** Reasoning text some models return alongside the answer */
  readonly reasoningContent?: string;
}

export interface ToolMessage {
  readonly role: "tool";
  /** Links the result back to the assistant's call */
  readonly toolCallId: string;
  readonly toolName: string;
  readonly content: string;
}

export type ChatMessage = SystemMessage | UserMessage | AssistantMessage | ToolMessage;
