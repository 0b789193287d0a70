// LLM provider interface

import type { ChatMessage } from "./message";
import type { ToolCall, ToolDefinition } from "./tool";

export type ProviderErrorCode =
  | "throttled"
  | "auth_failed"
  | "invalid_request"
  | "context_length_exceeded"
  | "transient_network"
  | "cancelled"
  | "unknown";

export interface ChatRequest {
  readonly messages: ChatMessage[];
  readonly tools?: ToolDefinition[];
  readonly model: string;
  readonly temperature?: number;
  readonly maxTokens?: number;
  readonly signal?: AbortSignal;
}

/** Exact token counts reported by the provider after a response completes. */
export interface ProviderUsage {
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly totalTokens: number;
}

export interface LLMResponse {
  readonly content: string | null;
  readonly toolCalls: ToolCall[];
  readonly reasoningContent?: string;
  readonly finishReason?: string;
  readonly usage?: ProviderUsage;
}

export interface Provider {
  readonly name: string;
  /** Model used when the caller does not configure one. */
  readonly defaultModel: string;
  chat(request: ChatRequest): Promise<LLMResponse>;
}

export function hasToolCalls(response: LLMResponse): boolean {
  return response.toolCalls.length > 0;
}
