// Tool system types -- definitions, calls, capabilities

import type { Result } from "./errors";

/**
 * JSON Schema describing a tool's parameters. Sent to the provider and
 * used for local argument validation.
 */
export interface JsonSchema {
  readonly type?: string | readonly string[];
  readonly description?: string;
  readonly enum?: readonly unknown[];
  readonly default?: unknown;
  readonly minimum?: number;
  readonly maximum?: number;
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly minItems?: number;
  readonly maxItems?: number;
  readonly properties?: Readonly<Record<string, JsonSchema>>;
  readonly required?: readonly string[];
  readonly items?: JsonSchema;
}

export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly parameters: JsonSchema;
}

/**
 * A tool invocation requested by the LLM. Ids are unique within one batch.
 */
export interface ToolCall {
  readonly id: string;
  readonly name: string;
  readonly args: Record<string, unknown>;
}

/**
 * A callable capability registered under a unique name.
 */
export interface Tool extends ToolDefinition {
  /** Returns every violation found in `args`; empty when valid. */
  validate(args: Record<string, unknown>): string[];
  execute(args: Record<string, unknown>): Promise<string>;
}

/** Tools that need to know where the current turn came from. */
export interface ContextualTool extends Tool {
  setContext(channel: string, chatId: string): void;
}

export function isContextualTool(tool: Tool): tool is ContextualTool {
  return "setContext" in tool && typeof tool.setContext === "function";
}

/**
 * Tool outcome at the registry boundary. Errors are text meant for the model,
 * so both branches carry a string.
 */
export type ToolOutcome = Result<string, string>;
