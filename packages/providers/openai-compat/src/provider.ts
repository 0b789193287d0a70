// OpenAICompatibleProvider: Chat Completions client for any OpenAI-style
// endpoint (OpenAI, OpenRouter, LM Studio, llama.cpp, vLLM).
//
// Handles:
//   • Base URL normalization (with or without /v1, full endpoint URLs)
//   • Message and tool conversion to the snake_case wire format
//   • <think>…</think> blocks moved out of content into reasoningContent
//   • Tool call argument parsing (malformed JSON becomes empty args)
//   • Unified error classification

import type {
  ChatMessage,
  ChatRequest,
  LLMResponse,
  Provider,
  ToolCall,
  ToolDefinition,
} from "@wayfarer/core";
import { ProviderError, errorMessage } from "@wayfarer/core";
import type { WireMessage, WireRequest, WireResponseMessage, WireToolDef } from "./wire";
import { WireResponseSchema } from "./wire";
import { HttpStatusError, buildErrorHint, classifyError } from "./errors";

// ── Config ───────────────────────────────────────────────────────────────────

export interface OpenAICompatibleConfig {
  /** Provider name used in logs and error messages (e.g. "openai", "lmstudio"). */
  readonly name: string;
  /**
   * Base URL for the API. Accepts any of:
   *   http://127.0.0.1:8080
   *   http://127.0.0.1:8080/v1
   *   http://127.0.0.1:8080/v1/chat/completions   (trailing endpoint stripped)
   * All are normalized to http://127.0.0.1:8080/v1 internally.
   */
  readonly baseUrl: string;
  /** Model used when a request does not name one. */
  readonly defaultModel: string;
  /** API key. If empty/undefined, the Authorization header is omitted. */
  readonly apiKey?: string | null;
  /** Extra headers merged into every request (e.g. HTTP-Referer for OpenRouter). */
  readonly extraHeaders?: Record<string, string>;
}

// ── Helpers ──────────────────────────────────────────────────────────────────

export function normalizeBaseUrl(raw: string): string {
  let url = raw.replace(/\/+$/, "");
  // Strip full endpoint path if user pasted the complete URL
  url = url.replace(/\/chat\/completions$/, "");
  if (!url.endsWith("/v1")) url += "/v1";
  return url;
}

export function toWireMessages(messages: ChatMessage[]): WireMessage[] {
  return messages.map((msg): WireMessage => {
    switch (msg.role) {
      case "system":
        return { role: "system", content: msg.content };
      case "user":
        return { role: "user", content: msg.content };
      case "tool":
        return { role: "tool", tool_call_id: msg.toolCallId, name: msg.toolName, content: msg.content };
      case "assistant": {
        const reasoning = msg.reasoningContent ? { reasoning_content: msg.reasoningContent } : {};
        if (msg.toolCalls && msg.toolCalls.length > 0) {
          return {
            role: "assistant",
            content: msg.content || null,
            tool_calls: msg.toolCalls.map((tc) => ({
              id: tc.id,
              type: "function" as const,
              function: { name: tc.name, arguments: JSON.stringify(tc.args) },
            })),
            ...reasoning,
          };
        }
        return { role: "assistant", content: msg.content, ...reasoning };
      }
    }
  });
}

function toWireTools(tools: ToolDefinition[]): WireToolDef[] {
  return tools.map((t) => ({
    type: "function" as const,
    function: { name: t.name, description: t.description, parameters: t.parameters },
  }));
}

const THINK_BLOCK = /<think>([\s\S]*?)<\/think>/g;

/** Split inline <think> blocks out of model text. */
export function extractThinking(text: string): { content: string; reasoning: string } {
  const reasoning: string[] = [];
  const content = text
    .replace(THINK_BLOCK, (_match, inner: string) => {
      reasoning.push(inner.trim());
      return "";
    })
    .replace(/<\/?think>/g, "")
    .trim();
  return { content, reasoning: reasoning.filter(Boolean).join("\n") };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parse tool arguments; anything that is not a JSON object becomes {}. */
export function parseToolArgs(raw: string | null | undefined): Record<string, unknown> {
  if (!raw) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

function toToolCalls(message: WireResponseMessage): ToolCall[] {
  return (message.tool_calls ?? []).map((tc, index) => ({
    id: tc.id || `call_${index}`,
    name: tc.function.name,
    args: parseToolArgs(tc.function.arguments),
  }));
}

// ── Provider ─────────────────────────────────────────────────────────────────

export class OpenAICompatibleProvider implements Provider {
  readonly name: string;
  readonly defaultModel: string;
  readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly extraHeaders: Record<string, string>;

  constructor(config: OpenAICompatibleConfig) {
    this.name = config.name;
    this.defaultModel = config.defaultModel;
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    this.apiKey = config.apiKey ?? "";
    this.extraHeaders = config.extraHeaders ?? {};
  }

  buildRequest(request: ChatRequest): WireRequest {
    const body: WireRequest = {
      model: request.model || this.defaultModel,
      messages: toWireMessages(request.messages),
    };
    if (request.tools && request.tools.length > 0) {
      body.tools = toWireTools(request.tools);
      body.tool_choice = "auto";
    }
    if (request.temperature !== undefined) body.temperature = request.temperature;
    if (request.maxTokens !== undefined) body.max_tokens = request.maxTokens;
    return body;
  }

  async chat(request: ChatRequest): Promise<LLMResponse> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      ...this.extraHeaders,
    };
    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }

    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers,
        body: JSON.stringify(this.buildRequest(request)),
        signal: request.signal,
      });

      if (!response.ok) {
        throw new HttpStatusError(response.status, await response.text(), this.name);
      }

      const parsed = WireResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new ProviderError(
          `${this.name} error: malformed response (${parsed.error.issues[0]?.message ?? "unknown shape"})`,
          "invalid_request",
        );
      }

      const [choice] = parsed.data.choices;
      if (!choice) {
        throw new ProviderError(`${this.name} error: response has no choices`, "invalid_request");
      }
      const { message } = choice;
      const thinking = extractThinking(message.content ?? "");
      const reasoning = message.reasoning_content || message.reasoning || thinking.reasoning;
      const usage = parsed.data.usage;

      return {
        content: thinking.content || null,
        toolCalls: toToolCalls(message),
        ...(reasoning ? { reasoningContent: reasoning } : {}),
        ...(choice.finish_reason ? { finishReason: choice.finish_reason } : {}),
        ...(usage
          ? {
              usage: {
                inputTokens: usage.prompt_tokens,
                outputTokens: usage.completion_tokens,
                totalTokens: usage.total_tokens,
              },
            }
          : {}),
      };
    } catch (err) {
      if (err instanceof ProviderError) throw err;

      const code = classifyError(err);
      const hint = buildErrorHint(code, this.name, this.baseUrl);
      throw new ProviderError(`${this.name} error: ${errorMessage(err)}${hint}`, code, err);
    }
  }
}
