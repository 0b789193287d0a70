// ContextBuilder: assembles the provider message list for one turn

import type {
  AssistantMessage,
  ChatMessage,
  Logger,
  MemoryStore,
  ToolCall,
} from "./types";
import type { SessionRole } from "./session";

export const DEFAULT_SYSTEM_PROMPT =
  "You are Wayfarer, a personal AI assistant. You are helpful, concise, and conversational.\n\n" +
  "You have access to tools (web fetch, web search, messaging) that you can call when needed. " +
  "Use them proactively to answer questions that need current information. " +
  "Never expose tool definitions, JSON schemas, or internal function signatures to the user.\n\n" +
  "Match the user's language. Keep responses focused and avoid unnecessary preamble.";

export interface ContextBuilderOptions {
  readonly systemPrompt?: string;
  readonly memory?: MemoryStore;
  readonly logger: Logger;
  /** Clock used for the "Current Time" section. */
  readonly now?: () => Date;
}

export interface BuildMessagesInput {
  readonly history: ReadonlyArray<{ role: SessionRole; content: string }>;
  readonly currentMessage: string;
  readonly media?: readonly string[];
  readonly channel?: string;
  readonly chatId?: string;
}

export class ContextBuilder {
  private readonly systemPrompt: string;
  private readonly memory?: MemoryStore;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: ContextBuilderOptions) {
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.memory = options.memory;
    this.logger = options.logger.child({ component: "ContextBuilder" });
    this.now = options.now ?? (() => new Date());
  }

  async buildSystemPrompt(channel?: string, chatId?: string): Promise<string> {
    const sections = [this.systemPrompt, `## Current Time\n${this.now().toISOString()}`];

    if (channel && chatId) {
      sections.push(`## Current Session\nChannel: ${channel}\nChat ID: ${chatId}`);
    }

    const memory = await this.readMemory();
    if (memory) {
      sections.push(`## Long-term Memory\n${memory}`);
    }

    return sections.join("\n\n");
  }

  async buildMessages(input: BuildMessagesInput): Promise<ChatMessage[]> {
    const messages: ChatMessage[] = [
      { role: "system", content: await this.buildSystemPrompt(input.channel, input.chatId) },
    ];

    for (const turn of input.history) {
      messages.push(
        turn.role === "user"
          ? { role: "user", content: turn.content }
          : { role: "assistant", content: turn.content },
      );
    }

    messages.push({ role: "user", content: withMedia(input.currentMessage, input.media) });
    return messages;
  }

  /** Append the assistant turn that requested `toolCalls`. */
  addAssistantMessage(
    messages: ChatMessage[],
    content: string | null,
    toolCalls: ToolCall[],
    reasoningContent?: string,
  ): ChatMessage[] {
    const turn: AssistantMessage = {
      role: "assistant",
      content,
      ...(toolCalls.length > 0 ? { toolCalls } : {}),
      ...(reasoningContent ? { reasoningContent } : {}),
    };
    messages.push(turn);
    return messages;
  }

  addToolResult(
    messages: ChatMessage[],
    toolCallId: string,
    toolName: string,
    result: string,
  ): ChatMessage[] {
    messages.push({ role: "tool", toolCallId, toolName, content: result });
    return messages;
  }

  private async readMemory(): Promise<string> {
    if (!this.memory) return "";
    const result = await this.memory.readLongTerm();
    if (!result.ok) {
      this.logger.warn("Failed to read long-term memory", { error: result.error.message });
      return "";
    }
    return result.value.trim();
  }
}

function withMedia(content: string, media?: readonly string[]): string {
  if (!media || media.length === 0) return content;
  return `${content}\n\n[Attached media]\n${media.map((m) => `- ${m}`).join("\n")}`;
}
