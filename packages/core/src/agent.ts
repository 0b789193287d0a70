// AgentLoop: bounded tool-calling cycle between the message bus and the provider
//
// Flow: inbound message → session lookup → build context → call provider →
//   if tool calls, execute them in order → append results → call provider
//   again → repeat until the LLM returns pure text (or maxIterations is hit)
//   → persist the turn → publish the reply → maybe consolidate memory.

import type {
  ChatMessage,
  InboundMessage,
  Logger,
  MemoryStore,
  MessageBus,
  OutboundMessage,
  Provider,
  SessionStore,
} from "./types";
import { SYSTEM_CHANNEL, errorMessage, hasToolCalls, sessionKeyOf } from "./types";
import type { ContextBuilder } from "./context-builder";
import type { EventBus } from "./events";
import type { Session } from "./session";
import { MemoryConsolidator } from "./consolidation";
import { TaskSupervisor } from "./task-supervisor";
import { outcomeText, type ToolRegistry } from "./tool-registry";

export const FALLBACK_REPLY = "I've completed processing but have no response to give.";
export const SYSTEM_FALLBACK_REPLY = "Background task completed.";
export const APOLOGY_REPLY = "Sorry, I encountered an internal error. Please try again.";
export const NEW_SESSION_REPLY = "New session started. Memory consolidation in progress.";
export const REFLECT_PROMPT = "Reflect on the results and decide next steps.";

const DEFAULT_MAX_ITERATIONS = 20;
const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_MAX_TOKENS = 4096;
const DEFAULT_MEMORY_WINDOW = 50;
const DEFAULT_POLL_INTERVAL_MS = 1000;

export interface AgentLoopDeps {
  readonly bus: MessageBus;
  readonly provider: Provider;
  readonly sessions: SessionStore;
  readonly tools: ToolRegistry;
  readonly contextBuilder: ContextBuilder;
  readonly logger: Logger;
  /** Without a memory store no consolidation is scheduled. */
  readonly memory?: MemoryStore;
  readonly eventBus?: EventBus;
  readonly supervisor?: TaskSupervisor;
  readonly model?: string;
  readonly maxIterations?: number;
  readonly temperature?: number;
  readonly maxTokens?: number;
  readonly memoryWindow?: number;
  readonly pollIntervalMs?: number;
}

export interface IterationResult {
  /** Final text, or null when the provider never produced any. */
  readonly content: string | null;
  /** Tool names in call order, duplicates included. */
  readonly toolsUsed: string[];
  /** Number of provider calls made. */
  readonly iterations: number;
}

export interface DirectOptions {
  readonly sessionKey?: string;
  readonly channel?: string;
  readonly chatId?: string;
}

export class AgentLoop {
  private readonly logger: Logger;
  private readonly supervisor: TaskSupervisor;
  private readonly consolidator?: MemoryConsolidator;
  private readonly model: string;
  private readonly maxIterations: number;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly memoryWindow: number;
  private readonly pollIntervalMs: number;
  private running = false;

  constructor(private readonly deps: AgentLoopDeps) {
    this.logger = deps.logger.child({ component: "AgentLoop" });
    this.supervisor = deps.supervisor ?? new TaskSupervisor(deps.logger);
    this.model = deps.model ?? deps.provider.defaultModel;
    this.maxIterations = deps.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.temperature = deps.temperature ?? DEFAULT_TEMPERATURE;
    this.maxTokens = deps.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.memoryWindow = deps.memoryWindow ?? DEFAULT_MEMORY_WINDOW;
    this.pollIntervalMs = deps.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;

    if (deps.memory) {
      this.consolidator = new MemoryConsolidator({
        provider: deps.provider,
        memory: deps.memory,
        sessions: deps.sessions,
        logger: deps.logger,
        model: this.model,
        memoryWindow: this.memoryWindow,
        eventBus: deps.eventBus,
      });
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Consume inbound messages until stop() is called. A failure while
   * processing one message is answered with an apology and never ends
   * the loop.
   */
  async run(): Promise<void> {
    this.running = true;
    this.logger.info("Agent loop started");

    while (this.running) {
      const msg = await this.deps.bus.consumeInbound(this.pollIntervalMs);
      if (!msg) continue;

      try {
        const response = await this.processMessage(msg);
        if (response) await this.deps.bus.publishOutbound(response);
      } catch (e) {
        this.logger.error("Error processing message", {
          channel: msg.channel,
          chatId: msg.chatId,
          error: errorMessage(e),
        });
        await this.deps.bus.publishOutbound({
          channel: msg.channel,
          chatId: msg.chatId,
          content: APOLOGY_REPLY,
        });
      }
    }

    this.logger.info("Agent loop stopped");
  }

  /** Stop taking new messages. The message in progress finishes. */
  stop(): void {
    this.running = false;
  }

  /** Stop intake and wait for background consolidation to finish. */
  async shutdown(): Promise<void> {
    this.stop();
    await this.supervisor.drain();
  }

  /** Process one message outside the bus and return the reply text. */
  async processDirect(content: string, options: DirectOptions = {}): Promise<string> {
    const msg: InboundMessage = {
      channel: options.channel ?? "cli",
      senderId: "user",
      chatId: options.chatId ?? "direct",
      content,
      timestamp: Date.now(),
    };
    const response = await this.processMessage(msg, options.sessionKey ?? "cli:direct");
    return response?.content ?? "";
  }

  async processMessage(msg: InboundMessage, sessionKey?: string): Promise<OutboundMessage | null> {
    if (msg.channel === SYSTEM_CHANNEL) {
      return this.processSystemMessage(msg);
    }

    const startTime = Date.now();
    const key = sessionKey ?? sessionKeyOf(msg);
    this.logger.info("Processing message", {
      channel: msg.channel,
      senderId: msg.senderId,
      sessionKey: key,
      preview: msg.content.slice(0, 80),
    });
    this.deps.eventBus?.emit("message:received", { sessionKey: key, message: msg });

    const session = await this.deps.sessions.getOrCreate(key);
    const command = msg.content.trim().toLowerCase();

    if (command === "/new") {
      return this.resetSession(msg, session);
    }
    if (command === "/help") {
      return { channel: msg.channel, chatId: msg.chatId, content: this.helpText() };
    }

    this.deps.tools.setContext(msg.channel, msg.chatId);
    const messages = await this.deps.contextBuilder.buildMessages({
      history: session.getHistory(this.memoryWindow),
      currentMessage: msg.content,
      media: msg.media,
      channel: msg.channel,
      chatId: msg.chatId,
    });

    const result = await this.runIterations(messages, key);
    const content = result.content ?? FALLBACK_REPLY;

    session.addMessage("user", msg.content);
    session.addMessage("assistant", content, result.toolsUsed);
    await this.deps.sessions.save(session);

    this.maybeConsolidate(session);

    const response: OutboundMessage = {
      channel: msg.channel,
      chatId: msg.chatId,
      content,
      ...(msg.metadata ? { metadata: msg.metadata } : {}),
    };

    this.deps.eventBus?.emit("message:response", {
      sessionKey: key,
      message: response,
      durationMs: Date.now() - startTime,
      iterations: result.iterations,
    });
    return response;
  }

  /**
   * Drive the provider until it answers without tool calls or the
   * iteration limit is reached. Mutates `messages` with every assistant,
   * tool and steering turn.
   */
  async runIterations(messages: ChatMessage[], sessionKey: string): Promise<IterationResult> {
    const toolsUsed: string[] = [];
    const definitions = this.deps.tools.getDefinitions();
    let lastContent: string | null = null;
    let finalContent: string | null = null;
    let iterations = 0;

    while (iterations < this.maxIterations) {
      iterations++;

      const response = await this.deps.provider.chat({
        messages,
        tools: definitions.length > 0 ? definitions : undefined,
        model: this.model,
        temperature: this.temperature,
        maxTokens: this.maxTokens,
      });

      if (response.content) lastContent = response.content;

      if (!hasToolCalls(response)) {
        finalContent = response.content || null;
        break;
      }

      this.deps.contextBuilder.addAssistantMessage(
        messages,
        response.content,
        response.toolCalls,
        response.reasoningContent,
      );

      for (const toolCall of response.toolCalls) {
        toolsUsed.push(toolCall.name);
        this.logger.info("Executing tool", {
          sessionKey,
          tool: toolCall.name,
          toolCallId: toolCall.id,
          iteration: iterations,
        });
        this.deps.eventBus?.emit("tool:calling", { sessionKey, toolCall });

        const toolStart = Date.now();
        const outcome = await this.deps.tools.execute(toolCall.name, toolCall.args);
        this.deps.eventBus?.emit("tool:result", {
          sessionKey,
          toolCall,
          outcome,
          durationMs: Date.now() - toolStart,
        });

        this.deps.contextBuilder.addToolResult(messages, toolCall.id, toolCall.name, outcomeText(outcome));
      }

      messages.push({ role: "user", content: REFLECT_PROMPT });
    }

    if (finalContent === null && iterations >= this.maxIterations) {
      this.logger.warn("Max iterations reached", { sessionKey, maxIterations: this.maxIterations });
      finalContent = lastContent;
    }

    return { content: finalContent, toolsUsed, iterations };
  }

  /**
   * Messages on the system channel carry `origin_channel:origin_chat` in
   * chatId; the reply goes back to that origin's session.
   */
  private async processSystemMessage(msg: InboundMessage): Promise<OutboundMessage> {
    const { channel, chatId } = parseOrigin(msg.chatId);
    const key = `${channel}:${chatId}`;
    this.logger.info("Processing system message", { senderId: msg.senderId, sessionKey: key });

    const session = await this.deps.sessions.getOrCreate(key);
    this.deps.tools.setContext(channel, chatId);
    const messages = await this.deps.contextBuilder.buildMessages({
      history: session.getHistory(this.memoryWindow),
      currentMessage: msg.content,
      channel,
      chatId,
    });

    const result = await this.runIterations(messages, key);
    const content = result.content ?? SYSTEM_FALLBACK_REPLY;

    session.addMessage("user", `[System: ${msg.senderId}] ${msg.content}`);
    session.addMessage("assistant", content, result.toolsUsed);
    await this.deps.sessions.save(session);

    return { channel, chatId, content };
  }

  private async resetSession(msg: InboundMessage, session: Session): Promise<OutboundMessage> {
    const snapshot = session.snapshot();
    session.clear();
    await this.deps.sessions.save(session);
    this.deps.sessions.invalidate(session.key);

    this.deps.eventBus?.emit("session:reset", { sessionKey: session.key, archivedMessages: snapshot.length });

    const consolidator = this.consolidator;
    if (consolidator && snapshot.length > 0) {
      // The live session is already cleared; the snapshot is the only copy left.
      this.supervisor.spawn(
        this.supervisor.uniqueKey(`archive:${session.key}`),
        async () => {
          await consolidator.consolidate(session, { archive: snapshot });
        },
        { ignoreLimit: true },
      );
    }

    return { channel: msg.channel, chatId: msg.chatId, content: NEW_SESSION_REPLY };
  }

  private maybeConsolidate(session: Session): void {
    const consolidator = this.consolidator;
    if (!consolidator || session.unconsolidatedCount <= this.memoryWindow) return;

    this.supervisor.spawn(`consolidate:${session.key}`, async () => {
      await consolidator.consolidate(session);
    });
  }

  private helpText(): string {
    const tools = this.deps.tools.names;
    return [
      "Wayfarer commands:",
      "/new - Start a new conversation",
      "/help - Show available commands",
      "",
      `Tools: ${tools.length > 0 ? tools.join(", ") : "none"}`,
    ].join("\n");
  }
}

/** Split `channel:chat` on the first colon; without one the origin is the CLI. */
export function parseOrigin(chatId: string): { channel: string; chatId: string } {
  const idx = chatId.indexOf(":");
  if (idx === -1) return { channel: "cli", chatId };
  return { channel: chatId.slice(0, idx), chatId: chatId.slice(idx + 1) };
}
