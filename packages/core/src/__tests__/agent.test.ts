import { describe, it, expect, beforeEach } from "vitest";
import {
  AgentLoop,
  APOLOGY_REPLY,
  FALLBACK_REPLY,
  NEW_SESSION_REPLY,
  REFLECT_PROMPT,
  parseOrigin,
  type AgentLoopDeps,
} from "../agent";
import { ContextBuilder } from "../context-builder";
import { SimpleEventBus } from "../events";
import { InMemoryMessageBus } from "../message-bus";
import { InMemorySessionManager } from "../session-manager";
import { TaskSupervisor } from "../task-supervisor";
import { ToolRegistry } from "../tool-registry";
import { defineTool } from "../tool-schema";
import { ConsoleLogger } from "../types/logger";
import type { ChatRequest, ContextualTool, LLMResponse } from "../types";
import { MockProvider, textResponse, toolResponse } from "../__fixtures__/mock-provider";
import { InMemoryMemoryStore } from "../__fixtures__/mock-memory";
import { createInbound, createSession } from "../__fixtures__/messages";

const CONSOLIDATION_REPLY = '{"history_entry": "[2025-01-01 10:00] Summary.", "memory_update": "Remembered."}';

describe("AgentLoop", () => {
  let provider: MockProvider;
  let bus: InMemoryMessageBus;
  let sessions: InMemorySessionManager;
  let tools: ToolRegistry;
  let memory: InMemoryMemoryStore;
  let eventBus: SimpleEventBus;
  let supervisor: TaskSupervisor;
  let executed: string[];
  let logger: ConsoleLogger;

  function createAgent(overrides: Partial<AgentLoopDeps> = {}): AgentLoop {
    return new AgentLoop({
      bus,
      provider,
      sessions,
      tools,
      contextBuilder: new ContextBuilder({ systemPrompt: "You are a test.", memory, logger }),
      logger,
      memory,
      eventBus,
      supervisor,
      ...overrides,
    });
  }

  /** Route consolidation requests to a fixed reply and everything else to `chat`. */
  function routeProvider(chat: (request: ChatRequest) => LLMResponse): string[] {
    const consolidationPrompts: string[] = [];
    provider.chat = async (request) => {
      const [first, second] = request.messages;
      if (first?.role === "system" && first.content.startsWith("You are a memory consolidation agent")) {
        consolidationPrompts.push(second?.content ?? "");
        return textResponse(CONSOLIDATION_REPLY);
      }
      return chat(request);
    };
    return consolidationPrompts;
  }

  beforeEach(() => {
    logger = new ConsoleLogger("silent");
    provider = new MockProvider();
    bus = new InMemoryMessageBus();
    sessions = new InMemorySessionManager();
    memory = new InMemoryMemoryStore();
    eventBus = new SimpleEventBus(logger);
    supervisor = new TaskSupervisor(logger);
    executed = [];
    tools = new ToolRegistry();
    tools.register(
      defineTool({
        name: "echo",
        description: "Echo text back",
        parameters: { type: "object", properties: { text: { type: "string" } }, required: ["text"] },
        execute: async (args) => {
          executed.push(String(args.text));
          return `echo: ${String(args.text)}`;
        },
      }),
    );
  });

  describe("processMessage", () => {
    it("replies with the provider text and persists the turn", async () => {
      provider.enqueue(textResponse("Hello from the agent!"));
      const agent = createAgent();

      const response = await agent.processMessage(createInbound({ content: "Hi", metadata: { messageId: "m1" } }));

      expect(response).toEqual({
        channel: "cli",
        chatId: "chat-1",
        content: "Hello from the agent!",
        metadata: { messageId: "m1" },
      });
      const session = await sessions.getOrCreate("cli:chat-1");
      expect(session.messages.map((m) => [m.role, m.content])).toEqual([
        ["user", "Hi"],
        ["assistant", "Hello from the agent!"],
      ]);
    });

    it("sends history, model settings and tool definitions to the provider", async () => {
      provider.enqueue(textResponse("first"), textResponse("second"));
      const agent = createAgent();

      await agent.processMessage(createInbound({ content: "one" }));
      await agent.processMessage(createInbound({ content: "two" }));

      const request = provider.callHistory[1];
      expect(request?.model).toBe("mock-model");
      expect(request?.temperature).toBe(0.7);
      expect(request?.maxTokens).toBe(4096);
      expect(request?.tools?.map((t) => t.name)).toEqual(["echo"]);
      expect(request?.messages.slice(1)).toEqual([
        { role: "user", content: "one" },
        { role: "assistant", content: "first" },
        { role: "user", content: "two" },
      ]);
    });

    it("uses the session key override", async () => {
      const agent = createAgent();
      await agent.processMessage(createInbound({ sessionKeyOverride: "shared" }));

      expect(sessions.keys()).toEqual(["shared"]);
    });

    it("executes tool calls in order and matches results to call ids", async () => {
      provider.enqueue(
        toolResponse(
          [
            { id: "call_1", name: "echo", args: { text: "a" } },
            { id: "call_2", name: "echo", args: { text: "b" } },
          ],
          "Let me check.",
        ),
        textResponse("done"),
      );
      const agent = createAgent();

      const response = await agent.processMessage(createInbound({ content: "go" }));

      expect(response?.content).toBe("done");
      expect(executed).toEqual(["a", "b"]);
      expect(provider.callHistory[1]?.messages.slice(2)).toEqual([
        {
          role: "assistant",
          content: "Let me check.",
          toolCalls: [
            { id: "call_1", name: "echo", args: { text: "a" } },
            { id: "call_2", name: "echo", args: { text: "b" } },
          ],
        },
        { role: "tool", toolCallId: "call_1", toolName: "echo", content: "echo: a" },
        { role: "tool", toolCallId: "call_2", toolName: "echo", content: "echo: b" },
        { role: "user", content: REFLECT_PROMPT },
      ]);

      const session = await sessions.getOrCreate("cli:chat-1");
      expect(session.messages[1]?.toolsUsed).toEqual(["echo", "echo"]);
    });

    it("feeds tool errors back to the model as text", async () => {
      provider.enqueue(
        toolResponse([
          { id: "call_1", name: "missing", args: {} },
          { id: "call_2", name: "echo", args: {} },
        ]),
        textResponse("recovered"),
      );
      const agent = createAgent();

      await agent.processMessage(createInbound());

      const toolTurns = provider.callHistory[1]?.messages.filter((m) => m.role === "tool");
      expect(toolTurns?.map((m) => m.content)).toEqual([
        'Error: Tool "missing" not found. Available tools: echo',
        'Error: Invalid parameters for tool "echo": missing required text',
      ]);
    });

    it("stops after maxIterations and falls back when there is no text", async () => {
      const loop = toolResponse([{ id: "call_1", name: "echo", args: { text: "x" } }]);
      provider.enqueue(loop, loop, loop, textResponse("never reached"));
      const agent = createAgent({ maxIterations: 3 });

      const response = await agent.processMessage(createInbound());

      expect(provider.callHistory).toHaveLength(3);
      expect(response?.content).toBe(FALLBACK_REPLY);
    });

    it("uses the last non-empty text when iterations run out", async () => {
      provider.enqueue(
        toolResponse([{ id: "call_1", name: "echo", args: { text: "x" } }], "Working on it"),
        toolResponse([{ id: "call_2", name: "echo", args: { text: "y" } }]),
      );
      const agent = createAgent({ maxIterations: 2 });

      const response = await agent.processMessage(createInbound());

      expect(response?.content).toBe("Working on it");
    });

    it("does not promote an earlier preamble when the final answer is empty", async () => {
      provider.enqueue(
        toolResponse([{ id: "call_1", name: "echo", args: { text: "x" } }], "Let me check."),
        textResponse(null),
      );
      const agent = createAgent();

      const response = await agent.processMessage(createInbound());

      expect(provider.callHistory).toHaveLength(2);
      expect(response?.content).toBe(FALLBACK_REPLY);
    });

    it("falls back when the provider returns no content", async () => {
      provider.enqueue(textResponse(null));
      const agent = createAgent();

      expect((await agent.processMessage(createInbound()))?.content).toBe(FALLBACK_REPLY);
    });

    it("sets routing context on contextual tools before the turn", async () => {
      const seen: string[] = [];
      const notify: ContextualTool = {
        ...defineTool({
          name: "notify",
          description: "Notify",
          parameters: { type: "object" },
          execute: async () => "sent",
        }),
        setContext(channel, chatId) {
          seen.push(`${channel}:${chatId}`);
        },
      };
      tools.register(notify);
      const agent = createAgent();

      await agent.processMessage(createInbound({ channel: "whatsapp", chatId: "42" }));

      expect(seen).toEqual(["whatsapp:42"]);
    });

    it("emits tool and message events", async () => {
      provider.enqueue(toolResponse([{ id: "call_1", name: "echo", args: { text: "a" } }]), textResponse("ok"));
      const events: string[] = [];
      eventBus.on("message:received", () => { events.push("received"); });
      eventBus.on("tool:calling", (d) => { events.push(`calling:${d.toolCall.id}`); });
      eventBus.on("tool:result", (d) => { events.push(`result:${d.outcome.ok}`); });
      eventBus.on("message:response", (d) => { events.push(`response:${d.iterations}`); });
      const agent = createAgent();

      await agent.processMessage(createInbound());

      expect(events).toEqual(["received", "calling:call_1", "result:true", "response:2"]);
    });
  });

  describe("commands", () => {
    it("/help lists commands and tools without calling the provider", async () => {
      const agent = createAgent();

      const response = await agent.processMessage(createInbound({ content: "  /HELP " }));

      expect(response?.content).toBe(
        "Wayfarer commands:\n/new - Start a new conversation\n/help - Show available commands\n\nTools: echo",
      );
      expect(provider.callHistory).toHaveLength(0);
    });

    it("/new archives exactly the messages from before the reset", async () => {
      let turn = 0;
      const prompts = routeProvider(() => textResponse(`reply ${++turn}`));
      const resets: number[] = [];
      eventBus.on("session:reset", (d) => { resets.push(d.archivedMessages); });
      const agent = createAgent();

      await agent.processMessage(createInbound({ content: "first" }));
      await agent.processMessage(createInbound({ content: "second" }));
      const reset = await agent.processMessage(createInbound({ content: "/new" }));
      await agent.processMessage(createInbound({ content: "third" }));
      await agent.shutdown();

      expect(reset?.content).toBe(NEW_SESSION_REPLY);
      expect(resets).toEqual([4]);
      expect(prompts).toHaveLength(1);
      expect(prompts[0]).toContain("USER: first");
      expect(prompts[0]).toContain("ASSISTANT: reply 1");
      expect(prompts[0]).toContain("USER: second");
      expect(prompts[0]).toContain("ASSISTANT: reply 2");
      expect(prompts[0]).not.toContain("third");
      expect(memory.history.map((h) => h.entry)).toEqual(["[2025-01-01 10:00] Summary."]);
      expect(memory.longTerm).toBe("Remembered.");

      const session = await sessions.getOrCreate("cli:chat-1");
      expect(session.messages.map((m) => m.content)).toEqual(["third", "reply 3"]);
      expect(session.lastConsolidated).toBe(0);
    });

    it("/new archives even when the background job limit is reached", async () => {
      let turn = 0;
      const prompts = routeProvider(() => textResponse(`reply ${++turn}`));
      supervisor = new TaskSupervisor(logger, { maxInFlight: 0 });
      const agent = createAgent();

      await agent.processMessage(createInbound({ content: "first" }));
      await agent.processMessage(createInbound({ content: "/new" }));
      await agent.shutdown();

      expect(prompts).toHaveLength(1);
      expect(prompts[0]).toContain("USER: first");
      expect(memory.history.map((h) => h.entry)).toEqual(["[2025-01-01 10:00] Summary."]);
    });

    it("/new on an empty session schedules no archive", async () => {
      const agent = createAgent();

      await agent.processMessage(createInbound({ content: "/new" }));
      await agent.shutdown();

      expect(provider.callHistory).toHaveLength(0);
    });
  });

  describe("consolidation", () => {
    it("consolidates messages[0:26] once a 49-message session passes the window", async () => {
      const prompts = routeProvider(() => textResponse("reply"));
      const session = createSession("cli:chat-1", 49);
      await sessions.save(session);
      const agent = createAgent();

      await agent.processMessage(createInbound({ content: "one more" }));
      await agent.shutdown();

      expect(session.messages).toHaveLength(51);
      expect(session.lastConsolidated).toBe(26);
      expect(prompts).toHaveLength(1);
      expect(prompts[0]).toContain("USER: message 0");
      expect(prompts[0]).toContain("ASSISTANT: message 25");
      expect(prompts[0]).not.toContain("message 26");
    });

    it("does not consolidate at exactly the window size", async () => {
      const prompts = routeProvider(() => textResponse("reply"));
      await sessions.save(createSession("cli:chat-1", 48));
      const agent = createAgent();

      await agent.processMessage(createInbound());
      await agent.shutdown();

      expect(prompts).toHaveLength(0);
    });

    it("schedules nothing without a memory store", async () => {
      const prompts = routeProvider(() => textResponse("reply"));
      await sessions.save(createSession("cli:chat-1", 60));
      const agent = createAgent({ memory: undefined });

      await agent.processMessage(createInbound());
      await agent.shutdown();

      expect(prompts).toHaveLength(0);
    });
  });

  describe("system messages", () => {
    it("routes the reply to the origin channel and session", async () => {
      provider.enqueue(textResponse("Reminder delivered"));
      const agent = createAgent();

      const response = await agent.processMessage(
        createInbound({ channel: "system", senderId: "cron", chatId: "whatsapp:42", content: "Time to stretch" }),
      );

      expect(response).toEqual({ channel: "whatsapp", chatId: "42", content: "Reminder delivered" });
      const session = await sessions.getOrCreate("whatsapp:42");
      expect(session.messages.map((m) => m.content)).toEqual([
        "[System: cron] Time to stretch",
        "Reminder delivered",
      ]);
    });

    it("uses the background fallback when there is no reply", async () => {
      provider.enqueue(textResponse(null));
      const agent = createAgent();

      const response = await agent.processMessage(
        createInbound({ channel: "system", senderId: "subagent", chatId: "99", content: "done" }),
      );

      expect(response).toEqual({ channel: "cli", chatId: "99", content: "Background task completed." });
    });

    it("parseOrigin splits on the first colon", () => {
      expect(parseOrigin("whatsapp:42:extra")).toEqual({ channel: "whatsapp", chatId: "42:extra" });
      expect(parseOrigin("direct")).toEqual({ channel: "cli", chatId: "direct" });
    });
  });

  describe("run", () => {
    it("publishes replies and apologizes for failures", async () => {
      provider.enqueue(new Error("provider exploded"), textResponse("fine now"));
      const agent = createAgent({ pollIntervalMs: 10 });
      const running = agent.run();

      await bus.publishInbound(createInbound({ chatId: "a", content: "first" }));
      expect(await bus.consumeOutbound(1000)).toEqual({ channel: "cli", chatId: "a", content: APOLOGY_REPLY });

      await bus.publishInbound(createInbound({ chatId: "b", content: "second" }));
      expect(await bus.consumeOutbound(1000)).toEqual({ channel: "cli", chatId: "b", content: "fine now" });

      agent.stop();
      await running;
      expect(agent.isRunning).toBe(false);
    });
  });

  describe("processDirect", () => {
    it("returns the reply text and uses the direct session", async () => {
      provider.enqueue(textResponse("direct reply"));
      const agent = createAgent();

      expect(await agent.processDirect("hello")).toBe("direct reply");
      expect(sessions.keys()).toEqual(["cli:direct"]);
    });
  });
});
