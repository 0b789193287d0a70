import { describe, it, expect, vi, afterEach } from "vitest";
import {
  ConsoleLogger,
  type Channel,
  type ChatRequest,
  type InboundMessage,
  type LLMResponse,
  type LifecycleStatus,
  type OutboundMessage,
  type Provider,
} from "@wayfarer/core";
import { defaultConfig, type WayfarerConfig } from "@wayfarer/config";
import { createGateway, type Gateway } from "../gateway";

const logger = new ConsoleLogger("error");

/** Replays scripted replies, then answers with a fixed greeting. */
class ScriptedProvider implements Provider {
  readonly name = "scripted";
  readonly defaultModel = "scripted-model";
  readonly requests: ChatRequest[] = [];

  constructor(private readonly script: LLMResponse[] = []) {}

  async chat(request: ChatRequest): Promise<LLMResponse> {
    this.requests.push(request);
    return this.script.shift() ?? { content: "Hello from wayfarer!", toolCalls: [], finishReason: "stop" };
  }
}

/** In-process channel that records what the gateway delivers. */
class RecordingChannel implements Channel {
  readonly name = "test";
  readonly sent: OutboundMessage[] = [];
  status: LifecycleStatus = "stopped";
  private handler: ((msg: InboundMessage) => Promise<void>) | null = null;

  constructor(private readonly sendDelayMs = 0) {}

  async start(): Promise<void> {
    this.status = "running";
  }

  async stop(): Promise<void> {
    this.status = "stopped";
  }

  onMessage(handler: (msg: InboundMessage) => Promise<void>): void {
    this.handler = handler;
  }

  async send(msg: OutboundMessage): Promise<void> {
    if (this.sendDelayMs > 0) await new Promise((resolve) => setTimeout(resolve, this.sendDelayMs));
    this.sent.push(msg);
  }

  async receive(content: string): Promise<void> {
    await this.handler?.({ channel: this.name, senderId: "u1", chatId: "chat-1", content, timestamp: Date.now() });
  }
}

function testConfig(): WayfarerConfig {
  const base = defaultConfig();
  return { ...base, logLevel: "error", memory: { path: ":memory:" } };
}

describe("Gateway", () => {
  let gateway: Gateway | undefined;

  afterEach(async () => {
    await gateway?.stop();
    gateway = undefined;
  });

  async function startGateway(provider: Provider, channel: Channel): Promise<Gateway> {
    gateway = await createGateway({
      config: testConfig(),
      logger,
      provider,
      channels: [channel],
      pollIntervalMs: 10,
    });
    await gateway.start();
    return gateway;
  }

  it("starts channels and answers a message through them", async () => {
    const channel = new RecordingChannel();
    const started = await startGateway(new ScriptedProvider(), channel);

    expect(started.status).toBe("running");
    expect(channel.status).toBe("running");

    await channel.receive("hello");

    await vi.waitFor(() => expect(channel.sent).toHaveLength(1));
    expect(channel.sent[0]).toEqual({ channel: "test", chatId: "chat-1", content: "Hello from wayfarer!" });
  });

  it("lists the registered tools on /help", async () => {
    const channel = new RecordingChannel();
    await startGateway(new ScriptedProvider(), channel);

    await channel.receive("/help");

    await vi.waitFor(() => expect(channel.sent).toHaveLength(1));
    expect(channel.sent[0]?.content).toBe(
      [
        "Wayfarer commands:",
        "/new - Start a new conversation",
        "/help - Show available commands",
        "",
        "Tools: message, web_search, web_fetch",
      ].join("\n"),
    );
  });

  it("delivers messages sent by the message tool before the reply", async () => {
    const channel = new RecordingChannel();
    const provider = new ScriptedProvider([
      {
        content: null,
        toolCalls: [{ id: "call_1", name: "message", args: { content: "Working on it" } }],
        finishReason: "tool_calls",
      },
      { content: "All done.", toolCalls: [], finishReason: "stop" },
    ]);
    await startGateway(provider, channel);

    await channel.receive("do the thing");

    await vi.waitFor(() => expect(channel.sent).toHaveLength(2));
    expect(channel.sent.map((m) => m.content)).toEqual(["Working on it", "All done."]);
    expect(provider.requests[0]?.tools?.map((t) => t.name)).toEqual(["message", "web_search", "web_fetch"]);
  });

  it("stops channels and reports stopped", async () => {
    const channel = new RecordingChannel();
    const started = await startGateway(new ScriptedProvider(), channel);

    await started.stop();

    expect(started.status).toBe("stopped");
    expect(channel.status).toBe("stopped");
  });

  it("delivers replies still queued when it stops", async () => {
    const channel = new RecordingChannel(50);
    const started = await startGateway(new ScriptedProvider(), channel);

    for (const content of ["one", "two", "three"]) {
      await started.deps.bus.publishOutbound({ channel: "test", chatId: "chat-1", content });
    }
    await started.stop();

    expect(channel.sent.map((m) => m.content)).toEqual(["one", "two", "three"]);
    expect(channel.status).toBe("stopped");
  });

  it("logs the loaded config with secrets masked", async () => {
    const lines: string[] = [];
    const debugLogger = new ConsoleLogger("debug", {}, (_level, line) => {
      lines.push(line);
    });
    const base = testConfig();
    gateway = await createGateway({
      config: { ...base, provider: { ...base.provider, apiKey: "test-secret" } },
      logger: debugLogger,
      provider: new ScriptedProvider(),
      channels: [],
    });

    const entry = lines.map((line): unknown => JSON.parse(line)).find((e) => {
      return typeof e === "object" && e !== null && "message" in e && e.message === "Config loaded";
    });

    expect(entry).toMatchObject({ config: { provider: { apiKey: "[redacted]" } } });
    expect(lines.some((line) => line.includes("test-secret"))).toBe(false);
  });
});
