// Gateway: composition root that wires all dependencies and manages lifecycle

import type { Database } from "better-sqlite3";
import {
  type Channel,
  type EventBus,
  type Lifecycle,
  type LifecycleStatus,
  type Logger,
  type MessageBus,
  type OutboundMessage,
  type Provider,
  AgentLoop,
  ContextBuilder,
  InMemoryMessageBus,
  SimpleEventBus,
  errorMessage,
} from "@wayfarer/core";
import { redactConfig, type WayfarerConfig } from "@wayfarer/config";
import { SqliteMemoryStore, SqliteSessionStore, openDatabase } from "@wayfarer/memory-sqlite";
import { OpenAICompatibleProvider } from "@wayfarer/provider-openai-compat";
import type { HostResolver } from "@wayfarer/tool-web-fetch";
import { buildToolRegistry } from "./tool-registrations";
import { CliChannel } from "./channels/cli-channel";

const DEFAULT_POLL_INTERVAL_MS = 1000;

export interface GatewayDeps {
  readonly config: WayfarerConfig;
  readonly logger: Logger;
  readonly bus: MessageBus;
  readonly eventBus: EventBus;
  readonly agent: AgentLoop;
  readonly channels?: Channel[];
  /** How long each outbound poll waits before re-checking the running flag. */
  readonly pollIntervalMs?: number;
}

export class Gateway implements Lifecycle {
  private _status: LifecycleStatus = "stopped";
  private db: Database | null;
  private agentRun: Promise<void> | null = null;
  private dispatchRun: Promise<void> | null = null;
  private dispatching = false;
  private observing = false;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;

  readonly deps: GatewayDeps;

  constructor(deps: GatewayDeps, db?: Database) {
    this.deps = deps;
    this.db = db ?? null;
    this.logger = deps.logger.child({ component: "Gateway" });
    this.pollIntervalMs = deps.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  get status(): LifecycleStatus {
    return this._status;
  }

  async start(): Promise<void> {
    if (this._status === "running" || this._status === "starting") return;
    this._status = "starting";

    const { config, agent } = this.deps;

    this.observeTurns();
    this.agentRun = agent.run().catch((e: unknown) => {
      this.logger.error("Agent loop crashed", { error: errorMessage(e) });
    });
    this.dispatching = true;
    this.dispatchRun = this.dispatchOutbound().catch((e: unknown) => {
      this.logger.error("Outbound dispatch crashed", { error: errorMessage(e) });
    });

    await this.startChannels();

    this._status = "running";
    this.logger.info("Gateway started", {
      provider: config.provider.name,
      model: config.agent.model ?? config.provider.model,
      memory: config.memory.path,
      channels: (this.deps.channels ?? []).map((c) => c.name),
    });
  }

  async stop(): Promise<void> {
    if (this._status === "stopped" || this._status === "stopping") return;
    this._status = "stopping";

    // Let the message in progress finish, then wait for background
    // consolidation before the database goes away.
    await this.deps.agent.shutdown();
    await this.agentRun;
    this.agentRun = null;

    this.dispatching = false;
    await this.dispatchRun;
    this.dispatchRun = null;
    await this.flushOutbound();

    await this.stopChannels();

    if (this.db) {
      this.db.close();
      this.db = null;
    }

    this.logger.info("Gateway stopped");
    this._status = "stopped";
  }

  private observeTurns(): void {
    if (this.observing) return;
    this.observing = true;
    const { eventBus } = this.deps;

    eventBus.on("message:response", ({ sessionKey, durationMs, iterations }) => {
      this.logger.info("Turn completed", { sessionKey, durationMs, iterations });
    });
    eventBus.on("tool:result", ({ sessionKey, toolCall, outcome, durationMs }) => {
      this.logger.debug("Tool finished", { sessionKey, tool: toolCall.name, ok: outcome.ok, durationMs });
    });
    eventBus.on("memory:consolidation_failed", ({ sessionKey, error }) => {
      this.logger.warn("Memory consolidation failed", { sessionKey, error });
    });
  }

  private async startChannels(): Promise<void> {
    const { bus } = this.deps;

    for (const channel of this.deps.channels ?? []) {
      channel.onMessage(async (msg) => {
        await bus.publishInbound(msg);
      });

      try {
        await channel.start();
        this.logger.info("Channel started", { channel: channel.name });
      } catch (e) {
        this.logger.error("Failed to start channel", { channel: channel.name, error: errorMessage(e) });
      }
    }
  }

  private async stopChannels(): Promise<void> {
    for (const channel of this.deps.channels ?? []) {
      try {
        await channel.stop();
      } catch (e) {
        this.logger.warn("Failed to stop channel", { channel: channel.name, error: errorMessage(e) });
      }
    }
  }

  /** Deliver outbound messages to the channel each one names. */
  private async dispatchOutbound(): Promise<void> {
    const { bus } = this.deps;

    while (this.dispatching) {
      const msg = await bus.consumeOutbound(this.pollIntervalMs);
      if (msg) await this.deliver(msg);
    }
  }

  /** Deliver replies still queued once the dispatch loop has exited. */
  private async flushOutbound(): Promise<void> {
    const { bus } = this.deps;
    for (let msg = await bus.consumeOutbound(0); msg; msg = await bus.consumeOutbound(0)) {
      await this.deliver(msg);
    }
  }

  private async deliver(msg: OutboundMessage): Promise<void> {
    const channel = (this.deps.channels ?? []).find((c) => c.name === msg.channel);
    if (!channel) {
      this.logger.warn("No channel for outbound message", { channel: msg.channel, chatId: msg.chatId });
      return;
    }

    try {
      await channel.send(msg);
    } catch (e) {
      this.logger.error("Failed to deliver message", {
        channel: msg.channel,
        chatId: msg.chatId,
        error: errorMessage(e),
      });
    }
  }
}

export interface CreateGatewayOptions {
  readonly config: WayfarerConfig;
  readonly logger: Logger;
  /** Replaces the configured OpenAI-compatible provider. */
  readonly provider?: Provider;
  readonly channels?: Channel[];
  readonly resolve?: HostResolver;
  readonly pollIntervalMs?: number;
}

/**
 * Create a fully-wired Gateway from a loaded config.
 * Channels default to the ones enabled in config.
 */
export async function createGateway(options: CreateGatewayOptions): Promise<Gateway> {
  const { config, logger } = options;
  logger.debug("Config loaded", { config: redactConfig(config) });

  const eventBus = new SimpleEventBus(logger);
  const bus = new InMemoryMessageBus();

  const db = await openDatabase(config.memory.path, logger);
  const sessions = new SqliteSessionStore(db, logger);
  const memory = new SqliteMemoryStore(db, logger);

  const provider =
    options.provider ??
    new OpenAICompatibleProvider({
      name: config.provider.name,
      baseUrl: config.provider.baseUrl,
      defaultModel: config.provider.model,
      apiKey: config.provider.apiKey,
    });

  const contextBuilder = new ContextBuilder({
    systemPrompt: config.agent.systemPrompt ?? undefined,
    memory,
    logger,
  });

  const tools = buildToolRegistry({ config, bus, logger, resolve: options.resolve });

  const agent = new AgentLoop({
    bus,
    provider,
    sessions,
    tools,
    contextBuilder,
    logger,
    memory,
    eventBus,
    model: config.agent.model ?? undefined,
    maxIterations: config.agent.maxIterations,
    temperature: config.agent.temperature,
    maxTokens: config.agent.maxTokens,
    memoryWindow: config.agent.memoryWindow,
    pollIntervalMs: options.pollIntervalMs,
  });

  const channels = options.channels ?? (config.channels.cli.enabled ? [new CliChannel({ logger })] : []);

  return new Gateway(
    {
      config,
      logger,
      bus,
      eventBus,
      agent,
      channels,
      pollIntervalMs: options.pollIntervalMs,
    },
    db,
  );
}
