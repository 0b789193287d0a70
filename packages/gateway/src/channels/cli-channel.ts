// Terminal channel: one line of input is one inbound message, replies are
// written back to the same terminal

import { createInterface, type Interface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { Channel, InboundMessage, LifecycleStatus, Logger, OutboundMessage } from "@wayfarer/core";
import { ChannelError, errorMessage } from "@wayfarer/core";

export const CLI_CHANNEL = "cli";
const CLI_CHAT_ID = "direct";
const CLI_SENDER_ID = "user";

export interface CliChannelOptions {
  readonly logger: Logger;
  readonly input?: Readable;
  readonly output?: Writable;
  /** Printed before each line of input; empty disables it. */
  readonly prompt?: string;
}

export class CliChannel implements Channel {
  readonly name = CLI_CHANNEL;

  private _status: LifecycleStatus = "stopped";
  private rl: Interface | null = null;
  private messageHandler: ((msg: InboundMessage) => Promise<void>) | null = null;
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly prompt: string;
  private readonly logger: Logger;

  constructor(options: CliChannelOptions) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.prompt = options.prompt ?? "> ";
    this.logger = options.logger.child({ component: "CliChannel" });
  }

  get status(): LifecycleStatus {
    return this._status;
  }

  async start(): Promise<void> {
    if (this._status === "running" || this._status === "starting") return;
    this._status = "starting";

    const rl = createInterface({ input: this.input, terminal: false });
    rl.on("line", (line) => {
      void this.handleLine(line);
    });
    this.rl = rl;

    this._status = "running";
    this.showPrompt();
  }

  async stop(): Promise<void> {
    if (this._status === "stopped" || this._status === "stopping") return;
    this._status = "stopping";

    this.rl?.close();
    this.rl = null;

    this._status = "stopped";
  }

  onMessage(handler: (msg: InboundMessage) => Promise<void>): void {
    this.messageHandler = handler;
  }

  async send(msg: OutboundMessage): Promise<void> {
    if (this._status !== "running") {
      throw new ChannelError(`CLI channel is not running (status: ${this._status})`);
    }
    this.output.write(`${msg.content}\n`);
    this.showPrompt();
  }

  private async handleLine(line: string): Promise<void> {
    const content = line.trim();
    if (!content) {
      this.showPrompt();
      return;
    }
    if (!this.messageHandler) {
      this.logger.warn("Dropping input, no message handler registered");
      return;
    }

    try {
      await this.messageHandler({
        channel: CLI_CHANNEL,
        senderId: CLI_SENDER_ID,
        chatId: CLI_CHAT_ID,
        content,
        timestamp: Date.now(),
      });
    } catch (e) {
      this.logger.error("Failed to hand off input", { error: errorMessage(e) });
    }
  }

  private showPrompt(): void {
    if (this.prompt) this.output.write(this.prompt);
  }
}
