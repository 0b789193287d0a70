// Bus envelopes and the channel interface for messaging adapters

import type { Lifecycle } from "./lifecycle";

/** Reserved channel tag for synthetic notifications routed back to a human-facing channel. */
export const SYSTEM_CHANNEL = "system";

export interface InboundMessage {
  /** Origin transport, e.g. "cli", "whatsapp" or "system" */
  readonly channel: string;
  readonly senderId: string;
  readonly chatId: string;
  readonly content: string;
  readonly timestamp: number;
  /** References (paths or URLs) to media sent with the message */
  readonly media?: readonly string[];
  readonly metadata?: Readonly<Record<string, unknown>>;
  /** Overrides the channel:chatId session key */
  readonly sessionKeyOverride?: string;
}

export interface OutboundMessage {
  readonly channel: string;
  readonly chatId: string;
  readonly content: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export function sessionKeyOf(msg: InboundMessage): string {
  return msg.sessionKeyOverride ?? `${msg.channel}:${msg.chatId}`;
}

/**
 * Transport between channels and the agent loop.
 * `consume*` resolve with null when nothing arrives within the timeout so
 * that pollers can check their running flag.
 */
export interface MessageBus {
  publishInbound(msg: InboundMessage): Promise<void>;
  consumeInbound(timeoutMs: number): Promise<InboundMessage | null>;
  publishOutbound(msg: OutboundMessage): Promise<void>;
  consumeOutbound(timeoutMs: number): Promise<OutboundMessage | null>;
}

export interface Channel extends Lifecycle {
  readonly name: string;

  /**
   * Called by the gateway to register the inbound handler.
   * The channel calls it whenever a user sends a message.
   */
  onMessage(handler: (msg: InboundMessage) => Promise<void>): void;

  /** Deliver a reply to the user through this channel. */
  send(msg: OutboundMessage): Promise<void>;
}
