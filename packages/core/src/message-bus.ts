// In-process message bus: two FIFO queues with timed consumption

import type { InboundMessage, MessageBus, OutboundMessage } from "./types";

/**
 * Unbounded FIFO whose `take` waits for an item or a timeout.
 * Waiters are served in arrival order.
 */
export class AsyncQueue<T> {
  private items: T[] = [];
  private waiters: Array<(item: T | null) => void> = [];

  push(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return;
    }
    this.items.push(item);
  }

  /** Resolves with the next item, or null once `timeoutMs` elapses. */
  take(timeoutMs: number): Promise<T | null> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift() ?? null);
    }

    return new Promise<T | null>((resolve) => {
      const waiter = (item: T | null) => {
        clearTimeout(timer);
        resolve(item);
      };
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve(null);
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  get size(): number {
    return this.items.length;
  }
}

export class InMemoryMessageBus implements MessageBus {
  private readonly inbound = new AsyncQueue<InboundMessage>();
  private readonly outbound = new AsyncQueue<OutboundMessage>();

  async publishInbound(msg: InboundMessage): Promise<void> {
    this.inbound.push(msg);
  }

  consumeInbound(timeoutMs: number): Promise<InboundMessage | null> {
    return this.inbound.take(timeoutMs);
  }

  async publishOutbound(msg: OutboundMessage): Promise<void> {
    this.outbound.push(msg);
  }

  consumeOutbound(timeoutMs: number): Promise<OutboundMessage | null> {
    return this.outbound.take(timeoutMs);
  }

  get inboundSize(): number {
    return this.inbound.size;
  }

  get outboundSize(): number {
    return this.outbound.size;
  }
}
