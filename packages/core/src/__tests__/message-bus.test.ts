import { describe, it, expect, vi, afterEach } from "vitest";
import { AsyncQueue, InMemoryMessageBus } from "../message-bus";
import { createInbound } from "../__fixtures__/messages";

describe("AsyncQueue", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns queued items in order", async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);

    expect(queue.size).toBe(2);
    expect(await queue.take(10)).toBe(1);
    expect(await queue.take(10)).toBe(2);
    expect(queue.size).toBe(0);
  });

  it("hands a pushed item to a waiting consumer", async () => {
    const queue = new AsyncQueue<string>();
    const pending = queue.take(1000);
    queue.push("x");

    expect(await pending).toBe("x");
    expect(queue.size).toBe(0);
  });

  it("resolves null on timeout and drops the waiter", async () => {
    vi.useFakeTimers();
    const queue = new AsyncQueue<string>();
    const pending = queue.take(50);

    await vi.advanceTimersByTimeAsync(50);
    expect(await pending).toBeNull();

    queue.push("later");
    expect(queue.size).toBe(1);
  });
});

describe("InMemoryMessageBus", () => {
  it("keeps inbound and outbound separate", async () => {
    const bus = new InMemoryMessageBus();
    const inbound = createInbound({ content: "hi" });
    await bus.publishInbound(inbound);
    await bus.publishOutbound({ channel: "cli", chatId: "chat-1", content: "reply" });

    expect(bus.inboundSize).toBe(1);
    expect(bus.outboundSize).toBe(1);
    expect(await bus.consumeInbound(10)).toBe(inbound);
    expect(await bus.consumeOutbound(10)).toEqual({ channel: "cli", chatId: "chat-1", content: "reply" });
  });
});
