// Test fixture: inbound message and session factories

import type { InboundMessage } from "../types";
import { Session, type SessionRecord } from "../session";

export function createInbound(overrides?: Partial<InboundMessage>): InboundMessage {
  return {
    channel: "cli",
    senderId: "user",
    chatId: "chat-1",
    content: "test message",
    timestamp: Date.now(),
    ...overrides,
  };
}

/** Session holding `count` alternating user/assistant records. */
export function createSession(key: string, count: number, lastConsolidated = 0): Session {
  const messages: SessionRecord[] = [];
  for (let i = 0; i < count; i++) {
    messages.push({
      role: i % 2 === 0 ? "user" : "assistant",
      content: `message ${i}`,
      timestamp: `2025-01-01T10:${String(i % 60).padStart(2, "0")}:00.000Z`,
    });
  }
  return new Session(key, { messages, lastConsolidated });
}
