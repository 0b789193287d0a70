import { describe, it, expect } from "vitest";
import { Session } from "../session";
import { createSession } from "../__fixtures__/messages";

describe("Session", () => {
  it("appends records with timestamps", () => {
    const session = new Session("cli:1");
    const record = session.addMessage("user", "hello");

    expect(session.messages).toHaveLength(1);
    expect(record.role).toBe("user");
    expect(Number.isNaN(Date.parse(record.timestamp))).toBe(false);
    expect(record.toolsUsed).toBeUndefined();
  });

  it("stores toolsUsed only when non-empty", () => {
    const session = new Session("cli:1");
    expect(session.addMessage("assistant", "a", []).toolsUsed).toBeUndefined();
    expect(session.addMessage("assistant", "b", ["web_fetch"]).toolsUsed).toEqual(["web_fetch"]);
  });

  it("getHistory returns the most recent records", () => {
    const session = createSession("cli:1", 5);

    expect(session.getHistory(2)).toEqual([
      { role: "assistant", content: "message 3" },
      { role: "user", content: "message 4" },
    ]);
    expect(session.getHistory(0)).toEqual([]);
  });

  it("clamps an initial cursor into range", () => {
    expect(createSession("k", 3, 10).lastConsolidated).toBe(3);
    expect(createSession("k", 3, -4).lastConsolidated).toBe(0);
  });

  describe("advanceConsolidated", () => {
    it("moves forward and clamps to the message count", () => {
      const session = createSession("k", 10);

      expect(session.advanceConsolidated(4)).toBe(true);
      expect(session.lastConsolidated).toBe(4);
      expect(session.advanceConsolidated(99)).toBe(true);
      expect(session.lastConsolidated).toBe(10);
      expect(session.unconsolidatedCount).toBe(0);
    });

    it("never moves backwards", () => {
      const session = createSession("k", 10, 6);

      expect(session.advanceConsolidated(3)).toBe(false);
      expect(session.lastConsolidated).toBe(6);
    });

    it("is ignored after a clear", () => {
      const session = createSession("k", 10);
      const epoch = session.epoch;
      session.clear();
      session.addMessage("user", "fresh");

      expect(session.advanceConsolidated(5, epoch)).toBe(false);
      expect(session.lastConsolidated).toBe(0);
    });
  });

  it("clear empties messages, resets the cursor and bumps the epoch", () => {
    const session = createSession("k", 6, 4);
    const snapshot = session.snapshot();

    session.clear();

    expect(session.messages).toHaveLength(0);
    expect(session.lastConsolidated).toBe(0);
    expect(session.epoch).toBe(1);
    expect(snapshot).toHaveLength(6);
  });
});
