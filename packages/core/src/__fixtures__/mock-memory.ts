// Test fixture: in-memory MemoryStore

import type { HistoryEntry, MemoryStore, Result } from "../types";
import { MemoryError, err, ok } from "../types";

export class InMemoryMemoryStore implements MemoryStore {
  longTerm = "";
  history: HistoryEntry[] = [];
  writes = 0;
  /** When set, every write fails with this message. */
  failWrites: string | null = null;

  async readLongTerm(): Promise<Result<string>> {
    return ok(this.longTerm);
  }

  async writeLongTerm(text: string): Promise<Result<void>> {
    if (this.failWrites) return err(new MemoryError(this.failWrites));
    this.longTerm = text;
    this.writes++;
    return ok(undefined);
  }

  async appendHistory(entry: string): Promise<Result<void>> {
    if (this.failWrites) return err(new MemoryError(this.failWrites));
    this.history.push({ id: this.history.length + 1, entry, createdAt: Date.now() });
    return ok(undefined);
  }
}
