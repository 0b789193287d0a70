// Durable memory contract: a long-term memory body plus an append-only history log

import type { Result } from "./errors";

export interface HistoryEntry {
  readonly id: number;
  readonly entry: string;
  readonly createdAt: number;
}

export interface MemoryStore {
  /** Current long-term memory text; empty string when nothing has been stored. */
  readLongTerm(): Promise<Result<string>>;
  writeLongTerm(text: string): Promise<Result<void>>;
  appendHistory(entry: string): Promise<Result<void>>;
}
