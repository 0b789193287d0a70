// SQLite-backed MemoryStore: one long-term memory document plus an append-only history log

import type { Database } from "better-sqlite3";
import type { Logger, MemoryStore, Result } from "@wayfarer/core";
import { MemoryError, err, errorMessage, ok } from "@wayfarer/core";

export class SqliteMemoryStore implements MemoryStore {
  private readonly logger: Logger;

  constructor(
    private readonly db: Database,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "SqliteMemoryStore" });
  }

  async readLongTerm(): Promise<Result<string>> {
    try {
      const row = this.db
        .prepare<[], { content: string }>("SELECT content FROM long_term_memory WHERE id = 1")
        .get();
      return ok(row?.content ?? "");
    } catch (cause) {
      return err(new MemoryError(`Failed to read long-term memory: ${errorMessage(cause)}`, cause));
    }
  }

  async writeLongTerm(text: string): Promise<Result<void>> {
    try {
      this.db
        .prepare<[string, number]>(
          `INSERT INTO long_term_memory (id, content, updated_at) VALUES (1, ?, ?)
           ON CONFLICT(id) DO UPDATE SET content = excluded.content, updated_at = excluded.updated_at`,
        )
        .run(text, Date.now());
      this.logger.debug("Long-term memory updated", { length: text.length });
      return ok(undefined);
    } catch (cause) {
      return err(new MemoryError(`Failed to write long-term memory: ${errorMessage(cause)}`, cause));
    }
  }

  async appendHistory(entry: string): Promise<Result<void>> {
    try {
      this.db
        .prepare<[string, number]>("INSERT INTO history_entries (entry, created_at) VALUES (?, ?)")
        .run(entry, Date.now());
      return ok(undefined);
    } catch (cause) {
      return err(new MemoryError(`Failed to append history: ${errorMessage(cause)}`, cause));
    }
  }
}
