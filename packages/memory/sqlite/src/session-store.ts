// SQLite-backed SessionStore using better-sqlite3

import type { Database } from "better-sqlite3";
import type { Logger, SessionRecord, SessionRole, SessionStore } from "@wayfarer/core";
import { Session, SessionError, errorMessage } from "@wayfarer/core";

interface SessionRow {
  key: string;
  last_consolidated: number;
  metadata: string;
  created_at: number;
  updated_at: number;
}

interface MessageRow {
  role: SessionRole;
  content: string;
  timestamp: string;
  tools_used: string | null;
}

function parseJson(text: string | null, fallback: unknown): unknown {
  if (text === null) return fallback;
  try {
    return JSON.parse(text);
  } catch {
    return fallback;
  }
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Sessions are cached after the first load; `save` rewrites the session's
 * rows in one transaction and `invalidate` forces the next lookup to read
 * the database again.
 */
export class SqliteSessionStore implements SessionStore {
  private readonly cache = new Map<string, Session>();
  private readonly logger: Logger;

  constructor(
    private readonly db: Database,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "SqliteSessionStore" });
  }

  async getOrCreate(key: string): Promise<Session> {
    const cached = this.cache.get(key);
    if (cached) return cached;

    let loaded: Session | null;
    try {
      loaded = this.load(key);
    } catch (cause) {
      throw new SessionError(`Failed to load session ${key}: ${errorMessage(cause)}`, cause);
    }
    const session = loaded ?? new Session(key);
    this.cache.set(key, session);
    return session;
  }

  async save(session: Session): Promise<void> {
    try {
      this.write(session);
    } catch (cause) {
      throw new SessionError(`Failed to save session ${session.key}: ${errorMessage(cause)}`, cause);
    }
    this.cache.set(session.key, session);
    this.logger.debug("Session saved", { key: session.key, messages: session.messages.length });
  }

  invalidate(key: string): void {
    this.cache.delete(key);
  }

  private write(session: Session): void {
    const upsert = this.db.prepare<[string, number, string, number, number]>(
      `INSERT INTO sessions (key, last_consolidated, metadata, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(key) DO UPDATE SET
         last_consolidated = excluded.last_consolidated,
         metadata = excluded.metadata,
         updated_at = excluded.updated_at`,
    );
    const clear = this.db.prepare<[string]>("DELETE FROM session_messages WHERE session_key = ?");
    const insert = this.db.prepare<[string, number, string, string, string, string | null]>(
      `INSERT INTO session_messages (session_key, seq, role, content, timestamp, tools_used)
       VALUES (?, ?, ?, ?, ?, ?)`,
    );

    const tx = this.db.transaction((s: Session) => {
      upsert.run(s.key, s.lastConsolidated, JSON.stringify(s.metadata), s.createdAt, s.updatedAt);
      clear.run(s.key);
      s.messages.forEach((m, seq) => {
        insert.run(s.key, seq, m.role, m.content, m.timestamp, m.toolsUsed ? JSON.stringify(m.toolsUsed) : null);
      });
    });

    tx(session);
  }

  private load(key: string): Session | null {
    const row = this.db
      .prepare<[string], SessionRow>(
        "SELECT key, last_consolidated, metadata, created_at, updated_at FROM sessions WHERE key = ?",
      )
      .get(key);
    if (!row) return null;

    const messages: SessionRecord[] = this.db
      .prepare<[string], MessageRow>(
        "SELECT role, content, timestamp, tools_used FROM session_messages WHERE session_key = ? ORDER BY seq",
      )
      .all(key)
      .map((m) => {
        const tools = parseJson(m.tools_used, null);
        return {
          role: m.role,
          content: m.content,
          timestamp: m.timestamp,
          ...(isStringArray(tools) && tools.length > 0 ? { toolsUsed: tools } : {}),
        };
      });

    const metadata = parseJson(row.metadata, {});
    return new Session(row.key, {
      messages,
      lastConsolidated: row.last_consolidated,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      metadata: isRecord(metadata) ? metadata : {},
    });
  }
}
