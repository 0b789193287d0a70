// Session manager: caches sessions by key

import type { SessionStore } from "./types";
import { Session } from "./session";

/**
 * In-memory session store backed by a Map.
 * Sessions survive for the lifetime of the process; `save` keeps a copy so
 * an invalidated key reloads the last saved state.
 */
export class InMemorySessionManager implements SessionStore {
  private cache = new Map<string, Session>();
  private saved = new Map<string, Session>();

  async getOrCreate(key: string): Promise<Session> {
    const cached = this.cache.get(key);
    if (cached) return cached;

    const persisted = this.saved.get(key);
    const session = persisted ? copySession(persisted) : new Session(key);
    this.cache.set(key, session);
    return session;
  }

  async save(session: Session): Promise<void> {
    this.saved.set(session.key, copySession(session));
    this.cache.set(session.key, session);
  }

  invalidate(key: string): void {
    this.cache.delete(key);
  }

  /** Keys of every session that has been saved at least once. */
  keys(): string[] {
    return [...this.saved.keys()];
  }
}

function copySession(session: Session): Session {
  return new Session(session.key, {
    messages: session.snapshot(),
    lastConsolidated: session.lastConsolidated,
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
    metadata: session.metadata,
  });
}
