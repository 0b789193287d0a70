// Session persistence contract

import type { Session } from "../session";

export interface SessionStore {
  /** Return the cached or persisted session for `key`, creating an empty one if none exists. */
  getOrCreate(key: string): Promise<Session>;
  save(session: Session): Promise<void>;
  /** Drop `key` from any cache so the next lookup reloads it. */
  invalidate(key: string): void;
}
