// Session: the conversation history of one channel/chat plus its consolidation cursor

export type SessionRole = "user" | "assistant";

export interface SessionRecord {
  readonly role: SessionRole;
  readonly content: string;
  /** ISO-8601 timestamp */
  readonly timestamp: string;
  /** Tool names invoked while producing this record (assistant records only) */
  readonly toolsUsed?: readonly string[];
}

export interface SessionInit {
  readonly messages?: readonly SessionRecord[];
  readonly lastConsolidated?: number;
  readonly createdAt?: number;
  readonly updatedAt?: number;
  readonly metadata?: Record<string, unknown>;
}

/**
 * Mutable session owned by the turn that is processing it.
 *
 * Messages are append-only; `clear()` is the only way to drop them and it
 * also resets the cursor. `lastConsolidated` stays within
 * `[0, messages.length]` and only moves forward between clears.
 */
export class Session {
  readonly key: string;
  readonly createdAt: number;
  updatedAt: number;
  metadata: Record<string, unknown>;
  private records: SessionRecord[];
  private cursor: number;
  private _epoch = 0;

  constructor(key: string, init: SessionInit = {}) {
    this.key = key;
    this.records = [...(init.messages ?? [])];
    this.cursor = Math.min(Math.max(init.lastConsolidated ?? 0, 0), this.records.length);
    this.createdAt = init.createdAt ?? Date.now();
    this.updatedAt = init.updatedAt ?? this.createdAt;
    this.metadata = { ...(init.metadata ?? {}) };
  }

  get messages(): readonly SessionRecord[] {
    return this.records;
  }

  get lastConsolidated(): number {
    return this.cursor;
  }

  /** Incremented by every clear(); lets background jobs detect a reset. */
  get epoch(): number {
    return this._epoch;
  }

  /** Number of messages not yet covered by consolidation. */
  get unconsolidatedCount(): number {
    return this.records.length - this.cursor;
  }

  addMessage(role: SessionRole, content: string, toolsUsed?: readonly string[]): SessionRecord {
    const record: SessionRecord = {
      role,
      content,
      timestamp: new Date().toISOString(),
      ...(toolsUsed && toolsUsed.length > 0 ? { toolsUsed: [...toolsUsed] } : {}),
    };
    this.records.push(record);
    this.updatedAt = Date.now();
    return record;
  }

  /** The most recent `maxMessages` records as provider chat turns. */
  getHistory(maxMessages: number): Array<{ role: SessionRole; content: string }> {
    const recent = maxMessages > 0 ? this.records.slice(-maxMessages) : [];
    return recent.map((m) => ({ role: m.role, content: m.content }));
  }

  /** Copy of the current records, safe to hand to a background job. */
  snapshot(): SessionRecord[] {
    return [...this.records];
  }

  /**
   * Move the cursor forward to `to`. Ignored when the session was cleared
   * after `expectedEpoch` was read; clamped to the message count and never
   * moves backwards. Returns whether the cursor changed.
   */
  advanceConsolidated(to: number, expectedEpoch: number = this._epoch): boolean {
    if (expectedEpoch !== this._epoch) return false;
    const next = Math.min(to, this.records.length);
    if (next <= this.cursor) return false;
    this.cursor = next;
    return true;
  }

  clear(): void {
    this.records = [];
    this.cursor = 0;
    this._epoch++;
    this.updatedAt = Date.now();
  }
}
