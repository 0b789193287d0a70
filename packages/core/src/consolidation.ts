/**
 * MemoryConsolidator: folds a slice of session history into durable memory.
 *
 * Two modes:
 *   - reactive: summarizes `messages[lastConsolidated : length - keepCount]`
 *     and moves the session cursor to the end of that slice
 *   - archive: summarizes a snapshot taken before `/new` cleared the session;
 *     the cursor was already reset by the clear and is left alone
 *
 * The provider is asked (without tools) for a JSON object with
 * `history_entry` and `memory_update`. Failures are logged and reported on
 * the event bus; they never move the cursor.
 */

import JSON5 from "json5";
import { z } from "zod";
import type { Logger, MemoryStore, Provider, SessionStore } from "./types";
import { errorMessage } from "./types";
import type { EventBus } from "./events";
import type { Session, SessionRecord } from "./session";

const SYSTEM_PROMPT = "You are a memory consolidation agent. Respond only with valid JSON.";

const ConsolidationReplySchema = z.object({
  history_entry: z.string().optional(),
  memory_update: z.string().optional(),
});

export type ConsolidationReply = z.infer<typeof ConsolidationReplySchema>;

export interface MemoryConsolidatorDeps {
  readonly provider: Provider;
  readonly memory: MemoryStore;
  readonly sessions: SessionStore;
  readonly logger: Logger;
  readonly model: string;
  readonly memoryWindow: number;
  readonly eventBus?: EventBus;
}

export interface ConsolidateOptions {
  /** Records to archive instead of the session's unconsolidated slice. */
  readonly archive?: readonly SessionRecord[];
}

export class MemoryConsolidator {
  private readonly logger: Logger;

  constructor(private readonly deps: MemoryConsolidatorDeps) {
    this.logger = deps.logger.child({ component: "MemoryConsolidator" });
  }

  /** Records kept out of reactive consolidation so recent context stays verbatim. */
  get keepCount(): number {
    return Math.floor(this.deps.memoryWindow / 2);
  }

  /**
   * Consolidate one slice. Resolves true when memory was written, false on
   * a no-op or a failure; never rejects.
   */
  async consolidate(session: Session, options: ConsolidateOptions = {}): Promise<boolean> {
    const archiveAll = options.archive !== undefined;
    const epoch = session.epoch;
    const end = session.messages.length - this.keepCount;
    const slice = options.archive
      ? [...options.archive]
      : session.messages.slice(session.lastConsolidated, Math.max(end, session.lastConsolidated));

    if (slice.length === 0) {
      this.logger.debug("Nothing to consolidate", { sessionKey: session.key, archiveAll });
      return false;
    }

    try {
      const current = await this.deps.memory.readLongTerm();
      if (!current.ok) throw current.error;

      const reply = await this.requestSummary(current.value, slice);

      if (reply.history_entry) {
        const appended = await this.deps.memory.appendHistory(reply.history_entry);
        if (!appended.ok) throw appended.error;
      }
      if (reply.memory_update !== undefined && reply.memory_update !== current.value) {
        const written = await this.deps.memory.writeLongTerm(reply.memory_update);
        if (!written.ok) throw written.error;
      }

      if (!archiveAll && session.advanceConsolidated(end, epoch)) {
        await this.deps.sessions.save(session);
      }

      this.logger.info("Memory consolidated", {
        sessionKey: session.key,
        archiveAll,
        messages: slice.length,
        lastConsolidated: session.lastConsolidated,
      });
      this.deps.eventBus?.emit("memory:consolidated", {
        sessionKey: session.key,
        archiveAll,
        consolidatedMessages: slice.length,
        lastConsolidated: session.lastConsolidated,
      });
      return true;
    } catch (e) {
      const error = errorMessage(e);
      this.logger.error("Memory consolidation failed", { sessionKey: session.key, archiveAll, error });
      this.deps.eventBus?.emit("memory:consolidation_failed", { sessionKey: session.key, archiveAll, error });
      return false;
    }
  }

  private async requestSummary(currentMemory: string, slice: readonly SessionRecord[]): Promise<ConsolidationReply> {
    const prompt = buildConsolidationPrompt(currentMemory, formatTranscript(slice));
    const response = await this.deps.provider.chat({
      model: this.deps.model,
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: prompt },
      ],
    });

    const text = response.content?.trim();
    if (!text) throw new Error("Empty consolidation reply");
    return parseConsolidationReply(text);
  }
}

/** `[YYYY-MM-DDTHH:MM] ROLE [tools: a, b]: content`, one line per non-empty record. */
export function formatTranscript(records: readonly SessionRecord[]): string {
  const lines: string[] = [];
  for (const record of records) {
    if (!record.content) continue;
    const tools = record.toolsUsed && record.toolsUsed.length > 0
      ? ` [tools: ${record.toolsUsed.join(", ")}]`
      : "";
    lines.push(`[${record.timestamp.slice(0, 16)}] ${record.role.toUpperCase()}${tools}: ${record.content}`);
  }
  return lines.join("\n");
}

export function buildConsolidationPrompt(currentMemory: string, transcript: string): string {
  return `Process this conversation and return a JSON object with exactly two keys:

1. "history_entry": a paragraph of 2-5 sentences summarizing the key events, decisions and topics. Start with a timestamp like [YYYY-MM-DD HH:MM]. Include enough detail to be useful when searched later.
2. "memory_update": the updated long-term memory. Add any new facts (location, preferences, personal details, habits, project context, technical decisions, services used). If nothing is new, return the existing content unchanged.

## Current Long-term Memory
${currentMemory || "(empty)"}

## Conversation to Process
${transcript}

Respond with ONLY valid JSON, no markdown fences.`;
}

/**
 * Parse the model's reply. Tolerates ``` fences and JSON5 syntax
 * (trailing commas, single quotes); throws when the result is not the
 * expected object.
 */
export function parseConsolidationReply(text: string): ConsolidationReply {
  let body = text.trim();
  if (body.startsWith("```")) {
    body = body.replace(/^```[a-zA-Z0-9]*\s*/, "").replace(/\s*```$/, "");
  }

  const parsed: unknown = JSON5.parse(body);
  const result = ConsolidationReplySchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Unexpected consolidation reply: ${result.error.issues[0]?.message ?? "invalid shape"}`);
  }
  return result.data;
}
