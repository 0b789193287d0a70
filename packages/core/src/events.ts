// EventBus: typed pub/sub for cross-cutting concerns

import type { InboundMessage, OutboundMessage, Logger, ToolCall, ToolOutcome } from "./types";

export interface WayfarerEvents {
  "message:received": { sessionKey: string; message: InboundMessage };
  "message:response": { sessionKey: string; message: OutboundMessage; durationMs: number; iterations: number };
  "tool:calling": { sessionKey: string; toolCall: ToolCall };
  "tool:result": { sessionKey: string; toolCall: ToolCall; outcome: ToolOutcome; durationMs: number };
  "session:reset": { sessionKey: string; archivedMessages: number };
  "memory:consolidated": { sessionKey: string; archiveAll: boolean; consolidatedMessages: number; lastConsolidated: number };
  "memory:consolidation_failed": { sessionKey: string; archiveAll: boolean; error: string };
}

type EventHandler<K extends keyof WayfarerEvents> = (data: WayfarerEvents[K]) => void | Promise<void>;

export interface EventBus {
  /** Fire-and-forget emit. Listener errors are caught and logged, never block the caller. */
  emit<K extends keyof WayfarerEvents>(event: K, data: WayfarerEvents[K]): void;
  on<K extends keyof WayfarerEvents>(event: K, handler: EventHandler<K>): void;
  off<K extends keyof WayfarerEvents>(event: K, handler: EventHandler<K>): void;
}

type Handler = (data: never) => void | Promise<void>;

export class SimpleEventBus implements EventBus {
  private handlers = new Map<keyof WayfarerEvents, Set<Handler>>();
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "EventBus" });
  }

  emit<K extends keyof WayfarerEvents>(event: K, data: WayfarerEvents[K]): void {
    const handlers = this.handlers.get(event);
    if (!handlers) return;

    for (const handler of handlers) {
      try {
        const result = (handler as EventHandler<K>)(data);
        if (result instanceof Promise) {
          result.catch((e: unknown) => {
            this.logger.error("Async listener error (fire-and-forget)", {
              event,
              error: String(e),
            });
          });
        }
      } catch (e) {
        this.logger.error("Sync listener error", {
          event,
          error: String(e),
        });
      }
    }
  }

  on<K extends keyof WayfarerEvents>(event: K, handler: EventHandler<K>): void {
    let handlers = this.handlers.get(event);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(event, handlers);
    }
    handlers.add(handler);
  }

  off<K extends keyof WayfarerEvents>(event: K, handler: EventHandler<K>): void {
    this.handlers.get(event)?.delete(handler);
  }
}
