// TaskSupervisor: owns detached background jobs so none is silently dropped

import type { Logger } from "./types";
import { errorMessage } from "./types";

const DEFAULT_MAX_IN_FLIGHT = 32;

export interface TaskSupervisorOptions {
  readonly maxInFlight?: number;
}

export interface SpawnOptions {
  /** Start even when the in-flight limit is reached. */
  readonly ignoreLimit?: boolean;
}

/**
 * Runs fire-and-forget jobs. Each job is keyed; a key that is already
 * running is not started again. Completion (success or failure) is
 * observed exactly once, failures are logged, and `drain()` waits for
 * everything in flight, including jobs spawned while draining.
 */
export class TaskSupervisor {
  private readonly running = new Map<string, Promise<void>>();
  private readonly maxInFlight: number;
  private readonly logger: Logger;
  private sequence = 0;

  constructor(logger: Logger, options: TaskSupervisorOptions = {}) {
    this.logger = logger.child({ component: "TaskSupervisor" });
    this.maxInFlight = options.maxInFlight ?? DEFAULT_MAX_IN_FLIGHT;
  }

  get size(): number {
    return this.running.size;
  }

  isRunning(key: string): boolean {
    return this.running.has(key);
  }

  /** Key that no other job shares, for jobs that must never be de-duplicated. */
  uniqueKey(prefix: string): string {
    this.sequence++;
    return `${prefix}#${this.sequence}`;
  }

  /**
   * Start `job` in the background. Returns false (and does not start it)
   * when `key` is already running or the in-flight limit is reached.
   */
  spawn(key: string, job: () => Promise<void>, options: SpawnOptions = {}): boolean {
    if (this.running.has(key)) {
      this.logger.debug("Job already running, skipped", { key });
      return false;
    }
    if (!options.ignoreLimit && this.running.size >= this.maxInFlight) {
      this.logger.warn("Too many background jobs, skipped", { key, inFlight: this.running.size });
      return false;
    }

    const startedAt = Date.now();
    const handle = Promise.resolve()
      .then(job)
      .then(
        () => {
          this.logger.debug("Job finished", { key, durationMs: Date.now() - startedAt });
        },
        (e: unknown) => {
          this.logger.error("Job failed", { key, error: errorMessage(e) });
        },
      )
      .finally(() => {
        this.running.delete(key);
      });

    this.running.set(key, handle);
    return true;
  }

  /** Wait for every in-flight job to settle. Jobs are never cancelled. */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all(this.running.values());
    }
  }
}
