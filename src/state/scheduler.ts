/**
 * Quran Stream Bot — src/state/scheduler.ts
 * WHAT: Background task spawning for fire-and-forget event emission.
 * WHY: State setters are synchronous; their notifications run after the
 *      setter returns. Whether anything runs at all is decided here, so tests
 *      and shutdown can switch it off and wait for stragglers.
 * FLOWS:
 *  - start() → isRunning() true → spawn(label, task) queues task as a microtask
 *  - stop() → new spawns are refused by callers checking isRunning()
 *  - drain() → await everything still pending
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import { classifyError, errorContext } from "../lib/errors.js";

export interface TaskScheduler {
  /** False before start() and after stop(). Emitters skip work when false. */
  isRunning(): boolean;
  /** Run `task` after the current synchronous call stack unwinds. */
  spawn(label: string, task: () => Promise<unknown>): void;
}

export class LoopScheduler implements TaskScheduler {
  private running = false;
  private readonly pending = new Set<Promise<void>>();

  start(): void {
    this.running = true;
    logger.debug({ evt: "scheduler_started" }, "[scheduler] started");
  }

  stop(): void {
    this.running = false;
    logger.debug({ evt: "scheduler_stopped", pending: this.pending.size }, "[scheduler] stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  pendingCount(): number {
    return this.pending.size;
  }

  spawn(label: string, task: () => Promise<unknown>): void {
    // Promise.resolve().then defers to a microtask: never inline with the caller
    const tracked: Promise<void> = Promise.resolve()
      .then(task)
      .then(
        () => undefined,
        (err: unknown) => {
          const classified = classifyError(err);
          logger.error(
            { evt: "scheduled_task_failed", label, ...errorContext(classified), err },
            `[scheduler] ${label} failed: ${classified.message}`
          );
        }
      )
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }

  /**
   * Wait for every spawned task, including ones spawned by tasks while we wait.
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}
