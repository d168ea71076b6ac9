/**
 * Quran Stream Bot — src/state/eventBus.ts
 * WHAT: In-process pub/sub for state change notifications.
 * WHY: Decouples state mutation from what reacts to it (panel refresh today).
 * FLOWS:
 *  - addEventListener(event, cb) → appended in registration order
 *  - emit(event, data) → each listener awaited in order, failures isolated → EmitResult
 * NOTE: there is no per-listener timeout. A listener that never settles holds
 *       up that one emission forever. PanelManager bounds its own work.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import { classifyError, errorContext } from "../lib/errors.js";

export type Listener<T> = (data: T) => Promise<void> | void;

export interface EmitResult {
  event: string;
  total: number;
  successful: number;
  failed: number;
}

/**
 * Typed event bus. `Events` maps event name → payload type.
 *
 * The set of names is closed by convention (the map), not enforced at
 * runtime: listening on a name nobody emits just creates an empty list.
 */
export class EventBus<Events extends object> {
  private readonly listeners: { [K in keyof Events]?: Array<Listener<Events[K]>> } = {};

  addEventListener<K extends keyof Events & string>(event: K, callback: Listener<Events[K]>): void {
    let list = this.listeners[event];
    if (!list) {
      list = [];
      this.listeners[event] = list;
    }
    list.push(callback);

    logger.debug(
      { evt: "event_listener_added", event, listenerCount: list.length },
      "[events] listener added"
    );
  }

  /**
   * Removes one occurrence. Unknown events and unregistered callbacks are
   * logged, not thrown; teardown paths call this unconditionally.
   */
  removeEventListener<K extends keyof Events & string>(event: K, callback: Listener<Events[K]>): boolean {
    const list = this.listeners[event];
    if (!list) {
      logger.warn(
        { evt: "remove_listener_unknown_event", event, knownEvents: Object.keys(this.listeners) },
        "[events] remove listener: unknown event"
      );
      return false;
    }

    const index = list.indexOf(callback);
    if (index === -1) {
      logger.warn(
        { evt: "remove_listener_not_found", event, listenerCount: list.length },
        "[events] remove listener: callback was not registered"
      );
      return false;
    }

    list.splice(index, 1);
    logger.debug(
      { evt: "event_listener_removed", event, listenerCount: list.length },
      "[events] listener removed"
    );
    return true;
  }

  listenerCount<K extends keyof Events & string>(event: K): number {
    return this.listeners[event]?.length ?? 0;
  }

  /**
   * Run every listener for `event` sequentially, in registration order.
   *
   * The list is copied first, so a listener that unsubscribes itself (or
   * another) mid-emission doesn't shift the indices under us. Never rejects.
   */
  async emit<K extends keyof Events & string>(event: K, data: Events[K]): Promise<EmitResult> {
    const result: EmitResult = { event, total: 0, successful: 0, failed: 0 };
    const snapshot = [...(this.listeners[event] ?? [])];
    result.total = snapshot.length;

    if (snapshot.length === 0) {
      logger.debug({ evt: "emit_no_listeners", event }, "[events] no listeners");
      return result;
    }

    for (const [index, callback] of snapshot.entries()) {
      try {
        await callback(data);
        result.successful++;
      } catch (err) {
        result.failed++;
        const classified = classifyError(err);
        logger.error(
          {
            evt: "event_callback_failed",
            event,
            callbackIndex: index,
            callbackName: callback.name || "anonymous",
            ...errorContext(classified),
            err,
          },
          `[events] ${event} listener #${index} failed: ${classified.message}`
        );
      }
    }

    logger.debug(
      { evt: "event_emission_complete", ...result },
      `[events] ${event} delivered to ${result.successful}/${result.total} listeners`
    );
    return result;
  }
}
