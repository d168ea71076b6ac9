/**
 * Quran Stream Bot — src/panel/panelManager.ts
 * WHAT: Owns the one live control panel and re-renders it on state changes.
 * WHY: State changes arrive in bursts (index + name + last change on every
 *      track switch). Only one Discord edit may be in flight at a time, and a
 *      stuck edit must not wedge the panel forever.
 * FLOWS:
 *  - register(panel) → subscribe to state_updated
 *  - state_updated → refresh() → updatePanelStatus() under a timeout → RefreshOutcome
 *  - shutdown() → wait (bounded) for an in-flight refresh → unregister()
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import {
  classifyError,
  errorContext,
  isForbidden,
  isHttpFailure,
  isNotFound,
  type ClassifiedError,
} from "../lib/errors.js";
import { withTimeout } from "../lib/timeout.js";
import {
  DEFAULT_PANEL_UPDATE_TIMEOUT_MS,
  PANEL_SHUTDOWN_POLL_MS,
  PANEL_SHUTDOWN_WAIT_MS,
} from "../lib/constants.js";
import type { EventBus } from "../state/eventBus.js";
import type { StateEventMap, StateUpdatedPayload } from "../state/types.js";
import type { ControlPanel, PanelHost, PanelManagerStatus, RefreshOutcome } from "./types.js";

export interface PanelManagerOptions {
  events: EventBus<StateEventMap>;
  updateTimeoutMs?: number;
  shutdownWaitMs?: number;
  shutdownPollMs?: number;
  now?: () => Date;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function outcomeFor(err: ClassifiedError): RefreshOutcome {
  if (err.kind === "timeout") return "timeout";
  if (isNotFound(err)) return "not_found";
  if (isForbidden(err)) return "forbidden";
  if (isHttpFailure(err)) return "http_error";
  return "failed";
}

export class PanelManager {
  private readonly events: EventBus<StateEventMap>;
  private readonly updateTimeoutMs: number;
  private readonly shutdownWaitMs: number;
  private readonly shutdownPollMs: number;
  private readonly now: () => Date;

  private panel: ControlPanel | null = null;
  private host: PanelHost | null = null;
  private updateInProgress = false;
  private listening = false;
  private registrationId = 0;
  // Bumped by reset(); a refresh started under an older generation no longer owns the flag
  private generation = 0;
  private lastOutcome: RefreshOutcome | null = null;
  private lastUpdateAt: string | null = null;

  constructor(options: PanelManagerOptions) {
    this.events = options.events;
    this.updateTimeoutMs = options.updateTimeoutMs ?? DEFAULT_PANEL_UPDATE_TIMEOUT_MS;
    this.shutdownWaitMs = options.shutdownWaitMs ?? PANEL_SHUTDOWN_WAIT_MS;
    this.shutdownPollMs = options.shutdownPollMs ?? PANEL_SHUTDOWN_POLL_MS;
    this.now = options.now ?? (() => new Date());
  }

  // One listener per manager, so replacing the panel never stacks subscriptions
  private readonly onStateUpdated = async (data: StateUpdatedPayload): Promise<void> => {
    await this.handleStateUpdated(data);
  };

  /**
   * Make `panel` the live panel. A previously registered panel is dropped
   * first. Returns false (and changes nothing) when the panel has no host.
   */
  register(panel: ControlPanel | null | undefined): boolean {
    if (!panel) {
      logger.error({ evt: "panel_register_rejected", reason: "no_panel" }, "[panel] cannot register a null panel");
      return false;
    }
    if (panel.host === undefined) {
      logger.error(
        { evt: "panel_register_rejected", reason: "no_host_capability" },
        "[panel] panel has no host attribute"
      );
      return false;
    }
    if (panel.host === null) {
      logger.error({ evt: "panel_register_rejected", reason: "host_null" }, "[panel] panel host is not attached");
      return false;
    }

    if (this.panel) {
      logger.info(
        { evt: "panel_replaced", previousRegistration: this.registrationId },
        "[panel] replacing existing panel"
      );
      this.unregister();
    }

    this.panel = panel;
    this.host = panel.host;
    this.registrationId++;

    if (!this.listening) {
      this.events.addEventListener("state_updated", this.onStateUpdated);
      this.listening = true;
    }

    logger.info(
      {
        evt: "panel_registered",
        registration: this.registrationId,
        hostUser: this.host.user?.username ?? null,
        hostReady: this.host.isReady(),
      },
      "[panel] registered"
    );
    return true;
  }

  unregister(): void {
    if (!this.panel) {
      logger.debug({ evt: "panel_unregister_noop" }, "[panel] nothing registered");
      return;
    }

    if (this.listening) {
      this.events.removeEventListener("state_updated", this.onStateUpdated);
      this.listening = false;
    }
    this.panel = null;
    this.host = null;
    logger.info({ evt: "panel_unregistered", registration: this.registrationId }, "[panel] unregistered");
  }

  /** Bus listener body. Resolves with what happened; never rejects. */
  async handleStateUpdated(data: StateUpdatedPayload): Promise<RefreshOutcome> {
    return this.refresh(`state_updated:${data.type}`);
  }

  async triggerManualUpdate(): Promise<RefreshOutcome> {
    return this.refresh("manual");
  }

  private async refresh(trigger: string): Promise<RefreshOutcome> {
    const panel = this.panel;
    if (!panel) {
      logger.debug({ evt: "panel_refresh_skipped", trigger, reason: "no_panel" }, "[panel] no panel registered");
      return this.record("skipped_no_panel");
    }
    if (this.updateInProgress) {
      logger.warn(
        { evt: "panel_refresh_skipped", trigger, reason: "in_progress" },
        "[panel] refresh already in progress, skipping"
      );
      return this.record("skipped_in_progress");
    }

    this.updateInProgress = true;
    const generation = this.generation;
    const started = Date.now();
    try {
      await withTimeout(panel.updatePanelStatus(), this.updateTimeoutMs, "panel_update");
      logger.debug(
        { evt: "panel_refresh_ok", trigger, durationMs: Date.now() - started },
        "[panel] refreshed"
      );
      return this.settle(generation, "success");
    } catch (err) {
      const classified = classifyError(err);
      const outcome = outcomeFor(classified);
      const ctx = { evt: `panel_refresh_${outcome}`, trigger, durationMs: Date.now() - started, ...errorContext(classified) };

      switch (outcome) {
        case "timeout":
          logger.error(ctx, `[panel] refresh timed out after ${this.updateTimeoutMs}ms`);
          break;
        case "not_found":
          logger.error(ctx, "[panel] panel message or channel no longer exists");
          break;
        case "forbidden":
          logger.error(ctx, "[panel] missing permission to edit the panel");
          break;
        case "http_error":
          logger.error(ctx, `[panel] Discord request failed: ${classified.message}`);
          break;
        default:
          logger.error({ ...ctx, err }, `[panel] refresh failed: ${classified.message}`);
      }
      return this.settle(generation, outcome);
    }
  }

  private settle(generation: number, outcome: RefreshOutcome): RefreshOutcome {
    if (generation !== this.generation) {
      logger.debug(
        { evt: "panel_refresh_stale", outcome, generation, current: this.generation },
        "[panel] refresh from before reset settled, ignoring"
      );
      return outcome;
    }
    this.updateInProgress = false;
    if (outcome === "success") {
      this.lastUpdateAt = this.now().toISOString();
    }
    return this.record(outcome);
  }

  private record(outcome: RefreshOutcome): RefreshOutcome {
    this.lastOutcome = outcome;
    return outcome;
  }

  /**
   * Give an in-flight refresh up to shutdownWaitMs to finish, then
   * unregister regardless.
   */
  async shutdown(): Promise<void> {
    logger.info({ evt: "panel_shutdown_start", updateInProgress: this.updateInProgress }, "[panel] shutting down");

    let waited = 0;
    while (this.updateInProgress && waited < this.shutdownWaitMs) {
      await sleep(this.shutdownPollMs);
      waited += this.shutdownPollMs;
    }

    if (this.updateInProgress) {
      logger.warn(
        { evt: "panel_shutdown_busy", waitedMs: waited },
        "[panel] refresh still in progress at shutdown"
      );
    }

    this.unregister();
    logger.info({ evt: "panel_shutdown_complete", waitedMs: waited }, "[panel] shutdown complete");
  }

  getStatus(): PanelManagerStatus {
    return {
      panelRegistered: this.panel !== null,
      hostRegistered: this.host !== null,
      hostReady: this.host?.isReady() ?? false,
      updateInProgress: this.updateInProgress,
      listenerRegistered: this.listening,
      lastOutcome: this.lastOutcome,
      lastUpdateAt: this.lastUpdateAt,
    };
  }

  isHealthy(): boolean {
    return this.panel !== null && this.host !== null && this.host.isReady();
  }

  /** Force back to empty, including a stuck in-progress flag. */
  reset(): void {
    this.unregister();
    this.generation++;
    this.updateInProgress = false;
    this.lastOutcome = null;
    this.lastUpdateAt = null;
    logger.warn({ evt: "panel_manager_reset" }, "[panel] manager reset");
  }
}
