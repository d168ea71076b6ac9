/**
 * Quran Stream Bot — tests/panel/panelManager.test.ts
 * WHAT: Tests for panel registration, refresh outcomes, and shutdown.
 * WHY: Every state change funnels into one Discord edit. Overlapping edits,
 *      hung edits and deleted panels each have to land on a distinct outcome
 *      without wedging the manager.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import { PanelManager } from "../../src/panel/panelManager.js";
import { EventBus } from "../../src/state/eventBus.js";
import type { StateEventMap } from "../../src/state/types.js";
import type { ControlPanel } from "../../src/panel/types.js";
import { logger } from "../../src/lib/logger.js";
import {
  createDiscordAPIError,
  createHttpError,
  createMockHost,
  createMockPanel,
  createRateLimitError,
  deferredUpdate,
} from "../utils/discordMocks.js";

describe("PanelManager", () => {
  let events: EventBus<StateEventMap>;
  let manager: PanelManager;

  beforeEach(() => {
    events = new EventBus<StateEventMap>();
    manager = new PanelManager({ events, updateTimeoutMs: 1_000 });
  });

  // ===== Registration =====

  describe("register", () => {
    it("rejects a missing panel", () => {
      expect(manager.register(null)).toBe(false);
      expect(logger.error).toHaveBeenCalledWith(
        { evt: "panel_register_rejected", reason: "no_panel" },
        "[panel] cannot register a null panel"
      );
    });

    it("rejects a panel without a host attribute", () => {
      const panel: ControlPanel = { updatePanelStatus: vi.fn(async () => undefined) };

      expect(manager.register(panel)).toBe(false);
      expect(manager.getStatus().panelRegistered).toBe(false);
      expect(events.listenerCount("state_updated")).toBe(0);
    });

    it("rejects a panel whose host is null", () => {
      expect(manager.register(createMockPanel(undefined, null))).toBe(false);
      expect(logger.error).toHaveBeenCalledWith(
        { evt: "panel_register_rejected", reason: "host_null" },
        "[panel] panel host is not attached"
      );
    });

    it("subscribes exactly one listener", () => {
      expect(manager.register(createMockPanel())).toBe(true);
      expect(events.listenerCount("state_updated")).toBe(1);
      expect(manager.getStatus()).toMatchObject({
        panelRegistered: true,
        hostRegistered: true,
        listenerRegistered: true,
      });
    });

    it("replaces an existing panel without stacking listeners", async () => {
      const first = createMockPanel();
      const second = createMockPanel();
      manager.register(first);
      manager.register(second);

      expect(events.listenerCount("state_updated")).toBe(1);

      await events.emit("state_updated", { type: "loop_user_cleared" });
      expect(first.updatePanelStatus).not.toHaveBeenCalled();
      expect(second.updatePanelStatus).toHaveBeenCalledTimes(1);
    });
  });

  describe("unregister", () => {
    it("is a logged no-op when nothing is registered", () => {
      manager.unregister();
      expect(logger.debug).toHaveBeenCalledWith({ evt: "panel_unregister_noop" }, "[panel] nothing registered");
    });

    it("drops the panel and the subscription", () => {
      manager.register(createMockPanel());
      manager.unregister();

      expect(events.listenerCount("state_updated")).toBe(0);
      expect(manager.getStatus()).toMatchObject({ panelRegistered: false, hostRegistered: false });
    });
  });

  // ===== Refresh =====

  describe("triggerManualUpdate", () => {
    it("skips when no panel is registered", async () => {
      expect(await manager.triggerManualUpdate()).toBe("skipped_no_panel");
    });

    it("refreshes the panel", async () => {
      const panel = createMockPanel();
      manager.register(panel);

      expect(await manager.triggerManualUpdate()).toBe("success");
      expect(panel.updatePanelStatus).toHaveBeenCalledTimes(1);
      expect(manager.getStatus().lastOutcome).toBe("success");
      expect(manager.getStatus().lastUpdateAt).not.toBeNull();
    });

    it("allows only one refresh in flight", async () => {
      const { update, resolve } = deferredUpdate();
      const panel = createMockPanel(update);
      manager.register(panel);

      const first = manager.triggerManualUpdate();
      const second = await manager.triggerManualUpdate();

      expect(second).toBe("skipped_in_progress");
      expect(panel.updatePanelStatus).toHaveBeenCalledTimes(1);

      resolve();
      expect(await first).toBe("success");
      expect(manager.getStatus().updateInProgress).toBe(false);
    });

    it("times out a hung refresh and clears the flag", async () => {
      vi.useFakeTimers();
      const panel = createMockPanel(() => new Promise<void>(() => undefined));
      manager.register(panel);

      const pending = manager.triggerManualUpdate();
      await vi.advanceTimersByTimeAsync(1_000);

      expect(await pending).toBe("timeout");
      expect(manager.getStatus().updateInProgress).toBe(false);
      expect(logger.error).toHaveBeenCalledWith(
        expect.objectContaining({ evt: "panel_refresh_timeout", errorKind: "timeout", timeoutMs: 1_000 }),
        "[panel] refresh timed out after 1000ms"
      );
    });

    it.each([
      ["a deleted message", () => createDiscordAPIError(10008, "Unknown Message", 404), "not_found"],
      ["a deleted channel", () => createDiscordAPIError(10003, "Unknown Channel", 400), "not_found"],
      ["missing permissions", () => createDiscordAPIError(50013, "Missing Permissions", 403), "forbidden"],
      ["missing access", () => createDiscordAPIError(50001, "Missing Access", 400), "forbidden"],
      ["another Discord API error", () => createDiscordAPIError(50035, "Invalid Form Body", 400), "http_error"],
      ["a rate limit", () => createRateLimitError(), "http_error"],
      ["a gateway HTTP error", () => createHttpError(502), "http_error"],
      ["anything else", () => new Error("boom"), "failed"],
    ] as const)("maps %s to %s", async (_label, makeError, expected) => {
      const panel = createMockPanel(async () => {
        throw makeError();
      });
      manager.register(panel);

      expect(await manager.triggerManualUpdate()).toBe(expected);
      expect(manager.getStatus().updateInProgress).toBe(false);
    });

    it("refreshes again after a failure", async () => {
      const panel = createMockPanel();
      panel.updatePanelStatus.mockRejectedValueOnce(new Error("once"));
      manager.register(panel);

      expect(await manager.triggerManualUpdate()).toBe("failed");
      expect(await manager.triggerManualUpdate()).toBe("success");
      expect(panel.updatePanelStatus).toHaveBeenCalledTimes(2);
    });

    it("handles a synchronous throw from the panel", async () => {
      const panel: ControlPanel = {
        host: createMockHost(),
        updatePanelStatus: () => {
          throw new Error("sync boom");
        },
      };
      manager.register(panel);

      expect(await manager.triggerManualUpdate()).toBe("failed");
    });
  });

  describe("handleStateUpdated", () => {
    it("refreshes when the bus delivers a state change", async () => {
      const panel = createMockPanel();
      manager.register(panel);

      const result = await events.emit("state_updated", { type: "index_changed", oldIndex: 0, newIndex: 1 });

      expect(result).toEqual({ event: "state_updated", total: 1, successful: 1, failed: 0 });
      expect(panel.updatePanelStatus).toHaveBeenCalledTimes(1);
    });

    it("resolves with the outcome", async () => {
      expect(await manager.handleStateUpdated({ type: "state_reset" })).toBe("skipped_no_panel");
    });
  });

  // ===== Shutdown / health =====

  describe("shutdown", () => {
    it("waits for an in-flight refresh before unregistering", async () => {
      vi.useFakeTimers();
      const { update, resolve } = deferredUpdate();
      manager = new PanelManager({ events, updateTimeoutMs: 60_000 });
      manager.register(createMockPanel(update));

      const refresh = manager.triggerManualUpdate();
      const done = manager.shutdown();

      await vi.advanceTimersByTimeAsync(1_000);
      expect(manager.getStatus().panelRegistered).toBe(true);

      resolve();
      expect(await refresh).toBe("success");
      await vi.advanceTimersByTimeAsync(1_000);
      await done;

      expect(manager.getStatus().panelRegistered).toBe(false);
      expect(logger.warn).not.toHaveBeenCalledWith(
        expect.objectContaining({ evt: "panel_shutdown_busy" }),
        expect.any(String)
      );
    });

    it("gives up after five seconds and unregisters anyway", async () => {
      vi.useFakeTimers();
      manager = new PanelManager({ events, updateTimeoutMs: 60_000 });
      manager.register(createMockPanel(() => new Promise<void>(() => undefined)));

      void manager.triggerManualUpdate();
      const done = manager.shutdown();
      await vi.advanceTimersByTimeAsync(5_000);
      await done;

      expect(manager.getStatus().panelRegistered).toBe(false);
      expect(events.listenerCount("state_updated")).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith(
        { evt: "panel_shutdown_busy", waitedMs: 5_000 },
        "[panel] refresh still in progress at shutdown"
      );
    });

    it("returns straight away when idle", async () => {
      manager.register(createMockPanel());
      await manager.shutdown();

      expect(manager.getStatus().panelRegistered).toBe(false);
    });
  });

  describe("isHealthy", () => {
    it("is false with no panel", () => {
      expect(manager.isHealthy()).toBe(false);
    });

    it("follows the host's readiness", () => {
      manager.register(createMockPanel(undefined, createMockHost({ isReady: () => false })));
      expect(manager.isHealthy()).toBe(false);

      manager.register(createMockPanel());
      expect(manager.isHealthy()).toBe(true);
    });
  });

  it("reset clears a stuck in-progress flag", async () => {
    const { update, resolve } = deferredUpdate();
    manager.register(createMockPanel(update));
    const refresh = manager.triggerManualUpdate();

    manager.reset();

    expect(manager.getStatus()).toMatchObject({
      panelRegistered: false,
      updateInProgress: false,
      lastOutcome: null,
    });
    resolve();
    await refresh;
  });

  it("ignores a refresh from before reset when it settles", async () => {
    const stale = deferredUpdate();
    manager.register(createMockPanel(stale.update));
    const staleRefresh = manager.triggerManualUpdate();

    manager.reset();

    const current = deferredUpdate();
    const replacement = createMockPanel(current.update);
    manager.register(replacement);
    const currentRefresh = manager.triggerManualUpdate();

    stale.resolve();
    expect(await staleRefresh).toBe("success");
    expect(manager.getStatus()).toMatchObject({ updateInProgress: true, lastOutcome: null, lastUpdateAt: null });

    expect(await manager.triggerManualUpdate()).toBe("skipped_in_progress");
    expect(replacement.updatePanelStatus).toHaveBeenCalledTimes(1);

    current.resolve();
    expect(await currentRefresh).toBe("success");
    expect(manager.getStatus()).toMatchObject({ updateInProgress: false, lastOutcome: "success" });
  });
});
