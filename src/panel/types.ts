/**
 * Quran Stream Bot — src/panel/types.ts
 * WHAT: Collaborator contracts for the live control panel.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/**
 * The bot connection a panel lives on. A discord.js Client satisfies this
 * structurally (user is null until login completes).
 */
export interface PanelHost {
  user: { id: string; username: string } | null;
  isReady(): boolean;
}

/**
 * Something that can re-render itself from current state.
 *
 * `host` undefined means the panel has no host capability at all;
 * `null` means it has one but it isn't attached yet. Both are rejected
 * at registration.
 */
export interface ControlPanel {
  host?: PanelHost | null;
  updatePanelStatus(): Promise<void>;
}

export type RefreshOutcome =
  | "skipped_no_panel"
  | "skipped_in_progress"
  | "success"
  | "timeout"
  | "not_found"
  | "forbidden"
  | "http_error"
  | "failed";

export interface PanelManagerStatus {
  panelRegistered: boolean;
  hostRegistered: boolean;
  hostReady: boolean;
  updateInProgress: boolean;
  listenerRegistered: boolean;
  lastOutcome: RefreshOutcome | null;
  lastUpdateAt: string | null; // ISO, last successful refresh
}
