/**
 * Quran Stream Bot — src/lib/constants.ts
 * WHAT: Centralized application constants for timeouts, delays, and limits
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { MessageMentionOptions } from "discord.js";

// ===== Discord Message Options =====

/** Panel embeds mention users for provenance; never ping them on edit */
export const SAFE_ALLOWED_MENTIONS: MessageMentionOptions = { parse: [] };

// ===== Timeouts & Delays =====

/** Budget for one panel re-render (message edit round-trip) */
export const DEFAULT_PANEL_UPDATE_TIMEOUT_MS = 30_000;

/** Max time shutdown waits for an in-flight panel refresh */
export const PANEL_SHUTDOWN_WAIT_MS = 5_000;

/** Poll interval while shutdown waits */
export const PANEL_SHUTDOWN_POLL_MS = 1_000;

/** Grace period before exit on uncaught exception (for Sentry flush) */
export const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

// ===== State =====

/** "Last Activity" stays on the panel this long after a user action */
export const LAST_ACTIVITY_WINDOW_S = 15 * 60;

/** Recitation files are named by zero-padded surah number: 001.mp3 */
export const SURAH_PREFIX_WIDTH = 3;

export const SURAH_COUNT = 114;
