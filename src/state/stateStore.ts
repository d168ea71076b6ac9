/**
 * Quran Stream Bot — src/state/stateStore.ts
 * WHAT: JSON-file backed playback/session state with change notifications.
 * WHY: Survives restarts (resume the surah that was playing, keep counters)
 *      and tells the control panel when something it renders has changed.
 * FLOWS:
 *  - constructor → load() → defaults merged with whatever the file holds
 *  - setter → validate → mutate → save() (sync) → emit in background via scheduler
 *  - save() → temp file + rename over the target
 * NOTE: best effort throughout. A failed save is logged and the in-memory
 *       value stays; nothing is rolled back.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";

import { logger } from "../lib/logger.js";
import {
  classifyError,
  errorContext,
  isMissingFile,
  isPermissionDenied,
} from "../lib/errors.js";
import { LAST_ACTIVITY_WINDOW_S, SURAH_PREFIX_WIDTH } from "../lib/constants.js";
import type { EventBus } from "./eventBus.js";
import type { TaskScheduler } from "./scheduler.js";
import { fromDocument, toDocument } from "./stateDocument.js";
import {
  defaultState,
  type ModeOwner,
  type PanelSnapshot,
  type PersistedState,
  type StateEventMap,
  type StateSummary,
} from "./types.js";

export interface StateStoreOptions {
  filePath: string;
  events: EventBus<StateEventMap>;
  scheduler: TaskScheduler;
  /** Injected clock. Defaults to the wall clock. */
  now?: () => Date;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function unixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export class StateStore {
  readonly filePath: string;
  private readonly events: EventBus<StateEventMap>;
  private readonly scheduler: TaskScheduler;
  private readonly now: () => Date;
  private state: PersistedState;

  constructor(options: StateStoreOptions) {
    this.filePath = options.filePath;
    this.events = options.events;
    this.scheduler = options.scheduler;
    this.now = options.now ?? (() => new Date());
    this.state = defaultState();
    this.state = this.load();
  }

  // ===== Persistence =====

  /**
   * Read the state file and replace the in-memory state with it.
   * Every failure path ends in defaults; never throws.
   */
  load(): PersistedState {
    let text: string;
    try {
      text = readFileSync(this.filePath, "utf8");
    } catch (err) {
      const classified = classifyError(err);
      if (isMissingFile(classified)) {
        logger.info(
          { evt: "state_file_missing", path: this.filePath },
          "[state] no state file yet, starting from defaults"
        );
      } else if (isPermissionDenied(classified)) {
        logger.error(
          { evt: "state_load_permission_denied", path: this.filePath, ...errorContext(classified) },
          "[state] permission denied reading state file, using defaults"
        );
      } else {
        logger.error(
          { evt: "state_load_failed", path: this.filePath, ...errorContext(classified), err },
          "[state] failed to read state file, using defaults"
        );
      }
      this.state = defaultState();
      return { ...this.state };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      logger.error(
        { evt: "state_decode_failed", path: this.filePath, ...errorContext(classifyError(err)) },
        "[state] state file is not valid JSON, using defaults"
      );
      this.setAsideUnreadable();
      this.state = defaultState();
      return { ...this.state };
    }

    if (!isPlainObject(parsed)) {
      logger.error(
        { evt: "state_decode_failed", path: this.filePath, topLevel: Array.isArray(parsed) ? "array" : typeof parsed },
        "[state] state file is not a JSON object, using defaults"
      );
      this.setAsideUnreadable();
      this.state = defaultState();
      return { ...this.state };
    }

    const { state, rejectedFields, repairedPairs } = fromDocument(parsed);
    if (rejectedFields.length > 0) {
      logger.warn(
        { evt: "state_fields_rejected", path: this.filePath, fields: rejectedFields },
        "[state] ignoring state fields with unexpected types"
      );
    }
    if (repairedPairs.length > 0) {
      logger.warn(
        { evt: "state_pairs_repaired", path: this.filePath, pairs: repairedPairs },
        "[state] cleared half-set mode provenance"
      );
    }

    this.state = state;
    logger.info(
      {
        evt: "state_loaded",
        path: this.filePath,
        currentSongIndex: state.currentSongIndex,
        botStartCount: state.botStartCount,
      },
      "[state] loaded"
    );
    return { ...this.state };
  }

  /**
   * Move an undecodable state file to `<file>.corrupt-<timestamp>` so the
   * next save does not overwrite what was there.
   */
  private setAsideUnreadable(): void {
    const stamp = this.now().toISOString().replace(/[:.]/g, "-");
    const backupPath = `${this.filePath}.corrupt-${stamp}`;
    try {
      renameSync(this.filePath, backupPath);
      logger.warn(
        { evt: "state_file_set_aside", path: this.filePath, backupPath },
        "[state] kept unreadable state file as a backup"
      );
    } catch (err) {
      logger.error(
        { evt: "state_set_aside_failed", path: this.filePath, backupPath, ...errorContext(classifyError(err)) },
        "[state] could not back up unreadable state file"
      );
    }
  }

  /**
   * Stamp lastStateSave and write the whole document.
   * Written to a sibling temp file first and renamed into place, so a crash
   * mid-write leaves the previous document intact.
   */
  save(): boolean {
    this.state.lastStateSave = this.now().toISOString();
    const tempPath = join(dirname(this.filePath), `.${basename(this.filePath)}.${process.pid}.tmp`);

    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(tempPath, JSON.stringify(toDocument(this.state), null, 2), "utf8");
      renameSync(tempPath, this.filePath);
      return true;
    } catch (err) {
      const classified = classifyError(err);
      if (isPermissionDenied(classified)) {
        logger.error(
          { evt: "state_save_permission_denied", path: this.filePath, ...errorContext(classified) },
          "[state] permission denied writing state file"
        );
      } else {
        logger.error(
          { evt: "state_save_failed", path: this.filePath, ...errorContext(classified), err },
          "[state] failed to write state file"
        );
      }
      this.removeTempFile(tempPath);
      return false;
    }
  }

  private removeTempFile(tempPath: string): void {
    try {
      rmSync(tempPath, { force: true });
    } catch (err) {
      logger.debug(
        { evt: "state_temp_cleanup_failed", tempPath, ...errorContext(classifyError(err)) },
        "[state] could not remove temp file"
      );
    }
  }

  // ===== Emission =====

  private emitInBackground<K extends keyof StateEventMap & string>(event: K, data: StateEventMap[K]): void {
    if (!this.scheduler.isRunning()) {
      logger.warn(
        { evt: "state_emit_skipped", event },
        "[state] scheduler not running, skipping events"
      );
      return;
    }
    this.scheduler.spawn(`emit:${event}`, () => this.events.emit(event, data));
  }

  // ===== Song index / name =====

  getCurrentSongIndex(): number {
    return this.state.currentSongIndex;
  }

  setCurrentSongIndex(index: number): void {
    if (typeof index !== "number" || !Number.isInteger(index)) {
      logger.error(
        { evt: "state_invalid_value", field: "currentSongIndex", value: index },
        "[state] song index must be an integer"
      );
      return;
    }

    let next = index;
    if (next < 0) {
      logger.warn(
        { evt: "state_index_clamped", requested: index },
        "[state] negative song index clamped to 0"
      );
      next = 0;
    }

    const oldIndex = this.state.currentSongIndex;
    this.state.currentSongIndex = next;
    this.save();

    this.emitInBackground("index_changed", { oldIndex, newIndex: next });
    this.emitInBackground("state_updated", { type: "index_changed", oldIndex, newIndex: next });
  }

  getCurrentSongName(): string | null {
    return this.state.currentSongName;
  }

  setCurrentSongName(name: string): void {
    if (typeof name !== "string") {
      logger.error(
        { evt: "state_invalid_value", field: "currentSongName", valueType: typeof name },
        "[state] song name must be a string"
      );
      return;
    }

    const oldSong = this.state.currentSongName;
    this.state.currentSongName = name;
    this.state.lastPlayedTime = this.now().toISOString();
    this.save();

    this.emitInBackground("song_changed", { oldSong, newSong: name });
    this.emitInBackground("state_updated", { type: "song_changed", oldSong, newSong: name });
  }

  /**
   * Point the index at the first file whose name starts with the zero-padded
   * surah number (7 → "007"). Pure lookup over `fileList`; no disk access.
   */
  setCurrentSongIndexBySurah(surahId: number, fileList: readonly string[]): void {
    if (fileList.length === 0) {
      logger.warn({ evt: "surah_lookup_no_files", surahId }, "[state] no audio files, resetting index to 0");
      this.setCurrentSongIndex(0);
      return;
    }

    const prefix = String(surahId).padStart(SURAH_PREFIX_WIDTH, "0");
    for (const [index, entry] of fileList.entries()) {
      if (!entry) {
        logger.warn({ evt: "surah_lookup_empty_entry", index }, "[state] skipping empty file entry");
        continue;
      }
      const name = entry.split(/[\\/]/).pop() ?? entry;
      if (name.startsWith(prefix)) {
        logger.info({ evt: "surah_lookup_hit", surahId, index, file: name }, "[state] surah found");
        this.setCurrentSongIndex(index);
        return;
      }
    }

    logger.warn(
      { evt: "surah_lookup_miss", surahId, prefix, fileCount: fileList.length },
      "[state] surah not found, resetting index to 0"
    );
    this.setCurrentSongIndex(0);
  }

  // ===== Counters =====

  incrementSongsPlayed(): void {
    this.state.totalSongsPlayed++;
    this.save();
  }

  incrementBotStartCount(): void {
    this.state.botStartCount++;
    this.save();
    logger.info({ evt: "bot_start_counted", botStartCount: this.state.botStartCount }, "[state] bot start recorded");
  }

  getTotalSongsPlayed(): number {
    return this.state.totalSongsPlayed;
  }

  getBotStartCount(): number {
    return this.state.botStartCount;
  }

  /** null when never set or when the stored timestamp doesn't parse */
  getLastPlayedTime(): Date | null {
    if (!this.state.lastPlayedTime) return null;
    const parsed = new Date(this.state.lastPlayedTime);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }

  // ===== Loop / shuffle provenance =====

  setLoopEnabledBy(userId: string, username: string): void {
    if (!this.validOwner("loop", userId, username)) return;
    this.state.loopEnabledBy = userId;
    this.state.loopEnabledByName = username;
    this.save();
    this.emitInBackground("state_updated", { type: "loop_user_changed", userId, username });
  }

  clearLoopEnabledBy(): void {
    this.state.loopEnabledBy = null;
    this.state.loopEnabledByName = null;
    this.save();
    this.emitInBackground("state_updated", { type: "loop_user_cleared" });
  }

  getLoopEnabledBy(): ModeOwner {
    return { userId: this.state.loopEnabledBy, username: this.state.loopEnabledByName };
  }

  setShuffleEnabledBy(userId: string, username: string): void {
    if (!this.validOwner("shuffle", userId, username)) return;
    this.state.shuffleEnabledBy = userId;
    this.state.shuffleEnabledByName = username;
    this.save();
    this.emitInBackground("state_updated", { type: "shuffle_user_changed", userId, username });
  }

  clearShuffleEnabledBy(): void {
    this.state.shuffleEnabledBy = null;
    this.state.shuffleEnabledByName = null;
    this.save();
    this.emitInBackground("state_updated", { type: "shuffle_user_cleared" });
  }

  getShuffleEnabledBy(): ModeOwner {
    return { userId: this.state.shuffleEnabledBy, username: this.state.shuffleEnabledByName };
  }

  private validOwner(mode: "loop" | "shuffle", userId: unknown, username: unknown): boolean {
    if (typeof userId === "string" && userId.length > 0 && typeof username === "string") {
      return true;
    }
    logger.error(
      { evt: "state_invalid_value", field: `${mode}EnabledBy`, userIdType: typeof userId, usernameType: typeof username },
      `[state] ${mode} owner needs a user id and a username`
    );
    return false;
  }

  // ===== Last change =====

  setLastChange(action: string, userId: string, username: string, details?: string): void {
    if (typeof action !== "string" || typeof userId !== "string" || typeof username !== "string") {
      logger.error(
        { evt: "state_invalid_value", field: "lastChange", actionType: typeof action },
        "[state] last change needs an action, user id and username"
      );
      return;
    }

    const change = details ? `${action} by <@${userId}> to ${details}` : `${action} by <@${userId}>`;
    this.state.lastChange = change;
    this.state.lastChangeTime = unixSeconds(this.now());
    this.save();

    this.emitInBackground("state_updated", {
      type: "last_change_updated",
      change,
      userId,
      username,
      action,
      details: details ?? null,
    });
  }

  getLastChange(): string | null {
    return this.state.lastChange;
  }

  clearLastChange(): void {
    this.state.lastChange = null;
    this.state.lastChangeTime = null;
    this.save();
    this.emitInBackground("state_updated", { type: "last_change_cleared" });
  }

  /** Recent user action still worth showing on the panel */
  shouldShowLastActivity(): boolean {
    if (this.state.lastChangeTime === null) return false;
    return unixSeconds(this.now()) - this.state.lastChangeTime <= LAST_ACTIVITY_WINDOW_S;
  }

  /** Discord short-time markdown, e.g. "<t:1700000000:t>" */
  getLastActivityDiscordTime(): string | null {
    if (this.state.lastChangeTime === null) return null;
    return `<t:${this.state.lastChangeTime}:t>`;
  }

  // ===== Playback position =====

  getPlaybackPosition(): number {
    return this.state.playbackPosition;
  }

  setPlaybackPosition(seconds: number): void {
    if (typeof seconds !== "number" || !Number.isFinite(seconds)) {
      logger.error(
        { evt: "state_invalid_value", field: "playbackPosition", value: String(seconds) },
        "[state] playback position must be a finite number"
      );
      return;
    }
    this.state.playbackPosition = Math.max(0, seconds);
    this.state.lastPositionSave = this.now().toISOString();
    this.save();
  }

  getPlaybackStartTime(): number | null {
    return this.state.playbackStartTime;
  }

  setPlaybackStartTime(unixTime: number): void {
    if (typeof unixTime !== "number" || !Number.isFinite(unixTime)) {
      logger.error(
        { evt: "state_invalid_value", field: "playbackStartTime", value: String(unixTime) },
        "[state] playback start time must be a finite number"
      );
      return;
    }
    this.state.playbackStartTime = unixTime;
    this.save();
  }

  /** Derive the position from the recorded start. No-op without a start time. */
  savePlaybackPosition(currentUnixTime: number): void {
    if (this.state.playbackStartTime === null) return;
    this.setPlaybackPosition(currentUnixTime - this.state.playbackStartTime);
  }

  clearPlaybackPosition(): void {
    this.state.playbackPosition = 0;
    this.state.playbackStartTime = null;
    this.state.lastPositionSave = null;
    this.save();
  }

  // ===== Snapshots =====

  getStateSummary(): StateSummary {
    return {
      currentSongIndex: this.state.currentSongIndex,
      currentSongName: this.state.currentSongName,
      totalSongsPlayed: this.state.totalSongsPlayed,
      botStartCount: this.state.botStartCount,
      lastPlayedTime: this.state.lastPlayedTime,
      lastStateSave: this.state.lastStateSave,
    };
  }

  getPanelSnapshot(): PanelSnapshot {
    return {
      currentSongIndex: this.state.currentSongIndex,
      currentSongName: this.state.currentSongName,
      totalSongsPlayed: this.state.totalSongsPlayed,
      loop: this.getLoopEnabledBy(),
      shuffle: this.getShuffleEnabledBy(),
      lastChange: this.state.lastChange,
      lastActivityTime: this.getLastActivityDiscordTime(),
      showLastActivity: this.shouldShowLastActivity(),
    };
  }

  /** Back to defaults, except the start counter. */
  resetState(): void {
    const botStartCount = this.state.botStartCount;
    this.state = { ...defaultState(), botStartCount };
    this.save();
    logger.info({ evt: "state_reset", botStartCount }, "[state] state reset to defaults");
    this.emitInBackground("state_updated", { type: "state_reset" });
  }
}
