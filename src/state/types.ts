/**
 * Quran Stream Bot — src/state/types.ts
 * WHAT: Persisted playback state shape, defaults, and state event payloads.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/**
 * In-memory state. The on-disk document uses snake_case keys
 * (see stateDocument.ts); this is the camelCase view the code works with.
 *
 * Provenance pairs (loopEnabledBy + loopEnabledByName, shuffle likewise) are
 * always both null or both set.
 */
export interface PersistedState {
  currentSongIndex: number;
  currentSongName: string | null;
  totalSongsPlayed: number;
  lastPlayedTime: string | null; // ISO
  botStartCount: number;
  lastStateSave: string | null; // ISO
  loopEnabledBy: string | null; // user snowflake
  loopEnabledByName: string | null;
  shuffleEnabledBy: string | null;
  shuffleEnabledByName: string | null;
  lastChange: string | null;
  lastChangeTime: number | null; // unix seconds
  playbackPosition: number; // seconds into the current track
  playbackStartTime: number | null; // unix seconds
  lastPositionSave: string | null; // ISO
}

export function defaultState(): PersistedState {
  return {
    currentSongIndex: 0,
    currentSongName: null,
    totalSongsPlayed: 0,
    lastPlayedTime: null,
    botStartCount: 0,
    lastStateSave: null,
    loopEnabledBy: null,
    loopEnabledByName: null,
    shuffleEnabledBy: null,
    shuffleEnabledByName: null,
    lastChange: null,
    lastChangeTime: null,
    playbackPosition: 0,
    playbackStartTime: null,
    lastPositionSave: null,
  };
}

export interface StateSummary {
  currentSongIndex: number;
  currentSongName: string | null;
  totalSongsPlayed: number;
  botStartCount: number;
  lastPlayedTime: string | null;
  lastStateSave: string | null;
}

/** Who turned a mode on. Both null when the mode is off. */
export interface ModeOwner {
  userId: string | null;
  username: string | null;
}

/** Everything the control panel renders, read in one go. */
export interface PanelSnapshot {
  currentSongIndex: number;
  currentSongName: string | null;
  totalSongsPlayed: number;
  loop: ModeOwner;
  shuffle: ModeOwner;
  lastChange: string | null;
  lastActivityTime: string | null; // <t:unix:t>
  showLastActivity: boolean;
}

// ===== Events =====

export interface IndexChangedPayload {
  oldIndex: number;
  newIndex: number;
}

export interface SongChangedPayload {
  oldSong: string | null;
  newSong: string;
}

export type StateUpdatedPayload =
  | ({ type: "index_changed" } & IndexChangedPayload)
  | ({ type: "song_changed" } & SongChangedPayload)
  | { type: "loop_user_changed"; userId: string; username: string }
  | { type: "loop_user_cleared" }
  | { type: "shuffle_user_changed"; userId: string; username: string }
  | { type: "shuffle_user_cleared" }
  | {
      type: "last_change_updated";
      change: string;
      userId: string;
      username: string;
      action: string;
      details: string | null;
    }
  | { type: "last_change_cleared" }
  | { type: "state_reset" };

export interface StateEventMap {
  song_changed: SongChangedPayload;
  index_changed: IndexChangedPayload;
  state_updated: StateUpdatedPayload;
}

