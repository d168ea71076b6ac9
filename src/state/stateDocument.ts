/**
 * Quran Stream Bot — src/state/stateDocument.ts
 * WHAT: On-disk JSON shape of the playback state and the mapping to/from PersistedState.
 * WHY: The file is hand-editable and older versions wrote fewer keys; loading
 *      has to take whatever is there field by field.
 * FLOWS:
 *  - fromDocument(json) → { state, rejectedFields, repairedPairs }  (defaults for missing/invalid keys)
 *  - toDocument(state) → snake_case object for JSON.stringify
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";

import { defaultState, type PersistedState } from "./types.js";

// Each key is optional; a wrong-typed value degrades to undefined (→ default)
// instead of failing the whole document.
const count = z.number().int().nonnegative().optional().catch(undefined);
const nullableString = z.string().nullable().optional().catch(undefined);
const nullableNumber = z.number().nullable().optional().catch(undefined);
// Older files stored user ids as JSON numbers
const userId = z
  .union([z.string(), z.number().int().transform((n) => String(n))])
  .nullable()
  .optional()
  .catch(undefined);

const stateDocumentSchema = z.object({
  current_song_index: count,
  current_song_name: nullableString,
  total_songs_played: count,
  last_played_time: nullableString,
  bot_start_count: count,
  last_state_save: nullableString,
  loop_enabled_by: userId,
  loop_enabled_by_name: nullableString,
  shuffle_enabled_by: userId,
  shuffle_enabled_by_name: nullableString,
  last_change: nullableString,
  last_change_time: nullableNumber,
  playback_position: z.number().nonnegative().optional().catch(undefined),
  playback_start_time: nullableNumber,
  last_position_save: nullableString,
});

type StateDocument = z.infer<typeof stateDocumentSchema>;

export interface DecodedState {
  state: PersistedState;
  /** Keys present in the file whose values were discarded */
  rejectedFields: string[];
  /** Provenance pairs that were half-set on disk and got cleared */
  repairedPairs: string[];
}

export function toDocument(state: PersistedState): Required<StateDocument> {
  return {
    current_song_index: state.currentSongIndex,
    current_song_name: state.currentSongName,
    total_songs_played: state.totalSongsPlayed,
    last_played_time: state.lastPlayedTime,
    bot_start_count: state.botStartCount,
    last_state_save: state.lastStateSave,
    loop_enabled_by: state.loopEnabledBy,
    loop_enabled_by_name: state.loopEnabledByName,
    shuffle_enabled_by: state.shuffleEnabledBy,
    shuffle_enabled_by_name: state.shuffleEnabledByName,
    last_change: state.lastChange,
    last_change_time: state.lastChangeTime,
    playback_position: state.playbackPosition,
    playback_start_time: state.playbackStartTime,
    last_position_save: state.lastPositionSave,
  };
}

/**
 * Merge a parsed JSON object over the defaults. Caller guarantees `raw` is a
 * plain object (arrays and primitives are rejected before this point).
 */
export function fromDocument(raw: Record<string, unknown>): DecodedState {
  const doc = stateDocumentSchema.parse(raw);
  const base = defaultState();

  const rejectedFields = Object.keys(stateDocumentSchema.shape).filter(
    (key) => raw[key] !== undefined && Reflect.get(doc, key) === undefined
  );

  const state: PersistedState = {
    currentSongIndex: doc.current_song_index ?? base.currentSongIndex,
    currentSongName: doc.current_song_name ?? base.currentSongName,
    totalSongsPlayed: doc.total_songs_played ?? base.totalSongsPlayed,
    lastPlayedTime: doc.last_played_time ?? base.lastPlayedTime,
    botStartCount: doc.bot_start_count ?? base.botStartCount,
    lastStateSave: doc.last_state_save ?? base.lastStateSave,
    loopEnabledBy: doc.loop_enabled_by ?? base.loopEnabledBy,
    loopEnabledByName: doc.loop_enabled_by_name ?? base.loopEnabledByName,
    shuffleEnabledBy: doc.shuffle_enabled_by ?? base.shuffleEnabledBy,
    shuffleEnabledByName: doc.shuffle_enabled_by_name ?? base.shuffleEnabledByName,
    lastChange: doc.last_change ?? base.lastChange,
    lastChangeTime: doc.last_change_time ?? base.lastChangeTime,
    playbackPosition: doc.playback_position ?? base.playbackPosition,
    playbackStartTime: doc.playback_start_time ?? base.playbackStartTime,
    lastPositionSave: doc.last_position_save ?? base.lastPositionSave,
  };

  const repairedPairs: string[] = [];
  if ((state.loopEnabledBy === null) !== (state.loopEnabledByName === null)) {
    state.loopEnabledBy = null;
    state.loopEnabledByName = null;
    repairedPairs.push("loop_enabled_by");
  }
  if ((state.shuffleEnabledBy === null) !== (state.shuffleEnabledByName === null)) {
    state.shuffleEnabledBy = null;
    state.shuffleEnabledByName = null;
    repairedPairs.push("shuffle_enabled_by");
  }

  return { state, rejectedFields, repairedPairs };
}
