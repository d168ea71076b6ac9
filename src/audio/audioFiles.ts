/**
 * Quran Stream Bot — src/audio/audioFiles.ts
 * WHAT: Lists the recitation files the stream plays, in playback order.
 * WHY: Files are named by zero-padded surah number (001.mp3 ... 114.mp3), so
 *      a plain name sort is surah order.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { readdirSync } from "node:fs";

import { logger } from "../lib/logger.js";
import { classifyError, errorContext, isMissingFile } from "../lib/errors.js";
import { SURAH_COUNT, SURAH_PREFIX_WIDTH } from "../lib/constants.js";

const AUDIO_EXTENSION = ".mp3";

export function listAudioFiles(dir: string): string[] {
  let entries: string[];
  try {
    entries = readdirSync(dir);
  } catch (err) {
    const classified = classifyError(err);
    if (isMissingFile(classified)) {
      logger.warn({ evt: "audio_dir_missing", dir }, "[audio] audio directory does not exist");
    } else {
      logger.error({ evt: "audio_dir_unreadable", dir, ...errorContext(classified) }, "[audio] cannot read audio directory");
    }
    return [];
  }

  return entries.filter((name) => name.toLowerCase().endsWith(AUDIO_EXTENSION)).sort();
}

/** "007 Al-A'raf.mp3" → 7. null without a 3-digit prefix or outside 1..114. */
export function surahIdFromFileName(name: string): number | null {
  const match = new RegExp(`^(\\d{${SURAH_PREFIX_WIDTH}})`).exec(name);
  if (!match) return null;
  const id = Number(match[1]);
  return id >= 1 && id <= SURAH_COUNT ? id : null;
}

/** First file numbered `surahId`, or null when the library has no such file. */
export function findSurahFile(files: readonly string[], surahId: number): string | null {
  return files.find((name) => surahIdFromFileName(name) === surahId) ?? null;
}
