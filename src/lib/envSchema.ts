/**
 * Quran Stream Bot — src/lib/envSchema.ts
 * WHAT: zod schema for the process environment, separate from loading.
 * WHY: env.ts exits the process on bad config at import time; tests need the
 *      schema without that side effect.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";

import { DEFAULT_PANEL_UPDATE_TIMEOUT_MS } from "./constants.js";

// Paths end up in fs calls; keep them to boring characters
const SAFE_PATH_REGEX = /^[a-zA-Z0-9_\-/.]+$/;

export const envSchema = z.object({
  // Core Discord credentials - bot won't start without these
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Persistent playback state document
  STATE_FILE: z
    .string()
    .default("data/bot_state.json")
    .refine((val) => SAFE_PATH_REGEX.test(val), {
      message: "STATE_FILE contains invalid characters",
    }),

  // Directory holding the recitation files (001.mp3 ... 114.mp3)
  AUDIO_DIR: z
    .string()
    .default("audio")
    .refine((val) => SAFE_PATH_REGEX.test(val), {
      message: "AUDIO_DIR contains invalid characters",
    }),

  // Optional surah to jump to on startup ("1", "18", "114")
  START_SURAH: z
    .string()
    .regex(/^\d{1,3}$/, "START_SURAH must be 1-3 digits")
    .optional(),

  // Channel the control panel is posted to; no panel when unset
  PANEL_CHANNEL_ID: z.string().regex(/^\d+$/, "PANEL_CHANNEL_ID must be a snowflake").optional(),
  PANEL_UPDATE_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_PANEL_UPDATE_TIMEOUT_MS),

  LOG_LEVEL: z.string().optional(),

  // Sentry error tracking - disabled if DSN not provided
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
});

export type Env = z.infer<typeof envSchema>;

export type EnvParseResult =
  | { ok: true; env: Env }
  | { ok: false; issues: string[] };

/**
 * Trim every value (stray whitespace from .env copy-paste is common), drop
 * empty strings so defaults apply, then validate in one pass. safeParse
 * reports all issues at once.
 */
export function parseEnv(source: Record<string, string | undefined>): EnvParseResult {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = source[key]?.trim();
    if (value) raw[key] = value;
  }

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`),
    };
  }
  return { ok: true, env: parsed.data };
}
