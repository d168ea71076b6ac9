/**
 * Quran Stream Bot — tests/lib/envSchema.test.ts
 * WHAT: Tests for environment parsing (defaults, trimming, validation messages).
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { parseEnv } from "../../src/lib/envSchema.js";

describe("parseEnv", () => {
  it("applies defaults around a bare token", () => {
    const result = parseEnv({ DISCORD_TOKEN: "test-token" });

    expect(result).toEqual({
      ok: true,
      env: {
        DISCORD_TOKEN: "test-token",
        NODE_ENV: "development",
        STATE_FILE: "data/bot_state.json",
        AUDIO_DIR: "audio",
        PANEL_UPDATE_TIMEOUT_MS: 30_000,
        SENTRY_TRACES_SAMPLE_RATE: 0.1,
      },
    });
  });

  it("trims values and treats blanks as unset", () => {
    const result = parseEnv({
      DISCORD_TOKEN: "  test-token  ",
      PANEL_UPDATE_TIMEOUT_MS: " 5000 ",
      START_SURAH: "18",
      PANEL_CHANNEL_ID: "   ",
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.env.DISCORD_TOKEN).toBe("test-token");
    expect(result.env.PANEL_UPDATE_TIMEOUT_MS).toBe(5000);
    expect(result.env.START_SURAH).toBe("18");
    expect(result.env.PANEL_CHANNEL_ID).toBeUndefined();
  });

  it("ignores variables the schema does not know", () => {
    const result = parseEnv({ DISCORD_TOKEN: "test-token", HOME: "/root" });
    expect(result.ok && "HOME" in result.env).toBe(false);
  });

  it("requires a token", () => {
    expect(parseEnv({ DISCORD_TOKEN: "" })).toEqual({ ok: false, issues: ["- DISCORD_TOKEN: Required"] });
  });

  it("reports every issue at once", () => {
    const result = parseEnv({
      DISCORD_TOKEN: "test-token",
      START_SURAH: "1234",
      STATE_FILE: "data/state file.json",
      PANEL_CHANNEL_ID: "general",
    });

    expect(result).toEqual({
      ok: false,
      issues: [
        "- STATE_FILE: STATE_FILE contains invalid characters",
        "- START_SURAH: START_SURAH must be 1-3 digits",
        "- PANEL_CHANNEL_ID: PANEL_CHANNEL_ID must be a snowflake",
      ],
    });
  });

  it("rejects a non-positive panel timeout", () => {
    const result = parseEnv({ DISCORD_TOKEN: "test-token", PANEL_UPDATE_TIMEOUT_MS: "0" });
    expect(result.ok).toBe(false);
  });
});
