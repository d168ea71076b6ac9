/**
 * Quran Stream Bot — tests/lib/timeout.test.ts
 * WHAT: Tests for withTimeout.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";
import { TimeoutError, withTimeout } from "../../src/lib/timeout.js";

describe("withTimeout", () => {
  it("resolves with the work's value when it finishes first", async () => {
    await expect(withTimeout(Promise.resolve(7), 1_000, "fast")).resolves.toBe(7);
  });

  it("passes the work's rejection through", async () => {
    await expect(withTimeout(Promise.reject(new Error("nope")), 1_000, "failing")).rejects.toThrow("nope");
  });

  it("rejects with TimeoutError once the budget passes", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => undefined), 500, "slow");
    const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutError);

    await vi.advanceTimersByTimeAsync(500);
    await assertion;
    await expect(pending).rejects.toThrow("slow timed out after 500ms");
  });

  it("clears its timer when the work wins", async () => {
    vi.useFakeTimers();
    await withTimeout(Promise.resolve("done"), 10_000, "fast");
    expect(vi.getTimerCount()).toBe(0);
  });
});
