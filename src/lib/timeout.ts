/**
 * Quran Stream Bot — src/lib/timeout.ts
 * WHAT: Promise.race based timeout guard with a typed error.
 * USAGE:
 *  await withTimeout(panel.updatePanelStatus(), 30_000, "panel_update");
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export class TimeoutError extends Error {
  constructor(
    readonly label: string,
    readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Resolve with `work`, or reject with TimeoutError once `timeoutMs` passes.
 *
 * The underlying promise is not cancelled; whatever it does after the
 * deadline is ignored. The timer is cleared on either outcome so a fast
 * result doesn't leave a pending handle behind.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([work, deadline]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
