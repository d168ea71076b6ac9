/**
 * Quran Stream Bot — src/lib/sentry.ts
 * WHAT: Sentry bootstrap and small helpers for capture on shutdown paths.
 * FLOWS: initializeSentry(options) → isSentryEnabled → captureException → flushSentry on shutdown
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import fs from "node:fs";
import path from "node:path";
import { logger } from "./logger.js";

let sentryEnabled = false;

export interface SentryOptions {
  dsn?: string;
  environment: string;
  tracesSampleRate: number;
}

function hasValidDsn(dsn: string | undefined): dsn is string {
  // Sentry DSN format: https://{key}@{org}.ingest.sentry.io/{project}
  if (!dsn) return false;
  try {
    const parsed = new URL(dsn);
    return (
      (parsed.protocol === "https:" || parsed.protocol === "http:") &&
      parsed.username.length > 0 &&
      parsed.pathname.length > 1
    );
  } catch {
    return false;
  }
}

// Release tag comes from package.json in the working directory
function getVersion(): string {
  try {
    const packagePath = path.join(process.cwd(), "package.json");
    const packageJson: unknown = JSON.parse(fs.readFileSync(packagePath, "utf-8"));
    if (packageJson && typeof packageJson === "object" && "version" in packageJson) {
      return typeof packageJson.version === "string" ? packageJson.version : "unknown";
    }
    return "unknown";
  } catch {
    return "unknown";
  }
}

/**
 * Initialize Sentry error tracking.
 * Only activates with a structurally valid DSN and never under Vitest.
 */
export function initializeSentry(options: SentryOptions): void {
  if (process.env.VITEST_WORKER_ID) {
    return;
  }

  if (!hasValidDsn(options.dsn)) {
    logger.info("Sentry DSN missing or invalid, error tracking disabled");
    return;
  }

  try {
    Sentry.init({
      dsn: options.dsn,
      environment: options.environment,
      release: `quran-stream-bot@${getVersion()}`,
      tracesSampleRate: options.tracesSampleRate,

      beforeSend(event) {
        // Discord bot token regex: {bot_id}.{timestamp}.{hmac}
        if (event.message) {
          event.message = event.message.replace(
            /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g,
            "[REDACTED_TOKEN]"
          );
        }
        return event;
      },

      // Discord API errors are logged with more context locally
      ignoreErrors: ["DiscordAPIError", "AbortError", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND"],
    });

    sentryEnabled = true;
    logger.info({ environment: options.environment }, "Sentry initialized");
  } catch (err) {
    logger.error({ err }, "Failed to initialize Sentry");
    sentryEnabled = false;
  }
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

/**
 * Capture an exception in Sentry. Returns the event id, or null when disabled.
 */
export function captureException(error: unknown, context?: Record<string, unknown>): string | null {
  if (!sentryEnabled) return null;

  return Sentry.captureException(error, {
    contexts: context ? { custom: context } : undefined,
  });
}

/**
 * Flush any pending events (use before shutdown)
 */
export async function flushSentry(timeout = 2000): Promise<boolean> {
  if (!sentryEnabled) return true;

  try {
    return await Sentry.close(timeout);
  } catch (err) {
    logger.error({ err }, "Failed to flush Sentry events");
    return false;
  }
}
