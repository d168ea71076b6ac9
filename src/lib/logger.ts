/**
 * Quran Stream Bot — src/lib/logger.ts
 * WHAT: Shared pino instance, string scrubbing, and Sentry forwarding for reportable errors.
 * FLOWS:
 *  - logger.error({ err }, msg) → reportableError(err) → lazy sentry.captureException
 *  - redact(name) before logging anything read from disk or Discord
 * DOCS:
 *  - pino: https://getpino.io/#/docs/api
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import pino from "pino";

import { classifyError, shouldReportToSentry } from "./errors.js";

// bot token (24.6.27), credentialed URL, mass mention
const tokenRe = /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g;
const dsnRe = /(https?:\/\/)([^:@]+):[^@]+@/gi;
const mentionRe = /@(everyone|here)/gi;

const MAX_REDACTED_LENGTH = 300;

let sentryImportWarned = false;

/** Single-line, secret-free, at most 300 chars. */
export function redact(value: string): string {
  if (!value) return "";
  let sanitized = value.replace(/\s+/g, " ").trim();
  sanitized = sanitized.replace(tokenRe, "[redacted_token]");
  sanitized = sanitized.replace(dsnRe, "$1$2:[redacted]@");
  sanitized = sanitized.replace(mentionRe, "@redacted");
  if (sanitized.length > MAX_REDACTED_LENGTH) {
    sanitized = `${sanitized.slice(0, MAX_REDACTED_LENGTH)}...`;
  }
  return sanitized;
}

/**
 * discord.js errors hang request bodies and client managers off themselves;
 * only the identifying fields go to the sink.
 */
export function serializeError(e: unknown): Record<string, unknown> {
  if (typeof e !== "object" || e === null) {
    return { message: String(e) };
  }
  return {
    name: Reflect.get(e, "name"),
    code: Reflect.get(e, "code"),
    message: Reflect.get(e, "message"),
    stack: Reflect.get(e, "stack"),
  };
}

/**
 * The Error carried by a log call's first argument (bare or under `err`),
 * or undefined when there is none or it is an operational failure
 * (deleted panel, lost permission, rate limit, timeout).
 */
export function reportableError(firstArg: unknown): Error | undefined {
  const candidate =
    firstArg instanceof Error
      ? firstArg
      : typeof firstArg === "object" && firstArg !== null
        ? Reflect.get(firstArg, "err")
        : undefined;

  if (!(candidate instanceof Error)) return undefined;
  return shouldReportToSentry(classifyError(candidate)) ? candidate : undefined;
}

const logLevel = process.env.LOG_LEVEL ?? "info";
const isVitest = !!process.env.VITEST_WORKER_ID;
const wantPretty = isVitest || (process.env.LOG_PRETTY === "true" && process.stdout.isTTY);

export const logger = pino({
  level: logLevel,
  ...(wantPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
            singleLine: false,
          },
        },
      }
    : process.env.LOG_FILE
      ? {
          transport: {
            target: "pino/file",
            options: { destination: process.env.LOG_FILE, mkdir: true },
          },
        }
      : {}),
  base: undefined,
  serializers: {
    err: serializeError,
  },
  hooks: {
    logMethod(args, method, level) {
      if (!isVitest && level >= pino.levels.values.error) {
        const error = reportableError(args[0]);

        if (error) {
          const message = typeof args[1] === "string" ? args[1] : undefined;
          const label = pino.levels.labels[level] ?? "error";

          // sentry.ts pulls in @sentry/node; keep it off the logger's static graph
          import("./sentry.js")
            .then(({ captureException, isSentryEnabled }) => {
              if (isSentryEnabled()) {
                captureException(error, { message, level: label });
              }
            })
            .catch((importErr: unknown) => {
              if (!sentryImportWarned) {
                sentryImportWarned = true;
                console.warn("[logger] Failed to import Sentry module:", serializeError(importErr).message);
              }
            });
        }
      }

      return method.apply(this, args);
    },
  },
});
