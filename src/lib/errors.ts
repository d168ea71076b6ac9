/**
 * Quran Stream Bot — src/lib/errors.ts
 * WHAT: Discriminated union error types for precise error handling
 * WHY: Panel refresh and state persistence each react differently to
 *      not-found, forbidden, rate-limit, filesystem and timeout failures.
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - isNotFound / isForbidden / isHttpFailure → panel refresh outcomes
 *  - isPermissionDenied / isMissingFile → state load/save logging
 *  - errorContext(err) → flat fields for pino
 * USAGE:
 *  import { classifyError, errorContext } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (classified.kind === "discord_api" && classified.code === 10008) { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { TimeoutError } from "./timeout.js";

// ===== Error Type Definitions =====

/**
 * Base error interface for the discriminated union pattern.
 *
 * The `kind` field is the discriminator - TypeScript uses it to narrow types
 * in switch statements.
 */
export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/**
 * Discord API errors (DiscordAPIError from @discordjs/rest).
 *
 * Discord uses numeric codes alongside the HTTP status:
 * - 10003: Unknown Channel
 * - 10008: Unknown Message (panel message deleted)
 * - 10015: Unknown Webhook
 * - 50001: Missing Access
 * - 50013: Missing Permissions
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number | string;
  httpStatus?: number;
  method?: string;
  path?: string;
}

/** discord.js RateLimitError, only surfaced when rejectOnRateLimit is configured */
export interface RateLimitedError extends AppError {
  kind: "rate_limit";
  route?: string;
  retryAfterMs?: number;
  global?: boolean;
}

/** Non-API HTTP failure (HTTPError from @discordjs/rest, e.g. a 502 from Cloudflare) */
export interface HttpError extends AppError {
  kind: "http";
  httpStatus?: number;
  method?: string;
  path?: string;
}

/** Node.js socket-level errors. Transient. */
export interface NetworkError extends AppError {
  kind: "network";
  code: string; // ECONNRESET, ETIMEDOUT, ENOTFOUND, ECONNREFUSED
  host?: string;
}

/** Filesystem errors from node:fs (state file reads and writes) */
export interface FsError extends AppError {
  kind: "fs";
  code: string; // ENOENT, EACCES, EPERM, EISDIR, ENOTDIR, ENOSPC, ...
  path?: string;
  syscall?: string;
}

/** JSON.parse failures */
export interface ParseError extends AppError {
  kind: "parse";
}

/** An awaited operation exceeded its budget (see withTimeout) */
export interface TimeoutFailure extends AppError {
  kind: "timeout";
  timeoutMs: number;
  label: string;
}

/** Unknown/unclassified errors */
export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | DiscordApiError
  | RateLimitedError
  | HttpError
  | NetworkError
  | FsError
  | ParseError
  | TimeoutFailure
  | UnknownError;

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

/** Discord codes meaning the panel's message or channel no longer exists */
export const NOT_FOUND_CODES: readonly number[] = [10003, 10008, 10015];

/** Discord codes meaning the bot lost the right to touch the panel */
export const FORBIDDEN_CODES: readonly number[] = [50001, 50013];

// ===== Error Classification =====

function field(source: object, key: string): unknown {
  return Reflect.get(source, key);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

/**
 * Classify any caught error into a discriminated union.
 *
 * Ordered from most specific to least: our own timeouts, Discord REST errors
 * (by name), JSON parse errors, socket errors, filesystem errors, then unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (err === null || err === undefined) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  if (err instanceof TimeoutError) {
    return {
      kind: "timeout",
      message: err.message,
      timeoutMs: err.timeoutMs,
      label: err.label,
      cause: err,
    };
  }

  if (typeof err !== "object") {
    return { kind: "unknown", message: String(err) };
  }

  const message = optionalString(field(err, "message")) ?? String(err);
  const code = field(err, "code");
  const name = optionalString(field(err, "name")) ?? "";
  const cause = err instanceof Error ? err : undefined;

  // DiscordAPIError's name is "DiscordAPIError[10008]" in discord.js v14
  if (name.startsWith("DiscordAPIError") && (typeof code === "number" || typeof code === "string")) {
    return {
      kind: "discord_api",
      code,
      httpStatus: optionalNumber(field(err, "status")) ?? optionalNumber(field(err, "httpStatus")),
      method: optionalString(field(err, "method")),
      path: optionalString(field(err, "url")) ?? optionalString(field(err, "path")),
      message,
      cause,
    };
  }

  if (name === "RateLimitError") {
    const globalFlag = field(err, "global");
    return {
      kind: "rate_limit",
      route: optionalString(field(err, "route")),
      retryAfterMs: optionalNumber(field(err, "retryAfter")) ?? optionalNumber(field(err, "timeToReset")),
      global: typeof globalFlag === "boolean" ? globalFlag : undefined,
      message,
      cause,
    };
  }

  if (name === "HTTPError") {
    return {
      kind: "http",
      httpStatus: optionalNumber(field(err, "status")),
      method: optionalString(field(err, "method")),
      path: optionalString(field(err, "url")),
      message,
      cause,
    };
  }

  if (err instanceof SyntaxError) {
    return { kind: "parse", message, cause };
  }

  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    return {
      kind: "network",
      code,
      host: optionalString(field(err, "hostname")) ?? optionalString(field(err, "host")),
      message,
      cause,
    };
  }

  // Node system errors from fs carry a syscall alongside the E-code
  if (typeof code === "string" && code.startsWith("E")) {
    return {
      kind: "fs",
      code,
      path: optionalString(field(err, "path")),
      syscall: optionalString(field(err, "syscall")),
      message,
      cause,
    };
  }

  return { kind: "unknown", message, cause };
}

// ===== Error Predicates =====

/** Panel message/channel is gone. */
export function isNotFound(err: ClassifiedError): boolean {
  if (err.kind !== "discord_api") return false;
  return err.httpStatus === 404 || (typeof err.code === "number" && NOT_FOUND_CODES.includes(err.code));
}

/** Bot lost permissions on the panel channel. */
export function isForbidden(err: ClassifiedError): boolean {
  if (err.kind !== "discord_api") return false;
  return err.httpStatus === 403 || (typeof err.code === "number" && FORBIDDEN_CODES.includes(err.code));
}

/** Any other transport-level failure talking to Discord. */
export function isHttpFailure(err: ClassifiedError): boolean {
  return err.kind === "discord_api" || err.kind === "rate_limit" || err.kind === "http";
}

export function isPermissionDenied(err: ClassifiedError): boolean {
  return err.kind === "fs" && (err.code === "EACCES" || err.code === "EPERM");
}

export function isMissingFile(err: ClassifiedError): boolean {
  return err.kind === "fs" && err.code === "ENOENT";
}

/**
 * Check if error should be reported to Sentry.
 *
 * Deleted panels, revoked permissions, rate limits and socket blips are
 * operational, not bugs.
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api":
      return !isNotFound(err) && !isForbidden(err);
    case "rate_limit":
    case "network":
    case "timeout":
      return false;
    default:
      return true;
  }
}

// ===== Error Context Helpers =====

/**
 * Extract structured context from a classified error for logging
 */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "discord_api":
      return {
        ...base,
        discordCode: err.code,
        httpStatus: err.httpStatus,
        method: err.method,
        path: err.path,
      };

    case "rate_limit":
      return { ...base, route: err.route, retryAfterMs: err.retryAfterMs, global: err.global };

    case "http":
      return { ...base, httpStatus: err.httpStatus, method: err.method, path: err.path };

    case "network":
      return { ...base, networkCode: err.code, host: err.host };

    case "fs":
      return { ...base, fsCode: err.code, path: err.path, syscall: err.syscall };

    case "timeout":
      return { ...base, timeoutMs: err.timeoutMs, label: err.label };

    default:
      return base;
  }
}
