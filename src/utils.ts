// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Shared helpers: parameter validation, constant-time byte comparison, buffer
 * wiping and the sanitizing dev log sink every logger forwards to.
 * @module
 */

import { getLoggingConfig } from "./config.ts";
import { MAX_LOG_MESSAGE_LENGTH } from "./constants.ts";
import { environment } from "./environment.ts";
import { InvalidParameterError } from "./errors.ts";
import type { LogLevel } from "./logger.ts";

/**
 * Validates that a value is an integer within a specified range.
 * @param value The numeric value to validate.
 * @param parameterName The name of the parameter being validated.
 * @param min The minimum allowed integer value.
 * @param max The maximum allowed integer value.
 * @throws {InvalidParameterError} If validation fails.
 */
export function validateNumericParameter(
  value: number,
  parameterName: string,
  min: number,
  max: number,
): void {
  if (
    typeof value !== "number" ||
    !Number.isInteger(value) ||
    value < min ||
    value > max
  ) {
    throw new InvalidParameterError(
      `${parameterName} must be an integer between ${String(min)} and ${String(max)}.`,
    );
  }
}

/** Validates a single byte value (0..255). */
export function validateByte(value: number, parameterName = "byte"): void {
  validateNumericParameter(value, parameterName, 0, 0xff);
}

/**
 * Performs a constant-time comparison of two byte arrays. Runs in time
 * proportional to the longer input regardless of where they differ.
 */
export function secureCompareBytes(a: Uint8Array, b: Uint8Array): boolean {
  // eslint-disable-next-line functional/no-let -- accumulator for constant-time compare
  let diff = a.length ^ b.length;
  const length = Math.max(a.length, b.length);
  // eslint-disable-next-line functional/no-let -- loop counter for array comparison
  for (let index = 0; index < length; index++) {
    const ca = index < a.length ? (a[index] ?? 0) : 0;
    const cb = index < b.length ? (b[index] ?? 0) : 0;
    diff |= ca ^ cb;
  }
  return diff === 0;
}

/**
 * Overwrites a byte buffer with zeros and reports whether every byte reads
 * back as zero afterwards.
 */
export function secureWipe(typedArray: Uint8Array | undefined): boolean {
  if (!typedArray) return true;
  if (typedArray.byteLength === 0) return true;
  typedArray.fill(0);
  return typedArray.every((byte) => byte === 0);
}

// Context keys that could carry secret material or raw line contents.
const SENSITIVE_KEY_REGEX =
  /^(?:secret|guess|candidates?|data|line|lineBytes|words?|value|recovered)$/iu;
const REDACTED_VALUE = "[REDACTED]";
const MAX_REDACT_DEPTH = 4;

/**
 * Replaces values under sensitive keys and any byte buffer with a marker.
 * Numbers, booleans and short strings under other keys pass through.
 */
export function _redact(data: unknown, depth = 0): unknown {
  if (data === null || data === undefined) return data;
  if (ArrayBuffer.isView(data)) return REDACTED_VALUE;
  if (typeof data === "string") {
    return data.length > MAX_LOG_MESSAGE_LENGTH
      ? `${data.slice(0, MAX_LOG_MESSAGE_LENGTH)}...[TRUNC]`
      : data;
  }
  if (typeof data !== "object") return data;
  if (depth >= MAX_REDACT_DEPTH) return "[Depth limit]";
  if (Array.isArray(data)) {
    return data.map((item: unknown) => _redact(item, depth + 1));
  }
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = SENSITIVE_KEY_REGEX.test(key)
      ? REDACTED_VALUE
      : _redact(value, depth + 1);
  }
  return out;
}

/**
 * Strips control characters and bounds the length of a log message.
 */
export function sanitizeLogMessage(message: unknown): string {
  const text =
    typeof message === "string"
      ? message
      : message instanceof Error
        ? `${message.name}: ${message.message}`
        : String(message);
  // eslint-disable-next-line no-control-regex -- stripping control characters is the point
  const stripped = text.replace(/[\u0000-\u001f\u007f]/gu, " ");
  return stripped.length > MAX_LOG_MESSAGE_LENGTH
    ? `${stripped.slice(0, MAX_LOG_MESSAGE_LENGTH)}...[TRUNC]`
    : stripped;
}

const SAFE_COMPONENT_REGEX = /^[\w.:-]{1,64}$/u;

export function sanitizeComponentName(name: string): string {
  return SAFE_COMPONENT_REGEX.test(name) ? name : "unsafe-component-name";
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevelEnabled(
  level: LogLevel,
  minLevel: LogLevel = getLoggingConfig().minLevel,
): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[minLevel];
}

export function _developmentConsole(
  level: LogLevel,
  message: string,
  safeContext: unknown,
): void {
  if (environment.isProduction) return;
  const contextString = ((): string => {
    if (safeContext === undefined) return "";
    try {
      return JSON.stringify(safeContext);
    } catch {
      return String(safeContext);
    }
  })();
  const out = contextString
    ? `${message} | context=${contextString}`
    : message;
  switch (level) {
    case "debug":
      console.debug(out);
      break;
    case "info":
      console.info(out);
      break;
    case "warn":
      console.warn(out);
      break;
    case "error":
      console.error(out);
      break;
  }
}

/**
 * Dev-only log sink. Every logger funnels through here so that message
 * sanitizing and context redaction happen in exactly one place.
 */
export function secureDevLog(
  level: LogLevel,
  component: string,
  message: string,
  context?: unknown,
  options: { readonly minLevel?: LogLevel } = {},
): void {
  if (environment.isProduction) return;
  if (!isLogLevelEnabled(level, options.minLevel)) return;

  const safeComponent = sanitizeComponentName(component);
  const safeMessage = sanitizeLogMessage(message);
  const safeContext = getLoggingConfig().redactContext
    ? _redact(context)
    : context;

  _developmentConsole(
    level,
    `[${level.toUpperCase()}] (${safeComponent}) ${safeMessage}`,
    safeContext,
  );
}
