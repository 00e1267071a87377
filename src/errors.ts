// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

import {
  MAX_ERROR_MESSAGE_LENGTH,
  MAX_TOTAL_STACK_LENGTH,
} from "./constants.ts";

/**
 * Custom error classes for machine-readable error handling.
 *
 * A denied victim access is deliberately absent: it is an ordinary return
 * value of {@link VictimBuffer.read} / {@link VictimBuffer.write}, not a fault.
 * @module
 */

export class InvalidParameterError extends RangeError {
  public readonly code = "ERR_INVALID_PARAMETER";

  constructor(message: string) {
    super(`[cache-sim] ${message}`);
    this.name = "InvalidParameterError";
  }
}

export class InvalidConfigurationError extends Error {
  public readonly code = "ERR_INVALID_CONFIGURATION";

  constructor(message: string) {
    super(`[cache-sim] ${message}`);
    this.name = "InvalidConfigurationError";
  }
}

export class SecretGenerationError extends Error {
  public readonly code = "ERR_SECRET_GENERATION";

  constructor(
    message = "Secret generator could not produce unique non-zero bytes within the retry cap.",
  ) {
    super(`[cache-sim] ${message}`);
    this.name = "SecretGenerationError";
  }
}

/**
 * Raised when an access leaves a superblock over its budget or a line in two
 * ways. Always a defect in the cache set or codec; the trial must abort.
 */
export class CapacityInvariantViolationError extends Error {
  public readonly code = "ERR_CAPACITY_INVARIANT";

  constructor(message: string) {
    super(`[cache-sim] ${message}`);
    this.name = "CapacityInvariantViolationError";
  }
}

export class IllegalStateError extends Error {
  public readonly code = "ERR_ILLEGAL_STATE";

  constructor(message: string) {
    super(`[cache-sim] ${message}`);
    this.name = "IllegalStateError";
  }
}

/**
 * Sanitizes error objects for logging by truncating messages and extracting
 * only name, code and a stack fingerprint.
 */
export function sanitizeErrorForLogs(error: unknown): {
  readonly name?: string;
  readonly code?: string;
  readonly message?: string;
  readonly stackHash?: string;
} {
  if (error instanceof Error) {
    const code: unknown = "code" in error ? error.code : undefined;
    const stackHash = getStackFingerprint(error.stack);
    return {
      name: error.name,
      message: error.message.slice(0, MAX_ERROR_MESSAGE_LENGTH),
      ...(typeof code === "string" ? { code } : {}),
      ...(stackHash ? { stackHash } : {}),
    };
  }
  return { message: String(error).slice(0, MAX_ERROR_MESSAGE_LENGTH) };
}

// FNV-1a 32-bit; only needs to be stable, not collision resistant.
function fnv1a32(input: string): number {
  const initial = 0x811c9dc5 >>> 0;
  const hash = Array.from(input).reduce((accumulator, ch) => {
    const xored = (accumulator ^ ch.charCodeAt(0)) >>> 0;
    return Math.imul(xored, 0x01000193) >>> 0;
  }, initial);
  return hash >>> 0;
}

/**
 * Fingerprints a stack trace with line and column numbers stripped, so the
 * same throw site hashes the same across builds.
 */
export function getStackFingerprint(stack?: string): string | undefined {
  if (!stack) return undefined;
  const bounded =
    stack.length > MAX_TOTAL_STACK_LENGTH
      ? stack.slice(0, MAX_TOTAL_STACK_LENGTH)
      : stack;
  const normalized = bounded
    .split("\n")
    .map((line) => line.replace(/:\d{1,6}:\d{1,6}\)?$/u, "").trim())
    .join("\n");
  return fnv1a32(normalized).toString(16).padStart(8, "0");
}
