// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Secret byte generation. The victim never reaches for a random source
 * itself; it is handed a {@link SecretGenerator} so that tests can inject a
 * fixed sequence and still exercise the uniqueness/non-zero contract.
 * @module
 */

import { getSimulationConfig } from "./config.ts";
import { SecretGenerationError } from "./errors.ts";
import { secureWipe, validateNumericParameter } from "./utils.ts";

export interface SecretGenerator {
  /** Returns one candidate byte (0..255). Zeros and repeats are filtered by the caller. */
  nextByte(): number;
}

const CRYPTO_BUFFER_BYTES = 64;

/**
 * Draws bytes from `globalThis.crypto.getRandomValues`, refilling a small
 * buffer as it drains. Consumed bytes are wiped from the buffer.
 */
export function cryptoSecretGenerator(): SecretGenerator {
  const crypto = globalThis.crypto;
  if (typeof crypto?.getRandomValues !== "function") {
    throw new SecretGenerationError(
      "A compliant Web Crypto API is not available in this environment.",
    );
  }
  const buffer = new Uint8Array(CRYPTO_BUFFER_BYTES);
  let cursor = buffer.length;
  return {
    nextByte(): number {
      if (cursor >= buffer.length) {
        crypto.getRandomValues(buffer);
        cursor = 0;
      }
      const value = buffer[cursor] ?? 0;
      buffer[cursor] = 0;
      cursor++;
      return value;
    },
  };
}

/**
 * Replays `bytes` in order. Running past the end is a generation failure,
 * which lets tests drive the retry cap deterministically.
 */
export function sequenceSecretGenerator(
  bytes: readonly number[] | Uint8Array,
): SecretGenerator {
  const values = Array.from(bytes);
  let cursor = 0;
  return {
    nextByte(): number {
      const value = values[cursor];
      if (value === undefined) {
        throw new SecretGenerationError("Secret byte sequence exhausted.");
      }
      cursor++;
      return value;
    },
  };
}

/**
 * Draws a secret of `length` pairwise distinct non-zero bytes, rejecting
 * zeros and repeats. More than `attemptCap` draws, or a generator returning
 * something other than a byte, aborts with {@link SecretGenerationError}.
 */
export function generateSecret(
  length: number,
  generator: SecretGenerator,
  attemptCap: number = getSimulationConfig().secretGenerationAttemptCap,
): Uint8Array {
  validateNumericParameter(length, "length", 1, 255);
  validateNumericParameter(
    attemptCap,
    "attemptCap",
    1,
    Number.MAX_SAFE_INTEGER,
  );

  const secret = new Uint8Array(length);
  const used = new Set<number>();
  let filled = 0;
  for (let attempt = 0; attempt < attemptCap && filled < length; attempt++) {
    const value = generator.nextByte();
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
      secureWipe(secret);
      throw new SecretGenerationError(
        "Secret generator returned a value outside 0..255.",
      );
    }
    if (value === 0 || used.has(value)) continue;
    used.add(value);
    secret[filled] = value;
    filled++;
  }
  if (filled < length) {
    secureWipe(secret);
    throw new SecretGenerationError();
  }
  return secret;
}
