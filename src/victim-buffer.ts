// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * The victim: a 256-byte buffer spanning exactly one superblock whose last
 * bytes hold a secret. Everything outside the secret is freely readable and
 * writable; the secret itself is only ever compared, never returned.
 * @module
 */

import { lineNumberOf, type CompressedCacheSet } from "./cache-set.ts";
import { compressedBits } from "./codec.ts";
import { getSimulationConfig } from "./config.ts";
import {
  LINE_SIZE_BYTES,
  SUPPORTED_SECRET_LENGTHS,
  VICTIM_BUFFER_SIZE_BYTES,
  type SecretLength,
} from "./constants.ts";
import { assertTestApiAllowed } from "./development-guards.ts";
import {
  IllegalStateError,
  InvalidConfigurationError,
  InvalidParameterError,
} from "./errors.ts";
import { createLogger, type Logger } from "./logger.ts";
import { generateSecret, type SecretGenerator } from "./secret-generator.ts";
import { secureCompareBytes, secureWipe, validateByte } from "./utils.ts";

export type VictimReadResult =
  | { readonly status: "ok"; readonly value: number }
  | { readonly status: "denied" };

export type VictimWriteResult =
  | { readonly status: "ok" }
  | { readonly status: "denied" };

/**
 * Everything the attacker is allowed to do to the victim. Deliberately
 * excludes the cache, the base address and any inspection helpers.
 */
export interface VictimInterface {
  readonly size: number;
  readonly secretLength: SecretLength;
  read(offset: number): VictimReadResult;
  write(offset: number, byte: number): VictimWriteResult;
  verifyGuess(candidate: Uint8Array): boolean;
}

export type VictimBufferOptions = {
  /** Defaults to the configured `victimBaseAddress`. */
  readonly baseAddress?: number;
  readonly attemptCap?: number;
  readonly logger?: Logger;
};

const DENIED = Object.freeze({ status: "denied" } as const);
const WRITE_OK = Object.freeze({ status: "ok" } as const);

type SecretRecord = {
  readonly secret: Uint8Array;
  readonly cache: CompressedCacheSet;
};

// Secrets live outside the instance so nothing reachable from a VictimBuffer
// (own properties, prototype, spread, JSON) can expose them.
const SECRETS = new WeakMap<VictimBuffer, SecretRecord>();

export function isSupportedSecretLength(
  length: number,
): length is SecretLength {
  return SUPPORTED_SECRET_LENGTHS.some((supported) => supported === length);
}

export class VictimBuffer implements VictimInterface {
  readonly size = VICTIM_BUFFER_SIZE_BYTES;
  readonly baseAddress: number;
  readonly secretLength: SecretLength;
  readonly secretOffset: number;

  readonly #cache: CompressedCacheSet;
  readonly #logger: Logger;
  #guessCount = 0;
  #disposed = false;

  constructor(
    cache: CompressedCacheSet,
    secretLength: number,
    generator: SecretGenerator,
    options: VictimBufferOptions = {},
  ) {
    if (!isSupportedSecretLength(secretLength)) {
      throw new InvalidConfigurationError(
        `secretLength must be one of ${SUPPORTED_SECRET_LENGTHS.join(", ")}.`,
      );
    }
    const baseAddress =
      options.baseAddress ?? getSimulationConfig().victimBaseAddress;
    const superblockBytes = cache.linesPerSuperblock * LINE_SIZE_BYTES;
    if (
      !Number.isSafeInteger(baseAddress) ||
      baseAddress < 0 ||
      baseAddress % superblockBytes !== 0 ||
      superblockBytes !== VICTIM_BUFFER_SIZE_BYTES
    ) {
      throw new InvalidParameterError(
        "The victim buffer must occupy exactly one aligned superblock.",
      );
    }

    this.baseAddress = baseAddress;
    this.secretLength = secretLength;
    this.secretOffset = VICTIM_BUFFER_SIZE_BYTES - secretLength;
    this.#cache = cache;
    this.#logger = options.logger ?? createLogger("victim");

    const secret = generateSecret(secretLength, generator, options.attemptCap);
    SECRETS.set(this, { secret, cache });
    secret.forEach((byte, index) => {
      cache.write(baseAddress + this.secretOffset + index, byte);
    });
    this.#logger.debug("Victim buffer initialised", {
      secretLength,
      secretOffset: this.secretOffset,
    });
  }

  get guessCount(): number {
    return this.#guessCount;
  }

  get disposed(): boolean {
    return this.#disposed;
  }

  #isReadable(offset: number): boolean {
    return (
      Number.isInteger(offset) &&
      offset >= 0 &&
      offset < this.secretOffset
    );
  }

  #assertLive(): void {
    if (this.#disposed) {
      throw new IllegalStateError("Victim buffer has been disposed.");
    }
  }

  /**
   * Reads one byte. Offsets inside the secret, or outside the buffer, are
   * denied without touching the cache.
   */
  read(offset: number): VictimReadResult {
    this.#assertLive();
    if (!this.#isReadable(offset)) {
      this.#logger.debug("Denied read", { offset });
      return DENIED;
    }
    const { value } = this.#cache.read(this.baseAddress + offset);
    return { status: "ok", value };
  }

  write(offset: number, byte: number): VictimWriteResult {
    this.#assertLive();
    validateByte(byte);
    if (!this.#isReadable(offset)) {
      this.#logger.debug("Denied write", { offset });
      return DENIED;
    }
    this.#cache.write(this.baseAddress + offset, byte);
    return WRITE_OK;
  }

  /**
   * Constant-time comparison against the secret. Every call is counted; the
   * buffer has no lockout, so callers are expected to guess only once they
   * have derived a candidate.
   */
  verifyGuess(candidate: Uint8Array): boolean {
    this.#assertLive();
    if (!(candidate instanceof Uint8Array)) {
      throw new InvalidParameterError("A guess must be a Uint8Array.");
    }
    this.#guessCount++;
    const record = SECRETS.get(this);
    if (record === undefined) {
      throw new IllegalStateError("Victim secret is missing.");
    }
    return secureCompareBytes(candidate, record.secret);
  }

  /** Wipes the secret. Any later access throws {@link IllegalStateError}. */
  dispose(): void {
    if (this.#disposed) return;
    secureWipe(SECRETS.get(this)?.secret);
    SECRETS.delete(this);
    this.#disposed = true;
  }

  /** Line numbers the buffer spans, first to last. */
  lineNumbers(): readonly number[] {
    const first = lineNumberOf(this.baseAddress);
    return Array.from(
      { length: VICTIM_BUFFER_SIZE_BYTES / LINE_SIZE_BYTES },
      (_, index) => first + index,
    );
  }
}

export type VictimInspection = {
  readonly secret: Uint8Array;
  /** Current contents of the line holding the secret. */
  readonly secretLine: Uint8Array;
  /** Compressed size of that line, in bits, against an empty dictionary. */
  readonly secretLineBits: number;
};

/**
 * Debug view of a victim's secret and the compressibility of its line.
 * Test and harness use only: guarded against production and re-exported
 * solely from the test-internals entry point.
 */
export function _inspectVictimForTests(
  victim: VictimBuffer,
): VictimInspection {
  assertTestApiAllowed();
  const record = SECRETS.get(victim);
  if (record === undefined) {
    throw new IllegalStateError("Victim secret is missing or disposed.");
  }
  const secretLine = record.cache.peekLine(
    lineNumberOf(victim.baseAddress + victim.secretOffset),
  );
  return {
    secret: record.secret.slice(),
    secretLine,
    secretLineBits: compressedBits(
      secretLine,
      record.cache.dictionaryCapacity,
    ),
  };
}
