// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Builds one trial: memory, the shared cache set, a victim holding a fresh
 * secret and an attacker that can only see the victim's interface and its
 * own slice of the address space.
 * @module
 */

import { createAddressSpacePort } from "./address-space.ts";
import {
  AttackerController,
  type AttackResult,
} from "./attacker-controller.ts";
import { CompressedCacheSet, type EvictedLine } from "./cache-set.ts";
import { getSimulationConfig } from "./config.ts";
import { LINE_SIZE_BYTES, SUPPORTED_SECRET_LENGTHS } from "./constants.ts";
import { InvalidConfigurationError } from "./errors.ts";
import { createLogger, type Logger, type LogLevel } from "./logger.ts";
import { MainMemory } from "./main-memory.ts";
import {
  cryptoSecretGenerator,
  type SecretGenerator,
} from "./secret-generator.ts";
import { isSupportedSecretLength, VictimBuffer } from "./victim-buffer.ts";

export type TrialOptions = {
  readonly onEvict?: (line: EvictedLine) => void;
  /** Parent logger; each component logs through a child of it. */
  readonly logger?: Logger;
  /** Minimum level for this trial's default logger; ignored with `logger`. */
  readonly verbosity?: LogLevel;
};

export type Trial = {
  readonly memory: MainMemory;
  readonly cache: CompressedCacheSet;
  readonly victim: VictimBuffer;
  readonly attacker: AttackerController;
  /** Flushes the cache, wipes memory and the secret. Idempotent. */
  readonly dispose: () => void;
};

export function initialize(
  secretLength: number,
  generator: SecretGenerator = cryptoSecretGenerator(),
  options: TrialOptions = {},
): Trial {
  if (!isSupportedSecretLength(secretLength)) {
    throw new InvalidConfigurationError(
      `secretLength must be one of ${SUPPORTED_SECRET_LENGTHS.join(", ")}.`,
    );
  }
  const config = getSimulationConfig();
  const logger =
    options.logger ??
    createLogger(
      "trial",
      options.verbosity === undefined ? {} : { minLevel: options.verbosity },
    );

  const memory = new MainMemory();
  const cache = new CompressedCacheSet({
    memory,
    associativity: config.associativity,
    linesPerSuperblock: config.linesPerSuperblock,
    superblockBudgetBytes: config.superblockBudgetBytes,
    dictionaryCapacity: config.dictionaryCapacity,
    logger: logger.child("cache"),
    ...(options.onEvict === undefined ? {} : { onEvict: options.onEvict }),
  });
  const victim = new VictimBuffer(cache, secretLength, generator, {
    baseAddress: config.victimBaseAddress,
    attemptCap: config.secretGenerationAttemptCap,
    logger: logger.child("victim"),
  });
  const port = createAddressSpacePort(
    cache,
    config.attackerBaseAddress,
    config.associativity * LINE_SIZE_BYTES,
  );
  const attacker = new AttackerController(victim, port, {
    associativity: config.associativity,
    linesPerSuperblock: config.linesPerSuperblock,
    superblockBudgetBytes: config.superblockBudgetBytes,
    dictionaryCapacity: config.dictionaryCapacity,
    logger: logger.child("attacker"),
  });

  let disposed = false;
  const dispose = (): void => {
    if (disposed) return;
    disposed = true;
    cache.flush();
    memory.clear();
    victim.dispose();
  };

  logger.debug("Trial initialised", { secretLength });
  return Object.freeze({ memory, cache, victim, attacker, dispose });
}

/** Initializes a trial, runs its attacker once and tears it down. */
export function runTrial(
  secretLength: number,
  generator?: SecretGenerator,
  options: TrialOptions = {},
): AttackResult {
  const trial = initialize(secretLength, generator, options);
  try {
    return trial.attacker.run();
  } finally {
    trial.dispose();
  }
}
