// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Compressed-cache side-channel simulation: a dictionary word codec, a
 * superblock-budgeted cache set, a victim holding a secret and an attacker
 * that recovers it from hit/miss outcomes alone.
 * @module compressed-cache-attack-sim
 * @version 0.1.0
 */

// --- Re-export all public APIs ---

// Errors
export * from "./errors.ts";

// Configuration
export {
  getSimulationConfig,
  setSimulationConfig,
  getLoggingConfig,
  setLoggingConfig,
  sealConfig,
  freezeConfig,
  isConfigSealed,
} from "./config.ts";
export type { SimulationConfig, LoggingConfig } from "./config.ts";

// Environment
export { environment, isDevelopment } from "./environment.ts";

// Constants
export {
  LINE_SIZE_BYTES,
  WORDS_PER_LINE,
  MAX_COMPRESSED_LINE_BYTES,
  VICTIM_BUFFER_SIZE_BYTES,
  SUPPORTED_SECRET_LENGTHS,
} from "./constants.ts";
export type { SecretLength } from "./constants.ts";

// Codec
export * from "./codec.ts";

// Memory and cache
export { MainMemory } from "./main-memory.ts";
export * from "./cache-set.ts";
export * from "./address-space.ts";

// Victim (the inspection helper lives in test-internals only)
export {
  VictimBuffer,
  isSupportedSecretLength,
} from "./victim-buffer.ts";
export type {
  VictimInterface,
  VictimReadResult,
  VictimWriteResult,
  VictimBufferOptions,
} from "./victim-buffer.ts";
export * from "./secret-generator.ts";

// Attacker
export * from "./attacker-controller.ts";
export { SecretKnowledge } from "./secret-knowledge.ts";

// Trial wiring
export * from "./trial.ts";

// General Utilities
export { secureWipe, secureCompareBytes, secureDevLog } from "./utils.ts";

// Logger (optional ergonomic wrapper)
export { createLogger } from "./logger.ts";
export type { Logger, LoggerOptions, LogLevel } from "./logger.ts";
