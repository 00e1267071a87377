// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Runtime configuration for the simulated cache geometry, the victim/attacker
 * layout and dev logging. Values are validated on every set and can be sealed
 * once a harness has finished configuring.
 * @module
 */

import {
  LINE_SIZE_BYTES,
  MAX_COMPRESSED_LINE_BYTES,
  MAX_DICTIONARY_CAPACITY,
  VICTIM_BUFFER_SIZE_BYTES,
} from "./constants.ts";
import { assertTestApiAllowed } from "./development-guards.ts";
import { environment } from "./environment.ts";
import {
  InvalidConfigurationError,
  InvalidParameterError,
} from "./errors.ts";
import type { LogLevel } from "./logger.ts";

export type SimulationConfig = {
  /** Ways in the simulated set. */
  readonly associativity: number;
  /** Naturally aligned lines that share one compressed-size budget. */
  readonly linesPerSuperblock: number;
  /** Budget of one superblock, in compressed bytes. */
  readonly superblockBudgetBytes: number;
  /** Entries in each resident line's FIFO word dictionary. */
  readonly dictionaryCapacity: number;
  /** Upper bound on generator draws while building one secret. */
  readonly secretGenerationAttemptCap: number;
  /** Byte address of the victim buffer; must start a superblock. */
  readonly victimBaseAddress: number;
  /** Byte address of the attacker's lines; must start a superblock. */
  readonly attackerBaseAddress: number;
};

const DEFAULT_SIMULATION_CONFIG: SimulationConfig = Object.freeze({
  associativity: 8,
  linesPerSuperblock: 4,
  superblockBudgetBytes: 256,
  dictionaryCapacity: 16,
  secretGenerationAttemptCap: 4096,
  victimBaseAddress: 0x1_0000,
  attackerBaseAddress: 0x2_0000,
});

/**
 * Logging configuration controls dev-only logging verbosity. Production
 * builds never log regardless of these settings.
 */
export type LoggingConfig = {
  /** Messages below this level are dropped. Defaults to "warn". */
  readonly minLevel: LogLevel;
  /**
   * When true, context objects are passed through the redactor; turning
   * this off is only allowed outside production.
   */
  readonly redactContext: boolean;
};

const DEFAULT_LOGGING_CONFIG: LoggingConfig = Object.freeze({
  minLevel: "warn",
  redactContext: true,
});

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/* eslint-disable functional/no-let -- controlled mutable configuration allowed here */
let _simulationConfig: SimulationConfig = DEFAULT_SIMULATION_CONFIG;
let _loggingConfig: LoggingConfig = DEFAULT_LOGGING_CONFIG;
let _sealed = false;
/* eslint-enable functional/no-let */

function assertNotSealed(): void {
  if (_sealed) {
    throw new InvalidConfigurationError(
      "Configuration is sealed and cannot be changed.",
    );
  }
}

/**
 * Reads an own data property from a partial configuration object, rejecting
 * accessors so a getter cannot return different values across reads.
 */
function readDataProperty<T extends object>(
  cfg: Partial<T>,
  property: keyof T & string,
):
  | { readonly present: true; readonly value: unknown }
  | { readonly present: false } {
  if (!Object.hasOwn(cfg, property)) return { present: false };
  const desc = Object.getOwnPropertyDescriptor(cfg, property);
  if (!desc) return { present: false };
  if ("get" in desc || "set" in desc) {
    throw new InvalidParameterError(
      `Configuration property "${property}" must be a plain data property (no getters/setters).`,
    );
  }
  return { present: true, value: desc.value };
}

function positiveInteger(value: unknown, name: string, max: number): number {
  if (
    typeof value !== "number" ||
    !Number.isInteger(value) ||
    value <= 0 ||
    value > max
  ) {
    throw new InvalidParameterError(
      `${name} must be an integer between 1 and ${String(max)}.`,
    );
  }
  return value;
}

function address(value: unknown, name: string): number {
  if (
    typeof value !== "number" ||
    !Number.isSafeInteger(value) ||
    value < 0
  ) {
    throw new InvalidParameterError(
      `${name} must be a non-negative safe integer.`,
    );
  }
  return value;
}

const SIMULATION_VALIDATORS: {
  readonly [K in keyof SimulationConfig]: (
    value: unknown,
  ) => SimulationConfig[K];
} = {
  associativity: (v) => positiveInteger(v, "associativity", 64),
  linesPerSuperblock: (v) => positiveInteger(v, "linesPerSuperblock", 64),
  superblockBudgetBytes: (v) => {
    const budget = positiveInteger(
      v,
      "superblockBudgetBytes",
      64 * LINE_SIZE_BYTES,
    );
    if (budget < MAX_COMPRESSED_LINE_BYTES) {
      throw new InvalidParameterError(
        `superblockBudgetBytes must be at least ${String(MAX_COMPRESSED_LINE_BYTES)} so any single line fits.`,
      );
    }
    return budget;
  },
  dictionaryCapacity: (v) =>
    positiveInteger(v, "dictionaryCapacity", MAX_DICTIONARY_CAPACITY),
  secretGenerationAttemptCap: (v) =>
    positiveInteger(v, "secretGenerationAttemptCap", 1_000_000),
  victimBaseAddress: (v) => address(v, "victimBaseAddress"),
  attackerBaseAddress: (v) => address(v, "attackerBaseAddress"),
};

function validateLayout(cfg: SimulationConfig): void {
  const superblockBytes = cfg.linesPerSuperblock * LINE_SIZE_BYTES;
  if (superblockBytes !== VICTIM_BUFFER_SIZE_BYTES) {
    throw new InvalidParameterError(
      `linesPerSuperblock must span the ${String(VICTIM_BUFFER_SIZE_BYTES)}-byte victim buffer exactly.`,
    );
  }
  if (cfg.associativity < cfg.linesPerSuperblock * 2) {
    throw new InvalidParameterError(
      "associativity must hold at least two full superblocks.",
    );
  }
  for (const [name, base] of [
    ["victimBaseAddress", cfg.victimBaseAddress],
    ["attackerBaseAddress", cfg.attackerBaseAddress],
  ] as const) {
    if (base % superblockBytes !== 0) {
      throw new InvalidParameterError(`${name} must be superblock aligned.`);
    }
  }
  const victimEnd = cfg.victimBaseAddress + VICTIM_BUFFER_SIZE_BYTES;
  const attackerEnd =
    cfg.attackerBaseAddress + cfg.associativity * LINE_SIZE_BYTES;
  if (
    cfg.victimBaseAddress < attackerEnd &&
    cfg.attackerBaseAddress < victimEnd
  ) {
    throw new InvalidParameterError(
      "victim and attacker regions must not overlap.",
    );
  }
}

export function getSimulationConfig(): SimulationConfig {
  return Object.freeze({ ..._simulationConfig });
}

function pick<K extends keyof SimulationConfig>(
  cfg: Partial<SimulationConfig>,
  key: K,
): SimulationConfig[K] {
  const extracted = readDataProperty<SimulationConfig>(cfg, key);
  return extracted.present
    ? SIMULATION_VALIDATORS[key](extracted.value)
    : _simulationConfig[key];
}

export function setSimulationConfig(cfg: Partial<SimulationConfig>): void {
  assertNotSealed();
  const next: SimulationConfig = {
    associativity: pick(cfg, "associativity"),
    linesPerSuperblock: pick(cfg, "linesPerSuperblock"),
    superblockBudgetBytes: pick(cfg, "superblockBudgetBytes"),
    dictionaryCapacity: pick(cfg, "dictionaryCapacity"),
    secretGenerationAttemptCap: pick(cfg, "secretGenerationAttemptCap"),
    victimBaseAddress: pick(cfg, "victimBaseAddress"),
    attackerBaseAddress: pick(cfg, "attackerBaseAddress"),
  };
  validateLayout(next);
  _simulationConfig = Object.freeze(next);
}

export function getLoggingConfig(): LoggingConfig {
  return Object.freeze({ ..._loggingConfig });
}

export function setLoggingConfig(cfg: Partial<LoggingConfig>): void {
  assertNotSealed();
  const level = readDataProperty<LoggingConfig>(cfg, "minLevel");
  const redact = readDataProperty<LoggingConfig>(cfg, "redactContext");

  const minLevel = ((): LogLevel => {
    if (!level.present) return _loggingConfig.minLevel;
    const found = LOG_LEVELS.find((candidate) => candidate === level.value);
    if (found === undefined) {
      throw new InvalidParameterError(
        `minLevel must be one of ${LOG_LEVELS.join(", ")}.`,
      );
    }
    return found;
  })();

  const redactContext = ((): boolean => {
    if (!redact.present) return _loggingConfig.redactContext;
    if (typeof redact.value !== "boolean") {
      throw new InvalidParameterError("redactContext must be a boolean.");
    }
    if (!redact.value && environment.isProduction) {
      throw new InvalidParameterError(
        "Context redaction cannot be disabled in production.",
      );
    }
    return redact.value;
  })();

  _loggingConfig = Object.freeze({ minLevel, redactContext });
}

/**
 * Seals the configuration, preventing any further changes for the lifetime
 * of the process.
 */
export function sealConfig(): void {
  _sealed = true;
}

/**
 * Alias for sealConfig() to provide a more discoverable name for freezing
 * the runtime configuration.
 */
export function freezeConfig(): void {
  sealConfig();
}

export function isConfigSealed(): boolean {
  return _sealed;
}

/**
 * Restores defaults and unseals. Test-only; guarded against production use.
 */
export function _resetConfigForTests(): void {
  assertTestApiAllowed();
  _simulationConfig = DEFAULT_SIMULATION_CONFIG;
  _loggingConfig = DEFAULT_LOGGING_CONFIG;
  _sealed = false;
}
