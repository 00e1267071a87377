// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * A single compressed set-associative cache set.
 *
 * Ways hold compressed lines. Naturally aligned groups of lines form
 * superblocks whose resident members share one compressed-size budget, so a
 * line that compresses badly can push its own neighbours out even while the
 * set still has free ways. The only externally observable signal is whether
 * an access hit or missed.
 * @module
 */

import {
  compress,
  decompress,
  type CompressedLine,
  WordDictionary,
} from "./codec.ts";
import { getSimulationConfig } from "./config.ts";
import { LINE_SIZE_BYTES, MAX_COMPRESSED_LINE_BYTES } from "./constants.ts";
import {
  CapacityInvariantViolationError,
  InvalidParameterError,
} from "./errors.ts";
import { createLogger, type Logger } from "./logger.ts";
import type { MainMemory } from "./main-memory.ts";
import { validateByte, validateNumericParameter } from "./utils.ts";

export type AccessKind = "read" | "write";
export type AccessOutcome = "hit" | "miss";

export type AccessResult = {
  readonly outcome: AccessOutcome;
  /** The byte read, or the byte written. */
  readonly value: number;
};

export type EvictionReason = "budget" | "capacity" | "flush";

export type EvictedLine = {
  readonly lineNumber: number;
  readonly superblock: number;
  readonly compressedBytes: number;
  readonly dirty: boolean;
  readonly reason: EvictionReason;
};

export type CacheSetStats = {
  readonly hits: number;
  readonly misses: number;
  readonly evictions: Readonly<Record<EvictionReason, number>>;
  readonly writeBacks: number;
  readonly residentLines: number;
};

export type ResidentLineSnapshot = {
  readonly way: number;
  readonly lineNumber: number;
  readonly superblock: number;
  readonly compressedBytes: number;
  readonly dirty: boolean;
  /** 0 for the most recently used line in the set. */
  readonly recencyRank: number;
};

export type CompressedCacheSetOptions = {
  readonly memory: MainMemory;
  readonly associativity?: number;
  readonly linesPerSuperblock?: number;
  readonly superblockBudgetBytes?: number;
  readonly dictionaryCapacity?: number;
  /** Called after a line leaves the set, once any write-back has happened. */
  readonly onEvict?: (line: EvictedLine) => void;
  readonly logger?: Logger;
};

type ResidentLine = {
  readonly lineNumber: number;
  readonly superblock: number;
  compressed: CompressedLine;
  readonly dictionary: WordDictionary;
  dirty: boolean;
  lastUsed: number;
};

export function lineNumberOf(address: number): number {
  return Math.floor(address / LINE_SIZE_BYTES);
}

export function lineOffsetOf(address: number): number {
  return address % LINE_SIZE_BYTES;
}

export function assertAddress(address: number): void {
  if (!Number.isSafeInteger(address) || address < 0) {
    throw new InvalidParameterError(
      "address must be a non-negative safe integer.",
    );
  }
}

export class CompressedCacheSet {
  readonly associativity: number;
  readonly linesPerSuperblock: number;
  readonly superblockBudgetBytes: number;
  readonly dictionaryCapacity: number;

  readonly #memory: MainMemory;
  readonly #ways: (ResidentLine | undefined)[];
  readonly #index = new Map<number, number>();
  readonly #scratch: WordDictionary;
  readonly #onEvict: ((line: EvictedLine) => void) | undefined;
  readonly #logger: Logger;

  #tick = 0;
  #hits = 0;
  #misses = 0;
  #writeBacks = 0;
  readonly #evictions: Record<EvictionReason, number> = {
    budget: 0,
    capacity: 0,
    flush: 0,
  };

  constructor(options: CompressedCacheSetOptions) {
    const defaults = getSimulationConfig();
    this.associativity = options.associativity ?? defaults.associativity;
    this.linesPerSuperblock =
      options.linesPerSuperblock ?? defaults.linesPerSuperblock;
    this.superblockBudgetBytes =
      options.superblockBudgetBytes ?? defaults.superblockBudgetBytes;
    this.dictionaryCapacity =
      options.dictionaryCapacity ?? defaults.dictionaryCapacity;

    validateNumericParameter(this.associativity, "associativity", 1, 64);
    validateNumericParameter(
      this.linesPerSuperblock,
      "linesPerSuperblock",
      1,
      this.associativity,
    );
    // Any single line must fit on its own or eviction could never make room.
    validateNumericParameter(
      this.superblockBudgetBytes,
      "superblockBudgetBytes",
      MAX_COMPRESSED_LINE_BYTES,
      Number.MAX_SAFE_INTEGER,
    );

    this.#memory = options.memory;
    this.#ways = Array.from({ length: this.associativity }, () => undefined);
    this.#scratch = new WordDictionary(this.dictionaryCapacity);
    this.#onEvict = options.onEvict;
    this.#logger = options.logger ?? createLogger("cache-set");
  }

  superblockOf(lineNumber: number): number {
    return Math.floor(lineNumber / this.linesPerSuperblock);
  }

  /**
   * Performs one byte access. The returned outcome is the timing oracle:
   * `hit` when the line was resident, `miss` when it had to be loaded.
   */
  access(address: number, kind: AccessKind, data?: number): AccessResult {
    assertAddress(address);
    if (kind === "write") {
      if (data === undefined) {
        throw new InvalidParameterError(
          "A write access requires a data byte.",
        );
      }
      validateByte(data, "data");
    }
    const lineNumber = lineNumberOf(address);
    const offset = lineOffsetOf(address);
    this.#tick++;

    const wayIndex = this.#index.get(lineNumber);
    const resident =
      wayIndex === undefined ? undefined : this.#ways[wayIndex];
    const result =
      resident === undefined
        ? this.#accessMiss(lineNumber, offset, kind, data)
        : this.#accessHit(resident, offset, kind, data);

    this.#verifyInvariants();
    return result;
  }

  read(address: number): AccessResult {
    return this.access(address, "read");
  }

  write(address: number, byte: number): AccessResult {
    return this.access(address, "write", byte);
  }

  #accessHit(
    resident: ResidentLine,
    offset: number,
    kind: AccessKind,
    data: number | undefined,
  ): AccessResult {
    this.#hits++;
    resident.lastUsed = this.#tick;
    const bytes = this.#decode(resident.compressed);
    if (kind === "read" || data === undefined) {
      return { outcome: "hit", value: bytes[offset] ?? 0 };
    }
    bytes[offset] = data;
    resident.dictionary.clear();
    resident.compressed = compress(bytes, resident.dictionary);
    resident.dirty = true;
    // The rewritten line may have grown; push out its neighbours, never itself.
    this.#restoreBudget(resident.superblock, 0, resident.lineNumber);
    return { outcome: "hit", value: data };
  }

  #accessMiss(
    lineNumber: number,
    offset: number,
    kind: AccessKind,
    data: number | undefined,
  ): AccessResult {
    this.#misses++;
    const bytes = this.#memory.readLine(lineNumber);
    if (kind === "write" && data !== undefined) bytes[offset] = data;
    const dictionary = new WordDictionary(this.dictionaryCapacity);
    const compressed = compress(bytes, dictionary);
    const superblock = this.superblockOf(lineNumber);

    this.#restoreBudget(superblock, compressed.bytes, undefined);
    const free = this.#freeWay() ?? this.#evictForCapacity();

    this.#ways[free] = {
      lineNumber,
      superblock,
      compressed,
      dictionary,
      dirty: kind === "write",
      lastUsed: this.#tick,
    };
    this.#index.set(lineNumber, free);
    return { outcome: "miss", value: bytes[offset] ?? 0 };
  }

  /**
   * Evicts least recently used members of `superblock` until `incoming`
   * more bytes fit in its budget. `protectedLine` is never chosen.
   */
  #restoreBudget(
    superblock: number,
    incoming: number,
    protectedLine: number | undefined,
  ): void {
    while (
      this.superblockUsage(superblock) + incoming >
      this.superblockBudgetBytes
    ) {
      const victim = this.#leastRecentlyUsed(
        (line) =>
          line.superblock === superblock && line.lineNumber !== protectedLine,
      );
      if (victim === undefined) {
        throw new CapacityInvariantViolationError(
          `Superblock ${String(superblock)} cannot make room for ${String(incoming)} bytes.`,
        );
      }
      this.#evict(victim, "budget");
    }
  }

  #evictForCapacity(): number {
    const victim = this.#leastRecentlyUsed(() => true);
    if (victim === undefined) {
      throw new CapacityInvariantViolationError(
        "Set reports no free way and no resident line.",
      );
    }
    this.#evict(victim, "capacity");
    return victim;
  }

  #freeWay(): number | undefined {
    const index = this.#ways.findIndex((way) => way === undefined);
    return index >= 0 ? index : undefined;
  }

  #leastRecentlyUsed(
    predicate: (line: ResidentLine) => boolean,
  ): number | undefined {
    let best: number | undefined;
    let bestTick = Number.POSITIVE_INFINITY;
    this.#ways.forEach((line, index) => {
      if (line !== undefined && predicate(line) && line.lastUsed < bestTick) {
        best = index;
        bestTick = line.lastUsed;
      }
    });
    return best;
  }

  #evict(wayIndex: number, reason: EvictionReason): void {
    const line = this.#ways[wayIndex];
    if (line === undefined) return;
    if (line.dirty) {
      this.#memory.writeLine(line.lineNumber, this.#decode(line.compressed));
      this.#writeBacks++;
    }
    line.dictionary.clear();
    this.#ways[wayIndex] = undefined;
    this.#index.delete(line.lineNumber);
    this.#evictions[reason]++;
    this.#onEvict?.({
      lineNumber: line.lineNumber,
      superblock: line.superblock,
      compressedBytes: line.compressed.bytes,
      dirty: line.dirty,
      reason,
    });
  }

  #decode(compressed: CompressedLine): Uint8Array {
    this.#scratch.clear();
    return decompress(compressed, this.#scratch);
  }

  #verifyInvariants(): void {
    const usage = new Map<number, number>();
    const seen = new Set<number>();
    for (const line of this.#ways) {
      if (line === undefined) continue;
      if (seen.has(line.lineNumber)) {
        this.#fail(
          `Line ${String(line.lineNumber)} occupies more than one way.`,
        );
      }
      seen.add(line.lineNumber);
      usage.set(
        line.superblock,
        (usage.get(line.superblock) ?? 0) + line.compressed.bytes,
      );
    }
    for (const [superblock, bytes] of usage) {
      if (bytes > this.superblockBudgetBytes) {
        this.#fail(
          `Superblock ${String(superblock)} holds ${String(bytes)} bytes, over its ${String(this.superblockBudgetBytes)}-byte budget.`,
        );
      }
    }
    if (seen.size !== this.#index.size) {
      this.#fail("Way index disagrees with way contents.");
    }
  }

  #fail(message: string): never {
    const error = new CapacityInvariantViolationError(message);
    this.#logger.error("Cache invariant violated", {
      code: error.code,
      detail: message,
    });
    throw error;
  }

  /** Total compressed bytes of the resident members of a superblock. */
  superblockUsage(superblock: number): number {
    let total = 0;
    for (const line of this.#ways) {
      if (line !== undefined && line.superblock === superblock) {
        total += line.compressed.bytes;
      }
    }
    return total;
  }

  /**
   * Current contents of a line without touching recency, statistics or
   * residency: the resident copy if cached, otherwise main memory.
   */
  peekLine(lineNumber: number): Uint8Array {
    const wayIndex = this.#index.get(lineNumber);
    const resident =
      wayIndex === undefined ? undefined : this.#ways[wayIndex];
    return resident === undefined
      ? this.#memory.readLine(lineNumber)
      : this.#decode(resident.compressed);
  }

  isResident(lineNumber: number): boolean {
    return this.#index.has(lineNumber);
  }

  /** Writes back every dirty line and empties the set. */
  flush(): void {
    this.#ways.forEach((_, index) => {
      this.#evict(index, "flush");
    });
    this.#logger.debug("Cache set flushed", {
      writeBacks: this.#writeBacks,
    });
  }

  getStats(): CacheSetStats {
    return Object.freeze({
      hits: this.#hits,
      misses: this.#misses,
      evictions: Object.freeze({ ...this.#evictions }),
      writeBacks: this.#writeBacks,
      residentLines: this.#index.size,
    });
  }

  snapshot(): readonly ResidentLineSnapshot[] {
    const byRecency = this.#ways
      .filter((line): line is ResidentLine => line !== undefined)
      .sort((a, b) => b.lastUsed - a.lastUsed)
      .map((line) => line.lineNumber);
    const out: ResidentLineSnapshot[] = [];
    this.#ways.forEach((line, way) => {
      if (line === undefined) return;
      out.push({
        way,
        lineNumber: line.lineNumber,
        superblock: line.superblock,
        compressedBytes: line.compressed.bytes,
        dirty: line.dirty,
        recencyRank: byRecency.indexOf(line.lineNumber),
      });
    });
    return out;
  }
}
