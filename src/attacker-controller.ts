// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * The attacker. It sees the victim only through {@link VictimInterface} and
 * the cache only through its own {@link AddressSpacePort}, and recovers the
 * secret from nothing but the hit/miss outcome of one of its own lines.
 *
 * One probe works like this. The attacker fills the first lines of the victim
 * superblock with calibration lines whose compressed sizes add up to a chosen
 * total, and writes probe words in front of the secret. It then reloads every
 * one of its own lines, which pushes all victim lines out of the set, and asks
 * the victim to touch each of its lines in order. The victim's first lines
 * each displace one attacker line. When the secret line is loaded last, it
 * either fits beside the calibration lines (and displaces one more attacker
 * line) or overflows the superblock budget (and displaces a victim line
 * instead). Reloading that attacker line therefore misses exactly when the
 * secret line compressed well enough to fit, i.e. when a probe word matched.
 *
 * The high half of each secret word is found with partial-dictionary matches,
 * many candidates per probe, narrowed by halving. The low half is then found
 * with exact matches, one candidate per probe.
 * @module
 */

import type { AddressSpacePort } from "./address-space.ts";
import {
  buildPrefix,
  calibrationCatalog,
  composeWord,
  highProbeWord,
  splitCalibration,
  UNMATCHED_LOW,
  UNMATCHED_STAND_INS,
} from "./attack-strings.ts";
import type { AccessOutcome } from "./cache-set.ts";
import { compressedSize, lineFromWords } from "./codec.ts";
import { getSimulationConfig } from "./config.ts";
import {
  LINE_SIZE_BYTES,
  WORD_SIZE_BYTES,
  WORDS_PER_LINE,
} from "./constants.ts";
import {
  IllegalStateError,
  InvalidParameterError,
  sanitizeErrorForLogs,
} from "./errors.ts";
import { createLogger, type Logger } from "./logger.ts";
import { SecretKnowledge } from "./secret-knowledge.ts";
import { secureWipe, validateNumericParameter } from "./utils.ts";
import type { VictimInterface } from "./victim-buffer.ts";

export type AttackPhase =
  | "idle"
  | "priming"
  | "probing"
  | "resolving"
  | "disambiguating"
  | "verifying"
  | "done"
  | "failed";

/** Which half of a secret word a probe was testing. */
export type ProbeFamily = "high-half" | "low-half";

export type ProbeObservation = {
  readonly family: ProbeFamily;
  readonly outcome: AccessOutcome;
};

export type AttackResult = {
  readonly success: boolean;
  readonly guessesUsed: number;
  readonly bytesWritten: number;
  readonly bytesRead: number;
  readonly linesReloaded: number;
  readonly setEvictions: number;
  readonly probes: number;
  /** The verified secret; absent when the attack failed. */
  readonly recovered?: Uint8Array;
};

export type AttackerControllerOptions = {
  readonly associativity?: number;
  readonly linesPerSuperblock?: number;
  readonly superblockBudgetBytes?: number;
  readonly dictionaryCapacity?: number;
  readonly logger?: Logger;
};

/** The most guesses ever submitted: one per possible word order. */
export const MAX_GUESSES = 2;

const HIGHEST_PAIR = 0xffff;
const LOWEST_PAIR = 0x0101;

// One frozen object per (family, outcome); the log can grow to ~10^5 entries.
const OBSERVATIONS: Readonly<
  Record<ProbeFamily, Readonly<Record<AccessOutcome, ProbeObservation>>>
> = Object.freeze({
  "high-half": Object.freeze({
    hit: Object.freeze({ family: "high-half", outcome: "hit" }),
    miss: Object.freeze({ family: "high-half", outcome: "miss" }),
  }),
  "low-half": Object.freeze({
    hit: Object.freeze({ family: "low-half", outcome: "hit" }),
    miss: Object.freeze({ family: "low-half", outcome: "miss" }),
  }),
});

type ProbeLayout = {
  readonly family: ProbeFamily;
  /** Words of the secret line the attacker controls. */
  readonly prefixWords: number;
  /** Leading prefix words kept as dictionary literals; the rest are zero. */
  readonly literalSlots: number;
};

export class AttackerController {
  readonly #victim: VictimInterface;
  readonly #port: AddressSpacePort;
  readonly #logger: Logger;
  readonly #budget: number;
  readonly #dictionaryCapacity: number;
  readonly #calibrationLines: number;
  readonly #attackerLines: readonly number[];
  readonly #probeLine: number;
  readonly #secretWords: number;
  readonly #prefixWords: number;
  readonly #catalog: ReadonlyMap<number, Uint8Array>;
  readonly #shadow: Uint8Array;
  readonly #knowledge: SecretKnowledge;
  readonly #observations: ProbeObservation[] = [];
  readonly #phaseHistory: AttackPhase[] = [];

  #phase: AttackPhase = "idle";
  #bytesWritten = 0;
  #bytesRead = 0;
  #linesReloaded = 0;
  #setEvictions = 0;
  #guessesUsed = 0;
  #probes = 0;

  constructor(
    victim: VictimInterface,
    port: AddressSpacePort,
    options: AttackerControllerOptions = {},
  ) {
    const defaults = getSimulationConfig();
    const associativity = options.associativity ?? defaults.associativity;
    const linesPerSuperblock =
      options.linesPerSuperblock ?? defaults.linesPerSuperblock;
    this.#budget =
      options.superblockBudgetBytes ?? defaults.superblockBudgetBytes;
    this.#dictionaryCapacity =
      options.dictionaryCapacity ?? defaults.dictionaryCapacity;

    if (victim.size !== linesPerSuperblock * LINE_SIZE_BYTES) {
      throw new InvalidParameterError(
        "The victim buffer must span exactly one superblock.",
      );
    }
    if (port.base % LINE_SIZE_BYTES !== 0) {
      throw new InvalidParameterError("The attacker region must be line aligned.");
    }
    // Reloading one line per way is what guarantees a full-set eviction.
    validateNumericParameter(
      Math.floor(port.length / LINE_SIZE_BYTES),
      "attacker line count",
      associativity,
      Number.MAX_SAFE_INTEGER,
    );

    this.#victim = victim;
    this.#port = port;
    this.#logger = options.logger ?? createLogger("attacker");
    this.#calibrationLines = linesPerSuperblock - 1;
    this.#attackerLines = Array.from(
      { length: associativity },
      (_, index) => port.base + index * LINE_SIZE_BYTES,
    );
    // The victim's first lines each displace one attacker line, oldest first;
    // the next one in line is the one whose fate depends on the secret line.
    this.#probeLine =
      this.#attackerLines[this.#calibrationLines] ?? port.base;
    this.#secretWords = victim.secretLength / WORD_SIZE_BYTES;
    this.#prefixWords = WORDS_PER_LINE - this.#secretWords;
    this.#catalog = calibrationCatalog(this.#dictionaryCapacity);
    this.#shadow = new Uint8Array(victim.size);
    this.#knowledge = new SecretKnowledge(victim.secretLength);
  }

  get phase(): AttackPhase {
    return this.#phase;
  }

  get phaseHistory(): readonly AttackPhase[] {
    return this.#phaseHistory;
  }

  get observations(): readonly ProbeObservation[] {
    return this.#observations;
  }

  #enter(phase: AttackPhase): void {
    this.#phase = phase;
    this.#phaseHistory.push(phase);
    this.#logger.debug("Phase change", { phase, probes: this.#probes });
  }

  /**
   * Runs the attack to completion. A controller runs at most once; its
   * shadow of the victim buffer is only valid for a single pass.
   */
  run(): AttackResult {
    if (this.#phase !== "idle") {
      throw new IllegalStateError("An attacker controller runs only once.");
    }
    try {
      const recovered = this.#attack();
      this.#enter(recovered === undefined ? "failed" : "done");
      const result = this.#result(recovered);
      this.#logger.info("Attack finished", {
        success: result.success,
        guessesUsed: result.guessesUsed,
        probes: result.probes,
      });
      return result;
    } catch (error) {
      if (this.phase !== "failed") this.#enter("failed");
      this.#logger.error("Attack aborted", {
        error: sanitizeErrorForLogs(error),
      });
      throw error;
    } finally {
      secureWipe(this.#shadow);
    }
  }

  #attack(): Uint8Array | undefined {
    this.#enter("priming");
    const highLayout = this.#layout("high-half");
    const highThreshold = this.#highThreshold(highLayout);
    this.#prime(highThreshold);

    this.#enter("probing");
    const highs = this.#findHighHalves(highLayout);
    if (highs === undefined) return undefined;

    this.#enter("resolving");
    const lowLayout = this.#layout("low-half");
    for (let word = 0; word < highs.length; word++) {
      const high = highs[word] ?? 0;
      this.#prime(this.#lowThreshold(lowLayout, high));
      if (!this.#findLowHalf(lowLayout, word, high)) return undefined;
    }

    const guesses = this.#orderedGuesses();
    this.#enter("verifying");
    for (const guess of guesses) {
      this.#guessesUsed++;
      if (this.#victim.verifyGuess(guess)) return guess;
    }
    return undefined;
  }

  #layout(family: ProbeFamily): ProbeLayout {
    // Literals in the prefix plus the secret words must all stay in the
    // dictionary, or a match could be lost to FIFO replacement.
    const literalSlots = Math.min(
      this.#prefixWords,
      this.#dictionaryCapacity - this.#secretWords,
    );
    if (literalSlots < 1) {
      throw new IllegalStateError(
        "Dictionary too small to hold a probe word beside the secret.",
      );
    }
    return { family, prefixWords: this.#prefixWords, literalSlots };
  }

  /**
   * Chooses the calibration total so the secret line fits exactly when it
   * compresses as well as `matchTail` would, and overflows when it
   * compresses like `missTail`.
   */
  #threshold(
    prefix: readonly number[],
    matchTail: readonly number[],
    missTail: readonly number[],
  ): number {
    const matched = compressedSize(
      lineFromWords([...prefix, ...matchTail]),
      this.#dictionaryCapacity,
    );
    const missed = compressedSize(
      lineFromWords([...prefix, ...missTail]),
      this.#dictionaryCapacity,
    );
    if (matched >= missed) {
      throw new IllegalStateError(
        "Probe layout does not separate a match from a miss.",
      );
    }
    return this.#budget - matched;
  }

  #highThreshold(layout: ProbeLayout): number {
    const sampleHigh = this.#nextHighCandidate(LOWEST_PAIR, 0) ?? LOWEST_PAIR;
    const prefix = buildPrefix(
      [highProbeWord(sampleHigh)],
      layout.literalSlots,
      layout.prefixWords,
    );
    const unmatched = UNMATCHED_STAND_INS.slice(0, this.#secretWords);
    // A single matching word is the weakest positive the probe must catch.
    const matched = [
      composeWord(sampleHigh, UNMATCHED_LOW),
      ...unmatched.slice(1),
    ];
    return this.#threshold(prefix, matched, unmatched);
  }

  #lowThreshold(layout: ProbeLayout, high: number): number {
    const sample = composeWord(high, UNMATCHED_LOW);
    const prefix = buildPrefix([sample], layout.literalSlots, layout.prefixWords);
    const others = UNMATCHED_STAND_INS.slice(1, this.#secretWords);
    return this.#threshold(prefix, [sample, ...others], [
      composeWord(high, UNMATCHED_LOW + 1),
      ...others,
    ]);
  }

  /** Rewrites the calibration lines so their compressed sizes sum to `threshold`. */
  #prime(threshold: number): void {
    const split = splitCalibration(
      threshold,
      this.#calibrationLines,
      Array.from(this.#catalog.keys()),
    );
    if (split === undefined) {
      throw new IllegalStateError(
        `No calibration layout reaches ${String(threshold)} compressed bytes.`,
      );
    }
    split.forEach((size, lineIndex) => {
      const line = this.#catalog.get(size);
      if (line === undefined) {
        throw new IllegalStateError("Calibration catalog lost an entry.");
      }
      this.#writeVictimBytes(lineIndex * LINE_SIZE_BYTES, line);
    });
    if (this.#logger.isEnabled("debug")) {
      this.#logger.debug("Calibrated victim superblock", {
        threshold,
        split: split.join("+"),
      });
    }
  }

  #writeVictimBytes(offset: number, bytes: Uint8Array): void {
    bytes.forEach((byte, index) => {
      const at = offset + index;
      if (this.#shadow[at] === byte) return;
      const written = this.#victim.write(at, byte);
      if (written.status !== "ok") {
        throw new IllegalStateError(`Victim denied a write at ${String(at)}.`);
      }
      this.#shadow[at] = byte;
      this.#bytesWritten++;
    });
  }

  /**
   * One eviction probe with `prefix` in front of the secret. Returns true
   * when the secret line fit in the superblock, i.e. a probe word matched.
   */
  #probe(family: ProbeFamily, prefix: readonly number[]): boolean {
    const secretLineOffset = this.#calibrationLines * LINE_SIZE_BYTES;
    const line = lineFromWords(prefix);
    this.#writeVictimBytes(
      secretLineOffset,
      line.subarray(0, this.#prefixWords * WORD_SIZE_BYTES),
    );

    for (const address of this.#attackerLines) {
      this.#port.read(address);
      this.#linesReloaded++;
    }
    this.#setEvictions++;

    for (let lineIndex = 0; lineIndex <= this.#calibrationLines; lineIndex++) {
      const read = this.#victim.read(lineIndex * LINE_SIZE_BYTES);
      if (read.status !== "ok") {
        throw new IllegalStateError("Victim denied a read outside its secret.");
      }
      this.#bytesRead++;
    }

    const { outcome } = this.#port.read(this.#probeLine);
    this.#linesReloaded++;
    this.#probes++;
    this.#observations.push(OBSERVATIONS[family][outcome]);
    return outcome === "miss";
  }

  /** Positions of the low and high byte of a word's high half. */
  #highPositions(word: number): readonly [number, number] {
    return [word * WORD_SIZE_BYTES + 2, word * WORD_SIZE_BYTES + 3];
  }

  #admitsHigh(word: number, pair: number): boolean {
    const [lowPosition, highPosition] = this.#highPositions(word);
    return this.#knowledge.admitsPair(
      lowPosition,
      highPosition,
      pair & 0xff,
      pair >>> 8,
    );
  }

  #nextHighCandidate(from: number, word: number): number | undefined {
    for (let pair = from; pair <= HIGHEST_PAIR; pair++) {
      if (this.#admitsHigh(word, pair)) return pair;
    }
    return undefined;
  }

  /**
   * Group-tests candidate high halves in ascending order. Found halves are
   * assigned to words in the order they are found, so for two-word secrets
   * the first word holds the numerically smaller high half.
   */
  #findHighHalves(layout: ProbeLayout): number[] | undefined {
    const found: number[] = [];
    const test = (group: readonly number[]): boolean =>
      this.#probe(
        layout.family,
        buildPrefix(
          group.map((pair) => highProbeWord(pair)),
          layout.literalSlots,
          layout.prefixWords,
        ),
      );
    const record = (pair: number): void => {
      const [lowPosition, highPosition] = this.#highPositions(found.length);
      this.#knowledge.assign(lowPosition, pair & 0xff);
      this.#knowledge.assign(highPosition, pair >>> 8);
      found.push(pair);
    };
    // `group` is known to contain at least one unfound high half.
    const narrow = (group: readonly number[]): void => {
      if (group.length === 1) {
        record(group[0] ?? 0);
        return;
      }
      const half = Math.ceil(group.length / 2);
      const left = group.slice(0, half);
      const right = group.slice(half);
      const leftMatched = test(left);
      if (leftMatched) narrow(left);
      if (found.length === this.#secretWords) return;
      if (!leftMatched || test(right)) narrow(right);
    };

    let cursor = LOWEST_PAIR;
    while (found.length < this.#secretWords) {
      const group: number[] = [];
      while (group.length < layout.literalSlots) {
        const next = this.#nextHighCandidate(cursor, found.length);
        if (next === undefined) break;
        group.push(next);
        cursor = next + 1;
      }
      if (group.length === 0) {
        this.#logger.warn("High-half candidates exhausted", {
          found: found.length,
          probes: this.#probes,
        });
        return undefined;
      }
      if (test(group)) narrow(group);
    }
    return found;
  }

  /** Tests low halves for `word` one at a time, ascending, until one matches exactly. */
  #findLowHalf(layout: ProbeLayout, word: number, high: number): boolean {
    const lowPosition = word * WORD_SIZE_BYTES;
    for (let pair = LOWEST_PAIR; pair <= HIGHEST_PAIR; pair++) {
      const low = pair & 0xff;
      const upper = pair >>> 8;
      if (!this.#knowledge.admitsPair(lowPosition, lowPosition + 1, low, upper)) {
        continue;
      }
      const prefix = buildPrefix(
        [composeWord(high, pair)],
        layout.literalSlots,
        layout.prefixWords,
      );
      if (this.#probe(layout.family, prefix)) {
        this.#knowledge.assign(lowPosition, low);
        this.#knowledge.assign(lowPosition + 1, upper);
        return true;
      }
    }
    this.#logger.warn("Low-half candidates exhausted", {
      word,
      probes: this.#probes,
    });
    return false;
  }

  /**
   * Guesses in submission order. A one-word secret has exactly one; for two
   * words the probes reveal both words but not which comes first, so the
   * default order is followed by the swapped one.
   */
  #orderedGuesses(): readonly Uint8Array[] {
    const recovered = this.#knowledge.toBytes();
    if (this.#secretWords === 1) return [recovered];
    this.#enter("disambiguating");
    const swapped = new Uint8Array(recovered.length);
    swapped.set(recovered.subarray(WORD_SIZE_BYTES), 0);
    swapped.set(recovered.subarray(0, WORD_SIZE_BYTES), WORD_SIZE_BYTES);
    return [recovered, swapped].slice(0, MAX_GUESSES);
  }

  #result(recovered: Uint8Array | undefined): AttackResult {
    const counters = {
      success: recovered !== undefined,
      guessesUsed: this.#guessesUsed,
      bytesWritten: this.#bytesWritten,
      bytesRead: this.#bytesRead,
      linesReloaded: this.#linesReloaded,
      setEvictions: this.#setEvictions,
      probes: this.#probes,
    };
    return Object.freeze(
      recovered === undefined ? counters : { ...counters, recovered },
    );
  }
}
