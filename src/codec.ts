// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Dictionary-based word compaction for 64-byte lines.
 *
 * Each 4-byte word is matched against five patterns in priority order and
 * costs a fixed number of bits:
 *
 * | pattern              | condition                                | bits |
 * | -------------------- | ---------------------------------------- | ---- |
 * | `zero`               | word is 0                                | 2    |
 * | `dictionary`         | word equals a dictionary entry           | 6    |
 * | `low-byte`           | only the least significant byte is set   | 10   |
 * | `partial-dictionary` | high 16 bits equal an entry's high 16    | 22   |
 * | `literal`            | anything else; inserted into the dictionary | 34 |
 *
 * Words are read little-endian, so the "high" bytes of a word are the third
 * and fourth bytes of its slice of the line. Only literals mutate the
 * dictionary, which evicts its oldest entry once full.
 * @module
 */

import { getSimulationConfig } from "./config.ts";
import {
  LINE_SIZE_BYTES,
  MAX_DICTIONARY_CAPACITY,
  PATTERN_COST_BITS,
  WORD_SIZE_BYTES,
  WORDS_PER_LINE,
} from "./constants.ts";
import { InvalidParameterError } from "./errors.ts";
import { validateNumericParameter } from "./utils.ts";

export type Pattern = keyof typeof PATTERN_COST_BITS;

export type EncodedWord =
  | { readonly pattern: "zero" }
  | { readonly pattern: "dictionary"; readonly index: number }
  | { readonly pattern: "low-byte"; readonly value: number }
  | {
      readonly pattern: "partial-dictionary";
      readonly index: number;
      readonly low: number;
    }
  | { readonly pattern: "literal"; readonly word: number };

export type CompressedLine = {
  readonly words: readonly EncodedWord[];
  /** Exact sum of the per-word costs. */
  readonly bits: number;
  /** `bits` rounded up to whole bytes; what the line occupies in a budget. */
  readonly bytes: number;
  /** Capacity of the dictionary the line was encoded against. */
  readonly dictionaryCapacity: number;
};

const ZERO_WORD: EncodedWord = Object.freeze({ pattern: "zero" });

/**
 * Bounded FIFO of previously seen words. Slots are stable: an entry keeps its
 * index until it is overwritten by the insertion that evicts it.
 */
export class WordDictionary {
  readonly #slots: Uint32Array;
  #size = 0;
  #next = 0;

  constructor(capacity: number = getSimulationConfig().dictionaryCapacity) {
    validateNumericParameter(
      capacity,
      "dictionaryCapacity",
      1,
      MAX_DICTIONARY_CAPACITY,
    );
    this.#slots = new Uint32Array(capacity);
  }

  get capacity(): number {
    return this.#slots.length;
  }

  get size(): number {
    return this.#size;
  }

  indexOf(word: number): number {
    for (let index = 0; index < this.#size; index++) {
      if (this.#slots[index] === word) return index;
    }
    return -1;
  }

  /** Index of the first entry whose high 16 bits equal `high`, or -1. */
  indexOfHigh(high: number): number {
    for (let index = 0; index < this.#size; index++) {
      if ((this.#slots[index] ?? 0) >>> 16 === high) return index;
    }
    return -1;
  }

  entryAt(index: number): number | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.#size) {
      return undefined;
    }
    return this.#slots[index];
  }

  /** Inserts a word, overwriting the oldest entry when full. Returns its slot. */
  insert(word: number): number {
    const slot = this.#next;
    this.#slots[slot] = word;
    this.#next = (slot + 1) % this.#slots.length;
    if (this.#size < this.#slots.length) this.#size++;
    return slot;
  }

  clear(): void {
    this.#slots.fill(0);
    this.#size = 0;
    this.#next = 0;
  }

  entries(): readonly number[] {
    return Array.from(this.#slots.subarray(0, this.#size));
  }
}

export function assertLine(line: Uint8Array): void {
  if (!(line instanceof Uint8Array) || line.length !== LINE_SIZE_BYTES) {
    throw new InvalidParameterError(
      `A line must be a Uint8Array of exactly ${String(LINE_SIZE_BYTES)} bytes.`,
    );
  }
}

/** Reads word `index` of a line, little-endian, as an unsigned 32-bit value. */
export function readWord(line: Uint8Array, index: number): number {
  const base = index * WORD_SIZE_BYTES;
  return (
    ((line[base] ?? 0) |
      ((line[base + 1] ?? 0) << 8) |
      ((line[base + 2] ?? 0) << 16) |
      ((line[base + 3] ?? 0) << 24)) >>>
    0
  );
}

export function writeWord(line: Uint8Array, index: number, word: number): void {
  const base = index * WORD_SIZE_BYTES;
  line[base] = word & 0xff;
  line[base + 1] = (word >>> 8) & 0xff;
  line[base + 2] = (word >>> 16) & 0xff;
  line[base + 3] = (word >>> 24) & 0xff;
}

export function wordsOf(line: Uint8Array): number[] {
  assertLine(line);
  return Array.from({ length: WORDS_PER_LINE }, (_, index) =>
    readWord(line, index),
  );
}

/** Builds a line from up to 16 words; missing trailing words are zero. */
export function lineFromWords(words: readonly number[]): Uint8Array {
  if (words.length > WORDS_PER_LINE) {
    throw new InvalidParameterError(
      `A line holds at most ${String(WORDS_PER_LINE)} words.`,
    );
  }
  const line = new Uint8Array(LINE_SIZE_BYTES);
  words.forEach((word, index) => {
    writeWord(line, index, word >>> 0);
  });
  return line;
}

function encodeWord(word: number, dictionary: WordDictionary): EncodedWord {
  if (word === 0) return ZERO_WORD;
  const exact = dictionary.indexOf(word);
  if (exact >= 0) return { pattern: "dictionary", index: exact };
  if ((word & 0xffff_ff00) === 0) return { pattern: "low-byte", value: word };
  const partial = dictionary.indexOfHigh(word >>> 16);
  if (partial >= 0) {
    return { pattern: "partial-dictionary", index: partial, low: word & 0xffff };
  }
  dictionary.insert(word);
  return { pattern: "literal", word };
}

export function encodedWordBits(encoded: EncodedWord): number {
  return PATTERN_COST_BITS[encoded.pattern];
}

/**
 * Compresses a line against `dictionary`, which is updated in place with
 * every literal. Pass a fresh or cleared dictionary for a standalone size.
 */
export function compress(
  line: Uint8Array,
  dictionary: WordDictionary = new WordDictionary(),
): CompressedLine {
  assertLine(line);
  const words: EncodedWord[] = [];
  let bits = 0;
  for (let index = 0; index < WORDS_PER_LINE; index++) {
    const encoded = encodeWord(readWord(line, index), dictionary);
    bits += encodedWordBits(encoded);
    words.push(encoded);
  }
  return {
    words,
    bits,
    bytes: Math.ceil(bits / 8),
    dictionaryCapacity: dictionary.capacity,
  };
}

function decodeWord(encoded: EncodedWord, dictionary: WordDictionary): number {
  switch (encoded.pattern) {
    case "zero":
      return 0;
    case "low-byte":
      return encoded.value & 0xff;
    case "literal":
      dictionary.insert(encoded.word >>> 0);
      return encoded.word >>> 0;
    case "dictionary":
    case "partial-dictionary": {
      const entry = dictionary.entryAt(encoded.index);
      if (entry === undefined) {
        throw new InvalidParameterError(
          `Dictionary index ${String(encoded.index)} refers to an empty slot.`,
        );
      }
      return encoded.pattern === "dictionary"
        ? entry
        : ((entry & 0xffff_0000) | (encoded.low & 0xffff)) >>> 0;
    }
  }
}

/**
 * Exact inverse of {@link compress}: replays the literals into a dictionary
 * of the same capacity so every index resolves to the word it named.
 */
export function decompress(
  compressed: CompressedLine,
  dictionary: WordDictionary = new WordDictionary(compressed.dictionaryCapacity),
): Uint8Array {
  if (compressed.words.length !== WORDS_PER_LINE) {
    throw new InvalidParameterError(
      `A compressed line must encode exactly ${String(WORDS_PER_LINE)} words.`,
    );
  }
  const line = new Uint8Array(LINE_SIZE_BYTES);
  compressed.words.forEach((encoded, index) => {
    writeWord(line, index, decodeWord(encoded, dictionary));
  });
  return line;
}

/** Unrounded bit cost of a line against an empty dictionary. */
export function compressedBits(
  line: Uint8Array,
  dictionaryCapacity: number = getSimulationConfig().dictionaryCapacity,
): number {
  return compress(line, new WordDictionary(dictionaryCapacity)).bits;
}

/** Byte cost of a line against an empty dictionary, rounded up. */
export function compressedSize(
  line: Uint8Array,
  dictionaryCapacity: number = getSimulationConfig().dictionaryCapacity,
): number {
  return Math.ceil(compressedBits(line, dictionaryCapacity) / 8);
}
