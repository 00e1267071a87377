// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Word and line builders for the eviction probe: the probe words written in
 * front of the secret, and the calibration lines that pad the rest of the
 * victim superblock to a chosen compressed total.
 * @module
 */

import { compressedSize, lineFromWords } from "./codec.ts";
import { WORDS_PER_LINE } from "./constants.ts";
import { IllegalStateError } from "./errors.ts";
import { validateNumericParameter } from "./utils.ts";

/** Word whose high 16 bits are `high` and low 16 bits are `low`. */
export function composeWord(high: number, low: number): number {
  return (((high & 0xffff) << 16) | (low & 0xffff)) >>> 0;
}

/**
 * Word that only shares its high half with `high`: it partially matches a
 * secret word with that high half and never matches one exactly.
 */
export function highProbeWord(high: number): number {
  return composeWord(high, 0);
}

/**
 * Literal that can never match any secret word: its high half has a zero
 * top byte, and secret bytes are non-zero.
 */
export function neutralWord(tag: number): number {
  validateNumericParameter(tag, "tag", 1, 0xff);
  return composeWord(tag, 0);
}

/**
 * Stand-in for a secret word that shares nothing with any probe: both
 * halves repeat a byte, which no candidate pair of distinct bytes does.
 */
export const UNMATCHED_STAND_INS: readonly number[] = Object.freeze([
  0xffff_0101, 0xfefe_0101,
]);

/** Low half used for "high half matches, low half does not" stand-ins. */
export const UNMATCHED_LOW = 0x0101;

/**
 * Lays out a probe prefix: the given words, then distinct neutral literals
 * up to `literalSlots`, then zero words up to `prefixWords`.
 */
export function buildPrefix(
  words: readonly number[],
  literalSlots: number,
  prefixWords: number,
): number[] {
  if (words.length > literalSlots || literalSlots > prefixWords) {
    throw new IllegalStateError("Probe words do not fit the prefix layout.");
  }
  const prefix = [...words];
  for (let tag = 1; prefix.length < literalSlots; tag++) {
    prefix.push(neutralWord(tag));
  }
  while (prefix.length < prefixWords) prefix.push(0);
  return prefix;
}

/**
 * A calibration line: `literals` distinct fresh words, then `lowBytes`
 * single-byte words, then zeros. Against an empty 16-entry dictionary it
 * compresses to `4 + 4 * literals + lowBytes` bytes.
 */
export function calibrationLine(
  literals: number,
  lowBytes: number,
): Uint8Array {
  if (literals < 0 || lowBytes < 0 || literals + lowBytes > WORDS_PER_LINE) {
    throw new IllegalStateError("Calibration line overflows 16 words.");
  }
  const words: number[] = [];
  for (let index = 0; index < literals; index++) {
    words.push(composeWord(0xf000 | (index + 1), 0x5aa5));
  }
  for (let index = 0; index < lowBytes; index++) words.push(0x7f);
  return lineFromWords(words);
}

/**
 * Every compressed size a calibration line can take, each mapped to the
 * first line found that reaches it.
 */
export function calibrationCatalog(
  dictionaryCapacity: number,
): ReadonlyMap<number, Uint8Array> {
  const catalog = new Map<number, Uint8Array>();
  for (let literals = 0; literals <= WORDS_PER_LINE; literals++) {
    for (let lowBytes = 0; literals + lowBytes <= WORDS_PER_LINE; lowBytes++) {
      const line = calibrationLine(literals, lowBytes);
      const size = compressedSize(line, dictionaryCapacity);
      if (!catalog.has(size)) catalog.set(size, line);
    }
  }
  return catalog;
}

/**
 * Splits `total` into `parts` catalog sizes, preferring the largest sizes
 * first so the split is deterministic. Returns undefined when no split
 * exists.
 */
export function splitCalibration(
  total: number,
  parts: number,
  sizes: readonly number[],
): readonly number[] | undefined {
  const descending = [...new Set(sizes)].sort((a, b) => b - a);
  const search = (
    remaining: number,
    left: number,
    ceiling: number,
  ): number[] | undefined => {
    if (left === 0) return remaining === 0 ? [] : undefined;
    for (const size of descending) {
      if (size > ceiling || size > remaining) continue;
      const rest = search(remaining - size, left - 1, size);
      if (rest !== undefined) return [size, ...rest];
    }
    return undefined;
  };
  return search(total, parts, Number.POSITIVE_INFINITY);
}
