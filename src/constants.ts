// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Project-wide immutable constants: the fixed geometry of lines and words,
 * the codec's bit-cost table and the logging caps.
 */

// --- Line geometry ---
/** Bytes per cache line. */
export const LINE_SIZE_BYTES = 64;
/** Bytes per codec word. */
export const WORD_SIZE_BYTES = 4;
export const WORDS_PER_LINE = LINE_SIZE_BYTES / WORD_SIZE_BYTES;

// --- Codec bit costs ---
export const PATTERN_PREFIX_BITS = 2;
export const DICTIONARY_INDEX_BITS = 4;
/** Hard ceiling on dictionary size: an index must fit in DICTIONARY_INDEX_BITS. */
export const MAX_DICTIONARY_CAPACITY = 1 << DICTIONARY_INDEX_BITS;

export const PATTERN_COST_BITS = Object.freeze({
  zero: PATTERN_PREFIX_BITS,
  dictionary: PATTERN_PREFIX_BITS + DICTIONARY_INDEX_BITS,
  "low-byte": PATTERN_PREFIX_BITS + 8,
  "partial-dictionary": PATTERN_PREFIX_BITS + DICTIONARY_INDEX_BITS + 16,
  literal: PATTERN_PREFIX_BITS + 32,
} as const);

/** Worst-case compressed size of one line: every word a fresh literal. */
export const MAX_COMPRESSED_LINE_BYTES = Math.ceil(
  (WORDS_PER_LINE * PATTERN_COST_BITS.literal) / 8,
);

// --- Victim layout ---
export const VICTIM_BUFFER_SIZE_BYTES = 256;
export const SUPPORTED_SECRET_LENGTHS = Object.freeze([4, 8] as const);
export type SecretLength = (typeof SUPPORTED_SECRET_LENGTHS)[number];

// --- Logging / error caps ---
export const MAX_ERROR_MESSAGE_LENGTH = 256;
export const MAX_LOG_MESSAGE_LENGTH = 512;
export const MAX_TOTAL_STACK_LENGTH = 64 * 1024;
