// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

import { IllegalStateError, InvalidParameterError } from "./errors.ts";
import { validateByte, validateNumericParameter } from "./utils.ts";

/**
 * Per-position candidate sets for the bytes of a secret. Every position
 * starts as 1..255; assigning a value to one position removes it from all
 * others, since secret bytes are pairwise distinct and non-zero.
 */
export class SecretKnowledge {
  readonly #candidates: Set<number>[];

  constructor(length: number) {
    validateNumericParameter(length, "length", 1, 255);
    this.#candidates = Array.from(
      { length },
      () => new Set(Array.from({ length: 255 }, (_, index) => index + 1)),
    );
  }

  get length(): number {
    return this.#candidates.length;
  }

  #at(position: number): Set<number> {
    const set = this.#candidates[position];
    if (set === undefined) {
      throw new InvalidParameterError(
        `position ${String(position)} is outside a ${String(this.length)}-byte secret.`,
      );
    }
    return set;
  }

  /** Remaining candidates at `position`, ascending. */
  candidatesAt(position: number): readonly number[] {
    return Array.from(this.#at(position)).sort((a, b) => a - b);
  }

  admits(position: number, value: number): boolean {
    return this.#at(position).has(value);
  }

  /**
   * Whether `low` at `lowPosition` and `high` at `highPosition` can both
   * still hold at once.
   */
  admitsPair(
    lowPosition: number,
    highPosition: number,
    low: number,
    high: number,
  ): boolean {
    return (
      low !== high &&
      this.admits(lowPosition, low) &&
      this.admits(highPosition, high)
    );
  }

  isResolved(position: number): boolean {
    return this.#at(position).size === 1;
  }

  valueAt(position: number): number | undefined {
    const set = this.#at(position);
    if (set.size !== 1) return undefined;
    const [value] = set;
    return value;
  }

  assign(position: number, value: number): void {
    validateByte(value, "value");
    const set = this.#at(position);
    if (!set.has(value)) {
      throw new IllegalStateError(
        `Observations contradict earlier pruning at position ${String(position)}.`,
      );
    }
    set.clear();
    set.add(value);
    this.#candidates.forEach((other, index) => {
      if (index !== position) other.delete(value);
    });
  }

  isComplete(): boolean {
    return this.#candidates.every((set) => set.size === 1);
  }

  toBytes(): Uint8Array {
    if (!this.isComplete()) {
      throw new IllegalStateError("Secret is not fully resolved.");
    }
    return Uint8Array.from(this.#candidates, (set) => {
      const [value] = set;
      return value ?? 0;
    });
  }
}
