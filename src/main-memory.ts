// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

import { LINE_SIZE_BYTES } from "./constants.ts";
import { InvalidParameterError } from "./errors.ts";
import { secureWipe } from "./utils.ts";

/**
 * Line-addressable backing store with unbounded capacity. Lines that were
 * never written read back as zeros; callers always receive copies.
 */
export class MainMemory {
  readonly #lines = new Map<number, Uint8Array>();

  readLine(lineNumber: number): Uint8Array {
    assertLineNumber(lineNumber);
    const stored = this.#lines.get(lineNumber);
    return stored ? stored.slice() : new Uint8Array(LINE_SIZE_BYTES);
  }

  writeLine(lineNumber: number, bytes: Uint8Array): void {
    assertLineNumber(lineNumber);
    if (bytes.length !== LINE_SIZE_BYTES) {
      throw new InvalidParameterError(
        `A line must be exactly ${String(LINE_SIZE_BYTES)} bytes.`,
      );
    }
    const existing = this.#lines.get(lineNumber);
    if (existing) {
      existing.set(bytes);
      return;
    }
    this.#lines.set(lineNumber, bytes.slice());
  }

  hasLine(lineNumber: number): boolean {
    return this.#lines.has(lineNumber);
  }

  get storedLineCount(): number {
    return this.#lines.size;
  }

  /** Zeroes and forgets every stored line; called at trial teardown. */
  clear(): void {
    for (const bytes of this.#lines.values()) secureWipe(bytes);
    this.#lines.clear();
  }
}

export function assertLineNumber(lineNumber: number): void {
  if (!Number.isSafeInteger(lineNumber) || lineNumber < 0) {
    throw new InvalidParameterError(
      "lineNumber must be a non-negative safe integer.",
    );
  }
}
