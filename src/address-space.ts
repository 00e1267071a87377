// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

import {
  assertAddress,
  type AccessResult,
  type CompressedCacheSet,
} from "./cache-set.ts";
import { InvalidParameterError } from "./errors.ts";
import { validateNumericParameter } from "./utils.ts";

/**
 * A window onto the shared cache that only admits addresses inside
 * `[base, base + length)`. The attacker is handed one of these instead of
 * the cache itself, so it can never touch victim lines directly.
 */
export type AddressSpacePort = {
  readonly base: number;
  readonly length: number;
  read(address: number): AccessResult;
  write(address: number, byte: number): AccessResult;
};

export function createAddressSpacePort(
  cache: CompressedCacheSet,
  base: number,
  length: number,
): AddressSpacePort {
  assertAddress(base);
  validateNumericParameter(length, "length", 1, Number.MAX_SAFE_INTEGER - base);

  const check = (address: number): void => {
    assertAddress(address);
    if (address < base || address >= base + length) {
      throw new InvalidParameterError(
        `address 0x${address.toString(16)} is outside this port's region.`,
      );
    }
  };

  return Object.freeze({
    base,
    length,
    read(address: number): AccessResult {
      check(address);
      return cache.read(address);
    },
    write(address: number, byte: number): AccessResult {
      check(address);
      return cache.write(address, byte);
    },
  });
}
