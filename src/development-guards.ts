// SPDX-License-Identifier: MIT
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Runtime guards for test-only APIs. They stop harness helpers (such as the
 * secret inspector) from being used when a production build ends up running.
 */
import { environment } from "./environment.ts";
import { InvalidConfigurationError } from "./errors.ts";

export const TEST_API_ENV_FLAG = "CACHE_SIM_ALLOW_TEST_APIS";
export const TEST_API_GLOBAL_FLAG = "__CACHE_SIM_ALLOW_TEST_APIS";

function globalFlagSet(): boolean {
  return Reflect.get(globalThis, TEST_API_GLOBAL_FLAG) === true;
}

export function assertTestApiAllowed(): void {
  // If we're not in production, it's always allowed.
  if (!environment.isProduction) return;

  // Allow explicit opt-in via env var or a global token.
  const environmentAllow =
    typeof process !== "undefined" &&
    process.env[TEST_API_ENV_FLAG] === "true";
  if (environmentAllow || globalFlagSet()) return;

  throw new InvalidConfigurationError(
    `Test-only APIs are disabled in production. Set ${TEST_API_ENV_FLAG}=true or set globalThis.${TEST_API_GLOBAL_FLAG} = true to explicitly allow.`,
  );
}
