// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Provides utilities for detecting the application environment.
 * @module
 */

export type EnvironmentName = "development" | "production";

export const environment = (() => {
  const cache = new Map<string, boolean>();
  // Mutable so callers can override detection during initialization or tests.
  // eslint-disable-next-line functional/no-let -- runtime mutability required for setExplicitEnv
  let explicitEnvironment: EnvironmentName | undefined;

  return {
    setExplicitEnv(environment_: EnvironmentName) {
      explicitEnvironment = environment_;
      cache.clear();
    },
    get isDevelopment() {
      if (explicitEnvironment !== undefined)
        return explicitEnvironment === "development";
      const cached = cache.get("isDevelopment");
      if (cached !== undefined) return cached;

      // Authoritative: NODE_ENV if present (case-insensitive)
      const nodeEnvironment =
        typeof process !== "undefined" ? process.env["NODE_ENV"] : undefined;
      const result =
        typeof nodeEnvironment === "string" &&
        ["development", "test"].includes(nodeEnvironment.trim().toLowerCase());
      cache.set("isDevelopment", result);
      return result;
    },
    get isProduction() {
      if (explicitEnvironment !== undefined)
        return explicitEnvironment === "production";
      // Reference the exported object, not `this`, so the getter survives extraction.
      return !environment.isDevelopment;
    },
    clearCache() {
      explicitEnvironment = undefined;
      cache.clear();
    },
  };
})();

/**
 * Returns `true` if the current environment is determined to be 'development'.
 */
export function isDevelopment(): boolean {
  return environment.isDevelopment;
}
