import { describe, it, expect, vi, afterEach } from "vitest";
import {
  assertTestApiAllowed,
  TEST_API_ENV_FLAG,
  TEST_API_GLOBAL_FLAG,
} from "../../src/development-guards.ts";
import { InvalidConfigurationError } from "../../src/errors.ts";
import { environment } from "../../src/environment.ts";

describe("development-guards", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    Reflect.deleteProperty(globalThis, TEST_API_GLOBAL_FLAG);
    environment.clearCache();
  });

  it("does not throw outside production", () => {
    environment.setExplicitEnv("development");
    expect(() => assertTestApiAllowed()).not.toThrow();
  });

  it("throws in production without an explicit opt-in", () => {
    environment.setExplicitEnv("production");
    vi.stubEnv(TEST_API_ENV_FLAG, "false");
    expect(() => assertTestApiAllowed()).toThrow(InvalidConfigurationError);
  });

  it("allows production use through the environment flag", () => {
    environment.setExplicitEnv("production");
    vi.stubEnv(TEST_API_ENV_FLAG, "true");
    expect(() => assertTestApiAllowed()).not.toThrow();
  });

  it("allows production use through the global flag", () => {
    environment.setExplicitEnv("production");
    vi.stubEnv(TEST_API_ENV_FLAG, "false");
    Reflect.set(globalThis, TEST_API_GLOBAL_FLAG, true);
    expect(() => assertTestApiAllowed()).not.toThrow();
  });
});
