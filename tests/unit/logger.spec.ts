import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createLogger } from "../../src/logger.ts";
import { environment } from "../../src/environment.ts";

// Mock secureDevLog to verify it's called
vi.mock("../../src/utils.ts", () => ({
  secureDevLog: vi.fn(),
  isLogLevelEnabled: vi.fn(
    (level: string, minLevel = "warn") =>
      ["debug", "info", "warn", "error"].indexOf(level) >=
      ["debug", "info", "warn", "error"].indexOf(minLevel),
  ),
}));

describe("logger", () => {
  beforeEach(() => {
    environment.setExplicitEnv("development");
  });

  afterEach(() => {
    environment.clearCache();
    vi.clearAllMocks();
  });

  it("forwards enabled levels to secureDevLog with its component", async () => {
    const { secureDevLog } = await import("../../src/utils.ts");
    const logger = createLogger("cache-set", { minLevel: "debug" });

    logger.debug("debug message", { probes: 1 });
    expect(secureDevLog).toHaveBeenCalledWith(
      "debug",
      "cache-set",
      "debug message",
      { probes: 1 },
      { minLevel: "debug" },
    );
    logger.error("error message");
    expect(secureDevLog).toHaveBeenCalledWith(
      "error",
      "cache-set",
      "error message",
      undefined,
      { minLevel: "debug" },
    );
  });

  it("drops levels below the configured minimum before forwarding", async () => {
    const { secureDevLog } = await import("../../src/utils.ts");
    const logger = createLogger("victim");
    expect(logger.isEnabled("info")).toBe(false);
    expect(logger.isEnabled("warn")).toBe(true);

    logger.info("quiet");
    expect(secureDevLog).not.toHaveBeenCalled();
    logger.warn("warn message");
    expect(secureDevLog).toHaveBeenCalledWith("warn", "victim", "warn message", undefined);
  });

  it("child loggers prefix the component name", async () => {
    const { secureDevLog } = await import("../../src/utils.ts");
    createLogger("trial", { minLevel: "info" }).child("victim").child("io").info("hello");
    expect(secureDevLog).toHaveBeenCalledWith("info", "trial:victim:io", "hello", undefined, {
      minLevel: "info",
    });
  });

  it("drops everything in production", async () => {
    const { secureDevLog } = await import("../../src/utils.ts");
    environment.setExplicitEnv("production");
    const logger = createLogger("attacker");
    logger.error("nope");
    expect(secureDevLog).not.toHaveBeenCalled();
    expect(logger.isEnabled("error")).toBe(false);
  });
});
