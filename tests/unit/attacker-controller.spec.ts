import { describe, it, expect, vi } from "vitest";
import { createAddressSpacePort } from "../../src/address-space.ts";
import { AttackerController } from "../../src/attacker-controller.ts";
import { CompressedCacheSet } from "../../src/cache-set.ts";
import { IllegalStateError, InvalidParameterError } from "../../src/errors.ts";
import type { Logger } from "../../src/logger.ts";
import { MainMemory } from "../../src/main-memory.ts";
import type { VictimInterface } from "../../src/victim-buffer.ts";

function silentLogger(): Logger {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    isEnabled: () => false,
    child: () => logger,
  };
  return logger;
}

function fakeVictim(overrides: Partial<VictimInterface> = {}): VictimInterface {
  return {
    size: 256,
    secretLength: 4,
    read: () => ({ status: "ok", value: 0 }),
    write: () => ({ status: "ok" }),
    verifyGuess: () => false,
    ...overrides,
  };
}

function makePort(length = 512, base = 0x2_0000) {
  const cache = new CompressedCacheSet({
    memory: new MainMemory(),
    associativity: 8,
    linesPerSuperblock: 4,
    superblockBudgetBytes: 256,
    dictionaryCapacity: 16,
  });
  return createAddressSpacePort(cache, base, length);
}

describe("AttackerController", () => {
  it("starts idle with empty logs", () => {
    const attacker = new AttackerController(fakeVictim(), makePort());
    expect(attacker.phase).toBe("idle");
    expect(attacker.phaseHistory).toEqual([]);
    expect(attacker.observations).toEqual([]);
  });

  it("requires a victim spanning exactly one superblock", () => {
    expect(() => new AttackerController(fakeVictim({ size: 128 }), makePort())).toThrow(
      InvalidParameterError,
    );
  });

  it("requires one attacker line per way", () => {
    expect(() => new AttackerController(fakeVictim(), makePort(448))).toThrow(
      InvalidParameterError,
    );
  });

  it("requires a line-aligned attacker region", () => {
    expect(
      () => new AttackerController(fakeVictim(), makePort(512, 0x2_0004)),
    ).toThrow(InvalidParameterError);
  });

  it("fails and stays failed when the victim refuses a calibration write", () => {
    const logger = silentLogger();
    const attacker = new AttackerController(
      fakeVictim({ write: () => ({ status: "denied" }) }),
      makePort(),
      { logger },
    );
    expect(() => attacker.run()).toThrow(IllegalStateError);
    expect(attacker.phase).toBe("failed");
    expect(attacker.phaseHistory).toEqual(["priming", "failed"]);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(() => attacker.run()).toThrow("[cache-sim] An attacker controller runs only once.");
  });
});
