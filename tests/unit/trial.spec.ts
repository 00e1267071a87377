import { describe, it, expect, vi } from "vitest";
import { InvalidConfigurationError } from "../../src/errors.ts";
import { sequenceSecretGenerator } from "../../src/secret-generator.ts";
import { initialize } from "../../src/trial.ts";
import type { EvictedLine } from "../../src/cache-set.ts";

describe("initialize", () => {
  it("rejects unsupported secret lengths before building anything", () => {
    for (const length of [0, 3, 5, 16]) {
      expect(() => initialize(length, sequenceSecretGenerator([]))).toThrow(
        InvalidConfigurationError,
      );
    }
  });

  it("wires a victim and an idle attacker around one cache", () => {
    const trial = initialize(4, sequenceSecretGenerator([9, 8, 7, 6]));
    expect(trial.victim.secretLength).toBe(4);
    expect(trial.victim.baseAddress).toBe(0x1_0000);
    expect(trial.attacker.phase).toBe("idle");
    expect(trial.cache.associativity).toBe(8);
    expect(trial.cache.isResident(0x403)).toBe(true);
    trial.dispose();
  });

  it("dispose flushes, wipes memory and disposes the victim once", () => {
    const evicted: EvictedLine[] = [];
    const trial = initialize(8, sequenceSecretGenerator([1, 2, 3, 4, 5, 6, 7, 8]), {
      onEvict: (line) => evicted.push(line),
    });
    trial.dispose();
    trial.dispose();
    expect(evicted).toEqual([
      { lineNumber: 0x403, superblock: 0x100, compressedBytes: 12, dirty: true, reason: "flush" },
    ]);
    expect(trial.memory.storedLineCount).toBe(0);
    expect(trial.cache.getStats().residentLines).toBe(0);
    expect(trial.victim.disposed).toBe(true);
  });

  it("logs at the requested verbosity without touching the global level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const quiet = initialize(4, sequenceSecretGenerator([1, 2, 3, 4]));
    expect(debug).not.toHaveBeenCalled();
    quiet.dispose();

    const verbose = initialize(4, sequenceSecretGenerator([1, 2, 3, 4]), {
      verbosity: "debug",
    });
    expect(debug).toHaveBeenCalledWith(
      '[DEBUG] (trial) Trial initialised | context={"secretLength":4}',
    );
    verbose.dispose();
    debug.mockRestore();
  });
});
