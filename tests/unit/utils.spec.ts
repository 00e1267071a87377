import { describe, it, expect, vi, afterEach } from "vitest";
import { setLoggingConfig, _resetConfigForTests } from "../../src/config.ts";
import { environment } from "../../src/environment.ts";
import { InvalidParameterError } from "../../src/errors.ts";
import {
  _redact,
  sanitizeComponentName,
  sanitizeLogMessage,
  secureCompareBytes,
  secureDevLog,
  secureWipe,
  validateByte,
  validateNumericParameter,
} from "../../src/utils.ts";

describe("utils", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    environment.clearCache();
    _resetConfigForTests();
  });

  it("validates integer ranges", () => {
    expect(() => validateNumericParameter(3, "n", 1, 5)).not.toThrow();
    expect(() => validateNumericParameter(6, "n", 1, 5)).toThrow(
      "[cache-sim] n must be an integer between 1 and 5.",
    );
    expect(() => validateNumericParameter(2.5, "n", 1, 5)).toThrow(InvalidParameterError);
    expect(() => validateByte(-1)).toThrow(InvalidParameterError);
  });

  it("compares byte arrays including their length", () => {
    expect(secureCompareBytes(Uint8Array.from([1, 2]), Uint8Array.from([1, 2]))).toBe(true);
    expect(secureCompareBytes(Uint8Array.from([1, 2]), Uint8Array.from([1, 3]))).toBe(false);
    expect(secureCompareBytes(Uint8Array.from([1, 2]), Uint8Array.from([1, 2, 0]))).toBe(
      false,
    );
  });

  it("wipes buffers", () => {
    const buffer = Uint8Array.from([1, 2, 3]);
    expect(secureWipe(buffer)).toBe(true);
    expect(Array.from(buffer)).toEqual([0, 0, 0]);
    expect(secureWipe(undefined)).toBe(true);
  });

  it("redacts secret-bearing keys and byte views", () => {
    expect(
      _redact({
        secret: [1, 2],
        guess: "x",
        probes: 3,
        nested: { recovered: 1, phase: "probing", raw: new Uint8Array(2) },
      }),
    ).toEqual({
      secret: "[REDACTED]",
      guess: "[REDACTED]",
      probes: 3,
      nested: { recovered: "[REDACTED]", phase: "probing", raw: "[REDACTED]" },
    });
    expect(_redact({ a: { b: { c: { d: { e: 1 } } } } })).toEqual({
      a: { b: { c: { d: "[Depth limit]" } } },
    });
  });

  it("sanitizes messages and component names", () => {
    expect(sanitizeLogMessage("a\nb\u0000c")).toBe("a b c");
    expect(sanitizeLogMessage("x".repeat(600))).toBe(`${"x".repeat(512)}...[TRUNC]`);
    expect(sanitizeComponentName("trial:victim")).toBe("trial:victim");
    expect(sanitizeComponentName("bad name!")).toBe("unsafe-component-name");
  });

  it("writes one redacted line per enabled message", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    secureDevLog("warn", "victim", "denied\nwrite", { secret: new Uint8Array(4), offset: 3 });
    secureDevLog("debug", "victim", "dropped at the default level");
    expect(warn).toHaveBeenCalledWith(
      '[WARN] (victim) denied write | context={"secret":"[REDACTED]","offset":3}',
    );
    expect(debug).not.toHaveBeenCalled();

    secureDevLog("debug", "victim", "per-call level", undefined, { minLevel: "debug" });
    expect(debug).toHaveBeenCalledWith("[DEBUG] (victim) per-call level");

    setLoggingConfig({ minLevel: "debug" });
    secureDevLog("debug", "victim", "now visible");
    expect(debug).toHaveBeenCalledWith("[DEBUG] (victim) now visible");
  });

  it("stays silent in production", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    environment.setExplicitEnv("production");
    secureDevLog("error", "trial", "hidden");
    expect(error).not.toHaveBeenCalled();
  });
});
