import { describe, it, expect } from "vitest";
import {
  buildPrefix,
  calibrationCatalog,
  calibrationLine,
  composeWord,
  highProbeWord,
  neutralWord,
  splitCalibration,
} from "../../src/attack-strings.ts";
import { compressedSize } from "../../src/codec.ts";
import { IllegalStateError, InvalidParameterError } from "../../src/errors.ts";

describe("attack strings", () => {
  it("composes words from their halves", () => {
    expect(composeWord(0x1234, 0xabcd)).toBe(0x1234abcd);
    expect(composeWord(0xffff, 0x0101)).toBe(0xffff0101);
    expect(highProbeWord(0x4433)).toBe(0x44330000);
  });

  it("builds neutral literals with a zero top byte", () => {
    expect(neutralWord(1)).toBe(0x00010000);
    expect(() => neutralWord(0)).toThrow(InvalidParameterError);
  });

  it("pads a prefix with neutrals and then zeros", () => {
    expect(buildPrefix([0x44330000], 3, 5)).toEqual([
      0x44330000, 0x00010000, 0x00020000, 0, 0,
    ]);
    expect(() => buildPrefix([1, 2], 1, 5)).toThrow(IllegalStateError);
  });

  it("calibration lines compress to 4 + 4 * literals + lowBytes bytes", () => {
    expect(compressedSize(calibrationLine(0, 0), 16)).toBe(4);
    expect(compressedSize(calibrationLine(3, 5), 16)).toBe(21);
    expect(compressedSize(calibrationLine(16, 0), 16)).toBe(68);
    expect(() => calibrationLine(10, 7)).toThrow(IllegalStateError);
  });

  it("catalogs every reachable calibration size", () => {
    const catalog = calibrationCatalog(16);
    const sizes = Array.from(catalog.keys()).sort((a, b) => a - b);
    const expected = [
      ...Array.from({ length: 59 }, (_, i) => i + 4),
      64,
      65,
      68,
    ];
    expect(sizes).toEqual(expected);
    for (const [size, line] of catalog) {
      expect(compressedSize(line, 16)).toBe(size);
    }
  });

  it("splits a calibration total largest-first", () => {
    const sizes = Array.from(calibrationCatalog(16).keys());
    expect(splitCalibration(189, 3, sizes)).toEqual([68, 68, 53]);
    expect(splitCalibration(191, 3, sizes)).toEqual([68, 68, 55]);
    expect(splitCalibration(8, 2, [4])).toEqual([4, 4]);
    expect(splitCalibration(9, 2, [4])).toBeUndefined();
  });
});
