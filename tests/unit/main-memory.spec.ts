import { describe, it, expect } from "vitest";
import { InvalidParameterError } from "../../src/errors.ts";
import { MainMemory } from "../../src/main-memory.ts";

describe("MainMemory", () => {
  it("reads never-written lines as zeros", () => {
    const memory = new MainMemory();
    expect(memory.readLine(123)).toEqual(new Uint8Array(64));
    expect(memory.hasLine(123)).toBe(false);
  });

  it("stores and returns copies", () => {
    const memory = new MainMemory();
    const line = new Uint8Array(64).fill(7);
    memory.writeLine(2, line);
    line[0] = 0;

    const read = memory.readLine(2);
    expect(read[0]).toBe(7);
    read[1] = 0;
    expect(memory.readLine(2)[1]).toBe(7);
    expect(memory.storedLineCount).toBe(1);
  });

  it("rejects malformed lines and line numbers", () => {
    const memory = new MainMemory();
    expect(() => memory.writeLine(0, new Uint8Array(32))).toThrow(InvalidParameterError);
    expect(() => memory.readLine(-1)).toThrow(InvalidParameterError);
    expect(() => memory.readLine(0.5)).toThrow(InvalidParameterError);
  });

  it("clear wipes every stored line", () => {
    const memory = new MainMemory();
    memory.writeLine(0, new Uint8Array(64).fill(1));
    memory.clear();
    expect(memory.storedLineCount).toBe(0);
    expect(memory.readLine(0)).toEqual(new Uint8Array(64));
  });
});
