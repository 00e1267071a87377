import { describe, it, expect } from "vitest";
import fc from "fast-check";
import {
  compress,
  compressedBits,
  compressedSize,
  decompress,
  lineFromWords,
  readWord,
  wordsOf,
  writeWord,
  WordDictionary,
  type CompressedLine,
} from "../../src/codec.ts";
import { InvalidParameterError } from "../../src/errors.ts";

function distinctLiteralLine(): Uint8Array {
  return lineFromWords(
    Array.from({ length: 16 }, (_, i) => (((0x80 + i) << 24) | 0x1234) >>> 0),
  );
}

describe("codec", () => {
  describe("word helpers", () => {
    it("reads words little-endian", () => {
      const line = new Uint8Array(64);
      line.set([0x78, 0x56, 0x34, 0x12], 4);
      expect(readWord(line, 1)).toBe(0x12345678);
    });

    it("writeWord and lineFromWords place the high half in bytes 2 and 3", () => {
      const line = new Uint8Array(64);
      writeWord(line, 0, 0xaabbccdd);
      expect(Array.from(line.subarray(0, 4))).toEqual([0xdd, 0xcc, 0xbb, 0xaa]);
      expect(Array.from(lineFromWords([0xaabbccdd]).subarray(0, 4))).toEqual([
        0xdd, 0xcc, 0xbb, 0xaa,
      ]);
    });

    it("wordsOf returns sixteen unsigned words", () => {
      const words = wordsOf(lineFromWords([0xffffffff, 1]));
      expect(words).toHaveLength(16);
      expect(words[0]).toBe(0xffffffff);
      expect(words[1]).toBe(1);
      expect(words[15]).toBe(0);
    });

    it("rejects more than sixteen words", () => {
      expect(() => lineFromWords(new Array<number>(17).fill(0))).toThrow(
        InvalidParameterError,
      );
    });
  });

  describe("WordDictionary", () => {
    it("evicts the oldest entry once full and keeps slots stable", () => {
      const dictionary = new WordDictionary(2);
      expect(dictionary.insert(0x11110000)).toBe(0);
      expect(dictionary.insert(0x22220000)).toBe(1);
      expect(dictionary.insert(0x33330000)).toBe(0);
      expect(dictionary.entries()).toEqual([0x33330000, 0x22220000]);
      expect(dictionary.indexOf(0x11110000)).toBe(-1);
      expect(dictionary.indexOf(0x22220000)).toBe(1);
      expect(dictionary.indexOfHigh(0x3333)).toBe(0);
      expect(dictionary.size).toBe(2);
    });

    it("clear empties every slot", () => {
      const dictionary = new WordDictionary(4);
      dictionary.insert(7);
      dictionary.clear();
      expect(dictionary.size).toBe(0);
      expect(dictionary.entryAt(0)).toBeUndefined();
    });

    it("rejects capacities whose index would not fit in four bits", () => {
      expect(() => new WordDictionary(0)).toThrow(InvalidParameterError);
      expect(() => new WordDictionary(17)).toThrow(InvalidParameterError);
    });
  });

  describe("compress", () => {
    it("encodes an all-zero line in 32 bits", () => {
      const compressed = compress(new Uint8Array(64));
      expect(compressed.bits).toBe(32);
      expect(compressed.bytes).toBe(4);
      expect(compressed.words.every((w) => w.pattern === "zero")).toBe(true);
    });

    it("encodes sixteen distinct literals in 544 bits", () => {
      const compressed = compress(distinctLiteralLine());
      expect(compressed.bits).toBe(544);
      expect(compressed.bytes).toBe(68);
    });

    it("picks the first matching pattern per word", () => {
      const line = lineFromWords([0x12345678, 0x12345678, 0xab, 0x1234abcd]);
      const compressed = compress(line);
      expect(compressed.words.slice(0, 4)).toEqual([
        { pattern: "literal", word: 0x12345678 },
        { pattern: "dictionary", index: 0 },
        { pattern: "low-byte", value: 0xab },
        { pattern: "partial-dictionary", index: 0, low: 0xabcd },
      ]);
      // 34 + 6 + 10 + 22 + 12 zero words
      expect(compressed.bits).toBe(96);
      expect(compressed.bytes).toBe(12);
    });

    it("treats a word with a non-zero second byte as a literal, not low-byte", () => {
      const compressed = compress(lineFromWords([0x0000ff00]));
      expect(compressed.words[0]).toEqual({ pattern: "literal", word: 0xff00 });
    });

    it("only inserts literals into the dictionary", () => {
      const dictionary = new WordDictionary(16);
      compress(lineFromWords([0x12345678, 0x12345678, 0xab, 0x1234abcd]), dictionary);
      expect(dictionary.entries()).toEqual([0x12345678]);
    });

    it("rounds byte size up", () => {
      expect(compressedBits(lineFromWords([0x7f]))).toBe(40);
      expect(compressedSize(lineFromWords([0x7f]))).toBe(5);
      expect(compressedSize(lineFromWords([0x11000000]))).toBe(8);
      expect(compressedSize(lineFromWords([0x11000000, 0x22000000]))).toBe(12);
    });

    it("rejects buffers that are not 64 bytes", () => {
      expect(() => compress(new Uint8Array(63))).toThrow(InvalidParameterError);
    });
  });

  describe("decompress", () => {
    it("rejects a compressed line with the wrong word count", () => {
      const compressed = compress(new Uint8Array(64));
      const truncated: CompressedLine = {
        ...compressed,
        words: compressed.words.slice(1),
      };
      expect(() => decompress(truncated)).toThrow(InvalidParameterError);
    });

    it("rejects an index into an empty dictionary slot", () => {
      const compressed = compress(new Uint8Array(64));
      const broken: CompressedLine = {
        ...compressed,
        words: [{ pattern: "dictionary", index: 3 }, ...compressed.words.slice(1)],
      };
      expect(() => decompress(broken)).toThrow(InvalidParameterError);
    });

    it("inverts compress for every line and dictionary capacity", () => {
      const pool = [0x12345678, 0x1234ffff, 0xdead0001, 0xdeadbeef];
      const word = fc.oneof(
        fc.constant(0),
        fc.integer({ min: 0, max: 0xff }),
        fc.constantFrom(...pool),
        fc.integer({ min: 0, max: 0xffffffff }),
      );
      fc.assert(
        fc.property(
          fc.array(word, { minLength: 16, maxLength: 16 }),
          fc.integer({ min: 1, max: 16 }),
          (words, capacity) => {
            const line = lineFromWords(words);
            const compressed = compress(line, new WordDictionary(capacity));
            expect(decompress(compressed)).toEqual(line);
          },
        ),
        { numRuns: 300 },
      );
    });

    it("inverts compress for arbitrary bytes", () => {
      fc.assert(
        fc.property(fc.uint8Array({ minLength: 64, maxLength: 64 }), (line) => {
          expect(decompress(compress(line))).toEqual(line);
        }),
        { numRuns: 200 },
      );
    });
  });
});
