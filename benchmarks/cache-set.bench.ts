import { Bench } from "tinybench";
import { CompressedCacheSet } from "../src/cache-set.ts";
import { compress, lineFromWords, WordDictionary } from "../src/codec.ts";
import { MainMemory } from "../src/main-memory.ts";

// Simple tinybench microbenchmark for the codec and the compressed cache set.
// Measures compression of typical lines and the per-access cost of the set.

function nowMs() {
  return typeof performance !== "undefined" ? performance.now() : Date.now();
}

async function main() {
  // Configure iterations explicitly for stable output
  const bench = new Bench({ now: nowMs, iterations: 2000 });

  const literalLine = lineFromWords(
    Array.from({ length: 16 }, (_, i) => ((0x80 + i) << 24 | 0x1234) >>> 0),
  );
  const mixedLine = lineFromWords([
    0x12345678, 0x12345678, 0xab, 0x1234abcd, 0, 0, 0x7f, 0xdeadbeef,
  ]);
  const dictionary = new WordDictionary(16);

  bench.add("compress (16 literals)", () => {
    dictionary.clear();
    compress(literalLine, dictionary);
  });

  bench.add("compress (mixed patterns)", () => {
    dictionary.clear();
    compress(mixedLine, dictionary);
  });

  const memory = new MainMemory();
  for (let line = 0; line < 32; line++) memory.writeLine(line, literalLine);
  const cache = new CompressedCacheSet({
    memory,
    associativity: 8,
    linesPerSuperblock: 4,
    superblockBudgetBytes: 256,
    dictionaryCapacity: 16,
  });
  let cursor = 0;

  bench.add("cache read (hit)", () => {
    cache.read(0);
  });

  bench.add("cache read (streaming misses)", () => {
    cursor = (cursor + 1) % 32;
    cache.read(cursor * 64);
  });

  bench.add("cache write (hit, recompress)", () => {
    cache.write(5, cursor & 0xff);
  });

  console.log("Warming up and running tinybench...");
  await bench.run();
  console.table(bench.table());
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
