import { defineConfig } from "tsup";

export default defineConfig([
  // Main entry point
  {
    entry: ["src/index.ts"],
    format: ["esm", "cjs"],
    dts: true,
    sourcemap: true,
    clean: true,
    outDir: "dist",
    // Disable code splitting to keep modules intact for tree-shaking
    splitting: false,
    // Ensure modern extensions: .mjs for esm, .cjs for cjs
    outExtension({ format }) {
      if (format === "cjs") return { js: ".cjs" };
      if (format === "esm") return { js: ".mjs" };
      return { js: ".js" };
    },
  },
  // Test internals (for harness and test use only)
  {
    entry: ["src/test-internals.ts"],
    format: ["esm", "cjs"],
    // Do not emit d.ts for test-only builds (avoid conflicts)
    dts: false,
    sourcemap: true,
    outDir: "dist",
    splitting: false,
    outExtension({ format }) {
      if (format === "cjs") return { js: ".cjs" };
      if (format === "esm") return { js: ".mjs" };
      return { js: ".js" };
    },
  },
]);
