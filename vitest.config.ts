import { defineConfig } from "vitest/config";

// End-to-end attack runs sweep tens of thousands of probes; allow override per machine.
const ATTACK_TEST_TIMEOUT = Number(
  process.env["VITEST_ATTACK_TEST_TIMEOUT"] ?? "120000",
);

export default defineConfig({
  test: {
    pool: "threads",
    globals: true,
    coverage: {
      provider: "v8" as const,
      reporter: ["text", "lcov"],
      include: ["src/**"],
      exclude: ["**/*.d.ts", "**/*.config.*", "dist/**", "tests/**"],
    },
    projects: [
      {
        extends: true,
        test: {
          name: "node",
          globals: true,
          environment: "node",
          include: ["tests/unit/**/*.{test,spec}.ts"],
        },
      },
      {
        extends: true,
        test: {
          name: "attack",
          globals: true,
          environment: "node",
          include: ["tests/integration/**/*.{test,spec}.ts"],
          testTimeout: ATTACK_TEST_TIMEOUT,
          hookTimeout: ATTACK_TEST_TIMEOUT,
        },
      },
    ],
  },
  define: {
    "process.env.NODE_ENV": JSON.stringify("test"),
    "process.env.CACHE_SIM_ALLOW_TEST_APIS": JSON.stringify("true"),
  },
});
