// SPDX-License-Identifier: MIT
// Re-export a small, guarded surface of test-only helpers for harnesses that
// need to look behind the attacker's back. Each helper asserts the test-API
// guard itself, so importing this module is harmless in production.

export { _inspectVictimForTests } from "./victim-buffer.ts";
export type { VictimInspection } from "./victim-buffer.ts";
export { _resetConfigForTests } from "./config.ts";
