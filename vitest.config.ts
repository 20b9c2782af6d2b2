import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    environment: "node",
    // PGlite boots a fresh WASM Postgres per test file
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
});
