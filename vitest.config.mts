// vitest.config.mts
//
// Vitest configuration for jsondescent.
// - TypeScript-first, Node environment
// - Coverage tuned for a library

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Use global test functions (describe, it, expect, etc.)
    globals: true,

    environment: "node",

    include: ["tests/**/*.spec.ts", "tests/**/*.test.ts"],

    exclude: [
      "node_modules",
      "dist",
      "coverage",
      "examples/**",
      "benchmarks/**",
    ],

    coverage: {
      provider: "v8",
      reportsDirectory: "coverage",
      reporter: ["text", "html", "lcov"],

      include: ["src/**/*.ts"],

      exclude: [
        "src/**/*.d.ts",
        "src/index.ts", // re-exports
      ],

      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },

    clearMocks: true,
    restoreMocks: true,
  },
});
