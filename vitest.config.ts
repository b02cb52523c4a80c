// =============================================================================
// Vitest Configuration
// https://vitest.dev/config/
// =============================================================================

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // =========================================================================
    // Environment Configuration
    // =========================================================================
    environment: "node",
    globals: true,

    // =========================================================================
    // Test File Patterns
    // =========================================================================
    include: ["tests/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist", "coverage", "results"],

    // =========================================================================
    // Timeouts
    // =========================================================================
    testTimeout: 10000,
    hookTimeout: 10000,

    // =========================================================================
    // Coverage Configuration
    // Off by default; `npm run test:coverage` turns it on.
    // =========================================================================
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["text", "json", "lcov"],
      reportsDirectory: "./coverage",

      include: ["src/**/*.ts"],

      exclude: [
        "src/**/*.d.ts",
        "src/types/**",
        "src/index.ts", // CLI entry point
        "src/env.ts",
        "src/**/index.ts", // Re-export modules
      ],

      thresholds: {
        branches: 70,
        functions: 80,
        lines: 80,
        statements: 80,
      },
    },

    // =========================================================================
    // Reporter Configuration
    // =========================================================================
    reporters: process.env["CI"] ? ["verbose"] : ["default"],

    // =========================================================================
    // Test Isolation and Cleanup
    // =========================================================================
    clearMocks: true,
    restoreMocks: true,

    // Randomize test order to catch order-dependent tests
    sequence: {
      shuffle: true,
    },

    watch: false,

    // =========================================================================
    // Console Output Handling
    // =========================================================================
    onConsoleLog(log, type) {
      // Keep expected error logging out of the test output
      if (type === "stderr" && log.includes("Error:")) {
        return false;
      }
      return true;
    },
  },
});
