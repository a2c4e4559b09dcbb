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
    exclude: ["node_modules", "dist", "coverage"],

    // =========================================================================
    // Coverage Configuration
    // Enabled through `npm run test:coverage`
    // =========================================================================
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
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
        branches: 75,
        functions: 80,
        lines: 80,
        statements: 80,
      },
    },

    // =========================================================================
    // Test Isolation and Cleanup
    // =========================================================================
    clearMocks: true,
    restoreMocks: true,
    mockReset: true,

    // Randomize test order to catch order-dependent tests
    sequence: {
      shuffle: true,
    },

    watch: false,
  },
});
