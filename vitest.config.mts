// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest configuration for every package's unit tests.
 * Scope: Node environment, shared setup file. Tests need no network or database server.
 * Invariants: Coverage disabled by default; v8 provider when enabled.
 * Side-effects: file system (coverage reports written to ./coverage/ when enabled)
 * @public
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    setupFiles: ["./tests/setup.ts"],
    include: ["packages/*/tests/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist"],
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["lcov", "json-summary", "text", "html"],
      reportsDirectory: "coverage",
      exclude: ["node_modules/", "tests/", "dist/", "**/*.d.ts", "**/*.config.*", "**/index.ts"],
    },
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
});
