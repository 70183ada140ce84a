// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest test runner configuration for every workspace package.
 * Scope: Discovers tests under packages/<pkg>/tests and services/<svc>/tests. No infrastructure required.
 * Invariants:
 *   - Package tests only import their own package (plus workspace dependencies)
 *   - Workspace packages resolve to their TypeScript sources, no build step
 * Side-effects: none
 * Links: tsconfig.json
 * @public
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: [
      "packages/*/tests/**/*.{test,spec}.ts",
      "services/*/tests/**/*.{test,spec}.ts",
    ],
    exclude: ["node_modules", "dist"],
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
  resolve: {
    alias: {
      "@cronwork/cron-core": path.resolve(
        __dirname,
        "./packages/cron-core/src/index.ts"
      ),
    },
  },
});
