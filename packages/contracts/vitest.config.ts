/**
 * Vitest Configuration — @curriflow/contracts
 *
 * Pure TypeScript tests. No DOM, no database, no network.
 * These tests validate the template schemas and shared vocabularies.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
