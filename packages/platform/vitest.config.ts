/**
 * Vitest Configuration — @curriflow/platform
 *
 * Unit tests for the workflow engine and its collaborators.
 * The Postgres audit sink is tested against a mocked connection;
 * nothing here needs a real database.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
