/**
 * Vitest Configuration — @curriflow/domain
 *
 * Tests for the built-in workflow templates and event subscribers.
 * Every built-in template must pass structural validation.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
