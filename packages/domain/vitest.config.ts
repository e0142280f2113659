/**
 * Vitest Configuration - @issuedesk/domain
 *
 * Tests for the resource actions, run against the in-memory data store.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: { LOG_LEVEL: "silent" },
  },
});
