/**
 * Vitest Configuration - @issuedesk/platform
 *
 * Unit tests for the platform engine. Everything runs in process:
 * the in-memory data and cache stores stand in for Postgres and Redis.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
