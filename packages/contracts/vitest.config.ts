/**
 * Vitest Configuration - @issuedesk/contracts
 *
 * Pure TypeScript tests. No database, no cache, no network.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
